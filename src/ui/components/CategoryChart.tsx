import { arc, pie, schemeTableau10, type PieArcDatum } from 'd3';
import { formatMoney } from '../../domain/format.js';
import type { CategoryTotal } from '../../domain/types.js';

const SIZE = 220;
const RADIUS = SIZE / 2;

interface CategoryChartProps {
  totals: CategoryTotal[];
  currency: string;
}

/** Donut of expenses per category, slices in first-seen order */
export function CategoryChart({ totals, currency }: CategoryChartProps) {
  const nonZero = totals.filter((t) => t.spent > 0);
  if (nonZero.length === 0) {
    return (
      <section className="chart-card" aria-label="Expenses by category">
        <h3>Expenses by category</h3>
        <p className="no-data">No expenses this month</p>
      </section>
    );
  }

  const slices = pie<CategoryTotal>().value((d) => d.spent).sort(null)(nonZero);
  const sliceArc = arc<PieArcDatum<CategoryTotal>>().innerRadius(RADIUS * 0.55).outerRadius(RADIUS - 2);
  const color = (i: number) => schemeTableau10[i % schemeTableau10.length];

  return (
    <section className="chart-card" aria-label="Expenses by category">
      <h3>Expenses by category</h3>
      <svg width={SIZE} height={SIZE} viewBox={`${-RADIUS} ${-RADIUS} ${SIZE} ${SIZE}`} role="img">
        {slices.map((s, i) => (
          <path key={s.data.category} d={sliceArc(s) ?? ''} fill={color(i)}>
            <title>{`${s.data.category}: ${formatMoney(s.data.spent, currency)}`}</title>
          </path>
        ))}
      </svg>
      <ul className="chart-legend">
        {slices.map((s, i) => (
          <li key={s.data.category}>
            <span className="legend-swatch" style={{ background: color(i) }} />
            {s.data.category}: {formatMoney(s.data.spent, currency)}
          </li>
        ))}
      </ul>
    </section>
  );
}
