import { scaleBand, scaleLinear } from 'd3';
import type { DailyNetSeries } from '../../domain/types.js';

const WIDTH = 640;
const HEIGHT = 200;
const MARGIN = { top: 10, right: 10, bottom: 24, left: 48 };

interface DailyNetChartProps {
  series: DailyNetSeries;
}

export function DailyNetChart({ series }: DailyNetChartProps) {
  if (series.labels.length === 0) {
    return (
      <section className="chart-card" aria-label="Daily cash flow">
        <h3>Daily cash flow</h3>
        <p className="no-data">No transactions this month</p>
      </section>
    );
  }

  const x = scaleBand<string>()
    .domain(series.labels)
    .range([MARGIN.left, WIDTH - MARGIN.right])
    .padding(0.2);

  const lo = Math.min(0, ...series.values);
  const hi = Math.max(0, ...series.values);
  const y = scaleLinear()
    .domain([lo, hi === lo ? lo + 1 : hi])
    .nice()
    .range([HEIGHT - MARGIN.bottom, MARGIN.top]);

  const zero = y(0);
  const ticks = y.ticks(4);

  return (
    <section className="chart-card" aria-label="Daily cash flow">
      <h3>Daily cash flow</h3>
      <svg width="100%" viewBox={`0 0 ${WIDTH} ${HEIGHT}`} role="img">
        {ticks.map((t) => (
          <g key={t} className="tick">
            <line x1={MARGIN.left} x2={WIDTH - MARGIN.right} y1={y(t)} y2={y(t)} />
            <text x={MARGIN.left - 6} y={y(t)} textAnchor="end" dominantBaseline="middle">
              {t}
            </text>
          </g>
        ))}
        {series.labels.map((label, i) => {
          const value = series.values[i] ?? 0;
          const top = Math.min(y(value), zero);
          return (
            <rect
              key={label}
              className={value >= 0 ? 'bar positive' : 'bar negative'}
              x={x(label) ?? 0}
              y={top}
              width={x.bandwidth()}
              height={Math.abs(y(value) - zero)}
            >
              <title>{`${label}: ${value}`}</title>
            </rect>
          );
        })}
        <line className="zero-line" x1={MARGIN.left} x2={WIDTH - MARGIN.right} y1={zero} y2={zero} />
        {series.labels.map((label) => (
          <text
            key={label}
            className="x-label"
            x={(x(label) ?? 0) + x.bandwidth() / 2}
            y={HEIGHT - 6}
            textAnchor="middle"
          >
            {label.slice(8, 10)}
          </text>
        ))}
      </svg>
    </section>
  );
}
