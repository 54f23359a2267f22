import { formatPercent } from '../../domain/format.js';
import type { HealthBreakdown } from '../../domain/types.js';

type HealthTone = 'positive' | 'warning' | 'danger';

function toneFor(health: number): HealthTone {
  if (health >= 70) return 'positive';
  if (health >= 40) return 'warning';
  return 'danger';
}

interface HealthCardProps {
  breakdown: HealthBreakdown;
  hasIncome: boolean;
}

export function HealthCard({ breakdown, hasIncome }: HealthCardProps) {
  const tone = toneFor(breakdown.health);
  const width = Math.max(0, Math.min(breakdown.health, 100));

  return (
    <section className={`health-card ${tone}`} aria-label="Financial health">
      <h3>Financial health</h3>
      <p className="health-score">{breakdown.health.toFixed(0)}</p>
      <div className="health-bar-track">
        <div className="health-bar-fill" style={{ width: `${width}%` }} />
      </div>
      {hasIncome ? (
        <dl className="health-breakdown">
          <dt>Spending efficiency (50%)</dt>
          <dd>{formatPercent(breakdown.spendEfficiency)}</dd>
          <dt>Budget use (30%)</dt>
          <dd>{formatPercent(breakdown.budgetEfficiency)}</dd>
          <dt>Savings ratio (20%)</dt>
          <dd>{formatPercent(breakdown.savingRatio)}</dd>
        </dl>
      ) : (
        <p className="no-data">Record some income this month to get a score.</p>
      )}
    </section>
  );
}
