import { formatMoney } from '../../domain/format.js';
import type { BudgetStatus } from '../../domain/types.js';

interface BudgetCardProps {
  status: BudgetStatus;
  currency: string;
}

export function BudgetCard({ status, currency }: BudgetCardProps) {
  const pct = status.budgeted > 0
    ? Math.min((status.spent / status.budgeted) * 100, 100)
    : 0;
  const isOver = status.remaining < 0;
  const deleteAction = `/delete_budget/${encodeURIComponent(status.category)}`;

  return (
    <div className={`budget-card ${isOver ? 'over' : ''}`}>
      <div className="budget-header">
        <span className="budget-category">{status.category}</span>
        <span className={`budget-remaining ${isOver ? 'negative' : ''}`}>
          {isOver ? 'Over by ' : 'Left '}{formatMoney(Math.abs(status.remaining), currency)}
        </span>
      </div>
      <div className="budget-bar-track">
        <div
          className={`budget-bar-fill ${isOver ? 'over' : ''}`}
          style={{ width: `${pct}%` }}
        />
      </div>
      <div className="budget-detail">
        {formatMoney(status.spent, currency)} / {formatMoney(status.budgeted, currency)}
      </div>

      <form className="inline-form" method="post" action="/update_budget">
        <input type="hidden" name="old_category" value={status.category} />
        <input name="category" defaultValue={status.category} aria-label="Category" required />
        <input name="amount" defaultValue={String(status.budgeted)} aria-label="Limit" inputMode="decimal" required />
        <button type="submit">Update</button>
      </form>
      <form className="inline-form" method="post" action={deleteAction}>
        <button type="submit" className="danger">Delete</button>
      </form>
    </div>
  );
}
