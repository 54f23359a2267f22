import type { BudgetStatus, FlashMessage, User } from '../../domain/types.js';
import { BudgetCard } from '../components/BudgetCard.js';
import { Layout } from '../components/Layout.js';

interface BudgetScreenProps {
  user: User;
  flash: FlashMessage[];
  statuses: BudgetStatus[];
  monthLabel: string;
}

export function BudgetScreen({ user, flash, statuses, monthLabel }: BudgetScreenProps) {
  return (
    <Layout title="Budget" flash={flash} user={user} active="budget">
      <h1>Budget</h1>
      <p className="hint">Spending so far in {monthLabel}</p>

      <section className="card">
        <h2>Set a category limit</h2>
        <form className="entry-form" method="post" action="/save_budget">
          <input name="category" placeholder="Category" required />
          <input name="amount" placeholder="Limit" inputMode="decimal" required />
          <button type="submit">Save</button>
        </form>
      </section>

      {statuses.length === 0 ? (
        <p className="no-data">No budgets yet</p>
      ) : (
        <div className="budget-list">
          {statuses.map((s) => (
            <BudgetCard key={s.category} status={s} currency={user.currency} />
          ))}
        </div>
      )}
    </Layout>
  );
}
