import type { FlashMessage, GoalProgress, User } from '../../domain/types.js';
import { GoalCard } from '../components/GoalCard.js';
import { Layout } from '../components/Layout.js';

interface SavingsScreenProps {
  user: User;
  flash: FlashMessage[];
  goals: GoalProgress[];
}

export function SavingsScreen({ user, flash, goals }: SavingsScreenProps) {
  return (
    <Layout title="Savings" flash={flash} user={user} active="savings">
      <h1>Savings goals</h1>

      <section className="card">
        <h2>New goal</h2>
        <form className="entry-form" method="post" action="/add_savings">
          <input name="name" placeholder="Name" required />
          <input name="target" placeholder="Target" inputMode="decimal" required />
          <input name="current" placeholder="Already saved" inputMode="decimal" defaultValue="0" />
          <input name="deadline" type="date" aria-label="Deadline" />
          <button type="submit">Add</button>
        </form>
      </section>

      {goals.length === 0 ? (
        <p className="no-data">No goals yet</p>
      ) : (
        <div className="goal-list">
          {goals.map((g) => (
            <GoalCard key={g.goal.id} progress={g} currency={user.currency} />
          ))}
        </div>
      )}

      <section className="card danger-zone">
        <h2>Account</h2>
        <form method="post" action="/delete_account">
          <button type="submit" className="danger">Delete my account and all data</button>
        </form>
      </section>
    </Layout>
  );
}
