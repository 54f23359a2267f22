import { formatMoney, formatPercent } from '../../domain/format.js';
import type { GoalProgress } from '../../domain/types.js';

interface GoalCardProps {
  progress: GoalProgress;
  currency: string;
}

export function GoalCard({ progress, currency }: GoalCardProps) {
  const { goal, percent } = progress;
  const reached = percent >= 100;

  return (
    <div className={`goal-card ${reached ? 'reached' : ''}`}>
      <div className="goal-header">
        <span className="goal-name">{goal.name}</span>
        <span className="goal-percent">{formatPercent(percent)}</span>
      </div>
      <div className="budget-bar-track">
        <div className="goal-bar-fill" style={{ width: `${Math.min(percent, 100)}%` }} />
      </div>
      <div className="goal-detail">
        {formatMoney(goal.current, currency)} / {formatMoney(goal.target, currency)}
        {goal.deadline && <span className="goal-deadline"> · by {goal.deadline}</span>}
      </div>

      <form className="inline-form" method="post" action={`/update_goal/${goal.id}`}>
        <input name="name" defaultValue={goal.name} aria-label="Name" />
        <input name="target" defaultValue={String(goal.target)} aria-label="Target" inputMode="decimal" />
        <input name="current" defaultValue={String(goal.current)} aria-label="Saved" inputMode="decimal" />
        <input name="deadline" type="date" defaultValue={goal.deadline ?? ''} aria-label="Deadline" />
        <button type="submit">Update</button>
      </form>
      <form className="inline-form" method="post" action={`/delete_goal/${goal.id}`}>
        <button type="submit" className="danger">Delete</button>
      </form>
    </div>
  );
}
