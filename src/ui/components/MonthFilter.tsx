import { monthName } from '../../domain/format.js';
import type { Period } from '../../domain/types.js';

interface MonthFilterProps {
  value: Period;
  years: number[];
}

/** Plain GET form; the dashboard re-renders for the chosen month */
export function MonthFilter({ value, years }: MonthFilterProps) {
  const months = Array.from({ length: 12 }, (_, i) => i + 1);

  return (
    <form className="month-filter" method="get" action="/dashboard">
      <label htmlFor="month-select">Month: </label>
      <select id="month-select" name="month" defaultValue={String(value.month)}>
        {months.map((m) => (
          <option key={m} value={m}>
            {monthName(m)}
          </option>
        ))}
      </select>
      <select name="year" defaultValue={String(value.year)} aria-label="Year">
        {years.map((y) => (
          <option key={y} value={y}>
            {y}
          </option>
        ))}
      </select>
      <button type="submit">Show</button>
    </form>
  );
}
