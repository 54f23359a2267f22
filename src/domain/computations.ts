/**
 * Pure domain computations.
 * No React, no DB, no IO — only data in, data out.
 */
import {
  DEFAULT_CATEGORY,
  type Budget,
  type BudgetStatus,
  type CategoryTotal,
  type DailyNetSeries,
  type DashboardSummary,
  type Goal,
  type GoalProgress,
  type HealthBreakdown,
  type Month,
  type Period,
  type Transaction,
  type TransactionType,
} from './types.js';

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Round to 2 decimals from the exact binary value. Exact halves go to the
 * even cent (10.125 → 10.12); -0 is normalized to 0.
 */
export function round2(n: number): number {
  let rounded: number;
  // Only odd multiples of 1/8 sit exactly halfway between two cents
  const eighths = n * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const floor = Math.floor(n * 100);
    rounded = (floor % 2 === 0 ? floor : floor + 1) / 100;
  } else {
    rounded = Number(n.toFixed(2));
  }
  return rounded === 0 ? 0 : rounded;
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(n, max));
}

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}`;
}

/** Today as YYYY-MM-DD in local time */
export function today(now: Date = new Date()): string {
  return `${currentMonth(now)}-${pad2(now.getDate())}`;
}

/** Period prefix `YYYY-MM` used to match transaction dates */
export function periodPrefix(period: Period): Month {
  return `${String(period.year).padStart(4, '0')}-${pad2(period.month)}`;
}

function parseInteger(raw: string | undefined): number | null {
  if (raw === undefined || !INTEGER_RE.test(raw)) return null;
  return Number(raw.trim());
}

/**
 * Resolve the dashboard's month/year selector.
 * Both values must be present, integral and in range; anything else means
 * "this month".
 */
export function parsePeriod(
  monthRaw: string | undefined,
  yearRaw: string | undefined,
  now: Date = new Date(),
): Period {
  const fallback: Period = { month: now.getMonth() + 1, year: now.getFullYear() };
  if (!monthRaw || !yearRaw) return fallback;

  const month = parseInteger(monthRaw);
  const year = parseInteger(yearRaw);
  if (month === null || year === null) return fallback;
  if (month < 1 || month > 12 || year < 1 || year > 9999) return fallback;

  return { month, year };
}

/** Filter transactions to a single month (YYYY-MM) */
export function forMonth(txns: Transaction[], month: Month): Transaction[] {
  return txns.filter((t) => t.date.slice(0, 7) === month);
}

export function sumByType(txns: Transaction[], type: TransactionType): number {
  return txns
    .filter((t) => t.type === type)
    .reduce((sum, t) => sum + t.amount, 0);
}

/** Expense totals per category, in the order categories first appear */
export function expensesByCategory(txns: Transaction[]): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of txns) {
    if (t.type !== 'expense') continue;
    const category = t.category || DEFAULT_CATEGORY;
    map.set(category, (map.get(category) ?? 0) + t.amount);
  }
  return Array.from(map.entries()).map(([category, spent]) => ({ category, spent }));
}

/** Signed net cash flow per day, dates ascending */
export function dailyNet(txns: Transaction[]): DailyNetSeries {
  const daily = new Map<string, number>();
  for (const t of txns) {
    const sign = t.type === 'income' ? 1 : -1;
    daily.set(t.date, (daily.get(t.date) ?? 0) + sign * t.amount);
  }

  const labels = Array.from(daily.keys()).sort();
  return {
    labels,
    values: labels.map((d) => round2(daily.get(d) ?? 0)),
  };
}

export function totalSavings(goals: Goal[]): number {
  return goals.reduce((sum, g) => sum + g.current, 0);
}

/** Category → limit. A repeated category keeps its first position and last amount. */
export function budgetMap(budgets: Budget[]): Map<string, number> {
  const map = new Map<string, number>();
  for (const b of budgets) map.set(b.category, b.amount);
  return map;
}

const NO_HEALTH: HealthBreakdown = {
  spendEfficiency: 0,
  spentVsBudget: 0,
  budgetEfficiency: 0,
  savingRatio: 0,
  health: 0,
};

/**
 * Financial health, 0–100 for non-negative savings.
 *
 * health = 0.5 × spend efficiency + 0.3 × budget efficiency + 0.2 × saving ratio
 *
 * The saving ratio is capped at 100 but has no lower bound, so negative goal
 * balances pull the score below the other components.
 */
export function healthScore(
  income: number,
  expenses: number,
  byCategory: CategoryTotal[],
  limits: Map<string, number>,
  savings: number,
): HealthBreakdown {
  if (income <= 0) return { ...NO_HEALTH };

  const balance = income - expenses;
  const spendEfficiency = clamp((balance / income) * 100, 0, 100);

  const spentMap = new Map(byCategory.map((c) => [c.category, c.spent]));
  let totalLimit = 0;
  let spentVsBudget = 0;
  for (const [category, limit] of limits) {
    totalLimit += limit;
    spentVsBudget += Math.min(spentMap.get(category) ?? 0, limit);
  }
  const budgetEfficiency = totalLimit > 0 ? (spentVsBudget / totalLimit) * 100 : 100;

  const savingRatio = Math.min((savings / income) * 100, 100);

  return {
    spendEfficiency,
    spentVsBudget,
    budgetEfficiency,
    savingRatio,
    health: spendEfficiency * 0.5 + budgetEfficiency * 0.3 + savingRatio * 0.2,
  };
}

/** Full dashboard aggregation for one period */
export function dashboardSummary(
  txns: Transaction[],
  budgets: Budget[],
  goals: Goal[],
  period: Period,
): DashboardSummary {
  const month = periodPrefix(period);
  const monthTxns = forMonth(txns, month);

  const income = sumByType(monthTxns, 'income');
  const expenses = sumByType(monthTxns, 'expense');
  const byCategory = expensesByCategory(monthTxns);
  const savings = totalSavings(goals);
  const limits = budgetMap(budgets);

  return {
    period,
    month,
    income,
    expenses,
    balance: income - expenses,
    expensesByCategory: byCategory,
    dailyNet: dailyNet(monthTxns),
    totalSavings: savings,
    budgetMap: limits,
    health: healthScore(income, expenses, byCategory, limits, savings),
  };
}

export function goalProgress(goal: Goal): GoalProgress {
  const percent = goal.target > 0 ? (goal.current / goal.target) * 100 : 0;
  return { goal, percent };
}

/**
 * "Spent so far" per category for the budget page.
 * Always evaluated against the given month, never the dashboard selection.
 */
export function spendingByCategory(txns: Transaction[], month: Month): Map<string, number> {
  const spending = new Map<string, number>();
  for (const t of txns) {
    if (t.type !== 'expense' || !t.date.startsWith(month)) continue;
    const category = t.category || DEFAULT_CATEGORY;
    spending.set(category, (spending.get(category) ?? 0) + t.amount);
  }
  return spending;
}

/** Pair each budget with what was spent against it */
export function budgetStatuses(budgets: Budget[], spending: Map<string, number>): BudgetStatus[] {
  return budgets.map((b) => {
    const spent = spending.get(b.category) ?? 0;
    return {
      category: b.category,
      budgeted: b.amount,
      spent,
      remaining: b.amount - spent,
    };
  });
}

/** Years offered by the dashboard selector: 2023 through next year */
export function selectableYears(now: Date = new Date()): number[] {
  const last = Math.max(now.getFullYear() + 1, 2023);
  return Array.from({ length: last - 2023 + 1 }, (_, i) => 2023 + i);
}
