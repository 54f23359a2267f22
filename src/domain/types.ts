/**
 * Domain types for the ledger.
 * Pure data — no React, no DB, no IO.
 */

export type TransactionType = 'income' | 'expense';

export const TRANSACTION_TYPES: readonly TransactionType[] = ['income', 'expense'];

/** Category used when a transaction or expense has none */
export const DEFAULT_CATEGORY = 'Other';

export interface User {
  id: number;
  name: string;
  username: string;
  passwordHash: string;
  currency: string;            // ISO code, e.g. "UAH"
  created: string;             // YYYY-MM-DD
}

export interface Transaction {
  id: number;
  userId: number;
  type: TransactionType;
  category: string;
  amount: number;              // non-negative; sign comes from type
  paymentMethod: string;
  date: string;                // YYYY-MM-DD
  description: string;
}

/** Spending limit for one category (not per month) */
export interface Budget {
  id: number;
  userId: number;
  category: string;
  amount: number;
}

export interface Goal {
  id: number;
  userId: number;
  name: string;
  target: number;
  current: number;             // may exceed target
  deadline: string | null;     // YYYY-MM-DD
}

/** Anything that belongs to exactly one user */
export interface Owned {
  userId: number;
}

/** Selected dashboard month */
export interface Period {
  month: number;               // 1–12
  year: number;
}

/** YYYY-MM string */
export type Month = string;

export interface CategoryTotal {
  category: string;
  spent: number;
}

export interface DailyNetSeries {
  labels: string[];            // YYYY-MM-DD, ascending
  values: number[];            // rounded to 2 decimals
}

export interface HealthBreakdown {
  spendEfficiency: number;
  spentVsBudget: number;
  budgetEfficiency: number;
  savingRatio: number;
  health: number;
}

/** Everything the dashboard shows for one period */
export interface DashboardSummary {
  period: Period;
  month: Month;
  income: number;
  expenses: number;
  balance: number;
  expensesByCategory: CategoryTotal[];   // first-seen order
  dailyNet: DailyNetSeries;
  totalSavings: number;
  budgetMap: Map<string, number>;
  health: HealthBreakdown;
}

export interface BudgetStatus {
  category: string;
  budgeted: number;
  spent: number;
  remaining: number;           // can be negative (overspent)
}

export interface GoalProgress {
  goal: Goal;
  percent: number;             // not clamped to 100
}

export type FlashLevel = 'success' | 'info' | 'warning' | 'danger';

export interface FlashMessage {
  level: FlashLevel;
  text: string;
}
