import { describe, expect, it } from 'vitest';
import {
  budgetMap,
  budgetStatuses,
  currentMonth,
  dailyNet,
  dashboardSummary,
  expensesByCategory,
  forMonth,
  goalProgress,
  healthScore,
  parsePeriod,
  periodPrefix,
  round2,
  selectableYears,
  spendingByCategory,
  today,
} from './computations.js';
import type { Budget, Goal, Transaction } from './types.js';

// --- Test data factories ---

let nextId = 1;

function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: nextId++,
    userId: 1,
    type: 'expense',
    amount: 100,
    category: 'Food',
    paymentMethod: 'Cash',
    date: '2024-05-15',
    description: 'test',
    ...overrides,
  };
}

function makeBudget(category: string, amount: number): Budget {
  return { id: nextId++, userId: 1, category, amount };
}

function makeGoal(current: number, target = 1000): Goal {
  return { id: nextId++, userId: 1, name: 'Goal', target, current, deadline: null };
}

const MAY_2024 = { month: 5, year: 2024 };

describe('dashboardSummary', () => {
  it('reproduces the reference health scenario', () => {
    const txns = [
      makeTxn({ type: 'income', amount: 1000, category: 'Salary', date: '2024-05-02' }),
      makeTxn({ amount: 200, category: 'food', date: '2024-05-03' }),
      makeTxn({ amount: 100, category: 'food', date: '2024-05-10' }),
    ];
    const s = dashboardSummary(txns, [makeBudget('food', 250)], [makeGoal(100)], MAY_2024);

    expect(s.month).toBe('2024-05');
    expect(s.income).toBe(1000);
    expect(s.expenses).toBe(300);
    expect(s.balance).toBe(700);
    expect(s.totalSavings).toBe(100);
    expect(s.expensesByCategory).toEqual([{ category: 'food', spent: 300 }]);
    expect(s.health.spendEfficiency).toBeCloseTo(70, 10);
    expect(s.health.spentVsBudget).toBe(250);
    expect(s.health.budgetEfficiency).toBe(100);
    expect(s.health.savingRatio).toBeCloseTo(10, 10);
    expect(s.health.health).toBeCloseTo(67, 10);
  });

  it('only counts transactions from the selected month', () => {
    const txns = [
      makeTxn({ type: 'income', amount: 500, date: '2024-05-31' }),
      makeTxn({ type: 'income', amount: 900, date: '2024-06-01' }),
      makeTxn({ amount: 40, date: '2024-04-30' }),
    ];
    const s = dashboardSummary(txns, [], [], MAY_2024);
    expect(s.income).toBe(500);
    expect(s.expenses).toBe(0);
    expect(s.dailyNet.labels).toEqual(['2024-05-31']);
  });

  it('keeps balance equal to income minus expenses', () => {
    const amounts = [12.5, 7.25, 300, 0.1, 0.2, 45];
    const txns = amounts.map((amount, i) => makeTxn({
      type: i % 2 === 0 ? 'income' : 'expense',
      amount,
      date: `2024-05-${String(i + 1).padStart(2, '0')}`,
    }));
    const s = dashboardSummary(txns, [], [], MAY_2024);
    expect(s.balance).toBe(s.income - s.expenses);
  });

  it('does not period-filter goals or budgets', () => {
    const s = dashboardSummary([], [makeBudget('Rent', 800)], [makeGoal(40), makeGoal(60)], MAY_2024);
    expect(s.totalSavings).toBe(100);
    expect(Array.from(s.budgetMap.entries())).toEqual([['Rent', 800]]);
  });
});

describe('healthScore', () => {
  it('is zero without income', () => {
    const h = healthScore(0, 50, [{ category: 'Food', spent: 50 }], new Map([['Food', 100]]), 500);
    expect(h).toEqual({
      spendEfficiency: 0,
      spentVsBudget: 0,
      budgetEfficiency: 0,
      savingRatio: 0,
      health: 0,
    });
  });

  it('treats no budgets as full budget efficiency', () => {
    const h = healthScore(1000, 500, [{ category: 'Food', spent: 500 }], new Map(), 0);
    expect(h.budgetEfficiency).toBe(100);
    // 0.5 × 50 + 0.3 × 100 + 0.2 × 0
    expect(h.health).toBe(55);
  });

  it('treats budgets that sum to zero as full budget efficiency', () => {
    const h = healthScore(1000, 0, [], new Map([['Food', 0]]), 0);
    expect(h.budgetEfficiency).toBe(100);
  });

  it('clamps spend efficiency at zero when overspending', () => {
    const h = healthScore(100, 300, [], new Map(), 0);
    expect(h.spendEfficiency).toBe(0);
    expect(h.health).toBe(30);
  });

  it('caps the saving ratio at 100', () => {
    const h = healthScore(1000, 0, [], new Map(), 5000);
    expect(h.savingRatio).toBe(100);
    expect(h.health).toBe(100);
  });

  it('lets negative savings drag the score down', () => {
    const h = healthScore(1000, 0, [], new Map(), -500);
    expect(h.savingRatio).toBe(-50);
    // 0.5 × 100 + 0.3 × 100 + 0.2 × −50
    expect(h.health).toBe(70);
  });

  it('counts at most the limit per budget category', () => {
    const byCategory = [
      { category: 'Food', spent: 400 },
      { category: 'Fun', spent: 50 },
    ];
    const limits = new Map([['Food', 300], ['Fun', 100], ['Rent', 100]]);
    const h = healthScore(2000, 450, byCategory, limits, 0);
    // min(400, 300) + min(50, 100) + min(0, 100)
    expect(h.spentVsBudget).toBe(350);
    expect(h.budgetEfficiency).toBe(70);
  });
});

describe('expensesByCategory', () => {
  it('groups in first-seen order and defaults blank categories', () => {
    const txns = [
      makeTxn({ category: 'Transport', amount: 10 }),
      makeTxn({ category: '', amount: 5 }),
      makeTxn({ type: 'income', category: 'Salary', amount: 999 }),
      makeTxn({ category: 'Food', amount: 7 }),
      makeTxn({ category: 'Transport', amount: 3 }),
    ];
    expect(expensesByCategory(txns)).toEqual([
      { category: 'Transport', spent: 13 },
      { category: 'Other', spent: 5 },
      { category: 'Food', spent: 7 },
    ]);
  });
});

describe('dailyNet', () => {
  it('sorts dates and signs amounts by type', () => {
    const txns = [
      makeTxn({ date: '2024-05-03', amount: 20 }),
      makeTxn({ type: 'income', date: '2024-05-01', amount: 50 }),
    ];
    expect(dailyNet(txns)).toEqual({
      labels: ['2024-05-01', '2024-05-03'],
      values: [50, -20],
    });
  });

  it('nets several transactions on one day and rounds to cents', () => {
    const txns = [
      makeTxn({ type: 'income', date: '2024-05-07', amount: 0.1 }),
      makeTxn({ type: 'income', date: '2024-05-07', amount: 0.2 }),
    ];
    expect(dailyNet(txns).values).toEqual([0.3]);
  });

  it('rounds a half-cent day to the even cent', () => {
    expect(dailyNet([makeTxn({ type: 'income', amount: 10.125 })]).values).toEqual([10.12]);
  });

  it('is empty without transactions', () => {
    expect(dailyNet([])).toEqual({ labels: [], values: [] });
  });
});

describe('round2', () => {
  it('rounds exact halves to the even cent', () => {
    expect(round2(10.125)).toBe(10.12);
    expect(round2(0.375)).toBe(0.38);
    expect(round2(-0.125)).toBe(-0.12);
  });

  it('rounds from the stored binary value', () => {
    // 1.005 and 2.675 are stored slightly below the half
    expect(round2(1.005)).toBe(1);
    expect(round2(2.675)).toBe(2.67);
    expect(round2(0.1 + 0.2)).toBe(0.3);
  });

  it('normalizes negative zero', () => {
    expect(round2(-0.001)).toBe(0);
  });
});

describe('forMonth', () => {
  it('filters by the YYYY-MM prefix', () => {
    const txns = [
      makeTxn({ date: '2025-01-15' }),
      makeTxn({ date: '2025-02-01' }),
      makeTxn({ date: '2025-01-31' }),
    ];
    expect(forMonth(txns, '2025-01')).toHaveLength(2);
  });
});

describe('parsePeriod', () => {
  const now = new Date(2025, 0, 15);

  it('accepts an in-range month and year', () => {
    expect(parsePeriod('3', '2024', now)).toEqual({ month: 3, year: 2024 });
    expect(parsePeriod(' 7 ', '2025', now)).toEqual({ month: 7, year: 2025 });
  });

  it('falls back to the current month for missing or bad input', () => {
    const fallback = { month: 1, year: 2025 };
    expect(parsePeriod(undefined, '2024', now)).toEqual(fallback);
    expect(parsePeriod('3', undefined, now)).toEqual(fallback);
    expect(parsePeriod('abc', '2024', now)).toEqual(fallback);
    expect(parsePeriod('3.5', '2024', now)).toEqual(fallback);
    expect(parsePeriod('13', '2024', now)).toEqual(fallback);
    expect(parsePeriod('0', '2024', now)).toEqual(fallback);
    expect(parsePeriod('3', '0', now)).toEqual(fallback);
  });
});

describe('periodPrefix', () => {
  it('zero-pads month and year', () => {
    expect(periodPrefix({ month: 3, year: 2024 })).toBe('2024-03');
    expect(periodPrefix({ month: 11, year: 999 })).toBe('0999-11');
  });
});

describe('goalProgress', () => {
  it('is current over target as a percentage', () => {
    expect(goalProgress(makeGoal(50, 200)).percent).toBe(25);
  });

  it('is zero for a zero target', () => {
    expect(goalProgress(makeGoal(50, 0)).percent).toBe(0);
  });

  it('is not clamped at 100', () => {
    expect(goalProgress(makeGoal(300, 200)).percent).toBe(150);
  });
});

describe('budget spending', () => {
  it('sums only this month\'s expenses per category', () => {
    const txns = [
      makeTxn({ category: 'Food', amount: 30, date: '2024-05-02' }),
      makeTxn({ category: 'Food', amount: 20, date: '2024-05-20' }),
      makeTxn({ category: 'Food', amount: 99, date: '2024-06-01' }),
      makeTxn({ type: 'income', category: 'Food', amount: 500, date: '2024-05-02' }),
      makeTxn({ category: 'Fun', amount: 15, date: '2024-05-09' }),
    ];
    const spending = spendingByCategory(txns, '2024-05');
    expect(Array.from(spending.entries())).toEqual([['Food', 50], ['Fun', 15]]);
  });

  it('reports remaining per budget, negative when overspent', () => {
    const spending = new Map([['Food', 120]]);
    const statuses = budgetStatuses([makeBudget('Food', 100), makeBudget('Rent', 800)], spending);
    expect(statuses).toEqual([
      { category: 'Food', budgeted: 100, spent: 120, remaining: -20 },
      { category: 'Rent', budgeted: 800, spent: 0, remaining: 800 },
    ]);
  });

  it('keeps the last limit for a repeated category', () => {
    const map = budgetMap([makeBudget('food', 100), makeBudget('rent', 500), makeBudget('food', 150)]);
    expect(Array.from(map.entries())).toEqual([['food', 150], ['rent', 500]]);
  });
});

describe('calendar helpers', () => {
  it('formats the current month and day', () => {
    expect(currentMonth(new Date(2025, 0, 15))).toBe('2025-01');
    expect(currentMonth(new Date(2025, 11, 1))).toBe('2025-12');
    expect(today(new Date(2025, 2, 9))).toBe('2025-03-09');
  });

  it('offers years from 2023 through next year', () => {
    expect(selectableYears(new Date(2025, 5, 1))).toEqual([2023, 2024, 2025, 2026]);
  });
});
