/**
 * Repository layer: prepared statements over the SQLite schema.
 *
 * Rows come back as domain objects (camelCase). Lookups by id are global;
 * callers check ownership with assertOwns before touching a row.
 */
import type { Db, BudgetRow, GoalRow, TransactionRow, UserRow } from './db.js';
import { today } from '../../src/domain/computations.js';
import type { Budget, Goal, Transaction, TransactionType, User } from '../../src/domain/types.js';

export interface UserInput {
  name: string;
  username: string;
  passwordHash: string;
  currency: string;
}

export type TransactionInput = Omit<Transaction, 'id'>;
export type GoalInput = Omit<Goal, 'id'>;
export type GoalChanges = Pick<Goal, 'name' | 'target' | 'current' | 'deadline'>;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    username: row.username,
    passwordHash: row.password,
    currency: row.currency,
    created: row.created,
  };
}

function toTransactionType(raw: string): TransactionType {
  return raw === 'income' ? 'income' : 'expense';
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    userId: row.user_id,
    type: toTransactionType(row.type),
    category: row.category,
    amount: row.amount,
    paymentMethod: row.payment_method,
    date: row.date,
    description: row.description,
  };
}

function toBudget(row: BudgetRow): Budget {
  return { id: row.id, userId: row.user_id, category: row.category, amount: row.amount };
}

function toGoal(row: GoalRow): Goal {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    target: row.target,
    current: row.current,
    deadline: row.deadline,
  };
}

export function createRepository(db: Db) {
  const stmts = {
    userById: db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?'),
    userByUsername: db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?'),
    insertUser: db.prepare<[string, string, string, string, string]>(
      'INSERT INTO users (name, username, password, currency, created) VALUES (?, ?, ?, ?, ?)',
    ),
    deleteUser: db.prepare<[number]>('DELETE FROM users WHERE id = ?'),

    transactionsByUser: db.prepare<[number], TransactionRow>(`
      SELECT * FROM transactions
      WHERE user_id = ?
      ORDER BY date DESC, id DESC
    `),
    transactionsByUserInserted: db.prepare<[number], TransactionRow>(
      'SELECT * FROM transactions WHERE user_id = ? ORDER BY id ASC',
    ),
    transactionById: db.prepare<[number], TransactionRow>('SELECT * FROM transactions WHERE id = ?'),
    insertTransaction: db.prepare<[number, string, string, number, string, string, string]>(`
      INSERT INTO transactions (user_id, type, category, amount, payment_method, date, description)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `),
    deleteTransaction: db.prepare<[number]>('DELETE FROM transactions WHERE id = ?'),

    budgetsByUser: db.prepare<[number], BudgetRow>('SELECT * FROM budgets WHERE user_id = ? ORDER BY id ASC'),
    budgetByCategory: db.prepare<[number, string], BudgetRow>(
      'SELECT * FROM budgets WHERE user_id = ? AND category = ? ORDER BY id ASC LIMIT 1',
    ),
    insertBudget: db.prepare<[number, string, number]>(
      'INSERT INTO budgets (user_id, category, amount) VALUES (?, ?, ?)',
    ),
    updateBudget: db.prepare<[string, number, number]>(
      'UPDATE budgets SET category = ?, amount = ? WHERE id = ?',
    ),
    deleteBudget: db.prepare<[number]>('DELETE FROM budgets WHERE id = ?'),

    goalsByUser: db.prepare<[number], GoalRow>('SELECT * FROM goals WHERE user_id = ? ORDER BY id ASC'),
    goalById: db.prepare<[number], GoalRow>('SELECT * FROM goals WHERE id = ?'),
    insertGoal: db.prepare<[number, string, number, number, string | null]>(
      'INSERT INTO goals (user_id, name, target, current, deadline) VALUES (?, ?, ?, ?, ?)',
    ),
    updateGoal: db.prepare<[string, number, number, string | null, number]>(
      'UPDATE goals SET name = ?, target = ?, current = ?, deadline = ? WHERE id = ?',
    ),
    deleteGoal: db.prepare<[number]>('DELETE FROM goals WHERE id = ?'),
  };

  return {
    // --- Users ---

    findUserById(id: number): User | undefined {
      const row = stmts.userById.get(id);
      return row ? toUser(row) : undefined;
    },

    findUserByUsername(username: string): User | undefined {
      const row = stmts.userByUsername.get(username);
      return row ? toUser(row) : undefined;
    },

    createUser(input: UserInput): User {
      const result = stmts.insertUser.run(
        input.name, input.username, input.passwordHash, input.currency, today(),
      );
      const row = stmts.userById.get(Number(result.lastInsertRowid));
      if (!row) throw new Error('User vanished after insert');
      return toUser(row);
    },

    /** Removes the user; transactions, budgets and goals cascade */
    deleteUser(id: number): boolean {
      return stmts.deleteUser.run(id).changes > 0;
    },

    // --- Transactions ---

    /** Newest first, for display */
    listTransactions(userId: number): Transaction[] {
      return stmts.transactionsByUser.all(userId).map(toTransaction);
    },

    /** Insertion order; aggregations rely on it for first-seen category order */
    listTransactionsInserted(userId: number): Transaction[] {
      return stmts.transactionsByUserInserted.all(userId).map(toTransaction);
    },

    findTransaction(id: number): Transaction | undefined {
      const row = stmts.transactionById.get(id);
      return row ? toTransaction(row) : undefined;
    },

    createTransaction(input: TransactionInput): Transaction {
      const result = stmts.insertTransaction.run(
        input.userId, input.type, input.category, input.amount,
        input.paymentMethod, input.date, input.description,
      );
      return { id: Number(result.lastInsertRowid), ...input };
    },

    deleteTransaction(id: number): void {
      stmts.deleteTransaction.run(id);
    },

    // --- Budgets ---

    listBudgets(userId: number): Budget[] {
      return stmts.budgetsByUser.all(userId).map(toBudget);
    },

    findBudgetByCategory(userId: number, category: string): Budget | undefined {
      const row = stmts.budgetByCategory.get(userId, category);
      return row ? toBudget(row) : undefined;
    },

    /** Update-if-exists keeps one budget per (user, category) */
    saveBudget(userId: number, category: string, amount: number): 'created' | 'updated' {
      const existing = stmts.budgetByCategory.get(userId, category);
      if (existing) {
        stmts.updateBudget.run(existing.category, amount, existing.id);
        return 'updated';
      }
      stmts.insertBudget.run(userId, category, amount);
      return 'created';
    },

    updateBudget(id: number, category: string, amount: number): void {
      stmts.updateBudget.run(category, amount, id);
    },

    deleteBudget(id: number): void {
      stmts.deleteBudget.run(id);
    },

    // --- Goals ---

    listGoals(userId: number): Goal[] {
      return stmts.goalsByUser.all(userId).map(toGoal);
    },

    findGoal(id: number): Goal | undefined {
      const row = stmts.goalById.get(id);
      return row ? toGoal(row) : undefined;
    },

    createGoal(input: GoalInput): Goal {
      const result = stmts.insertGoal.run(
        input.userId, input.name, input.target, input.current, input.deadline,
      );
      return { id: Number(result.lastInsertRowid), ...input };
    },

    updateGoal(id: number, changes: GoalChanges): void {
      stmts.updateGoal.run(changes.name, changes.target, changes.current, changes.deadline, id);
    },

    deleteGoal(id: number): void {
      stmts.deleteGoal.run(id);
    },
  };
}

export type Repository = ReturnType<typeof createRepository>;
