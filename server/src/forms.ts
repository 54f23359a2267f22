/**
 * Form parsing. Every POST body goes through one of these schemas before
 * anything is written; the first failing field decides the notice shown.
 */
import { z } from 'zod';
import { DEFAULT_CATEGORY } from '../../src/domain/types.js';

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a user-typed number. Comma and dot are both decimal separators.
 * Returns null for blanks and anything that is not a finite decimal.
 */
export function parseNumber(raw: string | undefined | null): number | null {
  const cleaned = (raw ?? '').trim().replace(/,/g, '.');
  if (!DECIMAL_RE.test(cleaned)) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

function decimal(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .transform((raw, ctx) => {
      const n = parseNumber(raw);
      if (n === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
        return z.NEVER;
      }
      return n;
    });
}

/** Blank or missing → undefined, otherwise trimmed */
const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

function requiredText(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .trim()
    .min(1, message);
}

export const loginSchema = z.object({
  username: z.string().default(''),
  password: z.string().default(''),
});

export const registerSchema = z.object({
  name: optionalText.transform((v) => v ?? ''),
  username: requiredText('Username is required!'),
  password: z.string({ required_error: 'Password is required!' }).min(1, 'Password is required!'),
  currency: optionalText.transform((v) => (v ?? 'UAH').toUpperCase()),
});

export const transactionSchema = z
  .object({
    amount: decimal('Transaction amount must be a number!').refine((n) => n >= 0, {
      message: 'Transaction amount cannot be negative!',
    }),
    type: z.enum(['income', 'expense'], {
      errorMap: () => ({ message: 'Transaction type must be income or expense!' }),
    }),
    category_select: optionalText,
    category: optionalText,
    payment: optionalText,
    date: optionalText.refine((v) => v === undefined || DATE_RE.test(v), {
      message: 'Date must look like YYYY-MM-DD!',
    }),
    description: optionalText,
  })
  .transform((f) => ({
    type: f.type,
    amount: f.amount,
    // The dropdown wins over the free-text field
    category: f.category_select ?? f.category ?? DEFAULT_CATEGORY,
    paymentMethod: f.payment ?? 'Cash',
    date: f.date,
    description: f.description ?? '',
  }));

export const budgetSchema = z.object({
  category: requiredText('Budget category is required!'),
  amount: decimal('Budget amount must be a number!'),
});

export const budgetUpdateSchema = budgetSchema.extend({
  old_category: z.string().default(''),
});

const GOAL_AMOUNT_MESSAGE = 'Goal amounts must be numbers!';

export const goalSchema = z.object({
  name: requiredText('Goal name is required!'),
  target: decimal(GOAL_AMOUNT_MESSAGE),
  current: decimal(GOAL_AMOUNT_MESSAGE).optional().transform((v) => v ?? 0),
  deadline: optionalText.transform((v) => v ?? null),
});

/**
 * Goal edits: absent fields keep the stored values. A number field that is
 * present must still parse, so a blank one is rejected.
 */
export const goalUpdateSchema = z.object({
  name: optionalText,
  target: decimal(GOAL_AMOUNT_MESSAGE).optional(),
  current: decimal(GOAL_AMOUNT_MESSAGE).optional(),
  deadline: optionalText.transform((v) => v ?? null),
});

export type ParseResult<T> = { ok: true; data: T } | { ok: false; message: string };

export function parseForm<S extends z.ZodTypeAny>(schema: S, body: unknown): ParseResult<z.output<S>> {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return { ok: true, data: result.data };
  }
  return { ok: false, message: result.error.issues[0]?.message ?? 'Invalid form data!' };
}

/** Positive integer id from a route parameter */
export function parseId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
