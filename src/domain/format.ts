import type { Period } from './types.js';

const moneyFormats = new Map<string, Intl.NumberFormat>();

function moneyFormat(currency: string): Intl.NumberFormat | null {
  const cached = moneyFormats.get(currency);
  if (cached) return cached;
  try {
    const fmt = new Intl.NumberFormat('en-US', {
      style: 'currency',
      currency,
      currencyDisplay: 'code',
    });
    moneyFormats.set(currency, fmt);
    return fmt;
  } catch (error) {
    // Intl rejects codes it does not know with a RangeError
    if (error instanceof RangeError) return null;
    throw error;
  }
}

/** Amount with the user's currency code; unknown codes are appended as-is */
export function formatMoney(amount: number, currency: string): string {
  const fmt = moneyFormat(currency);
  if (fmt) return fmt.format(amount).replace(/\u00a0/g, ' ');
  return `${amount.toFixed(2)} ${currency}`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

const monthNameFmt = new Intl.DateTimeFormat('en-US', { month: 'long', timeZone: 'UTC' });

/** English month name, 1 = January */
export function monthName(month: number): string {
  return monthNameFmt.format(new Date(Date.UTC(2000, month - 1, 1)));
}

/** e.g. "May 2024" */
export function periodLabel(period: Period): string {
  return `${monthName(period.month)} ${period.year}`;
}
