/**
 * Money helpers. Amounts travel as numbers rounded to centavos; the database
 * stores them as NUMERIC(12,2).
 */

import { config } from '../../config/environment';

/** Largest value a NUMERIC(12,2) column holds */
export const MAX_MONEY_AMOUNT = 9_999_999_999.99;

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function sumMoney(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) total += value;
  return roundMoney(total);
}

/** NUMERIC column value, as the pg driver returns it */
export function parseMoney(value: string | number | null): number {
  if (value === null) return 0;
  return roundMoney(Number(value));
}

/** NUMERIC column parameter */
export function toMoneyString(value: number): string {
  return roundMoney(value).toFixed(2);
}

const groupedFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

/** `₱1,234.50` */
export function formatCurrency(value: number, symbol: string = config.currencySymbol): string {
  return `${symbol}${groupedFormat.format(roundMoney(value))}`;
}
