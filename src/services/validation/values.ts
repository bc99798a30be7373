import type { Amount } from '../../domain/types.js';

/** Fixed-point scale: amounts are compared as integer ten-thousandths. */
export const UNITS_PER_WHOLE = 10_000n;

export type AmountReading =
  | { kind: 'absent' }
  | { kind: 'invalid'; raw: string }
  | { kind: 'value'; value: number; units: bigint };

export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === '';
}

export function readAmount(amount: Amount | undefined): AmountReading {
  if (amount === undefined || amount === null) return { kind: 'absent' };
  if (typeof amount === 'string') return { kind: 'invalid', raw: amount };
  if (!Number.isFinite(amount)) return { kind: 'invalid', raw: String(amount) };
  return { kind: 'value', value: amount, units: BigInt(Math.round(amount * Number(UNITS_PER_WHOLE))) };
}

export function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

export function formatUnits(units: bigint): string {
  return (Number(units) / Number(UNITS_PER_WHOLE)).toFixed(2);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parses a strict `YYYY-MM-DD` calendar date into a sortable day key
 * (`yyyymmdd` as an integer), or null when it is not a real date.
 */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return year * 10_000 + month * 100 + day;
}
