/**
 * Pure domain computations shared by the engines and the import pipeline.
 * No HTTP or DB here: data in, data out.
 */
import { format, isValid, parseISO } from 'date-fns';
import type { LedgerEntry, MonthWindow } from './types.js';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Round a money value to 2 decimals, exact half-cents to the even cent
 * (50.125 -> 50.12, 0.375 -> 0.38). Never returns -0.
 */
export function roundMoney(value: number): number {
  // Exact half-cents are the odd multiples of 1/8
  const eighths = value * 8;
  let rounded: number;
  if (Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1) {
    const cents = Math.floor(value * 100);
    rounded = (cents % 2 === 0 ? cents : cents + 1) / 100;
  } else {
    rounded = Number(value.toFixed(2));
  }
  return rounded === 0 ? 0 : rounded;
}

/** YYYY-MM key of a window, e.g. 2025-01 */
export function monthKey({ year, month }: MonthWindow): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** True when an ISO date falls inside the window (both ends inclusive) */
export function inWindow(date: string, window: MonthWindow): boolean {
  return date.startsWith(`${monthKey(window)}-`);
}

/** Filter entries to a single window */
export function forWindow<T extends { date: string }>(entries: T[], window: MonthWindow): T[] {
  return entries.filter((e) => inWindow(e.date, window));
}

/** Plain sum of amounts, no rounding */
export function sumAmounts(entries: Pick<LedgerEntry, 'amount'>[]): number {
  return entries.reduce((sum, e) => sum + e.amount, 0);
}

/**
 * Parse a strict YYYY-MM-DD calendar date.
 * Returns null for other shapes and for impossible dates such as 2025-02-30.
 */
export function parseIsoDate(value: string): string | null {
  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) return null;
  return isValid(parseISO(trimmed)) ? trimmed : null;
}

/** Today's local calendar date as YYYY-MM-DD */
export function today(now: Date = new Date()): string {
  return format(now, 'yyyy-MM-dd');
}

/** A date is in the future only when strictly after today */
export function isFutureDate(date: string, now: Date = new Date()): boolean {
  return date > today(now);
}
