import type { Window } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const PERIOD_PATTERN = /^(\d{4})-(\d{2})$/;

/**
 * Format a date as its UTC archive period, "YYYY-MM".
 */
export function periodOf(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${date.getUTCFullYear()}-${month}`;
}

export function parsePeriod(period: string): { year: number; month: number } {
  const match = period.match(PERIOD_PATTERN);
  if (!match) {
    throw new Error(`Invalid archive period: ${period}`);
  }
  const month = Number.parseInt(match[2], 10);
  if (month < 1 || month > 12) {
    throw new Error(`Invalid archive period: ${period}`);
  }
  return { year: Number.parseInt(match[1], 10), month };
}

/** First instant of the period, UTC. */
export function periodStart(period: string): Date {
  const { year, month } = parsePeriod(period);
  return new Date(Date.UTC(year, month - 1, 1));
}

/** First instant after the period, UTC. */
export function periodEnd(period: string): Date {
  const { year, month } = parsePeriod(period);
  return new Date(Date.UTC(year, month, 1));
}

export function windowStart(window: Window, now: Date): Date {
  if ("since" in window) return window.since;
  if (!Number.isInteger(window.days) || window.days < 0) {
    throw new Error(`Window must be a non-negative whole number of days, got ${window.days}`);
  }
  return new Date(now.getTime() - window.days * DAY_MS);
}

/**
 * Ordered archive periods covering the window, from the month of its start
 * through the month of `now`. Archives are monthly, so a month touched by a
 * single day of the window is included whole.
 */
export function periodsInWindow(window: Window, now: Date): string[] {
  const start = windowStart(window, now);
  if (start.getTime() > now.getTime()) {
    throw new Error(`Window starts in the future: ${start.toISOString()}`);
  }

  const periods: string[] = [];
  let year = start.getUTCFullYear();
  let month = start.getUTCMonth() + 1;
  const endYear = now.getUTCFullYear();
  const endMonth = now.getUTCMonth() + 1;

  while (year < endYear || (year === endYear && month <= endMonth)) {
    periods.push(`${year}-${String(month).padStart(2, "0")}`);
    month++;
    if (month > 12) {
      month = 1;
      year++;
    }
  }

  return periods;
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}
