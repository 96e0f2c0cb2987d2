import { invalidInput } from "./errors.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH = /^(\d{4})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

// Calendar dates are handled at UTC midnight so no local offset shifts the day.
export function parseIsoDate(value: string, field = "date"): Date {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    throw invalidInput(`${field} must be formatted YYYY-MM-DD.`, { field, value });
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw invalidInput(`${field} is not a calendar date.`, { field, value });
  }

  return date;
}

export function parseIsoMonth(value: string, field = "period"): { year: number; month: number } {
  const match = ISO_MONTH.exec(value.trim());
  const year = Number(match?.[1]);
  const month = Number(match?.[2]);
  if (!match || month < 1 || month > 12) {
    throw invalidInput(`${field} must be formatted YYYY-MM.`, { field, value });
  }

  return { year, month };
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isoDate(year: number, month: number, day: number): string {
  return formatIsoDate(new Date(Date.UTC(year, month - 1, day)));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function daysBetween(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / DAY_MS);
}
