// Field kinds and domains for cron schedules.

import type { FieldSet } from "./field-set.js";

export type FieldKind =
  | "second"
  | "minute"
  | "hour"
  | "dayOfMonth"
  | "month"
  | "dayOfWeek";

/** Field kinds in the order tokens are assigned, reading the expression right to left. */
export const FIELD_KINDS: readonly FieldKind[] = [
  "dayOfWeek",
  "month",
  "dayOfMonth",
  "hour",
  "minute",
  "second",
];

export interface FieldDomain {
  kind: FieldKind;
  min: number;
  max: number;
  /** Name at index i denotes `min + i`. */
  names?: readonly string[];
}

export const WEEKDAY_NAMES: readonly string[] = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

export const MONTH_NAMES: readonly string[] = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export const DOMAINS: Readonly<Record<FieldKind, FieldDomain>> = {
  second: { kind: "second", min: 0, max: 59 },
  minute: { kind: "minute", min: 0, max: 59 },
  hour: { kind: "hour", min: 0, max: 23 },
  dayOfMonth: { kind: "dayOfMonth", min: 1, max: 31 },
  month: { kind: "month", min: 1, max: 12, names: MONTH_NAMES },
  dayOfWeek: { kind: "dayOfWeek", min: 0, max: 6, names: WEEKDAY_NAMES },
};

// --- Schedule (top-level) ---

export type CronFields = Readonly<Record<FieldKind, FieldSet>>;

// --- Helper functions ---

/** Cron DOW number from an ISO day number (Monday=1 ... Sunday=7). */
export function cronDowFromIso(isoDay: number): number {
  return isoDay % 7;
}

export function weekdayName(cronDow: number): string {
  return WEEKDAY_NAMES[cronDow] ?? String(cronDow);
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Days in a proleptic Gregorian month. */
export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

/** Lexicographic comparison of (year, month, day) triples, which need not be valid dates. */
export function compareYmd(
  a: readonly [number, number, number],
  b: readonly [number, number, number],
): number {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}
