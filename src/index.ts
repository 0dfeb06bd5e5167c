// nextfire — Public API

import type { Temporal } from "@js-temporal/polyfill";
import type { CronFields } from "./ast.js";
import { type Clock, systemClock } from "./clock.js";
import { display } from "./display.js";
import {
  between,
  matches,
  maxInstantIn,
  nextFrom,
  nextNFrom,
  occurrences,
} from "./eval.js";
import { parse } from "./parser.js";

export class CronSchedule {
  private data: CronFields;
  private source: string;

  private constructor(data: CronFields, source: string) {
    this.data = data;
    this.source = source;
  }

  /** Parse a 5- or 6-field cron expression. */
  static parse(input: string): CronSchedule {
    return new CronSchedule(parse(input), input);
  }

  /** Check if an input string is a valid cron expression. */
  static validate(input: string): boolean {
    try {
      parse(input);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Compute the next occurrence after `start`. Returns `end` when there is
   * none before it; compare the result against `end` to tell the two apart.
   */
  nextFrom(
    start: Temporal.ZonedDateTime,
    end: Temporal.ZonedDateTime = maxInstantIn(start.timeZoneId),
  ): Temporal.ZonedDateTime {
    return nextFrom(this.data, start, end);
  }

  /** Compute up to `n` successive occurrences after `start`, all before `end`. */
  nextNFrom(
    start: Temporal.ZonedDateTime,
    n: number,
    end?: Temporal.ZonedDateTime,
  ): Temporal.ZonedDateTime[] {
    return nextNFrom(this.data, start, n, end);
  }

  /** Check if a datetime matches all six fields of this schedule. */
  matches(datetime: Temporal.ZonedDateTime): boolean {
    return matches(this.data, datetime);
  }

  /**
   * Returns a lazy iterator of occurrences starting after `from`.
   * Without `end` the iterator runs until the latest representable instant.
   */
  *occurrences(
    from: Temporal.ZonedDateTime,
    end?: Temporal.ZonedDateTime,
  ): Generator<Temporal.ZonedDateTime, void, unknown> {
    yield* occurrences(this.data, from, end);
  }

  /**
   * Returns a bounded iterator of occurrences where `from < occurrence <= to`.
   */
  *between(
    from: Temporal.ZonedDateTime,
    to: Temporal.ZonedDateTime,
  ): Generator<Temporal.ZonedDateTime, void, unknown> {
    yield* between(this.data, from, to);
  }

  /** Render as canonical 6-field string. */
  toString(): string {
    return display(this.data);
  }

  /** The parsed field sets. */
  get fields(): CronFields {
    return this.data;
  }

  /** The expression this schedule was parsed from. */
  get expression(): string {
    return this.source;
  }
}

/**
 * Next instant after `start` matching `expression`, or `end` when none exists
 * before it. `start` defaults to `clock.now()`, `end` to the latest
 * representable instant in `start`'s time zone.
 */
export function nextFire(
  expression: string | null | undefined,
  start?: Temporal.ZonedDateTime,
  end?: Temporal.ZonedDateTime,
  clock: Clock = systemClock,
): Temporal.ZonedDateTime {
  const fields = parse(expression);
  const from = start ?? clock.now();
  return nextFrom(fields, from, end ?? maxInstantIn(from.timeZoneId));
}

export { Temporal } from "@js-temporal/polyfill";
export type { CronFields, FieldDomain, FieldKind } from "./ast.js";
export { DOMAINS, FIELD_KINDS, MONTH_NAMES, WEEKDAY_NAMES } from "./ast.js";
export { type Clock, fixedClock, systemClock } from "./clock.js";
export type { CronErrorKind, Span } from "./error.js";
// Re-exports
export { CronError } from "./error.js";
export { FieldSet, type TokenSource } from "./field-set.js";
export { displayField } from "./display.js";
