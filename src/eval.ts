// Evaluator — computes next occurrences and matches for cron schedules.

import { Temporal } from "@js-temporal/polyfill";
import type { CronFields, FieldKind } from "./ast.js";
import { compareYmd, cronDowFromIso, daysInMonth } from "./ast.js";

type ZDT = Temporal.ZonedDateTime;
type PDT = Temporal.PlainDateTime;
type Ymd = readonly [number, number, number];

// =============================================================================
// Search
// =============================================================================
// Calendar fields are resolved lowest first (second, minute, hour), each one
// carrying +1 into the next when its allowed values are exhausted. Whenever a
// field moves past the search floor, every lower field restarts at its first
// allowed value. Day and month are resolved together: a day that does not
// exist in the resolved month (31 in April, 30 in February) is treated as
// exhausted and carries into the month.
//
// Day-of-week does not take part in the rollover. A candidate on a rejected
// weekday moves the floor to the start of the following day and the search
// runs again.
//
// Wall-clock fields are read in the start's time zone and the result is
// assembled in that zone with "compatible" disambiguation, so a time inside a
// spring-forward gap moves forward by the gap's length. A time repeated by a
// fall-back transition takes its earlier offset unless that lands at or before
// the start, in which case the later offset is used.
//
// The end bound is also read as wall-clock time in the start's zone. A
// candidate at or past the end's wall-clock time returns `end` before any
// instant is built, which keeps the search inside Temporal's range when the
// end is the latest representable instant.
// =============================================================================

/** Latest instant Temporal can represent. */
const MAX_INSTANT = Temporal.Instant.from("+275760-09-13T00:00:00Z");

/** The latest representable instant, viewed in `timeZone`. */
export function maxInstantIn(timeZone: string): ZDT {
  return MAX_INSTANT.toZonedDateTimeISO(timeZone);
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

type Firsts = Record<FieldKind, number>;

/** First allowed value of every field, or null if any field is empty. */
function firstValues(fields: CronFields): Firsts | null {
  const second = fields.second.first();
  const minute = fields.minute.first();
  const hour = fields.hour.first();
  const dayOfMonth = fields.dayOfMonth.first();
  const month = fields.month.first();
  const dayOfWeek = fields.dayOfWeek.first();
  if (
    second === null ||
    minute === null ||
    hour === null ||
    dayOfMonth === null ||
    month === null ||
    dayOfWeek === null
  ) {
    return null;
  }
  return { second, minute, hour, dayOfMonth, month, dayOfWeek };
}

/**
 * Earliest wall-clock time at or after `floor` matching every field except
 * day-of-week. Returns null when the only remaining dates are impossible ones
 * at or past `endDate`.
 */
function resolveWallClock(
  fields: CronFields,
  firsts: Firsts,
  floor: PDT,
  endDate: Ymd,
): WallClock | null {
  let year = floor.year;
  let month = floor.month;
  let day: number | null = floor.day;
  let hour = floor.hour;
  let minute = floor.minute;
  let second = floor.second;

  const resetTime = () => {
    second = firsts.second;
    minute = firsts.minute;
    hour = firsts.hour;
  };

  const nextSecond = fields.second.next(second);
  if (nextSecond === null) {
    second = firsts.second;
    minute++;
  } else {
    second = nextSecond;
  }

  const nextMinute = fields.minute.next(minute);
  if (nextMinute === null) {
    minute = firsts.minute;
    hour++;
  } else {
    minute = nextMinute;
    if (minute > floor.minute) second = firsts.second;
  }

  const nextHour = fields.hour.next(hour);
  if (nextHour === null) {
    resetTime();
    day++;
  } else {
    hour = nextHour;
    if (hour > floor.hour) {
      second = firsts.second;
      minute = firsts.minute;
    }
  }

  day = fields.dayOfMonth.next(day);

  for (;;) {
    if (day === null) {
      resetTime();
      day = firsts.dayOfMonth;
      month++;
    } else if (day > floor.day) {
      resetTime();
    }

    const nextMonth = fields.month.next(month);
    if (nextMonth === null) {
      resetTime();
      day = firsts.dayOfMonth;
      month = firsts.month;
      year++;
    } else {
      month = nextMonth;
      if (month > floor.month) {
        resetTime();
        day = firsts.dayOfMonth;
      }
    }

    const dateChanged =
      day !== floor.day || month !== floor.month || year !== floor.year;
    if (dateChanged && day > daysInMonth(year, month)) {
      if (compareYmd([year, month, day], endDate) >= 0) return null;
      day = null;
      continue;
    }

    return { year, month, day, hour, minute, second };
  }
}

/** Midnight at the start of the day after `wall`. */
function advanceToNextDay(wall: WallClock): PDT {
  return Temporal.PlainDate.from({
    year: wall.year,
    month: wall.month,
    day: wall.day,
  })
    .add({ days: 1 })
    .toPlainDateTime();
}

/**
 * Earliest instant strictly after `start` matching every field, or `end`
 * itself when there is none before it.
 */
export function nextFrom(fields: CronFields, start: ZDT, end: ZDT): ZDT {
  const firsts = firstValues(fields);
  if (firsts === null) return end;

  const tz = start.timeZoneId;
  const endWall = end.withTimeZone(tz).toPlainDateTime();
  const endDate: Ymd = [endWall.year, endWall.month, endWall.day];

  let floor = start
    .toPlainDateTime()
    .round({ smallestUnit: "second", roundingMode: "floor" })
    .add({ seconds: 1 });

  for (;;) {
    const wall = resolveWallClock(fields, firsts, floor, endDate);
    if (wall === null) return end;
    if (compareYmd([wall.year, wall.month, wall.day], endDate) > 0) return end;

    const plain = Temporal.PlainDateTime.from(wall);
    if (Temporal.PlainDateTime.compare(plain, endWall) >= 0) return end;

    if (!fields.dayOfWeek.has(cronDowFromIso(plain.dayOfWeek))) {
      if (compareYmd([wall.year, wall.month, wall.day], endDate) === 0) {
        return end;
      }
      floor = advanceToNextDay(wall);
      continue;
    }

    let candidate = plain.toZonedDateTime(tz, { disambiguation: "compatible" });
    if (Temporal.ZonedDateTime.compare(candidate, start) <= 0) {
      // repeated wall-clock time; the earlier offset is already behind us
      candidate = plain.toZonedDateTime(tz, { disambiguation: "later" });
      if (Temporal.ZonedDateTime.compare(candidate, start) <= 0) {
        floor = plain.add({ seconds: 1 });
        continue;
      }
    }
    if (Temporal.ZonedDateTime.compare(candidate, end) >= 0) return end;
    return candidate;
  }
}

export function nextNFrom(
  fields: CronFields,
  start: ZDT,
  n: number,
  end: ZDT = maxInstantIn(start.timeZoneId),
): ZDT[] {
  const results: ZDT[] = [];
  if (n <= 0) return results;
  for (const next of occurrences(fields, start, end)) {
    results.push(next);
    if (results.length >= n) break;
  }
  return results;
}

/** True when every field, day-of-week included, allows `datetime`'s wall-clock time. */
export function matches(fields: CronFields, datetime: ZDT): boolean {
  return (
    fields.second.has(datetime.second) &&
    fields.minute.has(datetime.minute) &&
    fields.hour.has(datetime.hour) &&
    fields.dayOfMonth.has(datetime.day) &&
    fields.month.has(datetime.month) &&
    fields.dayOfWeek.has(cronDowFromIso(datetime.dayOfWeek))
  );
}

export function* occurrences(
  fields: CronFields,
  from: ZDT,
  end: ZDT = maxInstantIn(from.timeZoneId),
): Generator<ZDT, void, unknown> {
  let current = from;
  for (;;) {
    const next = nextFrom(fields, current, end);
    if (Temporal.ZonedDateTime.compare(next, end) >= 0) return;
    current = next;
    yield next;
  }
}

/** Occurrences `t` with `from < t <= to`. */
export function* between(
  fields: CronFields,
  from: ZDT,
  to: ZDT,
): Generator<ZDT, void, unknown> {
  if (to.epochNanoseconds < MAX_INSTANT.epochNanoseconds) {
    yield* occurrences(fields, from, to.add({ nanoseconds: 1 }));
    return;
  }
  // `to` is the last representable instant and cannot be stepped past
  yield* occurrences(fields, from, to);
  if (Temporal.ZonedDateTime.compare(to, from) > 0 && matches(fields, to)) {
    yield to;
  }
}
