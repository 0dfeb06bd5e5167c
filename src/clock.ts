import { Temporal } from "@js-temporal/polyfill";

/** Source of the current time, used only to default a search start. */
export interface Clock {
  now(): Temporal.ZonedDateTime;
}

/** Reads the system clock in the system time zone. */
export const systemClock: Clock = {
  now: () => Temporal.Now.zonedDateTimeISO(),
};

/** A clock that always reports `instant`. */
export function fixedClock(instant: Temporal.ZonedDateTime): Clock {
  return { now: () => instant };
}
