// Testable CLI logic for nextfire

import { parseArgs } from "node:util";
import { Temporal } from "@js-temporal/polyfill";
import { cronDowFromIso, weekdayName } from "./ast.js";
import { type Clock, systemClock } from "./clock.js";
import { CronError } from "./error.js";
import { CronSchedule } from "./index.js";

export interface CliDeps {
  log?: (message: string) => void;
  error?: (message: string) => void;
  exit?: (code: number) => void;
  clock?: Clock;
}

const DEFAULT_COUNT = 10;

const USAGE = [
  "Usage: nextfire <expression> [--count <n>] [--from <datetime>] [--until <datetime>] [--tz <zone>]",
  "",
  "Options:",
  `  -n, --count <n>      Number of occurrences to print (default ${DEFAULT_COUNT})`,
  "  --from <datetime>    Zoned ISO datetime to search after (default: now)",
  "  --until <datetime>   Zoned ISO datetime to stop before",
  "  --tz <zone>          IANA time zone for the default start",
  "",
  "Expression: [second] minute hour day-of-month month day-of-week",
];

/** `yyyy.MM.dd HH:mm:ss  Weekday` */
export function formatOccurrence(dt: Temporal.ZonedDateTime): string {
  const p2 = (n: number) => String(n).padStart(2, "0");
  const date = `${String(dt.year).padStart(4, "0")}.${p2(dt.month)}.${p2(dt.day)}`;
  const time = `${p2(dt.hour)}:${p2(dt.minute)}:${p2(dt.second)}`;
  return `${date} ${time}  ${weekdayName(cronDowFromIso(dt.dayOfWeek))}`;
}

export function runCli(
  argv: string[],
  {
    log = console.log,
    error = console.error,
    exit = (code: number) => process.exit(code),
    clock = systemClock,
  }: CliDeps = {},
): void {
  function printUsage(write: (message: string) => void) {
    for (const line of USAGE) write(line);
    exit(1);
  }

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv.slice(2));
  } catch (err) {
    error(err instanceof Error ? err.message : String(err));
    printUsage(error);
    return;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    printUsage(log);
    return;
  }
  if (positionals.length === 0) {
    printUsage(error);
    return;
  }

  const count = values.count === undefined ? DEFAULT_COUNT : Number(values.count);
  if (!Number.isInteger(count) || count < 1) {
    error(`--count must be a positive integer, got '${values.count}'`);
    exit(1);
    return;
  }

  let start: Temporal.ZonedDateTime;
  let until: Temporal.ZonedDateTime | undefined;
  try {
    const now = values.from
      ? Temporal.ZonedDateTime.from(values.from)
      : clock.now();
    start = values.tz ? now.withTimeZone(values.tz) : now;
    until = values.until ? Temporal.ZonedDateTime.from(values.until) : undefined;
  } catch (err) {
    error(`invalid datetime: ${err instanceof Error ? err.message : String(err)}`);
    exit(1);
    return;
  }

  let schedule: CronSchedule;
  try {
    schedule = CronSchedule.parse(positionals.join(" "));
  } catch (err) {
    if (err instanceof CronError) {
      error(err.displayRich());
      exit(1);
      return;
    }
    throw err;
  }

  for (const occurrence of schedule.nextNFrom(start, count, until)) {
    log(formatOccurrence(occurrence));
  }
}

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      count: { type: "string", short: "n" },
      from: { type: "string" },
      until: { type: "string" },
      tz: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}
