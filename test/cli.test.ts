import { beforeEach, describe, expect, it, vi } from "vitest";
import { type CliDeps, formatOccurrence, runCli } from "../src/cli.js";
import { Temporal, fixedClock } from "../src/index.js";

function makeDeps() {
  return {
    log: vi.fn(),
    error: vi.fn(),
    exit: vi.fn(),
    clock: fixedClock(Temporal.ZonedDateTime.from("2024-01-01T00:00:00+00:00[UTC]")),
  } satisfies CliDeps;
}

describe("runCli", () => {
  let deps: ReturnType<typeof makeDeps>;

  beforeEach(() => {
    deps = makeDeps();
  });

  it("prints usage to stderr and exits with code 1 without an expression", () => {
    runCli(["node", "nextfire"], deps);
    expect(deps.error).toHaveBeenCalledWith("Options:");
    expect(deps.log).not.toHaveBeenCalled();
    expect(deps.exit).toHaveBeenCalledWith(1);
  });

  it("prints usage to stdout for --help", () => {
    runCli(["node", "nextfire", "--help"], deps);
    expect(deps.log).toHaveBeenCalledWith("Options:");
    expect(deps.error).not.toHaveBeenCalled();
    expect(deps.exit).toHaveBeenCalledWith(1);
  });

  it("prints successive occurrences with their weekday", () => {
    runCli(
      [
        "node",
        "nextfire",
        "10 0-8/2 * * SUN,TUE",
        "--from",
        "2024-01-03T00:00:00+00:00[UTC]",
        "--count",
        "3",
      ],
      deps,
    );
    expect(deps.log.mock.calls).toEqual([
      ["2024.01.07 00:10:00  Sunday"],
      ["2024.01.07 02:10:00  Sunday"],
      ["2024.01.07 04:10:00  Sunday"],
    ]);
    expect(deps.exit).not.toHaveBeenCalled();
  });

  it("joins separate arguments into one expression", () => {
    runCli(["node", "nextfire", "0", "12", "*", "*", "*", "-n", "2"], deps);
    expect(deps.log.mock.calls).toEqual([
      ["2024.01.01 12:00:00  Monday"],
      ["2024.01.02 12:00:00  Tuesday"],
    ]);
  });

  it("starts from the clock by default", () => {
    runCli(["node", "nextfire", "0 0 1 1 *", "-n", "1"], deps);
    expect(deps.log.mock.calls).toEqual([["2025.01.01 00:00:00  Wednesday"]]);
  });

  it("applies --tz to the default start", () => {
    runCli(["node", "nextfire", "0 12 * * *", "-n", "1", "--tz", "Asia/Tokyo"], deps);
    expect(deps.log.mock.calls).toEqual([["2024.01.01 12:00:00  Monday"]]);
  });

  it("stops early at --until", () => {
    runCli(
      [
        "node",
        "nextfire",
        "0 0 * * *",
        "-n",
        "5",
        "--until",
        "2024-01-03T00:00:00+00:00[UTC]",
      ],
      deps,
    );
    expect(deps.log.mock.calls).toEqual([["2024.01.02 00:00:00  Tuesday"]]);
  });

  it("prints a parse error with its location", () => {
    runCli(["node", "nextfire", "0 12 * 13 *"], deps);
    expect(deps.error).toHaveBeenCalledWith(
      "error: 13 is out of range [1, 12]\n  0 12 * 13 *\n         ^^",
    );
    expect(deps.exit).toHaveBeenCalledWith(1);
    expect(deps.log).not.toHaveBeenCalled();
  });

  it("rejects a non-positive count", () => {
    runCli(["node", "nextfire", "* * * * *", "-n", "0"], deps);
    expect(deps.error).toHaveBeenCalledWith(
      "--count must be a positive integer, got '0'",
    );
    expect(deps.exit).toHaveBeenCalledWith(1);
  });

  it("rejects an unparseable --from", () => {
    runCli(["node", "nextfire", "* * * * *", "--from", "yesterday"], deps);
    expect(deps.error).toHaveBeenCalledWith(
      expect.stringMatching(/^invalid datetime: /),
    );
    expect(deps.exit).toHaveBeenCalledWith(1);
  });

  it("rejects unknown options with usage", () => {
    runCli(["node", "nextfire", "* * * * *", "--bogus"], deps);
    expect(deps.error.mock.calls[0][0]).toMatch(/bogus/);
    expect(deps.error).toHaveBeenCalledWith("Options:");
    expect(deps.log).not.toHaveBeenCalled();
    expect(deps.exit).toHaveBeenCalledWith(1);
  });
});

describe("formatOccurrence", () => {
  it("pads every component", () => {
    const dt = Temporal.ZonedDateTime.from("2024-03-05T07:08:09+00:00[UTC]");
    expect(formatOccurrence(dt)).toBe("2024.03.05 07:08:09  Tuesday");
  });
});
