import { describe, expect, it } from "vitest";
import { CronError, CronSchedule } from "../src/index.js";

function parseError(input: string): CronError {
  try {
    CronSchedule.parse(input);
  } catch (err) {
    if (err instanceof CronError) return err;
    throw err;
  }
  throw new Error(`expected '${input}' to fail`);
}

describe("displayRich", () => {
  it("underlines the offending value", () => {
    expect(parseError("0 12 * 13 *").displayRich()).toBe(
      "error: 13 is out of range [1, 12]\n" +
        "  0 12 * 13 *\n" +
        "         ^^",
    );
  });

  it("underlines a whole unknown name", () => {
    expect(parseError("0 0 * * Mon-Fry").displayRich()).toBe(
      "error: 'Fry' is not a known value name, expected one of: " +
        "Sunday, Monday, Tuesday, Wednesday, Thursday, Friday, Saturday\n" +
        "  0 0 * * Mon-Fry\n" +
        "              ^^^",
    );
  });

  it("underlines the whole input for a wrong field count", () => {
    expect(parseError("* *").displayRich()).toBe(
      "error: expression must contain 5 or 6 fields, got 2\n" +
        "  * *\n" +
        "  ^^^",
    );
  });

  it("falls back to the message without a span", () => {
    expect(CronError.nullInput().displayRich()).toBe(
      "error: expression must not be null",
    );
  });
});

describe("CronError", () => {
  it("is an Error with a name and kind", () => {
    const err = parseError("0 0 * * Xyz");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("CronError");
    expect(err.kind).toBe("unknownName");
  });
});
