/** Byte range within the input string. */
export interface Span {
  start: number;
  end: number;
}

export type CronErrorKind =
  | "nullInput"
  | "tokenCount"
  | "valueOutOfRange"
  | "unknownName"
  | "malformedToken";

/** All errors produced while parsing a cron expression. */
export class CronError extends Error {
  readonly kind: CronErrorKind;
  readonly span?: Span;
  readonly input?: string;

  constructor(
    kind: CronErrorKind,
    message: string,
    span?: Span,
    input?: string,
  ) {
    super(message);
    this.name = "CronError";
    this.kind = kind;
    this.span = span;
    this.input = input;
  }

  static nullInput(): CronError {
    return new CronError("nullInput", "expression must not be null");
  }

  static tokenCount(count: number, input: string): CronError {
    return new CronError(
      "tokenCount",
      `expression must contain 5 or 6 fields, got ${count}`,
      { start: 0, end: input.length },
      input,
    );
  }

  static valueOutOfRange(
    value: number,
    min: number,
    max: number,
    span?: Span,
    input?: string,
  ): CronError {
    return new CronError(
      "valueOutOfRange",
      `${value} is out of range [${min}, ${max}]`,
      span,
      input,
    );
  }

  static unknownName(
    name: string,
    names: readonly string[],
    span?: Span,
    input?: string,
  ): CronError {
    return new CronError(
      "unknownName",
      `'${name}' is not a known value name, expected one of: ${names.join(", ")}`,
      span,
      input,
    );
  }

  static malformed(message: string, span?: Span, input?: string): CronError {
    return new CronError("malformedToken", message, span, input);
  }

  displayRich(): string {
    if (this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}
