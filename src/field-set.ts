// FieldSet — the allowed values of one cron field, held as a bit vector.

import type { FieldDomain } from "./ast.js";
import { CronError, type Span } from "./error.js";

/** Where a field token sits inside the full expression, for error spans. */
export interface TokenSource {
  input: string;
  offset: number;
}

export class FieldSet {
  readonly domain: FieldDomain;
  private readonly bits: Uint8Array;
  private readonly minValueSet: number;
  private readonly maxValueSet: number;

  private constructor(
    domain: FieldDomain,
    bits: Uint8Array,
    minValueSet: number,
    maxValueSet: number,
  ) {
    this.domain = domain;
    this.bits = bits;
    this.minValueSet = minValueSet;
    this.maxValueSet = maxValueSet;
  }

  /** Parse one field token (e.g. `1-5`, `0,30`, `MON-FRI`) against a domain. */
  static parse(token: string, domain: FieldDomain, source?: TokenSource): FieldSet {
    const built = new FieldSetBuilder(token, domain, source).build();
    return new FieldSet(domain, built.bits, built.minValueSet, built.maxValueSet);
  }

  /** A set with no members. Parsing never produces one. */
  static empty(domain: FieldDomain): FieldSet {
    const bits = new Uint8Array(domain.max - domain.min + 1);
    return new FieldSet(domain, bits, domain.max + 1, domain.min - 1);
  }

  get min(): number {
    return this.domain.min;
  }

  get max(): number {
    return this.domain.max;
  }

  /** Smallest member, or null when the set is empty. */
  first(): number | null {
    return this.next(this.minValueSet);
  }

  /** Smallest member `>= start`, or null when there is none. */
  next(start: number): number | null {
    const from = Math.max(start, this.minValueSet);
    for (let v = from; v <= this.maxValueSet; v++) {
      if (this.bits[v - this.domain.min] === 1) return v;
    }
    return null;
  }

  has(value: number): boolean {
    if (value < this.domain.min || value > this.domain.max) return false;
    return this.bits[value - this.domain.min] === 1;
  }

  /** Members in ascending order. */
  values(): number[] {
    const out: number[] = [];
    for (let v = this.minValueSet; v <= this.maxValueSet; v++) {
      if (this.bits[v - this.domain.min] === 1) out.push(v);
    }
    return out;
  }

  get size(): number {
    return this.values().length;
  }

  get isFull(): boolean {
    return this.size === this.bits.length;
  }
}

const DIGITS = /^[0-9]+$/;

class FieldSetBuilder {
  private token: string;
  private domain: FieldDomain;
  private source: TokenSource;
  private bits: Uint8Array;
  private minValueSet: number;
  private maxValueSet: number;

  constructor(token: string, domain: FieldDomain, source?: TokenSource) {
    this.token = token;
    this.domain = domain;
    this.source = source ?? { input: token, offset: 0 };
    this.bits = new Uint8Array(domain.max - domain.min + 1);
    this.minValueSet = domain.max + 1;
    this.maxValueSet = domain.min - 1;
  }

  build(): { bits: Uint8Array; minValueSet: number; maxValueSet: number } {
    if (this.token.trim().length === 0) {
      throw this.malformed("empty field", 0, this.token.length);
    }

    let at = 0;
    for (const part of this.token.split(",")) {
      this.parsePart(part, at);
      at += part.length + 1;
    }

    return {
      bits: this.bits,
      minValueSet: this.minValueSet,
      maxValueSet: this.maxValueSet,
    };
  }

  /** One comma-separated element, starting `at` characters into the token. */
  private parsePart(part: string, at: number): void {
    if (part.length === 0) {
      throw this.malformed(`empty list element in '${this.token}'`, at, at);
    }

    let body = part;
    let step: number | null = null;
    const slash = part.indexOf("/");
    if (slash >= 0) {
      body = part.slice(0, slash);
      const stepText = part.slice(slash + 1);
      if (body.length === 0) {
        throw this.malformed(`missing value before '/' in '${part}'`, at, at + part.length);
      }
      if (!DIGITS.test(stepText)) {
        throw this.malformed(
          `invalid step '${stepText}' in '${part}'`,
          at + slash + 1,
          at + part.length,
        );
      }
      step = Number.parseInt(stepText, 10);
    }

    if (body === "*") {
      this.accumulate(this.domain.min, this.domain.max, step === null || step < 1 ? 1 : step);
      return;
    }

    const dash = body.indexOf("-");
    if (dash > 0) {
      let first = this.parseValue(body.slice(0, dash), at);
      let last = this.parseValue(body.slice(dash + 1), at + dash + 1);
      if (first > last) {
        [first, last] = [last, first];
      }
      this.accumulate(first, last, step === null || step < 1 ? 1 : step);
      return;
    }

    const value = this.parseValue(body, at);

    if (step === null || step === 1) {
      this.accumulate(value, value, 1);
      return;
    }

    // Legacy form: `a/0` means every value from a through the field maximum.
    if (step === 0) {
      this.accumulate(value, this.domain.max, 1);
      return;
    }

    throw this.malformed(
      `step '/${step}' needs a range or '*' in '${part}'`,
      at,
      at + part.length,
    );
  }

  /** A numeric literal or a name prefix, starting `at` characters into the token. */
  private parseValue(text: string, at: number): number {
    const { min, max, names } = this.domain;
    const end = at + text.length;

    if (text.length === 0) {
      throw this.malformed(`missing value in '${this.token}'`, at, at);
    }

    if (DIGITS.test(text)) {
      const value = Number.parseInt(text, 10);
      if (value < min || value > max) {
        throw CronError.valueOutOfRange(
          value,
          min,
          max,
          this.span(at, end),
          this.source.input,
        );
      }
      return value;
    }

    if (!names) {
      throw this.malformed(
        `'${text}' is not a valid value, expected a number between ${min} and ${max}`,
        at,
        end,
      );
    }

    const lower = text.toLowerCase();
    const index = names.findIndex((n) => n.toLowerCase().startsWith(lower));
    if (index < 0) {
      throw CronError.unknownName(text, names, this.span(at, end), this.source.input);
    }
    return min + index;
  }

  private accumulate(start: number, end: number, step: number): void {
    const { min } = this.domain;
    let last = start;
    for (let v = start; v <= end; v += step) {
      this.bits[v - min] = 1;
      last = v;
    }
    if (start < this.minValueSet) this.minValueSet = start;
    if (last > this.maxValueSet) this.maxValueSet = last;
  }

  private span(start: number, end: number): Span {
    return {
      start: this.source.offset + start,
      end: this.source.offset + end,
    };
  }

  private malformed(message: string, start: number, end: number): CronError {
    return CronError.malformed(message, this.span(start, end), this.source.input);
  }
}
