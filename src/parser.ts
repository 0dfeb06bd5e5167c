// Parser for 5- and 6-field cron expressions.

import { type CronFields, DOMAINS, FIELD_KINDS, type FieldKind } from "./ast.js";
import { CronError } from "./error.js";
import { FieldSet } from "./field-set.js";
import { tokenize } from "./lexer.js";

export function parse(input: string | null | undefined): CronFields {
  if (input === null || input === undefined) {
    throw CronError.nullInput();
  }

  const tokens = tokenize(input);
  if (tokens.length < 5 || tokens.length > 6) {
    throw CronError.tokenCount(tokens.length, input);
  }

  const fields: Partial<Record<FieldKind, FieldSet>> = {};
  const reversed = [...tokens].reverse();
  for (let i = 0; i < reversed.length; i++) {
    const kind = FIELD_KINDS[i];
    const token = reversed[i];
    fields[kind] = FieldSet.parse(token.text, DOMAINS[kind], {
      input,
      offset: token.span.start,
    });
  }

  const { second, minute, hour, dayOfMonth, month, dayOfWeek } = fields;
  if (!minute || !hour || !dayOfMonth || !month || !dayOfWeek) {
    throw CronError.tokenCount(tokens.length, input);
  }

  return {
    second: second ?? FieldSet.parse("0", DOMAINS.second),
    minute,
    hour,
    dayOfMonth,
    month,
    dayOfWeek,
  };
}
