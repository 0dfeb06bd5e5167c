// Display (toString) for cron schedules — produces canonical 6-field form.

import type { CronFields, FieldKind } from "./ast.js";
import type { FieldSet } from "./field-set.js";

const DISPLAY_ORDER: readonly FieldKind[] = [
  "second",
  "minute",
  "hour",
  "dayOfMonth",
  "month",
  "dayOfWeek",
];

/** Render a schedule as its canonical string form. */
export function display(fields: CronFields): string {
  return DISPLAY_ORDER.map((kind) => displayField(fields[kind])).join(" ");
}

/** `*` for a full field, otherwise runs of consecutive values (`1-5,10,12`). */
export function displayField(set: FieldSet): string {
  if (set.isFull) return "*";

  const parts: string[] = [];
  const values = set.values();
  let i = 0;
  while (i < values.length) {
    let j = i;
    while (j + 1 < values.length && values[j + 1] === values[j] + 1) j++;
    const runLength = j - i + 1;
    if (runLength >= 3) {
      parts.push(`${values[i]}-${values[j]}`);
    } else {
      for (let k = i; k <= j; k++) parts.push(String(values[k]));
    }
    i = j + 1;
  }
  return parts.join(",");
}
