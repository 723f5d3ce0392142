// src/helpers/markInput.ts
import { ValidationError } from "../lib/errors";

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export type MarkInput = number | string | null | undefined;

/**
 * Mark fields arrive as typed text. Blank means 0, anything else must be
 * plain decimal text (no hex, binary or octal prefixes).
 */
export function coerceMark(value: MarkInput, field: string): number {
  if (value === null || value === undefined) return 0;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a valid number.`);
    }
    return value;
  }

  const trimmed = value.trim();
  if (trimmed === "") return 0;

  const parsed = Number(trimmed);
  if (!DECIMAL.test(trimmed) || !Number.isFinite(parsed)) {
    throw new ValidationError(`${field} must be a valid number.`);
  }
  return parsed;
}

export function sumBy<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((acc, item) => acc + pick(item), 0);
}
