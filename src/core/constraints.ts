import type { AdjustResult, Candle, Dataset, Direction, PriceField } from "../types/index.js";
import { EditorError } from "./errors.js";

export const PRICE_FIELDS: readonly PriceField[] = ["open", "high", "low", "close"];

export const ADJUSTMENT_STEP = 1.0;

export function isPriceField(value: string): value is PriceField {
  return PRICE_FIELDS.some((field) => field === value);
}

export function isDirection(value: number): value is Direction {
  return value === 1 || value === -1;
}

function fail(dataset: Dataset, error: EditorError): AdjustResult {
  return { dataset, error };
}

function adjustRow(candle: Candle, field: PriceField, direction: Direction): Candle {
  const next: Candle = { ...candle };
  next[field] = candle[field] + direction * ADJUSTMENT_STEP;

  switch (field) {
    case "open":
    case "close":
      // Open/Close may push through High/Low; the range widens, never shrinks.
      next.high = Math.max(next.high, next.open, next.close);
      next.low = Math.min(next.low, next.open, next.close);
      break;
    case "high":
      next.high = Math.max(next.high, next.open, next.close, next.low);
      next.low = Math.min(next.low, next.open, next.close);
      break;
    case "low":
      next.low = Math.min(next.low, next.open, next.close, next.high);
      next.high = Math.max(next.high, next.open, next.close);
      break;
  }
  return next;
}

/**
 * Moves one price of one candle by a single step and re-derives High/Low so the
 * candle stays valid. Saturation (High held up, Low held down) is silent.
 * On a validation failure the input dataset comes back with the error.
 */
export function adjustCandle(dataset: Dataset, index: number, field: string, direction: number): AdjustResult {
  if (!Number.isInteger(index) || index < 0 || index >= dataset.rows.length) {
    return fail(
      dataset,
      new EditorError("IndexOutOfRange", `Candle index ${index} out of range (0-${dataset.rows.length - 1})`)
    );
  }
  if (!isPriceField(field)) {
    return fail(dataset, new EditorError("InvalidField", `Invalid value type: ${field}`));
  }
  if (!isDirection(direction)) {
    return fail(dataset, new EditorError("InvalidDirection", `Invalid direction: ${direction} (expected 1 or -1)`));
  }

  const rows = dataset.rows.map((candle, i) => (i === index ? adjustRow(candle, field, direction) : candle));
  return { dataset: { columns: dataset.columns, rows }, error: null };
}
