import { types } from "node:util";
import { z } from "zod";
import type { Candle, CellValue, Dataset, ParseResult, PriceColumn } from "../types/index.js";
import { EditorError } from "./errors.js";

export const REQUIRED_COLUMNS: readonly PriceColumn[] = ["Open", "High", "Low", "Close"];
export const VOLUME_COLUMN = "Volume";

const OHLCV_COLUMNS: readonly string[] = [...REQUIRED_COLUMNS, VOLUME_COLUMN];

// Dates built inside a vm context fail `instanceof Date` here, so check by brand.
const CellSchema = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.null(),
  z.custom<Date>((value) => types.isDate(value), { message: "expected a date" }),
]);

const ColumnsSchema = z.record(z.string(), z.array(CellSchema));
const RecordsSchema = z.array(z.record(z.string(), CellSchema));

function copyCell(value: CellValue): CellValue {
  return types.isDate(value) ? new Date(value.getTime()) : value;
}

/**
 * Column-oriented table built by the `DataFrame(...)` constructor available to
 * buffer text. Accepts `{ Column: [values] }` or an array of row records.
 */
export class Frame {
  readonly columns: readonly string[];
  readonly length: number;
  private readonly data: ReadonlyMap<string, readonly CellValue[]>;

  constructor(input: unknown) {
    const data = new Map<string, CellValue[]>();

    const records = RecordsSchema.safeParse(input);
    if (records.success) {
      records.data.forEach((record, i) => {
        for (const [name, value] of Object.entries(record)) {
          let column = data.get(name);
          if (!column) {
            column = Array.from({ length: i }, (): CellValue => null);
            data.set(name, column);
          }
          column.push(copyCell(value));
        }
        for (const column of data.values()) {
          if (column.length === i) column.push(null);
        }
      });
    } else {
      const columns = ColumnsSchema.safeParse(input);
      if (!columns.success) {
        throw new TypeError("DataFrame expects { Column: [values] } or an array of row objects");
      }
      for (const [name, values] of Object.entries(columns.data)) {
        data.set(name, values.map(copyCell));
      }
    }

    const lengths = new Set([...data.values()].map((column) => column.length));
    if (lengths.size > 1) {
      throw new RangeError("DataFrame columns must all have the same length");
    }

    this.columns = [...data.keys()];
    this.length = lengths.values().next().value ?? 0;
    this.data = data;
  }

  column(name: string): readonly CellValue[] | undefined {
    return this.data.get(name);
  }
}

/** Binding exposed to buffer text; works with and without `new`. */
export function DataFrame(input: unknown): Frame {
  return new Frame(input);
}

function numericColumn(frame: Frame, name: string): number[] | EditorError {
  const values = frame.column(name) ?? [];
  const numbers: number[] = [];
  for (const value of values) {
    if (typeof value !== "number") {
      return new EditorError("NotADataset", `Column '${name}' must contain only numbers`);
    }
    numbers.push(value);
  }
  return numbers;
}

/** Converts a frame into a dataset, checking the OHLC shape. The result shares nothing with the frame. */
export function frameToDataset(frame: Frame): ParseResult {
  const missing = REQUIRED_COLUMNS.filter((name) => !frame.columns.includes(name));
  if (missing.length > 0) {
    return {
      success: false,
      dataset: null,
      error: new EditorError("MissingColumns", `DataFrame missing required columns: ${missing.join(", ")}`),
    };
  }

  const prices: number[][] = [];
  for (const name of [...REQUIRED_COLUMNS, VOLUME_COLUMN]) {
    const column = frame.columns.includes(name) ? numericColumn(frame, name) : Array.from({ length: frame.length }, () => 0);
    if (column instanceof EditorError) {
      return { success: false, dataset: null, error: column };
    }
    prices.push(column);
  }
  const [open = [], high = [], low = [], close = [], volume = []] = prices;
  const extraColumns = frame.columns.filter((name) => !OHLCV_COLUMNS.includes(name));

  const rows: Candle[] = [];
  for (let i = 0; i < frame.length; i++) {
    const extra: Record<string, CellValue> = {};
    for (const name of extraColumns) {
      extra[name] = copyCell(frame.column(name)?.[i] ?? null);
    }
    rows.push({
      open: open[i] ?? 0,
      high: high[i] ?? 0,
      low: low[i] ?? 0,
      close: close[i] ?? 0,
      volume: volume[i] ?? 0,
      extra,
    });
  }

  return { success: true, dataset: { columns: [...frame.columns], rows }, error: null };
}

/** Value of a named column for one candle, as written back to the buffer. */
export function cellOf(candle: Candle, column: string): CellValue {
  switch (column) {
    case "Open":
      return candle.open;
    case "High":
      return candle.high;
    case "Low":
      return candle.low;
    case "Close":
      return candle.close;
    case VOLUME_COLUMN:
      return candle.volume;
    default:
      return candle.extra[column] ?? null;
  }
}

export function createDataset(rows: readonly Omit<Candle, "extra">[], columns: readonly string[] = OHLCV_COLUMNS): Dataset {
  return { columns: [...columns], rows: rows.map((row) => ({ ...row, extra: {} })) };
}
