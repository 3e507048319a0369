import type { EditorError } from "../core/errors.js";

export type PriceField = "open" | "high" | "low" | "close";

export type PriceColumn = "Open" | "High" | "Low" | "Close";

export type Direction = 1 | -1;

/** A value held by a non-OHLCV column, e.g. a date or a symbol. */
export type CellValue = number | string | boolean | null | Date;

export interface OHLCVRow {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Candle extends OHLCVRow {
  /** Values of the columns other than Open/High/Low/Close/Volume, keyed by column name. */
  extra: Readonly<Record<string, CellValue>>;
}

export interface Dataset {
  /** Column names in source order; only columns listed here are written back. */
  readonly columns: readonly string[];
  readonly rows: readonly Candle[];
}

export interface CursorPosition {
  row: number;
  col: number;
}

export interface EditorState {
  readonly bufferContent: string;
  readonly variableName: string;
  readonly sourceIdentity: string;
  readonly cursorPosition: Readonly<CursorPosition>;
}

export type EditorCommand =
  | {
      readonly kind: "adjustCandle";
      readonly index: number;
      readonly field: string;
      readonly direction: number;
    }
  | {
      readonly kind: "moveCursor";
      readonly row: number;
      readonly col: number;
    };

export type ParseResult =
  | { success: true; dataset: Dataset; error: null }
  | { success: false; dataset: null; error: EditorError };

export type Result<T> =
  | { success: true; value: T }
  | { success: false; error: EditorError };

export interface AdjustResult {
  dataset: Dataset;
  error: EditorError | null;
}

export interface CommandOutcome {
  state: EditorState;
  error: EditorError | null;
}
