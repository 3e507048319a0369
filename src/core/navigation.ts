import type { CursorPosition } from "../types/index.js";
import { CHART_HEIGHT, candleColumn } from "./chart.js";

export type NavigationDirection = "left" | "right" | "up" | "down";

export const NAVIGATION_DIRECTIONS: readonly NavigationDirection[] = ["left", "right", "up", "down"];

export interface ChartExtent {
  candles: number;
  height?: number;
}

const clamp = (value: number, max: number) => Math.max(0, Math.min(max, value));

// Cursor rows are chart rows; cursor columns are candle indexes.
export function moveCursorBy(
  cursor: CursorPosition,
  direction: NavigationDirection,
  { candles, height = CHART_HEIGHT }: ChartExtent
): CursorPosition {
  const lastCandle = Math.max(0, candles - 1);
  const lastRow = Math.max(0, height - 1);
  switch (direction) {
    case "left":
      return { row: clamp(cursor.row, lastRow), col: clamp(cursor.col - 1, lastCandle) };
    case "right":
      return { row: clamp(cursor.row, lastRow), col: clamp(cursor.col + 1, lastCandle) };
    case "up":
      return { row: clamp(cursor.row - 1, lastRow), col: clamp(cursor.col, lastCandle) };
    case "down":
      return { row: clamp(cursor.row + 1, lastRow), col: clamp(cursor.col, lastCandle) };
  }
}

/** Line (1-based) and grid column (0-based) of the cursor cell, the way editor cursor APIs take them. */
export function cursorToGrid(cursor: CursorPosition): { line: number; column: number } {
  return { line: cursor.row + 1, column: candleColumn(cursor.col) };
}

export function isNavigationDirection(value: string): value is NavigationDirection {
  return NAVIGATION_DIRECTIONS.some((direction) => direction === value);
}
