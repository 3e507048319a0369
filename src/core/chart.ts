import type { Dataset, OHLCVRow } from "../types/index.js";
import { EditorError } from "./errors.js";

export const CHART_HEIGHT = 10;
export const CANDLE_WIDTH = 3;
export const BULLISH_BODY = "^";
export const BEARISH_BODY = "v";
export const WICK = "|";
export const EMPTY = " ";

export const NO_DATA_MESSAGE = "No data to render.";
export const FLAT_RANGE_MESSAGE = "Price range is flat, cannot render meaningful chart.";

export interface ChartBounds {
  minPrice: number;
  maxPrice: number;
}

type Grid = string[][];

export function chartBounds(dataset: Dataset): ChartBounds {
  let minPrice = Infinity;
  let maxPrice = -Infinity;
  for (const row of dataset.rows) {
    minPrice = Math.min(minPrice, row.low);
    maxPrice = Math.max(maxPrice, row.high);
  }
  return { minPrice, maxPrice };
}

/** Returns the reason a dataset cannot be drawn, or null when it can. */
export function checkRenderable(dataset: Dataset): EditorError | null {
  if (dataset.rows.length === 0) {
    return new EditorError("EmptyDataset", NO_DATA_MESSAGE);
  }
  const { minPrice, maxPrice } = chartBounds(dataset);
  if (maxPrice === minPrice) {
    return new EditorError("FlatPriceRange", FLAT_RANGE_MESSAGE);
  }
  return null;
}

/** Row 0 is the top of the chart (highest price). */
export function createPriceToRow(
  { minPrice, maxPrice }: ChartBounds,
  height = CHART_HEIGHT
): (price: number) => number {
  const span = maxPrice - minPrice;
  return (price) => {
    const row = Math.round((1 - (price - minPrice) / span) * (height - 1));
    return Math.max(0, Math.min(height - 1, row));
  };
}

/** Price a chart row stands for; the inverse of `createPriceToRow` before rounding. */
export function priceAtRow(row: number, { minPrice, maxPrice }: ChartBounds, height = CHART_HEIGHT): number {
  return maxPrice - (row / (height - 1)) * (maxPrice - minPrice);
}

export function candleColumn(index: number): number {
  return index * CANDLE_WIDTH + 1;
}

function createGrid(candles: number, height = CHART_HEIGHT): Grid {
  const width = candles * CANDLE_WIDTH;
  return Array.from({ length: height }, () => Array.from({ length: width }, () => EMPTY));
}

function fillColumn(grid: Grid, col: number, fromRow: number, toRow: number, glyph: string): void {
  const start = Math.min(fromRow, toRow);
  const end = Math.max(fromRow, toRow);
  for (let r = start; r <= end; r++) {
    const line = grid[r];
    if (line) line[col] = glyph;
  }
}

function drawCandle(grid: Grid, index: number, candle: OHLCVRow, priceToRow: (price: number) => number): void {
  const col = candleColumn(index);
  fillColumn(grid, col, priceToRow(candle.high), priceToRow(candle.low), WICK);

  const body = candle.close >= candle.open ? BULLISH_BODY : BEARISH_BODY;
  fillColumn(grid, col, priceToRow(candle.open), priceToRow(candle.close), body);
}

/**
 * Renders the dataset as an ASCII candlestick chart, `CHART_HEIGHT` lines of
 * `CANDLE_WIDTH` characters per candle. Datasets that cannot be drawn produce a
 * one-line explanation instead of a chart.
 */
export function renderChart(dataset: Dataset): string {
  const problem = checkRenderable(dataset);
  if (problem) return problem.message;

  const priceToRow = createPriceToRow(chartBounds(dataset));
  const grid = createGrid(dataset.rows.length);
  dataset.rows.forEach((candle, i) => drawCandle(grid, i, candle, priceToRow));

  return grid.map((line) => line.join("")).join("\n");
}
