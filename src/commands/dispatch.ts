import type { Dataset, EditorState, ParseResult, PriceField, Result } from "../types/index.js";
import { CHART_HEIGHT, chartBounds, checkRenderable, priceAtRow, renderChart } from "../core/chart.js";
import { PRICE_FIELDS } from "../core/constraints.js";
import { EditorError, describeError, formatError } from "../core/errors.js";
import { cellOf } from "../core/frame.js";
import { datasetFromJson, datasetToJson } from "../core/interchange.js";
import { cursorToGrid, isNavigationDirection, moveCursorBy } from "../core/navigation.js";
import { sampleDataset } from "../core/sample.js";
import type { SandboxOptions } from "../core/sandbox.js";
import { adjustCandleCommand, currentDataset, moveCursorCommand } from "../core/state.js";
import type { BufferProvider } from "../session/buffers.js";
import { SessionStore, type SessionKey } from "../session/store.js";

export interface DispatcherOptions {
  sandbox?: SandboxOptions;
  maxSessions?: number;
}

function unwrap<T>(result: Result<T>): T {
  if (!result.success) throw result.error;
  return result.value;
}

function datasetOf(parsed: ParseResult): Dataset {
  if (!parsed.success) throw parsed.error;
  return parsed.dataset;
}

function checkCandleIndex(dataset: Dataset, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= dataset.rows.length) {
    throw new EditorError("IndexOutOfRange", `Candle index ${index} out of range (0-${dataset.rows.length - 1})`);
  }
}

function describeCursor(state: EditorState): string {
  return JSON.stringify({ ...state.cursorPosition, ...cursorToGrid(state.cursorPosition) });
}

/**
 * The operations a host editor calls. Every operation takes primitives and
 * returns a string; failures come back as a single `Error: ...` line and
 * leave buffers and sessions untouched.
 */
export class CommandDispatcher {
  readonly sessions: SessionStore;
  private readonly sandbox: SandboxOptions;

  constructor(provider: BufferProvider, options: DispatcherOptions = {}) {
    this.sandbox = options.sandbox ?? {};
    this.sessions = new SessionStore(provider, { maxEntries: options.maxSessions, sandbox: this.sandbox });
  }

  renderSample(): string {
    return this.guard("renderSample", () => renderChart(sampleDataset()));
  }

  renderSerialized(json: string): string {
    return this.guard("renderSerialized", () => renderChart(datasetOf(datasetFromJson(json))));
  }

  renderSession(variableName: string, sourceIdentity: string): string {
    return this.guard("renderSession", () => renderChart(this.sessionDataset({ variableName, sourceIdentity })));
  }

  toSerialized(variableName: string, sourceIdentity: string): string {
    return this.guard("toSerialized", () => datasetToJson(this.sessionDataset({ variableName, sourceIdentity })));
  }

  /** One candle's columns as JSON; the sample dataset when no session is named. */
  getDatasetSlice(candleIndex: number, variableName?: string, sourceIdentity?: string): string {
    return this.guard("getDatasetSlice", () => {
      const dataset = this.datasetFor(variableName, sourceIdentity);
      checkCandleIndex(dataset, candleIndex);
      const candle = dataset.rows[candleIndex];
      const slice: Record<string, unknown> = { index: candleIndex };
      for (const column of dataset.columns) {
        slice[column] = candle ? cellOf(candle, column) : null;
      }
      return JSON.stringify(slice);
    });
  }

  adjustCandle(
    candleIndex: number,
    field: string,
    direction: number,
    variableName: string,
    sourceIdentity: string
  ): string {
    return this.guard("adjustCandle", () => {
      const state = unwrap(
        this.sessions.apply({ variableName, sourceIdentity }, adjustCandleCommand(candleIndex, field, direction))
      );
      return renderChart(datasetOf(currentDataset(state, this.sandbox)));
    });
  }

  /**
   * The OHLC field of a candle closest to the price a chart row stands for,
   * as JSON `{ field, value, rowPrice }`.
   */
  getPriceNearest(candleIndex: number, rowPosition: number, variableName?: string, sourceIdentity?: string): string {
    return this.guard("getPriceNearest", () => {
      const dataset = this.datasetFor(variableName, sourceIdentity);
      const problem = checkRenderable(dataset);
      if (problem) throw problem;
      checkCandleIndex(dataset, candleIndex);
      if (!Number.isInteger(rowPosition) || rowPosition < 0 || rowPosition >= CHART_HEIGHT) {
        throw new EditorError("IndexOutOfRange", `Row position ${rowPosition} out of range (0-${CHART_HEIGHT - 1})`);
      }

      const candle = dataset.rows[candleIndex];
      const rowPrice = priceAtRow(rowPosition, chartBounds(dataset));
      let nearest: { field: PriceField; value: number } | null = null;
      for (const field of PRICE_FIELDS) {
        const value = candle ? candle[field] : NaN;
        if (!nearest || Math.abs(value - rowPrice) < Math.abs(nearest.value - rowPrice)) {
          nearest = { field, value };
        }
      }
      return JSON.stringify({ ...nearest, rowPrice });
    });
  }

  moveCursor(row: number, col: number, variableName: string, sourceIdentity: string): string {
    return this.guard("moveCursor", () =>
      describeCursor(unwrap(this.sessions.apply({ variableName, sourceIdentity }, moveCursorCommand(row, col))))
    );
  }

  /** Moves the cursor one step (`left`, `right`, `up`, `down`), held inside the chart. */
  navigate(direction: string, variableName: string, sourceIdentity: string): string {
    return this.guard("navigate", () => {
      if (!isNavigationDirection(direction)) {
        throw new EditorError("InvalidDirection", `Invalid direction: ${direction} (expected left, right, up or down)`);
      }
      const key = { variableName, sourceIdentity };
      const dataset = this.sessionDataset(key);
      const state = unwrap(this.sessions.resolve(key));
      const target = moveCursorBy(state.cursorPosition, direction, { candles: dataset.rows.length });
      return describeCursor(unwrap(this.sessions.apply(key, moveCursorCommand(target.row, target.col))));
    });
  }

  private sessionDataset(key: SessionKey): Dataset {
    const state = unwrap(this.sessions.refresh(key));
    return datasetOf(currentDataset(state, this.sandbox));
  }

  private datasetFor(variableName?: string, sourceIdentity?: string): Dataset {
    if (variableName === undefined || sourceIdentity === undefined) return sampleDataset();
    return this.sessionDataset({ variableName, sourceIdentity });
  }

  private guard(operation: string, run: () => string): string {
    try {
      return run();
    } catch (error) {
      if (!(error instanceof EditorError)) {
        console.error(`❌ ${operation} failed: ${describeError(error)}`);
      }
      return formatError(error);
    }
  }
}
