import { z } from "zod";
import type { Dataset, ParseResult } from "../types/index.js";
import { EditorError, describeError } from "./errors.js";
import { Frame, cellOf, frameToDataset } from "./frame.js";

const Cell = z.union([z.number(), z.string(), z.boolean(), z.null()]);

// { "Open": [..] }, { "Open": { "0": .. } } or [{ "Open": .. }, ..]
const SerializedDataset = z.union([
  z.array(z.record(z.string(), Cell)),
  z.record(z.string(), z.union([z.array(Cell), z.record(z.string(), Cell)])),
]);

type SerializedDataset = z.infer<typeof SerializedDataset>;

function invalid(message: string): ParseResult {
  return { success: false, dataset: null, error: new EditorError("InvalidInterchange", message) };
}

function indexKeyedToArray(column: Record<string, z.infer<typeof Cell>>): z.infer<typeof Cell>[] {
  return Object.entries(column)
    .map(([key, value]) => [Number(key), value] as const)
    .sort(([a], [b]) => a - b)
    .map(([, value]) => value);
}

function toFrameInput(parsed: SerializedDataset): unknown {
  if (Array.isArray(parsed)) return parsed;
  return Object.fromEntries(
    Object.entries(parsed).map(([name, column]) => [name, Array.isArray(column) ? column : indexKeyedToArray(column)])
  );
}

/** Reads a JSON dataset (column-major, index-keyed columns or row records). */
export function datasetFromJson(json: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    return invalid(`Invalid dataset JSON: ${describeError(error)}`);
  }

  const parsed = SerializedDataset.safeParse(raw);
  if (!parsed.success) {
    return invalid(`Invalid dataset JSON: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`);
  }

  try {
    return frameToDataset(new Frame(toFrameInput(parsed.data)));
  } catch (error) {
    return invalid(`Invalid dataset JSON: ${describeError(error)}`);
  }
}

/** Column-major JSON, one array per dataset column. */
export function datasetToJson(dataset: Dataset): string {
  const columns: Record<string, unknown[]> = {};
  for (const column of dataset.columns) {
    columns[column] = dataset.rows.map((candle) => cellOf(candle, column));
  }
  return JSON.stringify(columns);
}
