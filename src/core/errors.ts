import { types } from "node:util";

export type ErrorCode =
  | "IndexOutOfRange"
  | "InvalidField"
  | "InvalidDirection"
  | "VariableNotFound"
  | "NotADataset"
  | "MissingColumns"
  | "DatetimeUsageError"
  | "EvaluationError"
  | "BufferUnavailable"
  | "EmptyDataset"
  | "FlatPriceRange"
  | "InvalidInterchange"
  | "InternalError";

export class EditorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "EditorError";
    this.code = code;
  }
}

/**
 * Message of anything thrown, including errors raised inside a vm context,
 * which are not `instanceof Error` in this realm.
 */
export function describeError(error: unknown): string {
  return types.isNativeError(error) ? error.message : String(error);
}

/** Formats a failure the way the command layer hands it to a host: one line, `Error:` prefixed. */
export function formatError(error: unknown): string {
  const message = error instanceof EditorError ? error.message : describeError(error);
  return `Error: ${message.replace(/\s*\r?\n\s*/g, " ").trim()}`;
}
