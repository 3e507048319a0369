import { types } from "node:util";
import type { CellValue, Dataset, ParseResult } from "../types/index.js";
import { EditorError } from "./errors.js";
import { Frame, cellOf, frameToDataset } from "./frame.js";
import { evaluateBuffer, type Evaluation, type SandboxOptions } from "./sandbox.js";

export const TABLE_CONSTRUCTOR = "DataFrame";

export interface DefinitionSpan {
  /** First line of the definition, 0-based. */
  start: number;
  /** Line holding the closing parenthesis, inclusive. */
  end: number;
  /** Text before the variable name on the first line (indentation, `const `). */
  prefix: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function definitionPattern(variableName: string): RegExp {
  return new RegExp(`(^|[^\\w$.])${escapeRegExp(variableName)}\\s*=\\s*(?:new\\s+)?${TABLE_CONSTRUCTOR}\\(`);
}

function parenBalance(line: string): number {
  let balance = 0;
  for (const ch of line) {
    if (ch === "(") balance++;
    else if (ch === ")") balance--;
  }
  return balance;
}

/** Finds the first `name = DataFrame(` assignment and the line its parentheses close on. */
export function findDefinition(bufferContent: string, variableName: string): DefinitionSpan | null {
  const lines = bufferContent.split("\n");
  const pattern = definitionPattern(variableName);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const match = pattern.exec(line);
    if (!match) continue;

    let balance = parenBalance(line);
    let end = i;
    while (end < lines.length - 1 && balance > 0) {
      end++;
      balance += parenBalance(lines[end] ?? "");
    }
    const nameStart = match.index + (match[1] ?? "").length;
    return { start: i, end, prefix: line.slice(0, nameStart) };
  }
  return null;
}

function typeLabel(value: unknown): string {
  if (value instanceof Frame) return TABLE_CONSTRUCTOR;
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (types.isDate(value)) return "Date";
  return typeof value;
}

function describeBindings(evaluation: Evaluation): string {
  const labelled = evaluation.bindings().map((name) => {
    const entry = evaluation.lookup(name);
    return { name, isFrame: entry.found && entry.value instanceof Frame, label: `${name}(${entry.found ? typeLabel(entry.value) : "undefined"})` };
  });
  const frames = labelled.filter((binding) => binding.isFrame);

  if (frames.length > 0) {
    return `Available DataFrames: ${frames.map((binding) => binding.label).join(", ")}`;
  }
  if (labelled.length > 0) {
    return `No DataFrames containing OHLC data found. Available variables: ${labelled.map((binding) => binding.label).join(", ")}`;
  }
  return "No DataFrames containing OHLC data found";
}

/**
 * Evaluates the buffer and extracts the named DataFrame as a dataset. The
 * returned dataset is a copy; nothing in it is shared with the evaluation.
 */
export function parseBuffer(bufferContent: string, variableName: string, options: SandboxOptions = {}): ParseResult {
  const evaluated = evaluateBuffer(bufferContent, options);
  if (!evaluated.success) {
    return { success: false, dataset: null, error: evaluated.error };
  }

  const evaluation = evaluated.value;
  const entry = evaluation.lookup(variableName);
  if (!entry.found) {
    return {
      success: false,
      dataset: null,
      error: new EditorError("VariableNotFound", `Variable '${variableName}' not found. ${describeBindings(evaluation)}`),
    };
  }
  if (!(entry.value instanceof Frame)) {
    return {
      success: false,
      dataset: null,
      error: new EditorError("NotADataset", `Variable '${variableName}' is not a ${TABLE_CONSTRUCTOR}`),
    };
  }
  return frameToDataset(entry.value);
}

/** Integral values lose the decimal point; fractional ones keep exactly one digit. */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return Number.isFinite(value) ? value.toFixed(1) : String(value);
}

function formatCell(value: CellValue): string {
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "string") return JSON.stringify(value);
  if (value instanceof Date) return `new Date(${JSON.stringify(value.toISOString())})`;
  return String(value);
}

function formatKey(column: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(column) ? column : JSON.stringify(column);
}

/** Writes the dataset back as a `name = DataFrame({...});` assignment, columns in dataset order. */
export function serializeDataset(dataset: Dataset, variableName: string): string {
  const lines = [`${variableName} = ${TABLE_CONSTRUCTOR}({`];
  for (const column of dataset.columns) {
    const values = dataset.rows.map((candle) => formatCell(cellOf(candle, column)));
    lines.push(`  ${formatKey(column)}: [${values.join(", ")}],`);
  }
  lines.push("});");
  return lines.join("\n");
}

/**
 * Splices the serialized dataset over the variable's definition, or appends it
 * when there is none. Other mentions of the variable are left as they are.
 */
export function replaceDefinition(bufferContent: string, variableName: string, dataset: Dataset): string {
  const fragment = serializeDataset(dataset, variableName);
  const span = findDefinition(bufferContent, variableName);

  if (!span) {
    return `${bufferContent}\n\n${fragment}`;
  }

  const lines = bufferContent.split("\n");
  const replacement = fragment.split("\n");
  replacement[0] = span.prefix + (replacement[0] ?? "");
  return [...lines.slice(0, span.start), ...replacement, ...lines.slice(span.end + 1)].join("\n");
}
