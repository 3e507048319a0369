import vm from "node:vm";
import { format as formatText } from "node:util";
import { addDays, addHours, addMinutes, format, parseISO, startOfDay, subDays } from "date-fns";
import type { Result } from "../types/index.js";
import { EditorError, describeError } from "./errors.js";
import { DataFrame } from "./frame.js";

export const DEFAULT_EVAL_TIMEOUT_MS = 1000;

export interface SandboxOptions {
  /** Wall-clock budget for running the buffer text. */
  timeoutMs?: number;
  /** Clock behind `datetime.DateTime.now()` and friends. */
  now?: () => Date;
  /** Source of `random.*` values, uniform in [0, 1). */
  random?: () => number;
  /** Shown in stack traces of evaluation errors. */
  filename?: string;
}

export interface Evaluation {
  /** Resolves a name the way the buffer would: lexical bindings first, then globals. */
  lookup(name: string): { found: true; value: unknown } | { found: false };
  /** Names the buffer bound, lexical declarations first. */
  bindings(): string[];
  /** Console output captured while the buffer ran. */
  readonly output: readonly string[];
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const DECLARATION = /\b(?:const|let|var|class|function)\s+([A-Za-z_$][\w$]*)/g;
const DATETIME_SHORTCUT = /\bdatetime\.(?:now|today|utcnow) is not a function/;

type DateUnit = "day" | "hour" | "minute";

const STEPPERS: Record<DateUnit, (date: Date, amount: number) => Date> = {
  day: addDays,
  hour: addHours,
  minute: addMinutes,
};

function toDate(value: Date | string | number): Date {
  return typeof value === "string" ? parseISO(value) : new Date(value);
}

function createDatetimeModule(now: () => Date, withShortcuts: boolean) {
  const DateTime = Object.freeze({
    now: () => now(),
    today: () => startOfDay(now()),
    utcnow: () => now(),
  });

  const dateRange = (start: Date | string | number, periods: number, unit: DateUnit = "day"): Date[] => {
    const origin = toDate(start);
    const step = STEPPERS[unit];
    return Array.from({ length: periods }, (_, i) => step(origin, i));
  };

  const module = { DateTime, addDays, subDays, addHours, addMinutes, startOfDay, parseISO, format, dateRange };
  return Object.freeze(
    withShortcuts ? { ...module, now: DateTime.now, today: DateTime.today, utcnow: DateTime.utcnow } : module
  );
}

function createRandomModule(random: () => number) {
  const uniform = (low: number, high: number) => low + (high - low) * random();
  return Object.freeze({
    random: () => random(),
    uniform,
    randint: (low: number, high: number) => Math.floor(uniform(low, high + 1)),
    gauss: (mean = 0, sigma = 1) => {
      const u = 1 - random();
      const v = random();
      return mean + sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    },
    choice: <T>(items: readonly T[]): T | undefined => items[Math.floor(random() * items.length)],
  });
}

function range(start: number, stop?: number, step = 1): number[] {
  const [from, to] = stop === undefined ? [0, start] : [start, stop];
  const values: number[] = [];
  if (step === 0) return values;
  for (let v = from; step > 0 ? v < to : v > to; v += step) values.push(v);
  return values;
}

function round(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function createGlobals(options: Required<Omit<SandboxOptions, "filename">>, output: string[], withShortcuts: boolean) {
  const capture = (...args: unknown[]) => {
    output.push(formatText(...args));
  };
  return {
    DataFrame,
    datetime: createDatetimeModule(options.now, withShortcuts),
    random: createRandomModule(options.random),
    range,
    round,
    console: Object.freeze({ log: capture, info: capture, warn: capture, error: capture, debug: capture }),
  };
}

const INJECTED = new Set(Object.keys(createGlobals({ timeoutMs: 0, now: () => new Date(0), random: () => 0 }, [], false)));

function createEvaluation(context: vm.Context, source: string, output: string[], timeout: number): Evaluation {
  const lookup: Evaluation["lookup"] = (name) => {
    if (!IDENTIFIER.test(name)) return { found: false };
    try {
      const probe = new vm.Script(`(() => { try { return [true, ${name}]; } catch { return [false]; } })()`);
      const outcome: unknown = probe.runInContext(context, { timeout });
      return Array.isArray(outcome) && outcome[0] === true ? { found: true, value: outcome[1] } : { found: false };
    } catch {
      // Reserved words and the like are never bindings.
      return { found: false };
    }
  };

  const bindings = () => {
    const lexical = [...source.matchAll(DECLARATION)].map((match) => match[1] ?? "");
    const globals = Object.keys(context).filter((name) => !INJECTED.has(name));
    return [...new Set([...lexical, ...globals])].filter((name) => name && !name.startsWith("_") && lookup(name).found);
  };

  return { lookup, bindings, output };
}

function run(source: string, options: Required<SandboxOptions>, withShortcuts: boolean): Evaluation {
  const output: string[] = [];
  const context = vm.createContext(createGlobals(options, output, withShortcuts), {
    codeGeneration: { strings: false, wasm: false },
  });
  new vm.Script(source, { filename: options.filename }).runInContext(context, { timeout: options.timeoutMs });
  return createEvaluation(context, source, output, options.timeoutMs);
}

/**
 * Runs buffer text in a fresh vm context that only offers the table constructor,
 * date/time, random and numeric helpers. `datetime.now()` style calls are retried
 * once with the shortcuts mounted on the module.
 */
export function evaluateBuffer(source: string, options: SandboxOptions = {}): Result<Evaluation> {
  const resolved: Required<SandboxOptions> = {
    timeoutMs: options.timeoutMs ?? DEFAULT_EVAL_TIMEOUT_MS,
    now: options.now ?? (() => new Date()),
    random: options.random ?? Math.random,
    filename: options.filename ?? "<buffer>",
  };

  try {
    return { success: true, value: run(source, resolved, false) };
  } catch (error) {
    const message = describeError(error);
    if (!DATETIME_SHORTCUT.test(message)) {
      return { success: false, error: new EditorError("EvaluationError", `Error parsing buffer: ${message}`) };
    }
  }

  try {
    return { success: true, value: run(source, resolved, true) };
  } catch (error) {
    return {
      success: false,
      error: new EditorError(
        "DatetimeUsageError",
        `Datetime usage error: use 'datetime.DateTime.now()' instead of 'datetime.now()'. Error: ${describeError(error)}`
      ),
    };
  }
}
