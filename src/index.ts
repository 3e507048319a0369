#!/usr/bin/env node
import { env } from "./config/env.js";
import { runAgent } from "./agent.js";
import { CommandDispatcher } from "./commands/dispatch.js";
import { FileBufferProvider } from "./session/buffers.js";

const USAGE = `Usage:
  candle-editor sample
  candle-editor render <file> <variable>
  candle-editor candle <file> <variable> <index>
  candle-editor adjust <file> <variable> <index> <open|high|low|close> <up|down> [times]
  candle-editor nearest <file> <variable> <index> <row>
  candle-editor json <file> <variable>
  candle-editor agent <prompt...>`;

const DIRECTIONS: Record<string, number> = { up: 1, down: -1, "+1": 1, "-1": -1, "1": 1 };

function toInt(value: string | undefined, name: string): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got ${value ?? "nothing"}`);
  }
  return parsed;
}

function required(value: string | undefined, name: string): string {
  if (!value) throw new Error(`Missing ${name}\n\n${USAGE}`);
  return value;
}

async function main(argv: string[]): Promise<string> {
  const [command, ...args] = argv;
  const dispatcher = new CommandDispatcher(new FileBufferProvider(), {
    sandbox: { timeoutMs: env.EVAL_TIMEOUT_MS },
    maxSessions: env.SESSION_MAX_ENTRIES,
  });

  switch (command) {
    case "sample":
      return dispatcher.renderSample();
    case "render":
      return dispatcher.renderSession(required(args[1], "variable"), required(args[0], "file"));
    case "json":
      return dispatcher.toSerialized(required(args[1], "variable"), required(args[0], "file"));
    case "candle":
      return dispatcher.getDatasetSlice(toInt(args[2], "index"), required(args[1], "variable"), required(args[0], "file"));
    case "nearest":
      return dispatcher.getPriceNearest(
        toInt(args[2], "index"),
        toInt(args[3], "row"),
        required(args[1], "variable"),
        required(args[0], "file")
      );
    case "adjust": {
      const file = required(args[0], "file");
      const variable = required(args[1], "variable");
      const index = toInt(args[2], "index");
      const field = required(args[3], "field");
      const direction = DIRECTIONS[required(args[4], "direction")] ?? NaN;
      const times = args[5] === undefined ? 1 : toInt(args[5], "times");

      let chart = "";
      for (let i = 0; i < times; i++) {
        chart = dispatcher.adjustCandle(index, field, direction, variable, file);
        if (chart.startsWith("Error:")) break;
      }
      if (!chart.startsWith("Error:")) console.log(`✏️  ${variable}[${index}].${field} ${direction > 0 ? "+" : "-"}${times} in ${file}`);
      return chart;
    }
    case "agent": {
      const prompt = args.join(" ");
      const result = await runAgent(required(prompt, "prompt"), dispatcher);
      return result.text;
    }
    default:
      return USAGE;
  }
}

main(process.argv.slice(2))
  .then((output) => {
    console.log(output);
    if (output.startsWith("Error:")) process.exitCode = 1;
  })
  .catch((error: unknown) => {
    const msg = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${msg}`);
    process.exitCode = 1;
  });
