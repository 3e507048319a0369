import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import { generateText, stepCountIs } from "ai";
import { env, warnMissingKeys, type ModelProvider } from "./config/env.js";
import type { CommandDispatcher } from "./commands/dispatch.js";
import { createChartTools } from "./tools/index.js";

const DEFAULT_MODELS: Record<ModelProvider, string> = {
  anthropic: "claude-opus-4-5",
  openai: "gpt-5.1",
};

function getSystemPrompt(): string {
  return `You edit OHLCV candlestick data that lives in text buffers.

## Buffers
A buffer is a small script that defines tables with the DataFrame constructor:

  const prices = DataFrame({
    Open: [100, 105],
    High: [108, 112],
    Low: [98, 103],
    Close: [105, 110],
    Volume: [1000, 1200],
  });

Address a table by its variable name and the buffer's identity (a file path).

## Tools
- render_session / render_sample / render_dataset: draw ASCII charts
  ('^' bullish body, 'v' bearish body, '|' wick, 10 lines, 3 columns per candle)
- get_candle: read one candle
- get_price_nearest: map a chart row to the closest price of a candle
- adjust_candle: move one price by one unit; repeat for larger moves

## Rules
- Look at the chart before and after editing.
- Every tool returns text; results starting with "Error:" changed nothing.
- Report the final chart and the values you changed.`;
}

export interface AgentOptions {
  provider?: ModelProvider;
  maxSteps?: number;
}

export async function runAgent(userPrompt: string, dispatcher: CommandDispatcher, options: AgentOptions = {}) {
  const provider = options.provider ?? env.MODEL_PROVIDER;
  const maxSteps = options.maxSteps ?? env.AGENT_MAX_STEPS;
  const modelName = env.MODEL_NAME ?? DEFAULT_MODELS[provider];
  warnMissingKeys();

  console.log("\n" + "=".repeat(60));
  console.log(`🧠 Model: ${provider}/${modelName}`);
  console.log("🤖 Prompt:", userPrompt);
  console.log("=".repeat(60) + "\n");

  const model = provider === "anthropic" ? anthropic(modelName) : openai(modelName);

  const result = await generateText({
    model,
    system: getSystemPrompt(),
    prompt: userPrompt,
    tools: createChartTools(dispatcher),
    stopWhen: stepCountIs(maxSteps),
    onStepFinish: (step) => {
      console.log(`\n--- Step done (${step.finishReason}) ---`);
      for (const tr of step.toolResults) {
        const output = String(tr.output);
        console.log(`🔧 ${tr.toolName}:\n${output.slice(0, 600)}${output.length > 600 ? "..." : ""}`);
      }
    },
  });

  console.log("\n📝 Response:", result.text);
  console.log("📊 Usage:", result.usage);
  return result;
}
