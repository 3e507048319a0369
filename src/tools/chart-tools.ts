import { z } from "zod";
import { tool } from "ai";
import type { CommandDispatcher } from "../commands/dispatch.js";

const SessionSchema = {
  variableName: z.string().describe("Name of the DataFrame variable in the buffer, e.g. sample_df"),
  sourceIdentity: z.string().describe("Buffer to edit; for the CLI this is a file path"),
};

const RenderDatasetSchema = z.object({
  datasetJson: z
    .string()
    .describe('Column-major JSON, e.g. {"Open":[100],"High":[108],"Low":[98],"Close":[105],"Volume":[1000]}'),
});

const CandleSchema = z.object({
  candleIndex: z.number().int().describe("0-based candle index, left to right"),
  variableName: SessionSchema.variableName.optional(),
  sourceIdentity: SessionSchema.sourceIdentity.optional(),
});

const AdjustCandleSchema = z.object({
  candleIndex: z.number().int().describe("0-based candle index, left to right"),
  field: z.enum(["open", "high", "low", "close"]).describe("Price to move"),
  direction: z.union([z.literal(1), z.literal(-1)]).describe("+1 raises the price by one unit, -1 lowers it"),
  ...SessionSchema,
});

const PriceNearestSchema = z.object({
  candleIndex: z.number().int().describe("0-based candle index, left to right"),
  rowPosition: z.number().int().min(0).describe("Chart row, 0 is the top line"),
  variableName: SessionSchema.variableName.optional(),
  sourceIdentity: SessionSchema.sourceIdentity.optional(),
});

const RenderSessionSchema = z.object(SessionSchema);

/** The dispatcher's operations as tools an agent can call. Results are the dispatcher's strings. */
export function createChartTools(dispatcher: CommandDispatcher) {
  return {
    render_sample: tool({
      description: "Render the built-in five candle sample as an ASCII candlestick chart.",
      inputSchema: z.object({}),
      execute: async () => dispatcher.renderSample(),
    }),
    render_dataset: tool({
      description: "Render an OHLCV dataset given as JSON as an ASCII candlestick chart.",
      inputSchema: RenderDatasetSchema,
      execute: async ({ datasetJson }) => dispatcher.renderSerialized(datasetJson),
    }),
    render_session: tool({
      description: "Render the DataFrame a buffer defines under the given variable name.",
      inputSchema: RenderSessionSchema,
      execute: async ({ variableName, sourceIdentity }) => dispatcher.renderSession(variableName, sourceIdentity),
    }),
    get_candle: tool({
      description: "Read one candle's Open/High/Low/Close/Volume as JSON. Without a buffer, reads the sample.",
      inputSchema: CandleSchema,
      execute: async ({ candleIndex, variableName, sourceIdentity }) =>
        dispatcher.getDatasetSlice(candleIndex, variableName, sourceIdentity),
    }),
    adjust_candle: tool({
      description: `Move one price of one candle by a single unit and write the DataFrame back to the buffer.
High/Low widen automatically when Open/Close pass them; High never drops below the other prices and Low never rises above them.
Call repeatedly for larger moves. Returns the updated chart.`,
      inputSchema: AdjustCandleSchema,
      execute: async ({ candleIndex, field, direction, variableName, sourceIdentity }) =>
        dispatcher.adjustCandle(candleIndex, field, direction, variableName, sourceIdentity),
    }),
    get_price_nearest: tool({
      description: "Find which price of a candle is closest to a chart row. Returns JSON { field, value, rowPrice }.",
      inputSchema: PriceNearestSchema,
      execute: async ({ candleIndex, rowPosition, variableName, sourceIdentity }) =>
        dispatcher.getPriceNearest(candleIndex, rowPosition, variableName, sourceIdentity),
    }),
  };
}

export type ChartTools = ReturnType<typeof createChartTools>;
