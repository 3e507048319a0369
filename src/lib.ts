export * from "./types/index.js";
export { EditorError, formatError, type ErrorCode } from "./core/errors.js";
export { renderChart, chartBounds, priceAtRow, CHART_HEIGHT, CANDLE_WIDTH } from "./core/chart.js";
export { adjustCandle, PRICE_FIELDS, ADJUSTMENT_STEP } from "./core/constraints.js";
export { parseBuffer, serializeDataset, findDefinition, replaceDefinition, type DefinitionSpan } from "./core/codec.js";
export { DataFrame, Frame, createDataset } from "./core/frame.js";
export { datasetFromJson, datasetToJson } from "./core/interchange.js";
export { moveCursorBy, cursorToGrid, type NavigationDirection } from "./core/navigation.js";
export { evaluateBuffer, type SandboxOptions } from "./core/sandbox.js";
export {
  createEditorState,
  handleEditorCommand,
  adjustCandleCommand,
  moveCursorCommand,
  currentDataset,
} from "./core/state.js";
export { SessionStore, type SessionKey } from "./session/store.js";
export { MemoryBufferProvider, FileBufferProvider, type BufferProvider } from "./session/buffers.js";
export { CommandDispatcher } from "./commands/dispatch.js";
export { createChartTools } from "./tools/index.js";
