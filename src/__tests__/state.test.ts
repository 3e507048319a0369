import { describe, expect, it } from "vitest";
import {
  adjustCandleCommand,
  createEditorState,
  currentDataset,
  handleEditorCommand,
  moveCursorCommand,
} from "../core/state.js";

const BUFFER = [
  "const df = DataFrame({",
  "  Open: [100, 105],",
  "  High: [108, 112],",
  "  Low: [98, 103],",
  "  Close: [105, 110],",
  "});",
].join("\n");

describe("createEditorState", () => {
  it("starts with the cursor at the origin and cannot be modified", () => {
    const state = createEditorState(BUFFER, "df", "prices.js");

    expect(state.cursorPosition).toEqual({ row: 0, col: 0 });
    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.cursorPosition)).toBe(true);
  });
});

describe("handleEditorCommand", () => {
  it("rewrites the buffer for a candle adjustment", () => {
    const state = createEditorState(BUFFER, "df", "prices.js", { row: 2, col: 1 });
    const { state: next, error } = handleEditorCommand(state, adjustCandleCommand(1, "close", -1));

    expect(error).toBeNull();
    expect(next).not.toBe(state);
    expect(next.bufferContent.split("\n")).toEqual([
      "const df = DataFrame({",
      "  Open: [100, 105],",
      "  High: [108, 112],",
      "  Low: [98, 103],",
      "  Close: [105, 109],",
      "});",
    ]);
    expect(next.cursorPosition).toEqual({ row: 2, col: 1 });
    expect(next.variableName).toBe("df");
    expect(next.sourceIdentity).toBe("prices.js");
    expect(state.bufferContent).toBe(BUFFER);
    expect(currentDataset(next).dataset?.rows[1]?.close).toBe(109);
  });

  it("returns the same state when the buffer does not parse", () => {
    const state = createEditorState("const = ;", "df", "broken.js");
    const outcome = handleEditorCommand(state, adjustCandleCommand(0, "open", 1));

    expect(outcome.state).toBe(state);
    expect(outcome.error?.code).toBe("EvaluationError");
  });

  it("returns the same state when the adjustment is rejected", () => {
    const state = createEditorState(BUFFER, "df", "prices.js");
    const outcome = handleEditorCommand(state, adjustCandleCommand(5, "open", 1));

    expect(outcome.state).toBe(state);
    expect(outcome.error?.code).toBe("IndexOutOfRange");
  });

  it("moves the cursor without touching the buffer", () => {
    const state = createEditorState(BUFFER, "df", "prices.js");
    const { state: next, error } = handleEditorCommand(state, moveCursorCommand(3, 1));

    expect(error).toBeNull();
    expect(next.cursorPosition).toEqual({ row: 3, col: 1 });
    expect(next.bufferContent).toBe(BUFFER);
    expect(state.cursorPosition).toEqual({ row: 0, col: 0 });
  });
});
