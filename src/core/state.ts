import type { CommandOutcome, CursorPosition, EditorCommand, EditorState, ParseResult } from "../types/index.js";
import { replaceDefinition, parseBuffer } from "./codec.js";
import { adjustCandle } from "./constraints.js";
import type { SandboxOptions } from "./sandbox.js";

export function createEditorState(
  bufferContent: string,
  variableName: string,
  sourceIdentity: string,
  cursorPosition: CursorPosition = { row: 0, col: 0 }
): EditorState {
  return Object.freeze({
    bufferContent,
    variableName,
    sourceIdentity,
    cursorPosition: Object.freeze({ ...cursorPosition }),
  });
}

export function withBuffer(state: EditorState, bufferContent: string): EditorState {
  return createEditorState(bufferContent, state.variableName, state.sourceIdentity, state.cursorPosition);
}

export function adjustCandleCommand(index: number, field: string, direction: number): EditorCommand {
  return Object.freeze({ kind: "adjustCandle", index, field, direction });
}

export function moveCursorCommand(row: number, col: number): EditorCommand {
  return Object.freeze({ kind: "moveCursor", row, col });
}

export function currentDataset(state: EditorState, options: SandboxOptions = {}): ParseResult {
  return parseBuffer(state.bufferContent, state.variableName, { filename: state.sourceIdentity, ...options });
}

/**
 * Applies one command to a state and returns the state that follows it. The
 * input state is never modified; on error it is returned as is.
 */
export function handleEditorCommand(
  state: EditorState,
  command: EditorCommand,
  options: SandboxOptions = {}
): CommandOutcome {
  switch (command.kind) {
    case "adjustCandle": {
      const parsed = currentDataset(state, options);
      if (!parsed.success) {
        return { state, error: parsed.error };
      }

      const adjusted = adjustCandle(parsed.dataset, command.index, command.field, command.direction);
      if (adjusted.error) {
        return { state, error: adjusted.error };
      }

      const bufferContent = replaceDefinition(state.bufferContent, state.variableName, adjusted.dataset);
      return { state: withBuffer(state, bufferContent), error: null };
    }
    case "moveCursor":
      return {
        state: createEditorState(state.bufferContent, state.variableName, state.sourceIdentity, {
          row: command.row,
          col: command.col,
        }),
        error: null,
      };
  }
}
