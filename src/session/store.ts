import type { EditorCommand, EditorState, Result } from "../types/index.js";
import { EditorError, describeError } from "../core/errors.js";
import type { SandboxOptions } from "../core/sandbox.js";
import { createEditorState, handleEditorCommand, withBuffer } from "../core/state.js";
import type { BufferProvider } from "./buffers.js";

export interface SessionKey {
  sourceIdentity: string;
  variableName: string;
}

export interface SessionStoreOptions {
  /** Least recently used sessions are dropped beyond this count. Unbounded by default. */
  maxEntries?: number;
  sandbox?: SandboxOptions;
}

function unavailable(identity: string): EditorError {
  return new EditorError("BufferUnavailable", `Buffer '${identity}' is not available`);
}

/**
 * Latest editor state per (source identity, variable name). States are
 * replaced, never modified; a failed command leaves both the stored state and
 * the buffer as they were. Callers run at most one command per key at a time.
 */
export class SessionStore {
  private readonly sessions = new Map<string, EditorState>();
  private readonly maxEntries: number;
  private readonly sandbox: SandboxOptions;

  constructor(
    private readonly provider: BufferProvider,
    options: SessionStoreOptions = {}
  ) {
    this.maxEntries = options.maxEntries ?? Infinity;
    this.sandbox = options.sandbox ?? {};
  }

  static keyOf({ sourceIdentity, variableName }: SessionKey): string {
    return JSON.stringify([sourceIdentity, variableName]);
  }

  get size(): number {
    return this.sessions.size;
  }

  get(key: SessionKey): EditorState | undefined {
    return this.sessions.get(SessionStore.keyOf(key));
  }

  /** Returns the session's state, creating it from the buffer on first reference. */
  resolve(key: SessionKey): Result<EditorState> {
    const existing = this.get(key);
    if (existing) {
      this.install(key, existing);
      return { success: true, value: existing };
    }

    const text = this.provider.getText(key.sourceIdentity);
    if (text === undefined) {
      return { success: false, error: unavailable(key.sourceIdentity) };
    }
    const state = createEditorState(text, key.variableName, key.sourceIdentity);
    this.install(key, state);
    return { success: true, value: state };
  }

  /** Resolves the session and picks up edits made to the buffer outside the editor. */
  refresh(key: SessionKey): Result<EditorState> {
    const resolved = this.resolve(key);
    if (!resolved.success) return resolved;

    const text = this.provider.getText(key.sourceIdentity);
    if (text === undefined) {
      return { success: false, error: unavailable(key.sourceIdentity) };
    }
    if (text === resolved.value.bufferContent) return resolved;

    const state = withBuffer(resolved.value, text);
    this.install(key, state);
    return { success: true, value: state };
  }

  apply(key: SessionKey, command: EditorCommand): Result<EditorState> {
    try {
      return this.applyUnguarded(key, command);
    } catch (error) {
      console.error(`❌ Session command failed: ${describeError(error)}`);
      return { success: false, error: new EditorError("InternalError", `Unexpected failure: ${describeError(error)}`) };
    }
  }

  private applyUnguarded(key: SessionKey, command: EditorCommand): Result<EditorState> {
    const resolved = this.resolve(key);
    if (!resolved.success) return resolved;

    let current = resolved.value;
    if (command.kind === "adjustCandle") {
      // The buffer may have been edited by hand since the last command.
      const text = this.provider.getText(key.sourceIdentity);
      if (text === undefined) {
        return { success: false, error: unavailable(key.sourceIdentity) };
      }
      if (text !== current.bufferContent) current = withBuffer(current, text);
    }

    const outcome = handleEditorCommand(current, command, this.sandbox);
    if (outcome.error) {
      return { success: false, error: outcome.error };
    }

    if (outcome.state.bufferContent !== current.bufferContent) {
      if (!this.provider.setText(key.sourceIdentity, outcome.state.bufferContent)) {
        return { success: false, error: unavailable(key.sourceIdentity) };
      }
    }

    this.install(key, outcome.state);
    return { success: true, value: outcome.state };
  }

  private install(key: SessionKey, state: EditorState): void {
    const id = SessionStore.keyOf(key);
    this.sessions.delete(id);
    this.sessions.set(id, state);

    while (this.sessions.size > this.maxEntries) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }
}
