import { existsSync, readFileSync, writeFileSync } from "fs";
import { resolve } from "path";

/** Where buffer text lives. Identities are opaque to the editor. */
export interface BufferProvider {
  getText(identity: string): string | undefined;
  setText(identity: string, text: string): boolean;
}

export class MemoryBufferProvider implements BufferProvider {
  private readonly buffers = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [identity, text] of Object.entries(initial)) {
      this.buffers.set(identity, text);
    }
  }

  getText(identity: string): string | undefined {
    return this.buffers.get(identity);
  }

  setText(identity: string, text: string): boolean {
    this.buffers.set(identity, text);
    return true;
  }
}

/** Identities are file paths, relative ones resolved against `baseDir`. */
export class FileBufferProvider implements BufferProvider {
  constructor(private readonly baseDir = process.cwd()) {}

  private pathOf(identity: string): string {
    return resolve(this.baseDir, identity);
  }

  getText(identity: string): string | undefined {
    const filePath = this.pathOf(identity);
    if (!existsSync(filePath)) return undefined;
    try {
      return readFileSync(filePath, "utf8");
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️  Could not read ${filePath}: ${msg}`);
      return undefined;
    }
  }

  setText(identity: string, text: string): boolean {
    const filePath = this.pathOf(identity);
    try {
      writeFileSync(filePath, text);
      return true;
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️  Could not write ${filePath}: ${msg}`);
      return false;
    }
  }
}
