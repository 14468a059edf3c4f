/**
 * Test helpers: in-memory collaborators and event constructors.
 */

import { createBuffer } from "../src/buffer/buffer.ts";
import type { FileSystem } from "../src/buffer/types.ts";
import { resolveConfig } from "../src/config/loader.ts";
import type { EditorConfig } from "../src/config/schema.ts";
import type {
  Clipboard,
  DispatchResult,
  KeyEvent,
  Messenger,
  MouseButton,
  MouseEvent,
  NamedKey,
  PromptAnswer,
} from "../src/editor/types.ts";
import { View } from "../src/editor/view.ts";

// =============================================================================
// Fakes
// =============================================================================

/** Messenger that answers prompts from a queue and records what it was asked. */
export class FakeMessenger implements Messenger {
  readonly questions: string[] = [];
  readonly errors: string[] = [];
  private readonly _answers: PromptAnswer[] = [];

  /** Queue an answer; `null` queues a cancelled prompt. */
  answer(text: string | null): this {
    this._answers.push(text === null ? { answer: "", cancelled: true } : { answer: text, cancelled: false });
    return this;
  }

  prompt(question: string): PromptAnswer {
    this.questions.push(question);
    return this._answers.shift() ?? { answer: "", cancelled: true };
  }

  reportError(message: string): void {
    this.errors.push(message);
  }
}

export class FakeClipboard implements Clipboard {
  available = true;
  contents = "";
  failRead = false;
  failWrite = false;

  isAvailable(): boolean {
    return this.available;
  }

  write(text: string): void {
    if (this.failWrite) throw new Error("clipboard write failed");
    this.contents = text;
  }

  read(): string {
    if (this.failRead) throw new Error("clipboard read failed");
    return this.contents;
  }
}

/** File system over a Map. Paths listed in `readOnly` refuse writes. */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, string>();
  readonly readOnly = new Set<string>();

  readFile(path: string): string {
    const text = this.files.get(path);
    if (text === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
    return text;
  }

  writeFile(path: string, text: string): void {
    if (this.readOnly.has(path)) throw new Error(`EACCES: permission denied, open '${path}'`);
    this.files.set(path, text);
  }
}

// =============================================================================
// View setup
// =============================================================================

export interface TestView {
  view: View;
  messenger: FakeMessenger;
  clipboard: FakeClipboard;
  fs: MemoryFileSystem;
}

/**
 * A view over `text`. The default 80x12 terminal gives a 10-row,
 * 80-column view.
 */
export function setupView(
  text: string,
  options: { path?: string; width?: number; height?: number; config?: EditorConfig } = {},
): TestView {
  const messenger = new FakeMessenger();
  const clipboard = new FakeClipboard();
  const fs = new MemoryFileSystem();
  const view = new View({
    buffer: createBuffer(text, options.path ?? "", fs),
    messenger,
    clipboard,
    fileSystem: fs,
    terminalWidth: options.width ?? 80,
    terminalHeight: options.height ?? 12,
    config: resolveConfig(options.config ?? {}),
  });
  return { view, messenger, clipboard, fs };
}

/** `n` lines named "line 0" .. "line n-1". */
export function numberedLines(n: number): string {
  return Array.from({ length: n }, (_, i) => `line ${i}`).join("\n");
}

// =============================================================================
// Events
// =============================================================================

export function key(name: NamedKey): KeyEvent {
  return { type: "key", key: name };
}

export function char(c: string): KeyEvent {
  return { type: "key", key: "character", char: c };
}

export function ctrl(c: string): KeyEvent {
  return { type: "key", key: "character", char: c, ctrl: true };
}

export function mouse(x: number, y: number, button: MouseButton = "primary"): MouseEvent {
  return { type: "mouse", x, y, button };
}

/** Redraw level of a result, or "terminate". */
export function levelOf(result: DispatchResult): number | "terminate" {
  return result.kind === "terminate" ? "terminate" : result.level;
}
