import { appendFileSync, writeFileSync } from "node:fs";
import type { DispatchResult, InputEvent } from "./editor/types.ts";

/**
 * Editor debug logger. Enabled by setting CELLPAD_DEBUG=/path/to/file.jsonl
 *
 * Records every dispatched event with its result and the resulting cursor
 * and viewport, so a session can be replayed and inspected without a real
 * terminal.
 *
 * Usage:
 *   CELLPAD_DEBUG=/tmp/cellpad.jsonl <editor>
 *   tail -f /tmp/cellpad.jsonl
 */

export interface DispatchEntry {
  type: "event";
  seq: number;
  ts: number;
  event: InputEvent;
  result: DispatchResult;
  loc: number;
  topline: number;
}

export interface ErrorEntry {
  type: "error";
  seq: number;
  ts: number;
  message: string;
}

export type DebugEntry = DispatchEntry | ErrorEntry;

export class DebugLogger {
  private path: string;
  private seq = 0;
  private enabled: boolean;

  constructor(path: string | undefined) {
    this.path = path ?? "";
    this.enabled = !!path;
    if (this.enabled) {
      // Truncate / create the file at startup
      try {
        writeFileSync(this.path, "");
      } catch (err) {
        this.enabled = false;
        process.emitWarning(`Debug log disabled: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /** Logger configured from CELLPAD_DEBUG. */
  static fromEnv(env: Record<string, string | undefined> = process.env): DebugLogger {
    return new DebugLogger(env.CELLPAD_DEBUG);
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  logDispatch(entry: Omit<DispatchEntry, "type" | "seq" | "ts">): void {
    if (!this.enabled) return;
    this.write({ type: "event", seq: this.seq++, ts: Date.now(), ...entry });
  }

  logError(message: string): void {
    if (!this.enabled) return;
    this.write({ type: "error", seq: this.seq++, ts: Date.now(), message });
  }

  private write(entry: DebugEntry): void {
    try {
      appendFileSync(this.path, `${JSON.stringify(entry)}\n`);
    } catch (err) {
      this.enabled = false;
      process.emitWarning(`Debug log disabled: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

/** Logger that records nothing. */
export const disabledLogger = new DebugLogger(undefined);
