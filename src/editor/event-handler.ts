/**
 * EventHandler: the undo/redo log for one buffer.
 *
 * Every edit goes through here. Each record keeps the text needed to build
 * its inverse and the cursor offset on both sides of the edit, so undo and
 * redo put the cursor back exactly where editing left it, with no fix-ups at
 * the call site.
 */

import type { Buffer } from "../buffer/types.ts";
import type { Cursor } from "./cursor.ts";

export type EditKind = "insert" | "remove";

export interface EditRecord {
  readonly kind: EditKind;
  /** Offset the text was inserted at or removed from. */
  readonly offset: number;
  /** Text inserted, or text removed. */
  readonly text: string;
  /** Cursor offset before the edit; restored by undo. */
  readonly cursorBefore: number;
  /** Cursor offset after the edit; restored by redo. */
  readonly cursorAfter: number;
}

export class EventHandler {
  readonly buffer: Buffer;
  readonly cursor: Cursor;
  private _undoStack: EditRecord[] = [];
  private _redoStack: EditRecord[] = [];

  constructor(buffer: Buffer, cursor: Cursor) {
    this.buffer = buffer;
    this.cursor = cursor;
  }

  /** Insert `text` at `offset`; the cursor ends up just after it. */
  insert(offset: number, text: string): void {
    if (text.length === 0) return;
    const at = this.buffer.clipOffset(offset);
    this._push({
      kind: "insert",
      offset: at,
      text,
      cursorBefore: this.cursor.loc,
      cursorAfter: at + text.length,
    });
  }

  /** Remove [start, end); the cursor ends up at the start. */
  remove(start: number, end: number): void {
    const from = this.buffer.clipOffset(Math.min(start, end));
    const to = this.buffer.clipOffset(Math.max(start, end));
    if (from === to) return;
    this._push({
      kind: "remove",
      offset: from,
      text: this.buffer.substring(from, to),
      cursorBefore: this.cursor.loc,
      cursorAfter: from,
    });
  }

  /** Revert the most recent edit. Returns false when there was nothing to undo. */
  undo(): boolean {
    const record = this._undoStack.pop();
    if (!record) return false;
    this._apply(invert(record));
    this._placeCursor(record.cursorBefore);
    this._redoStack.push(record);
    return true;
  }

  /** Re-apply the most recently undone edit. Returns false when there was nothing to redo. */
  redo(): boolean {
    const record = this._redoStack.pop();
    if (!record) return false;
    this._apply(record);
    this._placeCursor(record.cursorAfter);
    this._undoStack.push(record);
    return true;
  }

  canUndo(): boolean {
    return this._undoStack.length > 0;
  }

  canRedo(): boolean {
    return this._redoStack.length > 0;
  }

  private _push(record: EditRecord): void {
    this._apply(record);
    this._placeCursor(record.cursorAfter);
    this._undoStack.push(record);
    this._redoStack = [];
  }

  private _apply(record: EditRecord): void {
    if (record.kind === "insert") {
      this.buffer.insert(record.offset, record.text);
    } else {
      this.buffer.remove(record.offset, record.offset + record.text.length);
    }
  }

  private _placeCursor(loc: number): void {
    this.cursor.setLoc(loc);
    this.cursor.resetSelection();
  }
}

/** The edit that undoes `record`. */
function invert(record: EditRecord): EditRecord {
  return {
    ...record,
    kind: record.kind === "insert" ? "remove" : "insert",
  };
}
