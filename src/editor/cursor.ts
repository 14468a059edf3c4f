/**
 * Cursor: the caret position and selection within one buffer.
 *
 * The position is held twice, as an absolute offset (`loc`) and as
 * (x = character column, y = line index). Every setter goes through
 * the buffer's line index so the two never disagree.
 */

import type { Buffer, BufferPoint, BufferSnapshot } from "../buffer/types.ts";
import {
  charToVisualColumn,
  nextCharColumn,
  previousCharColumn,
  visualToCharColumn,
} from "../buffer/columns.ts";
import type { EventHandler } from "./event-handler.ts";
import { normalizeSelection } from "./selection.ts";

/**
 * Compute a new position one character away from `current`.
 * Pure function: clamps at buffer bounds, wraps across line ends, and
 * steps over a surrogate pair as a single character.
 */
export function moveCursor(
  snapshot: BufferSnapshot,
  current: BufferPoint,
  direction: "left" | "right",
): BufferPoint {
  const { row, column } = current;
  const line = snapshot.line(row);

  if (direction === "right") {
    if (column < line.length) {
      return { row, column: nextCharColumn(line, column) };
    }
    // At end of line: wrap to start of next line
    if (row + 1 < snapshot.lineCount) {
      return { row: row + 1, column: 0 };
    }
    return current;
  }

  if (column > 0) {
    return { row, column: previousCharColumn(line, column) };
  }
  // At start of line: wrap to end of previous line
  if (row > 0) {
    return { row: row - 1, column: snapshot.line(row - 1).length };
  }
  return current;
}

export class Cursor {
  readonly buffer: Buffer;
  private _loc = 0;
  private _x = 0;
  private _y = 0;
  private readonly _tabSize: number;

  /**
   * Remembered visual column for vertical navigation.
   * Set when a run of vertical moves begins; cleared by any other
   * repositioning. Lets the cursor return to its column after passing
   * through shorter lines.
   */
  private _goalVisualX: number | undefined = undefined;

  /** Selection offsets; order is not normalized. */
  selectionStart = 0;
  selectionEnd = 0;
  /** Position of the selection anchor when the selection was started. */
  selectionStartX = 0;
  selectionStartY = 0;

  constructor(buffer: Buffer, tabSize: number) {
    this.buffer = buffer;
    this._tabSize = tabSize;
  }

  get loc(): number {
    return this._loc;
  }

  /** Character column within line `y`. */
  get x(): number {
    return this._x;
  }

  /** Line index. */
  get y(): number {
    return this._y;
  }

  get tabSize(): number {
    return this._tabSize;
  }

  /** Move to an absolute offset, clamped to the buffer. */
  setLoc(loc: number): void {
    this._goalVisualX = undefined;
    this._placeAtOffset(loc);
  }

  /** Move to a character column and line, clamped to the buffer. */
  goTo(x: number, y: number): void {
    this._goalVisualX = undefined;
    this._placeAtPoint({ row: y, column: x });
  }

  up(): void {
    this._moveVertical("up");
  }

  down(): void {
    this._moveVertical("down");
  }

  left(): void {
    this._goalVisualX = undefined;
    this._placeAtPoint(moveCursor(this.buffer, this._point(), "left"));
  }

  right(): void {
    this._goalVisualX = undefined;
    this._placeAtPoint(moveCursor(this.buffer, this._point(), "right"));
  }

  /**
   * Move vertically to `row`, landing as close as possible to the goal
   * visual column. Used by keyboard movement and by scrolling that drags the
   * cursor into the visible window.
   */
  moveToRow(row: number): void {
    const target = Math.max(0, Math.min(row, this.buffer.lineCount - 1));
    if (this._goalVisualX === undefined) {
      this._goalVisualX = this.getVisualX();
    }
    const column = this.getCharPosInLine(target, this._goalVisualX);
    this._placeAtPoint({ row: target, column });
  }

  /** Signed offset delta from the cursor to character column `x` of line `y`. */
  distance(x: number, y: number): number {
    return this.buffer.pointToOffset({ row: y, column: x }) - this._loc;
  }

  /**
   * Character column in line `row` that sits at or just before
   * `visualColumn`. A tab spans several cells but one character, so a
   * pointer anywhere over it resolves to the tab.
   */
  getCharPosInLine(row: number, visualColumn: number): number {
    return visualToCharColumn(this.buffer.line(row), visualColumn, this._tabSize);
  }

  /** Visual (tab-expanded) column of the cursor. */
  getVisualX(): number {
    return charToVisualColumn(this.buffer.line(this._y), this._x, this._tabSize);
  }

  // ─── Selection ──────────────────────────────────────────────────

  hasSelection(): boolean {
    return this.selectionStart !== this.selectionEnd;
  }

  /** Selected text, whichever direction the selection runs. */
  getSelection(): string {
    const { start, end } = normalizeSelection(this.selectionStart, this.selectionEnd);
    return this.buffer.substring(start, end);
  }

  /**
   * Remove the selected text through the event handler, so the deletion is
   * undoable, and leave the cursor at the lower bound.
   */
  deleteSelection(eventHandler: EventHandler): void {
    const { start, end } = normalizeSelection(this.selectionStart, this.selectionEnd);
    eventHandler.remove(start, end);
    this.setLoc(start);
  }

  /** Collapse the selection onto the cursor. */
  resetSelection(): void {
    this.selectionStart = this._loc;
    this.selectionEnd = this._loc;
    this.selectionStartX = this._x;
    this.selectionStartY = this._y;
  }

  /** Drop the selection anchor at the cursor. */
  startSelection(): void {
    this.resetSelection();
  }

  /** Move the free end of the selection to the cursor. */
  extendSelection(): void {
    this.selectionEnd = this._loc;
  }

  setSelection(start: number, end: number): void {
    this.selectionStart = this.buffer.clipOffset(start);
    this.selectionEnd = this.buffer.clipOffset(end);
    const anchor = this.buffer.offsetToPoint(this.selectionStart);
    this.selectionStartX = anchor.column;
    this.selectionStartY = anchor.row;
  }

  // ─── Internals ──────────────────────────────────────────────────

  private _moveVertical(direction: "up" | "down"): void {
    const row = direction === "up" ? this._y - 1 : this._y + 1;
    if (row < 0 || row >= this.buffer.lineCount) return;
    this.moveToRow(row);
  }

  private _point(): BufferPoint {
    return { row: this._y, column: this._x };
  }

  private _placeAtOffset(loc: number): void {
    const clipped = this.buffer.clipOffset(loc);
    const point = this.buffer.offsetToPoint(clipped);
    this._loc = clipped;
    this._x = point.column;
    this._y = point.row;
  }

  private _placeAtPoint(point: BufferPoint): void {
    const clipped = this.buffer.clipPoint(point);
    this._loc = this.buffer.pointToOffset(clipped);
    this._x = clipped.column;
    this._y = clipped.row;
  }
}
