/**
 * View: the controller that ties buffer, cursor, history and viewport
 * together. Receives input events, applies them, keeps the cursor on
 * screen and reports how much needs repainting.
 */

import { createBuffer, nodeFileSystem, openBuffer } from "../buffer/buffer.ts";
import { previousCharColumn } from "../buffer/columns.ts";
import type { Buffer, FileSystem } from "../buffer/types.ts";
import { type ResolvedConfig, resolveConfig } from "../config/loader.ts";
import { type DebugLogger, disabledLogger } from "../debug-logger.ts";
import { describeCause } from "../errors.ts";
import { cursorScreenPosition, gutterWidth, screenToBuffer } from "../renderer/measurement.ts";
import { projectView } from "../renderer/projector.ts";
import { projectStatusLine } from "../renderer/status-line.ts";
import type { Cell, Frame, HighlightMap, ScreenPosition } from "../renderer/types.ts";
import { Cursor } from "./cursor.ts";
import { EventHandler } from "./event-handler.ts";
import { keyEventToCommand } from "./input-handler.ts";
import { type MouseState, mouseTransition } from "./mouse.ts";
import {
  clampRowToWindow,
  halfPageDown,
  halfPageUp,
  keepColumnVisible,
  keepRowVisible,
  pageDown,
  pageUp,
  scrollDown,
  scrollUp,
  viewSize,
} from "./scroll.ts";
import { selectAll } from "./selection.ts";
import {
  type Clipboard,
  type DispatchResult,
  type EditorCommand,
  type InputEvent,
  type Messenger,
  type MouseEvent,
  RedrawLevel,
  redraw,
  terminate,
} from "./types.ts";

export interface ViewOptions {
  readonly messenger: Messenger;
  readonly clipboard: Clipboard;
  /** Initial buffer; an empty unnamed buffer when omitted. */
  readonly buffer?: Buffer;
  readonly fileSystem?: FileSystem;
  /** Terminal size in cells at startup. */
  readonly terminalWidth: number;
  readonly terminalHeight: number;
  readonly config?: ResolvedConfig;
  readonly logger?: DebugLogger;
}

const NO_HIGHLIGHTS: HighlightMap = new Map();

export class View {
  /** First visible line. */
  topline = 0;
  /** First visible visual column, for horizontal scrolling. */
  leftCol = 0;

  private _buffer: Buffer;
  private _cursor: Cursor;
  private _eventHandler: EventHandler;
  private _height = 0;
  private _width = 0;
  private _mouseState: MouseState = "idle";
  private _highlights: HighlightMap = NO_HIGHLIGHTS;

  private readonly _config: ResolvedConfig;
  private readonly _messenger: Messenger;
  private readonly _clipboard: Clipboard;
  private readonly _fs: FileSystem;
  private readonly _logger: DebugLogger;

  constructor(options: ViewOptions) {
    this._config = options.config ?? resolveConfig({});
    this._messenger = options.messenger;
    this._clipboard = options.clipboard;
    this._fs = options.fileSystem ?? nodeFileSystem;
    this._logger = options.logger ?? disabledLogger;

    this._buffer = options.buffer ?? createBuffer("", "", this._fs);
    this._cursor = new Cursor(this._buffer, this._config.tabSize);
    this._eventHandler = new EventHandler(this._buffer, this._cursor);

    this.resize(options.terminalWidth, options.terminalHeight);
  }

  get buffer(): Buffer {
    return this._buffer;
  }

  get cursor(): Cursor {
    return this._cursor;
  }

  get eventHandler(): EventHandler {
    return this._eventHandler;
  }

  /** Visible rows. */
  get height(): number {
    return this._height;
  }

  /** Visible columns, gutter included. */
  get width(): number {
    return this._width;
  }

  get mouseState(): MouseState {
    return this._mouseState;
  }

  /** Gutter width: digits of the last line number plus a separator. */
  get lineNumOffset(): number {
    return gutterWidth(this._buffer.lineCount);
  }

  // ─── Geometry ───────────────────────────────────────────────────

  /** Recompute the view size from the terminal size. */
  resize(termWidth: number, termHeight: number): void {
    const size = viewSize(termWidth, termHeight, this._config.widthPercent, this._config.heightPercent);
    this._width = size.width;
    this._height = size.height;
  }

  scrollUp(n: number): void {
    this.topline = scrollUp(this.topline, n);
  }

  scrollDown(n: number): void {
    this.topline = scrollDown(this.topline, n, this._buffer.lineCount, this._height);
  }

  pageUp(): void {
    this.topline = pageUp(this.topline, this._height);
  }

  pageDown(): void {
    this.topline = pageDown(this.topline, this._buffer.lineCount, this._height);
  }

  halfPageUp(): void {
    this.topline = halfPageUp(this.topline, this._height);
  }

  halfPageDown(): void {
    this.topline = halfPageDown(this.topline, this._buffer.lineCount, this._height);
  }

  /**
   * Move the viewport so the cursor is visible.
   * Returns true if the viewport moved.
   */
  relocate(): boolean {
    const topline = keepRowVisible(this.topline, this._cursor.y, this._height);
    const leftCol = keepColumnVisible(
      this.leftCol,
      this._cursor.getVisualX(),
      this._width - this.lineNumOffset,
    );
    const moved = topline !== this.topline || leftCol !== this.leftCol;
    this.topline = topline;
    this.leftCol = leftCol;
    return moved;
  }

  // ─── Dispatch ───────────────────────────────────────────────────

  /** Apply one input event. */
  handleEvent(event: InputEvent): DispatchResult {
    const result = this._dispatch(event);
    this._logger.logDispatch({
      event,
      result,
      loc: this._cursor.loc,
      topline: this.topline,
    });
    return result;
  }

  /** Execute a command without reconciling the viewport. */
  execute(command: EditorCommand): DispatchResult {
    const cursor = this._cursor;

    switch (command.type) {
      case "moveCursor":
        switch (command.direction) {
          case "up":
            cursor.up();
            break;
          case "down":
            cursor.down();
            break;
          case "left":
            cursor.left();
            break;
          case "right":
            cursor.right();
            break;
        }
        return redraw(RedrawLevel.CursorOnly);
      case "insertText":
        return redraw(this._insertText(command.text));
      case "insertNewline":
        return redraw(this._insertText("\n"));
      case "insertTab":
        return redraw(this._insertText("\t"));
      case "deleteBackward":
        return redraw(this._deleteBackward());
      case "undo":
        this._eventHandler.undo();
        return redraw(RedrawLevel.Full);
      case "redo":
        this._eventHandler.redo();
        return redraw(RedrawLevel.Full);
      case "copy":
        return redraw(this._copy(false));
      case "cut":
        return redraw(this._copy(true));
      case "paste":
        return redraw(this._paste());
      case "selectAll": {
        const { selectionStart, selectionEnd } = selectAll(this._buffer.len());
        cursor.setSelection(selectionStart, selectionEnd);
        cursor.setLoc(0);
        return redraw(RedrawLevel.Full);
      }
      case "scroll":
        if (command.amount === "page") {
          if (command.direction === "up") this.pageUp();
          else this.pageDown();
        } else if (command.direction === "up") {
          this.halfPageUp();
        } else {
          this.halfPageDown();
        }
        this._keepCursorInWindow();
        return redraw(RedrawLevel.Full);
      case "save":
        return redraw(this._save());
      case "open":
        return redraw(this.openFile());
      case "quit":
        if (this._buffer.isDirty() && !this._confirm("You have unsaved changes. Quit anyway? ")) {
          return redraw(RedrawLevel.Full);
        }
        return terminate;
    }
  }

  /**
   * Prompt for a file name and replace the buffer with that file.
   * Asks first when the current buffer has unsaved changes.
   */
  openFile(): RedrawLevel {
    if (this._buffer.isDirty() && !this._confirm("You have unsaved changes. Continue? ")) {
      return RedrawLevel.Full;
    }
    const { answer, cancelled } = this._messenger.prompt("File to open: ");
    if (cancelled) return RedrawLevel.Full;

    try {
      this._setBuffer(openBuffer(answer, this._fs));
    } catch (err) {
      this._reportError(err);
    }
    return RedrawLevel.Full;
  }

  // ─── Rendering ──────────────────────────────────────────────────

  /** Replace the externally computed syntax highlight map. */
  setHighlights(highlights: HighlightMap): void {
    this._highlights = highlights;
  }

  /** Project the visible window into styled cells. */
  display(): Frame {
    return projectView({
      snapshot: this._buffer.snapshot(),
      topline: this.topline,
      height: this._height,
      leftCol: this.leftCol,
      width: this._width,
      cursor: { x: this._cursor.x, y: this._cursor.y },
      selectionStart: this._cursor.selectionStart,
      selectionEnd: this._cursor.selectionEnd,
      highlights: this._highlights,
      lineNumOffset: this.lineNumOffset,
      tabSize: this._config.tabSize,
      colorscheme: this._config.colorscheme,
    });
  }

  /** Screen cell of the cursor, or undefined when it is scrolled out. */
  cursorPosition(): ScreenPosition | undefined {
    return cursorScreenPosition(this._buffer.line(this._cursor.y), this._cursor.x, this._cursor.y, {
      topline: this.topline,
      height: this._height,
      leftCol: this.leftCol,
      width: this._width,
      lineNumOffset: this.lineNumOffset,
      tabSize: this._config.tabSize,
    });
  }

  statusLine(): Cell[] {
    return projectStatusLine(
      {
        name: this._buffer.name,
        dirty: this._buffer.isDirty(),
        line: this._cursor.y,
        column: this._cursor.x,
      },
      this._width,
      this._config.colorscheme.statusLine,
    );
  }

  // ─── Internals ──────────────────────────────────────────────────

  private _dispatch(event: InputEvent): DispatchResult {
    let level: RedrawLevel = RedrawLevel.None;

    switch (event.type) {
      case "resize":
        this.resize(event.width, event.height);
        level = RedrawLevel.Full;
        break;
      case "key": {
        const command = keyEventToCommand(event);
        if (!command) {
          level = RedrawLevel.None;
          break;
        }
        const result = this.execute(command);
        if (result.kind === "terminate") return result;
        level = result.level;
        break;
      }
      case "mouse": {
        if (event.button === "wheelUp" || event.button === "wheelDown") {
          level = this._scrollWheel(event.button);
          break;
        }
        const transition = mouseTransition(
          this._mouseState,
          event.button === "none" ? "release" : "press",
        );
        this._mouseState = transition.state;
        // A release alone must not move the cursor or the viewport.
        if (!transition.moveCursor) return redraw(RedrawLevel.None);
        level = this._pointCursor(event, transition.setAnchor);
        break;
      }
    }

    if (this.relocate()) level = RedrawLevel.Full;
    return redraw(level);
  }

  private _scrollWheel(button: "wheelUp" | "wheelDown"): RedrawLevel {
    if (button === "wheelUp") this.scrollUp(this._config.wheelScrollLines);
    else this.scrollDown(this._config.wheelScrollLines);
    this._keepCursorInWindow();
    return RedrawLevel.Full;
  }

  /** Move the cursor to the clicked cell and extend the selection to it. */
  private _pointCursor(event: MouseEvent, setAnchor: boolean): RedrawLevel {
    const cursor = this._cursor;

    const { row, visualColumn } = screenToBuffer(
      event.x,
      event.y,
      this.topline,
      this.leftCol,
      this.lineNumOffset,
    );

    let y = row;
    if (y - this.topline > this._height - 1) {
      this.scrollDown(1);
      y = this._height + this.topline - 1;
    }
    y = Math.max(0, Math.min(y, this._buffer.lineCount - 1));
    const x = cursor.getCharPosInLine(y, visualColumn);

    cursor.setLoc(cursor.loc + cursor.distance(x, y));
    if (setAnchor) cursor.startSelection();
    cursor.extendSelection();
    return RedrawLevel.Full;
  }

  private _insertText(text: string): RedrawLevel {
    if (this._cursor.hasSelection()) {
      this._cursor.deleteSelection(this._eventHandler);
      this._cursor.resetSelection();
    }
    this._eventHandler.insert(this._cursor.loc, text);
    return RedrawLevel.Full;
  }

  private _deleteBackward(): RedrawLevel {
    const cursor = this._cursor;
    if (cursor.hasSelection()) {
      cursor.deleteSelection(this._eventHandler);
      cursor.resetSelection();
      return RedrawLevel.Full;
    }
    if (cursor.loc === 0) return RedrawLevel.None;
    // At a line start this joins the lines; elsewhere it drops one code point.
    const start =
      cursor.x === 0
        ? cursor.loc - 1
        : cursor.loc - cursor.x + previousCharColumn(this._buffer.line(cursor.y), cursor.x);
    this._eventHandler.remove(start, cursor.loc);
    return RedrawLevel.Full;
  }

  private _copy(cut: boolean): RedrawLevel {
    const cursor = this._cursor;
    if (!cursor.hasSelection() || !this._clipboard.isAvailable()) {
      return RedrawLevel.None;
    }
    try {
      this._clipboard.write(cursor.getSelection());
    } catch (err) {
      this._reportError(err);
      return RedrawLevel.Full;
    }
    if (cut) {
      cursor.deleteSelection(this._eventHandler);
      cursor.resetSelection();
    }
    return RedrawLevel.Full;
  }

  private _paste(): RedrawLevel {
    if (!this._clipboard.isAvailable()) return RedrawLevel.None;

    let text: string;
    try {
      text = this._clipboard.read();
    } catch (err) {
      // Nothing to insert; the buffer is left alone.
      this._logger.logError(`Clipboard read failed: ${describeCause(err)}`);
      return RedrawLevel.None;
    }
    if (text.length === 0) return RedrawLevel.None;

    if (this._cursor.hasSelection()) {
      this._cursor.deleteSelection(this._eventHandler);
      this._cursor.resetSelection();
    }
    this._eventHandler.insert(this._cursor.loc, text);
    return RedrawLevel.Full;
  }

  private _save(): RedrawLevel {
    if (this._buffer.path === "") {
      const { answer, cancelled } = this._messenger.prompt("Filename: ");
      if (cancelled) return RedrawLevel.Full;
      this._buffer.setPath(answer);
    }
    try {
      this._buffer.save();
    } catch (err) {
      this._reportError(err);
    }
    // The status line shows the saved state.
    return RedrawLevel.CursorOnly;
  }

  /** Ask a yes/no question. Only "y" or "yes" count as yes. */
  private _confirm(question: string): boolean {
    const { answer, cancelled } = this._messenger.prompt(question);
    if (cancelled) return false;
    const normalized = answer.toLowerCase();
    return normalized === "y" || normalized === "yes";
  }

  /** After scrolling, pull the cursor onto the nearest visible row. */
  private _keepCursorInWindow(): void {
    const row = clampRowToWindow(this._cursor.y, this.topline, this._height, this._buffer.lineCount);
    if (row !== this._cursor.y) this._cursor.moveToRow(row);
  }

  private _setBuffer(buffer: Buffer): void {
    this._buffer = buffer;
    this._cursor = new Cursor(buffer, this._config.tabSize);
    this._eventHandler = new EventHandler(buffer, this._cursor);
    this.topline = 0;
    this.leftCol = 0;
    this._mouseState = "idle";
    this._highlights = NO_HIGHLIGHTS;
  }

  private _reportError(err: unknown): void {
    const message = describeCause(err);
    this._logger.logError(message);
    this._messenger.reportError(message);
  }
}
