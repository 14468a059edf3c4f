/**
 * Editor input, command and result types.
 *
 * Input events arrive from the terminal; the key map turns key events into
 * commands; the View turns events and commands into state changes and reports
 * how much of the screen needs repainting.
 */

/** Direction for cursor movement and scrolling. */
export type Direction = "left" | "right" | "up" | "down";

// =============================================================================
// Input events
// =============================================================================

/** Keys that are not plain characters. */
export type NamedKey =
  | "ArrowUp"
  | "ArrowDown"
  | "ArrowLeft"
  | "ArrowRight"
  | "Enter"
  | "Tab"
  | "Backspace"
  | "PageUp"
  | "PageDown";

export type KeyEvent =
  | { readonly type: "key"; readonly key: NamedKey; readonly ctrl?: boolean }
  | {
      readonly type: "key";
      readonly key: "character";
      /** The literal character typed (a space for the space bar). */
      readonly char: string;
      readonly ctrl?: boolean;
    };

export interface ResizeEvent {
  readonly type: "resize";
  /** New terminal width in cells. */
  readonly width: number;
  /** New terminal height in cells. */
  readonly height: number;
}

export type MouseButton = "primary" | "none" | "wheelUp" | "wheelDown";

export interface MouseEvent {
  readonly type: "mouse";
  /** Screen column of the pointer. */
  readonly x: number;
  /** Screen row of the pointer. */
  readonly y: number;
  readonly button: MouseButton;
}

export type InputEvent = KeyEvent | ResizeEvent | MouseEvent;

// =============================================================================
// Commands
// =============================================================================

/** Amount a scroll command jumps by. */
export type ScrollAmount = "page" | "halfPage";

/** All editor commands a key event can map to. */
export type EditorCommand =
  | { type: "moveCursor"; direction: Direction }
  | { type: "insertText"; text: string }
  | { type: "insertNewline" }
  | { type: "insertTab" }
  | { type: "deleteBackward" }
  | { type: "scroll"; direction: "up" | "down"; amount: ScrollAmount }
  | { type: "selectAll" }
  | { type: "undo" }
  | { type: "redo" }
  | { type: "copy" }
  | { type: "cut" }
  | { type: "paste" }
  | { type: "save" }
  | { type: "open" }
  | { type: "quit" };

// =============================================================================
// Dispatch results
// =============================================================================

/**
 * How much of the screen must be repainted after an event.
 * Levels are ordered: a higher level includes everything a lower one repaints.
 */
export const RedrawLevel = {
  None: 0,
  CursorOnly: 1,
  Full: 2,
} as const;

export type RedrawLevel = (typeof RedrawLevel)[keyof typeof RedrawLevel];

export type DispatchResult =
  | { readonly kind: "redraw"; readonly level: RedrawLevel }
  | { readonly kind: "terminate" };

export function redraw(level: RedrawLevel): DispatchResult {
  return { kind: "redraw", level };
}

export const terminate: DispatchResult = { kind: "terminate" };

// =============================================================================
// Collaborators
// =============================================================================

export interface PromptAnswer {
  readonly answer: string;
  readonly cancelled: boolean;
}

/** Message line: blocking prompts and non-blocking error display. */
export interface Messenger {
  prompt(question: string): PromptAnswer;
  reportError(message: string): void;
}

/**
 * System clipboard. `write` and `read` throw on failure; callers check
 * `isAvailable()` before touching either.
 */
export interface Clipboard {
  isAvailable(): boolean;
  write(text: string): void;
  read(): string;
}
