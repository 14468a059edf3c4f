/**
 * Keyboard input mapping.
 *
 * Maps terminal key events to EditorCommands. Control chords follow the
 * usual terminal-editor bindings (Ctrl+S save, Ctrl+Q quit, ...).
 */

import type { EditorCommand, KeyEvent } from "./types.ts";

/** Commands bound to Ctrl+<letter>. */
const CTRL_BINDINGS: ReadonlyMap<string, EditorCommand> = new Map<string, EditorCommand>([
  ["q", { type: "quit" }],
  ["s", { type: "save" }],
  ["o", { type: "open" }],
  ["z", { type: "undo" }],
  ["y", { type: "redo" }],
  ["c", { type: "copy" }],
  ["x", { type: "cut" }],
  ["v", { type: "paste" }],
  ["a", { type: "selectAll" }],
  ["u", { type: "scroll", direction: "up", amount: "halfPage" }],
  ["d", { type: "scroll", direction: "down", amount: "halfPage" }],
]);

/**
 * Map a key event to an EditorCommand, or undefined if not handled.
 */
export function keyEventToCommand(e: KeyEvent): EditorCommand | undefined {
  if (e.key === "character") {
    if (e.ctrl) return CTRL_BINDINGS.get(e.char.toLowerCase());
    if (e.char.length === 0) return undefined;
    return { type: "insertText", text: e.char };
  }

  switch (e.key) {
    // ── Navigation ──────────────────────────────────────────────

    case "ArrowUp":
      return { type: "moveCursor", direction: "up" };

    case "ArrowDown":
      return { type: "moveCursor", direction: "down" };

    case "ArrowLeft":
      return { type: "moveCursor", direction: "left" };

    case "ArrowRight":
      return { type: "moveCursor", direction: "right" };

    case "PageUp":
      return { type: "scroll", direction: "up", amount: "page" };

    case "PageDown":
      return { type: "scroll", direction: "down", amount: "page" };

    // ── Editing ─────────────────────────────────────────────────

    case "Backspace":
      return { type: "deleteBackward" };

    case "Enter":
      return { type: "insertNewline" };

    case "Tab":
      return { type: "insertTab" };
  }
}
