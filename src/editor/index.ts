export { Cursor, moveCursor } from "./cursor.ts";
export { type EditKind, type EditRecord, EventHandler } from "./event-handler.ts";
export { keyEventToCommand } from "./input-handler.ts";
export { type MouseAction, type MouseState, type MouseTransition, mouseTransition } from "./mouse.ts";
export {
  clampRowToWindow,
  halfPageDown,
  halfPageUp,
  keepColumnVisible,
  keepRowVisible,
  pageDown,
  pageUp,
  scrollDown,
  scrollUp,
  type ViewSize,
  viewSize,
} from "./scroll.ts";
export { isCollapsed, isOffsetSelected, normalizeSelection, selectAll } from "./selection.ts";
export type {
  Clipboard,
  Direction,
  DispatchResult,
  EditorCommand,
  InputEvent,
  KeyEvent,
  Messenger,
  MouseButton,
  MouseEvent,
  NamedKey,
  PromptAnswer,
  ResizeEvent,
  ScrollAmount,
} from "./types.ts";
export { RedrawLevel, redraw, terminate } from "./types.ts";
export { View, type ViewOptions } from "./view.ts";
