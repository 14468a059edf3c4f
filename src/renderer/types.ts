/**
 * Renderer interface types.
 *
 * Design principles:
 * - Backend-agnostic: the projector produces plain cells, a terminal backend
 *   paints them
 * - One cell per screen column; tabs are already expanded
 * - Viewport-based: only visible lines are projected
 */

import type { BufferSnapshot } from "../buffer/types.ts";

// =============================================================================
// Style Types
// =============================================================================

export interface Style {
  /** Foreground color, e.g. "#ebdbb2". Backend default when absent. */
  readonly fg?: string;
  readonly bg?: string;
  readonly bold?: boolean;
  readonly italic?: boolean;
  readonly underline?: boolean;
  /** Swap foreground and background. */
  readonly reverse?: boolean;
}

/**
 * Styles the projector draws with. Passed in explicitly rather than read
 * from shared state, so two views can render with different schemes.
 */
export interface Colorscheme {
  readonly default: Style;
  readonly lineNumber: Style;
  readonly selection: Style;
  readonly statusLine: Style;
}

/**
 * Externally computed syntax styles, keyed by absolute character offset.
 * Treated as a read-only lookup table.
 */
export type HighlightMap = ReadonlyMap<number, Style>;

// =============================================================================
// Cell Types
// =============================================================================

export interface Cell {
  /** One code point, so a surrogate pair shares a single cell. */
  readonly char: string;
  readonly style: Style;
}

/** A screen position relative to the view's top-left cell. */
export interface ScreenPosition {
  readonly col: number;
  readonly row: number;
}

// =============================================================================
// Projection
// =============================================================================

/**
 * Everything the projector reads. Nothing here is owned by the projector.
 */
export interface ProjectionInput {
  readonly snapshot: BufferSnapshot;
  /** First visible line. */
  readonly topline: number;
  /** Visible rows. */
  readonly height: number;
  /** First visible visual column of the text area. */
  readonly leftCol: number;
  /** Visible columns, gutter included. */
  readonly width: number;
  /** Cursor as character column and line index. */
  readonly cursor: { readonly x: number; readonly y: number };
  readonly selectionStart: number;
  readonly selectionEnd: number;
  readonly highlights: HighlightMap;
  /** Gutter width: line-number digits plus one separator. */
  readonly lineNumOffset: number;
  readonly tabSize: number;
  readonly colorscheme: Colorscheme;
}

/** Projected view: one row of cells per visible buffer line. */
export interface Frame {
  readonly rows: readonly (readonly Cell[])[];
  /** Where the terminal cursor goes, or undefined when it is scrolled out. */
  readonly cursor: ScreenPosition | undefined;
}

// =============================================================================
// Screen Interface
// =============================================================================

/**
 * Interface that terminal backends must satisfy.
 */
export interface Screen {
  /** Repaint the whole view and its status line. */
  draw(frame: Frame, statusLine: readonly Cell[]): void;
  /** Repaint only the cursor and status line. */
  drawCursor(cursor: ScreenPosition | undefined, statusLine: readonly Cell[]): void;
  /** Restore the terminal. */
  close(): void;
}
