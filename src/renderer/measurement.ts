/**
 * Pure screen geometry functions.
 * Convert between screen cells and buffer coordinates for a view whose
 * text area starts after a line-number gutter.
 */

import { charToVisualColumn } from "../buffer/columns.ts";
import type { ScreenPosition } from "./types.ts";

/**
 * Gutter width for a buffer of `lineCount` lines: the digit count of the
 * last line number plus one separator cell.
 */
export function gutterWidth(lineCount: number): number {
  return String(Math.max(lineCount, 1)).length + 1;
}

/**
 * Buffer row and visual column under a screen cell. The visual column is
 * clamped at 0 for clicks on the gutter; the row is not clamped.
 */
export function screenToBuffer(
  x: number,
  y: number,
  topline: number,
  leftCol: number,
  lineNumOffset: number,
): { row: number; visualColumn: number } {
  return {
    row: y + topline,
    visualColumn: Math.max(0, x - lineNumOffset + leftCol),
  };
}

/**
 * Screen cell of character column `x` on line `y`, or undefined when that
 * position is scrolled out of the window.
 */
export function cursorScreenPosition(
  line: string,
  x: number,
  y: number,
  view: {
    readonly topline: number;
    readonly height: number;
    readonly leftCol: number;
    readonly width: number;
    readonly lineNumOffset: number;
    readonly tabSize: number;
  },
): ScreenPosition | undefined {
  const textWidth = view.width - view.lineNumOffset;
  const visual = charToVisualColumn(line, x, view.tabSize);
  if (y < view.topline || y >= view.topline + view.height) return undefined;
  if (visual < view.leftCol || visual >= view.leftCol + textWidth) return undefined;
  return { col: view.lineNumOffset + visual - view.leftCol, row: y - view.topline };
}
