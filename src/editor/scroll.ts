/**
 * Pure viewport calculation functions.
 * All work in whole lines/cells; rows are buffer line indices.
 */

/** Visible size of a view in cells. */
export interface ViewSize {
  readonly width: number;
  readonly height: number;
}

/**
 * Size of a view covering the given fraction of the terminal.
 * One terminal row is kept for the message line and one view row for the
 * status line. Degenerate terminals give zero rows, never negative.
 */
export function viewSize(
  termWidth: number,
  termHeight: number,
  widthPercent: number,
  heightPercent: number,
): ViewSize {
  const usableRows = termHeight - 1;
  return {
    width: Math.max(0, Math.floor(termWidth * widthPercent)),
    height: Math.max(0, Math.floor(usableRows * heightPercent) - 1),
  };
}

/** Highest topline that still fills the window. */
function bottomTopline(lineCount: number, height: number): number {
  return lineCount - height;
}

/**
 * Scroll up by `n` lines. If that would pass the first line, scroll by
 * one instead.
 */
export function scrollUp(topline: number, n: number): number {
  if (topline - n >= 0) return topline - n;
  if (topline > 0) return topline - 1;
  return topline;
}

/**
 * Scroll down by `n` lines. If that would pass the last full window,
 * scroll by one instead.
 */
export function scrollDown(topline: number, n: number, lineCount: number, height: number): number {
  const bottom = bottomTopline(lineCount, height);
  if (topline + n <= bottom) return topline + n;
  if (topline < bottom) return topline + 1;
  return topline;
}

export function pageUp(topline: number, height: number): number {
  if (topline > height) return scrollUp(topline, height);
  return 0;
}

export function pageDown(topline: number, lineCount: number, height: number): number {
  if (lineCount - (topline + height) > height) {
    return scrollDown(topline, height, lineCount, height);
  }
  return Math.max(0, bottomTopline(lineCount, height));
}

export function halfPageUp(topline: number, height: number): number {
  const half = Math.floor(height / 2);
  if (topline > half) return scrollUp(topline, half);
  return 0;
}

export function halfPageDown(topline: number, lineCount: number, height: number): number {
  const half = Math.floor(height / 2);
  if (lineCount - (topline + height) > half) {
    return scrollDown(topline, half, lineCount, height);
  }
  return Math.max(0, bottomTopline(lineCount, height));
}

/**
 * Topline that keeps `row` inside a window of `height` rows, moving the
 * window as little as possible.
 */
export function keepRowVisible(topline: number, row: number, height: number): number {
  if (height <= 0) return topline;
  if (row < topline) return row;
  if (row > topline + height - 1) return row - height + 1;
  return topline;
}

/** Left column that keeps visual column `column` inside `textWidth` cells. */
export function keepColumnVisible(leftCol: number, column: number, textWidth: number): number {
  if (textWidth <= 0) return leftCol;
  if (column < leftCol) return column;
  if (column > leftCol + textWidth - 1) return column - textWidth + 1;
  return leftCol;
}

/** Nearest row to `row` that lies inside the window and the buffer. */
export function clampRowToWindow(
  row: number,
  topline: number,
  height: number,
  lineCount: number,
): number {
  const last = Math.min(topline + Math.max(height, 1) - 1, lineCount - 1);
  return Math.max(Math.min(row, last), Math.min(topline, lineCount - 1), 0);
}
