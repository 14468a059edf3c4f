/**
 * Selection helpers: pure functions over a (start, end) offset pair.
 *
 * A selection keeps the order it was made in. Start is where it was
 * anchored and end is where it was extended to, so end may precede start.
 */

import type { OffsetRange } from "../buffer/types.ts";

/** Ordered form of a selection, whichever direction it runs. */
export function normalizeSelection(start: number, end: number): OffsetRange {
  return start <= end ? { start, end } : { start: end, end: start };
}

/** True when the selection is zero-width (just a cursor). */
export function isCollapsed(start: number, end: number): boolean {
  return start === end;
}

/**
 * Whether `offset` is drawn as selected. Both ends are included, so the
 * character at the far end and a line's newline position count.
 */
export function isOffsetSelected(start: number, end: number, offset: number): boolean {
  if (isCollapsed(start, end)) return false;
  const range = normalizeSelection(start, end);
  return offset >= range.start && offset <= range.end;
}

/**
 * Selection covering the whole buffer. Anchored at the end so the cursor,
 * which sits at offset 0, is the free end.
 */
export function selectAll(length: number): { selectionStart: number; selectionEnd: number } {
  return { selectionStart: length, selectionEnd: 0 };
}
