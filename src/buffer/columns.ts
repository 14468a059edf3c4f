/**
 * Conversions between the two column spaces of a line.
 *
 * - character column: index into the line's string (UTF-16 code units)
 * - visual column: screen cell index after tab expansion
 *
 * A tab expands to a fixed run of `tabSize` cells (not to the next tab stop);
 * every other code point occupies one cell. A surrogate pair is one code
 * point: two character columns, one cell. Cursor positions never fall
 * between the two halves of a pair.
 */

const TAB = 9;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Code units taken by the code point starting at `column`: 2 for a surrogate pair, else 1. */
export function codeUnitsAt(line: string, column: number): 1 | 2 {
  if (isHighSurrogate(line.charCodeAt(column)) && isLowSurrogate(line.charCodeAt(column + 1))) {
    return 2;
  }
  return 1;
}

/** Start of the code point after the one at `column`, capped at the line end. */
export function nextCharColumn(line: string, column: number): number {
  if (column >= line.length) return line.length;
  return column + codeUnitsAt(line, column);
}

/** Start of the code point before `column`, or 0 at the line start. */
export function previousCharColumn(line: string, column: number): number {
  if (column <= 0) return 0;
  if (
    column >= 2 &&
    isLowSurrogate(line.charCodeAt(column - 1)) &&
    isHighSurrogate(line.charCodeAt(column - 2))
  ) {
    return column - 2;
  }
  return column - 1;
}

function cellWidth(line: string, column: number, tabSize: number): number {
  return line.charCodeAt(column) === TAB ? tabSize : 1;
}

/** Visual column at which character column `charColumn` starts. */
export function charToVisualColumn(line: string, charColumn: number, tabSize: number): number {
  const end = Math.min(Math.max(charColumn, 0), line.length);
  let visual = 0;
  for (let i = 0; i < end; i = nextCharColumn(line, i)) {
    visual += cellWidth(line, i, tabSize);
  }
  return visual;
}

/**
 * Largest character column whose visual column is <= `visualColumn`.
 * Clicking anywhere inside a tab's cells lands on the tab itself; targets
 * past the end of the line land on the line's end. The result is always the
 * start of a code point.
 */
export function visualToCharColumn(line: string, visualColumn: number, tabSize: number): number {
  if (visualColumn <= 0) return 0;
  let visual = 0;
  for (let i = 0; i < line.length; i = nextCharColumn(line, i)) {
    const next = visual + cellWidth(line, i, tabSize);
    if (next > visualColumn) return i;
    visual = next;
  }
  return line.length;
}

/** Total cells a line occupies on screen. */
export function lineVisualWidth(line: string, tabSize: number): number {
  return charToVisualColumn(line, line.length, tabSize);
}
