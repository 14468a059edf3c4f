/**
 * Status line: file name, modified marker and cursor position, drawn
 * across the full width of the view in the status style.
 */

import type { Cell, Style } from "./types.ts";

export interface StatusInfo {
  readonly name: string;
  readonly dirty: boolean;
  /** Zero-based line index. */
  readonly line: number;
  /** Zero-based character column. */
  readonly column: number;
}

/** Status text, e.g. `main.ts + (12,4)`. Positions are one-based. */
export function formatStatus(info: StatusInfo): string {
  const name = info.name === "" ? "No name" : info.name;
  const modified = info.dirty ? " +" : "";
  return `${name}${modified} (${info.line + 1},${info.column + 1})`;
}

export function projectStatusLine(info: StatusInfo, width: number, style: Style): Cell[] {
  const text = formatStatus(info).slice(0, Math.max(0, width)).padEnd(width, " ");
  return Array.from(text, (char) => ({ char, style }));
}
