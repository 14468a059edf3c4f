/**
 * Render projector: turns the visible window of a buffer into styled cells.
 *
 * Read-only. Runs after an event has been fully processed, over a buffer
 * snapshot, and hands the frame to whatever terminal backend paints it.
 */

import { nextCharColumn } from "../buffer/columns.ts";
import { isOffsetSelected } from "../editor/selection.ts";
import { cursorScreenPosition } from "./measurement.ts";
import type { Cell, Frame, ProjectionInput, Style } from "./types.ts";

const TAB = 9;

export function projectView(input: ProjectionInput): Frame {
  const { snapshot, topline, height } = input;
  const rows: Cell[][] = [];
  const endRow = Math.min(topline + height, snapshot.lineCount);

  for (let row = topline; row < endRow; row++) {
    rows.push(projectLine(input, row));
  }

  return {
    rows,
    cursor: cursorScreenPosition(snapshot.line(input.cursor.y), input.cursor.x, input.cursor.y, input),
  };
}

function projectLine(input: ProjectionInput, row: number): Cell[] {
  const { snapshot, colorscheme, leftCol, tabSize } = input;
  const cells: Cell[] = projectGutter(row, input.lineNumOffset, colorscheme.lineNumber).slice(
    0,
    Math.max(0, input.width),
  );

  const line = snapshot.line(row);
  const lineStart = snapshot.pointToOffset({ row, column: 0 });
  const textEnd = leftCol + Math.max(0, input.width - input.lineNumOffset);
  const visible = (column: number) => column >= leftCol && column < textEnd;

  let visual = 0;
  for (let i = 0; i < line.length; i = nextCharColumn(line, i)) {
    const style = resolveStyle(input, lineStart + i);
    if (line.charCodeAt(i) === TAB) {
      for (let k = 0; k < tabSize; k++) {
        if (visible(visual + k)) cells.push({ char: " ", style });
      }
      visual += tabSize;
    } else {
      if (visible(visual)) cells.push({ char: line.slice(i, nextCharColumn(line, i)), style });
      visual += 1;
    }
  }

  // A selection running through the newline shows as one blank cell.
  const newlineOffset = lineStart + line.length;
  if (isOffsetSelected(input.selectionStart, input.selectionEnd, newlineOffset) && visible(visual)) {
    cells.push({ char: " ", style: colorscheme.selection });
  }

  return cells;
}

/** Right-aligned one-based line number followed by a separator space. */
function projectGutter(row: number, lineNumOffset: number, style: Style): Cell[] {
  const digits = String(row + 1);
  const text = `${digits.padStart(lineNumOffset - 1, " ")} `;
  return Array.from(text, (char) => ({ char, style }));
}

/** Selection beats syntax highlighting, which beats the default style. */
function resolveStyle(input: ProjectionInput, offset: number): Style {
  if (isOffsetSelected(input.selectionStart, input.selectionEnd, offset)) {
    return input.colorscheme.selection;
  }
  return input.highlights.get(offset) ?? input.colorscheme.default;
}
