/**
 * Render projector tests.
 */

import { describe, expect, test } from "vitest";
import { createBuffer } from "../../src/buffer/buffer.ts";
import { projectView } from "../../src/renderer/projector.ts";
import { DEFAULT_COLORSCHEME } from "../../src/renderer/theme.ts";
import type { Cell, Frame, ProjectionInput } from "../../src/renderer/types.ts";

function input(text: string, overrides: Partial<ProjectionInput> = {}): ProjectionInput {
  return {
    snapshot: createBuffer(text).snapshot(),
    topline: 0,
    height: 10,
    leftCol: 0,
    width: 40,
    cursor: { x: 0, y: 0 },
    selectionStart: 0,
    selectionEnd: 0,
    highlights: new Map(),
    lineNumOffset: 2,
    tabSize: 4,
    colorscheme: DEFAULT_COLORSCHEME,
    ...overrides,
  };
}

function firstRow(frame: Frame): readonly Cell[] {
  return frame.rows[0] ?? [];
}

function text(rows: readonly (readonly Cell[])[]): string[] {
  return rows.map((cells) => cells.map((c) => c.char).join(""));
}

describe("projectView - Rows", () => {
  test("one row per visible line, stopping at the buffer end", () => {
    const frame = projectView(input("ab\ncd"));
    expect(text(frame.rows)).toEqual(["1 ab", "2 cd"]);
  });

  test("starts at the topline and stops at the height", () => {
    const frame = projectView(input("a\nb\nc\nd", { topline: 1, height: 2 }));
    expect(text(frame.rows)).toEqual(["2 b", "3 c"]);
  });

  test("line numbers are right-aligned in the gutter", () => {
    const lines = Array.from({ length: 12 }, (_, i) => String.fromCharCode(97 + i)).join("\n");
    const frame = projectView(input(lines, { topline: 8, height: 2, lineNumOffset: 3 }));
    expect(text(frame.rows)).toEqual([" 9 i", "10 j"]);
  });

  test("an empty line shows only the gutter", () => {
    const frame = projectView(input(""));
    expect(text(frame.rows)).toEqual(["1 "]);
  });
});

describe("projectView - Tabs and Clipping", () => {
  test("a tab becomes tabSize spaces", () => {
    const frame = projectView(input("\tx", { tabSize: 4 }));
    expect(text(frame.rows)).toEqual(["1     x"]);
  });

  test("text is clipped to the text area", () => {
    const frame = projectView(input("abcdef", { leftCol: 2, width: 5 }));
    expect(text(frame.rows)).toEqual(["1 cde"]);
  });

  test("a tab straddling the left edge shows its visible cells", () => {
    const frame = projectView(input("\tab", { leftCol: 2, width: 6 }));
    expect(text(frame.rows)).toEqual(["1   ab"]);
  });

  test("the gutter is cut to a width narrower than itself", () => {
    expect(text(projectView(input("ab", { width: 1, lineNumOffset: 3 })).rows)).toEqual([" "]);
    expect(text(projectView(input("ab", { width: 2, lineNumOffset: 2 })).rows)).toEqual(["1 "]);
    expect(firstRow(projectView(input("ab", { width: 0 })))).toHaveLength(0);
  });

  test("a surrogate pair fills one cell", () => {
    const row = firstRow(projectView(input("a😀b")));
    expect(row.map((c) => c.char)).toEqual(["1", " ", "a", "😀", "b"]);
  });

  test("clipping counts a surrogate pair as one column", () => {
    const frame = projectView(input("😀bc", { leftCol: 1, width: 4 }));
    expect(text(frame.rows)).toEqual(["1 bc"]);
  });
});

describe("projectView - Styles", () => {
  test("gutter uses the line number style", () => {
    const row = firstRow(projectView(input("a")));
    expect(row[0]?.style).toEqual(DEFAULT_COLORSCHEME.lineNumber);
    expect(row[1]?.style).toEqual(DEFAULT_COLORSCHEME.lineNumber);
  });

  test("selection covers both ends and the newline cell", () => {
    const row = firstRow(projectView(input("abc\nd", { selectionStart: 3, selectionEnd: 1 })));
    expect(row.map((c) => c.char).join("")).toBe("1 abc ");
    expect(row.slice(2).map((c) => c.style.reverse === true)).toEqual([false, true, true, true]);
  });

  test("no trailing cell without a selection", () => {
    const row = firstRow(projectView(input("abc\nd", { cursor: { x: 3, y: 0 } })));
    expect(row).toHaveLength(5);
  });

  test("selection beats highlights, which beat the default", () => {
    const keyword = { fg: "#fb4934" };
    const highlights = new Map([
      [0, keyword],
      [1, keyword],
    ]);
    const row = firstRow(projectView(input("abc", { highlights, selectionStart: 1, selectionEnd: 1 })));
    expect(row.slice(2).map((c) => c.style)).toEqual([keyword, keyword, {}]);

    const selected = firstRow(projectView(input("abc", { highlights, selectionStart: 1, selectionEnd: 2 })));
    expect(selected[3]?.style).toEqual(DEFAULT_COLORSCHEME.selection);
  });

  test("a custom colorscheme is used as given", () => {
    const colorscheme = { ...DEFAULT_COLORSCHEME, default: { fg: "#ebdbb2" } };
    const row = firstRow(projectView(input("a", { colorscheme })));
    expect(row[2]?.style).toEqual({ fg: "#ebdbb2" });
  });
});

describe("projectView - Cursor", () => {
  test("cursor cell accounts for gutter and tabs", () => {
    const frame = projectView(input("\tab", { cursor: { x: 2, y: 0 } }));
    expect(frame.cursor).toEqual({ col: 7, row: 0 });
  });

  test("cursor is relative to the topline", () => {
    const frame = projectView(input("a\nb\nc", { topline: 1, cursor: { x: 1, y: 2 } }));
    expect(frame.cursor).toEqual({ col: 3, row: 1 });
  });

  test("cursor above the window is undefined", () => {
    const frame = projectView(input("a\nb\nc", { topline: 1 }));
    expect(frame.cursor).toBeUndefined();
  });
});
