import { describe, expect, test } from "vitest";
import { isCollapsed, isOffsetSelected, normalizeSelection, selectAll } from "../../src/editor/selection.ts";

describe("normalizeSelection", () => {
  test("orders the ends", () => {
    expect(normalizeSelection(2, 5)).toEqual({ start: 2, end: 5 });
    expect(normalizeSelection(5, 2)).toEqual({ start: 2, end: 5 });
  });
});

describe("isCollapsed", () => {
  test("true only when both ends match", () => {
    expect(isCollapsed(3, 3)).toBe(true);
    expect(isCollapsed(3, 4)).toBe(false);
  });
});

describe("isOffsetSelected", () => {
  test("includes both ends", () => {
    expect(isOffsetSelected(2, 5, 2)).toBe(true);
    expect(isOffsetSelected(2, 5, 5)).toBe(true);
    expect(isOffsetSelected(2, 5, 6)).toBe(false);
    expect(isOffsetSelected(2, 5, 1)).toBe(false);
  });

  test("works for a backwards selection", () => {
    expect(isOffsetSelected(5, 2, 3)).toBe(true);
  });

  test("a collapsed selection selects nothing", () => {
    expect(isOffsetSelected(4, 4, 4)).toBe(false);
  });
});

describe("selectAll", () => {
  test("anchors at the end and runs back to 0", () => {
    expect(selectAll(12)).toEqual({ selectionStart: 12, selectionEnd: 0 });
  });
});
