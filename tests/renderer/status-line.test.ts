import { describe, expect, test } from "vitest";
import { formatStatus, projectStatusLine } from "../../src/renderer/status-line.ts";

describe("formatStatus", () => {
  test("name and one-based position", () => {
    expect(formatStatus({ name: "main.ts", dirty: false, line: 11, column: 3 })).toBe("main.ts (12,4)");
  });

  test("marks a modified buffer", () => {
    expect(formatStatus({ name: "main.ts", dirty: true, line: 0, column: 0 })).toBe("main.ts + (1,1)");
  });

  test("unnamed buffers show a placeholder", () => {
    expect(formatStatus({ name: "", dirty: false, line: 0, column: 0 })).toBe("No name (1,1)");
  });
});

describe("projectStatusLine", () => {
  const style = { reverse: true };

  test("pads to the width in the status style", () => {
    const cells = projectStatusLine({ name: "a", dirty: false, line: 0, column: 0 }, 10, style);
    expect(cells.map((c) => c.char).join("")).toBe("a (1,1)   ");
    expect(cells.every((c) => c.style === style)).toBe(true);
  });

  test("truncates to the width", () => {
    const cells = projectStatusLine({ name: "a.txt", dirty: false, line: 0, column: 0 }, 5, style);
    expect(cells.map((c) => c.char).join("")).toBe("a.txt");
  });

  test("zero width gives no cells", () => {
    expect(projectStatusLine({ name: "a", dirty: false, line: 0, column: 0 }, 0, style)).toEqual([]);
  });
});
