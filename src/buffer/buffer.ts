/**
 * Buffer: mutable text storage backed by a line array.
 *
 * Snapshots are immutable views created by copying the line array.
 * Position conversion uses a precomputed prefix-sum array of line starts.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { FileReadError, FileSaveError } from "../errors.ts";
import type { Buffer, BufferPoint, BufferSnapshot, FileSystem } from "./types.ts";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compute the offset of each line's start.
 * lineStarts[i] = sum of (lines[0..i-1].length + 1) for the newlines.
 */
function computeLineStarts(lines: readonly string[]): number[] {
  const starts = new Array<number>(lines.length);
  let offset = 0;
  for (let i = 0; i < lines.length; i++) {
    starts[i] = offset;
    offset += (lines[i] ?? "").length + 1;
  }
  return starts;
}

function findRow(lineStarts: readonly number[], offset: number): number {
  // Binary search for the last line starting at or before offset.
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((lineStarts[mid] ?? 0) <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Last path segment, used as the display name. */
function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

// =============================================================================
// File system
// =============================================================================

/** FileSystem backed by node:fs, reading and writing UTF-8. */
export const nodeFileSystem: FileSystem = {
  readFile(path: string): string {
    return readFileSync(path, "utf8");
  },
  writeFile(path: string, text: string): void {
    writeFileSync(path, text, "utf8");
  },
};

// =============================================================================
// BufferSnapshot
// =============================================================================

class BufferSnapshotImpl implements BufferSnapshot {
  readonly lineCount: number;
  readonly length: number;
  private readonly _lines: readonly string[];
  private readonly _lineStarts: readonly number[];

  constructor(lines: readonly string[], lineStarts: readonly number[], length: number) {
    this._lines = lines;
    this._lineStarts = lineStarts;
    this.lineCount = lines.length;
    this.length = length;
  }

  line(row: number): string {
    return this._lines[row] ?? "";
  }

  lines(startRow: number, endRow: number): readonly string[] {
    return this._lines.slice(startRow, endRow);
  }

  text(): string {
    return this._lines.join("\n");
  }

  pointToOffset(point: BufferPoint): number {
    return (this._lineStarts[point.row] ?? 0) + point.column;
  }

  offsetToPoint(offset: number): BufferPoint {
    const row = findRow(this._lineStarts, offset);
    return { row, column: offset - (this._lineStarts[row] ?? 0) };
  }
}

// =============================================================================
// Buffer
// =============================================================================

class BufferImpl implements Buffer {
  private _lines: string[];
  private _lineStarts: number[];
  private _length: number;
  private _path: string;
  private _name: string;
  private _dirty = false;
  private readonly _fs: FileSystem;

  constructor(text: string, path: string, fs: FileSystem) {
    this._lines = text.split("\n");
    this._lineStarts = computeLineStarts(this._lines);
    this._length = text.length;
    this._path = path;
    this._name = baseName(path);
    this._fs = fs;
  }

  get path(): string {
    return this._path;
  }

  get name(): string {
    return this._name;
  }

  get lineCount(): number {
    return this._lines.length;
  }

  get length(): number {
    return this._length;
  }

  len(): number {
    return this._length;
  }

  line(row: number): string {
    return this._lines[row] ?? "";
  }

  lines(startRow: number, endRow: number): readonly string[] {
    return this._lines.slice(startRow, endRow);
  }

  text(): string {
    return this._lines.join("\n");
  }

  substring(start: number, end: number): string {
    const from = this.clipOffset(Math.min(start, end));
    const to = this.clipOffset(Math.max(start, end));
    return this.text().slice(from, to);
  }

  pointToOffset(point: BufferPoint): number {
    const clipped = this.clipPoint(point);
    return (this._lineStarts[clipped.row] ?? 0) + clipped.column;
  }

  offsetToPoint(offset: number): BufferPoint {
    const clipped = this.clipOffset(offset);
    const row = findRow(this._lineStarts, clipped);
    return { row, column: clipped - (this._lineStarts[row] ?? 0) };
  }

  clipPoint(point: BufferPoint): BufferPoint {
    if (point.row >= this._lines.length) {
      // Past end of buffer → clamp to end of last line.
      const lastRow = this._lines.length - 1;
      return { row: lastRow, column: (this._lines[lastRow] ?? "").length };
    }
    if (point.row < 0) {
      return { row: 0, column: 0 };
    }
    const lineLen = (this._lines[point.row] ?? "").length;
    return { row: point.row, column: clamp(point.column, 0, lineLen) };
  }

  clipOffset(offset: number): number {
    return clamp(offset, 0, this._length);
  }

  insert(at: number, text: string): void {
    if (text.length === 0) return;
    const offset = this.clipOffset(at);
    const current = this.text();
    this._applyText(current.slice(0, offset) + text + current.slice(offset));
  }

  remove(start: number, end: number): void {
    const from = this.clipOffset(Math.min(start, end));
    const to = this.clipOffset(Math.max(start, end));
    if (from === to) return;
    const current = this.text();
    this._applyText(current.slice(0, from) + current.slice(to));
  }

  setPath(path: string): void {
    this._path = path;
    this._name = baseName(path);
  }

  isDirty(): boolean {
    return this._dirty;
  }

  save(): void {
    if (this._path === "") {
      throw new FileSaveError(this._path);
    }
    try {
      this._fs.writeFile(this._path, this.text());
    } catch (err) {
      throw new FileSaveError(this._path, err);
    }
    this._dirty = false;
  }

  snapshot(): BufferSnapshot {
    return new BufferSnapshotImpl(this._lines.slice(), this._lineStarts.slice(), this._length);
  }

  private _applyText(text: string): void {
    this._lines = text.split("\n");
    this._lineStarts = computeLineStarts(this._lines);
    this._length = text.length;
    this._dirty = true;
  }
}

// =============================================================================
// Factories
// =============================================================================

export function createBuffer(text: string, path = "", fs: FileSystem = nodeFileSystem): Buffer {
  return new BufferImpl(text, path, fs);
}

/**
 * Read a file into a new, clean buffer.
 * @throws FileReadError when the file cannot be read.
 */
export function openBuffer(path: string, fs: FileSystem = nodeFileSystem): Buffer {
  let text: string;
  try {
    text = fs.readFile(path);
  } catch (err) {
    throw new FileReadError(path, err);
  }
  return new BufferImpl(text, path, fs);
}
