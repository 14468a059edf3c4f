/**
 * Core types for the buffer data model.
 *
 * Design principles:
 * - Offsets and columns count UTF-16 code units (JavaScript string indices)
 * - A buffer always has at least one line; no line stores its terminator
 * - Joining lines with "\n" reproduces the stored text exactly
 */

// =============================================================================
// Position Types
// =============================================================================

/** A position within a buffer as (line index, character column). */
export interface BufferPoint {
  readonly row: number;
  readonly column: number;
}

/** A half-open offset range, always ordered (start <= end). */
export interface OffsetRange {
  readonly start: number;
  readonly end: number;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * File access used when opening and saving buffers.
 * Both calls are synchronous and throw on failure.
 */
export interface FileSystem {
  readFile(path: string): string;
  writeFile(path: string, text: string): void;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Immutable view of a buffer's lines at one point in time.
 * Rendering reads snapshots so it never observes a half-applied edit.
 */
export interface BufferSnapshot {
  readonly lineCount: number;
  /** Total character count including newlines. */
  readonly length: number;
  line(row: number): string;
  lines(startRow: number, endRow: number): readonly string[];
  text(): string;
  pointToOffset(point: BufferPoint): number;
  offsetToPoint(offset: number): BufferPoint;
}

// =============================================================================
// Buffer
// =============================================================================

/**
 * Mutable text storage for one open file.
 *
 * Every mutation re-derives the line index, so offset/point conversions are
 * valid immediately afterwards.
 */
export interface Buffer extends BufferSnapshot {
  /** Path the buffer saves to. Empty for an unnamed buffer. */
  readonly path: string;
  /** Display name, shown in the status line. */
  readonly name: string;

  /** Total character count including newlines. */
  len(): number;
  substring(start: number, end: number): string;

  insert(offset: number, text: string): void;
  remove(start: number, end: number): void;

  /** Clamp a point to the nearest valid position. */
  clipPoint(point: BufferPoint): BufferPoint;
  /** Clamp an offset to [0, len()]. */
  clipOffset(offset: number): number;

  setPath(path: string): void;
  isDirty(): boolean;
  /**
   * Write the content to `path`. Clears the dirty flag on success.
   * @throws FileSaveError when there is no path or the write fails.
   */
  save(): void;

  snapshot(): BufferSnapshot;
}
