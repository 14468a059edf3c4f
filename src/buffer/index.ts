export { createBuffer, nodeFileSystem, openBuffer } from "./buffer.ts";
export {
  charToVisualColumn,
  codeUnitsAt,
  lineVisualWidth,
  nextCharColumn,
  previousCharColumn,
  visualToCharColumn,
} from "./columns.ts";
export type { Buffer, BufferPoint, BufferSnapshot, FileSystem, OffsetRange } from "./types.ts";
