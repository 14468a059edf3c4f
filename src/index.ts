export * from "./buffer/index.ts";
export * from "./config/index.ts";
export { type DebugEntry, DebugLogger, disabledLogger, type DispatchEntry, type ErrorEntry } from "./debug-logger.ts";
export * from "./editor/index.ts";
export { describeCause, FileReadError, FileSaveError } from "./errors.ts";
export * from "./renderer/index.ts";
export { type RunEditorOptions, runEditor } from "./run-loop.ts";
