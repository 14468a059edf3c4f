/** Failure to read a file into a new buffer. */
export class FileReadError extends Error {
  constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(`Could not open ${path}: ${describeCause(cause)}`, { cause });
    this.name = "FileReadError";
  }
}

/** Failure to persist a buffer. The buffer's dirty flag is left as it was. */
export class FileSaveError extends Error {
  constructor(
    public readonly path: string,
    cause?: unknown,
  ) {
    super(
      path === "" ? "Buffer has no file name" : `Could not save ${path}: ${describeCause(cause)}`,
      { cause },
    );
    this.name = "FileSaveError";
  }
}

/** Message text for anything thrown by a collaborator. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
