/**
 * Errors raised while loading snapshots
 *
 * These never escape compareSnapshotFiles; they are turned into error entries there.
 */

export type SnapshotErrorCode = "UNSUPPORTED_FORMAT" | "MALFORMED_INPUT" | "FILE_ACCESS";

export class SnapshotError extends Error {
  public readonly code: SnapshotErrorCode;

  constructor(code: SnapshotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SnapshotError";
    this.code = code;
  }
}

export class UnsupportedFormatError extends SnapshotError {
  public readonly extension: string;

  constructor(extension: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported file type: ${extension || "(no extension)"}`);
    this.name = "UnsupportedFormatError";
    this.extension = extension;
  }
}

export class MalformedInputError extends SnapshotError {
  public readonly source: string;
  public readonly row?: number;

  constructor(source: string, detail: string, options?: { row?: number; cause?: unknown }) {
    const where = options?.row !== undefined ? `${source} (row ${options.row})` : source;
    super("MALFORMED_INPUT", `Malformed input in ${where}: ${detail}`, { cause: options?.cause });
    this.name = "MalformedInputError";
    this.source = source;
    this.row = options?.row;
  }
}

export class FileAccessError extends SnapshotError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super("FILE_ACCESS", describeAccessFailure(path, cause), { cause });
    this.name = "FileAccessError";
    this.path = path;
  }
}

function describeAccessFailure(path: string, cause: unknown): string {
  const code = errorCode(cause);
  if (code === "ENOENT") return `File not found: ${path}`;
  if (code === "EACCES" || code === "EPERM") return `Permission denied: ${path}`;
  if (code === "EISDIR") return `Not a file: ${path}`;
  return `Could not read ${path}: ${errorMessage(cause)}`;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
