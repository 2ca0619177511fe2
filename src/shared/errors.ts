/**
 * Error classes raised by the playback engine and surfaced by the control routes.
 */

export class AircatError extends Error {
  public constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AircatError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidFileError extends AircatError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_FILE", 406, context);
    this.name = "InvalidFileError";
  }
}

export class BadIndexError extends AircatError {
  public constructor(index: unknown) {
    super(`Not a playlist index: ${String(index)}`, "BAD_INDEX", 400, { index });
    this.name = "BadIndexError";
  }
}

export class IndexOutOfRangeError extends AircatError {
  public constructor(index: number, length: number) {
    super(`Index ${index} is outside the playlist (length ${length})`, "INDEX_OUT_OF_RANGE", 400, {
      index,
      length
    });
    this.name = "IndexOutOfRangeError";
  }
}

export class DirectoryNotFoundError extends AircatError {
  public constructor(directory: string) {
    super(`Cannot open directory: ${directory}`, "DIRECTORY_NOT_FOUND", 404, { directory });
    this.name = "DirectoryNotFoundError";
  }
}

export class SeekFailedError extends AircatError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "SEEK_FAILED", 400, context);
    this.name = "SeekFailedError";
  }
}

export class PlaybackOpenFailedError extends AircatError {
  public constructor(filePath: string, cause?: unknown) {
    super(`Cannot open ${filePath} for playback`, "PLAYBACK_OPEN_FAILED", 500, {
      path: filePath,
      cause: cause instanceof Error ? cause.message : cause
    });
    this.name = "PlaybackOpenFailedError";
  }
}

export class ResourceExhaustedError extends AircatError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, "RESOURCE_EXHAUSTED", 500, context);
    this.name = "ResourceExhaustedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
