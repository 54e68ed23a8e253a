export type ErrorCode =
  | "VALIDATION_FAILED"
  | "NOT_FOUND"
  | "STORAGE_FAILED"
  | "FILESYSTEM_FAILED"
  | "INVALID_TRANSITION";

export abstract class VoiceLensError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input; raised before anything is written. */
export class ValidationError extends VoiceLensError {
  readonly code = "VALIDATION_FAILED";
}

export class NotFoundError extends VoiceLensError {
  readonly code = "NOT_FOUND";
}

/**
 * The structured store failed. `analysisId` is set when a row for the
 * operation already exists and can be reconciled later.
 */
export class StorageError extends VoiceLensError {
  readonly code = "STORAGE_FAILED";

  constructor(
    message: string,
    readonly analysisId: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class FileSystemError extends VoiceLensError {
  readonly code = "FILESYSTEM_FAILED";

  constructor(
    message: string,
    readonly analysisId: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class InvalidTransitionError extends VoiceLensError {
  readonly code = "INVALID_TRANSITION";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
