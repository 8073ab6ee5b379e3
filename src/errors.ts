/** Machine-readable failure codes returned to API callers */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNKNOWN_TASK_TYPE'
  | 'UNAVAILABLE'
  | 'DUPLICATE_TASK'
  | 'CREATE_FAILED'
  | 'QUEUE_PUBLISH_FAILED'
  | 'SESSION_NOT_FOUND'
  | 'TASK_NOT_FOUND'
  | 'TRANSFER_NOT_FOUND'
  | 'DISPATCH_UNAVAILABLE'
  | 'COMPLETE_FAILED'
  | 'NO_TASK'
  | 'FORBIDDEN'
  | 'INTERNAL_ERROR';

export interface Failure {
  success: false;
  errorCode: ErrorCode;
  errorMessage: string;
}

export function failure(errorCode: ErrorCode, errorMessage: string): Failure {
  return { success: false, errorCode, errorMessage };
}

export type StoreErrorCode = 'DUPLICATE_KEY' | 'NOT_FOUND' | 'CORRUPT_RECORD' | 'BACKEND_ERROR';

/**
 * Raised by store implementations. Aborts the operation in flight and is
 * surfaced to the caller rather than swallowed.
 */
export class StoreError extends Error {
  constructor(
    readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
