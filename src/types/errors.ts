/**
 * Error types thrown below the service boundary.
 * StorageService converts them into Result failures.
 */

import type { ErrorCode } from './result.js';
import type { StorageKind } from './file.js';

/**
 * Codes raised by the codec and the metadata index
 */
export type StorageErrorCode =
  | Extract<ErrorCode, 'DURABILITY_FAILURE' | 'UNSUPPORTED_OPERATION'>
  | 'INPUT_NOT_FOUND';

export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/**
 * A remote backend call failed or timed out.
 * Always absorbed by the orchestrator, never returned to callers.
 */
export class BackendError extends Error {
  constructor(
    public readonly backend: Exclude<StorageKind, 'local'>,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BackendError';
  }
}
