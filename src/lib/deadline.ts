/**
 * Bound a backend call by a timeout.
 * The operation receives a signal that aborts when the deadline passes.
 */

import type { StorageKind } from '../types/index.js';
import { BackendError } from '../types/index.js';

export async function withDeadline<T>(
  backend: Exclude<StorageKind, 'local'>,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new BackendError(
        backend,
        `${backend} backend timed out after ${timeoutMs}ms`
      );
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
