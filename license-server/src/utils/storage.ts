import { TransientStorageError, classifyStorageError, isTransientStorageError } from '../errors';
import { createChildLogger } from './logger';

const log = createChildLogger('storage');

/**
 * Runs a storage call under a deadline. A call that outlives `timeoutMs`
 * rejects with TransientStorageError; busy/locked driver errors are mapped
 * to the same type.
 */
export async function withTimeout<T>(operation: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientStorageError(`${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(), deadline]);
  } catch (err) {
    throw classifyStorageError(err, operation);
  } finally {
    clearTimeout(timer);
  }
}

/** Retries once on a transient failure, then lets the error surface. */
export async function retryOnce<T>(operation: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (err) {
    if (!isTransientStorageError(err)) throw err;
    log.warn({ operation, code: err.code }, 'Transient storage failure, retrying once');
    return task();
  }
}
