import { StoreUnavailableError, isAuthError } from '@/common/errors/authErrors';
import { sleep } from '@/common/utils';

export interface StoreCallOptions {
  /** Used in errors and logs, e.g. `access.getRolesForPrincipal`. */
  operation: string;
  /** Upper bound for one attempt. */
  timeoutMs: number;
  /** Read-path calls may be retried once; writes never are. */
  retries?: 0 | 1;
  backoffMs?: number;
}

class AttemptTimeout extends Error {}

/**
 * Rejects with `reason()` as soon as `signal` aborts instead of waiting on
 * `work` any longer. `work` keeps running; its eventual outcome is ignored.
 */
export function abandonOnAbort<T>(
  signal: AbortSignal,
  work: Promise<T>,
  reason: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(reason());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Runs one external store call under the caller's cancellation and a
 * per-attempt timeout.
 *
 * - caller cancellation: the call is abandoned, never retried;
 * - timeout or store error: retried `retries` times after `backoffMs`;
 * - anything left over surfaces as `StoreUnavailableError`.
 *
 * `fn` receives a signal that aborts on either condition, for stores that can
 * cancel in-flight commands.
 */
export async function callStore<T>(
  signal: AbortSignal,
  options: StoreCallOptions,
  fn: (attemptSignal: AbortSignal) => Promise<T>,
): Promise<T> {
  const { operation, timeoutMs, retries = 0, backoffMs = 0 } = options;
  let lastError: unknown = null;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (signal.aborted) {
      throw new StoreUnavailableError(operation, `${operation} cancelled by caller`);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await abandonOnAbort(
        controller.signal,
        fn(controller.signal),
        () => new AttemptTimeout('Attempt aborted'),
      );
    } catch (error) {
      if (signal.aborted) {
        throw new StoreUnavailableError(operation, `${operation} cancelled by caller`, {
          cause: error,
        });
      }
      // Deterministic failures raised by the store wrapper itself are not retried
      if (isAuthError(error) && error.kind !== 'StoreUnavailable') {
        throw error;
      }
      lastError =
        error instanceof AttemptTimeout
          ? new Error(`${operation} timed out after ${timeoutMs}ms`)
          : error;
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', forwardAbort);
    }

    if (attempt < retries && backoffMs > 0) {
      try {
        await sleep(backoffMs, signal);
      } catch (error) {
        throw new StoreUnavailableError(operation, `${operation} cancelled by caller`, {
          cause: error,
        });
      }
    }
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new StoreUnavailableError(operation, `${operation} failed: ${reason}`, {
    cause: lastError,
  });
}
