/**
 * src/shared/db/store-timeout.ts
 *
 * WHY:
 * - The auth flows must never hang on a slow database or Redis, and must never
 *   leak a driver exception to their callers.
 * - Every store/cache call made by a flow goes through runStoreOp(), which
 *   bounds it by STORE_TIMEOUT_MS and turns any failure into StoreUnavailableError.
 *
 * RULES:
 * - The original error is kept as `cause` for logging.
 * - A timed-out operation may still complete later in the driver. Callers treat
 *   the outcome as unknown.
 */

export class StoreUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(`Store unavailable during ${operation}`, options);
    this.name = 'StoreUnavailableError';
  }
}

export async function runStoreOp<T>(
  operation: string,
  fn: () => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new StoreUnavailableError(operation, { cause: new Error(`timed out after ${timeoutMs}ms`) }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } catch (err) {
    if (err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError(operation, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Binds runStoreOp to one timeout so flows can write `await store('accounts.get', () => ...)`.
 */
export type StoreOpRunner = <T>(operation: string, fn: () => Promise<T>) => Promise<T>;

export function createStoreOpRunner(timeoutMs: number): StoreOpRunner {
  return (operation, fn) => runStoreOp(operation, fn, timeoutMs);
}
