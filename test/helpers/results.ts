import type { Result } from '../../src/modules/auth/auth.types';

/** Returns the success value, or fails the test with the failure it got instead. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`expected ok result, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}
