import { VaultAmmError } from '../errors/VaultAmmError.js';

export type Result<T, E = VaultAmmError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Runs `fn` and captures a thrown VaultAmmError as a failed result.
 * Anything else is a programming error and is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (cause) {
    if (cause instanceof VaultAmmError) return err(cause);
    throw cause;
  }
}
