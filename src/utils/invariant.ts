import { VaultAmmError } from '../errors/VaultAmmError.js';

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new VaultAmmError('InvariantViolation', message);
  }
}
