import { VaultAmmError } from '../errors/VaultAmmError.js';

export type RoundingMode = 'down' | 'up';

export const U64_MAX = (1n << 64n) - 1n;

const DECIMAL_DIGITS = /^[0-9]+$/;

/**
 * Parses a raw token amount and bounds it to u64. Routers hand amounts over
 * as bigint, safe integers or decimal strings.
 */
export function toU64(value: bigint | number | string, fieldName = 'amount'): bigint {
  let amount: bigint;
  if (typeof value === 'string') {
    if (!DECIMAL_DIGITS.test(value)) {
      throw new VaultAmmError('InvalidArgument', `${fieldName} must be a decimal integer string`, {
        details: { [fieldName]: value }
      });
    }
    amount = BigInt(value);
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new VaultAmmError('InvalidArgument', `${fieldName} must be a safe integer`, {
        details: { [fieldName]: value }
      });
    }
    amount = BigInt(value);
  } else {
    amount = value;
  }

  if (amount < 0n) {
    throw new VaultAmmError('InvalidArgument', `${fieldName} must not be negative`, {
      details: { [fieldName]: amount.toString() }
    });
  }
  if (amount > U64_MAX) {
    throw new VaultAmmError('InvalidArgument', `${fieldName} exceeds u64`, {
      details: { [fieldName]: amount.toString() }
    });
  }
  return amount;
}

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new VaultAmmError('InvalidArgument', 'pow10 exponent must be a non-negative integer');
  }
  return 10n ** BigInt(exp);
}

export function mulDiv(
  a: bigint,
  b: bigint,
  denom: bigint,
  rounding: RoundingMode = 'down'
): bigint {
  if (denom === 0n) throw new VaultAmmError('InvalidArgument', 'Division by zero');
  const product = a * b;
  const floor = product / denom;
  return rounding === 'up' && floor * denom !== product ? floor + 1n : floor;
}
