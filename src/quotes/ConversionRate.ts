import type { VaultDirection } from '../amm/Direction.js';
import type { VaultConstants } from '../config/constants.js';
import { invariant } from '../utils/invariant.js';
import { mulDiv, pow10, type RoundingMode } from '../utils/math.js';

/**
 * Fixed raw-unit conversion between the two vault assets:
 * `out = in * numerator / denominator`. At equal decimals this is 1:1.
 */
export type ConversionRate = {
  readonly numerator: bigint;
  readonly denominator: bigint;
};

export const IDENTITY_RATE: ConversionRate = Object.freeze({ numerator: 1n, denominator: 1n });

/** Rate that rescales raw units of a mint with `fromDecimals` into one with `toDecimals`. */
export function rateFromDecimals(fromDecimals: number, toDecimals: number): ConversionRate {
  if (fromDecimals === toDecimals) return IDENTITY_RATE;
  if (toDecimals > fromDecimals) {
    return Object.freeze({ numerator: pow10(toDecimals - fromDecimals), denominator: 1n });
  }
  return Object.freeze({ numerator: 1n, denominator: pow10(fromDecimals - toDecimals) });
}

export function invertRate(rate: ConversionRate): ConversionRate {
  return Object.freeze({ numerator: rate.denominator, denominator: rate.numerator });
}

export function convert(amount: bigint, rate: ConversionRate, rounding: RoundingMode = 'down'): bigint {
  invariant(rate.numerator > 0n && rate.denominator > 0n, 'conversion rate terms must be positive');
  return mulDiv(amount, rate.numerator, rate.denominator, rounding);
}

/** Input-to-output rate for one trade direction, from the configured mint decimals. */
export function rateForDirection(direction: VaultDirection, constants: VaultConstants): ConversionRate {
  const { vnx, goldc } = constants.decimals;
  return direction === 'deposit' ? rateFromDecimals(vnx, goldc) : rateFromDecimals(goldc, vnx);
}
