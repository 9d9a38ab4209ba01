import { invertRate, convert, type ConversionRate } from './ConversionRate.js';
import type { Quote, SwapMode } from './Quote.js';
import type { VaultView } from '../vaults/VaultView.js';
import { toU64 } from '../utils/math.js';

export type QuoteRequest = {
  amount: bigint | number | string;
  swapMode?: SwapMode;
};

/**
 * Reserve gate for the redeem direction: the vault pays out VNX, so the
 * output amount must not exceed what it holds. Deposits are never gated.
 */
export function hasSufficientReserve(view: VaultView, outAmount: bigint): boolean {
  return view.direction === 'deposit' || outAmount <= view.reserveBalance;
}

function finalize(view: VaultView, inAmount: bigint, outAmount: bigint): Quote {
  const valid = hasSufficientReserve(view, outAmount);
  return {
    inAmount,
    outAmount,
    feeAmount: 0n,
    feeMint: view.mintIn,
    feePct: 0,
    valid,
    ...(valid ? {} : { reason: 'InsufficientReserve' as const })
  };
}

/** `rate` converts raw units of the view's input mint into its output mint. */
export function quoteExactIn(view: VaultView, amountIn: bigint | number | string, rate: ConversionRate): Quote {
  const inAmount = toU64(amountIn, 'amountIn');
  return finalize(view, inAmount, convert(inAmount, rate, 'down'));
}

/** Smallest input that yields at least `amountOut`; `outAmount` is what that input actually buys. */
export function quoteExactOut(view: VaultView, amountOut: bigint | number | string, rate: ConversionRate): Quote {
  const outAmount = toU64(amountOut, 'amountOut');
  const inAmount = toU64(convert(outAmount, invertRate(rate), 'up'), 'amountIn');
  return finalize(view, inAmount, convert(inAmount, rate, 'down'));
}

export function quote(view: VaultView, request: QuoteRequest, rate: ConversionRate): Quote {
  return (request.swapMode ?? 'ExactIn') === 'ExactOut'
    ? quoteExactOut(view, request.amount, rate)
    : quoteExactIn(view, request.amount, rate);
}
