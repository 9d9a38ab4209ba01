import type { PublicKey } from '@solana/web3.js';

export type SwapMode = 'ExactIn' | 'ExactOut';

export type QuoteRejection = 'InsufficientReserve';

export type Quote = {
  inAmount: bigint;
  outAmount: bigint;

  /** Always zero: the vault converts at a fixed rate without fees. */
  feeAmount: bigint;
  feeMint: PublicKey;
  feePct: number;

  /** False when the quote must not be executed; `reason` says why. */
  valid: boolean;
  reason?: QuoteRejection;
};
