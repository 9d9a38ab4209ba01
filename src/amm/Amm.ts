import type { AccountInfo, PublicKey } from '@solana/web3.js';

import type { VaultConstants } from '../config/constants.js';
import type { Quote, SwapMode } from '../quotes/Quote.js';
import type { InstructionPlan } from '../swaps/SwapInstructions.js';
import type { Logger } from '../utils/logger.js';

/** Account data keyed by base58 address, as delivered by the host's account monitor. */
export type AccountMap = ReadonlyMap<string, Pick<AccountInfo<Uint8Array>, 'data'>>;

/** A market the router discovered; for this adapter, one of the two vault addresses. */
export type KeyedAccount = {
  key: PublicKey;
};

export type AmmContext = {
  constants?: VaultConstants;
  logger?: Logger;
};

export type QuoteParams = {
  inputMint: PublicKey;
  outputMint: PublicKey;
  amount: bigint | number | string;
  swapMode?: SwapMode;
};

export type SwapParams = {
  sourceMint: PublicKey;
  destinationMint: PublicKey;
  inAmount: bigint | number | string;
  outAmount?: bigint | number | string;

  sourceTokenAccount?: PublicKey;
  destinationTokenAccount?: PublicKey;
  tokenTransferAuthority?: PublicKey;

  missingDynamicAccountsAsDefault?: boolean;
};

/**
 * Capability set the router uses to treat every liquidity source alike.
 */
export interface Amm {
  label(): string;
  programId(): PublicKey;
  key(): PublicKey;

  getReserveMints(): PublicKey[];
  getAccountsToUpdate(): PublicKey[];
  update(accounts: AccountMap, slot?: number): void;

  quote(params: QuoteParams): Quote;
  getSwapAndAccountMetas(params: SwapParams): InstructionPlan;
  getAccountsLen(): number;

  clone(): Amm;
}
