import type { PublicKey } from '@solana/web3.js';

/** Immutable view of one vault token account as last observed on chain. */
export type VaultSnapshot = {
  readonly vault: PublicKey;
  readonly mint: PublicKey;
  /** Token account owner; unknown until the first refresh. */
  readonly owner?: PublicKey;

  /** Raw units of the reserve mint held by the vault. */
  readonly reserveBalance: bigint;

  readonly lastRefreshSlot?: number;
};
