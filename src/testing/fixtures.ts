import { ACCOUNT_SIZE, AccountLayout, AccountState } from '@solana/spl-token';
import { PublicKey } from '@solana/web3.js';

import { VaultAmmError } from '../errors/VaultAmmError.js';
import { createLogger } from '../utils/logger.js';

export const silentLogger = createLogger('silent');

/** Deterministic placeholder key filled with one byte value. */
export function testKey(fill: number): PublicKey {
  return new PublicKey(Buffer.alloc(32, fill));
}

export function packTokenAccount(opts: {
  mint: PublicKey;
  amount: bigint;
  owner?: PublicKey;
  state?: AccountState;
}): Buffer {
  const data = Buffer.alloc(ACCOUNT_SIZE);
  AccountLayout.encode(
    {
      mint: opts.mint,
      owner: opts.owner ?? testKey(9),
      amount: opts.amount,
      delegateOption: 0,
      delegate: PublicKey.default,
      state: opts.state ?? AccountState.Initialized,
      isNativeOption: 0,
      isNative: 0n,
      delegatedAmount: 0n,
      closeAuthorityOption: 0,
      closeAuthority: PublicKey.default
    },
    data
  );
  return data;
}

/** Runs `fn` and returns the VaultAmmError it throws; anything else fails the test. */
export function captureVaultError(fn: () => unknown): VaultAmmError {
  try {
    fn();
  } catch (e) {
    if (e instanceof VaultAmmError) return e;
    throw e;
  }
  throw new Error('expected a VaultAmmError to be thrown');
}
