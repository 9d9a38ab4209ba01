import type { PublicKey } from '@solana/web3.js';
import { ACCOUNT_SIZE, AccountLayout, AccountState } from '@solana/spl-token';

import { VaultAmmError } from '../errors/VaultAmmError.js';

export type DecodedTokenAccount = {
  mint: PublicKey;
  owner: PublicKey;
  amount: bigint;
  state: AccountState;
};

/**
 * Decodes a packed SPL token account. The layout carries no discriminator, so
 * exact length, initialization state and the expected mint stand in for one.
 */
export function decodeTokenAccount(data: Uint8Array, expectedMint: PublicKey): DecodedTokenAccount {
  if (data.length !== ACCOUNT_SIZE) {
    throw new VaultAmmError('DecodeError', 'Vault account has unexpected length', {
      details: { bytes: data.length, expected: ACCOUNT_SIZE }
    });
  }

  const raw = AccountLayout.decode(data);

  if (raw.state === AccountState.Uninitialized) {
    throw new VaultAmmError('DecodeError', 'Vault token account is not initialized');
  }

  if (!raw.mint.equals(expectedMint)) {
    throw new VaultAmmError('DecodeError', 'Vault token account holds an unexpected mint', {
      details: { mint: raw.mint.toBase58(), expected: expectedMint.toBase58() }
    });
  }

  return {
    mint: raw.mint,
    owner: raw.owner,
    amount: raw.amount,
    state: raw.state
  };
}
