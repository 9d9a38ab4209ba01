import type { PublicKey } from '@solana/web3.js';

import type { VaultConstants } from '../config/constants.js';
import { directionProfile, type DirectionProfile, type VaultDirection } from '../amm/Direction.js';
import { VaultAmmError } from '../errors/VaultAmmError.js';
import type { VaultSnapshot } from '../types/VaultState.js';
import { decodeTokenAccount } from './TokenAccountDecoder.js';

export class VaultView {
  readonly profile: DirectionProfile;

  /** Both vaults hold VNX: the deposit vault receives it, the redeem vault pays it out. */
  readonly reserveMint: PublicKey;

  private current: VaultSnapshot;

  constructor(direction: VaultDirection, constants: VaultConstants) {
    this.profile = directionProfile(direction, constants);
    this.reserveMint = constants.vnxMint;
    this.current = Object.freeze({
      vault: this.profile.vault,
      mint: this.reserveMint,
      reserveBalance: 0n
    });
  }

  get vaultAddress(): PublicKey {
    return this.profile.vault;
  }

  get direction(): VaultDirection {
    return this.profile.direction;
  }

  get mintIn(): PublicKey {
    return this.profile.mintIn;
  }

  get mintOut(): PublicKey {
    return this.profile.mintOut;
  }

  get reserveBalance(): bigint {
    return this.current.reserveBalance;
  }

  get lastRefreshSlot(): number | undefined {
    return this.current.lastRefreshSlot;
  }

  snapshot(): VaultSnapshot {
    return this.current;
  }

  requiredAccounts(): PublicKey[] {
    return [this.profile.vault];
  }

  /** Adopts a snapshot taken from another view of the same vault. */
  restore(snapshot: VaultSnapshot): void {
    if (!snapshot.vault.equals(this.profile.vault)) {
      throw new VaultAmmError('InvalidArgument', 'Snapshot belongs to a different vault', {
        details: { vault: snapshot.vault.toBase58(), expected: this.profile.vault.toBase58() }
      });
    }
    this.current = snapshot;
  }

  /**
   * Replaces the snapshot from raw vault account bytes. On a decode failure
   * the previous snapshot stays in place.
   */
  refresh(data: Uint8Array, slot?: number): VaultSnapshot {
    const decoded = decodeTokenAccount(data, this.reserveMint);

    const next: VaultSnapshot = Object.freeze({
      vault: this.profile.vault,
      mint: decoded.mint,
      owner: decoded.owner,
      reserveBalance: decoded.amount,
      ...(slot !== undefined ? { lastRefreshSlot: slot } : {})
    });

    this.current = next;
    return next;
  }
}
