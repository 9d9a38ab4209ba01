import type { PublicKey } from '@solana/web3.js';

import type { InstructionDiscriminator, VaultConstants } from '../config/constants.js';
import { VaultAmmError } from '../errors/VaultAmmError.js';

export type VaultDirection = 'deposit' | 'redeem';

export type DirectionProfile = {
  readonly direction: VaultDirection;
  /** Vault token account this direction trades against; also the AMM key. */
  readonly vault: PublicKey;
  readonly mintIn: PublicKey;
  readonly mintOut: PublicKey;
  /** Instruction name in the program IDL. */
  readonly instruction: VaultDirection;
  readonly discriminator: InstructionDiscriminator;
  /** Display only. */
  readonly label: string;
};

export const DIRECTION_LABELS: Readonly<Record<VaultDirection, string>> = {
  deposit: 'Deaura Vault (VNX→GOLDC)',
  redeem: 'Deaura Vault (GOLDC→VNX)'
};

export function directionProfile(direction: VaultDirection, constants: VaultConstants): DirectionProfile {
  switch (direction) {
    case 'deposit':
      return Object.freeze({
        direction,
        vault: constants.depositVault,
        mintIn: constants.vnxMint,
        mintOut: constants.goldcMint,
        instruction: direction,
        discriminator: constants.depositDiscriminator,
        label: DIRECTION_LABELS.deposit
      });
    case 'redeem':
      return Object.freeze({
        direction,
        vault: constants.redeemVault,
        mintIn: constants.goldcMint,
        mintOut: constants.vnxMint,
        instruction: direction,
        discriminator: constants.redeemDiscriminator,
        label: DIRECTION_LABELS.redeem
      });
  }
}

export function directionForVault(vault: PublicKey, constants: VaultConstants): VaultDirection {
  if (vault.equals(constants.depositVault)) return 'deposit';
  if (vault.equals(constants.redeemVault)) return 'redeem';
  throw new VaultAmmError('UnknownVault', 'Unknown Deaura vault account', {
    details: { vault: vault.toBase58() }
  });
}

export function directionForSourceMint(sourceMint: PublicKey, constants: VaultConstants): VaultDirection {
  if (sourceMint.equals(constants.vnxMint)) return 'deposit';
  if (sourceMint.equals(constants.goldcMint)) return 'redeem';
  throw new VaultAmmError('UnsupportedMint', 'Unsupported source mint for Deaura vault', {
    details: { sourceMint: sourceMint.toBase58() }
  });
}
