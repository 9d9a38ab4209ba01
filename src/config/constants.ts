import { PublicKey } from '@solana/web3.js';

export type InstructionDiscriminator = readonly [number, number, number, number, number, number, number, number];

export type VaultConstants = {
  readonly programId: PublicKey;

  readonly vnxMint: PublicKey;
  readonly goldcMint: PublicKey;

  /** VNX -> GOLDC */
  readonly depositVault: PublicKey;
  /** GOLDC -> VNX */
  readonly redeemVault: PublicKey;

  /** Anchor sighashes of `deposit(amount: u64)` and `redeem(amount: u64)`. */
  readonly depositDiscriminator: InstructionDiscriminator;
  readonly redeemDiscriminator: InstructionDiscriminator;

  /**
   * On-chain mint decimals. The raw-integer conversion rate between the two
   * assets is derived from these; see ConversionRate.
   */
  readonly decimals: { readonly vnx: number; readonly goldc: number };
};

export const DEAURA_PROGRAM_ID = new PublicKey('5ZcDxdRBiRe73S68BCHE7NwPt82evS5FyPPU9rfXwYBj');

export const VNX_MINT = new PublicKey('9TPL8droGJ7jThsq4momaoz6uhTcvX2SeMqipoPmNa8R');
export const GOLDC_MINT = new PublicKey('EhGYsb13zhso2xhQSd1H1xdu6bvcv88oLoVMWgfAV6tx');

export const VNX_DEPOSIT_VAULT = new PublicKey('CKixsXaerxYaaXuijWQFxKAyXHkAhfi2r9BBk6Wke4BH');
export const VNX_REDEEM_VAULT = new PublicKey('EUpqbEGhSPBegZJbk3HbdBNnMW7DTy7tb8fwnAejcfG1');

export const DEPOSIT_IX_DISC: InstructionDiscriminator = [242, 35, 198, 137, 82, 225, 242, 182];
export const REDEEM_IX_DISC: InstructionDiscriminator = [184, 12, 86, 149, 70, 196, 97, 225];

export const MAINNET_CONSTANTS: VaultConstants = Object.freeze({
  programId: DEAURA_PROGRAM_ID,
  vnxMint: VNX_MINT,
  goldcMint: GOLDC_MINT,
  depositVault: VNX_DEPOSIT_VAULT,
  redeemVault: VNX_REDEEM_VAULT,
  depositDiscriminator: DEPOSIT_IX_DISC,
  redeemDiscriminator: REDEEM_IX_DISC,
  decimals: Object.freeze({ vnx: 9, goldc: 9 })
});
