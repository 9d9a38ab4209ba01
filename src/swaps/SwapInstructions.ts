import type { AccountMeta } from '@solana/web3.js';
import { PublicKey, SystemProgram, TransactionInstruction } from '@solana/web3.js';
import { ASSOCIATED_TOKEN_PROGRAM_ID, TOKEN_PROGRAM_ID } from '@solana/spl-token';
import { BorshInstructionCoder } from '@coral-xyz/anchor';
import BN from 'bn.js';

import type { VaultDirection } from '../amm/Direction.js';
import { deriveProgramAuthorities } from '../accounts/Authorities.js';
import { PDA } from '../accounts/PDA.js';
import type { VaultConstants } from '../config/constants.js';
import { VaultAmmError } from '../errors/VaultAmmError.js';
import { VAULT_IX_ACCOUNTS, deauraVaultIdl, type VaultIxAccountName } from '../idl/deauraVault.js';
import { convert, rateForDirection } from '../quotes/ConversionRate.js';
import { hasSufficientReserve } from '../quotes/QuoteEngine.js';
import { toU64 } from '../utils/math.js';
import type { VaultView } from '../vaults/VaultView.js';

/** Accounts the router supplies for the user side of the trade. */
export type UserAccounts = {
  /** Signs the transaction and pays; becomes the program's `payer`. */
  userTransferAuthority?: PublicKey;
  sourceTokenAccount?: PublicKey;
  destinationTokenAccount?: PublicKey;
};

export type BuildSwapParams = {
  view: VaultView;
  amountIn: bigint | number | string;
  userAccounts: UserAccounts;

  /** Substitute the default public key for absent user accounts instead of failing. */
  missingDynamicAccountsAsDefault?: boolean;
};

export type InstructionPlan = {
  swap: 'TokenSwap';
  instructions: TransactionInstruction[];
  accountMetas: AccountMeta[];
};

function toBN(value: bigint): BN {
  return new BN(value.toString(10));
}

export class SwapInstructions {
  private readonly coder: BorshInstructionCoder;

  constructor(readonly constants: VaultConstants) {
    this.coder = new BorshInstructionCoder(deauraVaultIdl(constants));
  }

  get accountsLen(): number {
    return VAULT_IX_ACCOUNTS.length;
  }

  /** Instruction data: 8-byte discriminator followed by the u64 amount, little-endian. */
  encodeData(direction: VaultDirection, amount: bigint): Buffer {
    return this.coder.encode(direction, { amount: toBN(toU64(amount)) });
  }

  accountMetas(direction: VaultDirection, payer: PublicKey, source: PublicKey, destination: PublicKey): AccountMeta[] {
    const { globalState, vaultAuthority } = deriveProgramAuthorities(this.constants.programId);

    const [payerVnx, payerGoldc, vnxVault]: [PublicKey, PublicKey, PublicKey] =
      direction === 'deposit'
        ? [source, destination, this.constants.depositVault]
        : [destination, source, this.constants.redeemVault];

    const addresses: Record<VaultIxAccountName, PublicKey> = {
      payer,
      global_state: globalState,
      vault_authority: vaultAuthority,
      goldc_mint: this.constants.goldcMint,
      payer_goldc_token_account: payerGoldc,
      vnx_mint: this.constants.vnxMint,
      payer_vnx_token_account: payerVnx,
      vnx_vault: vnxVault,
      user_data: PDA.userState(this.constants.programId, payer).publicKey,
      token_program: TOKEN_PROGRAM_ID,
      associated_token_program: ASSOCIATED_TOKEN_PROGRAM_ID,
      system_program: SystemProgram.programId
    };

    return VAULT_IX_ACCOUNTS.map((account) => ({
      pubkey: addresses[account.name],
      isSigner: 'signer' in account && account.signer,
      isWritable: 'writable' in account && account.writable
    }));
  }

  /**
   * Builds the single deposit or redeem instruction for the view's direction.
   * Redeems are re-checked against the view's current reserve so a quote that
   * went stale after a refresh cannot be executed.
   */
  build(params: BuildSwapParams): InstructionPlan {
    const { view } = params;
    const amountIn = toU64(params.amountIn, 'amountIn');

    const payer = this.requireAccount(params, 'userTransferAuthority');
    const source = this.requireAccount(params, 'sourceTokenAccount');
    const destination = this.requireAccount(params, 'destinationTokenAccount');

    if (view.direction === 'redeem') {
      const amountOut = convert(amountIn, rateForDirection(view.direction, this.constants));
      if (!hasSufficientReserve(view, amountOut)) {
        throw new VaultAmmError('InsufficientReserve', 'Insufficient VNX liquidity in redeem vault', {
          details: {
            amountIn: amountIn.toString(),
            amountOut: amountOut.toString(),
            reserve: view.reserveBalance.toString()
          }
        });
      }
    }

    const accountMetas = this.accountMetas(view.direction, payer, source, destination);
    const instruction = new TransactionInstruction({
      programId: this.constants.programId,
      keys: accountMetas,
      data: this.encodeData(view.direction, amountIn)
    });

    return {
      swap: 'TokenSwap',
      instructions: [instruction],
      accountMetas
    };
  }

  private requireAccount(params: BuildSwapParams, name: keyof UserAccounts): PublicKey {
    const account = params.userAccounts[name];
    if (account) return account;
    if (params.missingDynamicAccountsAsDefault) return PublicKey.default;
    throw new VaultAmmError('MissingAccount', `Missing required user account: ${name}`, {
      details: { account: name, direction: params.view.direction }
    });
  }
}
