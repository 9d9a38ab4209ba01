import type { PublicKey } from '@solana/web3.js';

import { defaultConstants } from '../config/AdapterConfig.js';
import type { VaultConstants } from '../config/constants.js';
import { VaultAmmError } from '../errors/VaultAmmError.js';
import { rateForDirection, type ConversionRate } from '../quotes/ConversionRate.js';
import type { Quote } from '../quotes/Quote.js';
import { quote as computeQuote } from '../quotes/QuoteEngine.js';
import { SwapInstructions, type InstructionPlan, type UserAccounts } from '../swaps/SwapInstructions.js';
import { accountKey } from '../utils/encoding.js';
import { rootLogger, type Logger } from '../utils/logger.js';
import { VaultView } from '../vaults/VaultView.js';
import type { AccountMap, Amm, AmmContext, KeyedAccount, QuoteParams, SwapParams } from './Amm.js';
import { directionForVault, type VaultDirection } from './Direction.js';

/**
 * One vault, one direction. Both directions are served by registering the
 * deposit and the redeem vault as two separate markets.
 */
export class DeauraVaultAmm implements Amm {
  readonly view: VaultView;
  readonly rate: ConversionRate;

  private readonly instructions: SwapInstructions;
  private readonly logger: Logger;
  private readonly log: Logger;

  constructor(
    direction: VaultDirection,
    readonly constants: VaultConstants = defaultConstants(),
    logger: Logger = rootLogger()
  ) {
    this.view = new VaultView(direction, constants);
    this.rate = rateForDirection(direction, constants);
    this.instructions = new SwapInstructions(constants);
    this.logger = logger;
    this.log = logger.child({ amm: this.view.profile.label });
  }

  static fromKeyedAccount(keyedAccount: KeyedAccount, context: AmmContext = {}): DeauraVaultAmm {
    const constants = context.constants ?? defaultConstants();
    const direction = directionForVault(keyedAccount.key, constants);
    return new DeauraVaultAmm(direction, constants, context.logger ?? rootLogger());
  }

  get direction(): VaultDirection {
    return this.view.direction;
  }

  label(): string {
    return this.view.profile.label;
  }

  programId(): PublicKey {
    return this.constants.programId;
  }

  key(): PublicKey {
    return this.view.vaultAddress;
  }

  getReserveMints(): PublicKey[] {
    return [this.constants.vnxMint, this.constants.goldcMint];
  }

  getAccountsToUpdate(): PublicKey[] {
    return this.view.requiredAccounts();
  }

  update(accounts: AccountMap, slot?: number): void {
    const vault = this.view.vaultAddress;
    const account = accounts.get(accountKey(vault));
    if (!account) {
      throw new VaultAmmError('MissingAccount', 'Vault account missing from account map', {
        details: { vault: vault.toBase58() }
      });
    }

    try {
      const snapshot = this.view.refresh(account.data, slot);
      this.log.debug({ reserve: snapshot.reserveBalance.toString(), slot }, 'vault refreshed');
    } catch (cause) {
      this.log.warn({ err: cause, vault: vault.toBase58() }, 'vault refresh failed; keeping previous snapshot');
      throw cause;
    }
  }

  quote(params: QuoteParams): Quote {
    this.assertPair(params.inputMint, params.outputMint);
    const q = computeQuote(
      this.view,
      { amount: params.amount, ...(params.swapMode !== undefined ? { swapMode: params.swapMode } : {}) },
      this.rate
    );
    if (!q.valid) {
      this.log.debug(
        { inAmount: q.inAmount.toString(), reserve: this.view.reserveBalance.toString() },
        'quote exceeds reserve'
      );
    }
    return q;
  }

  getSwapAndAccountMetas(params: SwapParams): InstructionPlan {
    this.assertPair(params.sourceMint, params.destinationMint);

    const userAccounts: UserAccounts = {
      ...(params.tokenTransferAuthority ? { userTransferAuthority: params.tokenTransferAuthority } : {}),
      ...(params.sourceTokenAccount ? { sourceTokenAccount: params.sourceTokenAccount } : {}),
      ...(params.destinationTokenAccount ? { destinationTokenAccount: params.destinationTokenAccount } : {})
    };

    return this.instructions.build({
      view: this.view,
      amountIn: params.inAmount,
      userAccounts,
      ...(params.missingDynamicAccountsAsDefault !== undefined
        ? { missingDynamicAccountsAsDefault: params.missingDynamicAccountsAsDefault }
        : {})
    });
  }

  getAccountsLen(): number {
    return this.instructions.accountsLen;
  }

  /** Copies the current snapshot into a fresh instance; later refreshes do not propagate. */
  clone(): DeauraVaultAmm {
    const copy = new DeauraVaultAmm(this.direction, this.constants, this.logger);
    copy.view.restore(this.view.snapshot());
    return copy;
  }

  private assertPair(inputMint: PublicKey, outputMint: PublicKey): void {
    if (!inputMint.equals(this.view.mintIn) || !outputMint.equals(this.view.mintOut)) {
      throw new VaultAmmError('UnsupportedMint', `Mint pair not served by ${this.label()}`, {
        details: {
          inputMint: inputMint.toBase58(),
          outputMint: outputMint.toBase58(),
          expectedInput: this.view.mintIn.toBase58(),
          expectedOutput: this.view.mintOut.toBase58()
        }
      });
    }
  }
}
