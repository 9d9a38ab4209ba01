import type { PublicKey } from '@solana/web3.js';

import type { AccountMap, AmmContext, KeyedAccount } from '../amm/Amm.js';
import { DeauraVaultAmm } from '../amm/DeauraVaultAmm.js';
import { directionForSourceMint } from '../amm/Direction.js';
import { defaultConstants } from '../config/AdapterConfig.js';
import { isVaultAmmError } from '../errors/VaultAmmError.js';
import { accountKey } from '../utils/encoding.js';
import { rootLogger, type Logger } from '../utils/logger.js';
import { attempt, type Result } from '../utils/result.js';

export type RefreshReport = Map<string, Result<void>>;

/**
 * Holds the adapter instances discovered for the vault program, keyed by
 * vault address.
 */
export class AmmRegistry {
  private readonly amms = new Map<string, DeauraVaultAmm>();
  private readonly log: Logger;

  constructor(readonly context: AmmContext = {}) {
    this.log = (context.logger ?? rootLogger()).child({ component: 'registry' });
  }

  static withKnownVaults(context: AmmContext = {}): AmmRegistry {
    const constants = context.constants ?? defaultConstants();
    const registry = new AmmRegistry(context);
    registry.discover([{ key: constants.depositVault }, { key: constants.redeemVault }]);
    return registry;
  }

  /** Registers one instance per known vault; unknown accounts are skipped. */
  discover(keyedAccounts: KeyedAccount[]): DeauraVaultAmm[] {
    const added: DeauraVaultAmm[] = [];
    for (const keyed of keyedAccounts) {
      const id = accountKey(keyed.key);
      if (this.amms.has(id)) continue;

      try {
        const amm = DeauraVaultAmm.fromKeyedAccount(keyed, this.context);
        this.amms.set(id, amm);
        added.push(amm);
        this.log.info({ key: id, label: amm.label() }, 'registered vault market');
      } catch (cause) {
        if (!isVaultAmmError(cause, 'UnknownVault')) throw cause;
        this.log.debug({ key: id }, 'skipping unknown account');
      }
    }
    return added;
  }

  get(key: PublicKey | string): DeauraVaultAmm | undefined {
    return this.amms.get(accountKey(key));
  }

  /** The market that takes `sourceMint` as input, if it has been discovered. */
  forSourceMint(sourceMint: PublicKey): DeauraVaultAmm | undefined {
    const direction = directionForSourceMint(sourceMint, this.context.constants ?? defaultConstants());
    return this.all().find((amm) => amm.direction === direction);
  }

  all(): DeauraVaultAmm[] {
    return [...this.amms.values()];
  }

  accountsToUpdate(): PublicKey[] {
    const seen = new Map<string, PublicKey>();
    for (const amm of this.amms.values()) {
      for (const account of amm.getAccountsToUpdate()) {
        seen.set(account.toBase58(), account);
      }
    }
    return [...seen.values()];
  }

  /** Refreshes every instance; one failing leaves the others and its own previous snapshot intact. */
  refreshAll(accounts: AccountMap, slot?: number): RefreshReport {
    const report: RefreshReport = new Map();
    for (const [id, amm] of this.amms) {
      const result = attempt(() => amm.update(accounts, slot));
      if (!result.ok) {
        this.log.error({ key: id, code: result.error.code }, result.error.message);
      }
      report.set(id, result);
    }
    return report;
  }
}
