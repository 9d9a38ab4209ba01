import { config as loadDotenv } from 'dotenv';
import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';

import { VaultAmmError } from '../errors/VaultAmmError.js';
import { MAINNET_CONSTANTS, type VaultConstants } from './constants.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const base58Key = z
  .string()
  .trim()
  .transform((value, ctx) => {
    try {
      return new PublicKey(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a base58 public key' });
      return z.NEVER;
    }
  });

const decimals = z.coerce.number().int().min(0).max(18);

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DEAURA_PROGRAM_ID: base58Key.optional(),
  VNX_MINT: base58Key.optional(),
  GOLDC_MINT: base58Key.optional(),
  VNX_DEPOSIT_VAULT: base58Key.optional(),
  VNX_REDEEM_VAULT: base58Key.optional(),
  VNX_DECIMALS: decimals.optional(),
  GOLDC_DECIMALS: decimals.optional()
});

export type AdapterConfig = {
  readonly logLevel: LogLevel;
  readonly constants: VaultConstants;
};

export function parseAdapterConfig(env: Record<string, string | undefined>): AdapterConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new VaultAmmError('InvalidArgument', 'Invalid adapter configuration', {
      cause: parsed.error,
      details: { issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) }
    });
  }

  const e = parsed.data;
  const constants: VaultConstants = Object.freeze({
    ...MAINNET_CONSTANTS,
    programId: e.DEAURA_PROGRAM_ID ?? MAINNET_CONSTANTS.programId,
    vnxMint: e.VNX_MINT ?? MAINNET_CONSTANTS.vnxMint,
    goldcMint: e.GOLDC_MINT ?? MAINNET_CONSTANTS.goldcMint,
    depositVault: e.VNX_DEPOSIT_VAULT ?? MAINNET_CONSTANTS.depositVault,
    redeemVault: e.VNX_REDEEM_VAULT ?? MAINNET_CONSTANTS.redeemVault,
    decimals: Object.freeze({
      vnx: e.VNX_DECIMALS ?? MAINNET_CONSTANTS.decimals.vnx,
      goldc: e.GOLDC_DECIMALS ?? MAINNET_CONSTANTS.decimals.goldc
    })
  });

  if (constants.depositVault.equals(constants.redeemVault)) {
    throw new VaultAmmError('InvalidArgument', 'Deposit and redeem vaults must differ', {
      details: { vault: constants.depositVault.toBase58() }
    });
  }

  return Object.freeze({ logLevel: e.LOG_LEVEL, constants });
}

let loaded: AdapterConfig | undefined;

/** Reads `.env` and the process environment once; later calls return the same object. */
export function loadAdapterConfig(): AdapterConfig {
  if (!loaded) {
    loadDotenv();
    loaded = parseAdapterConfig(process.env);
  }
  return loaded;
}

/** Identifiers used when a caller supplies none: mainnet, with any environment overrides applied. */
export function defaultConstants(): VaultConstants {
  return loadAdapterConfig().constants;
}
