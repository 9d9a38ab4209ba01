import type { Idl } from '@coral-xyz/anchor';

import { defaultConstants } from '../config/AdapterConfig.js';
import type { VaultConstants } from '../config/constants.js';

type IdlAccountItem = Idl['instructions'][number]['accounts'][number];

/** Accounts of `deposit` and `redeem`, in program order. */
export const VAULT_IX_ACCOUNTS = [
  { name: 'payer', writable: true, signer: true },
  { name: 'global_state', writable: true },
  { name: 'vault_authority', writable: true },
  { name: 'goldc_mint', writable: true },
  { name: 'payer_goldc_token_account', writable: true },
  { name: 'vnx_mint', writable: true },
  { name: 'payer_vnx_token_account', writable: true },
  { name: 'vnx_vault', writable: true },
  { name: 'user_data', writable: true },
  { name: 'token_program' },
  { name: 'associated_token_program' },
  { name: 'system_program' }
] as const satisfies readonly IdlAccountItem[];

export type VaultIxAccountName = (typeof VAULT_IX_ACCOUNTS)[number]['name'];

/** Subset of the Deaura program IDL the adapter calls into. */
export function deauraVaultIdl(constants: VaultConstants = defaultConstants()): Idl {
  return {
    address: constants.programId.toBase58(),
    metadata: {
      name: 'deaura',
      version: '0.1.0',
      spec: '0.1.0'
    },
    instructions: [
      {
        name: 'deposit',
        discriminator: [...constants.depositDiscriminator],
        accounts: [...VAULT_IX_ACCOUNTS],
        args: [{ name: 'amount', type: 'u64' }]
      },
      {
        name: 'redeem',
        discriminator: [...constants.redeemDiscriminator],
        accounts: [...VAULT_IX_ACCOUNTS],
        args: [{ name: 'amount', type: 'u64' }]
      }
    ]
  };
}
