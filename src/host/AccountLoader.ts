import type { AccountInfo, Commitment, Connection, PublicKey } from '@solana/web3.js';

import type { AccountMap } from '../amm/Amm.js';
import { accountKey } from '../utils/encoding.js';

export type AccountRpc = Pick<Connection, 'getMultipleAccountsInfoAndContext'>;

export type LoadedAccounts = {
  accounts: AccountMap;
  slot: number;
};

/** Fetches the monitored accounts in one round trip. Absent accounts are left out of the map. */
export async function loadAccountMap(
  rpc: AccountRpc,
  keys: PublicKey[],
  commitment?: Commitment
): Promise<LoadedAccounts> {
  const { context, value } = await rpc.getMultipleAccountsInfoAndContext(keys, commitment);

  const accounts = new Map<string, AccountInfo<Buffer>>();
  keys.forEach((key, i) => {
    const info = value[i];
    if (info) accounts.set(accountKey(key), info);
  });

  return { accounts, slot: context.slot };
}
