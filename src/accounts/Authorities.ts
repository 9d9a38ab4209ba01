import type { PublicKey } from '@solana/web3.js';
import { PDA } from './PDA.js';

export type ProgramAuthorities = {
  globalState: PublicKey;
  vaultAuthority: PublicKey;
};

const cache = new Map<string, ProgramAuthorities>();

/** Program-wide PDAs; these do not depend on the user so they are derived once per program. */
export function deriveProgramAuthorities(programId: PublicKey): ProgramAuthorities {
  const key = programId.toBase58();
  const hit = cache.get(key);
  if (hit) return hit;

  const derived: ProgramAuthorities = Object.freeze({
    globalState: PDA.globalState(programId).publicKey,
    vaultAuthority: PDA.vaultAuthority(programId).publicKey
  });
  cache.set(key, derived);
  return derived;
}
