import { PublicKey } from '@solana/web3.js';
import { utf8Bytes } from '../utils/encoding.js';
import { Seeds } from './Seeds.js';

export type DerivedPda = { publicKey: PublicKey; bump: number };

function find(programId: PublicKey, seeds: Array<Buffer | Uint8Array>): DerivedPda {
  const [publicKey, bump] = PublicKey.findProgramAddressSync(seeds, programId);
  return { publicKey, bump };
}

export const PDA = {
  globalState(programId: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.GlobalState)]);
  },

  vaultAuthority(programId: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.VaultAuthority)]);
  },

  userState(programId: PublicKey, payer: PublicKey): DerivedPda {
    return find(programId, [utf8Bytes(Seeds.UserState), payer.toBuffer()]);
  }
} as const;
