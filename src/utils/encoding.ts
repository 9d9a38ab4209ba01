import type { PublicKey } from '@solana/web3.js';

export function utf8Bytes(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

/** Map key used for account maps: base58 address. */
export function accountKey(address: PublicKey | string): string {
  return typeof address === 'string' ? address : address.toBase58();
}
