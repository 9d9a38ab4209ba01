import { describe, expect, it } from 'vitest';

import { MAINNET_CONSTANTS, VNX_MINT, GOLDC_MINT } from '../config/constants.js';
import { U64_MAX } from '../utils/math.js';
import { captureVaultError, packTokenAccount } from '../testing/fixtures.js';
import { VaultView } from '../vaults/VaultView.js';
import { IDENTITY_RATE, invertRate, rateFromDecimals } from './ConversionRate.js';
import { hasSufficientReserve, quote, quoteExactIn, quoteExactOut } from './QuoteEngine.js';

function redeemView(reserve: bigint): VaultView {
  const view = new VaultView('redeem', MAINNET_CONSTANTS);
  view.refresh(packTokenAccount({ mint: VNX_MINT, amount: reserve }));
  return view;
}

describe('QuoteEngine', () => {
  describe('deposit direction', () => {
    const view = new VaultView('deposit', MAINNET_CONSTANTS);

    it.each([0n, 1n, 1_000n, U64_MAX / 2n])('passes %s through 1:1 without a reserve', (amount) => {
      const q = quoteExactIn(view, amount, IDENTITY_RATE);
      expect(q.valid).toBe(true);
      expect(q.inAmount).toBe(amount);
      expect(q.outAmount).toBe(amount);
      expect(q.reason).toBeUndefined();
    });

    it('charges no fee, denominated in the input mint', () => {
      const q = quoteExactIn(view, 1_000n, IDENTITY_RATE);
      expect(q.feeAmount).toBe(0n);
      expect(q.feePct).toBe(0);
      expect(q.feeMint.equals(VNX_MINT)).toBe(true);
    });
  });

  describe('redeem direction', () => {
    it.each([0n, 1n, 999n, 1_000n])('accepts %s against a reserve of 1000', (amount) => {
      const q = quoteExactIn(redeemView(1_000n), amount, IDENTITY_RATE);
      expect(q.valid).toBe(true);
      expect(q.outAmount).toBe(amount);
    });

    it.each([1_001n, 1_500n, U64_MAX])('flags %s as exceeding a reserve of 1000', (amount) => {
      const q = quoteExactIn(redeemView(1_000n), amount, IDENTITY_RATE);
      expect(q.valid).toBe(false);
      expect(q.reason).toBe('InsufficientReserve');
      expect(q.outAmount).toBe(amount);
    });

    it('reports the fee mint as GOLDC', () => {
      const q = quoteExactIn(redeemView(10n), 5n, IDENTITY_RATE);
      expect(q.feeMint.equals(GOLDC_MINT)).toBe(true);
    });

    it('treats an unrefreshed view as empty', () => {
      const view = new VaultView('redeem', MAINNET_CONSTANTS);
      expect(quoteExactIn(view, 1n, IDENTITY_RATE).valid).toBe(false);
      expect(quoteExactIn(view, 0n, IDENTITY_RATE).valid).toBe(true);
    });
  });

  it('quotes zero as a valid zero', () => {
    const q = quoteExactIn(redeemView(0n), 0n, IDENTITY_RATE);
    expect(q).toMatchObject({ inAmount: 0n, outAmount: 0n, valid: true });
  });

  it('accepts number and string amounts', () => {
    const view = new VaultView('deposit', MAINNET_CONSTANTS);
    expect(quoteExactIn(view, 42, IDENTITY_RATE).outAmount).toBe(42n);
    expect(quoteExactIn(view, '42', IDENTITY_RATE).outAmount).toBe(42n);
  });

  it('rejects negative and oversized amounts', () => {
    const view = new VaultView('deposit', MAINNET_CONSTANTS);
    expect(captureVaultError(() => quoteExactIn(view, -1n, IDENTITY_RATE)).code).toBe('InvalidArgument');
    expect(captureVaultError(() => quoteExactIn(view, 1.5, IDENTITY_RATE)).code).toBe('InvalidArgument');
    expect(captureVaultError(() => quoteExactIn(view, U64_MAX + 1n, IDENTITY_RATE)).code).toBe('InvalidArgument');
  });

  it('quotes exact-out as exact-in at 1:1', () => {
    const view = new VaultView('deposit', MAINNET_CONSTANTS);
    const q = quote(view, { amount: 1_000n, swapMode: 'ExactOut' }, IDENTITY_RATE);
    expect(q.inAmount).toBe(1_000n);
    expect(q.outAmount).toBe(1_000n);
  });

  it('defaults to exact-in', () => {
    const view = new VaultView('deposit', MAINNET_CONSTANTS);
    expect(quote(view, { amount: 7n }, IDENTITY_RATE)).toEqual(quoteExactIn(view, 7n, IDENTITY_RATE));
  });

  describe('decimal scale', () => {
    const up = rateFromDecimals(6, 9);
    const down = rateFromDecimals(9, 6);

    it('derives the factor from mint decimals', () => {
      expect(up).toEqual({ numerator: 1_000n, denominator: 1n });
      expect(down).toEqual({ numerator: 1n, denominator: 1_000n });
      expect(invertRate(up)).toEqual(down);
      expect(rateFromDecimals(9, 9)).toBe(IDENTITY_RATE);
    });

    it('scales up and rounds down when scaling down', () => {
      const view = new VaultView('deposit', MAINNET_CONSTANTS);
      expect(quoteExactIn(view, 5n, up).outAmount).toBe(5_000n);
      expect(quoteExactIn(view, 1_999n, down).outAmount).toBe(1n);
    });

    it('rounds the exact-out input up', () => {
      const view = new VaultView('deposit', MAINNET_CONSTANTS);
      const q = quoteExactOut(view, 1_500n, up);
      expect(q.inAmount).toBe(2n);
      expect(q.outAmount).toBe(2_000n);
    });

    it('checks the scaled output against the reserve', () => {
      const view = redeemView(1n);
      expect(quoteExactIn(view, 1_999n, down).valid).toBe(true);
      expect(quoteExactIn(view, 2_000n, down).valid).toBe(false);
    });
  });

  it('returns exactly the deposited amount on a deposit then redeem', () => {
    const deposit = new VaultView('deposit', MAINNET_CONSTANTS);
    const redeem = redeemView(1_000_000n);

    for (const amount of [1n, 12_345n, 1_000_000n]) {
      const minted = quoteExactIn(deposit, amount, IDENTITY_RATE);
      const returned = quoteExactIn(redeem, minted.outAmount, IDENTITY_RATE);
      expect(returned.valid).toBe(true);
      expect(returned.outAmount).toBe(amount);
    }

    const scaledOut = quoteExactIn(deposit, 5n, rateFromDecimals(6, 9));
    expect(quoteExactIn(redeem, scaledOut.outAmount, rateFromDecimals(9, 6)).outAmount).toBe(5n);
  });

  it('only gates the redeem direction on reserve', () => {
    expect(hasSufficientReserve(new VaultView('deposit', MAINNET_CONSTANTS), 10n)).toBe(true);
    expect(hasSufficientReserve(redeemView(9n), 10n)).toBe(false);
    expect(hasSufficientReserve(redeemView(10n), 10n)).toBe(true);
  });
});
