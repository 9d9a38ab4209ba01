import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { DeauraVaultAmm } from '../amm/DeauraVaultAmm.js';
import { AmmRegistry } from '../host/AmmRegistry.js';
import { silentLogger, testKey } from '../testing/fixtures.js';
import { defaultConstants, loadAdapterConfig } from './AdapterConfig.js';
import { GOLDC_MINT, VNX_REDEEM_VAULT } from './constants.js';

const context = { logger: silentLogger };

describe('environment overrides', () => {
  beforeAll(() => {
    vi.stubEnv('VNX_DEPOSIT_VAULT', testKey(77).toBase58());
    vi.stubEnv('GOLDC_DECIMALS', '6');
  });

  afterAll(() => {
    vi.unstubAllEnvs();
  });

  it('feed the default constants', () => {
    expect(defaultConstants()).toBe(loadAdapterConfig().constants);
    expect(defaultConstants().depositVault.equals(testKey(77))).toBe(true);
    expect(defaultConstants().decimals).toEqual({ vnx: 9, goldc: 6 });
  });

  it('apply to markets built from a keyed account', () => {
    const amm = DeauraVaultAmm.fromKeyedAccount({ key: testKey(77) }, context);
    expect(amm.direction).toBe('deposit');
    expect(amm.rate).toEqual({ numerator: 1n, denominator: 1000n });
  });

  it('apply to markets built without constants', () => {
    const amm = new DeauraVaultAmm('redeem', undefined, silentLogger);
    expect(amm.key().equals(VNX_REDEEM_VAULT)).toBe(true);
    expect(amm.rate).toEqual({ numerator: 1000n, denominator: 1n });
  });

  it('apply to registry discovery', () => {
    const registry = AmmRegistry.withKnownVaults(context);
    expect(registry.accountsToUpdate().map((k) => k.toBase58())).toEqual([
      testKey(77).toBase58(),
      VNX_REDEEM_VAULT.toBase58()
    ]);
    expect(registry.forSourceMint(GOLDC_MINT)?.direction).toBe('redeem');
  });
});
