export * from './src/amm/Amm.js';
export * from './src/amm/DeauraVaultAmm.js';
export * from './src/amm/Direction.js';

export * from './src/vaults/VaultView.js';
export * from './src/vaults/TokenAccountDecoder.js';

export * from './src/quotes/Quote.js';
export * from './src/quotes/QuoteEngine.js';
export * from './src/quotes/ConversionRate.js';

export * from './src/swaps/SwapInstructions.js';

export * from './src/host/AmmRegistry.js';
export * from './src/host/AccountLoader.js';

export * from './src/accounts/PDA.js';
export * from './src/accounts/Seeds.js';
export * from './src/accounts/Authorities.js';

export * from './src/idl/deauraVault.js';

export * from './src/config/constants.js';
export * from './src/config/AdapterConfig.js';

export * from './src/types/VaultState.js';

export * from './src/errors/VaultAmmError.js';

export * from './src/utils/math.js';
export * from './src/utils/invariant.js';
export * from './src/utils/encoding.js';
export * from './src/utils/result.js';
export * from './src/utils/logger.js';
