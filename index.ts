export * from './src/client/VaultReadonlyClient.js';

export * from './src/vaults/SingleAssetVault.js';
export * from './src/vaults/ConversionEngine.js';
export * from './src/vaults/VaultFactory.js';
export * from './src/vaults/VaultAccountDecoder.js';

export * from './src/ledger/TokenLedger.js';
export * from './src/ledger/InMemoryTokenLedger.js';

export * from './src/events/EventLog.js';
export * from './src/access/AccessGate.js';
export * from './src/config/VaultConfig.js';

export * from './src/accounts/PDA.js';
export * from './src/accounts/Seeds.js';
export * from './src/accounts/Authorities.js';

export * from './src/types/PoolState.js';
export * from './src/types/VaultState.js';
export * from './src/types/VaultEvents.js';

export * from './src/errors/VaultError.js';

export * from './src/utils/math.js';
export * from './src/utils/invariant.js';
export * from './src/utils/encoding.js';
export * from './src/utils/logger.js';
