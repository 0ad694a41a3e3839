export * from './farm.js';
export * from './errors.js';

export * from './config/config.js';

export * from './engine/context.js';
export * from './engine/pool-accounting.js';
export * from './engine/staking-engine.js';
export * from './engine/governance.js';

export * from './payout/payout-vault.js';

export * from './storage/db.js';
export * from './storage/events.js';
export * from './storage/pools.js';
export * from './storage/positions.js';

export * from './tokens/token-ledger.js';

export * from './telemetry/metrics.js';
