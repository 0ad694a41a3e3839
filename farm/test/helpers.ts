import type { Address } from 'viem';

import type { FarmConfig } from '../src/config/config.js';
import { Farm } from '../src/farm.js';
import type { FarmOptions } from '../src/farm.js';
import { FarmDb } from '../src/storage/db.js';

export const ADMIN: Address = '0x1111111111111111111111111111111111111111';
export const CUSTODY: Address = '0x2222222222222222222222222222222222222222';
export const OPERATOR: Address = '0x3333333333333333333333333333333333333333';
export const REWARD: Address = '0x4444444444444444444444444444444444444444';
export const RECIPIENT: Address = '0x5555555555555555555555555555555555555555';
export const LP1: Address = '0x6666666666666666666666666666666666666666';
export const LP2: Address = '0x7777777777777777777777777777777777777777';
export const ALICE: Address = '0x8888888888888888888888888888888888888888';
export const BOB: Address = '0x9999999999999999999999999999999999999999';

export const PRECISION = 10n ** 12n;

export function testConfig(overrides: { genesisTick?: bigint } = {}): FarmConfig {
  return {
    schedule: {
      genesisTick: overrides.genesisTick ?? 0n,
      epochLength: 100n,
      rateTable: [80n, 80n, 20n, 10n],
      feeDivisors: [10n, 10n, 20n],
    },
    accounts: { admin: ADMIN, custody: CUSTODY, operator: OPERATOR, rewardToken: REWARD },
    payout: { recipient: RECIPIENT, minIntervalTicks: 50n },
    storage: { dataDir: '/tmp' },
    telemetry: { logLevel: 'silent' },
  };
}

export function makeFarm(opts: Omit<FarmOptions, 'db'> & { genesisTick?: bigint } = {}): Farm {
  const { genesisTick, ...rest } = opts;
  return new Farm(testConfig({ genesisTick }), { ...rest, db: new FarmDb(':memory:') });
}

/** Registers `assets` as plain tokens and adds one pool per asset with the given weight. */
export function withPools(farm: Farm, pools: Array<{ asset: Address; weight: bigint }>, tick: bigint = 0n): void {
  for (const p of pools) {
    farm.tokens.register({ address: p.asset, symbol: 'LP' });
    farm.governance.addPool(ADMIN, p.asset, p.weight, tick);
  }
}

/** Credits `who` with `amount` of `asset` and approves custody for all of it. */
export function fund(farm: Farm, asset: Address, who: Address, amount: bigint): void {
  farm.tokens.credit(asset, who, amount);
  farm.tokens.approve(asset, who, CUSTODY, amount);
}
