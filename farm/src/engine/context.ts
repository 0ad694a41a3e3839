import type { Logger } from 'pino';
import type { Address } from 'viem';

import type { FarmDeployment, FarmEvent, PoolAccrual, RewardTokenService, StakedAssetService } from '../../../sdk/src/index.js';

import type { FarmDb } from '../storage/db.js';
import type { EventLog } from '../storage/events.js';
import type { PoolStore } from '../storage/pools.js';
import type { PositionStore } from '../storage/positions.js';
import type { Metrics } from '../telemetry/metrics.js';
import { TickRegression } from '../errors.js';

export interface FarmServices {
  stakedAsset(asset: Address): StakedAssetService;
  rewardToken(): RewardTokenService;
}

/**
 * Everything an action touches. One context owns one store; nothing here is
 * module-global.
 */
export interface FarmContext {
  db: FarmDb;
  pools: PoolStore;
  positions: PositionStore;
  events: EventLog;
  services: FarmServices;
  deployment: FarmDeployment;
  accrual: PoolAccrual;
  metrics: Metrics;
  logger?: Logger;
  onEvent?: (event: FarmEvent) => void;
}

const LAST_TICK_KEY = 'last_tick';

/** Records `tick` as the latest seen; ticks may repeat but never go back. */
export function observeTick(ctx: Pick<FarmContext, 'db'>, tick: bigint): void {
  const last = ctx.db.getBigIntMeta(LAST_TICK_KEY);
  if (last !== undefined && tick < last) throw new TickRegression(tick, last);
  if (last !== tick) ctx.db.setBigIntMeta(LAST_TICK_KEY, tick);
}
