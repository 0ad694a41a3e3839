import type { PoolState, RefreshOutcome } from '../../../sdk/src/index.js';

import type { FarmContext } from './context.js';
import { observeTick } from './context.js';

export interface PoolRefresh {
  pool: PoolState;
  poolReward: bigint;
  operatorFee: bigint;
}

/**
 * Lazy per-pool accumulator. A pool's stored state lags until it is touched;
 * `simulate` recovers the up-to-date view without writing, `refresh` persists
 * it and mints the reward that accrued in between.
 */
export class PoolAccounting {
  constructor(private readonly ctx: FarmContext) {}

  simulate(pid: number, now: bigint): RefreshOutcome {
    const pool = this.ctx.pools.require(pid);
    return this.compute(pool, now);
  }

  refresh(pid: number, now: bigint): PoolRefresh {
    return this.ctx.db.atomic(() => {
      observeTick(this.ctx, now);
      const pool = this.ctx.pools.require(pid);
      const out = this.compute(pool, now);
      if (out.lastRefreshTick === pool.lastRefreshTick) return { pool, poolReward: 0n, operatorFee: 0n };

      const { custody, operator } = this.ctx.deployment;
      const reward = this.ctx.services.rewardToken();
      if (out.operatorFee > 0n) reward.mint(operator, out.operatorFee);
      if (out.poolReward > 0n) reward.mint(custody, out.poolReward);

      const updated = this.ctx.pools.saveAccrual({ pid, lastRefreshTick: out.lastRefreshTick, rewardPerShare: out.rewardPerShare });

      this.ctx.db.afterCommit(() => {
        const crossed = this.ctx.accrual.accumulator.boundariesCrossed(pool.lastRefreshTick, now);
        if (crossed > 1n) {
          this.ctx.logger?.warn(
            { pool: pid, from: pool.lastRefreshTick.toString(), to: now.toString(), boundaries: crossed.toString() },
            'Pool went unrefreshed across several epochs',
          );
        }

        this.ctx.metrics.inc('pool_refreshes');
        this.ctx.metrics.addAmount('reward_minted', out.poolReward);
        this.ctx.metrics.addAmount('operator_fee_minted', out.operatorFee);
        this.ctx.logger?.debug(
          {
            pool: pid,
            from: pool.lastRefreshTick.toString(),
            to: now.toString(),
            poolReward: out.poolReward.toString(),
            operatorFee: out.operatorFee.toString(),
          },
          'Pool refreshed',
        );
      });

      return { pool: updated, poolReward: out.poolReward, operatorFee: out.operatorFee };
    });
  }

  refreshAll(now: bigint): PoolRefresh[] {
    return this.ctx.db.atomic(() => this.ctx.pools.list().map((p) => this.refresh(p.pid, now)));
  }

  private compute(pool: PoolState, now: bigint): RefreshOutcome {
    // The balance oracle is only consulted when there is something to accrue.
    const stakedBalance =
      now > pool.lastRefreshTick ? this.ctx.services.stakedAsset(pool.stakedAsset).balanceOf(this.ctx.deployment.custody) : 0n;

    return this.ctx.accrual.simulateRefresh({
      pool,
      totalAllocationWeight: this.ctx.pools.totalAllocationWeight(),
      stakedBalance,
      now,
    });
  }
}
