import type { PoolState, PositionState } from '../types/structs.js';
import { PositionPhase } from '../types/enums.js';
import type { FeeSchedule, RewardSchedule } from './emission.js';
import { mulDiv, perShareIncrement, rewardDebtOf } from './fixed.js';
import { PeriodRewardAccumulator } from './period.js';

export interface RefreshInput {
  pool: Pick<PoolState, 'allocationWeight' | 'lastRefreshTick' | 'rewardPerShare'>;
  totalAllocationWeight: bigint;
  // Staked-asset balance currently held in custody for this pool.
  stakedBalance: bigint;
  now: bigint;
}

export interface RefreshOutcome {
  lastRefreshTick: bigint;
  rewardPerShare: bigint;
  poolReward: bigint;
  operatorFee: bigint;
}

/**
 * Pure pool refresh. Both the persisting refresh and the read-only pending
 * reward query go through here.
 */
export class PoolAccrual {
  public readonly accumulator: PeriodRewardAccumulator;

  constructor(
    public readonly schedule: RewardSchedule,
    public readonly fees: FeeSchedule,
  ) {
    this.accumulator = new PeriodRewardAccumulator(schedule);
  }

  simulateRefresh(input: RefreshInput): RefreshOutcome {
    const { pool, now } = input;
    const unchanged: RefreshOutcome = {
      lastRefreshTick: pool.lastRefreshTick,
      rewardPerShare: pool.rewardPerShare,
      poolReward: 0n,
      operatorFee: 0n,
    };
    if (now <= pool.lastRefreshTick) return unchanged;

    // Empty pools drop their share of emission.
    if (input.stakedBalance === 0n || input.totalAllocationWeight === 0n) {
      return { ...unchanged, lastRefreshTick: now };
    }

    const total = this.accumulator.integrate(pool.lastRefreshTick, now);
    const poolReward = mulDiv(total, pool.allocationWeight, input.totalAllocationWeight);
    const operatorFee = this.fees.feeFor(poolReward, this.schedule.epochAt(now));

    return {
      lastRefreshTick: now,
      rewardPerShare: pool.rewardPerShare + perShareIncrement(poolReward, input.stakedBalance),
      poolReward,
      operatorFee,
    };
  }
}

export function pendingRewardOf(position: Pick<PositionState, 'stakedAmount' | 'rewardDebt'>, rewardPerShare: bigint): bigint {
  return rewardDebtOf(position.stakedAmount, rewardPerShare) - position.rewardDebt;
}

export function phaseOf(position: Pick<PositionState, 'stakedAmount'>): PositionPhase {
  return position.stakedAmount > 0n ? PositionPhase.STAKED : PositionPhase.EMPTY;
}
