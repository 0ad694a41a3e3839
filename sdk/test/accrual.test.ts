import { describe, expect, it } from 'vitest';

import { FeeSchedule, RewardSchedule } from '../src/math/emission.js';
import { PRECISION } from '../src/math/fixed.js';
import { PoolAccrual, pendingRewardOf, phaseOf } from '../src/math/accrual.js';
import type { RefreshInput } from '../src/math/accrual.js';
import { PositionPhase } from '../src/types/enums.js';

const accrual = new PoolAccrual(
  new RewardSchedule({ genesisTick: 0n, epochLength: 100n, rateTable: [80n, 80n, 20n, 10n] }),
  new FeeSchedule([10n, 10n, 20n]),
);

type InputOverrides = Omit<Partial<RefreshInput>, 'pool'> & { pool?: Partial<RefreshInput['pool']> };

function input(overrides: InputOverrides = {}): RefreshInput {
  return {
    totalAllocationWeight: 100n,
    stakedBalance: 100n,
    now: 100n,
    ...overrides,
    pool: { allocationWeight: 100n, lastRefreshTick: 0n, rewardPerShare: 0n, ...overrides.pool },
  };
}

describe('PoolAccrual.simulateRefresh', () => {
  it('accrues a full first epoch to a sole pool', () => {
    const out = accrual.simulateRefresh(input());
    expect(out.poolReward).toBe(8000n);
    expect(out.rewardPerShare).toBe((8000n * PRECISION) / 100n);
    expect(out.lastRefreshTick).toBe(100n);
    // Tick 100 is in epoch 1: divisor 10.
    expect(out.operatorFee).toBe(800n);
    expect(pendingRewardOf({ stakedAmount: 100n, rewardDebt: 0n }, out.rewardPerShare)).toBe(8000n);
  });

  it('scales by weight and floors at every step', () => {
    const out = accrual.simulateRefresh(input({ totalAllocationWeight: 3n, stakedBalance: 7n, pool: { allocationWeight: 1n } }));
    expect(out.poolReward).toBe(2666n);
    expect(out.rewardPerShare).toBe(380_857_142_857_142n);
    expect(pendingRewardOf({ stakedAmount: 7n, rewardDebt: 0n }, out.rewardPerShare)).toBe(2665n);
  });

  it('uses the smaller fee once past the first two epochs', () => {
    const out = accrual.simulateRefresh(input({ stakedBalance: 10n, now: 250n, pool: { lastRefreshTick: 200n } }));
    expect(out.poolReward).toBe(1000n);
    expect(out.operatorFee).toBe(50n);
  });

  it('drops reward for an empty pool but advances the tick', () => {
    const out = accrual.simulateRefresh(input({ stakedBalance: 0n, now: 50n, pool: { rewardPerShare: 5n } }));
    expect(out).toEqual({ lastRefreshTick: 50n, rewardPerShare: 5n, poolReward: 0n, operatorFee: 0n });
  });

  it('drops reward when no weight is allocated', () => {
    const out = accrual.simulateRefresh(input({ totalAllocationWeight: 0n, pool: { allocationWeight: 0n } }));
    expect(out).toEqual({ lastRefreshTick: 100n, rewardPerShare: 0n, poolReward: 0n, operatorFee: 0n });
  });

  it('is a no-op when now <= lastRefreshTick', () => {
    const out = accrual.simulateRefresh(input({ now: 40n, pool: { lastRefreshTick: 40n, rewardPerShare: 9n } }));
    expect(out).toEqual({ lastRefreshTick: 40n, rewardPerShare: 9n, poolReward: 0n, operatorFee: 0n });
  });

  it('is idempotent for the same tick', () => {
    const first = accrual.simulateRefresh(input({ now: 130n }));
    const second = accrual.simulateRefresh(input({ now: 130n, pool: first }));
    expect(second.rewardPerShare).toBe(first.rewardPerShare);
    expect(second.lastRefreshTick).toBe(130n);
    expect(second.poolReward).toBe(0n);
  });
});

describe('position helpers', () => {
  it('pending reward subtracts the reward debt', () => {
    expect(pendingRewardOf({ stakedAmount: 50n, rewardDebt: 1000n }, 30n * PRECISION)).toBe(500n);
  });

  it('phaseOf', () => {
    expect(phaseOf({ stakedAmount: 0n })).toBe(PositionPhase.EMPTY);
    expect(phaseOf({ stakedAmount: 1n })).toBe(PositionPhase.STAKED);
  });
});
