import { TickClock } from './epoch.js';

function stepAt(table: readonly bigint[], epoch: bigint): bigint {
  const last = table.length - 1;
  const idx = epoch >= BigInt(last) ? last : Number(epoch);
  const v = table[idx];
  if (v === undefined) throw new Error('step table is empty');
  return v;
}

export interface RewardScheduleParams {
  genesisTick: bigint;
  epochLength: bigint;
  // Per-tick emission for epoch i; the last entry applies to every later epoch.
  rateTable: readonly bigint[];
}

export class RewardSchedule {
  public readonly clock: TickClock;
  public readonly rateTable: readonly bigint[];

  constructor(params: RewardScheduleParams) {
    if (params.rateTable.length === 0) throw new Error('RewardSchedule: rateTable must not be empty');
    for (let i = 0; i < params.rateTable.length; i++) {
      const rate = params.rateTable[i] ?? 0n;
      if (rate < 0n) throw new Error(`RewardSchedule: rateTable[${i}] must be >= 0`);
      const prev = i > 0 ? params.rateTable[i - 1] : undefined;
      if (prev !== undefined && rate > prev) throw new Error('RewardSchedule: rateTable must be non-increasing');
    }
    this.clock = new TickClock(params.genesisTick, params.epochLength);
    this.rateTable = [...params.rateTable];
  }

  get genesisTick(): bigint {
    return this.clock.genesisTick;
  }

  get epochLength(): bigint {
    return this.clock.epochLength;
  }

  /** Index of the first epoch whose rate is the table's final (floor) rate. */
  get floorEpoch(): bigint {
    return BigInt(this.rateTable.length - 1);
  }

  epochAt(tick: bigint): bigint {
    return this.clock.epochAt(tick);
  }

  rateAt(tick: bigint): bigint {
    return stepAt(this.rateTable, this.clock.epochAt(tick));
  }
}

/**
 * Operator fee taken on top of a pool's reward: `reward / divisor`, with the
 * divisor looked up by schedule epoch (last entry applies afterwards).
 */
export class FeeSchedule {
  public readonly divisors: readonly bigint[];

  constructor(divisors: readonly bigint[]) {
    if (divisors.length === 0) throw new Error('FeeSchedule: divisors must not be empty');
    for (const [i, d] of divisors.entries()) {
      if (d <= 0n) throw new Error(`FeeSchedule: divisors[${i}] must be > 0`);
    }
    this.divisors = [...divisors];
  }

  divisorAt(epoch: bigint): bigint {
    return stepAt(this.divisors, epoch);
  }

  feeFor(reward: bigint, epoch: bigint): bigint {
    return reward / this.divisorAt(epoch);
  }
}
