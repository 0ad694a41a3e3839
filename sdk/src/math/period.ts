import { InvalidInterval, OutOfRange } from '../errors.js';
import type { RewardSchedule } from './emission.js';

/**
 * Integrates a step-wise emission schedule over `[from, to)`.
 *
 * Each tick contributes the rate of the epoch it falls in, so a tick sitting
 * exactly on an epoch boundary is paid at the new epoch's rate. Intervals that
 * cross several boundaries are summed segment by segment; everything past the
 * start of the floor epoch is a single segment.
 */
export class PeriodRewardAccumulator {
  constructor(public readonly schedule: RewardSchedule) {}

  integrate(from: bigint, to: bigint): bigint {
    const genesis = this.schedule.genesisTick;
    if (from < genesis) throw new OutOfRange(from, genesis);
    if (to < from) throw new InvalidInterval(from, to);

    const clock = this.schedule.clock;
    let total = 0n;
    let cursor = from;
    while (cursor < to) {
      const epoch = clock.epochAt(cursor);
      const rate = this.schedule.rateAt(cursor);
      if (epoch >= this.schedule.floorEpoch) {
        total += (to - cursor) * rate;
        break;
      }
      const next = clock.epochStart(epoch + 1n);
      const end = next < to ? next : to;
      total += (end - cursor) * rate;
      cursor = end;
    }
    return total;
  }

  /** Number of epoch boundaries `b` with `from < b < to`. */
  boundariesCrossed(from: bigint, to: bigint): bigint {
    if (to <= from) return 0n;
    const clock = this.schedule.clock;
    return clock.epochAt(to - 1n) - clock.epochAt(from);
  }
}
