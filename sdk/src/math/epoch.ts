import { OutOfRange } from '../errors.js';

export class TickClock {
  public readonly genesisTick: bigint;
  public readonly epochLength: bigint;

  constructor(genesisTick: bigint, epochLength: bigint) {
    if (epochLength <= 0n) throw new Error('TickClock: epochLength must be > 0');
    if (genesisTick < 0n) throw new Error('TickClock: genesisTick must be >= 0');
    this.genesisTick = genesisTick;
    this.epochLength = epochLength;
  }

  epochAt(tick: bigint): bigint {
    if (tick < this.genesisTick) throw new OutOfRange(tick, this.genesisTick);
    return (tick - this.genesisTick) / this.epochLength;
  }

  epochStart(epoch: bigint): bigint {
    if (epoch < 0n) throw new Error('TickClock: epoch must be >= 0');
    return this.genesisTick + epoch * this.epochLength;
  }

  // Last tick (inclusive) of `epoch`.
  epochEnd(epoch: bigint): bigint {
    return this.epochStart(epoch + 1n) - 1n;
  }

  ticksRemaining(tick: bigint): bigint {
    return this.epochStart(this.epochAt(tick) + 1n) - tick;
  }
}
