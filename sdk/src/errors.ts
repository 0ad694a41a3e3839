// Failure categories. Every concrete error extends exactly one of these.

export class PreconditionViolation extends Error {}

export class ExternalServiceFailure extends Error {}

export class CapabilityViolation extends Error {}

export class OutOfRange extends PreconditionViolation {
  readonly tick: bigint;
  readonly genesisTick: bigint;

  constructor(tick: bigint, genesisTick: bigint) {
    super(`Tick ${tick} is before genesis tick ${genesisTick}`);
    this.tick = tick;
    this.genesisTick = genesisTick;
  }
}

export class InvalidInterval extends PreconditionViolation {
  constructor(from: bigint, to: bigint) {
    super(`Invalid interval [${from}, ${to})`);
  }
}

export class InvalidAmount extends PreconditionViolation {
  constructor(label: string, amount: bigint) {
    super(`${label} must be >= 0 (got ${amount})`);
  }
}
