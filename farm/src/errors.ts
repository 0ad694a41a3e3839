import type { Address } from 'viem';

import { CapabilityViolation, ExternalServiceFailure, PreconditionViolation } from '../../sdk/src/index.js';

export class UnknownPool extends PreconditionViolation {
  constructor(pid: number) {
    super(`Unknown pool: ${pid}`);
  }
}

export class DuplicatePool extends PreconditionViolation {
  constructor(asset: Address, reason: string) {
    super(`Cannot register ${asset}: ${reason}`);
  }
}

export class InsufficientStake extends PreconditionViolation {
  readonly requested: bigint;
  readonly staked: bigint;

  constructor(requested: bigint, staked: bigint) {
    super(`Withdraw of ${requested} exceeds stake of ${staked}`);
    this.requested = requested;
    this.staked = staked;
  }
}

export class TickRegression extends PreconditionViolation {
  constructor(tick: bigint, lastTick: bigint) {
    super(`Tick ${tick} is behind the last observed tick ${lastTick}`);
  }
}

export class TimelockNotElapsed extends PreconditionViolation {
  readonly releasableAt: bigint;

  constructor(releasableAt: bigint, tick: bigint) {
    super(`Timelock not elapsed (tick=${tick}, releasable_at=${releasableAt})`);
    this.releasableAt = releasableAt;
  }
}

export class MigratorNotSet extends PreconditionViolation {
  constructor() {
    super('No migrator set');
  }
}

export class TransferFailed extends ExternalServiceFailure {
  constructor(token: Address, from: Address, to: Address, amount: bigint) {
    super(`Transfer of ${amount} ${token} from ${from} to ${to} was rejected`);
  }
}

export class MintRejected extends ExternalServiceFailure {
  constructor(token: Address, caller: Address) {
    super(`${caller} is not the minter of ${token}`);
  }
}

export class MigrationFailed extends ExternalServiceFailure {
  constructor(pid: number, expected: bigint, actual: bigint) {
    super(`Migration of pool ${pid} changed the custody balance (expected ${expected}, got ${actual})`);
  }
}

export class NotAdministrator extends CapabilityViolation {
  constructor(caller: Address) {
    super(`${caller} is not the administrator`);
  }
}
