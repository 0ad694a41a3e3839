import { getAddress } from 'viem';
import type { Address } from 'viem';

import { NotAdministrator, TimelockNotElapsed, TransferFailed } from '../errors.js';
import type { FarmContext } from '../engine/context.js';
import { observeTick } from '../engine/context.js';
import type { TokenLedger } from '../tokens/token-ledger.js';

const ADMIN_KEY = 'payout_admin';
const RECIPIENT_KEY = 'payout_recipient';
const LAST_RELEASE_KEY = 'payout_last_release';

export interface PayoutVaultState {
  admin: Address;
  recipient: Address;
  lastReleaseTick: bigint;
  releasableAt: bigint;
  balance: bigint;
}

/**
 * Holds the operator fee at the operator address and hands the whole balance
 * to one recipient, at most once per `minIntervalTicks`.
 */
export class PayoutVault {
  constructor(
    private readonly ctx: FarmContext,
    private readonly ledger: TokenLedger,
    public readonly minIntervalTicks: bigint,
  ) {
    if (minIntervalTicks < 0n) throw new Error('PayoutVault: minIntervalTicks must be >= 0');
  }

  get address(): Address {
    return this.ctx.deployment.operator;
  }

  /** First-time setup; later calls leave the stored state alone. */
  initialize(args: { admin: Address; recipient: Address; tick: bigint }): void {
    if (this.ctx.db.getMeta(ADMIN_KEY) !== undefined) return;
    this.ctx.db.atomic(() => {
      this.ctx.db.setMeta(ADMIN_KEY, getAddress(args.admin));
      this.ctx.db.setMeta(RECIPIENT_KEY, getAddress(args.recipient));
      this.ctx.db.setBigIntMeta(LAST_RELEASE_KEY, args.tick);
    });
  }

  state(): PayoutVaultState {
    const admin = this.ctx.db.getMeta(ADMIN_KEY);
    const recipient = this.ctx.db.getMeta(RECIPIENT_KEY);
    const lastReleaseTick = this.ctx.db.getBigIntMeta(LAST_RELEASE_KEY);
    if (admin === undefined || recipient === undefined || lastReleaseTick === undefined) {
      throw new Error('PayoutVault: not initialized');
    }
    return {
      admin: getAddress(admin),
      recipient: getAddress(recipient),
      lastReleaseTick,
      releasableAt: lastReleaseTick + this.minIntervalTicks,
      balance: this.ledger.balanceOf(this.ctx.deployment.rewardToken, this.address),
    };
  }

  release(caller: Address, tick: bigint): bigint {
    const released = this.ctx.db.atomic(() => {
      const s = this.state();
      this.requireAdmin(s, caller);
      observeTick(this.ctx, tick);
      if (tick < s.releasableAt) throw new TimelockNotElapsed(s.releasableAt, tick);

      const token = this.ledger.connect(this.ctx.deployment.rewardToken, this.address);
      if (!token.transfer(s.recipient, s.balance)) throw new TransferFailed(token.address, this.address, s.recipient, s.balance);
      this.ctx.db.setBigIntMeta(LAST_RELEASE_KEY, tick);
      return s.balance;
    });

    this.ctx.logger?.info({ amount: released.toString(), tick: tick.toString() }, 'Payout released');
    return released;
  }

  setAdmin(caller: Address, admin: Address): void {
    this.ctx.db.atomic(() => {
      this.requireAdmin(this.state(), caller);
      this.ctx.db.setMeta(ADMIN_KEY, getAddress(admin));
    });
  }

  setRecipient(caller: Address, recipient: Address): void {
    this.ctx.db.atomic(() => {
      this.requireAdmin(this.state(), caller);
      this.ctx.db.setMeta(RECIPIENT_KEY, getAddress(recipient));
    });
  }

  private requireAdmin(s: PayoutVaultState, caller: Address): void {
    const who = getAddress(caller);
    if (s.admin !== who) throw new NotAdministrator(who);
  }
}
