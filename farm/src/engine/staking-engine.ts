import { getAddress } from 'viem';
import type { Address } from 'viem';

import { InvalidAmount, PositionPhase, pendingRewardOf, phaseOf, rewardDebtOf } from '../../../sdk/src/index.js';
import type { FarmEvent, FarmEventKind, PositionState } from '../../../sdk/src/index.js';

import { InsufficientStake, TransferFailed } from '../errors.js';
import type { FarmContext } from './context.js';
import { observeTick } from './context.js';
import type { PoolAccounting } from './pool-accounting.js';

export interface ActionReceipt {
  position: PositionState;
  // Reward owed at settlement and the part actually paid; they differ only on shortfall.
  rewardOwed: bigint;
  rewardPaid: bigint;
}

/**
 * Deposit / withdraw state machine over (pool, participant) positions.
 *
 * Each action is one transaction: the pool is refreshed, the position's
 * pending reward settled, principal moved, then the reward debt re-priced at
 * the refreshed accumulator. A thrown error leaves no trace.
 */
export class StakingEngine {
  constructor(
    private readonly ctx: FarmContext,
    private readonly accounting: PoolAccounting,
  ) {}

  position(pid: number, participant: Address): PositionState {
    this.ctx.pools.require(pid);
    return this.ctx.positions.get(pid, participant);
  }

  phase(pid: number, participant: Address): PositionPhase {
    return phaseOf(this.position(pid, participant));
  }

  /** Reward that a deposit or withdraw at `tick` would pay out. Writes nothing. */
  pendingReward(pid: number, participant: Address, tick: bigint): bigint {
    const position = this.position(pid, participant);
    const { rewardPerShare } = this.accounting.simulate(pid, tick);
    return pendingRewardOf(position, rewardPerShare);
  }

  deposit(pid: number, participant: Address, amount: bigint, tick: bigint): ActionReceipt {
    if (amount < 0n) throw new InvalidAmount('deposit amount', amount);
    const who = getAddress(participant);

    const receipt = this.ctx.db.atomic(() => {
      observeTick(this.ctx, tick);
      const { pool } = this.accounting.refresh(pid, tick);
      const current = this.ctx.positions.get(pid, who);

      const owed = phaseOf(current) === PositionPhase.STAKED ? pendingRewardOf(current, pool.rewardPerShare) : 0n;
      const paid = this.payReward(pid, who, owed);

      if (amount > 0n) {
        const asset = this.ctx.services.stakedAsset(pool.stakedAsset);
        if (!asset.transferFrom(who, this.ctx.deployment.custody, amount)) {
          throw new TransferFailed(pool.stakedAsset, who, this.ctx.deployment.custody, amount);
        }
      }

      const stakedAmount = current.stakedAmount + amount;
      const position: PositionState = { pid, participant: who, stakedAmount, rewardDebt: rewardDebtOf(stakedAmount, pool.rewardPerShare) };
      this.ctx.positions.put(position);
      const event = this.record('deposit', pid, who, amount, tick);
      return { receipt: { position, rewardOwed: owed, rewardPaid: paid }, event };
    });

    this.ctx.metrics.inc('deposits');
    this.ctx.logger?.info({ pool: pid, participant: who, amount: amount.toString(), rewardPaid: receipt.receipt.rewardPaid.toString() }, 'Deposit');
    this.emit(receipt.event);
    return receipt.receipt;
  }

  withdraw(pid: number, participant: Address, amount: bigint, tick: bigint): ActionReceipt {
    if (amount < 0n) throw new InvalidAmount('withdraw amount', amount);
    const who = getAddress(participant);

    const receipt = this.ctx.db.atomic(() => {
      observeTick(this.ctx, tick);
      const current = this.position(pid, who);
      if (amount > current.stakedAmount) throw new InsufficientStake(amount, current.stakedAmount);

      const { pool } = this.accounting.refresh(pid, tick);
      const owed = pendingRewardOf(current, pool.rewardPerShare);
      const paid = this.payReward(pid, who, owed);

      const stakedAmount = current.stakedAmount - amount;
      const position: PositionState = { pid, participant: who, stakedAmount, rewardDebt: rewardDebtOf(stakedAmount, pool.rewardPerShare) };
      this.ctx.positions.put(position);

      if (amount > 0n) {
        const asset = this.ctx.services.stakedAsset(pool.stakedAsset);
        if (!asset.transfer(who, amount)) throw new TransferFailed(pool.stakedAsset, this.ctx.deployment.custody, who, amount);
      }

      const event = this.record('withdraw', pid, who, amount, tick);
      return { receipt: { position, rewardOwed: owed, rewardPaid: paid }, event };
    });

    this.ctx.metrics.inc('withdrawals');
    this.ctx.logger?.info({ pool: pid, participant: who, amount: amount.toString(), rewardPaid: receipt.receipt.rewardPaid.toString() }, 'Withdraw');
    this.emit(receipt.event);
    return receipt.receipt;
  }

  /**
   * Returns the whole stake without touching the accumulator or the reward
   * token. Pending reward is forfeited.
   */
  emergencyWithdraw(pid: number, participant: Address, tick: bigint): ActionReceipt {
    const who = getAddress(participant);

    const receipt = this.ctx.db.atomic(() => {
      observeTick(this.ctx, tick);
      const pool = this.ctx.pools.require(pid);
      const current = this.ctx.positions.get(pid, who);
      const amount = current.stakedAmount;

      const position: PositionState = { pid, participant: who, stakedAmount: 0n, rewardDebt: 0n };
      this.ctx.positions.put(position);

      if (amount > 0n) {
        const asset = this.ctx.services.stakedAsset(pool.stakedAsset);
        if (!asset.transfer(who, amount)) throw new TransferFailed(pool.stakedAsset, this.ctx.deployment.custody, who, amount);
      }

      const event = this.record('emergencyWithdraw', pid, who, amount, tick);
      return { receipt: { position, rewardOwed: 0n, rewardPaid: 0n }, event };
    });

    this.ctx.metrics.inc('emergency_withdrawals');
    this.ctx.logger?.warn({ pool: pid, participant: who, amount: receipt.event.amount.toString() }, 'Emergency withdraw');
    this.emit(receipt.event);
    return receipt.receipt;
  }

  // Pays what custody holds, up to `owed`.
  private payReward(pid: number, to: Address, owed: bigint): bigint {
    if (owed <= 0n) return 0n;
    const reward = this.ctx.services.rewardToken();
    const { custody } = this.ctx.deployment;
    const available = reward.balanceOf(custody);
    const paid = owed < available ? owed : available;

    if (paid > 0n && !reward.transfer(to, paid)) throw new TransferFailed(reward.address, custody, to, paid);

    this.ctx.db.afterCommit(() => {
      if (paid < owed) {
        this.ctx.metrics.inc('reward_shortfalls');
        this.ctx.logger?.warn(
          { pool: pid, participant: to, owed: owed.toString(), paid: paid.toString() },
          'Reward treasury short; paying available balance',
        );
      }
      this.ctx.metrics.addAmount('reward_paid', paid);
    });
    return paid;
  }

  private record(kind: FarmEventKind, pid: number, participant: Address, amount: bigint, tick: bigint): FarmEvent {
    const event: FarmEvent = { kind, pid, participant, amount, tick };
    this.ctx.events.append(event);
    return event;
  }

  private emit(event: FarmEvent): void {
    this.ctx.onEvent?.(event);
  }
}
