import { getAddress } from 'viem';
import type { Address } from 'viem';

import { InvalidAmount } from '../../../sdk/src/index.js';
import type { PoolState } from '../../../sdk/src/index.js';

import { DuplicatePool, MigrationFailed, MigratorNotSet, NotAdministrator, TransferFailed } from '../errors.js';
import type { FarmContext } from './context.js';
import { observeTick } from './context.js';
import type { PoolAccounting } from './pool-accounting.js';

/**
 * Moves a pool's staked asset to a replacement token. Called after custody
 * approved `address` for `amount` of `oldAsset`; must leave custody holding
 * exactly `amount` of the returned asset.
 */
export interface AssetMigrator {
  readonly address: Address;
  migrate(oldAsset: Address, holder: Address, amount: bigint): Address;
}

const OWNER_KEY = 'owner';

export class Governance {
  private migrator?: AssetMigrator;

  constructor(
    private readonly ctx: FarmContext,
    private readonly accounting: PoolAccounting,
  ) {}

  owner(): Address | undefined {
    const v = this.ctx.db.getMeta(OWNER_KEY);
    return v === undefined ? undefined : getAddress(v);
  }

  /** Sets the first owner. No-op once an owner exists. */
  initialize(owner: Address): Address {
    const current = this.owner();
    if (current) return current;
    this.ctx.db.setMeta(OWNER_KEY, getAddress(owner));
    return getAddress(owner);
  }

  addPool(caller: Address, stakedAsset: Address, allocationWeight: bigint, tick: bigint): PoolState {
    if (allocationWeight < 0n) throw new InvalidAmount('allocationWeight', allocationWeight);
    const asset = getAddress(stakedAsset);

    const pool = this.ctx.db.atomic(() => {
      this.requireOwner(caller);
      observeTick(this.ctx, tick);
      if (asset === this.ctx.deployment.rewardToken) throw new DuplicatePool(asset, 'the reward token cannot be staked');
      const existing = this.ctx.pools.findByAsset(asset);
      if (existing) throw new DuplicatePool(asset, `already staked in pool ${existing.pid}`);

      // Settle every pool at the old total weight first.
      this.accounting.refreshAll(tick);

      const genesis = this.ctx.accrual.schedule.genesisTick;
      return this.ctx.pools.insert({
        stakedAsset: asset,
        allocationWeight,
        lastRefreshTick: tick > genesis ? tick : genesis,
      });
    });

    this.ctx.logger?.info({ pool: pool.pid, stakedAsset: asset, allocationWeight: allocationWeight.toString() }, 'Pool added');
    return pool;
  }

  setWeight(caller: Address, pid: number, allocationWeight: bigint, tick: bigint): PoolState {
    if (allocationWeight < 0n) throw new InvalidAmount('allocationWeight', allocationWeight);

    const pool = this.ctx.db.atomic(() => {
      this.requireOwner(caller);
      observeTick(this.ctx, tick);
      this.ctx.pools.require(pid);
      this.accounting.refreshAll(tick);
      return this.ctx.pools.setAllocationWeight(pid, allocationWeight);
    });

    this.ctx.logger?.info({ pool: pid, allocationWeight: allocationWeight.toString() }, 'Pool weight set');
    return pool;
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    const next = getAddress(newOwner);
    this.ctx.db.atomic(() => {
      this.requireOwner(caller);
      this.ctx.db.setMeta(OWNER_KEY, next);
    });
    this.ctx.logger?.info({ owner: next }, 'Ownership transferred');
  }

  setMigrator(caller: Address, migrator: AssetMigrator | undefined): void {
    this.requireOwner(caller);
    this.migrator = migrator;
  }

  /** Open to anyone once the owner has set a migrator. */
  migrate(pid: number, tick: bigint): PoolState {
    const migrator = this.migrator;
    if (!migrator) throw new MigratorNotSet();
    const { custody } = this.ctx.deployment;

    const pool = this.ctx.db.atomic(() => {
      observeTick(this.ctx, tick);
      const current = this.ctx.pools.require(pid);
      const oldAsset = this.ctx.services.stakedAsset(current.stakedAsset);
      const balance = oldAsset.balanceOf(custody);

      if (!oldAsset.approve(migrator.address, balance)) {
        throw new TransferFailed(current.stakedAsset, custody, migrator.address, balance);
      }
      const newAsset = getAddress(migrator.migrate(current.stakedAsset, custody, balance));
      const clash = this.ctx.pools.findByAsset(newAsset);
      if (clash) throw new DuplicatePool(newAsset, `already staked in pool ${clash.pid}`);
      const migrated = this.ctx.services.stakedAsset(newAsset).balanceOf(custody);
      if (migrated !== balance) throw new MigrationFailed(pid, balance, migrated);

      return this.ctx.pools.setStakedAsset(pid, newAsset);
    });

    this.ctx.logger?.info({ pool: pid, stakedAsset: pool.stakedAsset }, 'Pool migrated');
    return pool;
  }

  private requireOwner(caller: Address): void {
    const who = getAddress(caller);
    if (this.owner() !== who) throw new NotAdministrator(who);
  }
}
