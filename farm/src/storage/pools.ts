import { getAddress } from 'viem';
import type { Address } from 'viem';

import type { PoolState } from '../../../sdk/src/index.js';

import { UnknownPool } from '../errors.js';
import type { FarmDb } from './db.js';

type PoolRow = {
  pid: number;
  staked_asset: string;
  allocation_weight: string;
  last_refresh_tick: string;
  reward_per_share: string;
};

const TOTAL_WEIGHT_KEY = 'total_allocation_weight';

function fromRow(r: PoolRow): PoolState {
  return {
    pid: r.pid,
    stakedAsset: getAddress(r.staked_asset),
    allocationWeight: BigInt(r.allocation_weight),
    lastRefreshTick: BigInt(r.last_refresh_tick),
    rewardPerShare: BigInt(r.reward_per_share),
  };
}

/**
 * Ordered pool registry. The running total of allocation weights lives beside
 * the pools and is only ever changed together with a pool's weight.
 */
export class PoolStore {
  private readonly db: FarmDb;
  private readonly insertStmt;
  private readonly updateStmt;
  private readonly selectStmt;
  private readonly listStmt;
  private readonly byAssetStmt;
  private readonly countStmt;

  constructor(db: FarmDb) {
    this.db = db;
    const raw = db.raw();
    this.insertStmt = raw.prepare<[number, string, string, string, string]>(
      `INSERT INTO pools(pid, staked_asset, allocation_weight, last_refresh_tick, reward_per_share) VALUES(?, ?, ?, ?, ?)`,
    );
    this.updateStmt = raw.prepare<[string, string, string, string, number]>(
      `UPDATE pools SET staked_asset = ?, allocation_weight = ?, last_refresh_tick = ?, reward_per_share = ? WHERE pid = ?`,
    );
    this.selectStmt = raw.prepare<[number], PoolRow>(`SELECT * FROM pools WHERE pid = ?`);
    this.listStmt = raw.prepare<[], PoolRow>(`SELECT * FROM pools ORDER BY pid ASC`);
    this.byAssetStmt = raw.prepare<[string], PoolRow>(`SELECT * FROM pools WHERE staked_asset = ?`);
    this.countStmt = raw.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM pools`);
  }

  count(): number {
    return this.countStmt.get()?.n ?? 0;
  }

  get(pid: number): PoolState | undefined {
    const row = this.selectStmt.get(pid);
    return row ? fromRow(row) : undefined;
  }

  require(pid: number): PoolState {
    const pool = this.get(pid);
    if (!pool) throw new UnknownPool(pid);
    return pool;
  }

  list(): PoolState[] {
    return this.listStmt.all().map(fromRow);
  }

  findByAsset(asset: Address): PoolState | undefined {
    const row = this.byAssetStmt.get(getAddress(asset));
    return row ? fromRow(row) : undefined;
  }

  totalAllocationWeight(): bigint {
    return this.db.getBigIntMeta(TOTAL_WEIGHT_KEY) ?? 0n;
  }

  /** Appends a pool at the next index. */
  insert(args: { stakedAsset: Address; allocationWeight: bigint; lastRefreshTick: bigint }): PoolState {
    return this.db.atomic(() => {
      const pool: PoolState = {
        pid: this.count(),
        stakedAsset: getAddress(args.stakedAsset),
        allocationWeight: args.allocationWeight,
        lastRefreshTick: args.lastRefreshTick,
        rewardPerShare: 0n,
      };
      this.insertStmt.run(
        pool.pid,
        pool.stakedAsset,
        pool.allocationWeight.toString(),
        pool.lastRefreshTick.toString(),
        pool.rewardPerShare.toString(),
      );
      this.db.setBigIntMeta(TOTAL_WEIGHT_KEY, this.totalAllocationWeight() + pool.allocationWeight);
      return pool;
    });
  }

  /** Persists accumulator progress; weight changes go through setAllocationWeight. */
  saveAccrual(pool: Pick<PoolState, 'pid' | 'lastRefreshTick' | 'rewardPerShare'>): PoolState {
    const current = this.require(pool.pid);
    if (pool.rewardPerShare < current.rewardPerShare) throw new Error(`pool ${pool.pid}: rewardPerShare must not decrease`);
    if (pool.lastRefreshTick < current.lastRefreshTick) throw new Error(`pool ${pool.pid}: lastRefreshTick must not decrease`);
    const next = { ...current, lastRefreshTick: pool.lastRefreshTick, rewardPerShare: pool.rewardPerShare };
    this.write(next);
    return next;
  }

  setAllocationWeight(pid: number, weight: bigint): PoolState {
    return this.db.atomic(() => {
      const current = this.require(pid);
      const total = this.totalAllocationWeight() - current.allocationWeight + weight;
      const next = { ...current, allocationWeight: weight };
      this.write(next);
      this.db.setBigIntMeta(TOTAL_WEIGHT_KEY, total);
      return next;
    });
  }

  setStakedAsset(pid: number, asset: Address): PoolState {
    const next = { ...this.require(pid), stakedAsset: getAddress(asset) };
    this.write(next);
    return next;
  }

  private write(pool: PoolState): void {
    this.updateStmt.run(
      pool.stakedAsset,
      pool.allocationWeight.toString(),
      pool.lastRefreshTick.toString(),
      pool.rewardPerShare.toString(),
      pool.pid,
    );
  }
}
