import { getAddress } from 'viem';
import type { Address } from 'viem';

import type { PositionState } from '../../../sdk/src/index.js';

import type { FarmDb } from './db.js';

type PositionRow = {
  pid: number;
  participant: string;
  staked_amount: string;
  reward_debt: string;
};

function fromRow(r: PositionRow): PositionState {
  return {
    pid: r.pid,
    participant: getAddress(r.participant),
    stakedAmount: BigInt(r.staked_amount),
    rewardDebt: BigInt(r.reward_debt),
  };
}

// (pid, participant) -> stake and reward debt. Rows are never deleted.
export class PositionStore {
  private readonly upsertStmt;
  private readonly selectStmt;
  private readonly byPoolStmt;

  constructor(db: FarmDb) {
    const raw = db.raw();
    this.upsertStmt = raw.prepare<[number, string, string, string]>(
      `INSERT INTO positions(pid, participant, staked_amount, reward_debt) VALUES(?, ?, ?, ?)
       ON CONFLICT(pid, participant) DO UPDATE SET staked_amount = excluded.staked_amount, reward_debt = excluded.reward_debt`,
    );
    this.selectStmt = raw.prepare<[number, string], PositionRow>(`SELECT * FROM positions WHERE pid = ? AND participant = ?`);
    this.byPoolStmt = raw.prepare<[number], PositionRow>(`SELECT * FROM positions WHERE pid = ? ORDER BY participant ASC`);
  }

  /** Missing positions read as an empty one. */
  get(pid: number, participant: Address): PositionState {
    const who = getAddress(participant);
    const row = this.selectStmt.get(pid, who);
    return row ? fromRow(row) : { pid, participant: who, stakedAmount: 0n, rewardDebt: 0n };
  }

  exists(pid: number, participant: Address): boolean {
    return this.selectStmt.get(pid, getAddress(participant)) !== undefined;
  }

  put(position: PositionState): void {
    if (position.stakedAmount < 0n) throw new Error('stakedAmount must be >= 0');
    this.upsertStmt.run(
      position.pid,
      getAddress(position.participant),
      position.stakedAmount.toString(),
      position.rewardDebt.toString(),
    );
  }

  listByPool(pid: number): PositionState[] {
    return this.byPoolStmt.all(pid).map(fromRow);
  }
}
