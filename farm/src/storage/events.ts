import { getAddress } from 'viem';

import type { FarmEvent, FarmEventKind } from '../../../sdk/src/index.js';

import type { FarmDb } from './db.js';

type EventRow = {
  id: number;
  kind: string;
  pid: number;
  participant: string;
  amount: string;
  tick: string;
};

export type StoredFarmEvent = FarmEvent & { id: number };

function parseKind(kind: string): FarmEventKind {
  if (kind !== 'deposit' && kind !== 'withdraw' && kind !== 'emergencyWithdraw') throw new Error(`unknown event kind: ${kind}`);
  return kind;
}

export class EventLog {
  private readonly insertStmt;
  private readonly sinceStmt;

  constructor(db: FarmDb) {
    const raw = db.raw();
    this.insertStmt = raw.prepare<[string, number, string, string, string]>(
      `INSERT INTO farm_events(kind, pid, participant, amount, tick) VALUES(?, ?, ?, ?, ?)`,
    );
    this.sinceStmt = raw.prepare<[number], EventRow>(`SELECT * FROM farm_events WHERE id > ? ORDER BY id ASC`);
  }

  append(event: FarmEvent): StoredFarmEvent {
    const res = this.insertStmt.run(event.kind, event.pid, getAddress(event.participant), event.amount.toString(), event.tick.toString());
    return { ...event, id: Number(res.lastInsertRowid) };
  }

  since(afterId: number = 0): StoredFarmEvent[] {
    return this.sinceStmt.all(afterId).map((r) => ({
      id: r.id,
      kind: parseKind(r.kind),
      pid: r.pid,
      participant: getAddress(r.participant),
      amount: BigInt(r.amount),
      tick: BigInt(r.tick),
    }));
  }
}
