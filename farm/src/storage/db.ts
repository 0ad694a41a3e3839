import fs from 'node:fs/promises';
import path from 'node:path';

import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

export interface FarmDbOptions {
  filename: string;
  readonly?: boolean;
}

export class FarmDb {
  public readonly filename: string;
  private readonly db: SqliteDatabase;
  private committed: Array<() => void> = [];

  constructor(opts: FarmDbOptions | string) {
    const o = typeof opts === 'string' ? { filename: opts } : opts;
    this.filename = o.filename;
    this.db = new Database(o.filename, { readonly: o.readonly ?? false });
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  static async openAtDataDir(dataDir: string): Promise<FarmDb> {
    await fs.mkdir(dataDir, { recursive: true });
    const filename = path.join(dataDir, 'farm.db');
    return new FarmDb({ filename });
  }

  close(): void {
    this.db.close();
  }

  /**
   * Runs `fn` as one transaction: any throw rolls back every write made inside
   * it. Nested calls become savepoints of the enclosing transaction.
   */
  atomic<T>(fn: () => T): T {
    if (this.db.inTransaction) {
      const mark = this.committed.length;
      try {
        return this.db.transaction(fn)();
      } catch (err) {
        this.committed.length = mark;
        throw err;
      }
    }

    this.committed = [];
    let out: T;
    try {
      out = this.db.transaction(fn)();
    } catch (err) {
      this.committed = [];
      throw err;
    }
    const hooks = this.committed;
    this.committed = [];
    for (const hook of hooks) hook();
    return out;
  }

  /**
   * Defers `hook` until the outermost transaction commits; it is dropped if
   * that transaction (or the savepoint it was queued in) rolls back. Outside a
   * transaction it runs immediately.
   */
  afterCommit(hook: () => void): void {
    if (this.db.inTransaction) this.committed.push(hook);
    else hook();
  }

  private migrate(): void {
    // Amounts and accumulators are stored as decimal TEXT: they outgrow 64-bit integers.
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS farm_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS pools (
        pid INTEGER PRIMARY KEY,
        staked_asset TEXT NOT NULL,
        allocation_weight TEXT NOT NULL,
        last_refresh_tick TEXT NOT NULL,
        reward_per_share TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS positions (
        pid INTEGER NOT NULL REFERENCES pools(pid),
        participant TEXT NOT NULL,
        staked_amount TEXT NOT NULL,
        reward_debt TEXT NOT NULL,
        PRIMARY KEY (pid, participant)
      );

      CREATE TABLE IF NOT EXISTS farm_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL,
        pid INTEGER NOT NULL,
        participant TEXT NOT NULL,
        amount TEXT NOT NULL,
        tick TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tokens (
        address TEXT PRIMARY KEY,
        symbol TEXT NOT NULL,
        minter TEXT,
        total_supply TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS token_balances (
        token TEXT NOT NULL REFERENCES tokens(address),
        holder TEXT NOT NULL,
        amount TEXT NOT NULL,
        PRIMARY KEY (token, holder)
      );

      CREATE TABLE IF NOT EXISTS token_allowances (
        token TEXT NOT NULL REFERENCES tokens(address),
        owner TEXT NOT NULL,
        spender TEXT NOT NULL,
        amount TEXT NOT NULL,
        PRIMARY KEY (token, owner, spender)
      );
    `);
  }

  getJournalMode(): string {
    const v = this.db.pragma('journal_mode', { simple: true });
    return typeof v === 'string' ? v : String(v);
  }

  getMeta(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>(`SELECT value FROM farm_meta WHERE key = ?`).get(key);
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare(`INSERT INTO farm_meta(key, value) VALUES(?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value`)
      .run(key, value);
  }

  getBigIntMeta(key: string): bigint | undefined {
    const v = this.getMeta(key);
    return v === undefined ? undefined : BigInt(v);
  }

  setBigIntMeta(key: string, value: bigint): void {
    this.setMeta(key, value.toString());
  }

  // Expose underlying db for prepared statement reuse in helper modules.
  raw(): SqliteDatabase {
    return this.db;
  }
}
