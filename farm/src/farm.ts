import pino from 'pino';
import type { Logger } from 'pino';

import { FeeSchedule, PoolAccrual, RewardSchedule } from '../../sdk/src/index.js';
import type { FarmEvent } from '../../sdk/src/index.js';

import type { FarmConfig } from './config/config.js';
import type { FarmContext } from './engine/context.js';
import { Governance } from './engine/governance.js';
import { PoolAccounting } from './engine/pool-accounting.js';
import { StakingEngine } from './engine/staking-engine.js';
import { PayoutVault } from './payout/payout-vault.js';
import { FarmDb } from './storage/db.js';
import { EventLog } from './storage/events.js';
import { PoolStore } from './storage/pools.js';
import { PositionStore } from './storage/positions.js';
import { Metrics } from './telemetry/metrics.js';
import { TokenLedger, ledgerServices } from './tokens/token-ledger.js';

export type FarmOptions = {
  db?: FarmDb;
  logger?: Logger;
  onEvent?: (event: FarmEvent) => void;
};

/**
 * One farm over one database: wires the stores, the token ledger and the
 * engine components, and performs first-run setup (reward token, owner,
 * payout vault).
 */
export class Farm {
  public readonly ctx: FarmContext;
  public readonly tokens: TokenLedger;
  public readonly accounting: PoolAccounting;
  public readonly engine: StakingEngine;
  public readonly governance: Governance;
  public readonly payout: PayoutVault;

  constructor(
    public readonly config: FarmConfig,
    opts: FarmOptions & { db: FarmDb },
  ) {
    const { db } = opts;
    const { admin, ...deployment } = config.accounts;
    const schedule = new RewardSchedule(config.schedule);

    this.tokens = new TokenLedger(db);
    this.ctx = {
      db,
      pools: new PoolStore(db),
      positions: new PositionStore(db),
      events: new EventLog(db),
      services: ledgerServices(this.tokens, deployment),
      deployment,
      accrual: new PoolAccrual(schedule, new FeeSchedule(config.schedule.feeDivisors)),
      metrics: new Metrics(),
      logger: opts.logger,
      onEvent: opts.onEvent,
    };
    this.accounting = new PoolAccounting(this.ctx);
    this.engine = new StakingEngine(this.ctx, this.accounting);
    this.governance = new Governance(this.ctx, this.accounting);
    this.payout = new PayoutVault(this.ctx, this.tokens, config.payout.minIntervalTicks);

    db.atomic(() => {
      if (!this.tokens.get(deployment.rewardToken)) {
        this.tokens.register({ address: deployment.rewardToken, symbol: 'REWARD', minter: deployment.custody });
      }
      this.governance.initialize(admin);
      this.payout.initialize({ admin, recipient: config.payout.recipient, tick: schedule.genesisTick });
    });
  }

  static async open(config: FarmConfig, opts: FarmOptions = {}): Promise<Farm> {
    const logger = opts.logger ?? pino({ level: config.telemetry.logLevel });
    const db = opts.db ?? (await FarmDb.openAtDataDir(config.storage.dataDir));
    logger.info({ filename: db.filename }, 'Farm ledger opened');
    return new Farm(config, { ...opts, db, logger });
  }

  get metrics(): Metrics {
    return this.ctx.metrics;
  }

  close(): void {
    this.ctx.db.close();
  }
}
