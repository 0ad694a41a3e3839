import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import * as TOML from '@iarna/toml';
import { getAddress, isAddress } from 'viem';
import type { Address } from 'viem';

import type { EmissionParams, FarmDeployment } from '../../../sdk/src/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface FarmConfig {
  schedule: EmissionParams;
  accounts: FarmDeployment & {
    admin: Address;
  };
  payout: {
    recipient: Address;
    minIntervalTicks: bigint;
  };
  storage: {
    dataDir: string;
  };
  telemetry: {
    logLevel: LogLevel;
  };
}

export function defaultFarmConfigPath(): string {
  return path.join(os.homedir(), '.tickfarm', 'farm.toml');
}

export function expandHome(p: string): string {
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function expectRecord(v: unknown, label: string): Record<string, unknown> {
  if (v === null || typeof v !== 'object' || Array.isArray(v)) throw new Error(`${label} must be a table/object`);
  return Object.fromEntries(Object.entries(v));
}

function expectString(v: unknown, label: string): string {
  if (typeof v !== 'string' || v.length === 0) throw new Error(`${label} must be a non-empty string`);
  return v;
}

function toBigInt(v: unknown, label: string): bigint {
  if (typeof v === 'bigint') return v;
  if (typeof v === 'number' && Number.isFinite(v) && Number.isInteger(v)) return BigInt(v);
  if (typeof v === 'string' && v.length > 0) {
    try {
      return BigInt(v);
    } catch {
      // fallthrough
    }
  }
  throw new Error(`${label} must be an integer (number, bigint, or string)`);
}

function toBigIntList(v: unknown, label: string): bigint[] {
  if (!Array.isArray(v) || v.length === 0) throw new Error(`${label} must be a non-empty array`);
  return v.map((item, i) => toBigInt(item, `${label}[${i}]`));
}

function expectAddress(v: unknown, label: string): Address {
  const s = expectString(v, label);
  if (!isAddress(s, { strict: false })) throw new Error(`${label} must be an EVM address`);
  return getAddress(s);
}

function parseLogLevel(v: unknown, label: string): LogLevel {
  const s = expectString(v, label);
  if (s !== 'debug' && s !== 'info' && s !== 'warn' && s !== 'error' && s !== 'silent') {
    throw new Error(`${label} must be one of debug, info, warn, error, silent`);
  }
  return s;
}

export function parseFarmConfig(raw: string): FarmConfig {
  const root = expectRecord(TOML.parse(raw), 'farm.toml');
  const schedule = expectRecord(root['schedule'], 'schedule');
  const accounts = expectRecord(root['accounts'], 'accounts');
  const payout = expectRecord(root['payout'], 'payout');
  const storage = expectRecord(root['storage'], 'storage');
  const telemetry = root['telemetry'] === undefined ? {} : expectRecord(root['telemetry'], 'telemetry');

  const cfg: FarmConfig = {
    schedule: {
      genesisTick: toBigInt(schedule['genesisTick'] ?? schedule['genesis_tick'], 'schedule.genesisTick'),
      epochLength: toBigInt(schedule['epochLength'] ?? schedule['epoch_length'], 'schedule.epochLength'),
      rateTable: toBigIntList(schedule['rateTable'] ?? schedule['rate_table'], 'schedule.rateTable'),
      feeDivisors: toBigIntList(schedule['feeDivisors'] ?? schedule['fee_divisors'] ?? [10, 10, 20], 'schedule.feeDivisors'),
    },
    accounts: {
      admin: expectAddress(accounts['admin'], 'accounts.admin'),
      custody: expectAddress(accounts['custody'], 'accounts.custody'),
      operator: expectAddress(accounts['operator'], 'accounts.operator'),
      rewardToken: expectAddress(accounts['rewardToken'] ?? accounts['reward_token'], 'accounts.rewardToken'),
    },
    payout: {
      recipient: expectAddress(payout['recipient'], 'payout.recipient'),
      minIntervalTicks: toBigInt(payout['minIntervalTicks'] ?? payout['min_interval_ticks'], 'payout.minIntervalTicks'),
    },
    storage: {
      dataDir: expandHome(expectString(storage['dataDir'] ?? storage['data_dir'], 'storage.dataDir')),
    },
    telemetry: {
      logLevel: parseLogLevel(telemetry['logLevel'] ?? telemetry['log_level'] ?? 'info', 'telemetry.logLevel'),
    },
  };

  if (cfg.schedule.genesisTick < 0n) throw new Error('schedule.genesisTick must be >= 0');
  if (cfg.schedule.epochLength <= 0n) throw new Error('schedule.epochLength must be > 0');
  if (cfg.payout.minIntervalTicks < 0n) throw new Error('payout.minIntervalTicks must be >= 0');
  const { custody, operator, rewardToken } = cfg.accounts;
  if (custody === operator) throw new Error('accounts.custody and accounts.operator must differ');
  if (rewardToken === custody || rewardToken === operator) throw new Error('accounts.rewardToken must not be a holder account');

  return cfg;
}

export async function loadFarmConfig(configPath: string = defaultFarmConfigPath()): Promise<FarmConfig> {
  const raw = await fs.readFile(expandHome(configPath), 'utf8');
  return parseFarmConfig(raw);
}

export function defaultConfigTemplate(): string {
  return `# ~/.tickfarm/farm.toml

[schedule]
genesisTick = "0"
epochLength = "100000"
# Per-tick emission for each epoch; the last entry holds forever.
rateTable = ["80", "80", "40", "20", "10", "5"]
# Operator fee = pool reward / divisor, by epoch.
feeDivisors = ["10", "10", "20"]

[accounts]
admin = "0x1000000000000000000000000000000000000001"
custody = "0x2000000000000000000000000000000000000002"
operator = "0x3000000000000000000000000000000000000003"
rewardToken = "0x4000000000000000000000000000000000000004"

[payout]
recipient = "0x1000000000000000000000000000000000000001"
minIntervalTicks = "6500"

[storage]
dataDir = "~/.tickfarm/data"

[telemetry]
logLevel = "info"
`;
}
