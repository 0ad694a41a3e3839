import fs from 'node:fs/promises';
import path from 'node:path';

import { Command } from 'commander';
import { getAddress, isAddress } from 'viem';
import type { Address } from 'viem';

import { fixedToDecimal } from '../../sdk/src/index.js';

import type { FarmConfig } from './config/config.js';
import { defaultConfigTemplate, defaultFarmConfigPath, expandHome, loadFarmConfig } from './config/config.js';
import { Farm } from './farm.js';

export type CliDeps = {
  loadConfig?: (configPath: string) => Promise<FarmConfig>;
  openFarm?: (cfg: FarmConfig) => Promise<Farm>;
  print?: (line: string) => void;
};

type ConfigOpts = { config?: string };
type ActorOpts = ConfigOpts & { as: string; tick: string };
type TickOpts = ConfigOpts & { tick: string };

function parseBigInt(v: string, label: string): bigint {
  try {
    return BigInt(v);
  } catch {
    throw new Error(`${label} must be an integer`);
  }
}

function parsePid(v: string): number {
  const n = Number(v);
  if (!Number.isSafeInteger(n) || n < 0) throw new Error('pid must be a non-negative integer');
  return n;
}

function parseAddress(v: string, label: string): Address {
  if (!isAddress(v, { strict: false })) throw new Error(`${label} must be an EVM address`);
  return getAddress(v);
}

function toJson(v: unknown): string {
  return JSON.stringify(v, (_k, x: unknown) => (typeof x === 'bigint' ? x.toString() : x), 2);
}

async function writeIfMissing(filePath: string, content: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return false;
  } catch {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
    return true;
  }
}

export function buildProgram(deps: CliDeps = {}): Command {
  const loadConfig = deps.loadConfig ?? loadFarmConfig;
  const openFarm = deps.openFarm ?? ((cfg: FarmConfig) => Farm.open(cfg));
  const print = deps.print ?? ((line: string) => console.log(line));

  async function withFarm(o: ConfigOpts, fn: (farm: Farm) => unknown): Promise<void> {
    const cfg = await loadConfig(o.config ?? defaultFarmConfigPath());
    const farm = await openFarm(cfg);
    try {
      const out = fn(farm);
      if (out !== undefined) print(toJson(out));
    } finally {
      farm.close();
    }
  }

  const program = new Command();
  program.name('tickfarm').description('Tick-driven incentive ledger').version('0.1.0');

  program
    .command('init')
    .option('-c, --config <path>', 'config path')
    .action(async (o: ConfigOpts) => {
      const configPath = expandHome(o.config ?? defaultFarmConfigPath());
      if (await writeIfMissing(configPath, defaultConfigTemplate())) print(`wrote ${configPath}`);
      await withFarm({ config: configPath }, (farm) => ({ owner: farm.governance.owner(), pools: farm.ctx.pools.count() }));
    });

  const token = program.command('token').description('local token ledger');

  token
    .command('register <address> <symbol>')
    .option('-c, --config <path>', 'config path')
    .action(async (address: string, symbol: string, o: ConfigOpts) => {
      await withFarm(o, (farm) => farm.tokens.register({ address: parseAddress(address, 'address'), symbol }));
    });

  token
    .command('credit <token> <holder> <amount>')
    .option('-c, --config <path>', 'config path')
    .action(async (tokenAddr: string, holder: string, amount: string, o: ConfigOpts) => {
      await withFarm(o, (farm) => {
        const t = parseAddress(tokenAddr, 'token');
        const h = parseAddress(holder, 'holder');
        farm.tokens.credit(t, h, parseBigInt(amount, 'amount'));
        return { token: t, holder: h, balance: farm.tokens.balanceOf(t, h) };
      });
    });

  token
    .command('approve <token> <spender> <amount>')
    .requiredOption('--as <address>', 'token owner')
    .option('-c, --config <path>', 'config path')
    .action(async (tokenAddr: string, spender: string, amount: string, o: ConfigOpts & { as: string }) => {
      await withFarm(o, (farm) => {
        const t = parseAddress(tokenAddr, 'token');
        const owner = parseAddress(o.as, '--as');
        const s = parseAddress(spender, 'spender');
        farm.tokens.approve(t, owner, s, parseBigInt(amount, 'amount'));
        return { token: t, owner, spender: s, allowance: farm.tokens.allowance(t, owner, s) };
      });
    });

  token
    .command('balance <token> <holder>')
    .option('-c, --config <path>', 'config path')
    .action(async (tokenAddr: string, holder: string, o: ConfigOpts) => {
      await withFarm(o, (farm) => farm.tokens.balanceOf(parseAddress(tokenAddr, 'token'), parseAddress(holder, 'holder')));
    });

  const pool = program.command('pool').description('pool administration and inspection');

  pool
    .command('add <asset> <weight>')
    .requiredOption('--as <address>', 'caller')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (asset: string, weight: string, o: ActorOpts) => {
      await withFarm(o, (farm) =>
        farm.governance.addPool(parseAddress(o.as, '--as'), parseAddress(asset, 'asset'), parseBigInt(weight, 'weight'), parseBigInt(o.tick, '--tick')),
      );
    });

  pool
    .command('set-weight <pid> <weight>')
    .requiredOption('--as <address>', 'caller')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (pid: string, weight: string, o: ActorOpts) => {
      await withFarm(o, (farm) =>
        farm.governance.setWeight(parseAddress(o.as, '--as'), parsePid(pid), parseBigInt(weight, 'weight'), parseBigInt(o.tick, '--tick')),
      );
    });

  pool
    .command('list')
    .option('-c, --config <path>', 'config path')
    .action(async (o: ConfigOpts) => {
      await withFarm(o, (farm) => ({
        totalAllocationWeight: farm.ctx.pools.totalAllocationWeight(),
        pools: farm.ctx.pools.list().map((p) => ({ ...p, rewardPerShare: fixedToDecimal(p.rewardPerShare, 6) })),
      }));
    });

  pool
    .command('refresh [pid]')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (pid: string | undefined, o: TickOpts) => {
      await withFarm(o, (farm) => {
        const tick = parseBigInt(o.tick, '--tick');
        return pid === undefined ? farm.accounting.refreshAll(tick) : [farm.accounting.refresh(parsePid(pid), tick)];
      });
    });

  program
    .command('deposit <pid> <amount>')
    .requiredOption('--as <address>', 'participant')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (pid: string, amount: string, o: ActorOpts) => {
      await withFarm(o, (farm) =>
        farm.engine.deposit(parsePid(pid), parseAddress(o.as, '--as'), parseBigInt(amount, 'amount'), parseBigInt(o.tick, '--tick')),
      );
    });

  program
    .command('withdraw <pid> <amount>')
    .requiredOption('--as <address>', 'participant')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (pid: string, amount: string, o: ActorOpts) => {
      await withFarm(o, (farm) =>
        farm.engine.withdraw(parsePid(pid), parseAddress(o.as, '--as'), parseBigInt(amount, 'amount'), parseBigInt(o.tick, '--tick')),
      );
    });

  program
    .command('emergency-withdraw <pid>')
    .requiredOption('--as <address>', 'participant')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (pid: string, o: ActorOpts) => {
      await withFarm(o, (farm) => farm.engine.emergencyWithdraw(parsePid(pid), parseAddress(o.as, '--as'), parseBigInt(o.tick, '--tick')));
    });

  program
    .command('pending <pid> <participant>')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (pid: string, participant: string, o: TickOpts) => {
      await withFarm(o, (farm) =>
        farm.engine.pendingReward(parsePid(pid), parseAddress(participant, 'participant'), parseBigInt(o.tick, '--tick')),
      );
    });

  const payout = program.command('payout').description('operator fee vault');

  payout
    .command('status')
    .option('-c, --config <path>', 'config path')
    .action(async (o: ConfigOpts) => {
      await withFarm(o, (farm) => farm.payout.state());
    });

  payout
    .command('release')
    .requiredOption('--as <address>', 'vault admin')
    .requiredOption('--tick <n>', 'current tick')
    .option('-c, --config <path>', 'config path')
    .action(async (o: ActorOpts) => {
      await withFarm(o, (farm) => ({ released: farm.payout.release(parseAddress(o.as, '--as'), parseBigInt(o.tick, '--tick')) }));
    });

  return program;
}
