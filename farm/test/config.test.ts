import { describe, expect, it } from 'vitest';

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import { defaultConfigTemplate, loadFarmConfig, parseFarmConfig } from '../src/config/config.js';

describe('farm config', () => {
  it('parses the default template', () => {
    const cfg = parseFarmConfig(defaultConfigTemplate());
    expect(cfg.schedule).toEqual({
      genesisTick: 0n,
      epochLength: 100_000n,
      rateTable: [80n, 80n, 40n, 20n, 10n, 5n],
      feeDivisors: [10n, 10n, 20n],
    });
    expect(cfg.accounts.custody).toBe('0x2000000000000000000000000000000000000002');
    expect(cfg.payout.minIntervalTicks).toBe(6500n);
    expect(cfg.storage.dataDir).toBe(path.join(os.homedir(), '.tickfarm', 'data'));
    expect(cfg.telemetry.logLevel).toBe('info');
  });

  it('accepts snake_case keys, numbers and default fee divisors', () => {
    const cfg = parseFarmConfig(`
[schedule]
genesis_tick = 5
epoch_length = 10
rate_table = [4, 2]

[accounts]
admin = "0x1000000000000000000000000000000000000001"
custody = "0x2000000000000000000000000000000000000002"
operator = "0x3000000000000000000000000000000000000003"
reward_token = "0x4000000000000000000000000000000000000004"

[payout]
recipient = "0x1000000000000000000000000000000000000001"
min_interval_ticks = 3

[storage]
data_dir = "/var/lib/tickfarm"
`);
    expect(cfg.schedule).toEqual({ genesisTick: 5n, epochLength: 10n, rateTable: [4n, 2n], feeDivisors: [10n, 10n, 20n] });
    expect(cfg.payout.minIntervalTicks).toBe(3n);
    expect(cfg.storage.dataDir).toBe('/var/lib/tickfarm');
    expect(cfg.telemetry.logLevel).toBe('info');
  });

  it('reports the offending key', () => {
    const bad = defaultConfigTemplate().replace('custody = "0x2000000000000000000000000000000000000002"', 'custody = "nope"');
    expect(() => parseFarmConfig(bad)).toThrow('accounts.custody must be an EVM address');

    const same = defaultConfigTemplate().replace(
      'operator = "0x3000000000000000000000000000000000000003"',
      'operator = "0x2000000000000000000000000000000000000002"',
    );
    expect(() => parseFarmConfig(same)).toThrow('accounts.custody and accounts.operator must differ');

    const zeroEpoch = defaultConfigTemplate().replace('epochLength = "100000"', 'epochLength = "0"');
    expect(() => parseFarmConfig(zeroEpoch)).toThrow('schedule.epochLength must be > 0');
  });

  it('loads from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tickfarm-cfg-'));
    const file = path.join(dir, 'farm.toml');
    await fs.writeFile(file, defaultConfigTemplate());
    const cfg = await loadFarmConfig(file);
    expect(cfg.accounts.rewardToken).toBe('0x4000000000000000000000000000000000000004');
  });
});
