import { describe, expect, it } from 'vitest';

import { NotAdministrator, TimelockNotElapsed } from '../src/errors.js';
import { ADMIN, ALICE, BOB, LP1, OPERATOR, RECIPIENT, REWARD, fund, makeFarm, withPools } from './helpers.js';

function farmWithFees() {
  const farm = makeFarm();
  withPools(farm, [{ asset: LP1, weight: 1n }]);
  fund(farm, LP1, ALICE, 100n);
  farm.engine.deposit(0, ALICE, 100n, 0n);
  // 40 ticks * 80 = 3200 to the pool, a tenth of it to the operator.
  farm.accounting.refresh(0, 40n);
  return farm;
}

describe('PayoutVault', () => {
  it('holds the operator fee until the interval has passed', () => {
    const farm = farmWithFees();
    expect(farm.payout.state()).toMatchObject({ admin: ADMIN, recipient: RECIPIENT, lastReleaseTick: 0n, releasableAt: 50n, balance: 320n });

    expect(() => farm.payout.release(ADMIN, 40n)).toThrow(TimelockNotElapsed);
    expect(farm.tokens.balanceOf(REWARD, OPERATOR)).toBe(320n);

    expect(farm.payout.release(ADMIN, 60n)).toBe(320n);
    expect(farm.tokens.balanceOf(REWARD, RECIPIENT)).toBe(320n);
    expect(farm.tokens.balanceOf(REWARD, OPERATOR)).toBe(0n);
    expect(farm.payout.state().releasableAt).toBe(110n);

    expect(() => farm.payout.release(ADMIN, 100n)).toThrow(TimelockNotElapsed);
  });

  it('only the vault admin can release, and the admin can be rotated', () => {
    const farm = farmWithFees();
    expect(() => farm.payout.release(BOB, 60n)).toThrow(NotAdministrator);

    farm.payout.setAdmin(ADMIN, BOB);
    expect(() => farm.payout.release(ADMIN, 60n)).toThrow(NotAdministrator);
    farm.payout.setRecipient(BOB, ALICE);
    expect(farm.payout.release(BOB, 60n)).toBe(320n);
    expect(farm.tokens.balanceOf(REWARD, ALICE)).toBe(320n);
  });

  it('a rejected release leaves the vault and the observed tick untouched', () => {
    const farm = farmWithFees();
    expect(() => farm.payout.release(ADMIN, 45n)).toThrow(TimelockNotElapsed);
    expect(farm.payout.state()).toMatchObject({ lastReleaseTick: 0n, balance: 320n });

    // Tick 45 was never recorded, so an action at 42 is still in order.
    expect(farm.accounting.refresh(0, 42n).poolReward).toBe(160n);
  });
});
