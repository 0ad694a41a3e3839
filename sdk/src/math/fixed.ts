// Reward-per-share values are fixed-point integers scaled by PRECISION.
export const PRECISION = 10n ** 12n;

export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) throw new Error('mulDiv: division by zero');
  return (a * b) / c;
}

/** Amount already priced in for `stakedAmount` at accumulator value `rewardPerShare`. */
export function rewardDebtOf(stakedAmount: bigint, rewardPerShare: bigint): bigint {
  return mulDiv(stakedAmount, rewardPerShare, PRECISION);
}

export function perShareIncrement(reward: bigint, stakedBalance: bigint): bigint {
  return mulDiv(reward, PRECISION, stakedBalance);
}

export function fixedToDecimal(value: bigint, decimals: number): string {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error('fixedToDecimal: decimals must be a non-negative integer');
  }

  const sign = value < 0n ? '-' : '';
  const abs = value < 0n ? -value : value;

  const integer = abs / PRECISION;
  if (decimals === 0) return `${sign}${integer}`;

  const frac = abs % PRECISION;
  const scale = 10n ** BigInt(decimals);
  const fracDec = mulDiv(frac, scale, PRECISION);
  const fracStr = fracDec.toString().padStart(decimals, '0');

  return `${sign}${integer}.${fracStr}`;
}
