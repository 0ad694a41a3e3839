import type { Address } from 'viem';

export interface PoolState {
  pid: number;
  stakedAsset: Address;
  allocationWeight: bigint;
  lastRefreshTick: bigint;
  // Cumulative reward per unit of stake, scaled by PRECISION.
  rewardPerShare: bigint;
}

export interface PositionState {
  pid: number;
  participant: Address;
  stakedAmount: bigint;
  rewardDebt: bigint;
}

export interface EmissionParams {
  genesisTick: bigint;
  epochLength: bigint;
  rateTable: bigint[];
  feeDivisors: bigint[];
}

export type FarmEventKind = 'deposit' | 'withdraw' | 'emergencyWithdraw';

export interface FarmEvent {
  kind: FarmEventKind;
  participant: Address;
  pid: number;
  amount: bigint;
  tick: bigint;
}
