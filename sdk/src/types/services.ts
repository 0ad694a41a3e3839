import type { Address } from 'viem';

// Calls are made on behalf of the account the service is bound to.

export interface StakedAssetService {
  readonly address: Address;
  balanceOf(holder: Address): bigint;
  // Exact amounts only; `false` means nothing moved.
  transfer(recipient: Address, amount: bigint): boolean;
  transferFrom(owner: Address, recipient: Address, amount: bigint): boolean;
  approve(spender: Address, amount: bigint): boolean;
}

export interface RewardTokenService {
  readonly address: Address;
  balanceOf(holder: Address): bigint;
  mint(recipient: Address, amount: bigint): void;
  transfer(recipient: Address, amount: bigint): boolean;
}
