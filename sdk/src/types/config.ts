import type { Address } from 'viem';

export interface FarmDeployment {
  // Account holding staked principal and undistributed reward.
  custody: Address;
  // Receives the operator fee mint (normally the payout vault).
  operator: Address;
  rewardToken: Address;
}
