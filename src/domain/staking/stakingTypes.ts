/**
 * Staking and reward accounting types.
 *
 * Amounts are base units. `rewardIndexSnapshot`, `globalIndex`, `carry` and
 * `pendingReward` are scaled by DECIMAL_SCALE.
 */

export interface StakeRecord {
  account: string;
  amount: bigint;
  rewardIndexSnapshot: bigint;
  pendingReward: bigint;
  createdAt: string;
  updatedAt: string;
}

export interface RewardIndexState {
  globalIndex: bigint;
  totalStaked: bigint;
  /** Scaled remainder left over by the last index update. */
  carry: bigint;
  /** Income received while nothing was staked. */
  withheldIncome: bigint;
  /** Whole units paid out through claims. */
  totalClaimed: bigint;
  totalIncome: bigint;
}

export interface StakingState {
  stakes: Record<string, StakeRecord>;
  rewardIndex: RewardIndexState;
}

export type IncomeSource = 'fees' | 'forfeited_deposit';

export type DistributionOutcome =
  | { status: 'noop' }
  | { status: 'distributed'; amount: bigint; indexDelta: bigint; globalIndex: bigint }
  | { status: 'withheld'; reason: 'no_stakers'; amount: bigint; withheldIncome: bigint };

export interface StakeChange {
  account: string;
  amount: bigint;
  balance: bigint;
  totalStaked: bigint;
}

export interface RewardClaim {
  account: string;
  amount: bigint;
}
