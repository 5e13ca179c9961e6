/**
 * Per-account stake and reward bookkeeping.
 *
 * Each stake remembers the global index it was last settled at. Settling
 * folds `amount * (globalIndex - snapshot)` into `pendingReward` and moves
 * the snapshot forward; it runs before every balance change so a deposit
 * never earns income that arrived before it.
 */

import { DomainError, ErrorCode, invalidAmount } from '../../errors/taxonomy.js';
import { requireUserAccount, TokenLedger } from '../../integrations/token/tokenLedger.js';
import { AppState } from '../../types.js';
import { DECIMAL_SCALE } from '../../utils/amount.js';
import { BlockContext } from '../chain/heightSource.js';
import { releaseWithheldIncome } from '../rewards/rewardDistributor.js';
import { RewardClaim, RewardIndexState, StakeChange, StakeRecord } from './stakingTypes.js';

const unsettled = (stake: StakeRecord, index: RewardIndexState): bigint => (
  stake.amount * (index.globalIndex - stake.rewardIndexSnapshot)
);

export const settle = (stake: StakeRecord, index: RewardIndexState): void => {
  stake.pendingReward += unsettled(stake, index);
  stake.rewardIndexSnapshot = index.globalIndex;
};

const ensureStake = (state: AppState, account: string, now: string): StakeRecord => {
  const existing = state.staking.stakes[account];
  if (existing) return existing;

  const created: StakeRecord = {
    account,
    amount: 0n,
    rewardIndexSnapshot: state.staking.rewardIndex.globalIndex,
    pendingReward: 0n,
    createdAt: now,
    updatedAt: now,
  };
  state.staking.stakes[account] = created;
  return created;
};

export const stakedBalance = (state: AppState, account: string): bigint => (
  state.staking.stakes[account]?.amount ?? 0n
);

export const stake = (
  state: AppState,
  ledger: TokenLedger,
  account: string,
  amount: bigint,
  block: BlockContext,
): StakeChange => {
  requireUserAccount(account, 'staker');
  if (amount <= 0n) throw invalidAmount('Stake amount must be positive.', { amount: amount.toString() });

  ledger.transferFrom(account, amount);

  const index = state.staking.rewardIndex;
  const record = ensureStake(state, account, block.now);
  settle(record, index);

  record.amount += amount;
  record.updatedAt = block.now;
  index.totalStaked += amount;

  // First stake after an empty period picks up whatever income was withheld.
  releaseWithheldIncome(index);

  return { account, amount, balance: record.amount, totalStaked: index.totalStaked };
};

/**
 * Withdraw stake. Never blocked by open polls: votes carry the power frozen
 * when they were cast, and a poll's tally is capped at its creation-time
 * total, so moving withdrawn tokens to another voter cannot inflate it.
 */
export const unstake = (
  state: AppState,
  ledger: TokenLedger,
  account: string,
  amount: bigint,
  block: BlockContext,
): StakeChange => {
  if (amount <= 0n) throw invalidAmount('Unstake amount must be positive.', { amount: amount.toString() });

  const record = state.staking.stakes[account];
  const balance = record?.amount ?? 0n;
  if (!record || amount > balance) {
    throw new DomainError(ErrorCode.InsufficientStake, 400, `Cannot unstake ${amount}; staked balance is ${balance}.`, {
      requested: amount.toString(),
      balance: balance.toString(),
    });
  }

  const index = state.staking.rewardIndex;
  settle(record, index);

  record.amount -= amount;
  record.updatedAt = block.now;
  index.totalStaked -= amount;

  ledger.transferTo(account, amount);

  return { account, amount, balance: record.amount, totalStaked: index.totalStaked };
};

/** Scaled reward owed to `account`, settled or not. */
export const pendingRewardScaled = (state: AppState, account: string): bigint => {
  const record = state.staking.stakes[account];
  if (!record) return 0n;
  return record.pendingReward + unsettled(record, state.staking.rewardIndex);
};

export const claimableReward = (state: AppState, account: string): bigint => (
  pendingRewardScaled(state, account) / DECIMAL_SCALE
);

/** Pay out whole units owed; the sub-unit remainder stays pending. */
export const claimReward = (
  state: AppState,
  ledger: TokenLedger,
  account: string,
  block: BlockContext,
): RewardClaim => {
  requireUserAccount(account, 'claimant');
  const record = state.staking.stakes[account];
  const payable = claimableReward(state, account);
  if (!record || payable === 0n) {
    throw new DomainError(ErrorCode.NothingToClaim, 409, 'No reward to claim.', { account });
  }

  const index = state.staking.rewardIndex;
  settle(record, index);
  record.pendingReward -= payable * DECIMAL_SCALE;
  record.updatedAt = block.now;
  index.totalClaimed += payable;

  ledger.transferTo(account, payable);

  return { account, amount: payable };
};

/** Sum of all stake records; equals `totalStaked` at every commit. */
export const sumOfStakes = (state: AppState): bigint => (
  Object.values(state.staking.stakes).reduce((sum, record) => sum + record.amount, 0n)
);
