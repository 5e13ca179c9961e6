/**
 * Reward-per-share index.
 *
 * Income raises a single global index by `amount / totalStaked`; stakers
 * realise their share lazily when they next stake, unstake or claim. The
 * division remainder is carried into the next update instead of being
 * dropped, so many small deposits add up to the same index as one large one.
 */

import { invalidAmount } from '../../errors/taxonomy.js';
import { requireUserAccount, TokenLedger } from '../../integrations/token/tokenLedger.js';
import { AppState } from '../../types.js';
import { DECIMAL_SCALE } from '../../utils/amount.js';
import { DistributionOutcome, RewardIndexState } from '../staking/stakingTypes.js';

const raiseIndex = (index: RewardIndexState, amount: bigint): DistributionOutcome => {
  const numerator = amount * DECIMAL_SCALE + index.carry;
  const indexDelta = numerator / index.totalStaked;
  index.carry = numerator % index.totalStaked;
  index.globalIndex += indexDelta;

  return { status: 'distributed', amount, indexDelta, globalIndex: index.globalIndex };
};

/**
 * Book `amount` of income that is already in the treasury. With nothing
 * staked the amount is withheld until the first stake arrives.
 */
export const accrueIncome = (index: RewardIndexState, amount: bigint): DistributionOutcome => {
  if (amount < 0n) throw invalidAmount('Income must not be negative.', { amount: amount.toString() });
  if (amount === 0n) return { status: 'noop' };

  index.totalIncome += amount;

  if (index.totalStaked === 0n) {
    index.withheldIncome += amount;
    return { status: 'withheld', reason: 'no_stakers', amount, withheldIncome: index.withheldIncome };
  }

  return raiseIndex(index, amount);
};

/** Feed withheld income into the index once someone is staked. */
export const releaseWithheldIncome = (index: RewardIndexState): DistributionOutcome => {
  if (index.withheldIncome === 0n || index.totalStaked === 0n) return { status: 'noop' };

  const amount = index.withheldIncome;
  index.withheldIncome = 0n;
  return raiseIndex(index, amount);
};

/** Income pushed by the fee forwarder: pulled from `from`, then accrued. */
export const depositIncome = (
  state: AppState,
  ledger: TokenLedger,
  from: string,
  amount: bigint,
): DistributionOutcome => {
  requireUserAccount(from, 'income source');
  if (amount < 0n) throw invalidAmount('Income must not be negative.', { amount: amount.toString() });
  if (amount === 0n) return { status: 'noop' };

  ledger.transferFrom(from, amount);
  return accrueIncome(state.staking.rewardIndex, amount);
};

/** Income credited to the index and not yet claimed. Bounds what stakers can still claim. */
export const outstandingRewards = (state: AppState): bigint => {
  const index = state.staking.rewardIndex;
  const distributed = index.totalIncome - index.withheldIncome;
  return distributed - index.totalClaimed;
};
