/**
 * Wire shapes. Amounts and scaled decimals leave the process as strings so
 * nothing is rounded through a JSON number.
 */

import { GovernanceConfig, Poll, Vote } from '../domain/governance/governanceTypes.js';
import { executionWindow } from '../domain/governance/pollRegistry.js';
import { claimableReward } from '../domain/staking/stakeLedger.js';
import { DistributionOutcome, StakeChange } from '../domain/staking/stakingTypes.js';
import { AppState } from '../types.js';
import { formatAmount, formatDecimal } from '../utils/amount.js';

export const toConfigView = (config: GovernanceConfig) => ({
  quorum: formatDecimal(config.quorum),
  threshold: formatDecimal(config.threshold),
  votingPeriod: config.votingPeriod,
  timelockPeriod: config.timelockPeriod,
  expirationPeriod: config.expirationPeriod,
  proposalDeposit: formatAmount(config.proposalDeposit),
  maxMessagesPerPoll: config.maxMessagesPerPoll,
  earlyPassThreshold: config.earlyPassThreshold === null ? null : formatDecimal(config.earlyPassThreshold),
  rejectedDepositPolicy: config.rejectedDepositPolicy,
});

export const toPollView = (poll: Poll, config: GovernanceConfig) => ({
  id: poll.id,
  creator: poll.creator,
  depositAmount: formatAmount(poll.depositAmount),
  title: poll.title,
  description: poll.description,
  link: poll.link ?? null,
  messages: poll.messages,
  status: poll.status,
  yesVotes: formatAmount(poll.yesVotes),
  noVotes: formatAmount(poll.noVotes),
  abstainVotes: formatAmount(poll.abstainVotes),
  totalVotingPowerAtCreation: formatAmount(poll.totalVotingPowerAtCreation),
  startHeight: poll.startHeight,
  endHeight: poll.endHeight,
  ...executionWindow(poll, config),
  depositResolution: poll.depositResolution,
  executionError: poll.executionError ?? null,
  createdAt: poll.createdAt,
  updatedAt: poll.updatedAt,
  resolvedAt: poll.resolvedAt ?? null,
});

export const toVoteView = (vote: Vote) => ({
  pollId: vote.pollId,
  voter: vote.voter,
  choice: vote.choice,
  power: formatAmount(vote.power),
  height: vote.height,
  castAt: vote.castAt,
});

export const toStakerView = (state: AppState, account: string) => {
  const record = state.staking.stakes[account];
  return {
    account,
    balance: formatAmount(record?.amount ?? 0n),
    claimableReward: formatAmount(claimableReward(state, account)),
    rewardIndexSnapshot: formatDecimal(record?.rewardIndexSnapshot ?? 0n),
    tokenBalance: formatAmount(state.token.balances[account] ?? 0n),
    updatedAt: record?.updatedAt ?? null,
  };
};

export const toStateView = (state: AppState) => {
  const index = state.staking.rewardIndex;
  return {
    globalIndex: formatDecimal(index.globalIndex),
    totalStaked: formatAmount(index.totalStaked),
    withheldIncome: formatAmount(index.withheldIncome),
    totalIncome: formatAmount(index.totalIncome),
    totalClaimed: formatAmount(index.totalClaimed),
    pollCount: state.governance.pollCount,
    totalDeposit: formatAmount(state.governance.totalDeposit),
    height: state.chain.lastHeight,
    sequence: state.chain.sequence,
  };
};

export const toStakeChangeView = (change: StakeChange) => ({
  account: change.account,
  amount: formatAmount(change.amount),
  balance: formatAmount(change.balance),
  totalStaked: formatAmount(change.totalStaked),
});

export const toDistributionView = (outcome: DistributionOutcome) => {
  switch (outcome.status) {
    case 'noop':
      return { status: outcome.status };
    case 'distributed':
      return {
        status: outcome.status,
        amount: formatAmount(outcome.amount),
        indexDelta: formatDecimal(outcome.indexDelta),
        globalIndex: formatDecimal(outcome.globalIndex),
      };
    case 'withheld':
      return {
        status: outcome.status,
        reason: outcome.reason,
        amount: formatAmount(outcome.amount),
        withheldIncome: formatAmount(outcome.withheldIncome),
      };
  }
};

export type ConfigView = ReturnType<typeof toConfigView>;
export type PollView = ReturnType<typeof toPollView>;
export type VoteView = ReturnType<typeof toVoteView>;
export type StakerView = ReturnType<typeof toStakerView>;
export type StateView = ReturnType<typeof toStateView>;
export type DistributionView = ReturnType<typeof toDistributionView>;
