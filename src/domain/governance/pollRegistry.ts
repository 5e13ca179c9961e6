/**
 * Poll lifecycle.
 *
 *   in_progress ──end──▶ passed ──execute──▶ executed | failed
 *        │                  └──expire──▶ expired
 *        └──────end──▶ rejected
 *
 * The quorum denominator is the total stake when the poll was created and
 * does not move afterwards. Polls are never deleted.
 */

import { DomainError, ErrorCode, stateConflict } from '../../errors/taxonomy.js';
import { requireUserAccount, TokenLedger } from '../../integrations/token/tokenLedger.js';
import { AppState } from '../../types.js';
import { ratioAtLeast } from '../../utils/amount.js';
import { BlockContext } from '../chain/heightSource.js';
import { accrueIncome } from '../rewards/rewardDistributor.js';
import { DistributionOutcome } from '../staking/stakingTypes.js';
import {
  GovernanceConfig,
  Poll,
  PollListQuery,
  PollOutcome,
  Vote,
  VoteChoice,
  VoterListQuery,
} from './governanceTypes.js';
import { PollMessage } from './pollMessages.js';
import { recordVote, talliedPower, votesFor } from './voteSnapshot.js';

export const TEXT_LIMITS = {
  title: { min: 4, max: 64 },
  description: { min: 4, max: 1024 },
  link: { min: 12, max: 128 },
} as const;

export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 30;

export interface CreatePollInput {
  creator: string;
  deposit: bigint;
  title: string;
  description: string;
  link?: string;
  messages: PollMessage[];
  votingPeriod?: number;
}

export interface EndPollResult extends PollOutcome {
  deposit: bigint;
  distribution: DistributionOutcome | null;
}

const checkText = (field: keyof typeof TEXT_LIMITS, value: string): void => {
  const { min, max } = TEXT_LIMITS[field];
  if (value.length < min || value.length > max) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, `${field} must be ${min}-${max} characters.`, {
      field,
      length: value.length,
    });
  }
};

export const pageLimit = (limit: number | undefined): number => (
  Math.min(Math.max(Math.trunc(limit ?? DEFAULT_PAGE_LIMIT), 1), MAX_PAGE_LIMIT)
);

export const findPoll = (state: AppState, pollId: number): Poll | null => (
  state.governance.polls[String(pollId)] ?? null
);

export const requirePoll = (state: AppState, pollId: number): Poll => {
  const poll = findPoll(state, pollId);
  if (!poll) throw new DomainError(ErrorCode.PollNotFound, 404, `Poll ${pollId} not found.`, { pollId });
  return poll;
};

/** Heights between which a passed poll may execute: [executableFrom, expiresAt). */
export const executionWindow = (poll: Poll, config: GovernanceConfig): { executableFrom: number; expiresAt: number } => ({
  executableFrom: poll.endHeight + config.timelockPeriod,
  expiresAt: poll.endHeight + config.expirationPeriod,
});

export const createPoll = (
  state: AppState,
  ledger: TokenLedger,
  input: CreatePollInput,
  block: BlockContext,
): Poll => {
  const { config } = state.governance;
  requireUserAccount(input.creator, 'poll creator');

  if (input.deposit < config.proposalDeposit) {
    throw new DomainError(ErrorCode.InsufficientDeposit, 400, `Deposit must be at least ${config.proposalDeposit}.`, {
      deposit: input.deposit.toString(),
      required: config.proposalDeposit.toString(),
    });
  }

  checkText('title', input.title);
  checkText('description', input.description);
  if (input.link !== undefined) checkText('link', input.link);

  if (input.messages.length > config.maxMessagesPerPoll) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, `A poll carries at most ${config.maxMessagesPerPoll} messages.`, {
      messages: input.messages.length,
    });
  }

  const votingPeriod = input.votingPeriod ?? config.votingPeriod;
  if (!Number.isSafeInteger(votingPeriod) || votingPeriod < 1) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'votingPeriod must be a positive integer.', { votingPeriod });
  }

  ledger.transferFrom(input.creator, input.deposit);

  const id = state.governance.pollCount + 1;
  state.governance.pollCount = id;
  state.governance.totalDeposit += input.deposit;

  const poll: Poll = {
    id,
    creator: input.creator,
    depositAmount: input.deposit,
    title: input.title,
    description: input.description,
    ...(input.link === undefined ? {} : { link: input.link }),
    messages: input.messages,
    status: 'in_progress',
    yesVotes: 0n,
    noVotes: 0n,
    abstainVotes: 0n,
    totalVotingPowerAtCreation: state.staking.rewardIndex.totalStaked,
    startHeight: block.height,
    endHeight: block.height + votingPeriod,
    depositResolution: 'escrowed',
    createdAt: block.now,
    updatedAt: block.now,
  };

  state.governance.polls[String(id)] = poll;
  return poll;
};

export const castVote = (
  state: AppState,
  pollId: number,
  voter: string,
  choice: VoteChoice,
  block: BlockContext,
): { poll: Poll; vote: Vote } => {
  const poll = requirePoll(state, pollId);
  if (poll.status !== 'in_progress' || block.height >= poll.endHeight) {
    throw stateConflict(ErrorCode.PollNotInProgress, `Poll ${pollId} is not accepting votes.`, {
      pollId,
      status: poll.status,
      endHeight: poll.endHeight,
      height: block.height,
    });
  }

  const vote = recordVote(state, poll, voter, choice, block);
  switch (choice) {
    case 'yes':
      poll.yesVotes += vote.power;
      break;
    case 'no':
      poll.noVotes += vote.power;
      break;
    case 'abstain':
      poll.abstainVotes += vote.power;
      break;
  }
  poll.updatedAt = block.now;

  return { poll, vote };
};

/**
 * Quorum counts every vote against the creation-time total; threshold
 * counts yes against yes + no only. A poll nobody voted on never reaches
 * quorum.
 */
export const evaluatePoll = (poll: Poll, config: GovernanceConfig): { quorumReached: boolean; thresholdReached: boolean } => {
  const tallied = talliedPower(poll);
  const decisive = poll.yesVotes + poll.noVotes;

  const quorumReached = tallied > 0n && ratioAtLeast(tallied, poll.totalVotingPowerAtCreation, config.quorum);
  const thresholdReached = decisive > 0n && ratioAtLeast(poll.yesVotes, decisive, config.threshold);

  return { quorumReached, thresholdReached };
};

const earlyPassReached = (poll: Poll, config: GovernanceConfig): boolean => (
  config.earlyPassThreshold !== null
  && ratioAtLeast(poll.yesVotes, poll.totalVotingPowerAtCreation, config.earlyPassThreshold)
);

export const endPoll = (
  state: AppState,
  ledger: TokenLedger,
  pollId: number,
  block: BlockContext,
): EndPollResult => {
  const poll = requirePoll(state, pollId);
  const { config } = state.governance;

  if (poll.status !== 'in_progress') {
    throw stateConflict(ErrorCode.PollNotInProgress, `Poll ${pollId} has already ended.`, { pollId, status: poll.status });
  }

  const { quorumReached, thresholdReached } = evaluatePoll(poll, config);
  const passed = quorumReached && thresholdReached;
  const votingOver = block.height >= poll.endHeight;
  const earlyPass = !votingOver && passed && earlyPassReached(poll, config);

  if (!votingOver && !earlyPass) {
    throw stateConflict(ErrorCode.VotingPeriodNotOver, `Poll ${pollId} is open until height ${poll.endHeight}.`, {
      pollId,
      endHeight: poll.endHeight,
      height: block.height,
    });
  }

  // Ending early closes voting now; the timelock and expiry count from here.
  if (earlyPass) poll.endHeight = block.height;

  const deposit = poll.depositAmount;
  state.governance.totalDeposit -= deposit;

  let distribution: DistributionOutcome | null = null;
  if (passed || config.rejectedDepositPolicy === 'refund') {
    ledger.transferTo(poll.creator, deposit);
    poll.depositResolution = 'refunded';
  } else {
    distribution = accrueIncome(state.staking.rewardIndex, deposit);
    poll.depositResolution = 'forfeited';
  }

  poll.status = passed ? 'passed' : 'rejected';
  poll.updatedAt = block.now;
  poll.resolvedAt = block.now;

  return { poll, quorumReached, thresholdReached, earlyPass, deposit, distribution };
};

/** A passed poll left unexecuted past its window can no longer run. */
export const expirePoll = (state: AppState, pollId: number, block: BlockContext): Poll => {
  const poll = requirePoll(state, pollId);
  if (poll.status !== 'passed') {
    throw stateConflict(ErrorCode.NotPassed, `Poll ${pollId} is ${poll.status}; only passed polls expire.`, {
      pollId,
      status: poll.status,
    });
  }

  const { expiresAt } = executionWindow(poll, state.governance.config);
  if (block.height < expiresAt) {
    throw stateConflict(ErrorCode.ExecutionWindowOpen, `Poll ${pollId} stays executable until height ${expiresAt}.`, {
      pollId,
      expiresAt,
      height: block.height,
    });
  }

  poll.status = 'expired';
  poll.updatedAt = block.now;
  poll.resolvedAt = block.now;
  return poll;
};

// ─── Queries ────────────────────────────────────────────────────────────────

export const listPolls = (state: AppState, query: PollListQuery = {}): Poll[] => {
  const order = query.order ?? 'asc';
  const { startAfter, status } = query;

  return Object.values(state.governance.polls)
    .filter((poll) => (status === undefined ? true : poll.status === status))
    .filter((poll) => {
      if (startAfter === undefined) return true;
      return order === 'asc' ? poll.id > startAfter : poll.id < startAfter;
    })
    .sort((a, b) => (order === 'asc' ? a.id - b.id : b.id - a.id))
    .slice(0, pageLimit(query.limit));
};

export const listVoters = (state: AppState, pollId: number, query: VoterListQuery = {}): Vote[] => {
  requirePoll(state, pollId);
  const { startAfter } = query;

  return Object.values(votesFor(state, pollId))
    .filter((vote) => (startAfter === undefined ? true : vote.voter > startAfter))
    .sort((a, b) => (a.voter < b.voter ? -1 : a.voter > b.voter ? 1 : 0))
    .slice(0, pageLimit(query.limit));
};
