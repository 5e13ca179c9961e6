/**
 * Poll and vote types.
 *
 * Tallies and deposits are base-unit amounts; quorum and thresholds are
 * scaled decimals. Heights are block heights, never wall time.
 */

import type { PollMessage, PollMessageKind } from './pollMessages.js';

export type PollStatus =
  | 'in_progress'
  | 'passed'
  | 'rejected'
  | 'executed'
  | 'expired'
  | 'failed';

export type VoteChoice = 'yes' | 'no' | 'abstain';

export type DepositPolicy = 'forfeit' | 'refund';

/** What happened to the creator's deposit when the poll left in_progress. */
export type DepositResolution = 'escrowed' | 'refunded' | 'forfeited';

export interface GovernanceConfig {
  quorum: bigint;
  threshold: bigint;
  votingPeriod: number;
  /** Blocks after end_height before a passed poll may execute. */
  timelockPeriod: number;
  /** Blocks after end_height a passed poll stays executable. */
  expirationPeriod: number;
  proposalDeposit: bigint;
  maxMessagesPerPoll: number;
  /** Share of the creation-time voting power that settles a poll early. Null disables it. */
  earlyPassThreshold: bigint | null;
  rejectedDepositPolicy: DepositPolicy;
}

export interface ExecutionError {
  index: number;
  kind: PollMessageKind;
  code: string;
  message: string;
}

export interface Poll {
  id: number;
  creator: string;
  depositAmount: bigint;
  title: string;
  description: string;
  link?: string;
  messages: PollMessage[];
  status: PollStatus;
  yesVotes: bigint;
  noVotes: bigint;
  abstainVotes: bigint;
  totalVotingPowerAtCreation: bigint;
  startHeight: number;
  endHeight: number;
  depositResolution: DepositResolution;
  executionError?: ExecutionError;
  createdAt: string;
  updatedAt: string;
  resolvedAt?: string;
}

export interface Vote {
  pollId: number;
  voter: string;
  choice: VoteChoice;
  power: bigint;
  height: number;
  castAt: string;
}

export interface GovernanceState {
  config: GovernanceConfig;
  pollCount: number;
  /** Deposits currently held in escrow. */
  totalDeposit: bigint;
  polls: Record<string, Poll>;
  /** Votes by poll id, then voter. */
  votes: Record<string, Record<string, Vote>>;
}

export interface PollOutcome {
  poll: Poll;
  quorumReached: boolean;
  thresholdReached: boolean;
  earlyPass: boolean;
}

export interface PollListQuery {
  status?: PollStatus;
  startAfter?: number;
  limit?: number;
  order?: 'asc' | 'desc';
}

export interface VoterListQuery {
  startAfter?: string;
  limit?: number;
}
