/**
 * One vote per (poll, voter), weighted by the voter's stake at the moment
 * the vote is cast. The recorded power never changes afterwards, whatever
 * the voter does with their stake.
 *
 * A poll's tally never exceeds the total stake at its creation: a vote is
 * weighted by at most the power the poll has left to count.
 */

import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { requireUserAccount } from '../../integrations/token/tokenLedger.js';
import { AppState } from '../../types.js';
import { BlockContext } from '../chain/heightSource.js';
import { stakedBalance } from '../staking/stakeLedger.js';
import { Poll, Vote, VoteChoice } from './governanceTypes.js';

export const votesFor = (state: AppState, pollId: number): Record<string, Vote> => (
  state.governance.votes[String(pollId)] ?? {}
);

export const findVote = (state: AppState, pollId: number, voter: string): Vote | null => (
  votesFor(state, pollId)[voter] ?? null
);

export const talliedPower = (poll: Poll): bigint => poll.yesVotes + poll.noVotes + poll.abstainVotes;

/** Power the poll can still count before its tally reaches the creation-time total. */
export const remainingVotingPower = (poll: Poll): bigint => {
  const remaining = poll.totalVotingPowerAtCreation - talliedPower(poll);
  return remaining > 0n ? remaining : 0n;
};

export const recordVote = (
  state: AppState,
  poll: Poll,
  voter: string,
  choice: VoteChoice,
  block: BlockContext,
): Vote => {
  requireUserAccount(voter, 'voter');
  if (findVote(state, poll.id, voter)) {
    throw new DomainError(ErrorCode.AlreadyVoted, 409, `${voter} already voted on poll ${poll.id}.`, {
      pollId: poll.id,
      voter,
    });
  }

  const staked = stakedBalance(state, voter);
  if (staked === 0n) {
    throw new DomainError(ErrorCode.NoStake, 409, `${voter} has no staked balance to vote with.`, { voter });
  }

  const remaining = remainingVotingPower(poll);
  if (remaining === 0n) {
    throw new DomainError(ErrorCode.VotingPowerExhausted, 409, `Poll ${poll.id} has counted its full voting power.`, {
      pollId: poll.id,
      totalVotingPowerAtCreation: poll.totalVotingPowerAtCreation.toString(),
    });
  }
  const power = staked < remaining ? staked : remaining;

  const vote: Vote = {
    pollId: poll.id,
    voter,
    choice,
    power,
    height: block.height,
    castAt: block.now,
  };

  const key = String(poll.id);
  state.governance.votes[key] = { ...votesFor(state, poll.id), [voter]: vote };
  return vote;
};

/**
 * Tallies must equal the per-choice sum of recorded vote powers, and their
 * total can never exceed the stake the poll snapshotted at creation.
 */
export const tallyIsConsistent = (state: AppState, poll: Poll): boolean => {
  const sums: Record<VoteChoice, bigint> = { yes: 0n, no: 0n, abstain: 0n };
  for (const vote of Object.values(votesFor(state, poll.id))) {
    sums[vote.choice] += vote.power;
  }

  return sums.yes === poll.yesVotes
    && sums.no === poll.noVotes
    && sums.abstain === poll.abstainVotes
    && talliedPower(poll) <= poll.totalVotingPowerAtCreation;
};
