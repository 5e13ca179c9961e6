import { describe, expect, it } from 'vitest';
import {
  castVote,
  createPoll,
  CreatePollInput,
  endPoll,
  expirePoll,
  listPolls,
  listVoters,
  requirePoll,
} from '../src/domain/governance/pollRegistry.js';
import { findVote, tallyIsConsistent } from '../src/domain/governance/voteSnapshot.js';
import { GovernanceConfig } from '../src/domain/governance/governanceTypes.js';
import { claimableReward, stake, unstake } from '../src/domain/staking/stakeLedger.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { at, codeOf, Fixture, fund, ratio, setup } from './helpers.js';

const proposal = (overrides: Partial<CreatePollInput> = {}): CreatePollInput => ({
  creator: 'dave',
  deposit: 100n,
  title: 'Raise the quorum',
  description: 'Tighten participation requirements.',
  messages: [],
  ...overrides,
});

/** alice 300, bob 200 and carol 500 staked; dave holds one deposit. */
const staked = (overrides: Partial<GovernanceConfig> = {}): Fixture => {
  const fixture = setup(overrides);
  fund(fixture, { alice: 300n, bob: 200n, carol: 500n, dave: 100n });
  stake(fixture.state, fixture.ledger, 'alice', 300n, at(1));
  stake(fixture.state, fixture.ledger, 'bob', 200n, at(1));
  stake(fixture.state, fixture.ledger, 'carol', 500n, at(1));
  return fixture;
};

describe('poll registry', () => {
  it('escrows the deposit and snapshots total stake on creation', () => {
    const fixture = staked();
    const poll = createPoll(fixture.state, fixture.ledger, proposal(), at(1));

    expect(poll.id).toBe(1);
    expect(poll.status).toBe('in_progress');
    expect(poll.startHeight).toBe(1);
    expect(poll.endHeight).toBe(11);
    expect(poll.totalVotingPowerAtCreation).toBe(1000n);
    expect(poll.depositResolution).toBe('escrowed');
    expect(fixture.ledger.balanceOf('dave')).toBe(0n);
    expect(fixture.state.governance.totalDeposit).toBe(100n);
  });

  it('validates deposit, text and message count before taking funds', () => {
    const fixture = staked();

    expect(codeOf(() => createPoll(fixture.state, fixture.ledger, proposal({ deposit: 99n }), at(1))))
      .toBe(ErrorCode.InsufficientDeposit);
    expect(codeOf(() => createPoll(fixture.state, fixture.ledger, proposal({ title: 'abc' }), at(1))))
      .toBe(ErrorCode.InvalidPayload);
    expect(codeOf(() => createPoll(fixture.state, fixture.ledger, proposal({ link: 'short' }), at(1))))
      .toBe(ErrorCode.InvalidPayload);
    expect(codeOf(() => createPoll(fixture.state, fixture.ledger, proposal({
      messages: Array.from({ length: 5 }, () => ({ kind: 'community_spend' as const, recipient: 'erin', amount: '1' })),
    }), at(1)))).toBe(ErrorCode.InvalidPayload);

    expect(fixture.ledger.balanceOf('dave')).toBe(100n);
    expect(fixture.state.governance.pollCount).toBe(0);
  });

  it('passes with quorum and threshold met and refunds the deposit', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'alice', 'yes', at(2));
    castVote(fixture.state, 1, 'bob', 'no', at(2));

    const result = endPoll(fixture.state, fixture.ledger, 1, at(11));

    expect(result.poll.status).toBe('passed');
    expect(result.quorumReached).toBe(true);
    expect(result.thresholdReached).toBe(true);
    expect(result.earlyPass).toBe(false);
    expect(result.poll.depositResolution).toBe('refunded');
    expect(fixture.ledger.balanceOf('dave')).toBe(100n);
    expect(fixture.state.governance.totalDeposit).toBe(0n);
  });

  it('rejects below quorum and forfeits the deposit to stakers', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'bob', 'no', at(2));

    const result = endPoll(fixture.state, fixture.ledger, 1, at(11));

    expect(result.poll.status).toBe('rejected');
    expect(result.quorumReached).toBe(false);
    expect(result.poll.depositResolution).toBe('forfeited');
    expect(result.distribution).toEqual({ status: 'distributed', amount: 100n, indexDelta: 10n ** 17n, globalIndex: 10n ** 17n });
    expect(claimableReward(fixture.state, 'alice')).toBe(30n);
    expect(claimableReward(fixture.state, 'bob')).toBe(20n);
    expect(claimableReward(fixture.state, 'carol')).toBe(50n);
  });

  it('refunds rejected deposits under the refund policy', () => {
    const fixture = staked({ rejectedDepositPolicy: 'refund' });
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'bob', 'no', at(2));

    const result = endPoll(fixture.state, fixture.ledger, 1, at(11));

    expect(result.poll.status).toBe('rejected');
    expect(result.poll.depositResolution).toBe('refunded');
    expect(result.distribution).toBeNull();
    expect(fixture.ledger.balanceOf('dave')).toBe(100n);
  });

  it('rejects a poll nobody voted on, even with a zero quorum', () => {
    const fixture = staked({ quorum: 0n });
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));

    const result = endPoll(fixture.state, fixture.ledger, 1, at(11));
    expect(result.poll.status).toBe('rejected');
    expect(result.quorumReached).toBe(false);
  });

  it('rejects when nothing was staked at creation', () => {
    const fixture = setup();
    fund(fixture, { alice: 300n, dave: 100n });
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    stake(fixture.state, fixture.ledger, 'alice', 300n, at(2));

    expect(codeOf(() => castVote(fixture.state, 1, 'alice', 'yes', at(2)))).toBe(ErrorCode.VotingPowerExhausted);
    expect(endPoll(fixture.state, fixture.ledger, 1, at(11)).poll.status).toBe('rejected');
  });

  it('caps late stake so the tally stays within the creation-time total', () => {
    const fixture = setup();
    fund(fixture, { alice: 100n, whale: 10_000n, dave: 100n });
    stake(fixture.state, fixture.ledger, 'alice', 100n, at(1));
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    stake(fixture.state, fixture.ledger, 'whale', 10_000n, at(2));

    const { vote } = castVote(fixture.state, 1, 'whale', 'yes', at(2));
    expect(vote.power).toBe(100n);
    expect(codeOf(() => castVote(fixture.state, 1, 'alice', 'no', at(3)))).toBe(ErrorCode.VotingPowerExhausted);

    const poll = requirePoll(fixture.state, 1);
    expect(poll.yesVotes + poll.noVotes + poll.abstainVotes).toBe(100n);
    expect(tallyIsConsistent(fixture.state, poll)).toBe(true);
  });

  it('bounds stake recycled through another account by the creation-time total', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'carol', 'yes', at(2));
    unstake(fixture.state, fixture.ledger, 'carol', 500n, at(3));
    fixture.ledger.transfer('carol', 'erin', 500n);
    stake(fixture.state, fixture.ledger, 'erin', 500n, at(3));
    castVote(fixture.state, 1, 'erin', 'yes', at(3));

    const poll = requirePoll(fixture.state, 1);
    expect(poll.yesVotes).toBe(1000n);
    expect(poll.noVotes).toBe(0n);
    expect(findVote(fixture.state, 1, 'erin')?.power).toBe(500n);
    expect(codeOf(() => castVote(fixture.state, 1, 'alice', 'no', at(4)))).toBe(ErrorCode.VotingPowerExhausted);
    expect(tallyIsConsistent(fixture.state, poll)).toBe(true);
  });

  it('flags a tally that exceeds the creation-time total', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'carol', 'yes', at(2));

    const poll = requirePoll(fixture.state, 1);
    expect(tallyIsConsistent(fixture.state, { ...poll, totalVotingPowerAtCreation: 400n })).toBe(false);
    expect(tallyIsConsistent(fixture.state, { ...poll, yesVotes: 400n })).toBe(false);
  });

  it('keeps custodial accounts from opening polls or voting', () => {
    const fixture = staked();
    fund(fixture, { governance: 100n });

    expect(codeOf(() => createPoll(fixture.state, fixture.ledger, proposal({ creator: 'governance' }), at(1))))
      .toBe(ErrorCode.ReservedAccount);
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    expect(codeOf(() => castVote(fixture.state, 1, 'governance', 'yes', at(2)))).toBe(ErrorCode.ReservedAccount);
    expect(codeOf(() => castVote(fixture.state, 1, 'community', 'yes', at(2)))).toBe(ErrorCode.ReservedAccount);
    expect(fixture.state.governance.pollCount).toBe(1);
  });

  it('fails the threshold when yes does not reach the ratio of decisive votes', () => {
    const fixture = staked({ threshold: ratio('0.6') });
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'alice', 'yes', at(2));
    castVote(fixture.state, 1, 'bob', 'no', at(2));
    castVote(fixture.state, 1, 'carol', 'abstain', at(2));

    const result = endPoll(fixture.state, fixture.ledger, 1, at(11));
    expect(result.quorumReached).toBe(true);
    expect(result.thresholdReached).toBe(true);

    const strict = staked({ threshold: ratio('0.61') });
    createPoll(strict.state, strict.ledger, proposal(), at(1));
    castVote(strict.state, 1, 'alice', 'yes', at(2));
    castVote(strict.state, 1, 'bob', 'no', at(2));
    expect(endPoll(strict.state, strict.ledger, 1, at(11)).thresholdReached).toBe(false);
  });

  it('accepts one vote per voter and only from stakers', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'alice', 'yes', at(2));

    expect(codeOf(() => castVote(fixture.state, 1, 'alice', 'no', at(3)))).toBe(ErrorCode.AlreadyVoted);
    expect(codeOf(() => castVote(fixture.state, 1, 'erin', 'yes', at(3)))).toBe(ErrorCode.NoStake);
    expect(codeOf(() => castVote(fixture.state, 2, 'bob', 'yes', at(3)))).toBe(ErrorCode.PollNotFound);
    expect(codeOf(() => castVote(fixture.state, 1, 'bob', 'yes', at(11)))).toBe(ErrorCode.PollNotInProgress);

    const poll = requirePoll(fixture.state, 1);
    expect(poll.yesVotes).toBe(300n);
    expect(poll.noVotes).toBe(0n);
    expect(tallyIsConsistent(fixture.state, poll)).toBe(true);
  });

  it('keeps cast votes intact after the voter unstakes', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'alice', 'yes', at(2));
    unstake(fixture.state, fixture.ledger, 'alice', 300n, at(3));
    castVote(fixture.state, 1, 'bob', 'no', at(4));

    const poll = requirePoll(fixture.state, 1);
    expect(poll.yesVotes).toBe(300n);
    expect(poll.totalVotingPowerAtCreation).toBe(1000n);
    expect(endPoll(fixture.state, fixture.ledger, 1, at(11)).poll.status).toBe('passed');
  });

  it('refuses to end before the voting period unless early pass applies', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'alice', 'yes', at(2));
    castVote(fixture.state, 1, 'carol', 'yes', at(2));

    expect(codeOf(() => endPoll(fixture.state, fixture.ledger, 1, at(3)))).toBe(ErrorCode.VotingPeriodNotOver);

    const early = staked({ earlyPassThreshold: ratio('0.5') });
    createPoll(early.state, early.ledger, proposal(), at(1));
    castVote(early.state, 1, 'alice', 'yes', at(2));
    castVote(early.state, 1, 'carol', 'yes', at(2));

    const result = endPoll(early.state, early.ledger, 1, at(3));
    expect(result.earlyPass).toBe(true);
    expect(result.poll.status).toBe('passed');
    expect(result.poll.endHeight).toBe(3);
  });

  it('does not end early on yes power below the early-pass ratio', () => {
    const fixture = staked({ earlyPassThreshold: ratio('0.5') });
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'alice', 'yes', at(2));

    expect(codeOf(() => endPoll(fixture.state, fixture.ledger, 1, at(3)))).toBe(ErrorCode.VotingPeriodNotOver);
  });

  it('ends a poll only once', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    endPoll(fixture.state, fixture.ledger, 1, at(11));

    expect(codeOf(() => endPoll(fixture.state, fixture.ledger, 1, at(12)))).toBe(ErrorCode.PollNotInProgress);
  });

  it('expires a passed poll once its execution window closes', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'carol', 'yes', at(2));
    endPoll(fixture.state, fixture.ledger, 1, at(11));

    expect(codeOf(() => expirePoll(fixture.state, 1, at(30)))).toBe(ErrorCode.ExecutionWindowOpen);
    expect(expirePoll(fixture.state, 1, at(31)).status).toBe('expired');
    expect(codeOf(() => expirePoll(fixture.state, 1, at(32)))).toBe(ErrorCode.NotPassed);
  });

  it('lists polls by status and pages through them in either order', () => {
    const fixture = staked();
    fund(fixture, { dave: 300n });
    for (let index = 0; index < 4; index += 1) {
      createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    }
    endPoll(fixture.state, fixture.ledger, 2, at(11));

    expect(listPolls(fixture.state).map((poll) => poll.id)).toEqual([1, 2, 3, 4]);
    expect(listPolls(fixture.state, { startAfter: 2, limit: 1 }).map((poll) => poll.id)).toEqual([3]);
    expect(listPolls(fixture.state, { order: 'desc', startAfter: 3 }).map((poll) => poll.id)).toEqual([2, 1]);
    expect(listPolls(fixture.state, { status: 'rejected' }).map((poll) => poll.id)).toEqual([2]);
  });

  it('lists voters in address order after a cursor', () => {
    const fixture = staked();
    createPoll(fixture.state, fixture.ledger, proposal(), at(1));
    castVote(fixture.state, 1, 'carol', 'yes', at(2));
    castVote(fixture.state, 1, 'alice', 'no', at(2));
    castVote(fixture.state, 1, 'bob', 'abstain', at(2));

    expect(listVoters(fixture.state, 1).map((vote) => vote.voter)).toEqual(['alice', 'bob', 'carol']);
    expect(listVoters(fixture.state, 1, { startAfter: 'alice', limit: 1 }).map((vote) => vote.voter)).toEqual(['bob']);
  });
});
