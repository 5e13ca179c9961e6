import { describe, expect, it } from 'vitest';
import { applyConfigUpdate, ExecutionEngine } from '../src/domain/governance/executionEngine.js';
import { PollMessage } from '../src/domain/governance/pollMessages.js';
import { castVote, createPoll, endPoll, requirePoll } from '../src/domain/governance/pollRegistry.js';
import { stake } from '../src/domain/staking/stakeLedger.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { DEFAULT_GOVERNANCE_CONFIG } from '../src/infra/storage/defaultState.js';
import { COMMUNITY_ACCOUNT, CommunityPool } from '../src/integrations/community/communityPool.js';
import { OutboxContract, OwnedContractRegistry } from '../src/integrations/ownedContracts.js';
import { at, codeOf, Fixture, fund, ratio, setup } from './helpers.js';

const engine = new ExecutionEngine(
  new OwnedContractRegistry().register(new CommunityPool()).register(new OutboxContract('bridge')),
);

/** A passed poll carrying `messages`, ended at height 11 and executable over [13, 31). */
const passedPoll = (messages: PollMessage[]): Fixture => {
  const fixture = setup();
  fund(fixture, { carol: 500n, dave: 100n, [COMMUNITY_ACCOUNT]: 1000n });
  stake(fixture.state, fixture.ledger, 'carol', 500n, at(1));
  createPoll(fixture.state, fixture.ledger, {
    creator: 'dave',
    deposit: 100n,
    title: 'Batch',
    description: 'Messages to run.',
    messages,
  }, at(1));
  castVote(fixture.state, 1, 'carol', 'yes', at(2));
  endPoll(fixture.state, fixture.ledger, 1, at(11));
  return fixture;
};

describe('execution engine', () => {
  it('applies a governance config update', () => {
    const fixture = passedPoll([{ kind: 'update_config', quorum: '0.4', votingPeriod: 50 }]);

    const result = engine.execute(fixture.state, 1, at(13));

    expect(result.outcome).toBe('executed');
    expect(result.configUpdated).toBe(true);
    expect(result.poll.status).toBe('executed');
    expect(fixture.state.governance.config.quorum).toBe(ratio('0.4'));
    expect(fixture.state.governance.config.votingPeriod).toBe(50);
  });

  it('runs community spends and forwards payloads in order', () => {
    const fixture = passedPoll([
      { kind: 'community_spend', recipient: 'erin', amount: '250' },
      { kind: 'forward', contract: 'bridge', payload: { action: 'sync' } },
    ]);

    const result = engine.execute(fixture.state, 1, at(20));

    expect(result.outcome).toBe('executed');
    expect(result.configUpdated).toBe(false);
    expect(fixture.ledger.balanceOf('erin')).toBe(250n);
    expect(fixture.ledger.balanceOf(COMMUNITY_ACCOUNT)).toBe(750n);
    expect(fixture.state.outbox).toHaveLength(1);
    expect(fixture.state.outbox[0]).toMatchObject({ contract: 'bridge', pollId: 1, payload: { action: 'sync' }, height: 20 });
  });

  it('rolls back every message when one fails', () => {
    const fixture = passedPoll([
      { kind: 'community_spend', recipient: 'erin', amount: '250' },
      { kind: 'update_config', timelockPeriod: 30 },
    ]);

    const result = engine.execute(fixture.state, 1, at(13));

    expect(result.outcome).toBe('failed');
    expect(result.error).toEqual({
      index: 1,
      kind: 'update_config',
      code: ErrorCode.InvalidPayload,
      message: 'expirationPeriod must exceed timelockPeriod.',
    });
    expect(requirePoll(fixture.state, 1).status).toBe('failed');
    expect(requirePoll(fixture.state, 1).executionError?.index).toBe(1);
    expect(fixture.ledger.balanceOf('erin')).toBe(0n);
    expect(fixture.ledger.balanceOf(COMMUNITY_ACCOUNT)).toBe(1000n);
    expect(fixture.state.governance.config.timelockPeriod).toBe(2);
  });

  it('fails on forwards to contracts governance does not own', () => {
    const fixture = passedPoll([{ kind: 'forward', contract: 'elsewhere', payload: {} }]);

    const result = engine.execute(fixture.state, 1, at(13));

    expect(result.error?.code).toBe(ErrorCode.UnknownContract);
    expect(fixture.state.outbox).toEqual([]);
  });

  it('fails a spend above the pool limit', () => {
    const fixture = passedPoll([{ kind: 'community_spend', recipient: 'erin', amount: '60' }]);
    fixture.state.community.spendLimit = 50n;

    expect(engine.execute(fixture.state, 1, at(13)).error?.code).toBe(ErrorCode.SpendLimitExceeded);
  });

  it('fails a spend after governance hands the pool to another owner', () => {
    const fixture = passedPoll([
      { kind: 'community_update_config', owner: 'council' },
      { kind: 'community_spend', recipient: 'erin', amount: '10' },
    ]);

    const result = engine.execute(fixture.state, 1, at(13));

    expect(result.error).toMatchObject({ index: 1, code: ErrorCode.Unauthorized });
    expect(fixture.state.community.owner).toBe('governance');
  });

  it('executes at most once, successful or not', () => {
    const fixture = passedPoll([]);
    engine.execute(fixture.state, 1, at(13));
    expect(codeOf(() => engine.execute(fixture.state, 1, at(14)))).toBe(ErrorCode.AlreadyExecuted);

    const failing = passedPoll([{ kind: 'forward', contract: 'elsewhere', payload: {} }]);
    engine.execute(failing.state, 1, at(13));
    expect(codeOf(() => engine.execute(failing.state, 1, at(14)))).toBe(ErrorCode.AlreadyExecuted);
  });

  it('only runs inside the execution window', () => {
    const fixture = passedPoll([]);

    expect(codeOf(() => engine.execute(fixture.state, 1, at(12)))).toBe(ErrorCode.TimelockActive);
    expect(codeOf(() => engine.execute(fixture.state, 1, at(31)))).toBe(ErrorCode.ExecutionWindowClosed);
    expect(engine.execute(fixture.state, 1, at(30)).outcome).toBe('executed');
  });

  it('refuses polls that did not pass', () => {
    const fixture = setup();
    fund(fixture, { dave: 100n });
    createPoll(fixture.state, fixture.ledger, {
      creator: 'dave',
      deposit: 100n,
      title: 'Open',
      description: 'Still voting.',
      messages: [],
    }, at(1));

    expect(codeOf(() => engine.execute(fixture.state, 1, at(13)))).toBe(ErrorCode.NotPassed);
    expect(codeOf(() => engine.execute(fixture.state, 9, at(13)))).toBe(ErrorCode.PollNotFound);
  });
});

describe('applyConfigUpdate', () => {
  it('leaves the config untouched when the result is invalid', () => {
    const config = { ...DEFAULT_GOVERNANCE_CONFIG };

    expect(codeOf(() => applyConfigUpdate(config, { kind: 'update_config', threshold: '0.7', expirationPeriod: 100 })))
      .toBe(ErrorCode.InvalidPayload);
    expect(config).toEqual(DEFAULT_GOVERNANCE_CONFIG);
  });

  it('switches early pass on and off', () => {
    const config = { ...DEFAULT_GOVERNANCE_CONFIG };

    applyConfigUpdate(config, { kind: 'update_config', earlyPassThreshold: '0.66', rejectedDepositPolicy: 'refund' });
    expect(config.earlyPassThreshold).toBe(ratio('0.66'));
    expect(config.rejectedDepositPolicy).toBe('refund');

    applyConfigUpdate(config, { kind: 'update_config', earlyPassThreshold: null });
    expect(config.earlyPassThreshold).toBeNull();
  });
});
