import { describe, expect, it } from 'vitest';
import { accrueIncome, depositIncome, outstandingRewards } from '../src/domain/rewards/rewardDistributor.js';
import { claimableReward, stake } from '../src/domain/staking/stakeLedger.js';
import { DomainError, ErrorCode } from '../src/errors/taxonomy.js';
import { COMMUNITY_ACCOUNT, GOVERNANCE_ACCOUNT } from '../src/infra/storage/defaultState.js';
import { at, codeOf, fund, setup } from './helpers.js';

describe('reward distributor', () => {
  it('raises the index by amount over total stake', () => {
    const fixture = setup();
    fund(fixture, { alice: 300n, bob: 700n, fees: 100n });
    stake(fixture.state, fixture.ledger, 'alice', 300n, at(1));
    stake(fixture.state, fixture.ledger, 'bob', 700n, at(1));

    const outcome = depositIncome(fixture.state, fixture.ledger, 'fees', 100n);

    expect(outcome).toEqual({ status: 'distributed', amount: 100n, indexDelta: 10n ** 17n, globalIndex: 10n ** 17n });
    expect(claimableReward(fixture.state, 'alice')).toBe(30n);
    expect(claimableReward(fixture.state, 'bob')).toBe(70n);
    expect(fixture.ledger.balanceOf('fees')).toBe(0n);
  });

  it('carries the division remainder into the next deposit', () => {
    const fixture = setup();
    fund(fixture, { alice: 3n });
    stake(fixture.state, fixture.ledger, 'alice', 3n, at(1));
    const index = fixture.state.staking.rewardIndex;

    accrueIncome(index, 1n);
    expect(index.globalIndex).toBe(333333333333333333n);
    expect(index.carry).toBe(1n);

    accrueIncome(index, 1n);
    expect(index.carry).toBe(2n);

    accrueIncome(index, 1n);
    expect(index.globalIndex).toBe(10n ** 18n);
    expect(index.carry).toBe(0n);
    expect(claimableReward(fixture.state, 'alice')).toBe(3n);
  });

  it('treats zero income as a no-op without touching balances', () => {
    const fixture = setup();
    const outcome = depositIncome(fixture.state, fixture.ledger, 'fees', 0n);

    expect(outcome).toEqual({ status: 'noop' });
    expect(fixture.state.staking.rewardIndex.totalIncome).toBe(0n);
  });

  it('rejects negative income', () => {
    const fixture = setup();
    expect(() => accrueIncome(fixture.state.staking.rewardIndex, -1n)).toThrow(DomainError);
  });

  it('withholds income while nobody is staked and releases it to the first staker', () => {
    const fixture = setup();
    fund(fixture, { fees: 100n, alice: 400n });

    const outcome = depositIncome(fixture.state, fixture.ledger, 'fees', 100n);
    expect(outcome).toEqual({ status: 'withheld', reason: 'no_stakers', amount: 100n, withheldIncome: 100n });
    expect(fixture.state.staking.rewardIndex.globalIndex).toBe(0n);
    expect(outstandingRewards(fixture.state)).toBe(0n);

    stake(fixture.state, fixture.ledger, 'alice', 400n, at(2));

    expect(fixture.state.staking.rewardIndex.withheldIncome).toBe(0n);
    expect(fixture.state.staking.rewardIndex.globalIndex).toBe(25n * 10n ** 16n);
    expect(claimableReward(fixture.state, 'alice')).toBe(100n);
    expect(outstandingRewards(fixture.state)).toBe(100n);
  });

  it('fails the deposit when the source lacks funds', () => {
    const fixture = setup();
    fund(fixture, { fees: 5n });

    expect(codeOf(() => depositIncome(fixture.state, fixture.ledger, 'fees', 6n))).toBe(ErrorCode.InsufficientBalance);
    expect(fixture.state.staking.rewardIndex.totalIncome).toBe(0n);
  });

  it('refuses income booked from the treasury or the community pool', () => {
    const fixture = setup();
    fund(fixture, { alice: 100n, [COMMUNITY_ACCOUNT]: 40n });
    stake(fixture.state, fixture.ledger, 'alice', 100n, at(1));

    expect(codeOf(() => depositIncome(fixture.state, fixture.ledger, GOVERNANCE_ACCOUNT, 50n))).toBe(ErrorCode.ReservedAccount);
    expect(codeOf(() => depositIncome(fixture.state, fixture.ledger, COMMUNITY_ACCOUNT, 40n))).toBe(ErrorCode.ReservedAccount);

    const index = fixture.state.staking.rewardIndex;
    expect(index.totalIncome).toBe(0n);
    expect(index.globalIndex).toBe(0n);
    expect(claimableReward(fixture.state, 'alice')).toBe(0n);
    expect(fixture.ledger.balanceOf(COMMUNITY_ACCOUNT)).toBe(40n);
  });
});
