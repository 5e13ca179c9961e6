/**
 * Staking commands: stake, unstake, claim, income.
 *
 * Every command runs in one store transaction; token movements and the
 * stake books commit together or not at all.
 */

import { CommandContext, enterBlock, HeightSource } from '../domain/chain/heightSource.js';
import { depositIncome } from '../domain/rewards/rewardDistributor.js';
import { claimReward, claimableReward, stake, unstake } from '../domain/staking/stakeLedger.js';
import { DistributionOutcome, RewardClaim, StakeChange } from '../domain/staking/stakingTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { EventBus, eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { StateTokenLedger } from '../integrations/token/tokenLedger.js';
import { formatAmount } from '../utils/amount.js';
import {
  StakerView,
  StateView,
  toDistributionView,
  toStakeChangeView,
  toStakerView,
  toStateView,
} from './views.js';

export interface IncomeResult {
  outcome: DistributionOutcome;
  block: CommandContext;
}

export class StakingService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly heights: HeightSource,
    private readonly bus: EventBus = eventBus,
  ) {}

  async stake(account: string, amount: bigint): Promise<StakeChange> {
    const { change, block } = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      return { change: stake(state, new StateTokenLedger(state), account, amount, block), block };
    });

    const view = { ...toStakeChangeView(change), height: block.height, sequence: block.sequence };
    this.bus.emit('stake.deposited', view);
    await this.logger.log('info', 'stake.deposited', view);
    return change;
  }

  async unstake(account: string, amount: bigint): Promise<StakeChange> {
    const { change, block } = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      return { change: unstake(state, new StateTokenLedger(state), account, amount, block), block };
    });

    const view = { ...toStakeChangeView(change), height: block.height, sequence: block.sequence };
    this.bus.emit('stake.withdrawn', view);
    await this.logger.log('info', 'stake.withdrawn', view);
    return change;
  }

  async claimReward(account: string): Promise<RewardClaim> {
    const { claim, block } = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      return { claim: claimReward(state, new StateTokenLedger(state), account, block), block };
    });

    const view = { account, amount: formatAmount(claim.amount), height: block.height, sequence: block.sequence };
    this.bus.emit('reward.claimed', view);
    await this.logger.log('info', 'reward.claimed', view);
    return claim;
  }

  /**
   * Income pushed by the fee forwarder. Zero is accepted and does nothing;
   * with nobody staked the income is withheld for the first staker.
   */
  async depositIncome(from: string, amount: bigint): Promise<IncomeResult> {
    const result = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      const outcome = depositIncome(state, new StateTokenLedger(state), from, amount);
      if (outcome.status !== 'noop') state.metrics.incomeDeposits += 1;
      return { outcome, block };
    });

    const view = { from, ...toDistributionView(result.outcome), height: result.block.height, sequence: result.block.sequence };
    if (result.outcome.status === 'distributed') {
      this.bus.emit('income.deposited', view);
      await this.logger.log('info', 'income.deposited', view);
    } else if (result.outcome.status === 'withheld') {
      this.bus.emit('income.withheld', view);
      await this.logger.log('warn', 'income.withheld', view);
    }
    return result;
  }

  /** Development faucet; the routes only expose it when enabled in config. */
  async mint(account: string, amount: bigint): Promise<bigint> {
    const balance = await this.store.transaction((state) => {
      enterBlock(state.chain, this.heights);
      const ledger = new StateTokenLedger(state);
      ledger.mint(account, amount);
      return ledger.balanceOf(account);
    });

    await this.logger.log('debug', 'token.minted', { account, amount: formatAmount(amount) });
    return balance;
  }

  getStaker(account: string): StakerView {
    const state = this.store.snapshot();
    if (!state.staking.stakes[account]) {
      throw new DomainError(ErrorCode.StakerNotFound, 404, `${account} has never staked.`, { account });
    }
    return toStakerView(state, account);
  }

  claimableReward(account: string): bigint {
    return claimableReward(this.store.snapshot(), account);
  }

  tokenBalance(account: string): bigint {
    return this.store.snapshot().token.balances[account] ?? 0n;
  }

  getState(): StateView {
    return toStateView(this.store.snapshot());
  }
}
