/**
 * Governance commands and queries.
 *
 * Stakers open polls with a deposit, vote with their current stake, and
 * anyone can end, execute or expire a poll once its height allows it.
 */

import { enterBlock, HeightSource } from '../domain/chain/heightSource.js';
import { ExecuteResult, ExecutionEngine } from '../domain/governance/executionEngine.js';
import { PollListQuery, PollStatus, VoteChoice, VoterListQuery } from '../domain/governance/governanceTypes.js';
import {
  castVote,
  createPoll,
  CreatePollInput,
  endPoll,
  EndPollResult,
  expirePoll,
  findPoll,
  listPolls,
  listVoters,
} from '../domain/governance/pollRegistry.js';
import { findVote } from '../domain/governance/voteSnapshot.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { EventBus, eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { StateTokenLedger } from '../integrations/token/tokenLedger.js';
import { OutboxEntry } from '../types.js';
import { formatAmount } from '../utils/amount.js';
import { ConfigView, PollView, toConfigView, toPollView, toVoteView, VoteView } from './views.js';

export interface CastVoteResult {
  poll: PollView;
  vote: VoteView;
}

export interface EndPollView {
  poll: PollView;
  quorumReached: boolean;
  thresholdReached: boolean;
  earlyPass: boolean;
}

export interface ExecutePollView {
  poll: PollView;
  outcome: ExecuteResult['outcome'];
  configUpdated: boolean;
}

const eventForStatus = (status: PollStatus): 'poll.executed' | 'poll.failed' => (
  status === 'executed' ? 'poll.executed' : 'poll.failed'
);

export class GovernanceService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly heights: HeightSource,
    private readonly engine: ExecutionEngine,
    private readonly bus: EventBus = eventBus,
  ) {}

  /**
   * Open a poll. The deposit is taken from the creator's token balance and
   * held until the poll ends.
   */
  async createPoll(input: CreatePollInput): Promise<PollView> {
    const poll = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      const created = createPoll(state, new StateTokenLedger(state), input, block);
      state.metrics.pollsCreated += 1;
      return toPollView(created, state.governance.config);
    });

    this.bus.emit('poll.created', poll);
    await this.logger.log('info', 'poll.created', {
      pollId: poll.id,
      creator: poll.creator,
      deposit: poll.depositAmount,
      endHeight: poll.endHeight,
      messages: poll.messages.length,
    });
    return poll;
  }

  async castVote(pollId: number, voter: string, choice: VoteChoice): Promise<CastVoteResult> {
    const result = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      const { poll, vote } = castVote(state, pollId, voter, choice, block);
      state.metrics.votesCast += 1;
      return { poll: toPollView(poll, state.governance.config), vote: toVoteView(vote) };
    });

    this.bus.emit('poll.voted', result.vote);
    await this.logger.log('info', 'poll.voted', result.vote);
    return result;
  }

  async endPoll(pollId: number): Promise<EndPollView> {
    const { result, view } = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      const ended: EndPollResult = endPoll(state, new StateTokenLedger(state), pollId, block);
      return {
        result: ended,
        view: {
          poll: toPollView(ended.poll, state.governance.config),
          quorumReached: ended.quorumReached,
          thresholdReached: ended.thresholdReached,
          earlyPass: ended.earlyPass,
        },
      };
    });

    this.bus.emit('poll.ended', view);
    await this.logger.log('info', 'poll.ended', {
      pollId,
      status: view.poll.status,
      quorumReached: result.quorumReached,
      thresholdReached: result.thresholdReached,
      earlyPass: result.earlyPass,
      deposit: formatAmount(result.deposit),
      depositResolution: view.poll.depositResolution,
      distribution: result.distribution?.status ?? null,
    });
    return view;
  }

  /**
   * Run a passed poll's messages. A failing message does not raise: the
   * poll comes back with status `failed` and the batch's effects discarded.
   */
  async executePoll(pollId: number): Promise<ExecutePollView> {
    const view = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      const result = this.engine.execute(state, pollId, block);
      if (result.outcome === 'executed') state.metrics.pollsExecuted += 1;
      else state.metrics.pollsFailed += 1;
      return {
        poll: toPollView(result.poll, state.governance.config),
        outcome: result.outcome,
        configUpdated: result.configUpdated,
      };
    });

    this.bus.emit(eventForStatus(view.poll.status), view);
    if (view.configUpdated) this.bus.emit('config.updated', this.getConfig());

    if (view.outcome === 'executed') {
      await this.logger.log('info', 'poll.executed', { pollId, messages: view.poll.messages.length });
    } else {
      await this.logger.log('warn', 'poll.failed', { pollId, error: view.poll.executionError });
    }
    return view;
  }

  async expirePoll(pollId: number): Promise<PollView> {
    const poll = await this.store.transaction((state) => {
      const block = enterBlock(state.chain, this.heights);
      return toPollView(expirePoll(state, pollId, block), state.governance.config);
    });

    this.bus.emit('poll.expired', poll);
    await this.logger.log('info', 'poll.expired', { pollId });
    return poll;
  }

  // ─── Queries ──────────────────────────────────────────────────────────

  getPoll(pollId: number): PollView | null {
    const state = this.store.snapshot();
    const poll = findPoll(state, pollId);
    return poll ? toPollView(poll, state.governance.config) : null;
  }

  listPolls(query: PollListQuery = {}): PollView[] {
    const state = this.store.snapshot();
    return listPolls(state, query).map((poll) => toPollView(poll, state.governance.config));
  }

  getVote(pollId: number, voter: string): VoteView {
    const state = this.store.snapshot();
    if (!findPoll(state, pollId)) {
      throw new DomainError(ErrorCode.PollNotFound, 404, `Poll ${pollId} not found.`, { pollId });
    }
    const vote = findVote(state, pollId, voter);
    if (!vote) {
      throw new DomainError(ErrorCode.VoteNotFound, 404, `${voter} has not voted on poll ${pollId}.`, { pollId, voter });
    }
    return toVoteView(vote);
  }

  listVoters(pollId: number, query: VoterListQuery = {}): VoteView[] {
    return listVoters(this.store.snapshot(), pollId, query).map(toVoteView);
  }

  getConfig(): ConfigView {
    return toConfigView(this.store.snapshot().governance.config);
  }

  listOutbox(contract?: string): OutboxEntry[] {
    const { outbox } = this.store.snapshot();
    return contract === undefined ? outbox : outbox.filter((entry) => entry.contract === contract);
  }
}
