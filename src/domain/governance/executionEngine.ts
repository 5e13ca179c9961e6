/**
 * Runs the messages of a passed poll, once.
 *
 * The batch runs in order against a savepoint of the state. Either every
 * message succeeds and the savepoint is committed, or the first failure
 * discards it and the poll is marked failed. Nothing a failed batch did
 * survives; only the poll's own status changes.
 */

import { DomainError, ErrorCode, stateConflict } from '../../errors/taxonomy.js';
import { GOVERNANCE_ACCOUNT } from '../../infra/storage/defaultState.js';
import { withSavepoint } from '../../infra/storage/stateStore.js';
import { OwnedContractRegistry } from '../../integrations/ownedContracts.js';
import { StateTokenLedger } from '../../integrations/token/tokenLedger.js';
import { AppState } from '../../types.js';
import { parseAmount, parseDecimal } from '../../utils/amount.js';
import { BlockContext } from '../chain/heightSource.js';
import { ExecutionError, GovernanceConfig, Poll } from './governanceTypes.js';
import { PollMessage, UpdateConfigMessage } from './pollMessages.js';
import { executionWindow, requirePoll } from './pollRegistry.js';

export interface ExecuteResult {
  poll: Poll;
  outcome: 'executed' | 'failed';
  error?: ExecutionError;
  configUpdated: boolean;
}

class MessageFailure extends Error {
  constructor(readonly detail: ExecutionError) {
    super(detail.message);
  }
}

const ratio = (field: string, value: string): bigint => {
  const parsed = parseDecimal(value);
  if (parsed === null) throw new DomainError(ErrorCode.InvalidPayload, 400, `${field} is not a decimal.`);
  return parsed;
};

/** Apply a governance self-update. Rejects a config whose execution window would be empty. */
export const applyConfigUpdate = (config: GovernanceConfig, message: UpdateConfigMessage): void => {
  const next: GovernanceConfig = { ...config };

  if (message.quorum !== undefined) next.quorum = ratio('quorum', message.quorum);
  if (message.threshold !== undefined) next.threshold = ratio('threshold', message.threshold);
  if (message.votingPeriod !== undefined) next.votingPeriod = message.votingPeriod;
  if (message.timelockPeriod !== undefined) next.timelockPeriod = message.timelockPeriod;
  if (message.expirationPeriod !== undefined) next.expirationPeriod = message.expirationPeriod;
  if (message.maxMessagesPerPoll !== undefined) next.maxMessagesPerPoll = message.maxMessagesPerPoll;
  if (message.rejectedDepositPolicy !== undefined) next.rejectedDepositPolicy = message.rejectedDepositPolicy;
  if (message.earlyPassThreshold !== undefined) {
    next.earlyPassThreshold = message.earlyPassThreshold === null
      ? null
      : ratio('earlyPassThreshold', message.earlyPassThreshold);
  }
  if (message.proposalDeposit !== undefined) {
    const deposit = parseAmount(message.proposalDeposit);
    if (deposit === null) throw new DomainError(ErrorCode.InvalidAmount, 400, 'proposalDeposit is not an amount.');
    next.proposalDeposit = deposit;
  }

  if (next.expirationPeriod <= next.timelockPeriod) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'expirationPeriod must exceed timelockPeriod.', {
      timelockPeriod: next.timelockPeriod,
      expirationPeriod: next.expirationPeriod,
    });
  }

  Object.assign(config, next);
};

const describeFailure = (index: number, message: PollMessage, error: unknown): ExecutionError => ({
  index,
  kind: message.kind,
  code: error instanceof DomainError ? error.code : ErrorCode.CollaboratorFailed,
  message: error instanceof Error ? error.message : String(error),
});

export class ExecutionEngine {
  constructor(
    private readonly contracts: OwnedContractRegistry,
    private readonly sender = GOVERNANCE_ACCOUNT,
  ) {}

  execute(state: AppState, pollId: number, block: BlockContext): ExecuteResult {
    const poll = requirePoll(state, pollId);

    if (poll.status === 'executed' || poll.status === 'failed') {
      throw stateConflict(ErrorCode.AlreadyExecuted, `Poll ${pollId} was already executed.`, { pollId, status: poll.status });
    }
    if (poll.status !== 'passed') {
      throw stateConflict(ErrorCode.NotPassed, `Poll ${pollId} is ${poll.status}, not passed.`, { pollId, status: poll.status });
    }

    const { executableFrom, expiresAt } = executionWindow(poll, state.governance.config);
    if (block.height < executableFrom) {
      throw stateConflict(ErrorCode.TimelockActive, `Poll ${pollId} is timelocked until height ${executableFrom}.`, {
        pollId,
        executableFrom,
        height: block.height,
      });
    }
    if (block.height >= expiresAt) {
      throw stateConflict(ErrorCode.ExecutionWindowClosed, `Poll ${pollId} expired at height ${expiresAt}.`, {
        pollId,
        expiresAt,
        height: block.height,
      });
    }

    const messages = poll.messages;
    const batch = withSavepoint(state, (draft) => {
      const ledger = new StateTokenLedger(draft);
      let configUpdated = false;

      messages.forEach((message, index) => {
        try {
          if (message.kind === 'update_config') {
            applyConfigUpdate(draft.governance.config, message);
            configUpdated = true;
          } else {
            this.contracts.dispatch(this.sender, message, { state: draft, ledger, block, pollId });
          }
        } catch (error) {
          throw new MessageFailure(describeFailure(index, message, error));
        }
      });

      return configUpdated;
    });

    // The savepoint may have replaced the governance section; look the poll up again.
    const settled = requirePoll(state, pollId);
    settled.updatedAt = block.now;
    settled.resolvedAt = block.now;

    if (batch.ok) {
      settled.status = 'executed';
      return { poll: settled, outcome: 'executed', configUpdated: batch.value };
    }

    if (!(batch.error instanceof MessageFailure)) throw batch.error;

    const error = batch.error.detail;
    settled.status = 'failed';
    settled.executionError = error;
    return { poll: settled, outcome: 'failed', error, configUpdated: false };
  }
}
