export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  InvalidAmount: 'invalid_amount',
  InsufficientDeposit: 'insufficient_deposit',
  InsufficientStake: 'insufficient_stake',
  InsufficientBalance: 'insufficient_balance',
  AlreadyVoted: 'already_voted',
  PollNotInProgress: 'poll_not_in_progress',
  VotingPeriodNotOver: 'voting_period_not_over',
  AlreadyExecuted: 'already_executed',
  NotPassed: 'not_passed',
  TimelockActive: 'timelock_active',
  ExecutionWindowOpen: 'execution_window_open',
  ExecutionWindowClosed: 'execution_window_closed',
  NoStakers: 'no_stakers',
  NothingToClaim: 'nothing_to_claim',
  NoStake: 'no_stake',
  VotingPowerExhausted: 'voting_power_exhausted',
  ReservedAccount: 'reserved_account',
  PollNotFound: 'poll_not_found',
  VoteNotFound: 'vote_not_found',
  StakerNotFound: 'staker_not_found',
  Unauthorized: 'unauthorized',
  SpendLimitExceeded: 'spend_limit_exceeded',
  UnknownContract: 'unknown_contract',
  CollaboratorFailed: 'collaborator_failed',
  FaucetDisabled: 'faucet_disabled',
  RateLimited: 'rate_limited',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export type ErrorCategory = 'validation' | 'state_conflict' | 'resource' | 'not_found' | 'collaborator' | 'internal';

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  invalid_payload: 'validation',
  invalid_amount: 'validation',
  insufficient_deposit: 'validation',
  insufficient_stake: 'validation',
  insufficient_balance: 'validation',
  already_voted: 'state_conflict',
  poll_not_in_progress: 'state_conflict',
  voting_period_not_over: 'state_conflict',
  already_executed: 'state_conflict',
  not_passed: 'state_conflict',
  timelock_active: 'state_conflict',
  execution_window_open: 'state_conflict',
  execution_window_closed: 'state_conflict',
  no_stakers: 'resource',
  nothing_to_claim: 'resource',
  no_stake: 'resource',
  voting_power_exhausted: 'resource',
  reserved_account: 'validation',
  poll_not_found: 'not_found',
  vote_not_found: 'not_found',
  staker_not_found: 'not_found',
  unauthorized: 'collaborator',
  spend_limit_exceeded: 'collaborator',
  unknown_contract: 'collaborator',
  collaborator_failed: 'collaborator',
  faucet_disabled: 'validation',
  rate_limited: 'resource',
  internal_error: 'internal',
};

export const errorCategory = (code: ErrorCode): ErrorCategory => CATEGORY_BY_CODE[code];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }

  get category(): ErrorCategory {
    return errorCategory(this.code);
  }
}

export const invalidAmount = (message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(ErrorCode.InvalidAmount, 400, message, details)
);

export const stateConflict = (code: ErrorCode, message: string, details?: Record<string, unknown>): DomainError => (
  new DomainError(code, 409, message, details)
);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    category: ErrorCategory;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    category: errorCategory(code),
    message,
    ...(details === undefined ? {} : { details }),
  },
});
