// Staked governance API: SDK entry point
export { GovernanceClient, GovernanceAPIError } from './client.js';
export type { GovernanceClientOptions } from './client.js';
export type {
  // Core unions
  PollStatus,
  VoteChoice,
  DepositPolicy,
  DepositResolution,

  // Polls
  PollMessage,
  ExecutionError,
  Poll,
  CreatePollOpts,
  ListPollsOpts,
  Vote,
  CastVoteResponse,
  EndPollResponse,
  ExecutePollResponse,

  // Staking
  StakeChange,
  Staker,
  RewardClaim,
  IncomeOutcome,
  IncomeResponse,

  // System
  GovernanceConfig,
  GovernanceState,
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
