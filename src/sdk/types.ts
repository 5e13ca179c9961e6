// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the staked governance API.
// Amounts are base-unit integers and ratios are decimals, both as strings.
// ────────────────────────────────────────────────────────────────────────────

export type PollStatus = 'in_progress' | 'passed' | 'rejected' | 'executed' | 'expired' | 'failed';
export type VoteChoice = 'yes' | 'no' | 'abstain';
export type DepositPolicy = 'forfeit' | 'refund';
export type DepositResolution = 'escrowed' | 'refunded' | 'forfeited';

// ─── Messages ──────────────────────────────────────────────────────────────

export type PollMessage =
  | {
    kind: 'update_config';
    quorum?: string;
    threshold?: string;
    votingPeriod?: number;
    timelockPeriod?: number;
    expirationPeriod?: number;
    proposalDeposit?: string;
    maxMessagesPerPoll?: number;
    earlyPassThreshold?: string | null;
    rejectedDepositPolicy?: DepositPolicy;
  }
  | { kind: 'community_spend'; recipient: string; amount: string }
  | { kind: 'community_update_config'; spendLimit?: string; owner?: string }
  | { kind: 'forward'; contract: string; payload: Record<string, unknown> };

// ─── Polls ─────────────────────────────────────────────────────────────────

export interface ExecutionError {
  index: number;
  kind: PollMessage['kind'];
  code: string;
  message: string;
}

export interface Poll {
  id: number;
  creator: string;
  depositAmount: string;
  title: string;
  description: string;
  link: string | null;
  messages: PollMessage[];
  status: PollStatus;
  yesVotes: string;
  noVotes: string;
  abstainVotes: string;
  totalVotingPowerAtCreation: string;
  startHeight: number;
  endHeight: number;
  executableFrom: number;
  expiresAt: number;
  depositResolution: DepositResolution;
  executionError: ExecutionError | null;
  createdAt: string;
  updatedAt: string;
  resolvedAt: string | null;
}

export interface CreatePollOpts {
  sender: string;
  deposit: string | number;
  title: string;
  description: string;
  link?: string;
  messages?: PollMessage[];
  votingPeriod?: number;
}

export interface ListPollsOpts {
  status?: PollStatus;
  startAfter?: number;
  limit?: number;
  order?: 'asc' | 'desc';
}

export interface Vote {
  pollId: number;
  voter: string;
  choice: VoteChoice;
  power: string;
  height: number;
  castAt: string;
}

export interface CastVoteResponse {
  poll: Poll;
  vote: Vote;
}

export interface EndPollResponse {
  poll: Poll;
  quorumReached: boolean;
  thresholdReached: boolean;
  earlyPass: boolean;
}

export interface ExecutePollResponse {
  poll: Poll;
  outcome: 'executed' | 'failed';
  configUpdated: boolean;
}

// ─── Staking ───────────────────────────────────────────────────────────────

export interface StakeChange {
  account: string;
  amount: string;
  balance: string;
  totalStaked: string;
}

export interface Staker {
  account: string;
  balance: string;
  claimableReward: string;
  rewardIndexSnapshot: string;
  tokenBalance: string;
  updatedAt: string | null;
}

export interface RewardClaim {
  account: string;
  amount: string;
}

export type IncomeOutcome =
  | { status: 'noop' }
  | { status: 'distributed'; amount: string; indexDelta: string; globalIndex: string }
  | { status: 'withheld'; reason: 'no_stakers'; amount: string; withheldIncome: string };

export interface IncomeResponse {
  income: IncomeOutcome;
  error?: { code: string; message: string };
}

// ─── System ────────────────────────────────────────────────────────────────

export interface GovernanceConfig {
  quorum: string;
  threshold: string;
  votingPeriod: number;
  timelockPeriod: number;
  expirationPeriod: number;
  proposalDeposit: string;
  maxMessagesPerPoll: number;
  earlyPassThreshold: string | null;
  rejectedDepositPolicy: DepositPolicy;
}

export interface GovernanceState {
  globalIndex: string;
  totalStaked: string;
  withheldIncome: string;
  totalIncome: string;
  totalClaimed: string;
  pollCount: number;
  totalDeposit: string;
  height: number;
  sequence: number;
}

export interface HealthResponse {
  status: 'ok';
  env: string;
  uptimeSeconds: number;
  height: number;
  processPid: number;
  state: GovernanceState;
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    category?: string;
    message: string;
    details?: unknown;
  };
}
