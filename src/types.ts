import type { GovernanceState } from './domain/governance/governanceTypes.js';
import type { StakingState } from './domain/staking/stakingTypes.js';

export interface TokenState {
  balances: Record<string, bigint>;
}

export interface CommunityPoolState {
  owner: string;
  spendLimit: bigint;
}

export interface ChainState {
  /** Count of committed commands; orders calls within a height. */
  sequence: number;
  lastHeight: number;
}

/** Payload forwarded by a passed poll, waiting for a relayer. */
export interface OutboxEntry {
  id: string;
  contract: string;
  pollId: number;
  payload: Record<string, unknown>;
  height: number;
  queuedAt: string;
}

export interface MetricsState {
  startedAt: string;
  commandsCommitted: number;
  pollsCreated: number;
  votesCast: number;
  pollsExecuted: number;
  pollsFailed: number;
  incomeDeposits: number;
  rateLimitDenials: number;
}

export interface AppState {
  governance: GovernanceState;
  staking: StakingState;
  token: TokenState;
  community: CommunityPoolState;
  chain: ChainState;
  outbox: OutboxEntry[];
  metrics: MetricsState;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  height: number;
  processPid: number;
}
