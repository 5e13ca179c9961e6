import { GovernanceConfig } from '../../domain/governance/governanceTypes.js';
import { AppState, CommunityPoolState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const GOVERNANCE_ACCOUNT = 'governance';
export const COMMUNITY_ACCOUNT = 'community';

export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = {
  quorum: 10n ** 17n, // 0.1
  threshold: 5n * 10n ** 17n, // 0.5
  votingPeriod: 100_800,
  timelockPeriod: 14_400,
  expirationPeriod: 28_800,
  proposalDeposit: 1_000_000_000n,
  maxMessagesPerPoll: 16,
  earlyPassThreshold: null,
  rejectedDepositPolicy: 'forfeit',
};

export interface StateSeed {
  governance?: Partial<GovernanceConfig>;
  community?: Partial<CommunityPoolState>;
}

export const createDefaultState = (seed: StateSeed = {}): AppState => ({
  governance: {
    config: { ...DEFAULT_GOVERNANCE_CONFIG, ...seed.governance },
    pollCount: 0,
    totalDeposit: 0n,
    polls: {},
    votes: {},
  },
  staking: {
    stakes: {},
    rewardIndex: {
      globalIndex: 0n,
      totalStaked: 0n,
      carry: 0n,
      withheldIncome: 0n,
      totalClaimed: 0n,
      totalIncome: 0n,
    },
  },
  token: {
    balances: {},
  },
  community: {
    owner: GOVERNANCE_ACCOUNT,
    spendLimit: 100_000_000_000n,
    ...seed.community,
  },
  chain: {
    sequence: 0,
    lastHeight: 0,
  },
  outbox: [],
  metrics: {
    startedAt: isoNow(),
    commandsCommitted: 0,
    pollsCreated: 0,
    votesCast: 0,
    pollsExecuted: 0,
    pollsFailed: 0,
    incomeDeposits: 0,
    rateLimitDenials: 0,
  },
});
