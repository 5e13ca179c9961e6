import fs from 'node:fs/promises';
import path from 'node:path';
import { AppState, OutboxEntry } from '../../types.js';
import { GovernanceConfig, Poll, Vote } from '../../domain/governance/governanceTypes.js';
import { StakeRecord } from '../../domain/staking/stakingTypes.js';
import { createDefaultState, StateSeed } from './defaultState.js';

type Raw = Record<string, unknown>;

const asRecord = (value: unknown): Raw => (
  value !== null && typeof value === 'object' && !Array.isArray(value) ? value as Raw : {}
);

const toBigInt = (value: unknown, fallback: bigint): bigint => {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value);
  return fallback;
};

const toNumber = (value: unknown, fallback: number): number => (
  typeof value === 'number' && Number.isFinite(value) ? value : fallback
);

const bigintReplacer = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? value.toString() : value
);

const mapValues = <T>(value: unknown, revive: (raw: Raw) => T): Record<string, T> => (
  Object.fromEntries(Object.entries(asRecord(value)).map(([key, entry]) => [key, revive(asRecord(entry))]))
);

const normalizeConfig = (raw: Raw, defaults: GovernanceConfig): GovernanceConfig => ({
  quorum: toBigInt(raw.quorum, defaults.quorum),
  threshold: toBigInt(raw.threshold, defaults.threshold),
  votingPeriod: toNumber(raw.votingPeriod, defaults.votingPeriod),
  timelockPeriod: toNumber(raw.timelockPeriod, defaults.timelockPeriod),
  expirationPeriod: toNumber(raw.expirationPeriod, defaults.expirationPeriod),
  proposalDeposit: toBigInt(raw.proposalDeposit, defaults.proposalDeposit),
  maxMessagesPerPoll: toNumber(raw.maxMessagesPerPoll, defaults.maxMessagesPerPoll),
  earlyPassThreshold: raw.earlyPassThreshold === null || raw.earlyPassThreshold === undefined
    ? null
    : toBigInt(raw.earlyPassThreshold, 0n),
  rejectedDepositPolicy: raw.rejectedDepositPolicy === 'refund' ? 'refund' : defaults.rejectedDepositPolicy,
});

const normalizePoll = (raw: Raw): Poll => {
  const typed = raw as unknown as Poll;
  return {
    ...typed,
    depositAmount: toBigInt(raw.depositAmount, 0n),
    yesVotes: toBigInt(raw.yesVotes, 0n),
    noVotes: toBigInt(raw.noVotes, 0n),
    abstainVotes: toBigInt(raw.abstainVotes, 0n),
    totalVotingPowerAtCreation: toBigInt(raw.totalVotingPowerAtCreation, 0n),
    messages: Array.isArray(raw.messages) ? typed.messages : [],
    depositResolution: typed.depositResolution ?? 'escrowed',
  };
};

const normalizeVote = (raw: Raw): Vote => ({
  ...(raw as unknown as Vote),
  power: toBigInt(raw.power, 0n),
});

const normalizeStake = (raw: Raw): StakeRecord => ({
  ...(raw as unknown as StakeRecord),
  amount: toBigInt(raw.amount, 0n),
  rewardIndexSnapshot: toBigInt(raw.rewardIndexSnapshot, 0n),
  pendingReward: toBigInt(raw.pendingReward, 0n),
});

/**
 * Rebuild state from its JSON form. Amounts are persisted as strings and
 * revived into bigint; missing sections fall back to defaults.
 */
export const normalizeState = (raw: unknown, seed: StateSeed = {}): AppState => {
  const defaults = createDefaultState(seed);
  const parsed = asRecord(raw);
  const governance = asRecord(parsed.governance);
  const staking = asRecord(parsed.staking);
  const rewardIndex = asRecord(staking.rewardIndex);
  const token = asRecord(parsed.token);
  const community = asRecord(parsed.community);
  const chain = asRecord(parsed.chain);

  return {
    governance: {
      config: normalizeConfig(asRecord(governance.config), defaults.governance.config),
      pollCount: toNumber(governance.pollCount, 0),
      totalDeposit: toBigInt(governance.totalDeposit, 0n),
      polls: mapValues(governance.polls, normalizePoll),
      votes: Object.fromEntries(
        Object.entries(asRecord(governance.votes)).map(([pollId, byVoter]) => [pollId, mapValues(byVoter, normalizeVote)]),
      ),
    },
    staking: {
      stakes: mapValues(staking.stakes, normalizeStake),
      rewardIndex: {
        globalIndex: toBigInt(rewardIndex.globalIndex, 0n),
        totalStaked: toBigInt(rewardIndex.totalStaked, 0n),
        carry: toBigInt(rewardIndex.carry, 0n),
        withheldIncome: toBigInt(rewardIndex.withheldIncome, 0n),
        totalClaimed: toBigInt(rewardIndex.totalClaimed, 0n),
        totalIncome: toBigInt(rewardIndex.totalIncome, 0n),
      },
    },
    token: {
      balances: Object.fromEntries(
        Object.entries(asRecord(token.balances)).map(([account, balance]) => [account, toBigInt(balance, 0n)]),
      ),
    },
    community: {
      owner: typeof community.owner === 'string' ? community.owner : defaults.community.owner,
      spendLimit: toBigInt(community.spendLimit, defaults.community.spendLimit),
    },
    chain: {
      sequence: toNumber(chain.sequence, 0),
      lastHeight: toNumber(chain.lastHeight, 0),
    },
    outbox: Array.isArray(parsed.outbox) ? parsed.outbox as OutboxEntry[] : [],
    metrics: {
      ...defaults.metrics,
      ...(asRecord(parsed.metrics) as Partial<AppState['metrics']>),
    },
  };
};

export type SavepointResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

/**
 * Run `work` against a copy of `state`. The copy replaces the live sections
 * only if `work` returns; a thrown error leaves `state` untouched.
 */
export const withSavepoint = <T>(state: AppState, work: (draft: AppState) => T): SavepointResult<T> => {
  const draft = structuredClone(state);
  try {
    const value = work(draft);
    Object.assign(state, draft);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
};

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

export class StateStore {
  private state: AppState;
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly stateFilePath: string, private readonly seed: StateSeed = {}) {
    this.state = createDefaultState(seed);
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.stateFilePath, 'utf-8');
      this.state = normalizeState(JSON.parse(raw), this.seed);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState(this.seed);
      await this.persist();
    }
  }

  snapshot(): AppState {
    return structuredClone(this.state);
  }

  /**
   * Serialised read-modify-write. `work` runs on a draft; the draft becomes
   * the live state and is persisted only when `work` completes.
   */
  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      draft.metrics.commandsCommitted += 1;
      this.state = draft;
      await this.persist();
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(this.state, bigintReplacer, 2));
  }
}
