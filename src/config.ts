import dotenv from 'dotenv';
import path from 'node:path';
import { DepositPolicy } from './domain/governance/governanceTypes.js';
import { parseAmount, parseDecimal } from './utils/amount.js';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseRatio = (input: string | undefined, fallback: string): bigint => (
  parseDecimal(input ?? fallback) ?? parseDecimal(fallback) ?? 0n
);

const parseTokenAmount = (input: string | undefined, fallback: bigint): bigint => (
  input === undefined ? fallback : parseAmount(input) ?? fallback
);

const parseOptionalRatio = (input: string | undefined): bigint | null => (
  input === undefined || input === '' ? null : parseDecimal(input)
);

const parseDepositPolicy = (input: string | undefined): DepositPolicy => (
  input === 'refund' ? 'refund' : 'forfeit'
);

const parseList = (input: string | undefined): string[] => (
  (input ?? '').split(',').map((s) => s.trim()).filter(Boolean)
);

const parsePeriod = (env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number => {
  const input = env[name];
  if (input === undefined || input === '') return fallback;
  const n = Number(input);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new Error(`${name} must be an integer of at least ${min}, got "${input}".`);
  }
  return n;
};

/** Block-height periods; the execution window must not be empty. */
export const parseGovernancePeriods = (env: NodeJS.ProcessEnv): {
  votingPeriod: number;
  timelockPeriod: number;
  expirationPeriod: number;
} => {
  const votingPeriod = parsePeriod(env, 'GOV_VOTING_PERIOD', 100_800, 1);
  const timelockPeriod = parsePeriod(env, 'GOV_TIMELOCK_PERIOD', 14_400, 0);
  const expirationPeriod = parsePeriod(env, 'GOV_EXPIRATION_PERIOD', 28_800, 0);
  if (expirationPeriod <= timelockPeriod) {
    throw new Error(`GOV_EXPIRATION_PERIOD (${expirationPeriod}) must exceed GOV_TIMELOCK_PERIOD (${timelockPeriod}).`);
  }
  return { votingPeriod, timelockPeriod, expirationPeriod };
};

const dataDir = path.resolve(process.env.DATA_DIR ?? 'data');

export const config = {
  app: {
    name: 'staked-governance-api',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir,
    stateFile: process.env.STATE_FILE ?? path.join(dataDir, 'state.json'),
    logFile: process.env.LOG_FILE ?? path.join(dataDir, 'events.ndjson'),
  },
  chain: {
    genesisTime: process.env.CHAIN_GENESIS_TIME ?? '2026-01-01T00:00:00.000Z',
    blockTimeMs: parseNumber(process.env.CHAIN_BLOCK_TIME_MS, 6000),
  },
  governance: {
    quorum: parseRatio(process.env.GOV_QUORUM, '0.1'),
    threshold: parseRatio(process.env.GOV_THRESHOLD, '0.5'),
    ...parseGovernancePeriods(process.env),
    proposalDeposit: parseTokenAmount(process.env.GOV_PROPOSAL_DEPOSIT, 1_000_000_000n),
    maxMessagesPerPoll: parseNumber(process.env.GOV_MAX_MESSAGES_PER_POLL, 16),
    earlyPassThreshold: parseOptionalRatio(process.env.GOV_EARLY_PASS_THRESHOLD),
    rejectedDepositPolicy: parseDepositPolicy(process.env.GOV_REJECTED_DEPOSIT_POLICY),
  },
  community: {
    spendLimit: parseTokenAmount(process.env.COMMUNITY_SPEND_LIMIT, 100_000_000_000n),
  },
  contracts: {
    outbox: parseList(process.env.OWNED_CONTRACTS),
  },
  token: {
    faucetEnabled: parseBool(process.env.TOKEN_FAUCET_ENABLED, process.env.NODE_ENV !== 'production'),
  },
  rateLimit: {
    commandsPerMinute: parseNumber(process.env.RATE_LIMIT_COMMANDS_PER_MINUTE, 60),
  },
};

export type AppConfig = typeof config;
