import { DomainError } from '../src/errors/taxonomy.js';
import { BlockContext } from '../src/domain/chain/heightSource.js';
import { GovernanceConfig } from '../src/domain/governance/governanceTypes.js';
import { createDefaultState } from '../src/infra/storage/defaultState.js';
import { StateTokenLedger } from '../src/integrations/token/tokenLedger.js';
import { AppState } from '../src/types.js';
import { parseDecimal } from '../src/utils/amount.js';

export const ratio = (value: string): bigint => {
  const parsed = parseDecimal(value);
  if (parsed === null) throw new Error(`bad ratio ${value}`);
  return parsed;
};

export const at = (height: number): BlockContext => ({ height, now: `2026-01-01T00:00:${String(height % 60).padStart(2, '0')}.000Z` });

export const TEST_CONFIG: Partial<GovernanceConfig> = {
  quorum: ratio('0.3'),
  threshold: ratio('0.5'),
  votingPeriod: 10,
  timelockPeriod: 2,
  expirationPeriod: 20,
  proposalDeposit: 100n,
  maxMessagesPerPoll: 4,
  earlyPassThreshold: null,
  rejectedDepositPolicy: 'forfeit',
};

export interface Fixture {
  state: AppState;
  ledger: StateTokenLedger;
}

export const setup = (overrides: Partial<GovernanceConfig> = {}): Fixture => {
  const state = createDefaultState({ governance: { ...TEST_CONFIG, ...overrides } });
  return { state, ledger: new StateTokenLedger(state) };
};

export const fund = ({ ledger }: Fixture, balances: Record<string, bigint>): void => {
  for (const [account, amount] of Object.entries(balances)) {
    ledger.mint(account, amount);
  }
};

/** Error code of a DomainError thrown by `work`, or null when it returns. */
export const codeOf = (work: () => unknown): string | null => {
  try {
    work();
    return null;
  } catch (error) {
    if (error instanceof DomainError) return error.code;
    throw error;
  }
};
