// ─── GovernanceClient ──────────────────────────────────────────────────────
// Lightweight, zero-dependency client for the staked governance API.
// Uses the runtime's fetch unless one is injected.
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  CastVoteResponse,
  CreatePollOpts,
  EndPollResponse,
  ExecutePollResponse,
  GovernanceConfig,
  GovernanceState,
  HealthResponse,
  IncomeResponse,
  ListPollsOpts,
  Poll,
  RewardClaim,
  StakeChange,
  Staker,
  Vote,
  VoteChoice,
} from './types.js';

export class GovernanceAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceAPIError';
  }
}

export interface GovernanceClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Account commands are sent as when a call does not name one. */
  sender?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

type Amount = string | number | bigint;

const amountParam = (value: Amount): string | number => (typeof value === 'bigint' ? value.toString() : value);

const isErrorEnvelope = (body: unknown): body is APIErrorEnvelope => (
  typeof body === 'object' && body !== null && 'error' in body
);

export class GovernanceClient {
  private readonly baseUrl: string;
  private readonly sender?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, sender?: string);
  constructor(opts: GovernanceClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceClientOptions, sender?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.sender = sender;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.sender = baseUrlOrOpts.sender;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private senderOr(account?: string): string {
    const resolved = account ?? this.sender;
    if (!resolved) throw new Error('No sender given and no default sender configured.');
    return resolved;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: { 'content-type': 'application/json' },
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: unknown;
      try {
        errorBody = await res.json();
      } catch (error) {
        errorBody = { error: { code: `HTTP_${res.status}`, message: String(error) } };
      }
      const envelope = isErrorEnvelope(errorBody) ? errorBody.error : undefined;
      throw new GovernanceAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body ?? {});
  }

  // ─── Staking ───────────────────────────────────────────────────────────

  async stake(amount: Amount, sender?: string): Promise<StakeChange> {
    return this.post<StakeChange>('/stake', { sender: this.senderOr(sender), amount: amountParam(amount) });
  }

  async unstake(amount: Amount, sender?: string): Promise<StakeChange> {
    return this.post<StakeChange>('/unstake', { sender: this.senderOr(sender), amount: amountParam(amount) });
  }

  async claimReward(sender?: string): Promise<RewardClaim> {
    return this.post<RewardClaim>('/rewards/claim', { sender: this.senderOr(sender) });
  }

  async getStaker(account: string): Promise<Staker> {
    return this.get<Staker>(`/stakers/${encodeURIComponent(account)}`);
  }

  async claimableReward(account: string): Promise<string> {
    const res = await this.get<{ claimableReward: string }>(`/stakers/${encodeURIComponent(account)}/reward`);
    return res.claimableReward;
  }

  /**
   * Push income into the treasury. A 202 (nothing staked yet) resolves with
   * the withheld outcome rather than throwing.
   */
  async depositIncome(amount: Amount, from?: string): Promise<IncomeResponse> {
    return this.post<IncomeResponse>('/income', { from: this.senderOr(from), amount: amountParam(amount) });
  }

  async faucet(amount: Amount, account?: string): Promise<{ account: string; balance: string }> {
    return this.post<{ account: string; balance: string }>('/token/faucet', { account: this.senderOr(account), amount: amountParam(amount) });
  }

  // ─── Polls ─────────────────────────────────────────────────────────────

  async createPoll(opts: Omit<CreatePollOpts, 'sender'> & { sender?: string }): Promise<Poll> {
    const res = await this.post<{ poll: Poll }>('/polls', { ...opts, sender: this.senderOr(opts.sender) });
    return res.poll;
  }

  async getPoll(pollId: number): Promise<Poll> {
    return this.get<Poll>(`/polls/${pollId}`);
  }

  async listPolls(opts: ListPollsOpts = {}): Promise<Poll[]> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(opts)) {
      if (value !== undefined) params.set(key, String(value));
    }
    const qs = params.toString();
    const res = await this.get<{ polls: Poll[] }>(`/polls${qs ? `?${qs}` : ''}`);
    return res.polls;
  }

  async castVote(pollId: number, choice: VoteChoice, sender?: string): Promise<CastVoteResponse> {
    return this.post<CastVoteResponse>(`/polls/${pollId}/votes`, { sender: this.senderOr(sender), choice });
  }

  async getVote(pollId: number, voter: string): Promise<Vote> {
    return this.get<Vote>(`/polls/${pollId}/votes/${encodeURIComponent(voter)}`);
  }

  async listVoters(pollId: number, opts: { startAfter?: string; limit?: number } = {}): Promise<Vote[]> {
    const params = new URLSearchParams();
    if (opts.startAfter !== undefined) params.set('startAfter', opts.startAfter);
    if (opts.limit !== undefined) params.set('limit', String(opts.limit));
    const qs = params.toString();
    const res = await this.get<{ voters: Vote[] }>(`/polls/${pollId}/voters${qs ? `?${qs}` : ''}`);
    return res.voters;
  }

  async endPoll(pollId: number): Promise<EndPollResponse> {
    return this.post<EndPollResponse>(`/polls/${pollId}/end`, { sender: this.sender });
  }

  async executePoll(pollId: number): Promise<ExecutePollResponse> {
    return this.post<ExecutePollResponse>(`/polls/${pollId}/execute`, { sender: this.sender });
  }

  async expirePoll(pollId: number): Promise<Poll> {
    const res = await this.post<{ poll: Poll }>(`/polls/${pollId}/expire`, { sender: this.sender });
    return res.poll;
  }

  // ─── System ────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }

  async getConfig(): Promise<GovernanceConfig> {
    return this.get<GovernanceConfig>('/config');
  }

  async getState(): Promise<GovernanceState> {
    return this.get<GovernanceState>('/state');
  }
}
