import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { pollMessageSchema } from '../domain/governance/pollMessages.js';
import { TEXT_LIMITS } from '../domain/governance/pollRegistry.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { GovernanceService } from '../services/governanceService.js';
import { StakingService } from '../services/stakingService.js';
import { toDistributionView, toStakeChangeView } from '../services/views.js';
import { RuntimeMetrics } from '../types.js';
import { formatAmount } from '../utils/amount.js';
import { CommandName, RateLimiter } from './rateLimiter.js';

interface RouteDeps {
  config: AppConfig;
  stakingService: StakingService;
  governanceService: GovernanceService;
  rateLimiter: RateLimiter;
  getRuntimeMetrics: () => RuntimeMetrics;
}

interface AccountParams {
  account: string;
}

const account = z.string().min(1).max(128);

const amount = z.union([
  z.string().regex(/^\d+$/, 'must be a non-negative integer string'),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]).transform((value) => BigInt(value));

const stakeSchema = z.object({
  sender: account,
  amount,
});

const claimSchema = z.object({
  sender: account,
});

const incomeSchema = z.object({
  from: account,
  amount,
});

const faucetSchema = z.object({
  account,
  amount,
});

const createPollSchema = z.object({
  sender: account,
  deposit: amount,
  title: z.string().min(TEXT_LIMITS.title.min).max(TEXT_LIMITS.title.max),
  description: z.string().min(TEXT_LIMITS.description.min).max(TEXT_LIMITS.description.max),
  link: z.string().min(TEXT_LIMITS.link.min).max(TEXT_LIMITS.link.max).optional(),
  messages: z.array(pollMessageSchema).default([]),
  votingPeriod: z.number().int().positive().optional(),
});

const voteSchema = z.object({
  sender: account,
  choice: z.enum(['yes', 'no', 'abstain']),
});

const pollActionSchema = z.object({
  sender: account.optional(),
}).default({});

const pollParamsSchema = z.object({
  pollId: z.coerce.number().int().positive(),
});

const pollListQuerySchema = z.object({
  status: z.enum(['in_progress', 'passed', 'rejected', 'executed', 'expired', 'failed']).optional(),
  startAfter: z.coerce.number().int().nonnegative().optional(),
  limit: z.coerce.number().int().positive().optional(),
  order: z.enum(['asc', 'desc']).optional(),
});

const voterListQuerySchema = z.object({
  startAfter: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, error: z.ZodError): FastifyReply => reply.code(400).send(toErrorEnvelope(
  ErrorCode.InvalidPayload,
  'Invalid request payload.',
  error.flatten(),
));

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { stakingService, governanceService } = deps;

  /** True when the sender is over budget; the 429 has already been sent. */
  const throttled = (request: FastifyRequest, reply: FastifyReply, command: CommandName, sender?: string): boolean => {
    const result = deps.rateLimiter.check(sender ?? request.ip, command);
    if (result.allowed) return false;

    void reply
      .header('retry-after', String(result.retryAfterSeconds ?? 60))
      .code(429)
      .send(toErrorEnvelope(ErrorCode.RateLimited, 'Too many commands; slow down.', result));
    return true;
  };

  const pollIdOf = (request: FastifyRequest, reply: FastifyReply): number | null => {
    const parse = pollParamsSchema.safeParse(request.params);
    if (!parse.success) {
      sendInvalid(reply, parse.error);
      return null;
    }
    return parse.data.pollId;
  };

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '1.0.0',
    status: 'ok',
  }));

  app.get('/health', async () => ({
    status: 'ok',
    env: deps.config.app.env,
    ...deps.getRuntimeMetrics(),
    state: stakingService.getState(),
    rateLimit: deps.rateLimiter.getMetrics(),
  }));

  app.get('/config', async () => governanceService.getConfig());

  app.get('/state', async () => stakingService.getState());

  // ─── Token collaborator ─────────────────────────────────────────────────

  app.get<{ Params: AccountParams }>('/token/:account', async (request) => {
    const { params } = request;
    return { account: params.account, balance: formatAmount(stakingService.tokenBalance(params.account)) };
  });

  app.post('/token/faucet', async (request, reply) => {
    if (!deps.config.token.faucetEnabled) {
      return reply.code(403).send(toErrorEnvelope(ErrorCode.FaucetDisabled, 'The token faucet is disabled.'));
    }

    const parse = faucetSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'faucet', parse.data.account)) return undefined;

    try {
      const balance = await stakingService.mint(parse.data.account, parse.data.amount);
      return { account: parse.data.account, balance: formatAmount(balance) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Staking ────────────────────────────────────────────────────────────

  app.post('/stake', async (request, reply) => {
    const parse = stakeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'stake', parse.data.sender)) return undefined;

    try {
      return toStakeChangeView(await stakingService.stake(parse.data.sender, parse.data.amount));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/unstake', async (request, reply) => {
    const parse = stakeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'unstake', parse.data.sender)) return undefined;

    try {
      return toStakeChangeView(await stakingService.unstake(parse.data.sender, parse.data.amount));
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/rewards/claim', async (request, reply) => {
    const parse = claimSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'claim', parse.data.sender)) return undefined;

    try {
      const claim = await stakingService.claimReward(parse.data.sender);
      return { account: claim.account, amount: formatAmount(claim.amount) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get<{ Params: AccountParams }>('/stakers/:account', async (request, reply) => {
    const { params } = request;
    try {
      return stakingService.getStaker(params.account);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get<{ Params: AccountParams }>('/stakers/:account/reward', async (request) => {
    const { params } = request;
    return {
      account: params.account,
      claimableReward: formatAmount(stakingService.claimableReward(params.account)),
    };
  });

  app.post('/income', async (request, reply) => {
    const parse = incomeSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'income', parse.data.from)) return undefined;

    try {
      const { outcome } = await stakingService.depositIncome(parse.data.from, parse.data.amount);
      const income = toDistributionView(outcome);

      if (outcome.status === 'withheld') {
        return reply.code(202).send({
          income,
          ...toErrorEnvelope(ErrorCode.NoStakers, 'Nothing is staked; income is held until the first stake.'),
        });
      }
      return { income };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Polls ──────────────────────────────────────────────────────────────

  app.post('/polls', async (request, reply) => {
    const parse = createPollSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'createPoll', parse.data.sender)) return undefined;

    const { sender, ...input } = parse.data;
    try {
      const poll = await governanceService.createPoll({ creator: sender, ...input });
      return reply.code(201).send({ poll });
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/polls', async (request, reply) => {
    const parse = pollListQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, parse.error);
    return { polls: governanceService.listPolls(parse.data) };
  });

  app.get('/polls/:pollId', async (request, reply) => {
    const pollId = pollIdOf(request, reply);
    if (pollId === null) return undefined;

    const poll = governanceService.getPoll(pollId);
    if (!poll) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.PollNotFound, 'Poll not found.'));
    }
    return poll;
  });

  app.post('/polls/:pollId/votes', async (request, reply) => {
    const pollId = pollIdOf(request, reply);
    if (pollId === null) return undefined;

    const parse = voteSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, parse.error);
    if (throttled(request, reply, 'vote', parse.data.sender)) return undefined;

    try {
      return await governanceService.castVote(pollId, parse.data.sender, parse.data.choice);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get<{ Params: { pollId: string; voter: string } }>('/polls/:pollId/votes/:voter', async (request, reply) => {
    const pollId = pollIdOf(request, reply);
    if (pollId === null) return undefined;

    const { voter } = request.params;
    try {
      return governanceService.getVote(pollId, voter);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/polls/:pollId/voters', async (request, reply) => {
    const pollId = pollIdOf(request, reply);
    if (pollId === null) return undefined;

    const parse = voterListQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, parse.error);

    try {
      return { voters: governanceService.listVoters(pollId, parse.data) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  const pollAction = (command: 'end' | 'execute' | 'expire', run: (pollId: number) => Promise<unknown>) => (
    async (request: FastifyRequest, reply: FastifyReply) => {
      const pollId = pollIdOf(request, reply);
      if (pollId === null) return undefined;

      const parse = pollActionSchema.safeParse(request.body ?? {});
      if (!parse.success) return sendInvalid(reply, parse.error);
      if (throttled(request, reply, command, parse.data.sender)) return undefined;

      try {
        return await run(pollId);
      } catch (error) {
        sendDomainError(reply, error);
        return undefined;
      }
    }
  );

  app.post('/polls/:pollId/end', pollAction('end', (pollId) => governanceService.endPoll(pollId)));
  app.post('/polls/:pollId/execute', pollAction('execute', (pollId) => governanceService.executePoll(pollId)));
  app.post('/polls/:pollId/expire', pollAction('expire', async (pollId) => ({
    poll: await governanceService.expirePoll(pollId),
  })));

  app.get<{ Querystring: { contract?: string } }>('/outbox', async (request) => {
    return { entries: governanceService.listOutbox(request.query.contract) };
  });
}
