import Fastify, { type FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { RateLimiter } from './api/rateLimiter.js';
import { LiveFeed, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { ClockHeightSource, HeightSource } from './domain/chain/heightSource.js';
import { ExecutionEngine } from './domain/governance/executionEngine.js';
import { EventBus, eventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { CommunityPool } from './integrations/community/communityPool.js';
import { OutboxContract, OwnedContractRegistry } from './integrations/ownedContracts.js';
import { GovernanceService } from './services/governanceService.js';
import { StakingService } from './services/stakingService.js';

export interface AppContext {
  app: FastifyInstance;
  stateStore: StateStore;
  logger: EventLogger;
  stakingService: StakingService;
  governanceService: GovernanceService;
  liveFeed: LiveFeed;
}

export interface BuildOptions {
  /** Defaults to a clock-derived height from the chain config. */
  heightSource?: HeightSource;
  bus?: EventBus;
  /** Millisecond clock for the rate limiter. */
  clock?: () => number;
}

export const buildContracts = (config: AppConfig): OwnedContractRegistry => {
  const registry = new OwnedContractRegistry().register(new CommunityPool());
  for (const address of config.contracts.outbox) {
    registry.register(new OutboxContract(address));
  }
  return registry;
};

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile, {
    governance: config.governance,
    community: { spendLimit: config.community.spendLimit },
  });
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const bus = options.bus ?? eventBus;
  const heightSource = options.heightSource ?? new ClockHeightSource(config.chain.genesisTime, config.chain.blockTimeMs);
  const engine = new ExecutionEngine(buildContracts(config));

  const stakingService = new StakingService(stateStore, logger, heightSource, bus);
  const governanceService = new GovernanceService(stateStore, logger, heightSource, engine, bus);
  const rateLimiter = new RateLimiter({ commandsPerMinute: config.rateLimit.commandsPerMinute, now: options.clock });

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    stakingService,
    governanceService,
    rateLimiter,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      height: heightSource.current(),
      processPid: process.pid,
    }),
  });

  // Register WebSocket live event feed endpoint.
  const liveFeed = await registerWebSocket(app, bus);

  return {
    app,
    stateStore,
    logger,
    stakingService,
    governanceService,
    liveFeed,
  };
}
