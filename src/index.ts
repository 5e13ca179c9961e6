import { buildApp } from './app.js';
import { config } from './config.js';
import { formatDecimal } from './utils/amount.js';

async function main(): Promise<void> {
  const { app, stateStore, logger } = await buildApp(config);

  const shutdown = async (signal: string): Promise<void> => {
    await logger.log('info', 'shutdown.start', { signal });
    await app.close();
    await stateStore.flush();
    await logger.log('info', 'shutdown.complete', { signal });
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await app.listen({ port: config.app.port, host: '0.0.0.0' });

  await logger.log('info', 'server.started', {
    port: config.app.port,
    env: config.app.env,
    quorum: formatDecimal(config.governance.quorum),
    threshold: formatDecimal(config.governance.threshold),
    rejectedDepositPolicy: config.governance.rejectedDepositPolicy,
    faucetEnabled: config.token.faucetEnabled,
    ownedContracts: config.contracts.outbox,
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
