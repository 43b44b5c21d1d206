import { buildApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const { app, store, logger, stopEventFeed } = await buildApp(config);

  const shutdown = async (signal: string): Promise<void> => {
    await logger.log('info', 'shutdown.start', { signal });
    stopEventFeed();
    await app.close();
    await store.flush();
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
    vaultId: config.vault.id,
    interestEnabled: config.interest.enabled,
    maxLeverage: config.leverage.maxLeverage,
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
