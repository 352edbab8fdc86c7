import { buildServer } from './server';
import { loadConfig, ApiConfigSchema, createLogger } from '@botm/shared';
import { initPool, closePool, createRunServices } from '@botm/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL, max: config.DATABASE_POOL_MAX });
  const { orchestrator, ledger } = createRunServices(config, logger);

  const app = await buildServer({
    credentials: { username: config.GENERATE_USERNAME, password: config.GENERATE_PASSWORD },
    orchestrator,
    ledger,
    logger,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start API');
  process.exit(1);
});
