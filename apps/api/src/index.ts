import { buildServer } from './server';
import { loadConfig, ApiConfigSchema, createLogger } from '@tenantgate/shared';
import { initPool, closePool, createPgRepositories } from '@tenantgate/db';

const logger = createLogger({ name: 'api' });

async function main(): Promise<void> {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const app = await buildServer(config, createPgRepositories());

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down API server');
    await app.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', (signal) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', (signal) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start API');
  process.exit(1);
});
