import { getEnv } from './env';
import { logger } from './log';
import { buildServer } from './server';

async function main() {
  // Load and validate environment
  const env = getEnv();
  logger.info({ env: { port: env.PORT, host: env.HOST, nodeEnv: env.NODE_ENV } }, 'Starting server');

  const { fastify } = await buildServer(env);

  try {
    await fastify.listen({ port: env.PORT, host: env.HOST });
    logger.info({ port: env.PORT }, 'Server started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully');
    await fastify.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => shutdown('SIGTERM').catch(fatal));
  process.on('SIGINT', () => shutdown('SIGINT').catch(fatal));
}

function fatal(error: unknown): never {
  logger.error({
    error: error instanceof Error ? {
      message: error.message,
      stack: error.stack,
      name: error.name
    } : error
  }, 'Fatal error');
  process.exit(1);
}

main().catch(fatal);
