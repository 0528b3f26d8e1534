import { LOG_LEVELS } from './infrastructure/index.js';
import type { LogLevel } from './infrastructure/index.js';
import { buildCollector } from './interfaces/http/index.js';

/**
 * Local collector for development: the agent API kept in memory.
 *
 *   PORT (4318), HOST (0.0.0.0), LOG_LEVEL (info), COLLECTOR_API_KEY
 */
function logLevelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL'];
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

async function main(): Promise<void> {
  const fastify = buildCollector({
    apiKey: process.env['COLLECTOR_API_KEY'],
    logLevel: logLevelFromEnv(),
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    fastify.log.info({ signal }, 'Shutting down collector...');

    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 4318);

  await fastify.listen({ host, port });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start collector', err);
  process.exit(1);
});
