// This is the process entrypoint that starts the math service and handles graceful shutdown.

import { z } from 'zod';
import { createServer } from './server.js';
import { LOG_LEVELS } from './utils/logger.js';

const env = z
  .object({
    HOST: z.string().trim().min(1).default('127.0.0.1'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8082),
    MATH_RPC_PATH: z.string().trim().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
  })
  .parse(process.env);

const app = createServer({ logLevel: env.LOG_LEVEL, rpcPath: env.MATH_RPC_PATH });

async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');
  await app.close();
  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: env.HOST, port: env.PORT })
  .then(() => {
    app.log.info({ host: env.HOST, port: env.PORT }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: error instanceof Error ? error.message : String(error) }, 'server_start_failed');
    process.exit(1);
  });
