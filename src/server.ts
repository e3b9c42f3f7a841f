// This module wires the math service routes and logging into one fastify application.

import Fastify, { type FastifyInstance } from 'fastify';
import { DEFAULT_MATH_RPC_PATH, MATH_METHODS, registerMathRoutes } from './math/service.js';
import { buildLoggerOptions, type LogLevel } from './utils/logger.js';
import { MATH_SERVICE_NAME } from './version.js';

export interface ServerOptions {
  logLevel?: LogLevel;
  rpcPath?: string;
}

// This function builds and configures the HTTP application without binding a port.
export function createServer(options: ServerOptions = {}): FastifyInstance {
  const rpcPath = `/${(options.rpcPath ?? DEFAULT_MATH_RPC_PATH).replace(/^\/+/, '')}`;
  const app = Fastify({
    logger: buildLoggerOptions(options.logLevel ?? 'info', MATH_SERVICE_NAME)
  });

  registerMathRoutes(app, rpcPath);

  app.get('/health', async () => ({
    status: 'ok',
    service: MATH_SERVICE_NAME,
    endpoint: rpcPath,
    methods: MATH_METHODS
  }));

  return app;
}
