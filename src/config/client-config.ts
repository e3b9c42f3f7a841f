// This module reads client configuration from the environment and validates it before use.

import type { Logger } from 'pino';
import { z } from 'zod';
import type { TransportOptions } from '../rpc/transport.js';
import { ConfigError } from '../utils/errors.js';
import { LOG_LEVELS } from '../utils/logger.js';
import { DEFAULT_USER_AGENT } from '../version.js';

const clientConfigSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  logLevel: z.enum(LOG_LEVELS).default('info')
});

export type ClientConfig = z.infer<typeof clientConfigSchema>;

// Blank variables count as unset.
function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = clientConfigSchema.safeParse({
    timeoutMs: readVariable(env, 'RPC_TIMEOUT_MS'),
    userAgent: readVariable(env, 'RPC_USER_AGENT'),
    logLevel: readVariable(env, 'LOG_LEVEL')
  });

  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(`Invalid client configuration: ${fields.join(', ')}.`, {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  return parsed.data;
}

export function toTransportOptions(config: ClientConfig, logger?: Logger): TransportOptions {
  return {
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    logger
  };
}
