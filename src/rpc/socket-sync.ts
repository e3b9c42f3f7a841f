// This module offers the blocking byte exchange by running the asynchronous one in a child process.

import { spawnSync, type SpawnSyncReturns } from 'node:child_process';
import { fileURLToPath } from 'node:url';
import { ConnectionError, ResponseError, messageOf } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';
import type { SocketEndpoint } from './address.js';
import { syncExchangeOutcomeSchema, type SyncExchangeRequest } from './sync-protocol.js';

const MAX_RUNNER_OUTPUT_BYTES = 64 * 1024 * 1024;
const STDERR_PREVIEW_LENGTH = 512;

// Running from TypeScript sources loads the runner through tsx; built output runs it directly.
const fromSources = import.meta.url.endsWith('.ts');
const runnerPath = fileURLToPath(new URL(fromSources ? './sync-runner.ts' : './sync-runner.js', import.meta.url));
const runnerExecArgv = fromSources ? ['--import', 'tsx'] : [];

export interface SyncExchangeOptions {
  timeoutMs?: number;
}

/**
 * Blocking counterpart of `exchangeBytes`: the calling thread waits until the child process
 * has completed the exchange, then the classified outcome is rebuilt here. The runner applies
 * `timeoutMs` as the same idle bound the asynchronous path uses; the child itself has no
 * wall-clock limit.
 */
export function exchangeBytesSync(endpoint: SocketEndpoint, payload: Buffer, options: SyncExchangeOptions = {}): Buffer {
  const request: SyncExchangeRequest = {
    host: endpoint.host,
    port: endpoint.port,
    payload: payload.toString('base64'),
    timeoutMs: options.timeoutMs
  };

  let child: SpawnSyncReturns<Buffer>;
  try {
    child = spawnSync(process.execPath, [...runnerExecArgv, runnerPath], {
      input: Buffer.from(JSON.stringify(request), 'utf8'),
      encoding: 'buffer',
      maxBuffer: MAX_RUNNER_OUTPUT_BYTES,
      windowsHide: true
    });
  } catch (error) {
    throw new ConnectionError(`Blocking exchange runner could not start: ${messageOf(error)}`);
  }

  if (child.error) {
    throw new ConnectionError(`Blocking exchange runner could not start: ${child.error.message}`);
  }

  if (child.status !== 0) {
    throw new ResponseError(`Blocking exchange runner exited with status ${String(child.status)}.`, {
      signal: child.signal,
      stderr: child.stderr.toString('utf8').slice(0, STDERR_PREVIEW_LENGTH)
    });
  }

  const outcome = syncExchangeOutcomeSchema.safeParse(parseJson(child.stdout.toString('utf8'), 'blocking exchange outcome'));
  if (!outcome.success) {
    throw new ResponseError('Blocking exchange runner returned a malformed outcome.', {
      issues: outcome.error.issues
    });
  }

  if (outcome.data.ok) {
    return Buffer.from(outcome.data.bytes, 'base64');
  }

  const { code, message, details } = outcome.data;
  throw code === 'connection_error' ? new ConnectionError(message, details) : new ResponseError(message, details);
}
