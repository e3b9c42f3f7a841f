// This script runs one asynchronous byte exchange to completion on behalf of the blocking transport.
// It reads a request message on stdin and writes exactly one outcome message on stdout.

import { ConnectionError, ResponseError, messageOf } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';
import { exchangeBytes } from './socket.js';
import { syncExchangeRequestSchema, type SyncExchangeOutcome } from './sync-protocol.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function run(): Promise<SyncExchangeOutcome> {
  const request = syncExchangeRequestSchema.parse(parseJson(await readStdin(), 'blocking exchange request'));

  try {
    const bytes = await exchangeBytes(
      { host: request.host, port: request.port },
      Buffer.from(request.payload, 'base64'),
      { timeoutMs: request.timeoutMs }
    );
    return { ok: true, bytes: bytes.toString('base64') };
  } catch (error) {
    if (error instanceof ConnectionError || error instanceof ResponseError) {
      return {
        ok: false,
        code: error.code === 'connection_error' ? 'connection_error' : 'response_error',
        message: error.message,
        details: error.details
      };
    }
    throw error;
  }
}

run()
  .then((outcome) => {
    process.stdout.write(JSON.stringify(outcome));
  })
  .catch((error: unknown) => {
    process.stderr.write(`${messageOf(error)}\n`);
    process.exitCode = 1;
  });
