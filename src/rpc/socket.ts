// This module performs one request/response byte exchange over a fresh TCP connection.

import { createConnection } from 'node:net';
import { ConnectionError, ResponseError, type ClientError } from '../utils/errors.js';
import type { SocketEndpoint } from './address.js';
import { ResponseProgress } from './framing.js';

export interface ExchangeOptions {
  // Idle bound applied to the connect, write and read phases alike.
  timeoutMs?: number;
  signal?: AbortSignal;
}

type ExchangePhase = 'connect' | 'write' | 'read';

// Failures before the request is fully written are connection failures; later ones are read failures.
function failureFor(phase: ExchangePhase, message: string, details?: unknown): ClientError {
  return phase === 'read' ? new ResponseError(message, details) : new ConnectionError(message, details);
}

/**
 * Connects, writes `payload` in one operation and collects the reply until the peer closes
 * or the reply is complete. The socket is destroyed on every exit path, including timeout
 * and abort.
 */
export function exchangeBytes(endpoint: SocketEndpoint, payload: Buffer, options: ExchangeOptions = {}): Promise<Buffer> {
  const { timeoutMs, signal } = options;

  if (signal?.aborted) {
    return Promise.reject(new ConnectionError('Request was aborted before connecting.'));
  }

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const progress = new ResponseProgress();
    let received = 0;
    let phase: ExchangePhase = 'connect';
    let settled = false;

    const socket = createConnection({ host: endpoint.host, port: endpoint.port });

    const finish = (error: ClientError | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      socket.destroy();

      if (error) {
        reject(error);
        return;
      }
      resolve(Buffer.concat(chunks, received));
    };

    function onAbort(): void {
      finish(failureFor(phase, `Request was aborted during ${phase}.`));
    }

    signal?.addEventListener('abort', onAbort, { once: true });

    if (timeoutMs !== undefined) {
      socket.setTimeout(timeoutMs, () => {
        finish(failureFor(phase, `Socket ${phase} timed out after ${timeoutMs} ms.`, { timeoutMs }));
      });
    }

    socket.once('connect', () => {
      phase = 'write';
      socket.write(payload, (error) => {
        if (error) {
          finish(new ConnectionError(`Failed to write request: ${error.message}`));
          return;
        }
        phase = 'read';
      });
    });

    socket.on('data', (chunk: Buffer) => {
      phase = 'read';
      chunks.push(chunk);
      received += chunk.length;

      if (progress.push(chunk)) {
        finish(null);
      }
    });

    socket.once('end', () => finish(null));
    socket.once('close', () => finish(null));

    socket.once('error', (error: NodeJS.ErrnoException) => {
      const verb = phase === 'connect' ? 'connect to' : phase === 'write' ? 'write to' : 'read from';
      finish(
        failureFor(phase, `Failed to ${verb} ${endpoint.host}:${endpoint.port}: ${error.message}`, {
          errno: error.code
        })
      );
    });
  });
}
