// This module sends JSON-RPC envelopes as minimal HTTP/1.1 requests over a raw socket, with async and blocking entry points.

import type { Logger } from 'pino';
import type { JsonRpcRequest, JsonValue } from '../types/jsonrpc.js';
import { isRpcError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { DEFAULT_USER_AGENT } from '../version.js';
import type { ServiceAddress, SocketEndpoint } from './address.js';
import type { Credential } from './credential.js';
import { serializeEnvelope } from './envelope.js';
import { decodeBody, frameRequest, splitResponse } from './framing.js';
import { exchangeBytes } from './socket.js';
import { exchangeBytesSync } from './socket-sync.js';

export interface TransportOptions {
  // Applied uniformly to connect, write and read.
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export interface SendOptions {
  signal?: AbortSignal;
}

interface PreparedRequest {
  endpoint: SocketEndpoint;
  payload: Buffer;
  bodyBytes: number;
}

interface RequestContext {
  method: string;
  id: JsonRpcRequest['id'];
  target: string;
  credentialName?: string;
  mode: 'async' | 'blocking';
}

// This class performs one isolated request/response pair per call; it holds no connection state.
export class RpcTransport {
  private readonly timeoutMs?: number;
  private readonly userAgent: string;
  private readonly logger?: Logger;

  public constructor(options: TransportOptions = {}) {
    if (options.timeoutMs !== undefined && !(Number.isInteger(options.timeoutMs) && options.timeoutMs > 0)) {
      throw new TypeError(`timeoutMs must be a positive integer, got ${options.timeoutMs}.`);
    }

    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger?.child({
      component: 'rpc_transport'
    });
  }

  // This helper writes one structured transport event only when a logger is available.
  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    event: string,
    details?: Record<string, unknown>
  ): void {
    if (!this.logger) {
      return;
    }
    const sanitized = sanitizeForLog(details ?? {});
    this.logger[level](
      {
        event,
        ...(typeof sanitized === 'object' && sanitized !== null ? sanitized : {})
      },
      event
    );
  }

  // Serialize, resolve the endpoint and frame; shared by both entry points.
  private prepare(envelope: JsonRpcRequest, address: ServiceAddress, credential?: Credential): PreparedRequest {
    const body = serializeEnvelope(envelope);
    const payload = frameRequest({
      body,
      address,
      userAgent: this.userAgent,
      credential
    });

    return {
      endpoint: address.endpoint(),
      payload,
      bodyBytes: Buffer.byteLength(body, 'utf8')
    };
  }

  // Split and decode; shared by both entry points.
  private complete(bytes: Buffer, context: RequestContext, startedAt: number): JsonValue {
    const response = splitResponse(bytes);
    const decoded = decodeBody(response.body);

    this.log('info', 'rpc_request_completed', {
      ...context,
      statusCode: response.statusCode,
      responseBytes: bytes.length,
      durationMs: Date.now() - startedAt
    });
    return decoded;
  }

  private started(envelope: JsonRpcRequest, address: ServiceAddress, credential: Credential | undefined, mode: RequestContext['mode']): RequestContext {
    const context: RequestContext = {
      method: envelope.method,
      id: envelope.id,
      target: address.fullPath(),
      credentialName: credential?.name,
      mode
    };
    this.log('debug', 'rpc_request_started', { ...context, timeoutMs: this.timeoutMs });
    return context;
  }

  private failed(error: unknown, context: RequestContext, startedAt: number): void {
    this.log(isRpcError(error) ? 'warn' : 'error', 'rpc_request_failed', {
      ...context,
      durationMs: Date.now() - startedAt,
      error: errorForLog(error)
    });
  }

  /**
   * Sends one envelope and resolves with the decoded JSON reply. A JSON-RPC `error`
   * member in the reply is returned as data, not raised.
   */
  public async send(
    envelope: JsonRpcRequest,
    address: ServiceAddress,
    credential?: Credential,
    options: SendOptions = {}
  ): Promise<JsonValue> {
    const startedAt = Date.now();
    const context = this.started(envelope, address, credential, 'async');

    try {
      const request = this.prepare(envelope, address, credential);
      this.log('debug', 'rpc_request_framed', { ...context, bodyBytes: request.bodyBytes });

      const bytes = await exchangeBytes(request.endpoint, request.payload, {
        timeoutMs: this.timeoutMs,
        signal: options.signal
      });
      return this.complete(bytes, context, startedAt);
    } catch (error) {
      this.failed(error, context, startedAt);
      throw error;
    }
  }

  // Blocking variant of `send`; the calling thread waits for the whole exchange.
  public sendSync(envelope: JsonRpcRequest, address: ServiceAddress, credential?: Credential): JsonValue {
    const startedAt = Date.now();
    const context = this.started(envelope, address, credential, 'blocking');

    try {
      const request = this.prepare(envelope, address, credential);
      this.log('debug', 'rpc_request_framed', { ...context, bodyBytes: request.bodyBytes });

      const bytes = exchangeBytesSync(request.endpoint, request.payload, {
        timeoutMs: this.timeoutMs
      });
      return this.complete(bytes, context, startedAt);
    } catch (error) {
      this.failed(error, context, startedAt);
      throw error;
    }
  }
}
