// This module binds a transport to one service address for repeated JSON-RPC calls.

import type { Logger } from 'pino';
import type { JsonRpcId, JsonRpcResponse } from '../types/jsonrpc.js';
import type { ServiceAddress } from './address.js';
import type { Credential } from './credential.js';
import { buildEnvelope } from './envelope.js';
import { toRpcResponse } from './response.js';
import { RpcTransport, type TransportOptions } from './transport.js';

export interface RpcClientOptions extends TransportOptions {
  address: ServiceAddress;
  credential?: Credential;
  // Shared transport; when given, the transport options above are ignored.
  transport?: RpcTransport;
}

export interface CallOptions {
  id?: JsonRpcId;
  signal?: AbortSignal;
}

export class RpcClient {
  public readonly address: ServiceAddress;
  private readonly credential?: Credential;
  private readonly transport: RpcTransport;
  private readonly logger?: Logger;
  private lastId = 0;

  public constructor(options: RpcClientOptions) {
    this.address = options.address;
    this.credential = options.credential;
    this.transport =
      options.transport ??
      new RpcTransport({
        timeoutMs: options.timeoutMs,
        userAgent: options.userAgent,
        logger: options.logger
      });
    this.logger = options.logger?.child({
      component: 'rpc_client'
    });
  }

  // Integer ids starting at 1, used when the caller does not choose one.
  private nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  private checkId(response: JsonRpcResponse, id: JsonRpcId, method: string): JsonRpcResponse {
    if (response.id !== id) {
      this.logger?.warn(
        {
          event: 'rpc_response_id_mismatch',
          method,
          requestId: id,
          responseId: response.id
        },
        'rpc_response_id_mismatch'
      );
    }
    return response;
  }

  public async call(method: string, params: unknown, options: CallOptions = {}): Promise<JsonRpcResponse> {
    const id = options.id ?? this.nextId();
    const envelope = buildEnvelope(method, params, id);
    const decoded = await this.transport.send(envelope, this.address, this.credential, { signal: options.signal });
    return this.checkId(toRpcResponse(decoded), id, method);
  }

  public callSync(method: string, params: unknown, options: Pick<CallOptions, 'id'> = {}): JsonRpcResponse {
    const id = options.id ?? this.nextId();
    const envelope = buildEnvelope(method, params, id);
    const decoded = this.transport.sendSync(envelope, this.address, this.credential);
    return this.checkId(toRpcResponse(decoded), id, method);
  }
}
