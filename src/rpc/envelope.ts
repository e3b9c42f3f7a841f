// This module builds JSON-RPC 2.0 request envelopes and owns the protocol format constants.

import type { JsonRpcId, JsonRpcRequest } from '../types/jsonrpc.js';
import { SerializationError } from '../utils/errors.js';
import { stringifyJson } from '../utils/json.js';

export const JSONRPC_VERSION = '2.0' as const;
export const JSON_CONTENT_TYPE = 'application/json';

/**
 * Builds an immutable request envelope. The protocol version is fixed and the id is kept
 * exactly as given, so a numeric id stays numeric and a string id stays a string.
 */
export function buildEnvelope<TParams>(method: string, params: TParams, id: JsonRpcId): JsonRpcRequest<TParams> {
  if (method.length === 0) {
    throw new TypeError('JSON-RPC method name must not be empty.');
  }

  const envelope: JsonRpcRequest<TParams> = {
    jsonrpc: JSONRPC_VERSION,
    method,
    params,
    id
  };
  return Object.freeze(envelope);
}

// This helper rejects ids that would not survive a JSON round trip unchanged.
function encodeId(id: JsonRpcId): string {
  if (typeof id === 'number' && !Number.isSafeInteger(id)) {
    throw new SerializationError('Failed to serialize request id.', {
      originalMessage: `numeric id must be a safe integer, got ${id}`
    });
  }

  return stringifyJson(id, 'request id');
}

/**
 * Encodes an envelope as JSON text with exactly the keys `jsonrpc`, `method`, `params`
 * and `id`, in that order.
 */
export function serializeEnvelope(envelope: JsonRpcRequest): string {
  const method = stringifyJson(envelope.method, 'request method');
  const params = stringifyJson(envelope.params, `params of ${envelope.method}`);
  const id = encodeId(envelope.id);

  return `{"jsonrpc":"${JSONRPC_VERSION}","method":${method},"params":${params},"id":${id}}`;
}
