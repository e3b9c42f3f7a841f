// This module narrows decoded JSON into the JSON-RPC 2.0 reply shape.

import { z } from 'zod';
import type { JsonRpcResponse } from '../types/jsonrpc.js';
import { InvalidResponseError } from '../utils/errors.js';

const rpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

const rpcResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: rpcErrorSchema.nullable().optional()
});

export function toRpcResponse(value: unknown): JsonRpcResponse {
  const parsed = rpcResponseSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidResponseError('Response body is not a JSON-RPC 2.0 reply.', {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }
  return parsed.data;
}

// True when the peer reported a JSON-RPC level failure.
export function isRpcErrorResponse(response: JsonRpcResponse): response is JsonRpcResponse & { error: NonNullable<JsonRpcResponse['error']> } {
  return response.error !== undefined && response.error !== null;
}
