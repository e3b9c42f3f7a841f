// This module implements a small JSON-RPC 2.0 arithmetic service over HTTP POST.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { JsonRpcError, JsonRpcId } from '../types/jsonrpc.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';

export const DEFAULT_MATH_RPC_PATH = '/math-api';

// Standard JSON-RPC 2.0 error codes plus one service-defined code.
export const RPC_ERRORS = {
  parseError: { code: -32700, message: 'Parse error' },
  invalidRequest: { code: -32600, message: 'Invalid Request' },
  methodNotFound: { code: -32601, message: 'Method not found' },
  invalidParams: { code: -32602, message: 'Invalid params' },
  internalError: { code: -32603, message: 'Internal error' },
  divisionByZero: { code: -32000, message: 'Division by zero' }
} as const satisfies Record<string, JsonRpcError>;

export interface MathRpcResponse {
  jsonrpc: '2.0';
  result: number | null;
  error: JsonRpcError | null;
  id: JsonRpcId | null;
}

const mathRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
  id: z.union([z.string(), z.number()]).nullable().optional()
});

type MathRequest = z.infer<typeof mathRequestSchema>;

// Every method takes exactly two finite numbers.
const operandsSchema = z.tuple([z.number().finite(), z.number().finite()]);

class DivisionByZero extends Error {}

const OPERATIONS: Record<string, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => {
    if (b === 0) {
      throw new DivisionByZero();
    }
    return a / b;
  }
};

export const MATH_METHODS = Object.keys(OPERATIONS);

function rpcResult(id: JsonRpcId | null, result: number): MathRpcResponse {
  return { jsonrpc: '2.0', result, error: null, id };
}

function rpcError(id: JsonRpcId | null, error: JsonRpcError): MathRpcResponse {
  return { jsonrpc: '2.0', result: null, error: { code: error.code, message: error.message }, id };
}

// This function evaluates one validated request and always yields a reply object.
export function handleMathRequest(request: MathRequest, logger?: FastifyBaseLogger): MathRpcResponse {
  const id = request.id ?? null;
  const operation = Object.hasOwn(OPERATIONS, request.method) ? OPERATIONS[request.method] : undefined;

  if (!operation) {
    logger?.info({ event: 'math_rpc_method_not_found', method: request.method, rpcRequestId: id }, 'math_rpc_method_not_found');
    return rpcError(id, RPC_ERRORS.methodNotFound);
  }

  const operands = operandsSchema.safeParse(request.params);
  if (!operands.success) {
    logger?.info(
      {
        event: 'math_rpc_invalid_params',
        method: request.method,
        rpcRequestId: id,
        params: sanitizeForLog(request.params)
      },
      'math_rpc_invalid_params'
    );
    return rpcError(id, RPC_ERRORS.invalidParams);
  }

  try {
    const [a, b] = operands.data;
    return rpcResult(id, operation(a, b));
  } catch (error) {
    if (error instanceof DivisionByZero) {
      return rpcError(id, RPC_ERRORS.divisionByZero);
    }
    logger?.error({ event: 'math_rpc_failed', method: request.method, error: errorForLog(error) }, 'math_rpc_failed');
    return rpcError(id, RPC_ERRORS.internalError);
  }
}

// This function registers the JSON-RPC endpoint and maps framework request failures to JSON-RPC errors.
export function registerMathRoutes(fastify: FastifyInstance, path: string = DEFAULT_MATH_RPC_PATH): void {
  fastify.setErrorHandler((error, request, reply) => {
    if (error.statusCode === 400) {
      request.log.warn({ event: 'math_rpc_parse_error', error: errorForLog(error) }, 'math_rpc_parse_error');
      reply.code(400).send(rpcError(null, RPC_ERRORS.parseError));
      return;
    }

    // Other client-side rejections from fastify (unsupported media type, oversized body) keep their status.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.warn({ event: 'math_rpc_rejected', statusCode: error.statusCode, error: errorForLog(error) }, 'math_rpc_rejected');
      reply.code(error.statusCode).send(rpcError(null, RPC_ERRORS.invalidRequest));
      return;
    }

    request.log.error({ event: 'math_rpc_unhandled_error', error: errorForLog(error) }, 'math_rpc_unhandled_error');
    reply.code(500).send(rpcError(null, RPC_ERRORS.internalError));
  });

  fastify.post(path, async (request: FastifyRequest, reply: FastifyReply) => {
    const rpcTraceId = randomUUID();
    const requestLogger = request.log.child({ component: 'math_rpc', rpcTraceId });
    const payload = mathRequestSchema.safeParse(request.body);

    if (!payload.success) {
      requestLogger.warn({ event: 'math_rpc_invalid_request' }, 'math_rpc_invalid_request');
      reply.code(400).send(rpcError(null, RPC_ERRORS.invalidRequest));
      return;
    }

    const startedAt = Date.now();
    const response = handleMathRequest(payload.data, requestLogger);

    requestLogger.info(
      {
        event: 'math_rpc_request_completed',
        method: payload.data.method,
        rpcRequestId: response.id,
        errorCode: response.error?.code ?? null,
        durationMs: Date.now() - startedAt
      },
      'math_rpc_request_completed'
    );
    reply.send(response);
  });
}
