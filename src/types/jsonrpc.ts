// This file defines the JSON-RPC 2.0 payload types shared by the client, the transport, and the math service.

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// Correlation token chosen by the caller and echoed by the peer without coercion.
export type JsonRpcId = string | number;

export interface JsonRpcRequest<TParams = unknown> {
  readonly jsonrpc: '2.0';
  readonly method: string;
  readonly params: TParams;
  readonly id: JsonRpcId;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError | null;
}
