// Public API of the client library.

export { ServiceAddress, type SocketEndpoint } from './rpc/address.js';
export { Credential } from './rpc/credential.js';
export { JSONRPC_VERSION, JSON_CONTENT_TYPE, buildEnvelope, serializeEnvelope } from './rpc/envelope.js';
export {
  HEADER_SEPARATOR,
  ResponseProgress,
  decodeBody,
  frameRequest,
  responseIsComplete,
  splitResponse,
  type ParsedResponse
} from './rpc/framing.js';
export { exchangeBytes, type ExchangeOptions } from './rpc/socket.js';
export { exchangeBytesSync } from './rpc/socket-sync.js';
export { RpcTransport, type SendOptions, type TransportOptions } from './rpc/transport.js';
export { isRpcErrorResponse, toRpcResponse } from './rpc/response.js';
export { RpcClient, type CallOptions, type RpcClientOptions } from './rpc/client.js';
export { loadClientConfig, toTransportOptions, type ClientConfig } from './config/client-config.js';
export {
  ClientError,
  ConfigError,
  ConnectionError,
  InvalidResponseError,
  ResponseError,
  SerializationError,
  isRpcError,
  type ClientErrorCode,
  type RpcError
} from './utils/errors.js';
export { createLogger, type LogLevel } from './utils/logger.js';
export type { JsonRpcError, JsonRpcId, JsonRpcRequest, JsonRpcResponse, JsonValue } from './types/jsonrpc.js';
export { CLIENT_NAME, CLIENT_VERSION, DEFAULT_USER_AGENT } from './version.js';
