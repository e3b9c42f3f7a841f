// This module provides the typed error taxonomy every fallible transport step reports through.

export type ClientErrorCode =
  | 'connection_error'
  | 'serialization_error'
  | 'response_error'
  | 'invalid_response'
  | 'invalid_config';

export class ClientError extends Error {
  public readonly code: ClientErrorCode;
  public readonly details?: unknown;

  public constructor(code: ClientErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ClientError';
    this.code = code;
    this.details = details;
  }
}

// The socket could not be opened, or the request could not be written.
export class ConnectionError extends ClientError {
  public constructor(message: string, details?: unknown) {
    super('connection_error', message, details);
    this.name = 'ConnectionError';
  }
}

// The envelope could not be encoded, or the reply body could not be decoded.
export class SerializationError extends ClientError {
  public constructor(message: string, details?: unknown) {
    super('serialization_error', message, details);
    this.name = 'SerializationError';
  }
}

// Reading the reply failed after the request went out.
export class ResponseError extends ClientError {
  public constructor(message: string, details?: unknown) {
    super('response_error', message, details);
    this.name = 'ResponseError';
  }
}

// Bytes arrived but do not form an HTTP reply carrying a JSON-RPC body.
export class InvalidResponseError extends ClientError {
  public constructor(message: string, details?: unknown) {
    super('invalid_response', message, details);
    this.name = 'InvalidResponseError';
  }
}

export class ConfigError extends ClientError {
  public constructor(message: string, details?: unknown) {
    super('invalid_config', message, details);
    this.name = 'ConfigError';
  }
}

export type RpcError = ConnectionError | SerializationError | ResponseError | InvalidResponseError;

// This helper narrows unknown failures to the four transport error kinds.
export function isRpcError(error: unknown): error is RpcError {
  return (
    error instanceof ConnectionError ||
    error instanceof SerializationError ||
    error instanceof ResponseError ||
    error instanceof InvalidResponseError
  );
}

// This helper returns the message of any thrown value for error details.
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
