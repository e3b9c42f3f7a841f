// This module centralizes client identity values so framing, logging, and the math service stay in sync.

export const CLIENT_NAME = 'jsonrpc-socket-client';
export const CLIENT_VERSION = '0.1.0';
export const DEFAULT_USER_AGENT = `${CLIENT_NAME}/${CLIENT_VERSION}`;
export const MATH_SERVICE_NAME = 'jsonrpc-math-service';
