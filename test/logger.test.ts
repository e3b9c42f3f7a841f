// This test suite verifies log payload sanitizing and error shaping.

import { Writable } from 'node:stream';
import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { handleMathRequest } from '../src/math/service.js';
import { ConnectionError } from '../src/utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from '../src/utils/logger.js';

describe('log sanitizing', () => {
  it('redacts secret-looking keys and keeps the rest', () => {
    const sanitized = sanitizeForLog({ credentialName: 'X-Api-Key', credentialValue: 'test-secret', apiKey: 'k', id: 4 });

    expect(sanitized).toMatchObject({ credentialName: 'X-Api-Key', id: 4 });
    expect(sanitized).toHaveProperty('credentialValue', expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/));
    expect(sanitized).toHaveProperty('apiKey', expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/));
  });

  it('truncates long strings and arrays', () => {
    const sanitized = sanitizeForLog({ text: 'a'.repeat(1030), list: Array.from({ length: 32 }, (_, index) => index) });

    expect(sanitized).toEqual({
      text: `${'a'.repeat(1024)}...[truncated:6]`,
      list: [...Array.from({ length: 30 }, (_, index) => index), '[truncated-items:2]']
    });
  });

  it('renders bigint params as text', () => {
    expect(sanitizeForLog([BigInt(12)])).toEqual(['12']);
  });

  it('keeps the classification code of client errors', () => {
    expect(errorForLog(new ConnectionError('refused'))).toMatchObject({
      name: 'ConnectionError',
      message: 'refused',
      code: 'connection_error'
    });
    expect(errorForLog('plain')).toEqual({ message: 'plain' });
  });
});

describe('logger options', () => {
  it('configures level and service without path-based redaction', () => {
    const options = buildLoggerOptions('debug', 'jsonrpc-math-service');

    expect(options.level).toBe('debug');
    expect(options.base).toEqual({ service: 'jsonrpc-math-service' });
    expect(options.redact).toBeUndefined();
  });

  it('hides secret-looking params in the invalid params event', () => {
    const lines: string[] = [];
    const destination = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      }
    });
    const logger = pino(buildLoggerOptions('info', 'jsonrpc-math-service'), destination);

    handleMathRequest({ jsonrpc: '2.0', method: 'add', params: { token: 'test-secret' }, id: 1 }, logger);

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}') as { event?: string; params?: { token?: string } };
    expect(entry.event).toBe('math_rpc_invalid_params');
    expect(entry.params?.token).toMatch(/^\[redacted:[0-9a-f]{12}\]$/);
    expect(lines[0]).not.toContain('test-secret');
  });
});
