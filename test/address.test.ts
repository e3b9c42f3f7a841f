// This test suite verifies service address normalization and endpoint parsing.

import { describe, expect, it } from 'vitest';
import { ServiceAddress } from '../src/rpc/address.js';
import { ConnectionError } from '../src/utils/errors.js';

describe('service address', () => {
  it('normalizes slashes so the full path has one separator', () => {
    const address = new ServiceAddress('host:port/', '/path/');

    expect(address.hostPort).toBe('host:port');
    expect(address.path).toBe('path');
    expect(address.fullPath()).toBe('host:port/path');
    expect(address.requestTarget()).toBe('/path');
  });

  it('is idempotent on already normalized input', () => {
    const first = new ServiceAddress('localhost:8082//', '//math-api');
    const second = new ServiceAddress(first.hostPort, first.path);

    expect(second.hostPort).toBe(first.hostPort);
    expect(second.path).toBe(first.path);
    expect(second.fullPath()).toBe('localhost:8082/math-api');
  });

  it('keeps inner path segments and allows an empty path', () => {
    expect(new ServiceAddress('h:1', '/v1/rpc/').requestTarget()).toBe('/v1/rpc');
    expect(new ServiceAddress('h:1', '/').requestTarget()).toBe('/');
  });

  it('builds from an http URL with a default port', () => {
    expect(ServiceAddress.fromUrl('http://localhost:8082/math-api').fullPath()).toBe('localhost:8082/math-api');
    expect(ServiceAddress.fromUrl('http://example.test/rpc').hostPort).toBe('example.test:80');
    expect(() => ServiceAddress.fromUrl('https://example.test/rpc')).toThrowError(TypeError);
  });

  it('splits host and port, including bracketed IPv6 hosts', () => {
    expect(new ServiceAddress('127.0.0.1:8082', 'x').endpoint()).toEqual({ host: '127.0.0.1', port: 8082 });
    expect(new ServiceAddress('[::1]:9000', 'x').endpoint()).toEqual({ host: '::1', port: 9000 });
  });

  it('reports unusable host:port values as connection errors', () => {
    expect(() => new ServiceAddress('localhost', 'x').endpoint()).toThrowError(ConnectionError);
    expect(() => new ServiceAddress('localhost:http', 'x').endpoint()).toThrowError(ConnectionError);
    expect(() => new ServiceAddress('localhost:70000', 'x').endpoint()).toThrowError(ConnectionError);
  });
});
