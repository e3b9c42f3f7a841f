// This module models the remote service location and its normalization rules.

import { ConnectionError } from '../utils/errors.js';

export interface SocketEndpoint {
  host: string;
  port: number;
}

const DEFAULT_HTTP_PORT = 80;

// This helper parses one port string and rejects anything outside the TCP range.
function parsePort(value: string, hostPort: string): number {
  const port = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConnectionError(`Invalid port in service address "${hostPort}".`);
  }
  return port;
}

/**
 * A reusable target for requests: `host:port` plus a path. Normalization guarantees that
 * joining both parts always yields exactly one separating slash.
 */
export class ServiceAddress {
  public readonly hostPort: string;
  public readonly path: string;

  public constructor(hostPort: string, path: string) {
    this.hostPort = hostPort.replace(/\/+$/, '');
    this.path = path.replace(/^\/+/, '').replace(/\/+$/, '');
    Object.freeze(this);
  }

  // This factory accepts the `http://host:port/path` form; TLS endpoints are not supported.
  public static fromUrl(value: string): ServiceAddress {
    const url = new URL(value);
    if (url.protocol !== 'http:') {
      throw new TypeError(`Unsupported service URL protocol "${url.protocol}"; only http: is supported.`);
    }

    const port = url.port === '' ? String(DEFAULT_HTTP_PORT) : url.port;
    return new ServiceAddress(`${url.hostname}:${port}`, url.pathname);
  }

  public fullPath(): string {
    return `${this.hostPort}/${this.path}`;
  }

  // Request-line target, always starting with exactly one slash.
  public requestTarget(): string {
    return `/${this.path}`;
  }

  // This method splits host and port for the socket layer, including bracketed IPv6 hosts.
  public endpoint(): SocketEndpoint {
    const bracketed = /^\[([^\]]+)\]:(.*)$/.exec(this.hostPort);
    if (bracketed) {
      return { host: bracketed[1] ?? '', port: parsePort(bracketed[2] ?? '', this.hostPort) };
    }

    const colon = this.hostPort.lastIndexOf(':');
    if (colon <= 0) {
      throw new ConnectionError(`Service address "${this.hostPort}" must have the form host:port.`);
    }

    return {
      host: this.hostPort.slice(0, colon),
      port: parsePort(this.hostPort.slice(colon + 1), this.hostPort)
    };
  }

  public toString(): string {
    return this.fullPath();
  }
}
