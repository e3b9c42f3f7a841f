// This helper module starts in-process peers for transport tests.

import { createServer as createNetServer, type AddressInfo, type Server, type Socket } from 'node:net';
import type { FastifyInstance } from 'fastify';
import { responseIsComplete } from '../../src/rpc/framing.js';
import { createServer } from '../../src/server.js';

function boundPort(address: AddressInfo | string | null): number {
  if (address === null || typeof address === 'string') {
    throw new Error('server did not bind a TCP port');
  }
  return address.port;
}

export interface RunningMathServer {
  app: FastifyInstance;
  hostPort: string;
}

export async function startMathServer(): Promise<RunningMathServer> {
  const app = createServer({ logLevel: 'silent' });
  await app.listen({ host: '127.0.0.1', port: 0 });
  return { app, hostPort: `127.0.0.1:${boundPort(app.server.address())}` };
}

export interface RawServer {
  hostPort: string;
  // Complete request bytes, one entry per connection that sent a full request.
  requests: Buffer[];
  connectionCount(): number;
  // Resolves when the first accepted connection has been closed by either side.
  firstConnectionClosed: Promise<void>;
  close(): Promise<void>;
}

/**
 * Starts a TCP server that buffers each full request (headers plus declared body) and
 * hands it to `respond`. A `respond` that does nothing leaves the client waiting.
 */
export async function startRawServer(respond: (request: Buffer, socket: Socket) => void): Promise<RawServer> {
  const sockets = new Set<Socket>();
  const requests: Buffer[] = [];
  let connections = 0;
  let markFirstClosed: () => void = () => undefined;
  const firstConnectionClosed = new Promise<void>((resolve) => {
    markFirstClosed = resolve;
  });

  const server: Server = createNetServer((socket) => {
    connections += 1;
    const isFirst = connections === 1;
    sockets.add(socket);
    let received = Buffer.alloc(0);
    let answered = false;

    socket.on('data', (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);
      if (!answered && responseIsComplete(received)) {
        answered = true;
        requests.push(received);
        respond(received, socket);
      }
    });
    socket.on('error', () => undefined);
    socket.on('close', () => {
      sockets.delete(socket);
      if (isFirst) {
        markFirstClosed();
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const port = boundPort(server.address());

  return {
    hostPort: `127.0.0.1:${port}`,
    requests,
    connectionCount: () => connections,
    firstConnectionClosed,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      })
  };
}

// Builds a complete HTTP reply around a body with a correct Content-Length.
export function httpReply(body: string, statusLine = 'HTTP/1.1 200 OK'): string {
  return `${statusLine}\r\nContent-Type: application/json\r\nContent-Length: ${Buffer.byteLength(body, 'utf8')}\r\n\r\n${body}`;
}

// Returns a port on 127.0.0.1 that had a listener a moment ago and has none now.
export async function closedPort(): Promise<number> {
  const server = createNetServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const port = boundPort(server.address());
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}
