import express, { type Express } from 'express';
import { vi } from 'vitest';
import type { Server } from 'http';

export interface RecordedRequest {
  method: string;
  path: string;
  body: string;
  contentType: string | undefined;
}

export interface StubServer {
  /** Base URL without a trailing slash, e.g. http://127.0.0.1:54321 */
  url: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/**
 * Start an express app on an ephemeral loopback port. Every request body is
 * read as text and recorded before the routes see it.
 */
export async function startStubServer(configure: (app: Express) => void): Promise<StubServer> {
  const app = express();
  const requests: RecordedRequest[] = [];

  app.use(express.text({ type: '*/*' }));
  app.use((req, _res, next) => {
    requests.push({
      method: req.method,
      path: req.path,
      body: typeof req.body === 'string' ? req.body : '',
      contentType: req.get('content-type')
    });
    next();
  });

  configure(app);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();

  if (address === null || typeof address === 'string') {
    throw new Error('Stub server is not listening on a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

/**
 * A server that accepts each connection and drops it before answering, so
 * every request to it fails at the transport level.
 */
export function startDroppingServer(): Promise<StubServer> {
  return startStubServer((app) => {
    app.use((req) => {
      req.socket.destroy();
    });
  });
}

export function silentConsole() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
