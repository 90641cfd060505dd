// This test suite verifies the pooled undici connection end to end against an in-process HTTP server.

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { BackendSession } from '../src/backend/session.js';
import { DecodeError, HttpStatusError, TimeoutError } from '../src/utils/errors.js';

let server: Server;
let baseUrl = '';

async function readBody(request: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

// This handler serves a few fixed routes under the /graph prefix.
async function handle(request: IncomingMessage, response: ServerResponse): Promise<void> {
  const url = request.url ?? '/';

  if (url.startsWith('/graph/echo')) {
    const body = await readBody(request);
    response.writeHead(200, { 'content-type': 'application/json' });
    response.end(
      JSON.stringify({
        method: request.method,
        url,
        clientName: request.headers['x-client-name'],
        userAgent: request.headers['user-agent'],
        body: body ? JSON.parse(body) : null
      })
    );
    return;
  }

  if (url === '/graph/unavailable') {
    response.writeHead(503, { 'content-type': 'text/plain' });
    response.end('service unavailable');
    return;
  }

  if (url === '/graph/garbled') {
    response.writeHead(200, { 'content-type': 'application/json' });
    response.end('{"papers": [');
    return;
  }

  if (url === '/graph/slow') {
    // Never answered; the client must give up on its own.
    return;
  }

  response.writeHead(404, { 'content-type': 'application/json' });
  response.end(JSON.stringify({ error: 'not found' }));
}

beforeAll(async () => {
  server = createServer((request, response) => {
    handle(request, response).catch((error: unknown) => {
      response.writeHead(500);
      response.end(error instanceof Error ? error.message : 'error');
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}/graph`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

function createSession(requestTimeoutMs = 2_000): BackendSession {
  return new BackendSession({
    config: {
      baseUrl,
      requestTimeoutMs,
      poolConnections: 2,
      keepAliveTimeoutMs: 1_000,
      clientName: 'undici-test'
    }
  });
}

describe('undici pooled connection', () => {
  it('sends prefixed paths, query strings, identification headers, and JSON bodies', async () => {
    const session = createSession();

    try {
      const payload = await session.request({
        method: 'POST',
        path: '/echo',
        query: { limit: 5 },
        body: { query: 'ml' }
      });

      expect(payload).toEqual({
        method: 'POST',
        url: '/graph/echo?limit=5',
        clientName: 'undici-test',
        userAgent: 'undici-test/0.1.0',
        body: { query: 'ml' }
      });
      expect(session.state).toBe('connected');
    } finally {
      await session.shutdown();
    }
  });

  it('reuses one pool across concurrent requests', async () => {
    const session = createSession();

    try {
      await Promise.all(Array.from({ length: 6 }, () => session.request({ method: 'GET', path: '/echo' })));
      expect(session.constructedSessions).toBe(1);
    } finally {
      await session.shutdown();
    }
  });

  it('maps a 503 response to HttpStatusError carrying the body', async () => {
    const session = createSession();

    try {
      const error = await session.request({ method: 'GET', path: '/unavailable' }).catch((reason: unknown) => reason);
      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error instanceof HttpStatusError ? error.message : '').toBe(
        'Backend responded with HTTP 503: service unavailable'
      );
    } finally {
      await session.shutdown();
    }
  });

  it('maps truncated JSON to DecodeError', async () => {
    const session = createSession();

    try {
      await expect(session.request({ method: 'GET', path: '/garbled' })).rejects.toBeInstanceOf(DecodeError);
    } finally {
      await session.shutdown();
    }
  });

  it('times out an unanswered request and keeps serving others', async () => {
    const session = createSession(200);

    try {
      await expect(session.request({ method: 'GET', path: '/slow' })).rejects.toBeInstanceOf(TimeoutError);
      await expect(session.request({ method: 'GET', path: '/echo' })).resolves.toMatchObject({ method: 'GET' });
      expect(session.constructedSessions).toBe(1);
    } finally {
      await session.shutdown();
    }
  });
});
