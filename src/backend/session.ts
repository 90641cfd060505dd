// This module owns the lifecycle of the pooled backend connection and executes single HTTP exchanges over it.

import type { FastifyBaseLogger } from 'fastify';
import type { BackendConfig } from '../config/env.js';
import type { RequestDescriptor } from '../types/domain.js';
import { ConnectionError, DecodeError, HttpStatusError, TimeoutError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog, truncateString } from '../utils/logger.js';
import { AsyncMutex } from '../utils/mutex.js';
import { MCP_SERVER_VERSION } from '../version.js';
import {
  createUndiciConnection,
  type BackendConnection,
  type ConnectionFactory,
  type ConnectionResponse
} from './connection.js';

export type SessionState = 'disconnected' | 'connecting' | 'connected';

interface Session {
  id: number;
  connection: BackendConnection;
  createdAt: Date;
}

export interface BackendSessionOptions {
  config: BackendConfig;
  logger?: FastifyBaseLogger;
  connectionFactory?: ConnectionFactory;
}

const BODY_PREVIEW_LENGTH = 500;

function isLive(session: Session | null): boolean {
  return session !== null && !session.connection.closed;
}

/**
 * Lazily creates, reuses, and replaces the one pooled connection to the backend origin.
 *
 * Construction is serialized behind a mutex with a re-check after acquisition, so concurrent
 * callers that find no live session produce exactly one new connection. Requests themselves are
 * never serialized. A superseded session is already closed, so replacing it never waits on disposal.
 */
export class BackendSession {
  private readonly config: BackendConfig;
  private readonly origin: string;
  private readonly basePath: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly connectionFactory: ConnectionFactory;
  private readonly logger?: FastifyBaseLogger;
  private readonly lock = new AsyncMutex();
  private current: Session | null = null;
  private connecting = false;
  private sessionCount = 0;

  public constructor(options: BackendSessionOptions) {
    const baseUrl = new URL(options.config.baseUrl);
    this.config = options.config;
    this.origin = baseUrl.origin;
    this.basePath = baseUrl.pathname.replace(/\/+$/, '');
    this.defaultHeaders = {
      accept: 'application/json',
      'user-agent': `${options.config.clientName}/${MCP_SERVER_VERSION}`,
      'x-client-name': options.config.clientName
    };
    this.connectionFactory = options.connectionFactory ?? createUndiciConnection;
    this.logger = options.logger?.child({
      component: 'backend_session'
    });
  }

  public get state(): SessionState {
    if (this.connecting) {
      return 'connecting';
    }

    return isLive(this.current) ? 'connected' : 'disconnected';
  }

  // Number of sessions constructed over the lifetime of this instance.
  public get constructedSessions(): number {
    return this.sessionCount;
  }

  // This helper writes one structured session event only when a logger is available.
  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    event: string,
    details?: Record<string, unknown>
  ): void {
    this.logger?.[level](
      {
        event,
        ...(details ?? {})
      },
      event
    );
  }

  public async connect(): Promise<void> {
    await this.ensureSession();
  }

  // This method returns the current live session, creating it under the lock when absent or closed.
  private async ensureSession(): Promise<Session> {
    const existing = this.current;
    if (existing !== null && isLive(existing)) {
      return existing;
    }

    return this.lock.runExclusive(async () => {
      const published = this.current;
      if (published !== null && isLive(published)) {
        return published;
      }

      if (published !== null) {
        this.current = null;
        this.retire(published);
      }

      this.connecting = true;
      try {
        const connection = await this.connectionFactory({
          origin: this.origin,
          connections: this.config.poolConnections,
          keepAliveTimeoutMs: this.config.keepAliveTimeoutMs
        });

        this.sessionCount += 1;
        const session: Session = {
          id: this.sessionCount,
          connection,
          createdAt: new Date()
        };
        this.current = session;

        this.log('info', 'backend_session_created', {
          sessionId: session.id,
          origin: this.origin,
          poolConnections: this.config.poolConnections
        });
        return session;
      } catch (error) {
        this.log('error', 'backend_session_create_failed', {
          origin: this.origin,
          error: errorForLog(error)
        });
        const message = error instanceof Error ? error.message : 'unknown construction error';
        throw new ConnectionError(`Failed to create backend session: ${message}`, { origin: this.origin });
      } finally {
        this.connecting = false;
      }
    });
  }

  // A session is only superseded once its pool reports closed, so retiring it releases the reference.
  private retire(session: Session): void {
    this.log('debug', 'backend_session_superseded', {
      sessionId: session.id,
      ageMs: Date.now() - session.createdAt.getTime()
    });
  }

  public async disconnect(): Promise<void> {
    const session = this.current;
    if (session === null) {
      return;
    }

    this.current = null;
    if (!session.connection.closed) {
      await session.connection.close();
    }

    this.log('info', 'backend_session_disconnected', {
      sessionId: session.id,
      ageMs: Date.now() - session.createdAt.getTime()
    });
  }

  // This method closes the current session before the process exits.
  public async shutdown(): Promise<void> {
    await this.disconnect();
    this.log('info', 'backend_session_shutdown', { constructedSessions: this.sessionCount });
  }

  // This helper appends non-empty query values to the prefixed request path.
  private buildPath(descriptor: RequestDescriptor): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(descriptor.query ?? {})) {
      if (value !== undefined) {
        search.set(key, String(value));
      }
    }

    const query = search.toString();
    return `${this.basePath}${descriptor.path}${query ? `?${query}` : ''}`;
  }

  // This method performs one HTTP exchange with a total timeout and returns the decoded JSON body.
  public async request(descriptor: RequestDescriptor): Promise<unknown> {
    const session = await this.ensureSession();
    const path = this.buildPath(descriptor);
    const startedAt = Date.now();
    const hasBody = descriptor.body !== undefined;

    this.log('debug', 'backend_request_started', {
      sessionId: session.id,
      method: descriptor.method,
      path,
      body: sanitizeForLog(descriptor.body)
    });

    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), this.config.requestTimeoutMs);
    let response: ConnectionResponse;

    try {
      response = await session.connection.request({
        method: descriptor.method,
        path,
        headers: hasBody ? { ...this.defaultHeaders, 'content-type': 'application/json' } : this.defaultHeaders,
        body: hasBody ? JSON.stringify(descriptor.body) : undefined,
        signal: abortController.signal
      });
    } catch (error) {
      const durationMs = Date.now() - startedAt;

      if (abortController.signal.aborted) {
        this.log('warn', 'backend_request_timeout', {
          method: descriptor.method,
          path,
          timeoutMs: this.config.requestTimeoutMs,
          durationMs
        });
        throw new TimeoutError(this.config.requestTimeoutMs, { method: descriptor.method, path });
      }

      this.log('error', 'backend_request_failed_transport', {
        method: descriptor.method,
        path,
        durationMs,
        error: errorForLog(error)
      });
      const message = error instanceof Error ? error.message : 'unknown transport error';
      throw new ConnectionError(`Backend request failed: ${message}`, { method: descriptor.method, path });
    } finally {
      clearTimeout(timer);
    }

    return this.decode(descriptor, path, response, startedAt);
  }

  // This helper turns a raw response into JSON or a categorized status/decode error.
  private decode(descriptor: RequestDescriptor, path: string, response: ConnectionResponse, startedAt: number): unknown {
    const durationMs = Date.now() - startedAt;

    if (response.statusCode < 200 || response.statusCode > 299) {
      const bodyPreview = truncateString(response.body.trim(), BODY_PREVIEW_LENGTH);
      this.log('error', 'backend_request_http_error', {
        method: descriptor.method,
        path,
        status: response.statusCode,
        bodyPreview,
        durationMs
      });
      throw new HttpStatusError(response.statusCode, bodyPreview, { method: descriptor.method, path });
    }

    if (response.statusCode === 204 || response.body.trim().length === 0) {
      this.log('debug', 'backend_request_completed', { method: descriptor.method, path, status: response.statusCode, durationMs });
      return {};
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      this.log('error', 'backend_request_decode_failed', {
        method: descriptor.method,
        path,
        status: response.statusCode,
        bodyPreview: truncateString(response.body, BODY_PREVIEW_LENGTH)
      });
      const message = error instanceof Error ? error.message : 'unknown parse error';
      throw new DecodeError(`Backend returned invalid JSON for ${descriptor.method} ${path}: ${message}`, {
        method: descriptor.method,
        path
      });
    }

    this.log('debug', 'backend_request_completed', {
      method: descriptor.method,
      path,
      status: response.statusCode,
      durationMs
    });
    return payload;
  }
}
