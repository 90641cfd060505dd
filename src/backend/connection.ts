// This module adapts one undici connection pool to the narrow surface the backend session needs.

import { Pool } from 'undici';
import type { HttpMethod } from '../types/domain.js';

export interface ConnectionOptions {
  origin: string;
  connections: number;
  keepAliveTimeoutMs: number;
}

export interface ConnectionRequest {
  method: HttpMethod;
  path: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface ConnectionResponse {
  statusCode: number;
  body: string;
}

// A pooled connection handle; safe for concurrent requests once constructed.
export interface BackendConnection {
  readonly closed: boolean;
  request(request: ConnectionRequest): Promise<ConnectionResponse>;
  close(): Promise<void>;
}

export type ConnectionFactory = (options: ConnectionOptions) => BackendConnection | Promise<BackendConnection>;

class UndiciPoolConnection implements BackendConnection {
  private readonly pool: Pool;

  public constructor(options: ConnectionOptions) {
    this.pool = new Pool(options.origin, {
      connections: options.connections,
      keepAliveTimeout: options.keepAliveTimeoutMs
    });
  }

  public get closed(): boolean {
    return this.pool.closed || this.pool.destroyed;
  }

  public async request(request: ConnectionRequest): Promise<ConnectionResponse> {
    const response = await this.pool.request({
      method: request.method,
      path: request.path,
      headers: request.headers,
      body: request.body,
      signal: request.signal
    });

    return {
      statusCode: response.statusCode,
      body: await response.body.text()
    };
  }

  public close(): Promise<void> {
    return this.pool.close();
  }
}

export const createUndiciConnection: ConnectionFactory = (options) => new UndiciPoolConnection(options);
