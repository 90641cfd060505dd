// This module wires the HTTP transport routes, request logging, and error mapping around one runtime.

import Fastify, { type FastifyInstance } from 'fastify';
import type { ConnectionFactory } from './backend/connection.js';
import type { AppConfig } from './config/env.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { createRuntime, type Runtime, type RuntimeOptions } from './runtime.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  runtime: Runtime;
}

export interface CreateServerOptions {
  connectionFactory?: ConnectionFactory;
  tools?: RuntimeOptions['tools'];
}

// This function builds and configures the HTTP application and its runtime.
export function createServer(config: AppConfig, options: CreateServerOptions = {}): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024
  });

  const runtime = createRuntime({
    backend: config.backend,
    logger: app.log,
    connectionFactory: options.connectionFactory,
    tools: options.tools
  });

  // This hook logs request start with a sanitized header snapshot.
  app.addHook('onRequest', async (request) => {
    request.log.debug(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        headers: sanitizeForLog({
          'user-agent': request.headers['user-agent'] ?? null,
          'content-type': request.headers['content-type'] ?? null,
          'content-length': request.headers['content-length'] ?? null
        })
      },
      'http_request_start'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs: reply.elapsedTime
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes liveness plus the current backend session state.
  app.get('/health', async () => {
    return {
      ok: true,
      status: 'alive',
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      backendSession: runtime.session.state,
      tools: runtime.catalog.size,
      ts: new Date().toISOString()
    };
  });

  registerMcpRoutes(app, runtime.dispatcher);

  // Closing the app releases every backend session, including ones still closing in the background.
  app.addHook('onClose', async () => {
    await runtime.session.shutdown();
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized =
      error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500
        ? new AppError(error.statusCode, error.code ?? 'bad_request', error.message)
        : normalizeError(error);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    runtime
  };
}
