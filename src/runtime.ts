// This module is the composition root that owns the backend session and everything built on top of it.

import type { FastifyBaseLogger } from 'fastify';
import { ResearchClient } from './backend/client.js';
import type { ConnectionFactory } from './backend/connection.js';
import { BackendSession } from './backend/session.js';
import type { BackendConfig } from './config/env.js';
import { ToolCatalog, type ToolDescriptor } from './mcp/catalog.js';
import { ToolDispatcher } from './mcp/dispatcher.js';
import { buildResearchTools } from './mcp/tools.js';

export interface RuntimeOptions {
  backend: BackendConfig;
  logger?: FastifyBaseLogger;
  connectionFactory?: ConnectionFactory;
  // Replaces the research tool list, mainly for tests.
  tools?: (client: ResearchClient) => ToolDescriptor[];
}

export interface Runtime {
  session: BackendSession;
  client: ResearchClient;
  catalog: ToolCatalog;
  dispatcher: ToolDispatcher;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const session = new BackendSession({
    config: options.backend,
    logger: options.logger,
    connectionFactory: options.connectionFactory
  });
  const client = new ResearchClient(session, options.logger);
  const catalog = new ToolCatalog((options.tools ?? buildResearchTools)(client));
  const dispatcher = new ToolDispatcher(catalog, options.logger);

  options.logger?.info(
    {
      event: 'runtime_created',
      backend: options.backend.baseUrl,
      tools: catalog.size
    },
    'runtime_created'
  );

  return {
    session,
    client,
    catalog,
    dispatcher
  };
}
