#!/usr/bin/env node
// This is the process entrypoint that connects to the backend, starts the chosen transport, and handles shutdown.

import { loadConfig, type AppConfig } from './config/env.js';
import { startStdioTransport } from './mcp/stdio.js';
import { createRuntime } from './runtime.js';
import { createServer } from './server.js';
import { createStderrLogger, errorForLog } from './utils/logger.js';

// This function runs the HTTP transport until a termination signal arrives.
async function runHttp(config: AppConfig): Promise<void> {
  const { app, runtime } = createServer(config);

  try {
    await runtime.session.connect();
  } catch (error) {
    app.log.fatal({ event: 'backend_connect_failed', error: errorForLog(error) }, 'backend_connect_failed');
    process.exit(1);
  }

  // Closing the app also shuts the backend session down through its onClose hook.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ signal }, 'shutdown_started');
    await app.close();
    app.log.info({ signal }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await app.listen({ host: config.host, port: config.port });
  app.log.info({ host: config.host, port: config.port }, 'server_started');
}

// This function serves newline-delimited JSON-RPC on stdio; stdout carries protocol frames only.
async function runStdio(config: AppConfig): Promise<void> {
  const logger = createStderrLogger(config.logLevel);
  const runtime = createRuntime({ backend: config.backend, logger });

  try {
    await runtime.session.connect();
  } catch (error) {
    logger.fatal({ event: 'backend_connect_failed', error: errorForLog(error) }, 'backend_connect_failed');
    process.exit(1);
  }

  const transport = startStdioTransport({
    input: process.stdin,
    output: process.stdout,
    dispatcher: runtime.dispatcher,
    logger
  });

  let stopping = false;
  async function shutdown(reason: string): Promise<void> {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ reason }, 'shutdown_started');
    transport.close();
    await transport.closed;
    await runtime.session.shutdown();
    logger.info({ reason }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await transport.closed;
  await shutdown('stdin_closed');
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (config.transport === 'http') {
    await runHttp(config);
  } else {
    await runStdio(config);
  }
}

main().catch((error: unknown) => {
  const logger = createStderrLogger();
  logger.fatal({ event: 'startup_failed', error: errorForLog(error) }, 'startup_failed');
  process.exit(1);
});
