// This module reads process configuration once at startup and validates it with zod.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { MCP_SERVER_NAME } from '../version.js';

export interface BackendConfig {
  baseUrl: string;
  requestTimeoutMs: number;
  poolConnections: number;
  keepAliveTimeoutMs: number;
  clientName: string;
}

export interface AppConfig {
  backend: BackendConfig;
  transport: 'stdio' | 'http';
  host: string;
  port: number;
  logLevel: string;
}

// Empty strings count as unset so `FOO=` in a .env file falls back to the default.
const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length === 0 ? undefined : value))
  .optional();

const envSchema = z.object({
  BACKEND_BASE_URL: optionalString.pipe(z.string().url().default('http://127.0.0.1:8080')),
  BACKEND_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().min(100).max(600_000).default(30_000)),
  BACKEND_POOL_CONNECTIONS: optionalString.pipe(z.coerce.number().int().min(1).max(512).default(30)),
  BACKEND_KEEP_ALIVE_MS: optionalString.pipe(z.coerce.number().int().min(1_000).max(600_000).default(30_000)),
  CLIENT_NAME: optionalString.pipe(z.string().max(120).default(MCP_SERVER_NAME)),
  MCP_TRANSPORT: optionalString.pipe(z.enum(['stdio', 'http']).default('stdio')),
  HOST: optionalString.pipe(z.string().default('0.0.0.0')),
  PORT: optionalString.pipe(z.coerce.number().int().min(0).max(65_535).default(3000)),
  LOG_LEVEL: optionalString.pipe(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  )
});

// This function maps environment variables into one immutable application config.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'config_invalid', 'Environment configuration is invalid.', parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  return {
    backend: {
      baseUrl: values.BACKEND_BASE_URL,
      requestTimeoutMs: values.BACKEND_TIMEOUT_MS,
      poolConnections: values.BACKEND_POOL_CONNECTIONS,
      keepAliveTimeoutMs: values.BACKEND_KEEP_ALIVE_MS,
      clientName: values.CLIENT_NAME
    },
    transport: values.MCP_TRANSPORT,
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL
  };
}
