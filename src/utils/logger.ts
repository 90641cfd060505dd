// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

const MAX_LOG_DEPTH = 5;
const MAX_LOG_STRING_LENGTH = 1024;
const MAX_LOG_ARRAY_ITEMS = 30;
const MAX_LOG_OBJECT_KEYS = 30;

const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  '*.authorization',
  '*.cookie',
  '*.token',
  '*.apiKey'
];

const SENSITIVE_KEY_FRAGMENTS = ['token', 'password', 'authorization', 'cookie', 'secret', 'apikey', 'api_key'];

// This helper returns true for field names that should never be logged in cleartext.
function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

export function truncateString(value: string, maxLength = MAX_LOG_STRING_LENGTH): string {
  if (value.length <= maxLength) {
    return value;
  }

  return `${value.slice(0, maxLength)}...[truncated:${value.length - maxLength}]`;
}

// This helper returns a stable short hash to correlate sensitive values without exposing them.
function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

function sanitizeEntries(entries: Array<[string, unknown]>, depth: number): Record<string, unknown> {
  const target: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, MAX_LOG_OBJECT_KEYS)) {
    if (isSensitiveKey(key)) {
      const serialized = typeof entryValue === 'string' ? entryValue : JSON.stringify(entryValue ?? '');
      target[key] = `[redacted:${shortHash(serialized)}]`;
      continue;
    }

    target[key] = sanitizeForLog(entryValue, depth + 1);
  }

  if (entries.length > MAX_LOG_OBJECT_KEYS) {
    target.__truncatedKeys = entries.length - MAX_LOG_OBJECT_KEYS;
  }

  return target;
}

// This helper sanitizes tool arguments and backend payloads before they reach a log line.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (depth > MAX_LOG_DEPTH) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return truncateString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value.slice(0, MAX_LOG_ARRAY_ITEMS).map((item) => sanitizeForLog(item, depth + 1));
    if (value.length > MAX_LOG_ARRAY_ITEMS) {
      items.push(`[truncated-items:${value.length - MAX_LOG_ARRAY_ITEMS}]`);
    }
    return items;
  }

  if (typeof value === 'object') {
    return sanitizeEntries(Object.entries(value), depth);
  }

  return String(value);
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one pino configuration shared by the Fastify and stdio transports.
export function buildLoggerOptions(level = 'info'): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// stdout belongs to the stdio transport, so standalone loggers always write to stderr.
export function createStderrLogger(level = 'info'): FastifyBaseLogger {
  return pino(buildLoggerOptions(level), pino.destination(2));
}

// This helper returns a logger that drops every entry, used by tests and library callers.
export function createSilentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}
