// This module routes tool discovery and invocation to the catalog and converts every failure into a result.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { CallToolResult, ContentItem, McpTool, TextContent } from '../types/mcp.js';
import {
  AppError,
  ToolExecutionError,
  ToolNotFoundError,
  errorKindOf,
  normalizeError,
  type ErrorKind
} from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { ToolCatalog, ToolHandlerOutput } from './catalog.js';

export interface InvocationError {
  kind: 'tool_not_found' | 'tool_execution_error';
  message: string;
  cause?: ErrorKind;
  details?: unknown;
}

export type InvocationResult =
  | {
      ok: true;
      content: ContentItem[];
      structuredContent?: Record<string, unknown>;
    }
  | {
      ok: false;
      error: InvocationError;
    };

type Success = Extract<InvocationResult, { ok: true }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTextContent(value: unknown): value is TextContent {
  return isRecord(value) && value.type === 'text' && typeof value.text === 'string';
}

function stringifyItem(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }

  return JSON.stringify(value, null, 2);
}

// Text items pass through; anything else becomes one text item holding its JSON rendering.
function toContentItem(value: unknown): ContentItem {
  if (isTextContent(value)) {
    return { type: 'text', text: value.text };
  }

  return { type: 'text', text: stringifyItem(value) };
}

function describeZodError(error: z.ZodError): string {
  const issues = error.issues.map(
    (issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`
  );
  return `Invalid arguments: ${issues.join('; ')}`;
}

// This helper coerces any handler return shape into protocol content items.
export function coerceHandlerOutput(output: ToolHandlerOutput): Success {
  if (typeof output === 'string') {
    return { ok: true, content: [{ type: 'text', text: output }] };
  }

  if (Array.isArray(output)) {
    return { ok: true, content: Array.from(output, toContentItem) };
  }

  if (isRecord(output) && Array.isArray(output.content)) {
    const items: unknown[] = output.content;
    const structured = output.structuredContent;
    return {
      ok: true,
      content: items.map(toContentItem),
      ...(isRecord(structured) ? { structuredContent: structured } : {})
    };
  }

  return {
    ok: true,
    content: [{ type: 'text', text: stringifyItem(output) }],
    structuredContent: isRecord(output) ? output : undefined
  };
}

/**
 * Single entry point for listing and calling tools.
 *
 * `call` never rejects. Unknown names and handler failures of any kind come back as
 * `{ ok: false }` results whose `kind` tells them apart, and the catalog stays usable afterwards.
 */
export class ToolDispatcher {
  private readonly catalog: ToolCatalog;
  private readonly logger?: FastifyBaseLogger;

  public constructor(catalog: ToolCatalog, logger?: FastifyBaseLogger) {
    this.catalog = catalog;
    this.logger = logger?.child({
      component: 'tool_dispatcher'
    });
  }

  public list(): McpTool[] {
    return this.catalog.allDefinitions();
  }

  public async call(name: string, args: Record<string, unknown> = {}): Promise<InvocationResult> {
    const startedAt = Date.now();
    const descriptor = this.catalog.resolve(name);

    if (!descriptor) {
      const error = new ToolNotFoundError(name, this.catalog.names());
      this.logger?.warn(
        {
          event: 'mcp_tool_not_found',
          toolName: name
        },
        'mcp_tool_not_found'
      );
      return {
        ok: false,
        error: {
          kind: 'tool_not_found',
          message: error.message,
          details: error.details
        }
      };
    }

    this.logger?.info(
      {
        event: 'mcp_tool_execution_started',
        toolName: name,
        args: sanitizeForLog(args)
      },
      'mcp_tool_execution_started'
    );

    try {
      const result = coerceHandlerOutput(await descriptor.handler(args));

      this.logger?.info(
        {
          event: 'mcp_tool_execution_completed',
          toolName: name,
          durationMs: Date.now() - startedAt,
          contentItems: result.content.length
        },
        'mcp_tool_execution_completed'
      );
      return result;
    } catch (error) {
      const failure = this.toExecutionError(name, error);

      this.logger?.error(
        {
          event: 'mcp_tool_execution_failed',
          toolName: name,
          durationMs: Date.now() - startedAt,
          cause: failure.causeKind,
          error: errorForLog(error)
        },
        'mcp_tool_execution_failed'
      );
      return {
        ok: false,
        error: {
          kind: 'tool_execution_error',
          message: failure.message,
          cause: failure.causeKind,
          details: failure.details
        }
      };
    }
  }

  // This helper wraps a handler failure while keeping its original category as the cause.
  private toExecutionError(toolName: string, error: unknown): ToolExecutionError {
    if (error instanceof z.ZodError) {
      return new ToolExecutionError(toolName, 'validation_error', describeZodError(error), error.flatten());
    }

    const normalized = normalizeError(error);
    const details =
      error instanceof AppError
        ? {
            operation: error.operation,
            ...(isRecord(error.details) ? error.details : {})
          }
        : undefined;
    return new ToolExecutionError(toolName, errorKindOf(normalized), normalized.message, details);
  }

  // This method renders an invocation result in the MCP tools/call result shape.
  public toCallToolResult(result: InvocationResult): CallToolResult {
    if (result.ok) {
      return {
        content: result.content,
        ...(result.structuredContent ? { structuredContent: result.structuredContent } : {})
      };
    }

    return {
      content: [{ type: 'text', text: `${result.error.kind}: ${result.error.message}` }],
      isError: true
    };
  }
}
