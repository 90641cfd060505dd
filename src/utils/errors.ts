// This module provides typed application errors that can be mapped into JSON-RPC results and HTTP responses.

// This union names every failure category the backend and dispatcher layers can surface.
export type ErrorKind =
  | 'connection_error'
  | 'timeout_error'
  | 'http_status_error'
  | 'decode_error'
  | 'validation_error'
  | 'tool_not_found'
  | 'tool_execution_error'
  | 'internal_error';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;
  // Name of the backend client method that raised the error, set once on the way up.
  public operation?: string;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// Session construction failed, or an issued request never reached the backend.
export class ConnectionError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(503, 'connection_error', message, details);
    this.name = 'ConnectionError';
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  public constructor(timeoutMs: number, details?: unknown) {
    super(504, 'timeout_error', `Backend request timed out after ${timeoutMs}ms.`, details);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class HttpStatusError extends AppError {
  public readonly status: number;
  public readonly bodyPreview: string;

  public constructor(status: number, bodyPreview: string, details?: unknown) {
    super(
      502,
      'http_status_error',
      bodyPreview ? `Backend responded with HTTP ${status}: ${bodyPreview}` : `Backend responded with HTTP ${status}.`,
      details
    );
    this.name = 'HttpStatusError';
    this.status = status;
    this.bodyPreview = bodyPreview;
  }
}

export class DecodeError extends AppError {
  public constructor(message: string, details?: unknown) {
    super(502, 'decode_error', message, details);
    this.name = 'DecodeError';
  }
}

export class ToolNotFoundError extends AppError {
  public readonly toolName: string;
  public readonly availableTools: string[];

  public constructor(toolName: string, availableTools: string[]) {
    super(404, 'tool_not_found', `Unknown tool: ${toolName}. Available tools: ${availableTools.join(', ')}`, {
      availableTools
    });
    this.name = 'ToolNotFoundError';
    this.toolName = toolName;
    this.availableTools = availableTools;
  }
}

// This error wraps any handler failure at the dispatcher boundary and keeps the original kind as cause.
export class ToolExecutionError extends AppError {
  public readonly toolName: string;
  public readonly causeKind: ErrorKind;

  public constructor(toolName: string, causeKind: ErrorKind, message: string, details?: unknown) {
    super(500, 'tool_execution_error', `Tool execution failed: ${message}`, details);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
    this.causeKind = causeKind;
  }
}

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'connection_error',
  'timeout_error',
  'http_status_error',
  'decode_error',
  'validation_error',
  'tool_not_found',
  'tool_execution_error',
  'internal_error'
]);

function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.has(value);
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// This helper classifies a normalized error into the taxonomy, folding unrecognized codes into internal_error.
export function errorKindOf(error: AppError): ErrorKind {
  return isErrorKind(error.code) ? error.code : 'internal_error';
}
