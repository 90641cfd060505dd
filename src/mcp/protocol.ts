// This module implements the JSON-RPC method table for MCP and the streamable HTTP endpoint that serves it.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { ToolDispatcher } from './dispatcher.js';

export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;

export type RpcReply = JsonRpcResponse | JsonRpcResponse[] | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: string | number | null, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: {
      code,
      message,
      data
    }
  };
}

// This helper validates that a payload is structurally a JSON-RPC request.
export function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (!isRecord(value)) {
    return false;
  }

  const id = value.id;
  const validId = id === undefined || id === null || typeof id === 'string' || typeof id === 'number';
  return (
    value.jsonrpc === '2.0' &&
    typeof value.method === 'string' &&
    validId &&
    (value.params === undefined || isRecord(value.params))
  );
}

// This function handles one JSON-RPC request and returns either a response object or null for notifications.
export async function handleRpcRequest(
  request: JsonRpcRequest,
  dispatcher: ToolDispatcher,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse | null> {
  const requestId = request.id ?? null;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();

  logger.debug(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method
    },
    'mcp_rpc_request_received'
  );

  try {
    switch (request.method) {
      case 'initialize': {
        return {
          jsonrpc: '2.0',
          id: requestId,
          result: {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: {
              tools: {
                listChanged: false
              }
            },
            serverInfo: {
              name: MCP_SERVER_NAME,
              version: MCP_SERVER_VERSION
            }
          }
        };
      }

      case 'notifications/initialized': {
        // Sent as a notification by most clients, so there is usually no body.
        return request.id === undefined
          ? null
          : {
              jsonrpc: '2.0',
              id: requestId,
              result: {}
            };
      }

      case 'ping': {
        return {
          jsonrpc: '2.0',
          id: requestId,
          result: {}
        };
      }

      case 'tools/list': {
        return {
          jsonrpc: '2.0',
          id: requestId,
          result: {
            tools: dispatcher.list()
          }
        };
      }

      case 'tools/call': {
        const name = request.params?.name;
        const args = request.params?.arguments;

        if (typeof name !== 'string') {
          logger.warn(
            {
              event: 'mcp_tool_call_invalid_name',
              rpcTraceId,
              rpcRequestId: requestId,
              providedNameType: typeof name
            },
            'mcp_tool_call_invalid_name'
          );
          return rpcError(requestId, RPC_INVALID_PARAMS, 'tools/call requires params.name as string.');
        }

        if (args !== undefined && args !== null && !isRecord(args)) {
          return rpcError(requestId, RPC_INVALID_PARAMS, 'tools/call requires params.arguments as an object.');
        }

        logger.info(
          {
            event: 'mcp_tool_call_requested',
            rpcTraceId,
            rpcRequestId: requestId,
            toolName: name,
            arguments: sanitizeForLog(args ?? {})
          },
          'mcp_tool_call_requested'
        );

        const result = await dispatcher.call(name, args ?? {});

        return {
          jsonrpc: '2.0',
          id: requestId,
          result: dispatcher.toCallToolResult(result)
        };
      }

      default:
        return rpcError(requestId, RPC_METHOD_NOT_FOUND, `Unknown method: ${request.method}`);
    }
  } catch (error) {
    const appError = normalizeError(error);

    logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        code: appError.code,
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    return rpcError(requestId, RPC_INTERNAL_ERROR, appError.message);
  } finally {
    logger.debug(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

// This function handles one decoded message, which may be a single request or a batch.
export async function handleRpcMessage(
  payload: unknown,
  dispatcher: ToolDispatcher,
  logger: FastifyBaseLogger
): Promise<RpcReply> {
  if (Array.isArray(payload)) {
    logger.info(
      {
        event: 'mcp_batch_received',
        batchSize: payload.length
      },
      'mcp_batch_received'
    );

    if (payload.length === 0) {
      return rpcError(null, RPC_INVALID_REQUEST, 'Empty JSON-RPC batch.');
    }

    // Items run concurrently; responses keep batch order.
    const settled = await Promise.all(
      payload.map(async (item: unknown): Promise<JsonRpcResponse | null> => {
        if (!isJsonRpcRequest(item)) {
          logger.warn(
            {
              event: 'mcp_batch_invalid_item'
            },
            'mcp_batch_invalid_item'
          );
          return rpcError(null, RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.');
        }

        return handleRpcRequest(item, dispatcher, logger);
      })
    );
    const responses = settled.filter((response): response is JsonRpcResponse => response !== null);

    return responses.length > 0 ? responses : null;
  }

  if (!isJsonRpcRequest(payload)) {
    logger.warn(
      {
        event: 'mcp_invalid_request_object'
      },
      'mcp_invalid_request_object'
    );
    return rpcError(null, RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.');
  }

  return handleRpcRequest(payload, dispatcher, logger);
}

// This function registers the streamable HTTP MCP routes.
export function registerMcpRoutes(fastify: FastifyInstance, dispatcher: ToolDispatcher): void {
  fastify.get('/mcp', async (request, reply) => {
    request.log.info(
      {
        event: 'mcp_transport_discovery'
      },
      'mcp_transport_discovery'
    );

    reply.send({
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      transport: 'streamable-http',
      endpoint: '/mcp',
      methods: ['initialize', 'notifications/initialized', 'ping', 'tools/list', 'tools/call']
    });
  });

  fastify.post('/mcp', async (request: FastifyRequest, reply: FastifyReply) => {
    const requestLogger = request.log.child({
      component: 'mcp'
    });

    const payload: unknown = request.body;
    if (payload === undefined || payload === null || payload === '') {
      requestLogger.warn(
        {
          event: 'mcp_post_missing_payload'
        },
        'mcp_post_missing_payload'
      );
      reply.code(400).send(rpcError(null, RPC_INVALID_REQUEST, 'Missing JSON-RPC request payload.'));
      return;
    }

    const response = await handleRpcMessage(payload, dispatcher, requestLogger);
    if (!response) {
      reply.code(202).send();
      return;
    }

    if (!Array.isArray(response) && response.error?.code === RPC_INVALID_REQUEST) {
      reply.code(400).send(response);
      return;
    }

    reply.send(response);
  });
}
