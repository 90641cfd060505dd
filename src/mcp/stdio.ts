// This module serves newline-delimited JSON-RPC over a pair of streams, normally stdin and stdout.

import readline from 'node:readline';
import type { FastifyBaseLogger } from 'fastify';
import type { JsonRpcResponse } from '../types/mcp.js';
import { errorForLog } from '../utils/logger.js';
import type { ToolDispatcher } from './dispatcher.js';
import { RPC_INTERNAL_ERROR, handleRpcMessage, rpcError, type RpcReply } from './protocol.js';

export const RPC_PARSE_ERROR = -32700;

export interface StdioTransportOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  dispatcher: ToolDispatcher;
  logger: FastifyBaseLogger;
}

export interface StdioTransport {
  // Resolves once input has ended and every in-flight request has been answered.
  closed: Promise<void>;
  close(): void;
}

function writeReply(output: NodeJS.WritableStream, reply: JsonRpcResponse | JsonRpcResponse[]): void {
  output.write(`${JSON.stringify(reply)}\n`);
}

export function startStdioTransport(options: StdioTransportOptions): StdioTransport {
  const logger = options.logger.child({
    component: 'stdio_transport'
  });
  const inFlight = new Set<Promise<void>>();
  const rl = readline.createInterface({
    input: options.input,
    crlfDelay: Infinity
  });

  // This helper decodes one line and answers it; failures are written back as JSON-RPC errors.
  const handleLine = async (line: string): Promise<void> => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(trimmed);
    } catch (error) {
      logger.warn(
        {
          event: 'stdio_parse_failed',
          error: errorForLog(error)
        },
        'stdio_parse_failed'
      );
      writeReply(options.output, rpcError(null, RPC_PARSE_ERROR, 'Request was not valid JSON.'));
      return;
    }

    const reply: RpcReply = await handleRpcMessage(payload, options.dispatcher, logger);
    if (reply) {
      writeReply(options.output, reply);
    }
  };

  rl.on('line', (line: string) => {
    const task = handleLine(line)
      .catch((error: unknown) => {
        logger.error(
          {
            event: 'stdio_request_failed',
            error: errorForLog(error)
          },
          'stdio_request_failed'
        );
        writeReply(options.output, rpcError(null, RPC_INTERNAL_ERROR, 'Internal error.'));
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  });

  const closed = new Promise<void>((resolve) => {
    rl.once('close', () => {
      logger.info(
        {
          event: 'stdio_input_closed',
          pending: inFlight.size
        },
        'stdio_input_closed'
      );
      void Promise.allSettled([...inFlight]).then(() => resolve());
    });
  });

  logger.info(
    {
      event: 'stdio_transport_started'
    },
    'stdio_transport_started'
  );

  return {
    closed,
    close: () => rl.close()
  };
}
