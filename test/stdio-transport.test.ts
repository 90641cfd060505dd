// This test suite verifies newline-delimited JSON-RPC handling over in-memory streams.

import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { startStdioTransport } from '../src/mcp/stdio.js';
import { createRuntime } from '../src/runtime.js';
import { createSilentLogger } from '../src/utils/logger.js';
import { createFakeFactory, jsonResponse, testBackendConfig } from './helpers/fake-backend.js';

// This helper feeds the given lines through a transport and returns every frame written back.
async function exchange(lines: string[]): Promise<unknown[]> {
  const fake = createFakeFactory(() => jsonResponse({ status: 'healthy' }));
  const runtime = createRuntime({ backend: testBackendConfig, connectionFactory: fake.factory });
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });
  const drained = new Promise<string>((resolve) => {
    output.on('end', () => resolve(written));
  });

  const transport = startStdioTransport({
    input,
    output,
    dispatcher: runtime.dispatcher,
    logger: createSilentLogger()
  });

  for (const line of lines) {
    input.write(`${line}\n`);
  }
  input.end();
  await transport.closed;
  await runtime.session.shutdown();
  output.end();
  const text = await drained;

  return text
    .split('\n')
    .filter((frame) => frame.length > 0)
    .map((frame): unknown => JSON.parse(frame));
}

describe('stdio transport', () => {
  it('answers each request line with one response frame', async () => {
    const frames = await exchange([
      JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'ping' }),
      '',
      JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' })
    ]);

    expect(frames).toEqual([{ jsonrpc: '2.0', id: 1, result: {} }]);
  });

  it('reports unparsable lines as parse errors and keeps reading', async () => {
    const frames = await exchange(['{not json', JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'ping' })]);

    expect(frames).toEqual([
      { jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Request was not valid JSON.' } },
      { jsonrpc: '2.0', id: 2, result: {} }
    ]);
  });

  it('waits for in-flight tool calls before closing', async () => {
    const frames = await exchange([
      JSON.stringify({
        jsonrpc: '2.0',
        id: 3,
        method: 'tools/call',
        params: { name: 'get_server_info', arguments: {} }
      })
    ]);

    expect(frames).toHaveLength(1);
    expect(frames[0]).toMatchObject({
      id: 3,
      result: {
        structuredContent: {
          backend: { status: 'healthy', details: {} }
        }
      }
    });
  });
});
