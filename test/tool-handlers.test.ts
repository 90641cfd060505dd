// This test suite verifies research tool handlers end to end through the dispatcher with a fake backend.

import { describe, expect, it } from 'vitest';
import type { ConnectionRequest, ConnectionResponse } from '../src/backend/connection.js';
import { renderKeywords } from '../src/mcp/markdown.js';
import { pickBestTitleMatch } from '../src/mcp/tools.js';
import { createRuntime, type Runtime } from '../src/runtime.js';
import type { Paper } from '../src/types/domain.js';
import { createFakeFactory, jsonResponse, testBackendConfig, type FakeFactory } from './helpers/fake-backend.js';

function rawPaper(index: number, title = `Paper ${index}`): Record<string, unknown> {
  return {
    id: `p-${index}`,
    title,
    authors: [{ id: `a-${index}`, name: `Author ${index}` }],
    citation_count: index,
    published_at: '2023-05-01'
  };
}

function paper(id: string, title: string): Paper {
  return {
    id,
    title,
    abstract: null,
    authors: [],
    keywords: [],
    citations: 0,
    referencesCount: 0,
    publishedAt: null,
    venue: null,
    doi: null,
    url: null
  };
}

function backendRoute(request: ConnectionRequest): ConnectionResponse {
  if (request.path === '/api/v1/papers/search') {
    const body: unknown = request.body ? JSON.parse(request.body) : {};
    const query = typeof body === 'object' && body !== null && 'query' in body ? String(body.query) : '';
    if (query === 'nothing') {
      return jsonResponse({ papers: [] });
    }
    if (query === 'graph transformers') {
      return jsonResponse({ papers: [rawPaper(1, 'Graph Transformers Survey'), rawPaper(2, 'Graph Transformers')] });
    }
    return jsonResponse({ papers: Array.from({ length: 9 }, (_, index) => rawPaper(index)), total_count: 120 });
  }

  if (request.path.startsWith('/api/v1/trends/keywords')) {
    return jsonResponse({
      keywords: [
        { keyword: 'graphs', paper_count: 40 },
        { keyword: 'llm', paper_count: 10 }
      ]
    });
  }

  if (request.path === '/health') {
    return jsonResponse({ status: 'healthy' });
  }

  if (request.path.startsWith('/api/v1/trends/papers')) {
    return { statusCode: 503, body: 'service unavailable' };
  }

  return jsonResponse({});
}

function createTestRuntime(): { runtime: Runtime; fake: FakeFactory } {
  const fake = createFakeFactory(backendRoute);
  const runtime = createRuntime({ backend: testBackendConfig, connectionFactory: fake.factory });
  return { runtime, fake };
}

function firstText(result: { content: Array<{ text: string }> }): string {
  return result.content[0]?.text ?? '';
}

describe('research tool handlers', () => {
  it('returns normalized JSON with at most the requested number of papers', async () => {
    const { runtime } = createTestRuntime();

    const result = runtime.dispatcher.toCallToolResult(
      await runtime.dispatcher.call('search_papers', { query: 'ml', limit: 5 })
    );

    expect(result.isError).toBeUndefined();
    const payload: unknown = JSON.parse(firstText(result));
    expect(payload).toEqual(result.structuredContent);
    const papers = result.structuredContent?.papers;
    expect(Array.isArray(papers) ? papers.length : -1).toBe(5);
    expect(result.structuredContent?.totalCount).toBe(120);
  });

  it('renders a Markdown report when asked', async () => {
    const { runtime } = createTestRuntime();

    const result = runtime.dispatcher.toCallToolResult(
      await runtime.dispatcher.call('search_papers', { query: 'ml', limit: 2, format: 'markdown' })
    );
    const lines = firstText(result).split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '# Paper Search Results',
      '',
      '**Query**: ml',
      '**Total**: 120',
      '',
      '## Papers (showing 2)'
    ]);
    expect(lines).toContain('### 1. Paper 0');
    expect(lines).toContain('**Citations**: 1');
    expect(lines).toContain('**Published At**: 2023-05-01');
  });

  it('renders an empty search with suggestions', async () => {
    const { runtime } = createTestRuntime();

    const result = runtime.dispatcher.toCallToolResult(
      await runtime.dispatcher.call('search_papers', { query: 'nothing', format: 'markdown' })
    );

    expect(firstText(result).split('\n').slice(0, 4)).toEqual([
      '# Search Results',
      '',
      '**Query**: nothing',
      '**Results**: No related papers found'
    ]);
  });

  it('builds a fresh session after disconnect before calling get_top_keywords', async () => {
    const { runtime, fake } = createTestRuntime();

    await runtime.session.connect();
    await runtime.session.disconnect();
    const result = await runtime.dispatcher.call('get_top_keywords', {});

    expect(fake.created).toHaveLength(2);
    expect(fake.created[0]?.requests).toHaveLength(0);
    expect(fake.created[1]?.requests.map((request) => request.path)).toEqual(['/api/v1/trends/keywords?limit=20']);
    expect(result.ok).toBe(true);
    expect(result.ok ? result.structuredContent : null).toEqual({
      keywords: [
        { keyword: 'graphs', paperCount: 40 },
        { keyword: 'llm', paperCount: 10 }
      ],
      totalCount: 2
    });
  });

  it('draws keyword bars relative to the most frequent keyword', async () => {
    const { runtime } = createTestRuntime();

    const result = runtime.dispatcher.toCallToolResult(
      await runtime.dispatcher.call('get_top_keywords', { format: 'markdown' })
    );
    const lines = firstText(result).split('\n');

    expect(lines).toContain(`1. **graphs** ${'█'.repeat(20)} 40 papers`);
    expect(lines).toContain(`2. **llm** ${'█'.repeat(5)}${'░'.repeat(15)} 10 papers`);
  });

  it('wraps a backend 503 as a tool execution error', async () => {
    const { runtime } = createTestRuntime();

    const result = runtime.dispatcher.toCallToolResult(await runtime.dispatcher.call('get_trending_papers', {}));

    expect(result).toEqual({
      content: [
        {
          type: 'text',
          text: 'tool_execution_error: Tool execution failed: Backend responded with HTTP 503: service unavailable'
        }
      ],
      isError: true
    });
  });

  it('rejects invalid arguments as validation failures', async () => {
    const { runtime, fake } = createTestRuntime();

    const result = await runtime.dispatcher.call('search_papers', { query: 'ml', limit: 500 });

    expect(result.ok ? null : result.error.cause).toBe('validation_error');
    expect(fake.attempts()).toBe(0);
  });

  it('requires a query or author id for author search', async () => {
    const { runtime } = createTestRuntime();

    const result = await runtime.dispatcher.call('search_authors', {});

    expect(result.ok ? null : result.error.message).toBe(
      'Tool execution failed: Invalid arguments: arguments: Either query or author_id must be provided.'
    );
  });

  it('looks papers up by title and reports titles without matches', async () => {
    const { runtime } = createTestRuntime();

    const result = await runtime.dispatcher.call('get_paper_details', { titles: ['graph transformers', 'nothing'] });

    expect(result.ok).toBe(true);
    const structured = result.ok ? result.structuredContent : undefined;
    const papers = structured?.papers;
    expect(Array.isArray(papers) ? papers.map((entry: Paper) => entry.id) : []).toEqual(['p-2']);
    expect(structured?.notFound).toEqual(['nothing']);
    expect(structured?.totalCount).toBe(1);
  });

  it('reports server metadata with backend health', async () => {
    const { runtime } = createTestRuntime();

    const result = await runtime.dispatcher.call('get_server_info', {});

    expect(result.ok ? result.structuredContent : null).toEqual({
      server: { name: 'research-graph-mcp', version: '0.1.0', protocolVersion: '2025-03-26' },
      backend: { status: 'healthy', details: {} }
    });
  });
});

describe('title matching', () => {
  const candidates = [paper('p-1', 'Deep Graph Learning at Scale'), paper('p-2', 'Graph Learning')];

  it('prefers an exact title match ignoring case and spacing', () => {
    expect(pickBestTitleMatch('  graph   LEARNING ', candidates)?.id).toBe('p-2');
  });

  it('falls back to containment and then to the first candidate', () => {
    expect(pickBestTitleMatch('deep graph learning', candidates)?.id).toBe('p-1');
    expect(pickBestTitleMatch('unrelated', candidates)?.id).toBe('p-1');
    expect(pickBestTitleMatch('unrelated', [])).toBeNull();
  });
});

describe('keyword markdown', () => {
  it('keeps bars within their width when a count is negative', () => {
    const lines = renderKeywords({
      keywords: [
        { keyword: 'graphs', paperCount: 4 },
        { keyword: 'broken', paperCount: -1 }
      ],
      totalCount: 2
    }).split('\n');

    expect(lines).toContain(`1. **graphs** ${'█'.repeat(20)} 4 papers`);
    expect(lines).toContain(`2. **broken** ${'░'.repeat(20)} -1 papers`);
  });
});
