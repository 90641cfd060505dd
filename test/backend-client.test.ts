// This test suite verifies research client request contracts and payload normalization.

import { describe, expect, it } from 'vitest';
import type { ConnectionRequest } from '../src/backend/connection.js';
import { ResearchClient } from '../src/backend/client.js';
import { BackendSession } from '../src/backend/session.js';
import { HttpStatusError } from '../src/utils/errors.js';
import { createFakeFactory, jsonResponse, testBackendConfig, type FakeRoute } from './helpers/fake-backend.js';

function createClient(route: FakeRoute): { client: ResearchClient; requests: () => ConnectionRequest[] } {
  const fake = createFakeFactory(route);
  const session = new BackendSession({ config: testBackendConfig, connectionFactory: fake.factory });
  return {
    client: new ResearchClient(session),
    requests: () => fake.created.flatMap((connection) => connection.requests)
  };
}

function parseBody(request: ConnectionRequest | undefined): unknown {
  return request?.body === undefined ? undefined : JSON.parse(request.body);
}

const rawPaper = {
  id: 'p-1',
  title: 'Graph Learning',
  abstract: 'An abstract.',
  authors: [{ id: 'a-1', name: 'Ada Example' }, 'Bo Example'],
  keywords: ['graphs', 'learning'],
  citation_count: 12,
  references_count: 30,
  published_at: 1_600_000_000,
  venue_name: 'Test Conf',
  doi: '10.1000/test',
  url: null
};

describe('research client', () => {
  it('scales microsecond and nanosecond timestamps and drops dates outside the valid range', async () => {
    const { client } = createClient(() =>
      jsonResponse({
        papers: [
          { ...rawPaper, id: 'ns', published_at: 1.7e18 },
          { ...rawPaper, id: 'us', published_at: 1.7e15 },
          { ...rawPaper, id: 'far', published_at: 1e25 }
        ]
      })
    );

    const result = await client.searchPapers({ query: 'graphs' });

    expect(result.papers.map((paper) => [paper.id, paper.publishedAt])).toEqual([
      ['ns', '2023-11-14T22:13:20.000Z'],
      ['us', '2023-11-14T22:13:20.000Z'],
      ['far', null]
    ]);
  });

  it('posts paper searches with defaults and normalizes snake_case fields', async () => {
    const { client, requests } = createClient(() => jsonResponse({ papers: [rawPaper], total_count: 42 }));

    const result = await client.searchPapers({ query: 'graph learning' });

    const request = requests()[0];
    expect(request?.method).toBe('POST');
    expect(request?.path).toBe('/api/v1/papers/search');
    expect(parseBody(request)).toEqual({
      query: 'graph learning',
      filters: {},
      sort_by: 'relevance',
      limit: 20,
      offset: 0
    });
    expect(result).toEqual({
      totalCount: 42,
      papers: [
        {
          id: 'p-1',
          title: 'Graph Learning',
          abstract: 'An abstract.',
          authors: [
            { id: 'a-1', name: 'Ada Example' },
            { id: '', name: 'Bo Example' }
          ],
          keywords: ['graphs', 'learning'],
          citations: 12,
          referencesCount: 30,
          publishedAt: '2020-09-13T12:26:40.000Z',
          venue: 'Test Conf',
          doi: '10.1000/test',
          url: null
        }
      ]
    });
  });

  it('truncates paper lists to the requested limit and falls back to the list length for totals', async () => {
    const papers = Array.from({ length: 8 }, (_, index) => ({ id: `p-${index}`, title: `Paper ${index}` }));
    const { client } = createClient(() => jsonResponse({ papers }));

    const result = await client.searchPapers({ query: 'ml', limit: 5 });

    expect(result.papers.map((paper) => paper.id)).toEqual(['p-0', 'p-1', 'p-2', 'p-3', 'p-4']);
    expect(result.totalCount).toBe(8);
  });

  it('fills missing fields with empty values', async () => {
    const { client } = createClient(() => jsonResponse({ papers: [{}] }));

    const result = await client.searchPapers({ query: 'ml' });

    expect(result.papers[0]).toEqual({
      id: '',
      title: 'Unknown Title',
      abstract: null,
      authors: [],
      keywords: [],
      citations: 0,
      referencesCount: 0,
      publishedAt: null,
      venue: null,
      doi: null,
      url: null
    });
  });

  it('returns empty collections when the backend omits them', async () => {
    const { client } = createClient(() => jsonResponse({}));

    await expect(client.getPaperCitations('p-1')).resolves.toEqual({
      paperId: 'p-1',
      citingPapers: [],
      citedPapers: []
    });
    await expect(client.getTopKeywords()).resolves.toEqual({ keywords: [], totalCount: 0 });
  });

  it('unwraps data envelopes', async () => {
    const { client } = createClient(() =>
      jsonResponse({ data: { authors: [{ id: 'a-1', name: 'Ada Example', h_index: 7 }], count: 1 } })
    );

    const result = await client.searchAuthors({ query: 'Ada' });

    expect(result.totalCount).toBe(1);
    expect(result.authors[0]).toEqual({
      id: 'a-1',
      name: 'Ada Example',
      affiliations: [],
      researchInterests: [],
      paperCount: 0,
      citationCount: 0,
      hIndex: 7
    });
  });

  it('maps author filters to backend field names', async () => {
    const { client, requests } = createClient(() => jsonResponse({ authors: [] }));

    await client.searchAuthors({ authorId: 'a-9', filters: { researchArea: 'nlp' }, limit: 3 });

    expect(parseBody(requests()[0])).toEqual({
      author_id: 'a-9',
      filters: { research_area: 'nlp' },
      limit: 3
    });
  });

  it('encodes path parameters and sends query parameters for GET routes', async () => {
    const { client, requests } = createClient(() => jsonResponse({ papers: [] }));

    await client.getAuthorPapers({ authorId: 'a/1', limit: 7 });
    await client.getTrendingPapers({});
    await client.getTopKeywords({ limit: 3, timeRange: '2020-2024' });

    expect(requests().map((request) => `${request.method} ${request.path}`)).toEqual([
      'GET /api/v1/authors/a%2F1/papers?limit=7',
      'GET /api/v1/trends/papers?time_window=month&limit=20',
      'GET /api/v1/trends/keywords?limit=3&time_range=2020-2024'
    ]);
  });

  it('applies network and trend defaults', async () => {
    const { client, requests } = createClient(() => jsonResponse({}));

    await client.getCitationNetwork({ seedPapers: ['p-1'] });
    await client.getResearchTrends({ domain: 'graphs' });

    expect(parseBody(requests()[0])).toEqual({ seed_papers: ['p-1'], depth: 2, direction: 'both', max_nodes: 50 });
    expect(parseBody(requests()[1])).toEqual({
      domain: 'graphs',
      time_range: '2020-2024',
      metrics: ['publication_count'],
      granularity: 'year'
    });
  });

  it('normalizes network nodes and edges', async () => {
    const { client } = createClient(() =>
      jsonResponse({
        nodes: [{ id: 'n-1', name: 'Ada', type: 'author' }],
        edges: [{ source: 'n-1', target: 'n-2', edge_type: 'coauthor' }]
      })
    );

    const network = await client.getCollaborationNetwork({ authors: ['n-1'] });

    expect(network).toEqual({
      nodes: [{ id: 'n-1', label: 'Ada', type: 'author', properties: {} }],
      edges: [{ source: 'n-1', target: 'n-2', type: 'coauthor', weight: 1, properties: {} }]
    });
  });

  it('splits health status from the remaining details', async () => {
    const { client } = createClient(() => jsonResponse({ status: 'healthy', version: '2.1' }));

    await expect(client.healthCheck()).resolves.toEqual({ status: 'healthy', details: { version: '2.1' } });
  });

  it('raises HttpStatusError tagged with the calling method for non-success responses', async () => {
    const { client } = createClient(() => ({ statusCode: 503, body: 'service unavailable' }));

    const error = await client.getTopKeywords().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(HttpStatusError);
    if (!(error instanceof HttpStatusError)) {
      return;
    }
    expect(error.status).toBe(503);
    expect(error.message).toContain('service unavailable');
    expect(error.operation).toBe('getTopKeywords');
  });
});
