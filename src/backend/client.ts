// This module wraps research backend capabilities and maps loosely-typed payloads into strict domain objects.

import type { FastifyBaseLogger } from 'fastify';
import type {
  Author,
  AuthorFilters,
  AuthorPapers,
  AuthorRef,
  AuthorSearchResult,
  BackendHealth,
  CitationDirection,
  KeywordStat,
  LandscapeDimension,
  Network,
  NetworkEdge,
  NetworkNode,
  Paper,
  PaperCitations,
  PaperFilters,
  PaperSearchResult,
  RequestDescriptor,
  ResearchLandscape,
  ResearchTrends,
  TimeWindow,
  TopKeywords,
  TrendGranularity,
  TrendingPapers,
  TrendMetric,
  TrendPoint
} from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import type { BackendSession } from './session.js';

type RawRecord = Record<string, unknown>;

export interface SearchPapersInput {
  query: string;
  filters?: PaperFilters;
  sortBy?: 'relevance' | 'citations' | 'date';
  limit?: number;
  offset?: number;
}

export interface SearchAuthorsInput {
  query?: string;
  authorId?: string;
  filters?: AuthorFilters;
  limit?: number;
}

export interface CitationNetworkInput {
  seedPapers: string[];
  depth?: number;
  direction?: CitationDirection;
  maxNodes?: number;
}

export interface CollaborationNetworkInput {
  authors: string[];
  timeRange?: string;
  maxNodes?: number;
}

export interface ResearchTrendsInput {
  domain: string;
  timeRange?: string;
  metrics?: TrendMetric[];
  granularity?: TrendGranularity;
}

const DEFAULT_LIMIT = 20;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): RawRecord {
  return isRecord(value) ? value : {};
}

function readArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function readString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  return fallback;
}

function readOptionalString(value: unknown): string | null {
  const text = readString(value).trim();
  return text.length > 0 ? text : null;
}

function readNumber(value: unknown, fallback = 0): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : fallback;
}

function readStringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.trim() ? [value.trim()] : [];
  }

  return readArray(value)
    .map((item) => readString(item).trim())
    .filter((item) => item.length > 0);
}

// Publication dates arrive as ISO strings or unix timestamps in seconds, milliseconds,
// microseconds or nanoseconds. Timestamps outside the Date range normalize to null.
function readDate(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    let millis = value;
    if (value > 1e17) {
      millis = value / 1e6;
    } else if (value > 1e14) {
      millis = value / 1e3;
    } else if (value < 1e12) {
      millis = value * 1000;
    }
    const date = new Date(millis);
    return Number.isFinite(date.getTime()) ? date.toISOString() : null;
  }

  return readOptionalString(value);
}

// Some backend routes wrap their payload in a `data` envelope.
function unwrapEnvelope(payload: unknown): RawRecord {
  const record = asRecord(payload);
  return isRecord(record.data) ? record.data : record;
}

function mapAuthorRef(raw: unknown): AuthorRef {
  if (typeof raw === 'string') {
    return { id: '', name: raw };
  }

  const record = asRecord(raw);
  return {
    id: readString(record.id),
    name: readString(record.name, 'Unknown')
  };
}

function mapPaper(raw: unknown): Paper {
  const record = asRecord(raw);
  return {
    id: readString(record.id),
    title: readString(record.title, 'Unknown Title'),
    abstract: readOptionalString(record.abstract),
    authors: readArray(record.authors).map(mapAuthorRef),
    keywords: readStringList(record.keywords),
    citations: readNumber(record.citations ?? record.citation_count),
    referencesCount: readNumber(record.references_count),
    publishedAt: readDate(record.published_at ?? record.publication_date),
    venue: readOptionalString(record.venue_name ?? record.venue),
    doi: readOptionalString(record.doi),
    url: readOptionalString(record.url)
  };
}

function mapAuthor(raw: unknown): Author {
  const record = asRecord(raw);
  return {
    id: readString(record.id),
    name: readString(record.name, 'Unknown Author'),
    affiliations: readStringList(record.affiliations ?? record.affiliation),
    researchInterests: readStringList(record.research_interests),
    paperCount: readNumber(record.paper_count),
    citationCount: readNumber(record.citation_count),
    hIndex: readNumber(record.h_index)
  };
}

function mapNode(raw: unknown): NetworkNode {
  const record = asRecord(raw);
  const id = readString(record.id);
  return {
    id,
    label: readString(record.label ?? record.name, id),
    type: readString(record.type, 'unknown'),
    properties: asRecord(record.properties)
  };
}

function mapEdge(raw: unknown): NetworkEdge {
  const record = asRecord(raw);
  return {
    source: readString(record.source),
    target: readString(record.target),
    type: readString(record.type ?? record.edge_type, 'unknown'),
    weight: readNumber(record.weight, 1),
    properties: asRecord(record.properties)
  };
}

function mapNetwork(record: RawRecord): Network {
  return {
    nodes: readArray(record.nodes).map(mapNode),
    edges: readArray(record.edges).map(mapEdge)
  };
}

function mapKeyword(raw: unknown): KeywordStat {
  const record = asRecord(raw);
  return {
    keyword: readString(record.keyword ?? record.name, 'Unknown'),
    paperCount: readNumber(record.paper_count ?? record.count)
  };
}

function mapTrendPoint(raw: unknown): TrendPoint {
  const record = asRecord(raw);
  return {
    period: readString(record.period ?? record.year ?? record.date),
    metric: readString(record.metric, 'publication_count'),
    value: readNumber(record.value ?? record.count)
  };
}

// Totals fall back to the returned list length when the backend omits them.
function readTotal(record: RawRecord, listLength: number): number {
  return readNumber(record.total_count ?? record.count ?? record.total, listLength);
}

// This class exposes one method per backend capability over a shared backend session.
export class ResearchClient {
  private readonly session: BackendSession;
  private readonly logger?: FastifyBaseLogger;

  public constructor(session: BackendSession, logger?: FastifyBaseLogger) {
    this.session = session;
    this.logger = logger?.child({
      component: 'research_client'
    });
  }

  // This helper issues one request, normalizes the payload, and tags failures with the calling method.
  private async call<T>(operation: string, descriptor: RequestDescriptor, map: (payload: RawRecord) => T): Promise<T> {
    try {
      const payload = await this.session.request(descriptor);
      return map(unwrapEnvelope(payload));
    } catch (error) {
      if (error instanceof AppError && error.operation === undefined) {
        error.operation = operation;
      }

      this.logger?.warn(
        {
          event: 'research_client_call_failed',
          operation,
          method: descriptor.method,
          path: descriptor.path,
          error: errorForLog(error)
        },
        'research_client_call_failed'
      );
      throw error;
    }
  }

  public async searchPapers(input: SearchPapersInput): Promise<PaperSearchResult> {
    const limit = input.limit ?? DEFAULT_LIMIT;
    return this.call(
      'searchPapers',
      {
        method: 'POST',
        path: '/api/v1/papers/search',
        body: {
          query: input.query,
          filters: input.filters ?? {},
          sort_by: input.sortBy ?? 'relevance',
          limit,
          offset: input.offset ?? 0
        }
      },
      (record) => {
        const papers = readArray(record.papers).map(mapPaper);
        return {
          papers: papers.slice(0, limit),
          totalCount: readTotal(record, papers.length)
        };
      }
    );
  }

  public async getPaperDetails(paperIds: string[]): Promise<{ papers: Paper[] }> {
    return this.call(
      'getPaperDetails',
      {
        method: 'POST',
        path: '/api/v1/papers/details',
        body: { paper_ids: paperIds }
      },
      (record) => ({
        papers: readArray(record.papers).map(mapPaper)
      })
    );
  }

  public async getPaperCitations(paperId: string): Promise<PaperCitations> {
    return this.call(
      'getPaperCitations',
      {
        method: 'GET',
        path: `/api/v1/papers/${encodeURIComponent(paperId)}/citations`
      },
      (record) => ({
        paperId,
        citingPapers: readArray(record.citing_papers).map(mapPaper),
        citedPapers: readArray(record.cited_papers).map(mapPaper)
      })
    );
  }

  public async searchAuthors(input: SearchAuthorsInput): Promise<AuthorSearchResult> {
    const limit = input.limit ?? DEFAULT_LIMIT;
    return this.call(
      'searchAuthors',
      {
        method: 'POST',
        path: '/api/v1/authors/search',
        body: {
          query: input.query,
          author_id: input.authorId,
          filters: {
            affiliation: input.filters?.affiliation,
            research_area: input.filters?.researchArea
          },
          limit
        }
      },
      (record) => {
        const authors = readArray(record.authors).map(mapAuthor);
        return {
          authors: authors.slice(0, limit),
          totalCount: readTotal(record, authors.length)
        };
      }
    );
  }

  public async getAuthorDetails(authorIds: string[]): Promise<{ authors: Author[] }> {
    return this.call(
      'getAuthorDetails',
      {
        method: 'POST',
        path: '/api/v1/authors/details',
        body: { author_ids: authorIds }
      },
      (record) => ({
        authors: readArray(record.authors).map(mapAuthor)
      })
    );
  }

  public async getAuthorPapers(input: { authorId: string; limit?: number }): Promise<AuthorPapers> {
    const limit = input.limit ?? DEFAULT_LIMIT;
    return this.call(
      'getAuthorPapers',
      {
        method: 'GET',
        path: `/api/v1/authors/${encodeURIComponent(input.authorId)}/papers`,
        query: { limit }
      },
      (record) => {
        const papers = readArray(record.papers).map(mapPaper);
        return {
          authorId: input.authorId,
          papers: papers.slice(0, limit),
          totalCount: readTotal(record, papers.length)
        };
      }
    );
  }

  public async getCitationNetwork(input: CitationNetworkInput): Promise<Network> {
    return this.call(
      'getCitationNetwork',
      {
        method: 'POST',
        path: '/api/v1/networks/citation',
        body: {
          seed_papers: input.seedPapers,
          depth: input.depth ?? 2,
          direction: input.direction ?? 'both',
          max_nodes: input.maxNodes ?? 50
        }
      },
      mapNetwork
    );
  }

  public async getCollaborationNetwork(input: CollaborationNetworkInput): Promise<Network> {
    return this.call(
      'getCollaborationNetwork',
      {
        method: 'POST',
        path: '/api/v1/networks/collaboration',
        body: {
          authors: input.authors,
          time_range: input.timeRange,
          max_nodes: input.maxNodes ?? 50
        }
      },
      mapNetwork
    );
  }

  public async getTrendingPapers(input: { timeWindow?: TimeWindow; limit?: number }): Promise<TrendingPapers> {
    const timeWindow = input.timeWindow ?? 'month';
    const limit = input.limit ?? DEFAULT_LIMIT;
    return this.call(
      'getTrendingPapers',
      {
        method: 'GET',
        path: '/api/v1/trends/papers',
        query: { time_window: timeWindow, limit }
      },
      (record) => {
        const papers = readArray(record.trending_papers ?? record.papers).map(mapPaper);
        return {
          timeWindow,
          papers: papers.slice(0, limit),
          totalCount: readTotal(record, papers.length)
        };
      }
    );
  }

  public async getTopKeywords(input: { limit?: number; timeRange?: string } = {}): Promise<TopKeywords> {
    const limit = input.limit ?? DEFAULT_LIMIT;
    return this.call(
      'getTopKeywords',
      {
        method: 'GET',
        path: '/api/v1/trends/keywords',
        query: { limit, time_range: input.timeRange }
      },
      (record) => {
        const keywords = readArray(record.keywords).map(mapKeyword);
        return {
          keywords: keywords.slice(0, limit),
          totalCount: readTotal(record, keywords.length)
        };
      }
    );
  }

  public async getResearchTrends(input: ResearchTrendsInput): Promise<ResearchTrends> {
    return this.call(
      'getResearchTrends',
      {
        method: 'POST',
        path: '/api/v1/trends/research',
        body: {
          domain: input.domain,
          time_range: input.timeRange ?? '2020-2024',
          metrics: input.metrics ?? ['publication_count'],
          granularity: input.granularity ?? 'year'
        }
      },
      (record) => ({
        domain: readString(record.domain, input.domain),
        dataPoints: readArray(record.data_points).map(mapTrendPoint)
      })
    );
  }

  public async analyzeResearchLandscape(input: {
    domain: string;
    analysisDimensions?: LandscapeDimension[];
  }): Promise<ResearchLandscape> {
    return this.call(
      'analyzeResearchLandscape',
      {
        method: 'POST',
        path: '/api/v1/analysis/landscape',
        body: {
          domain: input.domain,
          analysis_dimensions: input.analysisDimensions ?? ['topics', 'authors', 'trends']
        }
      },
      (record) => {
        const { domain, ...rest } = record;
        return {
          domain: readString(domain, input.domain),
          dimensions: isRecord(rest.dimensions) ? rest.dimensions : rest
        };
      }
    );
  }

  public async healthCheck(): Promise<BackendHealth> {
    return this.call('healthCheck', { method: 'GET', path: '/health' }, (record) => {
      const { status, ...details } = record;
      return {
        status: readString(status, 'unknown'),
        details
      };
    });
  }
}
