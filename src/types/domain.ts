// This file defines the normalized research domain shapes returned by the backend client.

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | number | boolean | undefined;

export interface RequestDescriptor {
  method: HttpMethod;
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
}

export interface AuthorRef {
  id: string;
  name: string;
}

export interface Paper {
  id: string;
  title: string;
  abstract: string | null;
  authors: AuthorRef[];
  keywords: string[];
  citations: number;
  referencesCount: number;
  publishedAt: string | null;
  venue: string | null;
  doi: string | null;
  url: string | null;
}

export interface Author {
  id: string;
  name: string;
  affiliations: string[];
  researchInterests: string[];
  paperCount: number;
  citationCount: number;
  hIndex: number;
}

export interface NetworkNode {
  id: string;
  label: string;
  type: string;
  properties: Record<string, unknown>;
}

export interface NetworkEdge {
  source: string;
  target: string;
  type: string;
  weight: number;
  properties: Record<string, unknown>;
}

export interface Network {
  nodes: NetworkNode[];
  edges: NetworkEdge[];
}

export interface KeywordStat {
  keyword: string;
  paperCount: number;
}

export interface TrendPoint {
  period: string;
  metric: string;
  value: number;
}

export interface PaperFilters {
  keywords?: string;
  author?: string;
  year?: number;
  venue?: string;
  doi?: string;
}

export interface AuthorFilters {
  affiliation?: string;
  researchArea?: string;
}

export type CitationDirection = 'incoming' | 'outgoing' | 'both';
export type TimeWindow = 'week' | 'month' | 'year';
export type TrendMetric = 'publication_count' | 'citation_count' | 'author_count';
export type TrendGranularity = 'year' | 'quarter' | 'month';
export type LandscapeDimension = 'topics' | 'authors' | 'trends' | 'institutions';

export interface PaperSearchResult {
  papers: Paper[];
  totalCount: number;
}

export interface PaperCitations {
  paperId: string;
  citingPapers: Paper[];
  citedPapers: Paper[];
}

export interface AuthorSearchResult {
  authors: Author[];
  totalCount: number;
}

export interface AuthorPapers {
  authorId: string;
  papers: Paper[];
  totalCount: number;
}

export interface TrendingPapers {
  timeWindow: TimeWindow;
  papers: Paper[];
  totalCount: number;
}

export interface TopKeywords {
  keywords: KeywordStat[];
  totalCount: number;
}

export interface ResearchTrends {
  domain: string;
  dataPoints: TrendPoint[];
}

export interface ResearchLandscape {
  domain: string;
  dimensions: Record<string, unknown>;
}

export interface BackendHealth {
  status: string;
  details: Record<string, unknown>;
}
