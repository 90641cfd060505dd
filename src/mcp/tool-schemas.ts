// This module defines research tool input contracts and their discovery metadata.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const formatSchema = z
  .enum(['json', 'markdown'])
  .default('json')
  .describe('Output format: json (normalized data) or markdown (readable report).');

export type OutputFormat = z.infer<typeof formatSchema>;

const limitSchema = z.number().int().min(1).max(100).default(20).describe('Maximum number of results.');
const idSchema = z.string().trim().min(1).max(200);
const timeRangeSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{4}$/, 'time_range must use the YYYY-YYYY format.');

export const searchPapersSchema = z.object({
  query: z.string().trim().min(1).max(500).describe('Search query, typically title keywords.'),
  filters: z
    .object({
      keywords: z.string().trim().min(1).optional(),
      author: z.string().trim().min(1).optional(),
      year: z.number().int().min(1800).max(2100).optional(),
      venue: z.string().trim().min(1).optional(),
      doi: z.string().trim().min(1).optional()
    })
    .optional(),
  limit: limitSchema,
  format: formatSchema
});

export const getPaperDetailsSchema = z.object({
  titles: z.array(z.string().trim().min(1).max(500)).min(1).max(20).describe('Full or partial paper titles.'),
  format: formatSchema
});

export const getPaperCitationsSchema = z.object({
  paper_id: idSchema,
  format: formatSchema
});

export const searchAuthorsSchema = z
  .object({
    query: z.string().trim().min(1).max(200).optional().describe('Author name to search for.'),
    author_id: idSchema.optional(),
    filters: z
      .object({
        affiliation: z.string().trim().min(1).optional(),
        research_area: z.string().trim().min(1).optional()
      })
      .optional(),
    limit: limitSchema,
    format: formatSchema
  })
  .refine((value) => Boolean(value.query) || Boolean(value.author_id), 'Either query or author_id must be provided.');

export const getAuthorDetailsSchema = z.object({
  author_ids: z.array(idSchema).min(1).max(50),
  format: formatSchema
});

export const getAuthorPapersSchema = z.object({
  author_id: idSchema,
  limit: limitSchema,
  format: formatSchema
});

export const getCitationNetworkSchema = z.object({
  seed_papers: z.array(idSchema).min(1).max(50).describe('Seed paper ids.'),
  depth: z.number().int().min(1).max(3).default(2),
  direction: z.enum(['incoming', 'outgoing', 'both']).default('both'),
  max_nodes: z.number().int().min(10).max(200).default(50),
  format: formatSchema
});

export const getCollaborationNetworkSchema = z.object({
  authors: z.array(idSchema).min(1).max(50).describe('Author ids.'),
  time_range: timeRangeSchema.optional(),
  max_nodes: z.number().int().min(10).max(200).default(50),
  format: formatSchema
});

export const getTrendingPapersSchema = z.object({
  time_window: z.enum(['week', 'month', 'year']).default('month'),
  limit: limitSchema,
  format: formatSchema
});

export const getTopKeywordsSchema = z.object({
  limit: limitSchema,
  time_range: timeRangeSchema.optional(),
  format: formatSchema
});

export const analyzeDomainTrendsSchema = z.object({
  domain: z.string().trim().min(1).max(200),
  time_range: timeRangeSchema.default('2020-2024'),
  metrics: z
    .array(z.enum(['publication_count', 'citation_count', 'author_count']))
    .min(1)
    .default(['publication_count']),
  granularity: z.enum(['year', 'quarter', 'month']).default('year'),
  format: formatSchema
});

export const analyzeResearchLandscapeSchema = z.object({
  domain: z.string().trim().min(1).max(200),
  analysis_dimensions: z
    .array(z.enum(['topics', 'authors', 'trends', 'institutions']))
    .min(1)
    .default(['topics', 'authors', 'trends']),
  format: formatSchema
});

export const serverInfoSchema = z.object({
  format: formatSchema
});

export type ToolName =
  | 'search_papers'
  | 'get_paper_details'
  | 'get_paper_citations'
  | 'search_authors'
  | 'get_author_details'
  | 'get_author_papers'
  | 'get_citation_network'
  | 'get_collaboration_network'
  | 'get_trending_papers'
  | 'get_top_keywords'
  | 'analyze_domain_trends'
  | 'analyze_research_landscape'
  | 'get_server_info';

export const toolDescriptions: Record<ToolName, string> = {
  search_papers: 'Search academic papers by keywords with optional author, year, venue, and DOI filters.',
  get_paper_details: 'Look up papers by full or partial title and return their details.',
  get_paper_citations: 'Return the papers citing and cited by one paper.',
  search_authors: 'Search academic authors by name or id with optional affiliation and research-area filters.',
  get_author_details: 'Return profile details for one or more author ids.',
  get_author_papers: 'List the papers published by one author.',
  get_citation_network: 'Build the citation network around seed papers up to a bounded depth.',
  get_collaboration_network: 'Build the co-authorship network between the given authors.',
  get_trending_papers: 'Return currently trending papers for a week, month, or year window.',
  get_top_keywords: 'Return the most frequent research keywords ranked by paper count.',
  analyze_domain_trends: 'Return publication, citation, or author-count trends for one research domain.',
  analyze_research_landscape: 'Summarize topics, authors, trends, and institutions of one research domain.',
  get_server_info: 'Return MCP server metadata and backend health.'
};

// This helper exports one MCP input schema from a zod contract without definitions indirection.
export function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  return zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<string, unknown>;
}
