// This module binds each research tool contract to the backend client and renders its output.

import type { z } from 'zod';
import type { ResearchClient } from '../backend/client.js';
import type { BackendHealth, Paper } from '../types/domain.js';
import type { CallToolResult } from '../types/mcp.js';
import { normalizeError } from '../utils/errors.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { ToolDescriptor } from './catalog.js';
import {
  renderAuthorDetails,
  renderAuthorPapers,
  renderAuthors,
  renderCitations,
  renderKeywords,
  renderLandscape,
  renderNetwork,
  renderPaperDetails,
  renderPaperSearch,
  renderServerInfo,
  renderTrendingPapers,
  renderTrends
} from './markdown.js';
import {
  analyzeDomainTrendsSchema,
  analyzeResearchLandscapeSchema,
  getAuthorDetailsSchema,
  getAuthorPapersSchema,
  getCitationNetworkSchema,
  getCollaborationNetworkSchema,
  getPaperCitationsSchema,
  getPaperDetailsSchema,
  getTopKeywordsSchema,
  getTrendingPapersSchema,
  searchAuthorsSchema,
  searchPapersSchema,
  serverInfoSchema,
  toInputSchema,
  toolDescriptions,
  type OutputFormat,
  type ToolName
} from './tool-schemas.js';

// This helper returns MCP content with a text rendering plus the normalized payload as structured content.
export function mcpResult(
  format: OutputFormat,
  payload: Record<string, unknown>,
  renderMarkdown: () => string
): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: format === 'markdown' ? renderMarkdown() : JSON.stringify(payload, null, 2)
      }
    ],
    structuredContent: payload
  };
}

// This helper parses raw arguments with the tool's zod contract before the typed handler runs.
function defineTool<S extends z.ZodTypeAny>(
  name: ToolName,
  schema: S,
  run: (input: z.output<S>) => Promise<CallToolResult>
): ToolDescriptor {
  return {
    name,
    description: toolDescriptions[name],
    inputSchema: toInputSchema(schema),
    handler: async (args) => run(schema.parse(args))
  };
}

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, ' ');
}

// Exact title match wins, then containment either way, then the backend's top hit.
export function pickBestTitleMatch(title: string, candidates: Paper[]): Paper | null {
  const wanted = normalizeTitle(title);
  const exact = candidates.find((paper) => normalizeTitle(paper.title) === wanted);
  if (exact) {
    return exact;
  }

  const partial = candidates.find((paper) => {
    const candidate = normalizeTitle(paper.title);
    return candidate.includes(wanted) || wanted.includes(candidate);
  });
  return partial ?? candidates[0] ?? null;
}

const TITLE_CANDIDATES = 5;

// This function builds the fixed, ordered list of research tool descriptors for one client.
export function buildResearchTools(client: ResearchClient): ToolDescriptor[] {
  return [
    defineTool('search_papers', searchPapersSchema, async (input) => {
      const result = await client.searchPapers({
        query: input.query,
        filters: input.filters,
        limit: input.limit
      });
      return mcpResult(input.format, { ...result }, () =>
        renderPaperSearch(input.query, result.papers, result.totalCount)
      );
    }),

    defineTool('get_paper_details', getPaperDetailsSchema, async (input) => {
      const matches = await Promise.all(
        input.titles.map(async (title) => {
          const result = await client.searchPapers({ query: title, limit: TITLE_CANDIDATES });
          return { title, paper: pickBestTitleMatch(title, result.papers) };
        })
      );

      const papers: Paper[] = [];
      const notFound: string[] = [];
      for (const match of matches) {
        if (match.paper) {
          papers.push(match.paper);
        } else {
          notFound.push(match.title);
        }
      }

      return mcpResult(input.format, { papers, notFound, totalCount: papers.length }, () =>
        renderPaperDetails(papers, notFound)
      );
    }),

    defineTool('get_paper_citations', getPaperCitationsSchema, async (input) => {
      const result = await client.getPaperCitations(input.paper_id);
      return mcpResult(input.format, { ...result }, () => renderCitations(result));
    }),

    defineTool('search_authors', searchAuthorsSchema, async (input) => {
      const result = await client.searchAuthors({
        query: input.query,
        authorId: input.author_id,
        filters: input.filters
          ? {
              affiliation: input.filters.affiliation,
              researchArea: input.filters.research_area
            }
          : undefined,
        limit: input.limit
      });
      const searchTerm = input.query ?? input.author_id ?? '';
      return mcpResult(input.format, { ...result }, () => renderAuthors(searchTerm, result));
    }),

    defineTool('get_author_details', getAuthorDetailsSchema, async (input) => {
      const result = await client.getAuthorDetails(input.author_ids);
      return mcpResult(input.format, { ...result }, () => renderAuthorDetails(result.authors));
    }),

    defineTool('get_author_papers', getAuthorPapersSchema, async (input) => {
      const result = await client.getAuthorPapers({ authorId: input.author_id, limit: input.limit });
      return mcpResult(input.format, { ...result }, () => renderAuthorPapers(result));
    }),

    defineTool('get_citation_network', getCitationNetworkSchema, async (input) => {
      const result = await client.getCitationNetwork({
        seedPapers: input.seed_papers,
        depth: input.depth,
        direction: input.direction,
        maxNodes: input.max_nodes
      });
      return mcpResult(input.format, { ...result }, () => renderNetwork('Citation Network', result));
    }),

    defineTool('get_collaboration_network', getCollaborationNetworkSchema, async (input) => {
      const result = await client.getCollaborationNetwork({
        authors: input.authors,
        timeRange: input.time_range,
        maxNodes: input.max_nodes
      });
      return mcpResult(input.format, { ...result }, () => renderNetwork('Collaboration Network', result));
    }),

    defineTool('get_trending_papers', getTrendingPapersSchema, async (input) => {
      const result = await client.getTrendingPapers({ timeWindow: input.time_window, limit: input.limit });
      return mcpResult(input.format, { ...result }, () => renderTrendingPapers(result));
    }),

    defineTool('get_top_keywords', getTopKeywordsSchema, async (input) => {
      const result = await client.getTopKeywords({ limit: input.limit, timeRange: input.time_range });
      return mcpResult(input.format, { ...result }, () => renderKeywords(result));
    }),

    defineTool('analyze_domain_trends', analyzeDomainTrendsSchema, async (input) => {
      const result = await client.getResearchTrends({
        domain: input.domain,
        timeRange: input.time_range,
        metrics: input.metrics,
        granularity: input.granularity
      });
      return mcpResult(input.format, { ...result }, () => renderTrends(result));
    }),

    defineTool('analyze_research_landscape', analyzeResearchLandscapeSchema, async (input) => {
      const result = await client.analyzeResearchLandscape({
        domain: input.domain,
        analysisDimensions: input.analysis_dimensions
      });
      return mcpResult(input.format, { ...result }, () => renderLandscape(result));
    }),

    defineTool('get_server_info', serverInfoSchema, async (input) => {
      const server = {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION,
        protocolVersion: MCP_PROTOCOL_VERSION
      };
      let backend: BackendHealth;
      try {
        backend = await client.healthCheck();
      } catch (error) {
        const normalized = normalizeError(error);
        backend = {
          status: 'unreachable',
          details: { code: normalized.code, message: normalized.message }
        };
      }

      return mcpResult(input.format, { server, backend: { ...backend } }, () => renderServerInfo(server, backend));
    })
  ];
}
