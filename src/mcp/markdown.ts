// This module renders normalized research payloads as compact Markdown reports.

import type {
  Author,
  BackendHealth,
  AuthorPapers,
  AuthorSearchResult,
  Network,
  Paper,
  PaperCitations,
  ResearchLandscape,
  ResearchTrends,
  TopKeywords,
  TrendingPapers
} from '../types/domain.js';

const ABSTRACT_PREVIEW_LENGTH = 200;
const KEYWORD_BAR_WIDTH = 20;

function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength)}...`;
}

function formatList(values: string[], maxCount: number, noun: string): string {
  if (values.length === 0) {
    return `No ${noun}`;
  }

  const shown = values.slice(0, maxCount).join(', ');
  return values.length > maxCount ? `${shown} etc (${values.length} ${noun})` : shown;
}

function paperLines(paper: Paper): string[] {
  const lines = [
    `**Authors**: ${formatList(
      paper.authors.map((author) => author.name),
      3,
      'authors'
    )}`,
    `**Published At**: ${paper.publishedAt ? paper.publishedAt.slice(0, 10) : 'Unknown'}`
  ];

  if (paper.citations > 0) {
    lines.push(`**Citations**: ${paper.citations}`);
  }
  if (paper.venue) {
    lines.push(`**Published In**: ${paper.venue}`);
  }
  if (paper.abstract) {
    lines.push(`**Abstract**: ${truncate(paper.abstract, ABSTRACT_PREVIEW_LENGTH)}`);
  }
  if (paper.keywords.length > 0) {
    lines.push(`**Keywords**: ${formatList(paper.keywords, 5, 'keywords')}`);
  }
  if (paper.url) {
    lines.push(`**Link**: ${paper.url}`);
  } else if (paper.doi) {
    lines.push(`**DOI**: ${paper.doi}`);
  }
  lines.push(`**ID**: ${paper.id || 'N/A'}`);

  return lines;
}

function paperSection(papers: Paper[]): string[] {
  return papers.flatMap((paper, index) => [`### ${index + 1}. ${paper.title}`, '', ...paperLines(paper), '', '---', '']);
}

function authorLines(author: Author): string[] {
  const lines = [`**Name**: ${author.name}`];
  if (author.affiliations.length > 0) {
    lines.push(`**Affiliation**: ${author.affiliations.join('; ')}`);
  }
  if (author.researchInterests.length > 0) {
    lines.push(`**Research Interests**: ${formatList(author.researchInterests, 5, 'interests')}`);
  }
  if (author.paperCount > 0) {
    lines.push(`**Paper Count**: ${author.paperCount}`);
  }
  if (author.citationCount > 0) {
    lines.push(`**Total Citations**: ${author.citationCount}`);
  }
  if (author.hIndex > 0) {
    lines.push(`**H-index**: ${author.hIndex}`);
  }
  lines.push(`**ID**: ${author.id || 'N/A'}`);
  return lines;
}

function header(title: string, fields: Array<[string, string | number]>): string[] {
  return [`# ${title}`, '', ...fields.map(([label, value]) => `**${label}**: ${value}`), ''];
}

function emptyResult(query: string, noun: string): string {
  return [
    '# Search Results',
    '',
    `**Query**: ${query}`,
    `**Results**: No related ${noun} found`,
    '',
    'Suggestions:',
    '- Try different keywords',
    '- Check spelling',
    '- Use more general search terms',
    ''
  ].join('\n');
}

export function renderPaperSearch(query: string, papers: Paper[], totalCount: number): string {
  if (papers.length === 0) {
    return emptyResult(query, 'papers');
  }

  return [
    ...header('Paper Search Results', [
      ['Query', query],
      ['Total', totalCount]
    ]),
    `## Papers (showing ${papers.length})`,
    '',
    ...paperSection(papers)
  ].join('\n');
}

export function renderPaperDetails(papers: Paper[], notFound: string[]): string {
  const lines = ['# Paper Details', ''];

  for (const paper of papers) {
    lines.push(`## ${paper.title}`, '', ...paperLines(paper));
    lines.push(`**References**: ${paper.referencesCount}`);
    if (paper.abstract) {
      lines.push('', '### Abstract', paper.abstract);
    }
    lines.push('', '---', '');
  }

  if (notFound.length > 0) {
    lines.push(`**Not found**: ${notFound.join('; ')}`, '');
  }

  return lines.join('\n');
}

export function renderCitations(citations: PaperCitations): string {
  return [
    ...header('Paper Citations', [
      ['Paper ID', citations.paperId],
      ['Cited By', citations.citingPapers.length],
      ['References', citations.citedPapers.length]
    ]),
    '## Citing Papers',
    '',
    ...(citations.citingPapers.length > 0 ? paperSection(citations.citingPapers) : ['None.', '']),
    '## Cited Papers',
    '',
    ...(citations.citedPapers.length > 0 ? paperSection(citations.citedPapers) : ['None.', ''])
  ].join('\n');
}

export function renderAuthors(searchTerm: string, result: AuthorSearchResult): string {
  if (result.authors.length === 0) {
    return emptyResult(searchTerm, 'authors');
  }

  return [
    ...header('Author Search Results', [
      ['Query', searchTerm],
      ['Total', result.totalCount]
    ]),
    ...result.authors.flatMap((author, index) => [`### ${index + 1}. ${author.name}`, '', ...authorLines(author), ''])
  ].join('\n');
}

export function renderAuthorDetails(authors: Author[]): string {
  return ['# Author Details', '', ...authors.flatMap((author) => [`## ${author.name}`, '', ...authorLines(author), ''])].join(
    '\n'
  );
}

export function renderAuthorPapers(result: AuthorPapers): string {
  return [
    ...header('Author Papers', [
      ['Author ID', result.authorId],
      ['Total Papers', result.totalCount],
      ['Shown', result.papers.length]
    ]),
    ...(result.papers.length > 0 ? paperSection(result.papers) : ['No papers recorded for this author.', ''])
  ].join('\n');
}

export function renderNetwork(title: string, network: Network): string {
  const typeCounts = new Map<string, number>();
  for (const node of network.nodes) {
    typeCounts.set(node.type, (typeCounts.get(node.type) ?? 0) + 1);
  }

  const labels = new Map(network.nodes.map((node) => [node.id, node.label]));
  const strongest = [...network.edges].sort((a, b) => b.weight - a.weight).slice(0, 10);

  return [
    ...header(title, [
      ['Nodes', network.nodes.length],
      ['Edges', network.edges.length]
    ]),
    '## Node Types',
    ...[...typeCounts.entries()].map(([type, count]) => `- ${type}: ${count}`),
    '',
    '## Strongest Links',
    ...strongest.map(
      (edge) =>
        `- ${labels.get(edge.source) ?? edge.source} -> ${labels.get(edge.target) ?? edge.target} (${edge.type}, weight ${edge.weight})`
    ),
    ''
  ].join('\n');
}

export function renderTrendingPapers(result: TrendingPapers): string {
  return [
    ...header(`Trending Papers (${result.timeWindow})`, [['Total', result.totalCount]]),
    ...(result.papers.length > 0 ? paperSection(result.papers) : ['No trending papers for this window.', ''])
  ].join('\n');
}

export function renderKeywords(result: TopKeywords): string {
  const maxCount = Math.max(0, ...result.keywords.map((keyword) => keyword.paperCount));

  return [
    ...header('Top Research Keywords', [
      ['Total Keywords', result.totalCount],
      ['Shown', result.keywords.length]
    ]),
    ...result.keywords.map((keyword, index) => {
      const ratio = maxCount > 0 ? keyword.paperCount / maxCount : 0;
      const filled = Math.min(KEYWORD_BAR_WIDTH, Math.max(0, Math.floor(ratio * KEYWORD_BAR_WIDTH)));
      const bar = '█'.repeat(filled) + '░'.repeat(KEYWORD_BAR_WIDTH - filled);
      return `${index + 1}. **${keyword.keyword}** ${bar} ${keyword.paperCount} papers`;
    }),
    ''
  ].join('\n');
}

export function renderTrends(result: ResearchTrends): string {
  return [
    ...header('Research Trends', [
      ['Domain', result.domain],
      ['Data Points', result.dataPoints.length]
    ]),
    '| Period | Metric | Value |',
    '| --- | --- | --- |',
    ...result.dataPoints.map((point) => `| ${point.period} | ${point.metric} | ${point.value} |`),
    ''
  ].join('\n');
}

export function renderLandscape(result: ResearchLandscape): string {
  return [
    ...header('Research Landscape', [['Domain', result.domain]]),
    ...Object.entries(result.dimensions).flatMap(([dimension, value]) => [
      `## ${dimension}`,
      '',
      '```json',
      JSON.stringify(value, null, 2),
      '```',
      ''
    ])
  ].join('\n');
}

export function renderServerInfo(server: { name: string; version: string; protocolVersion: string }, backend: BackendHealth): string {
  return header('Server Info', [
    ['Name', server.name],
    ['Version', server.version],
    ['Protocol Version', server.protocolVersion],
    ['Backend Status', backend.status]
  ]).join('\n');
}
