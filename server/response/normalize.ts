/**
 * Turns an AggregatedResult into per-intent research data plus derived
 * insights. Failed results contribute nothing; the caller counts them.
 */

import type { IntentType } from "@shared/schema";
import {
  decodePayload,
  readAuthors,
  readKeywords,
  readNetwork,
  readPaper,
  readPapers,
  readTimeWindow,
  type Author,
  type CitationNetwork,
  type KeywordStat,
  type Paper,
} from "../mcp/payloads";
import type { AggregatedResult, ToolName } from "../mcp/types";

export type ResearchData =
  | { kind: "papers"; papers: Paper[] }
  | { kind: "author"; authors: Author[]; papers: Paper[] }
  | { kind: "citations"; paper?: Paper; citingPapers: Paper[]; network?: CitationNetwork }
  | { kind: "trends"; papers: Paper[]; keywords: KeywordStat[]; timeWindow?: string }
  | { kind: "keywords"; keywords: KeywordStat[] }
  | { kind: "none" };

export type ResearchInsights = Record<string, string | number>;

function payloadOf(aggregated: AggregatedResult, tool: ToolName): unknown {
  const index = aggregated.invocations.findIndex(i => i.toolName === tool);
  const result = index >= 0 ? aggregated.results[index] : undefined;
  return result ? decodePayload(result) : undefined;
}

export function normalizeResults(aggregated: AggregatedResult): ResearchData {
  const type: IntentType = aggregated.intentType;
  switch (type) {
    case "search_papers":
      return { kind: "papers", papers: readPapers(payloadOf(aggregated, "search_papers")) };
    case "author_info":
      return {
        kind: "author",
        authors: readAuthors(payloadOf(aggregated, "search_authors")),
        papers: readPapers(payloadOf(aggregated, "get_author_papers")),
      };
    case "citation_analysis":
      return {
        kind: "citations",
        paper: readPaper(payloadOf(aggregated, "get_paper_details")),
        citingPapers: readPapers(payloadOf(aggregated, "get_paper_citations")),
        network: readNetwork(payloadOf(aggregated, "get_citation_network")),
      };
    case "trend_analysis": {
      const trending = payloadOf(aggregated, "get_trending_papers");
      return {
        kind: "trends",
        papers: readPapers(trending),
        keywords: readKeywords(payloadOf(aggregated, "get_top_keywords")),
        timeWindow: readTimeWindow(trending),
      };
    }
    case "keyword_analysis":
      return { kind: "keywords", keywords: readKeywords(payloadOf(aggregated, "get_top_keywords")) };
    case "unknown":
      return { kind: "none" };
    default: {
      const unhandled: never = type;
      throw new Error(`Unhandled intent type: ${unhandled}`);
    }
  }
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function trendInsights(papers: Paper[]): ResearchInsights {
  if (papers.length === 0) return {};
  const insights: ResearchInsights = {};

  const totalCitations = papers.reduce((sum, p) => sum + (p.citations ?? 0), 0);
  insights.averageCitations = round(totalCitations / papers.length, 1);

  const leadAuthors = papers.slice(0, 3).map(p => p.authors[0]).filter((a): a is string => a !== undefined);
  if (leadAuthors.length > 0) insights.topAuthors = leadAuthors.join(", ");

  const keywords = [...new Set(papers.flatMap(p => p.keywords))].slice(0, 3);
  if (keywords.length > 0) insights.hotKeywords = keywords.join(", ");

  const score = (p: Paper) => p.popularityScore ?? p.citations ?? 0;
  const hottest = papers.reduce((best, p) => (score(p) > score(best) ? p : best));
  insights.hottestPaper = hottest.title;

  return insights;
}

function keywordInsights(keywords: KeywordStat[]): ResearchInsights {
  if (keywords.length === 0) return {};
  return {
    totalPapers: keywords.reduce((sum, k) => sum + k.paperCount, 0),
    topKeyword: keywords[0].keyword,
    topKeywords: keywords.slice(0, 5).map(k => k.keyword).join(", "),
  };
}

function networkInsights(network: CitationNetwork | undefined): ResearchInsights {
  if (!network) return {};
  const nodes = network.nodes.length;
  const edges = network.edges.length;
  return {
    networkNodes: nodes,
    networkEdges: edges,
    networkDensity: nodes > 1 ? round(edges / (nodes * (nodes - 1)), 3) : 0,
  };
}

export function deriveInsights(data: ResearchData): ResearchInsights {
  switch (data.kind) {
    case "papers":
      return data.papers.length > 0 ? { papersFound: data.papers.length } : {};
    case "author": {
      const author = data.authors[0];
      if (!author) return {};
      return {
        author: author.name,
        ...(author.hIndex !== undefined ? { hIndex: author.hIndex } : {}),
        ...(author.citationCount !== undefined ? { citationCount: author.citationCount } : {}),
        papersListed: data.papers.length,
      };
    }
    case "citations":
      return { citingPapers: data.citingPapers.length, ...networkInsights(data.network) };
    case "trends":
      return { ...trendInsights(data.papers), ...keywordInsights(data.keywords) };
    case "keywords":
      return keywordInsights(data.keywords);
    case "none":
      return {};
  }
}
