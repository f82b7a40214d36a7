/**
 * Tool Payload Decoding
 *
 * Purpose:
 * The data service answers tools/call with MCP content blocks whose text is
 * JSON. This module decodes that text and validates it into the shapes the
 * rest of the pipeline works with (papers, authors, citation networks,
 * keyword counts). Unrecognized fields are ignored; malformed entries are
 * skipped rather than failing the whole payload.
 *
 * Layer: MCP (data normalization)
 */

import { z } from "zod";
import { firstText } from "../dataService/jsonRpc";
import type { ToolResult } from "../dataService/types";

// ============================================================================
// NORMALIZED SHAPES
// ============================================================================

export type Paper = {
  id?: string;
  title: string;
  abstract?: string;
  authors: string[];
  venue?: string;
  year?: number;
  citations?: number;
  keywords: string[];
  doi?: string;
  url?: string;
  popularityScore?: number;
};

export type Author = {
  id?: string;
  name: string;
  affiliation?: string;
  paperCount?: number;
  citationCount?: number;
  hIndex?: number;
  researchInterests: string[];
  coauthors: Array<{ name: string; collaborationCount?: number }>;
};

export type CitationNetwork = {
  nodes: Array<{ id: string; label?: string; citations?: number }>;
  edges: Array<{ source: string; target: string }>;
};

export type KeywordStat = {
  keyword: string;
  paperCount: number;
};

// ============================================================================
// WIRE SCHEMAS
// ============================================================================

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

const authorRefSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1) }).passthrough().transform(a => a.name),
]);

const rawPaperSchema = z.object({
  id: idSchema.nullish(),
  paper_id: idSchema.nullish(),
  title: z.string().min(1),
  abstract: z.string().nullish(),
  authors: z.array(z.unknown()).nullish(),
  venue_name: z.string().nullish(),
  venue: z.string().nullish(),
  year: z.number().int().nullish(),
  published_at: z.union([z.number(), z.string()]).nullish(),
  citations: z.number().nullish(),
  citation_count: z.number().nullish(),
  keywords: z.array(z.unknown()).nullish(),
  doi: z.string().nullish(),
  url: z.string().nullish(),
  popularity_score: z.number().nullish(),
}).passthrough();

const rawAuthorSchema = z.object({
  id: idSchema.nullish(),
  author_id: idSchema.nullish(),
  name: z.string().min(1),
  affiliation: z.string().nullish(),
  paper_count: z.number().nullish(),
  citation_count: z.number().nullish(),
  h_index: z.number().nullish(),
  research_interests: z.union([z.array(z.unknown()), z.string()]).nullish(),
  coauthors: z.array(z.unknown()).nullish(),
}).passthrough();

const rawCoauthorSchema = z.object({
  name: z.string().min(1),
  collaboration_count: z.number().nullish(),
}).passthrough();

const rawNodeSchema = z.object({
  id: idSchema,
  title: z.string().nullish(),
  label: z.string().nullish(),
  citations: z.number().nullish(),
}).passthrough();

const rawEdgeSchema = z.object({
  source: idSchema,
  target: idSchema,
}).passthrough();

const rawKeywordSchema = z.union([
  z.object({ keyword: z.string().min(1), paper_count: z.number().nullish(), count: z.number().nullish() }).passthrough(),
  z.tuple([z.string().min(1), z.number()]),
]);

// ============================================================================
// HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optional<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function strings(values: unknown[] | null | undefined): string[] {
  if (!values) return [];
  return values.filter((v): v is string => typeof v === "string" && v.trim().length > 0);
}

// Arrays are decoded entry by entry; one bad entry does not discard the rest
function parseEach<T>(values: unknown, parse: (value: unknown) => T | undefined): T[] {
  if (!Array.isArray(values)) return [];
  const out: T[] = [];
  for (const value of values) {
    const parsed = parse(value);
    if (parsed !== undefined) out.push(parsed);
  }
  return out;
}

function yearOf(publishedAt: number | string | null | undefined, year: number | null | undefined): number | undefined {
  if (year) return year;
  if (publishedAt === null || publishedAt === undefined) return undefined;
  if (typeof publishedAt === "number") {
    // Unix seconds
    return new Date(publishedAt * 1000).getUTCFullYear();
  }
  const parsed = Date.parse(publishedAt);
  return Number.isNaN(parsed) ? undefined : new Date(parsed).getUTCFullYear();
}

export function parsePaper(value: unknown): Paper | undefined {
  const parsed = rawPaperSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const p = parsed.data;
  return {
    id: optional(p.id ?? p.paper_id),
    title: p.title,
    abstract: optional(p.abstract),
    authors: parseEach(p.authors, a => {
      const author = authorRefSchema.safeParse(a);
      return author.success ? author.data : undefined;
    }),
    venue: optional(p.venue_name ?? p.venue),
    year: yearOf(p.published_at, p.year),
    citations: optional(p.citations ?? p.citation_count),
    keywords: strings(p.keywords),
    doi: optional(p.doi),
    url: optional(p.url),
    popularityScore: optional(p.popularity_score),
  };
}

export function parseAuthor(value: unknown): Author | undefined {
  const parsed = rawAuthorSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const a = parsed.data;
  const interests = a.research_interests;
  return {
    id: optional(a.id ?? a.author_id),
    name: a.name,
    affiliation: optional(a.affiliation),
    paperCount: optional(a.paper_count),
    citationCount: optional(a.citation_count),
    hIndex: optional(a.h_index),
    researchInterests: typeof interests === "string"
      ? interests.split(/\s*,\s*/).filter(Boolean)
      : strings(interests),
    coauthors: parseEach(a.coauthors, c => {
      const coauthor = rawCoauthorSchema.safeParse(c);
      return coauthor.success
        ? { name: coauthor.data.name, collaborationCount: optional(coauthor.data.collaboration_count) }
        : undefined;
    }),
  };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Decoded body of a successful tool result: parsed JSON when the text is
 * JSON, the raw text otherwise, undefined for failed or empty results.
 */
export function decodePayload(result: ToolResult): unknown {
  if (result.status !== "ok") return undefined;
  const text = firstText(result.payload);
  if (text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

const PAPER_LIST_KEYS = ["papers", "trending_papers", "citations", "citing_papers", "results"] as const;

export function readPapers(data: unknown): Paper[] {
  if (Array.isArray(data)) return parseEach(data, parsePaper);
  if (!isRecord(data)) return [];
  for (const key of PAPER_LIST_KEYS) {
    if (Array.isArray(data[key])) return parseEach(data[key], parsePaper);
  }
  return [];
}

export function readPaper(data: unknown): Paper | undefined {
  if (!isRecord(data)) return undefined;
  return parsePaper(data.paper) ?? parsePaper(data);
}

export function readAuthors(data: unknown): Author[] {
  if (Array.isArray(data)) return parseEach(data, parseAuthor);
  if (!isRecord(data)) return [];
  if (Array.isArray(data.authors)) return parseEach(data.authors, parseAuthor);
  const single = parseAuthor(data.author);
  return single ? [single] : [];
}

export function readNetwork(data: unknown): CitationNetwork | undefined {
  if (!isRecord(data)) return undefined;
  const source = isRecord(data.network) ? data.network : data;
  if (!Array.isArray(source.nodes) && !Array.isArray(source.edges)) return undefined;

  return {
    nodes: parseEach(source.nodes, n => {
      const node = rawNodeSchema.safeParse(n);
      return node.success
        ? { id: node.data.id, label: optional(node.data.title ?? node.data.label), citations: optional(node.data.citations) }
        : undefined;
    }),
    edges: parseEach(source.edges, e => {
      const edge = rawEdgeSchema.safeParse(e);
      return edge.success ? { source: edge.data.source, target: edge.data.target } : undefined;
    }),
  };
}

export function readKeywords(data: unknown): KeywordStat[] {
  const list = isRecord(data) ? data.keywords : data;
  return parseEach(list, k => {
    const parsed = rawKeywordSchema.safeParse(k);
    if (!parsed.success) return undefined;
    if (Array.isArray(parsed.data)) {
      return { keyword: parsed.data[0], paperCount: parsed.data[1] };
    }
    return { keyword: parsed.data.keyword, paperCount: parsed.data.paper_count ?? parsed.data.count ?? 0 };
  });
}

export function readTimeWindow(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  const window = data.time_window ?? data.time_range;
  return typeof window === "string" && window ? window : undefined;
}

