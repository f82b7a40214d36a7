/**
 * Slot Extraction
 *
 * Purpose:
 * Pulls typed parameters (keywords, author names, paper identifiers,
 * fields, time ranges, limits) out of a research question. Pure string
 * work; the classifier decides which slots an intent needs.
 *
 * Layer: Decision Layer (Intent Router)
 */

import type { IntentType } from "@shared/schema";

export type ExtractedSlots = {
  keywords?: string[];
  limit?: number;
  yearFrom?: number;
  yearTo?: number;
  authorName?: string;
  paperId?: string;
  paperTitle?: string;
  depth?: number;
  field?: string;
  timeRange?: string;
};

export type StructuredIdentifier = {
  kind: "arxiv" | "doi" | "id";
  value: string;
};

// What a pronoun or demonstrative in the question can point back to
export type ReferenceTarget = "author" | "paper" | "topic";

// ============================================================================
// PATTERNS
// ============================================================================

const ARXIV_ID = /\b(?:arxiv:\s*)?(\d{4}\.\d{4,5})(?:v\d+)?\b/i;
const DOI = /\b(10\.\d{4,9}\/[^\s"'<>]+[^\s"'<>.,;?!])/i;
const PREFIXED_ID = /\bid:\s*([\w./-]+)/i;

const YEAR_RANGE = /\b(?:from|between)\s+((?:19|20)\d{2})\s*(?:to|and|-|until|through)\s*((?:19|20)\d{2})\b/i;
const YEAR_SINCE = /\b(?:since|after|from)\s+((?:19|20)\d{2})\b/i;
const YEAR_BEFORE = /\b(?:before|until|prior to)\s+((?:19|20)\d{2})\b/i;
const YEAR_IN = /\b(?:in|during|of)\s+((?:19|20)\d{2})\b/i;

const LIMIT = /\b(?:top\s+)?(\d{1,3})\s+(?:papers|articles|publications|results|authors|researchers|keywords|topics)\b|\btop\s+(\d{1,3})\b/i;
const DEPTH = /\b(?:(?:with|at|of)\s+)?depth\s*(?:of\s*)?(\d{1,2})\b|\b(\d{1,2})\s*(?:levels?|hops?)\b/i;

const TIME_RANGE_COUNT = /\b(?:(?:in|over|during|for|of|from)\s+)?(?:the\s+)?(?:last|past)\s+(\d{1,2})\s+(year|month|week)s?\b/i;
const TIME_RANGE_SINGLE = /\b(?:(?:in|over|during|for|of|from)\s+)?(?:the\s+)?(?:last|past|this)\s+(year|month|week)\b/i;

const TOPIC = /\b(?:about|on|regarding|related to|concerning|in)\s+(.+)$/i;
const FIELD = /\b(?:in|on|for|within|about|of|across)\s+(?:the\s+)?(?:(?:field|area|domain)\s+of\s+)?(.+)$/i;
const QUOTED = /["“]([^"”]{3,300})["”]/;
const TITLE_AFTER_PREPOSITION = /\b(?:of|for|to|on|citing)\s+(?:the\s+)?(?:(?:paper|article)\s+)?(?:(?:titled|called|named)\s+)?(.+)$/i;
const TITLE_AFTER_NOUN = /\b(?:paper|article)\s+(?:(?:titled|called|named)\s+)?(.+)$/i;

const NAME = String.raw`[A-Z][\w'.-]*(?:\s+[A-Z][\w'.-]*){0,3}`;
const AUTHOR_NAME_PATTERNS = [
  new RegExp(String.raw`\b(?:by|[Aa]uthor|[Rr]esearcher|[Pp]rofessor|[Pp]rof\.?|[Dd]r\.?)\s+(${NAME})`),
  new RegExp(String.raw`\b[Ww]ho\s+is\s+(${NAME})`),
  new RegExp(String.raw`\b(?:about|on|for|of)\s+(${NAME})`),
  /\b(?:author|researcher)\s+(?:named\s+)?([a-z][\w'.-]*(?:\s+[a-z][\w'.-]*){0,2})\s*[?.!]*$/i,
];

const KEYWORD_SEPARATOR = /\s*(?:,|;|&|\band\b)\s*/i;
const MAX_KEYWORDS = 5;

const REFERENCE_PHRASE = /^(?:this|that|these|those|it|its|the same|same|his|her|their|them)\b/i;

const REFERENCE_PATTERNS: Record<ReferenceTarget, RegExp> = {
  author: /\b(?:he|him|his|she|her|they|them|their|this author|that author|the same author)\b/i,
  paper: /\b(?:this|that|the same|the first|the top)\s+(?:paper|article|one|work)\b|\bit\b/i,
  topic: /\b(?:this|that|the same)\s+(?:topic|field|area|subject|domain)\b|\bmore\b/i,
};

// Words that carry no topic when a question names none explicitly
const FILLER_WORDS = new Set([
  "a", "an", "the", "some", "any", "me", "i", "you", "can", "could", "please", "want", "need", "would", "like",
  "to", "for", "of", "find", "search", "show", "get", "list", "look", "give", "recommend", "fetch",
  "paper", "papers", "article", "articles", "publication", "publications", "literature", "studies", "research",
  "recent", "latest", "new", "good", "best", "relevant",
]);

const NAME_STOP_WORDS = new Set(["information", "info", "details", "profile", "papers", "publications", "work"]);

// ============================================================================
// HELPERS
// ============================================================================

function cleanPhrase(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const cleaned = value
    .trim()
    .replace(/^["“'‘]+|["”'’]+$/g, "")
    .replace(/[\s?.!,;:]+$/, "")
    .replace(/^the\s+/i, "")
    .trim();
  return cleaned || undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function removeMatch(text: string, match: RegExpExecArray): string {
  return `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`.replace(/\s+/g, " ").trim();
}

export function isReferencePhrase(value: string): boolean {
  return REFERENCE_PHRASE.test(value.trim());
}

export function refersBack(target: ReferenceTarget, text: string): boolean {
  return REFERENCE_PATTERNS[target].test(text);
}

export function findStructuredIdentifier(text: string): StructuredIdentifier | null {
  const arxiv = ARXIV_ID.exec(text);
  if (arxiv) return { kind: "arxiv", value: arxiv[1] };

  const doi = DOI.exec(text);
  if (doi) return { kind: "doi", value: doi[1] };

  const prefixed = PREFIXED_ID.exec(text);
  if (prefixed) return { kind: "id", value: prefixed[1] };

  return null;
}

function extractYears(text: string): { yearFrom?: number; yearTo?: number; rest: string } {
  const range = YEAR_RANGE.exec(text);
  if (range) {
    const a = Number(range[1]);
    const b = Number(range[2]);
    return { yearFrom: Math.min(a, b), yearTo: Math.max(a, b), rest: removeMatch(text, range) };
  }

  let rest = text;
  let yearFrom: number | undefined;
  let yearTo: number | undefined;

  const since = YEAR_SINCE.exec(rest);
  if (since) {
    yearFrom = Number(since[1]);
    rest = removeMatch(rest, since);
  }
  const before = YEAR_BEFORE.exec(rest);
  if (before) {
    yearTo = Number(before[1]);
    rest = removeMatch(rest, before);
  }
  if (yearFrom === undefined && yearTo === undefined) {
    const single = YEAR_IN.exec(rest);
    if (single) {
      yearFrom = Number(single[1]);
      yearTo = yearFrom;
      rest = removeMatch(rest, single);
    }
  }
  return { yearFrom, yearTo, rest };
}

function extractLimit(text: string): { limit?: number; rest: string } {
  const match = LIMIT.exec(text);
  if (!match) return { rest: text };
  const raw = Number(match[1] ?? match[2]);
  return { limit: clamp(raw, 1, 50), rest: removeMatch(text, match) };
}

function extractKeywords(text: string): string[] {
  const topic = TOPIC.exec(text);
  const phrase = cleanPhrase(
    topic
      ? topic[1]
      : text
        .split(/\s+/)
        .filter(word => !FILLER_WORDS.has(word.toLowerCase().replace(/[^\w-]/g, "")))
        .join(" "),
  );
  if (!phrase || isReferencePhrase(phrase)) return [];

  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const part of phrase.split(KEYWORD_SEPARATOR)) {
    const keyword = cleanPhrase(part);
    if (!keyword || isReferencePhrase(keyword)) continue;
    const key = keyword.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    keywords.push(keyword);
  }
  return keywords.slice(0, MAX_KEYWORDS);
}

function extractAuthorName(text: string): string | undefined {
  for (const pattern of AUTHOR_NAME_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const name = cleanPhrase(match[1].replace(/'s$/, ""));
    if (!name || isReferencePhrase(name)) continue;
    if (NAME_STOP_WORDS.has(name.split(/\s+/)[0].toLowerCase())) continue;
    return name;
  }
  return undefined;
}

function extractPaperTitle(text: string): string | undefined {
  const quoted = QUOTED.exec(text);
  if (quoted) return cleanPhrase(quoted[1]);

  for (const pattern of [TITLE_AFTER_PREPOSITION, TITLE_AFTER_NOUN]) {
    const match = pattern.exec(text);
    const title = cleanPhrase(match?.[1]);
    if (title && !isReferencePhrase(title)) return title;
  }
  return undefined;
}

function extractTimeRange(text: string): { timeRange?: string; rest: string } {
  const counted = TIME_RANGE_COUNT.exec(text);
  if (counted) {
    const count = clamp(Number(counted[1]), 1, 99);
    const unit = counted[2].toLowerCase();
    return { timeRange: `${count}${unit}${count > 1 ? "s" : ""}`, rest: removeMatch(text, counted) };
  }
  const single = TIME_RANGE_SINGLE.exec(text);
  if (single) {
    return { timeRange: `1${single[1].toLowerCase()}`, rest: removeMatch(text, single) };
  }
  return { rest: text };
}

function extractField(text: string): string | undefined {
  const match = FIELD.exec(text);
  const field = cleanPhrase(match?.[1])?.replace(/\s+(?:field|area|domain|research)$/i, "");
  if (!field || isReferencePhrase(field)) return undefined;
  return field;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Extract the slots relevant to `type` from the question text. Slots that
 * cannot be found are left undefined; defaults are applied when the intent
 * is built.
 */
export function extractSlots(type: IntentType, text: string): ExtractedSlots {
  switch (type) {
    case "search_papers": {
      const years = extractYears(text);
      const limited = extractLimit(years.rest);
      return {
        keywords: extractKeywords(limited.rest),
        limit: limited.limit,
        yearFrom: years.yearFrom,
        yearTo: years.yearTo,
      };
    }
    case "author_info": {
      const limited = extractLimit(text);
      return { authorName: extractAuthorName(limited.rest), limit: limited.limit };
    }
    case "citation_analysis": {
      const identifier = findStructuredIdentifier(text);
      const depthMatch = DEPTH.exec(text);
      const rest = depthMatch ? removeMatch(text, depthMatch) : text;
      return {
        paperId: identifier?.value,
        paperTitle: identifier ? undefined : extractPaperTitle(rest),
        depth: depthMatch ? clamp(Number(depthMatch[1] ?? depthMatch[2]), 1, 3) : undefined,
      };
    }
    case "trend_analysis": {
      const ranged = extractTimeRange(text);
      return { timeRange: ranged.timeRange, field: extractField(ranged.rest) };
    }
    case "keyword_analysis": {
      const limited = extractLimit(text);
      return { limit: limited.limit, field: extractField(limited.rest) };
    }
    case "unknown":
      return {};
  }
}
