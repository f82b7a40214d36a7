/**
 * Intent Classification
 *
 * Purpose:
 * Turns a research question (plus a bounded window of prior turns) into
 * exactly one typed Intent. Intent is immutable once classified.
 *
 * Classification Strategy:
 * 1. Structured identifiers (arXiv id, DOI, "id:") are the strongest signal
 * 2. Ordered pattern rules, each with a match strength
 * 3. Slot extraction per intent type, with coreference from prior turns
 * 4. Missing required slots or low confidence downgrade to `unknown`
 *
 * classifyIntent is pure: same question, same turns, same policy ⇒ same result.
 * The optional LLM fallback lives in llmInterpretation.ts.
 *
 * Layer: Decision Layer (Intent Router)
 */

import type { ConversationTurn, IntentType, Query } from "@shared/schema";
import { INTENT_CONSTANTS, TOOL_DEFAULTS } from "../config/constants";
import {
  extractSlots,
  findStructuredIdentifier,
  refersBack,
  type ExtractedSlots,
} from "./slotExtraction";

// ============================================================================
// TYPES
// ============================================================================

export type SearchPapersParameters = {
  keywords: readonly string[];
  limit: number;
  yearFrom?: number;
  yearTo?: number;
};

export type AuthorInfoParameters = {
  authorName: string;
  limit: number;
};

export type CitationAnalysisParameters = {
  paperId?: string;
  paperTitle?: string;
  depth: number;
};

export type TrendAnalysisParameters = {
  field?: string;
  timeRange: string;
};

export type KeywordAnalysisParameters = {
  field?: string;
  limit: number;
};

type IntentVariant<T extends IntentType, P> = Readonly<{
  type: T;
  parameters: Readonly<P>;
  confidence: number;
}>;

export type Intent =
  | IntentVariant<"search_papers", SearchPapersParameters>
  | IntentVariant<"author_info", AuthorInfoParameters>
  | IntentVariant<"citation_analysis", CitationAnalysisParameters>
  | IntentVariant<"trend_analysis", TrendAnalysisParameters>
  | IntentVariant<"keyword_analysis", KeywordAnalysisParameters>
  | IntentVariant<"unknown", Record<string, never>>;

export type IntentOf<T extends IntentType> = Extract<Intent, { type: T }>;

export type MatchStrength = "structured_id" | "verb_noun" | "noun" | "cue";

export type IntentDetectionMethod = "identifier" | "pattern" | "llm" | "default";

/**
 * Tunable scoring. Confidence is the score of the strongest matching rule,
 * multiplied by `coreferencePenalty` per slot resolved from a prior turn.
 */
export type ConfidencePolicy = {
  threshold: number;
  missingSlotPenalty: number;
  coreferencePenalty: number;
  contextWindow: number;
  strengthScores: Record<MatchStrength, number>;
};

export const DEFAULT_CONFIDENCE_POLICY: ConfidencePolicy = {
  threshold: INTENT_CONSTANTS.CONFIDENCE_THRESHOLD,
  missingSlotPenalty: INTENT_CONSTANTS.MISSING_SLOT_PENALTY,
  coreferencePenalty: INTENT_CONSTANTS.COREFERENCE_PENALTY,
  contextWindow: INTENT_CONSTANTS.CONTEXT_WINDOW_TURNS,
  strengthScores: { ...INTENT_CONSTANTS.STRENGTH_SCORES },
};

export type IntentClassification = {
  intent: Intent;
  detectionMethod: IntentDetectionMethod;
  reason: string;
  matchedRule?: string;
  // Set when a candidate was downgraded to unknown
  candidateType?: Exclude<IntentType, "unknown">;
  resolvedFromContext: string[];
  clarificationQuestions: string[];
};

type ConcreteIntentType = Exclude<IntentType, "unknown">;

type PatternRule = {
  name: string;
  intent: ConcreteIntentType;
  strength: Exclude<MatchStrength, "structured_id">;
  pattern: RegExp;
};

// ============================================================================
// PATTERN RULES - evaluated in order, first match wins
// ============================================================================

const PATTERN_RULES: PatternRule[] = [
  // Pronoun follow-ups about a previously named author
  {
    name: "author_pronoun_works",
    intent: "author_info",
    strength: "noun",
    pattern: /\b(?:his|her|their)\s+(?:papers|publications|work|research|articles)\b/i,
  },

  // Verb + noun phrasing
  // A search verb directly on papers with a stated topic is a search whatever
  // the topic mentions (citations, authors, trends)
  {
    name: "topical_paper_search",
    intent: "search_papers",
    strength: "verb_noun",
    pattern: /\b(?:find|search(?:\s+for)?|look for|show(?:\s+me)?|get|list|recommend|fetch)\s+(?:(?:me|some|the|recent|latest|top|\d{1,3})\s+)*(?:papers?|articles?|publications?|studies)\s+(?:about|on|regarding|related to|concerning)\s+\S/i,
  },
  {
    name: "citation_request",
    intent: "citation_analysis",
    strength: "verb_noun",
    pattern: /\b(?:analy[sz]e|show|get|find|map|list|what are|who)\b.*\b(?:citations?|cites|citing|cited|citation network|citation graph|references)\b/i,
  },
  {
    name: "author_lookup",
    intent: "author_info",
    strength: "verb_noun",
    pattern: /\b(?:find|search|look up|lookup|show|get|tell me about)\b.*\b(?:authors?|researchers?|scientists?|professors?)\b/i,
  },
  {
    name: "works_by_person",
    intent: "author_info",
    strength: "verb_noun",
    pattern: /\b(?:[Pp]apers|[Pp]ublications|[Ww]ork|[Rr]esearch|[Aa]rticles)\s+(?:by|from|of)\s+[A-Z]/,
  },
  {
    name: "trend_request",
    intent: "trend_analysis",
    strength: "verb_noun",
    pattern: /\b(?:show|find|get|list|what are|what's|what is)\b.*\b(?:trending|trends?|hot topics|emerging)\b/i,
  },
  {
    name: "keyword_request",
    intent: "keyword_analysis",
    strength: "verb_noun",
    pattern: /\b(?:show|find|get|list|what are|which are)\b.*\b(?:top|popular|common|frequent|most used)\s+(?:\d+\s+)?(?:keywords|topics|terms)\b/i,
  },
  {
    name: "paper_search",
    intent: "search_papers",
    strength: "verb_noun",
    pattern: /\b(?:find|search|look for|show|get|list|recommend|fetch)\b.*\b(?:papers?|articles?|publications?|literature|studies)\b/i,
  },

  // Noun phrasing
  {
    name: "citation_noun",
    intent: "citation_analysis",
    strength: "noun",
    pattern: /\b(?:citation (?:network|graph|count|analysis)|cited by)\b/i,
  },
  {
    name: "keyword_noun",
    intent: "keyword_analysis",
    strength: "noun",
    pattern: /\b(?:(?:top|popular)\s+keywords|keyword analysis)\b/i,
  },
  {
    name: "trend_noun",
    intent: "trend_analysis",
    strength: "noun",
    pattern: /\b(?:research trends?|trending papers|hot topics)\b/i,
  },
  {
    name: "author_noun",
    intent: "author_info",
    strength: "noun",
    pattern: /\b(?:author|researcher)\s+(?:profile|info|information|details)\b|\b[Ww]ho\s+is\s+[A-Z]/,
  },
  {
    name: "paper_noun",
    intent: "search_papers",
    strength: "noun",
    pattern: /\b(?:papers?|articles?|publications?)\s+(?:about|on|regarding|related to)\b/i,
  },

  // Single cue words
  { name: "citation_cue", intent: "citation_analysis", strength: "cue", pattern: /\bcit(?:ation|ations|ed|ing|es)\b/i },
  { name: "trend_cue", intent: "trend_analysis", strength: "cue", pattern: /\btrend(?:s|ing)?\b/i },
  { name: "keyword_cue", intent: "keyword_analysis", strength: "cue", pattern: /\bkeywords?\b/i },
  { name: "author_cue", intent: "author_info", strength: "cue", pattern: /\b(?:authors?|researchers?)\b/i },
  { name: "paper_cue", intent: "search_papers", strength: "cue", pattern: /\b(?:papers?|articles?|publications?)\b/i },
];

// ============================================================================
// CLARIFICATION
// ============================================================================

export const GENERIC_CLARIFICATION: readonly string[] = [
  "Sorry, I didn't fully understand your request. Would you like to:",
  "1. Search for papers?",
  "2. Find author information?",
  "3. Analyze citation relationships?",
  "4. View research trends or top keywords?",
  "Please tell me your specific needs.",
];

const SLOT_CLARIFICATION: Record<ConcreteIntentType, string> = {
  search_papers: "What topic of papers would you like to search? Please provide more specific keywords.",
  author_info: "Which author's information would you like to find? Please provide the author's name.",
  citation_analysis: "Please provide the paper's ID or title to analyze its citation relationships.",
  trend_analysis: "Which research field's trending papers would you like to see?",
  keyword_analysis: "Which research field's top keywords would you like to see?",
};

// ============================================================================
// INTENT CONSTRUCTION
// ============================================================================

type BuildOutcome =
  | { ok: true; intent: Intent }
  | { ok: false; missing: string };

function freezeIntent<I extends Intent>(intent: I): I {
  Object.freeze(intent.parameters);
  Object.freeze(intent);
  return intent;
}

export function unknownIntent(confidence: number): IntentOf<"unknown"> {
  return freezeIntent<IntentOf<"unknown">>({ type: "unknown", parameters: {}, confidence });
}

/**
 * Build a complete Intent from slots, or report the required slot that is
 * missing. Never returns an Intent with an unfilled required slot.
 */
export function buildIntent(type: ConcreteIntentType, slots: ExtractedSlots, confidence: number): BuildOutcome {
  switch (type) {
    case "search_papers": {
      if (!slots.keywords || slots.keywords.length === 0) return { ok: false, missing: "keywords" };
      return {
        ok: true,
        intent: freezeIntent<IntentOf<"search_papers">>({
          type,
          confidence,
          parameters: {
            keywords: Object.freeze([...slots.keywords]),
            limit: slots.limit ?? TOOL_DEFAULTS.SEARCH_LIMIT,
            ...(slots.yearFrom !== undefined ? { yearFrom: slots.yearFrom } : {}),
            ...(slots.yearTo !== undefined ? { yearTo: slots.yearTo } : {}),
          },
        }),
      };
    }
    case "author_info": {
      if (!slots.authorName) return { ok: false, missing: "authorName" };
      return {
        ok: true,
        intent: freezeIntent<IntentOf<"author_info">>({
          type,
          confidence,
          parameters: { authorName: slots.authorName, limit: slots.limit ?? TOOL_DEFAULTS.AUTHOR_LIMIT },
        }),
      };
    }
    case "citation_analysis": {
      if (!slots.paperId && !slots.paperTitle) return { ok: false, missing: "paperId or paperTitle" };
      return {
        ok: true,
        intent: freezeIntent<IntentOf<"citation_analysis">>({
          type,
          confidence,
          parameters: {
            ...(slots.paperId ? { paperId: slots.paperId } : {}),
            ...(slots.paperTitle ? { paperTitle: slots.paperTitle } : {}),
            depth: slots.depth ?? TOOL_DEFAULTS.NETWORK_DEPTH,
          },
        }),
      };
    }
    case "trend_analysis":
      return {
        ok: true,
        intent: freezeIntent<IntentOf<"trend_analysis">>({
          type,
          confidence,
          parameters: {
            ...(slots.field ? { field: slots.field } : {}),
            timeRange: slots.timeRange ?? TOOL_DEFAULTS.TREND_TIME_RANGE,
          },
        }),
      };
    case "keyword_analysis":
      return {
        ok: true,
        intent: freezeIntent<IntentOf<"keyword_analysis">>({
          type,
          confidence,
          parameters: {
            ...(slots.field ? { field: slots.field } : {}),
            limit: slots.limit ?? TOOL_DEFAULTS.KEYWORD_LIMIT,
          },
        }),
      };
  }
}

// ============================================================================
// COREFERENCE
// ============================================================================

function stringParam(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" && value.trim() ? value : undefined;
}

function stringArrayParam(params: Record<string, unknown>, key: string): string[] | undefined {
  const value = params[key];
  if (!Array.isArray(value)) return undefined;
  const strings = value.filter((v): v is string => typeof v === "string" && v.trim().length > 0);
  return strings.length > 0 ? strings : undefined;
}

/**
 * Newest-first search of the context window for the first turn whose
 * parameters satisfy `pick`.
 */
function findInContext<T>(
  turns: ConversationTurn[],
  pick: (params: Record<string, unknown>) => T | undefined,
): T | undefined {
  for (let i = turns.length - 1; i >= 0; i--) {
    const params = turns[i].parameters;
    if (!params) continue;
    const found = pick(params);
    if (found !== undefined) return found;
  }
  return undefined;
}

/**
 * Fill missing slots from prior turns when the question points back at
 * something ("his papers", "this paper", "that field"). Returns the names of
 * the slots that were resolved.
 */
function resolveReferences(
  type: ConcreteIntentType,
  text: string,
  slots: ExtractedSlots,
  turns: ConversationTurn[],
): string[] {
  if (turns.length === 0) return [];

  switch (type) {
    case "search_papers": {
      if (slots.keywords?.length || !refersBack("topic", text)) return [];
      const keywords = findInContext(turns, p => {
        const field = stringParam(p, "field");
        return stringArrayParam(p, "keywords") ?? (field ? [field] : undefined);
      });
      if (!keywords) return [];
      slots.keywords = keywords;
      return ["keywords"];
    }
    case "author_info": {
      if (slots.authorName || !refersBack("author", text)) return [];
      const authorName = findInContext(turns, p => stringParam(p, "authorName"));
      if (!authorName) return [];
      slots.authorName = authorName;
      return ["authorName"];
    }
    case "citation_analysis": {
      if (slots.paperId || slots.paperTitle || !refersBack("paper", text)) return [];
      const paper = findInContext(turns, p => {
        const paperId = stringParam(p, "paperId");
        const paperTitle = stringParam(p, "paperTitle");
        return paperId || paperTitle ? { paperId, paperTitle } : undefined;
      });
      if (!paper) return [];
      slots.paperId = paper.paperId;
      slots.paperTitle = paper.paperTitle;
      return ["paper"];
    }
    case "trend_analysis":
    case "keyword_analysis": {
      if (slots.field || !refersBack("topic", text)) return [];
      const field = findInContext(turns, p => stringParam(p, "field") ?? stringArrayParam(p, "keywords")?.[0]);
      if (!field) return [];
      slots.field = field;
      return ["field"];
    }
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export type CandidateIntent = {
  type: ConcreteIntentType;
  baseConfidence: number;
  slots: ExtractedSlots;
  detectionMethod: IntentDetectionMethod;
  matchedRule?: string;
};

function contextWindow(turns: ConversationTurn[], size: number): ConversationTurn[] {
  return size > 0 ? turns.slice(-size) : [];
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/**
 * Apply coreference, slot validation and the confidence threshold to a
 * candidate. Shared by the pattern classifier and the LLM fallback.
 */
export function finalizeCandidate(
  candidate: CandidateInput,
  recentTurns: ConversationTurn[],
  policy: ConfidencePolicy,
): IntentClassification {
  const slots: ExtractedSlots = { ...candidate.slots };
  const resolvedFromContext = resolveReferences(
    candidate.type,
    candidate.text,
    slots,
    contextWindow(recentTurns, policy.contextWindow),
  );

  let confidence = clamp01(candidate.baseConfidence * Math.pow(policy.coreferencePenalty, resolvedFromContext.length));
  const built = buildIntent(candidate.type, slots, confidence);
  const common = {
    detectionMethod: candidate.detectionMethod,
    matchedRule: candidate.matchedRule,
    resolvedFromContext,
  };

  if (!built.ok) {
    confidence = clamp01(confidence - policy.missingSlotPenalty);
    return {
      ...common,
      intent: unknownIntent(confidence),
      candidateType: candidate.type,
      reason: `${candidate.type} is missing required ${built.missing}`,
      clarificationQuestions: [SLOT_CLARIFICATION[candidate.type]],
    };
  }

  if (confidence < policy.threshold) {
    return {
      ...common,
      intent: unknownIntent(confidence),
      candidateType: candidate.type,
      reason: `${candidate.type} confidence ${confidence.toFixed(2)} is below threshold ${policy.threshold}`,
      clarificationQuestions: [...GENERIC_CLARIFICATION],
    };
  }

  return {
    ...common,
    intent: built.intent,
    reason: resolvedFromContext.length > 0
      ? `${candidate.type} with ${resolvedFromContext.join(", ")} resolved from earlier turns`
      : `${candidate.type} matched`,
    clarificationQuestions: [],
  };
}

export type CandidateInput = CandidateIntent & { text: string };

/**
 * Pattern-based classification. Pure function of its inputs.
 */
export function classifyIntent(
  query: Pick<Query, "text">,
  recentTurns: ConversationTurn[] = [],
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY,
): IntentClassification {
  const text = query.text.trim();

  const identifier = findStructuredIdentifier(text);
  if (identifier) {
    const slots = extractSlots("citation_analysis", text);
    return finalizeCandidate({
      type: "citation_analysis",
      baseConfidence: policy.strengthScores.structured_id,
      slots: { ...slots, paperId: identifier.value, paperTitle: undefined },
      detectionMethod: "identifier",
      matchedRule: `identifier:${identifier.kind}`,
      text,
    }, recentTurns, policy);
  }

  const rule = PATTERN_RULES.find(r => r.pattern.test(text));
  if (!rule) {
    return {
      intent: unknownIntent(0),
      detectionMethod: "default",
      reason: "no pattern matched",
      resolvedFromContext: [],
      clarificationQuestions: [...GENERIC_CLARIFICATION],
    };
  }

  return finalizeCandidate({
    type: rule.intent,
    baseConfidence: policy.strengthScores[rule.strength],
    slots: extractSlots(rule.intent, text),
    detectionMethod: "pattern",
    matchedRule: rule.name,
    text,
  }, recentTurns, policy);
}
