/**
 * Response Integrator
 *
 * Purpose:
 * Combines the Intent, the aggregated tool results and the conversation
 * window into one natural-language answer with metadata.
 *
 * Degradation:
 * - Any failed ToolResult: answer from what succeeded, degraded = true
 * - Language model failure or empty output: templated summary, degraded = true
 * - Nothing succeeded and the data service is unreachable: explicit `error`
 *
 * Error text from the data service or the model is logged, never returned.
 *
 * Layer: Response
 */

import type { ConversationTurn, IntentType, Query } from "@shared/schema";
import { RESPONSE_CONSTANTS } from "../config/constants";
import {
  DATA_SERVICE_UNAVAILABLE_MESSAGE,
  FOLLOW_UP_SUGGESTIONS,
  type ResponseStrategy,
} from "../config/prompts";
import type { ToolResult } from "../dataService/types";
import { GENERIC_CLARIFICATION, type Intent } from "../decisionLayer/intent";
import { generateText, type LLMMessage } from "../llm/client";
import type { AggregatedResult, ToolName } from "../mcp/types";
import { getErrorMessage } from "../utils/errorHandler";
import { buildFallbackMessage } from "./fallback";
import { deriveInsights, normalizeResults, type ResearchInsights } from "./normalize";
import { buildResponsePrompt } from "./prompt";

export type GenerationConfig = {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
};

/**
 * The one capability the integrator needs from a language model.
 */
export interface LanguageModel {
  generate(messages: LLMMessage[], config: GenerationConfig): Promise<string>;
}

export function createLanguageModel(model: string): LanguageModel {
  return {
    async generate(messages, config) {
      const response = await generateText({ model, messages, ...config });
      return response.text;
    },
  };
}

export type IntegrationContext = {
  recentTurns: ConversationTurn[];
  clarificationQuestions?: string[];
};

export type ResponseMetadata = {
  intentType: IntentType;
  confidence: number;
  processingTime: number;
  degraded: boolean;
  strategy: ResponseStrategy;
  toolsUsed: string[];
  failedTools: string[];
  followUpSuggestions: string[];
  insights: ResearchInsights;
};

export type IntegratedResponse = {
  message: string;
  metadata: ResponseMetadata;
  error?: { code: "DATA_SERVICE_UNAVAILABLE"; message: string };
};

export type ResponseIntegratorOptions = {
  languageModel: LanguageModel;
  generation?: Partial<GenerationConfig>;
  now?: () => number;
};

const STRATEGY_BY_INTENT: Record<IntentType, ResponseStrategy> = {
  search_papers: "paper_list",
  author_info: "author_detail",
  citation_analysis: "citation_analysis",
  trend_analysis: "trend_report",
  keyword_analysis: "keyword_analysis",
  unknown: "clarification",
};

// How a failed tool is described to the user
const TOOL_LABELS: Record<ToolName, string> = {
  search_papers: "paper search results",
  get_paper_details: "paper details",
  get_paper_citations: "citing papers",
  get_citation_network: "citation network",
  search_authors: "author profile",
  get_author_papers: "author's papers",
  get_trending_papers: "trending papers",
  get_top_keywords: "keyword statistics",
};

function isUnreachable(result: ToolResult): boolean {
  if (result.status === "ok") return false;
  const kind = result.errorDetail.kind;
  return kind === "transport" || kind === "closed";
}

/**
 * Nothing succeeded and the data service itself could not be reached.
 * Dependency failures are consequences of an earlier failure and do not
 * count against this.
 */
function isTotalFailure(results: ToolResult[]): boolean {
  if (results.length === 0 || results.some(r => r.status === "ok")) return false;
  const causes = results.filter(r => r.status !== "ok" && r.errorDetail.kind !== "dependency");
  return causes.length > 0 && causes.every(isUnreachable);
}

export class ResponseIntegrator {
  private readonly languageModel: LanguageModel;
  private readonly generation: GenerationConfig;
  private readonly now: () => number;

  constructor(options: ResponseIntegratorOptions) {
    this.languageModel = options.languageModel;
    this.generation = {
      maxTokens: options.generation?.maxTokens ?? RESPONSE_CONSTANTS.MAX_TOKENS,
      temperature: options.generation?.temperature ?? RESPONSE_CONSTANTS.TEMPERATURE,
      timeoutMs: options.generation?.timeoutMs ?? RESPONSE_CONSTANTS.LLM_TIMEOUT_MS,
    };
    this.now = options.now ?? Date.now;
  }

  async integrate(
    query: Query,
    intent: Intent,
    aggregated: AggregatedResult,
    context: IntegrationContext,
  ): Promise<IntegratedResponse> {
    const strategy = STRATEGY_BY_INTENT[intent.type];
    const data = normalizeResults(aggregated);
    const insights = deriveInsights(data);

    const toolsUsed = aggregated.invocations.map(i => i.toolName);
    const failedTools = aggregated.results.filter(r => r.status !== "ok").map(r => r.toolName);
    const unavailable = [...new Set(
      aggregated.invocations
        .filter((_, index) => aggregated.results[index]?.status !== "ok")
        .map(i => TOOL_LABELS[i.toolName]),
    )];

    for (const result of aggregated.results) {
      if (result.status !== "ok") {
        console.warn(`[Integrator] ${result.toolName} ${result.status} (${result.errorDetail.kind}): ${result.errorDetail.message}`);
      }
    }

    const clarificationQuestions = intent.type === "unknown"
      ? (context.clarificationQuestions?.length ? context.clarificationQuestions : [...GENERIC_CLARIFICATION])
      : [];

    const metadata = (degraded: boolean): ResponseMetadata => ({
      intentType: intent.type,
      confidence: intent.confidence,
      processingTime: Math.max(0, this.now() - query.timestamp.getTime()),
      degraded,
      strategy,
      toolsUsed,
      failedTools,
      followUpSuggestions: [...FOLLOW_UP_SUGGESTIONS[strategy]],
      insights,
    });

    if (isTotalFailure(aggregated.results)) {
      console.error(`[Integrator] No data available for ${intent.type}: data service unreachable`);
      return {
        message: DATA_SERVICE_UNAVAILABLE_MESSAGE,
        metadata: metadata(true),
        error: { code: "DATA_SERVICE_UNAVAILABLE", message: DATA_SERVICE_UNAVAILABLE_MESSAGE },
      };
    }

    const partial = failedTools.length > 0;
    const messages = buildResponsePrompt({
      question: query.text,
      strategy,
      data,
      insights,
      unavailable,
      clarificationQuestions,
      recentTurns: context.recentTurns,
    });

    try {
      const text = (await this.languageModel.generate(messages, this.generation)).trim();
      if (!text) {
        throw new Error("language model returned an empty answer");
      }
      return { message: text, metadata: metadata(partial) };
    } catch (error) {
      console.warn(`[Integrator] Generation failed, using templated answer: ${getErrorMessage(error)}`);
      const message = buildFallbackMessage(data, {
        unavailable,
        clarificationQuestions,
        limit: RESPONSE_CONSTANTS.MAX_ITEMS_IN_PROMPT,
      });
      return { message, metadata: metadata(true) };
    }
  }
}
