/**
 * Decision Layer (Intent Router)
 *
 * Purpose:
 * Central export for intent classification. IntentAnalyzer wraps the pure
 * pattern classifier with the optional LLM fallback.
 *
 * Flow:
 * 1. Pattern classification (identifier, rules, slots, coreference)
 * 2. If the result is `unknown` and the fallback is enabled, ask the LLM
 * 3. The LLM proposal passes the same slot validation and threshold
 *
 * Layer: Decision Layer (routing)
 */

import type { ConversationTurn, Query } from "@shared/schema";
import { ClassificationAmbiguousError, getErrorMessage } from "../utils/errorHandler";
import {
  classifyIntent,
  finalizeCandidate,
  DEFAULT_CONFIDENCE_POLICY,
  type ConfidencePolicy,
  type IntentClassification,
} from "./intent";
import { interpretQuery, type IntentInterpreter, type LlmIntentProposal } from "./llmInterpretation";

export {
  classifyIntent,
  buildIntent,
  unknownIntent,
  DEFAULT_CONFIDENCE_POLICY,
  GENERIC_CLARIFICATION,
  type Intent,
  type IntentOf,
  type IntentClassification,
  type IntentDetectionMethod,
  type ConfidencePolicy,
  type MatchStrength,
} from "./intent";
export { interpretQuery, type IntentInterpreter, type LlmIntentProposal } from "./llmInterpretation";

export type IntentAnalyzerOptions = {
  policy?: ConfidencePolicy;
  llmFallback?: boolean;
  interpreter?: IntentInterpreter;
};

function slotsFromProposal(proposal: LlmIntentProposal) {
  return {
    keywords: proposal.keywords,
    limit: proposal.limit,
    yearFrom: proposal.yearFrom,
    yearTo: proposal.yearTo,
    authorName: proposal.authorName,
    paperId: proposal.paperId,
    paperTitle: proposal.paperTitle,
    depth: proposal.depth,
    field: proposal.field,
    timeRange: proposal.timeRange,
  };
}

export class IntentAnalyzer {
  private readonly policy: ConfidencePolicy;
  private readonly llmFallback: boolean;
  private readonly interpreter: IntentInterpreter;

  constructor(options: IntentAnalyzerOptions = {}) {
    this.policy = options.policy ?? DEFAULT_CONFIDENCE_POLICY;
    this.llmFallback = options.llmFallback ?? false;
    this.interpreter = options.interpreter ?? ((text, turns) => interpretQuery(text, turns));
  }

  getPolicy(): ConfidencePolicy {
    return this.policy;
  }

  async analyze(query: Query, recentTurns: ConversationTurn[]): Promise<IntentClassification> {
    const pattern = classifyIntent(query, recentTurns, this.policy);
    this.log(query, pattern);

    if (pattern.intent.type !== "unknown" || !this.llmFallback) {
      return pattern;
    }

    try {
      const window = this.policy.contextWindow > 0 ? recentTurns.slice(-this.policy.contextWindow) : [];
      const proposal = await this.interpreter(query.text, window);

      if (proposal.intentType === "unknown") {
        throw new ClassificationAmbiguousError(proposal.confidence, this.policy.threshold, "LLM could not place the question");
      }

      const fromLlm = finalizeCandidate({
        type: proposal.intentType,
        baseConfidence: proposal.confidence,
        slots: slotsFromProposal(proposal),
        detectionMethod: "llm",
        matchedRule: "llm_fallback",
        text: query.text,
      }, recentTurns, this.policy);

      if (fromLlm.intent.type === "unknown") {
        throw new ClassificationAmbiguousError(fromLlm.intent.confidence, this.policy.threshold, fromLlm.reason);
      }

      this.log(query, fromLlm);
      return fromLlm;
    } catch (error) {
      // Ambiguity and LLM failures both keep the pattern result
      console.warn(`[Intent] LLM fallback did not resolve the question: ${getErrorMessage(error)}`);
      return pattern;
    }
  }

  private log(query: Query, result: IntentClassification): void {
    const { intent } = result;
    console.log(
      `[Intent] ${intent.type} (${result.detectionMethod}${result.matchedRule ? `:${result.matchedRule}` : ""}) ` +
      `confidence=${intent.confidence.toFixed(2)} reason="${result.reason}" user=${query.userId}`,
    );
  }
}
