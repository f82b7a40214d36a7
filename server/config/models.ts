/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for model selection. The provider is derived from
 * the model name (see server/llm/client.ts), so an OpenAI-compatible host
 * configured through OPENAI_BASE_URL can serve any name listed under LLM_MODELS.
 *
 * MODEL TIERS:
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Use for: intent fallback classification, structured extraction
 *
 * STANDARD_REASONING - gpt-4o
 *   Use for: research answers composed from data-service results
 */

export const LLM_MODELS = {
  /**
   * Fast, cheap model for classification and simple structured outputs.
   */
  FAST_CLASSIFICATION: "gpt-4o-mini",

  /**
   * Balanced model for composing research answers.
   */
  STANDARD_REASONING: "gpt-4o",
} as const;

/**
 * Gemini models, selectable through LLM_MODEL.
 */
export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

/**
 * Claude models, selectable through LLM_MODEL.
 */
export const CLAUDE_MODELS = {
  SONNET: "claude-sonnet-4-5",
} as const;

/** Which model each pipeline stage calls. */
export const MODEL_ASSIGNMENTS = {
  // Decision Layer - only consulted when pattern rules are not confident
  INTENT_CLASSIFICATION: LLM_MODELS.FAST_CLASSIFICATION,

  // Response Integrator
  RESEARCH_RESPONSE: LLM_MODELS.STANDARD_REASONING,
} as const;
