/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained in this single location.
 *
 * Structure:
 * - intent.ts: LLM fallback for intent classification
 * - response.ts: Research answer generation, per response strategy
 */

export * from "./intent";
export * from "./response";
