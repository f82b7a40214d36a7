/**
 * Application Constants
 *
 * Centralized configuration values used across the application.
 * Environment overrides are parsed in settings.ts; these are the defaults.
 */

/**
 * Data service (subprocess) connection defaults
 */
export const DATA_SERVICE_CONSTANTS = {
  /**
   * Time allowed for the subprocess to spawn and complete the handshake (milliseconds).
   */
  STARTUP_TIMEOUT_MS: 45000,

  /**
   * Default deadline for a single tool call (milliseconds).
   */
  CALL_TIMEOUT_MS: 60000,

  /**
   * Consecutive failed connection attempts before the client closes.
   */
  MAX_RETRIES: 3,

  /**
   * Delay before an automatic reconnect attempt (milliseconds).
   */
  RETRY_DELAY_MS: 1000,

  /**
   * Consecutive call timeouts that mark a live connection as degraded.
   */
  MAX_CONSECUTIVE_TIMEOUTS: 3,

  /**
   * Grace period for the subprocess to exit after stdin closes (milliseconds).
   */
  SHUTDOWN_GRACE_MS: 5000,

  PROTOCOL_VERSION: "2024-11-05",

  CLIENT_INFO: {
    name: "research-assistant",
    version: "1.0.0",
  },
} as const;

/**
 * Intent classification defaults
 */
export const INTENT_CONSTANTS = {
  /**
   * Minimum confidence for a non-unknown intent.
   */
  CONFIDENCE_THRESHOLD: 0.5,

  /**
   * Subtracted when a required slot could not be filled.
   */
  MISSING_SLOT_PENALTY: 0.35,

  /**
   * Multiplied in when a slot was resolved from a prior turn.
   */
  COREFERENCE_PENALTY: 0.9,

  /**
   * Number of prior turns consulted for coreference.
   */
  CONTEXT_WINDOW_TURNS: 6,

  /**
   * Confidence assigned to each kind of pattern match, strongest first.
   */
  STRENGTH_SCORES: {
    structured_id: 0.95,
    verb_noun: 0.9,
    noun: 0.75,
    cue: 0.55,
  },
} as const;

/**
 * Tool argument defaults
 */
export const TOOL_DEFAULTS = {
  SEARCH_LIMIT: 6,
  AUTHOR_LIMIT: 6,
  KEYWORD_LIMIT: 20,
  NETWORK_DEPTH: 2,
  TREND_TIME_RANGE: "1year",
} as const;

/**
 * Response generation defaults
 */
export const RESPONSE_CONSTANTS = {
  MAX_TOKENS: 2000,
  TEMPERATURE: 0.7,

  /**
   * Language model request timeout (milliseconds).
   */
  LLM_TIMEOUT_MS: 30000,

  /**
   * Items of each kind included in prompts and fallback summaries.
   */
  MAX_ITEMS_IN_PROMPT: 5,

  /**
   * Characters kept from an abstract when building prompts.
   */
  ABSTRACT_PREVIEW_CHARS: 300,
} as const;
