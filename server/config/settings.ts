/**
 * Runtime Settings
 *
 * Purpose:
 * Parses process.env once into a typed settings object. Every value has a
 * default from constants.ts so the server boots without a .env file; only
 * the data-service command and an LLM API key are needed for real answers.
 *
 * Layer: Infrastructure (configuration)
 */

import path from "path";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import {
  DATA_SERVICE_CONSTANTS,
  INTENT_CONSTANTS,
  RESPONSE_CONSTANTS,
} from "./constants";
import { MODEL_ASSIGNMENTS } from "./models";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform(value => value === "true" || value === "1" || value === "yes");

const jsonStringArray = z.string().transform((value, ctx) => {
  try {
    return z.array(z.string()).parse(JSON.parse(value));
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a JSON array of strings" });
    return z.NEVER;
  }
});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1).optional(),

  MCP_SERVER_COMMAND: z.string().min(1).default("research-data-service"),
  MCP_SERVER_ARGS: jsonStringArray.default("[]"),
  MCP_SERVER_CWD: z.string().min(1).default("."),
  MCP_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(DATA_SERVICE_CONSTANTS.STARTUP_TIMEOUT_MS),
  MCP_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(DATA_SERVICE_CONSTANTS.CALL_TIMEOUT_MS),
  MCP_MAX_RETRIES: z.coerce.number().int().positive().default(DATA_SERVICE_CONSTANTS.MAX_RETRIES),
  MCP_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(DATA_SERVICE_CONSTANTS.RETRY_DELAY_MS),
  MCP_MAX_CONSECUTIVE_TIMEOUTS: z.coerce.number().int().positive().default(DATA_SERVICE_CONSTANTS.MAX_CONSECUTIVE_TIMEOUTS),
  MCP_ENABLE_DEBUG_LOG: booleanFlag.default("false"),
  MCP_DEBUG_LOG_FILE: z.string().min(1).optional(),

  LLM_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.RESEARCH_RESPONSE),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(RESPONSE_CONSTANTS.MAX_TOKENS),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(RESPONSE_CONSTANTS.TEMPERATURE),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(RESPONSE_CONSTANTS.LLM_TIMEOUT_MS),

  INTENT_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(INTENT_CONSTANTS.CONFIDENCE_THRESHOLD),
  INTENT_LLM_FALLBACK: booleanFlag.default("false"),
  CONTEXT_WINDOW_TURNS: z.coerce.number().int().nonnegative().default(INTENT_CONSTANTS.CONTEXT_WINDOW_TURNS),
});

export type Settings = {
  port: number;
  databaseUrl?: string;
  dataService: {
    command: string;
    args: string[];
    cwd: string;
    startupTimeoutMs: number;
    callTimeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    maxConsecutiveTimeouts: number;
    debugLog: boolean;
    debugLogFile?: string;
  };
  llm: {
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  intent: {
    threshold: number;
    llmFallback: boolean;
    contextWindow: number;
  };
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`[Settings] Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    dataService: {
      command: e.MCP_SERVER_COMMAND,
      args: e.MCP_SERVER_ARGS,
      cwd: path.resolve(e.MCP_SERVER_CWD),
      startupTimeoutMs: e.MCP_CONNECT_TIMEOUT_MS,
      callTimeoutMs: e.MCP_CALL_TIMEOUT_MS,
      maxRetries: e.MCP_MAX_RETRIES,
      retryDelayMs: e.MCP_RETRY_DELAY_MS,
      maxConsecutiveTimeouts: e.MCP_MAX_CONSECUTIVE_TIMEOUTS,
      debugLog: e.MCP_ENABLE_DEBUG_LOG,
      debugLogFile: e.MCP_DEBUG_LOG_FILE,
    },
    llm: {
      model: e.LLM_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    intent: {
      threshold: e.INTENT_CONFIDENCE_THRESHOLD,
      llmFallback: e.INTENT_LLM_FALLBACK,
      contextWindow: e.CONTEXT_WINDOW_TURNS,
    },
  };
}
