import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

// ============================================================================
// Query pipeline taxonomy
// These never reach end users as text; the pipeline turns them into
// failed ToolResults, an `unknown` intent, or a templated fallback answer.
// ============================================================================

/** Subprocess unreachable, broken pipe, or exited. */
export class TransportError extends Error implements AppError {
  statusCode = 503;
  code = "TRANSPORT";
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

/** No response within a call's deadline. */
export class ProtocolTimeoutError extends Error implements AppError {
  statusCode = 504;
  code = "PROTOCOL_TIMEOUT";
  isOperational = true;
  timeoutMs: number;
  constructor(method: string, timeoutMs: number) {
    super(`No response to ${method} within ${timeoutMs}ms`);
    this.name = "ProtocolTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The data service reported an application-level failure for a tool. Not retried. */
export class ToolError extends Error implements AppError {
  statusCode = 502;
  code = "TOOL_ERROR";
  isOperational = true;
  toolName: string;
  constructor(toolName: string, message: string) {
    super(`${toolName} failed: ${message}`);
    this.name = "ToolError";
    this.toolName = toolName;
  }
}

/** The question could not be placed in an intent with enough confidence. Degrades to `unknown`. */
export class ClassificationAmbiguousError extends Error implements AppError {
  statusCode = 422;
  code = "CLASSIFICATION_AMBIGUOUS";
  isOperational = true;
  confidence: number;
  constructor(confidence: number, threshold: number, detail?: string) {
    super(detail ?? `Intent confidence ${confidence.toFixed(2)} is below threshold ${threshold.toFixed(2)}`);
    this.name = "ClassificationAmbiguousError";
    this.confidence = confidence;
  }
}

/** Language model call failed, timed out, or returned nothing usable. */
export class GenerationFailureError extends Error implements AppError {
  statusCode = 502;
  code = "GENERATION_FAILURE";
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "GenerationFailureError";
  }
}

/** The caller abandoned the query (client disconnect). Nothing is sent or stored. */
export class QueryCancelledError extends Error implements AppError {
  statusCode = 499;
  code = "CANCELLED";
  isOperational = true;
  constructor(stage: string) {
    super(`Query cancelled during ${stage}`);
    this.name = "QueryCancelledError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

function hasStatusCode(error: unknown): error is AppError & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);

  if (statusCode >= 500) {
    if (context) {
      console.error(`[${context}] Error:`, error);
    }
    // Internal failures are logged, never echoed back
    res.status(statusCode).json({ error: classifyPipelineError(error).userMessage });
    return;
  }

  res.status(statusCode).json({ error: getErrorMessage(error) });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export interface ClassifiedError {
  type: "data_service" | "llm_quota" | "llm_auth" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
}

function readErrorCode(err: unknown): string | number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && (typeof err.code === "string" || typeof err.code === "number")) return err.code;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = readErrorCode(err);

  if (err instanceof TransportError || err instanceof ProtocolTimeoutError) {
    return {
      type: "data_service",
      userMessage: "The research data service is unavailable right now. Please try again in a few minutes.",
      errorMessage, errorCode,
    };
  }

  if (errorCode === "insufficient_quota" || errorCode === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    errorMessage.includes("rate limit")) {
    return {
      type: "llm_quota",
      userMessage: "I can't process this right now because the language model quota has been exceeded. Please try again later.",
      errorMessage, errorCode,
    };
  }

  if (errorCode === 401 || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key")) {
    return {
      type: "llm_auth",
      userMessage: "I can't process this right now because the language model is not configured correctly. Please contact an admin.",
      errorMessage, errorCode,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, I hit an internal error while processing that request.",
    errorMessage, errorCode,
  };
}
