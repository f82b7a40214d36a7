import type { z } from "zod";
import type { IntentType } from "@shared/schema";
import type { IntentOf } from "../decisionLayer/intent";
import type { RequestOptions, ToolResult } from "../dataService/types";

// The vocabulary the data service exposes
export const TOOL_NAMES = [
  "search_papers",
  "get_paper_details",
  "get_paper_citations",
  "get_citation_network",
  "search_authors",
  "get_author_papers",
  "get_trending_papers",
  "get_top_keywords",
] as const;
export type ToolName = typeof TOOL_NAMES[number];

/**
 * A data service tool as seen from this side of the wire: its name and the
 * schema its arguments are validated against before a call is issued.
 */
export type ToolDefinition<Args extends Record<string, unknown> = Record<string, unknown>> = {
  name: ToolName;
  description: string;
  inputSchema: z.ZodType<Args, z.ZodTypeDef, unknown>;
};

export type ToolInvocation = {
  toolName: ToolName;
  arguments: Record<string, unknown>;
  correlationId: string;
};

/**
 * All results for one Intent, in invocation issue order.
 */
export type AggregatedResult = {
  intentType: IntentType;
  invocations: ToolInvocation[];
  results: ToolResult[];
};

/**
 * Results of earlier stages, keyed by tool name. Later stages read
 * identifiers (author id, paper id) out of these.
 */
export type EarlierResults = ReadonlyMap<ToolName, ToolResult>;

export type ArgsOutcome =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; reason: string };

export type DispatchStep<T extends IntentType> = {
  tool: ToolName;
  buildArgs: (parameters: IntentOf<T>["parameters"], earlier: EarlierResults) => ArgsOutcome;
};

/**
 * Ordered stages. Steps inside a stage are independent and issued
 * concurrently; a stage starts once the previous one has settled.
 */
export type DispatchPlan<T extends IntentType> = {
  stages: DispatchStep<T>[][];
};

// Exhaustive over IntentType: adding an intent without a plan fails to compile
export type DispatchTable = { [T in IntentType]: DispatchPlan<T> };

/**
 * The slice of ProtocolClient the dispatcher needs.
 */
export interface ToolClient {
  request(name: string, args: Record<string, unknown>, options?: RequestOptions): Promise<ToolResult>;
}
