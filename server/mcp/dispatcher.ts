/**
 * Tool Dispatcher
 *
 * Purpose:
 * Executes the dispatch plan for one Intent against the Protocol Client and
 * collects every outcome into an AggregatedResult.
 *
 * Execution:
 * - Stages run in order; steps within a stage are issued together
 * - Arguments are validated against the tool's zod schema before issue
 * - Every planned step yields exactly one ToolResult, failed or not
 * - Results keep plan order, whatever order responses arrive in
 * - No retries here; the Protocol Client owns transport retries
 *
 * Layer: MCP (dispatch)
 */

import { randomUUID } from "crypto";
import type { IntentType } from "@shared/schema";
import type { Intent, IntentOf } from "../decisionLayer/intent";
import type { ToolErrorKind, ToolResult } from "../dataService/types";
import { QueryCancelledError, getErrorMessage } from "../utils/errorHandler";
import { DISPATCH_TABLE } from "./dispatchTable";
import { TOOL_REGISTRY } from "./tools";
import type {
  AggregatedResult,
  ArgsOutcome,
  DispatchPlan,
  DispatchTable,
  EarlierResults,
  ToolClient,
  ToolDefinition,
  ToolInvocation,
  ToolName,
} from "./types";

export type ToolDispatcherOptions = {
  callTimeoutMs?: number;
  registry?: Record<ToolName, ToolDefinition>;
};

type BoundStep = {
  tool: ToolName;
  buildArgs: (earlier: EarlierResults) => ArgsOutcome;
};

type StepOutcome = {
  invocation: ToolInvocation;
  result: ToolResult;
};

function bind<T extends IntentType>(plan: DispatchPlan<T>, parameters: IntentOf<T>["parameters"]): BoundStep[][] {
  return plan.stages.map(stage =>
    stage.map(step => ({
      tool: step.tool,
      buildArgs: (earlier: EarlierResults) => step.buildArgs(parameters, earlier),
    })),
  );
}

function failedResult(correlationId: string, toolName: ToolName, kind: ToolErrorKind, message: string): ToolResult {
  return { correlationId, toolName, status: "error", errorDetail: { kind, message } };
}

function whenAborted(signal: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  let onAbort = (): void => undefined;
  const promise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new QueryCancelledError("dispatch"));
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

export class ToolDispatcher {
  private readonly registry: Record<ToolName, ToolDefinition>;

  constructor(
    private readonly client: ToolClient,
    private readonly table: DispatchTable = DISPATCH_TABLE,
    private readonly options: ToolDispatcherOptions = {},
  ) {
    this.registry = options.registry ?? TOOL_REGISTRY;
  }

  /**
   * Tool names per stage, without issuing anything.
   */
  planInvocations(intent: Intent): ToolName[][] {
    return this.boundPlan(intent).map(stage => stage.map(step => step.tool));
  }

  /**
   * Runs the plan. Resolves with one result per planned step. Rejects only
   * with QueryCancelledError when `signal` aborts; requests already issued
   * are left to finish and their results are dropped.
   */
  async dispatch(intent: Intent, signal?: AbortSignal): Promise<AggregatedResult> {
    const stages = this.boundPlan(intent);
    const invocations: ToolInvocation[] = [];
    const results: ToolResult[] = [];
    const earlier = new Map<ToolName, ToolResult>();
    const aborted = signal ? whenAborted(signal) : undefined;
    // An abort after the last stage has no race left to observe it
    aborted?.promise.catch(() => undefined);

    try {
      for (const [index, stage] of stages.entries()) {
        if (signal?.aborted) {
          throw new QueryCancelledError("dispatch");
        }

        const running = Promise.all(stage.map(step => this.runStep(step, earlier)));
        const outcomes = aborted ? await Promise.race([running, aborted.promise]) : await running;

        for (const { invocation, result } of outcomes) {
          invocations.push(invocation);
          results.push(result);
          earlier.set(invocation.toolName, result);
        }

        console.log(
          `[Dispatcher] ${intent.type} stage ${index + 1}/${stages.length}: ` +
          outcomes.map(o => `${o.invocation.toolName}=${o.result.status}`).join(", "),
        );
      }
    } finally {
      aborted?.dispose();
    }

    return { intentType: intent.type, invocations, results };
  }

  private boundPlan(intent: Intent): BoundStep[][] {
    switch (intent.type) {
      case "search_papers":
        return bind(this.table.search_papers, intent.parameters);
      case "author_info":
        return bind(this.table.author_info, intent.parameters);
      case "citation_analysis":
        return bind(this.table.citation_analysis, intent.parameters);
      case "trend_analysis":
        return bind(this.table.trend_analysis, intent.parameters);
      case "keyword_analysis":
        return bind(this.table.keyword_analysis, intent.parameters);
      case "unknown":
        return bind(this.table.unknown, intent.parameters);
      default: {
        const unhandled: never = intent;
        throw new Error(`No dispatch plan for intent: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  // Never rejects: every path ends in a ToolResult
  private async runStep(step: BoundStep, earlier: EarlierResults): Promise<StepOutcome> {
    const correlationId = randomUUID();
    const built = step.buildArgs(earlier);

    if (!built.ok) {
      console.warn(`[Dispatcher] ${step.tool} skipped: ${built.reason}`);
      return {
        invocation: { toolName: step.tool, arguments: {}, correlationId },
        result: failedResult(correlationId, step.tool, "dependency", built.reason),
      };
    }

    const invocation: ToolInvocation = { toolName: step.tool, arguments: built.args, correlationId };
    const parsed = this.registry[step.tool].inputSchema.safeParse(built.args);
    if (!parsed.success) {
      const message = getErrorMessage(parsed.error);
      console.warn(`[Dispatcher] ${step.tool} arguments rejected: ${message}`);
      return { invocation, result: failedResult(correlationId, step.tool, "invalid_arguments", message) };
    }

    try {
      const result = await this.client.request(step.tool, parsed.data, {
        correlationId,
        ...(this.options.callTimeoutMs !== undefined ? { timeoutMs: this.options.callTimeoutMs } : {}),
      });
      return { invocation: { ...invocation, arguments: parsed.data }, result };
    } catch (error) {
      // ProtocolClient.request resolves on failure; other clients may not
      return { invocation, result: failedResult(correlationId, step.tool, "transport", getErrorMessage(error)) };
    }
  }
}
