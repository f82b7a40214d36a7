/**
 * Research Assistant Orchestrator
 *
 * Purpose:
 * Runs one research question end to end:
 *   Query → Intent Analyzer → Tool Dispatcher → Response Integrator
 * and records the exchange in the conversation store.
 *
 * Each call is independent; concurrent queries share only the Protocol
 * Client connection. A cancelled query (aborted signal) stops before the
 * next stage and stores nothing.
 *
 * Layer: Assistant (composition)
 */

import type { ConversationTurn, Query } from "@shared/schema";
import type { IntentAnalyzer } from "../decisionLayer";
import type { Intent } from "../decisionLayer/intent";
import type { ConnectionState, ProtocolClientHealth } from "../dataService/types";
import type { ToolDispatcher } from "../mcp/dispatcher";
import type { AggregatedResult } from "../mcp/types";
import { normalizeResults } from "../response/normalize";
import type { IntegratedResponse, ResponseIntegrator } from "../response/integrator";
import type { IStorage } from "../storage";
import { QueryCancelledError, logError } from "../utils/errorHandler";

export type QueryRequest = {
  text: string;
  userId: string;
  conversationId?: string | null;
  recentTurns?: ConversationTurn[];
};

export type QueryOutcome = {
  conversationId: string | null;
  response: IntegratedResponse;
};

/**
 * The lifecycle slice of the Protocol Client the orchestrator manages.
 */
export interface DataServiceConnection {
  start(): Promise<ConnectionState>;
  shutdown(): Promise<void>;
  health(): ProtocolClientHealth;
}

export type OrchestratorDeps = {
  analyzer: IntentAnalyzer;
  dispatcher: ToolDispatcher;
  integrator: ResponseIntegrator;
  storage: IStorage;
  connection: DataServiceConnection;
  contextWindow: number;
  now?: () => Date;
};

const TITLE_MAX_CHARS = 80;

function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new QueryCancelledError(stage);
  }
}

/**
 * Entities the answer was about, so the next question can say "this paper"
 * or "his papers".
 */
export function resolveEntities(aggregated: AggregatedResult): Record<string, unknown> {
  const data = normalizeResults(aggregated);
  switch (data.kind) {
    case "papers": {
      const top = data.papers[0];
      return top ? { paperTitle: top.title, ...(top.id ? { paperId: top.id } : {}) } : {};
    }
    case "author": {
      const author = data.authors[0];
      return author ? { authorName: author.name } : {};
    }
    case "citations":
      return data.paper
        ? { paperTitle: data.paper.title, ...(data.paper.id ? { paperId: data.paper.id } : {}) }
        : {};
    case "trends":
    case "keywords":
    case "none":
      return {};
  }
}

function turnParameters(intent: Intent, aggregated: AggregatedResult): Record<string, unknown> {
  return { ...intent.parameters, ...resolveEntities(aggregated) };
}

export class ResearchOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async start(): Promise<ConnectionState> {
    return this.deps.connection.start();
  }

  async shutdown(): Promise<void> {
    await this.deps.connection.shutdown();
  }

  health(): ProtocolClientHealth {
    return this.deps.connection.health();
  }

  async handleQuery(request: QueryRequest, signal?: AbortSignal): Promise<QueryOutcome> {
    const query: Query = Object.freeze({
      text: request.text.trim(),
      userId: request.userId,
      conversationId: request.conversationId ?? null,
      timestamp: this.now(),
    });

    const { analyzer, dispatcher, integrator } = this.deps;

    const recentTurns = request.recentTurns ?? await this.loadTurns(query.conversationId);
    throwIfCancelled(signal, "classification");

    const classification = await analyzer.analyze(query, recentTurns);
    const { intent } = classification;
    throwIfCancelled(signal, "dispatch");

    const aggregated = await dispatcher.dispatch(intent, signal);
    throwIfCancelled(signal, "integration");

    const response = await integrator.integrate(query, intent, aggregated, {
      recentTurns,
      clarificationQuestions: classification.clarificationQuestions,
    });
    throwIfCancelled(signal, "persistence");

    console.log(
      `[Orchestrator] ${intent.type} answered in ${response.metadata.processingTime}ms ` +
      `(tools=${response.metadata.toolsUsed.length}, degraded=${response.metadata.degraded})`,
    );

    const conversationId = await this.record(query, intent, aggregated, response);
    return { conversationId, response };
  }

  // A failed read answers without context rather than failing the query
  private async loadTurns(conversationId: string | null): Promise<ConversationTurn[]> {
    if (!conversationId) return [];
    try {
      return await this.deps.storage.getRecentTurns(conversationId, this.deps.contextWindow);
    } catch (error) {
      logError("Orchestrator", error);
      return [];
    }
  }

  // Storage failures are logged; the answer is still returned
  private async record(
    query: Query,
    intent: Intent,
    aggregated: AggregatedResult,
    response: IntegratedResponse,
  ): Promise<string | null> {
    const { storage } = this.deps;
    try {
      let conversationId = query.conversationId;
      if (!conversationId || !(await storage.getConversation(conversationId))) {
        const conversation = await storage.createConversation(query.userId, query.text.slice(0, TITLE_MAX_CHARS));
        conversationId = conversation.id;
      }

      await storage.appendTurns(conversationId, [
        { role: "user", content: query.text, createdAt: query.timestamp },
        {
          role: "assistant",
          content: response.message,
          intentType: intent.type,
          parameters: turnParameters(intent, aggregated),
          createdAt: this.now(),
        },
      ]);
      return conversationId;
    } catch (error) {
      logError("Orchestrator", error);
      return query.conversationId;
    }
  }
}
