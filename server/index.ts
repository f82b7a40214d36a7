/**
 * Server bootstrap
 *
 * Wires settings, the data service client, the assistant pipeline and the
 * HTTP routes, then listens. SIGINT/SIGTERM shut the data service down
 * before exiting.
 */

import express from "express";
import { loadSettings } from "./config/settings";
import { createProtocolClient } from "./dataService";
import { DEFAULT_CONFIDENCE_POLICY, IntentAnalyzer } from "./decisionLayer";
import { ToolDispatcher } from "./mcp";
import { ResponseIntegrator, createLanguageModel } from "./response";
import { ResearchOrchestrator } from "./assistant/orchestrator";
import { createStorage } from "./storage";
import { registerRoutes } from "./routes";
import { logError } from "./utils/errorHandler";

async function main(): Promise<void> {
  const settings = loadSettings();

  const protocolClient = createProtocolClient(settings.dataService);
  const storage = createStorage(settings.databaseUrl);

  const orchestrator = new ResearchOrchestrator({
    analyzer: new IntentAnalyzer({
      policy: {
        ...DEFAULT_CONFIDENCE_POLICY,
        threshold: settings.intent.threshold,
        contextWindow: settings.intent.contextWindow,
      },
      llmFallback: settings.intent.llmFallback,
    }),
    dispatcher: new ToolDispatcher(protocolClient, undefined, { callTimeoutMs: settings.dataService.callTimeoutMs }),
    integrator: new ResponseIntegrator({
      languageModel: createLanguageModel(settings.llm.model),
      generation: {
        maxTokens: settings.llm.maxTokens,
        temperature: settings.llm.temperature,
        timeoutMs: settings.llm.timeoutMs,
      },
    }),
    storage,
    connection: protocolClient,
    contextWindow: settings.intent.contextWindow,
  });

  const app = express();
  app.use(express.json({ limit: "100kb" }));

  const server = registerRoutes(app, {
    orchestrator,
    storage,
    resetDataService: () => protocolClient.reset(),
  });

  const state = await orchestrator.start();
  console.log(`[Server] Data service ${state}`);

  server.listen(settings.port, () => {
    console.log(`[Server] Listening on port ${settings.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close();
    orchestrator.shutdown()
      .catch(error => logError("Server", error))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch(error => {
  logError("Server", error);
  process.exit(1);
});
