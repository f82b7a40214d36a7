import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { chatRequestSchema, type ChatRequest } from "@shared/schema";
import type { ResearchOrchestrator } from "./assistant/orchestrator";
import type { IStorage } from "./storage";
import { commonSchemas, validate, type MessageListQuery } from "./middleware/validation";
import { NotFoundError, QueryCancelledError, handleRouteError } from "./utils/errorHandler";

export type RouteDeps = {
  orchestrator: ResearchOrchestrator;
  storage: IStorage;
  // Takes the data service out of Closed after the retry bound was exhausted
  resetDataService: () => void;
};

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const { orchestrator, storage } = deps;

  app.post("/api/chat", validate({ body: chatRequestSchema }), async (req: Request, res: Response) => {
    const body: ChatRequest = req.body;
    const controller = new AbortController();
    // Client went away before the answer was written
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const { conversationId, response } = await orchestrator.handleQuery(
        { text: body.message, userId: body.userId, conversationId: body.conversationId },
        controller.signal,
      );

      if (response.error) {
        return res.status(503).json({
          error: response.error.message,
          code: response.error.code,
          conversationId,
          metadata: response.metadata,
        });
      }

      res.json({ conversationId, message: response.message, metadata: response.metadata });
    } catch (error) {
      if (error instanceof QueryCancelledError) {
        console.log(`[Routes] ${error.message} for user ${body.userId}`);
        return;
      }
      handleRouteError(res, error, "Routes");
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    const dataService = orchestrator.health();
    res.json({
      status: dataService.state === "Ready" ? "ok" : "degraded",
      dataService,
    });
  });

  app.post("/api/data-service/reset", async (_req: Request, res: Response) => {
    try {
      deps.resetDataService();
      const state = await orchestrator.start();
      console.log(`[Routes] Data service reset, now ${state}`);
      res.json({ state, dataService: orchestrator.health() });
    } catch (error) {
      handleRouteError(res, error, "Routes");
    }
  });

  app.get(
    "/api/conversations/:id/messages",
    validate({ params: commonSchemas.id, query: commonSchemas.messageList }),
    async (req: Request, res: Response) => {
      try {
        const { limit }: MessageListQuery = commonSchemas.messageList.parse(req.query);
        const conversation = await storage.getConversation(req.params.id);
        if (!conversation) {
          throw new NotFoundError("Conversation");
        }
        const messages = await storage.getMessages(conversation.id);
        // Most recent `limit` messages, oldest first
        res.json({ conversation, messages: limit === undefined ? messages : messages.slice(-limit) });
      } catch (error) {
        handleRouteError(res, error, "Routes");
      }
    },
  );

  // Errors passed to next(), e.g. by the validation middleware
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, error, "Routes");
  });

  return createServer(app);
}
