import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import {
  queryRequestSchema,
  type HealthResponse,
  type MessageResponse,
  type QueryResponse,
  type ToolsResponse,
} from "@shared/schema";
import type { ConversationDispatcher } from "./mcp/dispatcher";
import type { SessionManager } from "./mcp/sessionManager";
import { handleRouteError, type JsonResponse } from "./utils/errorHandler";
import { RequestLogger } from "./utils/logger";

export type RouteDeps = {
  sessions: Pick<SessionManager, "isConnected" | "connect" | "disconnect" | "listCapabilities">;
  dispatcher: Pick<ConversationDispatcher<unknown>, "dispatch">;
  /** Provider script every connect goes to. */
  target: string;
};

export function createRouteHandlers(deps: RouteDeps) {
  const { sessions, dispatcher, target } = deps;

  return {
    async query(req: Pick<Request, "body">, res: JsonResponse): Promise<void> {
      const logger = new RequestLogger("/query");
      try {
        const { query } = queryRequestSchema.parse(req.body);

        logger.startStage("connect");
        await sessions.connect(target);
        logger.debug("Session ready", { connectMs: logger.endStage("connect") });

        const result = await dispatcher.dispatch(query, { correlationId: logger.correlationId });
        logger.info("Query answered", { toolsUsed: result.toolsUsed });
        const body: QueryResponse = { response: result.response, tools_used: result.toolsUsed };
        res.json(body);
      } catch (error) {
        logger.error("Query failed", error);
        handleRouteError(res, error);
      }
    },

    async tools(_req: unknown, res: JsonResponse): Promise<void> {
      try {
        await sessions.connect(target);
        const capabilities = await sessions.listCapabilities();
        const body: ToolsResponse = {
          tools: capabilities.map((capability) => ({
            name: capability.name,
            description: capability.description ?? "",
            input_schema: capability.inputSchema ?? {},
          })),
        };
        res.json(body);
      } catch (error) {
        handleRouteError(res, error, "GET /tools");
      }
    },

    async connect(_req: unknown, res: JsonResponse): Promise<void> {
      try {
        await sessions.connect(target);
        const body: MessageResponse = { message: "Connected to server" };
        res.json(body);
      } catch (error) {
        handleRouteError(res, error, "POST /connect");
      }
    },

    async disconnect(_req: unknown, res: JsonResponse): Promise<void> {
      try {
        await sessions.disconnect();
        const body: MessageResponse = { message: "Disconnected from server" };
        res.json(body);
      } catch (error) {
        handleRouteError(res, error, "POST /disconnect");
      }
    },

    health(_req: unknown, res: JsonResponse): void {
      const body: HealthResponse = { status: "healthy", connected: sessions.isConnected };
      res.json(body);
    },
  };
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const handlers = createRouteHandlers(deps);

  app.post("/query", handlers.query);
  app.get("/tools", handlers.tools);
  app.post("/connect", handlers.connect);
  app.post("/disconnect", handlers.disconnect);
  app.get("/health", handlers.health);

  // Malformed JSON bodies land here
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, error, "Routes");
  });

  return createServer(app);
}
