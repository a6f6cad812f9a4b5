import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "http";
import { queryRequestSchema, type QueryRequest } from "@shared/schema";
import type { Orchestrator } from "./orchestrator";
import { validate, commonSchemas } from "./middleware/validation";
import { NotFoundError, handleRouteError } from "./utils/errorHandler";

export async function registerRoutes(app: Express, orchestrator: Orchestrator): Promise<Server> {
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", sessions: orchestrator.memory.sessionCount() });
  });

  app.post("/api/query", async (req, res) => {
    try {
      const body: QueryRequest = queryRequestSchema.parse(req.body);
      const result = await orchestrator.ask({
        text: body.question,
        tenantId: body.companyId,
        sessionId: body.sessionId,
      });
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Query");
    }
  });

  app.get("/api/sessions/:sessionId/history", validate({ params: commonSchemas.sessionId }), (req, res) => {
    try {
      const { sessionId } = req.params;
      if (!orchestrator.memory.hasSession(sessionId)) {
        throw new NotFoundError("Session");
      }
      const turns = orchestrator.memory.getHistory(sessionId).map(turn => ({
        question: turn.question,
        answer: turn.answer,
        timestamp: turn.timestamp.toISOString(),
      }));
      res.json({ sessionId, turns });
    } catch (error) {
      handleRouteError(res, error, "Session history");
    }
  });

  app.delete("/api/sessions/:sessionId", validate({ params: commonSchemas.sessionId }), async (req, res) => {
    try {
      await orchestrator.memory.clear(req.params.sessionId);
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, "Session clear");
    }
  });

  // Validation failures and anything else passed to next()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, error, "Express");
  });

  const httpServer = createServer(app);
  return httpServer;
}
