import type { Express } from "express";
import { createServer, type Server } from "http";
import type { ExtractionPipeline } from "../services/pipeline";
import { createCandidatesRouter } from "./candidates";

/**
 * Register all routes with the Express app
 */
export function registerRoutes(app: Express, pipeline: ExtractionPipeline): Server {
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use(createCandidatesRouter(pipeline));

  const httpServer = createServer(app);
  return httpServer;
}
