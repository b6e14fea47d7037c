import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import { logger } from "./lib/logger";
import { registerRoutes } from "./routes/index";
import type { ExtractionPipeline } from "./services/pipeline";

export function createApp(pipeline: ExtractionPipeline): { app: express.Express; server: Server } {
  const app = express();
  app.use(express.json({ limit: "50mb" }));
  app.use(express.urlencoded({ limit: "50mb", extended: true }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        logger.info(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });

    next();
  });

  const server = registerRoutes(app, pipeline);

  app.use(
    (
      err: Error & { status?: number; statusCode?: number },
      _req: Request,
      res: Response,
      _next: NextFunction
    ) => {
      const status = err.status || err.statusCode || 500;
      const message = err.message || "Internal Server Error";

      logger.error("Server error:", err);

      if (!res.headersSent) {
        res.status(status).json({ message });
      }
    }
  );

  return { app, server };
}
