import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { ExtractionPipeline } from "./services/pipeline";

// Load environment variables from .env file
dotenv.config();

async function main() {
  const config = loadConfig(process.env);
  const pipeline = new ExtractionPipeline(config.pipeline);
  const { server } = createApp(pipeline);

  const connection = await pipeline.verifyConnection();
  if (connection.ok) {
    logger.info(`Completion service reachable (model ${config.pipeline.model})`);
  } else {
    logger.warn(`Completion service check failed (${connection.failure}); requests will retry`);
  }

  server.listen(config.port, "0.0.0.0", () => {
    logger.info(`Server running on port ${config.port} in ${config.nodeEnv} mode`);
  });

  // Graceful shutdown handling
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);

    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error("Forcing shutdown after timeout");
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
