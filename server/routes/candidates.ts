import { sourceDocumentSchema } from "@shared/schemas";
import { Router } from "express";
import { z } from "zod";
import { logger } from "../lib/logger";
import { summarize, type ExtractionPipeline } from "../services/pipeline";

// Configuration constants
const CONFIG = {
  MAX_DOCUMENTS: 500,
} as const;

const extractRequestSchema = z.object({
  documents: z.array(sourceDocumentSchema).min(1).max(CONFIG.MAX_DOCUMENTS),
});

export function createCandidatesRouter(pipeline: ExtractionPipeline): Router {
  const router = Router();

  /**
   * Extract candidate records from already-converted resume text
   */
  router.post("/api/candidates/extract", async (req, res) => {
    const parsed = extractRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
      return res.status(400).json({ message });
    }

    const { documents } = parsed.data;

    try {
      const results = await pipeline.extractDocuments(documents);
      const summary = summarize(results);

      logger.info(summary.message);

      if (summary.failed > 0) {
        logger.error(
          "Failed documents:",
          results.filter((r) => r.outcome === "extraction_failed").map((r) => r.filename)
        );
      }

      return res.json({ results, summary });
    } catch (error) {
      return res
        .status(500)
        .json({ message: error instanceof Error ? error.message : "Unknown error" });
    }
  });

  return router;
}
