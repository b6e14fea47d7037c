import {
  emptyCandidate,
  type BatchEntry,
  type BatchResult,
  type CandidateRecord,
  type ExtractedCandidate,
  type ExtractionOutcome,
  type ExtractionSummary,
  type SourceDocument,
} from "@shared/schemas";
import type { PipelineConfig } from "../lib/config";
import { logger } from "../lib/logger";
import { BatchScheduler } from "../workers/batchScheduler";
import { createBackoffPolicy } from "./lib/llmRetry";
import { createOpenAITransport, type CompletionTransport } from "./lib/openai";
import {
  RequestOrchestrator,
  type OrchestrationAttempt,
  type OrchestrationResult,
  type Sleep,
} from "./orchestrator";
import { buildExtractionPrompt } from "./prompts";

export type PipelineDependencies = {
  transport?: CompletionTransport;
  sleep?: Sleep;
  onAttempt?: (attempt: OrchestrationAttempt) => void;
};

/**
 * Text(s) in, candidate record(s) out. Failures come back as outcome tags,
 * never as thrown errors.
 */
export class ExtractionPipeline {
  readonly config: PipelineConfig;
  private readonly orchestrator: RequestOrchestrator;
  private readonly scheduler: BatchScheduler;

  constructor(config: PipelineConfig, deps: PipelineDependencies = {}) {
    this.config = config;
    this.orchestrator = new RequestOrchestrator({
      transport: deps.transport ?? createOpenAITransport(config),
      backoff: createBackoffPolicy(config.backoff),
      sleep: deps.sleep,
      onAttempt: deps.onAttempt,
    });
    this.scheduler = new BatchScheduler({
      orchestrator: this.orchestrator,
      buildPrompt: (texts) => buildExtractionPrompt(texts, config.maxCharsPerResume),
      maxAttempts: config.maxAttempts,
      chunkTimeoutMs: config.chunkTimeoutMs,
      interChunkDelayMs: config.interChunkDelayMs,
      fallback: { minPhoneDigits: config.minPhoneDigits },
      sleep: deps.sleep,
    });
  }

  get callCount(): number {
    return this.orchestrator.callCount;
  }

  async extract(text: string): Promise<{ record: CandidateRecord; outcome: ExtractionOutcome }> {
    const [entry] = await this.extractMany([text]);
    return entry ?? { record: emptyCandidate(), outcome: "extraction_failed" };
  }

  async extractMany(texts: readonly string[]): Promise<BatchResult> {
    return this.scheduler.run(texts, this.config.batchSize, this.config.maxWorkers);
  }

  /**
   * Record-sink shape: each result carries the filename it came from
   */
  async extractDocuments(documents: readonly SourceDocument[]): Promise<ExtractedCandidate[]> {
    logger.info(`Extracting candidates from ${documents.length} documents`);

    const results = await this.extractMany(documents.map((doc) => doc.text));

    return results.map((entry) => ({
      ...entry,
      filename: documents[entry.index]?.filename ?? "",
    }));
  }

  async verifyConnection(): Promise<OrchestrationResult> {
    return this.orchestrator.verifyConnection();
  }
}

/**
 * Count outcomes so callers can report "N of M extracted"
 */
export function summarize(results: readonly BatchEntry[]): ExtractionSummary {
  const extracted = results.filter((r) => r.outcome === "ok").length;
  const parseFailed = results.filter((r) => r.outcome === "parse_failed").length;
  const failed = results.filter((r) => r.outcome === "extraction_failed").length;

  return {
    total: results.length,
    extracted,
    parseFailed,
    failed,
    message: `Extracted ${extracted} of ${results.length} candidates (${parseFailed} unparsed, ${failed} failed)`,
  };
}
