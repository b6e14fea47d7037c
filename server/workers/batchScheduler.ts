import {
  emptyCandidate,
  type BatchEntry,
  type BatchResult,
  type CandidateRecord,
  type ParseUnit,
} from "@shared/schemas";
import { logger } from "../lib/logger";
import { enrich, type FallbackOptions } from "../services/fallback";
import { normalizeReply } from "../services/normalizer";
import { wait, type RequestOrchestrator, type Sleep } from "../services/orchestrator";

export type BatchSchedulerOptions = {
  orchestrator: Pick<RequestOrchestrator, "execute">;
  buildPrompt: (texts: readonly string[]) => string;
  maxAttempts: number;
  chunkTimeoutMs: number;
  interChunkDelayMs?: number;
  fallback?: FallbackOptions;
  sleep?: Sleep;
};

function freezeEntry(index: number, record: CandidateRecord, outcome: BatchEntry["outcome"]): BatchEntry {
  return Object.freeze({ index, record: Object.freeze(record), outcome });
}

function failedEntries(units: readonly ParseUnit[]): BatchEntry[] {
  return units.map((unit) => freezeEntry(unit.index, emptyCandidate(), "extraction_failed"));
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  const chunkSize = Math.max(1, Math.floor(size) || 1);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Fans inputs out to a bounded pool of workers, one chunk per completion call,
 * and assembles a result the same length and order as the input.
 */
export class BatchScheduler {
  private readonly options: BatchSchedulerOptions;
  private readonly sleep: Sleep;

  constructor(options: BatchSchedulerOptions) {
    this.options = options;
    this.sleep = options.sleep ?? wait;
  }

  async run(inputs: readonly string[], batchSize: number, maxWorkers: number): Promise<BatchResult> {
    const units: ParseUnit[] = inputs.map((text, index) => ({ index, text }));
    const chunks = partition(units, batchSize);
    const workerCount = Math.min(Math.max(1, Math.floor(maxWorkers) || 1), chunks.length);
    const collected: BatchEntry[] = [];
    let nextChunk = 0;

    if (chunks.length === 0) {
      return [];
    }

    logger.info(
      `Processing ${units.length} inputs in ${chunks.length} chunks with ${workerCount} workers`
    );

    const worker = async () => {
      let handled = 0;

      while (nextChunk < chunks.length) {
        const chunk = chunks[nextChunk];
        nextChunk += 1;
        if (!chunk) break;

        // Smooth bursts against the remote service
        if (handled > 0 && this.options.interChunkDelayMs) {
          await this.sleep(this.options.interChunkDelayMs);
        }

        collected.push(...(await this.processChunk(chunk)));
        handled += 1;
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const result = collected.sort((a, b) => a.index - b.index);

    const succeeded = result.filter((r) => r.outcome === "ok").length;
    const parseFailed = result.filter((r) => r.outcome === "parse_failed").length;
    const failed = result.filter((r) => r.outcome === "extraction_failed").length;

    logger.info(
      `Extraction batch complete: ${succeeded} succeeded, ${parseFailed} unparsed, ${failed} failed`
    );

    return result;
  }

  /**
   * Runs one chunk under its own timeout. An abandoned or failed chunk only
   * affects its own positions.
   */
  async processChunk(units: readonly ParseUnit[]): Promise<BatchEntry[]> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.chunkTimeoutMs);
    const span = `${units[0]?.index ?? 0}-${units[units.length - 1]?.index ?? 0}`;

    try {
      const entries = await this.extractChunk(units, controller.signal);

      if (controller.signal.aborted) {
        logger.warn(`Chunk ${span} exceeded ${this.options.chunkTimeoutMs}ms, abandoning`);
        return failedEntries(units);
      }

      return entries;
    } catch (error) {
      logger.error(`Unexpected failure in chunk ${span}`, {
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return failedEntries(units);
    } finally {
      clearTimeout(timer);
    }
  }

  private async extractChunk(units: readonly ParseUnit[], signal: AbortSignal): Promise<BatchEntry[]> {
    const blank = units.filter((unit) => !unit.text.trim());
    const active = units.filter((unit) => unit.text.trim());
    const blankEntries = blank.map((unit) => freezeEntry(unit.index, emptyCandidate(), "ok"));

    if (active.length === 0) {
      return blankEntries;
    }

    const prompt = this.options.buildPrompt(active.map((unit) => unit.text));
    const response = await this.options.orchestrator.execute(prompt, this.options.maxAttempts, signal);

    if (!response.ok) {
      if (!response.aborted) {
        logger.error(`Extraction failed for ${active.length} inputs`, { failure: response.failure });
      }
      return [...blankEntries, ...failedEntries(active)];
    }

    logger.debug("Completion reply received", { chars: response.value.length });

    const { records, outcomes, parsed } = normalizeReply(response.value, active.length);

    if (!parsed) {
      logger.warn("Completion reply could not be parsed as JSON", {
        preview: response.value.substring(0, 200),
      });
    }

    const extracted = active.map((unit, i) =>
      freezeEntry(
        unit.index,
        enrich(records[i] ?? emptyCandidate(), unit.text, this.options.fallback),
        outcomes[i] ?? "parse_failed"
      )
    );

    return [...blankEntries, ...extracted];
  }
}
