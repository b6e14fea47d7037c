import type { FailureKind, Result } from "@shared/schemas";
import { logger } from "../lib/logger";
import { classifyFailure, type BackoffPolicy } from "./lib/llmRetry";
import type { CompletionTransport } from "./lib/openai";
import { CONNECTION_CHECK_PROMPT } from "./prompts";

/**
 * `aborted` is set when the caller's signal fired before a definitive outcome
 */
export type OrchestrationResult = Result<string, FailureKind> & { attempts: number; aborted?: boolean };

/**
 * Diagnostic view of one failed attempt, handed to the onAttempt hook
 */
export type OrchestrationAttempt = {
  attempt: number;
  waitMs: number;
  failure: FailureKind;
};

export type AttemptOutcome =
  | { ok: true; content: string }
  | { ok: false; failure: FailureKind; retryAfterMs?: number };

export type OrchestratorState =
  | { status: "attempting"; attempt: number }
  | { status: "backing-off"; attempt: number; failure: FailureKind; delayMs: number }
  | { status: "success"; attempt: number; content: string }
  | { status: "exhausted"; attempt: number; failure: FailureKind };

const CONNECTION_CHECK_MAX_TOKENS = 10;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after ms, or as soon as the signal aborts
 */
export const wait: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * attempting -> success | backing-off | exhausted
 */
export function afterAttempt(
  attempt: number,
  outcome: AttemptOutcome,
  maxAttempts: number,
  policy: BackoffPolicy
): OrchestratorState {
  if (outcome.ok) {
    return { status: "success", attempt, content: outcome.content };
  }

  if (attempt >= maxAttempts) {
    return { status: "exhausted", attempt, failure: outcome.failure };
  }

  return {
    status: "backing-off",
    attempt,
    failure: outcome.failure,
    delayMs: Math.max(0, policy[outcome.failure](attempt, outcome.retryAfterMs)),
  };
}

/**
 * backing-off -> attempting
 */
export function afterBackoff(state: Extract<OrchestratorState, { status: "backing-off" }>): OrchestratorState {
  return { status: "attempting", attempt: state.attempt + 1 };
}

export type RequestOrchestratorOptions = {
  transport: CompletionTransport;
  backoff: BackoffPolicy;
  sleep?: Sleep;
  onAttempt?: (attempt: OrchestrationAttempt) => void;
};

/**
 * Issues one logical parse request against the completion service with
 * per-failure-kind backoff. Never throws; every call resolves to a result.
 */
export class RequestOrchestrator {
  private readonly transport: CompletionTransport;
  private readonly backoff: BackoffPolicy;
  private readonly sleep: Sleep;
  private readonly onAttempt?: (attempt: OrchestrationAttempt) => void;
  private calls = 0;

  constructor(options: RequestOrchestratorOptions) {
    this.transport = options.transport;
    this.backoff = options.backoff;
    this.sleep = options.sleep ?? wait;
    this.onAttempt = options.onAttempt;
  }

  /** Diagnostic only; never consulted for control decisions */
  get callCount(): number {
    return this.calls;
  }

  async execute(prompt: string, maxAttempts: number, signal?: AbortSignal): Promise<OrchestrationResult> {
    return this.run(prompt, maxAttempts, signal);
  }

  /**
   * One-attempt round trip used at startup to check credentials and reachability
   */
  async verifyConnection(signal?: AbortSignal): Promise<OrchestrationResult> {
    return this.run(CONNECTION_CHECK_PROMPT, 1, signal, CONNECTION_CHECK_MAX_TOKENS);
  }

  private async run(
    prompt: string,
    maxAttempts: number,
    signal?: AbortSignal,
    maxTokens?: number
  ): Promise<OrchestrationResult> {
    if (!prompt.trim() || !Number.isInteger(maxAttempts) || maxAttempts < 1) {
      logger.error("Refusing orchestration request with invalid arguments", {
        promptLength: prompt.length,
        maxAttempts,
      });
      return { ok: false, failure: "unknown", attempts: 0 };
    }

    let state: OrchestratorState = { status: "attempting", attempt: 1 };

    for (;;) {
      switch (state.status) {
        case "attempting": {
          if (signal?.aborted) {
            return { ok: false, failure: "timeout", attempts: state.attempt - 1, aborted: true };
          }

          const outcome = await this.attempt(prompt, signal, maxTokens);

          if (signal?.aborted) {
            return { ok: false, failure: "timeout", attempts: state.attempt, aborted: true };
          }

          state = afterAttempt(state.attempt, outcome, maxAttempts, this.backoff);
          break;
        }

        case "backing-off": {
          this.onAttempt?.({ attempt: state.attempt, waitMs: state.delayMs, failure: state.failure });
          logger.warn(
            `Completion attempt ${state.attempt}/${maxAttempts} failed (${state.failure}), retrying in ${Math.round(state.delayMs / 1000)}s`
          );

          await this.sleep(state.delayMs, signal);
          state = afterBackoff(state);
          break;
        }

        case "success":
          return { ok: true, value: state.content, attempts: state.attempt };

        case "exhausted":
          this.onAttempt?.({ attempt: state.attempt, waitMs: 0, failure: state.failure });
          logger.error(`Completion request failed after ${state.attempt} attempts`, {
            failure: state.failure,
          });
          return { ok: false, failure: state.failure, attempts: state.attempt };
      }
    }
  }

  private async attempt(prompt: string, signal?: AbortSignal, maxTokens?: number): Promise<AttemptOutcome> {
    this.calls += 1;

    try {
      const content = await this.transport.complete({ prompt, signal, maxTokens });

      if (!content || !content.trim()) {
        return { ok: false, failure: "malformed" };
      }

      return { ok: true, content };
    } catch (error) {
      const classification = classifyFailure(error);
      logger.debug("Completion attempt threw", {
        kind: classification.kind,
        message: classification.message,
      });
      return { ok: false, failure: classification.kind, retryAfterMs: classification.retryAfterMs };
    }
  }
}
