/**
 * Resilient tracker calls.
 *
 * Every remote call made while reconciling an order goes through
 * `ResilientWriter.call`, which classifies failures, applies exponential
 * backoff with jitter, honours Retry-After and refreshes the version token
 * on optimistic-lock conflicts. Conflicts, rate limits and transient errors
 * share one retry budget per call but are counted apart.
 *
 * @module
 */

import { CallTimeoutError, ErrorCode, toError } from "../../errors.js";
import { sleep, timeout } from "../../../utils/async.js";
import type { Logger } from "../../../utils/logger.js";
import type { TrackerResult } from "../../tracker/interfaces/ITrackerClient.js";
import type { TrackerFailure } from "../../tracker/models/tracker-models.js";
import type { RetryPolicy } from "../interfaces/IReconciliation.js";

export type RetryReason = "rate_limited" | "server_error" | "timeout" | "network";

export type AttemptOutcome =
  | { kind: "retryable"; reason: RetryReason; failure: TrackerFailure }
  | { kind: "conflict"; failure: TrackerFailure }
  | { kind: "terminal"; failure: TrackerFailure };

/**
 * Sort a tracker failure into the retry class it belongs to
 */
export function classifyFailure(failure: TrackerFailure): AttemptOutcome {
  if (failure.status === 409) return { kind: "conflict", failure };
  if (failure.status === 429) return { kind: "retryable", reason: "rate_limited", failure };
  if (failure.status >= 500) return { kind: "retryable", reason: "server_error", failure };
  if (failure.status === 0 && failure.code === ErrorCode.TRACKER_TIMEOUT) {
    return { kind: "retryable", reason: "timeout", failure };
  }
  if (failure.status === 0 && failure.code === ErrorCode.TRACKER_UNREACHABLE) {
    return { kind: "retryable", reason: "network", failure };
  }
  return { kind: "terminal", failure };
}

/**
 * Delay before retry number `retry` (1-based). A server-provided Retry-After
 * wins, capped at `retryAfterCapMs`; otherwise `base * 2^(retry-1)` plus
 * jitter, capped at `maxDelayMs`.
 */
export function backoffDelay(
  retry: number,
  policy: RetryPolicy,
  random: () => number,
  retryAfterMs?: number
): number {
  if (retryAfterMs !== undefined) {
    return Math.min(Math.max(0, retryAfterMs), policy.retryAfterCapMs);
  }
  const exponential = policy.backoffBaseMs * 2 ** (retry - 1);
  const jitter = Math.floor(random() * policy.jitterMs);
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

export interface CallOptions {
  /**
   * Invoked after a conflict, before the next attempt. A failure returned
   * here is classified like any other.
   */
  onConflict?: () => Promise<TrackerResult<unknown>>;
}

export interface RetryCounts {
  /** All retries; never above the policy's `maxRetries` */
  retries: number;
  /** Retries after a version conflict */
  conflictRetries: number;
  /** Retries after rate limits, server errors, timeouts and network failures */
  transientRetries: number;
}

export type CallResult<T> = RetryCounts &
  ({ ok: true; value: T } | { ok: false; failure: TrackerFailure; exhausted: boolean });

export interface ResilientWriterOptions {
  policy: RetryPolicy;
  callTimeoutMs: number;
  logger: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class ResilientWriter {
  private readonly policy: RetryPolicy;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: ResilientWriterOptions) {
    this.policy = options.policy;
    this.callTimeoutMs = options.callTimeoutMs;
    this.logger = options.logger;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Run `attempt` until it succeeds, fails terminally or the retry budget
   * is spent
   */
  async call<T>(
    label: string,
    attempt: () => Promise<TrackerResult<T>>,
    options: CallOptions = {}
  ): Promise<CallResult<T>> {
    const counts: RetryCounts = { retries: 0, conflictRetries: 0, transientRetries: 0 };

    for (;;) {
      const result = await this.bounded(label, attempt);
      if (result.ok) return { ok: true, value: result.value, ...counts };

      let outcome = classifyFailure(result.error);
      if (outcome.kind === "conflict" && options.onConflict) {
        this.logger.debug({ call: label }, "Version conflict, refreshing version token");
        const refreshed = await this.bounded(`${label} (refresh)`, options.onConflict);
        if (!refreshed.ok) outcome = classifyFailure(refreshed.error);
      }
      if (outcome.kind === "conflict" && !options.onConflict) {
        outcome = { kind: "terminal", failure: outcome.failure };
      }
      if (outcome.kind === "terminal") {
        return { ok: false, failure: outcome.failure, exhausted: false, ...counts };
      }
      if (counts.retries >= this.policy.maxRetries) {
        this.logger.warn(
          { call: label, ...counts, status: outcome.failure.status, code: outcome.failure.code },
          "Retry budget exhausted"
        );
        return { ok: false, failure: outcome.failure, exhausted: true, ...counts };
      }

      counts.retries++;
      if (outcome.kind === "conflict") counts.conflictRetries++;
      else counts.transientRetries++;
      const delay =
        outcome.kind === "conflict"
          ? 0
          : backoffDelay(counts.retries, this.policy, this.random, outcome.failure.retryAfterMs);
      this.logger.info(
        {
          call: label,
          retry: counts.retries,
          delayMs: delay,
          reason: outcome.kind === "conflict" ? "conflict" : outcome.reason,
          status: outcome.failure.status,
        },
        "Retrying tracker call"
      );
      if (delay > 0) await this.sleepFn(delay);
    }
  }

  /**
   * One attempt under the per-call timeout. Rejections become failures so
   * callers only deal in results.
   */
  private async bounded<T>(label: string, attempt: () => Promise<TrackerResult<T>>): Promise<TrackerResult<T>> {
    try {
      return await timeout(attempt(), this.callTimeoutMs, `${label} timed out after ${this.callTimeoutMs}ms`);
    } catch (error) {
      if (error instanceof CallTimeoutError) {
        return { ok: false, error: { status: 0, code: ErrorCode.TRACKER_TIMEOUT, message: error.message } };
      }
      return {
        ok: false,
        error: { status: 0, code: ErrorCode.TRACKER_REJECTED, message: `${label} failed: ${toError(error).message}` },
      };
    }
  }
}
