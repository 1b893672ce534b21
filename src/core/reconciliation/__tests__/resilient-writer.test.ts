import { describe, it, expect } from "vitest";
import { ErrorCode } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { err, ok } from "../../../types/result.js";
import type { TrackerResult } from "../../tracker/interfaces/ITrackerClient.js";
import type { TrackerFailure } from "../../tracker/models/tracker-models.js";
import { DEFAULT_RECONCILE_OPTIONS } from "../interfaces/IReconciliation.js";
import { ResilientWriter, backoffDelay, classifyFailure } from "../impl/resilient-writer.js";
import { failure } from "./fixtures/fake-tracker.js";

const policy = {
  maxRetries: 3,
  backoffBaseMs: 500,
  maxDelayMs: 30000,
  retryAfterCapMs: 60000,
  jitterMs: 250,
};

function scripted<T>(...outcomes: TrackerResult<T>[]): () => Promise<TrackerResult<T>> {
  return async () => {
    const next = outcomes.shift();
    if (!next) throw new Error("no more scripted outcomes");
    return next;
  };
}

function writer(sleeps: number[], random = () => 0, callTimeoutMs = 1000): ResilientWriter {
  return new ResilientWriter({
    policy,
    callTimeoutMs,
    logger: createLogger("resilient-writer-test"),
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random,
  });
}

describe("classifyFailure", () => {
  it.each([
    [409, "conflict"],
    [429, "retryable"],
    [500, "retryable"],
    [503, "retryable"],
    [400, "terminal"],
    [404, "terminal"],
    [422, "terminal"],
  ])("classifies HTTP %i as %s", (status, kind) => {
    expect(classifyFailure(failure(status)).kind).toBe(kind);
  });

  it("retries timeouts and network failures", () => {
    const timeout: TrackerFailure = { status: 0, code: ErrorCode.TRACKER_TIMEOUT, message: "timed out" };
    const network: TrackerFailure = { status: 0, code: ErrorCode.TRACKER_UNREACHABLE, message: "ECONNRESET" };
    expect(classifyFailure(timeout)).toMatchObject({ kind: "retryable", reason: "timeout" });
    expect(classifyFailure(network)).toMatchObject({ kind: "retryable", reason: "network" });
  });
});

describe("backoffDelay", () => {
  it("doubles per retry", () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, policy, () => 0))).toEqual([500, 1000, 2000, 4000]);
  });

  it("adds jitter", () => {
    expect(backoffDelay(1, policy, () => 0.5)).toBe(625);
  });

  it("caps the exponential delay", () => {
    expect(backoffDelay(10, policy, () => 0)).toBe(30000);
  });

  it("prefers Retry-After, capped", () => {
    expect(backoffDelay(1, policy, () => 0.9, 2000)).toBe(2000);
    expect(backoffDelay(1, policy, () => 0, 120000)).toBe(60000);
  });

  it("matches the default options", () => {
    expect(DEFAULT_RECONCILE_OPTIONS).toMatchObject(policy);
  });
});

describe("ResilientWriter", () => {
  it("returns the first success without retrying", async () => {
    const sleeps: number[] = [];
    const result = await writer(sleeps).call("get", scripted(ok("done")));
    expect(result).toEqual({ ok: true, value: "done", retries: 0, conflictRetries: 0, transientRetries: 0 });
    expect(sleeps).toEqual([]);
  });

  it("backs off on server errors until success", async () => {
    const sleeps: number[] = [];
    const result = await writer(sleeps).call("create", scripted<string>(err(failure(502)), err(failure(503)), ok("42")));
    expect(result).toEqual({ ok: true, value: "42", retries: 2, conflictRetries: 0, transientRetries: 2 });
    expect(sleeps).toEqual([500, 1000]);
  });

  it("stops after the retry budget", async () => {
    const sleeps: number[] = [];
    const result = await writer(sleeps).call(
      "create",
      scripted<string>(err(failure(500)), err(failure(500)), err(failure(500)), err(failure(500)), ok("late"))
    );
    expect(result).toMatchObject({ ok: false, retries: 3, exhausted: true });
    expect(sleeps).toEqual([500, 1000, 2000]);
  });

  it("shares one budget between conflicts and rate limits", async () => {
    const sleeps: number[] = [];
    let refreshes = 0;
    const result = await writer(sleeps).call(
      "update",
      scripted<string>(err(failure(409)), err(failure(429, "slow down", 700)), err(failure(409)), err(failure(409))),
      {
        onConflict: async () => {
          refreshes++;
          return ok(null);
        },
      }
    );
    expect(result).toMatchObject({ ok: false, retries: 3, conflictRetries: 2, transientRetries: 1, exhausted: true });
    expect(refreshes).toBe(3);
    expect(sleeps).toEqual([700]);
  });

  it("treats a conflict without a refresh hook as terminal", async () => {
    const result = await writer([]).call("update", scripted<string>(err(failure(409))));
    expect(result).toMatchObject({ ok: false, retries: 0, exhausted: false });
  });

  it("surfaces a failed refresh", async () => {
    const result = await writer([]).call("update", scripted<string>(err(failure(409))), {
      onConflict: async () => err(failure(404, "gone")),
    });
    expect(result).toMatchObject({ ok: false, exhausted: false, failure: { status: 404, message: "gone" } });
  });

  it("returns terminal failures immediately", async () => {
    const sleeps: number[] = [];
    const result = await writer(sleeps).call("update", scripted<string>(err(failure(400, "bad field"))));
    expect(result).toEqual({
      ok: false,
      failure: { status: 400, code: ErrorCode.TRACKER_REJECTED, message: "bad field" },
      retries: 0,
      conflictRetries: 0,
      transientRetries: 0,
      exhausted: false,
    });
    expect(sleeps).toEqual([]);
  });

  it("times out slow calls and retries them", async () => {
    const sleeps: number[] = [];
    let calls = 0;
    const result = await writer(sleeps, () => 0, 20).call("get", () => {
      calls++;
      if (calls === 1) return new Promise<TrackerResult<string>>(() => {});
      return Promise.resolve(ok("fast"));
    });
    expect(result).toEqual({ ok: true, value: "fast", retries: 1, conflictRetries: 0, transientRetries: 1 });
    expect(sleeps).toEqual([500]);
  });

  it("turns a thrown error into a terminal failure", async () => {
    const result = await writer([]).call("get", async (): Promise<TrackerResult<string>> => {
      throw new Error("socket hang up");
    });
    expect(result).toMatchObject({
      ok: false,
      exhausted: false,
      failure: { status: 0, code: ErrorCode.TRACKER_REJECTED, message: "get failed: socket hang up" },
    });
  });
});
