/**
 * Sync Pipeline Tests
 *
 * Full runs over an in-memory source, tracker and identity store, checking
 * the delta pre-filter and checkpoint bookkeeping between runs.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import Database from "better-sqlite3";
import { SqliteIdentityStore } from "../../identity/impl/SqliteIdentityStore.js";
import { DEFAULT_REQUIRED_FIELDS } from "../../plan/models/field-definitions.js";
import type { SourceRecord } from "../../plan/models/plan.js";
import { Reconciler } from "../../reconciliation/impl/Reconciler.js";
import type { ISourceReader } from "../../source/interfaces/ISourceReader.js";
import { ProductRegistry } from "../../source/impl/ProductRegistry.js";
import { emptyTotals } from "../../reconciliation/interfaces/IReconciliation.js";
import { FakeTracker, orderRow, testFieldMap } from "../../reconciliation/__tests__/fixtures/fake-tracker.js";
import { SyncPipeline } from "../sync-pipeline.js";
import { hasProblems, reportFileName, summarizeTotals } from "../report.js";

class MemorySourceReader implements ISourceReader {
  readonly name = "memory";
  rows: SourceRecord[];

  constructor(rows: SourceRecord[]) {
    this.rows = rows;
  }

  async read(): Promise<SourceRecord[]> {
    return this.rows;
  }
}

describe("SyncPipeline", () => {
  let tracker: FakeTracker;
  let store: SqliteIdentityStore;
  let reader: MemorySourceReader;
  let pipeline: SyncPipeline;

  beforeEach(async () => {
    tracker = new FakeTracker();
    store = new SqliteIdentityStore({ path: ":memory:" });
    await store.initialize();
    reader = new MemorySourceReader([
      orderRow("WPO-1"),
      orderRow("WPO-2", { quantity: 2, rowTimestamp: "2024-02-02T08:00:00Z" }),
    ]);
    const registry = new ProductRegistry({ ALPHA: "apollo" });
    const reconciler = new Reconciler({
      client: tracker,
      store,
      registry,
      requiredFields: DEFAULT_REQUIRED_FIELDS,
      fieldMap: testFieldMap(),
      sleep: async () => {},
      random: () => 0,
    });
    pipeline = new SyncPipeline({ reader, reconciler, store, registry });
  });

  afterEach(async () => {
    await store.close();
  });

  it("reconciles every order on the first run and checkpoints them", async () => {
    const report = await pipeline.run();

    expect(report.source).toBe("memory");
    expect(report.rows).toBe(2);
    expect(report.skippedRows).toBe(0);
    expect(report.perOrder.map((r) => [r.orderId, r.outcome])).toEqual([
      ["WPO-1", "applied"],
      ["WPO-2", "applied"],
    ]);
    expect(report.totals).toMatchObject({ orders: 2, applied: 2, skipped: 0, created: 5 });
    expect(await store.getAllCheckpoints("apollo")).toEqual(
      new Map([
        ["WPO-1", "2024-02-01T08:00:00Z"],
        ["WPO-2", "2024-02-02T08:00:00Z"],
      ])
    );
    expect(await store.getAllRowTimestamps("ALPHA")).toEqual(
      new Map([
        ["WPO-1", "2024-02-01T08:00:00Z"],
        ["WPO-2", "2024-02-02T08:00:00Z"],
      ])
    );
  });

  it("skips unchanged orders on the next run", async () => {
    await pipeline.run();
    tracker.resetCalls();

    const report = await pipeline.run();

    expect(report.perOrder).toEqual([]);
    expect(report.totals).toEqual({ ...emptyTotals(), skipped: 2 });
    expect(tracker.calls.filter((c) => c.method !== "listCustomFields")).toEqual([]);
  });

  it("picks up orders whose rows changed", async () => {
    await pipeline.run();
    reader.rows = [
      orderRow("WPO-1"),
      orderRow("WPO-2", { quantity: 2, wpName: "Splicing", rowTimestamp: "2024-02-03T08:00:00Z" }),
    ];

    const report = await pipeline.run();

    expect(report.perOrder.map((r) => r.orderId)).toEqual(["WPO-2"]);
    expect(report.totals.skipped).toBe(1);
    expect(report.totals.updated).toBe(3);
    expect((await store.getAllCheckpoints("apollo")).get("WPO-2")).toBe("2024-02-03T08:00:00Z");
  });

  it("reconciles everything when forced", async () => {
    await pipeline.run();
    const report = await pipeline.run({ forceSync: true });

    expect(report.perOrder.map((r) => r.outcome)).toEqual(["applied", "applied"]);
    expect(report.totals).toMatchObject({ skipped: 0, noops: 5, created: 0, updated: 0 });
  });

  it("does not checkpoint orders that were not applied", async () => {
    reader.rows = [orderRow("WPO-1"), orderRow("WPO-2", { wpName: null })];

    const first = await pipeline.run();
    expect(first.perOrder.map((r) => r.outcome)).toEqual(["applied", "blocked"]);
    expect([...(await store.getAllCheckpoints("apollo")).keys()]).toEqual(["WPO-1"]);

    const second = await pipeline.run();
    expect(second.perOrder.map((r) => r.orderId)).toEqual(["WPO-2"]);
    expect(second.totals.skipped).toBe(1);
  });

  it("always selects orders without a project mapping", async () => {
    reader.rows = [orderRow("WPO-9", { product: "GAMMA" })];

    await pipeline.run();
    const report = await pipeline.run();

    expect(report.perOrder.map((r) => [r.orderId, r.outcome])).toEqual([["WPO-9", "unmapped"]]);
    expect(report.totals.unmapped).toBe(1);
  });

  it("leaves checkpoints alone in a dry run", async () => {
    const report = await pipeline.run({ dryRun: true });

    expect(report.perOrder.map((r) => r.outcome)).toEqual(["planned", "planned"]);
    expect(await store.getAllCheckpoints("apollo")).toEqual(new Map());
    expect(await store.getAllRowTimestamps("ALPHA")).toEqual(new Map());
    expect(tracker.count("createItem")).toBe(0);
  });

  it("keeps the store the same size over repeated unchanged runs", async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "sync-pipeline-test-"));
    const file = path.join(tempDir, "identity.db");
    const fileStore = new SqliteIdentityStore({ path: file });
    await fileStore.initialize();
    const registry = new ProductRegistry({ ALPHA: "apollo" });
    const reconciler = new Reconciler({
      client: tracker,
      store: fileStore,
      registry,
      requiredFields: DEFAULT_REQUIRED_FIELDS,
      fieldMap: testFieldMap(),
      sleep: async () => {},
      random: () => 0,
    });
    const repeated = new SyncPipeline({ reader, reconciler, store: fileStore, registry });

    const sizes: number[][] = [];
    try {
      for (let run = 0; run < 5; run++) {
        await repeated.run({ forceSync: run === 4 });
        const db = new Database(file, { readonly: true });
        const count = (table: string): number =>
          db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
        sizes.push([count("row_time_log"), count("checkpoint_log"), count("identity_log")]);
        db.close();
      }
    } finally {
      await fileStore.close();
      await fs.rm(tempDir, { recursive: true, force: true });
    }

    const firstRun = sizes[0];
    expect(firstRun?.slice(0, 2)).toEqual([2, 2]);
    expect(sizes.every((s) => s.join() === firstRun?.join())).toBe(true);
  });

  it("counts rows without an order id", async () => {
    reader.rows = [orderRow("WPO-1"), orderRow(" ")];

    const report = await pipeline.run();

    expect(report.rows).toBe(2);
    expect(report.skippedRows).toBe(1);
    expect(report.perOrder).toHaveLength(1);
  });
});

describe("report", () => {
  it("derives a file name from the start time", () => {
    expect(reportFileName("2024-02-01T08:00:00.123Z")).toBe("sync-2024-02-01T08-00-00-123Z.json");
  });

  it("does not treat unmapped products as problems", () => {
    expect(hasProblems({ ...emptyTotals(), orders: 2, applied: 1, unmapped: 1 })).toBe(false);
    expect(hasProblems({ ...emptyTotals(), orders: 2, applied: 1, failed: 1 })).toBe(true);
    expect(hasProblems({ ...emptyTotals(), blocked: 1 })).toBe(true);
    expect(hasProblems({ ...emptyTotals(), cancelled: 1 })).toBe(true);
  });

  it("summarizes totals", () => {
    const totals = {
      ...emptyTotals(),
      orders: 3,
      skipped: 1,
      applied: 2,
      failed: 1,
      created: 4,
      retries: 3,
      conflictRetries: 1,
      transientRetries: 2,
      warnings: 1,
    };
    expect(summarizeTotals(totals)).toEqual([
      "Orders:    3 reconciled, 1 unchanged",
      "Outcome:   2 applied, 1 failed, 0 blocked, 0 unmapped, 0 cancelled",
      "Items:     4 created, 0 updated, 0 unchanged, 0 recovered",
      "Retries:   3 (1 after conflicts, 2 after rate limits or transient errors)",
      "Warnings:  1",
    ]);
  });
});
