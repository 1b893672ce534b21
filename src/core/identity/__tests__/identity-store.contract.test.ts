/**
 * IIdentityStore Contract Tests
 *
 * Runs the same expectations against both backends.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import Database from "better-sqlite3";
import type { IIdentityStore } from "../interfaces/IIdentityStore.js";
import { SqliteIdentityStore } from "../impl/SqliteIdentityStore.js";
import { FileCatalogIdentityStore } from "../impl/FileCatalogIdentityStore.js";
import { createIdentityStore } from "../index.js";
import { IdentityStoreError } from "../../errors.js";

/** Clock that advances one second per call */
function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let t = start;
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

interface Backend {
  name: string;
  create(dir: string): IIdentityStore;
}

const backends: Backend[] = [
  { name: "sqlite", create: () => new SqliteIdentityStore({ path: ":memory:", now: steppingClock() }) },
  {
    name: "file",
    create: (dir) => new FileCatalogIdentityStore({ path: path.join(dir, "identity.json"), now: steppingClock() }),
  },
];

describe.each(backends)("IIdentityStore contract ($name)", (backend) => {
  let store: IIdentityStore;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "identity-test-"));
    store = backend.create(tempDir);
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("lookups", () => {
    it("should return null when no mapping exists", async () => {
      expect(await store.resolveContainer("PRJ", "WPO-1")).toBeNull();
      expect(await store.resolveUnit("PRJ", "WPO-1", 1)).toBeNull();
      expect(await store.getLastFingerprint("PRJ", "container", "WPO-1")).toBeNull();
    });

    it("should resolve registered containers and units", async () => {
      await store.registerContainer("PRJ", "WPO-1", "100", "fp-c");
      await store.registerUnit("PRJ", "WPO-1", 2, "102", "fp-u2");

      expect(await store.resolveContainer("PRJ", "WPO-1")).toBe("100");
      expect(await store.resolveUnit("PRJ", "WPO-1", 2)).toBe("102");
      expect(await store.resolveUnit("PRJ", "WPO-1", 1)).toBeNull();
      expect(await store.getLastFingerprint("PRJ", "container", "WPO-1")).toBe("fp-c");
      expect(await store.getLastFingerprint("PRJ", "unit", "WPO-1", 2)).toBe("fp-u2");
    });

    it("should keep projects apart", async () => {
      await store.registerContainer("PRJ-A", "WPO-1", "100");
      expect(await store.resolveContainer("PRJ-B", "WPO-1")).toBeNull();
    });

    it("should not confuse a container with a unit of the same order", async () => {
      await store.registerUnit("PRJ", "WPO-1", 1, "101", "fp-u1");
      expect(await store.resolveContainer("PRJ", "WPO-1")).toBeNull();
    });
  });

  describe("latest write wins", () => {
    it("should return the most recent remote key and fingerprint", async () => {
      await store.registerContainer("PRJ", "WPO-1", "100", "fp-1");
      await store.registerContainer("PRJ", "WPO-1", "200", "fp-2");

      expect(await store.resolveContainer("PRJ", "WPO-1")).toBe("200");
      expect(await store.getLastFingerprint("PRJ", "container", "WPO-1")).toBe("fp-2");
    });

    it("should clear the fingerprint when re-registered without one", async () => {
      await store.registerUnit("PRJ", "WPO-1", 1, "101", "fp-1");
      await store.registerUnit("PRJ", "WPO-1", 1, "101");

      expect(await store.resolveUnit("PRJ", "WPO-1", 1)).toBe("101");
      expect(await store.getLastFingerprint("PRJ", "unit", "WPO-1", 1)).toBeNull();
    });
  });

  describe("unchanged writes", () => {
    it("should keep the first entry when a registration repeats it", async () => {
      await store.registerContainer("PRJ", "WPO-1", "100", "fp-c");
      await store.registerContainer("PRJ", "WPO-1", "100", "fp-c");

      const [mapping] = await store.getMappings("PRJ", "WPO-1");
      expect(mapping).toMatchObject({ remoteKey: "100", fingerprint: "fp-c", timestamp: "2024-01-01T00:00:00.000Z" });
    });
  });

  describe("getMappings", () => {
    it("should list the latest mapping per item, container first", async () => {
      await store.registerUnit("PRJ", "WPO-1", 2, "102", "fp-u2");
      await store.registerContainer("PRJ", "WPO-1", "100", "fp-c");
      await store.registerUnit("PRJ", "WPO-1", 1, "101", "fp-u1");
      await store.registerUnit("PRJ", "WPO-1", 1, "111", "fp-u1b");
      await store.registerContainer("PRJ", "WPO-2", "200");

      const mappings = await store.getMappings("PRJ", "WPO-1");
      expect(mappings.map((m) => [m.kind, m.instance ?? 0, m.remoteKey])).toEqual([
        ["container", 0, "100"],
        ["unit", 1, "111"],
        ["unit", 2, "102"],
      ]);
      expect(mappings[0]?.timestamp).toBe("2024-01-01T00:00:01.000Z");
    });
  });

  describe("checkpoints and row timestamps", () => {
    it("should return an empty map when nothing was recorded", async () => {
      expect((await store.getAllCheckpoints("PRJ")).size).toBe(0);
      expect((await store.getAllRowTimestamps("Widget")).size).toBe(0);
    });

    it("should return the latest checkpoint per order", async () => {
      await store.setCheckpoint("PRJ", "WPO-1", "2024-03-01T00:00:00Z");
      await store.setCheckpoint("PRJ", "WPO-2", "2024-03-02T00:00:00Z");
      await store.setCheckpoint("PRJ", "WPO-1", "2024-03-05T00:00:00Z");
      await store.setCheckpoint("OTHER", "WPO-9", "2024-03-05T00:00:00Z");

      const checkpoints = await store.getAllCheckpoints("PRJ");
      expect(Object.fromEntries(checkpoints)).toEqual({
        "WPO-1": "2024-03-05T00:00:00Z",
        "WPO-2": "2024-03-02T00:00:00Z",
      });
    });

    it("should return the latest row timestamp per order of a product", async () => {
      await store.recordRowTimestamps("Widget", new Map([["WPO-1", "2024-03-01T00:00:00Z"]]));
      await store.recordRowTimestamps(
        "Widget",
        new Map([
          ["WPO-1", "2024-03-04T00:00:00Z"],
          ["WPO-2", "2024-03-02T00:00:00Z"],
        ])
      );
      await store.recordRowTimestamps("Gadget", new Map([["WPO-1", "2024-01-01T00:00:00Z"]]));

      const rows = await store.getAllRowTimestamps("Widget");
      expect(Object.fromEntries(rows)).toEqual({
        "WPO-1": "2024-03-04T00:00:00Z",
        "WPO-2": "2024-03-02T00:00:00Z",
      });
    });
  });
});

describe("FileCatalogIdentityStore", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "identity-file-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should persist mappings across instances", async () => {
    const file = path.join(tempDir, "nested", "identity.json");
    const first = new FileCatalogIdentityStore({ path: file });
    await first.initialize();
    await first.registerContainer("PRJ", "WPO-1", "100", "fp-c");
    await first.setCheckpoint("PRJ", "WPO-1", "2024-03-01T00:00:00Z");
    await first.close();

    const second = new FileCatalogIdentityStore({ path: file });
    await second.initialize();
    expect(await second.resolveContainer("PRJ", "WPO-1")).toBe("100");
    expect(await second.getLastFingerprint("PRJ", "container", "WPO-1")).toBe("fp-c");
    expect((await second.getAllCheckpoints("PRJ")).get("WPO-1")).toBe("2024-03-01T00:00:00Z");
    await second.close();
  });

  it("should serialize concurrent registrations without losing writes", async () => {
    const store = new FileCatalogIdentityStore({ path: path.join(tempDir, "identity.json") });
    await store.initialize();
    await Promise.all(
      [1, 2, 3, 4, 5, 6].map((n) => store.registerUnit("PRJ", "WPO-1", n, String(100 + n), `fp-${n}`))
    );
    await store.close();

    const reopened = new FileCatalogIdentityStore({ path: path.join(tempDir, "identity.json") });
    await reopened.initialize();
    const mappings = await reopened.getMappings("PRJ", "WPO-1");
    expect(mappings.map((m) => m.remoteKey)).toEqual(["101", "102", "103", "104", "105", "106"]);
    await reopened.close();
  });

  it("should refuse a corrupt catalog instead of starting empty", async () => {
    const file = path.join(tempDir, "identity.json");
    await fs.writeFile(file, "{ not json", "utf-8");

    const store = new FileCatalogIdentityStore({ path: file });
    await expect(store.initialize()).rejects.toBeInstanceOf(IdentityStoreError);
  });

  it("should refuse a catalog with an unexpected shape", async () => {
    const file = path.join(tempDir, "identity.json");
    await fs.writeFile(file, JSON.stringify({ version: 2, items: {} }), "utf-8");

    const store = new FileCatalogIdentityStore({ path: file });
    await expect(store.initialize()).rejects.toThrow("unexpected shape");
  });

  it("should raise a store error when used before initialize", async () => {
    const store = new FileCatalogIdentityStore({ path: path.join(tempDir, "identity.json") });
    await expect(store.resolveContainer("PRJ", "WPO-1")).rejects.toBeInstanceOf(IdentityStoreError);
  });
});

describe("SqliteIdentityStore", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "identity-sqlite-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function countRows(file: string, table: string): number {
    const db = new Database(file, { readonly: true });
    try {
      const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
      return row?.n ?? 0;
    } finally {
      db.close();
    }
  }

  it("should not grow its logs when values repeat", async () => {
    const file = path.join(tempDir, "identity.db");
    const store = new SqliteIdentityStore({ path: file });
    await store.initialize();
    const rows = new Map([
      ["WPO-1", "2024-03-01T00:00:00Z"],
      ["WPO-2", "2024-03-02T00:00:00Z"],
    ]);

    for (let run = 0; run < 5; run++) {
      await store.recordRowTimestamps("Widget", rows);
      await store.setCheckpoint("PRJ", "WPO-1", "2024-03-01T00:00:00Z");
      await store.registerContainer("PRJ", "WPO-1", "100", "fp-c");
    }
    await store.recordRowTimestamps("Widget", new Map([["WPO-1", "2024-03-09T00:00:00Z"]]));

    expect(countRows(file, "row_time_log")).toBe(3);
    expect(countRows(file, "checkpoint_log")).toBe(1);
    expect(countRows(file, "identity_log")).toBe(1);
    expect(Object.fromEntries(await store.getAllRowTimestamps("Widget"))).toEqual({
      "WPO-1": "2024-03-09T00:00:00Z",
      "WPO-2": "2024-03-02T00:00:00Z",
    });
    await store.close();
  });

  it("should record a value again after it changed back", async () => {
    const store = new SqliteIdentityStore({ path: ":memory:" });
    await store.initialize();
    await store.setCheckpoint("PRJ", "WPO-1", "2024-03-01T00:00:00Z");
    await store.setCheckpoint("PRJ", "WPO-1", "2024-03-05T00:00:00Z");
    await store.setCheckpoint("PRJ", "WPO-1", "2024-03-01T00:00:00Z");

    expect((await store.getAllCheckpoints("PRJ")).get("WPO-1")).toBe("2024-03-01T00:00:00Z");
    await store.close();
  });

  it("should raise a store error after close instead of reporting not found", async () => {
    const store = new SqliteIdentityStore({ path: ":memory:" });
    await store.initialize();
    await store.close();
    await expect(store.resolveContainer("PRJ", "WPO-1")).rejects.toBeInstanceOf(IdentityStoreError);
  });
});

describe("createIdentityStore", () => {
  it("should select the backend from configuration", () => {
    expect(createIdentityStore({ backend: "sqlite", path: ":memory:" }).backend).toBe("sqlite");
    expect(createIdentityStore({ backend: "file", path: "identity.json" }).backend).toBe("file");
  });
});
