/**
 * File-catalog identity store.
 *
 * Holds the latest entry per key in one JSON document and rewrites it
 * atomically on every write. A mutex serializes writers inside the process;
 * the backend is not safe to share between processes.
 *
 * @module
 */

import * as path from "node:path";
import { ErrorCode, IdentityStoreError, toError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { readTextFileIfExists, writeFileAtomic } from "../../../utils/fs.js";
import { IdentityCatalogFileSchema, formatZodError, type IdentityCatalogFile } from "../../../utils/validation.js";
import { Mutex } from "../../../utils/async.js";
import { identityKey, type IdentityMapping, type IdentityRef } from "../interfaces/IIdentityStore.js";
import { BaseIdentityStore, type Clock } from "./BaseIdentityStore.js";

const logger = createLogger("identity-file");

export interface FileCatalogIdentityStoreOptions {
  path: string;
  now?: Clock;
}

function emptyCatalog(): IdentityCatalogFile {
  return { version: 1, items: {}, checkpoints: {}, rowTimestamps: {} };
}

export class FileCatalogIdentityStore extends BaseIdentityStore {
  readonly backend = "file" as const;

  private readonly filePath: string;
  private readonly mutex = new Mutex();
  private catalog: IdentityCatalogFile | null = null;

  constructor(options: FileCatalogIdentityStoreOptions) {
    super(options.now);
    this.filePath = path.resolve(options.path);
  }

  async initialize(): Promise<void> {
    if (this.catalog) return;

    let content: string | null;
    try {
      content = await readTextFileIfExists(this.filePath);
    } catch (error) {
      throw new IdentityStoreError(`Cannot read identity catalog: ${toError(error).message}`, ErrorCode.STORE_UNAVAILABLE, {
        path: this.filePath,
      });
    }

    if (content === null) {
      this.catalog = emptyCatalog();
      logger.debug({ path: this.filePath }, "Identity catalog not found, starting empty");
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new IdentityStoreError(`Identity catalog is not valid JSON: ${toError(error).message}`, ErrorCode.STORE_CORRUPT, {
        path: this.filePath,
      });
    }

    const result = IdentityCatalogFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new IdentityStoreError("Identity catalog has an unexpected shape", ErrorCode.STORE_CORRUPT, {
        path: this.filePath,
        issues: formatZodError(result.error),
      });
    }
    this.catalog = result.data;
    logger.debug({ path: this.filePath, items: Object.keys(result.data.items).length }, "Identity catalog loaded");
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.catalog = null;
    });
  }

  protected async latest(ref: IdentityRef): Promise<IdentityMapping | null> {
    const entry = this.requireCatalog().items[identityKey(ref)];
    return entry ? { ...entry } : null;
  }

  protected async append(mapping: IdentityMapping): Promise<void> {
    await this.update((catalog) => {
      const key = identityKey(mapping);
      const existing = catalog.items[key];
      if (existing && existing.timestamp > mapping.timestamp) return;
      catalog.items[key] = { ...mapping };
    });
  }

  async getMappings(project: string, orderId: string): Promise<IdentityMapping[]> {
    return Object.values(this.requireCatalog().items)
      .filter((entry) => entry.project === project && entry.orderId === orderId)
      .map((entry) => ({ ...entry }))
      .sort((a, b) => (a.kind === b.kind ? (a.instance ?? 0) - (b.instance ?? 0) : a.kind === "container" ? -1 : 1));
  }

  async getAllCheckpoints(project: string): Promise<Map<string, string>> {
    return new Map(Object.entries(this.requireCatalog().checkpoints[project] ?? {}));
  }

  async setCheckpoint(project: string, orderId: string, timestamp: string): Promise<void> {
    await this.update((catalog) => {
      const perProject = catalog.checkpoints[project] ?? {};
      perProject[orderId] = timestamp;
      catalog.checkpoints[project] = perProject;
    });
  }

  async getAllRowTimestamps(product: string): Promise<Map<string, string>> {
    return new Map(Object.entries(this.requireCatalog().rowTimestamps[product] ?? {}));
  }

  async recordRowTimestamps(product: string, timestamps: ReadonlyMap<string, string>): Promise<void> {
    const known = this.requireCatalog().rowTimestamps[product] ?? {};
    if ([...timestamps].every(([orderId, ts]) => known[orderId] === ts)) return;
    await this.update((catalog) => {
      const perProduct = catalog.rowTimestamps[product] ?? {};
      for (const [orderId, ts] of timestamps) perProduct[orderId] = ts;
      catalog.rowTimestamps[product] = perProduct;
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireCatalog(): IdentityCatalogFile {
    if (!this.catalog) {
      throw new IdentityStoreError("Identity store not initialized", ErrorCode.STORE_UNAVAILABLE);
    }
    return this.catalog;
  }

  /**
   * Apply a mutation and persist the whole catalog. The in-memory copy only
   * changes once the file write succeeded.
   */
  private async update(mutate: (catalog: IdentityCatalogFile) => void): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const current = this.requireCatalog();
      const next: IdentityCatalogFile = structuredClone(current);
      mutate(next);
      try {
        await writeFileAtomic(this.filePath, JSON.stringify(next, null, 2));
      } catch (error) {
        throw new IdentityStoreError(`Cannot write identity catalog: ${toError(error).message}`, ErrorCode.STORE_WRITE_FAILED, {
          path: this.filePath,
        });
      }
      this.catalog = next;
    });
  }
}
