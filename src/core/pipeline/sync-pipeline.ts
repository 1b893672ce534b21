/**
 * Sync Pipeline
 *
 * One end-to-end run: read rows, group them into logical orders, drop
 * orders whose rows have not changed since their last successful sync,
 * reconcile the rest and advance checkpoints for orders that fully
 * succeeded.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { fromPromise } from "../../types/result.js";
import type { IIdentityStore } from "../identity/interfaces/IIdentityStore.js";
import { groupRecords, lastRowTimestamp } from "../plan/impl/grouping.js";
import type { LogicalOrder } from "../plan/models/plan.js";
import type { ReconcileOptions, ReconcileReport } from "../reconciliation/interfaces/IReconciliation.js";
import type { Reconciler } from "../reconciliation/impl/Reconciler.js";
import type { ISourceReader } from "../source/interfaces/ISourceReader.js";
import type { ProductRegistry } from "../source/impl/ProductRegistry.js";

const logger = createLogger("sync-pipeline");

export interface SyncPipelineDeps {
  reader: ISourceReader;
  reconciler: Reconciler;
  store: IIdentityStore;
  registry: ProductRegistry;
}

export interface SyncRunReport extends ReconcileReport {
  source: string;
  rows: number;
  /** Rows without a product or order id */
  skippedRows: number;
}

function isNewer(rowTimestamp: string, checkpoint: string): boolean {
  const row = Date.parse(rowTimestamp);
  const done = Date.parse(checkpoint);
  if (Number.isNaN(row) || Number.isNaN(done)) return rowTimestamp !== checkpoint;
  return row > done;
}

/** Latest row timestamp per order, grouped by product */
function rowTimestampsByProduct(orders: readonly LogicalOrder[]): Map<string, Map<string, string>> {
  const byProduct = new Map<string, Map<string, string>>();
  for (const order of orders) {
    const ts = lastRowTimestamp(order);
    if (ts === undefined) continue;
    const perOrder = byProduct.get(order.product) ?? new Map<string, string>();
    perOrder.set(order.orderId, ts);
    byProduct.set(order.product, perOrder);
  }
  return byProduct;
}

export class SyncPipeline {
  private readonly deps: SyncPipelineDeps;

  constructor(deps: SyncPipelineDeps) {
    this.deps = deps;
  }

  async run(options: Partial<ReconcileOptions> = {}): Promise<SyncRunReport> {
    const { reader, reconciler } = this.deps;
    const records = await reader.read();
    const { orders, skippedRows } = groupRecords(records);
    if (skippedRows > 0) logger.warn({ skippedRows }, "Rows without product or order id were skipped");

    const timestamps = rowTimestampsByProduct(orders);
    if (!options.dryRun) await this.recordRowTimestamps(timestamps);

    const selected = options.forceSync
      ? orders
      : await this.selectChanged(orders, options.dryRun ? timestamps : undefined);
    logger.info(
      { orders: orders.length, selected: selected.length, forced: options.forceSync ?? false },
      "Orders selected for reconciliation"
    );

    const report = await reconciler.reconcile(selected, options);
    report.totals.skipped = orders.length - selected.length;

    if (!report.dryRun) await this.advanceCheckpoints(report, selected);

    return { ...report, source: reader.name, rows: records.length, skippedRows };
  }

  private async recordRowTimestamps(byProduct: ReadonlyMap<string, ReadonlyMap<string, string>>): Promise<void> {
    for (const [product, timestamps] of byProduct) {
      await this.deps.store.recordRowTimestamps(product, timestamps);
    }
  }

  /**
   * Orders whose latest row is newer than their checkpoint. Orders without
   * row timestamps, without a checkpoint or without a project mapping are
   * always selected. `unrecorded` stands in for the stored row timestamps
   * when they were not written (dry run).
   */
  private async selectChanged(
    orders: readonly LogicalOrder[],
    unrecorded?: ReadonlyMap<string, ReadonlyMap<string, string>>
  ): Promise<LogicalOrder[]> {
    const { store, registry } = this.deps;
    const rowTimes = new Map<string, ReadonlyMap<string, string>>();
    const checkpoints = new Map<string, Map<string, string>>();

    const selected: LogicalOrder[] = [];
    for (const order of orders) {
      const projectKey = registry.projectFor(order.product);
      if (projectKey === undefined) {
        selected.push(order);
        continue;
      }

      let products = rowTimes.get(order.product);
      if (!products) {
        products = unrecorded?.get(order.product) ?? (await store.getAllRowTimestamps(order.product));
        rowTimes.set(order.product, products);
      }
      let done = checkpoints.get(projectKey);
      if (!done) {
        done = await store.getAllCheckpoints(projectKey);
        checkpoints.set(projectKey, done);
      }

      const rowTs = products.get(order.orderId);
      const checkpoint = done.get(order.orderId);
      if (rowTs === undefined || checkpoint === undefined || isNewer(rowTs, checkpoint)) {
        selected.push(order);
      }
    }
    return selected;
  }

  private async advanceCheckpoints(report: ReconcileReport, orders: readonly LogicalOrder[]): Promise<void> {
    const latest = new Map(orders.map((o) => [JSON.stringify([o.product, o.orderId]), lastRowTimestamp(o)]));
    for (const result of report.perOrder) {
      if (result.outcome !== "applied") continue;
      const ts = latest.get(JSON.stringify([result.product, result.orderId]));
      if (ts === undefined) continue;
      const written = await fromPromise(this.deps.store.setCheckpoint(result.projectKey, result.orderId, ts));
      if (!written.ok) {
        result.warnings.push(`Checkpoint not recorded: ${written.error.message}`);
        report.totals.warnings++;
        logger.warn({ err: written.error, orderId: result.orderId }, "Checkpoint write failed");
      }
    }
  }
}
