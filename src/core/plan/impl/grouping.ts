/**
 * Groups source rows into logical orders keyed by (product, orderId).
 */

import type { LogicalOrder, SourceRecord } from "../models/plan.js";

export interface GroupingResult {
  orders: LogicalOrder[];
  /** Rows dropped because they carry no order id or product */
  skippedRows: number;
}

export function groupRecords(records: Iterable<SourceRecord>): GroupingResult {
  const groups = new Map<string, { product: string; orderId: string; records: SourceRecord[] }>();
  let skippedRows = 0;

  for (const record of records) {
    const product = record.product.trim();
    const orderId = record.orderId.trim();
    if (!product || !orderId) {
      skippedRows++;
      continue;
    }
    const key = JSON.stringify([product, orderId]);
    const group = groups.get(key);
    if (group) {
      group.records.push(record);
    } else {
      groups.set(key, { product, orderId, records: [record] });
    }
  }

  const orders = [...groups.values()].sort((a, b) =>
    a.product === b.product ? a.orderId.localeCompare(b.orderId) : a.product.localeCompare(b.product)
  );
  return { orders, skippedRows };
}

/**
 * Latest row timestamp of an order, for the delta pre-filter
 */
export function lastRowTimestamp(order: LogicalOrder): string | undefined {
  let latest: string | undefined;
  for (const record of order.records) {
    const ts = record.rowTimestamp;
    if (ts && (latest === undefined || Date.parse(ts) > Date.parse(latest))) latest = ts;
  }
  return latest;
}
