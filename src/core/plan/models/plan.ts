/**
 * Plan Models
 *
 * Source rows, logical orders and the desired-state plan compiled from them.
 */

import type { FieldMap } from "./fields.js";

// =============================================================================
// Source Side
// =============================================================================

export type SourceScalar = string | number | null | undefined;

/**
 * One input row. Immutable once read; owned by the source reader.
 */
export interface SourceRecord {
  readonly product: string;
  readonly orderId: string;
  readonly status?: SourceScalar;
  readonly quantity?: SourceScalar;

  readonly projectName?: SourceScalar;
  readonly domain?: SourceScalar;
  readonly customer?: SourceScalar;
  readonly bpId?: SourceScalar;
  readonly wpId?: SourceScalar;
  readonly wpName?: SourceScalar;
  readonly employeeName?: SourceScalar;
  readonly std?: SourceScalar;

  readonly acknowledgementDate?: SourceScalar;
  readonly addedDate?: SourceScalar;
  readonly approvedDate?: SourceScalar;
  readonly cancelledDate?: SourceScalar;
  readonly poStartDate?: SourceScalar;
  readonly poEndDate?: SourceScalar;
  readonly readinessDate?: SourceScalar;
  readonly requestedDate?: SourceScalar;
  readonly submittedDate?: SourceScalar;
  readonly updatedDate?: SourceScalar;

  /** When the row landed in the source (RFC 3339) */
  readonly rowTimestamp?: string;
}

/**
 * All source rows sharing one (product, orderId) key
 */
export interface LogicalOrder {
  readonly product: string;
  readonly orderId: string;
  readonly records: readonly SourceRecord[];
}

// =============================================================================
// Desired Plan
// =============================================================================

export type ItemKind = "container" | "unit";

interface PlannedItemBase {
  /** Logical identity: the order id for containers, `orderId-n` for units */
  identity: string;
  summary: string;
  description: string;
  fields: FieldMap;
}

export interface ContainerItem extends PlannedItemBase {
  kind: "container";
  /** Workflow status named after the order status */
  status?: string;
}

export interface UnitItem extends PlannedItemBase {
  kind: "unit";
  /** 1-based instance number */
  instance: number;
  /** Standard due-date field (YYYY-MM-DD) */
  dueDate?: string;
}

export type PlannedItem = ContainerItem | UnitItem;

export interface DesiredPlan {
  product: string;
  projectKey: string;
  orderId: string;
  /** Unit fan-out, never below 1 */
  quantity: number;
  container: ContainerItem;
  units: UnitItem[];
  /** Compiler notes (e.g. unparseable quantity) */
  warnings: string[];
}

export function unitIdentity(orderId: string, instance: number): string {
  return `${orderId}-${instance}`;
}

export function containerSummary(product: string, orderId: string): string {
  return `${product} :: ${orderId}`;
}

/**
 * Batch-unique key of a logical order
 */
export function orderKey(product: string, orderId: string): string {
  return `${product}::${orderId}`;
}
