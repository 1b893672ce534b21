/**
 * Reconciliation Interface
 *
 * Options, per-order results and run totals of a reconciliation pass.
 */

import type { CancellationToken } from "../../../utils/async.js";
import type { ItemKind } from "../../plan/models/plan.js";

// =============================================================================
// Per-Order State Machine
// =============================================================================

export enum OrderState {
  RESOLVE = "RESOLVE",
  SHORT_CIRCUIT_CHECK = "SHORT_CIRCUIT_CHECK",
  NOOP = "NOOP",
  CREATE = "CREATE",
  UPDATE = "UPDATE",
  CHILD_FANOUT = "CHILD_FANOUT",
  REGISTER = "REGISTER",
  DONE = "DONE",
  ERROR = "ERROR",
}

/**
 * Final disposition of one logical order
 * - applied: every item reconciled (with or without writes)
 * - failed: at least one item could not be reconciled
 * - blocked: rejected by validation before any remote call
 * - unmapped: product has no project mapping
 * - cancelled: the batch was cancelled before the order started
 * - planned: dry run; nothing was sent
 */
export type OrderOutcome = "applied" | "failed" | "blocked" | "unmapped" | "cancelled" | "planned";

export type ItemAction = "created" | "updated" | "recovered" | "noop" | "failed";

export interface ItemResult {
  kind: ItemKind;
  identity: string;
  action: ItemAction;
  remoteKey?: string;
  /** Changed keys for updates */
  changedKeys?: string[];
  error?: string;
}

export interface ApplyTimings {
  totalMs: number;
  containerMs: number;
  unitsMs: number;
}

export interface ApplyResult {
  orderId: string;
  product: string;
  projectKey: string;
  outcome: OrderOutcome;
  createdKeys: string[];
  updatedKeys: string[];
  noopKeys: string[];
  /** Keys created to replace items deleted on the tracker */
  recoveredKeys: string[];
  warnings: string[];
  errors: string[];
  /** All retries; the sum of the two counts below */
  retryCount: number;
  /** Retries after version conflicts */
  conflictRetries: number;
  /** Retries after rate limits and transient failures */
  transientRetries: number;
  timings: ApplyTimings;
  /** States visited, in order */
  states: OrderState[];
  items: ItemResult[];
}

export interface ReconcileTotals {
  orders: number;
  applied: number;
  failed: number;
  blocked: number;
  unmapped: number;
  /** Orders left out by the delta pre-filter */
  skipped: number;
  cancelled: number;
  created: number;
  updated: number;
  noops: number;
  recovered: number;
  warnings: number;
  retries: number;
  conflictRetries: number;
  transientRetries: number;
}

export interface ReconcileReport {
  perOrder: ApplyResult[];
  totals: ReconcileTotals;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  dryRun: boolean;
  /** Set when validation errors blocked the whole batch */
  blockedGlobally: boolean;
}

// =============================================================================
// Options
// =============================================================================

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  backoffBaseMs: number;
  maxDelayMs: number;
  retryAfterCapMs: number;
  jitterMs: number;
}

export interface ReconcileOptions extends RetryPolicy {
  /** Bypass fingerprint short-circuits and description-only suppression */
  forceSync: boolean;
  continueOnError: boolean;
  workerCount: number;
  unitWorkers: number;
  callTimeoutMs: number;
  unitStatusEnabled: boolean;
  /** Comment on each updated item with the changes made */
  changeComments: boolean;
  containerType: string;
  unitType: string;
  /** Compile and validate only */
  dryRun: boolean;
  /** Stops scheduling new orders once cancelled */
  cancellation?: CancellationToken;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  forceSync: false,
  continueOnError: true,
  workerCount: 6,
  unitWorkers: 4,
  maxRetries: 3,
  backoffBaseMs: 500,
  maxDelayMs: 30000,
  retryAfterCapMs: 60000,
  jitterMs: 250,
  callTimeoutMs: 30000,
  unitStatusEnabled: false,
  changeComments: true,
  containerType: "Epic",
  unitType: "User story",
  dryRun: false,
};

export function emptyTotals(): ReconcileTotals {
  return {
    orders: 0,
    applied: 0,
    failed: 0,
    blocked: 0,
    unmapped: 0,
    skipped: 0,
    cancelled: 0,
    created: 0,
    updated: 0,
    noops: 0,
    recovered: 0,
    warnings: 0,
    retries: 0,
    conflictRetries: 0,
    transientRetries: 0,
  };
}

export function computeTotals(results: readonly ApplyResult[], skipped = 0): ReconcileTotals {
  const totals = emptyTotals();
  totals.orders = results.length;
  totals.skipped = skipped;
  for (const r of results) {
    totals[r.outcome === "planned" ? "applied" : r.outcome]++;
    totals.created += r.createdKeys.length;
    totals.updated += r.updatedKeys.length;
    totals.noops += r.noopKeys.length;
    totals.recovered += r.recoveredKeys.length;
    totals.warnings += r.warnings.length;
    totals.retries += r.retryCount;
    totals.conflictRetries += r.conflictRetries;
    totals.transientRetries += r.transientRetries;
  }
  return totals;
}
