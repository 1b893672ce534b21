/**
 * Reconciliation Module
 *
 * Applies validated plans to the tracker: per-order state machine, retrying
 * writer and the batch driver.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Implementation
export * from "./impl/resilient-writer.js";
export { OrderExecutor, type OrderExecutorDeps } from "./impl/OrderExecutor.js";
export { Reconciler, type ReconcilerDeps } from "./impl/Reconciler.js";
