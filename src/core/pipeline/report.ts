/**
 * Run reports: JSON on disk and a short text summary for the terminal.
 */

import * as path from "node:path";
import { writeJson } from "../../utils/index.js";
import type { ReconcileTotals } from "../reconciliation/interfaces/IReconciliation.js";
import type { SyncRunReport } from "./sync-pipeline.js";

export function reportFileName(startedAt: string): string {
  return `sync-${startedAt.replace(/[:.]/g, "-")}.json`;
}

/**
 * Write the full run report into `dir`, returning the file path
 */
export function writeReport(report: SyncRunReport, dir: string): string {
  const filePath = path.join(dir, reportFileName(report.startedAt));
  writeJson(filePath, report);
  return filePath;
}

/**
 * Whether a run needs attention. Unmapped products are warnings and do not
 * count.
 */
export function hasProblems(totals: ReconcileTotals): boolean {
  return totals.failed + totals.blocked + totals.cancelled > 0;
}

export function summarizeTotals(totals: ReconcileTotals): string[] {
  return [
    `Orders:    ${totals.orders} reconciled, ${totals.skipped} unchanged`,
    `Outcome:   ${totals.applied} applied, ${totals.failed} failed, ${totals.blocked} blocked, ${totals.unmapped} unmapped, ${totals.cancelled} cancelled`,
    `Items:     ${totals.created} created, ${totals.updated} updated, ${totals.noops} unchanged, ${totals.recovered} recovered`,
    `Retries:   ${totals.retries} (${totals.conflictRetries} after conflicts, ${totals.transientRetries} after rate limits or transient errors)`,
    `Warnings:  ${totals.warnings}`,
  ];
}
