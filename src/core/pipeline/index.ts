/**
 * Pipeline Module
 */

export { SyncPipeline, type SyncPipelineDeps, type SyncRunReport } from "./sync-pipeline.js";
export { hasProblems, reportFileName, summarizeTotals, writeReport } from "./report.js";
