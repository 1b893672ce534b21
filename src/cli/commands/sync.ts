/**
 * sync command - Reconcile source rows into the tracker
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, formatDuration, getReportsDir } from "../../utils/index.js";
import { CancellationTokenSource } from "../../utils/async.js";
import { Reconciler, type ApplyResult, type ReconcileOptions } from "../../core/reconciliation/index.js";
import { JsonFileSourceReader } from "../../core/source/index.js";
import { SyncPipeline, hasProblems, summarizeTotals, writeReport } from "../../core/pipeline/index.js";
import { openTrackerRuntime } from "../runtime.js";
import { setShutdownHandler } from "../shutdown.js";

const logger = createLogger("sync");

export interface SyncOptions {
  config?: string;
  source: string;
  products?: string[];
  force?: boolean;
  strict?: boolean;
  workers?: number;
  maxRetries?: number;
  deadline?: number;
  dryRun?: boolean;
  reportDir?: string;
}

function printOrderProblems(results: readonly ApplyResult[]): void {
  const troubled = results.filter((r) => r.errors.length > 0);
  if (troubled.length === 0) return;

  console.log();
  console.log(chalk.yellow.bold(`Problems (${troubled.length} orders)`));
  for (const result of troubled.slice(0, 10)) {
    console.log(`  ${chalk.red("✗")} ${result.product} ${result.orderId} ${chalk.dim(`[${result.outcome}]`)}`);
    for (const error of result.errors.slice(0, 3)) {
      console.log(chalk.dim(`      ${error}`));
    }
  }
  if (troubled.length > 10) {
    console.log(chalk.dim(`  ... and ${troubled.length - 10} more orders`));
  }
}

function printUnmappedProducts(results: readonly ApplyResult[]): void {
  const products = [...new Set(results.filter((r) => r.outcome === "unmapped").map((r) => r.product))].sort();
  if (products.length === 0) return;
  console.log();
  console.log(chalk.yellow(`No project mapping for: ${products.join(", ")}`));
}

/**
 * Run one reconciliation pass
 */
export async function syncCommand(options: SyncOptions): Promise<void> {
  logger.info({ options }, "Starting sync");

  const runtime = await openTrackerRuntime(options.config);
  const { config, store, client, registry, fieldMap } = runtime;
  const cancellation = new CancellationTokenSource(options.deadline ?? config.deadlineMs);
  setShutdownHandler((signal) => cancellation.cancel(`received ${signal}`));

  console.log();
  console.log(chalk.cyan.bold(options.dryRun ? "Sync (dry run)" : "Sync"));
  console.log(chalk.dim("─".repeat(40)));

  const spinner = ora("Reading source rows...").start();
  const startTime = Date.now();

  try {
    const reader = new JsonFileSourceReader({ path: options.source, products: options.products });
    const reconciler = new Reconciler({
      client,
      store,
      registry,
      requiredFields: config.requiredFields,
      fieldMap,
    });
    const pipeline = new SyncPipeline({ reader, reconciler, store, registry });

    const overrides: Partial<ReconcileOptions> = {
      ...config.reconcile,
      containerType: config.tracker.containerType,
      unitType: config.tracker.unitType,
      forceSync: options.force ?? false,
      dryRun: options.dryRun ?? false,
      cancellation: cancellation.token,
    };
    if (options.strict !== undefined) overrides.continueOnError = !options.strict;
    if (options.workers !== undefined) overrides.workerCount = options.workers;
    if (options.maxRetries !== undefined) overrides.maxRetries = options.maxRetries;

    spinner.text = "Reconciling orders...";
    const report = await pipeline.run(overrides);
    const { totals } = report;

    const reportPath = writeReport(report, options.reportDir ?? getReportsDir());

    if (hasProblems(totals)) {
      spinner.warn(chalk.yellow("Sync completed with problems"));
      process.exitCode = 1;
    } else {
      spinner.succeed(chalk.green("Sync complete"));
    }

    console.log();
    console.log(chalk.white.bold("Results"));
    for (const line of summarizeTotals(totals)) {
      console.log(`  ${line}`);
    }
    console.log(`  Duration:  ${formatDuration(Date.now() - startTime)}`);
    printOrderProblems(report.perOrder);
    printUnmappedProducts(report.perOrder);

    console.log();
    console.log(chalk.dim("─".repeat(40)));
    if (report.blockedGlobally) {
      console.log(chalk.yellow("Validation errors blocked the whole batch (fail-closed policy)"));
    }
    if (options.force) {
      console.log(chalk.dim("Fingerprints and checkpoints were ignored (--force flag used)"));
    }
    console.log(chalk.dim(`Report written to ${reportPath}`));

    logger.info({ totals, reportPath }, "Sync complete");
  } catch (error) {
    spinner.fail(chalk.red("Sync failed"));
    logger.error({ err: error }, "Sync failed");
    throw error;
  } finally {
    setShutdownHandler(null);
    cancellation.dispose();
    await runtime.close();
  }
}
