#!/usr/bin/env node

/**
 * order-sync CLI
 * Reconcile work-order rows into the tracker and inspect the results
 */

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { initCommand } from "./commands/init.js";
import { syncCommand } from "./commands/sync.js";
import { inspectCommand } from "./commands/inspect.js";
import { checkCommand } from "./commands/check.js";
import { getShutdownHandler } from "./shutdown.js";
import { isSyncError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

// Create the main program
const program = new Command();

program
  .name("order-sync")
  .description("Reconcile work-order records into a hierarchical issue tracker")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("init")
  .description("Write a starter configuration and product registry")
  .option("-f, --force", "Overwrite an existing configuration")
  .option("--base-url <url>", "Tracker base URL")
  .action(initCommand);

program
  .command("sync")
  .description("Reconcile source rows into the tracker")
  .requiredOption("-s, --source <path>", "JSON file of source rows")
  .option("-c, --config <path>", "Configuration file")
  .option("-p, --products <list>", "Comma-separated products to include", parseList)
  .option("-f, --force", "Ignore fingerprints and checkpoints; re-diff every item")
  .option("--strict", "Block the whole batch when any order fails validation")
  .option("--continue-on-error", "Apply valid orders even when others fail validation")
  .option("-w, --workers <n>", "Orders processed concurrently", parseCount)
  .option("--max-retries <n>", "Retries per remote call", parseCount)
  .option("--deadline <ms>", "Stop starting new orders after this many milliseconds", parseCount)
  .option("--dry-run", "Compile and validate only; send nothing")
  .option("--report-dir <dir>", "Directory for the JSON run report")
  .action(async (options: Parameters<typeof syncCommand>[0] & { continueOnError?: boolean }) => {
    const { continueOnError, ...rest } = options;
    if (continueOnError) rest.strict = false;
    await syncCommand(rest);
  });

program
  .command("inspect <project> <orderId>")
  .description("Show recorded mappings and the checkpoint of one order")
  .option("-c, --config <path>", "Configuration file")
  .action(inspectCommand);

program
  .command("check <project>")
  .description("Verify types, custom fields and statuses of a tracker project")
  .option("-c, --config <path>", "Configuration file")
  .action(checkCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

/**
 * Handle uncaught errors
 */
function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${isSyncError(error) ? error.toString() : error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

let isShuttingDown = false;

/**
 * First signal lets a running sync finish its in-flight orders; a second
 * one exits at once.
 */
function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.warn("Forced shutdown");
    process.exit(1);
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");

  const handler = getShutdownHandler();
  if (handler) {
    console.log(chalk.dim(`\nReceived ${signal}, finishing in-flight orders (press again to abort)...`));
    handler(signal);
    return;
  }
  process.exit(0);
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

// Parse command line arguments
program.parseAsync(process.argv).catch(handleError);
