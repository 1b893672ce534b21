/**
 * inspect command - Show the identity mappings recorded for one order
 */

import chalk from "chalk";
import { createLogger, truncate } from "../../utils/index.js";
import { openStoreRuntime } from "../runtime.js";

const logger = createLogger("inspect");

export interface InspectOptions {
  config?: string;
}

export async function inspectCommand(project: string, orderId: string, options: InspectOptions): Promise<void> {
  logger.info({ project, orderId }, "Inspecting order");

  const runtime = await openStoreRuntime(options.config);
  try {
    const mappings = await runtime.store.getMappings(project, orderId);
    const checkpoints = await runtime.store.getAllCheckpoints(project);

    console.log();
    console.log(chalk.cyan.bold(`Order ${orderId} in ${project}`));
    console.log(chalk.dim("─".repeat(40)));

    if (mappings.length === 0) {
      console.log(chalk.yellow("No mappings recorded for this order."));
      return;
    }

    for (const mapping of mappings) {
      const label = mapping.kind === "container" ? "container" : `unit ${mapping.instance ?? "?"}`;
      const fingerprint = mapping.fingerprint ? truncate(mapping.fingerprint, 15) : chalk.dim("(none)");
      console.log(
        `  ${label.padEnd(12)} ${chalk.white(mapping.remoteKey.padEnd(10))} ${fingerprint}  ${chalk.dim(mapping.timestamp)}`
      );
    }

    console.log();
    console.log(`  Checkpoint:  ${checkpoints.get(orderId) ?? chalk.dim("(none)")}`);
    console.log(`  Backend:     ${runtime.store.backend}`);
  } finally {
    await runtime.close();
  }
}
