/**
 * check command - Verify that a tracker project is set up for syncing:
 * configured types enabled, custom fields present, statuses listed
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/index.js";
import { FIELD_DEFINITIONS } from "../../core/plan/index.js";
import { RunCache } from "../../core/tracker/index.js";
import { openTrackerRuntime } from "../runtime.js";

const logger = createLogger("check");

export interface CheckOptions {
  config?: string;
}

export async function checkCommand(projectKey: string, options: CheckOptions): Promise<void> {
  logger.info({ projectKey }, "Checking tracker setup");

  const runtime = await openTrackerRuntime(options.config);
  const { client, config } = runtime;
  const cache = new RunCache(client, runtime.fieldMap);
  const spinner = ora(`Resolving project ${projectKey}...`).start();
  let problems = 0;

  try {
    const project = await cache.project(projectKey);
    if (!project.ok) {
      spinner.fail(chalk.red(project.error.message));
      process.exitCode = 1;
      return;
    }
    spinner.succeed(`Project ${chalk.white(project.value.name)} (id ${project.value.id})`);

    console.log();
    console.log(chalk.white.bold("Types"));
    for (const typeName of [config.tracker.containerType, config.tracker.unitType]) {
      const type = await cache.typeId(project.value.id, typeName);
      if (type.ok) {
        console.log(`  ${chalk.green("✓")} ${typeName} ${chalk.dim(`(id ${type.value})`)}`);
      } else {
        problems++;
        console.log(`  ${chalk.red("✗")} ${type.error.message}`);
      }
    }

    console.log();
    console.log(chalk.white.bold("Custom fields"));
    const catalog = await cache.fieldCatalog();
    if (!catalog.ok) {
      problems++;
      console.log(`  ${chalk.red("✗")} ${catalog.error.message}`);
    } else {
      for (const def of FIELD_DEFINITIONS) {
        const remoteId = catalog.value.remoteIdFor(def.field);
        console.log(
          remoteId
            ? `  ${chalk.green("✓")} ${def.displayName} ${chalk.dim(`→ ${remoteId}`)}`
            : `  ${chalk.yellow("-")} ${def.displayName} ${chalk.dim("(not on tracker)")}`
        );
      }
    }

    console.log();
    console.log(chalk.white.bold("Statuses"));
    const statuses = await client.listStatuses();
    if (!statuses.ok) {
      problems++;
      console.log(`  ${chalk.red("✗")} ${statuses.error.message}`);
    } else {
      for (const status of statuses.value) {
        console.log(`  ${status.name}${status.isClosed ? chalk.dim(" (closed)") : ""}`);
      }
    }

    if (problems > 0) process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}
