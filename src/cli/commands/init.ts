/**
 * init command - Write a starter configuration and product registry
 */

import chalk from "chalk";
import ora from "ora";
import * as path from "node:path";
import {
  getConfigDir,
  getConfigPath,
  getDataDir,
  getReportsDir,
  ensureDir,
  writeJson,
  fileExists,
  createLogger,
} from "../../utils/index.js";

const logger = createLogger("init");

export interface InitOptions {
  force?: boolean;
  baseUrl?: string;
}

const REGISTRY_FILE = "registry.json";

/**
 * Create the configuration directory with a config and an empty registry
 */
export async function initCommand(options: InitOptions): Promise<void> {
  const configPath = getConfigPath();

  logger.info({ options }, "Starting initialization");

  if ((await fileExists(configPath)) && !options.force) {
    console.log(chalk.yellow("A sync configuration already exists in this directory."));
    console.log(chalk.dim("Use --force to overwrite it."));
    logger.info("Already initialized, skipping");
    return;
  }

  const spinner = ora("Initializing...").start();

  try {
    spinner.text = "Creating directory structure...";
    const configDir = getConfigDir();
    ensureDir(configDir);
    ensureDir(getDataDir());
    ensureDir(getReportsDir());

    spinner.text = "Writing configuration...";
    const registryPath = path.join(configDir, REGISTRY_FILE);
    const config = {
      tracker: {
        baseUrl: options.baseUrl ?? "https://tracker.example.com",
        apiKeyEnv: "OPENPROJECT_API_KEY",
      },
      identityStore: { backend: "sqlite", path: "data/identity.db" },
      registryPath: REGISTRY_FILE,
    };
    writeJson(configPath, config);
    if (!(await fileExists(registryPath)) || options.force) {
      writeJson(registryPath, { registry: {} });
    }

    logger.info({ configPath }, "Configuration saved");
    spinner.succeed(chalk.green("Initialized"));

    console.log();
    console.log(chalk.dim("Configuration:"));
    console.log(chalk.dim(`  Config:    ${configPath}`));
    console.log(chalk.dim(`  Registry:  ${registryPath}`));
    console.log(chalk.dim(`  Tracker:   ${config.tracker.baseUrl}`));
    console.log();
    console.log(chalk.dim("Add product → project entries to the registry, export"));
    console.log(chalk.dim(`${config.tracker.apiKeyEnv}, then run`), chalk.white("order-sync sync --source <rows.json>"));
  } catch (error) {
    spinner.fail(chalk.red("Initialization failed"));
    logger.error({ err: error }, "Initialization failed");
    throw error;
  }
}
