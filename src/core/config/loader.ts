/**
 * Configuration Loader
 *
 * Reads the JSON configuration, validates it with zod and resolves file
 * paths relative to the configuration file. Secrets never live in the file:
 * the tracker API key is read from the environment variable it names.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { readTextFileIfExists } from "../../utils/fs.js";
import { FieldMapSchema, SyncConfigSchema, formatZodError, type SyncConfig } from "../../utils/validation.js";

const logger = createLogger("config");

async function readJsonFile(filePath: string, what: string): Promise<unknown> {
  const text = await readTextFileIfExists(filePath);
  if (text === null) {
    throw new ConfigurationError(`${what} not found: ${filePath}`, ErrorCode.CONFIG_NOT_FOUND, { path: filePath });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`${what} is not valid JSON: ${filePath}`, ErrorCode.CONFIG_INVALID, {
      path: filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Load and validate the sync configuration. Relative paths inside it
 * (registry, field map, identity store) resolve against its directory.
 *
 * @throws {ConfigurationError} when the file is missing or invalid
 */
export async function loadConfig(configPath: string): Promise<SyncConfig> {
  const absolute = path.resolve(configPath);
  const raw = await readJsonFile(absolute, "Configuration");

  const parsed = SyncConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodError(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, ErrorCode.CONFIG_INVALID, {
      path: absolute,
      issues,
    });
  }

  const baseDir = path.dirname(absolute);
  const config = parsed.data;
  const resolved: SyncConfig = {
    ...config,
    registryPath: path.resolve(baseDir, config.registryPath),
    identityStore: {
      ...config.identityStore,
      path:
        config.identityStore.path === ":memory:"
          ? config.identityStore.path
          : path.resolve(baseDir, config.identityStore.path),
    },
  };
  if (config.fieldMapPath !== undefined) resolved.fieldMapPath = path.resolve(baseDir, config.fieldMapPath);

  logger.debug({ path: absolute, backend: resolved.identityStore.backend }, "Configuration loaded");
  return resolved;
}

/**
 * Static display-name → remote-field-id map
 *
 * @throws {ConfigurationError} when the file is missing or invalid
 */
export async function loadFieldMap(fieldMapPath: string): Promise<Record<string, string>> {
  const raw = await readJsonFile(fieldMapPath, "Field map");
  const parsed = FieldMapSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid field map: ${formatZodError(parsed.error).join("; ")}`,
      ErrorCode.CONFIG_INVALID,
      { path: fieldMapPath }
    );
  }
  return parsed.data;
}

/**
 * The tracker API key from the environment variable named in the config
 *
 * @throws {ConfigurationError} when the variable is unset or empty
 */
export function resolveApiKey(config: SyncConfig, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[config.tracker.apiKeyEnv]?.trim();
  if (!value) {
    throw new ConfigurationError(
      `Environment variable ${config.tracker.apiKeyEnv} must hold the tracker API key`,
      ErrorCode.CONFIG_INVALID,
      { variable: config.tracker.apiKeyEnv }
    );
  }
  return value;
}
