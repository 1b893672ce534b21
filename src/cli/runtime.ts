/**
 * Wiring shared by CLI commands: configuration, identity store, tracker
 * client and registry, opened together and closed together.
 */

import { loadConfig, loadFieldMap, resolveApiKey } from "../core/config/index.js";
import { createIdentityStore, type IIdentityStore } from "../core/identity/index.js";
import { ProductRegistry } from "../core/source/index.js";
import { OpenProjectClient } from "../core/tracker/index.js";
import { getConfigPath } from "../utils/index.js";
import type { SyncConfig } from "../utils/validation.js";

export interface Runtime {
  config: SyncConfig;
  store: IIdentityStore;
  close(): Promise<void>;
}

export interface TrackerRuntime extends Runtime {
  client: OpenProjectClient;
  registry: ProductRegistry;
  fieldMap?: Record<string, string>;
}

export async function openStoreRuntime(configPath: string = getConfigPath()): Promise<Runtime> {
  const config = await loadConfig(configPath);
  const store = createIdentityStore(config.identityStore);
  await store.initialize();
  return { config, store, close: () => store.close() };
}

export async function openTrackerRuntime(configPath: string = getConfigPath()): Promise<TrackerRuntime> {
  const config = await loadConfig(configPath);
  const apiKey = resolveApiKey(config);
  const registry = await ProductRegistry.load(config.registryPath);
  const fieldMap = config.fieldMapPath ? await loadFieldMap(config.fieldMapPath) : undefined;

  const client = new OpenProjectClient({
    baseUrl: config.tracker.baseUrl,
    apiKey,
    timeoutMs: config.tracker.timeoutMs,
    pageSize: config.tracker.pageSize,
  });

  const store = createIdentityStore(config.identityStore);
  await store.initialize();
  return { config, store, client, registry, fieldMap, close: () => store.close() };
}
