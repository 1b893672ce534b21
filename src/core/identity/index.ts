/**
 * Identity Module
 *
 * Persistent logical-key → remote-key mappings with last-applied
 * fingerprints. The backend is chosen once, from configuration.
 */

import type { IIdentityStore, IdentityStoreConfig } from "./interfaces/IIdentityStore.js";
import { SqliteIdentityStore } from "./impl/SqliteIdentityStore.js";
import { FileCatalogIdentityStore } from "./impl/FileCatalogIdentityStore.js";
import type { Clock } from "./impl/BaseIdentityStore.js";

export * from "./interfaces/IIdentityStore.js";
export { BaseIdentityStore, type Clock } from "./impl/BaseIdentityStore.js";
export { SqliteIdentityStore, type SqliteIdentityStoreOptions } from "./impl/SqliteIdentityStore.js";
export { FileCatalogIdentityStore, type FileCatalogIdentityStoreOptions } from "./impl/FileCatalogIdentityStore.js";

/**
 * Create (but do not initialize) the configured identity store
 */
export function createIdentityStore(config: IdentityStoreConfig, now?: Clock): IIdentityStore {
  switch (config.backend) {
    case "sqlite":
      return new SqliteIdentityStore({ path: config.path, now });
    case "file":
      return new FileCatalogIdentityStore({ path: config.path, now });
  }
}
