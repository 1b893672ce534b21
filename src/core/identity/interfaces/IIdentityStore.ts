/**
 * Identity Store Interface
 *
 * Persistent mapping from a logical item key to the remote item created for
 * it, plus the fingerprint last applied. Writes are log-structured: the most
 * recent entry for a key wins on read. Backends throw IdentityStoreError when
 * storage cannot answer; "no mapping" is only ever reported as null.
 */

import type { ItemKind } from "../../plan/models/plan.js";

export type IdentityStoreBackend = "sqlite" | "file";

export interface IdentityRef {
  project: string;
  kind: ItemKind;
  orderId: string;
  /** Unit instance (1-based); absent for containers */
  instance?: number;
}

export interface IdentityMapping extends IdentityRef {
  remoteKey: string;
  fingerprint: string | null;
  /** When the entry was written (ISO 8601) */
  timestamp: string;
}

export interface IIdentityStore {
  readonly backend: IdentityStoreBackend;

  /**
   * Open the backing storage; must be called before any other method
   */
  initialize(): Promise<void>;

  // =========================================================================
  // Point lookups
  // =========================================================================

  resolveContainer(project: string, orderId: string): Promise<string | null>;

  resolveUnit(project: string, orderId: string, instance: number): Promise<string | null>;

  getLastFingerprint(project: string, kind: ItemKind, orderId: string, instance?: number): Promise<string | null>;

  /**
   * Latest mapping for every item of one order
   */
  getMappings(project: string, orderId: string): Promise<IdentityMapping[]>;

  // =========================================================================
  // Registration
  // =========================================================================

  /**
   * Record the remote key (and optionally the applied fingerprint). Registering
   * without a fingerprint clears the stored one, so the next run re-diffs.
   */
  registerContainer(project: string, orderId: string, remoteKey: string, fingerprint?: string): Promise<void>;

  registerUnit(
    project: string,
    orderId: string,
    instance: number,
    remoteKey: string,
    fingerprint?: string
  ): Promise<void>;

  // =========================================================================
  // Delta pre-filter (bulk)
  // =========================================================================

  /**
   * Last processed source timestamp per order id of one project
   */
  getAllCheckpoints(project: string): Promise<Map<string, string>>;

  setCheckpoint(project: string, orderId: string, timestamp: string): Promise<void>;

  /**
   * Latest source row timestamp per order id of one product
   */
  getAllRowTimestamps(product: string): Promise<Map<string, string>>;

  recordRowTimestamps(product: string, timestamps: ReadonlyMap<string, string>): Promise<void>;

  close(): Promise<void>;
}

export interface IdentityStoreConfig {
  backend: IdentityStoreBackend;
  /** SQLite database file (":memory:" allowed) or JSON catalog file */
  path: string;
}

export function identityKey(ref: IdentityRef): string {
  return [ref.project, ref.kind, ref.orderId, ref.kind === "unit" ? String(ref.instance ?? 0) : ""].join("::");
}
