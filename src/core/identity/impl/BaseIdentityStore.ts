/**
 * Shared behavior for identity-store backends. Backends supply the two
 * primitives (append an entry, read the latest entry for a key); the
 * container/unit convenience API is defined once here. A registration that
 * repeats the latest remote key and fingerprint writes nothing.
 */

import type { ItemKind } from "../../plan/models/plan.js";
import type {
  IIdentityStore,
  IdentityMapping,
  IdentityRef,
  IdentityStoreBackend,
} from "../interfaces/IIdentityStore.js";

export type Clock = () => Date;

export abstract class BaseIdentityStore implements IIdentityStore {
  abstract readonly backend: IdentityStoreBackend;

  protected readonly now: Clock;

  constructor(now: Clock = () => new Date()) {
    this.now = now;
  }

  abstract initialize(): Promise<void>;
  abstract close(): Promise<void>;
  abstract getMappings(project: string, orderId: string): Promise<IdentityMapping[]>;
  abstract getAllCheckpoints(project: string): Promise<Map<string, string>>;
  abstract setCheckpoint(project: string, orderId: string, timestamp: string): Promise<void>;
  abstract getAllRowTimestamps(product: string): Promise<Map<string, string>>;
  abstract recordRowTimestamps(product: string, timestamps: ReadonlyMap<string, string>): Promise<void>;

  /** Latest entry for a key, or null when none exists */
  protected abstract latest(ref: IdentityRef): Promise<IdentityMapping | null>;

  protected abstract append(mapping: IdentityMapping): Promise<void>;

  async resolveContainer(project: string, orderId: string): Promise<string | null> {
    const entry = await this.latest({ project, kind: "container", orderId });
    return entry?.remoteKey ?? null;
  }

  async resolveUnit(project: string, orderId: string, instance: number): Promise<string | null> {
    const entry = await this.latest({ project, kind: "unit", orderId, instance });
    return entry?.remoteKey ?? null;
  }

  async getLastFingerprint(
    project: string,
    kind: ItemKind,
    orderId: string,
    instance?: number
  ): Promise<string | null> {
    const ref: IdentityRef = kind === "unit" ? { project, kind, orderId, instance } : { project, kind, orderId };
    const entry = await this.latest(ref);
    return entry?.fingerprint ?? null;
  }

  async registerContainer(project: string, orderId: string, remoteKey: string, fingerprint?: string): Promise<void> {
    await this.register({ project, kind: "container", orderId }, remoteKey, fingerprint ?? null);
  }

  async registerUnit(
    project: string,
    orderId: string,
    instance: number,
    remoteKey: string,
    fingerprint?: string
  ): Promise<void> {
    await this.register({ project, kind: "unit", orderId, instance }, remoteKey, fingerprint ?? null);
  }

  private async register(ref: IdentityRef, remoteKey: string, fingerprint: string | null): Promise<void> {
    const current = await this.latest(ref);
    if (current && current.remoteKey === remoteKey && current.fingerprint === fingerprint) return;
    await this.append({ ...ref, remoteKey, fingerprint, timestamp: this.now().toISOString() });
  }
}
