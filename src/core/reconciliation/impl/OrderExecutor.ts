/**
 * Order Executor
 *
 * Drives one validated plan through RESOLVE → SHORT_CIRCUIT_CHECK →
 * {NOOP | CREATE | UPDATE} → CHILD_FANOUT → REGISTER → DONE. The container
 * is applied first; units follow, concurrently when the container was just
 * created (pure creates) and one at a time otherwise. A container that was
 * written is then moved to the workflow status named by its order status,
 * and every updated item gets a comment listing what changed; both are
 * best effort and only warn. Remote failures are recorded on the result;
 * identity-store failures abort the order. Nothing escapes `execute`.
 *
 * @module
 */

import { ErrorCode, IdentityStoreError, ReconciliationError, describeError } from "../../errors.js";
import { createChildLogger, createLogger, type Logger } from "../../../utils/logger.js";
import { mapConcurrent } from "../../../utils/async.js";
import { err, fromPromise, ok, type Result } from "../../../types/result.js";
import { diff, type DesiredState } from "../../diff/diff-engine.js";
import { fingerprintItem } from "../../fingerprint/fingerprinter.js";
import type { IIdentityStore } from "../../identity/interfaces/IIdentityStore.js";
import type { FieldCatalog } from "../../plan/impl/field-catalog.js";
import { optionValue, type FieldValue } from "../../plan/models/fields.js";
import type { DesiredPlan, PlannedItem, UnitItem } from "../../plan/models/plan.js";
import type { ITrackerClient, TrackerResult } from "../../tracker/interfaces/ITrackerClient.js";
import type { CreateItemInput, RemoteItem } from "../../tracker/models/tracker-models.js";
import type { RunCache } from "../../tracker/impl/run-cache.js";
import {
  OrderState,
  type ApplyResult,
  type ItemAction,
  type ReconcileOptions,
} from "../interfaces/IReconciliation.js";
import { buildChangeComment } from "./change-comment.js";
import { ResilientWriter, type CallOptions, type CallResult, type RetryCounts } from "./resilient-writer.js";

const logger = createLogger("order-executor");

export interface OrderExecutorDeps {
  client: ITrackerClient;
  store: IIdentityStore;
  cache: RunCache;
  catalog: FieldCatalog;
  options: ReconcileOptions;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  clock?: () => number;
}

interface AppliedItem {
  remoteKey: string;
  action: Exclude<ItemAction, "failed">;
  changedKeys?: string[];
  /** Item as written; absent for no-ops */
  remote?: RemoteItem;
}

interface ContainerOutcome {
  key: string;
  /** Created in this pass; units are pure creates */
  created: boolean;
  /** Replaced after being deleted remotely; units must be re-parented */
  recovered: boolean;
}

interface PendingRegistration {
  item: PlannedItem;
  remoteKey: string;
  fingerprint: string;
}

interface OrderContext {
  plan: DesiredPlan;
  result: ApplyResult;
  projectId: string;
  containerTypeId: string;
  unitTypeId: string;
  writer: ResilientWriter;
  log: Logger;
  pending: PendingRegistration[];
  /** Set once the identity store failed; remaining units are skipped */
  aborted: boolean;
}

function newResult(plan: DesiredPlan): ApplyResult {
  return {
    orderId: plan.orderId,
    product: plan.product,
    projectKey: plan.projectKey,
    outcome: "applied",
    createdKeys: [],
    updatedKeys: [],
    noopKeys: [],
    recoveredKeys: [],
    warnings: [...plan.warnings],
    errors: [],
    retryCount: 0,
    conflictRetries: 0,
    transientRetries: 0,
    timings: { totalMs: 0, containerMs: 0, unitsMs: 0 },
    states: [],
    items: [],
  };
}

function addRetries(result: ApplyResult, counts: RetryCounts): void {
  result.retryCount += counts.retries;
  result.conflictRetries += counts.conflictRetries;
  result.transientRetries += counts.transientRetries;
}

function normalizeSummary(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

function byNumericKey(a: RemoteItem, b: RemoteItem): number {
  const na = Number(a.key);
  const nb = Number(b.key);
  if (Number.isFinite(na) && Number.isFinite(nb) && na !== nb) return na - nb;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

export class OrderExecutor {
  private readonly client: ITrackerClient;
  private readonly store: IIdentityStore;
  private readonly cache: RunCache;
  private readonly catalog: FieldCatalog;
  private readonly options: ReconcileOptions;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly random?: () => number;
  private readonly clock: () => number;

  constructor(deps: OrderExecutorDeps) {
    this.client = deps.client;
    this.store = deps.store;
    this.cache = deps.cache;
    this.catalog = deps.catalog;
    this.options = deps.options;
    this.sleep = deps.sleep;
    this.random = deps.random;
    this.clock = deps.clock ?? (() => performance.now());
  }

  async execute(plan: DesiredPlan): Promise<ApplyResult> {
    const started = this.clock();
    const result = newResult(plan);
    const log = createChildLogger(logger, { product: plan.product, orderId: plan.orderId });
    const writer = new ResilientWriter({
      policy: this.options,
      callTimeoutMs: this.options.callTimeoutMs,
      logger: log,
      sleep: this.sleep,
      random: this.random,
    });

    try {
      result.states.push(OrderState.RESOLVE);
      const ctx = await this.resolve(plan, result, writer, log);
      if (ctx) {
        const containerStarted = this.clock();
        const container = await this.applyContainer(ctx);
        result.timings.containerMs = this.clock() - containerStarted;

        if (container.ok) {
          result.states.push(OrderState.CHILD_FANOUT);
          const unitsStarted = this.clock();
          await this.applyUnits(ctx, container.value);
          result.timings.unitsMs = this.clock() - unitsStarted;

          result.states.push(OrderState.REGISTER);
          await this.registerPending(ctx);
        } else {
          this.fail(ctx, plan.container, container.error);
        }
      }
    } catch (error) {
      result.errors.push(describeError(error));
      log.error({ err: error }, "Order aborted");
    }

    result.outcome = result.errors.length > 0 ? "failed" : "applied";
    result.states.push(result.outcome === "failed" ? OrderState.ERROR : OrderState.DONE);
    result.timings.totalMs = this.clock() - started;

    log.info(
      {
        outcome: result.outcome,
        created: result.createdKeys.length,
        updated: result.updatedKeys.length,
        noops: result.noopKeys.length,
        recovered: result.recoveredKeys.length,
        retries: result.retryCount,
        conflictRetries: result.conflictRetries,
        transientRetries: result.transientRetries,
        durationMs: Math.round(result.timings.totalMs),
      },
      "Order reconciled"
    );
    return result;
  }

  // ===========================================================================
  // RESOLVE
  // ===========================================================================

  private async resolve(
    plan: DesiredPlan,
    result: ApplyResult,
    writer: ResilientWriter,
    log: Logger
  ): Promise<OrderContext | undefined> {
    const project = await writer.call("resolve project", () => this.cache.project(plan.projectKey));
    addRetries(result, project);
    if (!project.ok) {
      result.errors.push(`Project ${plan.projectKey} could not be resolved: ${project.failure.message}`);
      return undefined;
    }

    const projectId = project.value.id;
    const containerType = await writer.call("resolve container type", () =>
      this.cache.typeId(projectId, this.options.containerType)
    );
    addRetries(result, containerType);
    const unitType = await writer.call("resolve unit type", () => this.cache.typeId(projectId, this.options.unitType));
    addRetries(result, unitType);

    for (const resolved of [containerType, unitType]) {
      if (!resolved.ok) result.errors.push(resolved.failure.message);
    }
    if (!containerType.ok || !unitType.ok) return undefined;

    return {
      plan,
      result,
      projectId,
      containerTypeId: containerType.value,
      unitTypeId: unitType.value,
      writer,
      log,
      pending: [],
      aborted: false,
    };
  }

  // ===========================================================================
  // Container
  // ===========================================================================

  private async applyContainer(ctx: OrderContext): Promise<Result<ContainerOutcome, string>> {
    const { plan, result } = ctx;
    const item = await this.prepare(ctx, plan.container);
    const fingerprint = fingerprintItem(item);

    let key = await this.store.resolveContainer(plan.projectKey, plan.orderId);
    if (key) {
      result.states.push(OrderState.SHORT_CIRCUIT_CHECK);
      if (!this.options.forceSync) {
        const last = await this.store.getLastFingerprint(plan.projectKey, "container", plan.orderId);
        if (last === fingerprint) {
          result.states.push(OrderState.NOOP);
          this.record(ctx, item, { remoteKey: key, action: "noop" }, fingerprint);
          return ok({ key, created: false, recovered: false });
        }
      }
    } else {
      const found = await this.search(ctx, item, ctx.containerTypeId);
      if (!found.ok) return found;
      if (found.value) {
        key = found.value.key;
        ctx.log.info({ remoteKey: key }, "Adopted existing container found by summary");
        await this.registerSafely(ctx, item, key);
      }
    }

    const createInput: CreateItemInput = {
      projectId: ctx.projectId,
      typeId: ctx.containerTypeId,
      summary: item.summary,
      description: item.description,
      fields: item.fields,
    };

    if (!key) {
      result.states.push(OrderState.CREATE);
      const created = await this.call(ctx, "create container", () => this.client.createItem(createInput));
      if (!created.ok) return err(`Create failed: ${created.failure.message}`);
      await this.registerSafely(ctx, item, created.value.key);
      this.record(ctx, item, { remoteKey: created.value.key, action: "created" }, fingerprint);
      await this.syncContainerStatus(ctx, created.value);
      return ok({ key: created.value.key, created: true, recovered: false });
    }

    result.states.push(OrderState.UPDATE);
    const desired: DesiredState = { summary: item.summary, description: item.description, fields: item.fields };
    const applied = await this.updateExisting(ctx, item, key, desired, createInput);
    if (!applied.ok) return applied;
    if (applied.value.action === "recovered") await this.registerSafely(ctx, item, applied.value.remoteKey);
    this.record(ctx, item, applied.value, fingerprint);
    if (applied.value.remote) await this.syncContainerStatus(ctx, applied.value.remote);
    return ok({ key: applied.value.remoteKey, created: false, recovered: applied.value.action === "recovered" });
  }

  // ===========================================================================
  // CHILD_FANOUT
  // ===========================================================================

  private async applyUnits(ctx: OrderContext, container: ContainerOutcome): Promise<void> {
    const units = ctx.plan.units;
    if (container.created) {
      await mapConcurrent(
        units,
        (unit) => this.guardUnit(ctx, unit, () => this.createUnit(ctx, unit, container.key)),
        this.options.unitWorkers
      );
      return;
    }
    for (const unit of units) {
      if (ctx.aborted) break;
      await this.guardUnit(ctx, unit, () => this.reconcileUnit(ctx, unit, container));
    }
  }

  private async guardUnit(
    ctx: OrderContext,
    unit: UnitItem,
    run: () => Promise<Result<void, string>>
  ): Promise<void> {
    try {
      const outcome = await run();
      if (!outcome.ok) this.fail(ctx, unit, outcome.error);
    } catch (error) {
      this.fail(ctx, unit, describeError(error));
      if (error instanceof IdentityStoreError) ctx.aborted = true;
    }
  }

  private async createUnit(ctx: OrderContext, unit: UnitItem, parentKey: string): Promise<Result<void, string>> {
    const item = await this.prepare(ctx, unit);
    const created = await this.call(ctx, `create unit ${item.identity}`, () =>
      this.client.createItem(this.unitCreateInput(ctx, item, parentKey))
    );
    if (!created.ok) return err(`Create failed: ${created.failure.message}`);
    await this.registerSafely(ctx, item, created.value.key);
    this.record(ctx, item, { remoteKey: created.value.key, action: "created" }, fingerprintItem(item));
    return ok(undefined);
  }

  private async reconcileUnit(
    ctx: OrderContext,
    unit: UnitItem,
    container: ContainerOutcome
  ): Promise<Result<void, string>> {
    const { plan } = ctx;
    const item = await this.prepare(ctx, unit);
    const fingerprint = fingerprintItem(item);

    let key = await this.store.resolveUnit(plan.projectKey, plan.orderId, item.instance);
    if (key) {
      if (!this.options.forceSync && !container.recovered) {
        const last = await this.store.getLastFingerprint(plan.projectKey, "unit", plan.orderId, item.instance);
        if (last === fingerprint) {
          this.record(ctx, item, { remoteKey: key, action: "noop" }, fingerprint);
          return ok(undefined);
        }
      }
    } else {
      const found = await this.search(ctx, item, ctx.unitTypeId);
      if (!found.ok) return found;
      if (found.value) {
        key = found.value.key;
        await this.registerSafely(ctx, item, key);
      }
    }

    const createInput = this.unitCreateInput(ctx, item, container.key);
    if (!key) {
      const created = await this.call(ctx, `create unit ${item.identity}`, () => this.client.createItem(createInput));
      if (!created.ok) return err(`Create failed: ${created.failure.message}`);
      await this.registerSafely(ctx, item, created.value.key);
      this.record(ctx, item, { remoteKey: created.value.key, action: "created" }, fingerprint);
      return ok(undefined);
    }

    const desired: DesiredState = {
      summary: item.summary,
      description: item.description,
      fields: item.fields,
      parentKey: container.key,
    };
    if (item.dueDate !== undefined) desired.dueDate = item.dueDate;

    const applied = await this.updateExisting(ctx, item, key, desired, createInput);
    if (!applied.ok) return applied;
    if (applied.value.action === "recovered") await this.registerSafely(ctx, item, applied.value.remoteKey);
    this.record(ctx, item, applied.value, fingerprint);
    return ok(undefined);
  }

  private unitCreateInput(ctx: OrderContext, item: UnitItem, parentKey: string): CreateItemInput {
    const input: CreateItemInput = {
      projectId: ctx.projectId,
      typeId: ctx.unitTypeId,
      summary: item.summary,
      description: item.description,
      fields: item.fields,
      parentKey,
    };
    if (item.dueDate !== undefined) input.dueDate = item.dueDate;
    return input;
  }

  // ===========================================================================
  // UPDATE (with self-heal)
  // ===========================================================================

  private async updateExisting(
    ctx: OrderContext,
    item: PlannedItem,
    key: string,
    desired: DesiredState,
    recreate: CreateItemInput
  ): Promise<Result<AppliedItem, string>> {
    const label = item.kind === "container" ? "container" : `unit ${item.identity}`;
    const current = await this.call(ctx, `read ${label}`, () => this.client.getItem(key));
    if (!current.ok) {
      if (current.failure.code === ErrorCode.TRACKER_NOT_FOUND) return this.recreate(ctx, label, key, recreate);
      return err(`Read of ${key} failed: ${current.failure.message}`);
    }

    const changes = diff(desired, current.value, { force: this.options.forceSync });
    if (changes.suppressed) ctx.log.debug({ remoteKey: key }, "Description-only change suppressed");
    if (changes.empty) return ok({ remoteKey: key, action: "noop" });

    let versionToken = current.value.versionToken;
    const written = await this.call(
      ctx,
      `update ${label}`,
      () => this.client.updateItem(key, changes.changes, versionToken),
      {
        onConflict: async () => {
          const refreshed = await this.client.getItem(key);
          if (refreshed.ok) versionToken = refreshed.value.versionToken;
          return refreshed;
        },
      }
    );
    if (!written.ok) {
      if (written.failure.code === ErrorCode.TRACKER_NOT_FOUND) return this.recreate(ctx, label, key, recreate);
      return err(`Update of ${key} failed: ${written.failure.message}`);
    }

    if (this.options.changeComments) {
      const comment = buildChangeComment(
        { projectKey: ctx.plan.projectKey, orderId: ctx.plan.orderId, item },
        current.value,
        changes,
        this.catalog
      );
      if (comment) await this.postComment(ctx, key, comment);
    }
    return ok({ remoteKey: key, action: "updated", changedKeys: changes.changedKeys, remote: written.value });
  }

  private async recreate(
    ctx: OrderContext,
    label: string,
    staleKey: string,
    input: CreateItemInput
  ): Promise<Result<AppliedItem, string>> {
    ctx.log.warn({ staleKey, item: label }, "Mapped item no longer exists; creating a replacement");
    const created = await this.call(ctx, `recreate ${label}`, () => this.client.createItem(input));
    if (!created.ok) return err(`Recreate of ${staleKey} failed: ${created.failure.message}`);
    return ok({ remoteKey: created.value.key, action: "recovered", remote: created.value });
  }

  // ===========================================================================
  // Workflow status & change comments
  // ===========================================================================

  /**
   * Move a container that was just written to the workflow status named
   * like its order status. Failures leave the status as it is and warn.
   */
  private async syncContainerStatus(ctx: OrderContext, remote: RemoteItem): Promise<void> {
    const wanted = ctx.plan.container.status;
    if (!wanted || remote.status?.trim().toLowerCase() === wanted.trim().toLowerCase()) return;

    const resolved = await this.call(ctx, "resolve status", () => this.cache.status(wanted));
    if (!resolved.ok) {
      this.warnOnce(ctx, `Statuses could not be listed: ${resolved.failure.message}`);
      return;
    }
    const target = resolved.value;
    if (!target) {
      this.warnOnce(ctx, `Status "${wanted}" does not exist on the tracker; ${remote.key} keeps its status`);
      return;
    }

    let versionToken = remote.versionToken;
    const moved = await this.call(
      ctx,
      "move container status",
      () => this.client.updateItem(remote.key, { fields: new Map(), statusId: target.id }, versionToken),
      {
        onConflict: async () => {
          const refreshed = await this.client.getItem(remote.key);
          if (refreshed.ok) versionToken = refreshed.value.versionToken;
          return refreshed;
        },
      }
    );
    if (!moved.ok) {
      ctx.result.warnings.push(`Status of ${remote.key} not moved to ${target.name}: ${moved.failure.message}`);
      ctx.log.warn({ remoteKey: remote.key, status: target.name, error: moved.failure.message }, "Status move failed");
      return;
    }
    ctx.log.debug({ remoteKey: remote.key, status: target.name }, "Container status moved");
  }

  private async postComment(ctx: OrderContext, key: string, comment: string): Promise<void> {
    const posted = await this.call(ctx, `comment on ${key}`, () => this.client.addComment(key, comment));
    if (!posted.ok) {
      ctx.result.warnings.push(`Change comment on ${key} not posted: ${posted.failure.message}`);
      ctx.log.warn({ remoteKey: key, error: posted.failure.message }, "Change comment failed");
    }
  }

  // ===========================================================================
  // Fallback search
  // ===========================================================================

  /**
   * Remote item whose summary equals the planned one, preferring an exact
   * match over a whitespace/case-insensitive one
   */
  private async search(
    ctx: OrderContext,
    item: PlannedItem,
    typeId: string
  ): Promise<Result<RemoteItem | undefined, string>> {
    const found = await this.call(ctx, `search ${item.identity}`, () =>
      this.client.searchItems({ projectId: ctx.projectId, summary: item.summary, typeId })
    );
    if (!found.ok) return err(`Search failed: ${found.failure.message}`);

    const candidates = [...found.value].sort(byNumericKey);
    const exact = candidates.find((c) => c.summary.trim() === item.summary.trim());
    if (exact) return ok(exact);
    const wanted = normalizeSummary(item.summary);
    return ok(candidates.find((c) => normalizeSummary(c.summary) === wanted));
  }

  // ===========================================================================
  // Option references
  // ===========================================================================

  /**
   * Fill in tracker references for option-valued fields. Options the
   * tracker does not know are dropped with a warning.
   */
  private async prepare<T extends PlannedItem>(ctx: OrderContext, item: T): Promise<T> {
    const fields = new Map<string, FieldValue>();
    for (const [id, value] of item.fields) {
      if (value.kind !== "option" || value.ref !== undefined) {
        fields.set(id, value);
        continue;
      }
      const ref = await this.call(ctx, "resolve option", () => this.cache.optionRef(value.value));
      if (!ref.ok) {
        throw new ReconciliationError(`Custom options could not be listed: ${ref.failure.message}`);
      }
      if (ref.value === undefined) {
        this.warnOnce(ctx, `Option "${value.value}" does not exist on the tracker; ${id} left unchanged`);
        continue;
      }
      fields.set(id, optionValue(value.value, ref.value));
    }
    return { ...item, fields };
  }

  // ===========================================================================
  // REGISTER
  // ===========================================================================

  private async registerPending(ctx: OrderContext): Promise<void> {
    for (const entry of ctx.pending) {
      await this.registerSafely(ctx, entry.item, entry.remoteKey, entry.fingerprint);
    }
  }

  /**
   * Record a mapping. A failure after a successful remote write is only a
   * warning; the next run re-diffs the item.
   */
  private async registerSafely(
    ctx: OrderContext,
    item: PlannedItem,
    remoteKey: string,
    fingerprint?: string
  ): Promise<void> {
    const { plan } = ctx;
    const written = await fromPromise(
      item.kind === "container"
        ? this.store.registerContainer(plan.projectKey, plan.orderId, remoteKey, fingerprint)
        : this.store.registerUnit(plan.projectKey, plan.orderId, item.instance, remoteKey, fingerprint)
    );
    if (!written.ok) {
      ctx.result.warnings.push(`Mapping for ${item.identity} → ${remoteKey} not recorded: ${written.error.message}`);
      ctx.log.warn({ err: written.error, item: item.identity, remoteKey }, "Identity registration failed");
    }
  }

  // ===========================================================================
  // Bookkeeping
  // ===========================================================================

  private async call<T>(
    ctx: OrderContext,
    label: string,
    attempt: () => Promise<TrackerResult<T>>,
    options?: CallOptions
  ): Promise<CallResult<T>> {
    const outcome = await ctx.writer.call(label, attempt, options);
    addRetries(ctx.result, outcome);
    return outcome;
  }

  private record(ctx: OrderContext, item: PlannedItem, applied: AppliedItem, fingerprint: string): void {
    const { result } = ctx;
    const bucket = {
      created: result.createdKeys,
      updated: result.updatedKeys,
      recovered: result.recoveredKeys,
      noop: result.noopKeys,
    }[applied.action];
    bucket.push(applied.remoteKey);

    result.items.push({
      kind: item.kind,
      identity: item.identity,
      action: applied.action,
      remoteKey: applied.remoteKey,
      ...(applied.changedKeys ? { changedKeys: applied.changedKeys } : {}),
    });
    ctx.pending.push({ item, remoteKey: applied.remoteKey, fingerprint });
  }

  private fail(ctx: OrderContext, item: PlannedItem, message: string): void {
    ctx.result.errors.push(`${item.identity}: ${message}`);
    ctx.result.items.push({ kind: item.kind, identity: item.identity, action: "failed", error: message });
    ctx.log.warn({ item: item.identity, error: message }, "Item could not be reconciled");
  }

  private warnOnce(ctx: OrderContext, message: string): void {
    if (!ctx.result.warnings.includes(message)) ctx.result.warnings.push(message);
  }
}
