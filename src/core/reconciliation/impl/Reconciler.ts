/**
 * Reconciler
 *
 * Batch driver: routes orders to projects, compiles and validates every
 * plan, then fans eligible orders out to a bounded pool of order workers.
 * One order's failure never affects another. Cancellation stops new orders
 * from starting; orders already running finish.
 *
 * @module
 */

import { TrackerError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { mapConcurrent } from "../../../utils/async.js";
import type { RequiredFieldSpec } from "../../../utils/validation.js";
import type { IIdentityStore } from "../../identity/interfaces/IIdentityStore.js";
import { PlanCompiler } from "../../plan/impl/plan-compiler.js";
import { orderKey, type DesiredPlan, type LogicalOrder } from "../../plan/models/plan.js";
import type { ProductRegistry } from "../../source/impl/ProductRegistry.js";
import type { ITrackerClient } from "../../tracker/interfaces/ITrackerClient.js";
import { RunCache } from "../../tracker/impl/run-cache.js";
import { PlanValidator, decideApply, type OrderValidation } from "../../validation/validator.js";
import {
  DEFAULT_RECONCILE_OPTIONS,
  computeTotals,
  type ApplyResult,
  type OrderOutcome,
  type ReconcileOptions,
  type ReconcileReport,
} from "../interfaces/IReconciliation.js";
import { OrderExecutor } from "./OrderExecutor.js";

const logger = createLogger("reconciler");

export interface ReconcilerDeps {
  client: ITrackerClient;
  store: IIdentityStore;
  registry: ProductRegistry;
  requiredFields: RequiredFieldSpec;
  /** Static display-name → field-id map; discovered from the tracker when absent */
  fieldMap?: Readonly<Record<string, string>>;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

function emptyResult(
  order: { product: string; orderId: string },
  projectKey: string,
  outcome: OrderOutcome
): ApplyResult {
  return {
    orderId: order.orderId,
    product: order.product,
    projectKey,
    outcome,
    createdKeys: [],
    updatedKeys: [],
    noopKeys: [],
    recoveredKeys: [],
    warnings: [],
    errors: [],
    retryCount: 0,
    conflictRetries: 0,
    transientRetries: 0,
    timings: { totalMs: 0, containerMs: 0, unitsMs: 0 },
    states: [],
    items: [],
  };
}

export class Reconciler {
  private readonly deps: ReconcilerDeps;
  private readonly now: () => Date;

  constructor(deps: ReconcilerDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Reconcile a batch of logical orders. Per-order failures are reported,
   * not thrown; only a tracker that cannot describe its custom fields
   * fails the whole batch.
   *
   * @throws {TrackerError} when the field catalog cannot be loaded
   */
  async reconcile(orders: readonly LogicalOrder[], overrides: Partial<ReconcileOptions> = {}): Promise<ReconcileReport> {
    const options: ReconcileOptions = { ...DEFAULT_RECONCILE_OPTIONS, ...overrides };
    const started = this.now();
    const cache = new RunCache(this.deps.client, this.deps.fieldMap);

    const catalog = await cache.fieldCatalog();
    if (!catalog.ok) {
      throw new TrackerError(
        `Custom fields could not be listed: ${catalog.error.message}`,
        catalog.error.code,
        { status: catalog.error.status }
      );
    }

    // Route and compile
    const results = new Map<string, ApplyResult>();
    const plans: DesiredPlan[] = [];
    const compiler = new PlanCompiler({ catalog: catalog.value, unitStatusEnabled: options.unitStatusEnabled });
    for (const order of orders) {
      const key = orderKey(order.product, order.orderId);
      const projectKey = this.deps.registry.projectFor(order.product);
      if (projectKey === undefined) {
        const unmapped = emptyResult(order, "", "unmapped");
        unmapped.warnings.push(`Product ${order.product} has no project mapping`);
        results.set(key, unmapped);
        continue;
      }
      plans.push(compiler.compile(order, projectKey));
    }

    // Validate
    const validator = new PlanValidator(catalog.value, this.deps.requiredFields);
    const report = validator.validate(plans, { continueOnError: options.continueOnError });
    const decision = decideApply(report);
    const findings = new Map<string, OrderValidation>(report.perOrder.map((v) => [v.key, v]));

    const eligible: DesiredPlan[] = [];
    for (const plan of plans) {
      const key = orderKey(plan.product, plan.orderId);
      const validation = findings.get(key);
      if (decision.allowed.has(key)) {
        eligible.push(plan);
        continue;
      }
      const blocked = emptyResult(plan, plan.projectKey, "blocked");
      blocked.warnings.push(...(validation?.warnings ?? []));
      blocked.errors.push(...(validation?.errors ?? []));
      if (blocked.errors.length === 0) {
        blocked.errors.push("Blocked: another order in this batch failed validation");
      }
      results.set(key, blocked);
    }

    logger.info(
      { orders: orders.length, eligible: eligible.length, blocked: decision.blocked.size, dryRun: options.dryRun },
      "Batch validated"
    );

    // Apply
    const executor = new OrderExecutor({
      client: this.deps.client,
      store: this.deps.store,
      cache,
      catalog: catalog.value,
      options,
      sleep: this.deps.sleep,
      random: this.deps.random,
    });

    const applied = await mapConcurrent(
      eligible,
      async (plan) => {
        const validationWarnings = findings.get(orderKey(plan.product, plan.orderId))?.warnings ?? [];
        if (options.dryRun) {
          const planned = emptyResult(plan, plan.projectKey, "planned");
          planned.warnings.push(...validationWarnings);
          return planned;
        }
        if (options.cancellation?.cancelled) {
          const cancelled = emptyResult(plan, plan.projectKey, "cancelled");
          cancelled.errors.push(`Not started: ${options.cancellation.reason ?? "run cancelled"}`);
          return cancelled;
        }
        const result = await executor.execute(plan);
        const extra = result.warnings.filter((w) => !validationWarnings.includes(w));
        result.warnings = [...validationWarnings, ...extra];
        return result;
      },
      options.workerCount
    );
    for (const result of applied) {
      results.set(orderKey(result.product, result.orderId), result);
    }

    const perOrder = orders.flatMap((order) => {
      const result = results.get(orderKey(order.product, order.orderId));
      return result ? [result] : [];
    });
    const finished = this.now();
    const totals = computeTotals(perOrder);

    logger.info({ ...totals, durationMs: finished.getTime() - started.getTime() }, "Reconciliation finished");

    return {
      perOrder,
      totals,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      dryRun: options.dryRun,
      blockedGlobally: report.blockedGlobally,
    };
  }
}
