/**
 * Plan Validator
 *
 * Checks compiled plans against the required-field rules and cross-order
 * identity uniqueness, then partitions orders into eligible and blocked.
 * Findings are collected per order; nothing here throws.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { RequiredFieldSpec } from "../../utils/validation.js";
import { isEmptyFieldValue } from "../plan/models/fields.js";
import { getFieldDefinition, type LogicalField } from "../plan/models/field-definitions.js";
import { orderKey, type DesiredPlan, type PlannedItem } from "../plan/models/plan.js";
import type { FieldCatalog } from "../plan/impl/field-catalog.js";

const logger = createLogger("validator");

export interface OrderValidation {
  /** Batch-unique order key (product + order id) */
  key: string;
  orderId: string;
  product: string;
  projectKey: string;
  ok: boolean;
  errors: string[];
  warnings: string[];
}

export interface ValidationReport {
  perOrder: OrderValidation[];
  /** Set when errors exist and the policy is fail-closed */
  blockedGlobally: boolean;
}

export interface ValidateOptions {
  /** When false, any error blocks every order */
  continueOnError: boolean;
}

export interface ApplyDecision {
  allowed: Set<string>;
  blocked: Set<string>;
}

function displayName(field: LogicalField): string {
  return getFieldDefinition(field)?.displayName ?? field;
}

export class PlanValidator {
  private readonly catalog: FieldCatalog;
  private readonly required: RequiredFieldSpec;

  constructor(catalog: FieldCatalog, required: RequiredFieldSpec) {
    this.catalog = catalog;
    this.required = required;
  }

  validate(plans: readonly DesiredPlan[], options: ValidateOptions): ValidationReport {
    const duplicates = this.findDuplicateIdentities(plans);

    const perOrder = plans.map((plan) => {
      const key = orderKey(plan.product, plan.orderId);
      const errors: string[] = [];
      const warnings = [...plan.warnings];

      this.checkContainer(plan, errors, warnings);
      this.checkUnits(plan, errors, warnings);

      const clashes = duplicates.get(key);
      if (clashes) {
        errors.push(`Duplicate identity in project ${plan.projectKey}: ${clashes.join(", ")}`);
      }

      const result: OrderValidation = {
        key,
        orderId: plan.orderId,
        product: plan.product,
        projectKey: plan.projectKey,
        ok: errors.length === 0,
        errors,
        warnings,
      };
      if (!result.ok) {
        logger.warn({ orderId: plan.orderId, product: plan.product, errors }, "Order failed validation");
      }
      return result;
    });

    const hasErrors = perOrder.some((r) => !r.ok);
    const blockedGlobally = hasErrors && !options.continueOnError;
    if (blockedGlobally) {
      logger.warn({ orders: perOrder.length }, "Validation errors with fail-closed policy; blocking the whole run");
    }

    return { perOrder, blockedGlobally };
  }

  private checkContainer(plan: DesiredPlan, errors: string[], warnings: string[]): void {
    if (!plan.container.summary.trim()) errors.push("Container summary is empty");

    const { missing, unmapped } = this.missingFields(plan.container, this.required.container);
    if (missing.length > 0) {
      errors.push(`Container missing required fields: ${missing.join(", ")}`);
    }
    if (unmapped.length > 0) {
      warnings.push(`Required container fields have no tracker mapping: ${unmapped.join(", ")}`);
    }
  }

  private checkUnits(plan: DesiredPlan, errors: string[], warnings: string[]): void {
    let withoutDueDate = 0;
    for (const unit of plan.units) {
      if (!unit.summary.trim()) errors.push(`Unit ${unit.identity} summary is empty`);
      const { missing } = this.missingFields(unit, this.required.unit);
      if (missing.length > 0) {
        errors.push(`Unit ${unit.identity} missing required fields: ${missing.join(", ")}`);
      }
      if (!unit.dueDate) withoutDueDate++;
    }
    if (withoutDueDate > 0) {
      warnings.push(`${withoutDueDate} unit(s) have no due date`);
    }
  }

  /**
   * Required fields that are mapped but empty, and required fields the
   * tracker has no field for. Names are sorted display names.
   */
  private missingFields(
    item: PlannedItem,
    required: readonly LogicalField[]
  ): { missing: string[]; unmapped: string[] } {
    const missing = new Set<string>();
    const unmapped = new Set<string>();
    for (const field of required) {
      const remoteId = this.catalog.remoteIdFor(field);
      if (!remoteId) {
        unmapped.add(displayName(field));
      } else if (isEmptyFieldValue(item.fields.get(remoteId))) {
        missing.add(displayName(field));
      }
    }
    return { missing: [...missing].sort(), unmapped: [...unmapped].sort() };
  }

  /**
   * Identities claimed by more than one distinct order of the same project.
   * Repeated identities inside one order are not reported.
   */
  private findDuplicateIdentities(plans: readonly DesiredPlan[]): Map<string, string[]> {
    const owners = new Map<string, { identity: string; keys: Set<string> }>();
    const claim = (plan: DesiredPlan, item: PlannedItem): void => {
      const slot = JSON.stringify([plan.projectKey, item.kind, item.identity]);
      const owner = owners.get(slot) ?? { identity: item.identity, keys: new Set<string>() };
      owner.keys.add(orderKey(plan.product, plan.orderId));
      owners.set(slot, owner);
    };
    for (const plan of plans) {
      claim(plan, plan.container);
      for (const unit of plan.units) claim(plan, unit);
    }

    const clashes = new Map<string, Set<string>>();
    for (const { identity, keys } of owners.values()) {
      if (keys.size < 2) continue;
      for (const key of keys) {
        const set = clashes.get(key) ?? new Set<string>();
        set.add(identity);
        clashes.set(key, set);
      }
    }
    return new Map([...clashes].map(([key, ids]) => [key, [...ids].sort()]));
  }
}

/**
 * Eligible and blocked order keys under the report's policy
 */
export function decideApply(report: ValidationReport): ApplyDecision {
  const allowed = new Set<string>();
  const blocked = new Set<string>();
  for (const result of report.perOrder) {
    if (result.ok && !report.blockedGlobally) {
      allowed.add(result.key);
    } else {
      blocked.add(result.key);
    }
  }
  return { allowed, blocked };
}
