/**
 * Plan Compiler
 *
 * Expands one logical order into a container item plus one unit item per
 * ordered quantity. Compilation is pure: the same rows, in any order, produce
 * the same plan. Missing values are omitted; required-field enforcement is
 * left to the validator.
 *
 * @module
 */

import {
  containerSummary,
  unitIdentity,
  type ContainerItem,
  type DesiredPlan,
  type LogicalOrder,
  type SourceRecord,
  type SourceScalar,
  type UnitItem,
} from "../models/plan.js";
import {
  dateValue,
  formatFieldValue,
  numberValue,
  optionValue,
  stringValue,
  type FieldValue,
} from "../models/fields.js";
import {
  CONTAINER_FIELDS,
  FIELD_DEFINITIONS,
  UNIT_FIELDS,
  type LogicalField,
} from "../models/field-definitions.js";
import { FieldCatalog } from "./field-catalog.js";
import {
  cleanText,
  effectiveUpdatedDate,
  normalizeStatus,
  parseNumber,
  parseQuantity,
  toIsoDate,
} from "./normalize.js";

export interface PlanCompilerOptions {
  catalog: FieldCatalog;
  /** Write the order status onto unit items as well */
  unitStatusEnabled?: boolean;
}

type TextColumn = "projectName" | "domain" | "customer" | "bpId" | "wpId" | "wpName" | "employeeName";
type DateColumn =
  | "acknowledgementDate"
  | "addedDate"
  | "approvedDate"
  | "cancelledDate"
  | "poStartDate"
  | "poEndDate"
  | "readinessDate"
  | "requestedDate"
  | "submittedDate"
  | "updatedDate";

const TEXT_COLUMNS: readonly TextColumn[] = ["projectName", "domain", "customer", "bpId", "wpId", "wpName", "employeeName"];
const DATE_COLUMNS: readonly DateColumn[] = [
  "acknowledgementDate",
  "addedDate",
  "approvedDate",
  "cancelledDate",
  "poStartDate",
  "poEndDate",
  "readinessDate",
  "requestedDate",
  "submittedDate",
  "updatedDate",
];

// =============================================================================
// Record Ordering
// =============================================================================

function canonicalRecord(record: SourceRecord): string {
  const entries = Object.entries(record)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

/**
 * Stable ordering independent of input order: by row timestamp, then by
 * the row's canonical content.
 */
export function sortRecords(records: readonly SourceRecord[]): SourceRecord[] {
  return records
    .map((record) => ({ record, key: canonicalRecord(record) }))
    .sort((a, b) => {
      const ta = a.record.rowTimestamp ?? "";
      const tb = b.record.rowTimestamp ?? "";
      if (ta !== tb) return ta < tb ? -1 : 1;
      return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
    })
    .map(({ record }) => record);
}

function firstNonEmpty<T>(
  records: readonly SourceRecord[],
  pick: (record: SourceRecord) => SourceScalar,
  parse: (value: SourceScalar) => T | undefined
): T | undefined {
  for (const record of records) {
    const parsed = parse(pick(record));
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

function nonEmptyText(value: SourceScalar): string | undefined {
  const text = cleanText(value);
  return text ? text : undefined;
}

// =============================================================================
// Compiler
// =============================================================================

export class PlanCompiler {
  private readonly catalog: FieldCatalog;
  private readonly unitStatusEnabled: boolean;

  constructor(options: PlanCompilerOptions) {
    this.catalog = options.catalog;
    this.unitStatusEnabled = options.unitStatusEnabled ?? false;
  }

  compile(order: LogicalOrder, projectKey: string): DesiredPlan {
    const records = sortRecords(order.records);
    const warnings: string[] = [];

    const quantity = this.computeQuantity(records, warnings);
    const values = this.collectValues(order, records, quantity);

    const container: ContainerItem = {
      kind: "container",
      identity: order.orderId,
      summary: containerSummary(order.product, order.orderId),
      description: this.describe(values, FIELD_DEFINITIONS.map((d) => d.field)),
      fields: this.mapFields(values, CONTAINER_FIELDS),
    };
    const orderStatus = values.get("orderStatus");
    if (orderStatus?.kind === "option") container.status = orderStatus.value;

    const unitFields = UNIT_FIELDS.filter((f) => f !== "orderStatus" || this.unitStatusEnabled);
    const unitDescriptionBody = this.describe(values, ["wpId", "wpName"]);
    const readiness = values.get("readinessDate");
    const units: UnitItem[] = [];
    for (let instance = 1; instance <= quantity; instance++) {
      const header = `Unit ${instance} of ${quantity} for order ${order.orderId}`;
      const unit: UnitItem = {
        kind: "unit",
        instance,
        identity: unitIdentity(order.orderId, instance),
        summary: unitIdentity(order.orderId, instance),
        description: unitDescriptionBody ? `${header}\n\n${unitDescriptionBody}` : header,
        fields: this.mapFields(values, unitFields),
      };
      if (readiness) unit.dueDate = String(readiness.value);
      units.push(unit);
    }

    return {
      product: order.product,
      projectKey,
      orderId: order.orderId,
      quantity,
      container,
      units,
      warnings,
    };
  }

  /**
   * Maximum quantity across rows, never below 1. Rows whose quantity cannot
   * be parsed do not count.
   */
  private computeQuantity(records: readonly SourceRecord[], warnings: string[]): number {
    let max: number | undefined;
    for (const record of records) {
      const q = parseQuantity(record.quantity);
      if (q !== undefined && (max === undefined || q > max)) max = q;
    }
    if (max === undefined) {
      warnings.push("Quantity missing or unparseable; defaulting to 1");
      return 1;
    }
    return Math.max(1, max);
  }

  private collectValues(
    order: LogicalOrder,
    records: readonly SourceRecord[],
    quantity: number
  ): Map<LogicalField, FieldValue> {
    const values = new Map<LogicalField, FieldValue>();

    values.set("product", stringValue(order.product));
    values.set("orderId", stringValue(order.orderId));
    values.set("quantity", numberValue(quantity));

    for (const column of TEXT_COLUMNS) {
      const text = firstNonEmpty(records, (r) => r[column], nonEmptyText);
      if (text !== undefined) values.set(column, stringValue(text));
    }

    const status = firstNonEmpty(records, (r) => r.status, nonEmptyText);
    if (status !== undefined) values.set("orderStatus", optionValue(normalizeStatus(status)));

    const std = firstNonEmpty(records, (r) => r.std, parseNumber);
    if (std !== undefined) values.set("std", numberValue(std));

    const dates: Partial<Record<DateColumn, string>> = {};
    for (const column of DATE_COLUMNS) {
      const iso = firstNonEmpty(records, (r) => r[column], toIsoDate);
      if (iso !== undefined) {
        dates[column] = iso;
        if (column !== "updatedDate") values.set(column, dateValue(iso));
      }
    }
    if (dates.acknowledgementDate) values.set("startDate", dateValue(dates.acknowledgementDate));

    const updated = effectiveUpdatedDate(status ?? "", dates);
    if (updated) values.set("updatedDate", dateValue(updated));

    return values;
  }

  private mapFields(
    values: ReadonlyMap<LogicalField, FieldValue>,
    allowed: readonly LogicalField[]
  ): Map<string, FieldValue> {
    const fields = new Map<string, FieldValue>();
    for (const field of allowed) {
      const value = values.get(field);
      const remoteId = this.catalog.remoteIdFor(field);
      if (value && remoteId) fields.set(remoteId, value);
    }
    return fields;
  }

  private describe(values: ReadonlyMap<LogicalField, FieldValue>, fields: readonly LogicalField[]): string {
    const lines: string[] = [];
    for (const def of FIELD_DEFINITIONS) {
      if (!fields.includes(def.field)) continue;
      const value = values.get(def.field);
      if (value) lines.push(`**${def.displayName}**: ${formatFieldValue(value)}`);
    }
    return lines.join("\n");
  }
}
