/**
 * Logical field definitions: how each syncable field is named on the tracker
 * and which item kinds may carry it.
 */

import type { FieldKind } from "./fields.js";

export type LogicalField =
  | "product"
  | "projectName"
  | "domain"
  | "customer"
  | "bpId"
  | "orderId"
  | "wpId"
  | "wpName"
  | "quantity"
  | "orderStatus"
  | "employeeName"
  | "std"
  | "acknowledgementDate"
  | "addedDate"
  | "approvedDate"
  | "cancelledDate"
  | "poStartDate"
  | "poEndDate"
  | "readinessDate"
  | "requestedDate"
  | "submittedDate"
  | "startDate"
  | "updatedDate";

export interface FieldDefinition {
  field: LogicalField;
  /** Display name of the custom field on the tracker */
  displayName: string;
  kind: FieldKind;
}

export const FIELD_DEFINITIONS: readonly FieldDefinition[] = [
  { field: "product", displayName: "WPR Product", kind: "string" },
  { field: "projectName", displayName: "WPR Project", kind: "string" },
  { field: "domain", displayName: "WPR Domain", kind: "string" },
  { field: "customer", displayName: "WPR Customer", kind: "string" },
  { field: "bpId", displayName: "WPR BP ID", kind: "string" },
  { field: "orderId", displayName: "WPR WP Order ID", kind: "string" },
  { field: "wpId", displayName: "WPR WP ID", kind: "string" },
  { field: "wpName", displayName: "WPR WP Name", kind: "string" },
  { field: "quantity", displayName: "WPR WP Quantity", kind: "number" },
  { field: "orderStatus", displayName: "WPR WP Order Status", kind: "option" },
  { field: "employeeName", displayName: "WPR Employee Name", kind: "string" },
  { field: "std", displayName: "WPR STD", kind: "number" },
  { field: "acknowledgementDate", displayName: "WPR Acknowledgement Date", kind: "date" },
  { field: "addedDate", displayName: "WPR Added Date", kind: "date" },
  { field: "approvedDate", displayName: "WPR Approved Date", kind: "date" },
  { field: "cancelledDate", displayName: "WPR Cancelled Date", kind: "date" },
  { field: "poStartDate", displayName: "WPR PO Start Date", kind: "date" },
  { field: "poEndDate", displayName: "WPR PO End Date", kind: "date" },
  { field: "readinessDate", displayName: "WPR Readiness Date", kind: "date" },
  { field: "requestedDate", displayName: "WPR Requested Date", kind: "date" },
  { field: "submittedDate", displayName: "WPR Submitted Date", kind: "date" },
  { field: "startDate", displayName: "WPR Start Date", kind: "date" },
  { field: "updatedDate", displayName: "WPR Updated Date", kind: "date" },
];

/** Fields a container may carry, in write order */
export const CONTAINER_FIELDS: readonly LogicalField[] = FIELD_DEFINITIONS.map((d) => d.field);

/** Fields a unit may carry; orderStatus only when unit status sync is enabled */
export const UNIT_FIELDS: readonly LogicalField[] = ["wpId", "wpName", "orderId", "orderStatus"];

export const DEFAULT_REQUIRED_FIELDS: { container: LogicalField[]; unit: LogicalField[] } = {
  container: [
    "projectName",
    "product",
    "domain",
    "poStartDate",
    "poEndDate",
    "wpId",
    "wpName",
    "orderId",
    "orderStatus",
    "quantity",
  ],
  unit: ["wpId", "wpName", "orderId"],
};

const BY_FIELD = new Map<LogicalField, FieldDefinition>(FIELD_DEFINITIONS.map((d) => [d.field, d]));

export function getFieldDefinition(field: LogicalField): FieldDefinition | undefined {
  return BY_FIELD.get(field);
}

export function isLogicalField(value: string): value is LogicalField {
  return FIELD_DEFINITIONS.some((d) => d.field === value);
}
