/**
 * Source value normalization: text cleanup, quantities, dates and order status.
 */

import type { SourceScalar } from "../models/plan.js";

const EMPTY_MARKERS = new Set(["nan", "nat", "null", "none"]);

/**
 * Trimmed text form of a source cell; spreadsheet null markers become "".
 */
export function cleanText(value: SourceScalar): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && !Number.isFinite(value)) return "";
  const text = String(value).trim();
  return EMPTY_MARKERS.has(text.toLowerCase()) ? "" : text;
}

/**
 * Numeric cell value with thousands separators removed
 */
export function parseNumber(value: SourceScalar): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  const text = cleanText(value).replace(/,/g, "");
  if (!text) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Plain decimal, optionally with comma thousands separators */
const DECIMAL_QUANTITY = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?$/;

/**
 * Whole-number quantity; fractional inputs are truncated. Text cells must be
 * plain decimals, so hex, exponent and signed forms do not parse.
 */
export function parseQuantity(value: SourceScalar): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : undefined;
  const text = cleanText(value);
  if (!DECIMAL_QUANTITY.test(text)) return undefined;
  return Math.trunc(Number(text.replace(/,/g, "")));
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

/**
 * Date-only ISO form (YYYY-MM-DD) of a date cell, or undefined when the
 * cell does not hold a valid date. Any time component is dropped.
 */
export function toIsoDate(value: SourceScalar): string | undefined {
  const text = cleanText(value);
  if (!text) return undefined;

  const match = ISO_DATE.exec(text);
  if (match) {
    const [, y, m, d] = match;
    const year = Number(y);
    const month = Number(m);
    const day = Number(d);
    const candidate = new Date(Date.UTC(year, month - 1, day));
    if (candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day) {
      return `${y}-${m}-${d}`;
    }
    return undefined;
  }

  const parsed = new Date(text);
  if (Number.isNaN(parsed.getTime())) return undefined;
  return `${parsed.getFullYear()}-${pad2(parsed.getMonth() + 1)}-${pad2(parsed.getDate())}`;
}

// =============================================================================
// Order Status
// =============================================================================

export type OrderStatus =
  | "Pending Acknowledgement"
  | "Acknowledged"
  | "Pending Approval"
  | "Approved"
  | "Objected"
  | "Rejected"
  | "Cancelled"
  | "Waiting for order submission";

const STATUS_ALIASES: ReadonlyMap<string, OrderStatus> = new Map([
  ["pending acknowledgement", "Pending Acknowledgement"],
  ["pending acknowledgment", "Pending Acknowledgement"],
  ["acknowledge", "Acknowledged"],
  ["acknowledged", "Acknowledged"],
  ["pending approval", "Pending Approval"],
  ["approved", "Approved"],
  ["objected", "Objected"],
  ["rejected", "Rejected"],
  ["cancelled", "Cancelled"],
  ["canceled", "Cancelled"],
  ["waiting for order submission", "Waiting for order submission"],
]);

export function canonicalStatus(value: SourceScalar): OrderStatus | undefined {
  const text = cleanText(value).toLowerCase().replace(/\s+/g, " ");
  return STATUS_ALIASES.get(text);
}

/**
 * Canonical status name, falling back to the trimmed source text for
 * statuses outside the known set.
 */
export function normalizeStatus(value: SourceScalar): string {
  return canonicalStatus(value) ?? cleanText(value);
}

export interface StatusDates {
  addedDate?: string;
  acknowledgementDate?: string;
  submittedDate?: string;
  approvedDate?: string;
  cancelledDate?: string;
  updatedDate?: string;
}

/**
 * The date an order last changed state, derived from its status
 */
export function effectiveUpdatedDate(status: string, dates: StatusDates): string | undefined {
  switch (canonicalStatus(status)) {
    case "Pending Acknowledgement":
      return dates.addedDate;
    case "Acknowledged":
      return dates.acknowledgementDate;
    case "Pending Approval":
    case "Objected":
    case "Rejected":
      return dates.submittedDate;
    case "Approved":
      return dates.approvedDate;
    case "Cancelled":
      return dates.cancelledDate;
    case "Waiting for order submission":
      return dates.acknowledgementDate ?? dates.addedDate;
    default:
      return dates.updatedDate;
  }
}
