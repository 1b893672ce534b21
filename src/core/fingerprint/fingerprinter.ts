/**
 * Fingerprinter
 *
 * SHA-256 over a canonical JSON encoding of an item's syncable content:
 * summary, description, due date (units) and the sorted custom-field map.
 * Every field the diff engine may write is part of the input; two items with
 * equal fingerprints cannot produce a remote diff.
 *
 * @module
 */

import * as crypto from "node:crypto";
import { fieldMapToObject, type FieldMap } from "../plan/models/fields.js";
import type { PlannedItem } from "../plan/models/plan.js";

export interface FingerprintInput {
  summary: string;
  description: string;
  dueDate?: string;
  fields: FieldMap;
}

type CanonicalValue = string | number | boolean | null | CanonicalValue[] | { [key: string]: CanonicalValue };

/**
 * JSON with object keys sorted at every depth and no insignificant whitespace
 */
export function canonicalJson(value: CanonicalValue): string {
  if (value === null || typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  const keys = Object.keys(value).sort();
  const body = keys
    .map((key) => {
      const child = value[key];
      return child === undefined ? null : `${JSON.stringify(key)}:${canonicalJson(child)}`;
    })
    .filter((part): part is string => part !== null);
  return `{${body.join(",")}}`;
}

function toCanonical(input: FingerprintInput): CanonicalValue {
  const custom: { [key: string]: CanonicalValue } = {};
  for (const [key, entry] of Object.entries(fieldMapToObject(input.fields))) {
    custom[key] = { kind: entry.kind, value: entry.value };
  }
  return {
    summary: input.summary,
    description: input.description.trim(),
    duedate: input.dueDate ?? "",
    custom,
  };
}

export function fingerprint(input: FingerprintInput): string {
  return crypto.createHash("sha256").update(canonicalJson(toCanonical(input)), "utf8").digest("hex");
}

/**
 * Fingerprint of a planned item. Containers carry no due date.
 */
export function fingerprintItem(item: PlannedItem): string {
  return fingerprint({
    summary: item.summary,
    description: item.description,
    dueDate: item.kind === "unit" ? item.dueDate : undefined,
    fields: item.fields,
  });
}
