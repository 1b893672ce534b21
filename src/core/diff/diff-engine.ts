/**
 * Diff Engine
 *
 * Compares a desired item against the tracker's current representation and
 * emits only the keys whose values differ. Desired values that are absent
 * are never written, so remote values the plan does not carry survive.
 *
 * @module
 */

import { fieldValueMatches, type FieldMap, type FieldValue } from "../plan/models/fields.js";
import type { ChangeSet, RemoteItem } from "../tracker/models/tracker-models.js";

export interface DesiredState {
  summary: string;
  description: string;
  dueDate?: string;
  fields: FieldMap;
  /** Parent the item must hang under; unchecked when absent */
  parentKey?: string;
}

export interface DiffOptions {
  /** Keep description-only changes instead of treating them as a no-op */
  force?: boolean;
}

export interface DiffResult {
  changes: ChangeSet;
  /** Changed keys in write order ("summary", "description", "dueDate", "parent", then field ids) */
  changedKeys: string[];
  /** True when nothing needs writing */
  empty: boolean;
  /** True when a description-only change was dropped */
  suppressed: boolean;
}

function sameText(a: string, b: string | undefined): boolean {
  return a.trim() === (b ?? "").trim();
}

export function diff(desired: DesiredState, current: RemoteItem, options: DiffOptions = {}): DiffResult {
  const changes: ChangeSet = { fields: new Map<string, FieldValue>() };
  const changedKeys: string[] = [];
  const fieldChanges = new Map<string, FieldValue>();

  if (!sameText(desired.summary, current.summary)) {
    changes.summary = desired.summary;
    changedKeys.push("summary");
  }
  if (!sameText(desired.description, current.description)) {
    changes.description = desired.description;
    changedKeys.push("description");
  }
  if (desired.dueDate !== undefined && !sameText(desired.dueDate, current.dueDate)) {
    changes.dueDate = desired.dueDate;
    changedKeys.push("dueDate");
  }
  if (desired.parentKey !== undefined && desired.parentKey !== current.parentKey) {
    changes.parentKey = desired.parentKey;
    changedKeys.push("parent");
  }

  for (const id of [...desired.fields.keys()].sort()) {
    const value = desired.fields.get(id);
    if (value === undefined) continue;
    if (!fieldValueMatches(value, current.fields.get(id))) {
      fieldChanges.set(id, value);
      changedKeys.push(id);
    }
  }
  changes.fields = fieldChanges;

  const descriptionOnly = changedKeys.length === 1 && changedKeys[0] === "description";
  if (descriptionOnly && !options.force) {
    return { changes: { fields: new Map() }, changedKeys: [], empty: true, suppressed: true };
  }

  return { changes, changedKeys, empty: changedKeys.length === 0, suppressed: false };
}
