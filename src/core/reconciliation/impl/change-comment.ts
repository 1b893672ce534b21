/**
 * Audit comment posted on an item after the sync changed it.
 */

import type { DiffResult } from "../../diff/diff-engine.js";
import type { FieldCatalog } from "../../plan/impl/field-catalog.js";
import { getFieldDefinition } from "../../plan/models/field-definitions.js";
import { formatFieldValue, type FieldValue } from "../../plan/models/fields.js";
import type { PlannedItem } from "../../plan/models/plan.js";
import type { RemoteItem } from "../../tracker/models/tracker-models.js";

const MAX_LINES = 6;
const EMPTY = "(empty)";

export interface ChangeCommentContext {
  projectKey: string;
  orderId: string;
  item: PlannedItem;
}

function shown(value: FieldValue | string | undefined): string {
  if (value === undefined) return EMPTY;
  const text = typeof value === "string" ? value : formatFieldValue(value);
  return text.trim() === "" ? EMPTY : text;
}

function fieldName(remoteId: string, catalog: FieldCatalog): string {
  const field = catalog.logicalFor(remoteId);
  return (field && getFieldDefinition(field)?.displayName) ?? remoteId;
}

/**
 * Markdown comment listing what an update changed, or undefined when the
 * update touched nothing worth reporting (a parent move alone)
 */
export function buildChangeComment(
  context: ChangeCommentContext,
  current: RemoteItem,
  changes: DiffResult,
  catalog: FieldCatalog
): string | undefined {
  const { changes: written } = changes;
  const lines: string[] = [];
  for (const key of changes.changedKeys) {
    switch (key) {
      case "summary":
        lines.push(`- Summary: ${shown(current.summary)} → ${shown(written.summary)}`);
        break;
      case "description":
        lines.push("- Description updated");
        break;
      case "dueDate":
        lines.push(`- Due date: ${shown(current.dueDate)} → ${shown(written.dueDate)}`);
        break;
      case "parent":
        break;
      default:
        lines.push(`- ${fieldName(key, catalog)}: ${shown(current.fields.get(key))} → ${shown(written.fields.get(key))}`);
    }
  }
  if (lines.length === 0) return undefined;

  const { item } = context;
  const instance = item.kind === "unit" ? ` #${item.instance}` : "";
  const listed = lines.slice(0, MAX_LINES);
  if (lines.length > MAX_LINES) listed.push(`- and ${lines.length - MAX_LINES} more`);
  return [`Order sync | ${context.projectKey} ${item.kind}`, `Order: ${context.orderId}${instance}`, "Changes:", ...listed].join(
    "\n"
  );
}
