/**
 * Tracker Models
 *
 * Tracker-neutral shapes exchanged between the reconciliation engine and a
 * remote tracker client.
 */

import type { ErrorCode } from "../../errors.js";
import type { FieldMap } from "../../plan/models/fields.js";

/**
 * Current remote representation of a previously applied item
 */
export interface RemoteItem {
  key: string;
  summary: string;
  description: string;
  dueDate?: string;
  fields: FieldMap;
  /** Optimistic-concurrency token; must match on update */
  versionToken: number;
  parentKey?: string;
  /** Name of the workflow status, when the tracker reports it */
  status?: string;
}

export interface TrackerProject {
  id: string;
  identifier: string;
  name: string;
}

export interface TrackerType {
  id: string;
  name: string;
}

export interface CustomFieldInfo {
  /** Attribute id used in payloads, e.g. "customField7" */
  id: string;
  name: string;
}

export interface CustomOption {
  id: string;
  value: string;
  /** Reference written into option-valued fields */
  href: string;
}

export interface TrackerStatus {
  id: string;
  name: string;
  isClosed: boolean;
}

export interface CreateItemInput {
  projectId: string;
  typeId: string;
  summary: string;
  description: string;
  dueDate?: string;
  fields: FieldMap;
  parentKey?: string;
}

/**
 * Minimal set of remote changes. Only present keys are written.
 */
export interface ChangeSet {
  summary?: string;
  description?: string;
  dueDate?: string;
  parentKey?: string;
  /** Workflow status to move the item to */
  statusId?: string;
  fields: FieldMap;
}

export interface SearchQuery {
  projectId: string;
  /** Substring the summary must contain */
  summary: string;
  typeId?: string;
}

/**
 * Why a tracker call did not succeed. `status` is the HTTP status, or 0 when
 * no response arrived (network failure, timeout).
 */
export interface TrackerFailure {
  status: number;
  code: ErrorCode;
  message: string;
  /** Server-provided retry hint */
  retryAfterMs?: number;
}
