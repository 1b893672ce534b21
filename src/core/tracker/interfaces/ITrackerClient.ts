/**
 * Remote Tracker Client Interface
 *
 * The reconciliation engine depends only on this contract. Every call
 * resolves to a Result: expected HTTP failures come back as values so the
 * caller can classify them (retry, conflict, self-heal, terminal).
 */

import type { Result } from "../../../types/result.js";
import type {
  ChangeSet,
  CreateItemInput,
  CustomFieldInfo,
  CustomOption,
  RemoteItem,
  SearchQuery,
  TrackerFailure,
  TrackerProject,
  TrackerStatus,
  TrackerType,
} from "../models/tracker-models.js";

export type TrackerResult<T> = Result<T, TrackerFailure>;

export interface ITrackerClient {
  /** Look up a project by its logical key (identifier or name) */
  resolveProject(projectKey: string): Promise<TrackerResult<TrackerProject>>;

  listTypes(projectId: string): Promise<TrackerResult<TrackerType[]>>;

  createItem(input: CreateItemInput): Promise<TrackerResult<RemoteItem>>;

  /**
   * Apply a change set. Fails with status 409 when `versionToken` is stale
   * and 404 when the item no longer exists.
   */
  updateItem(key: string, changes: ChangeSet, versionToken: number): Promise<TrackerResult<RemoteItem>>;

  getItem(key: string): Promise<TrackerResult<RemoteItem>>;

  /** Post a markdown comment to an item's activity */
  addComment(key: string, text: string): Promise<TrackerResult<void>>;

  searchItems(query: SearchQuery): Promise<TrackerResult<RemoteItem[]>>;

  listCustomFields(): Promise<TrackerResult<CustomFieldInfo[]>>;

  listCustomOptions(): Promise<TrackerResult<CustomOption[]>>;

  listStatuses(): Promise<TrackerResult<TrackerStatus[]>>;
}
