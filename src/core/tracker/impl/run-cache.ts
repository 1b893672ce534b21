/**
 * Per-run tracker metadata cache.
 *
 * Project ids, type ids, the custom-field catalog, option references and
 * workflow statuses are
 * fetched at most once per reconciliation pass and shared by all order
 * workers. Concurrent callers await the same in-flight request. Failures are
 * not cached, so the next caller retries.
 */

import { ErrorCode } from "../../errors.js";
import { err, ok } from "../../../types/result.js";
import { FieldCatalog } from "../../plan/impl/field-catalog.js";
import type { ITrackerClient, TrackerResult } from "../interfaces/ITrackerClient.js";
import type { TrackerProject, TrackerStatus } from "../models/tracker-models.js";

const SINGLETON = "*";

export class RunCache {
  private readonly client: ITrackerClient;
  private readonly staticFieldMap?: Readonly<Record<string, string>>;

  private readonly projects = new Map<string, Promise<TrackerResult<TrackerProject>>>();
  private readonly types = new Map<string, Promise<TrackerResult<Map<string, string>>>>();
  private readonly catalogs = new Map<string, Promise<TrackerResult<FieldCatalog>>>();
  private readonly options = new Map<string, Promise<TrackerResult<Map<string, string>>>>();
  private readonly statuses = new Map<string, Promise<TrackerResult<Map<string, TrackerStatus>>>>();

  /**
   * @param staticFieldMap - display name → remote field id; skips discovery when given
   */
  constructor(client: ITrackerClient, staticFieldMap?: Readonly<Record<string, string>>) {
    this.client = client;
    this.staticFieldMap = staticFieldMap;
  }

  project(projectKey: string): Promise<TrackerResult<TrackerProject>> {
    return memo(this.projects, projectKey, () => this.client.resolveProject(projectKey));
  }

  /**
   * Type id by case-insensitive name within a project
   */
  async typeId(projectId: string, typeName: string): Promise<TrackerResult<string>> {
    const types = await memo(this.types, projectId, async () => {
      const listed = await this.client.listTypes(projectId);
      if (!listed.ok) return listed;
      return ok(new Map(listed.value.map((t) => [t.name.trim().toLowerCase(), t.id])));
    });
    if (!types.ok) return types;
    const id = types.value.get(typeName.trim().toLowerCase());
    if (id === undefined) {
      return err({
        status: 0,
        code: ErrorCode.TRACKER_TYPE_NOT_FOUND,
        message: `Type "${typeName}" is not enabled in project ${projectId}`,
      });
    }
    return ok(id);
  }

  fieldCatalog(): Promise<TrackerResult<FieldCatalog>> {
    const staticMap = this.staticFieldMap;
    if (staticMap) return Promise.resolve(ok(FieldCatalog.fromRecord(staticMap)));
    return memo(this.catalogs, SINGLETON, async () => {
      const listed = await this.client.listCustomFields();
      if (!listed.ok) return listed;
      return ok(new FieldCatalog(listed.value.map((cf): [string, string] => [cf.name, cf.id])));
    });
  }

  /**
   * Reference of the custom option whose value matches (case-insensitive),
   * or undefined when the tracker has no such option
   */
  async optionRef(value: string): Promise<TrackerResult<string | undefined>> {
    const options = await memo(this.options, SINGLETON, async () => {
      const listed = await this.client.listCustomOptions();
      if (!listed.ok) return listed;
      return ok(new Map(listed.value.map((o) => [o.value.trim().toLowerCase(), o.href])));
    });
    if (!options.ok) return options;
    return ok(options.value.get(value.trim().toLowerCase()));
  }

  /**
   * Workflow status by case-insensitive name, or undefined when the tracker
   * has none by that name
   */
  async status(name: string): Promise<TrackerResult<TrackerStatus | undefined>> {
    const statuses = await memo(this.statuses, SINGLETON, async () => {
      const listed = await this.client.listStatuses();
      if (!listed.ok) return listed;
      return ok(new Map(listed.value.map((s) => [s.name.trim().toLowerCase(), s])));
    });
    if (!statuses.ok) return statuses;
    return ok(statuses.value.get(name.trim().toLowerCase()));
  }
}

function memo<T>(
  cache: Map<string, Promise<TrackerResult<T>>>,
  key: string,
  load: () => Promise<TrackerResult<T>>
): Promise<TrackerResult<T>> {
  const cached = cache.get(key);
  if (cached) return cached;
  const pending = load();
  cache.set(key, pending);
  const evict = (): void => {
    if (cache.get(key) === pending) cache.delete(key);
  };
  void pending.then((result) => {
    if (!result.ok) evict();
  }, evict);
  return pending;
}
