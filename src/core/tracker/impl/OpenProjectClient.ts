/**
 * OpenProject Tracker Client
 *
 * ITrackerClient over the OpenProject REST API (v3, HAL+JSON) using fetch.
 * Work packages carry a `lockVersion` that serves as the version token;
 * custom fields appear as `customFieldN` attributes or `_links` entries.
 *
 * @module
 */

import { z } from "zod";
import { ErrorCode, toError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { err, ok, type Result } from "../../../types/result.js";
import type { ITrackerClient, TrackerResult } from "../interfaces/ITrackerClient.js";
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
import {
  CollectionSchema,
  CustomFieldSchema,
  CustomOptionSchema,
  ErrorBodySchema,
  ProjectSchema,
  StatusSchema,
  TypeSchema,
  WORK_PACKAGES_PATH,
  WorkPackageSchema,
  changeSetToPayload,
  fieldsToPayload,
  toCustomOption,
  toRemoteItem,
  toTrackerStatus,
  toTrackerType,
  workPackageHref,
  type WorkPackagePayload,
} from "./hal.js";

const logger = createLogger("openproject-client");

/** Upper bound on pages followed by one listing call */
const MAX_PAGES = 100;

export interface OpenProjectClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  pageSize?: number;
  /** Injected for tests */
  fetch?: typeof fetch;
  now?: () => number;
}

type HttpMethod = "GET" | "POST" | "PATCH";

interface RequestOptions {
  query?: Record<string, string | number>;
  body?: unknown;
}

/**
 * Milliseconds to wait according to a Retry-After header (delta-seconds or
 * HTTP date), or undefined when absent or unparseable
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (header === null) return undefined;
  const text = header.trim();
  if (!text) return undefined;
  if (/^\d+(\.\d+)?$/.test(text)) return Math.round(Number(text) * 1000);
  const at = Date.parse(text);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

function codeForStatus(status: number): ErrorCode {
  switch (status) {
    case 404:
    case 410:
      return ErrorCode.TRACKER_NOT_FOUND;
    case 409:
      return ErrorCode.TRACKER_CONFLICT;
    case 429:
      return ErrorCode.TRACKER_RATE_LIMITED;
    default:
      return ErrorCode.TRACKER_REJECTED;
  }
}

export class OpenProjectClient implements ITrackerClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;

  constructor(options: OpenProjectClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`apikey:${options.apiKey}`, "utf8").toString("base64")}`;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.pageSize = options.pageSize ?? 50;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  // ===========================================================================
  // ITrackerClient
  // ===========================================================================

  async resolveProject(projectKey: string): Promise<TrackerResult<TrackerProject>> {
    const direct = await this.request("GET", `/api/v3/projects/${encodeURIComponent(projectKey)}`);
    if (direct.ok) return this.parse(direct.value, ProjectSchema, toProject);
    if (direct.error.status !== 404) return direct;

    const filters = JSON.stringify([{ name_and_identifier: { operator: "~", values: [projectKey] } }]);
    const listing = await this.list("/api/v3/projects", ProjectSchema, { filters });
    if (!listing.ok) return listing;

    const wanted = projectKey.trim().toLowerCase();
    const match = listing.value.find(
      (p) => p.identifier.toLowerCase() === wanted || p.name.trim().toLowerCase() === wanted
    );
    if (!match) {
      return err({
        status: 404,
        code: ErrorCode.TRACKER_PROJECT_NOT_FOUND,
        message: `Project not found: ${projectKey}`,
      });
    }
    return ok(toProject(match));
  }

  async listTypes(projectId: string): Promise<TrackerResult<TrackerType[]>> {
    const result = await this.list(`/api/v3/projects/${projectId}/types`, TypeSchema);
    return result.ok ? ok(result.value.map(toTrackerType)) : result;
  }

  async createItem(input: CreateItemInput): Promise<TrackerResult<RemoteItem>> {
    const payload: WorkPackagePayload = {
      body: {
        subject: input.summary,
        description: { format: "markdown", raw: input.description },
      },
      links: {
        project: { href: `/api/v3/projects/${input.projectId}` },
        type: { href: `/api/v3/types/${input.typeId}` },
      },
    };
    if (input.dueDate) payload.body["dueDate"] = input.dueDate;
    if (input.parentKey) payload.links["parent"] = { href: workPackageHref(input.parentKey) };
    fieldsToPayload(input.fields, payload);

    const result = await this.request("POST", WORK_PACKAGES_PATH, { body: { ...payload.body, _links: payload.links } });
    if (!result.ok) return result;
    return this.parse(result.value, WorkPackageSchema, toRemoteItem);
  }

  async updateItem(key: string, changes: ChangeSet, versionToken: number): Promise<TrackerResult<RemoteItem>> {
    const result = await this.request("PATCH", workPackageHref(key), { body: changeSetToPayload(changes, versionToken) });
    if (!result.ok) return result;
    return this.parse(result.value, WorkPackageSchema, toRemoteItem);
  }

  async getItem(key: string): Promise<TrackerResult<RemoteItem>> {
    const result = await this.request("GET", workPackageHref(key));
    if (!result.ok) return result;
    return this.parse(result.value, WorkPackageSchema, toRemoteItem);
  }

  async addComment(key: string, text: string): Promise<TrackerResult<void>> {
    const result = await this.request("POST", `${workPackageHref(key)}/activities`, {
      body: { comment: { format: "markdown", raw: text } },
    });
    return result.ok ? ok(undefined) : result;
  }

  /**
   * Every work package whose subject contains the query text, across all
   * pages and statuses, oldest first
   */
  async searchItems(query: SearchQuery): Promise<TrackerResult<RemoteItem[]>> {
    const filters: Record<string, { operator: string; values: string[] }>[] = [
      { subject: { operator: "~", values: [query.summary] } },
      { status: { operator: "*", values: [] } },
    ];
    if (query.typeId) filters.push({ type: { operator: "=", values: [query.typeId] } });

    const result = await this.list(`/api/v3/projects/${query.projectId}/work_packages`, WorkPackageSchema, {
      filters: JSON.stringify(filters),
      sortBy: JSON.stringify([["id", "asc"]]),
    });
    return result.ok ? ok(result.value.map(toRemoteItem)) : result;
  }

  async listCustomFields(): Promise<TrackerResult<CustomFieldInfo[]>> {
    const result = await this.list("/api/v3/custom_fields", CustomFieldSchema);
    return result.ok ? ok(result.value.map((cf) => ({ id: `customField${cf.id}`, name: cf.name }))) : result;
  }

  async listCustomOptions(): Promise<TrackerResult<CustomOption[]>> {
    const result = await this.list("/api/v3/custom_options", CustomOptionSchema);
    return result.ok ? ok(result.value.map(toCustomOption)) : result;
  }

  async listStatuses(): Promise<TrackerResult<TrackerStatus[]>> {
    const result = await this.list("/api/v3/statuses", StatusSchema);
    return result.ok ? ok(result.value.map(toTrackerStatus)) : result;
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<TrackerResult<unknown>> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(name, String(value));
    }

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), {
        method,
        headers: {
          Accept: "application/hal+json, application/json",
          "Content-Type": "application/json",
          Authorization: this.authorization,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const cause = toError(error);
      const timedOut = cause.name === "TimeoutError" || cause.name === "AbortError";
      logger.debug({ method, path, err: cause }, "Tracker request did not complete");
      return err({
        status: 0,
        code: timedOut ? ErrorCode.TRACKER_TIMEOUT : ErrorCode.TRACKER_UNREACHABLE,
        message: timedOut ? `${method} ${path} timed out after ${this.timeoutMs}ms` : cause.message,
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const cause = toError(error);
      const timedOut = cause.name === "TimeoutError" || cause.name === "AbortError";
      logger.debug({ method, path, status: response.status, err: cause }, "Tracker response body could not be read");
      return err({
        status: 0,
        code: timedOut ? ErrorCode.TRACKER_TIMEOUT : ErrorCode.TRACKER_UNREACHABLE,
        message: `${method} ${path} response could not be read: ${cause.message}`,
      });
    }
    if (!response.ok) {
      const failure: TrackerFailure = {
        status: response.status,
        code: codeForStatus(response.status),
        message: this.errorMessage(response.status, text),
      };
      const retryAfterMs = parseRetryAfter(response.headers.get("Retry-After"), this.now());
      if (retryAfterMs !== undefined) failure.retryAfterMs = retryAfterMs;
      logger.debug({ method, path, status: response.status }, "Tracker request failed");
      return err(failure);
    }

    if (!text) return ok(null);
    const parsed = parseJson(text);
    return parsed.ok ? parsed : err(this.malformed(`${method} ${path} response`));
  }

  /**
   * Follow offset pagination of a HAL collection, keeping elements that match
   * the schema
   */
  private async list<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query: Record<string, string | number> = {}
  ): Promise<TrackerResult<T[]>> {
    const items: T[] = [];
    const pageSize = Math.max(this.pageSize, 100);
    for (let page = 1; page <= MAX_PAGES; page++) {
      const result = await this.request("GET", path, { query: { ...query, pageSize, offset: page } });
      if (!result.ok) return result;
      const collection = CollectionSchema.safeParse(result.value);
      if (!collection.success) return err(this.malformed(`${path} collection`));

      const elements = collection.data._embedded.elements;
      for (const element of elements) {
        const parsed = schema.safeParse(element);
        if (parsed.success) items.push(parsed.data);
      }

      const total = collection.data.total;
      if (elements.length < pageSize || total === undefined || page * pageSize >= total) break;
    }
    return ok(items);
  }

  private parse<S, T>(
    raw: unknown,
    schema: z.ZodType<S, z.ZodTypeDef, unknown>,
    convert: (value: S) => T
  ): TrackerResult<T> {
    const parsed = schema.safeParse(raw);
    return parsed.success ? ok(convert(parsed.data)) : err(this.malformed("response"));
  }

  private malformed(what: string): TrackerFailure {
    return { status: 0, code: ErrorCode.TRACKER_REJECTED, message: `Unexpected ${what} from tracker` };
  }

  private errorMessage(status: number, text: string): string {
    const parsed = parseJson(text);
    const body = parsed.ok ? ErrorBodySchema.safeParse(parsed.value) : undefined;
    if (body?.success) return body.data.message;
    return text.trim() ? text.trim().slice(0, 300) : `HTTP ${status}`;
  }
}

function parseJson(text: string): Result<unknown, Error> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (error) {
    return err(toError(error));
  }
}

function toProject(raw: z.infer<typeof ProjectSchema>): TrackerProject {
  return { id: String(raw.id), identifier: raw.identifier, name: raw.name };
}
