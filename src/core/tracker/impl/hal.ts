/**
 * HAL+JSON response schemas and converters for the OpenProject API (v3).
 */

import { z } from "zod";
import {
  dateValue,
  numberValue,
  optionValue,
  stringValue,
  type FieldMap,
  type FieldValue,
} from "../../plan/models/fields.js";
import type { ChangeSet, CustomOption, RemoteItem, TrackerStatus, TrackerType } from "../models/tracker-models.js";

const LinkSchema = z.object({
  href: z.string().nullable().optional(),
  title: z.string().optional(),
});

export const CollectionSchema = z.object({
  total: z.number().optional(),
  count: z.number().optional(),
  _embedded: z.object({ elements: z.array(z.unknown()) }),
});

export const WorkPackageSchema = z
  .object({
    id: z.number(),
    subject: z.string(),
    description: z.object({ raw: z.string().nullable().optional() }).nullable().optional(),
    dueDate: z.string().nullable().optional(),
    lockVersion: z.number(),
    _links: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ProjectSchema = z.object({
  id: z.number(),
  identifier: z.string(),
  name: z.string(),
});

const NamedElementSchema = z.object({ id: z.number(), name: z.string() });

export const TypeSchema = NamedElementSchema;

export const StatusSchema = NamedElementSchema.extend({ isClosed: z.boolean().optional() });

export const CustomFieldSchema = NamedElementSchema;

export const CustomOptionSchema = z.object({
  id: z.number(),
  value: z.string().optional(),
  title: z.string().optional(),
  name: z.string().optional(),
  _links: z.object({ self: LinkSchema.optional() }).optional(),
});

export const ErrorBodySchema = z.object({ message: z.string() });

const CUSTOM_FIELD_KEY = /^customField\d+$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export const WORK_PACKAGES_PATH = "/api/v3/work_packages";

export function workPackageHref(key: string): string {
  return `${WORK_PACKAGES_PATH}/${key}`;
}

export function statusHref(id: string): string {
  return `/api/v3/statuses/${id}`;
}

/** Last path segment of an href ("/api/v3/work_packages/42" → "42") */
export function idFromHref(href: string): string {
  const parts = href.split("/").filter((p) => p !== "");
  return parts[parts.length - 1] ?? href;
}

function linkValue(raw: unknown): FieldValue | undefined {
  const first = Array.isArray(raw) ? raw[0] : raw;
  const link = LinkSchema.safeParse(first);
  if (!link.success || !link.data.href) return undefined;
  return optionValue(link.data.title ?? idFromHref(link.data.href), link.data.href);
}

function scalarValue(raw: unknown): FieldValue | undefined {
  if (typeof raw === "number") return numberValue(raw);
  if (typeof raw === "string") return DATE_ONLY.test(raw) ? dateValue(raw) : stringValue(raw);
  if (typeof raw === "boolean") return stringValue(String(raw));
  const formattable = z.object({ raw: z.string().nullable() }).safeParse(raw);
  if (formattable.success && formattable.data.raw !== null) return stringValue(formattable.data.raw);
  return undefined;
}

export function toRemoteItem(wp: z.infer<typeof WorkPackageSchema>): RemoteItem {
  const fields = new Map<string, FieldValue>();
  for (const [key, raw] of Object.entries(wp)) {
    if (!CUSTOM_FIELD_KEY.test(key)) continue;
    const value = scalarValue(raw);
    if (value) fields.set(key, value);
  }
  const links = wp._links ?? {};
  for (const [key, raw] of Object.entries(links)) {
    if (!CUSTOM_FIELD_KEY.test(key)) continue;
    const value = linkValue(raw);
    if (value) fields.set(key, value);
  }

  const item: RemoteItem = {
    key: String(wp.id),
    summary: wp.subject,
    description: wp.description?.raw ?? "",
    fields,
    versionToken: wp.lockVersion,
  };
  if (wp.dueDate) item.dueDate = wp.dueDate;
  const parent = LinkSchema.safeParse(links["parent"]);
  if (parent.success && parent.data.href) item.parentKey = idFromHref(parent.data.href);
  const status = LinkSchema.safeParse(links["status"]);
  if (status.success && status.data.title) item.status = status.data.title;
  return item;
}

export function toTrackerType(raw: z.infer<typeof TypeSchema>): TrackerType {
  return { id: String(raw.id), name: raw.name };
}

export function toTrackerStatus(raw: z.infer<typeof StatusSchema>): TrackerStatus {
  return { id: String(raw.id), name: raw.name, isClosed: raw.isClosed ?? false };
}

export function toCustomOption(raw: z.infer<typeof CustomOptionSchema>): CustomOption {
  return {
    id: String(raw.id),
    value: raw.value ?? raw.title ?? raw.name ?? String(raw.id),
    href: raw._links?.self?.href ?? `/api/v3/custom_options/${raw.id}`,
  };
}

// =============================================================================
// Request Payloads
// =============================================================================

export interface WorkPackagePayload {
  body: Record<string, unknown>;
  links: Record<string, { href: string }>;
}

/**
 * Custom-field values go into the body; option values go into `_links`
 * when their reference is known.
 */
export function fieldsToPayload(fields: FieldMap, payload: WorkPackagePayload): void {
  for (const [id, value] of fields) {
    if (value.kind === "option" && value.ref) {
      payload.links[id] = { href: value.ref };
    } else {
      payload.body[id] = value.value;
    }
  }
}

export function changeSetToPayload(changes: ChangeSet, versionToken: number): Record<string, unknown> {
  const payload: WorkPackagePayload = { body: { lockVersion: versionToken }, links: {} };
  if (changes.summary !== undefined) payload.body["subject"] = changes.summary;
  if (changes.description !== undefined) payload.body["description"] = { format: "markdown", raw: changes.description };
  if (changes.dueDate !== undefined) payload.body["dueDate"] = changes.dueDate;
  if (changes.parentKey !== undefined) payload.links["parent"] = { href: workPackageHref(changes.parentKey) };
  if (changes.statusId !== undefined) payload.links["status"] = { href: statusHref(changes.statusId) };
  fieldsToPayload(changes.fields, payload);
  return Object.keys(payload.links).length > 0 ? { ...payload.body, _links: payload.links } : payload.body;
}
