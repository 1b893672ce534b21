/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration and data at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";
import { DEFAULT_REQUIRED_FIELDS, isLogicalField, type LogicalField } from "../core/plan/models/field-definitions.js";

// =============================================================================
// Shared Pieces
// =============================================================================

const LogicalFieldSchema = z.custom<LogicalField>((value) => typeof value === "string" && isLogicalField(value), {
  message: "Unknown logical field",
});

const SourceScalarSchema = z.union([z.string(), z.number(), z.null()]).optional();

/** Key columns may arrive as numbers in spreadsheet exports */
const KeyTextSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

// =============================================================================
// Sync Configuration Schema
// =============================================================================

export const TrackerConfigSchema = z.object({
  /** Base URL of the tracker, e.g. https://tracker.example.com */
  baseUrl: z.string().url(),

  /** Name of the environment variable holding the API key */
  apiKeyEnv: z.string().min(1).default("OPENPROJECT_API_KEY"),

  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(30000),

  /** Work-package type names used for containers and units */
  containerType: z.string().min(1).default("Epic"),
  unitType: z.string().min(1).default("User story"),

  /** Page size for list and search calls */
  pageSize: z.number().int().positive().max(1000).default(50),
});

export const IdentityStoreConfigSchema = z.object({
  backend: z.enum(["sqlite", "file"]).default("sqlite"),
  path: z.string().min(1).default(".order-sync/data/identity.db"),
});

export const RequiredFieldsSchema = z.object({
  container: z.array(LogicalFieldSchema).default(DEFAULT_REQUIRED_FIELDS.container),
  unit: z.array(LogicalFieldSchema).default(DEFAULT_REQUIRED_FIELDS.unit),
});

export type RequiredFieldSpec = z.infer<typeof RequiredFieldsSchema>;

export const ReconcileConfigSchema = z.object({
  /** Orders processed concurrently */
  workerCount: z.number().int().min(1).max(64).default(6),

  /** Concurrent unit creates under a newly created container */
  unitWorkers: z.number().int().min(1).max(64).default(4),

  /** Retries after the first attempt, per remote write */
  maxRetries: z.number().int().min(0).max(20).default(3),

  backoffBaseMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().min(0).default(30000),
  retryAfterCapMs: z.number().int().min(0).default(60000),
  jitterMs: z.number().int().min(0).default(250),

  /** Timeout applied to every remote call */
  callTimeoutMs: z.number().int().positive().default(30000),

  /** When false, any validation error blocks the whole run */
  continueOnError: z.boolean().default(true),

  /** Write the order status onto unit items as well */
  unitStatusEnabled: z.boolean().default(false),

  /** Comment on each updated item with the changes made */
  changeComments: z.boolean().default(true),
});

export const SyncConfigSchema = z.object({
  tracker: TrackerConfigSchema,
  identityStore: IdentityStoreConfigSchema.default({}),

  /** Product → project registry JSON */
  registryPath: z.string().min(1),

  /** Static display-name → remote-field-id map; discovered from the tracker when absent */
  fieldMapPath: z.string().min(1).optional(),

  requiredFields: RequiredFieldsSchema.default({}),
  reconcile: ReconcileConfigSchema.default({}),

  /** Whole-batch deadline */
  deadlineMs: z.number().int().positive().optional(),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

// =============================================================================
// Data File Schemas
// =============================================================================

/**
 * Product registry: `{ "registry": { "<product>": "<project key>" } }`
 */
export const ProductRegistrySchema = z.object({
  registry: z.record(z.string().min(1)),
});

/**
 * Display name → remote field id (e.g. "WPR WP Order ID" → "customField7")
 */
export const FieldMapSchema = z.record(z.string().min(1));

export const SourceRecordSchema = z.object({
  product: KeyTextSchema,
  orderId: KeyTextSchema,
  status: SourceScalarSchema,
  quantity: SourceScalarSchema,

  projectName: SourceScalarSchema,
  domain: SourceScalarSchema,
  customer: SourceScalarSchema,
  bpId: SourceScalarSchema,
  wpId: SourceScalarSchema,
  wpName: SourceScalarSchema,
  employeeName: SourceScalarSchema,
  std: SourceScalarSchema,

  acknowledgementDate: SourceScalarSchema,
  addedDate: SourceScalarSchema,
  approvedDate: SourceScalarSchema,
  cancelledDate: SourceScalarSchema,
  poStartDate: SourceScalarSchema,
  poEndDate: SourceScalarSchema,
  readinessDate: SourceScalarSchema,
  requestedDate: SourceScalarSchema,
  submittedDate: SourceScalarSchema,
  updatedDate: SourceScalarSchema,

  rowTimestamp: z.string().optional(),
});

export const SourceFileSchema = z.array(SourceRecordSchema);

// =============================================================================
// Identity Catalog File Schema
// =============================================================================

export const IdentityEntrySchema = z.object({
  project: z.string(),
  kind: z.enum(["container", "unit"]),
  orderId: z.string(),
  instance: z.number().int().positive().optional(),
  remoteKey: z.string().min(1),
  fingerprint: z.string().nullable(),
  timestamp: z.string(),
});

export const IdentityCatalogFileSchema = z.object({
  version: z.literal(1),
  items: z.record(IdentityEntrySchema).default({}),
  /** project → orderId → last processed timestamp */
  checkpoints: z.record(z.record(z.string())).default({}),
  /** product → orderId → latest row timestamp */
  rowTimestamps: z.record(z.record(z.string())).default({}),
});

export type IdentityCatalogFile = z.infer<typeof IdentityCatalogFileSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
