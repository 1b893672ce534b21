/**
 * Product Registry
 *
 * Maps a product name to the tracker project that receives its orders.
 * Lookups try the exact name first, then a normalized form (upper case,
 * runs of non-alphanumerics folded to "_").
 */

import { ConfigurationError, ErrorCode } from "../../errors.js";
import { readTextFileIfExists } from "../../../utils/fs.js";
import { ProductRegistrySchema, formatZodError } from "../../../utils/validation.js";

export function normalizeProduct(product: string): string {
  return product
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export class ProductRegistry {
  private readonly exact: ReadonlyMap<string, string>;
  private readonly normalized: ReadonlyMap<string, string>;

  constructor(entries: Readonly<Record<string, string>>) {
    const exact = new Map<string, string>();
    const normalized = new Map<string, string>();
    for (const [product, projectKey] of Object.entries(entries)) {
      const key = projectKey.trim();
      exact.set(product.trim(), key);
      const folded = normalizeProduct(product);
      if (!normalized.has(folded)) normalized.set(folded, key);
    }
    this.exact = exact;
    this.normalized = normalized;
  }

  /**
   * Load `{ "registry": { "<product>": "<project key>" } }` from disk
   *
   * @throws {ConfigurationError} when the file is missing or malformed
   */
  static async load(filePath: string): Promise<ProductRegistry> {
    const text = await readTextFileIfExists(filePath);
    if (text === null) {
      throw new ConfigurationError(`Product registry not found: ${filePath}`, ErrorCode.CONFIG_NOT_FOUND, {
        path: filePath,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ConfigurationError(`Product registry is not valid JSON: ${filePath}`, ErrorCode.REGISTRY_INVALID, {
        path: filePath,
      });
    }

    const parsed = ProductRegistrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Product registry is invalid: ${formatZodError(parsed.error).join("; ")}`,
        ErrorCode.REGISTRY_INVALID,
        { path: filePath }
      );
    }
    return new ProductRegistry(parsed.data.registry);
  }

  projectFor(product: string): string | undefined {
    return this.exact.get(product.trim()) ?? this.normalized.get(normalizeProduct(product));
  }

  products(): string[] {
    return [...this.exact.keys()].sort();
  }
}
