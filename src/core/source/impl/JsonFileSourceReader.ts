/**
 * Reads source rows from a JSON array file. Rows are validated as a whole;
 * a single malformed row rejects the file, naming the offending paths.
 */

import * as path from "node:path";
import { ErrorCode, SourceError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { readTextFileIfExists } from "../../../utils/fs.js";
import { SourceFileSchema, formatZodError } from "../../../utils/validation.js";
import type { SourceRecord } from "../../plan/models/plan.js";
import type { ISourceReader } from "../interfaces/ISourceReader.js";

const logger = createLogger("source-reader");

export interface JsonFileSourceReaderOptions {
  path: string;
  /** Keep only rows of these products */
  products?: readonly string[];
}

export class JsonFileSourceReader implements ISourceReader {
  readonly name: string;
  private readonly filePath: string;
  private readonly products?: ReadonlySet<string>;

  constructor(options: JsonFileSourceReaderOptions) {
    this.filePath = path.resolve(options.path);
    this.name = path.basename(this.filePath);
    if (options.products && options.products.length > 0) {
      this.products = new Set(options.products.map((p) => p.trim()));
    }
  }

  async read(): Promise<SourceRecord[]> {
    const text = await readTextFileIfExists(this.filePath);
    if (text === null) {
      throw new SourceError(`Source file not found: ${this.filePath}`, ErrorCode.SOURCE_READ_FAILED, {
        path: this.filePath,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new SourceError(`Source file is not valid JSON: ${this.filePath}`, ErrorCode.SOURCE_READ_FAILED, {
        path: this.filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = SourceFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = formatZodError(parsed.error);
      throw new SourceError(
        `Source file has invalid rows: ${issues.slice(0, 5).join("; ")}`,
        ErrorCode.SOURCE_ROW_INVALID,
        { path: this.filePath, issues }
      );
    }

    const products = this.products;
    const rows = products ? parsed.data.filter((row) => products.has(row.product.trim())) : parsed.data;
    logger.info({ source: this.name, rows: rows.length, total: parsed.data.length }, "Source rows read");
    return rows;
  }
}
