/**
 * Source Reader Interface
 *
 * Yields the work-order rows of one batch. Readers validate every row and
 * throw SourceError when the input cannot be used.
 */

import type { SourceRecord } from "../../plan/models/plan.js";

export interface ISourceReader {
  /** Human-readable origin, used in logs and reports */
  readonly name: string;

  read(): Promise<SourceRecord[]>;
}
