/**
 * Field Catalog
 *
 * Case-insensitive lookup from tracker display names to remote field ids.
 * Built once per run, either from a static field map or from the tracker's
 * custom-field listing.
 */

import {
  FIELD_DEFINITIONS,
  getFieldDefinition,
  type LogicalField,
} from "../models/field-definitions.js";

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

export class FieldCatalog {
  private readonly byName = new Map<string, string>();
  private readonly byRemoteId = new Map<string, LogicalField>();

  constructor(entries: Iterable<readonly [string, string]>) {
    for (const [name, remoteId] of entries) {
      const id = remoteId.trim();
      if (!id) continue;
      this.byName.set(normalizeName(name), id);
    }
    for (const def of FIELD_DEFINITIONS) {
      const id = this.byName.get(normalizeName(def.displayName));
      if (id) this.byRemoteId.set(id, def.field);
    }
  }

  static fromRecord(record: Readonly<Record<string, string>>): FieldCatalog {
    return new FieldCatalog(Object.entries(record));
  }

  static empty(): FieldCatalog {
    return new FieldCatalog([]);
  }

  /** Remote field id for a logical field, if the tracker has one */
  remoteIdFor(field: LogicalField): string | undefined {
    const def = getFieldDefinition(field);
    return def ? this.byName.get(normalizeName(def.displayName)) : undefined;
  }

  /** Reverse lookup for messages and reports */
  logicalFor(remoteId: string): LogicalField | undefined {
    return this.byRemoteId.get(remoteId);
  }

  /** Remote ids of every mapped logical field */
  mappedRemoteIds(): string[] {
    return [...this.byRemoteId.keys()];
  }

  get size(): number {
    return this.byName.size;
  }
}
