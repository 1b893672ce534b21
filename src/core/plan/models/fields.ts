/**
 * Field Value Model
 *
 * Typed field values carried by planned and remote items. A field map is an
 * ordered map from remote field id (e.g. "customField7") to a tagged value.
 */

// =============================================================================
// Tagged Values
// =============================================================================

export type FieldValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "date"; value: string }
  /** `ref` is the tracker-side option reference, filled in when known */
  | { kind: "option"; value: string; ref?: string };

export type FieldKind = FieldValue["kind"];

export type FieldMap = ReadonlyMap<string, FieldValue>;

export function stringValue(value: string): FieldValue {
  return { kind: "string", value };
}

export function numberValue(value: number): FieldValue {
  return { kind: "number", value };
}

export function dateValue(value: string): FieldValue {
  return { kind: "date", value };
}

export function optionValue(value: string, ref?: string): FieldValue {
  return ref === undefined ? { kind: "option", value } : { kind: "option", value, ref };
}

// =============================================================================
// Comparison & Encoding
// =============================================================================

/**
 * Whether the tracker's current value already equals the desired one. The
 * comparison follows the desired kind, since remote payloads do not say
 * whether "3" is text or a number. Option references are ignored: two
 * options with the same name are the same choice.
 */
export function fieldValueMatches(desired: FieldValue, current: FieldValue | undefined): boolean {
  if (current === undefined) return false;
  if (desired.kind === "number") {
    const text = String(current.value).trim();
    return text !== "" && Number(text) === desired.value;
  }
  if (desired.kind === "date") {
    return String(current.value).trim().slice(0, 10) === desired.value.trim();
  }
  return String(current.value).trim() === desired.value.trim();
}

/**
 * Whether a value counts as "present" for required-field checks
 */
export function isEmptyFieldValue(value: FieldValue | undefined): boolean {
  if (value === undefined) return true;
  if (value.kind === "number") return !Number.isFinite(value.value);
  return value.value.trim() === "";
}

/**
 * Plain, key-sorted object form of a field map. Option references are dropped
 * so that the encoding depends only on planned content.
 */
export function fieldMapToObject(fields: FieldMap): Record<string, { kind: FieldKind; value: string | number }> {
  const out: Record<string, { kind: FieldKind; value: string | number }> = {};
  for (const key of [...fields.keys()].sort()) {
    const value = fields.get(key);
    if (value) out[key] = { kind: value.kind, value: value.value };
  }
  return out;
}

export function formatFieldValue(value: FieldValue): string {
  return String(value.value);
}
