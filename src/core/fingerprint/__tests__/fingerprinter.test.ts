import { describe, it, expect } from "vitest";
import * as crypto from "node:crypto";
import { canonicalJson, fingerprint, fingerprintItem, type FingerprintInput } from "../fingerprinter.js";
import { dateValue, numberValue, optionValue, stringValue } from "../../plan/models/fields.js";
import type { ContainerItem, UnitItem } from "../../plan/models/plan.js";

function input(overrides: Partial<FingerprintInput> = {}): FingerprintInput {
  return {
    summary: "WPO-1-1",
    description: "Unit 1 of 1 for order WPO-1",
    dueDate: "2024-03-01",
    fields: new Map([
      ["cf1", stringValue("WPO-1")],
      ["cf2", numberValue(3)],
    ]),
    ...overrides,
  };
}

describe("canonicalJson", () => {
  it("sorts keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: null, e: "x" }], c: true } })).toBe(
      '{"a":{"c":true,"d":[2,{"e":"x","f":null}]},"b":1}'
    );
  });
});

describe("fingerprint", () => {
  it("is a SHA-256 of the canonical encoding", () => {
    const expected = crypto
      .createHash("sha256")
      .update(
        '{"custom":{"cf1":{"kind":"string","value":"WPO-1"},"cf2":{"kind":"number","value":3}},' +
          '"description":"Unit 1 of 1 for order WPO-1","duedate":"2024-03-01","summary":"WPO-1-1"}'
      )
      .digest("hex");
    expect(fingerprint(input())).toBe(expected);
  });

  it("ignores field insertion order", () => {
    const reordered = input({
      fields: new Map([
        ["cf2", numberValue(3)],
        ["cf1", stringValue("WPO-1")],
      ]),
    });
    expect(fingerprint(reordered)).toBe(fingerprint(input()));
  });

  it("ignores surrounding whitespace in the description", () => {
    expect(fingerprint(input({ description: "  Unit 1 of 1 for order WPO-1\n" }))).toBe(fingerprint(input()));
  });

  it("ignores option references", () => {
    const bare = input({ fields: new Map([["cf3", optionValue("Approved")]]) });
    const resolved = input({ fields: new Map([["cf3", optionValue("Approved", "/api/v3/custom_options/1")]]) });
    expect(fingerprint(resolved)).toBe(fingerprint(bare));
  });

  it.each<[string, Partial<FingerprintInput>]>([
    ["summary", { summary: "WPO-1-2" }],
    ["description", { description: "Unit 1 of 2 for order WPO-1" }],
    ["due date", { dueDate: "2024-03-02" }],
    ["missing due date", { dueDate: undefined }],
    ["field value", { fields: new Map([["cf1", stringValue("WPO-9")], ["cf2", numberValue(3)]]) }],
    ["field kind", { fields: new Map([["cf1", stringValue("WPO-1")], ["cf2", stringValue("3")]]) }],
    ["extra field", { fields: new Map([["cf1", stringValue("WPO-1")], ["cf2", numberValue(3)], ["cf9", dateValue("2024-01-01")]]) }],
  ])("changes when the %s changes", (_label, overrides) => {
    expect(fingerprint(input(overrides))).not.toBe(fingerprint(input()));
  });
});

describe("fingerprintItem", () => {
  it("leaves the due date out for containers", () => {
    const container: ContainerItem = {
      kind: "container",
      identity: "WPO-1",
      summary: "ALPHA :: WPO-1",
      description: "",
      fields: new Map(),
    };
    expect(fingerprintItem(container)).toBe(fingerprint({ summary: "ALPHA :: WPO-1", description: "", fields: new Map() }));
  });

  it("includes the due date for units", () => {
    const unit: UnitItem = {
      kind: "unit",
      instance: 1,
      identity: "WPO-1-1",
      summary: "WPO-1-1",
      description: "Unit 1 of 1 for order WPO-1",
      dueDate: "2024-03-01",
      fields: input().fields,
    };
    expect(fingerprintItem(unit)).toBe(fingerprint(input()));
  });
});
