import { describe, it, expect } from "vitest";
import { diff, type DesiredState } from "../../diff/diff-engine.js";
import { FieldCatalog } from "../../plan/impl/field-catalog.js";
import { optionValue, stringValue } from "../../plan/models/fields.js";
import type { ContainerItem, UnitItem } from "../../plan/models/plan.js";
import type { RemoteItem } from "../../tracker/models/tracker-models.js";
import { buildChangeComment } from "../impl/change-comment.js";

const catalog = FieldCatalog.fromRecord({
  "WPR Domain": "cf1",
  "WPR WP ID": "cf2",
  "WPR WP Name": "cf3",
  "WPR WP Order Status": "cf6",
});

const unit: UnitItem = {
  kind: "unit",
  instance: 2,
  identity: "WPO-1-2",
  summary: "WPO-1-2",
  description: "Unit 2 of 2",
  fields: new Map(),
};

const container: ContainerItem = {
  kind: "container",
  identity: "WPO-1",
  summary: "ALPHA :: WPO-1",
  description: "",
  fields: new Map(),
};

function remote(overrides: Partial<RemoteItem> = {}): RemoteItem {
  return { key: "101", summary: "WPO-1-2", description: "Unit 2 of 2", fields: new Map(), versionToken: 3, ...overrides };
}

function desired(overrides: Partial<DesiredState> = {}): DesiredState {
  return { summary: "WPO-1-2", description: "Unit 2 of 2", fields: new Map(), ...overrides };
}

describe("buildChangeComment", () => {
  it("lists at most six changes and counts the rest", () => {
    const current = remote({ summary: "WPO-1-2 (old)" });
    const changes = diff(
      desired({
        description: "Unit 2 of 2\n\n**WPR WP Name**: Cabling",
        dueDate: "2024-03-01",
        parentKey: "100",
        fields: new Map([
          ["cf1", stringValue("Transport")],
          ["cf2", stringValue("WP-7")],
          ["cf3", stringValue("Cabling")],
          ["cf4", stringValue("x")],
          ["cf5", stringValue("y")],
        ]),
      }),
      current
    );

    expect(buildChangeComment({ projectKey: "apollo", orderId: "WPO-1", item: unit }, current, changes, catalog)).toBe(
      [
        "Order sync | apollo unit",
        "Order: WPO-1 #2",
        "Changes:",
        "- Summary: WPO-1-2 (old) → WPO-1-2",
        "- Description updated",
        "- Due date: (empty) → 2024-03-01",
        "- WPR Domain: (empty) → Transport",
        "- WPR WP ID: (empty) → WP-7",
        "- WPR WP Name: (empty) → Cabling",
        "- and 2 more",
      ].join("\n")
    );
  });

  it("shows option values by name and unmapped fields by id", () => {
    const current = remote({
      fields: new Map([
        ["cf6", optionValue("Approved", "/api/v3/custom_options/1")],
        ["cf9", stringValue("old")],
      ]),
    });
    const changes = diff(
      desired({
        fields: new Map([
          ["cf6", optionValue("Cancelled", "/api/v3/custom_options/2")],
          ["cf9", stringValue("new")],
        ]),
      }),
      current
    );

    expect(buildChangeComment({ projectKey: "apollo", orderId: "WPO-1", item: container }, current, changes, catalog)).toBe(
      [
        "Order sync | apollo container",
        "Order: WPO-1",
        "Changes:",
        "- WPR WP Order Status: Approved → Cancelled",
        "- cf9: old → new",
      ].join("\n")
    );
  });

  it("has nothing to say about a parent move alone", () => {
    const changes = diff(desired({ parentKey: "100" }), remote({ parentKey: "90" }));

    expect(changes.changedKeys).toEqual(["parent"]);
    expect(buildChangeComment({ projectKey: "apollo", orderId: "WPO-1", item: unit }, remote(), changes, catalog)).toBe(
      undefined
    );
  });
});
