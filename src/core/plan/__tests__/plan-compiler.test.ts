import { describe, it, expect } from "vitest";
import { FieldCatalog } from "../impl/field-catalog.js";
import { PlanCompiler, sortRecords } from "../impl/plan-compiler.js";
import { groupRecords, lastRowTimestamp } from "../impl/grouping.js";
import { parseQuantity } from "../impl/normalize.js";
import { dateValue, numberValue, optionValue, stringValue } from "../models/fields.js";
import type { LogicalOrder, SourceRecord } from "../models/plan.js";

const catalog = FieldCatalog.fromRecord({
  "WPR WP Order ID": "cf1",
  "WPR WP Quantity": "cf2",
  "WPR WP Order Status": "cf3",
  "WPR Domain": "cf4",
  "WPR WP ID": "cf5",
  "WPR WP Name": "cf6",
  "WPR Updated Date": "cf7",
  "WPR Start Date": "cf8",
});

function row(overrides: Partial<SourceRecord> = {}): SourceRecord {
  return {
    product: "ALPHA",
    orderId: "WPO-1",
    status: "approved",
    quantity: "3",
    domain: "Networks",
    wpId: "WP-7",
    wpName: "Cabling",
    approvedDate: "2024-01-15",
    rowTimestamp: "2024-02-01T08:00:00Z",
    ...overrides,
  };
}

function order(...records: SourceRecord[]): LogicalOrder {
  return { product: "ALPHA", orderId: "WPO-1", records };
}

describe("PlanCompiler", () => {
  const compiler = new PlanCompiler({ catalog });

  it("builds the container from the order's values", () => {
    const plan = compiler.compile(order(row()), "apollo");

    expect(plan.projectKey).toBe("apollo");
    expect(plan.container.summary).toBe("ALPHA :: WPO-1");
    expect(plan.container.identity).toBe("WPO-1");
    expect([...plan.container.fields]).toEqual([
      ["cf4", stringValue("Networks")],
      ["cf1", stringValue("WPO-1")],
      ["cf5", stringValue("WP-7")],
      ["cf6", stringValue("Cabling")],
      ["cf2", numberValue(3)],
      ["cf3", optionValue("Approved")],
      ["cf7", dateValue("2024-01-15")],
    ]);
    expect(plan.container.description).toBe(
      [
        "**WPR Product**: ALPHA",
        "**WPR Domain**: Networks",
        "**WPR WP Order ID**: WPO-1",
        "**WPR WP ID**: WP-7",
        "**WPR WP Name**: Cabling",
        "**WPR WP Quantity**: 3",
        "**WPR WP Order Status**: Approved",
        "**WPR Approved Date**: 2024-01-15",
        "**WPR Updated Date**: 2024-01-15",
      ].join("\n")
    );
  });

  it("names the container's workflow status after the canonical order status", () => {
    expect(compiler.compile(order(row({ status: " CANCELED " })), "apollo").container.status).toBe("Cancelled");
    expect("status" in compiler.compile(order(row({ status: "" })), "apollo").container).toBe(false);
  });

  it("fans out one unit per quantity", () => {
    const plan = compiler.compile(order(row()), "apollo");

    expect(plan.quantity).toBe(3);
    expect(plan.units.map((u) => u.identity)).toEqual(["WPO-1-1", "WPO-1-2", "WPO-1-3"]);
    expect(plan.units[1]?.summary).toBe("WPO-1-2");
    expect(plan.units[1]?.description).toBe(
      "Unit 2 of 3 for order WPO-1\n\n**WPR WP ID**: WP-7\n**WPR WP Name**: Cabling"
    );
    expect([...(plan.units[0]?.fields.keys() ?? [])]).toEqual(["cf5", "cf6", "cf1"]);
  });

  it("takes the largest quantity across rows", () => {
    const plan = compiler.compile(order(row({ quantity: 2 }), row({ quantity: "4", rowTimestamp: "2024-02-02T08:00:00Z" })), "apollo");
    expect(plan.quantity).toBe(4);
    expect(plan.units).toHaveLength(4);
  });

  it("defaults unparseable quantities to one unit with a warning", () => {
    const plan = compiler.compile(order(row({ quantity: "lots" })), "apollo");
    expect(plan.quantity).toBe(1);
    expect(plan.units).toHaveLength(1);
    expect(plan.warnings).toEqual(["Quantity missing or unparseable; defaulting to 1"]);
  });

  it("does not read hex or exponent quantities as numbers", () => {
    const plan = compiler.compile(order(row({ quantity: "1e3" }), row({ quantity: "0x10" })), "apollo");
    expect(plan.quantity).toBe(1);
    expect(plan.warnings).toEqual(["Quantity missing or unparseable; defaulting to 1"]);
  });

  it("never plans fewer than one unit", () => {
    const plan = compiler.compile(order(row({ quantity: 0 })), "apollo");
    expect(plan.quantity).toBe(1);
    expect(plan.warnings).toEqual([]);
  });

  it("is independent of row order", () => {
    const a = row({ domain: "", rowTimestamp: "2024-02-01T08:00:00Z" });
    const b = row({ domain: "Transport", wpName: "Splicing", rowTimestamp: "2024-02-03T08:00:00Z" });
    const c = row({ domain: "Networks", rowTimestamp: "2024-02-02T08:00:00Z" });

    const forward = compiler.compile(order(a, b, c), "apollo");
    const backward = compiler.compile(order(c, b, a), "apollo");

    expect(backward).toEqual(forward);
    expect(forward.container.fields.get("cf4")).toEqual(stringValue("Networks"));
    expect(forward.container.fields.get("cf6")).toEqual(stringValue("Cabling"));
  });

  it("treats spreadsheet null markers as empty", () => {
    const plan = compiler.compile(order(row({ domain: "NaN" })), "apollo");
    expect(plan.container.fields.has("cf4")).toBe(false);
  });

  it("derives the start date from the acknowledgement date", () => {
    const plan = compiler.compile(order(row({ status: "Acknowledged", acknowledgementDate: "2024-01-05" })), "apollo");
    expect(plan.container.fields.get("cf8")).toEqual(dateValue("2024-01-05"));
    expect(plan.container.fields.get("cf7")).toEqual(dateValue("2024-01-05"));
  });

  it("puts the readiness date on units only", () => {
    const plan = compiler.compile(order(row({ readinessDate: "2024-03-01" })), "apollo");
    expect(plan.units.every((u) => u.dueDate === "2024-03-01")).toBe(true);
    expect("dueDate" in plan.container).toBe(false);
  });

  it("writes the status onto units when enabled", () => {
    const withStatus = new PlanCompiler({ catalog, unitStatusEnabled: true });
    const plan = withStatus.compile(order(row()), "apollo");
    expect(plan.units[0]?.fields.get("cf3")).toEqual(optionValue("Approved"));
  });

  it("omits fields the tracker has no mapping for", () => {
    const plan = new PlanCompiler({ catalog: FieldCatalog.empty() }).compile(order(row()), "apollo");
    expect(plan.container.fields.size).toBe(0);
    expect(plan.container.description).toContain("**WPR WP Name**: Cabling");
  });
});

describe("sortRecords", () => {
  it("orders by row timestamp, then content", () => {
    const late = row({ rowTimestamp: "2024-03-01T00:00:00Z" });
    const early = row({ rowTimestamp: "2024-01-01T00:00:00Z" });
    const sameB = row({ domain: "B", rowTimestamp: "2024-02-01T00:00:00Z" });
    const sameA = row({ domain: "A", rowTimestamp: "2024-02-01T00:00:00Z" });
    expect(sortRecords([late, sameB, early, sameA])).toEqual([early, sameA, sameB, late]);
  });
});

describe("groupRecords", () => {
  it("groups rows by product and order id", () => {
    const { orders, skippedRows } = groupRecords([
      row({ orderId: "WPO-2" }),
      row(),
      row({ product: "BETA" }),
      row({ quantity: 5 }),
      row({ orderId: "  " }),
    ]);

    expect(orders.map((o) => [o.product, o.orderId, o.records.length])).toEqual([
      ["ALPHA", "WPO-1", 2],
      ["ALPHA", "WPO-2", 1],
      ["BETA", "WPO-1", 1],
    ]);
    expect(skippedRows).toBe(1);
  });

  it("finds the latest row timestamp", () => {
    const grouped = order(
      row({ rowTimestamp: "2024-02-01T08:00:00Z" }),
      row({ rowTimestamp: "2024-02-05T08:00:00+02:00" }),
      row({ rowTimestamp: undefined })
    );
    expect(lastRowTimestamp(grouped)).toBe("2024-02-05T08:00:00+02:00");
  });
});

describe("parseQuantity", () => {
  it.each([
    ["12", 12],
    [" 1,250 ", 1250],
    ["3.9", 3],
    [7.5, 7],
    ["0x10", undefined],
    ["1e3", undefined],
    ["-2", undefined],
    ["12,34", undefined],
    ["", undefined],
  ])("parses %j as %j", (input, expected) => {
    expect(parseQuantity(input)).toBe(expected);
  });
});
