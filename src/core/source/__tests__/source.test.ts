/**
 * Source Reader and Product Registry Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { ConfigurationError, ErrorCode, SourceError } from "../../errors.js";
import { JsonFileSourceReader } from "../impl/JsonFileSourceReader.js";
import { ProductRegistry, normalizeProduct } from "../impl/ProductRegistry.js";

describe("JsonFileSourceReader", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "source-reader-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeSource(name: string, content: unknown): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
    return filePath;
  }

  it("reads rows and stringifies numeric keys", async () => {
    const filePath = await writeSource("rows.json", [
      { product: "ALPHA", orderId: 1001, quantity: "2", domain: null, rowTimestamp: "2024-02-01T08:00:00Z" },
    ]);
    const reader = new JsonFileSourceReader({ path: filePath });

    expect(reader.name).toBe("rows.json");
    expect(await reader.read()).toEqual([
      { product: "ALPHA", orderId: "1001", quantity: "2", domain: null, rowTimestamp: "2024-02-01T08:00:00Z" },
    ]);
  });

  it("keeps only the requested products", async () => {
    const filePath = await writeSource("mixed.json", [
      { product: "ALPHA", orderId: "WPO-1" },
      { product: "BETA", orderId: "WPO-2" },
      { product: "GAMMA ", orderId: "WPO-3" },
    ]);
    const rows = await new JsonFileSourceReader({ path: filePath, products: ["BETA", " GAMMA"] }).read();
    expect(rows.map((r) => r.orderId)).toEqual(["WPO-2", "WPO-3"]);
  });

  it("fails on a missing file", async () => {
    const reader = new JsonFileSourceReader({ path: path.join(tempDir, "absent.json") });
    await expect(reader.read()).rejects.toMatchObject({
      code: ErrorCode.SOURCE_READ_FAILED,
      message: `Source file not found: ${path.join(tempDir, "absent.json")}`,
    });
  });

  it("fails on malformed JSON", async () => {
    const filePath = await writeSource("broken.json", "[{");
    await expect(new JsonFileSourceReader({ path: filePath }).read()).rejects.toBeInstanceOf(SourceError);
  });

  it("names the invalid rows", async () => {
    const filePath = await writeSource("invalid.json", [
      { product: "ALPHA", orderId: "WPO-1" },
      { product: "ALPHA", quantity: 3 },
    ]);
    const failure = new JsonFileSourceReader({ path: filePath }).read();
    await expect(failure).rejects.toMatchObject({ code: ErrorCode.SOURCE_ROW_INVALID });
    await expect(failure).rejects.toThrow(/^Source file has invalid rows: 1\.orderId: /);
  });
});

describe("ProductRegistry", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "registry-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("normalizes product names", () => {
    expect(normalizeProduct("  Fibre / Access-2 ")).toBe("FIBRE_ACCESS_2");
    expect(normalizeProduct("--x--")).toBe("X");
  });

  it("prefers the exact name, then the normalized one", () => {
    const registry = new ProductRegistry({ "Fibre Access": "fibre", FIBRE_ACCESS: "other", Radio: " radio " });

    expect(registry.projectFor("Fibre Access")).toBe("fibre");
    expect(registry.projectFor("fibre-access")).toBe("fibre");
    expect(registry.projectFor("RADIO")).toBe("radio");
    expect(registry.projectFor("Copper")).toBeUndefined();
    expect(registry.products()).toEqual(["FIBRE_ACCESS", "Fibre Access", "Radio"]);
  });

  it("loads a registry file", async () => {
    const filePath = path.join(tempDir, "registry.json");
    await fs.writeFile(filePath, JSON.stringify({ registry: { ALPHA: "apollo" } }), "utf-8");
    const registry = await ProductRegistry.load(filePath);
    expect(registry.projectFor("alpha")).toBe("apollo");
  });

  it("rejects a missing registry", async () => {
    await expect(ProductRegistry.load(path.join(tempDir, "absent.json"))).rejects.toMatchObject({
      code: ErrorCode.CONFIG_NOT_FOUND,
    });
  });

  it("rejects an invalid registry", async () => {
    const filePath = path.join(tempDir, "bad-registry.json");
    await fs.writeFile(filePath, JSON.stringify({ registry: { ALPHA: "" } }), "utf-8");
    const failure = ProductRegistry.load(filePath);
    await expect(failure).rejects.toBeInstanceOf(ConfigurationError);
    await expect(failure).rejects.toMatchObject({ code: ErrorCode.REGISTRY_INVALID });
  });
});
