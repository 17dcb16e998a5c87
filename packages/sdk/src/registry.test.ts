import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DatasetStore } from "./datasets.js";
import { FieldRegistry } from "./registry.js";
import { TypeMismatchError } from "./errors.js";

describe("FieldRegistry", () => {
  let root: string;
  let datasets: DatasetStore;
  let registry: FieldRegistry;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "leadlink-registry-"));
    datasets = new DatasetStore(root);
    registry = new FieldRegistry(root, datasets);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should start empty", async () => {
    expect(await registry.load()).toEqual({ files: {}, fields: {} });
  });

  it("should reject a registry with the wrong shape", async () => {
    await writeFile(join(root, "registry.json"), '{"files": [], "fields": {}}');

    await expect(registry.load()).rejects.toThrow(TypeMismatchError);
  });

  describe("register", () => {
    it("should record the file and point each field at it", async () => {
      const carried = await registry.register(
        "postData_isHiring.json",
        ["index", "isHiring", "reasoning"],
        "postIndex"
      );

      expect(carried).toEqual(["isHiring", "reasoning"]);
      expect(await registry.resolve("isHiring")).toBe("postData_isHiring.json");
      expect(await registry.resolve("index")).toBeNull();
    });

    it("should let the last registration of a field win", async () => {
      await registry.register("a.json", ["score"], "postIndex");
      await registry.register("b.json", ["score"], "profileIndex");

      const loaded = await registry.load();
      expect(loaded.fields).toEqual({ score: "b.json" });
      expect(Object.keys(loaded.files)).toEqual(["a.json", "b.json"]);
    });
  });

  describe("resolveSource", () => {
    it("should resolve a registered field to its file and index field", async () => {
      await registry.register("postData_isHiring.json", ["isHiring"], "postIndex");

      expect(await registry.resolveSource("isHiring")).toEqual({
        kind: "file",
        field: "isHiring",
        outputFile: "postData_isHiring.json",
        indexField: "postIndex",
      });
    });

    it("should report a null index field when the file entry is missing", async () => {
      await writeFile(
        join(root, "registry.json"),
        JSON.stringify({ files: {}, fields: { isHiring: "old.json" } })
      );

      expect(await registry.resolveSource("isHiring")).toEqual({
        kind: "file",
        field: "isHiring",
        outputFile: "old.json",
        indexField: null,
      });
    });

    it("should fall back to attached lead fields", async () => {
      expect(await registry.resolveSource("constructor")).toEqual({
        kind: "attached",
        field: "constructor",
      });
    });
  });

  describe("lookup", () => {
    beforeEach(async () => {
      await datasets.save("postData_isHiring", [
        { index: 0, isHiring: true },
        { index: 2, isHiring: false },
      ]);
      await registry.register("postData_isHiring.json", ["isHiring", "reasoning"], "postIndex");
    });

    it("should return the value for an own-domain index", async () => {
      expect(await registry.lookup("isHiring", 0)).toBe(true);
      expect(await registry.lookup("isHiring", 2)).toBe(false);
    });

    it("should return null for a missing record or field", async () => {
      expect(await registry.lookup("isHiring", 1)).toBeNull();
      expect(await registry.lookup("reasoning", 0)).toBeNull();
    });

    it("should return null for an unregistered field", async () => {
      expect(await registry.lookup("unknown", 0)).toBeNull();
    });

    it("should return null when the output file is gone", async () => {
      await rm(join(root, "postData_isHiring.json"));

      expect(await registry.lookup("isHiring", 0)).toBeNull();
    });

    it("should return null when the output file is not an array", async () => {
      await writeFile(join(root, "postData_isHiring.json"), '{"index": 0}');

      expect(await registry.lookup("isHiring", 0)).toBeNull();
    });

    it("should return null instead of throwing for an unreadable registry", async () => {
      await writeFile(join(root, "registry.json"), "{ not json");

      expect(await registry.lookup("isHiring", 0)).toBeNull();
    });
  });
});
