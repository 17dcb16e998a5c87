/**
 * Integration tests for MCP tools
 * Tests the full flow of tool execution against a real workspace
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTempRoot, readDataset, removeDir, writeDataset } from "@leadlink/testkit";
import {
  extract,
  initMapping,
  updateMapping,
  linkIndices,
  registerOutput,
  lookupField,
  listDatasets,
  type ToolResult,
} from "../../tools.js";
import { metrics } from "../../observability/metrics.js";

let testRoot: string;

/**
 * JSON payload of a tool result
 */
function payload(result: ToolResult): unknown {
  return JSON.parse(result.content[1]?.text ?? "null");
}

beforeEach(async () => {
  testRoot = await createTempRoot("leadlink-tools-");
  process.env.LEADLINK_ROOT = testRoot;
  await writeDataset(testRoot, "postData", [
    { content: "hiring", author: { profileUrl: "https://example.com/a" } },
    { content: "lunch", author: { profileUrl: "https://example.com/b" } },
    { content: "hiring again", author: { profileUrl: "https://example.com/c" } },
  ]);
});

afterEach(async () => {
  delete process.env.LEADLINK_ROOT;
  await removeDir(testRoot);
});

describe("Tool integration tests", () => {
  describe("extract", () => {
    it("should return a summary and the indexed values", async () => {
      const result = await extract({ source: "postData", path: "[*].content" });

      expect(result.content).toHaveLength(2);
      expect(result.content[0]).toEqual({ type: "text", text: "Extracted 3 values from postData" });
      expect(result.isError).toBeUndefined();
      expect(payload(result)).toEqual({
        status: "success",
        data: [
          { index: 0, value: "hiring" },
          { index: 1, value: "lunch" },
          { index: 2, value: "hiring again" },
        ],
        count: 3,
      });
    });

    it("should flag an error result", async () => {
      const result = await extract({ source: "missing", path: "content" });

      expect(result.isError).toBe(true);
      expect(result.content[0]?.text).toMatch(/^Failed: Dataset not found: /);
      expect(payload(result)).toMatchObject({ status: "error", code: "ENOENT" });
    });

    it("should throw on invalid input", async () => {
      await expect(extract({ source: "postData" })).rejects.toThrow(/Provide exactly one/);
    });

    it("should save the extracted values", async () => {
      const result = await extract({ source: "postData", path: "content", limit: 1, saveAs: "firstPost" });

      expect(result.content[0]?.text).toContain("(saved to ");
      expect(await readDataset(testRoot, "firstPost")).toEqual(["hiring"]);
    });
  });

  describe("mapping tools", () => {
    it("should seed, update and filter on lead fields", async () => {
      const seeded = await initMapping({ source: "postData" });
      expect(seeded.content[0]?.text).toBe("Created 3 leads (0 already present, 3 total)");

      const updated = await updateMapping({
        indexField: "postIndex",
        indices: [0, 2],
        field: "isHiring",
        value: true,
      });
      expect(payload(updated)).toEqual({ status: "success", updated: 2 });

      const filtered = await extract({ source: "postData", path: "author.profileUrl", where: "isHiring=true" });
      expect(payload(filtered)).toEqual({
        status: "success",
        data: [
          { index: 0, value: "https://example.com/a" },
          { index: 2, value: "https://example.com/c" },
        ],
        count: 2,
      });
    });

    it("should link indices and report the allocation", async () => {
      await initMapping({ source: "postData" });

      const result = await linkIndices({
        sourceIndexField: "postIndex",
        sourceIndices: [2, 0],
        targetIndexField: "profileIndex",
      });

      expect(result.content[0]?.text).toBe("Linked 2 postIndex values to profileIndex starting at 0");
      expect(payload(result)).toEqual({
        status: "success",
        linked: [2, 0],
        skipped: [],
        missing: [],
        targetStart: 0,
      });
    });
  });

  describe("registry tools", () => {
    it("should return null for a field nobody registered", async () => {
      const lookup = await lookupField({ field: "unregistered", index: 0 });

      expect(payload(lookup)).toEqual({ status: "success", value: null });
    });

    it("should register an output file and look up its values", async () => {
      await writeDataset(testRoot, "postData_isHiring", [
        { index: 0, isHiring: true },
        { index: 1, isHiring: false },
      ]);

      const registered = await registerOutput({
        outputFile: "postData_isHiring.json",
        fields: ["isHiring"],
        indexField: "postIndex",
      });
      expect(registered.content[0]?.text).toBe("Registered postData_isHiring.json for isHiring");

      const lookup = await lookupField({ field: "isHiring", index: 1 });
      expect(lookup.content[0]?.text).toBe("isHiring[1] = false");
      expect(payload(lookup)).toEqual({ status: "success", value: false });
    });
  });

  describe("list_datasets", () => {
    it("should list dataset files without arguments", async () => {
      const result = await listDatasets(undefined);

      expect(result.content[0]?.text).toBe("Found 1 datasets");
      expect(payload(result)).toEqual({ status: "success", datasets: ["postData.json"] });
    });
  });

  describe("metrics", () => {
    it("should count calls and errors per tool", async () => {
      const calls = metrics.calls("extract");
      const errors = metrics.errors("extract", "ENOENT");

      await extract({ source: "missing", path: "content" });

      expect(metrics.calls("extract")).toBe(calls + 1);
      expect(metrics.errors("extract", "ENOENT")).toBe(errors + 1);
    });
  });
});
