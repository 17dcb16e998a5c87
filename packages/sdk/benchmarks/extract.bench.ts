/**
 * Performance benchmarks for extraction and linking
 * Run with: VITEST_PERF=1 npm test
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openWorkspace, type Workspace } from "../src/workspace.js";
import type { JsonValue } from "../src/types.js";

// Only run benchmarks if VITEST_PERF is set
const describeIf = process.env.VITEST_PERF ? describe : describe.skip;

const ROWS = 10000;

describeIf("Extraction Performance Benchmarks", () => {
  let testDir: string;
  let workspace: Workspace;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "leadlink-bench-"));
    workspace = openWorkspace({ root: testDir });

    const rows: JsonValue[] = [];
    for (let i = 0; i < ROWS; i++) {
      rows.push({
        content: `Post number ${i}`,
        author: { name: `Author ${i % 500}`, profileUrl: `https://example.com/u/${i % 500}` },
      });
    }
    await workspace.datasets.save("postData", rows);
    await workspace.initMapping("postData");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("10k rows, single path - < 500ms", { timeout: 30000 }, async () => {
    const start = Date.now();
    const result = await workspace.extract({ source: "postData", path: "[*].author.profileUrl" });
    const duration = Date.now() - start;

    console.log(`Single path: ${ROWS} rows in ${duration}ms`);
    expect(result).toMatchObject({ status: "success", count: ROWS });
    expect(duration).toBeLessThanOrEqual(500);
  });

  it("10k rows, where on lead fields - < 1000ms", { timeout: 30000 }, async () => {
    const even = Array.from({ length: ROWS / 2 }, (_, i) => i * 2);
    await workspace.updateMapping("postIndex", even, "isEven", true);

    const start = Date.now();
    const result = await workspace.extract({ source: "postData", path: "content", where: "isEven=true" });
    const duration = Date.now() - start;

    console.log(`Where on lead fields: ${ROWS} rows in ${duration}ms`);
    expect(result).toMatchObject({ status: "success", count: ROWS / 2 });
    expect(duration).toBeLessThanOrEqual(1000);
  });

  it("10k rows, link every index - < 1000ms", { timeout: 30000 }, async () => {
    const all = Array.from({ length: ROWS }, (_, i) => i);

    const start = Date.now();
    const result = await workspace.link("postIndex", all, "profileIndex");
    const duration = Date.now() - start;

    console.log(`Link: ${ROWS} indices in ${duration}ms`);
    expect(result).toMatchObject({ status: "success", targetStart: 0 });
    expect(duration).toBeLessThanOrEqual(1000);
  });
});
