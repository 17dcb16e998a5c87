import { describe, it, expect } from "vitest";
import { access } from "node:fs/promises";
import { readDataset, withTempDir, withTempWorkspace, writeDataset } from "./fs.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("testkit fs helpers", () => {
  it("should write datasets as indented JSON and read them back", async () => {
    await withTempDir(async (dir) => {
      const filePath = await writeDataset(dir, "postData", [{ content: "a" }]);

      expect(filePath.endsWith("postData.json")).toBe(true);
      expect(await readDataset(dir, "postData.json")).toEqual([{ content: "a" }]);
    });
  });

  it("should remove the temp root after the callback", async () => {
    const root = await withTempWorkspace(async (workspace, root) => {
      await workspace.datasets.save("postData", [{ content: "a" }]);
      expect(await workspace.initMapping("postData")).toMatchObject({ status: "success", created: 1 });
      return root;
    });

    expect(await exists(root)).toBe(false);
  });

  it("should pass workspace options through", async () => {
    await withTempWorkspace(
      async (workspace, root) => {
        expect(workspace.root).toBe(root);
        expect(await workspace.listDatasets()).toEqual({ status: "success", datasets: [] });
      },
      { lock: false }
    );
  });
});
