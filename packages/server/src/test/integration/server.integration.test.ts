/**
 * MCP protocol tests: a client and the server over a linked in-memory transport
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { createTempRoot, removeDir, writeDataset } from "@leadlink/testkit";
import { createServer, mapErrorToMcp, type ServerOptions } from "../../server.js";
import { ToolTimeoutError } from "../../tools.js";
import { z } from "zod";

let testRoot: string;
let client: Client;

async function connect(options: ServerOptions = {}): Promise<Client> {
  const server = createServer(options);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const connected = new Client({ name: "leadlink-test-client", version: "0.0.0" });
  await Promise.all([server.connect(serverTransport), connected.connect(clientTransport)]);
  return connected;
}

async function call(name: string, args: Record<string, unknown>): Promise<{ text: string[]; isError: boolean }> {
  const result = await client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
  return {
    text: result.content.flatMap((item) => (item.type === "text" ? [item.text] : [])),
    isError: result.isError ?? false,
  };
}

describe("MCP server", () => {
  beforeEach(async () => {
    testRoot = await createTempRoot("leadlink-server-");
    process.env.LEADLINK_ROOT = testRoot;
    await writeDataset(testRoot, "postData", [{ content: "a" }, { content: "b" }]);
  });

  afterEach(async () => {
    await client.close();
    delete process.env.LEADLINK_ROOT;
    await removeDir(testRoot);
  });

  it("should list every tool", async () => {
    client = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "extract",
      "init_mapping",
      "update_mapping",
      "link_indices",
      "register_output",
      "lookup_field",
      "list_datasets",
    ]);
  });

  it("should run a tool and return summary and JSON", async () => {
    client = await connect();

    const result = await call("init_mapping", { source: "postData" });

    expect(result.isError).toBe(false);
    expect(result.text[0]).toBe("Created 2 leads (0 already present, 2 total)");
    expect(JSON.parse(result.text[1] ?? "null")).toEqual({
      status: "success",
      created: 2,
      skipped: 0,
      totalLeads: 2,
    });
  });

  it("should map validation errors to InvalidParams", async () => {
    client = await connect();

    const attempt = call("lookup_field", { field: "isHiring", index: -1 });

    await expect(attempt).rejects.toBeInstanceOf(McpError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("should reject unknown tools", async () => {
    client = await connect();

    await expect(call("drop_everything", {})).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
  });

  describe("read-only mode", () => {
    it("should only list read tools", async () => {
      client = await connect({ readOnly: true });

      const { tools } = await client.listTools();

      expect(tools.map((tool) => tool.name)).toEqual(["extract", "lookup_field", "list_datasets"]);
    });

    it("should refuse write tools and saves", async () => {
      client = await connect({ readOnly: true });

      await expect(call("init_mapping", { source: "postData" })).rejects.toMatchObject({
        code: ErrorCode.InvalidRequest,
      });
      await expect(call("extract", { source: "postData", path: "content", saveAs: "copy" })).rejects.toMatchObject({
        code: ErrorCode.InvalidRequest,
      });

      const allowed = await call("extract", { source: "postData", path: "content" });
      expect(allowed.text[0]).toBe("Extracted 2 values from postData");
    });
  });
});

describe("mapErrorToMcp", () => {
  it("should map zod errors to InvalidParams", () => {
    const result = z.object({ index: z.number() }).safeParse({ index: "x" });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(mapErrorToMcp(result.error)).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Validation error: index: Expected number, received string",
    });
  });

  it("should map timeouts to RequestTimeout", () => {
    expect(mapErrorToMcp(new ToolTimeoutError(50))).toEqual({
      code: ErrorCode.RequestTimeout,
      message: "Tool execution timeout after 50ms",
    });
  });

  it("should map anything else to InternalError", () => {
    expect(mapErrorToMcp(new Error("boom"))).toEqual({ code: ErrorCode.InternalError, message: "boom" });
    expect(mapErrorToMcp("boom")).toEqual({ code: ErrorCode.InternalError, message: "boom" });
  });
});
