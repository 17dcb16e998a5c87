/**
 * MCP server for leadlink
 * Exposes extraction, mapping, linking and registry tools
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { READONLY_TOOLS, ToolTimeoutError, errorCode, toolDefinitions, toolHandlers } from "./tools.js";
import type { ToolHandler } from "./tools.js";
import { logger } from "./observability/logger.js";

export const SERVER_NAME = "leadlink-server";
export const SERVER_VERSION = "0.1.0";

export interface ServerOptions {
  /** Only expose tools that never write to the workspace */
  readOnly?: boolean;
}

/**
 * Map validation and runtime errors to MCP error codes
 */
export function mapErrorToMcp(error: unknown): { code: number; message: string } {
  if (error instanceof z.ZodError) {
    return {
      code: ErrorCode.InvalidParams,
      message: `Validation error: ${error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ")}`,
    };
  }

  if (error instanceof ToolTimeoutError) {
    return { code: ErrorCode.RequestTimeout, message: error.message };
  }

  if (error instanceof Error) {
    const errCode = errorCode(error);

    if (errCode === "EACCES" || errCode === "EPERM") {
      return {
        code: ErrorCode.InternalError,
        message: `Permission denied: ${error.message}`,
      };
    }

    return {
      code: ErrorCode.InternalError,
      message: error.message,
    };
  }

  return {
    code: ErrorCode.InternalError,
    message: String(error),
  };
}

function requestsSave(args: unknown): boolean {
  return typeof args === "object" && args !== null && "saveAs" in args && args.saveAs !== undefined;
}

/**
 * Create a configured MCP server; the caller connects a transport
 */
export function createServer(options: ServerOptions = {}): Server {
  const readOnly = options.readOnly ?? false;

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = readOnly
      ? toolDefinitions.filter((t) => READONLY_TOOLS.includes(t.name))
      : toolDefinitions;

    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (readOnly && !READONLY_TOOLS.includes(name)) {
        throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
      }
      if (readOnly && name === "extract" && requestsSave(args)) {
        throw new McpError(ErrorCode.InvalidRequest, "saveAs is not available in read-only mode");
      }

      const handler: ToolHandler | undefined = Object.hasOwn(toolHandlers, name) ? toolHandlers[name] : undefined;
      if (!handler) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return await handler(args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(error),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  return server;
}
