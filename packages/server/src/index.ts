export { createServer, mapErrorToMcp, SERVER_NAME, SERVER_VERSION } from "./server.js";
export type { ServerOptions } from "./server.js";
export { toolDefinitions, toolHandlers, READONLY_TOOLS } from "./tools.js";
export type { ToolResult, ToolHandler } from "./tools.js";
export { LeadLinkService, leadLinkService } from "./service/leadlink.js";
