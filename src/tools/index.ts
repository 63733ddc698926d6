import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { documentTools } from "./definitions/documents.js";
import { cacheTools } from "./definitions/caches.js";

export { ToolHandlers } from "./handlers.js";

export function buildToolDefinitions(): Tool[] {
  return [...documentTools, ...cacheTools];
}
