/**
 * Context Cache Tool Definitions
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

const createCacheTool: Tool = {
  name: "create_cache",
  description: `Upload files and store them in a server-side context cache.

Use the returned cache name with generate_with_cache (or cache_name on the
process_* tools) to ask further questions without re-uploading.`,
  inputSchema: {
    type: "object",
    properties: {
      file_paths: {
        type: "array",
        items: { type: "string" },
        description: "Files to cache",
      },
      system_instruction: {
        type: "string",
        description: "System instruction stored with the cache",
      },
      ttl_hours: {
        type: "number",
        description: "Cache lifetime in hours (server default: 1)",
      },
      display_name: {
        type: "string",
        description: "Human-readable cache label",
      },
      model: {
        type: "string",
        description: "Model the cache is bound to",
      },
    },
    required: ["file_paths"],
  },
};

const generateWithCacheTool: Tool = {
  name: "generate_with_cache",
  description: `Generate text from an existing context cache.`,
  inputSchema: {
    type: "object",
    properties: {
      cache_name: {
        type: "string",
        description: "Cache name (cachedContents/...)",
      },
      prompt: {
        type: "string",
        description: "Question or instruction (default: transcription prompt)",
      },
      model: {
        type: "string",
        description: "Must match the model the cache was created for",
      },
    },
    required: ["cache_name"],
  },
};

const listCachesTool: Tool = {
  name: "list_caches",
  description: `List context cache metadata (names, models, expiry). Cached contents are not retrievable.`,
  inputSchema: {
    type: "object",
    properties: {},
  },
};

const updateCacheTtlTool: Tool = {
  name: "update_cache_ttl",
  description: `Set a cache to expire the given number of hours from now.`,
  inputSchema: {
    type: "object",
    properties: {
      cache_name: {
        type: "string",
        description: "Cache name (cachedContents/...)",
      },
      hours: {
        type: "number",
        default: 2,
        description: "Hours from now until expiration",
      },
    },
    required: ["cache_name"],
  },
};

const deleteCacheTool: Tool = {
  name: "delete_cache",
  description: `Delete a context cache.`,
  inputSchema: {
    type: "object",
    properties: {
      cache_name: {
        type: "string",
        description: "Cache name (cachedContents/...)",
      },
    },
    required: ["cache_name"],
  },
};

export const cacheTools: Tool[] = [
  createCacheTool,
  generateWithCacheTool,
  listCachesTool,
  updateCacheTtlTool,
  deleteCacheTool,
];
