/**
 * Gemini Document Parser MCP Server
 *
 * Exposes document processing and cache management as MCP tools over stdio.
 *
 * Usage:
 *   gemini-parser serve
 *
 * Environment Variables:
 *   GEMINI_API_KEY - required for every tool call
 *   LOG_LEVEL - server logs go to stderr; stdout carries the MCP transport
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { createRequire } from "node:module";

import { CONFIG } from "./config.js";
import type { DocumentProcessor } from "./gemini/index.js";
import { ToolHandlers, buildToolDefinitions } from "./tools/index.js";
import { log } from "./utils/logger.js";

const require = createRequire(import.meta.url);
const packageJson: { version: string } = require("../package.json");
export const VERSION = packageJson.version;

/**
 * Main MCP Server Class
 */
export class DocumentParserServer {
  private server: Server;
  private toolHandlers: ToolHandlers;
  private toolDefinitions: Tool[];

  constructor(processor?: DocumentProcessor) {
    this.server = new Server(
      {
        name: "gemini-doc-parser",
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.toolHandlers = new ToolHandlers(processor);
    this.toolDefinitions = buildToolDefinitions();

    this.setupHandlers();

    log.info("🚀 Gemini Document Parser MCP Server initialized");
    log.info(`  Version: ${VERSION}`);
    log.info(`  Node: ${process.version}`);
    log.info(`  Tools: ${this.toolDefinitions.length}`);
  }

  /**
   * Setup MCP request handlers
   */
  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      log.info("📋 [MCP] list_tools request received");
      return {
        tools: this.toolDefinitions,
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      const progressToken = request.params._meta?.progressToken;

      log.info(`🔧 [MCP] Tool call: ${name}`);

      const sendProgress = async (message: string, progress?: number, total?: number) => {
        if (progressToken === undefined) return;
        await this.server.notification({
          method: "notifications/progress",
          params: {
            progressToken,
            message,
            progress: progress ?? 0,
            ...(total !== undefined && { total }),
          },
        });
        log.dim(`  📊 Progress: ${message}`);
      };

      const result = await this.toolHandlers.handleToolCall(name, args, sendProgress);

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    });
  }

  /**
   * Close the transport on SIGINT/SIGTERM
   */
  private setupShutdownHandlers(): void {
    let shuttingDown = false;

    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info(`\n🛑 Received ${signal}, shutting down gracefully...`);

      try {
        await this.close();
        log.success("✅ Shutdown complete");
        process.exit(0);
      } catch (error) {
        log.error(`❌ Error during shutdown: ${error}`);
        process.exit(1);
      }
    };

    process.on("SIGINT", () => void shutdown("SIGINT"));
    process.on("SIGTERM", () => void shutdown("SIGTERM"));
  }

  /**
   * Attach to any MCP transport (stdio in production, in-memory in tests)
   */
  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  /**
   * Start the MCP server on stdio
   */
  async start(): Promise<void> {
    log.info("🎯 Starting Gemini Document Parser MCP Server...");
    log.info("📝 Configuration:");
    log.info(`  Model: ${CONFIG.defaultModel}`);
    log.info(`  API key: ${this.toolHandlers.isAvailable() ? "configured" : "missing"}`);
    log.info(`  Max Retries: ${CONFIG.maxRetries}`);
    log.info(`  Log level: ${CONFIG.logLevel}`);
    log.info("");

    if (!this.toolHandlers.isAvailable()) {
      log.warning("⚠️  GEMINI_API_KEY is not set: every tool call will fail until it is");
    }

    this.setupShutdownHandlers();

    await this.connect(new StdioServerTransport());

    log.success("✅ MCP Server connected via stdio");
    log.info("💡 Available tools:");
    for (const tool of this.toolDefinitions) {
      const desc = tool.description ? tool.description.split("\n")[0] : "No description";
      log.info(`  - ${tool.name}: ${desc}`);
    }
  }
}
