/**
 * MCP Tool Handlers
 *
 * Implements the logic for all MCP tools. Arguments are validated with zod
 * before they reach the DocumentProcessor; every handler resolves to a
 * ToolResult and never throws.
 */

import { z } from "zod";
import { DocumentProcessor } from "../gemini/index.js";
import type {
  CacheInfo,
  FolderResult,
  GenerationResult,
  ProcessOptions,
  UploadedFile,
} from "../gemini/index.js";
import { ErrorCode, GeminiParserError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { ProgressCallback, ToolResult } from "../types.js";

const NOT_CONFIGURED = "Gemini API key not configured. Set GEMINI_API_KEY environment variable.";

const nonEmpty = (label: string) => z.string().trim().min(1, `${label} cannot be empty`);

const generationArgs = {
  prompt: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
};

const cacheArgs = {
  use_cache: z.boolean().optional(),
  cache_ttl_hours: z.number().positive().optional(),
  cache_name: z.string().min(1).optional(),
};

const ProcessFileArgs = z.object({ file_path: nonEmpty("File path"), ...generationArgs, ...cacheArgs });
const ProcessUrlArgs = z.object({ url: z.string().url(), ...generationArgs, ...cacheArgs });
const ProcessFilesArgs = z.object({
  file_paths: z.array(nonEmpty("File path")).min(1, "At least one file path is required"),
  ...generationArgs,
  ...cacheArgs,
});
const ProcessFolderArgs = z.object({
  folder_path: nonEmpty("Folder path"),
  output_dir: z.string().min(1).optional(),
  output_extension: z.string().min(1).optional(),
  concurrency: z.number().int().positive().optional(),
  ...generationArgs,
  use_cache: cacheArgs.use_cache,
  cache_ttl_hours: cacheArgs.cache_ttl_hours,
});
const CreateCacheArgs = z.object({
  file_paths: z.array(nonEmpty("File path")).min(1, "At least one file path is required"),
  system_instruction: z.string().min(1).optional(),
  ttl_hours: z.number().positive().optional(),
  display_name: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});
const GenerateWithCacheArgs = z.object({
  cache_name: nonEmpty("Cache name"),
  prompt: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});
const CacheNameArgs = z.object({ cache_name: nonEmpty("Cache name") });
const UpdateCacheTtlArgs = z.object({ cache_name: nonEmpty("Cache name"), hours: z.number().positive().default(2) });
const FileNameArgs = z.object({ file_name: nonEmpty("File name") });

/**
 * Validate raw tool arguments, reporting every issue in one message
 */
export function parseToolArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new GeminiParserError(ErrorCode.INVALID_INPUT, `Invalid arguments: ${details}`);
  }
  return parsed.data;
}

function toProcessOptions(args: {
  prompt?: string;
  model?: string;
  use_cache?: boolean;
  cache_ttl_hours?: number;
  cache_name?: string;
}): ProcessOptions {
  return {
    prompt: args.prompt,
    model: args.model,
    useCache: args.use_cache,
    cacheTtlHours: args.cache_ttl_hours,
    cacheName: args.cache_name,
  };
}

/**
 * MCP Tool Handlers
 */
export class ToolHandlers {
  private processor: DocumentProcessor | null;

  /**
   * @param processor - injected processor; built from CONFIG when omitted.
   *   Without an API key every tool reports the missing configuration.
   */
  constructor(processor?: DocumentProcessor) {
    if (processor) {
      this.processor = processor;
      return;
    }

    try {
      this.processor = new DocumentProcessor();
    } catch (error) {
      if (error instanceof GeminiParserError && error.code === ErrorCode.MISSING_API_KEY) {
        log.warning("⚠️  Gemini client not initialized (no API key)");
        this.processor = null;
      } else {
        throw error;
      }
    }
  }

  isAvailable(): boolean {
    return this.processor !== null;
  }

  /**
   * Dispatch a tool call by name
   */
  async handleToolCall(
    name: string,
    args: Record<string, unknown> | undefined,
    sendProgress?: ProgressCallback
  ): Promise<ToolResult> {
    switch (name) {
      case "process_file":
        return this.handleProcessFile(args);
      case "process_url":
        return this.handleProcessUrl(args);
      case "process_files":
        return this.handleProcessFiles(args);
      case "process_folder":
        return this.handleProcessFolder(args, sendProgress);
      case "create_cache":
        return this.handleCreateCache(args);
      case "generate_with_cache":
        return this.handleGenerateWithCache(args);
      case "list_caches":
        return this.handleListCaches();
      case "update_cache_ttl":
        return this.handleUpdateCacheTtl(args);
      case "delete_cache":
        return this.handleDeleteCache(args);
      case "list_files":
        return this.handleListFiles();
      case "delete_file":
        return this.handleDeleteFile(args);
      default:
        log.warning(`⚠️  [TOOL] Unknown tool: ${name}`);
        return { success: false, error: `Unknown tool: ${name}` };
    }
  }

  // ==================== DOCUMENT TOOLS ====================

  async handleProcessFile(args: unknown): Promise<ToolResult<GenerationResult>> {
    return this.run("process_file", (processor) => {
      const input = parseToolArgs(ProcessFileArgs, args);
      log.info(`  File: ${input.file_path}`);
      return processor.processFile(input.file_path, toProcessOptions(input));
    });
  }

  async handleProcessUrl(args: unknown): Promise<ToolResult<GenerationResult>> {
    return this.run("process_url", (processor) => {
      const input = parseToolArgs(ProcessUrlArgs, args);
      log.info(`  URL: ${input.url}`);
      return processor.processFromUrl(input.url, toProcessOptions(input));
    });
  }

  async handleProcessFiles(args: unknown): Promise<ToolResult<GenerationResult>> {
    return this.run("process_files", (processor) => {
      const input = parseToolArgs(ProcessFilesArgs, args);
      log.info(`  Files: ${input.file_paths.length}`);
      return processor.processMultipleFiles(input.file_paths, toProcessOptions(input));
    });
  }

  async handleProcessFolder(args: unknown, sendProgress?: ProgressCallback): Promise<ToolResult<FolderResult>> {
    return this.run("process_folder", (processor) => {
      const input = parseToolArgs(ProcessFolderArgs, args);
      log.info(`  Folder: ${input.folder_path}`);
      return processor.processFolder(input.folder_path, {
        prompt: input.prompt,
        model: input.model,
        useCache: input.use_cache,
        cacheTtlHours: input.cache_ttl_hours,
        outputDir: input.output_dir,
        outputExtension: input.output_extension,
        concurrency: input.concurrency,
        onProgress: sendProgress,
      });
    });
  }

  async handleListFiles(): Promise<ToolResult<{ files: UploadedFile[]; totalCount: number }>> {
    return this.run("list_files", async (processor) => {
      const files = await processor.listFiles();
      return { files, totalCount: files.length };
    });
  }

  async handleDeleteFile(args: unknown): Promise<ToolResult<{ deleted: boolean; fileName: string }>> {
    return this.run("delete_file", async (processor) => {
      const input = parseToolArgs(FileNameArgs, args);
      await processor.deleteFile(input.file_name);
      return { deleted: true, fileName: input.file_name };
    });
  }

  // ==================== CACHE TOOLS ====================

  async handleCreateCache(args: unknown): Promise<ToolResult<CacheInfo>> {
    return this.run("create_cache", (processor) => {
      const input = parseToolArgs(CreateCacheArgs, args);
      return processor.createCacheFromFiles(input.file_paths, {
        systemInstruction: input.system_instruction,
        ttlHours: input.ttl_hours,
        displayName: input.display_name,
        model: input.model,
      });
    });
  }

  async handleGenerateWithCache(args: unknown): Promise<ToolResult<GenerationResult>> {
    return this.run("generate_with_cache", (processor) => {
      const input = parseToolArgs(GenerateWithCacheArgs, args);
      log.info(`  Cache: ${input.cache_name}`);
      return processor.generateFromCache(input.cache_name, input.prompt, input.model);
    });
  }

  async handleListCaches(): Promise<ToolResult<{ caches: CacheInfo[]; totalCount: number }>> {
    return this.run("list_caches", async (processor) => {
      const caches = await processor.listCaches();
      return { caches, totalCount: caches.length };
    });
  }

  async handleUpdateCacheTtl(args: unknown): Promise<ToolResult<CacheInfo>> {
    return this.run("update_cache_ttl", (processor) => {
      const input = parseToolArgs(UpdateCacheTtlArgs, args);
      return processor.updateCacheTtl(input.cache_name, input.hours);
    });
  }

  async handleDeleteCache(args: unknown): Promise<ToolResult<{ deleted: boolean; cacheName: string }>> {
    return this.run("delete_cache", async (processor) => {
      const input = parseToolArgs(CacheNameArgs, args);
      await processor.deleteCache(input.cache_name);
      return { deleted: true, cacheName: input.cache_name };
    });
  }

  /**
   * Shared envelope: availability check, timing, logging, error capture
   */
  private async run<T>(
    tool: string,
    action: (processor: DocumentProcessor) => Promise<T>
  ): Promise<ToolResult<T>> {
    const startTime = Date.now();
    log.info(`🔧 [TOOL] ${tool} called`);

    if (!this.processor) {
      log.error(`❌ [TOOL] ${tool} failed: Gemini API key not configured`);
      return { success: false, error: NOT_CONFIGURED };
    }

    try {
      const data = await action(this.processor);
      log.success(`✅ [TOOL] ${tool} completed in ${Date.now() - startTime}ms`);
      return { success: true, data };
    } catch (error) {
      const message = errorMessage(error);
      log.error(`❌ [TOOL] ${tool} failed: ${message}`);
      return { success: false, error: message };
    }
  }
}
