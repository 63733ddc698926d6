/**
 * Document Processor
 *
 * Orchestrates uploads, context caches and generation for single files,
 * URLs, file sets and whole folders. Every remote call goes through
 * FileManager / CacheManager or the SDK models API.
 */

import fs from "fs";
import path from "path";
import { createPartFromUri, createUserContent } from "@google/genai";
import { CONFIG, normalizeExtension } from "../config.js";
import { ErrorCode, GeminiParserError, errorMessage, isMissingPathError, toGeminiParserError } from "../errors.js";
import { log } from "../utils/logger.js";
import { detectMimeType, isSupportedFile, parseContentType } from "../utils/mime-types.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import { runWorkerPool } from "../utils/worker-pool.js";
import { CacheManager } from "./cache-manager.js";
import { createGeminiClient, type GeminiClient } from "./client.js";
import { FileManager, inspectLocalFile, type LocalFileInfo } from "./file-manager.js";
import { sumUsage, toGenerationResult } from "./generation.js";
import { PDF_LIMITS, analyzePdf, chunkPdf, cleanupChunks } from "./pdf-chunker.js";
import type {
  CacheInfo,
  CreateCacheFromFilesOptions,
  DocumentProcessorOptions,
  FolderOptions,
  FolderResult,
  GenerationResult,
  ProcessOptions,
  UploadedFile,
} from "./types.js";

interface ResolvedCall {
  model: string;
  prompt: string;
}

type FolderOutcome = { input: string; output: string } | { input: string; skipReason: string };

export class DocumentProcessor {
  readonly client: GeminiClient;
  readonly files: FileManager;
  readonly caches: CacheManager;
  readonly model: string;
  readonly prompt: string;

  private readonly retry: Omit<RetryOptions, "label">;
  private readonly maxConcurrency: number;
  private readonly pagesPerChunk?: number;
  private readonly outputExtension: string;

  constructor(options: DocumentProcessorOptions = {}, client?: GeminiClient) {
    this.client = client ?? createGeminiClient(options.apiKey ?? CONFIG.geminiApiKey);
    this.model = options.model ?? CONFIG.defaultModel;
    this.prompt = options.prompt ?? CONFIG.defaultPrompt;
    this.retry = {
      maxRetries: options.maxRetries ?? CONFIG.maxRetries,
      delayMs: options.retryDelayMs ?? CONFIG.retryDelayMs,
    };
    this.maxConcurrency = options.maxConcurrency ?? CONFIG.maxConcurrency;
    this.pagesPerChunk = options.pagesPerChunk ?? CONFIG.pagesPerChunk;
    this.outputExtension = normalizeExtension(options.outputExtension ?? CONFIG.outputExtension);

    this.files = new FileManager(this.client, {
      maxRetries: this.retry.maxRetries,
      retryDelayMs: this.retry.delayMs,
      pollIntervalMs: options.filePollIntervalMs,
      processingTimeoutMs: options.fileProcessingTimeoutMs,
    });
    this.caches = new CacheManager(this.client, {
      maxRetries: this.retry.maxRetries,
      retryDelayMs: this.retry.delayMs,
      systemInstruction: options.systemInstruction,
    });

    log.debug(`DocumentProcessor ready (model: ${this.model})`);
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  /**
   * Transcribe/summarize one local file
   */
  async processFile(filePath: string, options: ProcessOptions = {}): Promise<GenerationResult> {
    const call = this.resolveCall(options);
    log.info(`📄 Processing file: ${filePath}`);

    const info = await inspectLocalFile(filePath);

    const reused = await this.tryReuseCache(options, call);
    if (reused) return reused;

    if (info.mimeType === "application/pdf") {
      const analysis = await analyzePdf(filePath, this.pagesPerChunk);
      if (analysis.needsChunking) {
        log.info(`✂️  ${analysis.reason}`);
        return this.processChunkedPdf(filePath, options, call);
      }
    }

    const uploaded = await this.files.uploadFile(filePath, { mimeType: info.mimeType });
    return this.generate([uploaded], options, call);
  }

  /**
   * Download a document and process it like a local file
   */
  async processFromUrl(url: string, options: ProcessOptions = {}): Promise<GenerationResult> {
    const call = this.resolveCall(options);
    const target = this.parseHttpUrl(url);
    log.info(`🌐 Processing document from URL: ${target.href}`);

    const reused = await this.tryReuseCache(options, call);
    if (reused) return reused;

    const download = await this.download(target);
    const uploaded = await this.files.uploadFile(download.blob, {
      mimeType: download.mimeType,
      displayName: download.displayName,
    });
    return this.generate([uploaded], options, call);
  }

  /**
   * Upload several files and ask one question over all of them
   */
  async processMultipleFiles(filePaths: string[], options: ProcessOptions = {}): Promise<GenerationResult> {
    if (filePaths.length === 0) {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, "At least one file path is required");
    }

    const call = this.resolveCall(options);
    log.info(`📚 Processing ${filePaths.length} files together`);

    const infos: LocalFileInfo[] = [];
    for (const filePath of filePaths) {
      infos.push(await inspectLocalFile(filePath));
    }

    const reused = await this.tryReuseCache(options, call);
    if (reused) return reused;

    const uploads: UploadedFile[] = [];
    for (const info of infos) {
      uploads.push(await this.files.uploadFile(info.filePath, { mimeType: info.mimeType }));
    }
    return this.generate(uploads, options, call);
  }

  /**
   * Process every supported file in a folder (non-recursive) and write
   * one `<stem>.<ext>` per input. Per-file failures are collected, not thrown.
   */
  async processFolder(folderPath: string, options: FolderOptions = {}): Promise<FolderResult> {
    const stats = await fs.promises.stat(folderPath).catch((error: unknown) => {
      if (isMissingPathError(error)) return undefined;
      throw toGeminiParserError(error);
    });
    if (!stats || !stats.isDirectory()) {
      throw new GeminiParserError(ErrorCode.FOLDER_NOT_FOUND, `Folder does not exist: ${folderPath}`);
    }

    const outputDir = options.outputDir ?? folderPath;
    const ext = normalizeExtension(options.outputExtension ?? this.outputExtension);
    if (ext.length === 0) {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, "Output extension cannot be empty");
    }
    await fs.promises.mkdir(outputDir, { recursive: true });

    const result: FolderResult = { folder: folderPath, outputDir, written: [], skipped: [], failed: [] };

    const entries = await fs.promises.readdir(folderPath, { withFileTypes: true });
    const names = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
    // No output may replace a file already in the folder
    const existing = new Set(names.map((name) => path.resolve(folderPath, name)));
    const inputs: string[] = [];
    for (const name of names) {
      const input = path.join(folderPath, name);
      if (isSupportedFile(input)) {
        inputs.push(input);
      } else {
        log.warning(`⚠️  Skipping unsupported file: ${name}`);
        result.skipped.push({ input, reason: "unsupported file type" });
      }
    }

    log.info(`📂 Processing folder ${folderPath}: ${inputs.length} file(s) → ${outputDir}`);

    const processOptions: ProcessOptions = {
      prompt: options.prompt,
      model: options.model,
      useCache: options.useCache,
      cacheTtlHours: options.cacheTtlHours,
      systemInstruction: options.systemInstruction,
    };

    await runWorkerPool(
      inputs,
      async (input): Promise<FolderOutcome> => {
        const output = path.join(outputDir, `${path.parse(input).name}.${ext}`);
        if (existing.has(path.resolve(output))) {
          return { input, skipReason: "output would overwrite input" };
        }

        const generation = await this.processFile(input, processOptions);
        if (generation.text.trim().length === 0) {
          return { input, skipReason: "empty response" };
        }

        await fs.promises.writeFile(output, generation.text, "utf-8");
        return { input, output };
      },
      {
        concurrency: options.concurrency ?? this.maxConcurrency,
        onSettled: async ({ index, completed, total, result: outcome, error }) => {
          const input = inputs[index];
          if (error) {
            log.error(`❌ Failed: ${path.basename(input)}: ${error.message}`);
            result.failed.push({ input, error: error.message });
          } else if (outcome && "output" in outcome) {
            log.success(`💾 Saved to ${outcome.output}`);
            result.written.push({ input, output: outcome.output });
          } else if (outcome) {
            log.warning(`⚠️  No output for ${path.basename(input)} (${outcome.skipReason})`);
            result.skipped.push({ input, reason: outcome.skipReason });
          }
          try {
            await options.onProgress?.(path.basename(input), completed, total);
          } catch (progressError) {
            log.warning(`⚠️  Progress callback failed: ${errorMessage(progressError)}`);
          }
        },
      }
    );

    const byInput = (a: { input: string }, b: { input: string }) => a.input.localeCompare(b.input);
    result.written.sort(byInput);
    result.skipped.sort(byInput);
    result.failed.sort(byInput);

    log.info(
      `📊 Folder done: ${result.written.length} written, ${result.skipped.length} skipped, ${result.failed.length} failed`
    );
    return result;
  }

  // ===========================================================================
  // Caches
  // ===========================================================================

  async generateFromCache(cacheName: string, prompt?: string, model?: string): Promise<GenerationResult> {
    if (cacheName.trim().length === 0) {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, "Cache name cannot be empty");
    }
    return this.caches.generateWithCache({
      model: model ?? this.model,
      cacheName,
      prompt: prompt ?? this.prompt,
    });
  }

  /**
   * Upload files and store them in a new cache for repeated questions
   */
  async createCacheFromFiles(filePaths: string[], options: CreateCacheFromFilesOptions = {}): Promise<CacheInfo> {
    if (filePaths.length === 0) {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, "At least one file path is required");
    }

    const uploads: UploadedFile[] = [];
    for (const filePath of filePaths) {
      uploads.push(await this.files.uploadFile(filePath));
    }

    return this.caches.createCache({
      model: options.model ?? this.model,
      files: uploads,
      systemInstruction: options.systemInstruction,
      ttlHours: options.ttlHours,
      displayName: options.displayName,
    });
  }

  listCaches(): Promise<CacheInfo[]> {
    return this.caches.listCaches();
  }

  getCache(cacheName: string): Promise<CacheInfo> {
    return this.caches.getCache(cacheName);
  }

  updateCacheTtl(cacheName: string, hours?: number): Promise<CacheInfo> {
    return this.caches.updateCacheTtl(cacheName, hours);
  }

  deleteCache(cacheName: string): Promise<void> {
    return this.caches.deleteCache(cacheName);
  }

  // ===========================================================================
  // Files
  // ===========================================================================

  listFiles(): Promise<UploadedFile[]> {
    return this.files.listFiles();
  }

  getFile(fileName: string): Promise<UploadedFile> {
    return this.files.getFile(fileName);
  }

  deleteFile(fileName: string): Promise<void> {
    return this.files.deleteFile(fileName);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private resolveCall(options: ProcessOptions): ResolvedCall {
    return {
      model: options.model ?? this.model,
      prompt: options.prompt ?? this.prompt,
    };
  }

  /**
   * Generate from `options.cacheName` when it is still usable
   */
  private async tryReuseCache(options: ProcessOptions, call: ResolvedCall): Promise<GenerationResult | undefined> {
    if (!options.cacheName) return undefined;

    if (await this.caches.isCacheUsable(options.cacheName)) {
      log.info(`♻️  Reusing cache ${options.cacheName}`);
      return this.caches.generateWithCache({ model: call.model, cacheName: options.cacheName, prompt: call.prompt });
    }

    log.warning(`⚠️  Cache ${options.cacheName} is expired or missing, uploading fresh content`);
    return undefined;
  }

  /**
   * Generate from freshly uploaded files, through a new cache if requested
   */
  private async generate(
    uploads: UploadedFile[],
    options: ProcessOptions,
    call: ResolvedCall
  ): Promise<GenerationResult> {
    const filesUsed = uploads.map((file) => file.name);

    if (options.useCache) {
      const cache = await this.caches.createCache({
        model: call.model,
        files: uploads,
        systemInstruction: options.systemInstruction,
        ttlHours: options.cacheTtlHours,
      });
      const result = await this.caches.generateWithCache({
        model: call.model,
        cacheName: cache.name,
        prompt: call.prompt,
      });
      return { ...result, filesUsed };
    }

    log.info(`🧠 Generating with ${call.model} over ${uploads.length} file(s)`);
    const response = await withRetry(
      () =>
        this.client.models.generateContent({
          model: call.model,
          contents: createUserContent([
            ...uploads.map((file) => createPartFromUri(file.uri, file.mimeType)),
            call.prompt,
          ]),
        }),
      { ...this.retry, label: "Generate" }
    );

    return toGenerationResult(response, call.model, { filesUsed });
  }

  /**
   * Split a PDF, process each chunk in order and join the texts
   */
  private async processChunkedPdf(
    filePath: string,
    options: ProcessOptions,
    call: ResolvedCall
  ): Promise<GenerationResult> {
    if (options.useCache) {
      log.warning("⚠️  Caching is not applied to chunked PDFs; each chunk is generated directly");
    }

    const chunks = await chunkPdf(filePath, this.pagesPerChunk ?? PDF_LIMITS.defaultChunkPages);

    try {
      const parts: GenerationResult[] = [];
      for (const chunk of chunks) {
        log.info(`  Part ${chunk.index + 1}/${chunk.total} (pages ${chunk.first}-${chunk.last})`);
        const uploaded = await this.files.uploadFile(chunk.filePath, {
          mimeType: "application/pdf",
          displayName: `${path.basename(filePath)} (Part ${chunk.index + 1}/${chunk.total})`,
        });
        parts.push(await this.generate([uploaded], { ...options, useCache: false }, call));
      }

      return {
        text: parts.map((part) => part.text).join("\n\n"),
        model: call.model,
        filesUsed: parts.flatMap((part) => part.filesUsed),
        usage: sumUsage(parts.map((part) => part.usage)),
      };
    } finally {
      await cleanupChunks(chunks);
    }
  }

  private parseHttpUrl(url: string): URL {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, `Invalid URL: ${url} (${errorMessage(error)})`);
    }
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, `Only http(s) URLs are supported: ${url}`);
    }
    return target;
  }

  private async download(target: URL): Promise<{ blob: Blob; mimeType: string; displayName: string }> {
    return withRetry(
      async () => {
        const response = await fetch(target);
        if (!response.ok) {
          throw new GeminiParserError(
            ErrorCode.DOWNLOAD_FAILED,
            `Failed to download ${target.href}: HTTP ${response.status}`,
            response.status
          );
        }

        const blob = await response.blob();
        if (blob.size === 0) {
          throw new GeminiParserError(ErrorCode.DOWNLOAD_FAILED, `Downloaded document is empty: ${target.href}`);
        }

        const headerType = parseContentType(response.headers.get("content-type"));
        const mimeType =
          headerType && headerType !== "application/octet-stream"
            ? headerType
            : detectMimeType(target.pathname) ?? "application/pdf";
        const displayName = path.posix.basename(target.pathname) || target.hostname;

        log.info(`⬇️  Downloaded ${displayName} (${blob.size} bytes, ${mimeType})`);
        return { blob, mimeType, displayName };
      },
      { ...this.retry, label: `Download ${target.href}` }
    );
  }
}
