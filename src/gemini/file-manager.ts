/**
 * Gemini Files API wrapper
 *
 * Uploads local files or in-memory bytes and returns the file handle used
 * in later generate and cache calls. Uploaded files are retained for 48
 * hours; the ~20GB size limit is enforced server-side.
 */

import fs from "fs";
import path from "path";
import { FileState, type File as GenAIFile } from "@google/genai";
import { CONFIG } from "../config.js";
import { ErrorCode, GeminiParserError, isMissingPathError, toGeminiParserError } from "../errors.js";
import { log } from "../utils/logger.js";
import { detectMimeType } from "../utils/mime-types.js";
import { sleep, withRetry, type RetryOptions } from "../utils/retry.js";
import type { GeminiClient } from "./client.js";
import { formatBytes } from "./pdf-chunker.js";
import type { UploadedFile, UploadOptions, UploadSource, UploadState } from "./types.js";

export interface FileManagerOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  pollIntervalMs?: number;
  processingTimeoutMs?: number;
}

export interface LocalFileInfo {
  filePath: string;
  sizeBytes: number;
  mimeType: string;
}

/**
 * Check that a path is an existing regular file of a supported type
 *
 * @param mimeType - explicit type; skips extension detection
 */
export async function inspectLocalFile(filePath: string, mimeType?: string): Promise<LocalFileInfo> {
  const stats = await fs.promises.stat(filePath).catch((error: unknown) => {
    if (isMissingPathError(error)) return undefined;
    throw toGeminiParserError(error);
  });

  if (!stats || !stats.isFile()) {
    throw new GeminiParserError(ErrorCode.FILE_NOT_FOUND, `File not found: ${filePath}`);
  }

  const resolvedType = mimeType ?? detectMimeType(filePath);
  if (!resolvedType) {
    throw new GeminiParserError(
      ErrorCode.UNSUPPORTED_FILE_TYPE,
      `Unsupported file type: ${path.extname(filePath) || "(no extension)"} (${filePath})`
    );
  }

  return { filePath, sizeBytes: stats.size, mimeType: resolvedType };
}

export class FileManager {
  private readonly client: GeminiClient;
  private readonly retry: Omit<RetryOptions, "label">;
  private readonly pollIntervalMs: number;
  private readonly processingTimeoutMs: number;

  constructor(client: GeminiClient, options: FileManagerOptions = {}) {
    this.client = client;
    this.retry = {
      maxRetries: options.maxRetries ?? CONFIG.maxRetries,
      delayMs: options.retryDelayMs ?? CONFIG.retryDelayMs,
    };
    this.pollIntervalMs = options.pollIntervalMs ?? CONFIG.filePollIntervalMs;
    this.processingTimeoutMs = options.processingTimeoutMs ?? CONFIG.fileProcessingTimeoutMs;
  }

  /**
   * Upload a local file or a Blob and wait until it is ACTIVE
   */
  async uploadFile(source: UploadSource, options: UploadOptions = {}): Promise<UploadedFile> {
    let mimeType: string;
    let displayName = options.displayName;

    if (typeof source === "string") {
      const info = await inspectLocalFile(source, options.mimeType);
      mimeType = info.mimeType;
      displayName ??= path.basename(source);
      log.info(`📤 Uploading ${displayName} (${formatBytes(info.sizeBytes)}, ${mimeType})`);
    } else {
      mimeType = options.mimeType ?? (source.type || "application/pdf");
      log.info(`📤 Uploading ${displayName ?? "in-memory document"} (${formatBytes(source.size)}, ${mimeType})`);
    }

    const uploaded = await withRetry(
      () =>
        this.client.files.upload({
          file: source,
          config: { mimeType, displayName },
        }),
      { ...this.retry, label: "Upload" }
    );

    let file = this.mapFile(uploaded);
    if (file.state === "PROCESSING") {
      file = await this.waitForFileProcessing(file.name);
    } else if (file.state === "FAILED") {
      throw new GeminiParserError(
        ErrorCode.FILE_PROCESSING_FAILED,
        `File processing failed: ${file.error || "Unknown error"}`
      );
    }

    log.success(`✅ Uploaded: ${file.name}`);
    return file;
  }

  /**
   * Poll until the file leaves the PROCESSING state
   */
  async waitForFileProcessing(fileName: string): Promise<UploadedFile> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.processingTimeoutMs) {
      const file = await this.getFile(fileName);

      if (file.state === "ACTIVE") {
        return file;
      }

      if (file.state === "FAILED") {
        throw new GeminiParserError(
          ErrorCode.FILE_PROCESSING_FAILED,
          `File processing failed: ${file.error || "Unknown error"}`
        );
      }

      log.dim(`  ⏳ ${fileName} still processing...`);
      await sleep(this.pollIntervalMs);
    }

    throw new GeminiParserError(
      ErrorCode.FILE_PROCESSING_TIMEOUT,
      `File processing timed out after ${this.processingTimeoutMs / 1000} seconds`
    );
  }

  async getFile(fileName: string): Promise<UploadedFile> {
    const file = await withRetry(() => this.client.files.get({ name: fileName }), {
      ...this.retry,
      label: `Get file ${fileName}`,
    });
    return this.mapFile(file);
  }

  /**
   * List every file stored via the Files API (all pages)
   */
  async listFiles(): Promise<UploadedFile[]> {
    const pager = await withRetry(() => this.client.files.list({ config: { pageSize: 100 } }), {
      ...this.retry,
      label: "List files",
    });

    const files: UploadedFile[] = [];
    try {
      for await (const file of pager) {
        files.push(this.mapFile(file));
      }
    } catch (error) {
      throw toGeminiParserError(error);
    }

    log.info(`📁 Found ${files.length} uploaded file(s)`);
    return files;
  }

  async deleteFile(fileName: string): Promise<void> {
    await withRetry(() => this.client.files.delete({ name: fileName }), {
      ...this.retry,
      label: `Delete file ${fileName}`,
    });
    log.info(`🗑️  Deleted file: ${fileName}`);
  }

  private mapFile(file: GenAIFile): UploadedFile {
    return {
      name: file.name || "",
      displayName: file.displayName,
      mimeType: file.mimeType || "application/octet-stream",
      sizeBytes: file.sizeBytes !== undefined ? Number(file.sizeBytes) : undefined,
      createTime: file.createTime,
      expirationTime: file.expirationTime,
      state: this.mapState(file.state),
      uri: file.uri || "",
      error: file.error?.message,
    };
  }

  private mapState(state: FileState | undefined): UploadState {
    if (state === FileState.ACTIVE) return "ACTIVE";
    if (state === FileState.FAILED) return "FAILED";
    return "PROCESSING";
  }
}
