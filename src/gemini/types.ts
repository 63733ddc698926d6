/**
 * Gemini document processing types
 */

import type { ProgressCallback } from "../types.js";

// =============================================================================
// Files API
// =============================================================================

/**
 * File processing state
 */
export type UploadState = "PROCESSING" | "ACTIVE" | "FAILED";

/**
 * Uploaded file metadata (the "file handle")
 */
export interface UploadedFile {
  /** Resource name, e.g. files/abc-123 */
  name: string;
  displayName?: string;
  mimeType: string;
  sizeBytes?: number;
  createTime?: string;
  /** Files expire 48h after upload */
  expirationTime?: string;
  state: UploadState;
  /** URI used in fileData parts */
  uri: string;
  /** Error details if state is FAILED */
  error?: string;
}

/**
 * What can be uploaded: a local path or in-memory bytes
 */
export type UploadSource = string | Blob;

export interface UploadOptions {
  /** Overrides extension-based detection */
  mimeType?: string;
  displayName?: string;
}

// =============================================================================
// Caches API
// =============================================================================

/**
 * Server-side cache metadata. Cached contents themselves are not retrievable.
 */
export interface CacheInfo {
  /** Resource name, e.g. cachedContents/xyz */
  name: string;
  displayName?: string;
  model?: string;
  createTime?: string;
  updateTime?: string;
  expireTime?: string;
  totalTokenCount?: number;
}

export interface CreateCacheOptions {
  model: string;
  files: UploadedFile[];
  systemInstruction?: string;
  /** Time to live in hours; server default applies when omitted */
  ttlHours?: number;
  displayName?: string;
}

export interface GenerateWithCacheOptions {
  model: string;
  cacheName: string;
  prompt: string;
}

// =============================================================================
// Generation
// =============================================================================

export interface TokenUsage {
  promptTokens?: number;
  outputTokens?: number;
  cachedTokens?: number;
  totalTokens?: number;
}

export interface GenerationResult {
  /** Generated text ("" when the model returned no text) */
  text: string;
  model: string;
  /** Cache the answer was generated from, if any */
  cacheName?: string;
  /** File handles sent with the request (empty when a cache was reused) */
  filesUsed: string[];
  usage?: TokenUsage;
}

// =============================================================================
// Orchestration
// =============================================================================

export interface DocumentProcessorOptions {
  /** Defaults to CONFIG.geminiApiKey */
  apiKey?: string;
  /** Defaults to CONFIG.defaultModel */
  model?: string;
  /** Defaults to CONFIG.defaultPrompt */
  prompt?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Parallel files in folder mode */
  maxConcurrency?: number;
  /** Split PDFs into chunks of this many pages before processing */
  pagesPerChunk?: number;
  outputExtension?: string;
  filePollIntervalMs?: number;
  fileProcessingTimeoutMs?: number;
  /** System instruction for caches created without one; defaults to CONFIG.cacheSystemInstruction */
  systemInstruction?: string;
}

/**
 * Per-call options shared by every process* operation
 */
export interface ProcessOptions {
  prompt?: string;
  model?: string;
  /** Create a cache over the uploaded content and generate from it */
  useCache?: boolean;
  /** TTL for a cache created by this call */
  cacheTtlHours?: number;
  /** Existing cache to reuse; falls back to a fresh upload when unusable */
  cacheName?: string;
  /** System instruction for a cache created by this call */
  systemInstruction?: string;
}

/**
 * Folder mode: every input gets its own upload, so an existing cache
 * cannot be reused here
 */
export interface FolderOptions extends Omit<ProcessOptions, "cacheName"> {
  /** Defaults to the input folder */
  outputDir?: string;
  outputExtension?: string;
  concurrency?: number;
  onProgress?: ProgressCallback;
}

export interface FolderResult {
  folder: string;
  outputDir: string;
  written: Array<{ input: string; output: string }>;
  skipped: Array<{ input: string; reason: string }>;
  failed: Array<{ input: string; error: string }>;
}

export interface CreateCacheFromFilesOptions {
  model?: string;
  systemInstruction?: string;
  ttlHours?: number;
  displayName?: string;
}
