/**
 * Gemini Document Parser
 *
 * Library entry point. Upload documents to the Gemini Files API, cache them
 * server-side and generate text from them.
 *
 * @example
 * ```ts
 * import { DocumentProcessor } from "gemini-doc-parser";
 *
 * const processor = new DocumentProcessor({ apiKey: process.env.GEMINI_API_KEY });
 * const { text } = await processor.processFile("report.pdf", { prompt: "Summarize this report" });
 * ```
 */

export * from "./gemini/index.js";
export {
  ErrorCode,
  GeminiParserError,
  RETRYABLE_CODES,
  isRetryable,
  toGeminiParserError,
} from "./errors.js";
export {
  CONFIG,
  DEFAULT_MODEL,
  DEFAULT_PROMPT,
  DEFAULT_SYSTEM_INSTRUCTION,
  loadConfig,
  normalizeExtension,
  type Config,
} from "./config.js";
export { Logger, log, parseLogLevel, type LogLevel } from "./utils/logger.js";
export { SUPPORTED_MIME_TYPES, detectMimeType, isSupportedFile } from "./utils/mime-types.js";
export { withRetry, type RetryOptions } from "./utils/retry.js";
export { runWorkerPool } from "./utils/worker-pool.js";
export { DocumentParserServer } from "./server.js";
export type { ProgressCallback, ToolResult } from "./types.js";
