/**
 * Configuration
 *
 * Values come from the environment (the CLI and server load `.env` first).
 *
 * Environment Variables:
 *   GEMINI_API_KEY - API key for the Gemini API
 *   GEMINI_MODEL - Default model (default: gemini-2.0-flash)
 *   GEMINI_PARSER_PROMPT - Default prompt sent with every document
 *   GEMINI_PARSER_SYSTEM_INSTRUCTION - System instruction stored in new caches
 *   GEMINI_PARSER_MAX_RETRIES - Retries for rate-limited/unavailable calls (default: 3)
 *   GEMINI_PARSER_RETRY_DELAY_MS - Initial retry delay, doubled per attempt (default: 2000)
 *   GEMINI_PARSER_MAX_CONCURRENCY - Files processed in parallel in folder mode (default: 2)
 *   GEMINI_PARSER_PAGES_PER_CHUNK - Split PDFs into chunks of this many pages
 *   GEMINI_PARSER_OUTPUT_EXT - Output extension in folder mode (default: md)
 *   GEMINI_PARSER_FILE_POLL_MS - Poll interval while an upload is processing (default: 2000)
 *   GEMINI_PARSER_FILE_TIMEOUT_MS - Give up on upload processing after (default: 60000)
 *   LOG_LEVEL - debug | info | warning | error | silent (default: info)
 */

import { z } from "zod";
import { ErrorCode, GeminiParserError } from "./errors.js";
import { parseLogLevel, type LogLevel } from "./utils/logger.js";

export const DEFAULT_MODEL = "gemini-2.0-flash";
export const DEFAULT_PROMPT =
  "Transcribe this document into text format preserving layout and formatting.";
export const DEFAULT_SYSTEM_INSTRUCTION = "You are processing documents efficiently.";

const optionalString = z.preprocess(
  (val) => (typeof val === "string" && val.trim().length > 0 ? val.trim() : undefined),
  z.string().optional()
);

const intWithDefault = (fallback: number, min: number) =>
  z.preprocess(
    (val) => (val === undefined || val === "" ? fallback : Number(val)),
    z.number().int().min(min)
  );

const envSchema = z.object({
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: optionalString,
  GEMINI_PARSER_PROMPT: optionalString,
  GEMINI_PARSER_SYSTEM_INSTRUCTION: optionalString,
  GEMINI_PARSER_MAX_RETRIES: intWithDefault(3, 0),
  GEMINI_PARSER_RETRY_DELAY_MS: intWithDefault(2000, 0),
  GEMINI_PARSER_MAX_CONCURRENCY: intWithDefault(2, 1),
  GEMINI_PARSER_PAGES_PER_CHUNK: z.preprocess(
    (val) => (val === undefined || val === "" ? undefined : Number(val)),
    z.number().int().min(1).optional()
  ),
  GEMINI_PARSER_OUTPUT_EXT: optionalString,
  GEMINI_PARSER_FILE_POLL_MS: intWithDefault(2000, 1),
  GEMINI_PARSER_FILE_TIMEOUT_MS: intWithDefault(60000, 1),
  LOG_LEVEL: optionalString,
});

export interface Config {
  geminiApiKey?: string;
  defaultModel: string;
  defaultPrompt: string;
  cacheSystemInstruction: string;
  maxRetries: number;
  retryDelayMs: number;
  maxConcurrency: number;
  pagesPerChunk?: number;
  outputExtension: string;
  filePollIntervalMs: number;
  fileProcessingTimeoutMs: number;
  logLevel: LogLevel;
}

/**
 * Build a Config from an environment map.
 * Throws CONFIG_INVALID listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new GeminiParserError(ErrorCode.CONFIG_INVALID, `Invalid environment variables: ${issues}`);
  }

  const vars = parsed.data;
  return {
    geminiApiKey: vars.GEMINI_API_KEY,
    defaultModel: vars.GEMINI_MODEL ?? DEFAULT_MODEL,
    defaultPrompt: vars.GEMINI_PARSER_PROMPT ?? DEFAULT_PROMPT,
    cacheSystemInstruction: vars.GEMINI_PARSER_SYSTEM_INSTRUCTION ?? DEFAULT_SYSTEM_INSTRUCTION,
    maxRetries: vars.GEMINI_PARSER_MAX_RETRIES,
    retryDelayMs: vars.GEMINI_PARSER_RETRY_DELAY_MS,
    maxConcurrency: vars.GEMINI_PARSER_MAX_CONCURRENCY,
    pagesPerChunk: vars.GEMINI_PARSER_PAGES_PER_CHUNK,
    outputExtension: normalizeExtension(vars.GEMINI_PARSER_OUTPUT_EXT ?? "md"),
    filePollIntervalMs: vars.GEMINI_PARSER_FILE_POLL_MS,
    fileProcessingTimeoutMs: vars.GEMINI_PARSER_FILE_TIMEOUT_MS,
    logLevel: parseLogLevel(vars.LOG_LEVEL),
  };
}

/** "md", ".md" and " .MD " all become "md" */
export function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\.+/, "").toLowerCase();
}

export const CONFIG: Config = loadConfig();
