/**
 * Error types
 *
 * Every failure the library raises is a GeminiParserError carrying a
 * machine-readable code. SDK errors are translated by toGeminiParserError.
 */

import { ApiError } from "@google/genai";

export enum ErrorCode {
  MISSING_API_KEY = "MISSING_API_KEY",
  CONFIG_INVALID = "CONFIG_INVALID",
  INVALID_INPUT = "INVALID_INPUT",
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  FOLDER_NOT_FOUND = "FOLDER_NOT_FOUND",
  UNSUPPORTED_FILE_TYPE = "UNSUPPORTED_FILE_TYPE",
  DOWNLOAD_FAILED = "DOWNLOAD_FAILED",
  FILE_PROCESSING_FAILED = "FILE_PROCESSING_FAILED",
  FILE_PROCESSING_TIMEOUT = "FILE_PROCESSING_TIMEOUT",
  AUTH_ERROR = "AUTH_ERROR",
  NOT_FOUND = "NOT_FOUND",
  RATE_LIMITED = "RATE_LIMITED",
  PROVIDER_UNAVAILABLE = "PROVIDER_UNAVAILABLE",
  PROVIDER_ERROR = "PROVIDER_ERROR",
  NETWORK_ERROR = "NETWORK_ERROR",
  EMPTY_RESPONSE = "EMPTY_RESPONSE",
}

export class GeminiParserError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "GeminiParserError";
  }
}

/** Codes worth another attempt after a delay */
export const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.RATE_LIMITED,
  ErrorCode.PROVIDER_UNAVAILABLE,
  ErrorCode.NETWORK_ERROR,
]);

export function isRetryable(error: unknown): boolean {
  return error instanceof GeminiParserError && RETRYABLE_CODES.has(error.code);
}

function codeForStatus(status: number): ErrorCode {
  if (status === 401 || status === 403) return ErrorCode.AUTH_ERROR;
  if (status === 404) return ErrorCode.NOT_FOUND;
  if (status === 429) return ErrorCode.RATE_LIMITED;
  if (status >= 500) return ErrorCode.PROVIDER_UNAVAILABLE;
  return ErrorCode.PROVIDER_ERROR;
}

/**
 * Normalize anything thrown by the SDK, fetch or the filesystem.
 */
export function toGeminiParserError(error: unknown): GeminiParserError {
  if (error instanceof GeminiParserError) {
    return error;
  }

  if (error instanceof ApiError) {
    return new GeminiParserError(codeForStatus(error.status), error.message, error.status, error);
  }

  if (error instanceof TypeError && error.message === "fetch failed") {
    return new GeminiParserError(ErrorCode.NETWORK_ERROR, error.message, undefined, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new GeminiParserError(ErrorCode.PROVIDER_ERROR, message, undefined, error);
}

/** ENOENT/ENOTDIR from fs calls on a path that does not exist */
export function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
