import { ApiError } from "@google/genai";
import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  GeminiParserError,
  isMissingPathError,
  isRetryable,
  toGeminiParserError,
} from "./errors.js";

describe("toGeminiParserError", () => {
  it.each([
    [401, ErrorCode.AUTH_ERROR],
    [403, ErrorCode.AUTH_ERROR],
    [404, ErrorCode.NOT_FOUND],
    [429, ErrorCode.RATE_LIMITED],
    [500, ErrorCode.PROVIDER_UNAVAILABLE],
    [503, ErrorCode.PROVIDER_UNAVAILABLE],
    [400, ErrorCode.PROVIDER_ERROR],
  ])("maps HTTP %i to %s", (status, code) => {
    const apiError = new ApiError({ message: "request failed", status });
    const error = toGeminiParserError(apiError);

    expect(error.code).toBe(code);
    expect(error.status).toBe(status);
    expect(error.message).toBe("request failed");
    expect(error.cause).toBe(apiError);
  });

  it("returns existing GeminiParserErrors unchanged", () => {
    const original = new GeminiParserError(ErrorCode.FILE_NOT_FOUND, "File not found: a.pdf");
    expect(toGeminiParserError(original)).toBe(original);
  });

  it("treats fetch failures as network errors", () => {
    const error = toGeminiParserError(new TypeError("fetch failed"));
    expect(error.code).toBe(ErrorCode.NETWORK_ERROR);
  });

  it("wraps anything else as a provider error", () => {
    expect(toGeminiParserError(new Error("boom"))).toMatchObject({
      code: ErrorCode.PROVIDER_ERROR,
      message: "boom",
    });
    expect(toGeminiParserError("plain string").message).toBe("plain string");
  });
});

describe("isRetryable", () => {
  it("retries rate limits, outages and network errors only", () => {
    expect(isRetryable(new GeminiParserError(ErrorCode.RATE_LIMITED, "slow down"))).toBe(true);
    expect(isRetryable(new GeminiParserError(ErrorCode.PROVIDER_UNAVAILABLE, "503"))).toBe(true);
    expect(isRetryable(new GeminiParserError(ErrorCode.NETWORK_ERROR, "fetch failed"))).toBe(true);
    expect(isRetryable(new GeminiParserError(ErrorCode.AUTH_ERROR, "denied"))).toBe(false);
    expect(isRetryable(new Error("boom"))).toBe(false);
  });
});

describe("isMissingPathError", () => {
  it("recognizes ENOENT and ENOTDIR", () => {
    expect(isMissingPathError(Object.assign(new Error("missing"), { code: "ENOENT" }))).toBe(true);
    expect(isMissingPathError(Object.assign(new Error("not a dir"), { code: "ENOTDIR" }))).toBe(true);
    expect(isMissingPathError(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isMissingPathError("ENOENT")).toBe(false);
  });
});
