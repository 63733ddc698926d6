import { describe, expect, it } from "vitest";
import { DEFAULT_MODEL, DEFAULT_PROMPT, DEFAULT_SYSTEM_INSTRUCTION, loadConfig, normalizeExtension } from "./config.js";
import { ErrorCode, GeminiParserError } from "./errors.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      geminiApiKey: undefined,
      defaultModel: DEFAULT_MODEL,
      defaultPrompt: DEFAULT_PROMPT,
      cacheSystemInstruction: DEFAULT_SYSTEM_INSTRUCTION,
      maxRetries: 3,
      retryDelayMs: 2000,
      maxConcurrency: 2,
      pagesPerChunk: undefined,
      outputExtension: "md",
      filePollIntervalMs: 2000,
      fileProcessingTimeoutMs: 60000,
      logLevel: "info",
    });
  });

  it("reads and normalizes overrides", () => {
    const config = loadConfig({
      GEMINI_API_KEY: " test-key ",
      GEMINI_MODEL: "gemini-2.5-pro",
      GEMINI_PARSER_MAX_RETRIES: "5",
      GEMINI_PARSER_MAX_CONCURRENCY: "4",
      GEMINI_PARSER_PAGES_PER_CHUNK: "50",
      GEMINI_PARSER_OUTPUT_EXT: ".TXT",
      LOG_LEVEL: "warn",
    });

    expect(config.geminiApiKey).toBe("test-key");
    expect(config.defaultModel).toBe("gemini-2.5-pro");
    expect(config.maxRetries).toBe(5);
    expect(config.maxConcurrency).toBe(4);
    expect(config.pagesPerChunk).toBe(50);
    expect(config.outputExtension).toBe("txt");
    expect(config.logLevel).toBe("warning");
  });

  it("treats a blank API key as missing", () => {
    expect(loadConfig({ GEMINI_API_KEY: "   " }).geminiApiKey).toBeUndefined();
  });

  it("rejects invalid numbers with CONFIG_INVALID", () => {
    const error = captureError(() =>
      loadConfig({ GEMINI_PARSER_MAX_RETRIES: "many", GEMINI_PARSER_MAX_CONCURRENCY: "0" })
    );

    expect(error).toBeInstanceOf(GeminiParserError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIG_INVALID });
    expect(String(error)).toContain("GEMINI_PARSER_MAX_RETRIES");
    expect(String(error)).toContain("GEMINI_PARSER_MAX_CONCURRENCY");
  });
});

describe("normalizeExtension", () => {
  it("drops leading dots, whitespace and case", () => {
    expect(normalizeExtension("md")).toBe("md");
    expect(normalizeExtension(" .MD ")).toBe("md");
    expect(normalizeExtension("..txt")).toBe("txt");
    expect(normalizeExtension(".")).toBe("");
  });
});
