import fs from "node:fs";
import path from "node:path";
import { ApiError } from "@google/genai";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DocumentProcessor } from "../gemini/index.js";
import { FAR_FUTURE, createFakeClient, pager, type FakeGeminiClient } from "../test-support/fake-gemini.js";
import { makeTempDir, removeDir, writeText } from "../test-support/files.js";
import type { ProgressCallback } from "../types.js";
import { ToolHandlers, buildToolDefinitions } from "./index.js";

describe("ToolHandlers", () => {
  let dir: string;
  let client: FakeGeminiClient;
  let handlers: ToolHandlers;

  beforeEach(async () => {
    dir = await makeTempDir();
    client = createFakeClient();
    handlers = new ToolHandlers(
      new DocumentProcessor(
        { model: "gemini-test", prompt: "Transcribe", maxRetries: 0, retryDelayMs: 0, filePollIntervalMs: 0 },
        client
      )
    );
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("rejects unknown tools", async () => {
    await expect(handlers.handleToolCall("summon_pdf", {})).resolves.toEqual({
      success: false,
      error: "Unknown tool: summon_pdf",
    });
  });

  it("reports missing arguments", async () => {
    const result = await handlers.handleToolCall("process_file", {});

    expect(result).toEqual({ success: false, error: "Invalid arguments: file_path: Required" });
    expect(client.files.upload).not.toHaveBeenCalled();
  });

  it("reports malformed URLs", async () => {
    const result = await handlers.handleToolCall("process_url", { url: "not a url" });

    expect(result).toEqual({ success: false, error: "Invalid arguments: url: Invalid url" });
  });

  it("processes a file", async () => {
    const file = await writeText(path.join(dir, "notes.txt"));

    const result = await handlers.handleToolCall("process_file", { file_path: file, prompt: "Summarize" });

    expect(result).toEqual({
      success: true,
      data: { text: "generated text", model: "gemini-test", filesUsed: ["files/notes.txt"] },
    });
    expect(client.models.generateContent.mock.calls[0][0].contents).toMatchObject({
      parts: [{}, { text: "Summarize" }],
    });
  });

  it("returns processing failures as errors", async () => {
    const result = await handlers.handleToolCall("process_file", { file_path: path.join(dir, "missing.pdf") });

    expect(result).toEqual({ success: false, error: `File not found: ${path.join(dir, "missing.pdf")}` });
  });

  it("forwards folder progress", async () => {
    const folder = path.join(dir, "in");
    await makeFolder(folder);
    const sendProgress = vi.fn<ProgressCallback>();

    const result = await handlers.handleToolCall(
      "process_folder",
      { folder_path: folder, output_dir: path.join(dir, "out") },
      sendProgress
    );

    expect(result.success).toBe(true);
    expect(sendProgress).toHaveBeenCalledWith("a.txt", 1, 1);
  });

  it("extends a cache by two hours by default", async () => {
    const result = await handlers.handleToolCall("update_cache_ttl", { cache_name: "cachedContents/abc" });

    expect(client.caches.update).toHaveBeenCalledWith({ name: "cachedContents/abc", config: { ttl: "7200s" } });
    expect(result).toEqual({ success: true, data: { name: "cachedContents/abc", expireTime: FAR_FUTURE } });
  });

  it("lists caches with a count", async () => {
    client.caches.list.mockResolvedValue(pager([{ name: "cachedContents/a" }, { name: "cachedContents/b" }]));

    const result = await handlers.handleToolCall("list_caches", undefined);

    expect(result).toEqual({
      success: true,
      data: { caches: [{ name: "cachedContents/a" }, { name: "cachedContents/b" }], totalCount: 2 },
    });
  });

  it("deletes a cache", async () => {
    const result = await handlers.handleToolCall("delete_cache", { cache_name: "cachedContents/abc" });

    expect(result).toEqual({ success: true, data: { deleted: true, cacheName: "cachedContents/abc" } });
  });

  it("passes provider errors through as messages", async () => {
    client.caches.delete.mockRejectedValue(new ApiError({ message: "Cached content not found", status: 404 }));

    const result = await handlers.handleToolCall("delete_cache", { cache_name: "cachedContents/gone" });

    expect(result).toEqual({ success: false, error: "Cached content not found" });
  });

  it("creates a cache from files", async () => {
    const file = await writeText(path.join(dir, "notes.txt"));

    const result = await handlers.handleToolCall("create_cache", {
      file_paths: [file],
      ttl_hours: 1,
      display_name: "notes",
    });

    expect(result.success).toBe(true);
    expect(client.caches.create).toHaveBeenCalledWith({
      model: "gemini-test",
      config: expect.objectContaining({ ttl: "3600s", displayName: "notes" }),
    });
  });

  it("reports missing configuration on every call", async () => {
    const unconfigured = new ToolHandlers();

    expect(unconfigured.isAvailable()).toBe(false);
    await expect(unconfigured.handleToolCall("list_caches", {})).resolves.toEqual({
      success: false,
      error: "Gemini API key not configured. Set GEMINI_API_KEY environment variable.",
    });
  });
});

describe("buildToolDefinitions", () => {
  it("declares every tool once with an object schema", () => {
    const tools = buildToolDefinitions();
    const names = tools.map((tool) => tool.name);

    expect(names).toHaveLength(11);
    expect(new Set(names).size).toBe(11);
    expect(tools.every((tool) => tool.inputSchema.type === "object")).toBe(true);
  });
});

async function makeFolder(folder: string): Promise<void> {
  await fs.promises.mkdir(folder, { recursive: true });
  await writeText(path.join(folder, "a.txt"));
}
