import { ApiError } from "@google/genai";
import { beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../errors.js";
import {
  FAR_FUTURE,
  LONG_AGO,
  createFakeClient,
  pager,
  textResponse,
  type FakeGeminiClient,
} from "../test-support/fake-gemini.js";
import { CacheManager, toTtl } from "./cache-manager.js";
import type { UploadedFile } from "./types.js";

const pdf: UploadedFile = {
  name: "files/report",
  mimeType: "application/pdf",
  state: "ACTIVE",
  uri: "https://generativelanguage.googleapis.com/v1beta/files/report",
};

const notes: UploadedFile = {
  name: "files/notes",
  mimeType: "text/plain",
  state: "ACTIVE",
  uri: "https://generativelanguage.googleapis.com/v1beta/files/notes",
};

describe("toTtl", () => {
  it("converts hours to whole seconds", () => {
    expect(toTtl(1)).toBe("3600s");
    expect(toTtl(1.5)).toBe("5400s");
  });

  it("rejects non-positive and non-finite hours", () => {
    expect(() => toTtl(0)).toThrow("Cache TTL must be a positive number of hours, got 0");
    expect(() => toTtl(-2)).toThrow("got -2");
    expect(() => toTtl(Number.NaN)).toThrow("got NaN");
  });
});

describe("CacheManager", () => {
  let client: FakeGeminiClient;
  let caches: CacheManager;

  beforeEach(() => {
    client = createFakeClient();
    caches = new CacheManager(client, { maxRetries: 0, retryDelayMs: 0, systemInstruction: "Be brief." });
  });

  describe("createCache", () => {
    it("stores every file as one user turn with the requested TTL", async () => {
      const cache = await caches.createCache({
        model: "gemini-2.0-flash",
        files: [pdf, notes],
        ttlHours: 2,
        displayName: "quarterly",
      });

      expect(client.caches.create).toHaveBeenCalledWith({
        model: "gemini-2.0-flash",
        config: {
          contents: [
            {
              role: "user",
              parts: [
                { fileData: { fileUri: pdf.uri, mimeType: "application/pdf" } },
                { fileData: { fileUri: notes.uri, mimeType: "text/plain" } },
              ],
            },
          ],
          systemInstruction: "Be brief.",
          ttl: "7200s",
          displayName: "quarterly",
        },
      });
      expect(cache).toMatchObject({
        name: "cachedContents/cache-1",
        model: "gemini-2.0-flash",
        displayName: "quarterly",
        expireTime: FAR_FUTURE,
      });
    });

    it("leaves the TTL to the service when omitted", async () => {
      await caches.createCache({ model: "gemini-2.0-flash", files: [pdf], systemInstruction: "Summaries only." });

      const config = client.caches.create.mock.calls[0][0].config;
      expect(config?.ttl).toBeUndefined();
      expect(config?.systemInstruction).toBe("Summaries only.");
    });

    it("requires at least one file", async () => {
      await expect(caches.createCache({ model: "gemini-2.0-flash", files: [] })).rejects.toMatchObject({
        code: ErrorCode.INVALID_INPUT,
      });
      expect(client.caches.create).not.toHaveBeenCalled();
    });

    it("fails when the service returns no name", async () => {
      client.caches.create.mockResolvedValue({ model: "gemini-2.0-flash" });

      await expect(caches.createCache({ model: "gemini-2.0-flash", files: [pdf] })).rejects.toMatchObject({
        code: ErrorCode.PROVIDER_ERROR,
      });
    });
  });

  it("generates from a cache by name", async () => {
    client.models.generateContent.mockResolvedValue(
      textResponse("cached answer", {
        promptTokenCount: 10,
        candidatesTokenCount: 5,
        cachedContentTokenCount: 8,
        totalTokenCount: 15,
      })
    );

    const result = await caches.generateWithCache({
      model: "gemini-2.0-flash",
      cacheName: "cachedContents/abc",
      prompt: "List the deadlines",
    });

    expect(client.models.generateContent).toHaveBeenCalledWith({
      model: "gemini-2.0-flash",
      contents: "List the deadlines",
      config: { cachedContent: "cachedContents/abc" },
    });
    expect(result).toEqual({
      text: "cached answer",
      model: "gemini-2.0-flash",
      cacheName: "cachedContents/abc",
      filesUsed: [],
      usage: { promptTokens: 10, outputTokens: 5, cachedTokens: 8, totalTokens: 15 },
    });
  });

  describe("isCacheUsable", () => {
    const now = Date.parse("2030-06-01T00:00:00Z");

    it("accepts caches that expire in the future", async () => {
      client.caches.get.mockResolvedValue({ name: "cachedContents/abc", expireTime: "2030-06-01T01:00:00Z" });
      await expect(caches.isCacheUsable("cachedContents/abc", now)).resolves.toBe(true);
    });

    it("rejects expired caches", async () => {
      client.caches.get.mockResolvedValue({ name: "cachedContents/abc", expireTime: LONG_AGO });
      await expect(caches.isCacheUsable("cachedContents/abc", now)).resolves.toBe(false);
    });

    it("accepts caches without an expiry time", async () => {
      client.caches.get.mockResolvedValue({ name: "cachedContents/abc" });
      await expect(caches.isCacheUsable("cachedContents/abc", now)).resolves.toBe(true);
    });

    it("treats missing and malformed names as unusable", async () => {
      client.caches.get.mockRejectedValueOnce(new ApiError({ message: "Not found", status: 404 }));
      await expect(caches.isCacheUsable("cachedContents/gone", now)).resolves.toBe(false);

      client.caches.get.mockRejectedValueOnce(new ApiError({ message: "Invalid name", status: 400 }));
      await expect(caches.isCacheUsable("bogus", now)).resolves.toBe(false);
    });

    it("propagates other failures", async () => {
      client.caches.get.mockRejectedValue(new ApiError({ message: "Permission denied", status: 403 }));
      await expect(caches.isCacheUsable("cachedContents/abc", now)).rejects.toMatchObject({
        code: ErrorCode.AUTH_ERROR,
      });
    });
  });

  describe("updateCacheTtl", () => {
    it("defaults to two hours", async () => {
      const cache = await caches.updateCacheTtl("cachedContents/abc");

      expect(client.caches.update).toHaveBeenCalledWith({
        name: "cachedContents/abc",
        config: { ttl: "7200s" },
      });
      expect(cache).toMatchObject({ name: "cachedContents/abc", expireTime: FAR_FUTURE });
    });

    it("rejects a zero TTL before calling the service", async () => {
      await expect(caches.updateCacheTtl("cachedContents/abc", 0)).rejects.toMatchObject({
        code: ErrorCode.INVALID_INPUT,
      });
      expect(client.caches.update).not.toHaveBeenCalled();
    });
  });

  it("lists caches from the pager", async () => {
    client.caches.list.mockResolvedValue(
      pager([
        { name: "cachedContents/a", displayName: "first", usageMetadata: { totalTokenCount: 1200 } },
        { name: "cachedContents/b" },
      ])
    );

    const listed = await caches.listCaches();

    expect(listed).toEqual([
      { name: "cachedContents/a", displayName: "first", totalTokenCount: 1200 },
      { name: "cachedContents/b" },
    ]);
  });

  it("deletes by name", async () => {
    await caches.deleteCache("cachedContents/abc");
    expect(client.caches.delete).toHaveBeenCalledWith({ name: "cachedContents/abc" });
  });
});
