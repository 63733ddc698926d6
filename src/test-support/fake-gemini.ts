/**
 * In-process stand-in for the Gemini SDK client
 *
 * Every method is a vi.fn with a working default, so tests only override
 * the calls they care about. Uploaded files are named after their display
 * name ("files/notes.txt") to keep assertions deterministic.
 */

import {
  FileState,
  GenerateContentResponse,
  type CachedContent,
  type File as GenAIFile,
  type GenerateContentResponseUsageMetadata,
} from "@google/genai";
import { vi } from "vitest";
import type { GeminiClient } from "../gemini/client.js";

type FilesApi = GeminiClient["files"];
type CachesApi = GeminiClient["caches"];
type ModelsApi = GeminiClient["models"];

export const FAR_FUTURE = "2999-01-01T00:00:00Z";
export const LONG_AGO = "2000-01-01T00:00:00Z";

export function fileResource(name: string, overrides: Partial<GenAIFile> = {}): GenAIFile {
  return {
    name,
    uri: `https://generativelanguage.googleapis.com/v1beta/${name}`,
    mimeType: "application/pdf",
    state: FileState.ACTIVE,
    ...overrides,
  };
}

export function textResponse(text: string, usageMetadata?: GenerateContentResponseUsageMetadata): GenerateContentResponse {
  const response = new GenerateContentResponse();
  response.candidates = [{ content: { role: "model", parts: [{ text }] } }];
  response.usageMetadata = usageMetadata;
  return response;
}

export async function* pager<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

export function createFakeClient() {
  let cacheCount = 0;

  return {
    files: {
      upload: vi.fn<FilesApi["upload"]>(async (params) => {
        const displayName = params.config?.displayName ?? "upload";
        return fileResource(`files/${displayName}`, {
          displayName,
          mimeType: params.config?.mimeType ?? "application/octet-stream",
        });
      }),
      get: vi.fn<FilesApi["get"]>(async (params) => fileResource(params.name)),
      list: vi.fn<FilesApi["list"]>(async () => pager<GenAIFile>([])),
      delete: vi.fn<FilesApi["delete"]>(async () => ({})),
    },
    caches: {
      create: vi.fn<CachesApi["create"]>(async (params): Promise<CachedContent> => {
        cacheCount++;
        return {
          name: `cachedContents/cache-${cacheCount}`,
          model: params.model,
          displayName: params.config?.displayName,
          expireTime: FAR_FUTURE,
        };
      }),
      get: vi.fn<CachesApi["get"]>(async (params) => ({ name: params.name, expireTime: FAR_FUTURE })),
      list: vi.fn<CachesApi["list"]>(async () => pager<CachedContent>([])),
      update: vi.fn<CachesApi["update"]>(async (params) => ({ name: params.name, expireTime: FAR_FUTURE })),
      delete: vi.fn<CachesApi["delete"]>(async () => ({})),
    },
    models: {
      generateContent: vi.fn<ModelsApi["generateContent"]>(async () => textResponse("generated text")),
    },
  } satisfies GeminiClient;
}

export type FakeGeminiClient = ReturnType<typeof createFakeClient>;
