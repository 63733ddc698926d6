/**
 * Gemini Caches API wrapper
 *
 * Creates, inspects, extends and deletes server-side context caches built
 * from uploaded files, and generates from them. TTL and eviction are
 * handled by the service.
 */

import { createPartFromUri, createUserContent, type CachedContent } from "@google/genai";
import { CONFIG } from "../config.js";
import { ErrorCode, GeminiParserError, toGeminiParserError } from "../errors.js";
import { log } from "../utils/logger.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import type { GeminiClient } from "./client.js";
import { toGenerationResult } from "./generation.js";
import type {
  CacheInfo,
  CreateCacheOptions,
  GenerateWithCacheOptions,
  GenerationResult,
} from "./types.js";

export interface CacheManagerOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  systemInstruction?: string;
}

/**
 * Hours to the duration string the API expects ("5400s")
 */
export function toTtl(hours: number): string {
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new GeminiParserError(ErrorCode.INVALID_INPUT, `Cache TTL must be a positive number of hours, got ${hours}`);
  }
  return `${Math.round(hours * 3600)}s`;
}

export class CacheManager {
  private readonly client: GeminiClient;
  private readonly retry: Omit<RetryOptions, "label">;
  private readonly systemInstruction: string;

  constructor(client: GeminiClient, options: CacheManagerOptions = {}) {
    this.client = client;
    this.retry = {
      maxRetries: options.maxRetries ?? CONFIG.maxRetries,
      delayMs: options.retryDelayMs ?? CONFIG.retryDelayMs,
    };
    this.systemInstruction = options.systemInstruction ?? CONFIG.cacheSystemInstruction;
  }

  /**
   * Create a cache holding the given files as one user turn
   */
  async createCache(options: CreateCacheOptions): Promise<CacheInfo> {
    const { model, files, displayName } = options;

    if (files.length === 0) {
      throw new GeminiParserError(ErrorCode.INVALID_INPUT, "At least one uploaded file is required to create a cache");
    }

    const ttl = options.ttlHours !== undefined ? toTtl(options.ttlHours) : undefined;
    const contents = [
      createUserContent(files.map((file) => createPartFromUri(file.uri, file.mimeType))),
    ];

    const created = await withRetry(
      () =>
        this.client.caches.create({
          model,
          config: {
            contents,
            systemInstruction: options.systemInstruction ?? this.systemInstruction,
            ttl,
            displayName,
          },
        }),
      { ...this.retry, label: "Create cache" }
    );

    const cache = this.mapCache(created);
    if (!cache.name) {
      throw new GeminiParserError(ErrorCode.PROVIDER_ERROR, "Cache was created but the response has no name");
    }

    log.success(`✅ Created cache: ${cache.name}${ttl ? ` (ttl ${ttl})` : ""}`);
    return cache;
  }

  /**
   * Generate new text from existing cached content
   */
  async generateWithCache(options: GenerateWithCacheOptions): Promise<GenerationResult> {
    const { model, cacheName, prompt } = options;
    log.info(`🧠 Generating from cache ${cacheName} with ${model}`);

    const response = await withRetry(
      () =>
        this.client.models.generateContent({
          model,
          contents: prompt,
          config: { cachedContent: cacheName },
        }),
      { ...this.retry, label: "Generate with cache" }
    );

    return toGenerationResult(response, model, { cacheName, filesUsed: [] });
  }

  /**
   * List cache metadata. Cached contents are not retrievable.
   */
  async listCaches(): Promise<CacheInfo[]> {
    const pager = await withRetry(() => this.client.caches.list({ config: { pageSize: 100 } }), {
      ...this.retry,
      label: "List caches",
    });

    const caches: CacheInfo[] = [];
    try {
      for await (const cache of pager) {
        caches.push(this.mapCache(cache));
      }
    } catch (error) {
      throw toGeminiParserError(error);
    }

    for (const cache of caches) {
      log.dim(`  Cache found: ${cache.name}`);
    }
    return caches;
  }

  async getCache(cacheName: string): Promise<CacheInfo> {
    const cache = await withRetry(() => this.client.caches.get({ name: cacheName }), {
      ...this.retry,
      label: `Get cache ${cacheName}`,
    });
    return this.mapCache(cache);
  }

  /**
   * Whether a cache exists and has not expired. Missing or malformed
   * names count as unusable; any other failure propagates.
   */
  async isCacheUsable(cacheName: string, now: number = Date.now()): Promise<boolean> {
    try {
      const cache = await this.getCache(cacheName);
      if (!cache.expireTime) return true;
      const expiresAt = Date.parse(cache.expireTime);
      return Number.isNaN(expiresAt) || expiresAt > now;
    } catch (error) {
      const normalized = toGeminiParserError(error);
      if (normalized.code === ErrorCode.NOT_FOUND || normalized.status === 400) {
        log.debug(`Cache ${cacheName} unusable: ${normalized.message}`);
        return false;
      }
      throw normalized;
    }
  }

  /**
   * Set the cache to expire `hours` from now
   */
  async updateCacheTtl(cacheName: string, hours = 2): Promise<CacheInfo> {
    const ttl = toTtl(hours);
    const updated = await withRetry(
      () => this.client.caches.update({ name: cacheName, config: { ttl } }),
      { ...this.retry, label: `Update cache ${cacheName}` }
    );
    log.info(`⏱️  Updated cache ${cacheName} TTL to ${hours} hours.`);
    return this.mapCache(updated);
  }

  async deleteCache(cacheName: string): Promise<void> {
    await withRetry(() => this.client.caches.delete({ name: cacheName }), {
      ...this.retry,
      label: `Delete cache ${cacheName}`,
    });
    log.info(`🗑️  Deleted cache ${cacheName}`);
  }

  private mapCache(cache: CachedContent): CacheInfo {
    return {
      name: cache.name || "",
      displayName: cache.displayName,
      model: cache.model,
      createTime: cache.createTime,
      updateTime: cache.updateTime,
      expireTime: cache.expireTime,
      totalTokenCount: cache.usageMetadata?.totalTokenCount,
    };
  }
}
