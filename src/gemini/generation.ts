/**
 * Mapping from SDK generation responses to GenerationResult
 */

import type { GenerateContentResponse } from "@google/genai";
import type { GenerationResult, TokenUsage } from "./types.js";

export function toGenerationResult(
  response: GenerateContentResponse,
  model: string,
  context: { cacheName?: string; filesUsed: string[] }
): GenerationResult {
  const usageMetadata = response.usageMetadata;
  const usage: TokenUsage | undefined = usageMetadata
    ? {
        promptTokens: usageMetadata.promptTokenCount,
        outputTokens: usageMetadata.candidatesTokenCount,
        cachedTokens: usageMetadata.cachedContentTokenCount,
        totalTokens: usageMetadata.totalTokenCount,
      }
    : undefined;

  return {
    text: response.text ?? "",
    model,
    cacheName: context.cacheName,
    filesUsed: context.filesUsed,
    usage,
  };
}

/**
 * Sum token usage across several calls (chunked documents)
 */
export function sumUsage(usages: Array<TokenUsage | undefined>): TokenUsage | undefined {
  const present = usages.filter((u): u is TokenUsage => u !== undefined);
  if (present.length === 0) return undefined;

  const add = (key: keyof TokenUsage): number | undefined => {
    const values = present.map((u) => u[key]).filter((v): v is number => v !== undefined);
    return values.length > 0 ? values.reduce((a, b) => a + b, 0) : undefined;
  };

  return {
    promptTokens: add("promptTokens"),
    outputTokens: add("outputTokens"),
    cachedTokens: add("cachedTokens"),
    totalTokens: add("totalTokens"),
  };
}
