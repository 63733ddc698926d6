import {
  GoogleGenAI,
  type CachedContent,
  type CreateCachedContentParameters,
  type DeleteCachedContentParameters,
  type DeleteFileParameters,
  type File as GenAIFile,
  type GenerateContentParameters,
  type GenerateContentResponse,
  type GetCachedContentParameters,
  type GetFileParameters,
  type ListCachedContentsParameters,
  type ListFilesParameters,
  type UpdateCachedContentParameters,
  type UploadFileParameters,
} from "@google/genai";
import { ErrorCode, GeminiParserError } from "../errors.js";

/**
 * The slice of the SDK client this package calls. A GoogleGenAI instance
 * satisfies it; list() pagers only need to be async-iterable.
 */
export interface GeminiClient {
  files: {
    upload(params: UploadFileParameters): Promise<GenAIFile>;
    get(params: GetFileParameters): Promise<GenAIFile>;
    list(params?: ListFilesParameters): Promise<AsyncIterable<GenAIFile>>;
    delete(params: DeleteFileParameters): Promise<unknown>;
  };
  caches: {
    create(params: CreateCachedContentParameters): Promise<CachedContent>;
    get(params: GetCachedContentParameters): Promise<CachedContent>;
    list(params?: ListCachedContentsParameters): Promise<AsyncIterable<CachedContent>>;
    update(params: UpdateCachedContentParameters): Promise<CachedContent>;
    delete(params: DeleteCachedContentParameters): Promise<unknown>;
  };
  models: {
    generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
  };
}

/**
 * Create an SDK client for the Gemini Developer API.
 * The key stays in memory only; it is never logged.
 */
export function createGeminiClient(apiKey: string | undefined): GeminiClient {
  if (!apiKey || apiKey.trim().length === 0) {
    throw new GeminiParserError(
      ErrorCode.MISSING_API_KEY,
      "Gemini API key not configured. Set GEMINI_API_KEY environment variable."
    );
  }
  return new GoogleGenAI({ apiKey });
}
