/**
 * Gemini Module
 *
 * Exports for Gemini Files, Caches and generation integration.
 */

export * from "./types.js";
export * from "./client.js";
export * from "./file-manager.js";
export * from "./cache-manager.js";
export * from "./document-processor.js";
export * from "./pdf-chunker.js";
