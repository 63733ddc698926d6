/**
 * Supported document types
 *
 * Extension table used to pick the MIME type sent with an upload. Files
 * with other extensions are rejected (single file) or skipped (folder).
 */

import path from "path";

export const SUPPORTED_MIME_TYPES: Readonly<Record<string, string>> = {
  ".pdf": "application/pdf",
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".html": "text/html",
  ".htm": "text/html",
  ".csv": "text/csv",
  ".json": "application/json",
  ".xml": "text/xml",
  ".rtf": "text/rtf",
  ".js": "text/javascript",
  ".py": "text/x-python",
  ".css": "text/css",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
  ".heic": "image/heic",
  ".heif": "image/heif",
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".aac": "audio/aac",
  ".ogg": "audio/ogg",
  ".flac": "audio/flac",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".webm": "video/webm",
};

/**
 * MIME type for a path, or undefined when the extension is not supported
 */
export function detectMimeType(filePath: string): string | undefined {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_MIME_TYPES[ext];
}

export function isSupportedFile(filePath: string): boolean {
  return detectMimeType(filePath) !== undefined;
}

/**
 * Strip parameters from a Content-Type header value
 * ("application/pdf; charset=binary" -> "application/pdf")
 */
export function parseContentType(header: string | null): string | undefined {
  if (!header) return undefined;
  const mimeType = header.split(";")[0].trim().toLowerCase();
  return mimeType.length > 0 ? mimeType : undefined;
}
