/**
 * PDF Chunker
 *
 * Splits a PDF into consecutive page ranges before upload, either because
 * a chunk size was configured or because the document is past what the
 * API accepts in one file (50MB, 1000 pages). Page handling is pdf-lib
 * only; no system tools are needed.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { PDFDocument } from "pdf-lib";
import { ErrorCode, GeminiParserError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";

export const PDF_LIMITS = {
  maxFileSizeBytes: 50 * 1024 * 1024,
  maxPages: 1000,
  /** Chunk size when only the hard limits force a split */
  defaultChunkPages: 500,
  /** Rough bytes per chunk, used for estimates on oversized files */
  chunkSizeBytes: 25 * 1024 * 1024,
} as const;

export interface PdfAnalysis {
  sizeBytes: number;
  /** undefined when pdf-lib could not read the document */
  pageCount?: number;
  needsChunking: boolean;
  estimatedChunks: number;
  reason?: string;
}

export interface PageRange {
  /** 1-indexed, inclusive */
  first: number;
  last: number;
}

export interface PdfChunk extends PageRange {
  index: number;
  total: number;
  filePath: string;
  sizeBytes: number;
}

async function loadPdf(filePath: string): Promise<PDFDocument> {
  return PDFDocument.load(await fs.promises.readFile(filePath), { ignoreEncryption: true });
}

/**
 * Consecutive ranges of at most `pagesPerChunk` pages covering the document
 */
export function planPageRanges(totalPages: number, pagesPerChunk: number): PageRange[] {
  const size = Math.max(1, Math.min(Math.floor(pagesPerChunk), PDF_LIMITS.maxPages));
  const ranges: PageRange[] = [];
  for (let first = 1; first <= totalPages; first += size) {
    ranges.push({ first, last: Math.min(first + size - 1, totalPages) });
  }
  return ranges;
}

/**
 * Decide whether a PDF has to be split
 *
 * @param pagesPerChunk - configured chunk size; longer PDFs are split
 */
export async function analyzePdf(filePath: string, pagesPerChunk?: number): Promise<PdfAnalysis> {
  const { size: sizeBytes } = await fs.promises.stat(filePath);

  if (sizeBytes > PDF_LIMITS.maxFileSizeBytes) {
    return {
      sizeBytes,
      needsChunking: true,
      estimatedChunks: Math.ceil(sizeBytes / PDF_LIMITS.chunkSizeBytes),
      reason: `File size ${formatBytes(sizeBytes)} exceeds 50MB limit`,
    };
  }

  let pageCount: number;
  try {
    pageCount = (await loadPdf(filePath)).getPageCount();
  } catch (error) {
    // The API may still read it; send it whole
    log.warning(`⚠️  Could not read ${path.basename(filePath)} with pdf-lib: ${errorMessage(error)}`);
    return { sizeBytes, needsChunking: false, estimatedChunks: 1, reason: `Could not analyze: ${errorMessage(error)}` };
  }

  if (pageCount > PDF_LIMITS.maxPages) {
    const size = pagesPerChunk ?? PDF_LIMITS.defaultChunkPages;
    return {
      sizeBytes,
      pageCount,
      needsChunking: true,
      estimatedChunks: planPageRanges(pageCount, size).length,
      reason: `Page count ${pageCount} exceeds 1000 page limit`,
    };
  }

  if (pagesPerChunk !== undefined && pageCount > pagesPerChunk) {
    return {
      sizeBytes,
      pageCount,
      needsChunking: true,
      estimatedChunks: planPageRanges(pageCount, pagesPerChunk).length,
      reason: `Page count ${pageCount} exceeds ${pagesPerChunk} pages per chunk`,
    };
  }

  return { sizeBytes, pageCount, needsChunking: false, estimatedChunks: 1 };
}

/**
 * Write each page range to its own PDF in a fresh temp directory.
 * On failure the directory is removed and FILE_PROCESSING_FAILED is thrown.
 */
export async function chunkPdf(
  filePath: string,
  pagesPerChunk: number = PDF_LIMITS.defaultChunkPages
): Promise<PdfChunk[]> {
  const stem = path.parse(filePath).name;
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "gemini-parser-chunks-"));

  try {
    const source = await loadPdf(filePath);
    const ranges = planPageRanges(source.getPageCount(), pagesPerChunk);
    log.info(`✂️  Splitting ${path.basename(filePath)} (${source.getPageCount()} pages) into ${ranges.length} part(s)`);

    const chunks: PdfChunk[] = [];
    for (const [index, range] of ranges.entries()) {
      const part = await PDFDocument.create();
      const indices = Array.from({ length: range.last - range.first + 1 }, (_, i) => range.first - 1 + i);
      for (const page of await part.copyPages(source, indices)) {
        part.addPage(page);
      }

      const bytes = await part.save();
      const chunkPath = path.join(dir, `${stem}.part-${index + 1}-of-${ranges.length}.pdf`);
      await fs.promises.writeFile(chunkPath, bytes);

      chunks.push({ ...range, index, total: ranges.length, filePath: chunkPath, sizeBytes: bytes.byteLength });
      log.dim(`  Part ${index + 1}: pages ${range.first}-${range.last} (${formatBytes(bytes.byteLength)})`);
    }

    return chunks;
  } catch (error) {
    await fs.promises.rm(dir, { recursive: true, force: true });
    throw new GeminiParserError(
      ErrorCode.FILE_PROCESSING_FAILED,
      `Failed to split PDF ${filePath}: ${errorMessage(error)}`,
      undefined,
      error
    );
  }
}

/**
 * Remove the temp directory the chunks were written to
 */
export async function cleanupChunks(chunks: PdfChunk[]): Promise<void> {
  if (chunks.length === 0) return;

  const dir = path.dirname(chunks[0].filePath);
  try {
    await fs.promises.rm(dir, { recursive: true, force: true });
    log.debug(`Removed chunk directory ${dir}`);
  } catch (error) {
    log.warning(`⚠️  Could not remove chunk directory ${dir}: ${errorMessage(error)}`);
  }
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
}
