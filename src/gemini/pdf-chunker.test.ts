import fs from "node:fs";
import path from "node:path";
import { PDFDocument } from "pdf-lib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "../errors.js";
import { makeTempDir, removeDir, writePdf, writeText } from "../test-support/files.js";
import { analyzePdf, chunkPdf, cleanupChunks, formatBytes, planPageRanges } from "./pdf-chunker.js";

describe("pdf-chunker", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("planPageRanges", () => {
    it("covers every page in order", () => {
      expect(planPageRanges(5, 2)).toEqual([
        { first: 1, last: 2 },
        { first: 3, last: 4 },
        { first: 5, last: 5 },
      ]);
    });

    it("caps the chunk size at the page limit", () => {
      expect(planPageRanges(2500, 5000)).toEqual([
        { first: 1, last: 1000 },
        { first: 1001, last: 2000 },
        { first: 2001, last: 2500 },
      ]);
    });

    it("returns nothing for an empty document", () => {
      expect(planPageRanges(0, 10)).toEqual([]);
    });
  });

  describe("analyzePdf", () => {
    it("leaves small PDFs whole", async () => {
      const file = await writePdf(path.join(dir, "short.pdf"), 3);

      const analysis = await analyzePdf(file);

      expect(analysis.pageCount).toBe(3);
      expect(analysis.needsChunking).toBe(false);
      expect(analysis.estimatedChunks).toBe(1);
    });

    it("splits PDFs longer than the requested chunk size", async () => {
      const file = await writePdf(path.join(dir, "long.pdf"), 5);

      const analysis = await analyzePdf(file, 2);

      expect(analysis.needsChunking).toBe(true);
      expect(analysis.estimatedChunks).toBe(3);
      expect(analysis.reason).toBe("Page count 5 exceeds 2 pages per chunk");
    });

    it("sends unreadable PDFs whole", async () => {
      const file = await writeText(path.join(dir, "broken.pdf"), "not a pdf");

      const analysis = await analyzePdf(file, 2);

      expect(analysis.needsChunking).toBe(false);
      expect(analysis.pageCount).toBeUndefined();
      expect(analysis.sizeBytes).toBe(9);
    });
  });

  describe("chunkPdf", () => {
    it("writes page ranges into separate files", async () => {
      const file = await writePdf(path.join(dir, "report.pdf"), 5);

      const chunks = await chunkPdf(file, 2);

      expect(chunks.map((c) => [path.basename(c.filePath), c.first, c.last, c.index, c.total])).toEqual([
        ["report.part-1-of-3.pdf", 1, 2, 0, 3],
        ["report.part-2-of-3.pdf", 3, 4, 1, 3],
        ["report.part-3-of-3.pdf", 5, 5, 2, 3],
      ]);

      const last = await PDFDocument.load(await fs.promises.readFile(chunks[2].filePath));
      expect(last.getPageCount()).toBe(1);
      expect(chunks[2].sizeBytes).toBe((await fs.promises.stat(chunks[2].filePath)).size);

      await cleanupChunks(chunks);
      expect(fs.existsSync(path.dirname(chunks[0].filePath))).toBe(false);
    });

    it("throws FILE_PROCESSING_FAILED for unreadable input", async () => {
      const file = await writeText(path.join(dir, "broken.pdf"), "not a pdf");

      await expect(chunkPdf(file, 2)).rejects.toMatchObject({ code: ErrorCode.FILE_PROCESSING_FAILED });
    });
  });

  describe("formatBytes", () => {
    it("picks a readable unit", () => {
      expect(formatBytes(512)).toBe("512 B");
      expect(formatBytes(2048)).toBe("2.0 KB");
      expect(formatBytes(5 * 1024 * 1024)).toBe("5.0 MB");
      expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe("3.0 GB");
    });
  });
});
