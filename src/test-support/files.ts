/**
 * Temp-directory fixtures for tests that touch the filesystem
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PDFDocument } from "pdf-lib";

export async function makeTempDir(prefix = "gemini-parser-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/** Blank PDF with the given number of pages */
export async function writePdf(filePath: string, pages: number): Promise<string> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pages; i++) {
    doc.addPage([200, 200]);
  }
  await fs.promises.writeFile(filePath, await doc.save());
  return filePath;
}

export async function writeText(filePath: string, content = "sample content"): Promise<string> {
  await fs.promises.writeFile(filePath, content, "utf-8");
  return filePath;
}
