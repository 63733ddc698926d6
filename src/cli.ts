#!/usr/bin/env node

/**
 * gemini-parser entry point
 *
 * Loads .env before anything reads CONFIG.
 */

import "dotenv/config";
import { main } from "./cli/main.js";
import { log } from "./utils/logger.js";

main(process.argv).catch((error: unknown) => {
  log.error(`💥 Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
