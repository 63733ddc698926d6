/**
 * CLI Program
 *
 * Uses commander for subcommand-based CLI with per-command options.
 * Results go to stdout, logs and errors to stderr.
 */

import fs from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { CONFIG } from "../config.js";
import { ErrorCode, GeminiParserError, errorMessage } from "../errors.js";
import { DocumentProcessor } from "../gemini/index.js";
import type {
  DocumentProcessorOptions,
  GenerationResult,
  ProcessOptions,
} from "../gemini/index.js";
import { DocumentParserServer, VERSION } from "../server.js";
import { isLogLevel, log, type LogLevel } from "../utils/logger.js";

type GlobalOptions = {
  model?: string;
  prompt?: string;
  logLevel?: LogLevel;
  apiKey?: string;
};

type ProcessFlags = GlobalOptions & {
  cache?: boolean;
  cacheTtl?: number;
  cacheName?: string;
  output?: string;
};

type FolderFlags = GlobalOptions & {
  outputDir?: string;
  ext?: string;
  concurrency?: number;
  cache?: boolean;
  cacheTtl?: number;
};

type CacheCreateFlags = GlobalOptions & {
  ttl?: number;
  systemInstruction?: string;
  displayName?: string;
};

export interface ProgramDeps {
  createProcessor?: (options: DocumentProcessorOptions) => DocumentProcessor;
  startServer?: (processor: DocumentProcessor | undefined) => Promise<void>;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

const DESCRIPTION = `Transcribe, summarize and query documents with Gemini.

Examples:
  $ gemini-parser file report.pdf
  $ gemini-parser file report.pdf --prompt "Summarize this report" --output summary.md
  $ gemini-parser folder ./scans --output-dir ./text --ext txt --concurrency 4
  $ gemini-parser cache:create contract.pdf --ttl 2
  $ gemini-parser cache:generate cachedContents/abc123 "List every deadline"`;

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseLevelOption(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (normalized === "warn") return "warning";
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError("Must be one of: debug, info, warning, error, silent.");
  }
  return normalized;
}

function toProcessOptions(flags: ProcessFlags): ProcessOptions {
  return {
    useCache: flags.cache,
    cacheTtlHours: flags.cacheTtl,
    cacheName: flags.cacheName,
  };
}

function withProcessFlags(command: Command): Command {
  return command
    .option("--cache", "Cache the uploaded content and generate from the cache")
    .option("--cache-ttl <hours>", "TTL for a cache created by this run", parsePositiveNumber)
    .option("--cache-name <name>", "Reuse an existing cache instead of uploading (falls back when expired)")
    .option("-o, --output <file>", "Write the result to a file instead of stdout");
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const createProcessor =
    deps.createProcessor ?? ((options: DocumentProcessorOptions) => new DocumentProcessor(options));
  const startServer =
    deps.startServer ??
    ((processor: DocumentProcessor | undefined) => new DocumentParserServer(processor).start());
  const stdout = deps.stdout ?? ((text: string) => void process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => void process.stderr.write(text));

  const processorFor = (command: Command): DocumentProcessor => {
    const opts = command.optsWithGlobals<GlobalOptions>();
    return createProcessor({ apiKey: opts.apiKey, model: opts.model, prompt: opts.prompt });
  };

  /** Failures become "✗ message" on stderr and exit code 1 */
  const run =
    <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        stderr(`✗ ${errorMessage(error)}\n`);
        process.exitCode = 1;
      }
    };

  const emitResult = async (result: GenerationResult, output: string | undefined): Promise<void> => {
    if (result.text.trim().length === 0) {
      throw new GeminiParserError(ErrorCode.EMPTY_RESPONSE, "Model returned an empty response");
    }

    if (output) {
      await fs.promises.writeFile(output, result.text, "utf-8");
      log.success(`💾 Saved to ${output}`);
    } else {
      stdout(result.text.endsWith("\n") ? result.text : `${result.text}\n`);
    }

    if (result.usage?.totalTokens !== undefined) {
      log.dim(`  Tokens: ${result.usage.totalTokens}${result.cacheName ? ` (cache ${result.cacheName})` : ""}`);
    }
  };

  const program = new Command()
    .name("gemini-parser")
    .description(DESCRIPTION)
    .version(VERSION, "-V, --version", "Show version number")
    // Global options inherited by all subcommands
    .option("-m, --model <model>", `Gemini model (default: ${CONFIG.defaultModel})`)
    .option("-p, --prompt <prompt>", "Prompt sent with the document(s)")
    .option("--log-level <level>", "debug | info | warning | error | silent", parseLevelOption)
    .option("--api-key <key>", "Gemini API key (or set GEMINI_API_KEY)");

  program.hook("preAction", (_thisCommand, actionCommand) => {
    const { logLevel } = actionCommand.optsWithGlobals<GlobalOptions>();
    if (logLevel) log.setLevel(logLevel);
  });

  // ============ PROCESSING ============

  withProcessFlags(
    program
      .command("file")
      .description("Process one local file")
      .argument("<path>", "Document to process")
  ).action(
    run(async (filePath: string, _opts: unknown, command: Command) => {
      const flags = command.optsWithGlobals<ProcessFlags>();
      const result = await processorFor(command).processFile(filePath, toProcessOptions(flags));
      await emitResult(result, flags.output);
    })
  );

  withProcessFlags(
    program
      .command("url")
      .description("Download a document over http(s) and process it")
      .argument("<url>", "Document URL")
  ).action(
    run(async (url: string, _opts: unknown, command: Command) => {
      const flags = command.optsWithGlobals<ProcessFlags>();
      const result = await processorFor(command).processFromUrl(url, toProcessOptions(flags));
      await emitResult(result, flags.output);
    })
  );

  withProcessFlags(
    program
      .command("files")
      .description("Process several files together with one prompt")
      .argument("<paths...>", "Documents to process")
  ).action(
    run(async (filePaths: string[], _opts: unknown, command: Command) => {
      const flags = command.optsWithGlobals<ProcessFlags>();
      const result = await processorFor(command).processMultipleFiles(filePaths, toProcessOptions(flags));
      await emitResult(result, flags.output);
    })
  );

  program
    .command("folder")
    .description("Process every supported file in a folder, writing <name>.<ext> per input")
    .argument("<dir>", "Folder to process (non-recursive)")
    .option("--output-dir <dir>", "Where to write results (default: the input folder)")
    .option("--ext <ext>", `Output extension (default: ${CONFIG.outputExtension})`)
    .option("-c, --concurrency <n>", `Files processed in parallel (default: ${CONFIG.maxConcurrency})`, parsePositiveInt)
    .option("--cache", "Cache each upload and generate from the cache")
    .option("--cache-ttl <hours>", "TTL for caches created by this run", parsePositiveNumber)
    .action(
      run(async (folder: string, _opts: unknown, command: Command) => {
        const flags = command.optsWithGlobals<FolderFlags>();
        const result = await processorFor(command).processFolder(folder, {
          outputDir: flags.outputDir,
          outputExtension: flags.ext,
          concurrency: flags.concurrency,
          useCache: flags.cache,
          cacheTtlHours: flags.cacheTtl,
          onProgress: (message, completed, total) => log.dim(`  [${completed}/${total}] ${message}`),
        });

        for (const entry of result.written) {
          stdout(`✓ ${entry.output}\n`);
        }
        for (const entry of result.skipped) {
          stdout(`- ${entry.input} (${entry.reason})\n`);
        }
        for (const entry of result.failed) {
          stderr(`✗ ${entry.input}: ${entry.error}\n`);
        }
        if (result.failed.length > 0) {
          process.exitCode = 1;
        }
      })
    );

  // ============ CACHES ============

  program
    .command("cache:create")
    .description("Upload files into a new cache and print its name")
    .argument("<paths...>", "Documents to cache")
    .option("--ttl <hours>", "Cache time to live in hours", parsePositiveNumber)
    .option("--system-instruction <text>", "System instruction stored with the cache")
    .option("--display-name <name>", "Human-readable cache name")
    .action(
      run(async (filePaths: string[], _opts: unknown, command: Command) => {
        const flags = command.optsWithGlobals<CacheCreateFlags>();
        const cache = await processorFor(command).createCacheFromFiles(filePaths, {
          model: flags.model,
          ttlHours: flags.ttl,
          systemInstruction: flags.systemInstruction,
          displayName: flags.displayName,
        });
        stdout(`${cache.name}\n`);
        if (cache.expireTime) log.dim(`  Expires: ${cache.expireTime}`);
      })
    );

  program
    .command("cache:generate")
    .description("Ask a question against an existing cache")
    .argument("<name>", "Cache name (cachedContents/...)")
    .argument("[prompt]", "Prompt (default: --prompt or the configured prompt)")
    .option("-o, --output <file>", "Write the result to a file instead of stdout")
    .action(
      run(async (cacheName: string, prompt: string | undefined, _opts: unknown, command: Command) => {
        const flags = command.optsWithGlobals<ProcessFlags>();
        const result = await processorFor(command).generateFromCache(cacheName, prompt);
        await emitResult(result, flags.output);
      })
    );

  program
    .command("cache:list")
    .description("List caches (name, display name, expiry)")
    .action(
      run(async (_opts: unknown, command: Command) => {
        const caches = await processorFor(command).listCaches();
        if (caches.length === 0) {
          log.info("No caches found");
          return;
        }
        for (const cache of caches) {
          stdout(`${cache.name}\t${cache.displayName ?? ""}\t${cache.expireTime ?? ""}\n`);
        }
      })
    );

  program
    .command("cache:update-ttl")
    .description("Set a cache to expire <hours> from now")
    .argument("<name>", "Cache name")
    .argument("<hours>", "New time to live in hours", parsePositiveNumber)
    .action(
      run(async (cacheName: string, hours: number, _opts: unknown, command: Command) => {
        const cache = await processorFor(command).updateCacheTtl(cacheName, hours);
        stdout(`${cache.name}\t${cache.expireTime ?? ""}\n`);
      })
    );

  program
    .command("cache:delete")
    .description("Delete a cache")
    .argument("<name>", "Cache name")
    .action(
      run(async (cacheName: string, _opts: unknown, command: Command) => {
        await processorFor(command).deleteCache(cacheName);
        stdout(`Deleted ${cacheName}\n`);
      })
    );

  // ============ FILES ============

  program
    .command("file:list")
    .description("List uploaded files (name, display name, MIME type, state)")
    .action(
      run(async (_opts: unknown, command: Command) => {
        const files = await processorFor(command).listFiles();
        if (files.length === 0) {
          log.info("No uploaded files found");
          return;
        }
        for (const file of files) {
          stdout(`${file.name}\t${file.displayName ?? ""}\t${file.mimeType}\t${file.state}\n`);
        }
      })
    );

  program
    .command("file:get")
    .description("Show metadata for one uploaded file")
    .argument("<name>", "File name (files/...)")
    .action(
      run(async (fileName: string, _opts: unknown, command: Command) => {
        const file = await processorFor(command).getFile(fileName);
        stdout(`${JSON.stringify(file, null, 2)}\n`);
      })
    );

  program
    .command("file:delete")
    .description("Delete an uploaded file")
    .argument("<name>", "File name (files/...)")
    .action(
      run(async (fileName: string, _opts: unknown, command: Command) => {
        await processorFor(command).deleteFile(fileName);
        stdout(`Deleted ${fileName}\n`);
      })
    );

  // ============ SERVER ============

  program
    .command("serve")
    .description("Start the MCP server on stdio")
    .action(
      run(async (_opts: unknown, command: Command) => {
        const opts = command.optsWithGlobals<GlobalOptions>();
        const hasKey = Boolean(opts.apiKey ?? CONFIG.geminiApiKey);
        await startServer(hasKey ? processorFor(command) : undefined);
      })
    );

  return program;
}
