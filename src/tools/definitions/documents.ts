/**
 * Document Processing Tool Definitions
 *
 * Tools that upload content and ask Gemini to transcribe or summarize it.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

const cacheProperties = {
  use_cache: {
    type: "boolean",
    default: false,
    description: "Store the uploaded content in a new server-side cache and generate from it",
  },
  cache_ttl_hours: {
    type: "number",
    description: "Lifetime of the cache created by this call, in hours",
  },
  cache_name: {
    type: "string",
    description: "Existing cache (cachedContents/...) to reuse instead of uploading. Falls back to a fresh upload when expired.",
  },
} as const;

const generationProperties = {
  prompt: {
    type: "string",
    description: "Instruction sent with the document (default: transcribe preserving layout)",
  },
  model: {
    type: "string",
    description: "Gemini model id (default: GEMINI_MODEL or gemini-2.0-flash)",
  },
} as const;

/**
 * Process a single local file
 */
const processFileTool: Tool = {
  name: "process_file",
  description: `Upload a local document to Gemini and return the generated transcription or summary.

## Notes
- PDFs above the configured page limit are split and processed chunk by chunk
- Supported: PDF, text, markdown, HTML, CSV, JSON, XML, images, audio, video`,
  inputSchema: {
    type: "object",
    properties: {
      file_path: {
        type: "string",
        description: "Absolute or working-directory-relative path to the file",
      },
      ...generationProperties,
      ...cacheProperties,
    },
    required: ["file_path"],
  },
};

/**
 * Process a document downloaded from a URL
 */
const processUrlTool: Tool = {
  name: "process_url",
  description: `Download a document over HTTP(S), upload it to Gemini and return the generated text.`,
  inputSchema: {
    type: "object",
    properties: {
      url: {
        type: "string",
        description: "http:// or https:// URL of the document",
      },
      ...generationProperties,
      ...cacheProperties,
    },
    required: ["url"],
  },
};

/**
 * Process several files in a single request
 */
const processFilesTool: Tool = {
  name: "process_files",
  description: `Upload several local files and send them to Gemini together with one prompt.`,
  inputSchema: {
    type: "object",
    properties: {
      file_paths: {
        type: "array",
        items: { type: "string" },
        description: "Files to include, in order",
      },
      ...generationProperties,
      ...cacheProperties,
    },
    required: ["file_paths"],
  },
};

/**
 * Process every file in a folder
 */
const processFolderTool: Tool = {
  name: "process_folder",
  description: `Process every supported file in a folder and write one output file per input.

## Returns
- written: input/output pairs
- skipped: unsupported files or empty responses
- failed: files whose processing raised an error`,
  inputSchema: {
    type: "object",
    properties: {
      folder_path: {
        type: "string",
        description: "Folder to scan (non-recursive)",
      },
      output_dir: {
        type: "string",
        description: "Where to write results (default: the input folder)",
      },
      output_extension: {
        type: "string",
        default: "md",
        description: "Extension of the output files",
      },
      concurrency: {
        type: "number",
        description: "Files processed in parallel",
      },
      ...generationProperties,
      use_cache: cacheProperties.use_cache,
      cache_ttl_hours: cacheProperties.cache_ttl_hours,
    },
    required: ["folder_path"],
  },
};

/**
 * List files stored via the Files API
 */
const listFilesTool: Tool = {
  name: "list_files",
  description: `List documents currently stored in the Gemini Files API (retained for 48 hours).`,
  inputSchema: {
    type: "object",
    properties: {},
  },
};

/**
 * Delete an uploaded file
 */
const deleteFileTool: Tool = {
  name: "delete_file",
  description: `Delete an uploaded document from the Gemini Files API.`,
  inputSchema: {
    type: "object",
    properties: {
      file_name: {
        type: "string",
        description: "File name returned by an upload (files/...)",
      },
    },
    required: ["file_name"],
  },
};

export const documentTools: Tool[] = [
  processFileTool,
  processUrlTool,
  processFilesTool,
  processFolderTool,
  listFilesTool,
  deleteFileTool,
];
