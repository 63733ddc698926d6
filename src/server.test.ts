import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentProcessor } from "./gemini/index.js";
import { createFakeClient, type FakeGeminiClient } from "./test-support/fake-gemini.js";
import { DocumentParserServer } from "./server.js";

describe("DocumentParserServer", () => {
  let gemini: FakeGeminiClient;
  let server: DocumentParserServer;
  let client: Client;

  beforeEach(async () => {
    gemini = createFakeClient();
    server = new DocumentParserServer(
      new DocumentProcessor({ model: "gemini-test", maxRetries: 0, retryDelayMs: 0 }, gemini)
    );
    client = new Client({ name: "test-client", version: "0.0.0" });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("lists every tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "create_cache",
      "delete_cache",
      "delete_file",
      "generate_with_cache",
      "list_caches",
      "list_files",
      "process_file",
      "process_files",
      "process_folder",
      "process_url",
      "update_cache_ttl",
    ]);
  });

  it("returns the tool result as JSON text", async () => {
    const result = await client.callTool({ name: "delete_cache", arguments: { cache_name: "cachedContents/a" } });

    expect(gemini.caches.delete).toHaveBeenCalledWith({ name: "cachedContents/a" });
    expect(result).toMatchObject({
      isError: false,
      content: [
        {
          type: "text",
          text: JSON.stringify({ success: true, data: { deleted: true, cacheName: "cachedContents/a" } }, null, 2),
        },
      ],
    });
  });

  it("flags failed calls as errors", async () => {
    const result = await client.callTool({ name: "delete_cache", arguments: {} });

    expect(result).toMatchObject({
      isError: true,
      content: [
        {
          type: "text",
          text: JSON.stringify({ success: false, error: "Invalid arguments: cache_name: Required" }, null, 2),
        },
      ],
    });
  });
});
