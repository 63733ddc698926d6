import { afterEach, describe, expect, it, vi } from "vitest";

describe("main", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
    process.exitCode = undefined;
  });

  it("reports invalid configuration as a command failure", async () => {
    vi.stubEnv("GEMINI_PARSER_MAX_RETRIES", "many");
    vi.resetModules();
    const { main } = await import("./main.js");
    const err: string[] = [];
    const out: string[] = [];

    await main(["node", "gemini-parser", "cache:list"], {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
    });

    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^✗ Invalid environment variables: GEMINI_PARSER_MAX_RETRIES: /);
    expect(out).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it("runs the program when configuration is valid", async () => {
    const { main } = await import("./main.js");
    const err: string[] = [];

    await main(["node", "gemini-parser", "cache:list"], { stderr: (text) => err.push(text) });

    expect(err).toEqual(["✗ Gemini API key not configured. Set GEMINI_API_KEY environment variable.\n"]);
    expect(process.exitCode).toBe(1);
  });
});
