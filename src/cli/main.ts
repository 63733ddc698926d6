/**
 * CLI bootstrap
 *
 * The program module is imported dynamically so that configuration errors
 * raised while CONFIG loads are reported like any other command failure.
 */

import type { Command } from "commander";
import { errorMessage } from "../errors.js";

export interface MainDeps {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export async function main(argv: string[], deps: MainDeps = {}): Promise<void> {
  const stderr = deps.stderr ?? ((text: string) => void process.stderr.write(text));

  let program: Command;
  try {
    const { createProgram } = await import("./program.js");
    program = createProgram({ stdout: deps.stdout, stderr });
  } catch (error) {
    stderr(`✗ ${errorMessage(error)}\n`);
    process.exitCode = 1;
    return;
  }

  await program.parseAsync(argv);
}
