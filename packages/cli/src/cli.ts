#!/usr/bin/env node

/**
 * Lexicon CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram, type GlobalOptions } from "./program.js";
import { formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    process.exit(mapSdkErrorToExitCode(err));
  }
}

void main();
