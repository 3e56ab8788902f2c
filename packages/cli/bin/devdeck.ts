#!/usr/bin/env node
/**
 * Executable wrapper around `runCli`.
 */
import { runCli } from '../src/runner.js';

runCli(process.argv).catch((error: unknown) => {
  // `runCli` already set `process.exitCode`; print the unexpected failure once.
  if (error instanceof Error && error.message) {
    console.error(error.message);
    return;
  }

  console.error(String(error));
});
