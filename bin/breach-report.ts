#!/usr/bin/env node
/**
 * breach-report - CLI entry point
 *
 * Pulls every email address out of a text file, checks each one against the
 * Have I Been Pwned breachedaccount API, and writes the compromised accounts
 * grouped by breach. Exit codes are documented in src/cli.ts.
 */

import "dotenv/config";
import { runCli } from "../src/cli.js";

async function main() {
  let exitCode = 1;
  try {
    exitCode = await runCli(process.argv.slice(2));
  } catch (err: unknown) {
    // eslint-disable-next-line no-console
    console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    process.exit(exitCode);
  }
}

// eslint-disable-next-line @typescript-eslint/no-floating-promises
main();
