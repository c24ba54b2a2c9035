/**
 * Command-line handling for breach-report.
 *
 * Exit codes:
 * - 0: Report written (or dry run completed), or help/version shown
 * - 1: Unreadable input, no emails found, suspected rate limiting, bad options,
 *      or any other fatal error
 */

import { Command, CommanderError } from "commander";
import path from "node:path";
import chalk from "chalk";
import type { FetchLike } from "./collector/breachApiClient.js";
import { DEFAULT_OUTFILE, DEFAULT_SLEEP_SECONDS, DEFAULT_TIMEOUT_SECONDS, parseSeconds, resolveClientConfig } from "./config.js";
import { BreachReportError, ExtractionError, RateLimitSuspectedError } from "./errors.js";
import { assertReadable } from "./extractor/emailExtractor.js";
import { createLogger } from "./logger.js";
import { runReport } from "./pipeline.js";
import { renderSummaryBox } from "./summary.js";
import { ProgressUI } from "./ui/progressUI.js";

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

type CliOptions = {
  apikey?: string;
  infile: string;
  sleep: string;
  outfile: string;
  timeout: string;
  dedupe?: boolean;
  dryRun?: boolean;
  quiet?: boolean;
};

function buildProgram(): Command {
  return new Command()
    .name("breach-report")
    .description("Check haveibeenpwned for compromised email addresses found in any text file")
    .version("1.0.0")
    .option("-a, --apikey <key>", "HIBP API key (default: $HIBP_API_KEY)")
    .requiredOption("-f, --infile <path>", "Text file with email addresses, formatted any way you like")
    .option("-s, --sleep <seconds>", `Seconds to sleep between each email (default: ${DEFAULT_SLEEP_SECONDS})`, String(DEFAULT_SLEEP_SECONDS))
    .option("-o, --outfile <path>", `File to write the report to (default: ${DEFAULT_OUTFILE})`, DEFAULT_OUTFILE)
    .option("--timeout <seconds>", `Per-request timeout (default: ${DEFAULT_TIMEOUT_SECONDS})`, String(DEFAULT_TIMEOUT_SECONDS))
    .option("--dedupe", "Check each address once, even if it appears several times", false)
    .option("--dry-run", "Extract and list addresses only; do not call the API", false)
    .option("--quiet", "Suppress progress output", false)
    .exitOverride();
}

/**
 * Runs one invocation with user arguments (no node/script prefix) and
 * resolves to the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(args, { from: "user" });
  } catch (err: unknown) {
    // commander has already printed the usage error (or help/version)
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const logger = createLogger({ quiet: opts.quiet });
  const progress = new ProgressUI(Boolean(opts.quiet));

  try {
    const inPath = path.resolve(opts.infile);
    // Checked before anything else so a typo never costs an API call
    await assertReadable(inPath);

    const delayMs = parseSeconds(opts.sleep, "--sleep");
    const timeoutMs = parseSeconds(opts.timeout, "--timeout");
    // A dry run never reaches the API, so it needs no key
    const client = opts.dryRun ? null : resolveClientConfig({ apiKey: opts.apikey, timeoutMs }, deps.env);

    const { summary } = await runReport({
      inPath,
      outPath: path.resolve(opts.outfile),
      client,
      delayMs,
      dedupe: Boolean(opts.dedupe),
      dryRun: Boolean(opts.dryRun),
      logger,
      fetchImpl: deps.fetchImpl,
      sleep: deps.sleep,
      onStart: (total) => progress.start(total),
      onProgress: (p) => progress.update(p),
      onAnomaly: (a) => progress.anomaly(a),
      onCollected: () => progress.stop()
    });

    // Printed to stderr so it stays visible with --quiet
    // eslint-disable-next-line no-console
    console.error(renderSummaryBox(summary));
    return 0;
  } catch (err: unknown) {
    progress.stop();
    if (err instanceof RateLimitSuspectedError) {
      logger.error(err.message);
      logger.error("Results collected so far were discarded. Try a longer --sleep.");
      return err.exitCode;
    }
    if (err instanceof ExtractionError) {
      logger.error("No valid emails found, exiting.");
      return err.exitCode;
    }
    if (err instanceof BreachReportError) {
      logger.error(err.message);
      return err.exitCode;
    }
    // eslint-disable-next-line no-console
    console.error(chalk.red(`Fatal error: ${err instanceof Error ? err.message : String(err)}`));
    return 1;
  }
}
