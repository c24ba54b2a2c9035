/**
 * Runs one report end to end: extract, collect, format, write.
 *
 * Each stage consumes the whole output of the previous one. There are two
 * abort points, both terminal: no addresses in the input, and the collector's
 * failure threshold. Neither writes a report.
 */

import { BreachApiClient, type FetchLike } from "./collector/breachApiClient.js";
import { collectResults } from "./collector/breachCollector.js";
import { dedupeEmails, findEmails } from "./extractor/emailExtractor.js";
import { countBreachedAccounts, formatResults } from "./formatter/breachFormatter.js";
import type { Logger } from "./logger.js";
import { writeReport } from "./report/reportWriter.js";
import type { BreachClientConfig, BreachIndex, CollectionProgress, ResponseAnomaly, RunSummary } from "./types.js";

export type ReportOptions = {
  inPath: string;
  outPath: string;
  // may be null only for a dry run
  client: BreachClientConfig | null;
  delayMs: number;
  dedupe?: boolean;
  dryRun?: boolean;
  failureThreshold?: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  onStart?: (total: number) => void;
  onProgress?: (progress: CollectionProgress) => void;
  onAnomaly?: (anomaly: ResponseAnomaly) => void;
  onCollected?: () => void;
};

export type ReportResult = {
  emails: string[];
  index: BreachIndex;
  summary: RunSummary;
};

export async function runReport(options: ReportOptions): Promise<ReportResult> {
  const startedAt = Date.now();
  const { logger } = options;

  const found = await findEmails(options.inPath, logger);
  let emails = found;
  if (options.dedupe) {
    emails = dedupeEmails(found);
    if (emails.length < found.length) {
      logger.info(`Removed ${found.length - emails.length} duplicate addresses, ${emails.length} left to check`);
    }
  }

  if (options.dryRun) {
    for (const email of emails) {
      logger.log(`  ${email}`);
    }
    logger.warn("Dry run enabled: no API requests made and no report written.");
    return {
      emails,
      index: new Map(),
      summary: {
        addressesFound: found.length,
        addressesChecked: 0,
        accountsBreached: 0,
        breaches: 0,
        unexpectedResponses: 0,
        dryRun: true,
        startedAt,
        endedAt: Date.now()
      }
    };
  }

  if (!options.client) {
    throw new Error("Client configuration is required unless dryRun is set");
  }
  const client = new BreachApiClient(options.client, options.fetchImpl);
  options.onStart?.(emails.length);
  const collection = await collectResults(emails, {
    client,
    delayMs: options.delayMs,
    failureThreshold: options.failureThreshold,
    sleep: options.sleep,
    onProgress: options.onProgress,
    onAnomaly: options.onAnomaly
  });
  options.onCollected?.();
  logger.info(`Found ${collection.results.size} accounts with breach data`);

  const index = formatResults(collection.results);
  await writeReport(index, options.outPath, logger);

  return {
    emails,
    index,
    summary: {
      addressesFound: found.length,
      addressesChecked: collection.checked,
      accountsBreached: countBreachedAccounts(index),
      breaches: index.size,
      unexpectedResponses: collection.anomalies.length,
      outPath: options.outPath,
      dryRun: false,
      startedAt,
      endedAt: Date.now()
    }
  };
}
