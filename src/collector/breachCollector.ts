import { FAILURE_THRESHOLD } from "../config.js";
import { RateLimitSuspectedError } from "../errors.js";
import type { CollectionProgress, CollectionResult, RawBreachResults, ResponseAnomaly } from "../types.js";
import type { BreachApiClient } from "./breachApiClient.js";

type CollectOptions = {
  client: BreachApiClient;
  delayMs: number;
  failureThreshold?: number;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: CollectionProgress) => void;
  onAnomaly?: (anomaly: ResponseAnomaly) => void;
};

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

function isExpectedStatus(status: number | null): boolean {
  return status === 200 || status === 404;
}

/**
 * Query every address in order, one at a time, sleeping `delayMs` after each
 * request. Rate limiting is state held by the provider, so this must stay
 * sequential.
 *
 * Throws RateLimitSuspectedError as soon as the failure threshold is reached;
 * anything collected up to that point is dropped.
 */
export async function collectResults(emails: string[], options: CollectOptions): Promise<CollectionResult> {
  const threshold = options.failureThreshold ?? FAILURE_THRESHOLD;
  const sleep = options.sleep ?? defaultSleep;

  const results: RawBreachResults = new Map();
  const anomalies: ResponseAnomaly[] = [];
  let checked = 0;

  for (let i = 0; i < emails.length; i++) {
    const address = emails[i];
    const lookup = await options.client.checkAccount(address);
    checked += 1;

    options.onProgress?.({
      index: i + 1,
      total: emails.length,
      address,
      status: lookup.status
    });

    if (!isExpectedStatus(lookup.status)) {
      const anomaly: ResponseAnomaly = {
        index: i + 1,
        address,
        status: lookup.status,
        timestamp: new Date().toISOString()
      };
      if (lookup.error) {
        anomaly.error = lookup.error;
      }
      anomalies.push(anomaly);
      options.onAnomaly?.(anomaly);
      if (anomalies.length >= threshold) {
        throw new RateLimitSuspectedError(anomalies);
      }
    }

    // A body means breaches were found; 404 comes back empty
    if (lookup.body) {
      results.set(address, lookup.body);
    }

    await sleep(options.delayMs);
  }

  return { results, anomalies, checked };
}
