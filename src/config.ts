import type { BreachClientConfig } from "./types.js";

// Most-likely-to-change values: the provider may ban a User-Agent, or move the endpoint.
export const API_URL = "https://haveibeenpwned.com/api/v3/breachedaccount";
export const USER_AGENT = "breach-report/1.0";
export const API_KEY_HEADER = "hibp-api-key";

export const DEFAULT_SLEEP_SECONDS = 1.6;
export const DEFAULT_OUTFILE = "pwned.txt";
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const FAILURE_THRESHOLD = 3;

type ClientConfigInput = {
  apiKey?: string;
  timeoutMs?: number;
};

/**
 * Builds the immutable client configuration for a run.
 *
 * The key comes from the command line first and HIBP_API_KEY second;
 * HIBP_API_URL and HIBP_USER_AGENT override the built-in endpoint and agent.
 */
export function resolveClientConfig(
  input: ClientConfigInput,
  env: NodeJS.ProcessEnv = process.env
): BreachClientConfig {
  const apiKey = (input.apiKey ?? env.HIBP_API_KEY ?? "").trim();
  if (apiKey === "") {
    throw new Error("An API key is required: pass --apikey or set HIBP_API_KEY.");
  }

  const apiUrl = env.HIBP_API_URL?.trim() || API_URL;
  const userAgent = env.HIBP_USER_AGENT?.trim() || USER_AGENT;
  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;

  return Object.freeze({
    apiUrl: apiUrl.replace(/\/+$/, ""),
    userAgent,
    apiKeyHeader: API_KEY_HEADER,
    apiKey,
    timeoutMs
  });
}

/** Parses a seconds option into milliseconds; rejects negatives and non-numbers. */
export function parseSeconds(value: string | number, optionName: string): number {
  const seconds = typeof value === "number" ? value : Number(String(value).trim());
  if (String(value).trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`${optionName} must be a non-negative number of seconds (got "${value}")`);
  }
  return Math.round(seconds * 1000);
}
