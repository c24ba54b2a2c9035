/** Email address -> raw response body. Only non-empty bodies are kept. */
export type RawBreachResults = Map<string, string>;

/** Breach name -> affected addresses, in processing order. */
export type BreachIndex = Map<string, string[]>;

export type BreachClientConfig = {
  apiUrl: string;
  userAgent: string;
  apiKeyHeader: string;
  apiKey: string;
  timeoutMs: number;
};

export type AccountLookup = {
  address: string;
  // null when the request never produced a response (network error, timeout)
  status: number | null;
  body: string;
  error?: string;
};

/** A non-200/404 outcome that has not (yet) tripped the failure threshold. */
export type ResponseAnomaly = {
  index: number;
  address: string;
  status: number | null;
  error?: string;
  timestamp: string;
};

export type CollectionProgress = {
  index: number;
  total: number;
  address: string;
  status: number | null;
};

export type CollectionResult = {
  results: RawBreachResults;
  anomalies: ResponseAnomaly[];
  checked: number;
};

export type RunSummary = {
  addressesFound: number;
  addressesChecked: number;
  accountsBreached: number;
  breaches: number;
  unexpectedResponses: number;
  outPath?: string;
  dryRun: boolean;
  startedAt: number;
  endedAt: number;
};
