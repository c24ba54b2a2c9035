import type { BreachIndex, RawBreachResults } from "../types.js";

// Truncated responses look like [{"Name":"Adobe"},{"Name":"LinkedIn"}]. Matched
// as text rather than parsed: a cut-off body still yields the names it holds.
const BREACH_NAME_PATTERN = /"Name":"(.*?)"/gi;

/** Names of every breach record in one raw response body, in body order. */
export function extractBreachNames(body: string): string[] {
  return Array.from(body.matchAll(BREACH_NAME_PATTERN), match => match[1]);
}

/**
 * Re-index per-address results by breach name. Each breach lists its
 * addresses in the order the results were collected.
 */
export function formatResults(results: RawBreachResults): BreachIndex {
  const knownBreaches: BreachIndex = new Map();

  for (const [address, body] of results) {
    for (const breach of extractBreachNames(body)) {
      const accounts = knownBreaches.get(breach);
      if (accounts) {
        accounts.push(address);
      } else {
        knownBreaches.set(breach, [address]);
      }
    }
  }

  return knownBreaches;
}

/** Distinct addresses across the whole index. */
export function countBreachedAccounts(index: BreachIndex): number {
  const accounts = new Set<string>();
  for (const addresses of index.values()) {
    for (const address of addresses) accounts.add(address);
  }
  return accounts.size;
}
