/**
 * HTTP client for the breached-account endpoint.
 *
 * One instance is shared by every request in a run so that cookies issued by
 * the provider's edge protection are replayed on later calls.
 */

import type { AccountLookup, BreachClientConfig } from "../types.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class BreachApiClient {
  private readonly config: BreachClientConfig;
  private readonly fetchImpl: FetchLike;
  private readonly cookies: Map<string, string> = new Map();

  constructor(config: BreachClientConfig, fetchImpl: FetchLike = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  buildUrl(address: string): string {
    // truncated mode returns only the breach names, which is all the formatter reads
    return `${this.config.apiUrl}/${encodeURIComponent(address)}?truncateResponse=true`;
  }

  /**
   * Look up one address. Never throws for HTTP or transport failures; those
   * come back as a lookup with a non-200/404 (or null) status for the
   * collector to count.
   */
  async checkAccount(address: string): Promise<AccountLookup> {
    const headers: Record<string, string> = {
      "User-Agent": this.config.userAgent,
      [this.config.apiKeyHeader]: this.config.apiKey
    };
    const cookieHeader = this.cookieHeader();
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(address), {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (err) {
      return {
        address,
        status: null,
        body: "",
        error: err instanceof Error ? err.message : String(err)
      };
    }

    this.storeCookies(response.headers);

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      return {
        address,
        status: null,
        body: "",
        error: `Failed to read response body: ${err instanceof Error ? err.message : String(err)}`
      };
    }

    return { address, status: response.status, body };
  }

  /** Cookies currently held, as name -> value. */
  getCookies(): ReadonlyMap<string, string> {
    return this.cookies;
  }

  private cookieHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join("; ");
  }

  private storeCookies(headers: Headers): void {
    for (const setCookie of headers.getSetCookie()) {
      const pair = setCookie.split(";", 1)[0] ?? "";
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      if (name) {
        this.cookies.set(name, value);
      }
    }
  }
}
