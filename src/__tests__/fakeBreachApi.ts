/**
 * In-process stand-in for the breachedaccount endpoint.
 * Answers from a scripted list of replies and records every request.
 */

import type { FetchLike } from '../collector/breachApiClient.js';

export type FakeReply =
  | { status: number; body?: string; setCookie?: string[] }
  | { error: string };

export type RecordedCall = {
  url: string;
  address: string;
  headers: Headers;
  hasSignal: boolean;
};

export function breachBody(...names: string[]): string {
  return JSON.stringify(names.map(name => ({ Name: name })));
}

export function createFakeBreachApi(reply: FakeReply[] | ((address: string, callIndex: number) => FakeReply)) {
  const calls: RecordedCall[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    const segments = parsed.pathname.split('/');
    const address = decodeURIComponent(segments[segments.length - 1] ?? '');
    const callIndex = calls.length;
    calls.push({
      url,
      address,
      headers: new Headers(init.headers),
      hasSignal: init.signal instanceof AbortSignal
    });

    const next = Array.isArray(reply) ? reply[callIndex] : reply(address, callIndex);
    if (!next) {
      throw new Error(`Unexpected request #${callIndex + 1} for ${address}`);
    }
    if ('error' in next) {
      throw new Error(next.error);
    }
    const headers = new Headers();
    for (const cookie of next.setCookie ?? []) {
      headers.append('Set-Cookie', cookie);
    }
    return new Response(next.body ?? '', { status: next.status, headers });
  };

  return { fetch: fetchImpl, calls };
}
