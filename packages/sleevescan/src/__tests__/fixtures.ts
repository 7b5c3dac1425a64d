/**
 * Shared test fixtures: a parsed config, a scripted fetch and sample rows.
 */

import { HttpInvoker, type FetchLike } from '../http/invoker.js';
import { parseConfig } from '../shared/config.js';
import type { EventSink, RunEvent } from '../shared/events.js';
import type { MatchResult, SleevescanConfig } from '../shared/types.js';

export function testConfig(overrides: Record<string, unknown> = {}): SleevescanConfig {
  return parseConfig(
    {
      catalog: { username: 'tester', token: 'test-secret', baseUrl: 'https://api.test' },
      storage: { bucket: 'covers-bucket', root: 'covers/' },
      streaming: {
        clientId: 'client-id',
        clientSecret: 'client-secret',
        refreshToken: 'refresh-token',
        apiUrl: 'https://streaming.test/v1',
        accountsUrl: 'https://accounts.test',
      },
      retry: { maxAttempts: 3, lookupAttempts: 3, baseDelayMs: 100, timeoutMs: 1000 },
      ...overrides,
    },
    '/tmp/sleevescan-test',
    {}
  );
}

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export interface RecordedCall {
  method: string;
  url: string;
  body: string | null;
  headers: Record<string, string>;
}

export type Route = (call: RecordedCall) => Response | Error | undefined;

/**
 * Fetch that answers from `route`; an unrouted request gets a 404. Every
 * call is recorded in order.
 */
export function routedFetch(route: Route): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const call: RecordedCall = {
      method: init.method ?? 'GET',
      url,
      body: typeof init.body === 'string' ? init.body : null,
      headers,
    };
    calls.push(call);
    const answer = route(call);
    if (answer instanceof Error) throw answer;
    return answer ?? new Response('not found', { status: 404 });
  };
  return { fetchImpl, calls };
}

/** Answers the scripted responses in order, one per call. */
export function scriptedFetch(script: Array<() => Response | Error>): { fetchImpl: FetchLike; calls: RecordedCall[] } {
  let i = 0;
  return routedFetch(() => {
    const next = script[Math.min(i, script.length - 1)];
    i++;
    return next();
  });
}

export function collectingSink(): EventSink & { events: RunEvent[] } {
  const events: RunEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
  };
}

export function testInvoker(
  fetchImpl: FetchLike,
  opts: { events?: EventSink; sleeps?: number[]; config?: SleevescanConfig } = {}
): HttpInvoker {
  const sleeps = opts.sleeps ?? [];
  return new HttpInvoker({
    policy: (opts.config ?? testConfig()).retry,
    fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    random: () => 0,
    events: opts.events,
  });
}

export function matchResult(overrides: Partial<MatchResult> = {}): MatchResult {
  return {
    locator: 'gs://covers-bucket/covers/Dad/a.jpg',
    filename: 'a.jpg',
    owner: 'Dad',
    status: 'matched',
    confidence: 'high',
    method: 'direct-release-url',
    releaseId: 101,
    releaseUrl: 'https://www.discogs.com/release/101',
    isTargetFormat: true,
    isPreferredRegion: true,
    candidateSource: 'catalog',
    catalogCandidates: ['https://www.discogs.com/release/101'],
    otherCandidates: [],
    hint: { artist: 'Artist X', album: 'Album Y' },
    bestGuessLabel: 'Artist X - Album Y',
    reason: 'Vinyl, US',
    errorMessage: null,
    alreadyInCollection: false,
    ...overrides,
  };
}
