/**
 * Rate-limited page fetcher.
 *
 * Every request after the first waits a random delay drawn uniformly from the
 * configured range, then performs a single GET with a timeout. Any network
 * error, timeout or non-2xx status comes back as a failure value; there is no
 * retry.
 */

import type { FetchResult } from './types.js';

export type HttpGet = (url: string, init: { headers: Record<string, string>; signal: AbortSignal }) => Promise<Response>;

export type Fetcher = (url: string) => Promise<FetchResult>;

export interface FetcherOptions {
    /** [min, max] seconds to wait before each request after the first */
    delayRange: readonly [number, number];
    /** Per-request timeout in seconds */
    timeout: number;
    userAgent: string;
    /** Suspends for the given milliseconds. Defaults to a setTimeout-based sleep. */
    wait?: (ms: number) => Promise<void>;
    /** Uniform random source in [0, 1). Defaults to Math.random. */
    random?: () => number;
    /** HTTP implementation. Defaults to the global fetch. */
    httpGet?: HttpGet;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Picks a delay in milliseconds uniformly from [min, max] seconds.
 */
export function pickDelayMs([min, max]: readonly [number, number], random: () => number = Math.random): number {
    return Math.round((min + (max - min) * random()) * 1000);
}

function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.name === 'TimeoutError' ? 'request timed out' : err.message;
    }
    return String(err);
}

export function createFetcher(options: FetcherOptions): Fetcher {
    const wait = options.wait ?? sleep;
    const random = options.random ?? Math.random;
    const httpGet: HttpGet = options.httpGet ?? ((url, init) => fetch(url, init));
    let requests = 0;

    return async function fetchPage(url: string): Promise<FetchResult> {
        if (requests > 0) {
            await wait(pickDelayMs(options.delayRange, random));
        }
        requests++;

        try {
            const res = await httpGet(url, {
                headers: { 'User-Agent': options.userAgent },
                signal: AbortSignal.timeout(options.timeout * 1000),
            });
            if (!res.ok) {
                return { ok: false, reason: `HTTP ${res.status}${res.statusText ? ' ' + res.statusText : ''}` };
            }
            return { ok: true, html: await res.text() };
        } catch (err) {
            return { ok: false, reason: describeError(err) };
        }
    };
}
