/**
 * @file fetch.ts
 * @description Transport for import targets: files, environment variables
 * and URLs.
 */

import { readFile } from 'node:fs/promises';
import { CanonicalTarget } from './canonical';
import { consoleLog } from './state';

export interface Fetcher {
    /** Returns the source text of `target`, or rejects. */
    fetch(target: CanonicalTarget, signal?: AbortSignal): Promise<string>;
}

export interface DefaultFetcherOptions {
    env?: NodeJS.ProcessEnv;
    timeoutMs?: number;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

async function fetchUrl(href: string, timeoutMs: number, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort);
    try {
        const response = await fetch(href, { signal: controller.signal });
        if (!response.ok) throw new Error(`HTTP ${response.status} ${response.statusText}`);
        return await response.text();
    } catch (e) {
        if (controller.signal.aborted && !signal?.aborted) throw new Error(`timed out after ${timeoutMs}ms`);
        throw e;
    } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forwardAbort);
    }
}

/** Reads files with `fs/promises`, variables from `env` and URLs with `fetch`. */
export function createDefaultFetcher(options: DefaultFetcherOptions = {}): Fetcher {
    const env = options.env ?? process.env;
    const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    return {
        async fetch(target, signal) {
            consoleLog(`fetch: ${target.key}`);
            switch (target.kind) {
                case 'file': return readFile(target.path, { encoding: 'utf8', signal });
                case 'env': {
                    const value = env[target.name];
                    if (value === undefined) throw new Error(`environment variable ${target.name} is not set`);
                    return value;
                }
                case 'url': return fetchUrl(target.href, timeoutMs, signal);
            }
        },
    };
}
