/**
 * @file config.ts
 * @description Configuration read from environment variables.
 *
 * | variable                   | effect                                   |
 * | -------------------------- | ---------------------------------------- |
 * | `STRATA_VERBOSE`           | verbose logging (`1`/`true`)             |
 * | `STRATA_ASCII`             | print `\`, `->`, `forall` instead of Unicode |
 * | `STRATA_CACHE_DIR`         | directory of the persisted import cache  |
 * | `STRATA_CACHE_MAX_ENTRIES` | bound on persisted cache entries         |
 * | `STRATA_FETCH_TIMEOUT_MS`  | timeout of URL imports                   |
 */

import { z } from 'zod';
import { setFlag } from './state';
import { FileImportCache, DEFAULT_MAX_CACHE_ENTRIES } from './cache';
import { createDefaultFetcher, DEFAULT_FETCH_TIMEOUT_MS } from './fetch';
import { ResolveOptions } from './imports';

const booleanFlag = z.enum(['0', '1', 'true', 'false']).transform(value => value === '1' || value === 'true');

const envSchema = z.object({
    STRATA_VERBOSE: booleanFlag.default('false'),
    STRATA_ASCII: booleanFlag.default('false'),
    STRATA_CACHE_DIR: z.string().min(1).optional(),
    STRATA_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(DEFAULT_MAX_CACHE_ENTRIES),
    STRATA_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
});

export interface StrataConfig {
    verbose: boolean;
    asciiOutput: boolean;
    cacheDirectory?: string;
    cacheMaxEntries: number;
    fetchTimeoutMs: number;
}

/**
 * Reads the configuration from `env`.
 * @throws ZodError when a variable is set to an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StrataConfig {
    const parsed = envSchema.parse(env);
    return {
        verbose: parsed.STRATA_VERBOSE,
        asciiOutput: parsed.STRATA_ASCII,
        cacheDirectory: parsed.STRATA_CACHE_DIR,
        cacheMaxEntries: parsed.STRATA_CACHE_MAX_ENTRIES,
        fetchTimeoutMs: parsed.STRATA_FETCH_TIMEOUT_MS,
    };
}

/** Sets the global flags from `config` and returns the matching resolver options. */
export function applyConfig(config: StrataConfig): ResolveOptions {
    setFlag('verbose', config.verbose);
    setFlag('asciiOutput', config.asciiOutput);
    return {
        fetcher: createDefaultFetcher({ timeoutMs: config.fetchTimeoutMs }),
        cache: config.cacheDirectory === undefined
            ? undefined
            : new FileImportCache(config.cacheDirectory, config.cacheMaxEntries),
    };
}
