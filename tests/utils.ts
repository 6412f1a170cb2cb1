/**
 * @file tests/utils.ts
 * @description Utility functions for running tests.
 */

import { Expr, Result } from '../src/types';
import { parseExpression } from '../src/parser';
import { denote } from '../src/substitution';
import { Fetcher } from '../src/fetch';
import { ImportBase } from '../src/canonical';

export const PROJECT: ImportBase = { kind: 'directory', path: '/project' };

/** Parses source text and drops the source spans, for structural comparisons. */
export function parse(source: string): Expr {
    return denote(parseExpression(source));
}

export interface MemoryFetcher extends Fetcher {
    /** Number of fetches per canonical key. */
    fetchCounts: Map<string, number>;
}

/** A fetcher that serves sources from a map of canonical keys. */
export function memoryFetcher(sources: Record<string, string>): MemoryFetcher {
    const fetchCounts = new Map<string, number>();
    return {
        fetchCounts,
        async fetch(target) {
            fetchCounts.set(target.key, (fetchCounts.get(target.key) ?? 0) + 1);
            if (!Object.prototype.hasOwnProperty.call(sources, target.key)) {
                throw new Error(`no such resource: ${target.key}`);
            }
            return sources[target.key];
        },
    };
}

export function unwrapOk<T, E>(result: Result<T, E>): T {
    if (result.ok) return result.value;
    throw result.error instanceof Error ? result.error : new Error(`Expected success, got ${String(result.error)}`);
}

export function unwrapErr<T, E>(result: Result<T, E>): E {
    if (!result.ok) return result.error;
    throw new Error('Expected an error, got a value');
}
