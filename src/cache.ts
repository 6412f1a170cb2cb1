/**
 * @file cache.ts
 * @description Caches of resolved imports, keyed by canonical target.
 *
 * An entry records the hash of the source it was built from and of every
 * import it (transitively) depends on; the resolver only uses an entry whose
 * hashes all still match. Both caches keep the first entry stored for a key,
 * so concurrent runs never wait on each other.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, unlink, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { Expr } from './types';
import { exprSchema, bigintReplacer } from './serialize';
import { consoleLog } from './state';

export interface CacheDependency {
    target: string;
    sourceHash: string;
}

export interface CacheEntry {
    key: string;
    sourceHash: string;
    dependencies: CacheDependency[];
    /** Type-checked and normalized. */
    expression: Expr;
    storedAt: number;
}

export interface ImportCache {
    get(key: string): Promise<CacheEntry | undefined>;
    /** Stores `entry` unless an entry for the same key is already present. */
    set(entry: CacheEntry): Promise<void>;
}

/** Hex SHA-256 of a source text. */
export function sha256(text: string): string {
    return createHash('sha256').update(text).digest('hex');
}

export const cacheEntrySchema = z.object({
    key: z.string(),
    sourceHash: z.string().regex(/^[0-9a-f]{64}$/),
    dependencies: z.array(z.object({ target: z.string(), sourceHash: z.string().regex(/^[0-9a-f]{64}$/) })),
    expression: exprSchema,
    storedAt: z.number(),
});

/** In-process cache, shareable between runs. */
export class MemoryImportCache implements ImportCache {
    private readonly entries = new Map<string, CacheEntry>();

    async get(key: string): Promise<CacheEntry | undefined> {
        return this.entries.get(key);
    }

    async set(entry: CacheEntry): Promise<void> {
        if (!this.entries.has(entry.key)) this.entries.set(entry.key, entry);
    }

    get size(): number {
        return this.entries.size;
    }
}

function hasErrorCode(e: unknown, code: string): boolean {
    return e instanceof Error && 'code' in e && e.code === code;
}

export const DEFAULT_MAX_CACHE_ENTRIES = 512;

/**
 * On-disk cache: one JSON file per key, named after the key's SHA-256.
 * Entries that fail validation are ignored. Once more than `maxEntries`
 * files exist, the oldest by `storedAt` are removed.
 */
export class FileImportCache implements ImportCache {
    constructor(
        public readonly directory: string,
        public readonly maxEntries: number = DEFAULT_MAX_CACHE_ENTRIES
    ) {}

    private fileFor(key: string): string {
        return path.join(this.directory, `${sha256(key)}.json`);
    }

    private async readEntry(file: string): Promise<CacheEntry | undefined> {
        let text: string;
        try {
            text = await readFile(file, 'utf8');
        } catch (e) {
            if (hasErrorCode(e, 'ENOENT')) return undefined;
            throw e;
        }
        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (e) {
            console.warn(`Ignoring unreadable cache entry ${file}: ${e instanceof Error ? e.message : String(e)}`);
            return undefined;
        }
        const parsed = cacheEntrySchema.safeParse(json);
        if (!parsed.success) {
            console.warn(`Ignoring invalid cache entry ${file}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
            return undefined;
        }
        return parsed.data;
    }

    async get(key: string): Promise<CacheEntry | undefined> {
        const entry = await this.readEntry(this.fileFor(key));
        return entry?.key === key ? entry : undefined;
    }

    async set(entry: CacheEntry): Promise<void> {
        await mkdir(this.directory, { recursive: true });
        try {
            await writeFile(this.fileFor(entry.key), JSON.stringify(entry, bigintReplacer), { flag: 'wx' });
        } catch (e) {
            if (hasErrorCode(e, 'EEXIST')) return;
            throw e;
        }
        consoleLog(`cache: stored ${entry.key}`);
        await this.evict();
    }

    private async evict(): Promise<void> {
        const files = (await readdir(this.directory)).filter(f => f.endsWith('.json'));
        if (files.length <= this.maxEntries) return;
        const ages = await Promise.all(files.map(async name => {
            const file = path.join(this.directory, name);
            const entry = await this.readEntry(file);
            return { file, storedAt: entry?.storedAt ?? 0 };
        }));
        ages.sort((a, b) => a.storedAt - b.storedAt);
        for (const { file } of ages.slice(0, files.length - this.maxEntries)) {
            try {
                await unlink(file);
            } catch (e) {
                if (!hasErrorCode(e, 'ENOENT')) throw e;
            }
        }
    }
}
