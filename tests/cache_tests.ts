/**
 * @file tests/cache_tests.ts
 * @description Tests for the in-memory and on-disk import caches and their
 * use by the resolver.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile, readdir } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Expr, Var, Lam, BinOp, Natural, NaturalLit, BoolLit } from '../src/types';
import { resolve } from '../src/imports';
import { parseExpression } from '../src/parser';
import { CacheEntry, ImportCache, MemoryImportCache, FileImportCache, sha256 } from '../src/cache';
import { serializeExpr, deserializeExpr } from '../src/serialize';
import { parse, memoryFetcher, PROJECT } from './utils';

function entry(key: string, storedAt: number, expression: Expr = NaturalLit(1)): CacheEntry {
    return { key, sourceHash: sha256('+1'), dependencies: [], expression, storedAt };
}

/** Resolves `./main` and records which sources had to be parsed. */
async function resolveMain(sources: Record<string, string>, cache: ImportCache) {
    const parsed: string[] = [];
    const parser = (source: string, origin: string) => {
        parsed.push(origin);
        return parseExpression(source, origin);
    };
    const value = await resolve(parse('./main'), { base: PROJECT, fetcher: memoryFetcher(sources), parser, cache });
    return { value, parsed };
}

describe('Import Caches', () => {
    describe('Serialized expressions', () => {
        it('writes naturals as decimal strings', () => {
            assert.strictEqual(serializeExpr(NaturalLit(7)), '{"tag":"NaturalLit","value":"7"}');
        });

        it('reads expressions back', () => {
            const expr = Lam('x', Natural(), BinOp('+', Var('x', 1), NaturalLit(12345678901234567890n)));
            assert.deepStrictEqual(deserializeExpr(serializeExpr(expr)), expr);
        });

        it('rejects unknown built-ins and negative naturals', () => {
            assert.throws(() => deserializeExpr('{"tag":"Builtin","name":"Nat"}'));
            assert.throws(() => deserializeExpr('{"tag":"NaturalLit","value":"-1"}'));
        });
    });

    describe('MemoryImportCache', () => {
        it('keeps the first entry stored for a key', async () => {
            const cache = new MemoryImportCache();
            await cache.set(entry('/project/a', 1));
            await cache.set(entry('/project/a', 2, NaturalLit(2)));
            const stored = await cache.get('/project/a');
            assert.strictEqual(stored?.storedAt, 1);
            assert.deepStrictEqual(stored?.expression, NaturalLit(1));
            assert.strictEqual(cache.size, 1);
        });

        it('serves a second run without parsing', async () => {
            const cache = new MemoryImportCache();
            const sources = { '/project/main': './dep + +1', '/project/dep': '+1' };

            const first = await resolveMain(sources, cache);
            assert.deepStrictEqual(first.value, NaturalLit(2));
            assert.deepStrictEqual(first.parsed, ['/project/main', '/project/dep']);
            assert.strictEqual(cache.size, 2);

            const second = await resolveMain(sources, cache);
            assert.deepStrictEqual(second.value, NaturalLit(2));
            assert.deepStrictEqual(second.parsed, []);
        });

        it('records the hashes of transitive dependencies', async () => {
            const cache = new MemoryImportCache();
            await resolveMain({ '/project/main': './dep', '/project/dep': './leaf', '/project/leaf': 'True' }, cache);
            const main = await cache.get('/project/main');
            assert.deepStrictEqual(
                main?.dependencies.map(d => d.target).sort(),
                ['/project/dep', '/project/leaf']
            );
            assert.deepStrictEqual(main?.dependencies.find(d => d.target === '/project/leaf')?.sourceHash, sha256('True'));
            assert.strictEqual(main?.sourceHash, sha256('./dep'));
        });

        it('does not store expressions that read environment variables', async () => {
            const cache = new MemoryImportCache();
            const { value } = await resolveMain({
                '/project/main': './plain + env:PORT',
                '/project/plain': '+1',
                'env:PORT': './offset',
                '/project/offset': '+2',
            }, cache);
            assert.deepStrictEqual(value, NaturalLit(3));
            assert.strictEqual(await cache.get('/project/main'), undefined);
            assert.strictEqual(await cache.get('env:PORT'), undefined);
            assert.strictEqual((await cache.get('/project/plain'))?.key, '/project/plain');
            assert.strictEqual((await cache.get('/project/offset'))?.key, '/project/offset');
            assert.strictEqual(cache.size, 2);
        });

        it('ignores entries whose dependencies changed', async () => {
            const cache = new MemoryImportCache();
            await resolveMain({ '/project/main': './dep + +1', '/project/dep': '+1' }, cache);

            const changed = await resolveMain({ '/project/main': './dep + +1', '/project/dep': '+2' }, cache);
            assert.deepStrictEqual(changed.value, NaturalLit(3));
            assert.deepStrictEqual(changed.parsed, ['/project/main', '/project/dep']);
        });
    });

    describe('FileImportCache', () => {
        let root: string;

        before(async () => {
            root = await mkdtemp(path.join(os.tmpdir(), 'strata-cache-'));
        });

        after(async () => {
            await rm(root, { recursive: true, force: true });
        });

        it('stores entries as JSON and reads them back', async () => {
            const cache = new FileImportCache(path.join(root, 'roundtrip'));
            const stored: CacheEntry = {
                key: '/project/a',
                sourceHash: sha256('λ(x : Natural) → x + +1'),
                dependencies: [{ target: '/project/b', sourceHash: sha256('+2') }],
                expression: Lam('x', Natural(), BinOp('+', Var('x'), NaturalLit(1))),
                storedAt: 1000,
            };
            await cache.set(stored);
            assert.deepStrictEqual(await cache.get('/project/a'), stored);
            assert.strictEqual(await cache.get('/project/other'), undefined);
        });

        it('keeps the first entry stored for a key', async () => {
            const cache = new FileImportCache(path.join(root, 'first-wins'));
            await cache.set(entry('/project/a', 1, BoolLit(true)));
            await cache.set(entry('/project/a', 2, BoolLit(false)));
            const stored = await cache.get('/project/a');
            assert.deepStrictEqual(stored?.expression, BoolLit(true));
        });

        it('ignores unreadable and malformed entries', async () => {
            const directory = path.join(root, 'corrupt');
            const cache = new FileImportCache(directory);
            await cache.set(entry('/project/seed', 1));
            await writeFile(path.join(directory, `${sha256('/project/broken')}.json`), '{ not json');
            await writeFile(path.join(directory, `${sha256('/project/partial')}.json`), '{"key":"/project/partial"}');
            assert.strictEqual(await cache.get('/project/broken'), undefined);
            assert.strictEqual(await cache.get('/project/partial'), undefined);
        });

        it('evicts the oldest entries beyond the bound', async () => {
            const directory = path.join(root, 'bounded');
            const cache = new FileImportCache(directory, 2);
            await cache.set(entry('/project/k1', 1));
            await cache.set(entry('/project/k2', 2));
            await cache.set(entry('/project/k3', 3));
            assert.strictEqual((await readdir(directory)).length, 2);
            assert.strictEqual(await cache.get('/project/k1'), undefined);
            assert.strictEqual((await cache.get('/project/k2'))?.storedAt, 2);
            assert.strictEqual((await cache.get('/project/k3'))?.storedAt, 3);
        });

        it('serves a later run from disk', async () => {
            const directory = path.join(root, 'runs');
            const sources = { '/project/main': './dep * +2', '/project/dep': '+21' };
            const first = await resolveMain(sources, new FileImportCache(directory));
            assert.deepStrictEqual(first.value, NaturalLit(42));

            const second = await resolveMain(sources, new FileImportCache(directory));
            assert.deepStrictEqual(second.value, NaturalLit(42));
            assert.deepStrictEqual(second.parsed, []);
        });
    });
});
