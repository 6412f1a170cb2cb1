/**
 * @file imports.ts
 * @description Import resolution. Replaces every import node by the
 * type-checked normal form of the expression it points at, walking the import
 * graph depth-first and sequentially.
 *
 * Within one call each canonical target is fetched, parsed, resolved and
 * normalized at most once. A target that is reached again while it is still
 * being resolved is a cycle.
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { Expr, ExprOf } from './types';
import { mapChildren } from './substitution';
import { normalize } from './reduction';
import { areEqual } from './equality';
import { typeOf } from './typecheck';
import { emptyCtx, consoleLog } from './state';
import { parseExpression } from './parser';
import { ImportBase, CanonicalTarget, canonicalize, baseOf, targetFromKey } from './canonical';
import { Fetcher, createDefaultFetcher } from './fetch';
import { ImportCache, CacheEntry, CacheDependency, sha256 } from './cache';
import {
    CoreError, CyclicImportError, ImportFetchError, CancellationError, ImportError,
    ReferentialSanityError, TypeMismatchError
} from './errors';

export type SourceParser = (source: string, origin: string) => Expr;

export interface ResolveOptions {
    /** Base for relative imports of the root expression. Defaults to the working directory. */
    base?: ImportBase;
    fetcher?: Fetcher;
    parser?: SourceParser;
    cache?: ImportCache;
    signal?: AbortSignal;
    homeDirectory?: string;
}

interface Resolved {
    expr: Expr;
    type: Expr;
    /** Keys of every import this one depends on, transitively. */
    dependencies: Set<string>;
}

/** State shared by every step of one `resolve` call. */
interface RunState {
    fetcher: Fetcher;
    parser: SourceParser;
    cache?: ImportCache;
    signal?: AbortSignal;
    homeDirectory: string;
    /** Base of relative imports inside environment variables: the base of the root expression. */
    envBase: ImportBase;
    memo: Map<string, Resolved>;
    sources: Map<string, string>;
}

/** Where the walk currently is: the chain of imports being resolved and their base. */
export interface ResolutionContext {
    chain: string[];
    base: ImportBase;
    run: RunState;
}

/** Errors that already carry the import chain they happened on. */
function carriesChain(e: unknown): boolean {
    return e instanceof ImportError || e instanceof CyclicImportError || e instanceof ImportFetchError ||
        e instanceof CancellationError || e instanceof ReferentialSanityError;
}

/** Import nodes of `expr` in depth-first pre-order. */
function collectImports(expr: Expr, found: ExprOf<'Import'>[] = []): ExprOf<'Import'>[] {
    if (expr.tag === 'Import') {
        found.push(expr);
        return found;
    }
    mapChildren(expr, child => {
        collectImports(child, found);
        return child;
    });
    return found;
}

function replaceImports(expr: Expr, resolved: Map<ExprOf<'Import'>, Expr>): Expr {
    if (expr.tag === 'Import') return resolved.get(expr) ?? expr;
    return mapChildren(expr, child => replaceImports(child, resolved));
}

/** @param chain The import chain ending at `target`. */
async function fetchSource(target: CanonicalTarget, run: RunState, chain: string[]): Promise<string> {
    const known = run.sources.get(target.key);
    if (known !== undefined) return known;
    if (run.signal?.aborted) throw new CancellationError(target.key, chain);
    let source: string;
    try {
        source = await run.fetcher.fetch(target, run.signal);
    } catch (e) {
        if (run.signal?.aborted) throw new CancellationError(target.key, chain);
        if (e instanceof CoreError) throw e;
        throw new ImportFetchError(target.key, e instanceof Error ? e.message : String(e), chain);
    }
    run.sources.set(target.key, source);
    return source;
}

/** A cache entry is usable when its source and every dependency are unchanged. */
async function isEntryValid(entry: CacheEntry, source: string, ctx: ResolutionContext): Promise<boolean> {
    if (entry.sourceHash !== sha256(source)) return false;
    for (const dependency of entry.dependencies) {
        const dependencySource = await fetchSource(targetFromKey(dependency.target), ctx.run, [...ctx.chain, dependency.target]);
        if (sha256(dependencySource) !== dependency.sourceHash) return false;
    }
    return true;
}

async function fromCache(target: CanonicalTarget, source: string, ctx: ResolutionContext): Promise<Resolved | undefined> {
    const cache = ctx.run.cache;
    if (!cache) return undefined;
    const entry = await cache.get(target.key);
    if (!entry || !(await isEntryValid(entry, source, ctx))) return undefined;
    consoleLog(`resolve: cache hit for ${target.key}`);
    return {
        expr: entry.expression,
        type: typeOf(emptyCtx, entry.expression),
        dependencies: new Set(entry.dependencies.map(d => d.target)),
    };
}

async function toCache(target: CanonicalTarget, source: string, resolved: Resolved, ctx: ResolutionContext): Promise<void> {
    const cache = ctx.run.cache;
    if (!cache) return;
    // Relative imports inside environment variables depend on the run's root base.
    const readsEnvironment = [target.key, ...resolved.dependencies].some(key => targetFromKey(key).kind === 'env');
    if (readsEnvironment) return;
    const dependencies: CacheDependency[] = [];
    for (const key of resolved.dependencies) {
        const dependencySource = await fetchSource(targetFromKey(key), ctx.run, [...ctx.chain, key]);
        dependencies.push({ target: key, sourceHash: sha256(dependencySource) });
    }
    await cache.set({
        key: target.key,
        sourceHash: sha256(source),
        dependencies,
        expression: resolved.expr,
        storedAt: Date.now(),
    });
}

async function loadTarget(target: CanonicalTarget, ctx: ResolutionContext): Promise<Resolved> {
    const source = await fetchSource(target, ctx.run, ctx.chain);
    const cached = await fromCache(target, source, ctx);
    if (cached) return cached;

    const parsed = ctx.run.parser(source, target.key);
    const dependencies = new Set<string>();
    const inner: ResolutionContext = { chain: ctx.chain, base: baseOf(target, ctx.run.envBase), run: ctx.run };
    const expr = await resolveWithin(parsed, inner, dependencies);
    const type = typeOf(emptyCtx, expr);
    const resolved = { expr: normalize(expr), type, dependencies };
    await toCache(target, source, resolved, ctx);
    return resolved;
}

async function resolveImport(node: ExprOf<'Import'>, ctx: ResolutionContext, dependencies: Set<string>): Promise<Expr> {
    const target = canonicalize(node.target, ctx.base, ctx.chain, ctx.run.homeDirectory);
    const chain = [...ctx.chain, target.key];
    if (ctx.chain.includes(target.key)) throw new CyclicImportError(chain);

    try {
        let resolved = ctx.run.memo.get(target.key);
        if (!resolved) {
            consoleLog(`resolve: ${chain.join(' -> ')}`);
            resolved = await loadTarget(target, { chain, base: ctx.base, run: ctx.run });
            ctx.run.memo.set(target.key, resolved);
        }
        if (node.expectedType !== undefined) {
            const expected = await resolveWithin(node.expectedType, ctx, dependencies);
            typeOf(emptyCtx, expected);
            if (!areEqual(expected, resolved.type)) {
                throw new TypeMismatchError(node, normalize(expected), resolved.type);
            }
        }
        dependencies.add(target.key);
        for (const key of resolved.dependencies) dependencies.add(key);
        return resolved.expr;
    } catch (e) {
        if (carriesChain(e)) throw e;
        if (e instanceof CoreError) throw new ImportError(chain, e);
        throw e;
    }
}

async function resolveWithin(expr: Expr, ctx: ResolutionContext, dependencies: Set<string>): Promise<Expr> {
    const nodes = collectImports(expr);
    if (nodes.length === 0) return expr;
    const resolved = new Map<ExprOf<'Import'>, Expr>();
    for (const node of nodes) {
        resolved.set(node, await resolveImport(node, ctx, dependencies));
    }
    return replaceImports(expr, resolved);
}

/**
 * Replaces every import in `expr` by the normal form of its target.
 * @throws CoreError on the first failing import.
 */
export async function resolve(expr: Expr, options: ResolveOptions = {}): Promise<Expr> {
    const base: ImportBase = options.base ?? { kind: 'directory', path: process.cwd() };
    const ctx: ResolutionContext = {
        chain: [],
        base,
        run: {
            fetcher: options.fetcher ?? createDefaultFetcher(),
            parser: options.parser ?? parseExpression,
            cache: options.cache,
            signal: options.signal,
            homeDirectory: options.homeDirectory ?? os.homedir(),
            envBase: base,
            memo: new Map(),
            sources: new Map(),
        },
    };
    return resolveWithin(expr, ctx, new Set());
}

/** The base for an expression read from `file`. */
export function baseForFile(file: string): ImportBase {
    return { kind: 'directory', path: path.dirname(path.resolve(file)) };
}
