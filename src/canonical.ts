/**
 * @file canonical.ts
 * @description Canonical import targets. Two imports that denote the same
 * resource get the same key, however they were spelled.
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { ImportTarget } from './types';
import { printImportTarget } from './state';
import { ImportFetchError, ReferentialSanityError } from './errors';

/** Where relative imports of an expression are resolved from. */
export type ImportBase =
    | { kind: 'directory', path: string }
    | { kind: 'url', href: string };

export type CanonicalTarget =
    | { kind: 'file', key: string, path: string }
    | { kind: 'env', key: string, name: string }
    | { kind: 'url', key: string, href: string };

/**
 * Normalizes a URL: lower-case scheme and host, resolved `.` and `..`
 * segments, no duplicate or trailing slashes in the path.
 */
export function normalizeUrl(raw: string, chain: string[] = []): string {
    let url: URL;
    try {
        url = new URL(raw);
    } catch {
        throw new ImportFetchError(raw, 'invalid URL', chain);
    }
    let pathname = url.pathname.replace(/\/{2,}/g, '/');
    if (pathname.length > 1 && pathname.endsWith('/')) pathname = pathname.slice(0, -1);
    url.pathname = pathname;
    return url.href;
}

const urlTarget = (href: string): CanonicalTarget => ({ kind: 'url', key: href, href });
const fileTarget = (filePath: string): CanonicalTarget => ({ kind: 'file', key: filePath, path: filePath });
const envTarget = (name: string): CanonicalTarget => ({ kind: 'env', key: `env:${name}`, name });

function isRelativePath(p: string): boolean {
    return p.startsWith('./') || p.startsWith('../');
}

/**
 * Resolves an import target against the base of the expression that contains it.
 * @param chain Keys of the imports being resolved, for error reporting.
 * @throws ReferentialSanityError when a remote expression refers to a local
 * path or an environment variable.
 */
export function canonicalize(
    target: ImportTarget,
    base: ImportBase,
    chain: string[] = [],
    homeDirectory: string = os.homedir()
): CanonicalTarget {
    switch (target.kind) {
        case 'url':
            return urlTarget(normalizeUrl(target.url, chain));
        case 'env':
            if (base.kind === 'url') throw new ReferentialSanityError(base.href, printImportTarget(target));
            return envTarget(target.name);
        case 'path': {
            if (base.kind === 'url') {
                if (!isRelativePath(target.path)) throw new ReferentialSanityError(base.href, target.path);
                return urlTarget(normalizeUrl(new URL(target.path, base.href).href, chain));
            }
            if (target.path.startsWith('~/')) return fileTarget(path.join(homeDirectory, target.path.slice(2)));
            return fileTarget(path.resolve(base.path, target.path));
        }
    }
}

/**
 * The base for the imports of an expression loaded from `target`.
 * @param envBase Base of the imports inside environment variables. It is the
 * same for every importer, so that `env:NAME` always denotes one expression.
 */
export function baseOf(target: CanonicalTarget, envBase: ImportBase): ImportBase {
    switch (target.kind) {
        case 'file': return { kind: 'directory', path: path.dirname(target.path) };
        case 'url': return { kind: 'url', href: target.href };
        case 'env': return envBase;
    }
}

/** Recovers a canonical target from its key. */
export function targetFromKey(key: string): CanonicalTarget {
    if (key.startsWith('env:')) return envTarget(key.slice('env:'.length));
    if (/^https?:\/\//.test(key)) return urlTarget(key);
    return fileTarget(key);
}
