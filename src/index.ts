/**
 * @file index.ts
 * @description Public API of the strata core.
 */

export * from './types';
export * from './errors';
export { shift, substitute, instantiate, denote, occursFree } from './substitution';
export { normalize, isNormalized } from './reduction';
export { alphaEquivalent, areEqual } from './equality';
export { typeOf, infer, check } from './typecheck';
export { typeOfBuiltin, BUILTIN_NAMES } from './stdlib';
export { parseExpression } from './parser';
export { printExpr, setFlag, getFlag, resetFlags, emptyCtx, extendCtx, lookupCtx } from './state';
export { resolve, baseForFile } from './imports';
export type { ResolveOptions, ResolutionContext, SourceParser } from './imports';
export { canonicalize, normalizeUrl } from './canonical';
export type { ImportBase, CanonicalTarget } from './canonical';
export { createDefaultFetcher } from './fetch';
export type { Fetcher } from './fetch';
export { MemoryImportCache, FileImportCache, sha256 } from './cache';
export type { ImportCache, CacheEntry } from './cache';
export { serializeExpr, deserializeExpr } from './serialize';
export { run, evaluate, input } from './driver';
export type { RunOptions, Evaluation } from './driver';
export { decode, expectedType, bool, natural, integer, double, text, list, optional, record } from './decode';
export type { Decoder } from './decode';
export { loadConfig, applyConfig } from './config';
export type { StrataConfig } from './config';
