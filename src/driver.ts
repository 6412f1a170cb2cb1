/**
 * @file driver.ts
 * @description Entry points: resolve imports, type-check, normalize.
 */

import { z } from 'zod';
import { Expr, Result, Ok, Err, Annot } from './types';
import { emptyCtx, consoleLog, printExpr } from './state';
import { parseExpression } from './parser';
import { resolve, ResolveOptions } from './imports';
import { typeOf } from './typecheck';
import { normalize } from './reduction';
import { decode, expectedType } from './decode';
import { CoreError } from './errors';

export interface RunOptions extends ResolveOptions {
    /** Name of the source text, used in spans and error messages. */
    origin?: string;
}

export interface Evaluation {
    type: Expr;
    value: Expr;
}

async function evaluateExpr(rawExpr: Expr, options: RunOptions): Promise<Evaluation> {
    const resolved = await resolve(rawExpr, options);
    const type = typeOf(emptyCtx, resolved);
    const value = normalize(resolved);
    consoleLog(`run: ${printExpr(value)} : ${printExpr(type)}`);
    return { type, value };
}

function toResult<T>(e: unknown): Result<T, CoreError> {
    if (e instanceof CoreError) return Err(e);
    throw e;
}

/**
 * Resolves, type-checks and normalizes an expression, stopping at the first error.
 * @returns The normal form, or the error that stopped the run.
 */
export async function run(rawExpr: Expr, options: RunOptions = {}): Promise<Result<Expr, CoreError>> {
    try {
        const { value } = await evaluateExpr(rawExpr, options);
        return Ok(value);
    } catch (e) {
        return toResult(e);
    }
}

/** Parses and runs source text, returning both its type and its normal form. */
export async function evaluate(source: string, options: RunOptions = {}): Promise<Result<Evaluation, CoreError>> {
    try {
        return Ok(await evaluateExpr(parseExpression(source, options.origin), options));
    } catch (e) {
        return toResult(e);
    }
}

/**
 * Parses and runs source text expected to have the decoder's type, and
 * returns the decoded value.
 * @throws CoreError when any step fails.
 */
export async function input<D extends z.ZodTypeAny>(decoder: D, source: string, options: RunOptions = {}): Promise<z.output<D>> {
    const annotated = Annot(parseExpression(source, options.origin), expectedType(decoder));
    const { value } = await evaluateExpr(annotated, options);
    return decode(decoder, value);
}
