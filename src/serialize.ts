/**
 * @file serialize.ts
 * @description JSON form of expressions, used by the persisted import cache.
 * Naturals and integers are written as decimal strings.
 */

import { z } from 'zod';
import { Expr } from './types';
import { isBuiltinName } from './stdlib';

const positionSchema = z.object({ offset: z.number(), line: z.number(), column: z.number() });

const bigintSchema = z.string().regex(/^-?\d+$/).transform(digits => BigInt(digits));

const importTargetSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('path'), path: z.string() }),
    z.object({ kind: z.literal('env'), name: z.string() }),
    z.object({ kind: z.literal('url'), url: z.string() }),
]);

export const exprSchema: z.ZodType<Expr, z.ZodTypeDef, unknown> = z.lazy(() => {
    const entries = z.array(z.tuple([z.string(), exprSchema]));
    return z.discriminatedUnion('tag', [
        z.object({ tag: z.literal('Const'), sort: z.enum(['Type', 'Kind']) }),
        z.object({ tag: z.literal('Var'), name: z.string(), index: z.number().int().nonnegative() }),
        z.object({ tag: z.literal('Lam'), name: z.string(), domain: exprSchema, body: exprSchema }),
        z.object({ tag: z.literal('Pi'), name: z.string(), domain: exprSchema, codomain: exprSchema }),
        z.object({ tag: z.literal('App'), func: exprSchema, arg: exprSchema }),
        z.object({
            tag: z.literal('Let'), name: z.string(), annotation: exprSchema.optional(), value: exprSchema, body: exprSchema,
        }),
        z.object({ tag: z.literal('Annot'), expr: exprSchema, type: exprSchema }),
        z.object({ tag: z.literal('BoolLit'), value: z.boolean() }),
        z.object({ tag: z.literal('NaturalLit'), value: bigintSchema.refine(n => n >= 0n, 'negative natural') }),
        z.object({ tag: z.literal('IntegerLit'), value: bigintSchema }),
        z.object({ tag: z.literal('DoubleLit'), value: z.number() }),
        z.object({ tag: z.literal('TextLit'), value: z.string() }),
        z.object({ tag: z.literal('BoolIf'), cond: exprSchema, thenBranch: exprSchema, elseBranch: exprSchema }),
        z.object({
            tag: z.literal('BinOp'), op: z.enum(['&&', '||', '==', '!=', '+', '*', '++']), left: exprSchema, right: exprSchema,
        }),
        z.object({ tag: z.literal('ListLit'), type: exprSchema.optional(), elements: z.array(exprSchema) }),
        z.object({ tag: z.literal('OptionalLit'), type: exprSchema, elements: z.array(exprSchema) }),
        z.object({ tag: z.literal('RecordType'), fields: entries }),
        z.object({ tag: z.literal('RecordLit'), fields: entries }),
        z.object({ tag: z.literal('UnionType'), alternatives: entries }),
        z.object({ tag: z.literal('UnionLit'), label: z.string(), value: exprSchema, alternatives: entries }),
        z.object({ tag: z.literal('Field'), record: exprSchema, name: z.string() }),
        z.object({ tag: z.literal('Builtin'), name: z.string().refine(isBuiltinName, 'unknown built-in') }),
        z.object({
            tag: z.literal('Note'),
            span: z.object({ origin: z.string(), start: positionSchema, end: positionSchema }),
            expr: exprSchema,
        }),
        z.object({ tag: z.literal('Import'), target: importTargetSchema, expectedType: exprSchema.optional() }),
    ]);
});

/** `JSON.stringify` replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

export function serializeExpr(expr: Expr): string {
    return JSON.stringify(expr, bigintReplacer);
}

/**
 * Reads an expression back from its JSON form.
 * @throws SyntaxError on malformed JSON, ZodError on a malformed expression.
 */
export function deserializeExpr(text: string): Expr {
    const json: unknown = JSON.parse(text);
    return exprSchema.parse(json);
}
