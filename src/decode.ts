/**
 * @file decode.ts
 * @description Decoding normalized values into plain TypeScript values.
 *
 * A decoder is a zod schema built from the combinators below. Its shape also
 * determines the strata type the value must have, so a configuration can be
 * checked against it before anything is extracted:
 *
 *     const Config = record({ port: natural, hosts: list(text) });
 *     const config = await input(Config, source); // { port: bigint, hosts: string[] }
 */

import { z } from 'zod';
import { Expr, Bool, Natural, Integer, Double, Text, List, Optional, RecordType } from './types';
import { DecodeError } from './errors';

export type Decoder<T> = z.ZodType<T>;

export const bool = z.boolean();
export const natural = z.bigint().nonnegative();
export const integer = z.bigint();
export const double = z.number();
export const text = z.string();

export const list = <D extends z.ZodTypeAny>(element: D) => z.array(element);
export const optional = <D extends z.ZodTypeAny>(element: D) => element.optional();
export const record = <S extends z.ZodRawShape>(shape: S) => z.object(shape).strict();

/**
 * The strata type a decoder accepts.
 * @throws TypeError for schemas that are not built from the combinators.
 */
export function expectedType(decoder: z.ZodTypeAny): Expr {
    if (decoder instanceof z.ZodBoolean) return Bool();
    if (decoder instanceof z.ZodBigInt) {
        const min = decoder.minValue;
        return min !== null && min >= 0n ? Natural() : Integer();
    }
    if (decoder instanceof z.ZodNumber) return Double();
    if (decoder instanceof z.ZodString) return Text();
    if (decoder instanceof z.ZodArray) return List(expectedType(decoder.element));
    if (decoder instanceof z.ZodOptional) return Optional(expectedType(decoder.unwrap()));
    if (decoder instanceof z.ZodObject) {
        const shape: z.ZodRawShape = decoder.shape;
        return RecordType(Object.entries(shape).map(([name, field]): [string, Expr] => [name, expectedType(field)]));
    }
    throw new TypeError(`No strata type corresponds to ${decoder.constructor.name}`);
}

/** Converts a normal-form value to plain data, or undefined when it is not data. */
function toNative(expr: Expr): { ok: true, value: unknown } | { ok: false } {
    switch (expr.tag) {
        case 'BoolLit': case 'NaturalLit': case 'IntegerLit': case 'DoubleLit': case 'TextLit':
            return { ok: true, value: expr.value };
        case 'ListLit': {
            const values: unknown[] = [];
            for (const element of expr.elements) {
                const native = toNative(element);
                if (!native.ok) return native;
                values.push(native.value);
            }
            return { ok: true, value: values };
        }
        case 'OptionalLit':
            return expr.elements.length === 0 ? { ok: true, value: undefined } : toNative(expr.elements[0]);
        case 'RecordLit': {
            const fields: Record<string, unknown> = {};
            for (const [name, value] of expr.fields) {
                const native = toNative(value);
                if (!native.ok) return native;
                fields[name] = native.value;
            }
            return { ok: true, value: fields };
        }
        default:
            return { ok: false };
    }
}

/**
 * Extracts a value of the decoder's type from a normalized expression.
 * @throws DecodeError when the expression does not have the decoder's shape.
 */
export function decode<D extends z.ZodTypeAny>(decoder: D, expr: Expr): z.output<D> {
    const native = toNative(expr);
    if (native.ok) {
        const parsed = decoder.safeParse(native.value);
        if (parsed.success) return parsed.data;
    }
    throw new DecodeError(expectedType(decoder), expr);
}
