/**
 * @file tests/typecheck_tests.ts
 * @description Tests for type inference and checking, including the error
 * reported for each kind of ill-typed expression.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    Var, Pi, Arrow, Type, Kind, Bool, Natural, Text, List, Optional, UnionType, NaturalLit, Import
} from '../src/types';
import { emptyCtx, extendCtx } from '../src/state';
import { infer, check, typeOf } from '../src/typecheck';
import { parseExpression } from '../src/parser';
import {
    TypeCheckError, UnboundVariableError, UntypedError, InvalidInputTypeError, InvalidOutputTypeError,
    NoDependentTypesError, NotAFunctionError, TypeMismatchError, AnnotationMismatchError,
    IfBranchMismatchError, MissingListTypeError, InvalidOptionalLiteralError, DuplicateFieldError,
    DuplicateAlternativeError, InvalidFieldTypeError, NotARecordError, MissingFieldError,
    UnresolvedImportError
} from '../src/errors';
import { parse, unwrapOk, unwrapErr } from './utils';

const inferSource = (source: string) => unwrapOk(infer(emptyCtx, parse(source)));
const inferError = (source: string) => unwrapErr(infer(emptyCtx, parse(source)));

describe('Type Checking', () => {
    describe('Inference', () => {
        it('types literals and operators', () => {
            assert.deepStrictEqual(inferSource('+2 + +3'), Natural());
            assert.deepStrictEqual(inferSource('True && False'), Bool());
            assert.deepStrictEqual(inferSource('"a" ++ "b"'), Text());
        });

        it('types Type as Kind', () => {
            assert.deepStrictEqual(inferSource('Type'), Kind());
        });

        it('types lambdas with a Pi', () => {
            assert.deepStrictEqual(inferSource('λ(n : Bool) → +10 * +10'), Pi('n', Bool(), Natural()));
        });

        it('types polymorphic functions', () => {
            assert.deepStrictEqual(inferSource('λ(a : Type) → λ(x : a) → x'), Pi('a', Type(), Pi('x', Var('a'), Var('a'))));
        });

        it('instantiates the codomain on application', () => {
            assert.deepStrictEqual(inferSource('(λ(a : Type) → λ(x : a) → x) Bool'), Pi('x', Bool(), Bool()));
            assert.deepStrictEqual(inferSource('Natural/fold +3 Text'), Pi('succ', Arrow(Text(), Text()), Pi('zero', Text(), Text())));
        });

        it('types lists, optionals, records and unions', () => {
            assert.deepStrictEqual(inferSource('[True, False]'), List(Bool()));
            assert.deepStrictEqual(inferSource('[] : List Natural'), List(Natural()));
            assert.deepStrictEqual(inferSource('[+1] : Optional Natural'), Optional(Natural()));
            assert.deepStrictEqual(inferSource('{ a = +1, b = True }'), parse('{ a : Natural, b : Bool }'));
            assert.deepStrictEqual(inferSource('{ a : Natural }'), Type());
            assert.deepStrictEqual(inferSource('{ a = +1 }.a'), Natural());
            assert.deepStrictEqual(
                inferSource('< Left = +1 | Right : Bool >'),
                UnionType([['Left', Natural()], ['Right', Bool()]])
            );
        });

        it('type-checks let bodies with the value substituted', () => {
            assert.deepStrictEqual(inferSource('let T = Natural in λ(x : T) → x'), Pi('x', Natural(), Natural()));
            assert.deepStrictEqual(inferSource('let b : Bool = True in b || False'), Bool());
        });

        it('looks variables up in the context', () => {
            const ctx = extendCtx(emptyCtx, 'x', Bool());
            assert.deepStrictEqual(unwrapOk(infer(ctx, Var('x'))), Bool());
        });

        it('resolves shadowed variables by index', () => {
            assert.deepStrictEqual(inferSource('λ(x : Bool) → λ(x : Natural) → x@1'), Pi('x', Bool(), Pi('x', Natural(), Bool())));
        });
    });

    describe('Checking', () => {
        it('accepts a matching type', () => {
            assert.strictEqual(check(emptyCtx, NaturalLit(1), Natural()).ok, true);
            assert.strictEqual(check(emptyCtx, Type(), Kind()).ok, true);
        });

        it('reports the expected and actual types', () => {
            const error = unwrapErr(check(emptyCtx, NaturalLit(1), Bool()));
            assert.ok(error instanceof TypeMismatchError);
            assert.deepStrictEqual(error.expected, Bool());
            assert.deepStrictEqual(error.actual, Natural());
        });
    });

    describe('Errors', () => {
        it('rejects Kind, which has no type', () => {
            assert.ok(inferError('Kind') instanceof UntypedError);
        });

        it('rejects unbound variables', () => {
            const error = inferError('λ(x : Bool) → y');
            assert.ok(error instanceof UnboundVariableError);
            assert.strictEqual(error.kind, 'UnboundVariable');
        });

        it('rejects invalid input and output types', () => {
            assert.ok(inferError('λ(x : +1) → x') instanceof InvalidInputTypeError);
            assert.ok(inferError('∀(x : Bool) → +1') instanceof InvalidOutputTypeError);
        });

        it('rejects functions from terms to types', () => {
            assert.ok(inferError('λ(x : Bool) → Bool') instanceof NoDependentTypesError);
        });

        it('rejects applying a non-function', () => {
            assert.ok(inferError('True False') instanceof NotAFunctionError);
        });

        it('rejects arguments of the wrong type', () => {
            const error = inferError('(λ(x : Bool) → x) +1');
            assert.ok(error instanceof TypeMismatchError);
            assert.deepStrictEqual(error.expected, Bool());
            assert.deepStrictEqual(error.actual, Natural());
            assert.deepStrictEqual(error.expr, NaturalLit(1));
        });

        it('rejects operands of the wrong type', () => {
            assert.ok(inferError('+1 && True') instanceof TypeMismatchError);
        });

        it('rejects mismatched annotations', () => {
            assert.ok(inferError('+1 : Bool') instanceof AnnotationMismatchError);
            assert.ok(inferError('let x : Bool = +1 in x') instanceof AnnotationMismatchError);
        });

        it('rejects if with a non-Bool condition or mismatched branches', () => {
            assert.ok(inferError('if +1 then True else False') instanceof TypeMismatchError);
            const error = inferError('if True then +1 else "one"');
            assert.ok(error instanceof IfBranchMismatchError);
            assert.strictEqual(error.kind, 'IfBranchMismatch');
        });

        it('rejects malformed list and optional literals', () => {
            assert.ok(inferError('[]') instanceof MissingListTypeError);
            assert.ok(inferError('[+1, True]') instanceof TypeMismatchError);
            assert.ok(inferError('[True] : List Natural') instanceof TypeMismatchError);
            const error = inferError('[+1, +2] : Optional Natural');
            assert.ok(error instanceof InvalidOptionalLiteralError);
            assert.strictEqual(error.count, 2);
        });

        it('rejects duplicate fields and alternatives', () => {
            const field = inferError('{ a = +1, a = +2 }');
            assert.ok(field instanceof DuplicateFieldError);
            assert.strictEqual(field.field, 'a');
            assert.ok(inferError('{ a : Bool, a : Natural }') instanceof DuplicateFieldError);
            assert.ok(inferError('< A : Bool | A : Natural >') instanceof DuplicateAlternativeError);
            assert.ok(inferError('< A = True | A : Bool >') instanceof DuplicateAlternativeError);
        });

        it('rejects fields that are not terms', () => {
            assert.ok(inferError('{ a : +1 }') instanceof InvalidFieldTypeError);
            assert.ok(inferError('{ a = Bool }') instanceof InvalidFieldTypeError);
        });

        it('rejects selecting from non-records and missing fields', () => {
            assert.ok(inferError('True.a') instanceof NotARecordError);
            const error = inferError('{ a = +1 }.b');
            assert.ok(error instanceof MissingFieldError);
            assert.strictEqual(error.field, 'b');
        });

        it('rejects unresolved imports', () => {
            assert.throws(() => typeOf(emptyCtx, Import({ kind: 'env', name: 'HOME' })), UnresolvedImportError);
        });
    });

    describe('Source locations', () => {
        it('attaches the span of the innermost note', () => {
            const result = infer(emptyCtx, parseExpression('λ(x : Bool) → y'));
            const error = unwrapErr(result);
            assert.ok(error instanceof TypeCheckError);
            assert.deepStrictEqual(error.span, {
                origin: '(input)',
                start: { offset: 14, line: 1, column: 15 },
                end: { offset: 15, line: 1, column: 16 },
            });
        });
    });
});
