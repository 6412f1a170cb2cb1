/**
 * @file typecheck.ts
 * @description Bidirectional type checking of import-free expressions:
 * `infer` computes the type of an expression, `check` verifies it against an
 * expected one. Both are pure and report failures as `Result` values; the
 * throwing core `typeOf` is shared with the import resolver.
 */

import {
    Expr, ExprOf, Context, Result, Ok, Err, Sort, Type, Kind, Pi, Bool, Natural, Integer,
    Double, Text, List, Optional, RecordType, UnionType
} from './types';
import { extendCtx, lookupCtx, consoleLog, printExpr } from './state';
import { normalize } from './reduction';
import { areEqual } from './equality';
import { instantiate } from './substitution';
import { typeOfBuiltin } from './stdlib';
import {
    TypeCheckError, UnboundVariableError, UntypedError, InvalidInputTypeError,
    InvalidOutputTypeError, NoDependentTypesError, NotAFunctionError, TypeMismatchError,
    AnnotationMismatchError, IfBranchMismatchError, MissingListTypeError,
    InvalidOptionalLiteralError, DuplicateFieldError, DuplicateAlternativeError,
    InvalidFieldTypeError, NotARecordError, MissingFieldError, UnresolvedImportError
} from './errors';

const OPERAND_TYPES = {
    '&&': Bool, '||': Bool, '==': Bool, '!=': Bool,
    '+': Natural, '*': Natural,
    '++': Text,
} satisfies Record<ExprOf<'BinOp'>['op'], () => Expr>;

/** The sort a type lives in, or undefined when `type` is not a type at all. */
function sortOf(ctx: Context, type: Expr): Sort | undefined {
    const kind = typeOf(ctx, type);
    return kind.tag === 'Const' ? kind.sort : undefined;
}

/** Throws `mismatch()` unless `expr`'s type is judgmentally equal to `expected`. */
function expectType(ctx: Context, expr: Expr, expected: Expr, mismatch?: (actual: Expr) => TypeCheckError): void {
    const actual = typeOf(ctx, expr);
    if (!areEqual(expected, actual)) {
        throw mismatch ? mismatch(actual) : new TypeMismatchError(expr, normalize(expected), actual);
    }
}

function firstDuplicate(names: string[]): string | undefined {
    const seen = new Set<string>();
    for (const name of names) {
        if (seen.has(name)) return name;
        seen.add(name);
    }
    return undefined;
}

/** Checks that `type` is a `Type`, i.e. classifies run-time values. */
function ensureValueType(ctx: Context, type: Expr, onFailure: (kind: Expr) => TypeCheckError): void {
    const kind = typeOf(ctx, type);
    if (kind.tag !== 'Const' || kind.sort !== 'Type') throw onFailure(kind);
}

/** Type-checks a type annotation. `Kind` is a valid annotation even though it has no type. */
function checkAnnotation(ctx: Context, type: Expr): void {
    let bare = type;
    while (bare.tag === 'Note') bare = bare.expr;
    if (bare.tag === 'Const' && bare.sort === 'Kind') return;
    typeOf(ctx, type);
}

function typeOfPi(ctx: Context, expr: ExprOf<'Pi'>): Expr {
    const inputSort = sortOf(ctx, expr.domain);
    if (inputSort === undefined) throw new InvalidInputTypeError(expr, expr.domain);
    const innerCtx = extendCtx(ctx, expr.name, normalize(expr.domain));
    const outputSort = sortOf(innerCtx, expr.codomain);
    if (outputSort === undefined) throw new InvalidOutputTypeError(expr, expr.codomain);
    if (inputSort === 'Type' && outputSort === 'Kind') throw new NoDependentTypesError(expr);
    return outputSort === 'Type' ? Type() : Kind();
}

function typeOfRecordLit(ctx: Context, expr: ExprOf<'RecordLit'>): Expr {
    const duplicate = firstDuplicate(expr.fields.map(([name]) => name));
    if (duplicate !== undefined) throw new DuplicateFieldError(expr, duplicate);
    const fieldTypes = expr.fields.map(([name, value]): [string, Expr] => {
        const fieldType = typeOf(ctx, value);
        ensureValueType(ctx, fieldType, () => new InvalidFieldTypeError(expr, name, fieldType));
        return [name, fieldType];
    });
    return RecordType(fieldTypes);
}

function typeOfUnionLit(ctx: Context, expr: ExprOf<'UnionLit'>): Expr {
    const duplicate = firstDuplicate([expr.label, ...expr.alternatives.map(([name]) => name)]);
    if (duplicate !== undefined) throw new DuplicateAlternativeError(expr, duplicate);
    const valueType = typeOf(ctx, expr.value);
    ensureValueType(ctx, valueType, () => new InvalidFieldTypeError(expr, expr.label, valueType));
    const unionType = UnionType([[expr.label, valueType], ...expr.alternatives]);
    typeOf(ctx, unionType);
    return normalize(unionType);
}

function typeOfList(ctx: Context, expr: ExprOf<'ListLit'> | ExprOf<'OptionalLit'>): Expr {
    let elementType: Expr;
    if (expr.type !== undefined) {
        const declared = expr.type;
        ensureValueType(ctx, declared, kind => new TypeMismatchError(declared, Type(), kind));
        elementType = normalize(declared);
    } else if (expr.elements.length > 0) {
        const inferred = typeOf(ctx, expr.elements[0]);
        ensureValueType(ctx, inferred, kind => new TypeMismatchError(inferred, Type(), kind));
        elementType = inferred;
    } else {
        throw new MissingListTypeError(expr);
    }
    for (const element of expr.elements) expectType(ctx, element, elementType);
    return expr.tag === 'ListLit' ? List(elementType) : Optional(elementType);
}

/**
 * Computes the normalized type of `expr` in `ctx`.
 * @throws TypeCheckError when the expression is ill-typed.
 * @throws UnresolvedImportError when the expression still contains an import.
 */
export function typeOf(ctx: Context, expr: Expr): Expr {
    switch (expr.tag) {
        case 'Const':
            if (expr.sort === 'Type') return Kind();
            throw new UntypedError(expr);
        case 'Var': {
            const binding = lookupCtx(ctx, expr.name, expr.index);
            if (!binding) throw new UnboundVariableError(expr);
            return binding.type;
        }
        case 'Lam': {
            if (sortOf(ctx, expr.domain) === undefined) throw new InvalidInputTypeError(expr, expr.domain);
            const domain = normalize(expr.domain);
            const bodyType = typeOf(extendCtx(ctx, expr.name, domain), expr.body);
            const lamType = Pi(expr.name, domain, bodyType);
            typeOf(ctx, lamType);
            return lamType;
        }
        case 'Pi': return typeOfPi(ctx, expr);
        case 'App': {
            const funcType = typeOf(ctx, expr.func);
            if (funcType.tag !== 'Pi') throw new NotAFunctionError(expr.func, funcType);
            expectType(ctx, expr.arg, funcType.domain);
            return normalize(instantiate(funcType.codomain, funcType.name, expr.arg));
        }
        case 'Let': {
            if (expr.annotation !== undefined) {
                const annotation = expr.annotation;
                checkAnnotation(ctx, annotation);
                expectType(ctx, expr.value, annotation,
                    actual => new AnnotationMismatchError(expr.value, normalize(annotation), actual));
            } else {
                typeOf(ctx, expr.value);
            }
            return typeOf(ctx, instantiate(expr.body, expr.name, expr.value));
        }
        case 'Annot': {
            checkAnnotation(ctx, expr.type);
            const expected = normalize(expr.type);
            expectType(ctx, expr.expr, expected, actual => new AnnotationMismatchError(expr.expr, expected, actual));
            return expected;
        }
        case 'BoolLit': return Bool();
        case 'NaturalLit': return Natural();
        case 'IntegerLit': return Integer();
        case 'DoubleLit': return Double();
        case 'TextLit': return Text();
        case 'BoolIf': {
            expectType(ctx, expr.cond, Bool());
            const thenType = typeOf(ctx, expr.thenBranch);
            const elseType = typeOf(ctx, expr.elseBranch);
            ensureValueType(ctx, thenType, kind => new TypeMismatchError(expr.thenBranch, Type(), kind));
            if (!areEqual(thenType, elseType)) throw new IfBranchMismatchError(expr, thenType, elseType);
            return thenType;
        }
        case 'BinOp': {
            const operandType = OPERAND_TYPES[expr.op]();
            expectType(ctx, expr.left, operandType);
            expectType(ctx, expr.right, operandType);
            return operandType;
        }
        case 'ListLit': return typeOfList(ctx, expr);
        case 'OptionalLit':
            if (expr.elements.length > 1) throw new InvalidOptionalLiteralError(expr, expr.elements.length);
            return typeOfList(ctx, expr);
        case 'RecordType': {
            const duplicate = firstDuplicate(expr.fields.map(([name]) => name));
            if (duplicate !== undefined) throw new DuplicateFieldError(expr, duplicate);
            for (const [name, fieldType] of expr.fields) {
                ensureValueType(ctx, fieldType, () => new InvalidFieldTypeError(expr, name, fieldType));
            }
            return Type();
        }
        case 'RecordLit': return typeOfRecordLit(ctx, expr);
        case 'UnionType': {
            const duplicate = firstDuplicate(expr.alternatives.map(([name]) => name));
            if (duplicate !== undefined) throw new DuplicateAlternativeError(expr, duplicate);
            for (const [name, alternativeType] of expr.alternatives) {
                ensureValueType(ctx, alternativeType, () => new InvalidFieldTypeError(expr, name, alternativeType));
            }
            return Type();
        }
        case 'UnionLit': return typeOfUnionLit(ctx, expr);
        case 'Field': {
            const recordType = typeOf(ctx, expr.record);
            if (recordType.tag !== 'RecordType') throw new NotARecordError(expr.record, recordType);
            const field = recordType.fields.find(([name]) => name === expr.name);
            if (!field) throw new MissingFieldError(expr, expr.name, recordType);
            return field[1];
        }
        case 'Builtin': return typeOfBuiltin(expr.name);
        case 'Note':
            try {
                return typeOf(ctx, expr.expr);
            } catch (e) {
                if (e instanceof TypeCheckError && e.span === undefined) e.span = expr.span;
                throw e;
            }
        case 'Import': throw new UnresolvedImportError(expr);
        default: {
            const exhaustiveCheck: never = expr;
            throw new Error(`typeOf: Unhandled expression: ${JSON.stringify(exhaustiveCheck)}`);
        }
    }
}

/**
 * Infers the type of an expression.
 * @returns The normalized type, or the first type error encountered.
 */
export function infer(ctx: Context, expr: Expr): Result<Expr, TypeCheckError> {
    try {
        const type = typeOf(ctx, expr);
        consoleLog(`infer: ${printExpr(expr)} : ${printExpr(type)}`);
        return Ok(type);
    } catch (e) {
        if (e instanceof TypeCheckError) return Err(e);
        throw e;
    }
}

/** Checks `expr` against `expected`, which must itself be well-typed. */
export function check(ctx: Context, expr: Expr, expected: Expr): Result<void, TypeCheckError> {
    try {
        checkAnnotation(ctx, expected);
        expectType(ctx, expr, expected);
        return Ok(undefined);
    } catch (e) {
        if (e instanceof TypeCheckError) return Err(e);
        throw e;
    }
}
