/**
 * @file errors.ts
 * @description The error taxonomy of the core. Every error is terminal for
 * its enclosing run; the objects keep the offending expression, the expected
 * and actual types or the import chain so that a front end can render them.
 */

import { Expr, Span } from './types';
import { printExpr } from './state';

export type ErrorCode =
    | 'PARSE_ERROR'
    | 'TYPE_ERROR'
    | 'UNRESOLVED_IMPORT'
    | 'CYCLIC_IMPORT'
    | 'IMPORT_FETCH_FAILED'
    | 'REFERENTIAL_SANITY'
    | 'CANCELLED'
    | 'IMPORT_FAILED'
    | 'DECODE_FAILED';

export class CoreError extends Error {
    constructor(message: string, public readonly code: ErrorCode) {
        super(message);
        this.name = 'CoreError';
    }
}

export class ParseError extends CoreError {
    constructor(
        message: string,
        public readonly origin: string,
        public readonly offset: number,
        public readonly line: number,
        public readonly column: number,
        public readonly expected: string[]
    ) {
        super(message, 'PARSE_ERROR');
        this.name = 'ParseError';
    }
}

// Type errors

export type TypeErrorKind =
    | 'UnboundVariable'
    | 'Untyped'
    | 'InvalidInputType'
    | 'InvalidOutputType'
    | 'NoDependentTypes'
    | 'NotAFunction'
    | 'TypeMismatch'
    | 'AnnotationMismatch'
    | 'IfBranchMismatch'
    | 'MissingListType'
    | 'InvalidOptionalLiteral'
    | 'DuplicateField'
    | 'DuplicateAlternative'
    | 'InvalidFieldType'
    | 'NotARecord'
    | 'MissingField';

export class TypeCheckError extends CoreError {
    /** Filled in by the innermost enclosing source note, when there is one. */
    public span?: Span;

    constructor(
        message: string,
        public readonly kind: TypeErrorKind,
        public readonly expr: Expr
    ) {
        super(message, 'TYPE_ERROR');
        this.name = 'TypeCheckError';
    }
}

export class UnboundVariableError extends TypeCheckError {
    constructor(expr: Extract<Expr, { tag: 'Var' }>) {
        super(`Unbound variable: ${printExpr(expr)}`, 'UnboundVariable', expr);
        this.name = 'UnboundVariableError';
    }
}

export class UntypedError extends TypeCheckError {
    constructor(expr: Expr) {
        super(`${printExpr(expr)} has no type`, 'Untyped', expr);
        this.name = 'UntypedError';
    }
}

export class InvalidInputTypeError extends TypeCheckError {
    constructor(expr: Expr, public readonly inputType: Expr) {
        super(`Invalid function input type: ${printExpr(inputType)}`, 'InvalidInputType', expr);
        this.name = 'InvalidInputTypeError';
    }
}

export class InvalidOutputTypeError extends TypeCheckError {
    constructor(expr: Expr, public readonly outputType: Expr) {
        super(`Invalid function output type: ${printExpr(outputType)}`, 'InvalidOutputType', expr);
        this.name = 'InvalidOutputTypeError';
    }
}

export class NoDependentTypesError extends TypeCheckError {
    constructor(expr: Expr) {
        super(`No dependent types: ${printExpr(expr)}`, 'NoDependentTypes', expr);
        this.name = 'NoDependentTypesError';
    }
}

export class NotAFunctionError extends TypeCheckError {
    constructor(expr: Expr, public readonly actual: Expr) {
        super(`Not a function: ${printExpr(expr)} has type ${printExpr(actual)}`, 'NotAFunction', expr);
        this.name = 'NotAFunctionError';
    }
}

export class TypeMismatchError extends TypeCheckError {
    constructor(
        expr: Expr,
        public readonly expected: Expr,
        public readonly actual: Expr,
        kind: TypeErrorKind = 'TypeMismatch'
    ) {
        super(`Type mismatch: expected ${printExpr(expected)} but ${printExpr(expr)} has type ${printExpr(actual)}`, kind, expr);
        this.name = 'TypeMismatchError';
    }
}

/** `x : T` where the inferred type of `x` is not `T`. */
export class AnnotationMismatchError extends TypeMismatchError {
    constructor(expr: Expr, expected: Expr, actual: Expr) {
        super(expr, expected, actual, 'AnnotationMismatch');
        this.message = `Expression doesn't match annotation: ${printExpr(expr)} : ${printExpr(expected)}`;
        this.name = 'AnnotationMismatchError';
    }
}

export class IfBranchMismatchError extends TypeMismatchError {
    constructor(expr: Expr, thenType: Expr, elseType: Expr) {
        super(expr, thenType, elseType, 'IfBranchMismatch');
        this.message = `if branches have different types: ${printExpr(thenType)} and ${printExpr(elseType)}`;
        this.name = 'IfBranchMismatchError';
    }
}

export class MissingListTypeError extends TypeCheckError {
    constructor(expr: Expr) {
        super('Empty list literals need a type annotation', 'MissingListType', expr);
        this.name = 'MissingListTypeError';
    }
}

export class InvalidOptionalLiteralError extends TypeCheckError {
    constructor(expr: Expr, public readonly count: number) {
        super(`Optional literal with ${count} elements; at most one is allowed`, 'InvalidOptionalLiteral', expr);
        this.name = 'InvalidOptionalLiteralError';
    }
}

export class DuplicateFieldError extends TypeCheckError {
    constructor(expr: Expr, public readonly field: string) {
        super(`Duplicate field: ${field}`, 'DuplicateField', expr);
        this.name = 'DuplicateFieldError';
    }
}

export class DuplicateAlternativeError extends TypeCheckError {
    constructor(expr: Expr, public readonly alternative: string) {
        super(`Duplicate alternative: ${alternative}`, 'DuplicateAlternative', expr);
        this.name = 'DuplicateAlternativeError';
    }
}

export class InvalidFieldTypeError extends TypeCheckError {
    constructor(expr: Expr, public readonly field: string, public readonly fieldType: Expr) {
        super(`Invalid type for field ${field}: ${printExpr(fieldType)}`, 'InvalidFieldType', expr);
        this.name = 'InvalidFieldTypeError';
    }
}

export class NotARecordError extends TypeCheckError {
    constructor(expr: Expr, public readonly actual: Expr) {
        super(`Not a record: ${printExpr(expr)} has type ${printExpr(actual)}`, 'NotARecord', expr);
        this.name = 'NotARecordError';
    }
}

export class MissingFieldError extends TypeCheckError {
    constructor(expr: Expr, public readonly field: string, public readonly recordType: Expr) {
        super(`Missing field ${field} in ${printExpr(recordType)}`, 'MissingField', expr);
        this.name = 'MissingFieldError';
    }
}

// Import errors

/** An import node reached the type checker or the normalizer. */
export class UnresolvedImportError extends CoreError {
    constructor(public readonly expr: Extract<Expr, { tag: 'Import' }>) {
        super(`Unresolved import: ${printExpr(expr)}`, 'UNRESOLVED_IMPORT');
        this.name = 'UnresolvedImportError';
    }
}

export class CyclicImportError extends CoreError {
    /** Canonical keys, from the outermost import to the repeated one. */
    constructor(public readonly cycle: string[]) {
        super(`Cyclic import: ${cycle[cycle.length - 1]}`, 'CYCLIC_IMPORT');
        this.name = 'CyclicImportError';
    }
}

export class ImportFetchError extends CoreError {
    constructor(
        public readonly target: string,
        public readonly reason: string,
        public readonly chain: string[]
    ) {
        super(`Failed to fetch ${target}: ${reason}`, 'IMPORT_FETCH_FAILED');
        this.name = 'ImportFetchError';
    }
}

/** A remote source referenced a local path or an environment variable. */
export class ReferentialSanityError extends CoreError {
    constructor(public readonly parent: string, public readonly target: string) {
        super(`Remote import ${parent} cannot import ${target}`, 'REFERENTIAL_SANITY');
        this.name = 'ReferentialSanityError';
    }
}

export class CancellationError extends CoreError {
    constructor(public readonly target: string, public readonly chain: string[]) {
        super(`Import resolution cancelled before fetching ${target}`, 'CANCELLED');
        this.name = 'CancellationError';
    }
}

/** A failure inside an imported expression, with the chain that led to it. */
export class ImportError extends CoreError {
    constructor(public readonly chain: string[], public cause: CoreError) {
        super(`${chain.map((key, i) => `${'  '.repeat(i)}↳ ${key}`).join('\n')}\n\n${cause.message}`, 'IMPORT_FAILED');
        this.name = 'ImportError';
    }
}

export class DecodeError extends CoreError {
    constructor(public readonly expected: Expr, public readonly actual: Expr) {
        super(`Cannot decode ${printExpr(actual)} as ${printExpr(expected)}`, 'DECODE_FAILED');
        this.name = 'DecodeError';
    }
}
