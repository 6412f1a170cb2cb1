/**
 * @file types.ts
 * @description Defines the core data structures of the strata language:
 * expressions, import targets, source spans, typing contexts and results.
 */

export type Sort = 'Type' | 'Kind';

export type BuiltinName =
    | 'Bool' | 'Natural' | 'Integer' | 'Double' | 'Text' | 'List' | 'Optional'
    | 'Natural/fold' | 'Natural/build' | 'Natural/isZero' | 'Natural/even' | 'Natural/odd';

export type Operator = '&&' | '||' | '==' | '!=' | '+' | '*' | '++';

export interface SourcePosition { offset: number, line: number, column: number }

export interface Span {
    origin: string;
    start: SourcePosition;
    end: SourcePosition;
}

/** Import target as written in the source, before canonicalization. */
export type ImportTarget =
    | { kind: 'path', path: string }
    | { kind: 'env', name: string }
    | { kind: 'url', url: string };

export type Expr =
    | { tag: 'Const', sort: Sort }
    // `x@n` refers to the n-th enclosing binder named `x`
    | { tag: 'Var', name: string, index: number }
    | { tag: 'Lam', name: string, domain: Expr, body: Expr }
    | { tag: 'Pi', name: string, domain: Expr, codomain: Expr }
    | { tag: 'App', func: Expr, arg: Expr }
    | { tag: 'Let', name: string, annotation?: Expr, value: Expr, body: Expr }
    | { tag: 'Annot', expr: Expr, type: Expr }
    | { tag: 'BoolLit', value: boolean }
    | { tag: 'NaturalLit', value: bigint }
    | { tag: 'IntegerLit', value: bigint }
    | { tag: 'DoubleLit', value: number }
    | { tag: 'TextLit', value: string }
    | { tag: 'BoolIf', cond: Expr, thenBranch: Expr, elseBranch: Expr }
    | { tag: 'BinOp', op: Operator, left: Expr, right: Expr }
    | { tag: 'ListLit', type?: Expr, elements: Expr[] }
    | { tag: 'OptionalLit', type: Expr, elements: Expr[] }
    | { tag: 'RecordType', fields: Array<[string, Expr]> }
    | { tag: 'RecordLit', fields: Array<[string, Expr]> }
    | { tag: 'UnionType', alternatives: Array<[string, Expr]> }
    // `alternatives` lists the types of the alternatives that were not selected
    | { tag: 'UnionLit', label: string, value: Expr, alternatives: Array<[string, Expr]> }
    | { tag: 'Field', record: Expr, name: string }
    | { tag: 'Builtin', name: BuiltinName }
    | { tag: 'Note', span: Span, expr: Expr }
    | { tag: 'Import', target: ImportTarget, expectedType?: Expr };

export type ExprOf<T extends Expr['tag']> = Extract<Expr, { tag: T }>;

/** A variable reference used as a shift cutoff or substitution target. */
export interface VarRef { name: string, index: number }

// Expression Constructors

export const Type = (): ExprOf<'Const'> => ({ tag: 'Const', sort: 'Type' });
export const Kind = (): ExprOf<'Const'> => ({ tag: 'Const', sort: 'Kind' });
export const Var = (name: string, index: number = 0): ExprOf<'Var'> => ({ tag: 'Var', name, index });
export const Lam = (name: string, domain: Expr, body: Expr): ExprOf<'Lam'> => ({ tag: 'Lam', name, domain, body });
export const Pi = (name: string, domain: Expr, codomain: Expr): ExprOf<'Pi'> => ({ tag: 'Pi', name, domain, codomain });
/** Non-dependent function type `A → B`. */
export const Arrow = (domain: Expr, codomain: Expr): ExprOf<'Pi'> => Pi('_', domain, codomain);
export const App = (func: Expr, arg: Expr): ExprOf<'App'> => ({ tag: 'App', func, arg });

/** Left-nested application of `func` to every argument in turn. */
export const Apps = (func: Expr, ...args: Expr[]): Expr => args.reduce<Expr>((acc, arg) => App(acc, arg), func);

export function Let(name: string, value: Expr, body: Expr): ExprOf<'Let'>;
export function Let(name: string, annotation: Expr, value: Expr, body: Expr): ExprOf<'Let'>;
export function Let(name: string, second: Expr, third: Expr, fourth?: Expr): ExprOf<'Let'> {
    if (fourth === undefined) return { tag: 'Let', name, value: second, body: third };
    return { tag: 'Let', name, annotation: second, value: third, body: fourth };
}

export const Annot = (expr: Expr, type: Expr): ExprOf<'Annot'> => ({ tag: 'Annot', expr, type });
export const BoolLit = (value: boolean): ExprOf<'BoolLit'> => ({ tag: 'BoolLit', value });
export const NaturalLit = (value: bigint | number): ExprOf<'NaturalLit'> => {
    const n = BigInt(value);
    if (n < 0n) throw new RangeError(`Natural literal cannot be negative: ${n}`);
    return { tag: 'NaturalLit', value: n };
};
export const IntegerLit = (value: bigint | number): ExprOf<'IntegerLit'> => ({ tag: 'IntegerLit', value: BigInt(value) });
export const DoubleLit = (value: number): ExprOf<'DoubleLit'> => ({ tag: 'DoubleLit', value });
export const TextLit = (value: string): ExprOf<'TextLit'> => ({ tag: 'TextLit', value });
export const BoolIf = (cond: Expr, thenBranch: Expr, elseBranch: Expr): ExprOf<'BoolIf'> =>
    ({ tag: 'BoolIf', cond, thenBranch, elseBranch });
export const BinOp = (op: Operator, left: Expr, right: Expr): ExprOf<'BinOp'> => ({ tag: 'BinOp', op, left, right });
export const ListLit = (type: Expr | undefined, elements: Expr[]): ExprOf<'ListLit'> =>
    type === undefined ? { tag: 'ListLit', elements } : { tag: 'ListLit', type, elements };
export const OptionalLit = (type: Expr, elements: Expr[]): ExprOf<'OptionalLit'> => ({ tag: 'OptionalLit', type, elements });
export const RecordType = (fields: Array<[string, Expr]>): ExprOf<'RecordType'> => ({ tag: 'RecordType', fields });
export const RecordLit = (fields: Array<[string, Expr]>): ExprOf<'RecordLit'> => ({ tag: 'RecordLit', fields });
export const UnionType = (alternatives: Array<[string, Expr]>): ExprOf<'UnionType'> => ({ tag: 'UnionType', alternatives });
export const UnionLit = (label: string, value: Expr, alternatives: Array<[string, Expr]>): ExprOf<'UnionLit'> =>
    ({ tag: 'UnionLit', label, value, alternatives });
export const Field = (record: Expr, name: string): ExprOf<'Field'> => ({ tag: 'Field', record, name });
export const Builtin = (name: BuiltinName): ExprOf<'Builtin'> => ({ tag: 'Builtin', name });
export const Note = (span: Span, expr: Expr): ExprOf<'Note'> => ({ tag: 'Note', span, expr });
export const Import = (target: ImportTarget, expectedType?: Expr): ExprOf<'Import'> =>
    expectedType === undefined ? { tag: 'Import', target } : { tag: 'Import', target, expectedType };

// Frequently used built-in types
export const Bool = (): ExprOf<'Builtin'> => Builtin('Bool');
export const Natural = (): ExprOf<'Builtin'> => Builtin('Natural');
export const Integer = (): ExprOf<'Builtin'> => Builtin('Integer');
export const Double = (): ExprOf<'Builtin'> => Builtin('Double');
export const Text = (): ExprOf<'Builtin'> => Builtin('Text');
export const List = (elementType: Expr): ExprOf<'App'> => App(Builtin('List'), elementType);
export const Optional = (elementType: Expr): ExprOf<'App'> => App(Builtin('Optional'), elementType);

// Typing Context
export type Binding = {
    name: string;
    type: Expr;
};
/** Innermost binding first. */
export type Context = readonly Binding[];

// Results
export type Result<T, E> =
    | { ok: true, value: T }
    | { ok: false, error: E };

export const Ok = <T>(value: T): { ok: true, value: T } => ({ ok: true, value });
export const Err = <E>(error: E): { ok: false, error: E } => ({ ok: false, error });
