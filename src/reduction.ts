/**
 * @file reduction.ts
 * @description Reduction of import-free expressions to normal form.
 *
 * Reduction happens under binders, so a lambda's body is evaluated before the
 * lambda is ever applied. `Natural/fold +n` reduces to the Church numeral of
 * `n`, so every way of reaching it ends in the same normal form.
 */

import {
    Expr, ExprOf, App, Apps, Lam, Arrow, BinOp, BoolIf, BoolLit, NaturalLit, TextLit,
    ListLit, OptionalLit, Field, Natural, Type, Var
} from './types';
import { instantiate, mapChildren } from './substitution';
import { alphaEquivalent } from './equality';
import { UnresolvedImportError } from './errors';

const isBool = (e: Expr, value: boolean): boolean => e.tag === 'BoolLit' && e.value === value;
const isNatural = (e: Expr, value: bigint): boolean => e.tag === 'NaturalLit' && e.value === value;
const isBuiltin = (e: Expr, name: ExprOf<'Builtin'>['name']): boolean => e.tag === 'Builtin' && e.name === name;

/** `λ(x : Natural) → x + +1`, the successor handed to `Natural/build`'s argument. */
const naturalSucc = (): Expr => Lam('x', Natural(), BinOp('+', Var('x'), NaturalLit(1)));

/** Strips annotations and notes, which never change what an expression reduces to. */
function unwrap(expr: Expr): Expr {
    let current = expr;
    while (current.tag === 'Note' || current.tag === 'Annot') current = current.expr;
    return current;
}

/**
 * If `expr` is syntactically `g x` where `g` normalizes to the built-in
 * `name`, returns `x`. Used to apply fusion laws before the argument is
 * reduced, so that `Natural/build f` is not first evaluated to a literal.
 */
function appliedBuiltinArg(expr: Expr, name: ExprOf<'Builtin'>['name']): Expr | undefined {
    const current = unwrap(expr);
    if (current.tag !== 'App') return undefined;
    return isBuiltin(normalize(current.func), name) ? current.arg : undefined;
}

function normalizeBinOp(expr: ExprOf<'BinOp'>): Expr {
    const l = normalize(expr.left);
    const r = normalize(expr.right);
    switch (expr.op) {
        case '&&':
            if (l.tag === 'BoolLit') return l.value ? r : l;
            if (r.tag === 'BoolLit') return r.value ? l : r;
            if (alphaEquivalent(l, r)) return l;
            break;
        case '||':
            if (l.tag === 'BoolLit') return l.value ? l : r;
            if (r.tag === 'BoolLit') return r.value ? r : l;
            if (alphaEquivalent(l, r)) return l;
            break;
        case '==':
            if (l.tag === 'BoolLit' && r.tag === 'BoolLit') return BoolLit(l.value === r.value);
            if (isBool(l, true)) return r;
            if (isBool(r, true)) return l;
            if (alphaEquivalent(l, r)) return BoolLit(true);
            break;
        case '!=':
            if (l.tag === 'BoolLit' && r.tag === 'BoolLit') return BoolLit(l.value !== r.value);
            if (isBool(l, false)) return r;
            if (isBool(r, false)) return l;
            if (alphaEquivalent(l, r)) return BoolLit(false);
            break;
        case '+':
            if (l.tag === 'NaturalLit' && r.tag === 'NaturalLit') return NaturalLit(l.value + r.value);
            if (isNatural(l, 0n)) return r;
            if (isNatural(r, 0n)) return l;
            break;
        case '*':
            if (l.tag === 'NaturalLit' && r.tag === 'NaturalLit') return NaturalLit(l.value * r.value);
            if (isNatural(l, 0n) || isNatural(r, 0n)) return NaturalLit(0);
            if (isNatural(l, 1n)) return r;
            if (isNatural(r, 1n)) return l;
            break;
        case '++':
            if (l.tag === 'TextLit' && r.tag === 'TextLit') return TextLit(l.value + r.value);
            if (l.tag === 'TextLit' && l.value === '') return r;
            if (r.tag === 'TextLit' && r.value === '') return l;
            break;
    }
    return BinOp(expr.op, l, r);
}

/**
 * The Church numeral of `count`, which `Natural/fold +count` reduces to:
 * `λ(natural : Type) → λ(succ : natural → natural) → λ(zero : natural) → succ (… zero)`
 */
function churchNumeral(count: bigint): Expr {
    let body: Expr = Var('zero');
    for (let i = 0n; i < count; i++) body = App(Var('succ'), body);
    return Lam('natural', Type(),
        Lam('succ', Arrow(Var('natural'), Var('natural')),
            Lam('zero', Var('natural'), body)));
}

/**
 * Unfolds `Natural/fold +n t succ zero` into `succ (succ (… zero))`, one
 * normalized step at a time.
 */
function unfoldNatural(count: bigint, succ: Expr, zero: Expr): Expr {
    let acc = normalize(zero);
    for (let i = 0n; i < count; i++) {
        acc = normalize(App(succ, acc));
    }
    return acc;
}

/**
 * Matches a fully applied `Natural/fold +n t succ zero`, whose result is the
 * same as beta-reducing the numeral but is computed without deep recursion.
 */
function foldOverLiteral(expr: ExprOf<'App'>): { count: bigint, succ: Expr, zero: Expr } | undefined {
    const withSucc = unwrap(expr.func);
    if (withSucc.tag !== 'App') return undefined;
    const withType = unwrap(withSucc.func);
    if (withType.tag !== 'App') return undefined;
    const withCount = unwrap(withType.func);
    if (withCount.tag !== 'App' || !isBuiltin(normalize(withCount.func), 'Natural/fold')) return undefined;
    const count = normalize(withCount.arg);
    if (count.tag !== 'NaturalLit') return undefined;
    return { count: count.value, succ: normalize(withSucc.arg), zero: expr.arg };
}

function normalizeApp(expr: ExprOf<'App'>): Expr {
    const unfolded = foldOverLiteral(expr);
    if (unfolded !== undefined) return unfoldNatural(unfolded.count, unfolded.succ, unfolded.zero);

    const func = normalize(expr.func);

    if (func.tag === 'Lam') {
        return normalize(instantiate(func.body, func.name, normalize(expr.arg)));
    }

    // Fusion: Natural/fold (Natural/build f) = f
    if (isBuiltin(func, 'Natural/fold')) {
        const built = appliedBuiltinArg(expr.arg, 'Natural/build');
        if (built !== undefined) return normalize(built);
    }
    // Fusion: Natural/build (Natural/fold x) = x
    if (isBuiltin(func, 'Natural/build')) {
        const folded = appliedBuiltinArg(expr.arg, 'Natural/fold');
        if (folded !== undefined) return normalize(folded);
    }

    const arg = normalize(expr.arg);

    if (func.tag === 'Builtin') {
        switch (func.name) {
            case 'Natural/fold':
                if (arg.tag === 'App' && isBuiltin(arg.func, 'Natural/build')) return arg.arg;
                if (arg.tag === 'NaturalLit') return churchNumeral(arg.value);
                break;
            case 'Natural/build': {
                if (arg.tag === 'App' && isBuiltin(arg.func, 'Natural/fold')) return arg.arg;
                const applied = normalize(Apps(arg, Natural(), naturalSucc(), NaturalLit(0)));
                if (applied.tag === 'NaturalLit') return applied;
                break;
            }
            case 'Natural/isZero':
                if (arg.tag === 'NaturalLit') return BoolLit(arg.value === 0n);
                break;
            case 'Natural/even':
                if (arg.tag === 'NaturalLit') return BoolLit(arg.value % 2n === 0n);
                break;
            case 'Natural/odd':
                if (arg.tag === 'NaturalLit') return BoolLit(arg.value % 2n === 1n);
                break;
        }
    }

    return App(func, arg);
}

/**
 * Reduces an import-free expression to its normal form. The result contains
 * no notes, annotations, `let`s or reducible applications, and
 * `normalize(normalize(e))` is `normalize(e)`.
 * @throws UnresolvedImportError if an import node is reached.
 */
export function normalize(expr: Expr): Expr {
    switch (expr.tag) {
        case 'Const': case 'Var': case 'BoolLit': case 'NaturalLit': case 'IntegerLit':
        case 'DoubleLit': case 'TextLit': case 'Builtin':
            return expr;
        case 'Note': return normalize(expr.expr);
        case 'Annot': return normalize(expr.expr);
        case 'Import': throw new UnresolvedImportError(expr);
        case 'Let': return normalize(instantiate(expr.body, expr.name, expr.value));
        case 'Lam': return { tag: 'Lam', name: expr.name, domain: normalize(expr.domain), body: normalize(expr.body) };
        case 'Pi': return { tag: 'Pi', name: expr.name, domain: normalize(expr.domain), codomain: normalize(expr.codomain) };
        case 'App': return normalizeApp(expr);
        case 'BinOp': return normalizeBinOp(expr);
        case 'BoolIf': {
            const cond = normalize(expr.cond);
            const thenBranch = normalize(expr.thenBranch);
            const elseBranch = normalize(expr.elseBranch);
            if (cond.tag === 'BoolLit') return cond.value ? thenBranch : elseBranch;
            if (isBool(thenBranch, true) && isBool(elseBranch, false)) return cond;
            if (alphaEquivalent(thenBranch, elseBranch)) return thenBranch;
            return BoolIf(cond, thenBranch, elseBranch);
        }
        case 'ListLit':
            return ListLit(expr.type === undefined ? undefined : normalize(expr.type), expr.elements.map(normalize));
        case 'OptionalLit': return OptionalLit(normalize(expr.type), expr.elements.map(normalize));
        case 'RecordType': return { tag: 'RecordType', fields: expr.fields.map(([k, v]) => [k, normalize(v)]) };
        case 'RecordLit': return { tag: 'RecordLit', fields: expr.fields.map(([k, v]) => [k, normalize(v)]) };
        case 'UnionType': return { tag: 'UnionType', alternatives: expr.alternatives.map(([k, v]) => [k, normalize(v)]) };
        case 'UnionLit':
            return {
                tag: 'UnionLit',
                label: expr.label,
                value: normalize(expr.value),
                alternatives: expr.alternatives.map(([k, v]) => [k, normalize(v)]),
            };
        case 'Field': {
            const record = normalize(expr.record);
            if (record.tag === 'RecordLit') {
                const field = record.fields.find(([name]) => name === expr.name);
                if (field !== undefined) return field[1];
            }
            return Field(record, expr.name);
        }
        default: {
            const exhaustiveCheck: never = expr;
            throw new Error(`normalize: Unhandled expression: ${JSON.stringify(exhaustiveCheck)}`);
        }
    }
}

/** True if the expression is already in normal form. */
export function isNormalized(expr: Expr): boolean {
    return alphaEquivalent(normalize(expr), expr) && !containsNoteOrAnnotation(expr);
}

function containsNoteOrAnnotation(expr: Expr): boolean {
    if (expr.tag === 'Note' || expr.tag === 'Annot' || expr.tag === 'Let') return true;
    let found = false;
    mapChildren(expr, child => {
        found = found || containsNoteOrAnnotation(child);
        return child;
    });
    return found;
}
