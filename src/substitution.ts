/**
 * @file substitution.ts
 * @description Capture-avoiding shifting and substitution over named
 * de Bruijn variables (`x@n`).
 *
 * A variable `x@n` points at the n-th enclosing binder called `x`. Moving an
 * expression under a binder named `x` shifts its free `x` references by one,
 * so a substituted value can never be captured: there is nothing to rename.
 */

import { Expr, VarRef, Var } from './types';

/**
 * Rebuilds `expr` with `f` applied to every direct child. For a child that
 * lies in the scope of a binder, `boundName` is the name that binder adds.
 */
export function mapChildren(expr: Expr, f: (child: Expr, boundName?: string) => Expr): Expr {
    switch (expr.tag) {
        case 'Const': case 'Var': case 'BoolLit': case 'NaturalLit': case 'IntegerLit':
        case 'DoubleLit': case 'TextLit': case 'Builtin':
            return expr;
        case 'Lam': return { tag: 'Lam', name: expr.name, domain: f(expr.domain), body: f(expr.body, expr.name) };
        case 'Pi': return { tag: 'Pi', name: expr.name, domain: f(expr.domain), codomain: f(expr.codomain, expr.name) };
        case 'App': return { tag: 'App', func: f(expr.func), arg: f(expr.arg) };
        case 'Let': {
            const value = f(expr.value);
            const body = f(expr.body, expr.name);
            return expr.annotation === undefined
                ? { tag: 'Let', name: expr.name, value, body }
                : { tag: 'Let', name: expr.name, annotation: f(expr.annotation), value, body };
        }
        case 'Annot': return { tag: 'Annot', expr: f(expr.expr), type: f(expr.type) };
        case 'BoolIf': return { tag: 'BoolIf', cond: f(expr.cond), thenBranch: f(expr.thenBranch), elseBranch: f(expr.elseBranch) };
        case 'BinOp': return { tag: 'BinOp', op: expr.op, left: f(expr.left), right: f(expr.right) };
        case 'ListLit': {
            const elements = expr.elements.map(e => f(e));
            return expr.type === undefined ? { tag: 'ListLit', elements } : { tag: 'ListLit', type: f(expr.type), elements };
        }
        case 'OptionalLit': return { tag: 'OptionalLit', type: f(expr.type), elements: expr.elements.map(e => f(e)) };
        case 'RecordType': return { tag: 'RecordType', fields: expr.fields.map(([k, v]) => [k, f(v)]) };
        case 'RecordLit': return { tag: 'RecordLit', fields: expr.fields.map(([k, v]) => [k, f(v)]) };
        case 'UnionType': return { tag: 'UnionType', alternatives: expr.alternatives.map(([k, v]) => [k, f(v)]) };
        case 'UnionLit':
            return { tag: 'UnionLit', label: expr.label, value: f(expr.value), alternatives: expr.alternatives.map(([k, v]) => [k, f(v)]) };
        case 'Field': return { tag: 'Field', record: f(expr.record), name: expr.name };
        case 'Note': return { tag: 'Note', span: expr.span, expr: f(expr.expr) };
        case 'Import':
            return expr.expectedType === undefined
                ? expr
                : { tag: 'Import', target: expr.target, expectedType: f(expr.expectedType) };
        default: {
            const exhaustiveCheck: never = expr;
            throw new Error(`mapChildren: Unhandled expression: ${JSON.stringify(exhaustiveCheck)}`);
        }
    }
}

/**
 * Adds `amount` to the index of every free occurrence of `cutoff.name` whose
 * index is at least `cutoff.index`.
 */
export function shift(expr: Expr, amount: number, cutoff: VarRef): Expr {
    if (amount === 0) return expr;
    if (expr.tag === 'Var') {
        if (expr.name === cutoff.name && expr.index >= cutoff.index) {
            return Var(expr.name, expr.index + amount);
        }
        return expr;
    }
    return mapChildren(expr, (child, boundName) => {
        const inner = boundName === cutoff.name ? { name: cutoff.name, index: cutoff.index + 1 } : cutoff;
        return shift(child, amount, inner);
    });
}

/**
 * Replaces free occurrences of `variable` in `target` by `replacement`.
 * Under a binder the replacement is shifted past the bound name, and if that
 * name is the one being replaced the target index moves up by one.
 */
export function substitute(target: Expr, variable: VarRef, replacement: Expr): Expr {
    if (target.tag === 'Var') {
        return target.name === variable.name && target.index === variable.index ? replacement : target;
    }
    return mapChildren(target, (child, boundName) => {
        if (boundName === undefined) return substitute(child, variable, replacement);
        const innerVar = boundName === variable.name ? { name: variable.name, index: variable.index + 1 } : variable;
        const innerReplacement = shift(replacement, 1, { name: boundName, index: 0 });
        return substitute(child, innerVar, innerReplacement);
    });
}

/**
 * Instantiates the scope of a binder named `name` with `value`: the body's
 * `name@0` becomes `value` and the binder disappears.
 */
export function instantiate(body: Expr, name: string, value: Expr): Expr {
    const zero = { name, index: 0 };
    return shift(substitute(body, zero, shift(value, 1, zero)), -1, zero);
}

/** Removes every source annotation (`Note`) from an expression. */
export function denote(expr: Expr): Expr {
    if (expr.tag === 'Note') return denote(expr.expr);
    return mapChildren(expr, child => denote(child));
}

/** Returns true when `name@index` occurs free in `expr`. */
export function occursFree(expr: Expr, variable: VarRef): boolean {
    if (expr.tag === 'Var') return expr.name === variable.name && expr.index === variable.index;
    let found = false;
    mapChildren(expr, (child, boundName) => {
        if (!found) {
            const inner = boundName === variable.name ? { name: variable.name, index: variable.index + 1 } : variable;
            found = occursFree(child, inner);
        }
        return child;
    });
    return found;
}
