/**
 * @file equality.ts
 * @description Alpha-equivalence of expressions and judgmental equality
 * (alpha-equivalence of normal forms).
 */

import { Expr, ImportTarget } from './types';
import { normalize } from './reduction';

type Binders = { left: string[], right: string[] };

type ResolvedVar = { bound: number } | { free: string, index: number };

function resolveVar(scope: string[], name: string, index: number): ResolvedVar {
    let remaining = index;
    for (let i = scope.length - 1; i >= 0; i--) {
        if (scope[i] !== name) continue;
        if (remaining === 0) return { bound: i };
        remaining--;
    }
    return { free: name, index: remaining };
}

function sameImportTarget(a: ImportTarget, b: ImportTarget): boolean {
    switch (a.kind) {
        case 'path': return b.kind === 'path' && a.path === b.path;
        case 'env': return b.kind === 'env' && a.name === b.name;
        case 'url': return b.kind === 'url' && a.url === b.url;
    }
}

function under(binders: Binders, leftName: string, rightName: string): Binders {
    return { left: [...binders.left, leftName], right: [...binders.right, rightName] };
}

/** Field maps compare as sets: order does not matter. */
function sameEntries(a: Array<[string, Expr]>, b: Array<[string, Expr]>, binders: Binders): boolean {
    if (a.length !== b.length) return false;
    return a.every(([name, value]) => {
        const other = b.find(([otherName]) => otherName === name);
        return other !== undefined && alphaEq(value, other[1], binders);
    });
}

function sameList(a: Expr[], b: Expr[], binders: Binders): boolean {
    return a.length === b.length && a.every((e, i) => alphaEq(e, b[i], binders));
}

function alphaEq(t1: Expr, t2: Expr, binders: Binders): boolean {
    const e1 = t1.tag === 'Note' ? t1.expr : t1;
    const e2 = t2.tag === 'Note' ? t2.expr : t2;
    if (e1.tag === 'Note' || e2.tag === 'Note') return alphaEq(e1, e2, binders);
    if (e1.tag !== e2.tag) return false;

    switch (e1.tag) {
        case 'Const': return e1.sort === (e2 as typeof e1).sort;
        case 'Var': {
            const v2 = e2 as typeof e1;
            const r1 = resolveVar(binders.left, e1.name, e1.index);
            const r2 = resolveVar(binders.right, v2.name, v2.index);
            if ('bound' in r1) return 'bound' in r2 && r1.bound === r2.bound;
            return 'free' in r2 && r1.free === r2.free && r1.index === r2.index;
        }
        case 'Lam': {
            const lam2 = e2 as typeof e1;
            return alphaEq(e1.domain, lam2.domain, binders) &&
                   alphaEq(e1.body, lam2.body, under(binders, e1.name, lam2.name));
        }
        case 'Pi': {
            const pi2 = e2 as typeof e1;
            return alphaEq(e1.domain, pi2.domain, binders) &&
                   alphaEq(e1.codomain, pi2.codomain, under(binders, e1.name, pi2.name));
        }
        case 'App': {
            const app2 = e2 as typeof e1;
            return alphaEq(e1.func, app2.func, binders) && alphaEq(e1.arg, app2.arg, binders);
        }
        case 'Let': {
            const let2 = e2 as typeof e1;
            if ((e1.annotation === undefined) !== (let2.annotation === undefined)) return false;
            if (e1.annotation && let2.annotation && !alphaEq(e1.annotation, let2.annotation, binders)) return false;
            return alphaEq(e1.value, let2.value, binders) &&
                   alphaEq(e1.body, let2.body, under(binders, e1.name, let2.name));
        }
        case 'Annot': {
            const annot2 = e2 as typeof e1;
            return alphaEq(e1.expr, annot2.expr, binders) && alphaEq(e1.type, annot2.type, binders);
        }
        case 'BoolLit': case 'NaturalLit': case 'IntegerLit': case 'TextLit':
            return e1.value === (e2 as typeof e1).value;
        case 'DoubleLit': return Object.is(e1.value, (e2 as typeof e1).value);
        case 'BoolIf': {
            const if2 = e2 as typeof e1;
            return alphaEq(e1.cond, if2.cond, binders) &&
                   alphaEq(e1.thenBranch, if2.thenBranch, binders) &&
                   alphaEq(e1.elseBranch, if2.elseBranch, binders);
        }
        case 'BinOp': {
            const op2 = e2 as typeof e1;
            return e1.op === op2.op && alphaEq(e1.left, op2.left, binders) && alphaEq(e1.right, op2.right, binders);
        }
        case 'ListLit': {
            const list2 = e2 as typeof e1;
            if ((e1.type === undefined) !== (list2.type === undefined)) return false;
            if (e1.type && list2.type && !alphaEq(e1.type, list2.type, binders)) return false;
            return sameList(e1.elements, list2.elements, binders);
        }
        case 'OptionalLit': {
            const opt2 = e2 as typeof e1;
            return alphaEq(e1.type, opt2.type, binders) && sameList(e1.elements, opt2.elements, binders);
        }
        case 'RecordType': case 'RecordLit':
            return sameEntries(e1.fields, (e2 as typeof e1).fields, binders);
        case 'UnionType':
            return sameEntries(e1.alternatives, (e2 as typeof e1).alternatives, binders);
        case 'UnionLit': {
            const union2 = e2 as typeof e1;
            return e1.label === union2.label &&
                   alphaEq(e1.value, union2.value, binders) &&
                   sameEntries(e1.alternatives, union2.alternatives, binders);
        }
        case 'Field': {
            const field2 = e2 as typeof e1;
            return e1.name === field2.name && alphaEq(e1.record, field2.record, binders);
        }
        case 'Builtin': return e1.name === (e2 as typeof e1).name;
        case 'Import': {
            const import2 = e2 as typeof e1;
            if (!sameImportTarget(e1.target, import2.target)) return false;
            if (e1.expectedType === undefined || import2.expectedType === undefined) {
                return e1.expectedType === import2.expectedType;
            }
            return alphaEq(e1.expectedType, import2.expectedType, binders);
        }
        default: {
            const exhaustiveCheck: never = e1;
            throw new Error(`alphaEquivalent: Unhandled expression: ${JSON.stringify(exhaustiveCheck)}`);
        }
    }
}

/**
 * Checks if two expressions are equal up to consistent renaming of bound
 * variables. Source notes are ignored; no reduction is performed.
 */
export function alphaEquivalent(e1: Expr, e2: Expr): boolean {
    return alphaEq(e1, e2, { left: [], right: [] });
}

/**
 * Checks if two expressions are judgmentally equal: their normal forms are
 * alpha-equivalent. This is the only equality the type checker uses.
 */
export function areEqual(e1: Expr, e2: Expr): boolean {
    return alphaEquivalent(normalize(e1), normalize(e2));
}
