/**
 * @file state.ts
 * @description Global flags, verbose logging, typing context utilities and
 * expression printing.
 */

import { Expr, Context, Binding, Operator, ImportTarget } from './types';
import { shift, occursFree } from './substitution';

// Global Flags
const flags = {
    verbose: false,
    asciiOutput: false,
};

export type FlagName = keyof typeof flags;

export function setFlag(name: FlagName, value: boolean) {
    if (name in flags) {
        flags[name] = value;
    } else {
        console.warn(`Attempted to set unknown flag: ${name}`);
    }
}

export function getFlag(name: FlagName): boolean {
    return flags[name] ?? false;
}

export function resetFlags() {
    flags.verbose = false;
    flags.asciiOutput = false;
}

export function consoleLog(message?: unknown, ...optionalParams: unknown[]): void {
    if (flags.verbose) {
        console.log("[VERBOSE]", message, ...optionalParams);
    }
}

// Context Manipulation
export const emptyCtx: Context = [];

/**
 * Extends a context with a new binding. Every type already in the context,
 * and the new one, is shifted so that it keeps pointing at the same binders
 * once `name@0` refers to the new entry.
 * @param ctx The context to extend.
 * @param name The bound name.
 * @param type The type of the bound variable, relative to `ctx`.
 * @returns The new, extended context.
 */
export const extendCtx = (ctx: Context, name: string, type: Expr): Context => {
    const cutoff = { name, index: 0 };
    return [{ name, type }, ...ctx].map(b => ({ name: b.name, type: shift(b.type, 1, cutoff) }));
};

/**
 * Looks up `name@index` in the context, skipping `index` bindings of the same name.
 * @returns The binding if found, otherwise undefined.
 */
export const lookupCtx = (ctx: Context, name: string, index: number = 0): Binding | undefined => {
    let remaining = index;
    for (const binding of ctx) {
        if (binding.name !== name) continue;
        if (remaining === 0) return binding;
        remaining--;
    }
    return undefined;
};

// Expression Printing

const OPERATOR_PRECEDENCE: Record<Operator, number> = {
    '||': 1, '+': 2, '++': 3, '&&': 4, '*': 5, '==': 6, '!=': 7,
};
const APP_PRECEDENCE = 8;
const ATOM_PRECEDENCE = 9;

function precedence(expr: Expr): number {
    switch (expr.tag) {
        case 'Lam': case 'Pi': case 'Let': case 'BoolIf': case 'Annot': case 'OptionalLit':
            return 0;
        case 'ListLit': return expr.type === undefined ? ATOM_PRECEDENCE : 0;
        case 'BinOp': return OPERATOR_PRECEDENCE[expr.op];
        case 'App': return APP_PRECEDENCE;
        case 'Note': return precedence(expr.expr);
        default: return ATOM_PRECEDENCE;
    }
}

function printDouble(value: number): string {
    if (Number.isInteger(value) && Math.abs(value) < 1e21) return value.toFixed(1);
    return String(value);
}

function printLabel(label: string): string {
    return /^[A-Za-z_][A-Za-z0-9_\-]*$/.test(label) ? label : `\`${label}\``;
}

/**
 * Pretty-prints an expression in surface syntax. Unicode symbols are used
 * unless the `asciiOutput` flag is set.
 * @param expr The expression to print.
 * @param minPrecedence Parenthesize the result when it binds more loosely than this.
 */
export function printExpr(expr: Expr, minPrecedence: number = 0): string {
    const ascii = getFlag('asciiOutput');
    const lambda = ascii ? '\\' : 'λ';
    const arrow = ascii ? '->' : '→';
    const forall = ascii ? 'forall ' : '∀';
    const p = (e: Expr, min: number) => printExpr(e, min);

    const render = (): string => {
        switch (expr.tag) {
            case 'Const': return expr.sort;
            case 'Var': return expr.index === 0 ? expr.name : `${expr.name}@${expr.index}`;
            case 'Lam': return `${lambda}(${expr.name} : ${p(expr.domain, 0)}) ${arrow} ${p(expr.body, 0)}`;
            case 'Pi':
                if (expr.name === '_' && !occursFree(expr.codomain, { name: '_', index: 0 })) {
                    return `${p(expr.domain, 1)} ${arrow} ${p(expr.codomain, 0)}`;
                }
                return `${forall}(${expr.name} : ${p(expr.domain, 0)}) ${arrow} ${p(expr.codomain, 0)}`;
            case 'App': return `${p(expr.func, APP_PRECEDENCE)} ${p(expr.arg, ATOM_PRECEDENCE)}`;
            case 'Let': {
                const annotation = expr.annotation ? ` : ${p(expr.annotation, 0)}` : '';
                return `let ${expr.name}${annotation} = ${p(expr.value, 0)} in ${p(expr.body, 0)}`;
            }
            case 'Annot': return `${p(expr.expr, 1)} : ${p(expr.type, 0)}`;
            case 'BoolLit': return expr.value ? 'True' : 'False';
            case 'NaturalLit': return `+${expr.value}`;
            case 'IntegerLit': return `${expr.value}`;
            case 'DoubleLit': return printDouble(expr.value);
            case 'TextLit': return JSON.stringify(expr.value);
            case 'BoolIf':
                return `if ${p(expr.cond, 0)} then ${p(expr.thenBranch, 0)} else ${p(expr.elseBranch, 0)}`;
            case 'BinOp': {
                const prec = OPERATOR_PRECEDENCE[expr.op];
                return `${p(expr.left, prec)} ${expr.op} ${p(expr.right, prec + 1)}`;
            }
            case 'ListLit': {
                const body = `[${expr.elements.map(e => p(e, 0)).join(', ')}]`;
                return expr.type === undefined ? body : `${body} : List ${p(expr.type, ATOM_PRECEDENCE)}`;
            }
            case 'OptionalLit':
                return `[${expr.elements.map(e => p(e, 0)).join(', ')}] : Optional ${p(expr.type, ATOM_PRECEDENCE)}`;
            case 'RecordType':
                if (expr.fields.length === 0) return '{}';
                return `{ ${expr.fields.map(([k, v]) => `${printLabel(k)} : ${p(v, 0)}`).join(', ')} }`;
            case 'RecordLit':
                if (expr.fields.length === 0) return '{=}';
                return `{ ${expr.fields.map(([k, v]) => `${printLabel(k)} = ${p(v, 0)}`).join(', ')} }`;
            case 'UnionType':
                if (expr.alternatives.length === 0) return '<>';
                return `< ${expr.alternatives.map(([k, v]) => `${printLabel(k)} : ${p(v, 0)}`).join(' | ')} >`;
            case 'UnionLit': {
                const selected = `${printLabel(expr.label)} = ${p(expr.value, 0)}`;
                const others = expr.alternatives.map(([k, v]) => ` | ${printLabel(k)} : ${p(v, 0)}`).join('');
                return `< ${selected}${others} >`;
            }
            case 'Field': return `${p(expr.record, ATOM_PRECEDENCE)}.${printLabel(expr.name)}`;
            case 'Builtin': return expr.name;
            case 'Note': return p(expr.expr, minPrecedence);
            case 'Import': return printImportTarget(expr.target);
            default: {
                const exhaustiveCheck: never = expr;
                throw new Error(`printExpr: Unhandled expression: ${JSON.stringify(exhaustiveCheck)}`);
            }
        }
    };

    const text = render();
    if (expr.tag === 'Note') return text;
    return precedence(expr) < minPrecedence ? `(${text})` : text;
}

export function printImportTarget(target: ImportTarget): string {
    switch (target.kind) {
        case 'path': return target.path;
        case 'env': return `env:${target.name}`;
        case 'url': return target.url;
    }
}
