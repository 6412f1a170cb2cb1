/**
 * @file src/parser.ts
 * @description Parser for the surface syntax. Accepts both the Unicode
 * (`λ`, `∀`, `→`) and the ASCII (`\`, `forall`, `->`) spellings, and wraps
 * every node in a `Note` carrying its source span.
 */

import * as P from 'parsimmon';
import {
    Expr, Span, ImportTarget, Kind, Type, Var, Lam, Pi, Arrow, App, Let, Annot, BoolLit,
    NaturalLit, IntegerLit, DoubleLit, TextLit, BoolIf, BinOp, ListLit, OptionalLit, RecordType,
    RecordLit, UnionType, UnionLit, Field, Builtin, Note, Import, Operator
} from './types';
import { BUILTIN_NAMES, isBuiltinName } from './stdlib';
import { ParseError } from './errors';

const whitespace = P.alt(
    P.regexp(/\s+/),
    P.regexp(/--[^\n]*/),
    P.regexp(/\{-[\s\S]*?-\}/)
).many();

// Helper to create a parser that consumes trailing whitespace and comments
function token<T>(parser: P.Parser<T>): P.Parser<T> {
    return parser.skip(whitespace);
}

const symbol = (text: string) => token(P.string(text));

/** A keyword that is not the prefix of a longer identifier. */
const keyword = (word: string) => token(P.regexp(new RegExp(`${word}(?![A-Za-z0-9_])`)));

const keywords = ['let', 'in', 'if', 'then', 'else', 'forall', 'True', 'False', 'Type', 'Kind'];
const reserved = new Set<string>([...keywords, ...BUILTIN_NAMES]);

// Lowest precedence first
const OPERATORS: Operator[] = ['||', '+', '++', '&&', '*', '==', '!='];

const operatorToken = (op: Operator) =>
    // `+1` is a natural literal and `++` is text append
    op === '+' ? token(P.regexp(/\+(?![+0-9])/)) : symbol(op);

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\\/]/g, '\\$&');

const builtinPattern = new RegExp(
    `(?:${[...BUILTIN_NAMES].sort((a, b) => b.length - a.length).map(escapeRegExp).join('|')})(?![A-Za-z0-9_/])`
);

const pathCharacters = '[^\\s()\\[\\]{}<>,]+';

type UnionEntryBody = { kind: 'type', type: Expr } | { kind: 'value', value: Expr };
type UnionEntry = UnionEntryBody & { label: string };

interface Grammar {
    Expr: Expr;
    Lambda: Expr;
    Forall: Expr;
    Let: Expr;
    If: Expr;
    Annotated: Expr;
    Arrow: Expr;
    Operator: Expr;
    Application: Expr;
    Selector: Expr;
    Atom: Expr;
    Parens: Expr;
    Literal: Expr;
    Text: Expr;
    Builtin: Expr;
    Import: Expr;
    List: Expr;
    Record: Expr;
    Union: Expr;
    Var: Expr;
    Identifier: string;
    Label: string;
    ArrowSymbol: string;
}

function stripOuterNotes(expr: Expr): Expr {
    return expr.tag === 'Note' ? stripOuterNotes(expr.expr) : expr;
}

/**
 * `[a, b] : List T` and `[a] : Optional T` are list and optional literals
 * rather than annotated expressions.
 */
function annotate(expr: Expr, type: Expr): Expr {
    const list = stripOuterNotes(expr);
    const annotation = stripOuterNotes(type);
    if (list.tag === 'ListLit' && list.type === undefined && annotation.tag === 'App') {
        const head = stripOuterNotes(annotation.func);
        if (head.tag === 'Builtin' && head.name === 'List') return ListLit(annotation.arg, list.elements);
        if (head.tag === 'Builtin' && head.name === 'Optional') return OptionalLit(annotation.arg, list.elements);
    }
    return Annot(expr, type);
}

function parseText(raw: string): P.Parser<Expr> {
    try {
        const value: unknown = JSON.parse(raw);
        return typeof value === 'string' ? P.succeed(TextLit(value)) : P.fail('text literal');
    } catch {
        return P.fail('valid escape sequence');
    }
}

function buildUnion(entries: UnionEntry[]): P.Parser<Expr> {
    const values = entries.filter(e => e.kind === 'value');
    const types: Array<[string, Expr]> = [];
    for (const entry of entries) {
        if (entry.kind === 'type') types.push([entry.label, entry.type]);
    }
    if (values.length === 0) return P.succeed(UnionType(types));
    const selected = values[0];
    if (values.length > 1 || selected.kind !== 'value') return P.fail('at most one selected alternative');
    return P.succeed(UnionLit(selected.label, selected.value, types));
}

function buildParser(origin: string) {
    const withSpan = (parser: P.Parser<Expr>): P.Parser<Expr> =>
        parser.mark().map(({ start, end, value }) => {
            if (value.tag === 'Note') return value;
            const span: Span = { origin, start, end };
            return Note(span, value);
        });

    const lang = P.createLanguage<Grammar>({
        Expr: r => P.alt(r.Lambda, r.Forall, r.Let, r.If, r.Annotated),

        Lambda: r => withSpan(P.seqMap(
            token(P.alt(P.string('λ'), P.string('\\'))).then(symbol('(')).then(r.Identifier),
            symbol(':').then(r.Expr).skip(symbol(')')),
            r.ArrowSymbol.then(r.Expr),
            (name, domain, body) => Lam(name, domain, body)
        )),

        Forall: r => withSpan(P.seqMap(
            P.alt(symbol('∀'), keyword('forall')).then(symbol('(')).then(r.Identifier),
            symbol(':').then(r.Expr).skip(symbol(')')),
            r.ArrowSymbol.then(r.Expr),
            (name, domain, codomain) => Pi(name, domain, codomain)
        )),

        Let: r => withSpan(P.seqMap(
            keyword('let').then(r.Identifier),
            symbol(':').then(r.Expr).fallback(undefined),
            symbol('=').then(r.Expr),
            keyword('in').then(r.Expr),
            (name, annotation, value, body) =>
                annotation === undefined ? Let(name, value, body) : Let(name, annotation, value, body)
        )),

        If: r => withSpan(P.seqMap(
            keyword('if').then(r.Expr),
            keyword('then').then(r.Expr),
            keyword('else').then(r.Expr),
            (cond, thenBranch, elseBranch) => BoolIf(cond, thenBranch, elseBranch)
        )),

        Annotated: r => withSpan(P.seqMap(
            r.Arrow,
            symbol(':').then(r.Expr).fallback(undefined),
            (expr, type) => type === undefined ? expr : annotate(expr, type)
        )),

        Arrow: r => withSpan(P.seqMap(
            r.Operator,
            r.ArrowSymbol.then(r.Expr).fallback(undefined),
            (domain, codomain) => codomain === undefined ? domain : Arrow(domain, codomain)
        )),

        Operator: r => OPERATORS.reduceRight<P.Parser<Expr>>(
            (operand, op) => withSpan(P.seqMap(
                operand,
                operatorToken(op).then(operand).many(),
                (head, rest) => rest.reduce<Expr>((left, right) => BinOp(op, left, right), head)
            )),
            r.Application
        ),

        Application: r => withSpan(P.seqMap(
            r.Selector,
            r.Selector.many(),
            (func, args) => args.reduce<Expr>((acc, arg) => App(acc, arg), func)
        )),

        Selector: r => withSpan(P.seqMap(
            r.Atom,
            symbol('.').then(r.Label).many(),
            (record, names) => names.reduce<Expr>((acc, name) => Field(acc, name), record)
        )),

        Atom: r => withSpan(P.alt(
            r.Parens, r.Literal, r.Text, r.Builtin, r.Import, r.List, r.Record, r.Union, r.Var
        )),

        Parens: r => r.Expr.wrap(symbol('('), symbol(')')),

        Literal: () => P.alt<Expr>(
            token(P.regexp(/\+(\d+)/, 1)).map(digits => NaturalLit(BigInt(digits))),
            token(P.regexp(/-?\d+\.\d+(?:[eE][+-]?\d+)?/)).map(digits => DoubleLit(Number(digits))),
            token(P.regexp(/-?\d+/)).map(digits => IntegerLit(BigInt(digits))),
            keyword('True').map(() => BoolLit(true)),
            keyword('False').map(() => BoolLit(false)),
            keyword('Type').map(() => Type()),
            keyword('Kind').map(() => Kind())
        ),

        Text: () => token(P.regexp(/"(?:[^"\\]|\\.)*"/)).chain(parseText),

        Builtin: () => token(P.regexp(builtinPattern)).chain(name =>
            isBuiltinName(name) ? P.succeed(Builtin(name)) : P.fail('built-in')),

        Import: () => token(P.alt<ImportTarget>(
            P.regexp(new RegExp(`https?://${pathCharacters}`)).map<ImportTarget>(url => ({ kind: 'url', url })),
            P.regexp(/env:([A-Za-z_][A-Za-z0-9_]*)/, 1).map<ImportTarget>(name => ({ kind: 'env', name })),
            P.regexp(new RegExp(`(?:\\.\\./|\\./|~/|/)${pathCharacters}`)).map<ImportTarget>(path => ({ kind: 'path', path }))
        )).map(target => Import(target)),

        List: r => r.Expr.sepBy(symbol(',')).wrap(symbol('['), symbol(']')).map(elements => ListLit(undefined, elements)),

        Record: r => P.alt<Expr>(
            symbol('{').then(symbol('=')).skip(symbol('}')).map(() => RecordLit([])),
            P.seq(r.Label.skip(symbol(':')), r.Expr).sepBy1(symbol(',')).wrap(symbol('{'), symbol('}')).map(RecordType),
            P.seq(r.Label.skip(symbol('=')), r.Expr).sepBy1(symbol(',')).wrap(symbol('{'), symbol('}')).map(RecordLit),
            symbol('{').then(symbol('}')).map(() => RecordType([]))
        ),

        Union: r => P.seqMap(
            r.Label,
            P.alt<UnionEntryBody>(
                symbol(':').then(r.Expr).map(type => ({ kind: 'type', type })),
                symbol('=').then(r.Expr).map(value => ({ kind: 'value', value }))
            ),
            (label, entry): UnionEntry => ({ label, ...entry })
        ).sepBy(symbol('|')).wrap(symbol('<'), symbol('>')).chain(buildUnion),

        Var: r => P.seqMap(
            r.Identifier,
            token(P.regexp(/@(\d+)/, 1)).map(Number).fallback(0),
            (name, index) => Var(name, index)
        ),

        Identifier: () => token(P.regexp(/[A-Za-z_][A-Za-z0-9_]*/))
            .assert(name => !reserved.has(name), 'identifier'),

        Label: () => P.alt(
            token(P.regexp(/`([^`]+)`/, 1)),
            token(P.regexp(/[A-Za-z_][A-Za-z0-9_]*/))
        ),

        ArrowSymbol: () => P.alt(symbol('→'), symbol('->')),
    });
    return whitespace.then(lang.Expr).skip(P.eof);
}

/**
 * Parses source text into an expression whose nodes carry source spans.
 * @param source The text to parse.
 * @param origin Where the text came from, recorded in every span.
 * @throws ParseError when the text is not a valid expression.
 */
export function parseExpression(source: string, origin: string = '(input)'): Expr {
    const result = buildParser(origin).parse(source);
    if (result.status) return result.value;
    const { offset, line, column } = result.index;
    throw new ParseError(
        `Parsing failed in ${origin}: ${P.formatError(source, result)}`,
        origin, offset, line, column, result.expected
    );
}
