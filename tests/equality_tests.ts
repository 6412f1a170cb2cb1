/**
 * @file tests/equality_tests.ts
 * @description Tests for alpha-equivalence and judgmental equality.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { Var, Lam, Pi, Bool, Natural, NaturalLit, RecordType, UnionType, Import } from '../src/types';
import { alphaEquivalent, areEqual } from '../src/equality';
import { parseExpression } from '../src/parser';
import { parse } from './utils';

describe('Equality Tests', () => {
    describe('Alpha Equivalence', () => {
        it('identifies binders that differ only in name', () => {
            assert.ok(alphaEquivalent(Lam('x', Bool(), Var('x')), Lam('y', Bool(), Var('y'))));
            assert.ok(alphaEquivalent(
                parse('∀(a : Type) → ∀(x : a) → a'),
                parse('∀(b : Type) → ∀(y : b) → b')
            ));
        });

        it('distinguishes bound from free occurrences', () => {
            assert.ok(!alphaEquivalent(Lam('x', Bool(), Var('y')), Lam('y', Bool(), Var('y'))));
        });

        it('matches free variables that skip a same-named binder', () => {
            assert.ok(alphaEquivalent(Lam('x', Bool(), Var('x', 1)), Lam('y', Bool(), Var('x'))));
        });

        it('keeps shadowing indices apart', () => {
            assert.ok(!alphaEquivalent(
                parse('λ(x : Bool) → λ(x : Bool) → x'),
                parse('λ(x : Bool) → λ(x : Bool) → x@1')
            ));
            assert.ok(alphaEquivalent(
                parse('λ(x : Bool) → λ(x : Bool) → x@1'),
                parse('λ(a : Bool) → λ(b : Bool) → a')
            ));
        });

        it('ignores source notes', () => {
            assert.ok(alphaEquivalent(parseExpression('λ(x : Bool) → x'), Lam('z', Bool(), Var('z'))));
        });

        it('compares record and union fields regardless of order', () => {
            assert.ok(alphaEquivalent(
                RecordType([['a', Bool()], ['b', Natural()]]),
                RecordType([['b', Natural()], ['a', Bool()]])
            ));
            assert.ok(alphaEquivalent(
                UnionType([['A', Bool()], ['B', Natural()]]),
                UnionType([['B', Natural()], ['A', Bool()]])
            ));
            assert.ok(!alphaEquivalent(RecordType([['a', Bool()]]), RecordType([['b', Bool()]])));
        });

        it('compares import targets as written', () => {
            assert.ok(alphaEquivalent(Import({ kind: 'path', path: './a' }), Import({ kind: 'path', path: './a' })));
            assert.ok(!alphaEquivalent(Import({ kind: 'path', path: './a' }), Import({ kind: 'env', name: 'a' })));
        });

        it('performs no reduction', () => {
            assert.ok(!alphaEquivalent(parse('+1 + +1'), NaturalLit(2)));
        });
    });

    describe('Judgmental Equality', () => {
        it('equates expressions with the same normal form', () => {
            assert.ok(areEqual(parse('+1 + +1'), NaturalLit(2)));
            assert.ok(areEqual(parse('(λ(a : Type) → a) Bool'), Bool()));
            assert.ok(areEqual(
                parse('let T = Natural in ∀(x : T) → T'),
                Pi('y', Natural(), Natural())
            ));
        });

        it('distinguishes different normal forms', () => {
            assert.ok(!areEqual(parse('+1 + +2'), NaturalLit(2)));
            assert.ok(!areEqual(Bool(), Natural()));
        });

        it('uses the operator identities under binders', () => {
            assert.ok(areEqual(parse('λ(x : Natural) → x * +1'), parse('λ(y : Natural) → y + +0')));
        });
    });
});
