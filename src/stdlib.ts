/**
 * @file stdlib.ts
 * @description Type signatures of the built-in types and functions.
 */

import {
    Expr, BuiltinName, Type, Var, Pi, Arrow, Bool, Natural
} from './types';

/**
 * The Church-encoded shape shared by `Natural/fold` and `Natural/build`:
 * `∀(natural : Type) → ∀(succ : natural → natural) → ∀(zero : natural) → natural`
 */
export const churchNatural = (): Expr =>
    Pi('natural', Type(),
        Pi('succ', Arrow(Var('natural'), Var('natural')),
            Pi('zero', Var('natural'), Var('natural'))));

const BUILTIN_TYPES: Record<BuiltinName, () => Expr> = {
    'Bool': () => Type(),
    'Natural': () => Type(),
    'Integer': () => Type(),
    'Double': () => Type(),
    'Text': () => Type(),
    'List': () => Arrow(Type(), Type()),
    'Optional': () => Arrow(Type(), Type()),
    'Natural/fold': () => Arrow(Natural(), churchNatural()),
    'Natural/build': () => Arrow(churchNatural(), Natural()),
    'Natural/isZero': () => Arrow(Natural(), Bool()),
    'Natural/even': () => Arrow(Natural(), Bool()),
    'Natural/odd': () => Arrow(Natural(), Bool()),
};

export const BUILTIN_NAMES: readonly BuiltinName[] = [
    'Bool', 'Natural', 'Integer', 'Double', 'Text', 'List', 'Optional',
    'Natural/fold', 'Natural/build', 'Natural/isZero', 'Natural/even', 'Natural/odd',
];

export function isBuiltinName(name: string): name is BuiltinName {
    return Object.prototype.hasOwnProperty.call(BUILTIN_TYPES, name);
}

/** The fixed type of a built-in. */
export function typeOfBuiltin(name: BuiltinName): Expr {
    return BUILTIN_TYPES[name]();
}
