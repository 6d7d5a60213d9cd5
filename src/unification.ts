/**
 * @file unification.ts
 * @description First-order unification over types, including exact
 * unification of natural-number type arguments.
 */

import { Type, Substitution, Result, CheckError, ok, err } from './types';
import { applySubst, composeSubst, occursIn, singletonSubst } from './substitution';

export type UnifyResult = Result<Substitution, CheckError>;

/**
 * Unifies two types under `subst`, returning the extended substitution.
 * Both sides are resolved against `subst` first, so callers may pass types
 * that still mention bound variables.
 * @param t1 The expected side; a dimension conflict reports its value as `expected`.
 * @param t2 The found side.
 * @param subst The substitution accumulated so far.
 */
export function unify(t1: Type, t2: Type, subst: Substitution): UnifyResult {
    const a = applySubst(subst, t1);
    const b = applySubst(subst, t2);

    if (a.tag === 'Var') return bindVar(a.id, b, subst);
    if (b.tag === 'Var') return bindVar(b.id, a, subst);

    switch (a.tag) {
        case 'Data':
            if (b.tag !== 'Data' || a.constructor !== b.constructor || a.args.length !== b.args.length) {
                return err({ kind: 'TypeMismatch', left: a, right: b });
            }
            return unifyMany(a.args, b.args, subst);
        case 'NatValue':
            if (b.tag !== 'NatValue') return err({ kind: 'TypeMismatch', left: a, right: b });
            return a.value === b.value
                ? ok(subst)
                : err({ kind: 'DimensionMismatch', expected: a.value, found: b.value });
        case 'Function': {
            if (b.tag !== 'Function') return err({ kind: 'TypeMismatch', left: a, right: b });
            return unifyMany([a.domain, a.codomain], [b.domain, b.codomain], subst);
        }
        case 'Product':
            if (b.tag !== 'Product' || a.elements.length !== b.elements.length) {
                return err({ kind: 'TypeMismatch', left: a, right: b });
            }
            return unifyMany(a.elements, b.elements, subst);
        case 'String':
            return b.tag === 'String' ? ok(subst) : err({ kind: 'TypeMismatch', left: a, right: b });
    }
}

/**
 * Unifies two sequences pairwise, left to right. Later pairs see the
 * bindings made by earlier ones.
 */
export function unifyMany(left: readonly Type[], right: readonly Type[], subst: Substitution): UnifyResult {
    let current = subst;
    for (let i = 0; i < left.length; i++) {
        const res = unify(left[i], right[i], current);
        if (!res.ok) return res;
        current = res.value;
    }
    return ok(current);
}

function bindVar(id: number, type: Type, subst: Substitution): UnifyResult {
    if (type.tag === 'Var' && type.id === id) return ok(subst);
    if (occursIn(id, type)) {
        return err({ kind: 'OccursCheckFailure', variable: id, type });
    }
    return ok(composeSubst(subst, singletonSubst(id, type)));
}
