/**
 * @file substitution.ts
 * @description Substitution application and composition, plus the structural
 * queries on types (free variables, occurs check, equality) that unification
 * and the driver rely on.
 */

import { Type, Substitution } from './types';

export const emptySubst = (): Substitution => new Map();

export const singletonSubst = (id: number, type: Type): Substitution => new Map([[id, type]]);

/**
 * Rewrites every bound variable in `type`. Bindings are followed until a
 * fixed point, so the result never mentions a variable bound in `subst`.
 * @param subst The substitution to apply.
 * @param type The type to rewrite.
 * @returns The rewritten type (the input itself when nothing changes).
 */
export function applySubst(subst: Substitution, type: Type): Type {
    if (subst.size === 0) return type;
    switch (type.tag) {
        case 'Var': {
            const bound = subst.get(type.id);
            return bound === undefined ? type : applySubst(subst, bound);
        }
        case 'Data': {
            if (type.args.length === 0) return type;
            return { ...type, args: type.args.map(a => applySubst(subst, a)) };
        }
        case 'Function':
            return { tag: 'Function', domain: applySubst(subst, type.domain), codomain: applySubst(subst, type.codomain) };
        case 'Product':
            return { tag: 'Product', elements: type.elements.map(e => applySubst(subst, e)) };
        case 'NatValue':
        case 'String':
            return type;
        default: {
            const exhaustiveCheck: never = type;
            throw new Error(`applySubst: Unhandled type tag: ${JSON.stringify(exhaustiveCheck)}`);
        }
    }
}

/**
 * Extends `old` with `newBindings`. Every existing binding is rewritten by the
 * new bindings so the composed substitution stays idempotent.
 */
export function composeSubst(old: Substitution, newBindings: Substitution): Substitution {
    const result = new Map<number, Type>();
    for (const [id, type] of old) {
        result.set(id, applySubst(newBindings, type));
    }
    for (const [id, type] of newBindings) {
        if (!result.has(id)) result.set(id, type);
    }
    return result;
}

/**
 * Collects the ids of every variable in `type`, in order of first occurrence.
 */
export function freeTypeVars(type: Type, acc: number[] = []): number[] {
    switch (type.tag) {
        case 'Var':
            if (!acc.includes(type.id)) acc.push(type.id);
            return acc;
        case 'Data':
            type.args.forEach(a => freeTypeVars(a, acc));
            return acc;
        case 'Function':
            freeTypeVars(type.domain, acc);
            return freeTypeVars(type.codomain, acc);
        case 'Product':
            type.elements.forEach(e => freeTypeVars(e, acc));
            return acc;
        case 'NatValue':
        case 'String':
            return acc;
    }
}

export function occursIn(id: number, type: Type): boolean {
    switch (type.tag) {
        case 'Var': return type.id === id;
        case 'Data': return type.args.some(a => occursIn(id, a));
        case 'Function': return occursIn(id, type.domain) || occursIn(id, type.codomain);
        case 'Product': return type.elements.some(e => occursIn(id, e));
        case 'NatValue':
        case 'String':
            return false;
    }
}

export const isGround = (type: Type): boolean => freeTypeVars(type).length === 0;

/**
 * Structural equality. `typeName` is not compared: two data types are the
 * same when their constructors and arguments agree.
 */
export function typesEqual(a: Type, b: Type): boolean {
    switch (a.tag) {
        case 'Var': return b.tag === 'Var' && a.id === b.id;
        case 'NatValue': return b.tag === 'NatValue' && a.value === b.value;
        case 'String': return b.tag === 'String';
        case 'Data':
            return b.tag === 'Data'
                && a.constructor === b.constructor
                && a.args.length === b.args.length
                && a.args.every((arg, i) => typesEqual(arg, b.args[i]));
        case 'Function':
            return b.tag === 'Function' && typesEqual(a.domain, b.domain) && typesEqual(a.codomain, b.codomain);
        case 'Product':
            return b.tag === 'Product'
                && a.elements.length === b.elements.length
                && a.elements.every((e, i) => typesEqual(e, b.elements[i]));
    }
}
