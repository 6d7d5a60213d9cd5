/**
 * @file promotion.ts
 * @description Numeric promotion. Edges come from ground implementations of
 * the `Promotes(From, To)` structure, so the standard library's
 * ℕ → ℤ → ℝ → ℂ chain is data rather than code.
 */

import { Type } from './types';
import { StructureRegistry } from './registry';
import { resolveTypeExpr, namesIn, BUILTIN_TYPES } from './signature';
import { printType, isTypeVariableName } from './utils';

export const PROMOTION_STRUCTURE = 'Promotes';

export interface PromotionGraph {
    /** Printed type to the printed types it promotes to directly. */
    edges: ReadonlyMap<string, readonly string[]>;
    nodes: ReadonlyMap<string, Type>;
}

export function promotionGraph(registry: StructureRegistry): PromotionGraph {
    const edges = new Map<string, string[]>();
    const nodes = new Map<string, Type>();
    for (const impl of registry.implementationsOf(PROMOTION_STRUCTURE)) {
        if (impl.typeArgs.length !== 2) continue;
        const open = impl.typeArgs.flatMap(arg => namesIn(arg)).some(n => isTypeVariableName(n) && !(n in BUILTIN_TYPES));
        if (open) continue;
        const [from, to] = impl.typeArgs.map(arg => resolveTypeExpr(arg, new Map()));
        const fromKey = printType(from);
        const toKey = printType(to);
        nodes.set(fromKey, from);
        nodes.set(toKey, to);
        edges.set(fromKey, [...(edges.get(fromKey) ?? []), toKey]);
    }
    return { edges, nodes };
}

/** `type` followed by everything it promotes to, nearest first. */
function reachable(graph: PromotionGraph, start: string): string[] {
    const order = [start];
    for (let i = 0; i < order.length; i++) {
        for (const next of graph.edges.get(order[i]) ?? []) {
            if (!order.includes(next)) order.push(next);
        }
    }
    return order;
}

/**
 * The nearest type both `a` and `b` promote to: ℕ and ℝ meet at ℝ, ℤ and ℂ
 * at ℂ. Undefined when either is outside the graph or they never meet.
 */
export function commonSupertype(graph: PromotionGraph, a: Type, b: Type): Type | undefined {
    const left = printType(a);
    const right = printType(b);
    if (!graph.nodes.has(left) || !graph.nodes.has(right)) return undefined;
    const above = new Set(reachable(graph, right));
    const meet = reachable(graph, left).find(name => above.has(name));
    return meet === undefined ? undefined : graph.nodes.get(meet);
}

/**
 * Promotes every numeric argument to the common supertype of all of them.
 * Undefined unless at least two distinct numeric types take part and they
 * have one.
 */
export function promoteArguments(registry: StructureRegistry, argTypes: readonly Type[]): Type[] | undefined {
    const graph = promotionGraph(registry);
    const numeric = argTypes.filter(t => graph.nodes.has(printType(t)));
    const distinct = [...new Set(numeric.map(printType))];
    if (distinct.length < 2) return undefined;
    let target: Type | undefined = numeric[0];
    for (const t of numeric.slice(1)) {
        if (target === undefined) return undefined;
        target = commonSupertype(graph, target, t);
    }
    if (target === undefined) return undefined;
    const promoted = target;
    return argTypes.map(t => graph.nodes.has(printType(t)) ? promoted : t);
}
