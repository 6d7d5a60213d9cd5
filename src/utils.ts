/**
 * @file utils.ts
 *
 * Pretty-printing for types, type expressions and notation expressions, and
 * small name helpers shared by the registry, the interpreter and the driver.
 */

import { Type, TypeExpr, Expression } from './types';

/**
 * Display names for the built-in scalar constructors.
 */
const SCALAR_DISPLAY: Record<string, string> = {
    Scalar: 'ℝ',
    Complex: 'ℂ',
    Int: 'ℤ',
    Nat: 'ℕ',
    Bool: 'Bool',
};

/**
 * Pretty-prints a type. Variables print as `α<id>`; built-in scalars use
 * their mathematical symbol.
 */
export function printType(type: Type): string {
    switch (type.tag) {
        case 'Var': return `α${type.id}`;
        case 'NatValue': return String(type.value);
        case 'String': return 'String';
        case 'Data': {
            if (type.args.length === 0) {
                return (type.typeName === 'Type' && SCALAR_DISPLAY[type.constructor]) || type.constructor;
            }
            return `${type.constructor}(${type.args.map(printType).join(', ')})`;
        }
        case 'Function': {
            const dom = type.domain.tag === 'Function' ? `(${printType(type.domain)})` : printType(type.domain);
            return `${dom} → ${printType(type.codomain)}`;
        }
        case 'Product':
            return type.elements
                .map(e => (e.tag === 'Function' || e.tag === 'Product') ? `(${printType(e)})` : printType(e))
                .join(' × ');
    }
}

export function printTypeExpr(expr: TypeExpr): string {
    switch (expr.tag) {
        case 'Named': return expr.name;
        case 'NatLit': return String(expr.value);
        case 'Parametric': return `${expr.name}(${expr.args.map(printTypeExpr).join(', ')})`;
        case 'FunctionExpr': {
            const from = expr.from.tag === 'FunctionExpr' ? `(${printTypeExpr(expr.from)})` : printTypeExpr(expr.from);
            return `${from} → ${printTypeExpr(expr.to)}`;
        }
        case 'ProductExpr':
            return expr.elements
                .map(e => (e.tag === 'FunctionExpr' || e.tag === 'ProductExpr') ? `(${printTypeExpr(e)})` : printTypeExpr(e))
                .join(' × ');
    }
}

export function printExpression(expr: Expression): string {
    switch (expr.tag) {
        case 'Const': return expr.value;
        case 'Object': return expr.name;
        case 'Placeholder': return expr.hint ? `□${expr.id}:${expr.hint}` : `□${expr.id}`;
        case 'Operation': return `${expr.name}(${expr.args.map(printExpression).join(', ')})`;
        case 'List': return `[${expr.items.map(printExpression).join(', ')}]`;
        case 'Quantifier': {
            const symbol = expr.quantifier === 'forall' ? '∀' : '∃';
            const vars = expr.variables
                .map(v => v.type ? `${v.name} : ${printTypeExpr(v.type)}` : v.name)
                .join(', ');
            return `${symbol}(${vars}). ${printExpression(expr.body)}`;
        }
    }
}

/**
 * Names treated as implicit type variables when they are not declared
 * parameters: a single letter, optionally followed by digits or primes
 * (`T`, `m`, `F1`, `n'`).
 */
export function isTypeVariableName(name: string): boolean {
    return /^[A-Za-zα-ω][0-9']*$/.test(name);
}

export function editDistance(a: string, b: string): number {
    const prev = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        let diag = prev[0];
        prev[0] = i;
        for (let j = 1; j <= b.length; j++) {
            const above = prev[j];
            prev[j] = Math.min(
                prev[j] + 1,
                prev[j - 1] + 1,
                diag + (a[i - 1] === b[j - 1] ? 0 : 1)
            );
            diag = above;
        }
    }
    return prev[b.length];
}

/**
 * The closest known name to `name`, if any is within a third of its length.
 */
export function closestName(name: string, known: Iterable<string>): string | undefined {
    const limit = Math.max(1, Math.floor(name.length / 3));
    let best: string | undefined;
    let bestDistance = Infinity;
    for (const candidate of known) {
        const d = editDistance(name, candidate);
        if (d < bestDistance && d <= limit) {
            best = candidate;
            bestDistance = d;
        }
    }
    return best;
}
