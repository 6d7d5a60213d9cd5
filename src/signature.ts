/**
 * @file signature.ts
 * @description The signature interpreter. Given one structure's declared
 * signature for an operation and the caller's argument types, binds the
 * structure's own type and dimension parameters by unification and produces
 * the operation's return type.
 *
 * Example, with
 *     structure MatrixMultipliable(m: Nat, n: Nat, p: Nat, T) {
 *         operation multiply : Matrix(m, n, T) → Matrix(n, p, T) → Matrix(m, p, T)
 *     }
 * `multiply(Matrix(2, 3, ℝ), Matrix(3, 4, ℝ))` binds m=2, n=3, T=ℝ from the
 * first argument, checks n=3 and binds p=4 from the second, and returns
 * `Matrix(2, 4, ℝ)`.
 */

import {
    Type, TypeExpr, Substitution, Candidate, CheckError, ParamKind, StructureDef, DataDef, DataVariant, Result, ok, err,
    Data, NatValue, FunctionType, Product, StringType, Scalar, Complex, Int, Nat, Bool, TVar
} from './types';
import { applySubst, emptySubst, freeTypeVars } from './substitution';
import { unify, unifyMany } from './unification';
import { isTypeVariableName } from './utils';

/**
 * Named types that resolve to built-in types rather than to a data type of
 * the same name.
 */
export const BUILTIN_TYPES: Readonly<Record<string, () => Type>> = {
    'ℝ': Scalar,
    Real: Scalar,
    Scalar: Scalar,
    'ℂ': Complex,
    Complex: Complex,
    'ℤ': Int,
    Int: Int,
    Integer: Int,
    'ℕ': Nat,
    Nat: Nat,
    Bool: Bool,
    String: StringType,
};

export interface SignatureParts {
    params: TypeExpr[];
    returns: TypeExpr;
}

/**
 * Splits a signature into parameter types and return type. The arrow chain
 * is curried (`A → B → C`); a product domain (`A × B → C`) contributes one
 * parameter per component. A signature without an arrow is nullary.
 */
export function splitSignature(signature: TypeExpr): SignatureParts {
    const params: TypeExpr[] = [];
    let current = signature;
    while (current.tag === 'FunctionExpr') {
        if (current.from.tag === 'ProductExpr') params.push(...current.from.elements);
        else params.push(current.from);
        current = current.to;
    }
    return { params, returns: current };
}

export const signatureArity = (signature: TypeExpr): number => splitSignature(signature).params.length;

/**
 * What the interpreter needs from its caller: the substitution to start from
 * and a supply of fresh variables that cannot clash with the caller's.
 */
export interface InterpretState {
    readonly substitution: Substitution;
    freshVar(): Type & { tag: 'Var' };
}

export interface Interpretation {
    type: Type;
    substitution: Substitution;
    /** Concrete constructors in the instantiated parameter types; used by most-specific dispatch. */
    specificity: number;
    /** Values of the owning structure's parameters, in declaration order. */
    bindings: Type[];
}

interface ScopeEntry {
    name: string;
    /** Undefined for implicit names, which carry no kind annotation. */
    kind?: ParamKind;
    variable: Type & { tag: 'Var' };
}

/**
 * Resolves a type expression against a scope of parameter bindings. Names
 * not in scope resolve to built-in types or to nullary data types.
 */
export function resolveTypeExpr(expr: TypeExpr, scope: ReadonlyMap<string, Type>): Type {
    switch (expr.tag) {
        case 'Named': {
            const bound = scope.get(expr.name);
            if (bound) return bound;
            const builtin = BUILTIN_TYPES[expr.name];
            return builtin ? builtin() : Data(expr.name, expr.name);
        }
        case 'Parametric':
            return Data(expr.name, expr.name, expr.args.map(a => resolveTypeExpr(a, scope)));
        case 'NatLit':
            return NatValue(expr.value);
        case 'FunctionExpr':
            return FunctionType(resolveTypeExpr(expr.from, scope), resolveTypeExpr(expr.to, scope));
        case 'ProductExpr':
            return Product(expr.elements.map(e => resolveTypeExpr(e, scope)));
    }
}

/** Every name mentioned in a type expression, in order of first occurrence. */
export function namesIn(expr: TypeExpr | undefined, acc: string[] = []): string[] {
    if (!expr) return acc;
    switch (expr.tag) {
        case 'Named':
            if (!acc.includes(expr.name)) acc.push(expr.name);
            return acc;
        case 'Parametric':
            expr.args.forEach(a => namesIn(a, acc));
            return acc;
        case 'NatLit':
            return acc;
        case 'FunctionExpr':
            namesIn(expr.from, acc);
            return namesIn(expr.to, acc);
        case 'ProductExpr':
            expr.elements.forEach(e => namesIn(e, acc));
            return acc;
    }
}

function isImplicitParam(name: string, declared: readonly { name: string }[]): boolean {
    return !declared.some(p => p.name === name) && !(name in BUILTIN_TYPES) && isTypeVariableName(name);
}

function buildScope(structure: StructureDef | undefined, signature: TypeExpr, state: InterpretState): ScopeEntry[] {
    const declared = structure?.params ?? [];
    const scope: ScopeEntry[] = declared.map(p => ({ name: p.name, kind: p.kind, variable: state.freshVar() }));
    const mentioned = namesIn(structure?.overClause, namesIn(structure?.extendsClause, namesIn(signature)));
    for (const name of mentioned) {
        if (isImplicitParam(name, declared)) {
            scope.push({ name, variable: state.freshVar() });
        }
    }
    return scope;
}

function concreteness(type: Type): number {
    switch (type.tag) {
        case 'Var': return 0;
        case 'NatValue':
        case 'String':
            return 1;
        case 'Data': return 1 + type.args.reduce((n, a) => n + concreteness(a), 0);
        case 'Function': return concreteness(type.domain) + concreteness(type.codomain);
        case 'Product': return type.elements.reduce((n, e) => n + concreteness(e), 0);
    }
}

/**
 * Finds the structure parameter whose value conflicts in a dimension
 * position, replaying the unification of `declared` against `actual`.
 */
function locateDimension(declared: Type, actual: Type, subst: Substitution, names: ReadonlyMap<number, string>): string | undefined {
    let running = subst;
    const walk = (d: Type, a: Type): string | undefined => {
        const found = applySubst(running, a);
        if (d.tag === 'Var') {
            const resolved = applySubst(running, d);
            if (resolved.tag === 'NatValue' && found.tag === 'NatValue') {
                return resolved.value !== found.value ? names.get(d.id) : undefined;
            }
            const res = unify(resolved, found, running);
            if (res.ok) running = res.value;
            return undefined;
        }
        if (d.tag === 'Data' && found.tag === 'Data' && d.args.length === found.args.length) {
            for (let i = 0; i < d.args.length; i++) {
                const name = walk(d.args[i], found.args[i]);
                if (name !== undefined) return name;
            }
        }
        if (d.tag === 'Function' && found.tag === 'Function') {
            return walk(d.domain, found.domain) ?? walk(d.codomain, found.codomain);
        }
        if (d.tag === 'Product' && found.tag === 'Product' && d.elements.length === found.elements.length) {
            for (let i = 0; i < d.elements.length; i++) {
                const name = walk(d.elements[i], found.elements[i]);
                if (name !== undefined) return name;
            }
        }
        return undefined;
    };
    return walk(declared, actual);
}

/**
 * Interprets a candidate signature against the caller's argument types.
 * Does not modify the caller's state: the returned substitution extends
 * `state.substitution` and is committed by the caller if it selects this
 * candidate.
 */
export function interpretSignature(candidate: Candidate, argTypes: readonly Type[], state: InterpretState): Result<Interpretation, CheckError> {
    const { structure, operation, signature } = candidate;
    const { params, returns } = splitSignature(signature);
    if (argTypes.length !== params.length) {
        return err({
            kind: 'ArityMismatch',
            subject: structure ? `'${operation}' in structure '${structure.name}'` : `top-level operation '${operation}'`,
            expected: params.length,
            found: argTypes.length,
        });
    }

    const scope = buildScope(structure, signature, state);
    const scopeTypes = new Map<string, Type>(scope.map(e => [e.name, e.variable]));
    const names = new Map<number, string>(scope.map(e => [e.variable.id, e.name]));
    let subst = state.substitution;

    if (structure && candidate.instantiation) {
        // Names left open in the implementation's arguments (`implements
        // MatrixAddable(m, n, ℝ)`) become variables of their own.
        const implScope = new Map<string, Type>();
        for (const name of candidate.instantiation.flatMap(arg => namesIn(arg))) {
            if (isTypeVariableName(name) && !(name in BUILTIN_TYPES) && !implScope.has(name)) {
                implScope.set(name, state.freshVar());
            }
        }
        for (let i = 0; i < structure.params.length; i++) {
            const res = unify(scope[i].variable, resolveTypeExpr(candidate.instantiation[i], implScope), subst);
            if (!res.ok) return res;
            subst = res.value;
        }
    }

    const declared = params.map(p => resolveTypeExpr(p, scopeTypes));
    const specificity = declared.reduce((n, t) => n + concreteness(applySubst(subst, t)), 0);

    for (let i = 0; i < declared.length; i++) {
        const res = unify(declared[i], argTypes[i], subst);
        if (!res.ok) {
            return err(annotate(res.error, operation, i, declared[i], argTypes[i], subst, names));
        }
        subst = res.value;
    }

    const kindError = checkKinds(scope, subst, operation);
    if (kindError) return err(kindError);

    const used = namesIn(signature);
    const connected = new Set(argTypes.flatMap(t => freeTypeVars(applySubst(subst, t))));
    for (const entry of scope) {
        if (!used.includes(entry.name)) continue;
        const open = freeTypeVars(applySubst(subst, entry.variable));
        if (open.some(id => !connected.has(id))) {
            return err({ kind: 'UnresolvedTypeParameter', operation, structure: structure?.name, parameter: entry.name });
        }
    }

    const bindings = (structure?.params ?? []).map((_, i) => applySubst(subst, scope[i].variable));
    return ok({ type: applySubst(subst, resolveTypeExpr(returns, scopeTypes)), substitution: subst, specificity, bindings });
}

function checkKinds(scope: readonly ScopeEntry[], subst: Substitution, owner: string): CheckError | undefined {
    for (const entry of scope) {
        if (entry.kind === undefined) continue;
        const value = applySubst(subst, entry.variable);
        const wrongKind = entry.kind === 'Nat'
            ? value.tag !== 'NatValue' && value.tag !== 'Var'
            : value.tag === 'NatValue';
        if (wrongKind) {
            return {
                kind: 'TypeMismatch',
                left: entry.kind === 'Nat' ? Data('Type', 'Nat') : entry.variable,
                right: value,
                context: `${entry.kind === 'Nat' ? 'dimension' : 'type'} parameter '${entry.name}' of '${owner}'`,
            };
        }
    }
    return undefined;
}

/**
 * Types an application of a data constructor: `Some(x)` with `x : ℝ` is an
 * `Option(ℝ)`. Each use gets fresh variables for the data type's parameters.
 */
export function interpretConstructor(
    dataType: DataDef,
    variant: DataVariant,
    argTypes: readonly Type[],
    state: InterpretState
): Result<{ type: Type, substitution: Substitution }, CheckError> {
    if (argTypes.length !== variant.fields.length) {
        return err({
            kind: 'ArityMismatch',
            subject: `constructor '${variant.name}' of data type '${dataType.name}'`,
            expected: variant.fields.length,
            found: argTypes.length,
        });
    }
    const scope: ScopeEntry[] = dataType.params.map(p => ({ name: p.name, kind: p.kind, variable: state.freshVar() }));
    const scopeTypes = new Map<string, Type>(scope.map(e => [e.name, e.variable]));
    const names = new Map<number, string>(scope.map(e => [e.variable.id, e.name]));
    let subst = state.substitution;
    for (let i = 0; i < argTypes.length; i++) {
        const declared = resolveTypeExpr(variant.fields[i].type, scopeTypes);
        const res = unify(declared, argTypes[i], subst);
        if (!res.ok) return err(annotate(res.error, variant.name, i, declared, argTypes[i], subst, names));
        subst = res.value;
    }
    const kindError = checkKinds(scope, subst, variant.name);
    if (kindError) return err(kindError);
    const type = Data(dataType.name, dataType.name, scope.map(e => e.variable));
    return ok({ type: applySubst(subst, type), substitution: subst });
}

/**
 * Whether the parameter values `values` are an instance of an
 * implementation's arguments. Names left open in `args` match anything,
 * consistently across positions.
 */
export function matchesInstantiation(args: readonly TypeExpr[], values: readonly Type[]): boolean {
    if (args.length !== values.length) return false;
    let next = values.reduce((max, t) => Math.max(max, ...freeTypeVars(t).map(id => id + 1)), 0);
    const scope = new Map<string, Type>();
    for (const name of args.flatMap(arg => namesIn(arg))) {
        if (isTypeVariableName(name) && !(name in BUILTIN_TYPES) && !scope.has(name)) {
            scope.set(name, TVar(next++));
        }
    }
    return unifyMany(args.map(a => resolveTypeExpr(a, scope)), [...values], emptySubst()).ok;
}

function annotate(
    error: CheckError,
    operation: string,
    index: number,
    declared: Type,
    actual: Type,
    before: Substitution,
    names: ReadonlyMap<number, string>
): CheckError {
    const expectedType = applySubst(before, declared);
    const foundType = applySubst(before, actual);
    switch (error.kind) {
        case 'DimensionMismatch':
            return {
                ...error,
                operation,
                parameter: locateDimension(declared, actual, before, names) ?? `argument ${index + 1}`,
                expectedType,
                foundType,
            };
        case 'TypeMismatch':
            return { kind: 'TypeMismatch', left: expectedType, right: foundType, context: `argument ${index + 1} of '${operation}'` };
        default:
            return error;
    }
}

/**
 * Interprets `signature` as declared by `structure` outside of any inference
 * session. Variables already present in `argTypes` are left alone.
 */
export function interpret(structure: StructureDef, operation: string, signature: TypeExpr, argTypes: readonly Type[]): Result<Type, CheckError> {
    let next = argTypes.reduce((max, t) => Math.max(max, ...freeTypeVars(t).map(id => id + 1)), 0);
    const state: InterpretState = { substitution: emptySubst(), freshVar: () => TVar(next++) };
    const res = interpretSignature({ structure, operation, signature, source: 'structure' }, argTypes, state);
    return res.ok ? ok(res.value.type) : res;
}
