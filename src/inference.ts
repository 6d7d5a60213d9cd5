/**
 * @file inference.ts
 * @description The inference driver. Walks a notation expression left to
 * right, depth first, and resolves every operation against the structure
 * registry. The first failure stops the walk.
 */

import {
    Type, Expression, TypeEnv, TypeCheckResult, Candidate, CandidateFailure, CheckError,
    StructureDef, Result, ok, err, Scalar, Bool, Nat, ListType, Matrix, QuantifiedVar, Product
} from './types';
import { isGround } from './substitution';
import { unify } from './unification';
import { StructureRegistry } from './registry';
import { interpretSignature, interpretConstructor, resolveTypeExpr, namesIn, BUILTIN_TYPES, Interpretation } from './signature';
import { promoteArguments } from './promotion';
import { InferenceSession, consoleLog, getFlag } from './state';
import { CheckerOptions } from './config';
import { formatCheckError, suggestionFor } from './errors';
import { printType, printTypeExpr, closestName, isTypeVariableName } from './utils';

export type InferResult = Result<Type, CheckError>;

/** Operation names that build a matrix from its dimensions and entries. */
export const MATRIX_CONSTRUCTORS: ReadonlySet<string> = new Set(['Matrix', 'PMatrix', 'VMatrix', 'BMatrix']);

export function describeCandidate(candidate: Candidate): string {
    const { structure } = candidate;
    if (!structure) return `${candidate.operation} : ${printTypeExpr(candidate.signature)}`;
    if (candidate.implementedBy !== undefined) return `implements ${candidate.implementedBy}.${candidate.operation}`;
    const params = candidate.instantiation
        ? candidate.instantiation.map(printTypeExpr)
        : structure.params.map(p => p.name);
    const owner = params.length > 0 ? `${structure.name}(${params.join(', ')})` : structure.name;
    return `${candidate.source === 'implements' ? 'implements ' : ''}${owner}.${candidate.operation}`;
}

/**
 * Infers the type of `expr`, committing to `session` as it goes. The
 * returned type has the session substitution applied.
 */
export function inferType(expr: Expression, session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): InferResult {
    switch (expr.tag) {
        case 'Const':
            return ok(Scalar());
        case 'Object': {
            const known = session.lookup(expr.name);
            if (known) return ok(session.apply(known));
            const constant = registry.lookupVariant(expr.name);
            if (constant && constant.variant.fields.length === 0) {
                return inferConstructor(expr.name, [], session, registry, options);
            }
            const fresh = session.freshVar();
            session.bind(expr.name, fresh);
            return ok(fresh);
        }
        case 'Placeholder':
            return ok(session.freshVar());
        case 'List':
            return inferList(expr.items, session, registry, options);
        case 'Quantifier':
            return inferQuantifier(expr.variables, expr.body, session, registry, options);
        case 'Operation':
            if (MATRIX_CONSTRUCTORS.has(expr.name)) {
                return inferMatrixLiteral(expr.name, expr.args, session, registry, options);
            }
            if (registry.lookupVariant(expr.name)) {
                return inferConstructor(expr.name, expr.args, session, registry, options);
            }
            return inferOperation(expr.name, expr.args, session, registry, options);
    }
}

/**
 * Infers `expr` and unifies the result with `expected`, committing on success.
 */
function inferAgainst(expr: Expression, expected: Type, context: string, session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): Result<void, CheckError> {
    const inferred = inferType(expr, session, registry, options);
    if (!inferred.ok) return inferred;
    const res = unify(expected, inferred.value, session.substitution);
    if (!res.ok) {
        if (res.error.kind === 'TypeMismatch') {
            return err({ kind: 'TypeMismatch', left: session.apply(expected), right: inferred.value, context });
        }
        return res;
    }
    session.commit(res.value);
    return ok(undefined);
}

function inferList(items: readonly Expression[], session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): InferResult {
    const element = session.freshVar();
    for (let i = 0; i < items.length; i++) {
        const res = inferAgainst(items[i], element, `list item ${i + 1}`, session, registry, options);
        if (!res.ok) return res;
    }
    return ok(session.apply(ListType(element)));
}

function inferQuantifier(
    variables: readonly QuantifiedVar[],
    body: Expression,
    session: InferenceSession,
    registry: StructureRegistry,
    options: CheckerOptions
): InferResult {
    // Type-variable names in the annotations (`∀(x y : T)`) share one variable per name.
    const annotationScope = new Map<string, Type>();
    for (const v of variables) {
        for (const name of namesIn(v.type)) {
            if (isTypeVariableName(name) && !(name in BUILTIN_TYPES) && !annotationScope.has(name)) {
                annotationScope.set(name, session.freshVar());
            }
        }
    }

    const saved = variables.map(v => ({ name: v.name, previous: session.lookup(v.name) }));
    for (const v of variables) {
        session.bind(v.name, v.type ? resolveTypeExpr(v.type, annotationScope) : session.freshVar());
    }
    const res = inferAgainst(body, Bool(), 'quantified proposition', session, registry, options);
    for (const { name, previous } of saved.reverse()) session.unbind(name, previous);
    return res.ok ? ok(Bool()) : res;
}

function dimensionOf(arg: Expression, what: string, session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): Result<number, CheckError> {
    if (arg.tag === 'Const') {
        const text = String(arg.value);
        if (/^[0-9]+$/.test(text)) return ok(Number(text));
        return err({ kind: 'TypeMismatch', left: Nat(), right: Scalar(), context: what });
    }
    const inferred = inferType(arg, session, registry, options);
    if (!inferred.ok) return inferred;
    return err({ kind: 'TypeMismatch', left: Nat(), right: inferred.value, context: what });
}

/**
 * `Matrix(rows, cols, e11, e12, …)`: literal dimensions and real entries,
 * either none or exactly rows × cols of them.
 */
function inferMatrixLiteral(name: string, args: readonly Expression[], session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): InferResult {
    if (args.length < 2) {
        return err({ kind: 'ArityMismatch', subject: `matrix literal '${name}'`, expected: 2, found: args.length });
    }
    const rows = dimensionOf(args[0], `row count of matrix literal '${name}'`, session, registry, options);
    if (!rows.ok) return rows;
    const cols = dimensionOf(args[1], `column count of matrix literal '${name}'`, session, registry, options);
    if (!cols.ok) return cols;

    const elements = args.slice(2);
    if (elements.length !== 0 && elements.length !== rows.value * cols.value) {
        return err({
            kind: 'ArityMismatch',
            subject: `entries of matrix literal '${name}'`,
            expected: rows.value * cols.value,
            found: elements.length,
        });
    }
    for (let i = 0; i < elements.length; i++) {
        const res = inferAgainst(elements[i], Scalar(), `entry ${i + 1} of matrix literal '${name}'`, session, registry, options);
        if (!res.ok) return res;
    }
    return ok(Matrix(rows.value, cols.value, Scalar()));
}

/** `Some(x)`, `None`: applications of a data type's constructors. */
function inferConstructor(name: string, args: readonly Expression[], session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): InferResult {
    const found = registry.lookupVariant(name);
    if (!found) return err({ kind: 'UnboundOperation', operation: name, arity: args.length });
    const argTypes: Type[] = [];
    for (const arg of args) {
        const res = inferType(arg, session, registry, options);
        if (!res.ok) return res;
        argTypes.push(res.value);
    }
    const res = interpretConstructor(found.dataType, found.variant, argTypes.map(t => session.apply(t)), session);
    if (!res.ok) return res;
    session.commit(res.value.substitution);
    return ok(session.apply(res.value.type));
}

interface Selection {
    candidate: Candidate;
    interpretation: Interpretation;
}

interface Attempt {
    selected?: Selection;
    failures: CandidateFailure[];
}

/**
 * For structures listed in `requireImplementation`, a structure-level
 * signature only applies at parameter values some implementation covers.
 * Values that are still open are not checked.
 */
function requireImplementation(interpretation: Interpretation, structure: StructureDef, operation: string, registry: StructureRegistry): Result<Interpretation, CheckError> {
    const { bindings } = interpretation;
    if (bindings.every(t => t.tag === 'Var')) return ok(interpretation);
    if (registry.isImplementedAt(structure.name, bindings)) return ok(interpretation);
    const available: string[] = [];
    for (const inst of registry.instantiationsOf(structure.name)) {
        const shown = inst.args.map(arg => printType(resolveTypeExpr(arg, new Map()))).join(', ');
        if (!available.includes(shown)) available.push(shown);
    }
    return err({
        kind: 'MissingImplementation',
        structure: structure.name,
        operation,
        type: bindings.length === 1 ? bindings[0] : Product([...bindings]),
        available,
    });
}

function tryCandidates(candidates: readonly Candidate[], argTypes: readonly Type[], session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): Attempt {
    const failures: CandidateFailure[] = [];
    let selected: Selection | undefined;
    for (const candidate of candidates) {
        const interpreted = interpretSignature(candidate, argTypes, session);
        const res = interpreted.ok && candidate.source === 'structure' && candidate.structure
            && options.requireImplementation.includes(candidate.structure.name)
            ? requireImplementation(interpreted.value, candidate.structure, candidate.operation, registry)
            : interpreted;
        if (getFlag('traceCandidates')) {
            consoleLog(`[Infer] ${describeCandidate(candidate)}: ${res.ok ? printType(res.value.type) : formatCheckError(res.error)}`);
        }
        if (!res.ok) {
            failures.push({ candidate: describeCandidate(candidate), error: res.error });
            continue;
        }
        if (options.dispatch === 'first-match') {
            return { selected: { candidate, interpretation: res.value }, failures };
        }
        if (!selected || res.value.specificity > selected.interpretation.specificity) {
            selected = { candidate, interpretation: res.value };
        }
    }
    return { selected, failures };
}

function inferOperation(name: string, args: readonly Expression[], session: InferenceSession, registry: StructureRegistry, options: CheckerOptions): InferResult {
    session.recordOperation(name);

    const inferred: Type[] = [];
    for (const arg of args) {
        const res = inferType(arg, session, registry, options);
        if (!res.ok) return res;
        inferred.push(res.value);
    }
    // Later arguments may have bound variables in earlier ones.
    const argTypes = inferred.map(t => session.apply(t));

    const candidates = registry.signaturesFor(name, args.length);
    if (candidates.length === 0) {
        const closest = closestName(name, registry.operationNames().filter(n => n !== name));
        return err({ kind: 'UnboundOperation', operation: name, arity: args.length, closest });
    }

    let attempt = tryCandidates(candidates, argTypes, session, registry, options);
    if (!attempt.selected) {
        // ℤ and ℝ arguments meet at ℝ: retry once with every numeric argument promoted.
        const promoted = promoteArguments(registry, argTypes);
        if (promoted) {
            const retry = tryCandidates(candidates, promoted, session, registry, options);
            if (retry.selected) {
                consoleLog(`[Infer] ${name} promoted to (${promoted.map(printType).join(', ')})`);
                attempt = retry;
            }
        }
    }
    const { selected } = attempt;
    if (!selected) return err(selectFailure(name, argTypes, attempt.failures));

    consoleLog(`[Infer] ${name} resolved by ${describeCandidate(selected.candidate)}`);
    session.commit(selected.interpretation.substitution);
    return ok(session.apply(selected.interpretation.type));
}

function selectFailure(name: string, argTypes: Type[], failures: CandidateFailure[]): CheckError {
    if (failures.every(f => f.error.kind === 'DimensionMismatch')) return failures[0].error;
    if (failures.length === 1) return failures[0].error;
    return { kind: 'NoMatchingImplementation', operation: name, argTypes, reasons: failures };
}

/**
 * Runs one complete check in a fresh session.
 * @param context Types of free objects known to the caller.
 */
export function checkExpression(expr: Expression, registry: StructureRegistry, options: CheckerOptions, context?: TypeEnv): TypeCheckResult {
    const session = new InferenceSession(context);
    const res = inferType(expr, session, registry, options);
    if (!res.ok) {
        return { tag: 'Error', message: formatCheckError(res.error), suggestion: suggestionFor(res.error), error: res.error };
    }
    const type = session.apply(res.value);
    if (isGround(type)) return { tag: 'Success', type };

    const availableTypes: string[] = [];
    for (const op of session.operationsVisited) {
        for (const t of registry.typesSupporting(op)) {
            if (!availableTypes.includes(t)) availableTypes.push(t);
        }
    }
    return { tag: 'Polymorphic', typeVar: type, availableTypes };
}
