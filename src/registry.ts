/**
 * @file registry.ts
 * @description The structure registry: owns every loaded structure and
 * implementation, answers operation lookups in registration order and
 * computes structure dependency closures.
 *
 * The registry is filled during a load phase and only read while checking.
 * Callers that want to add definitions after checks have started take a
 * `clone()` and extend that instead.
 */

import {
    StructureDef, ImplementsDef, StructureMember, TypeExpr, Type, Expression, Candidate, DataDef, DataVariant,
    CheckError, Result, ok, err, TVar, Parametric, FunctionExpr, ProductExpr
} from './types';
import { signatureArity, splitSignature, resolveTypeExpr, namesIn, matchesInstantiation, BUILTIN_TYPES } from './signature';
import { consoleLog } from './state';
import { printType, isTypeVariableName } from './utils';

export interface OperationDecl {
    name: string;
    signature: TypeExpr;
}

/** A structure together with the arguments an implementation gives it. */
export interface Instantiation {
    structure: StructureDef;
    args: readonly TypeExpr[];
}

type RegistryEntry =
    | { tag: 'Structure', def: StructureDef }
    | { tag: 'Implements', def: ImplementsDef, key: string, label: string, hierarchy: Instantiation[] }
    | { tag: 'Data', def: DataDef }
    | { tag: 'Operation', decl: OperationDecl };

/**
 * Operations declared by a structure, including those inside nested
 * structures, in declaration order.
 */
export function collectOperations(members: readonly StructureMember[], acc: OperationDecl[] = []): OperationDecl[] {
    for (const member of members) {
        if (member.tag === 'Operation') {
            acc.push({ name: member.name, signature: member.signature });
        } else if (member.tag === 'NestedStructure') {
            collectOperations(member.members, acc);
        }
    }
    return acc;
}

/** The name of the structure a clause such as `extends Monoid(M)` points at. */
export function clauseTarget(clause: TypeExpr | undefined): string | undefined {
    if (!clause) return undefined;
    if (clause.tag === 'Named' || clause.tag === 'Parametric') return clause.name;
    return undefined;
}

function clauseArgs(clause: TypeExpr): readonly TypeExpr[] {
    return clause.tag === 'Parametric' ? clause.args : [];
}

function isOpenName(name: string): boolean {
    return isTypeVariableName(name) && !(name in BUILTIN_TYPES);
}

/** Replaces names bound in `bindings`, leaving every other name as written. */
function substituteTypeExpr(expr: TypeExpr, bindings: ReadonlyMap<string, TypeExpr>): TypeExpr {
    switch (expr.tag) {
        case 'Named':
            return bindings.get(expr.name) ?? expr;
        case 'Parametric':
            return Parametric(expr.name, expr.args.map(a => substituteTypeExpr(a, bindings)));
        case 'NatLit':
            return expr;
        case 'FunctionExpr':
            return FunctionExpr(substituteTypeExpr(expr.from, bindings), substituteTypeExpr(expr.to, bindings));
        case 'ProductExpr':
            return ProductExpr(expr.elements.map(e => substituteTypeExpr(e, bindings)));
    }
}

function printArgs(name: string, args: readonly Type[]): string {
    return args.length > 0 ? `${name}(${args.map(printType).join(', ')})` : name;
}

/**
 * Identity of an implementation: built-in aliases are normalised and names
 * left open are numbered by first occurrence, so `MatrixAddable(m, n, Real)`
 * and `MatrixAddable(a, b, ℝ)` share the key `MatrixAddable(α0, α1, ℝ)`.
 */
export function implementationKey(def: ImplementsDef): string {
    const scope = new Map<string, Type>();
    for (const name of def.typeArgs.flatMap(arg => namesIn(arg))) {
        if (isOpenName(name) && !scope.has(name)) scope.set(name, TVar(scope.size));
    }
    return printArgs(def.structureName, def.typeArgs.map(arg => resolveTypeExpr(arg, scope)));
}

/** How an implementation is shown in messages: `Arithmetic(ℝ)`, `MatrixAddable(m, n, ℝ)`. */
export function implementationLabel(def: ImplementsDef): string {
    return printArgs(def.structureName, def.typeArgs.map(arg => resolveTypeExpr(arg, new Map())));
}

/**
 * The type an implementation provides an operation for: the parameter of the
 * signature that mentions the most structure parameters, with the
 * implementation's arguments substituted. Falls back to the arguments
 * themselves when no parameter mentions one.
 */
function carrierType(inst: Instantiation, signature: TypeExpr): string {
    const own = inst.structure.params.map(p => p.name);
    let best: TypeExpr | undefined;
    let bestCount = 0;
    for (const param of splitSignature(signature).params) {
        const count = namesIn(param).filter(n => own.includes(n)).length;
        if (count > bestCount) {
            best = param;
            bestCount = count;
        }
    }
    const values = inst.args.map(arg => resolveTypeExpr(arg, new Map()));
    if (!best) return values.map(printType).join(', ');
    const scope = new Map<string, Type>(own.map((name, i) => [name, values[i]]));
    return printType(resolveTypeExpr(best, scope));
}

export class StructureRegistry {
    private readonly structures = new Map<string, StructureDef>();
    private readonly implementations = new Map<string, ImplementsDef[]>();
    private readonly dataTypes = new Map<string, DataDef>();
    private readonly variants = new Map<string, { dataType: DataDef, variant: DataVariant }>();
    private readonly toplevel = new Map<string, OperationDecl>();
    private readonly entries: RegistryEntry[] = [];

    /**
     * Registers a structure definition. `extends` and `over` targets may be
     * registered later; `dependencyClosure` reports the ones that never are.
     * @returns `DuplicateName` when a structure of that name exists.
     */
    register(def: StructureDef): Result<void, CheckError> {
        if (this.structures.has(def.name)) {
            return err({ kind: 'DuplicateName', name: def.name, what: 'structure' });
        }
        this.structures.set(def.name, def);
        this.entries.push({ tag: 'Structure', def });
        consoleLog(`[Registry] structure ${def.name} (${collectOperations(def.members).length} operations)`);
        return ok(undefined);
    }

    /**
     * Registers an implementation of an already registered structure whose
     * dependency closure is complete. Its operations may be declared by the
     * structure or by any structure it extends or is over.
     */
    registerImplements(def: ImplementsDef): Result<void, CheckError> {
        const key = implementationKey(def);
        const label = implementationLabel(def);
        const structure = this.structures.get(def.structureName);
        if (!structure) {
            return err({ kind: 'UnknownStructure', name: def.structureName, referencedBy: `implements ${label}` });
        }
        if (def.typeArgs.length !== structure.params.length) {
            return err({
                kind: 'ArityMismatch',
                subject: `implements ${label}`,
                expected: structure.params.length,
                found: def.typeArgs.length,
            });
        }
        const referenced = [clauseTarget(def.overClause), ...(def.whereClause ?? []).map(c => c.structureName)];
        for (const name of referenced) {
            if (name !== undefined && !this.structures.has(name)) {
                return err({ kind: 'UnknownStructure', name, referencedBy: `implements ${label}` });
            }
        }
        const hierarchy = this.instantiateHierarchy(def);
        if (!hierarchy.ok) return hierarchy;
        for (const member of def.members) {
            if (member.tag !== 'Operation') continue;
            const declared = hierarchy.value.some(inst => collectOperations(inst.structure.members).some(op => op.name === member.name));
            if (!declared) {
                return err({ kind: 'UndeclaredMember', implementation: label, member: member.name, structure: structure.name });
            }
        }
        const existing = this.implementations.get(def.structureName) ?? [];
        if (existing.some(other => implementationKey(other) === key)) {
            return err({ kind: 'DuplicateName', name: label, what: 'implements' });
        }
        this.implementations.set(def.structureName, [...existing, def]);
        this.entries.push({ tag: 'Implements', def, key, label, hierarchy: hierarchy.value });
        consoleLog(`[Registry] implements ${label}`);
        return ok(undefined);
    }

    /**
     * The implemented structure followed by its ancestors, each with the
     * arguments the implementation passes down through `extends` and `over`.
     * An `over` clause on the implementation replaces the structure's own.
     */
    instantiateHierarchy(def: ImplementsDef): Result<Instantiation[], CheckError> {
        const closure = this.dependencyClosure(def.structureName);
        if (!closure.ok) return closure;
        const order: Instantiation[] = [];
        const seen = new Set<string>();

        const visit = (structure: StructureDef, args: readonly TypeExpr[], overClause?: TypeExpr): CheckError | undefined => {
            if (seen.has(structure.name)) return undefined;
            seen.add(structure.name);
            order.push({ structure, args });
            const bindings = new Map<string, TypeExpr>(structure.params.map((p, i) => [p.name, args[i]]));
            for (const [clause, keyword] of [[structure.extendsClause, 'extends'], [structure.overClause, 'over']] as const) {
                const target = clauseTarget(clause);
                const parent = target === undefined ? undefined : this.structures.get(target);
                if (!clause || !parent) continue;
                const parentArgs = keyword === 'over' && overClause && clauseTarget(overClause) === parent.name
                    ? clauseArgs(overClause)
                    : clauseArgs(clause).map(a => substituteTypeExpr(a, bindings));
                if (parentArgs.length !== parent.params.length) {
                    return {
                        kind: 'ArityMismatch',
                        subject: `${keyword} ${parent.name} in structure '${structure.name}'`,
                        expected: parent.params.length,
                        found: parentArgs.length,
                    };
                }
                const failure = visit(parent, parentArgs);
                if (failure) return failure;
            }
            return undefined;
        };

        const failure = visit(closure.value[0], def.typeArgs, def.overClause);
        return failure ? err(failure) : ok(order);
    }

    /**
     * Registers a data type and its constructors. Constructor names are
     * global: two data types cannot share one.
     */
    registerData(def: DataDef): Result<void, CheckError> {
        if (this.dataTypes.has(def.name) || def.name in BUILTIN_TYPES) {
            return err({ kind: 'DuplicateName', name: def.name, what: 'data type' });
        }
        const names: string[] = [];
        for (const variant of def.variants) {
            const clash = this.variants.get(variant.name);
            if (clash || names.includes(variant.name)) {
                return err({ kind: 'DuplicateName', name: variant.name, what: 'constructor', owner: clash ? clash.dataType.name : def.name });
            }
            names.push(variant.name);
        }
        this.dataTypes.set(def.name, def);
        for (const variant of def.variants) this.variants.set(variant.name, { dataType: def, variant });
        this.entries.push({ tag: 'Data', def });
        consoleLog(`[Registry] data ${def.name} (${names.join(' | ')})`);
        return ok(undefined);
    }

    /** Registers an operation declared outside any structure. */
    registerOperation(decl: OperationDecl): Result<void, CheckError> {
        if (this.toplevel.has(decl.name)) {
            return err({ kind: 'DuplicateName', name: decl.name, what: 'operation' });
        }
        this.toplevel.set(decl.name, decl);
        this.entries.push({ tag: 'Operation', decl });
        consoleLog(`[Registry] operation ${decl.name}`);
        return ok(undefined);
    }

    getStructure(name: string): StructureDef | undefined {
        return this.structures.get(name);
    }

    hasStructure(name: string): boolean {
        return this.structures.has(name);
    }

    structureNames(): string[] {
        return [...this.structures.keys()];
    }

    get structureCount(): number {
        return this.structures.size;
    }

    getDataType(name: string): DataDef | undefined {
        return this.dataTypes.get(name);
    }

    dataTypeNames(): string[] {
        return [...this.dataTypes.keys()];
    }

    lookupVariant(name: string): { dataType: DataDef, variant: DataVariant } | undefined {
        return this.variants.get(name);
    }

    getOperation(name: string): OperationDecl | undefined {
        return this.toplevel.get(name);
    }

    implementationsOf(structureName: string): readonly ImplementsDef[] {
        return this.implementations.get(structureName) ?? [];
    }

    operationsOf(structureName: string): OperationDecl[] {
        const def = this.structures.get(structureName);
        return def ? collectOperations(def.members) : [];
    }

    axiomsOf(structureName: string): Array<{ name: string, proposition: Expression }> {
        const def = this.structures.get(structureName);
        if (!def) return [];
        const axioms: Array<{ name: string, proposition: Expression }> = [];
        const walk = (members: readonly StructureMember[]) => {
            for (const m of members) {
                if (m.tag === 'Axiom') axioms.push({ name: m.name, proposition: m.proposition });
                else if (m.tag === 'NestedStructure') walk(m.members);
            }
        };
        walk(def.members);
        return axioms;
    }

    /** Every operation name declared by a structure or at top level, in registration order. */
    operationNames(): string[] {
        const names: string[] = [];
        for (const entry of this.entries) {
            const declared = entry.tag === 'Structure' ? collectOperations(entry.def.members)
                : entry.tag === 'Operation' ? [entry.decl]
                : [];
            for (const op of declared) {
                if (!names.includes(op.name)) names.push(op.name);
            }
        }
        return names;
    }

    /**
     * Every signature for `opName` taking `arity` arguments, in registration
     * order: structures that declare the operation, top-level declarations
     * and implementations that implement it, each specialised to the
     * arguments the declaring structure receives from the implementation.
     */
    signaturesFor(opName: string, arity: number): Candidate[] {
        const candidates: Candidate[] = [];
        for (const entry of this.entries) {
            switch (entry.tag) {
                case 'Structure':
                    for (const op of collectOperations(entry.def.members)) {
                        if (op.name === opName && signatureArity(op.signature) === arity) {
                            candidates.push({ structure: entry.def, operation: opName, signature: op.signature, source: 'structure' });
                        }
                    }
                    break;
                case 'Operation':
                    if (entry.decl.name === opName && signatureArity(entry.decl.signature) === arity) {
                        candidates.push({ operation: opName, signature: entry.decl.signature, source: 'toplevel' });
                    }
                    break;
                case 'Implements': {
                    const implemented = entry.def.members.some(m => m.tag === 'Operation' && m.name === opName);
                    if (!implemented) break;
                    for (const inst of entry.hierarchy) {
                        for (const op of collectOperations(inst.structure.members)) {
                            if (op.name === opName && signatureArity(op.signature) === arity) {
                                candidates.push({
                                    structure: inst.structure,
                                    operation: opName,
                                    signature: op.signature,
                                    source: 'implements',
                                    instantiation: inst.args,
                                    implementedBy: entry.label,
                                });
                            }
                        }
                    }
                    break;
                }
                case 'Data':
                    break;
            }
        }
        return candidates;
    }

    /**
     * Every registered implementation that covers `structureName`, directly
     * or through a structure extending it, as the arguments it receives.
     */
    instantiationsOf(structureName: string): Instantiation[] {
        const found: Instantiation[] = [];
        for (const entry of this.entries) {
            if (entry.tag !== 'Implements') continue;
            found.push(...entry.hierarchy.filter(inst => inst.structure.name === structureName));
        }
        return found;
    }

    /** Whether some implementation covers `structureName` at the parameter values `values`. */
    isImplementedAt(structureName: string, values: readonly Type[]): boolean {
        return this.instantiationsOf(structureName).some(inst => matchesInstantiation(inst.args, values));
    }

    /**
     * The structure followed by everything it depends on through `extends`
     * and `over` clauses, depth first, each structure once.
     */
    dependencyClosure(structureName: string): Result<StructureDef[], CheckError> {
        const order: StructureDef[] = [];
        const done = new Set<string>();

        const visit = (name: string, path: string[], referencedBy?: string): CheckError | undefined => {
            const cycleStart = path.indexOf(name);
            if (cycleStart >= 0) {
                return { kind: 'CyclicDependency', path: [...path.slice(cycleStart), name] };
            }
            if (done.has(name)) return undefined;
            const def = this.structures.get(name);
            if (!def) return { kind: 'UnknownStructure', name, referencedBy };
            done.add(name);
            order.push(def);
            for (const dep of [clauseTarget(def.extendsClause), clauseTarget(def.overClause)]) {
                if (dep === undefined) continue;
                const failure = visit(dep, [...path, name], name);
                if (failure) return failure;
            }
            return undefined;
        };

        const failure = visit(structureName, []);
        return failure ? err(failure) : ok(order);
    }

    /**
     * Checks that every data type named in `expr` is given as many arguments
     * as it declares parameters.
     */
    checkDataArity(expr: TypeExpr, subject: string): Result<void, CheckError> {
        for (const node of dataReferences(expr)) {
            const def = this.dataTypes.get(node.name);
            const found = node.tag === 'Parametric' ? node.args.length : 0;
            if (def && def.params.length !== found) {
                return err({ kind: 'ArityMismatch', subject: `data type '${def.name}' in ${subject}`, expected: def.params.length, found });
            }
        }
        return ok(undefined);
    }

    /**
     * The types each implementation provides `opName` for, printed: the
     * operation's carrier parameter with the implementation's arguments
     * substituted (`ℝ`, `Matrix(m, n, ℝ)`, `Vector(3, ℝ)`).
     */
    typesSupporting(opName: string): string[] {
        const types: string[] = [];
        for (const entry of this.entries) {
            if (entry.tag !== 'Implements') continue;
            for (const inst of entry.hierarchy) {
                const op = collectOperations(inst.structure.members).find(o => o.name === opName);
                if (!op) continue;
                const carrier = carrierType(inst, op.signature);
                if (!types.includes(carrier)) types.push(carrier);
                break;
            }
        }
        return types;
    }

    /** An independent copy that can be extended without affecting this one. */
    clone(): StructureRegistry {
        const copy = new StructureRegistry();
        for (const entry of this.entries) {
            switch (entry.tag) {
                case 'Structure': copy.register(entry.def); break;
                case 'Implements': copy.registerImplements(entry.def); break;
                case 'Data': copy.registerData(entry.def); break;
                case 'Operation': copy.registerOperation(entry.decl); break;
            }
        }
        return copy;
    }
}

type NameNode = TypeExpr & { tag: 'Named' | 'Parametric' };

function dataReferences(expr: TypeExpr, acc: NameNode[] = []): NameNode[] {
    switch (expr.tag) {
        case 'Named':
            acc.push(expr);
            return acc;
        case 'Parametric':
            acc.push(expr);
            expr.args.forEach(a => dataReferences(a, acc));
            return acc;
        case 'NatLit':
            return acc;
        case 'FunctionExpr':
            dataReferences(expr.from, acc);
            return dataReferences(expr.to, acc);
        case 'ProductExpr':
            expr.elements.forEach(e => dataReferences(e, acc));
            return acc;
    }
}
