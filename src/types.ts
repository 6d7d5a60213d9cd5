/**
 * @file types.ts
 * @description Defines the core data structures of the checker: types, type
 * expressions, notation expressions, structure and implementation definitions,
 * and the result shapes shared by every module.
 */

// Types

export type Type =
    | { tag: 'Var', id: number }
    | { tag: 'Data', typeName: string, constructor: string, args: Type[] }
    | { tag: 'NatValue', value: number }
    | { tag: 'Function', domain: Type, codomain: Type }
    | { tag: 'Product', elements: Type[] }
    | { tag: 'String' };

export type TypeTag = Type['tag'];

export const TVar = (id: number): Type & { tag: 'Var' } => ({ tag: 'Var', id });

export const Data = (typeName: string, constructor: string, args: Type[] = []): Type & { tag: 'Data' } =>
    ({ tag: 'Data', typeName, constructor, args });

export const NatValue = (value: number): Type & { tag: 'NatValue' } => {
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`NatValue requires a natural number, got ${value}`);
    }
    return { tag: 'NatValue', value };
};

export const FunctionType = (domain: Type, codomain: Type): Type & { tag: 'Function' } =>
    ({ tag: 'Function', domain, codomain });

export const Product = (elements: Type[]): Type & { tag: 'Product' } => ({ tag: 'Product', elements });

export const StringType = (): Type & { tag: 'String' } => ({ tag: 'String' });

// Built-in scalar types live under the 'Type' family, like any other data type.
export const Scalar = (): Type & { tag: 'Data' } => Data('Type', 'Scalar');
export const Complex = (): Type & { tag: 'Data' } => Data('Type', 'Complex');
export const Int = (): Type & { tag: 'Data' } => Data('Type', 'Int');
export const Nat = (): Type & { tag: 'Data' } => Data('Type', 'Nat');
export const Bool = (): Type & { tag: 'Data' } => Data('Type', 'Bool');

export const Matrix = (rows: Type | number, cols: Type | number, elem: Type = Scalar()): Type & { tag: 'Data' } =>
    Data('Matrix', 'Matrix', [dimension(rows), dimension(cols), elem]);

export const Vector = (size: Type | number, elem: Type = Scalar()): Type & { tag: 'Data' } =>
    Data('Vector', 'Vector', [dimension(size), elem]);

export const Tensor = (upper: Type | number, lower: Type | number, dim: Type | number, elem: Type = Scalar()): Type & { tag: 'Data' } =>
    Data('Tensor', 'Tensor', [dimension(upper), dimension(lower), dimension(dim), elem]);

export const ListType = (elem: Type): Type & { tag: 'Data' } => Data('List', 'List', [elem]);

function dimension(d: Type | number): Type {
    return typeof d === 'number' ? NatValue(d) : d;
}

/**
 * A finite mapping from type-variable id to type. Kept idempotent: no bound
 * variable appears inside any binding's value.
 */
export type Substitution = ReadonlyMap<number, Type>;

// Type expressions (unresolved syntax inside structure definitions)

export type TypeExpr =
    | { tag: 'Named', name: string }
    | { tag: 'Parametric', name: string, args: TypeExpr[] }
    | { tag: 'NatLit', value: number }
    | { tag: 'FunctionExpr', from: TypeExpr, to: TypeExpr }
    | { tag: 'ProductExpr', elements: TypeExpr[] };

export const Named = (name: string): TypeExpr & { tag: 'Named' } => ({ tag: 'Named', name });
export const Parametric = (name: string, args: TypeExpr[]): TypeExpr & { tag: 'Parametric' } => ({ tag: 'Parametric', name, args });
export const NatLit = (value: number): TypeExpr & { tag: 'NatLit' } => ({ tag: 'NatLit', value });
export const FunctionExpr = (from: TypeExpr, to: TypeExpr): TypeExpr & { tag: 'FunctionExpr' } => ({ tag: 'FunctionExpr', from, to });
export const ProductExpr = (elements: TypeExpr[]): TypeExpr & { tag: 'ProductExpr' } => ({ tag: 'ProductExpr', elements });

// Notation expressions (produced by the editor / parser collaborators)

export interface QuantifiedVar {
    name: string;
    type?: TypeExpr;
}

export type Expression =
    | { tag: 'Const', value: string }
    | { tag: 'Object', name: string }
    | { tag: 'Placeholder', id: number, hint: string }
    | { tag: 'Operation', name: string, args: Expression[] }
    | { tag: 'List', items: Expression[] }
    | { tag: 'Quantifier', quantifier: 'forall' | 'exists', variables: QuantifiedVar[], body: Expression };

export const Const = (value: string | number): Expression & { tag: 'Const' } => ({ tag: 'Const', value: String(value) });
export const Obj = (name: string): Expression & { tag: 'Object' } => ({ tag: 'Object', name });
export const Placeholder = (id: number, hint: string = ''): Expression & { tag: 'Placeholder' } => ({ tag: 'Placeholder', id, hint });
export const Op = (name: string, args: Expression[] = []): Expression & { tag: 'Operation' } => ({ tag: 'Operation', name, args });
export const List = (items: Expression[]): Expression & { tag: 'List' } => ({ tag: 'List', items });
export const Quantifier = (quantifier: 'forall' | 'exists', variables: QuantifiedVar[], body: Expression): Expression & { tag: 'Quantifier' } =>
    ({ tag: 'Quantifier', quantifier, variables, body });

// Structures and implementations

export type ParamKind = 'Type' | 'Nat';

export interface TypeParam {
    name: string;
    kind: ParamKind;
}

export type StructureMember =
    | { tag: 'Operation', name: string, signature: TypeExpr }
    | { tag: 'Element', name: string, type: TypeExpr }
    | { tag: 'Axiom', name: string, proposition: Expression }
    | { tag: 'NestedStructure', name: string, structureType: TypeExpr, members: StructureMember[] };

export interface StructureDef {
    readonly name: string;
    readonly params: readonly TypeParam[];
    readonly members: readonly StructureMember[];
    readonly extendsClause?: TypeExpr;
    readonly overClause?: TypeExpr;
}

export type Implementation =
    | { tag: 'Builtin', name: string }
    | { tag: 'Inline', params: string[], body: Expression };

export type ImplMember =
    | { tag: 'Element', name: string, value: Expression }
    | { tag: 'Operation', name: string, implementation: Implementation };

export interface WhereConstraint {
    structureName: string;
    typeArgs: TypeExpr[];
}

export interface ImplementsDef {
    readonly structureName: string;
    readonly typeArgs: readonly TypeExpr[];
    readonly members: readonly ImplMember[];
    readonly overClause?: TypeExpr;
    readonly whereClause?: readonly WhereConstraint[];
}

// Data types

export interface DataField {
    /** Absent for positional fields. */
    name?: string;
    type: TypeExpr;
}

export interface DataVariant {
    name: string;
    fields: DataField[];
}

/** `data Option(T) = None | Some(value : T)` */
export interface DataDef {
    readonly name: string;
    readonly params: readonly TypeParam[];
    readonly variants: readonly DataVariant[];
}

export type TopLevel =
    | { tag: 'Structure', def: StructureDef }
    | { tag: 'Implements', def: ImplementsDef }
    | { tag: 'Data', def: DataDef }
    | { tag: 'Operation', name: string, signature: TypeExpr };

/**
 * An operation signature as found in the registry, together with the structure
 * that owns it. `instantiation` is present when the candidate comes from an
 * `implements` block and fixes the structure's parameters to its type arguments;
 * for an operation inherited through `extends`, those are the arguments the
 * ancestor receives. Top-level operations have no structure.
 */
export interface Candidate {
    structure?: StructureDef;
    operation: string;
    signature: TypeExpr;
    source: 'structure' | 'implements' | 'toplevel';
    instantiation?: readonly TypeExpr[];
    /** The implementation a candidate comes from, as `Group(ℤ)`. */
    implementedBy?: string;
}

// Results

export type Result<T, E> = { ok: true, value: T } | { ok: false, error: E };

export const ok = <T>(value: T): { ok: true, value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false, error: E } => ({ ok: false, error });

export type CheckError =
    | { kind: 'UnboundOperation', operation: string, arity: number, closest?: string }
    | { kind: 'NoMatchingImplementation', operation: string, argTypes: Type[], reasons: CandidateFailure[] }
    | { kind: 'ArityMismatch', subject: string, expected: number, found: number }
    | { kind: 'DimensionMismatch', expected: number, found: number, parameter?: string, operation?: string, expectedType?: Type, foundType?: Type }
    | { kind: 'TypeMismatch', left: Type, right: Type, context?: string }
    | { kind: 'OccursCheckFailure', variable: number, type: Type }
    | { kind: 'UnresolvedTypeParameter', operation: string, structure?: string, parameter: string }
    | { kind: 'MissingImplementation', structure: string, operation: string, type: Type, available: string[] }
    | { kind: 'UndeclaredMember', implementation: string, member: string, structure: string }
    | { kind: 'CyclicDependency', path: string[] }
    | { kind: 'DuplicateName', name: string, what: 'structure' | 'implements' | 'data type' | 'constructor' | 'operation', owner?: string }
    | { kind: 'UnknownStructure', name: string, referencedBy?: string }
    | { kind: 'ParseError', message: string, origin?: string };

export type CheckErrorKind = CheckError['kind'];

export interface CandidateFailure {
    candidate: string;
    error: CheckError;
}

export type TypeCheckResult =
    | { tag: 'Success', type: Type }
    | { tag: 'Error', message: string, suggestion?: string, error: CheckError }
    | { tag: 'Polymorphic', typeVar: Type, availableTypes: string[] };

/** Identifier environment: names of free objects mapped to their types. */
export type TypeEnv = ReadonlyMap<string, Type>;
