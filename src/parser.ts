import * as P from 'parsimmon';
import {
    TopLevel, TypeParam, ParamKind, StructureMember, ImplMember, WhereConstraint, TypeExpr, Expression, DataVariant, DataField,
    QuantifiedVar, Named, Parametric, NatLit, FunctionExpr, ProductExpr, Const, Obj, Placeholder, Op, List, Quantifier
} from './types';
import { StructureLoadError } from './errors';

// Whitespace and `//` line comments
const ignore = P.regexp(/(?:\s|\/\/[^\n]*)*/);

// Helper to create a parser that consumes trailing whitespace and comments
function token<T>(parser: P.Parser<T>): P.Parser<T> {
    return parser.skip(ignore);
}

const sym = (s: string) => token(P.string(s));

const keyword = (word: string) => token(P.string(word).skip(P.notFollowedBy(P.regexp(/[A-Za-z0-9_']/))));

const keywords = ['structure', 'implements', 'data', 'operation', 'element', 'axiom', 'extends', 'over', 'where', 'forall', 'exists'];

const infixOps: Record<string, string> = {
    '+': 'plus',
    '-': 'minus',
    '*': 'times',
    '·': 'times',
    '/': 'divide',
    '^': 'power',
    '=': 'equals',
};

const binary = (ops: string[]) => P.alt(...ops.map(o => sym(o).result(infixOps[o])));

const leftAssoc = (operand: P.Parser<Expression>, ops: string[]) =>
    P.seq(operand, P.seq(binary(ops), operand).many())
        .map(([head, rest]) => rest.reduce<Expression>((acc, [name, rhs]) => Op(name, [acc, rhs]), head));

type Grammar = {
    Program: TopLevel[];
    TopLevel: TopLevel;
    Structure: TopLevel;
    Implements: TopLevel;
    Data: TopLevel;
    Variant: DataVariant;
    Field: DataField;
    TopOperation: TopLevel;
    Params: TypeParam[];
    Param: TypeParam;
    Member: StructureMember;
    Block: StructureMember[];
    ImplMember: ImplMember;
    Constraint: WhereConstraint;
    TypeArgs: TypeExpr[];
    TypeExpr: TypeExpr;
    TypeProduct: TypeExpr;
    TypeAtom: TypeExpr;
    TypeName: string;
    Identifier: string;
    Expr: Expression;
    Quantifier: Expression;
    Binder: QuantifiedVar[];
    Equality: Expression;
    Additive: Expression;
    Multiplicative: Expression;
    Unary: Expression;
    Power: Expression;
    Atom: Expression;
};

const lang = P.createLanguage<Grammar>({
    Program: r => ignore.then(r.TopLevel.many()),

    TopLevel: r => P.alt(r.Structure, r.Implements, r.Data, r.TopOperation),

    Structure: r => P.seq(
        keyword('structure'),
        r.TypeName,
        r.Params.fallback([]),
        keyword('extends').then(r.TypeAtom).atMost(1),
        keyword('over').then(r.TypeAtom).atMost(1),
        r.Block
    ).map(([, name, params, ext, over, members]): TopLevel => ({
        tag: 'Structure',
        def: { name, params, members, extendsClause: ext[0], overClause: over[0] },
    })),

    Implements: r => P.seq(
        keyword('implements'),
        r.TypeName,
        r.TypeArgs.fallback([]),
        keyword('over').then(r.TypeAtom).atMost(1),
        keyword('where').then(r.Constraint.sepBy1(sym(','))).atMost(1),
        r.ImplMember.many().wrap(sym('{'), sym('}'))
    ).map(([, structureName, typeArgs, over, where, members]): TopLevel => ({
        tag: 'Implements',
        def: { structureName, typeArgs, members, overClause: over[0], whereClause: where[0] },
    })),

    Data: r => P.seq(
        keyword('data'),
        r.TypeName,
        r.Params.fallback([]),
        sym('='),
        r.Variant.sepBy1(sym('|'))
    ).skip(sym(';').atMost(1)).map(([, name, params, , variants]): TopLevel => ({
        tag: 'Data',
        def: { name, params, variants },
    })),

    Variant: r => P.seq(r.Identifier, r.Field.sepBy(sym(',')).wrap(sym('('), sym(')')).fallback([]))
        .map(([name, fields]) => ({ name, fields })),

    Field: r => P.alt(
        P.seq(r.Identifier, sym(':'), r.TypeExpr).map(([name, , type]): DataField => ({ name, type })),
        r.TypeExpr.map((type): DataField => ({ type }))
    ),

    TopOperation: r => P.seq(keyword('operation'), r.Identifier, sym(':'), r.TypeExpr)
        .skip(sym(';').atMost(1))
        .map(([, name, , signature]): TopLevel => ({ tag: 'Operation', name, signature })),

    Params: r => r.Param.sepBy(sym(',')).wrap(sym('('), sym(')')),

    Param: r => P.seq(
        r.Identifier,
        sym(':').then(P.alt(keyword('Nat').result<ParamKind>('Nat'), keyword('Type').result<ParamKind>('Type'))).atMost(1)
    ).map(([name, kind]) => ({ name, kind: kind[0] ?? 'Type' })),

    Block: r => r.Member.many().wrap(sym('{'), sym('}')),

    Member: r => P.alt(
        P.seq(keyword('operation'), r.Identifier, sym(':'), r.TypeExpr)
            .map(([, name, , signature]): StructureMember => ({ tag: 'Operation', name, signature })),
        P.seq(keyword('element'), r.Identifier, sym(':'), r.TypeExpr)
            .map(([, name, , type]): StructureMember => ({ tag: 'Element', name, type })),
        P.seq(keyword('axiom'), r.Identifier, sym(':'), r.Expr)
            .map(([, name, , proposition]): StructureMember => ({ tag: 'Axiom', name, proposition })),
        P.seq(keyword('structure'), r.Identifier, sym(':'), r.TypeAtom, r.Block)
            .map(([, name, , structureType, members]): StructureMember => ({ tag: 'NestedStructure', name, structureType, members }))
    ).skip(sym(';').atMost(1)),

    ImplMember: r => P.alt(
        P.seq(keyword('element'), r.Identifier, sym('='), r.Expr)
            .map(([, name, , value]): ImplMember => ({ tag: 'Element', name, value })),
        P.seq(keyword('operation'), r.Identifier, r.Identifier.sepBy(sym(',')).wrap(sym('('), sym(')')), sym('='), r.Expr)
            .map(([, name, params, , body]): ImplMember => ({ tag: 'Operation', name, implementation: { tag: 'Inline', params, body } })),
        P.seq(keyword('operation'), r.Identifier, sym('='), r.Identifier)
            .map(([, name, , builtin]): ImplMember => ({ tag: 'Operation', name, implementation: { tag: 'Builtin', name: builtin } }))
    ).skip(sym(';').atMost(1)),

    Constraint: r => P.seq(r.TypeName, r.TypeArgs)
        .map(([structureName, typeArgs]) => ({ structureName, typeArgs })),

    TypeArgs: r => r.TypeExpr.sepBy(sym(',')).wrap(sym('('), sym(')')),

    // Arrows associate to the right and bind looser than products.
    TypeExpr: r => P.seq(r.TypeProduct, P.alt(sym('→'), sym('->')).then(r.TypeExpr).atMost(1))
        .map(([from, to]) => to.length > 0 ? FunctionExpr(from, to[0]) : from),

    TypeProduct: r => r.TypeAtom.sepBy1(sym('×'))
        .map(elements => elements.length > 1 ? ProductExpr(elements) : elements[0]),

    TypeAtom: r => P.alt(
        token(P.regexp(/[0-9]+/)).map(digits => NatLit(Number(digits))),
        P.seq(r.TypeName, r.TypeArgs).map(([name, args]) => Parametric(name, args)),
        r.TypeName.map(name => Named(name)),
        r.TypeExpr.wrap(sym('('), sym(')'))
    ),

    TypeName: r => P.alt(token(P.regexp(/[ℝℂℤℕ]/)), r.Identifier),

    Identifier: () => token(P.regexp(/[A-Za-z_α-ω][A-Za-z0-9_α-ω']*/))
        .assert(name => !keywords.includes(name), 'identifier'),

    Expr: r => P.alt(r.Quantifier, r.Equality),

    Quantifier: r => P.seq(
        P.alt(sym('∀'), keyword('forall')).result<'forall'>('forall')
            .or(P.alt(sym('∃'), keyword('exists')).result<'exists'>('exists')),
        r.Binder.sepBy1(sym(',')).wrap(sym('('), sym(')')),
        sym('.'),
        r.Expr
    ).map(([quantifier, groups, , body]) => Quantifier(quantifier, groups.flat(), body)),

    // `x y : T` binds both names at T; names without an annotation get fresh types.
    Binder: r => P.seq(r.Identifier.atLeast(1), sym(':').then(r.TypeExpr).atMost(1))
        .map(([names, type]): QuantifiedVar[] => names.map(name => (type.length > 0 ? { name, type: type[0] } : { name }))),

    Equality: r => P.seq(r.Additive, binary(['=']).then(r.Additive).atMost(1))
        .map(([lhs, rhs]) => rhs.length > 0 ? Op('equals', [lhs, rhs[0]]) : lhs),

    Additive: r => leftAssoc(r.Multiplicative, ['+', '-']),

    Multiplicative: r => leftAssoc(r.Unary, ['*', '·', '/']),

    Unary: r => P.alt(
        sym('-').then(r.Unary).map(operand => Op('negate', [operand])),
        r.Power
    ),

    Power: r => P.seq(r.Atom, binary(['^']).then(r.Unary).atMost(1))
        .map(([base, exp]) => exp.length > 0 ? Op('power', [base, exp[0]]) : base),

    Atom: r => P.alt(
        token(P.regexp(/[0-9]+(?:\.[0-9]+)?/)).map(n => Const(n)),
        sym('□').map(() => Placeholder(0)),
        r.Expr.sepBy(sym(',')).wrap(sym('['), sym(']')).map(items => List(items)),
        P.seq(r.Identifier, r.Expr.sepBy(sym(',')).wrap(sym('('), sym(')'))).map(([name, args]) => Op(name, args)),
        r.Identifier.map(name => Obj(name)),
        r.Expr.wrap(sym('('), sym(')'))
    ),
});

/**
 * Gives every placeholder its position, counting from 0 in reading order.
 */
function numberPlaceholders(expr: Expression, counter: { next: number }): Expression {
    switch (expr.tag) {
        case 'Placeholder':
            return Placeholder(counter.next++, expr.hint);
        case 'Operation':
            return Op(expr.name, expr.args.map(a => numberPlaceholders(a, counter)));
        case 'List':
            return List(expr.items.map(i => numberPlaceholders(i, counter)));
        case 'Quantifier':
            return Quantifier(expr.quantifier, expr.variables, numberPlaceholders(expr.body, counter));
        case 'Const':
        case 'Object':
            return expr;
    }
}

function run<T>(parser: P.Parser<T>, source: string, origin?: string): T {
    const result = parser.parse(source);
    if (result.status) return result.value;
    throw new StructureLoadError({ kind: 'ParseError', message: P.formatError(source, result), origin });
}

/**
 * Parses a structure-language source into its top-level definitions.
 * @throws StructureLoadError carrying a `ParseError`.
 */
export function parseProgram(source: string, origin?: string): TopLevel[] {
    return run(lang.Program, source, origin);
}

export function parseTypeExpr(source: string): TypeExpr {
    return run(ignore.then(lang.TypeExpr), source);
}

export function parseExpression(source: string): Expression {
    return numberPlaceholders(run(ignore.then(lang.Expr), source), { next: 0 });
}
