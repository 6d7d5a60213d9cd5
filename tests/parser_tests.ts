/**
 * @file tests/parser_tests.ts
 * @description Tests for the structure-language parser: type expressions,
 * notation expressions and whole definition files.
 */
import { describe, it } from 'node:test';
import { parseProgram, parseTypeExpr, parseExpression } from '../src/parser';
import { StructureLoadError } from '../src/errors';
import { printTypeExpr, printExpression } from '../src/utils';
import { assert, assertEqual } from './utils';

describe("Type expression parsing", () => {

    it("should parse parametric types with dimension literals", () => {
        const t = parseTypeExpr('Matrix(2, n, ℝ)');
        assert(t.tag === 'Parametric' && t.args[0].tag === 'NatLit', "Matrix with a literal row count");
        assertEqual(printTypeExpr(t), 'Matrix(2, n, ℝ)', "round trip");
    });

    it("should make arrows right associative and looser than products", () => {
        const t = parseTypeExpr('A × B → C → D');
        assert(t.tag === 'FunctionExpr' && t.from.tag === 'ProductExpr' && t.to.tag === 'FunctionExpr', "shape");
        assertEqual(printTypeExpr(t), 'A × B → C → D', "printed");
    });

    it("should accept the ASCII arrow and parentheses", () => {
        assertEqual(printTypeExpr(parseTypeExpr('(A -> B) -> C')), '(A → B) → C', "function argument");
    });
});

describe("Expression parsing", () => {

    it("should map infix operators to operation names", () => {
        assertEqual(printExpression(parseExpression('a + b * c')), 'plus(a, times(b, c))', "precedence");
        assertEqual(printExpression(parseExpression('a - b - c')), 'minus(minus(a, b), c)', "left associative");
        assertEqual(printExpression(parseExpression('x / 2 = y')), 'equals(divide(x, 2), y)', "equality loosest");
    });

    it("should parse powers and unary minus", () => {
        assertEqual(printExpression(parseExpression('-x ^ 2')), 'negate(power(x, 2))', "minus binds looser than power");
        assertEqual(printExpression(parseExpression('a ^ b ^ c')), 'power(a, power(b, c))', "right associative");
    });

    it("should parse calls, lists and numbers", () => {
        assertEqual(printExpression(parseExpression('multiply(A, [1, 2.5])')), 'multiply(A, [1, 2.5])', "call with a list");
        assertEqual(printExpression(parseExpression('f()')), 'f()', "no arguments");
    });

    it("should number placeholders in reading order", () => {
        assertEqual(printExpression(parseExpression('einstein(□, □, □)')), 'einstein(□0, □1, □2)', "three placeholders");
        assertEqual(printExpression(parseExpression('plus(f(□), □)')), 'plus(f(□0), □1)', "depth first");
    });

    it("should parse quantifiers with grouped binders", () => {
        const e = parseExpression('∀(x y : T, z). x + y = z');
        assert(e.tag === 'Quantifier', "quantifier");
        if (e.tag !== 'Quantifier') return;
        assertEqual(e.quantifier, 'forall', "kind");
        assertEqual(e.variables.map(v => v.name).join(','), 'x,y,z', "names");
        assertEqual(e.variables.map(v => (v.type ? printTypeExpr(v.type) : '_')).join(','), 'T,T,_', "annotations");
        assertEqual(printExpression(e.body), 'equals(plus(x, y), z)', "body");
        assertEqual(parseExpression('exists(n). n = 0').tag, 'Quantifier', "keyword form");
    });

    it("should skip line comments", () => {
        assertEqual(printExpression(parseExpression('a + // the rest\n b')), 'plus(a, b)', "comment between tokens");
    });
});

describe("Program parsing", () => {

    it("should parse structures with parameters, clauses and members", () => {
        const [item] = parseProgram(`
            // matrices
            structure MatrixAddable(m: Nat, n: Nat, T) extends Base(T) over Field(F) {
                operation matrix_add : Matrix(m, n, T) → Matrix(m, n, T) → Matrix(m, n, T)
                element zero : Matrix(m, n, T)
                axiom commutes : ∀(a b : Matrix(m, n, T)). matrix_add(a, b) = matrix_add(b, a)
            }
        `);
        assert(item.tag === 'Structure', "structure");
        if (item.tag !== 'Structure') return;
        const def = item.def;
        assertEqual(def.name, 'MatrixAddable', "name");
        assertEqual(def.params.map(p => `${p.name}:${p.kind}`).join(','), 'm:Nat,n:Nat,T:Type', "params");
        assertEqual(def.extendsClause ? printTypeExpr(def.extendsClause) : '', 'Base(T)', "extends");
        assertEqual(def.overClause ? printTypeExpr(def.overClause) : '', 'Field(F)', "over");
        assertEqual(def.members.map(m => m.tag).join(','), 'Operation,Element,Axiom', "members");
    });

    it("should parse nested structures", () => {
        const [item] = parseProgram(`structure Ring(R) { structure additive : AbelianGroup(R) { element zero : R } }`);
        assert(item.tag === 'Structure' && item.def.members[0].tag === 'NestedStructure', "nested");
    });

    it("should parse implementations with builtin and inline operations", () => {
        const [item] = parseProgram(`
            implements Numeric(ℝ) over Field(ℝ) where Ordered(ℝ), Equatable(ℝ) {
                element zero = 0
                operation abs = builtin_abs
                operation square(x) = x * x
            }
        `);
        assert(item.tag === 'Implements', "implements");
        if (item.tag !== 'Implements') return;
        const def = item.def;
        assertEqual(def.typeArgs.map(printTypeExpr).join(','), 'ℝ', "type arguments");
        assertEqual((def.whereClause ?? []).map(c => c.structureName).join(','), 'Ordered,Equatable', "where");
        const [zero, abs, square] = def.members;
        assert(zero.tag === 'Element' && printExpression(zero.value) === '0', "element");
        assert(abs.tag === 'Operation' && abs.implementation.tag === 'Builtin' && abs.implementation.name === 'builtin_abs', "builtin");
        assert(square.tag === 'Operation' && square.implementation.tag === 'Inline'
            && printExpression(square.implementation.body) === 'times(x, x)', "inline body");
    });

    it("should parse parameterless structures", () => {
        const [item] = parseProgram(`structure GeneralRelativity { operation einstein : Tensor(0, 2, 4, ℝ) → ℝ }`);
        assert(item.tag === 'Structure' && item.def.params.length === 0, "no parameters");
    });

    it("should parse data declarations with named and positional fields", () => {
        const [option, pair] = parseProgram(`
            data Option(T) = None | Some(value : T)
            data Pair(n: Nat) = MkPair(Vector(n, ℝ), second : ℝ);
        `);
        if (option.tag !== 'Data' || pair.tag !== 'Data') throw new Error('expected data declarations');
        assertEqual(option.def.params.map(p => p.name).join(','), 'T', "parameters");
        assertEqual(option.def.variants.map(v => `${v.name}/${v.fields.length}`).join(','), 'None/0,Some/1', "variants");
        const [first, second] = pair.def.variants[0].fields;
        assertEqual(pair.def.params[0].kind, 'Nat', "dimension parameter");
        assertEqual(first.name ?? '_', '_', "positional");
        assertEqual(printTypeExpr(first.type), 'Vector(n, ℝ)', "positional type");
        assertEqual(`${second.name ?? '_'} : ${printTypeExpr(second.type)}`, 'second : ℝ', "named");
    });

    it("should parse operations declared outside any structure", () => {
        const items = parseProgram(`
            operation sin : ℝ → ℝ
            structure Trig(T) { operation sin : T → T }
        `);
        assertEqual(items.map(i => i.tag).join(','), 'Operation,Structure', "items");
        const [sin] = items;
        assert(sin.tag === 'Operation' && sin.name === 'sin' && printTypeExpr(sin.signature) === 'ℝ → ℝ', "top-level sin");
    });

    it("should reserve the data keyword", () => {
        let caught: unknown;
        try {
            parseProgram('structure data { }');
        } catch (e) {
            caught = e;
        }
        assert(caught instanceof StructureLoadError, "StructureLoadError thrown");
    });

    it("should throw a load error carrying the location on bad input", () => {
        let caught: unknown;
        try {
            parseProgram('structure Broken(T) {\n    operation : T\n}', 'broken.struct');
        } catch (e) {
            caught = e;
        }
        assert(caught instanceof StructureLoadError, "StructureLoadError thrown");
        if (caught instanceof StructureLoadError) {
            assertEqual(caught.error.kind, 'ParseError', "kind");
            assert(caught.message.startsWith('Failed to parse broken.struct: '), caught.message);
            assert(caught.message.includes('operation : T'), caught.message);
        }
    });
});
