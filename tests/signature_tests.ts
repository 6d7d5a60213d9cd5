/**
 * @file tests/signature_tests.ts
 * @description Interpretation of declared signatures against argument types.
 */
import { describe, it } from 'node:test';
import { Candidate, StructureDef, TVar, Scalar, Complex, Int, Matrix, Vector, ListType, Named, FunctionExpr } from '../src/types';
import { emptySubst, applySubst } from '../src/substitution';
import { interpret, interpretSignature, interpretConstructor, matchesInstantiation, splitSignature, signatureArity, InterpretState } from '../src/signature';
import { parseProgram, parseTypeExpr } from '../src/parser';
import { formatCheckError } from '../src/errors';
import { printTypeExpr, printType } from '../src/utils';
import { assert, assertEqual, assertType, unwrap, unwrapErr } from './utils';

function structureFrom(source: string): StructureDef {
    const [item] = parseProgram(source);
    if (item.tag !== 'Structure') throw new Error('expected a structure');
    return item.def;
}

function candidateFor(structure: StructureDef, operation: string, instantiation?: string[]): Candidate {
    const member = structure.members.find(m => m.tag === 'Operation' && m.name === operation);
    if (!member || member.tag !== 'Operation') throw new Error(`no operation ${operation}`);
    return {
        structure,
        operation,
        signature: member.signature,
        source: instantiation ? 'implements' : 'structure',
        instantiation: instantiation?.map(parseTypeExpr),
    };
}

/** Fresh variables start at 100 so they cannot collide with the ones the tests pass in. */
function freshState(): InterpretState {
    let next = 100;
    return { substitution: emptySubst(), freshVar: () => TVar(next++) };
}

const matrices = structureFrom(`
    structure MatrixMultipliable(m: Nat, n: Nat, p: Nat, T) {
        operation multiply : Matrix(m, n, T) → Matrix(n, p, T) → Matrix(m, p, T)
        operation first_row : Matrix(m, n, T) → Vector(n, T)
        operation from_rows : Vector(n, T) × ℝ → Matrix(m, n, T)
    }
`);

describe("Signature splitting", () => {

    it("should split curried arrows into parameters and a return type", () => {
        const parts = splitSignature(parseTypeExpr('A → B → C'));
        assertEqual(parts.params.map(printTypeExpr).join(','), 'A,B', "params");
        assertEqual(printTypeExpr(parts.returns), 'C', "returns");
    });

    it("should spread a product domain into separate parameters", () => {
        assertEqual(signatureArity(parseTypeExpr('A × B → C')), 2, "A × B → C");
        assertEqual(signatureArity(parseTypeExpr('A × B → C → D')), 3, "mixed");
    });

    it("should treat a signature without arrows as nullary", () => {
        assertEqual(signatureArity(parseTypeExpr('Matrix(2, 2, ℝ)')), 0, "constant");
    });
});

describe("Signature interpretation", () => {

    it("should bind dimensions from the first argument and check them in the second", () => {
        const res = unwrap(interpretSignature(candidateFor(matrices, 'multiply'), [Matrix(2, 3), Matrix(3, 4)], freshState()), "multiply");
        assertType(res.type, 'Matrix(2, 4, ℝ)', "result");
    });

    it("should name the conflicting parameter and both argument types", () => {
        const e = unwrapErr(interpretSignature(candidateFor(matrices, 'multiply'), [Matrix(2, 3), Matrix(5, 6)], freshState()), "3 vs 5");
        assert(e.kind === 'DimensionMismatch', `got ${e.kind}`);
        if (e.kind !== 'DimensionMismatch') return;
        assertEqual(e.parameter ?? '', 'n', "parameter");
        assertEqual(e.expected, 3, "expected");
        assertEqual(e.found, 5, "found");
        assertEqual(
            formatCheckError(e),
            "Dimension mismatch in 'multiply' for parameter 'n': expected 3, found 5 (Matrix(3, α102, ℝ) vs Matrix(5, 6, ℝ))",
            "message"
        );
    });

    it("should locate a parameter repeated within one argument", () => {
        const square = structureFrom(`structure Square(k: Nat) { operation det : Matrix(k, k, ℝ) → ℝ }`);
        const e = unwrapErr(interpretSignature(candidateFor(square, 'det'), [Matrix(2, 3)], freshState()), "2×3 is not square");
        assert(e.kind === 'DimensionMismatch' && e.parameter === 'k', `got ${formatCheckError(e)}`);
    });

    it("should return concrete parts of the result even for unknown arguments", () => {
        const res = unwrap(interpretSignature(candidateFor(matrices, 'first_row'), [TVar(0)], freshState()), "first_row(α0)");
        assertType(res.type, 'Vector(α101, α103)', "shape known, sizes open");
        assertType(applySubst(res.substitution, TVar(0)), 'Matrix(α100, α101, α103)', "argument refined");
    });

    it("should accept product-domain signatures", () => {
        const signature = parseTypeExpr('Matrix(m, n, T) × Matrix(n, p, T) → Matrix(m, p, T)');
        const res = unwrap(interpret(matrices, 'multiply', signature, [Matrix(2, 3), Matrix(3, 4)]), "product domain");
        assertType(res, 'Matrix(2, 4, ℝ)', "result");
    });

    it("should report an unresolvable parameter in the return type", () => {
        const e = unwrapErr(interpretSignature(candidateFor(matrices, 'from_rows'), [Vector(3), Scalar()], freshState()), "m unknown");
        assertEqual(formatCheckError(e), "Cannot determine parameter 'm' of structure 'MatrixMultipliable' from the arguments of 'from_rows'", "message");
    });

    it("should reject the wrong number of arguments", () => {
        const e = unwrapErr(interpretSignature(candidateFor(matrices, 'multiply'), [Matrix(2, 3)], freshState()), "one argument");
        assertEqual(formatCheckError(e), "Argument count mismatch for 'multiply' in structure 'MatrixMultipliable': expected 2, found 1", "message");
    });

    it("should reject a non-dimension bound to a Nat parameter", () => {
        const sized = structureFrom(`structure Sized(n: Nat) { operation size : List(n) → ℝ }`);
        const e = unwrapErr(interpretSignature(candidateFor(sized, 'size'), [ListType(Scalar())], freshState()), "ℝ as a size");
        assertEqual(formatCheckError(e), "Type mismatch in dimension parameter 'n' of 'size': cannot unify ℕ with ℝ", "message");
    });

    it("should reject a dimension bound to a Type parameter", () => {
        const wrapper = structureFrom(`structure Wrap(T) { operation first : Vector(T, ℝ) → ℝ }`);
        const e = unwrapErr(interpretSignature(candidateFor(wrapper, 'first'), [Vector(2)], freshState()), "2 as a type");
        assert(e.kind === 'TypeMismatch' && e.context === "type parameter 'T' of 'first'", `got ${formatCheckError(e)}`);
    });

    it("should treat undeclared single-letter names as implicit parameters", () => {
        const space = structureFrom(`structure VectorSpace(V) over Field(F) { operation scale : F → V → V }`);
        const res = unwrap(interpretSignature(candidateFor(space, 'scale'), [Complex(), Vector(2, Complex())], freshState()), "scale");
        assertType(res.type, 'Vector(2, ℂ)', "V bound, F implicit");
    });

    it("should pre-bind structure parameters for implementation candidates", () => {
        const arithmetic = structureFrom(`structure Arithmetic(T) { operation plus : T → T → T }`);
        const real = unwrap(interpretSignature(candidateFor(arithmetic, 'plus', ['ℝ']), [TVar(0), TVar(1)], freshState()), "plus at ℝ");
        assertType(real.type, 'ℝ', "fixed by the implementation");
        assertType(applySubst(real.substitution, TVar(1)), 'ℝ', "arguments follow");
        const e = unwrapErr(interpretSignature(candidateFor(arithmetic, 'plus', ['ℝ']), [Complex(), Complex()], freshState()), "ℂ against ℝ");
        assertEqual(formatCheckError(e), "Type mismatch in argument 1 of 'plus': cannot unify ℝ with ℂ", "message");
    });

    it("should give open implementation arguments their own variables", () => {
        const res = unwrap(
            interpretSignature(candidateFor(matrices, 'multiply', ['m', 'n', 'p', 'ℝ']), [Matrix(2, 3), Matrix(3, 1)], freshState()),
            "implements MatrixMultipliable(m, n, p, ℝ)"
        );
        assertType(res.type, 'Matrix(2, 1, ℝ)', "result");
    });

    it("should rank implementation candidates above generic ones", () => {
        const arithmetic = structureFrom(`structure Arithmetic(T) { operation plus : T → T → T }`);
        const generic = unwrap(interpretSignature(candidateFor(arithmetic, 'plus'), [Scalar(), Scalar()], freshState()), "generic");
        const real = unwrap(interpretSignature(candidateFor(arithmetic, 'plus', ['ℝ']), [Scalar(), Scalar()], freshState()), "at ℝ");
        assertEqual(generic.specificity, 0, "generic");
        assertEqual(real.specificity, 2, "two concrete parameters");
    });

    it("should report the values bound to the structure's parameters", () => {
        const res = unwrap(interpretSignature(candidateFor(matrices, 'multiply'), [Matrix(2, 3), Matrix(3, 4)], freshState()), "multiply");
        assertEqual(res.bindings.map(printType).join(', '), '2, 3, 4, ℝ', "m, n, p, T");
    });

    it("should type top-level signatures without a structure", () => {
        const sin: Candidate = { operation: 'sin', signature: FunctionExpr(Named('ℝ'), Named('ℝ')), source: 'toplevel' };
        const res = unwrap(interpretSignature(sin, [TVar(0)], freshState()), "sin(□)");
        assertType(res.type, 'ℝ', "result");
        assertEqual(res.bindings.length, 0, "no structure parameters");
        const e = unwrapErr(interpretSignature(sin, [], freshState()), "sin()");
        assertEqual(formatCheckError(e), "Argument count mismatch for top-level operation 'sin': expected 1, found 0", "message");
    });

    it("should leave the caller's substitution untouched", () => {
        const state = freshState();
        unwrap(interpretSignature(candidateFor(matrices, 'first_row'), [TVar(0)], state), "first_row");
        assertEqual(state.substitution.size, 0, "nothing committed");
    });
});

describe("Constructors and implementation matching", () => {
    const [optionItem] = parseProgram(`data Option(T) = None | Some(value : T)`);
    if (optionItem.tag !== 'Data') throw new Error('expected a data type');
    const option = optionItem.def;
    const [none, some] = option.variants;

    it("should instantiate the data type's parameters per use", () => {
        const filled = unwrap(interpretConstructor(option, some, [Complex()], freshState()), "Some(z)");
        assertType(filled.type, 'Option(ℂ)', "Some(z)");
        const empty = unwrap(interpretConstructor(option, none, [], freshState()), "None");
        assertType(empty.type, 'Option(α100)', "None");
    });

    it("should reject constructor arguments of the wrong number", () => {
        const e = unwrapErr(interpretConstructor(option, none, [Scalar()], freshState()), "None(1)");
        assertEqual(formatCheckError(e), "Argument count mismatch for constructor 'None' of data type 'Option': expected 0, found 1", "message");
    });

    it("should match parameter values against implementation arguments", () => {
        const square = ['k', 'k', 'ℝ'].map(parseTypeExpr);
        assert(matchesInstantiation(square, [TVar(0), TVar(0), Scalar()]), "open values");
        assert(matchesInstantiation(square, [Matrix(2, 2).args[0], Matrix(2, 2).args[1], Scalar()]), "equal sizes");
        assert(!matchesInstantiation(square, [Matrix(2, 3).args[0], Matrix(2, 3).args[1], Scalar()]), "different sizes");
        assert(!matchesInstantiation(['ℤ'].map(parseTypeExpr), [Scalar()]), "ℝ is not ℤ");
        assert(matchesInstantiation(['ℤ'].map(parseTypeExpr), [Int()]), "ℤ");
        assert(!matchesInstantiation(square, [Scalar()]), "argument count");
    });
});
