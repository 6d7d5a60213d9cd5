/**
 * @file errors.ts
 * @description Rendering of checker errors into messages and remediation
 * hints, and the exception type thrown at the loading boundary.
 */

import { CheckError, CandidateFailure } from './types';
import { printType } from './utils';

/**
 * Renders a checker error as a one-paragraph human readable message.
 */
export function formatCheckError(error: CheckError): string {
    switch (error.kind) {
        case 'UnboundOperation':
            return `Unknown operation '${error.operation}' with ${error.arity} argument(s): no loaded structure declares it`;
        case 'NoMatchingImplementation':
            return `No implementation of '${error.operation}' accepts argument types (${error.argTypes.map(printType).join(', ')})`;
        case 'ArityMismatch':
            return `Argument count mismatch for ${error.subject}: expected ${error.expected}, found ${error.found}`;
        case 'DimensionMismatch': {
            const where = error.operation ? ` in '${error.operation}'` : '';
            const param = error.parameter ? ` for parameter '${error.parameter}'` : '';
            const types = error.expectedType && error.foundType
                ? ` (${printType(error.expectedType)} vs ${printType(error.foundType)})`
                : '';
            return `Dimension mismatch${where}${param}: expected ${error.expected}, found ${error.found}${types}`;
        }
        case 'TypeMismatch': {
            const ctx = error.context ? ` in ${error.context}` : '';
            return `Type mismatch${ctx}: cannot unify ${printType(error.left)} with ${printType(error.right)}`;
        }
        case 'OccursCheckFailure':
            return `Occurs check failed: α${error.variable} occurs in ${printType(error.type)} (infinite type)`;
        case 'UnresolvedTypeParameter':
            return error.structure
                ? `Cannot determine parameter '${error.parameter}' of structure '${error.structure}' from the arguments of '${error.operation}'`
                : `Cannot determine type parameter '${error.parameter}' from the arguments of '${error.operation}'`;
        case 'MissingImplementation':
            return `Type '${printType(error.type)}' does not implement structure '${error.structure}', which '${error.operation}' requires`;
        case 'UndeclaredMember':
            return `Implementation '${error.implementation}' defines operation '${error.member}', which structure '${error.structure}' does not declare`;
        case 'CyclicDependency':
            return `Cyclic structure dependency: ${error.path.join(' → ')}`;
        case 'DuplicateName':
            switch (error.what) {
                case 'structure': return `Structure '${error.name}' is already registered`;
                case 'implements': return `Implementation '${error.name}' is already registered`;
                case 'data type': return `Data type '${error.name}' is already registered`;
                case 'operation': return `Operation '${error.name}' is already declared at top level`;
                case 'constructor': return `Constructor '${error.name}' is already declared by data type '${error.owner ?? error.name}'`;
            }
        case 'UnknownStructure':
            return error.referencedBy
                ? `Unknown structure '${error.name}' referenced by '${error.referencedBy}'`
                : `Unknown structure '${error.name}'`;
        case 'ParseError':
            return error.origin ? `Failed to parse ${error.origin}: ${error.message}` : `Parse error: ${error.message}`;
    }
}

/**
 * A remediation hint for the error, when one can be derived from the error
 * payload alone. The driver adds registry-backed hints on top of this.
 */
export function suggestionFor(error: CheckError): string | undefined {
    switch (error.kind) {
        case 'UnboundOperation':
            return error.closest ? `Did you mean '${error.closest}'?` : undefined;
        case 'NoMatchingImplementation':
            return describeFailures(error.reasons);
        case 'DimensionMismatch':
            return error.parameter
                ? `All uses of '${error.parameter}' must have the same value`
                : undefined;
        case 'MissingImplementation':
            return error.available.length > 0
                ? `'${error.structure}' is implemented for: ${error.available.join(', ')}`
                : `No type implements '${error.structure}'`;
        case 'UndeclaredMember':
            return `Declare '${error.member}' in '${error.structure}' or in a structure it extends`;
        case 'UnresolvedTypeParameter':
            return `Add an argument that mentions '${error.parameter}', or give the operation a concrete return type`;
        default:
            return undefined;
    }
}

function describeFailures(reasons: CandidateFailure[]): string | undefined {
    if (reasons.length === 0) return undefined;
    return 'Tried: ' + reasons.map(r => `${r.candidate} (${formatCheckError(r.error)})`).join('; ');
}

/**
 * Thrown when structure definitions cannot be loaded: a source does not
 * parse, a name collides or a definition references something unknown.
 */
export class StructureLoadError extends Error {
    readonly error: CheckError;

    constructor(error: CheckError) {
        super(formatCheckError(error));
        this.name = 'StructureLoadError';
        this.error = error;
    }
}
