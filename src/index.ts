export * from './types';
export { applySubst, composeSubst, emptySubst, singletonSubst, freeTypeVars, occursIn, isGround, typesEqual } from './substitution';
export { unify, unifyMany } from './unification';
export type { UnifyResult } from './unification';
export { StructureRegistry, collectOperations, implementationKey, implementationLabel } from './registry';
export type { OperationDecl, Instantiation } from './registry';
export {
    interpret, interpretSignature, interpretConstructor, matchesInstantiation, splitSignature, signatureArity, resolveTypeExpr, BUILTIN_TYPES
} from './signature';
export type { InterpretState, Interpretation, SignatureParts } from './signature';
export { promotionGraph, commonSupertype, promoteArguments, PROMOTION_STRUCTURE } from './promotion';
export type { PromotionGraph } from './promotion';
export { inferType, checkExpression, describeCandidate, MATRIX_CONSTRUCTORS } from './inference';
export type { InferResult } from './inference';
export { InferenceSession, setFlag, getFlag, resetFlags, setDebugVerbose, getDebugVerbose } from './state';
export type { FlagName } from './state';
export { defaultOptions, resolveOptions, DEFAULT_STDLIB_FILES } from './config';
export type { CheckerOptions, DispatchPolicy } from './config';
export { parseProgram, parseTypeExpr, parseExpression } from './parser';
export { readStandardLibrary, readStructureFile } from './stdlib';
export type { LoadedSource } from './stdlib';
export { formatCheckError, suggestionFor, StructureLoadError } from './errors';
export { printType, printTypeExpr, printExpression } from './utils';
export { TypeChecker } from './checker';
