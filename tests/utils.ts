/**
 * @file tests/utils.ts
 * @description Utility functions for running tests.
 */

import { Type, TypeCheckResult, CheckError } from '../src/types';
import { printType } from '../src/utils';
import { TypeChecker } from '../src/checker';

// Helper function to assert equality for test cases
export function assertEqual<T extends string | number | boolean>(actual: T, expected: T, message: string) {
    if (actual !== expected) {
        throw new Error(`Assertion Failed: ${message}\nExpected: ${expected}\nActual:   ${actual}`);
    }
}

export function assert(condition: boolean, message: string) {
    if (!condition) {
        throw new Error(`Assertion Failed: ${message}`);
    }
}

/** Compares types through their printed form, so variable ids must match too. */
export function assertType(actual: Type, expected: Type | string, message: string) {
    assertEqual(printType(actual), typeof expected === 'string' ? expected : printType(expected), message);
}

export function expectSuccess(result: TypeCheckResult): Type {
    if (result.tag !== 'Success') {
        throw new Error(`Expected Success, got ${result.tag}${result.tag === 'Error' ? `: ${result.message}` : ''}`);
    }
    return result.type;
}

export function expectError(result: TypeCheckResult): CheckError {
    if (result.tag !== 'Error') {
        throw new Error(`Expected Error, got ${result.tag}`);
    }
    return result.error;
}

export function expectPolymorphic(result: TypeCheckResult): { typeVar: Type, availableTypes: string[] } {
    if (result.tag !== 'Polymorphic') {
        throw new Error(`Expected Polymorphic, got ${result.tag}${result.tag === 'Error' ? `: ${result.message}` : ''}`);
    }
    return result;
}

export function unwrap<T, E>(result: { ok: true, value: T } | { ok: false, error: E }, message: string): T {
    if (!result.ok) throw new Error(`${message}: ${JSON.stringify(result.error)}`);
    return result.value;
}

export function unwrapErr<T, E>(result: { ok: true, value: T } | { ok: false, error: E }, message: string): E {
    if (result.ok) throw new Error(`${message}: expected failure`);
    return result.error;
}

let shared: TypeChecker | undefined;

/** One standard-library checker per test process; tests that load more use `fork()`. */
export function stdlibChecker(): TypeChecker {
    shared ??= TypeChecker.withStandardLibrary();
    return shared;
}
