/**
 * @file config.ts
 * @description Checker configuration: dispatch policy, the structures whose
 * operations need an implementation at the argument types, and the location
 * and load order of the bundled standard library.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * How the driver picks among several candidate signatures that all accept
 * the argument types.
 * - `first-match`: the first candidate in registration order.
 * - `most-specific`: the candidate whose parameter types carry the most
 *   concrete constructors; registration order breaks ties.
 */
export type DispatchPolicy = 'first-match' | 'most-specific';

export interface CheckerOptions {
    dispatch: DispatchPolicy;
    /**
     * Structures whose declared operations only accept argument types with a
     * registered implementation (`less_than` on matrices is rejected unless
     * something implements `Ordered` for them).
     */
    requireImplementation: readonly string[];
    stdlibDir: string;
    stdlibFiles: readonly string[];
}

export const DEFAULT_STDLIB_FILES: readonly string[] = [
    'types.struct',
    'algebra.struct',
    'matrices.struct',
    'tensors.struct',
];

// `stdlib/` sits at the package root, one level above `src/` and two above `dist/src/`.
function bundledStdlibDir(): string {
    const candidates = [path.resolve(__dirname, '..', 'stdlib'), path.resolve(__dirname, '..', '..', 'stdlib')];
    return candidates.find(dir => fs.existsSync(dir)) ?? candidates[0];
}

export const defaultOptions: CheckerOptions = {
    dispatch: 'first-match',
    requireImplementation: ['Ordered'],
    stdlibDir: bundledStdlibDir(),
    stdlibFiles: DEFAULT_STDLIB_FILES,
};

export function resolveOptions(overrides: Partial<CheckerOptions> = {}): CheckerOptions {
    const resolved: CheckerOptions = { ...defaultOptions };
    if (overrides.dispatch !== undefined) {
        if (overrides.dispatch !== 'first-match' && overrides.dispatch !== 'most-specific') {
            throw new Error(`Unknown dispatch policy: ${String(overrides.dispatch)}`);
        }
        resolved.dispatch = overrides.dispatch;
    }
    if (overrides.requireImplementation !== undefined) {
        const invalid = overrides.requireImplementation.find(name => typeof name !== 'string' || name.length === 0);
        if (invalid !== undefined) throw new Error(`Invalid structure name in requireImplementation: ${JSON.stringify(invalid)}`);
        resolved.requireImplementation = [...overrides.requireImplementation];
    }
    if (overrides.stdlibDir !== undefined) resolved.stdlibDir = path.resolve(overrides.stdlibDir);
    if (overrides.stdlibFiles !== undefined) resolved.stdlibFiles = [...overrides.stdlibFiles];
    return resolved;
}
