/**
 * @file stdlib.ts
 * @description Locates and parses the bundled structure definitions: scalar
 * arithmetic, the algebraic hierarchy, matrices and tensors.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TopLevel } from './types';
import { CheckerOptions } from './config';
import { parseProgram } from './parser';
import { consoleLog } from './state';

export interface LoadedSource {
    origin: string;
    items: TopLevel[];
}

export function readStructureFile(filePath: string): LoadedSource {
    const origin = path.basename(filePath);
    const items = parseProgram(fs.readFileSync(filePath, 'utf8'), origin);
    consoleLog(`[Stdlib] parsed ${origin}: ${items.length} definitions`);
    return { origin, items };
}

/**
 * Parses every standard-library file named by `options`, in order.
 * @throws StructureLoadError when a file does not parse.
 */
export function readStandardLibrary(options: CheckerOptions): LoadedSource[] {
    return options.stdlibFiles.map(file => readStructureFile(path.join(options.stdlibDir, file)));
}
