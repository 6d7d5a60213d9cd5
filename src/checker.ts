/**
 * @file checker.ts
 * @description The public entry point: a registry of structures plus the
 * options that drive dispatch, with loading and checking on top.
 */

import {
    Type, Expression, TypeEnv, TopLevel, TypeCheckResult, ImplementsDef, StructureMember, CheckError,
    Result, ok, err
} from './types';
import { StructureRegistry } from './registry';
import { CheckerOptions, resolveOptions } from './config';
import { checkExpression, inferType } from './inference';
import { InferenceSession, consoleLog } from './state';
import { parseProgram } from './parser';
import { readStandardLibrary, readStructureFile } from './stdlib';
import { StructureLoadError, formatCheckError } from './errors';

function elementNames(members: readonly StructureMember[], acc: string[] = []): string[] {
    for (const m of members) {
        if (m.tag === 'Element') acc.push(m.name);
        else if (m.tag === 'NestedStructure') elementNames(m.members, acc);
    }
    return acc;
}

function unwrapLoad<T>(res: Result<T, CheckError>): T {
    if (!res.ok) throw new StructureLoadError(res.error);
    return res.value;
}

/** Data types named with the wrong number of arguments anywhere in the batch. */
function checkDataArity(registry: StructureRegistry, items: readonly TopLevel[]): void {
    for (const item of items) {
        switch (item.tag) {
            case 'Structure':
                for (const op of registry.operationsOf(item.def.name)) {
                    unwrapLoad(registry.checkDataArity(op.signature, `'${op.name}' in structure '${item.def.name}'`));
                }
                break;
            case 'Operation':
                unwrapLoad(registry.checkDataArity(item.signature, `top-level operation '${item.name}'`));
                break;
            case 'Data':
                for (const variant of item.def.variants) {
                    for (const field of variant.fields) {
                        unwrapLoad(registry.checkDataArity(field.type, `constructor '${variant.name}'`));
                    }
                }
                break;
            case 'Implements':
                break;
        }
    }
}

/**
 * Element bindings in an implementation that no structure in its dependency
 * closure declares are kept, with a warning.
 */
function warnUnknownElements(registry: StructureRegistry, def: ImplementsDef, origin: string): void {
    const closure = registry.dependencyClosure(def.structureName);
    const declared = closure.ok ? closure.value.flatMap(s => elementNames(s.members)) : [];
    for (const member of def.members) {
        if (member.tag === 'Element' && !declared.includes(member.name)) {
            console.warn(`Warning: ${origin}: element '${member.name}' is not declared by structure '${def.structureName}'`);
        }
    }
}

export class TypeChecker {
    readonly options: CheckerOptions;
    private registry: StructureRegistry;

    constructor(options: Partial<CheckerOptions> = {}, registry: StructureRegistry = new StructureRegistry()) {
        this.options = resolveOptions(options);
        this.registry = registry;
    }

    /**
     * A checker with every bundled standard-library file loaded.
     * @throws StructureLoadError when a file does not parse or a definition is rejected.
     */
    static withStandardLibrary(options: Partial<CheckerOptions> = {}): TypeChecker {
        const checker = new TypeChecker(options);
        for (const { origin, items } of readStandardLibrary(checker.options)) {
            checker.load(items, origin);
        }
        return checker;
    }

    get structures(): StructureRegistry {
        return this.registry;
    }

    /**
     * Registers data types, structures, top-level operations and
     * implementations, given as source text or as parsed definitions. Either
     * every definition is registered or none is.
     *
     * Definitions other than implementations go in first, so a structure may
     * refer to one defined later in the same batch, and an implementation may
     * precede the structure it implements. Implementations are registered last,
     * once every structure's dependency closure is known to be complete.
     * @returns The number of definitions registered.
     * @throws StructureLoadError
     */
    load(source: string | readonly TopLevel[], origin: string = '<input>'): number {
        const items = typeof source === 'string' ? parseProgram(source, origin) : source;
        const next = this.registry.clone();

        for (const item of items) {
            switch (item.tag) {
                case 'Data': unwrapLoad(next.registerData(item.def)); break;
                case 'Structure': unwrapLoad(next.register(item.def)); break;
                case 'Operation': unwrapLoad(next.registerOperation({ name: item.name, signature: item.signature })); break;
                case 'Implements': break;
            }
        }
        for (const item of items) {
            if (item.tag === 'Structure') unwrapLoad(next.dependencyClosure(item.def.name));
        }
        checkDataArity(next, items);
        for (const item of items) {
            if (item.tag !== 'Implements') continue;
            unwrapLoad(next.registerImplements(item.def));
            warnUnknownElements(next, item.def, origin);
        }

        this.registry = next;
        consoleLog(`[Checker] loaded ${items.length} definitions from ${origin}`);
        return items.length;
    }

    /**
     * @throws StructureLoadError
     */
    loadFile(filePath: string): number {
        const { origin, items } = readStructureFile(filePath);
        return this.load(items, origin);
    }

    check(expr: Expression, context?: TypeEnv): TypeCheckResult {
        return checkExpression(expr, this.registry, this.options, context);
    }

    /**
     * The inferred type of `expr`, which may still contain type variables.
     */
    infer(expr: Expression, context?: TypeEnv): Result<Type, string> {
        const session = new InferenceSession(context);
        const res = inferType(expr, session, this.registry, this.options);
        return res.ok ? ok(session.apply(res.value)) : err(formatCheckError(res.error));
    }

    typesSupporting(opName: string): string[] {
        return this.registry.typesSupporting(opName);
    }

    /**
     * A checker over a snapshot of this one's registry. Definitions loaded
     * into either afterwards are not seen by the other.
     */
    fork(): TypeChecker {
        return new TypeChecker(this.options, this.registry.clone());
    }
}
