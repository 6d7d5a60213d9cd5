/**
 * @file state.ts
 * @description Debug flags and verbose logging, and the per-call inference
 * session: fresh type variables, the accumulating substitution and the
 * identifier environment.
 */

import { Type, TypeEnv, Substitution, TVar } from './types';
import { applySubst, emptySubst, freeTypeVars } from './substitution';
import { printType } from './utils';

// Global Flags
const flags = {
    traceCandidates: false,
    traceSubstitution: false,
};

export type FlagName = keyof typeof flags;

export function setFlag(name: FlagName, value: boolean) {
    if (name in flags) {
        flags[name] = value;
    } else {
        console.warn(`Attempted to set unknown flag: ${name}`);
    }
}

export function getFlag(name: FlagName): boolean {
    return flags[name] ?? false;
}

export function resetFlags() {
    flags.traceCandidates = false;
    flags.traceSubstitution = false;
}

// Debugging Utilities
let _debug_verbose_flag = false;

export function setDebugVerbose(value: boolean): void {
    _debug_verbose_flag = value;
}

export function getDebugVerbose(): boolean {
    return _debug_verbose_flag;
}

export function consoleLog(message?: unknown, ...optionalParams: unknown[]): void {
    if (_debug_verbose_flag) {
        console.log("[VERBOSE]", message, ...optionalParams);
    }
}

/**
 * State owned by one top-level `check` / `infer` call. Nothing here is shared
 * between calls: each call creates its own session and drops it at the end.
 */
export class InferenceSession {
    private nextVarId = 0;
    private subst: Substitution = emptySubst();
    private readonly env: Map<string, Type>;
    private readonly visited: string[] = [];

    constructor(context?: TypeEnv) {
        this.env = new Map(context ?? []);
        // Variables supplied by the caller keep their ids; fresh ones start above them.
        for (const type of this.env.values()) {
            for (const id of freeTypeVars(type)) this.nextVarId = Math.max(this.nextVarId, id + 1);
        }
    }

    freshVar(): Type & { tag: 'Var' } {
        return TVar(this.nextVarId++);
    }

    get substitution(): Substitution {
        return this.subst;
    }

    /**
     * Replaces the session substitution. Only the driver calls this, with a
     * substitution that extends the current one.
     */
    commit(next: Substitution): void {
        if (getFlag('traceSubstitution')) {
            const shown = [...next].map(([id, t]) => `α${id} := ${printType(t)}`).join(', ');
            consoleLog(`[Session] substitution {${shown}}`);
        }
        this.subst = next;
    }

    apply(type: Type): Type {
        return applySubst(this.subst, type);
    }

    lookup(name: string): Type | undefined {
        return this.env.get(name);
    }

    bind(name: string, type: Type): void {
        this.env.set(name, type);
    }

    unbind(name: string, previous: Type | undefined): void {
        if (previous === undefined) this.env.delete(name);
        else this.env.set(name, previous);
    }

    recordOperation(name: string): void {
        if (!this.visited.includes(name)) this.visited.push(name);
    }

    get operationsVisited(): readonly string[] {
        return this.visited;
    }
}
