// src/threshold.ts
// Minimum-severity gate shared by loggers.
// - One process-wide instance (`sharedThreshold`) unless a logger is given its own.
// - Read on every call, never cached by loggers.
// - Scoped overrides restore in finally / Promise.finally.

import { Severity } from './types';
import { parseSeverity } from './severity';

export type EnvBag = Record<string, string | undefined>;

/* ------------------------------- Env helpers ------------------------------- */

/** `process.env` when running on Node, else undefined. */
export function processEnv(): EnvBag | undefined {
    return typeof process !== 'undefined' ? process.env : undefined;
}

/**
 * Resolve the minimum severity in the following order:
 * 1) Explicit `level`
 * 2) `DEBUG_MODE=1|true|yes|on` → Trace
 * 3) `LOG_LEVEL=<trace|debug|info|notice|warn|warning|error|fault|0..6>`
 * 4) `NODE_ENV=production` → `prodDefault` (default Info), else Trace
 */
export function resolveThreshold(
    env?: EnvBag,
    explicit?: Severity | null,
    prodDefault: Severity = Severity.Info,
): Severity {
    // 1) explicit
    if (explicit != null) return explicit;

    // 2) DEBUG_MODE
    const dm = env?.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return Severity.Trace;

    // 3) LOG_LEVEL
    const level = parseSeverity(env?.LOG_LEVEL);
    if (level != null) return level;

    // 4) NODE_ENV
    return env?.NODE_ENV?.trim().toLowerCase() === 'production' ? prodDefault : Severity.Trace;
}

/* -------------------------------- Threshold -------------------------------- */

/** Any object with a `then` method, native Promise or not. */
function isThenable<T>(v: T | PromiseLike<T>): v is PromiseLike<T> {
    return typeof v === 'object' && v !== null && typeof (v as { then?: unknown }).then === 'function';
}

type LevelToken = { token: symbol; level: Severity };

export class SeverityThreshold {
    private base: Severity;
    private overrides: LevelToken[] = [];

    constructor(level: Severity = Severity.Trace) {
        this.base = level;
    }

    /** Effective minimum: the latest override, or the base level. */
    get level(): Severity {
        const top = this.overrides[this.overrides.length - 1];
        return top ? top.level : this.base;
    }

    /** True when a line at `severity` passes the gate. */
    allows(severity: Severity): boolean {
        return severity >= this.level;
    }

    /**
     * Set the base minimum. Returns true if it changed.
     * Active `withLevel` scopes still take precedence until they end.
     */
    setLevel(level: Severity): boolean {
        if (this.base === level) return false;
        this.base = level;
        return true;
    }

    /**
     * Run `fn` under `level`, then restore the previous effective level.
     * Nesting is LIFO. Works with sync & async functions.
     */
    withLevel<T>(level: Severity, fn: () => PromiseLike<T>): Promise<T>;
    withLevel<T>(level: Severity, fn: () => T): T;
    withLevel<T>(level: Severity, fn: () => T | PromiseLike<T>): T | Promise<T> {
        const token = Symbol('lvl');
        this.overrides.push({ token, level });
        const dispose = () => {
            const idx = this.overrides.findIndex(o => o.token === token);
            if (idx >= 0) this.overrides.splice(idx, 1);
        };

        try {
            const r = fn();
            if (isThenable(r)) {
                const pending: PromiseLike<T> = r;
                return new Promise<T>((resolve, reject) => {
                    pending.then(
                        value => { dispose(); resolve(value); },
                        err => { dispose(); reject(err); },
                    );
                });
            }
            dispose();
            return r;
        } catch (e) { dispose(); throw e; }
    }
}

/** Process-wide threshold, resolved once from the environment at load. */
export const sharedThreshold = new SeverityThreshold(resolveThreshold(processEnv()));
