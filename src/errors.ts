// src/errors.ts
// Error types raised by slatelog. Only programmer errors are thrown;
// everything reached at log time degrades to a line instead.

export class SlatelogError extends Error {
    readonly code: string;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'SlatelogError';
        this.code = code;
    }
}

/** A broken construction-time contract (bad bracket pair, mismatched lookup table). */
export class PreconditionError extends SlatelogError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'PRECONDITION', options);
        this.name = 'PreconditionError';
    }
}

/** Throw a `PreconditionError` unless `condition` holds. */
export function precondition(condition: boolean, message: string): asserts condition {
    if (!condition) throw new PreconditionError(message);
}

/** Extract a message string from an unknown thrown value. */
export function errorMessage(value: unknown): string {
    if (value instanceof Error) return value.message;
    if (value == null) return 'Unknown error';
    return String(value);
}
