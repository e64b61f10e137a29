// src/redact.ts
// Header-name redaction for HTTP traces.

/* ---------------------------------- Types ---------------------------------- */

/** Token written in place of a redacted header value. */
export const HEADER_MASK = '██';

/* ------------------------------ Redaction list ----------------------------- */

/**
 * Append-only list of header names whose values are masked in traces.
 * Names are matched case-insensitively. There is no removal: once redacted, always redacted.
 */
export class HeaderRedactions {
    private readonly names: string[] = [];
    private readonly lowered = new Set<string>();

    constructor(readonly mask: string = HEADER_MASK) {}

    /** Add a header name. Repeats are kept as given. */
    redact(name: string): void {
        this.names.push(name);
        this.lowered.add(name.toLowerCase());
    }

    /** Case-insensitive membership. */
    has(name: string): boolean {
        return this.lowered.has(name.toLowerCase());
    }

    /** `value`, or the mask when `name` is redacted. */
    apply(name: string, value: string): string {
        return this.has(name) ? this.mask : value;
    }

    /** Names in the order they were added. */
    list(): readonly string[] {
        return [...this.names];
    }
}

/** Process-wide redactions: empty at start, grows for the life of the process. */
export const sharedRedactions = new HeaderRedactions();

