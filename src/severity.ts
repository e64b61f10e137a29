// src/severity.ts
// Per-severity display data and lookups.

import { precondition } from './errors';
import { Severity, type SeverityName } from './types';

/* ---------------------------------- Tables --------------------------------- */

/** Every severity, in ordinal order. */
export const SEVERITIES: readonly Severity[] = Object.freeze(
    Object.values(Severity).filter((v): v is Severity => typeof v === 'number')
);

/** Display names, indexed by ordinal. */
export const SEVERITY_NAMES: readonly string[] = Object.freeze([
    'Trace', 'Debug', 'Info', 'Notice', 'Warning', 'Error', 'Fault',
]);

/** Icon glyphs, indexed by ordinal. */
export const SEVERITY_ICONS: readonly string[] = Object.freeze([
    '💜', '💚', '💙', '🖤', '💛', '🩷', '❤️',
]);

/**
 * Check that each lookup table has exactly one entry per severity.
 * Runs once at load and again on every lookup; a mismatch is a programming error.
 */
export function verifySeverityTables(
    names: readonly string[] = SEVERITY_NAMES,
    icons: readonly string[] = SEVERITY_ICONS,
): void {
    precondition(names.length === SEVERITIES.length,
        `Severity name table has ${names.length} entries for ${SEVERITIES.length} severities`);
    precondition(icons.length === SEVERITIES.length,
        `Severity icon table has ${icons.length} entries for ${SEVERITIES.length} severities`);
}

verifySeverityTables();

/* --------------------------------- Lookups --------------------------------- */

/** Display name, e.g. "Notice". */
export function severityName(severity: Severity): string {
    verifySeverityTables();
    return SEVERITY_NAMES[severity];
}

/** Capitalized first letter of the display name, e.g. "N". */
export function severityInitial(severity: Severity): string {
    return severityName(severity).charAt(0).toUpperCase();
}

/** Icon glyph, e.g. "🖤". */
export function severityIcon(severity: Severity): string {
    verifySeverityTables();
    return SEVERITY_ICONS[severity];
}

/** Lower-case name, matching the logger method for that severity. */
export function severityKey(severity: Severity): SeverityName {
    switch (severity) {
        case Severity.Trace: return 'trace';
        case Severity.Debug: return 'debug';
        case Severity.Info: return 'info';
        case Severity.Notice: return 'notice';
        case Severity.Warning: return 'warning';
        case Severity.Error: return 'error';
        case Severity.Fault: return 'fault';
    }
}

/**
 * Resolve a string into a `Severity`.
 * Accepts a name (any case, 'warn' for warning) or an ordinal 0..6 (clamped).
 * Returns `undefined` if unparsable; callers decide the fallback.
 */
export function parseSeverity(s?: string): Severity | undefined {
    if (!s) return undefined;
    switch (s.trim().toLowerCase())
    {
        case 'trace': return Severity.Trace;
        case 'debug': return Severity.Debug;
        case 'info': return Severity.Info;
        case 'notice': return Severity.Notice;
        case 'warn':
        case 'warning': return Severity.Warning;
        case 'error': return Severity.Error;
        case 'fault': return Severity.Fault;
    }
    const n = Number(s);
    if (s.trim() === '' || !Number.isFinite(n)) return undefined;
    return SEVERITIES[Math.max(0, Math.min(SEVERITIES.length - 1, Math.trunc(n)))];
}
