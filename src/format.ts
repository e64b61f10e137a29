import { Severity } from './types';
import { severityIcon, severityInitial } from './severity';
import { type EnvBag, processEnv } from './threshold';

/* ---------------------------------- Types ---------------------------------- */

export type ColorMode   = 'auto' | 'on' | 'off';

export interface LineStyle {
    brackets: string;
    useIcons: boolean;
    showLevel: boolean;
}

const CSI = '\x1b[';
const colors = {
    red:     (s: string) => `${CSI}31m${s}${CSI}39m`,
    magenta: (s: string) => `${CSI}35m${s}${CSI}39m`,
    yellow:  (s: string) => `${CSI}33m${s}${CSI}39m`,
    cyan:    (s: string) => `${CSI}36m${s}${CSI}39m`,
    dim:     (s: string) => `${CSI}2m${s}${CSI}22m`,
};

/* ------------------------------- Line builder ------------------------------ */

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** User-perceived characters of `s`, so '❤️' or a decomposed 'é' count once. */
export function graphemes(s: string): string[] {
    return Array.from(graphemeSegmenter.segment(s), part => part.segment);
}

/** `[N] ` style tag: open bracket, glyph, close bracket, space. Empty when levels are hidden. */
export function buildLevelSlug(severity: Severity, style: LineStyle): string {
    if (!style.showLevel) return '';
    const [open, close] = graphemes(style.brackets);
    const glyph = style.useIcons ? severityIcon(severity) : severityInitial(severity);
    return `${open}${glyph}${close} `;
}

/** Final line: `slug + prefix + separator + ' ' + message`. Nothing is escaped. */
export function buildLine(
    severity: Severity,
    style: LineStyle,
    prefix: string,
    separator: string,
    message: string,
): string {
    return `${buildLevelSlug(severity, style)}${prefix}${separator} ${message}`;
}

/* ------------------------------- Colorizers -------------------------------- */

/** Line colorizer for console output; color is auto by default. */
export function createColorizer(color: ColorMode = 'auto', env: EnvBag | undefined = processEnv()) {
    const isTTY = typeof process !== 'undefined' && !!process.stdout?.isTTY;
    const useColor = color === 'on' || (color === 'auto' && isTTY && env?.NODE_ENV !== 'production');

    return (severity: Severity, line: string): string => {
        if (!useColor) return line;
        if (severity >= Severity.Error) return colors.red(line);
        if (severity === Severity.Warning) return colors.yellow(line);
        if (severity === Severity.Notice) return colors.magenta(line);
        if (severity <= Severity.Debug) return colors.cyan(line);
        return colors.dim(line);
    };
}

/* ----------------------------- Format helpers ------------------------------ */

/** Elapsed time for trace lines: milliseconds as `Nms`, strings verbatim. */
export function formatElapsed(elapsed: number | string): string {
    return typeof elapsed === 'string' ? elapsed : `${elapsed}ms`;
}
