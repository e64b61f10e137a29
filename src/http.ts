/**
 * Human-readable HTTP request/response traces.
 *
 * Each trace line is a separate `Logger.log` call at the chosen severity, so
 * lines from other callers may interleave between them.
 *
 * @example
 * ```ts
 * const tracer = new HttpTraceLogger({ logger: createLogger({ prefix: 'api' }) });
 * tracer.redactHeader('Authorization');
 * tracer.logResponse(
 *     { status: 200, url: 'https://example.test/items', headers: res.headers },
 *     body,
 *     { elapsed: 42, verbosity: TraceVerbosity.Body },
 * );
 * ```
 */

import { Severity } from './types';
import { formatElapsed } from './format';
import { type Logger, sharedLogger } from './logger';
import { HeaderRedactions, sharedRedactions } from './redact';

/* ---------------------------------- Types ---------------------------------- */

/** How much of a response to show. */
export enum TraceVerbosity {
    /** Status line only */
    Basic = 'basic',
    /** Status line and headers */
    Headers = 'headers',
    /** Status line, headers and decoded body */
    Body = 'body',
}

export type HeaderValue = string | number | readonly string[] | undefined;

/**
 * Anything headers can be read from: a fetch `Headers`, a `Map`, an array of pairs,
 * or a plain record such as Node's `IncomingHttpHeaders`.
 */
export type HeaderSource =
    | Iterable<readonly [string, string]>
    | Readonly<Record<string, HeaderValue>>;

/** Raw payload; strings are counted and decoded as UTF-8. */
export type TraceBody = Uint8Array | ArrayBuffer | string;

export interface TraceResponse {
    status: number;
    url?: string | URL;
    headers?: HeaderSource;
}

export interface TraceRequest {
    method?: string;
    url?: string | URL;
    headers?: HeaderSource;
    body?: TraceBody;
}

export interface ResponseTraceOptions {
    /** Milliseconds, or a preformatted duration. Default 0 */
    elapsed?: number | string;
    /** Default `TraceVerbosity.Basic` */
    verbosity?: TraceVerbosity;
    /** Default `Severity.Info` */
    level?: Severity;
}

export interface RequestTraceOptions {
    /** Same shape as `ResponseTraceOptions.elapsed`; request traces print no timing line */
    elapsed?: number | string;
    /** Default `Severity.Info` */
    level?: Severity;
}

export interface HttpTraceLoggerOptions {
    /** Lines go through this logger (default: `sharedLogger`) */
    logger?: Logger;
    /** Header names to mask (default: the process-wide `sharedRedactions`) */
    redactions?: HeaderRedactions;
}

/* ------------------------------ Format helpers ----------------------------- */

const CONTENT_LENGTH = 'Content-Length';

const utf8 = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

function isIterable(v: unknown): v is Iterable<readonly [string, string]> {
    return typeof v === 'object' && v !== null && Symbol.iterator in v;
}

/** Flatten a header source into `[name, value]` pairs in the order the source yields them. */
export function headerEntries(source?: HeaderSource): Array<[string, string]> {
    if (!source) return [];
    const out: Array<[string, string]> = [];
    if (isIterable(source)) {
        for (const [name, value] of source) out.push([name, value]);
        return out;
    }
    for (const [name, value] of Object.entries(source)) {
        if (value === undefined) continue;
        out.push([name, typeof value === 'string' || typeof value === 'number' ? String(value) : value.join(', ')]);
    }
    return out;
}

/** Body as bytes, so lengths are byte counts. */
export function bodyBytes(body: TraceBody): Uint8Array {
    if (typeof body === 'string') return utf8Encoder.encode(body);
    return body instanceof Uint8Array ? body : new Uint8Array(body);
}

/** Strict UTF-8 decode; undefined when the bytes are not valid UTF-8. */
export function decodeBody(bytes: Uint8Array): string | undefined {
    try {
        return utf8.decode(bytes);
    } catch {
        return undefined;
    }
}

function bodyInfo(bytes?: Uint8Array): string {
    return bytes ? `${bytes.byteLength}-byte body` : 'unknown-length body';
}

function urlText(url?: string | URL): string {
    return url === undefined ? '' : String(url);
}

/* --------------------------------- Tracer ---------------------------------- */

export class HttpTraceLogger {
    private readonly logger: Logger;
    private readonly redactions: HeaderRedactions;

    constructor(options: HttpTraceLoggerOptions = {}) {
        this.logger = options.logger ?? sharedLogger;
        this.redactions = options.redactions ?? sharedRedactions;
    }

    /** Mask `name` in all later traces from this tracer. Permanent. */
    redactHeader(name: string): void {
        this.redactions.redact(name);
    }

    /** Trace one response: framing lines, then headers and body as `verbosity` allows. */
    logResponse(response: TraceResponse, body?: TraceBody, options: ResponseTraceOptions = {}): void {
        const level = options.level ?? Severity.Info;
        const verbosity = options.verbosity ?? TraceVerbosity.Basic;
        const log = (line: string) => this.logger.log(line, level);
        const bytes = body === undefined ? undefined : bodyBytes(body);

        log('URLResponse Info');
        log(`<--- ${response.status} ${urlText(response.url)} (elapsed: ${formatElapsed(options.elapsed ?? 0)}, ${bodyInfo(bytes)})`);

        if (verbosity !== TraceVerbosity.Basic) {
            this.logHeaders(response.headers, level);
        }

        if (verbosity === TraceVerbosity.Body) {
            const text = bytes ? decodeBody(bytes) : undefined;
            if (text !== undefined) {
                log('Request Body');
                log(text);
            } else {
                log('Unable to parse body');
            }
            // 'unknown-length body' when no body was given, as in the summary line
            log(`<-- END HTTP (${bodyInfo(bytes)})`);
        } else {
            log('<-- END HTTP');
        }
    }

    /** Trace one outgoing request: method line, headers, then the body when present. */
    logRequest(request: TraceRequest, options: RequestTraceOptions = {}): void {
        const level = options.level ?? Severity.Info;
        const log = (line: string) => this.logger.log(line, level);
        const method = request.method ?? 'UNKNOWN';
        const headers = headerEntries(request.headers);
        const bytes = request.body === undefined ? undefined : bodyBytes(request.body);

        log('URLRequest Info');
        log(`--> ${method} ${urlText(request.url)}`);

        const declaresLength = headers.some(([name]) => name.toLowerCase() === CONTENT_LENGTH.toLowerCase());
        if (bytes && !declaresLength) {
            log(`${CONTENT_LENGTH}: ${bytes.byteLength}`);
        }

        log('Request Headers');
        this.logHeaders(headers, level);

        if (bytes) {
            const text = decodeBody(bytes);
            if (text !== undefined) {
                log('Request Body');
                log(text);
            }
            log(`--> END ${method} (${bytes.byteLength}-byte body)`);
        } else {
            log(`--> END ${method}`);
        }
    }

    private logHeaders(source: HeaderSource | undefined, level: Severity): void {
        for (const [name, value] of headerEntries(source)) {
            this.logger.log(`${name}: ${this.redactions.apply(name, value)}`, level);
        }
    }
}

/* ----------------------------- Shared tracer ------------------------------- */

/** Tracer over `sharedLogger` and `sharedRedactions`. */
export const sharedTracer = new HttpTraceLogger();

export function logResponse(response: TraceResponse, body?: TraceBody, options?: ResponseTraceOptions): void {
    sharedTracer.logResponse(response, body, options);
}

export function logRequest(request: TraceRequest, options?: RequestTraceOptions): void {
    sharedTracer.logRequest(request, options);
}

/** Redact `name` in every trace that uses the shared redactions. */
export function redactHeader(name: string): void {
    sharedTracer.redactHeader(name);
}
