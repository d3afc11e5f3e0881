/**
 * Engine Error Kinds
 *
 * Every failure that crosses a component boundary is one of a small,
 * closed set of kinds. The job runner and the retry policy switch on
 * `kind` instead of inspecting message text.
 */

export type ErrorKind =
    | 'configuration'
    | 'transient'
    | 'auth'
    | 'validation'
    | 'best_effort'
    | 'terminal';

export abstract class EngineError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or invalid setting, fatal at startup
 */
export class ConfigurationError extends EngineError {
    readonly kind = 'configuration';
}

/**
 * Network failure, timeout, 5xx or rate limit
 */
export class TransientError extends EngineError {
    readonly kind = 'transient';
    readonly status?: number;
    readonly retryAfterMs?: number;

    constructor(
        message: string,
        options: { cause?: unknown; status?: number; retryAfterMs?: number } = {}
    ) {
        super(message, { cause: options.cause });
        this.status = options.status;
        this.retryAfterMs = options.retryAfterMs;
    }
}

export class AuthError extends EngineError {
    readonly kind = 'auth';
}

export type ValidationReason = 'truncated' | 'malformed' | 'schema' | 'rules';

/**
 * Generated content that cannot be parsed or fails its rules.
 * All failing rules travel together in `issues`.
 */
export class ValidationError extends EngineError {
    readonly kind = 'validation';
    readonly reason: ValidationReason;
    readonly issues: string[];

    constructor(reason: ValidationReason, issues: string[], options?: { cause?: unknown }) {
        super(`${reasonLabel(reason)}: ${issues.join('; ')}`, options);
        this.reason = reason;
        this.issues = issues;
    }
}

function reasonLabel(reason: ValidationReason): string {
    switch (reason) {
        case 'truncated':
            return 'Response truncated';
        case 'malformed':
            return 'Malformed response';
        case 'schema':
            return 'Response missing required fields';
        case 'rules':
            return 'Content validation failed';
    }
}

/**
 * Failure inside an optional branch (cover images, news context)
 */
export class BestEffortError extends EngineError {
    readonly kind = 'best_effort';
}

/**
 * Unrecoverable pipeline failure, e.g. the publishing platform rejected a post
 */
export class TerminalError extends EngineError {
    readonly kind = 'terminal';
}

/**
 * Raised when a job is triggered while a previous run is still in flight
 */
export class JobAlreadyRunningError extends Error {
    constructor(readonly jobType: string) {
        super(`Job ${jobType} is already running`);
        this.name = 'JobAlreadyRunningError';
    }
}

// ============================================================================
// Classification of raw library errors
// ============================================================================

const AUTH_PATTERN = /authentication|api key/i;
const NETWORK_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * HTTP status carried by an axios, openai or fetch-style error
 */
export function httpStatusOf(error: unknown): number | undefined {
    if (!isRecord(error)) {
        return undefined;
    }
    if (typeof error.status === 'number') {
        return error.status;
    }
    if (isRecord(error.response) && typeof error.response.status === 'number') {
        return error.response.status;
    }
    return undefined;
}

function headersOf(error: Record<string, unknown>): Record<string, unknown> | undefined {
    if (isRecord(error.headers)) {
        return error.headers;
    }
    if (isRecord(error.response) && isRecord(error.response.headers)) {
        return error.response.headers;
    }
    return undefined;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: unknown, now: Date = new Date()): number | undefined {
    if (typeof value === 'number' && value >= 0) {
        return value * 1000;
    }
    if (typeof value !== 'string' || value.trim() === '') {
        return undefined;
    }

    const seconds = Number(value);
    if (!Number.isNaN(seconds) && seconds >= 0) {
        return seconds * 1000;
    }

    const date = Date.parse(value);
    if (!Number.isNaN(date)) {
        return Math.max(0, date - now.getTime());
    }
    return undefined;
}

function retryAfterOf(error: unknown): number | undefined {
    if (!isRecord(error)) {
        return undefined;
    }
    const headers = headersOf(error);
    return headers ? parseRetryAfter(headers['retry-after']) : undefined;
}

/**
 * Map anything thrown by a client library onto the engine's error kinds
 */
export function classifyError(error: unknown, source = 'external call', detail?: string): EngineError {
    if (error instanceof EngineError) {
        return error;
    }

    const message = detail ?? (error instanceof Error ? error.message : String(error));
    const status = httpStatusOf(error);

    if (status === 401 || AUTH_PATTERN.test(message)) {
        return new AuthError(`${source}: ${message}`, { cause: error });
    }

    if (status === 429) {
        return new TransientError(`${source}: rate limited`, {
            cause: error,
            status,
            retryAfterMs: retryAfterOf(error),
        });
    }

    if (status !== undefined) {
        return new TransientError(`${source}: HTTP ${status} ${message}`, { cause: error, status });
    }

    const code = isRecord(error) && typeof error.code === 'string' ? error.code : undefined;
    if (code && NETWORK_CODES.has(code)) {
        return new TransientError(`${source}: ${code} ${message}`, { cause: error });
    }

    return new TransientError(`${source}: ${message}`, { cause: error });
}
