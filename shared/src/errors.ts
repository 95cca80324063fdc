export type ErrorKind =
    | 'retrieval'
    | 'provider'
    | 'generation'
    | 'judge_parse'
    | 'persistence'
    | 'configuration';

/**
 * Base class for every failure the pipeline and harness know how to handle
 */
export abstract class CareError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Retrieval index unavailable or returned garbage. */
export class RetrievalError extends CareError {
    readonly kind = 'retrieval';
}

/**
 * Network, auth or rate-limit failure from a language-model provider
 */
export class ProviderError extends CareError {
    readonly kind = 'provider';
    readonly retryable: boolean;
    readonly status?: number;

    constructor(message: string, opts: { retryable: boolean; status?: number; cause?: unknown }) {
        super(message, { cause: opts.cause });
        this.retryable = opts.retryable;
        this.status = opts.status;
    }
}

/** Provider failure after the retry budget is spent. */
export class GenerationError extends CareError {
    readonly kind = 'generation';
    readonly attempts: number;

    constructor(message: string, attempts: number, options?: { cause?: unknown }) {
        super(message, options);
        this.attempts = attempts;
    }
}

export class JudgeParseError extends CareError {
    readonly kind = 'judge_parse';
    readonly rawOutput: string;

    constructor(message: string, rawOutput: string) {
        super(message);
        this.rawOutput = rawOutput;
    }
}

export class PersistenceError extends CareError {
    readonly kind = 'persistence';
}

export class ConfigurationError extends CareError {
    readonly kind = 'configuration';
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

export const isCareError = (err: unknown): err is CareError => err instanceof CareError;

export const errorMessage = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);

const UPSTREAM_KINDS: ReadonlySet<ErrorKind> = new Set(['retrieval', 'provider', 'generation', 'judge_parse']);

/**
 * HTTP status for an error escaping a route handler
 */
export function httpStatusFor(err: unknown): number {
    if (isCareError(err)) {
        return UPSTREAM_KINDS.has(err.kind) ? 502 : 500;
    }
    if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number') {
        return err.statusCode >= 400 && err.statusCode < 600 ? err.statusCode : 500;
    }
    return 500;
}
