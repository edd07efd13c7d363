/**
 * @file Pipeline Error Taxonomy
 *
 * Every failure that ends a target carries a `kind`:
 *
 * - `structural`: malformed content key, unbalanced placeholders, bad
 *   configuration or sequence documents. The target fails; the batch
 *   continues unless fail-fast is set.
 * - `transient`: network or backend errors. Retried by the generator
 *   client, then surfaced.
 * - `rejection`: the backend refused the request. One adaptive retry
 *   is attempted when the rejection names a sampling or format
 *   parameter.
 *
 * Resolution fallback (no path to the target) is not an error; it is
 * reported through `PathResolution.fellBack`.
 *
 * @module core/errors
 */

export type FailureKind = 'structural' | 'transient' | 'rejection';

/**
 * Base class for all pipeline failures.
 */
export class PipelineError extends Error {
    readonly kind: FailureKind;

    constructor(message: string, kind: FailureKind, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.kind = kind;
    }
}

/**
 * Input that cannot be processed as written.
 */
export class StructuralError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'structural', options);
        this.name = 'StructuralError';
    }
}

/**
 * Indentation or nesting error in a configuration document.
 */
export class ConfigParseError extends StructuralError {
    readonly line: number;

    constructor(message: string, line: number) {
        super(`line ${line}: ${message}`);
        this.name = 'ConfigParseError';
        this.line = line;
    }
}

/**
 * Non-2xx response from the generation backend.
 */
export class ProviderApiError extends PipelineError {
    readonly statusCode: number;
    readonly responseSnippet: string;

    constructor(input: { statusCode: number; responseSnippet: string }) {
        const kind: FailureKind = input.statusCode >= 400 && input.statusCode < 500 && input.statusCode !== 429
            ? 'rejection'
            : 'transient';
        super(`Generation backend request failed (${input.statusCode}): ${input.responseSnippet}`, kind);
        this.name = 'ProviderApiError';
        this.statusCode = input.statusCode;
        this.responseSnippet = input.responseSnippet;
    }
}

/**
 * Network failure or timeout on the way to the generation backend.
 */
export class TransportError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'transient', options);
        this.name = 'TransportError';
    }
}

/**
 * 2xx response whose body holds no recognisable variants. Retried like
 * any other transient failure.
 */
export class ResponseShapeError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'transient', options);
        this.name = 'ResponseShapeError';
    }
}

/**
 * Generation gave up after exhausting its retries.
 */
export class GenerationError extends PipelineError {
    readonly attempts: number;

    constructor(message: string, attempts: number, cause: unknown) {
        super(message, cause instanceof PipelineError ? cause.kind : 'transient', { cause });
        this.name = 'GenerationError';
        this.attempts = attempts;
    }
}

/**
 * Resolve a printable message from any thrown value.
 */
export function errorMessage_resolve(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Resolve the failure kind of any thrown value. Unknown throwables count
 * as transient.
 */
export function failureKind_resolve(error: unknown): FailureKind {
    return error instanceof PipelineError ? error.kind : 'transient';
}
