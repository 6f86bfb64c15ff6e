import { APICallError, RetryError } from "ai";

/**
 * Error taxonomy for snapshot bootstrap and request handling.
 *
 * - `bootstrap-fatal`: start-up is aborted and the process exits non-zero.
 * - `bootstrap-retryable`: retried with bounded backoff, then treated as fatal.
 * - `request-local`: the current request fails or degrades, serving continues.
 */
export type ErrorCategory = "bootstrap-fatal" | "bootstrap-retryable" | "request-local";

export abstract class KnowledgeBaseError extends Error {
    abstract readonly category: ErrorCategory;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

/** Remote artifact source rejected the credential (401/403). */
export class AuthError extends KnowledgeBaseError {
    readonly category = "bootstrap-fatal";

    constructor(
        message: string,
        public readonly status: number
    ) {
        super(message);
    }
}

/** Remote artifact does not exist (404/410). */
export class NotFoundError extends KnowledgeBaseError {
    readonly category = "bootstrap-fatal";

    constructor(
        message: string,
        public readonly status: number
    ) {
        super(message);
    }
}

/** Any other non-retryable rejection from the artifact source. */
export class ArtifactFetchError extends KnowledgeBaseError {
    readonly category = "bootstrap-fatal";

    constructor(
        message: string,
        public readonly status: number
    ) {
        super(message);
    }
}

export class TransientNetworkError extends KnowledgeBaseError {
    readonly category = "bootstrap-retryable";
    readonly status?: number;

    constructor(
        message: string,
        options?: { cause?: unknown; status?: number }
    ) {
        super(message, options);
        this.status = options?.status;
    }
}

export class CorruptArchiveError extends KnowledgeBaseError {
    readonly category = "bootstrap-fatal";
}

export class EmptyCorpusError extends KnowledgeBaseError {
    readonly category = "bootstrap-fatal";

    constructor(public readonly installPath: string) {
        super(`Snapshot installed at ${installPath} contains no documents; refusing to serve an empty knowledge base.`);
    }
}

function upstreamStatus(error: unknown): number | undefined {
    if (APICallError.isInstance(error)) {
        return error.statusCode;
    }
    if (RetryError.isInstance(error)) {
        return upstreamStatus(error.lastError);
    }
    if (error instanceof ProviderError) {
        return error.status;
    }
    return undefined;
}

export class ProviderError extends KnowledgeBaseError {
    readonly category = "request-local";
    /** HTTP status reported by the provider, when one is known. */
    readonly status?: number;

    constructor(message: string, options?: { cause?: unknown; status?: number }) {
        super(message, options);
        this.status = options?.status ?? upstreamStatus(options?.cause);
    }

    get rateLimited(): boolean {
        return this.status === 429;
    }
}

export class PersistenceError extends KnowledgeBaseError {
    readonly category = "request-local";
}

export class RetrievalError extends KnowledgeBaseError {
    readonly category = "request-local";
}

export class InvalidRequestError extends KnowledgeBaseError {
    readonly category = "request-local";
}

export function isKnowledgeBaseError(error: unknown): error is KnowledgeBaseError {
    return error instanceof KnowledgeBaseError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
