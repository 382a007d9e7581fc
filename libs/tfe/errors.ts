import type { ErrorCategory } from '../execution/failureTypes.js';

/**
 * Base class for errors raised by the TFE retrieval path.
 * Messages are public: they never carry tokens or plan content.
 */
export class TfeError extends Error {
    readonly code: string;
    /** Set when the failure is already known to belong to a category */
    readonly category?: ErrorCategory;

    constructor(code: string, message: string, options?: { category?: ErrorCategory; cause?: unknown }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'TfeError';
        this.code = code;
        this.category = options?.category;
    }
}

/**
 * Non-2xx response from the TFE API or the plan JSON download.
 */
export class TfeHttpError extends TfeError {
    readonly statusCode: number;
    readonly headers: Readonly<Record<string, string>>;

    constructor(statusCode: number, message: string, headers: Readonly<Record<string, string>> = {}) {
        super('TFE_HTTP_ERROR', message);
        this.name = 'TfeHttpError';
        this.statusCode = statusCode;
        this.headers = headers;
    }

    /** Value of the X-RateLimit-Reset header, when the server sent one */
    get rateLimitReset(): string | undefined {
        return this.headers['x-ratelimit-reset'];
    }
}

/**
 * The run or plan payload parsed but lacks the link to the next step.
 */
export class PlanResolutionError extends TfeError {
    constructor(message: string) {
        super('PLAN_RESOLUTION_FAILED', message, { category: 'PLAN_NOT_FOUND' });
        this.name = 'PlanResolutionError';
    }
}

/**
 * A response body that is not the JSON document it should be.
 * Content-level failure: retrying returns the same bytes.
 */
export class MalformedPlanError extends TfeError {
    constructor(message: string, cause?: unknown) {
        super('MALFORMED_PLAN_JSON', message, { category: 'PLAN_NOT_FOUND', cause });
        this.name = 'MalformedPlanError';
    }
}

/**
 * The caller aborted the operation.
 */
export class OperationCancelledError extends TfeError {
    constructor(operation: string) {
        super('OPERATION_CANCELLED', `Operation cancelled: ${operation}`);
        this.name = 'OperationCancelledError';
    }
}
