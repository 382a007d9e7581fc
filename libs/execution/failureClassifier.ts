/**
 * Failure Classifier
 *
 * Maps a raised value plus the operation name onto exactly one ErrorCategory.
 *
 * Order of checks (first match wins):
 * 1. Domain errors that already know their category
 * 2. TLS failures (anywhere in the cause chain)
 * 3. Timeouts
 * 4. Connection failures
 * 5. HTTP status codes
 * 6. Message patterns
 */

import { getComponentLogger } from '../logging/logger.js';
import { TfeError } from '../tfe/errors.js';
import { CATEGORY_POLICY, type ErrorCategory } from './failureTypes.js';

export { validateWorkspaceId, validateRunId } from '../validation/identifiers.js';
export type { IdentifierCheck } from '../validation/identifiers.js';

const logger = getComponentLogger('FailureClassifier');

const MAX_CAUSE_DEPTH = 5;

const TLS_ERROR_CODES = new Set([
    'CERT_HAS_EXPIRED',
    'CERT_NOT_YET_VALID',
    'CERT_UNTRUSTED',
    'CERT_REVOKED',
    'DEPTH_ZERO_SELF_SIGNED_CERT',
    'SELF_SIGNED_CERT_IN_CHAIN',
    'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
    'UNABLE_TO_GET_ISSUER_CERT',
    'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
    'HOSTNAME_MISMATCH',
    'EPROTO'
]);
const TLS_ERROR_PREFIXES = ['ERR_TLS_', 'ERR_SSL_'];

const TIMEOUT_ERROR_CODES = new Set([
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
    'ETIMEDOUT',
    'ESOCKETTIMEDOUT',
    'TIMEOUT_ERR'
]);

const CONNECTION_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ECONNABORTED',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EPIPE',
    'UND_ERR_SOCKET',
    'UND_ERR_CLOSED'
]);

interface MessagePattern {
    readonly patterns: readonly string[];
    readonly category: ErrorCategory;
}

const MESSAGE_PATTERNS: readonly MessagePattern[] = [
    { patterns: ['rate limit', 'too many requests'], category: 'API_RATE_LIMIT' },
    { patterns: ['network', 'connection'], category: 'NETWORK_CONNECTIVITY' },
    { patterns: ['auth', 'unauthorized'], category: 'AUTHENTICATION' }
];

/**
 * Collect the error itself and its `cause` chain.
 */
function causeChain(err: unknown): unknown[] {
    const chain: unknown[] = [];
    let current: unknown = err;
    while (current !== undefined && current !== null && chain.length < MAX_CAUSE_DEPTH) {
        chain.push(current);
        current = current instanceof Error ? current.cause : undefined;
    }
    return chain;
}

function readCode(err: unknown): string | undefined {
    if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}

/**
 * HTTP status carried by the error: TfeHttpError and undici's RequestRetryError
 * expose `statusCode`; some clients use `status`.
 */
export function readStatusCode(err: unknown): number | undefined {
    if (!err || typeof err !== 'object') return undefined;
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
    if ('status' in err && typeof err.status === 'number') return err.status;
    return undefined;
}

/**
 * X-RateLimit-Reset carried by the error's response headers. TfeHttpError and
 * undici's RequestRetryError both expose lowercase `headers`.
 */
export function readRateLimitReset(err: unknown): string | undefined {
    if (!err || typeof err !== 'object' || !('headers' in err)) return undefined;
    const headers: unknown = err.headers;
    if (!headers || typeof headers !== 'object' || !('x-ratelimit-reset' in headers)) return undefined;
    const value: unknown = headers['x-ratelimit-reset'];
    if (typeof value === 'string') return value;
    const first: unknown = Array.isArray(value) ? value[0] : undefined;
    return typeof first === 'string' ? first : undefined;
}

function isTlsCode(code: string): boolean {
    return TLS_ERROR_CODES.has(code) || TLS_ERROR_PREFIXES.some(prefix => code.startsWith(prefix));
}

function categoryFromStatus(status: number): ErrorCategory | undefined {
    if (status === 401) return 'AUTHENTICATION';
    if (status === 403) return 'PERMISSION_DENIED';
    if (status === 404) return 'PLAN_NOT_FOUND';
    if (status === 429) return 'API_RATE_LIMIT';
    if (status >= 500) return 'SERVER_UNREACHABLE';
    return undefined;
}

function categoryFromMessage(err: unknown): ErrorCategory | undefined {
    const text = (err instanceof Error ? err.message : String(err)).toLowerCase();
    const matched = MESSAGE_PATTERNS.find(entry => entry.patterns.some(p => text.includes(p)));
    return matched?.category;
}

function resolveCategory(err: unknown): ErrorCategory {
    if (err instanceof TfeError && err.category) {
        return err.category;
    }

    const codes = causeChain(err)
        .map(readCode)
        .filter((code): code is string => code !== undefined);

    if (codes.some(isTlsCode)) return 'SSL_ERROR';
    if (codes.some(code => TIMEOUT_ERROR_CODES.has(code))) return 'TIMEOUT';
    if (codes.some(code => CONNECTION_ERROR_CODES.has(code))) return 'SERVER_UNREACHABLE';

    const status = readStatusCode(err);
    if (status !== undefined) {
        const fromStatus = categoryFromStatus(status);
        if (fromStatus) return fromStatus;
    }

    return categoryFromMessage(err) ?? 'UNKNOWN';
}

/**
 * Classify a failure raised while performing `operation`.
 */
export function classifyError(err: unknown, operation = ''): ErrorCategory {
    const category = resolveCategory(err);

    logger.debug({
        operation,
        category,
        code: readCode(err),
        statusCode: readStatusCode(err)
    }, 'Failure classified');

    return category;
}

/**
 * Check if a category allows retry.
 */
export function isRetryable(category: ErrorCategory): boolean {
    return CATEGORY_POLICY[category].retryable;
}
