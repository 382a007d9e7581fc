/**
 * Retry Engine
 *
 * Runs an operation until it succeeds, fails with a category that does not
 * allow retry, or spends its retry budget. Between attempts it sleeps for
 * `baseDelay * 2^attempt` plus 10-30% jitter.
 *
 * The engine never throws for a failed operation: callers get a RetryOutcome
 * whose error text comes from the configured formatter.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { getComponentLogger } from '../logging/logger.js';
import { OperationCancelledError } from '../tfe/errors.js';
import { classifyError, readRateLimitReset } from './failureClassifier.js';
import { markdownFormatter, type ErrorMessageFormatter } from './errorFormatter.js';
import {
    CATEGORY_POLICY,
    type ErrorCategory,
    type ErrorContext,
    type RetryDecision
} from './failureTypes.js';

const logger = getComponentLogger('RetryEngine');

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;

const JITTER_MIN_RATIO = 0.1;
const JITTER_SPAN_RATIO = 0.2;

/**
 * Progress notice emitted before each backoff sleep.
 */
export interface RetryNotice {
    readonly operation: string;
    readonly category: ErrorCategory;
    /** 1-based number of the retry about to happen */
    readonly retryNumber: number;
    readonly maxRetries: number;
    readonly delayMs: number;
    readonly message: string;
    readonly detail?: string;
}

export type RetryNotifier = (notice: RetryNotice) => void;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryOutcome<T> =
    | { readonly ok: true; readonly value: T; readonly attempts: number }
    | {
        readonly ok: false;
        readonly error: string;
        readonly category: ErrorCategory;
        readonly attempts: number;
        readonly cancelled: boolean;
    };

export interface RetryEngineOptions {
    maxRetries?: number;
    baseDelayMs?: number;
    notifier?: RetryNotifier;
    formatter?: ErrorMessageFormatter;
    sleep?: Sleep;
    /** Uniform source in [0, 1) used for jitter */
    random?: () => number;
}

export const logRetryNotice: RetryNotifier = notice => {
    logger.info({
        operation: notice.operation,
        category: notice.category,
        retryNumber: notice.retryNumber,
        maxRetries: notice.maxRetries,
        delayMs: Math.round(notice.delayMs)
    }, notice.message);
};

const abortableSleep: Sleep = async (ms, signal) => {
    await delay(ms, undefined, { signal });
};

/**
 * Decide whether a failed attempt (0-based) should be followed by another.
 */
export function decideRetry(category: ErrorCategory, attempt: number, maxRetries: number): RetryDecision {
    if (!CATEGORY_POLICY[category].retryable) {
        return { shouldRetry: false, reason: `Category ${category} does not allow retry` };
    }
    if (attempt >= maxRetries) {
        return { shouldRetry: false, reason: `Retry budget of ${maxRetries} exhausted` };
    }
    return { shouldRetry: true, reason: `Category ${category} is transient` };
}

/**
 * Backoff for a failed attempt (0-based): the exponential term plus a jitter of
 * 10% to 30% of it.
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, random: () => number = Math.random): number {
    const exponential = baseDelayMs * Math.pow(2, attempt);
    const jitter = (JITTER_MIN_RATIO + JITTER_SPAN_RATIO * random()) * exponential;
    return exponential + jitter;
}

function buildNotice(context: ErrorContext, delayMs: number): RetryNotice {
    const retryNumber = context.retryCount + 1;
    const seconds = (delayMs / 1000).toFixed(1);
    const message = context.category === 'API_RATE_LIMIT'
        ? `Rate limited. Waiting ${seconds} seconds before retry ${retryNumber}/${context.maxRetries}...`
        : `Retrying operation in ${seconds} seconds (attempt ${retryNumber}/${context.maxRetries})...`;

    let detail = CATEGORY_POLICY[context.category].retryNotice;
    const resetAt = readRateLimitReset(context.error);
    if (context.category === 'API_RATE_LIMIT' && resetAt) {
        detail = `Rate limited (resets at ${resetAt}). Will retry automatically.`;
    }

    return {
        operation: context.operation,
        category: context.category,
        retryNumber,
        maxRetries: context.maxRetries,
        delayMs,
        message,
        detail
    };
}

export class RetryEngine {
    readonly maxRetries: number;
    readonly baseDelayMs: number;
    private readonly notifier: RetryNotifier;
    private readonly formatter: ErrorMessageFormatter;
    private readonly sleep: Sleep;
    private readonly random: () => number;

    constructor(options: RetryEngineOptions = {}) {
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
        this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
        this.notifier = options.notifier ?? logRetryNotice;
        this.formatter = options.formatter ?? markdownFormatter;
        this.sleep = options.sleep ?? abortableSleep;
        this.random = options.random ?? Math.random;
    }

    /**
     * Run `operation` with exponential backoff. The context is updated in place
     * with the latest category, error and attempt number.
     */
    async run<T>(operation: () => Promise<T>, context: ErrorContext, signal?: AbortSignal): Promise<RetryOutcome<T>> {
        context.maxRetries = this.maxRetries;

        for (let attempt = 0; ; attempt++) {
            if (signal?.aborted) {
                return this.cancelled(context, attempt);
            }
            context.retryCount = attempt;

            try {
                const value = await operation();
                return { ok: true, value, attempts: attempt + 1 };
            } catch (err) {
                if (signal?.aborted) {
                    return this.cancelled(context, attempt + 1);
                }

                context.error = err;
                context.category = classifyError(err, context.operation);

                const decision = decideRetry(context.category, attempt, context.maxRetries);
                if (!decision.shouldRetry) {
                    logger.warn({
                        operation: context.operation,
                        category: context.category,
                        attempts: attempt + 1,
                        reason: decision.reason
                    }, 'Operation failed');
                    return {
                        ok: false,
                        error: this.formatter.format(context.category, context),
                        category: context.category,
                        attempts: attempt + 1,
                        cancelled: false
                    };
                }

                const delayMs = computeBackoffDelay(attempt, this.baseDelayMs, this.random);
                this.notifier(buildNotice(context, delayMs));

                try {
                    await this.sleep(delayMs, signal);
                } catch (sleepErr) {
                    if (signal?.aborted) {
                        return this.cancelled(context, attempt + 1);
                    }
                    throw sleepErr;
                }
            }
        }
    }

    private cancelled<T>(context: ErrorContext, attempts: number): RetryOutcome<T> {
        logger.info({ operation: context.operation, attempts }, 'Operation cancelled');
        const cancellation = new OperationCancelledError(context.operation);
        context.error = cancellation;
        return {
            ok: false,
            error: cancellation.message,
            category: context.category,
            attempts,
            cancelled: true
        };
    }
}

/**
 * One-shot form of RetryEngine.run.
 */
export function retryWithBackoff<T>(
    operation: () => Promise<T>,
    context: ErrorContext,
    options: RetryEngineOptions & { signal?: AbortSignal } = {}
): Promise<RetryOutcome<T>> {
    return new RetryEngine(options).run(operation, context, options.signal);
}
