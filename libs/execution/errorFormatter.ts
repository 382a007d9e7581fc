/**
 * Human-facing text for failed operations.
 *
 * The retry engine only decides; formatters turn a category plus its context
 * into text. Markdown suits the dashboard, plain text suits the CLI, and the
 * JSON variant suits API consumers.
 */

import { describeError } from '../errors/sanitizer.js';
import { TfeError, TfeHttpError } from '../tfe/errors.js';
import { readRateLimitReset } from './failureClassifier.js';
import { CATEGORY_POLICY, type ErrorCategory, type ErrorContext } from './failureTypes.js';

/**
 * Structured error message. Every formatter renders exactly these parts.
 */
export interface ErrorMessageParts {
    readonly category: ErrorCategory;
    readonly title: string;
    readonly summary: string;
    readonly detail?: string;
    readonly causesHeading: string;
    readonly causes: readonly string[];
    readonly remediesHeading: string;
    readonly remedies: readonly string[];
}

export interface ErrorMessageFormatter {
    format(category: ErrorCategory, context: ErrorContext): string;
}

/**
 * Extra line derived from the failing error. Only domain error messages and
 * the rate-limit reset header are surfaced; transport messages are not,
 * except for UNKNOWN where the sanitized message is all there is.
 */
function detailFor(category: ErrorCategory, context: ErrorContext): string | undefined {
    const err = context.error;
    const resetAt = readRateLimitReset(err);
    if (category === 'API_RATE_LIMIT' && resetAt) {
        return `Rate limit resets at ${resetAt}`;
    }
    if (err instanceof TfeHttpError) {
        return undefined;
    }
    if (err instanceof TfeError && err.category === category) {
        return err.message;
    }
    if (category === 'UNKNOWN' && err !== null && err !== undefined) {
        return describeError(err, context.secrets);
    }
    return undefined;
}

export function buildMessageParts(category: ErrorCategory, context: ErrorContext): ErrorMessageParts {
    const policy = CATEGORY_POLICY[category];
    return {
        category,
        title: policy.title,
        summary: policy.summary,
        detail: detailFor(category, context),
        causesHeading: policy.causesHeading,
        causes: policy.causes,
        remediesHeading: policy.remediesHeading ?? 'Solutions',
        remedies: policy.remedies
    };
}

export const markdownFormatter: ErrorMessageFormatter = {
    format(category, context) {
        const parts = buildMessageParts(category, context);
        const lines = [`**${parts.title}**`, '', parts.summary];
        if (parts.detail) {
            lines.push(parts.detail);
        }
        if (parts.causes.length > 0) {
            lines.push('', `**${parts.causesHeading}:**`, ...parts.causes.map(cause => `• ${cause}`));
        }
        lines.push('', `**${parts.remediesHeading}:**`, ...parts.remedies.map(remedy => `• ${remedy}`));
        return lines.join('\n');
    }
};

export const plainTextFormatter: ErrorMessageFormatter = {
    format(category, context) {
        const parts = buildMessageParts(category, context);
        const lines = [`${parts.title}: ${parts.summary}`];
        if (parts.detail) {
            lines.push(parts.detail);
        }
        if (parts.causes.length > 0) {
            lines.push(`${parts.causesHeading}:`, ...parts.causes.map(cause => `  - ${cause}`));
        }
        lines.push(`${parts.remediesHeading}:`, ...parts.remedies.map(remedy => `  - ${remedy}`));
        return lines.join('\n');
    }
};

export const jsonFormatter: ErrorMessageFormatter = {
    format(category, context) {
        return JSON.stringify(buildMessageParts(category, context));
    }
};
