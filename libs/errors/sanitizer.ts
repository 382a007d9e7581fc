/**
 * Error Information Disclosure Prevention
 * Scrubs credentials out of any text that may reach a user, a log line or a report.
 */

const MAX_MESSAGE_LENGTH = 500;

const SECRET_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
    [/bearer\s+[A-Za-z0-9._~+/=-]+/gi, 'Bearer [REDACTED]'],
    [/token[=:]\s*\S+/gi, 'token=[REDACTED]'],
    [/password[=:]\s*\S+/gi, 'password=[REDACTED]'],
    [/secret[=:]\s*\S+/gi, 'secret=[REDACTED]'],
    [/key[=:]\s*\S+/gi, 'key=[REDACTED]']
];

/**
 * Remove known secret values and recognisable credential shapes from a message,
 * then cap its length. Secrets are redacted before the cap.
 */
export function sanitizeErrorMessage(message: string, secrets: ReadonlyArray<string | undefined | null> = []): string {
    let result = redactValues(message, secrets);
    for (const [pattern, replacement] of SECRET_PATTERNS) {
        result = result.replace(pattern, replacement);
    }
    return result.substring(0, MAX_MESSAGE_LENGTH);
}

/**
 * Replace every occurrence of the given secret values with asterisks of equal length.
 * Empty values are ignored.
 */
export function redactValues(message: string, secrets: ReadonlyArray<string | undefined | null>): string {
    let result = message;
    for (const secret of secrets) {
        if (!secret) continue;
        result = result.split(secret).join('*'.repeat(secret.length));
    }
    return result;
}

/**
 * Best-effort text for an unknown thrown value, sanitized.
 */
export function describeError(err: unknown, secrets: ReadonlyArray<string | undefined | null> = []): string {
    if (err instanceof Error) {
        return sanitizeErrorMessage(err.message || err.name, secrets);
    }
    if (typeof err === 'string') {
        return sanitizeErrorMessage(err, secrets);
    }
    if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
        return sanitizeErrorMessage(err.message, secrets);
    }
    return sanitizeErrorMessage(String(err), secrets);
}
