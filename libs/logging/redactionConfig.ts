/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'Authorization', '*.Authorization',
    'token', '*.token',
    'apiToken', '*.apiToken',
    'access_token', '*.access_token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Connection descriptor
    'credentials', '*.credentials',

    // Plan payloads never reach logs
    'plan', '*.plan',
    'planJson', '*.planJson',
    'resource_changes', '*.resource_changes'
];

export const REDACT_CENSOR = '[REDACTED]';
