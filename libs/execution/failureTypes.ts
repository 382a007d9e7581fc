/**
 * Failure categories for TFE plan retrieval.
 *
 * Each category carries a fixed retry policy and the troubleshooting text
 * shown once an operation gives up. The retry engine and the message
 * formatters both read from CATEGORY_POLICY; nothing else decides retryability.
 */

export type ErrorCategory =
    | 'AUTHENTICATION'        // Bad or expired token → No retry
    | 'API_RATE_LIMIT'        // 429 → Retry with backoff
    | 'NETWORK_CONNECTIVITY'  // Generic network trouble → Retry
    | 'INVALID_ID_FORMAT'     // Malformed ws-/run- id → No retry
    | 'SERVER_UNREACHABLE'    // Connection refused, DNS, 5xx → Retry
    | 'PLAN_NOT_FOUND'        // 404, missing plan or JSON output → No retry
    | 'PERMISSION_DENIED'     // 403 → No retry
    | 'SSL_ERROR'             // Certificate verification failed → No retry
    | 'TIMEOUT'               // Connect/headers/body timeout → Retry
    | 'UNKNOWN';              // Anything else → Retry

export const ERROR_CATEGORIES: readonly ErrorCategory[] = [
    'AUTHENTICATION',
    'API_RATE_LIMIT',
    'NETWORK_CONNECTIVITY',
    'INVALID_ID_FORMAT',
    'SERVER_UNREACHABLE',
    'PLAN_NOT_FOUND',
    'PERMISSION_DENIED',
    'SSL_ERROR',
    'TIMEOUT',
    'UNKNOWN'
];

/**
 * Retry policy and user-facing text for one category.
 */
export interface CategoryPolicy {
    /** Whether a failure in this category is worth another attempt */
    readonly retryable: boolean;
    /** Short heading, e.g. "Authentication Failed" */
    readonly title: string;
    /** One-line cause summary */
    readonly summary: string;
    /** Heading for the causes list ("Common causes", "What this means", ...) */
    readonly causesHeading: string;
    readonly causes: readonly string[];
    /** Heading for the remedies list, "Solutions" when absent */
    readonly remediesHeading?: string;
    readonly remedies: readonly string[];
    /** Short notice shown between attempts */
    readonly retryNotice?: string;
}

/**
 * Mutable context threaded through every attempt of one retried operation.
 */
export interface ErrorContext {
    category: ErrorCategory;
    error: unknown;
    readonly operation: string;
    readonly serverUrl?: string;
    readonly workspaceId?: string;
    readonly runId?: string;
    /** Values scrubbed from any error text built from this context */
    readonly secrets: readonly string[];
    retryCount: number;
    maxRetries: number;
}

/**
 * Pure retry decision for one failed attempt.
 */
export interface RetryDecision {
    readonly shouldRetry: boolean;
    readonly reason: string;
}

export function createErrorContext(
    operation: string,
    details: {
        serverUrl?: string;
        workspaceId?: string;
        runId?: string;
        maxRetries?: number;
        secrets?: readonly string[];
    } = {}
): ErrorContext {
    return {
        category: 'UNKNOWN',
        error: null,
        operation,
        serverUrl: details.serverUrl,
        workspaceId: details.workspaceId,
        runId: details.runId,
        secrets: details.secrets ?? [],
        retryCount: 0,
        maxRetries: details.maxRetries ?? 3
    };
}

export const CATEGORY_POLICY: Record<ErrorCategory, CategoryPolicy> = {
    AUTHENTICATION: {
        retryable: false,
        title: 'Authentication Failed',
        summary: 'The TFE server rejected the API token.',
        causesHeading: 'Common causes',
        causes: [
            'Invalid or expired API token',
            'Incorrect organization name',
            'Token lacks required permissions'
        ],
        remedies: [
            "Verify your API token is correct and hasn't expired",
            'Check organization name spelling',
            'Ensure token has read access to the organization',
            'Generate a new API token if needed'
        ]
    },
    API_RATE_LIMIT: {
        retryable: true,
        title: 'API Rate Limit Exceeded',
        summary: 'The TFE API rate limit has been exceeded and retries were unsuccessful.',
        causesHeading: 'What this means',
        causes: [
            'Too many requests sent to TFE API in a short time',
            'Rate limits protect the TFE service from overload'
        ],
        remedies: [
            'Wait a few minutes and try again',
            'Reduce concurrent operations if running multiple processes',
            'Contact your TFE administrator if limits seem too restrictive'
        ],
        retryNotice: 'Rate limited. Will retry automatically.'
    },
    NETWORK_CONNECTIVITY: {
        retryable: true,
        title: 'Network Connectivity Issue',
        summary: 'Unable to establish connection to TFE server after multiple attempts.',
        causesHeading: 'Common causes',
        causes: [
            'Internet connectivity problems',
            'Firewall blocking connections',
            'Proxy configuration issues',
            'DNS resolution problems'
        ],
        remedies: [
            'Check your internet connection',
            'Verify firewall settings allow HTTPS connections',
            'Check proxy configuration if applicable',
            'Try accessing the TFE server in a web browser',
            'Contact your network administrator if issues persist'
        ],
        retryNotice: 'Network connectivity issue. Will retry automatically.'
    },
    INVALID_ID_FORMAT: {
        retryable: false,
        title: 'Invalid Identifier Format',
        summary: 'The workspace or run identifier is not in the expected format.',
        causesHeading: 'Common causes',
        causes: [
            "Workspace ID does not start with 'ws-'",
            "Run ID does not start with 'run-'",
            'Identifier copied with extra characters or truncated'
        ],
        remedies: [
            'Copy the workspace ID from the workspace settings page',
            'Copy the run ID from the run details URL',
            "Use the formats 'ws-ABC123456789' and 'run-XYZ987654321'"
        ]
    },
    SERVER_UNREACHABLE: {
        retryable: true,
        title: 'TFE Server Unreachable',
        summary: 'The TFE server is not responding after multiple attempts.',
        causesHeading: 'Possible causes',
        causes: [
            'TFE server is down for maintenance',
            'Incorrect server URL',
            'Server experiencing high load',
            'Network routing issues'
        ],
        remedies: [
            'Verify the TFE server URL is correct',
            'Check TFE service status page if available',
            'Try again in a few minutes',
            'Switch to file upload method as alternative',
            'Contact your TFE administrator'
        ],
        retryNotice: 'TFE server temporarily unreachable. Will retry automatically.'
    },
    PLAN_NOT_FOUND: {
        retryable: false,
        title: 'Plan Not Found',
        summary: 'The specified workspace run or plan could not be found.',
        causesHeading: 'Common causes',
        causes: [
            'Incorrect workspace ID or run ID',
            'Run does not exist or has been deleted',
            'Plan has not been generated yet',
            'No structured JSON output available'
        ],
        remedies: [
            'Verify workspace ID and run ID are correct',
            'Check if the run exists in TFE web interface',
            'Ensure the run has completed successfully',
            'Verify the plan has JSON output available'
        ]
    },
    PERMISSION_DENIED: {
        retryable: false,
        title: 'Permission Denied',
        summary: 'Your API token does not have sufficient permissions for this operation.',
        causesHeading: 'Required permissions',
        causes: [
            'Read access to the organization',
            'Read access to the workspace',
            'Read access to runs and plans'
        ],
        remedies: [
            'Contact workspace administrator to grant permissions',
            'Use a different API token with appropriate permissions',
            "Verify you're accessing the correct workspace",
            'Check if workspace has restricted access policies'
        ]
    },
    SSL_ERROR: {
        retryable: false,
        title: 'SSL Certificate Error',
        summary: 'SSL certificate verification failed for the TFE server.',
        causesHeading: 'Common causes',
        causes: [
            'Self-signed certificate on custom TFE instance',
            'Expired SSL certificate',
            'Certificate chain issues',
            'Corporate proxy interfering with SSL'
        ],
        remedies: [
            'For testing: set verify_ssl to false in configuration (not recommended for production)',
            'Contact TFE administrator to fix certificate issues',
            'Add custom CA certificate to system trust store',
            'Check if corporate proxy requires special configuration'
        ]
    },
    TIMEOUT: {
        retryable: true,
        title: 'Request Timeout',
        summary: 'TFE server did not respond within the timeout period.',
        causesHeading: 'Common causes',
        causes: [
            'Server is experiencing high load',
            'Large plan data taking time to process',
            'Network latency issues',
            'Server temporarily overloaded'
        ],
        remedies: [
            'Increase timeout value in configuration',
            'Try again during off-peak hours',
            'Use file upload for very large plans',
            'Contact TFE administrator if timeouts persist'
        ],
        retryNotice: 'Request timed out. Will retry.'
    },
    UNKNOWN: {
        retryable: true,
        title: 'Unexpected Error',
        summary: 'An unexpected error occurred.',
        causesHeading: 'Common causes',
        causes: [],
        remediesHeading: 'What you can do',
        remedies: [
            'Try the operation again',
            'Use file upload as an alternative',
            'Check TFE server status',
            'Contact support if the issue persists'
        ],
        retryNotice: 'Unexpected error occurred. Will retry.'
    }
};
