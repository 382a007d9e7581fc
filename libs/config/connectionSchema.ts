import { z } from 'zod';
import { RUN_ID_PATTERN, WORKSPACE_ID_PATTERN } from '../validation/identifiers.js';
import { inspectServerAddress } from './serverAddress.js';

/**
 * TFE connection descriptor schema.
 * Field rules attach their own error codes through issue params; the
 * validator maps zod's built-in issues (missing keys, wrong types, ranges,
 * unrecognized keys) onto the remaining codes.
 */

export interface IssueParams {
    readonly code: string;
    readonly suggestion: string;
}

export interface RequiredFieldSpec {
    readonly description: string;
    readonly example: string;
}

export interface OptionalFieldSpec {
    readonly description: string;
    readonly type: 'boolean' | 'integer';
    readonly default: boolean | number;
    readonly min?: number;
    readonly max?: number;
}

export const REQUIRED_FIELDS = {
    tfe_server: { description: 'TFE server URL (e.g., app.terraform.io)', example: 'app.terraform.io' },
    organization: { description: 'TFE organization name', example: 'my-organization' },
    token: { description: 'TFE API token', example: 'your-api-token-here' },
    workspace_id: { description: 'Workspace identifier (starts with ws-)', example: 'ws-ABC123456789' },
    run_id: { description: 'Run identifier (starts with run-)', example: 'run-XYZ987654321' }
} satisfies Record<string, RequiredFieldSpec>;

export const OPTIONAL_FIELDS = {
    verify_ssl: { description: 'Enable SSL certificate verification', type: 'boolean', default: true },
    timeout: { description: 'Request timeout in seconds', type: 'integer', default: 30, min: 1, max: 300 },
    retry_attempts: {
        description: 'Number of retry attempts for failed requests',
        type: 'integer',
        default: 3,
        min: 0,
        max: 10
    }
} satisfies Record<string, OptionalFieldSpec>;

export type RequiredField = keyof typeof REQUIRED_FIELDS;
export type OptionalField = keyof typeof OPTIONAL_FIELDS;

export const KNOWN_FIELDS: readonly string[] = [...Object.keys(REQUIRED_FIELDS), ...Object.keys(OPTIONAL_FIELDS)].sort();

const TOKEN_PLACEHOLDERS = [
    'your-token-here', 'placeholder', 'example', 'test-token', 'fake-token', 'dummy',
    'sample', 'xxx', 'yyy', 'zzz', 'replace-me', 'change-me', 'todo'
];
const ID_PLACEHOLDERS = ['example', 'test', 'fake', 'dummy'];

const TOKEN_CHARACTERS = /^[A-Za-z0-9._-]+$/;
const ORGANIZATION_CHARACTERS = /^[A-Za-z0-9_-]+$/;

type Report = (message: string, params: IssueParams) => void;

/**
 * A required, non-blank string whose content is then checked by `rules`.
 */
function requiredText(field: RequiredField, rules: (value: string, report: Report) => void) {
    return z.string().superRefine((value, ctx) => {
        const report: Report = (message, params) => {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message, params: { ...params } });
        };
        if (value.trim().length === 0) {
            report(`Required field "${field}" cannot be empty`, {
                code: 'EMPTY_REQUIRED_FIELD',
                suggestion: `Provide a valid value for ${field}. Example: ${REQUIRED_FIELDS[field].example}`
            });
            return;
        }
        rules(value, report);
    });
}

function boundedInteger(field: 'timeout' | 'retry_attempts') {
    const spec = OPTIONAL_FIELDS[field];
    return z.number().int().min(spec.min).max(spec.max).default(spec.default);
}

function checkServer(server: string, report: Report): void {
    const problem = inspectServerAddress(server);
    if (!problem) return;
    switch (problem.code) {
        case 'INVALID_PORT':
            report(`Invalid port number: ${problem.port}`, {
                code: problem.code,
                suggestion: 'Use a port number between 1 and 65535'
            });
            return;
        case 'INVALID_PORT_FORMAT':
            report(`Invalid port format: ${problem.port}`, {
                code: problem.code,
                suggestion: 'Port must be a number (e.g., tfe.internal.local:443)'
            });
            return;
        case 'INVALID_HOSTNAME':
            report(`Invalid hostname format: ${problem.host}`, {
                code: problem.code,
                suggestion: 'Use a valid hostname (e.g., app.terraform.io) or IP address'
            });
    }
}

function checkOrganization(organization: string, report: Report): void {
    if (organization.length > 100) {
        report('Organization name is too long', {
            code: 'ORGANIZATION_TOO_LONG',
            suggestion: 'Organization names should not exceed 100 characters'
        });
        return;
    }
    if (!ORGANIZATION_CHARACTERS.test(organization)) {
        report('Organization name contains invalid characters', {
            code: 'INVALID_ORGANIZATION_CHARACTERS',
            suggestion: 'Organization names should only contain letters, numbers, hyphens, and underscores'
        });
    }
}

// Token values never appear in messages.
function checkToken(token: string, report: Report): void {
    if (token.length < 10) {
        report('API token is too short', {
            code: 'TOKEN_TOO_SHORT',
            suggestion: 'API tokens should be at least 10 characters long'
        });
    } else if (token.length > 200) {
        report('API token is too long', {
            code: 'TOKEN_TOO_LONG',
            suggestion: 'API tokens should not exceed 200 characters'
        });
    } else if (!TOKEN_CHARACTERS.test(token)) {
        report('API token contains invalid characters', {
            code: 'INVALID_TOKEN_CHARACTERS',
            suggestion: 'API tokens should only contain letters, numbers, dots, hyphens, and underscores'
        });
    }

    const lowered = token.toLowerCase();
    const placeholder = TOKEN_PLACEHOLDERS.find(pattern => lowered.includes(pattern));
    if (placeholder) {
        report(`Token appears to contain placeholder text: "${placeholder}"`, {
            code: 'PLACEHOLDER_TOKEN',
            suggestion: 'Replace with your actual TFE API token'
        });
    }
}

function looksLikePlaceholderId(id: string): boolean {
    const lowered = id.toLowerCase();
    return ID_PLACEHOLDERS.some(pattern => lowered.includes(pattern));
}

function checkWorkspaceId(workspaceId: string, report: Report): void {
    if (!WORKSPACE_ID_PATTERN.test(workspaceId)) {
        report(`Invalid workspace ID format: ${workspaceId}`, {
            code: 'INVALID_WORKSPACE_ID',
            suggestion:
                'Workspace ID must start with "ws-" followed by at least 6 alphanumeric characters (e.g., ws-ABC123456789)'
        });
    }
    if (looksLikePlaceholderId(workspaceId)) {
        report('Workspace ID appears to be a placeholder', {
            code: 'PLACEHOLDER_WORKSPACE_ID',
            suggestion: 'Replace with your actual workspace ID from TFE'
        });
    }
}

function checkRunId(runId: string, report: Report): void {
    if (!RUN_ID_PATTERN.test(runId)) {
        report(`Invalid run ID format: ${runId}`, {
            code: 'INVALID_RUN_ID',
            suggestion: 'Run ID must start with "run-" followed by at least 6 alphanumeric characters (e.g., run-XYZ987654321)'
        });
    }
    if (looksLikePlaceholderId(runId)) {
        report('Run ID appears to be a placeholder', {
            code: 'PLACEHOLDER_RUN_ID',
            suggestion: 'Replace with your actual run ID from TFE'
        });
    }
}

export const ConnectionSchema = z.object({
    tfe_server: requiredText('tfe_server', checkServer),
    organization: requiredText('organization', checkOrganization),
    token: requiredText('token', checkToken),
    workspace_id: requiredText('workspace_id', checkWorkspaceId),
    run_id: requiredText('run_id', checkRunId),
    verify_ssl: z.boolean().default(OPTIONAL_FIELDS.verify_ssl.default),
    timeout: boundedInteger('timeout'),
    retry_attempts: boundedInteger('retry_attempts')
}).strict();

export type ConnectionDescriptor = z.output<typeof ConnectionSchema>;
