/**
 * Connection Validator
 *
 * Checks a raw connection descriptor (parsed from a form, a config file or
 * the environment) and returns every problem at once. Never throws.
 * Defaults are applied to the descriptor of a passing result.
 */

import { z } from 'zod';
import { isRecord } from '../plan/json.js';
import { getComponentLogger } from '../logging/logger.js';
import {
    ConnectionSchema,
    KNOWN_FIELDS,
    OPTIONAL_FIELDS,
    REQUIRED_FIELDS,
    type ConnectionDescriptor,
    type OptionalField,
    type OptionalFieldSpec,
    type RequiredField
} from './connectionSchema.js';
import { isInsecureScheme } from './serverAddress.js';

const logger = getComponentLogger('ConnectionValidator');

export interface ValidationIssue {
    readonly field: string;
    readonly message: string;
    readonly suggestion: string;
    readonly code: string;
}

export type ValidationResult =
    | {
        readonly ok: true;
        readonly errors: readonly ValidationIssue[];
        readonly warnings: readonly ValidationIssue[];
        readonly descriptor: ConnectionDescriptor;
    }
    | {
        readonly ok: false;
        readonly errors: readonly ValidationIssue[];
        readonly warnings: readonly ValidationIssue[];
        readonly descriptor: null;
    };

function isRequiredField(field: string): field is RequiredField {
    return Object.hasOwn(REQUIRED_FIELDS, field);
}

function isOptionalField(field: string): field is OptionalField {
    return Object.hasOwn(OPTIONAL_FIELDS, field);
}

function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
    return typeof value;
}

function typeIssue(field: string, value: unknown): ValidationIssue {
    if (isRequiredField(field)) {
        const example = REQUIRED_FIELDS[field].example;
        if (value === undefined) {
            return {
                field,
                message: `Required field "${field}" is missing`,
                suggestion: `Add ${field}: ${example} to your configuration`,
                code: 'MISSING_REQUIRED_FIELD'
            };
        }
        if (value === null) {
            return {
                field,
                message: `Required field "${field}" cannot be empty`,
                suggestion: `Provide a valid value for ${field}. Example: ${example}`,
                code: 'EMPTY_REQUIRED_FIELD'
            };
        }
        return {
            field,
            message: `Field "${field}" must be of type string, got ${describeType(value)}`,
            suggestion: `Ensure ${field} is a string. Example: ${example}`,
            code: 'INVALID_FIELD_TYPE'
        };
    }

    if (isOptionalField(field)) {
        const spec: OptionalFieldSpec = OPTIONAL_FIELDS[field];
        return {
            field,
            message: `Optional field "${field}" must be of type ${spec.type}, got ${describeType(value)}`,
            suggestion: `Ensure ${field} is of type ${spec.type} or remove it to use the default value (${String(spec.default)})`,
            code: 'INVALID_OPTIONAL_FIELD_TYPE'
        };
    }

    return { field, message: `Field "${field}" has an invalid type`, suggestion: '', code: 'INVALID_FIELD_TYPE' };
}

function rangeIssue(field: string, value: unknown, bound: 'low' | 'high'): ValidationIssue {
    const spec: OptionalFieldSpec | undefined = isOptionalField(field) ? OPTIONAL_FIELDS[field] : undefined;
    const suggestion = `Set ${field} to a value between ${String(spec?.min)} and ${String(spec?.max)}`;
    return bound === 'low'
        ? {
            field,
            message: `Field "${field}" must be at least ${String(spec?.min)}, got ${String(value)}`,
            suggestion,
            code: 'VALUE_TOO_LOW'
        }
        : {
            field,
            message: `Field "${field}" must be at most ${String(spec?.max)}, got ${String(value)}`,
            suggestion,
            code: 'VALUE_TOO_HIGH'
        };
}

function unknownFieldIssue(field: string): ValidationIssue {
    return {
        field,
        message: `Unknown configuration field: ${field}`,
        suggestion: `Remove "${field}" or check for typos. Valid fields are: ${KNOWN_FIELDS.join(', ')}`,
        code: 'UNKNOWN_FIELD'
    };
}

function toIssues(issue: z.ZodIssue, input: Record<string, unknown>): ValidationIssue[] {
    const head = issue.path[0];
    const field = typeof head === 'string' ? head : 'config';

    switch (issue.code) {
        case z.ZodIssueCode.unrecognized_keys:
            return issue.keys.map(unknownFieldIssue);
        case z.ZodIssueCode.invalid_type:
            return [typeIssue(field, input[field])];
        case z.ZodIssueCode.too_small:
            return [rangeIssue(field, input[field], 'low')];
        case z.ZodIssueCode.too_big:
            return [rangeIssue(field, input[field], 'high')];
        case z.ZodIssueCode.custom: {
            const code: unknown = issue.params?.code;
            const suggestion: unknown = issue.params?.suggestion;
            return [{
                field,
                message: issue.message,
                suggestion: typeof suggestion === 'string' ? suggestion : '',
                code: typeof code === 'string' ? code : 'INVALID_VALUE'
            }];
        }
        default:
            return [{ field, message: issue.message, suggestion: '', code: 'INVALID_VALUE' }];
    }
}

function collectWarnings(input: Record<string, unknown>): ValidationIssue[] {
    const server = input.tfe_server;
    if (typeof server === 'string' && isInsecureScheme(server)) {
        return [{
            field: 'tfe_server',
            message: 'Using insecure HTTP protocol',
            suggestion: 'Use HTTPS for secure communication with TFE server',
            code: 'INSECURE_PROTOCOL'
        }];
    }
    return [];
}

export function validateConnection(input: unknown): ValidationResult {
    if (!isRecord(input)) {
        return {
            ok: false,
            errors: [{
                field: 'config',
                message: 'Configuration must be an object',
                suggestion: 'Provide key-value pairs, not a list or scalar value',
                code: 'INVALID_STRUCTURE'
            }],
            warnings: [],
            descriptor: null
        };
    }

    const warnings = collectWarnings(input);
    const parsed = ConnectionSchema.safeParse(input);

    if (parsed.success) {
        logger.debug({ warnings: warnings.length }, 'Connection descriptor valid');
        return { ok: true, errors: [], warnings, descriptor: parsed.data };
    }

    const errors = parsed.error.issues.flatMap(issue => toIssues(issue, input));
    logger.debug({ errors: errors.map(e => e.code), warnings: warnings.length }, 'Connection descriptor rejected');
    return { ok: false, errors, warnings, descriptor: null };
}

function renderIssues(issues: readonly ValidationIssue[]): string[] {
    return issues.flatMap((issue, index) => {
        const lines = [`${index + 1}. **${issue.field}**: ${issue.message}`];
        if (issue.suggestion) {
            lines.push(`   Suggestion: ${issue.suggestion}`);
        }
        return lines;
    });
}

/**
 * Numbered, human-readable list of errors and warnings.
 */
export function summarizeValidation(result: ValidationResult): string {
    const lines = result.errors.length === 0
        ? ['Configuration is valid.']
        : [`Found ${result.errors.length} validation error(s):`, ...renderIssues(result.errors)];

    if (result.warnings.length > 0) {
        lines.push(`${result.warnings.length} warning(s):`, ...renderIssues(result.warnings));
    }
    return lines.join('\n');
}

/**
 * Template descriptor with every field filled in, for forms and docs.
 */
export function exampleConnection(): ConnectionDescriptor {
    return {
        tfe_server: REQUIRED_FIELDS.tfe_server.example,
        organization: REQUIRED_FIELDS.organization.example,
        token: REQUIRED_FIELDS.token.example,
        workspace_id: REQUIRED_FIELDS.workspace_id.example,
        run_id: REQUIRED_FIELDS.run_id.example,
        verify_ssl: OPTIONAL_FIELDS.verify_ssl.default,
        timeout: OPTIONAL_FIELDS.timeout.default,
        retry_attempts: OPTIONAL_FIELDS.retry_attempts.default
    };
}
