import { z } from 'zod';
import { DEFAULT_BASE_DELAY_MS } from '../../execution/retryEngine.js';
import { DEFAULT_SESSION_TIMEOUT_SECONDS, MIN_SESSION_TIMEOUT_SECONDS } from '../../secrets/SecretStore.js';
import type { Env, GuardRule } from '../config-guard.js';

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

const RuntimeSettingsSchema = z.object({
    sessionTimeoutSeconds: z.coerce.number().int().min(MIN_SESSION_TIMEOUT_SECONDS).default(DEFAULT_SESSION_TIMEOUT_SECONDS),
    retryBaseDelayMs: z.coerce.number().int().min(0).default(DEFAULT_BASE_DELAY_MS)
});

export type RuntimeSettings = z.output<typeof RuntimeSettingsSchema>;

function runtimeInput(env: Env) {
    return {
        sessionTimeoutSeconds: env.SESSION_TIMEOUT_SECONDS,
        retryBaseDelayMs: env.RETRY_BASE_DELAY_MS
    };
}

function parseBoolean(raw: string): boolean | string {
    const lowered = raw.trim().toLowerCase();
    if (TRUE_VALUES.has(lowered)) return true;
    if (FALSE_VALUES.has(lowered)) return false;
    return raw;
}

function parseInteger(raw: string): number | string {
    return /^-?\d+$/.test(raw.trim()) ? Number(raw.trim()) : raw;
}

/**
 * TFE connection environment guards.
 */
export const TFE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'TFE_SERVER' },
    { type: 'required', name: 'TFE_ORGANIZATION' },
    { type: 'required', name: 'TFE_TOKEN' },
    { type: 'required', name: 'TFE_WORKSPACE_ID' },
    { type: 'required', name: 'TFE_RUN_ID' },

    {
        type: 'forbidIf',
        name: 'TFE_VERIFY_SSL',
        when: env => env.NODE_ENV === 'production' && parseBoolean(env.TFE_VERIFY_SSL ?? 'true') === false,
        message: 'SSL verification cannot be disabled in production'
    },
    {
        type: 'assert',
        check: env => RuntimeSettingsSchema.safeParse(runtimeInput(env)).success,
        message: `SESSION_TIMEOUT_SECONDS must be an integer >= ${MIN_SESSION_TIMEOUT_SECONDS} and RETRY_BASE_DELAY_MS a non-negative integer`
    }
];

/**
 * Raw connection descriptor from TFE_* variables. Booleans and integers are
 * parsed; anything unparsable is passed through as text so the connection
 * validator reports it. Unset variables are left out.
 */
export function connectionInputFromEnv(env: Env = process.env): Record<string, unknown> {
    const input: Record<string, unknown> = {};
    const text: ReadonlyArray<readonly [string, string]> = [
        ['tfe_server', 'TFE_SERVER'],
        ['organization', 'TFE_ORGANIZATION'],
        ['token', 'TFE_TOKEN'],
        ['workspace_id', 'TFE_WORKSPACE_ID'],
        ['run_id', 'TFE_RUN_ID']
    ];
    for (const [field, name] of text) {
        const value = env[name];
        if (value !== undefined) input[field] = value;
    }

    if (env.TFE_VERIFY_SSL !== undefined) input.verify_ssl = parseBoolean(env.TFE_VERIFY_SSL);
    if (env.TFE_TIMEOUT !== undefined) input.timeout = parseInteger(env.TFE_TIMEOUT);
    if (env.TFE_RETRY_ATTEMPTS !== undefined) input.retry_attempts = parseInteger(env.TFE_RETRY_ATTEMPTS);

    return input;
}

/**
 * Session and backoff settings. Callers run TFE_CONFIG_GUARDS first; invalid
 * values throw here.
 */
export function runtimeSettingsFromEnv(env: Env = process.env): RuntimeSettings {
    return RuntimeSettingsSchema.parse(runtimeInput(env));
}
