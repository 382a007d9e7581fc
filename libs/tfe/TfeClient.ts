/**
 * TFE Client
 *
 * Retrieves a plan's redacted JSON through the run → plan → JSON link chain.
 * Every GET is handed to the retry engine on its own; the first step that
 * gives up ends the pipeline. Results are `{ value | error }` pairs and every
 * error string has the API token removed.
 */

import type { Dispatcher } from 'undici';
import type { ConnectionDescriptor } from '../config/connectionSchema.js';
import { redactValues } from '../errors/sanitizer.js';
import { markdownFormatter } from '../execution/errorFormatter.js';
import { validateRunId, validateWorkspaceId } from '../execution/failureClassifier.js';
import { createErrorContext } from '../execution/failureTypes.js';
import { RetryEngine, type RetryEngineOptions, type RetryOutcome } from '../execution/retryEngine.js';
import { getComponentLogger } from '../logging/logger.js';
import { isRecord, type PlanJson } from '../plan/json.js';
import type { CredentialStore } from '../secrets/CredentialStore.js';
import { maskSecret } from '../secrets/masking.js';
import { PlanStore } from '../secrets/PlanStore.js';
import { MalformedPlanError, PlanResolutionError, TfeError, TfeHttpError } from './errors.js';
import { TfeHttpClient } from './httpClient.js';
import { normalizeServerUrl, resolveApiUrl } from './serverUrl.js';

const logger = getComponentLogger('TfeClient');

export interface TfeClientOptions {
    credentials: CredentialStore;
    /** Defaults to a store owned by this client */
    plans?: PlanStore;
    /** Retry tuning; the retry budget always comes from the descriptor */
    retry?: Omit<RetryEngineOptions, 'maxRetries'>;
    /** HTTP dispatcher override, e.g. an undici MockAgent */
    dispatcher?: Dispatcher;
}

export type AuthResult =
    | { readonly authenticated: true; readonly error: null }
    | { readonly authenticated: false; readonly error: string };

export type PlanResult =
    | { readonly plan: PlanJson; readonly error: null }
    | { readonly plan: null; readonly error: string };

export interface ConnectionCheck {
    readonly reachable: boolean;
    readonly message: string;
}

export interface PlanRequestOptions {
    signal?: AbortSignal;
}

function pluck(value: unknown, ...path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (!isRecord(current)) return undefined;
        current = current[key];
    }
    return current;
}

/** `data.relationships.plan.data.id` of a run, when it points at a plan */
export function extractPlanId(runBody: unknown): string {
    const plan = pluck(runBody, 'data', 'relationships', 'plan', 'data');
    const id = pluck(plan, 'id');
    if (pluck(plan, 'type') === 'plans' && typeof id === 'string' && id.length > 0) {
        return id;
    }
    throw new PlanResolutionError('No plan found in run data');
}

export function extractJsonOutputUrl(planBody: unknown): string {
    const link = pluck(planBody, 'data', 'attributes', 'json-output-redacted');
    if (typeof link === 'string' && link.length > 0) {
        return link;
    }
    throw new PlanResolutionError('No structured JSON output available for this plan');
}

export class TfeClient {
    readonly plans: PlanStore;
    private readonly ownsPlans: boolean;
    private readonly credentials: CredentialStore;
    private readonly retryOptions: Omit<RetryEngineOptions, 'maxRetries'>;
    private readonly dispatcher?: Dispatcher;
    private http: TfeHttpClient | null = null;
    private authenticated = false;

    constructor(options: TfeClientOptions) {
        this.credentials = options.credentials;
        this.plans = options.plans ?? new PlanStore();
        this.ownsPlans = options.plans === undefined;
        this.retryOptions = options.retry ?? {};
        this.dispatcher = options.dispatcher;
    }

    get isAuthenticated(): boolean {
        return this.authenticated;
    }

    async authenticate(signal?: AbortSignal): Promise<AuthResult> {
        const descriptor = this.credentials.getDescriptor();
        if (!descriptor) {
            return { authenticated: false, error: 'No TFE configuration available' };
        }

        const baseUrl = normalizeServerUrl(descriptor.tfe_server);
        const http = this.session(descriptor);
        const outcome = await this.engine(descriptor).run(async () => {
            const { statusCode, headers } = await http.probe(
                resolveApiUrl(baseUrl, '/api/v2/account/details'),
                { token: descriptor.token, signal }
            );
            if (statusCode < 200 || statusCode >= 300) {
                throw new TfeHttpError(statusCode, `Authentication request failed with HTTP ${statusCode}`, headers);
            }
        }, createErrorContext('authentication', { serverUrl: baseUrl, secrets: [descriptor.token] }), signal);

        if (!outcome.ok) {
            this.authenticated = false;
            return { authenticated: false, error: redactValues(outcome.error, [descriptor.token]) };
        }

        this.authenticated = true;
        logger.info({ server: baseUrl, organization: descriptor.organization }, 'Authenticated with TFE');
        return { authenticated: true, error: null };
    }

    async getPlanJson(workspaceId: string, runId: string, options: PlanRequestOptions = {}): Promise<PlanResult> {
        const http = this.http;
        if (!this.authenticated || !http) {
            return { plan: null, error: 'Not authenticated with TFE server' };
        }
        const descriptor = this.credentials.getDescriptor();
        if (!descriptor) {
            return { plan: null, error: 'No TFE configuration available' };
        }

        const baseUrl = normalizeServerUrl(descriptor.tfe_server);
        const ids = { serverUrl: baseUrl, workspaceId, runId, secrets: [descriptor.token] };

        for (const check of [validateWorkspaceId(workspaceId), validateRunId(runId)]) {
            if (!check.valid) {
                return { plan: null, error: this.invalidIdentifier(check.message ?? 'Invalid identifier', ids) };
            }
        }

        const { signal } = options;
        const token = descriptor.token;
        const engine = this.engine(descriptor);
        const step = <T>(operation: string, action: () => Promise<T>): Promise<RetryOutcome<T>> =>
            engine.run(action, createErrorContext(operation, ids), signal);
        const fail = (error: string): PlanResult => ({ plan: null, error: redactValues(error, [token]) });

        const planId = await step('run_lookup', async () => extractPlanId(
            await http.getJson(resolveApiUrl(baseUrl, `/api/v2/runs/${encodeURIComponent(runId)}`), { token, signal })
        ));
        if (!planId.ok) return fail(planId.error);

        const jsonLink = await step('plan_lookup', async () => extractJsonOutputUrl(
            await http.getJson(resolveApiUrl(baseUrl, `/api/v2/plans/${encodeURIComponent(planId.value)}`), { token, signal })
        ));
        if (!jsonLink.ok) return fail(jsonLink.error);

        const download = await step('plan_download', async () => {
            const body = await http.getJson(resolveApiUrl(baseUrl, jsonLink.value), { token, signal });
            if (!isRecord(body)) {
                throw new MalformedPlanError('Plan JSON output is not a JSON object');
            }
            return body;
        });
        if (!download.ok) return fail(download.error);

        this.plans.store(download.value, 'tfe_integration', { workspaceId, runId });
        const plan = this.plans.get();
        if (!plan) {
            return fail('Plan data was cleared before it could be returned');
        }

        logger.info({
            workspaceId: maskSecret(workspaceId),
            runId: maskSecret(runId),
            resourceCount: this.plans.getMetadata()?.resourceCount
        }, 'Plan JSON retrieved');
        return { plan, error: null };
    }

    /**
     * Unauthenticated reachability check. A 401 still proves the server answered.
     */
    async validateConnection(signal?: AbortSignal): Promise<ConnectionCheck> {
        const descriptor = this.credentials.getDescriptor();
        if (!descriptor) {
            return { reachable: false, message: 'No TFE configuration available' };
        }

        const baseUrl = normalizeServerUrl(descriptor.tfe_server);
        const http = this.session(descriptor);
        const outcome = await this.engine(descriptor).run(async () => {
            const { statusCode, headers } = await http.probe(resolveApiUrl(baseUrl, '/api/v2'), { signal });
            if (statusCode !== 200 && statusCode !== 401) {
                throw new TfeHttpError(statusCode, `Server returned status code: ${statusCode}`, headers);
            }
        }, createErrorContext('connection_validation', { serverUrl: baseUrl, secrets: [descriptor.token] }), signal);

        if (!outcome.ok) {
            return { reachable: false, message: redactValues(outcome.error, [descriptor.token]) };
        }
        return { reachable: true, message: 'Connection successful' };
    }

    /**
     * Close the HTTP client and wipe both secret stores. A plan store this
     * client created is also released from the registry.
     */
    async close(): Promise<void> {
        const http = this.http;
        this.http = null;
        this.authenticated = false;
        try {
            await http?.close();
        } finally {
            if (this.ownsPlans) {
                this.plans.dispose();
            } else {
                this.plans.clear();
            }
            this.credentials.clear();
        }
    }

    private session(descriptor: ConnectionDescriptor): TfeHttpClient {
        if (!this.http) {
            this.http = new TfeHttpClient({
                verifySsl: descriptor.verify_ssl,
                timeoutMs: descriptor.timeout * 1000,
                dispatcher: this.dispatcher
            });
        }
        return this.http;
    }

    private engine(descriptor: ConnectionDescriptor): RetryEngine {
        return new RetryEngine({ ...this.retryOptions, maxRetries: descriptor.retry_attempts });
    }

    private invalidIdentifier(message: string, ids: { serverUrl: string; workspaceId: string; runId: string; secrets: readonly string[] }): string {
        const context = createErrorContext('plan_retrieval', ids);
        context.category = 'INVALID_ID_FORMAT';
        context.error = new TfeError('INVALID_ID_FORMAT', message, { category: 'INVALID_ID_FORMAT' });
        const formatter = this.retryOptions.formatter ?? markdownFormatter;
        return formatter.format(context.category, context);
    }
}
