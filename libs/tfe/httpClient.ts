/**
 * TFE HTTP Client
 *
 * Thin undici wrapper owned by one TfeClient. Non-2xx responses become
 * TfeHttpError; transport failures (TLS, timeouts, refused connections) are
 * thrown as undici / Node raised them so the classifier can read their codes.
 */

import { Agent, RetryAgent, request, type Dispatcher, type RetryHandler } from 'undici';
import { getComponentLogger } from '../logging/logger.js';
import { MalformedPlanError, TfeHttpError } from './errors.js';

const logger = getComponentLogger('TfeHttpClient');

export const USER_AGENT = 'terraform-plan-retrieval/1.0';
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Transport-level retries for idempotent requests, under the retry engine.
 * 429 is left to the engine so the rate-limit reset header reaches the caller.
 */
const TRANSPORT_RETRY: RetryHandler.RetryOptions = {
    maxRetries: 2,
    minTimeout: 250,
    maxTimeout: 2_000,
    methods: ['GET', 'HEAD', 'OPTIONS'],
    statusCodes: [500, 502, 503, 504]
};

export interface TfeHttpClientOptions {
    verifySsl?: boolean;
    timeoutMs?: number;
    /** Replaces the default Agent + RetryAgent stack; not closed by close() */
    dispatcher?: Dispatcher;
}

export interface ProbeResult {
    readonly statusCode: number;
    readonly headers: Readonly<Record<string, string>>;
}

export interface RequestOptions {
    token?: string;
    signal?: AbortSignal;
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        if (value === undefined) continue;
        flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
    return flat;
}

export class TfeHttpClient {
    /** Default request headers; cleared in place on close() */
    readonly headers = new Map<string, string>([
        ['User-Agent', USER_AGENT],
        ['Accept', 'application/vnd.api+json'],
        ['Cache-Control', 'no-cache, no-store, must-revalidate'],
        ['Pragma', 'no-cache']
    ]);

    private readonly dispatcher: Dispatcher;
    private readonly ownsDispatcher: boolean;
    private closed = false;

    constructor(options: TfeHttpClientOptions = {}) {
        const verifySsl = options.verifySsl ?? true;
        if (!verifySsl) {
            logger.warn('SSL certificate verification is DISABLED for TFE requests. Do not use this in production.');
        }

        if (options.dispatcher) {
            this.dispatcher = options.dispatcher;
            this.ownsDispatcher = false;
        } else {
            const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
            const agent = new Agent({
                connect: { rejectUnauthorized: verifySsl, timeout: timeoutMs },
                headersTimeout: timeoutMs,
                bodyTimeout: timeoutMs
            });
            this.dispatcher = new RetryAgent(agent, TRANSPORT_RETRY);
            this.ownsDispatcher = true;
        }
    }

    /**
     * GET `url` and parse the body as JSON.
     */
    async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
        const response = await this.send(url, options);
        if (response.statusCode < 200 || response.statusCode >= 300) {
            await response.body.dump();
            throw new TfeHttpError(
                response.statusCode,
                `TFE request failed with HTTP ${response.statusCode}`,
                flattenHeaders(response.headers)
            );
        }

        const text = await response.body.text();
        try {
            const parsed: unknown = JSON.parse(text);
            return parsed;
        } catch (err) {
            throw new MalformedPlanError('Response body is not valid JSON', err);
        }
    }

    /**
     * GET `url` and discard the body, whatever the status.
     */
    async probe(url: string, options: RequestOptions = {}): Promise<ProbeResult> {
        const response = await this.send(url, options);
        await response.body.dump();
        return { statusCode: response.statusCode, headers: flattenHeaders(response.headers) };
    }

    async close(): Promise<void> {
        this.headers.clear();
        if (this.closed) return;
        this.closed = true;
        if (this.ownsDispatcher) {
            await this.dispatcher.close();
        }
    }

    private send(url: string, options: RequestOptions): Promise<Dispatcher.ResponseData> {
        const headers: Record<string, string> = Object.fromEntries(this.headers);
        if (options.token) {
            headers['Authorization'] = `Bearer ${options.token}`;
        }
        return request(url, {
            method: 'GET',
            headers,
            dispatcher: this.dispatcher,
            signal: options.signal
        });
    }
}
