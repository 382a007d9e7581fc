/**
 * Unit Tests: TfeClient
 *
 * Exercises the run → plan → JSON chain against an in-process MockAgent.
 * Backoff sleeps are recorded instead of awaited.
 *
 * @see libs/tfe/TfeClient.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import type { MockAgent } from 'undici';
import { TfeClient, extractJsonOutputUrl, extractPlanId } from '../../libs/tfe/TfeClient.js';
import { PlanResolutionError } from '../../libs/tfe/errors.js';
import { CredentialStore } from '../../libs/secrets/CredentialStore.js';
import { PlanStore } from '../../libs/secrets/PlanStore.js';
import { secretStoreRegistry } from '../../libs/secrets/registry.js';
import type { RetryNotice } from '../../libs/execution/retryEngine.js';
import type { ConnectionDescriptor } from '../../libs/config/connectionSchema.js';
import {
    BASE_URL,
    ManualClock,
    PLAN_ID,
    RUN_ID,
    TOKEN,
    WORKSPACE_ID,
    descriptor,
    planFixture
} from '../helpers/fixtures.js';
import {
    JSON_OUTPUT_PATH,
    createMockAgent,
    headerValue,
    mockHappyPath,
    planBody,
    runBody
} from '../helpers/mockTfe.js';
import { sendJson, startLocalServer } from '../helpers/localServer.js';

const RUN_PATH = `/api/v2/runs/${RUN_ID}`;
const PLAN_PATH = `/api/v2/plans/${PLAN_ID}`;
const ACCOUNT_PATH = '/api/v2/account/details';

describe('TfeClient', () => {
    let agent: MockAgent;
    let credentials: CredentialStore;
    let plans: PlanStore;
    let client: TfeClient;
    let sleeps: number[];

    function connect(overrides: Partial<ConnectionDescriptor> = {}): void {
        credentials.store(descriptor(overrides), 'environment');
    }

    async function authenticated(overrides: Partial<ConnectionDescriptor> = {}): Promise<void> {
        connect(overrides);
        agent.get(BASE_URL).intercept({ path: ACCOUNT_PATH, method: 'GET' }).reply(200, { data: {} });
        const auth = await client.authenticate();
        assert.strictEqual(auth.authenticated, true);
    }

    beforeEach(() => {
        const time = new ManualClock();
        agent = createMockAgent();
        credentials = new CredentialStore({ clock: time.clock, scheduler: time.scheduler });
        plans = new PlanStore({ clock: time.clock, scheduler: time.scheduler });
        sleeps = [];
        client = new TfeClient({
            credentials,
            plans,
            dispatcher: agent,
            retry: {
                sleep: async ms => {
                    sleeps.push(ms);
                },
                notifier: () => undefined,
                random: () => 0
            }
        });
    });

    afterEach(async () => {
        await client.close();
        credentials.dispose();
        plans.dispose();
        await agent.close();
    });

    describe('authenticate', () => {
        it('reports missing configuration', async () => {
            const result = await client.authenticate();
            assert.deepStrictEqual(result, { authenticated: false, error: 'No TFE configuration available' });
        });

        it('authenticates on 2xx and sends the bearer token', async () => {
            connect();
            let seen: unknown;
            agent.get(BASE_URL).intercept({ path: ACCOUNT_PATH, method: 'GET' }).reply(options => {
                seen = options.headers;
                return { statusCode: 200, data: { data: { id: 'user-Ab12Cd34' } } };
            });

            const result = await client.authenticate();

            assert.deepStrictEqual(result, { authenticated: true, error: null });
            assert.strictEqual(client.isAuthenticated, true);
            assert.strictEqual(headerValue(seen, 'authorization'), `Bearer ${TOKEN}`);
        });

        it('does not retry a rejected token', async () => {
            connect();
            agent.get(BASE_URL).intercept({ path: ACCOUNT_PATH, method: 'GET' }).reply(401, { errors: [] });

            const result = await client.authenticate();

            assert.strictEqual(result.authenticated, false);
            assert.ok(result.error?.startsWith('**Authentication Failed**'));
            assert.ok(!result.error?.includes(TOKEN));
            assert.deepStrictEqual(sleeps, []);
            assert.strictEqual(client.isAuthenticated, false);
        });
    });

    describe('validateConnection', () => {
        it('treats 200 and 401 as reachable', async () => {
            connect();
            const tfe = agent.get(BASE_URL);
            tfe.intercept({ path: '/api/v2', method: 'GET' }).reply(200, {});
            tfe.intercept({ path: '/api/v2', method: 'GET' }).reply(401, {});

            assert.deepStrictEqual(await client.validateConnection(), { reachable: true, message: 'Connection successful' });
            assert.deepStrictEqual(await client.validateConnection(), { reachable: true, message: 'Connection successful' });
        });

        it('reports an unreachable server once retries are spent', async () => {
            connect({ retry_attempts: 1 });
            agent.get(BASE_URL).intercept({ path: '/api/v2', method: 'GET' }).reply(502, '').times(2);

            const result = await client.validateConnection();

            assert.strictEqual(result.reachable, false);
            assert.ok(result.message.startsWith('**TFE Server Unreachable**'));
            assert.deepStrictEqual(sleeps, [1100]);
        });
    });

    describe('getPlanJson', () => {
        it('refuses to run before authentication', async () => {
            connect();
            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);
            assert.deepStrictEqual(result, { plan: null, error: 'Not authenticated with TFE server' });
        });

        it('rejects malformed identifiers without a request', async () => {
            await authenticated();

            const result = await client.getPlanJson('ws-ABC', RUN_ID);

            assert.strictEqual(result.plan, null);
            assert.ok(result.error?.startsWith('**Invalid Identifier Format**'));
            assert.ok(result.error?.includes("Invalid workspace ID format: 'ws-ABC'"));

            const run = await client.getPlanJson(WORKSPACE_ID, 'run_123456');
            assert.ok(run.error?.includes("Invalid run ID format: 'run_123456'"));
            agent.assertNoPendingInterceptors();
        });

        it('follows the link chain and stores the plan', async () => {
            connect();
            mockHappyPath(agent);
            assert.strictEqual((await client.authenticate()).authenticated, true);

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.strictEqual(result.error, null);
            assert.deepStrictEqual(result.plan, planFixture());
            assert.deepStrictEqual(sleeps, []);
            agent.assertNoPendingInterceptors();

            const metadata = plans.getMetadata();
            assert.strictEqual(metadata?.source, 'tfe_integration');
            assert.strictEqual(metadata?.resourceCount, 3);
            assert.strictEqual(metadata?.terraformVersion, '1.6.0');
            assert.deepStrictEqual(metadata?.actionSummary, { create: 2, delete: 1, update: 1 });
            assert.strictEqual(metadata?.workspaceId, WORKSPACE_ID);
            assert.strictEqual(metadata?.runId, RUN_ID);
        });

        it('returns a copy of the stored plan', async () => {
            connect();
            mockHappyPath(agent);
            await client.authenticate();

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);
            assert.ok(result.plan);
            result.plan['terraform_version'] = 'tampered';

            assert.strictEqual(plans.get()?.['terraform_version'], '1.6.0');
        });

        it('downloads from an absolute JSON output link', async () => {
            await authenticated();
            const tfe = agent.get(BASE_URL);
            tfe.intercept({ path: RUN_PATH, method: 'GET' }).reply(200, runBody());
            tfe.intercept({ path: PLAN_PATH, method: 'GET' })
                .reply(200, planBody('https://archivist.internal.local/v1/object/abc123'));
            agent.get('https://archivist.internal.local')
                .intercept({ path: '/v1/object/abc123', method: 'GET' })
                .reply(200, planFixture());

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.deepStrictEqual(result.plan, planFixture());
        });

        it('stops when the run has no plan', async () => {
            await authenticated();
            agent.get(BASE_URL).intercept({ path: RUN_PATH, method: 'GET' }).reply(200, { data: { id: RUN_ID } });

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.strictEqual(result.plan, null);
            assert.ok(result.error?.startsWith('**Plan Not Found**'));
            assert.ok(result.error?.includes('No plan found in run data'));
            assert.deepStrictEqual(sleeps, []);
            assert.strictEqual(plans.has(), false);
        });

        it('stops when the plan has no JSON output', async () => {
            await authenticated();
            const tfe = agent.get(BASE_URL);
            tfe.intercept({ path: RUN_PATH, method: 'GET' }).reply(200, runBody());
            tfe.intercept({ path: PLAN_PATH, method: 'GET' }).reply(200, { data: { id: PLAN_ID, attributes: {} } });

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.ok(result.error?.includes('No structured JSON output available for this plan'));
        });

        it('does not retry a download that is not JSON', async () => {
            await authenticated();
            const tfe = agent.get(BASE_URL);
            tfe.intercept({ path: RUN_PATH, method: 'GET' }).reply(200, runBody());
            tfe.intercept({ path: PLAN_PATH, method: 'GET' }).reply(200, planBody());
            tfe.intercept({ path: JSON_OUTPUT_PATH, method: 'GET' }).reply(200, '{"format_version": ');

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.ok(result.error?.startsWith('**Plan Not Found**'));
            assert.ok(result.error?.includes('Response body is not valid JSON'));
            assert.deepStrictEqual(sleeps, []);
        });

        it('rejects a download that is not a JSON object', async () => {
            await authenticated();
            const tfe = agent.get(BASE_URL);
            tfe.intercept({ path: RUN_PATH, method: 'GET' }).reply(200, runBody());
            tfe.intercept({ path: PLAN_PATH, method: 'GET' }).reply(200, planBody());
            tfe.intercept({ path: JSON_OUTPUT_PATH, method: 'GET' }).reply(200, '[1, 2, 3]');

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.ok(result.error?.includes('Plan JSON output is not a JSON object'));
        });

        it('retries a step that hits a server error', async () => {
            await authenticated();
            const tfe = agent.get(BASE_URL);
            tfe.intercept({ path: RUN_PATH, method: 'GET' }).reply(503, '').times(2);
            tfe.intercept({ path: RUN_PATH, method: 'GET' }).reply(200, runBody());
            tfe.intercept({ path: PLAN_PATH, method: 'GET' }).reply(200, planBody());
            tfe.intercept({ path: JSON_OUTPUT_PATH, method: 'GET' }).reply(200, planFixture());

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.deepStrictEqual(result.plan, planFixture());
            assert.deepStrictEqual(sleeps, [1100, 2200]);
        });

        it('maps a missing run to Plan Not Found without retrying', async () => {
            await authenticated();
            agent.get(BASE_URL).intercept({ path: RUN_PATH, method: 'GET' }).reply(404, { errors: [] });

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.ok(result.error?.startsWith('**Plan Not Found**'));
            assert.deepStrictEqual(sleeps, []);
        });

        it('removes the token from unexpected error text', async () => {
            await authenticated({ retry_attempts: 0 });
            agent.get(BASE_URL).intercept({ path: RUN_PATH, method: 'GET' })
                .replyWithError(new Error(`upstream rejected ${TOKEN}`));

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.ok(result.error?.startsWith('**Unexpected Error**'));
            assert.ok(result.error?.includes(`upstream rejected ${'*'.repeat(TOKEN.length)}`));
            assert.ok(!result.error?.includes(TOKEN));
        });

        it('keeps a token cut by the message length cap out of the error', async () => {
            await authenticated({ retry_attempts: 0 });
            agent.get(BASE_URL).intercept({ path: RUN_PATH, method: 'GET' })
                .replyWithError(new Error(`${'x'.repeat(490)}${TOKEN}`));

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.ok(result.error?.includes(`${'x'.repeat(490)}${'*'.repeat(10)}`));
            assert.ok(!result.error?.includes('test-'));
        });

        it('stops before the first request when already cancelled', async () => {
            await authenticated();
            const controller = new AbortController();
            controller.abort();

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID, { signal: controller.signal });

            assert.deepStrictEqual(result, { plan: null, error: 'Operation cancelled: run_lookup' });
        });
    });

    describe('close', () => {
        it('wipes both stores and drops the session', async () => {
            connect();
            mockHappyPath(agent);
            await client.authenticate();
            await client.getPlanJson(WORKSPACE_ID, RUN_ID);
            assert.strictEqual(plans.has(), true);

            await client.close();

            assert.strictEqual(plans.has(), false);
            assert.strictEqual(credentials.has(), false);
            assert.strictEqual(client.isAuthenticated, false);
            assert.deepStrictEqual(
                await client.getPlanJson(WORKSPACE_ID, RUN_ID),
                { plan: null, error: 'Not authenticated with TFE server' }
            );
        });
    });
});

describe('TfeClient store ownership', () => {
    it('releases a plan store it created on close', async () => {
        const time = new ManualClock();
        const credentials = new CredentialStore({ clock: time.clock, scheduler: time.scheduler });
        const before = secretStoreRegistry.size;

        for (let i = 0; i < 5; i++) {
            const client = new TfeClient({ credentials });
            await client.close();
        }

        assert.strictEqual(secretStoreRegistry.size, before);
        credentials.dispose();
    });

    it('leaves an injected plan store registered', async () => {
        const time = new ManualClock();
        const credentials = new CredentialStore({ clock: time.clock, scheduler: time.scheduler });
        const plans = new PlanStore({ clock: time.clock, scheduler: time.scheduler });
        const before = secretStoreRegistry.size;

        await new TfeClient({ credentials, plans }).close();

        assert.strictEqual(secretStoreRegistry.size, before);
        plans.dispose();
        credentials.dispose();
    });
});

describe('TfeClient isolation', () => {
    function instance() {
        const time = new ManualClock();
        const agent = createMockAgent();
        const credentials = new CredentialStore({ clock: time.clock, scheduler: time.scheduler });
        const plans = new PlanStore({ clock: time.clock, scheduler: time.scheduler });
        const client = new TfeClient({ credentials, plans, dispatcher: agent });
        credentials.store(descriptor(), 'environment');
        return { agent, credentials, plans, client };
    }

    it('keeps stores and sessions of separate clients apart', async () => {
        const first = instance();
        const second = instance();
        try {
            mockHappyPath(first.agent);
            mockHappyPath(second.agent);
            assert.strictEqual((await first.client.authenticate()).authenticated, true);
            assert.strictEqual((await second.client.authenticate()).authenticated, true);

            assert.strictEqual((await first.client.getPlanJson(WORKSPACE_ID, RUN_ID)).error, null);
            assert.strictEqual(first.plans.has(), true);
            assert.strictEqual(second.plans.has(), false);

            await first.client.close();

            assert.strictEqual(first.credentials.has(), false);
            assert.strictEqual(second.credentials.has(), true);
            assert.strictEqual(second.client.isAuthenticated, true);

            const result = await second.client.getPlanJson(WORKSPACE_ID, RUN_ID);
            assert.deepStrictEqual(result.plan, planFixture());
            assert.strictEqual(first.plans.has(), false);
        } finally {
            for (const side of [first, second]) {
                await side.client.close();
                side.credentials.dispose();
                side.plans.dispose();
                await side.agent.close();
            }
        }
    });
});

describe('TfeClient over the default dispatcher', () => {
    it('reports the rate-limit reset time sent by the server', async () => {
        const server = await startLocalServer((req, res) => {
            if (req.url === '/api/v2/account/details') {
                sendJson(res, 200, { data: {} });
                return;
            }
            sendJson(res, 429, { errors: [] }, { 'X-RateLimit-Reset': '42' });
        });
        const time = new ManualClock();
        const credentials = new CredentialStore({ clock: time.clock, scheduler: time.scheduler });
        const plans = new PlanStore({ clock: time.clock, scheduler: time.scheduler });
        const notices: RetryNotice[] = [];
        const sleeps: number[] = [];
        const client = new TfeClient({
            credentials,
            plans,
            retry: {
                sleep: async ms => {
                    sleeps.push(ms);
                },
                notifier: notice => notices.push(notice),
                random: () => 0
            }
        });

        try {
            credentials.store(descriptor({ tfe_server: server.baseUrl, retry_attempts: 1, timeout: 5 }), 'environment');
            assert.strictEqual((await client.authenticate()).authenticated, true);

            const result = await client.getPlanJson(WORKSPACE_ID, RUN_ID);

            assert.strictEqual(result.plan, null);
            assert.ok(result.error?.startsWith('**API Rate Limit Exceeded**'));
            assert.ok(result.error?.includes('Rate limit resets at 42'));
            assert.strictEqual(notices.length, 1);
            assert.strictEqual(notices[0]?.detail, 'Rate limited (resets at 42). Will retry automatically.');
            assert.deepStrictEqual(sleeps, [1100]);
            assert.deepStrictEqual(server.requests, [
                '/api/v2/account/details',
                `/api/v2/runs/${RUN_ID}`,
                `/api/v2/runs/${RUN_ID}`
            ]);
        } finally {
            await client.close();
            credentials.dispose();
            plans.dispose();
            await server.close();
        }
    });
});

describe('extractPlanId', () => {
    it('reads the plan relationship', () => {
        assert.strictEqual(extractPlanId(runBody()), PLAN_ID);
    });

    it('rejects a relationship of another type', () => {
        const body = { data: { relationships: { plan: { data: { id: PLAN_ID, type: 'applies' } } } } };
        assert.throws(() => extractPlanId(body), PlanResolutionError);
    });
});

describe('extractJsonOutputUrl', () => {
    it('reads the redacted JSON link', () => {
        assert.strictEqual(extractJsonOutputUrl(planBody()), `/api/v2/plans/${PLAN_ID}/json-output-redacted`);
    });

    it('rejects an empty link', () => {
        assert.throws(() => extractJsonOutputUrl(planBody('')), { message: 'No structured JSON output available for this plan' });
    });
});
