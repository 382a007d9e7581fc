/**
 * Shared test data and a manual clock/scheduler pair for the secret stores.
 */

import type { ConnectionDescriptor } from '../../libs/config/connectionSchema.js';
import type { IdleScheduler } from '../../libs/secrets/types.js';

export const TOKEN = 'test-secret-0001';
export const WORKSPACE_ID = 'ws-Prod4821Alpha';
export const RUN_ID = 'run-Qx81Lm29Pa';
export const PLAN_ID = 'plan-Vb73Hk20Zr';
export const SERVER = 'tfe.internal.local';
export const BASE_URL = 'https://tfe.internal.local';

export function validInput(): Record<string, unknown> {
    return {
        tfe_server: SERVER,
        organization: 'platform-team',
        token: TOKEN,
        workspace_id: WORKSPACE_ID,
        run_id: RUN_ID
    };
}

export function descriptor(overrides: Partial<ConnectionDescriptor> = {}): ConnectionDescriptor {
    return {
        tfe_server: SERVER,
        organization: 'platform-team',
        token: TOKEN,
        workspace_id: WORKSPACE_ID,
        run_id: RUN_ID,
        verify_ssl: true,
        timeout: 30,
        retry_attempts: 3,
        ...overrides
    };
}

export function planFixture(): Record<string, unknown> {
    return {
        format_version: '1.2',
        terraform_version: '1.6.0',
        resource_changes: [
            { address: 'aws_s3_bucket.logs', change: { actions: ['create'] } },
            { address: 'aws_instance.web', change: { actions: ['delete', 'create'] } },
            { address: 'aws_iam_role.ci', change: { actions: ['update'] } }
        ]
    };
}

export interface ScheduledCheck {
    readonly callback: () => void;
    readonly delayMs: number;
    cancelled: boolean;
}

/**
 * Manual time source. `scheduled` records every idle check the store arms.
 */
export class ManualClock {
    now = Date.parse('2026-01-01T00:00:00.000Z');
    readonly scheduled: ScheduledCheck[] = [];

    readonly clock = (): number => this.now;

    readonly scheduler: IdleScheduler = (callback, delayMs) => {
        const check: ScheduledCheck = { callback, delayMs, cancelled: false };
        this.scheduled.push(check);
        return () => {
            check.cancelled = true;
        };
    };

    advance(seconds: number): void {
        this.now += seconds * 1000;
    }

    /** Most recently armed check that has not been cancelled */
    pending(): ScheduledCheck | undefined {
        return this.scheduled.filter(check => !check.cancelled).at(-1);
    }
}
