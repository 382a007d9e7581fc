import type { SecretSource } from '../secrets/types.js';
import { isRecord, type PlanJson } from './json.js';

/**
 * Non-sensitive facts about a stored plan. Safe to log and display.
 */
export interface PlanMetadata {
    readonly terraformVersion: string;
    readonly formatVersion: string;
    readonly resourceCount: number;
    /** Count of each action across resource_changes[].change.actions */
    readonly actionSummary: Readonly<Record<string, number>>;
    readonly source: SecretSource;
    readonly workspaceId?: string;
    readonly runId?: string;
}

function readVersion(plan: PlanJson, key: string): string {
    const value = plan[key];
    return typeof value === 'string' ? value : 'unknown';
}

export function extractPlanMetadata(
    plan: PlanJson,
    source: SecretSource,
    ids: { workspaceId?: string; runId?: string } = {}
): PlanMetadata {
    const changes = Array.isArray(plan.resource_changes) ? plan.resource_changes : [];
    const actionSummary: Record<string, number> = {};

    for (const resource of changes) {
        if (!isRecord(resource) || !isRecord(resource.change)) continue;
        const actions = resource.change.actions;
        if (!Array.isArray(actions)) continue;
        for (const action of actions) {
            if (typeof action === 'string') {
                actionSummary[action] = (actionSummary[action] ?? 0) + 1;
            }
        }
    }

    return {
        terraformVersion: readVersion(plan, 'terraform_version'),
        formatVersion: readVersion(plan, 'format_version'),
        resourceCount: changes.length,
        actionSummary,
        source,
        workspaceId: ids.workspaceId,
        runId: ids.runId
    };
}
