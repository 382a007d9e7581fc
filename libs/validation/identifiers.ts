/**
 * Format checks for TFE workspace and run identifiers.
 * Shared by the connection validator and the plan retrieval path.
 */

export const WORKSPACE_ID_PATTERN = /^ws-[A-Za-z0-9]{6,}$/;
export const RUN_ID_PATTERN = /^run-[A-Za-z0-9]{6,}$/;

export interface IdentifierCheck {
    readonly valid: boolean;
    readonly message: string | null;
}

export function validateWorkspaceId(workspaceId: string | null | undefined): IdentifierCheck {
    if (!workspaceId) {
        return { valid: false, message: 'Workspace ID is required' };
    }
    if (!WORKSPACE_ID_PATTERN.test(workspaceId)) {
        return {
            valid: false,
            message:
                `Invalid workspace ID format: '${workspaceId}'. ` +
                "Workspace IDs should start with 'ws-' followed by at least 6 alphanumeric characters " +
                "(e.g., 'ws-ABC123456789')"
        };
    }
    return { valid: true, message: null };
}

export function validateRunId(runId: string | null | undefined): IdentifierCheck {
    if (!runId) {
        return { valid: false, message: 'Run ID is required' };
    }
    if (!RUN_ID_PATTERN.test(runId)) {
        return {
            valid: false,
            message:
                `Invalid run ID format: '${runId}'. ` +
                "Run IDs should start with 'run-' followed by at least 6 alphanumeric characters " +
                "(e.g., 'run-XYZ987654321')"
        };
    }
    return { valid: true, message: null };
}
