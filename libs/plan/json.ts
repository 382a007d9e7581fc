/**
 * Plan JSON is handled as plain parsed data; only the fields this package
 * reads are narrowed, at the point of use.
 */
export type PlanJson = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
