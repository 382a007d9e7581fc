import { extractPlanMetadata, type PlanMetadata } from '../plan/planMetadata.js';
import type { PlanJson } from '../plan/json.js';
import { maskOptional } from './masking.js';
import { SecretStore, type SecretStoreOptions } from './SecretStore.js';
import type { SecretSource } from './types.js';

export type PlanTags = { workspaceId?: string; runId?: string };

export type PlanSummary =
    | { readonly status: 'empty' }
    | {
        readonly status: 'loaded';
        readonly terraformVersion: string;
        readonly formatVersion: string;
        readonly resourceCount: number;
        readonly actionSummary: Readonly<Record<string, number>>;
        readonly source: SecretSource;
        readonly workspaceId: string | null;
        readonly runId: string | null;
        /** Approximate serialized size, e.g. "~12KB" */
        readonly dataSize: string;
    };

/**
 * Holds one plan JSON document together with metadata derived at store time.
 */
export class PlanStore extends SecretStore<PlanJson> {
    protected readonly kind = 'plan';
    private metadata: PlanMetadata | null = null;

    constructor(options: SecretStoreOptions = {}) {
        super('PlanStore', options);
    }

    override store(plan: PlanJson, source: SecretSource = 'unknown', tags: PlanTags = {}): void {
        super.store(plan, source, tags);
        this.metadata = extractPlanMetadata(plan, source, tags);
    }

    override clear(): void {
        super.clear();
        this.metadata = null;
    }

    getMetadata(): PlanMetadata | null {
        if (!this.metadata) return null;
        return { ...this.metadata, actionSummary: { ...this.metadata.actionSummary } };
    }

    getMaskedSummary(): PlanSummary {
        const entry = this.peek();
        const metadata = this.metadata;
        if (!entry || !metadata) return { status: 'empty' };
        const kilobytes = Math.floor(Buffer.byteLength(JSON.stringify(entry.value), 'utf8') / 1024);
        return {
            status: 'loaded',
            terraformVersion: metadata.terraformVersion,
            formatVersion: metadata.formatVersion,
            resourceCount: metadata.resourceCount,
            actionSummary: { ...metadata.actionSummary },
            source: metadata.source,
            workspaceId: maskOptional(metadata.workspaceId),
            runId: maskOptional(metadata.runId),
            dataSize: `~${kilobytes}KB`
        };
    }

    /**
     * Error context built only from metadata, never from plan content.
     */
    getSafeErrorContext(extra = ''): string {
        const parts = this.metadata
            ? [
                `source=${this.metadata.source}`,
                `resources=${this.metadata.resourceCount}`,
                `terraform=${this.metadata.terraformVersion}`
            ]
            : ['no plan loaded'];
        if (extra) {
            parts.push(extra);
        }
        return `Plan context: ${parts.join(', ')}`;
    }
}
