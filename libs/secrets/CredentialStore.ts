import type { ConnectionDescriptor } from '../config/connectionSchema.js';
import { maskSecret } from './masking.js';
import { SecretStore, type SecretStoreOptions } from './SecretStore.js';
import type { SecretSource } from './types.js';

export type CredentialSummary =
    | { readonly status: 'empty' }
    | {
        readonly status: 'loaded';
        readonly tfeServer: string;
        readonly organization: string;
        readonly token: string;
        readonly workspaceId: string;
        readonly runId: string;
        readonly verifySsl: boolean;
        readonly timeout: number;
        readonly retryAttempts: number;
        readonly source: SecretSource;
    };

/**
 * Holds one validated connection descriptor, API token included.
 */
export class CredentialStore extends SecretStore<ConnectionDescriptor> {
    protected readonly kind = 'credentials';

    constructor(options: SecretStoreOptions = {}) {
        super('CredentialStore', options);
    }

    getDescriptor(): ConnectionDescriptor | null {
        return this.get();
    }

    /**
     * Stored descriptor with only the token masked.
     */
    getMaskedConfig(): ConnectionDescriptor | null {
        const entry = this.peek();
        if (!entry) return null;
        return { ...entry.value, token: maskSecret(entry.value.token) };
    }

    getMaskedSummary(): CredentialSummary {
        const entry = this.peek();
        if (!entry) return { status: 'empty' };
        const descriptor = entry.value;
        return {
            status: 'loaded',
            tfeServer: descriptor.tfe_server,
            organization: descriptor.organization,
            token: maskSecret(descriptor.token),
            workspaceId: maskSecret(descriptor.workspace_id),
            runId: maskSecret(descriptor.run_id),
            verifySsl: descriptor.verify_ssl,
            timeout: descriptor.timeout,
            retryAttempts: descriptor.retry_attempts,
            source: entry.source
        };
    }
}
