/**
 * Shared shapes for the memory-only secret stores.
 */

export type SecretKind = 'credentials' | 'plan';

export type SecretSource =
    | 'file_upload'
    | 'tfe_integration'
    | 'manual_entry'
    | 'environment'
    | 'unknown';

export type SecretTags = Readonly<Record<string, string | undefined>>;

/**
 * One held secret. `value` lives in memory only and is overwritten before release.
 */
export interface StoredSecret<TValue> {
    readonly kind: SecretKind;
    readonly value: TValue;
    readonly source: SecretSource;
    readonly tags: SecretTags;
    readonly storedAt: number;
}

export interface SessionInfo {
    readonly active: boolean;
    readonly timeRemainingSeconds: number;
    /** ISO-8601 time of the last read or store, null when inactive */
    readonly lastAccess: string | null;
    readonly timeoutSeconds: number;
}

/** Cancels a scheduled idle check */
export type CancelTimer = () => void;

/** Schedules `callback` after `delayMs`; the default keeps the process free to exit */
export type IdleScheduler = (callback: () => void, delayMs: number) => CancelTimer;
