/**
 * Secret Store
 *
 * Memory-only holder for one sensitive value with an idle session timeout.
 * Values are deep-copied in and out; the held copy is overwritten before it
 * is released. After `timeoutSeconds` without a read or store the value is
 * cleared by a timer that never keeps the process alive.
 */

import { getComponentLogger, type Logger } from '../logging/logger.js';
import { overwriteInPlace } from './overwrite.js';
import { secretStoreRegistry, type ClearableStore } from './registry.js';
import type {
    CancelTimer,
    IdleScheduler,
    SecretKind,
    SecretSource,
    SecretTags,
    SessionInfo,
    StoredSecret
} from './types.js';

export const DEFAULT_SESSION_TIMEOUT_SECONDS = 3600;
export const MIN_SESSION_TIMEOUT_SECONDS = 60;

export interface SecretStoreOptions {
    timeoutSeconds?: number;
    /** Milliseconds since the epoch */
    clock?: () => number;
    scheduler?: IdleScheduler;
}

const unrefScheduler: IdleScheduler = (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs);
    timer.unref();
    return () => clearTimeout(timer);
};

function assertTimeout(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < MIN_SESSION_TIMEOUT_SECONDS) {
        throw new RangeError(`Session timeout must be at least ${MIN_SESSION_TIMEOUT_SECONDS} seconds`);
    }
}

export abstract class SecretStore<TValue extends object> implements ClearableStore {
    protected abstract readonly kind: SecretKind;
    protected readonly logger: Logger;

    private entry: StoredSecret<TValue> | null = null;
    private sessionActive = false;
    private lastAccess: number | null = null;
    private timeoutMs: number;
    private cancelTimer: CancelTimer | null = null;
    private readonly clock: () => number;
    private readonly scheduler: IdleScheduler;

    /**
     * Clear every live store. Also runs on process exit.
     */
    static cleanupAllInstances(): number {
        return secretStoreRegistry.clearAll();
    }

    protected constructor(component: string, options: SecretStoreOptions = {}) {
        const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_SESSION_TIMEOUT_SECONDS;
        assertTimeout(timeoutSeconds);
        this.timeoutMs = timeoutSeconds * 1000;
        this.clock = options.clock ?? Date.now;
        this.scheduler = options.scheduler ?? unrefScheduler;
        this.logger = getComponentLogger(component);
        secretStoreRegistry.register(this);
    }

    get label(): string {
        return this.kind;
    }

    store(value: TValue, source: SecretSource = 'unknown', tags: SecretTags = {}): void {
        this.discardEntry();
        this.entry = {
            kind: this.kind,
            value: structuredClone(value),
            source,
            tags: { ...tags },
            storedAt: this.clock()
        };
        this.sessionActive = true;
        this.touch();
        this.logger.info({ kind: this.kind, source }, 'Secret stored in memory');
    }

    get(): TValue | null {
        if (!this.entry) return null;
        this.touch();
        return structuredClone(this.entry.value);
    }

    has(): boolean {
        return this.entry !== null;
    }

    /** Masked, display-safe view of the held value */
    abstract getMaskedSummary(): object;

    /**
     * Overwrite and drop the held value. Safe to call repeatedly.
     */
    clear(): void {
        const hadValue = this.entry !== null;
        this.discardEntry();
        this.disarmTimer();
        this.sessionActive = false;
        this.lastAccess = null;
        if (hadValue) {
            this.logger.info({ kind: this.kind }, 'Secret cleared from memory');
        }
    }

    getSessionInfo(): SessionInfo {
        const timeoutSeconds = this.timeoutMs / 1000;
        if (!this.sessionActive || this.lastAccess === null) {
            return { active: false, timeRemainingSeconds: 0, lastAccess: null, timeoutSeconds };
        }
        const remainingMs = Math.max(0, this.timeoutMs - (this.clock() - this.lastAccess));
        return {
            active: true,
            timeRemainingSeconds: Math.ceil(remainingMs / 1000),
            lastAccess: new Date(this.lastAccess).toISOString(),
            timeoutSeconds
        };
    }

    setSessionTimeout(seconds: number): void {
        assertTimeout(seconds);
        this.timeoutMs = seconds * 1000;
        if (this.sessionActive) {
            this.checkIdleTimeout();
        }
    }

    extendSession(): void {
        if (this.sessionActive) {
            this.touch();
        }
    }

    /**
     * Idle timer callback: clear when the session has been idle for the full
     * timeout, otherwise wait out the remainder.
     */
    checkIdleTimeout(): void {
        if (!this.sessionActive || this.lastAccess === null) {
            this.disarmTimer();
            return;
        }
        const idleMs = this.clock() - this.lastAccess;
        if (idleMs >= this.timeoutMs) {
            this.logger.info({ kind: this.kind, idleSeconds: Math.floor(idleMs / 1000) }, 'Session idle timeout reached');
            this.clear();
            return;
        }
        this.armTimer(this.timeoutMs - idleMs);
    }

    dispose(): void {
        this.clear();
        secretStoreRegistry.unregister(this);
    }

    /** Held entry without copying or bumping the access time */
    protected peek(): StoredSecret<TValue> | null {
        return this.entry;
    }

    private touch(): void {
        this.lastAccess = this.clock();
        this.armTimer(this.timeoutMs);
    }

    private armTimer(delayMs: number): void {
        this.disarmTimer();
        this.cancelTimer = this.scheduler(() => this.checkIdleTimeout(), delayMs);
    }

    private disarmTimer(): void {
        if (this.cancelTimer) {
            this.cancelTimer();
            this.cancelTimer = null;
        }
    }

    private discardEntry(): void {
        if (this.entry) {
            overwriteInPlace(this.entry.value);
            this.entry = null;
        }
    }
}
