import { describeError } from '../errors/sanitizer.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('SecretStoreRegistry');

export interface ClearableStore {
    readonly label: string;
    clear(): void;
}

/**
 * Every live secret store, held explicitly. Stores join on construction and
 * leave on dispose(); clearAll() runs once more when the process exits.
 */
class SecretStoreRegistry {
    private readonly live = new Set<ClearableStore>();
    private exitHookInstalled = false;

    register(store: ClearableStore): void {
        this.live.add(store);
        this.installExitHook();
    }

    unregister(store: ClearableStore): void {
        this.live.delete(store);
    }

    get size(): number {
        return this.live.size;
    }

    /**
     * Clear every registered store. A store that throws is logged and skipped.
     * Returns how many stores cleared.
     */
    clearAll(): number {
        let cleared = 0;
        for (const store of [...this.live]) {
            try {
                store.clear();
                cleared++;
            } catch (err) {
                logger.error({ store: store.label, error: describeError(err) }, 'Failed to clear secret store');
            }
        }
        return cleared;
    }

    private installExitHook(): void {
        if (this.exitHookInstalled) return;
        process.once('exit', () => {
            this.clearAll();
        });
        this.exitHookInstalled = true;
    }
}

export const secretStoreRegistry = new SecretStoreRegistry();
