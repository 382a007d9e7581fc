import { isRecord } from '../plan/json.js';

/**
 * Overwrite a parsed JSON-like tree in place before it is dropped:
 * strings become asterisks of equal length, every other scalar becomes null.
 * Objects and arrays are walked, never replaced, so every holder of a
 * reference sees the scrubbed values.
 */
export function overwriteInPlace(target: unknown): void {
    if (Array.isArray(target)) {
        for (let i = 0; i < target.length; i++) {
            target[i] = scrubbed(target[i]);
        }
        return;
    }
    if (isRecord(target)) {
        for (const key of Object.keys(target)) {
            target[key] = scrubbed(target[key]);
        }
    }
}

function scrubbed(value: unknown): unknown {
    if (Array.isArray(value) || isRecord(value)) {
        overwriteInPlace(value);
        return value;
    }
    if (typeof value === 'string') {
        return '*'.repeat(value.length);
    }
    return null;
}
