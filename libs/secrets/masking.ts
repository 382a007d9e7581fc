/**
 * Display masking for tokens and identifiers.
 * Values longer than 8 characters keep their first and last 4 characters;
 * shorter values are fully starred. Length is always preserved.
 */
export function maskSecret(value: string): string {
    if (value.length <= 8) {
        return '*'.repeat(value.length);
    }
    return `${value.slice(0, 4)}${'*'.repeat(value.length - 8)}${value.slice(-4)}`;
}

export function maskOptional(value: string | null | undefined): string | null {
    return value ? maskSecret(value) : null;
}
