/**
 * Base URL for a configured TFE server: `https://` is assumed when no scheme
 * is given, trailing slashes are dropped.
 */
export function normalizeServerUrl(server: string): string {
    const trimmed = server.trim();
    const withScheme = /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
    return withScheme.replace(/\/+$/, '');
}

/**
 * Resolve an API path or a link from a response body against the server.
 * Absolute links (pre-signed download URLs) are returned unchanged.
 */
export function resolveApiUrl(baseUrl: string, pathOrUrl: string): string {
    return new URL(pathOrUrl, `${baseUrl}/`).toString();
}
