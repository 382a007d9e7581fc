/**
 * Syntactic checks on a TFE server address: optional http(s) scheme,
 * hostname, IPv4 address or localhost, optional port, optional path.
 */

export type ServerAddressProblem =
    | { readonly code: 'INVALID_PORT'; readonly port: string }
    | { readonly code: 'INVALID_PORT_FORMAT'; readonly port: string }
    | { readonly code: 'INVALID_HOSTNAME'; readonly host: string };

const HOST_LABEL = /^[A-Za-z0-9]([A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;
const PORT_DIGITS = /^[+-]?\d+$/;
const OCTET = /^\d+$/;

export function hasScheme(server: string): boolean {
    return server.startsWith('http://') || server.startsWith('https://');
}

export function isInsecureScheme(server: string): boolean {
    return server.startsWith('http://');
}

export function isValidIpv4(host: string): boolean {
    const parts = host.split('.');
    return parts.length === 4 && parts.every(part => OCTET.test(part) && Number(part) <= 255);
}

export function isValidHostname(host: string): boolean {
    if (host.toLowerCase() === 'localhost' || isValidIpv4(host)) {
        return true;
    }
    if (host.length > 253 || !host.includes('.')) {
        return false;
    }
    return host.split('.').every(label => label.length > 0 && label.length <= 63 && HOST_LABEL.test(label));
}

/**
 * First problem found in `server`, or null when it is usable.
 */
export function inspectServerAddress(server: string): ServerAddressProblem | null {
    const withoutScheme = hasScheme(server) ? server.slice(server.indexOf('://') + 3) : server;
    const authority = withoutScheme.replace(/\/+$/, '').split('/')[0] ?? '';

    let host = authority;
    const colon = authority.lastIndexOf(':');
    if (colon !== -1) {
        host = authority.slice(0, colon);
        const port = authority.slice(colon + 1);
        if (!PORT_DIGITS.test(port)) {
            return { code: 'INVALID_PORT_FORMAT', port };
        }
        const portNumber = Number(port);
        if (portNumber < 1 || portNumber > 65535) {
            return { code: 'INVALID_PORT', port };
        }
    }

    return isValidHostname(host) ? null : { code: 'INVALID_HOSTNAME', host };
}
