/**
 * Canonical form used as a task's identity: scheme and host lower-cased,
 * default port dropped, fragment removed. Path and query are kept as
 * written, so `/a` and `/a/` stay distinct pages.
 * Unparseable input is returned unchanged.
 */
export function normalizeUrl(url: string): string {
    try {
        const parsed = new URL(url.trim());

        // Remove fragment
        parsed.hash = '';

        return parsed.href;
    } catch {
        return url;
    }
}

/**
 * Lower-cased host name of a URL (no port), or null when it has none.
 */
export function getDomain(url: string): string | null {
    try {
        const { hostname } = new URL(url);
        return hostname ? hostname.toLowerCase() : null;
    } catch {
        return null;
    }
}

export function isValidUrl(url: string): boolean {
    try {
        const parsed = new URL(url);
        return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Resolve `relative` against `base` with standard URL resolution rules.
 * Absolute input comes back as-is (normalized by the URL parser).
 */
export function resolveUrl(base: string, relative: string): string | null {
    try {
        return new URL(relative, base).href;
    } catch {
        return null;
    }
}

export function isSameOrigin(url1: string, url2: string): boolean {
    try {
        const u1 = new URL(url1);
        const u2 = new URL(url2);
        return u1.origin === u2.origin;
    } catch {
        return false;
    }
}
