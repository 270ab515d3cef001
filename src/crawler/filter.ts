import { getDomain, isValidUrl } from '../url/normalize.js';

export type DomainMatch = 'exact' | 'suffix';

/**
 * Admission predicate over an allow-list of domains. An empty list admits
 * every http(s) URL.
 */
export class DomainFilter {
    private readonly domains: ReadonlySet<string>;
    private readonly match: DomainMatch;

    constructor(allowed: Iterable<string> = [], match: DomainMatch = 'exact') {
        const domains = new Set<string>();
        for (const entry of allowed) {
            const domain = normalizeDomainEntry(entry);
            if (domain) domains.add(domain);
        }
        this.domains = domains;
        this.match = match;
    }

    get unrestricted(): boolean {
        return this.domains.size === 0;
    }

    get allowed(): string[] {
        return [...this.domains];
    }

    admit(url: string): boolean {
        if (!isValidUrl(url)) return false;
        if (this.unrestricted) return true;

        const domain = getDomain(url);
        if (!domain) return false;

        return this.admitDomain(domain);
    }

    admitDomain(domain: string): boolean {
        if (this.unrestricted) return true;

        const host = domain.toLowerCase();
        if (this.domains.has(host)) return true;
        if (this.match === 'exact') return false;

        for (const allowed of this.domains) {
            if (host.endsWith(`.${allowed}`)) return true;
        }
        return false;
    }
}

function normalizeDomainEntry(entry: string): string {
    return entry
        .trim()
        .toLowerCase()
        .replace(/^\*?\./, '');
}
