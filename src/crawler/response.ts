import { resolveUrl } from '../url/normalize.js';

export interface CrawlResponseInit {
    /** URL the task asked for */
    url: string;
    /** URL after redirects, defaults to `url` */
    finalUrl?: string;
    status: number;
    statusText?: string;
    headers?: Record<string, string> | Array<[string, string]>;
    body?: Uint8Array | string;
}

const CHARSET_PATTERN = /charset=\s*["']?([^;"'\s]+)/i;

/**
 * A fetched document, handed to the document handler and dropped once the
 * handler returns.
 */
export class CrawlResponse {
    readonly url: string;
    readonly finalUrl: string;
    readonly status: number;
    readonly statusText: string;
    readonly body: Uint8Array;
    private readonly headers = new Map<string, string>();
    private decoded: string | undefined;

    constructor(init: CrawlResponseInit) {
        this.url = init.url;
        this.finalUrl = init.finalUrl ?? init.url;
        this.status = init.status;
        this.statusText = init.statusText ?? '';
        this.body =
            typeof init.body === 'string'
                ? new TextEncoder().encode(init.body)
                : (init.body ?? new Uint8Array(0));

        const entries = Array.isArray(init.headers)
            ? init.headers
            : Object.entries(init.headers ?? {});
        for (const [key, value] of entries) {
            this.headers.set(key.toLowerCase(), value);
        }
    }

    get ok(): boolean {
        return this.status >= 200 && this.status < 300;
    }

    /** Header lookup, case-insensitive. */
    get(name: string): string | undefined;
    get(name: string, fallback: string): string;
    get(name: string, fallback?: string): string | undefined {
        return this.headers.get(name.toLowerCase()) ?? fallback;
    }

    /**
     * Charset named by the Content-Type header, if any.
     */
    get encoding(): string | undefined {
        const contentType = this.get('content-type');
        if (!contentType) return undefined;
        const match = CHARSET_PATTERN.exec(contentType);
        return match ? match[1].toLowerCase() : undefined;
    }

    /**
     * Body decoded with the declared charset, UTF-8 when none is declared
     * or the label is unknown. Malformed bytes become U+FFFD.
     */
    get text(): string {
        if (this.decoded === undefined) {
            this.decoded = decodeBody(this.body, this.encoding);
        }
        return this.decoded;
    }

    /**
     * Resolve a link found in this document against its final URL.
     */
    urlJoin(relative: string): string | null {
        return resolveUrl(this.finalUrl, relative);
    }
}

function decodeBody(body: Uint8Array, encoding: string | undefined): string {
    let decoder: TextDecoder;
    try {
        decoder = new TextDecoder(encoding ?? 'utf-8', { fatal: false });
    } catch {
        decoder = new TextDecoder('utf-8', { fatal: false });
    }
    return decoder.decode(body);
}
