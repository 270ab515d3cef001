import { fetch, type Dispatcher } from 'undici';
import { CrawlResponse } from './response.js';
import { FetchError } from './errors.js';

export const DEFAULT_USER_AGENT = 'crawl-engine/0.1';
export const DEFAULT_TIMEOUT_MS = 30000;

export interface FetchOptions {
    userAgent?: string;
    timeout?: number;
    maxRedirections?: number;
    /** undici dispatcher, e.g. a pooled Agent or a MockAgent in tests */
    dispatcher?: Dispatcher;
}

/**
 * The fetch collaborator a crawl run calls once per task. Resolves with the
 * response or rejects; a rejection ends the task without a retry.
 */
export type Fetcher = (url: string) => Promise<CrawlResponse>;

export async function fetchDocument(
    url: string,
    options: FetchOptions = {}
): Promise<CrawlResponse> {
    const {
        userAgent = DEFAULT_USER_AGENT,
        timeout = DEFAULT_TIMEOUT_MS,
        maxRedirections = 5,
        dispatcher,
    } = options;

    let response: Awaited<ReturnType<typeof fetch>>;
    let body: ArrayBuffer;
    try {
        response = await fetch(url, {
            headers: {
                'User-Agent': userAgent,
                Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.5',
                'Cache-Control': 'no-cache',
                Pragma: 'no-cache',
            },
            redirect: maxRedirections > 0 ? 'follow' : 'manual',
            signal: AbortSignal.timeout(timeout),
            dispatcher,
        });
        body = await response.arrayBuffer();
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new FetchError(`Failed to fetch ${url}: ${reason}`, url, {
            cause: error,
        });
    }

    if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} for ${url}`, url, {
            status: response.status,
        });
    }

    const headers: Array<[string, string]> = [];
    response.headers.forEach((value, key) => {
        headers.push([key, value]);
    });

    return new CrawlResponse({
        url,
        finalUrl: response.url || url,
        status: response.status,
        statusText: response.statusText,
        headers,
        body: new Uint8Array(body),
    });
}

/**
 * Bind options into a Fetcher for a crawl run.
 */
export function createFetcher(options: FetchOptions = {}): Fetcher {
    return (url: string) => fetchDocument(url, options);
}
