import type { CrawlResponse } from './crawler/response.js';
import type { Fetcher } from './crawler/fetch.js';
import type { DomainMatch } from './crawler/filter.js';
import type { Logger } from './utils/logger.js';

export interface CrawlOptions {
    /** Global concurrency cap (default 20) */
    maxWorker?: number;
    /** Concurrency cap per domain (default 5) */
    workerDomain?: number;
    /** Domains a URL must belong to; empty admits everything */
    allowedDomains?: string[];
    domainMatch?: DomainMatch;
    /** Apply the allow-list to seed URLs too (default true) */
    filterSeeds?: boolean;
    /** Period of the status log line in ms, 0 disables it */
    statusIntervalMs?: number;
    /** Timeout of the default fetcher in ms */
    timeout?: number;
    /** User agent of the default fetcher */
    userAgent?: string;
    fetcher?: Fetcher;
    logger?: Logger;
    /** Aborting this signal cancels every run of the crawler */
    signal?: AbortSignal;
}

/** A task holds its domain and global slots from `fetching` until `done`. */
export type TaskState = 'queued' | 'fetching' | 'handling' | 'done';

export interface CrawlTask {
    url: string;
    domain: string;
    retries: number;
    state: TaskState;
}

/**
 * What a document handler gets besides the response.
 */
export interface TaskContext {
    runId: string;
    /** URL of the task being handled */
    url: string;
    /** Aborted when the run is cancelled */
    signal: AbortSignal;
    /**
     * Submit discovered URLs. Returns how many were admitted; filtered and
     * already-seen URLs are dropped silently.
     */
    addTask(...urls: string[]): number;
}

export type DocumentHandler = (
    response: CrawlResponse,
    context: TaskContext
) => void | Promise<void>;

export interface CrawlSummary {
    runId: string;
    admitted: number;
    fetched: number;
    handled: number;
    fetchFailed: number;
    handlerFailed: number;
    /** Queued tasks dropped when the run was cancelled */
    dropped: number;
    filtered: number;
    duplicates: number;
    cancelled: boolean;
    elapsedMs: number;
    pagesPerMinute: number;
}

export interface RunStats {
    /** Admitted tasks waiting for a domain or global slot */
    queued: number;
    /** Tasks holding a global slot */
    active: number;
    /** Admitted and not yet done, queued ones included */
    inFlight: number;
    admitted: number;
    fetched: number;
    handled: number;
    fetchFailed: number;
    handlerFailed: number;
    dropped: number;
    filtered: number;
    duplicates: number;
}
