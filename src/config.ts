import { ConfigError } from './crawler/errors.js';
import {
    createFetcher,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_USER_AGENT,
    type Fetcher,
} from './crawler/fetch.js';
import type { DomainMatch } from './crawler/filter.js';
import { logger as defaultLogger, type Logger } from './utils/logger.js';
import type { CrawlOptions } from './types.js';

export const DEFAULT_MAX_WORKER = 20;
export const DEFAULT_WORKER_DOMAIN = 5;
export const DEFAULT_STATUS_INTERVAL_MS = 60 * 1000;

export interface CrawlConfig {
    maxWorker: number;
    workerDomain: number;
    allowedDomains: string[];
    domainMatch: DomainMatch;
    filterSeeds: boolean;
    statusIntervalMs: number;
    fetcher: Fetcher;
    logger: Logger;
    signal?: AbortSignal;
}

function requirePositiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

/**
 * Apply defaults and validate. Throws ConfigError on the first bad value.
 */
export function resolveCrawlConfig(options: CrawlOptions = {}): CrawlConfig {
    const maxWorker = requirePositiveInteger(
        'maxWorker',
        options.maxWorker ?? DEFAULT_MAX_WORKER
    );
    const workerDomain = requirePositiveInteger(
        'workerDomain',
        options.workerDomain ?? DEFAULT_WORKER_DOMAIN
    );

    const domainMatch = options.domainMatch ?? 'exact';
    if (domainMatch !== 'exact' && domainMatch !== 'suffix') {
        throw new ConfigError(
            `domainMatch must be "exact" or "suffix", got ${String(domainMatch)}`
        );
    }

    const statusIntervalMs =
        options.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS;
    if (!Number.isFinite(statusIntervalMs) || statusIntervalMs < 0) {
        throw new ConfigError(
            `statusIntervalMs must be zero or a positive number, got ${statusIntervalMs}`
        );
    }

    const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeout) || timeout <= 0) {
        throw new ConfigError(`timeout must be a positive number, got ${timeout}`);
    }

    const allowedDomains = (options.allowedDomains ?? [])
        .map(domain => domain.trim())
        .filter(domain => domain.length > 0);

    return {
        maxWorker,
        workerDomain,
        allowedDomains,
        domainMatch,
        filterSeeds: options.filterSeeds ?? true,
        statusIntervalMs,
        fetcher:
            options.fetcher ??
            createFetcher({
                timeout,
                userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
            }),
        logger: options.logger ?? defaultLogger,
        signal: options.signal,
    };
}

function parseNumber(name: string, value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigError(`${name} must be a number, got "${value}"`);
    }
    return parsed;
}

function parseBoolean(name: string, value: string | undefined): boolean | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    switch (value.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw new ConfigError(`${name} must be true or false, got "${value}"`);
    }
}

function parseDomainMatch(value: string | undefined): DomainMatch | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const match = value.trim().toLowerCase();
    if (match === 'exact' || match === 'suffix') return match;
    throw new ConfigError(
        `CRAWL_DOMAIN_MATCH must be "exact" or "suffix", got "${value}"`
    );
}

/**
 * Crawl options from CRAWL_* environment variables. Unset variables are
 * left out so they fall back to the defaults.
 */
export function crawlOptionsFromEnv(
    env: NodeJS.ProcessEnv = process.env
): CrawlOptions {
    const options: CrawlOptions = {};

    const maxWorker = parseNumber('CRAWL_MAX_WORKER', env.CRAWL_MAX_WORKER);
    if (maxWorker !== undefined) options.maxWorker = maxWorker;

    const workerDomain = parseNumber('CRAWL_WORKER_DOMAIN', env.CRAWL_WORKER_DOMAIN);
    if (workerDomain !== undefined) options.workerDomain = workerDomain;

    if (env.CRAWL_ALLOWED_DOMAIN) {
        options.allowedDomains = env.CRAWL_ALLOWED_DOMAIN.split(',')
            .map(domain => domain.trim())
            .filter(Boolean);
    }

    const domainMatch = parseDomainMatch(env.CRAWL_DOMAIN_MATCH);
    if (domainMatch !== undefined) options.domainMatch = domainMatch;

    const filterSeeds = parseBoolean('CRAWL_FILTER_SEEDS', env.CRAWL_FILTER_SEEDS);
    if (filterSeeds !== undefined) options.filterSeeds = filterSeeds;

    const statusIntervalMs = parseNumber('CRAWL_STATUS_INTERVAL', env.CRAWL_STATUS_INTERVAL);
    if (statusIntervalMs !== undefined) options.statusIntervalMs = statusIntervalMs;

    const timeout = parseNumber('CRAWL_TIMEOUT', env.CRAWL_TIMEOUT);
    if (timeout !== undefined) options.timeout = timeout;

    if (env.CRAWL_USER_AGENT) options.userAgent = env.CRAWL_USER_AGENT;

    return options;
}
