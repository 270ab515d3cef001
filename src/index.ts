export { Crawler, crawl } from './crawler/crawler.js';
export { CrawlRun, type RunState } from './crawler/run.js';
export { CrawlResponse, type CrawlResponseInit } from './crawler/response.js';
export {
    createFetcher,
    fetchDocument,
    DEFAULT_TIMEOUT_MS,
    DEFAULT_USER_AGENT,
    type Fetcher,
    type FetchOptions,
} from './crawler/fetch.js';
export { DomainFilter, type DomainMatch } from './crawler/filter.js';
export { DedupSet } from './crawler/dedup.js';
export {
    ThrottleRegistry,
    type QueueSnapshot,
    type ThrottleSnapshot,
} from './crawler/throttle.js';
export {
    CrawlError,
    ConfigError,
    FetchError,
    CrawlCancelledError,
} from './crawler/errors.js';
export {
    resolveCrawlConfig,
    crawlOptionsFromEnv,
    DEFAULT_MAX_WORKER,
    DEFAULT_WORKER_DOMAIN,
    DEFAULT_STATUS_INTERVAL_MS,
    type CrawlConfig,
} from './config.js';
export {
    followLinks,
    type FollowLinksOptions,
    type PageVisit,
} from './handlers/follow-links.js';
export { htmlToDom, extractLinks, extractTitle } from './parser/dom.js';
export {
    normalizeUrl,
    getDomain,
    isValidUrl,
    resolveUrl,
    isSameOrigin,
} from './url/normalize.js';
export { Logger, LogLevel, logger, parseLogLevel } from './utils/logger.js';
export type {
    CrawlOptions,
    CrawlSummary,
    CrawlTask,
    DocumentHandler,
    RunStats,
    TaskContext,
    TaskState,
} from './types.js';
