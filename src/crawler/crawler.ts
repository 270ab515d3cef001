import { resolveCrawlConfig, type CrawlConfig } from '../config.js';
import type { CrawlOptions, CrawlSummary, DocumentHandler } from '../types.js';
import { CrawlRun } from './run.js';

/**
 * A configured crawler. The handler and options are fixed at construction;
 * every `start` gets a fresh CrawlRun, so runs never share queues,
 * dedup state or throttle pools.
 *
 * @example
 * const crawler = new Crawler(async (response, { addTask }) => {
 *     for (const href of findLinks(response.text)) {
 *         const url = response.urlJoin(href);
 *         if (url) addTask(url);
 *     }
 * }, { maxWorker: 10, workerDomain: 2, allowedDomains: ['example.com'] });
 * await crawler.start('https://example.com/');
 */
export class Crawler {
    readonly config: Readonly<CrawlConfig>;
    private readonly handler: DocumentHandler;
    private readonly runs = new Set<CrawlRun>();

    /**
     * @throws ConfigError when a capacity or other option is invalid
     */
    constructor(handler: DocumentHandler, options: CrawlOptions = {}) {
        this.config = resolveCrawlConfig(options);
        this.handler = handler;
    }

    get activeRuns(): number {
        return this.runs.size;
    }

    /**
     * A run that has not been started yet, for callers that want to inspect
     * or cancel it directly.
     */
    createRun(): CrawlRun {
        return new CrawlRun(this.config, this.handler);
    }

    start(seeds: string | string[]): Promise<CrawlSummary> {
        const run = this.createRun();
        this.runs.add(run);
        return run.start(seeds).finally(() => {
            this.runs.delete(run);
        });
    }

    cancel(reason?: string): void {
        for (const run of this.runs) {
            run.cancel(reason);
        }
    }
}

/**
 * Crawl from `seeds` with a one-off crawler. Invalid options throw
 * synchronously, before anything is fetched.
 */
export function crawl(
    seeds: string | string[],
    handler: DocumentHandler,
    options: CrawlOptions = {}
): Promise<CrawlSummary> {
    return new Crawler(handler, options).start(seeds);
}
