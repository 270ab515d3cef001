import { v4 as uuid } from 'uuid';
import type { CrawlConfig } from '../config.js';
import type {
    CrawlSummary,
    CrawlTask,
    DocumentHandler,
    RunStats,
    TaskContext,
} from '../types.js';
import type { Logger } from '../utils/logger.js';
import { getDomain, isValidUrl, normalizeUrl } from '../url/normalize.js';
import { DedupSet } from './dedup.js';
import { CrawlCancelledError, errorMessage } from './errors.js';
import { DomainFilter } from './filter.js';
import type { CrawlResponse } from './response.js';
import { ThrottleRegistry, type ThrottleSnapshot } from './throttle.js';

export type RunState = 'idle' | 'running' | 'cancelling' | 'finished';

/**
 * One crawl from seed submission until no admitted task is left. Owns its
 * dedup set and throttle queues; nothing is shared between runs.
 */
export class CrawlRun {
    readonly id: string = uuid();
    private readonly config: CrawlConfig;
    private readonly handler: DocumentHandler;
    private readonly logger: Logger;
    private readonly filter: DomainFilter;
    private readonly dedup = new DedupSet();
    private readonly throttle: ThrottleRegistry;
    private readonly controller = new AbortController();
    private readonly workers = new Set<Promise<void>>();
    private state: RunState = 'idle';
    private wasCancelled = false;
    // counted from admission, not dispatch, so queued work keeps the run alive
    private inFlight = 0;
    private counters = {
        admitted: 0,
        fetched: 0,
        handled: 0,
        fetchFailed: 0,
        handlerFailed: 0,
        dropped: 0,
        filtered: 0,
        duplicates: 0,
    };
    private startedAt = 0;
    private finishedAt = 0;
    private statusTimer: NodeJS.Timeout | null = null;
    private detachSignal: () => void = () => {};
    private resolveFinished: () => void = () => {};
    private readonly finished = new Promise<void>(resolve => {
        this.resolveFinished = resolve;
    });

    constructor(config: CrawlConfig, handler: DocumentHandler) {
        this.config = config;
        this.handler = handler;
        this.logger = config.logger;
        this.filter = new DomainFilter(config.allowedDomains, config.domainMatch);
        this.throttle = new ThrottleRegistry(config.maxWorker, config.workerDomain);
    }

    get status(): RunState {
        return this.state;
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    /**
     * Submit the seeds and resolve once every admitted task is done. Fetch
     * and handler failures are logged and counted, never thrown.
     */
    async start(seeds: string | string[]): Promise<CrawlSummary> {
        if (this.state !== 'idle') {
            throw new Error(`Crawl run ${this.id} has already been started`);
        }
        this.state = 'running';
        this.startedAt = Date.now();

        const seedList = typeof seeds === 'string' ? [seeds] : seeds;
        this.logger.info(
            `Run ${this.id} starting with ${seedList.length} seed URL(s)`
        );

        this.watchExternalSignal();
        this.startStatusTimer();

        for (const seed of seedList) {
            this.submit(seed, true);
        }
        this.checkDone();

        await this.finished;
        await Promise.all([...this.workers]);
        this.teardown();

        const summary = this.summary();
        this.logger.info(
            `Run ${this.id} ${summary.cancelled ? 'cancelled' : 'finished'}: ` +
                `fetched ${summary.fetched} document(s), ` +
                `average ${summary.pagesPerMinute}/min, ` +
                `took ${(summary.elapsedMs / 1000).toFixed(3)}s`
        );
        return summary;
    }

    /**
     * Stop dispatching. A task still waiting for a slot is dropped as soon
     * as one reaches it; tasks already fetching run to completion. Returns
     * false when the run is not running.
     */
    cancel(reason = 'Crawl run cancelled'): boolean {
        if (this.state !== 'running') return false;

        this.state = 'cancelling';
        this.logger.warn(`Run ${this.id} cancelling: ${reason}`);
        this.controller.abort(new CrawlCancelledError(reason));
        this.checkDone();
        return true;
    }

    stats(): RunStats {
        return {
            queued: this.throttle.queued,
            active: this.throttle.active,
            inFlight: this.inFlight,
            ...this.counters,
        };
    }

    throttleSnapshot(): ThrottleSnapshot {
        return this.throttle.snapshot();
    }

    private submit(url: string, seed: boolean): boolean {
        if (this.state !== 'running') {
            this.logger.debug(`Declined ${url}: run is ${this.state}`);
            return false;
        }

        const normalized = normalizeUrl(url);
        const domain = getDomain(normalized);
        if (!domain || !isValidUrl(normalized)) {
            this.counters.filtered++;
            this.logger.debug(`Rejected ${url}: not an http(s) URL`);
            return false;
        }

        const bypassFilter = seed && !this.config.filterSeeds;
        if (!bypassFilter && !this.filter.admit(normalized)) {
            this.counters.filtered++;
            this.logger.debug(`Rejected ${normalized}: domain ${domain} not allowed`);
            return false;
        }

        if (!this.dedup.markIfNew(normalized)) {
            this.counters.duplicates++;
            return false;
        }

        const task: CrawlTask = {
            url: normalized,
            domain,
            retries: 0,
            state: 'queued',
        };
        this.inFlight++;
        this.counters.admitted++;
        this.logger.debug(`Queued ${normalized}`);
        this.track(this.throttle.run(domain, () => this.execute(task)));
        return true;
    }

    private async execute(task: CrawlTask): Promise<void> {
        // slots keep freeing up after cancel(); nothing new starts from then on
        if (this.signal.aborted) {
            this.logger.debug(`Dropped ${task.url}: run cancelled`);
            this.complete(task, true);
            return;
        }

        // both slots are held from here until complete()
        task.state = 'fetching';
        try {
            let response: CrawlResponse;
            try {
                response = await this.config.fetcher(task.url);
            } catch (error) {
                this.counters.fetchFailed++;
                this.logger.warn(`GET ${task.url} failed: ${errorMessage(error)}`);
                return;
            }
            this.counters.fetched++;
            this.logger.info(`(${response.status}) GET ${task.url}`);

            task.state = 'handling';
            const { context, close } = this.createContext(task);
            try {
                await this.handler(response, context);
                this.counters.handled++;
            } catch (error) {
                this.counters.handlerFailed++;
                this.logger.error(
                    `Handler failed for ${task.url}: ${errorMessage(error)}`
                );
            } finally {
                close();
            }
        } finally {
            this.complete(task, false);
        }
    }

    private createContext(task: CrawlTask): {
        context: TaskContext;
        close: () => void;
    } {
        let active = true;
        const context: TaskContext = {
            runId: this.id,
            url: task.url,
            signal: this.signal,
            addTask: (...urls: string[]): number => {
                if (!active) {
                    this.logger.warn(
                        `addTask called after the handler for ${task.url} ` +
                            `returned, ignoring ${urls.length} URL(s)`
                    );
                    return 0;
                }
                let admitted = 0;
                for (const url of urls) {
                    if (this.submit(url, false)) admitted++;
                }
                return admitted;
            },
        };
        return {
            context,
            close: () => {
                active = false;
            },
        };
    }

    private complete(task: CrawlTask, dropped: boolean): void {
        task.state = 'done';
        if (dropped) this.counters.dropped++;
        this.inFlight--;
        this.checkDone();
    }

    private checkDone(): void {
        if (this.inFlight > 0) return;
        if (this.state !== 'running' && this.state !== 'cancelling') return;

        this.wasCancelled = this.state === 'cancelling';
        this.state = 'finished';
        this.finishedAt = Date.now();
        this.resolveFinished();
    }

    private track(work: Promise<void>): void {
        const tracked: Promise<void> = work.then(
            () => {
                this.workers.delete(tracked);
            },
            (error: unknown) => {
                this.workers.delete(tracked);
                this.logger.error(
                    `Run ${this.id} task failed: ${errorMessage(error)}`
                );
            }
        );
        this.workers.add(tracked);
    }

    private watchExternalSignal(): void {
        const external = this.config.signal;
        if (!external) return;

        const onAbort = () => {
            this.cancel(
                external.reason === undefined
                    ? undefined
                    : errorMessage(external.reason)
            );
        };
        if (external.aborted) {
            onAbort();
            return;
        }
        external.addEventListener('abort', onAbort, { once: true });
        this.detachSignal = () => external.removeEventListener('abort', onAbort);
    }

    private startStatusTimer(): void {
        if (this.config.statusIntervalMs <= 0) return;
        this.statusTimer = setInterval(
            () => this.reportStatus(),
            this.config.statusIntervalMs
        );
        this.statusTimer.unref();
    }

    private reportStatus(): void {
        const { queued, active, fetched } = this.stats();
        this.logger.info(
            `Run ${this.id}: ${queued} queued, ${active} active, ` +
                `${fetched} fetched, average ${this.pagesPerMinute(Date.now())}/min`
        );
    }

    private teardown(): void {
        if (this.statusTimer) {
            clearInterval(this.statusTimer);
            this.statusTimer = null;
        }
        this.detachSignal();
    }

    private pagesPerMinute(now: number): number {
        const elapsed = now - this.startedAt;
        if (elapsed <= 0) return 0;
        return Math.round((this.counters.fetched / elapsed) * 60000 * 100) / 100;
    }

    private summary(): CrawlSummary {
        return {
            runId: this.id,
            ...this.counters,
            cancelled: this.wasCancelled,
            elapsedMs: this.finishedAt - this.startedAt,
            pagesPerMinute: this.pagesPerMinute(this.finishedAt),
        };
    }
}
