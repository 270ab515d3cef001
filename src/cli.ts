#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { config as loadEnv } from 'dotenv';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { crawlOptionsFromEnv } from './config.js';
import { Crawler } from './crawler/crawler.js';
import { ConfigError } from './crawler/errors.js';
import { followLinks } from './handlers/follow-links.js';
import { logger, parseLogLevel } from './utils/logger.js';
import type { CrawlOptions } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load environment variables from ENV_FILE or .env
loadEnv({ path: process.env.ENV_FILE || join(__dirname, '..', '.env') });

// Read package.json for version
const packageJson: { version: string } = JSON.parse(
    readFileSync(join(__dirname, '../package.json'), 'utf-8')
);

interface CrawlCommandOptions {
    maxWorker?: number;
    workerDomain?: number;
    allow?: string[];
    suffixMatch?: boolean;
    filterSeeds: boolean;
    sameOrigin?: boolean;
    timeout?: number;
    userAgent?: string;
    statusInterval?: number;
    logLevel?: string;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function toCrawlOptions(options: CrawlCommandOptions): CrawlOptions {
    const crawlOptions: CrawlOptions = { ...crawlOptionsFromEnv() };
    if (options.maxWorker !== undefined) crawlOptions.maxWorker = options.maxWorker;
    if (options.workerDomain !== undefined) crawlOptions.workerDomain = options.workerDomain;
    if (options.allow && options.allow.length > 0) crawlOptions.allowedDomains = options.allow;
    if (options.suffixMatch) crawlOptions.domainMatch = 'suffix';
    if (!options.filterSeeds) crawlOptions.filterSeeds = false;
    if (options.timeout !== undefined) crawlOptions.timeout = options.timeout;
    if (options.userAgent) crawlOptions.userAgent = options.userAgent;
    if (options.statusInterval !== undefined) {
        crawlOptions.statusIntervalMs = options.statusInterval * 1000;
    }
    return crawlOptions;
}

async function crawlAction(urls: string[], options: CrawlCommandOptions): Promise<void> {
    if (options.logLevel) {
        const level = parseLogLevel(options.logLevel);
        if (level === undefined) {
            throw new ConfigError(`Unknown log level: ${options.logLevel}`);
        }
        logger.setLevel(level);
    }

    const handler = followLinks({
        sameOriginOnly: options.sameOrigin,
        onPage: visit => {
            const title = visit.title ? ` ${visit.title}` : '';
            process.stdout.write(`${visit.status} ${visit.finalUrl}${title}\n`);
        },
    });

    const crawler = new Crawler(handler, toCrawlOptions(options));

    const onSigint = () => {
        logger.warn('Interrupted, waiting for in-flight requests...');
        crawler.cancel('Interrupted');
    };
    process.once('SIGINT', onSigint);

    try {
        const summary = await crawler.start(urls);
        logger.info(
            `Crawled ${summary.fetched} page(s): ${summary.fetchFailed} fetch failure(s), ` +
                `${summary.handlerFailed} handler failure(s), ${summary.filtered} filtered`
        );
    } finally {
        process.removeListener('SIGINT', onSigint);
    }
}

const program = new Command();

program
    .name('crawl-engine')
    .description('Crawl websites under global and per-domain concurrency limits')
    .version(packageJson.version);

program
    .command('crawl <urls...>', { isDefault: true })
    .description('Crawl from one or more seed URLs, following links')
    .option('-w, --max-worker <n>', 'Global concurrency limit', parseInteger)
    .option('-d, --worker-domain <n>', 'Concurrency limit per domain', parseInteger)
    .option('-a, --allow <domains...>', 'Only crawl these domains')
    .option('--suffix-match', 'Also allow subdomains of allowed domains')
    .option('--no-filter-seeds', 'Let seed URLs bypass the domain allow-list')
    .option('--same-origin', 'Only follow links to the same origin')
    .option('-t, --timeout <ms>', 'Request timeout in milliseconds', parseInteger)
    .option('--user-agent <ua>', 'User-Agent header')
    .option('--status-interval <seconds>', 'Seconds between status lines, 0 disables', parseInteger)
    .option('--log-level <level>', 'error, warn, info or debug')
    .action(crawlAction);

program.parseAsync().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        logger.error(error.message);
    } else {
        logger.error('Crawl failed:', error);
    }
    process.exitCode = 1;
});
