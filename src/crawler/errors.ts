export class CrawlError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Run-level misconfiguration, raised before any fetch starts. */
export class ConfigError extends CrawlError {}

export class FetchError extends CrawlError {
    readonly url: string;
    readonly status?: number;

    constructor(
        message: string,
        url: string,
        options: { status?: number; cause?: unknown } = {}
    ) {
        super(message, { cause: options.cause });
        this.url = url;
        this.status = options.status;
    }
}

export class CrawlCancelledError extends CrawlError {
    constructor(reason = 'Crawl run cancelled') {
        super(reason);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
