export enum LogLevel {
    ERROR = 0,
    WARN = 1,
    INFO = 2,
    DEBUG = 3,
}

export class Logger {
    private level: LogLevel;
    private name: string;
    private quiet: boolean;

    constructor(
        name: string,
        level: LogLevel = LogLevel.INFO,
        quiet = process.env.CRAWL_QUIET === 'true'
    ) {
        this.name = name;
        this.level = level;
        this.quiet = quiet;
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (level > this.level) return;

        // quiet leaves errors only
        if (this.quiet && level !== LogLevel.ERROR) return;

        const timestamp = new Date().toISOString();
        const levelName = LogLevel[level];
        const prefix = `[${timestamp}] [${levelName}] [${this.name}]`;

        // stdout belongs to the crawl output, diagnostics go to stderr
        console.error(prefix, message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.log(LogLevel.ERROR, message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARN, message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, message, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, message, ...args);
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }
}

/**
 * Parse a level name such as `debug` or `WARN`. Returns undefined for
 * anything that is not a level.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) return undefined;
    switch (value.trim().toUpperCase()) {
        case 'ERROR':
            return LogLevel.ERROR;
        case 'WARN':
            return LogLevel.WARN;
        case 'INFO':
            return LogLevel.INFO;
        case 'DEBUG':
            return LogLevel.DEBUG;
        default:
            return undefined;
    }
}

// Global logger instance
export const logger = new Logger('crawl');

// Set log level from environment
const envLevel = parseLogLevel(process.env.LOG_LEVEL);
if (envLevel !== undefined) {
    logger.setLevel(envLevel);
}
