/**
 * Raised when the run is cancelled (SIGINT/SIGTERM). It is the only error the
 * fetcher lets through, so callers can stop early and keep partial results.
 */
export class ScrapeAbortedError extends Error {
    constructor(message = 'Scrape aborted') {
        super(message);
        this.name = 'ScrapeAbortedError';
    }
}

export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function isAbortError(error: unknown): error is ScrapeAbortedError {
    return error instanceof ScrapeAbortedError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class TransportTimeoutError extends Error {
    constructor(public readonly url: string, timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms: ${url}`);
        this.name = 'TransportTimeoutError';
    }
}

/** Non-2xx status the fetcher has no dedicated policy for. */
export class HttpStatusError extends Error {
    constructor(public readonly status: number, public readonly url: string) {
        super(`HTTP ${status} for ${url}`);
        this.name = 'HttpStatusError';
    }
}
