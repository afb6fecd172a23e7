import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import logger from './logger';
import { HttpTransport } from './http';
import { HttpConfig } from './config';

// ============================================================================
// P-QUEUE: Item Concurrency Control
// ============================================================================

/**
 * Movie Processing Queue
 * Enrichment of movies runs through this queue. Concurrency 1 (the default)
 * processes movies strictly one after another in collection order.
 */
export function createItemQueue(concurrency: number): PQueue {
    return new PQueue({ concurrency });
}

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

/**
 * Schedule Host Limiter
 * Caps requests in flight against the schedule host and keeps a minimum gap
 * between them, on top of the fetcher's own politeness delays.
 */
export function createScraperLimiter(http: Pick<HttpConfig, 'concurrency'>): Bottleneck {
    const limiter = new Bottleneck({
        maxConcurrent: http.concurrency,
        minTime: 200
    });

    // Prevent queue hangs from unhandled rejections
    limiter.on('error', (err: unknown) => {
        logger.error(`[Scraper Limiter] Unhandled error in queue: ${err instanceof Error ? err.message : String(err)}`);
    });

    limiter.on('failed', (err: unknown) => {
        logger.debug(`[Scraper] Request failed: ${err instanceof Error ? err.message : String(err)}`);
        return null; // Retry policy lives in the fetcher
    });

    return limiter;
}

// ============================================================================
// RATE-LIMITED TRANSPORT
// ============================================================================

/**
 * Wraps a transport so every GET is queued through the limiter.
 */
export function createRateLimitedTransport(transport: HttpTransport, limiter: Bottleneck, serviceName: string): HttpTransport {
    return {
        get: (url, headers, timeoutMs, signal) => {
            logger.trace(`[${serviceName}] Scheduling GET ${url}`);
            return limiter.schedule(() => transport.get(url, headers, timeoutMs, signal));
        },
    };
}
