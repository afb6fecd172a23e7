import * as cheerio from 'cheerio';
import logger from '../util/logger';
import { HttpTransport, HttpResponse } from '../util/http';
import { FrozenConfig } from '../util/config';
import { Sleep, createSleep } from '../util/sleep';
import { HttpStatusError, TransportTimeoutError, errorMessage, isAbortError } from '../util/errors';
import { BROWSER_HEADERS, DEFAULT_USER_AGENT } from '../util/constants';

/**
 * Kind of request, which decides the politeness delay applied after it.
 * `retry` is the pause taken before every attempt after the first.
 */
export type RequestCategory = 'default' | 'page' | 'detail' | 'retry';

export type FetchResult =
    | { status: 'ok'; url: string; $: cheerio.CheerioAPI }
    | { status: 'not-found'; url: string }
    | { status: 'failed'; url: string };

export interface FetcherOptions {
    transport: HttpTransport;
    http: FrozenConfig['http'];
    sleep?: Sleep;
    /** Uniform [0, 1) source for jitter. */
    random?: () => number;
    signal?: AbortSignal;
}

export class RateLimitedFetcher {
    private readonly sleep: Sleep;
    private readonly random: () => number;
    private readonly headers: Readonly<Record<string, string>>;

    constructor(private readonly options: FetcherOptions) {
        this.sleep = options.sleep ?? createSleep(options.signal);
        this.random = options.random ?? Math.random;
        this.headers = {
            'User-Agent': options.http.userAgent ?? DEFAULT_USER_AGENT,
            ...BROWSER_HEADERS,
        };
    }

    /** Base delay of a category in seconds, before jitter. */
    baseDelay(category: RequestCategory): number {
        const { http } = this.options;
        switch (category) {
            case 'page':
                return http.pageDelay;
            case 'detail':
                return http.detailDelay;
            case 'retry':
                return http.baseDelay * 2;
            default:
                return http.baseDelay;
        }
    }

    /** Base delay plus uniform jitter in [1, jitter) seconds, in milliseconds. */
    delayFor(category: RequestCategory): number {
        const jitter = 1 + this.random() * (this.options.http.jitter - 1);
        return Math.round((this.baseDelay(category) + jitter) * 1000);
    }

    async pause(category: RequestCategory): Promise<void> {
        const ms = this.delayFor(category);
        logger.trace(`Delay ${category}: ${(ms / 1000).toFixed(2)}s`);
        await this.sleep(ms);
    }

    /**
     * GET `url` and parse it. Never throws for HTTP or network problems:
     * 404 resolves to `not-found`, exhausted attempts to `failed`.
     * Only cancellation (ScrapeAbortedError) propagates.
     */
    async fetch(url: string, category: RequestCategory = 'default', retries: number = this.options.http.maxRetries): Promise<FetchResult> {
        const { transport, http, signal } = this.options;
        const timeoutMs = http.timeoutSeconds * 1000;
        let delay = http.baseDelay;

        for (let attempt = 1; attempt <= retries; attempt++) {
            logger.debug(`Request ${attempt}/${retries} for ${url}`);

            if (attempt > 1) {
                await this.pause('retry');
            }

            let response: HttpResponse | null = null;
            let failure: unknown = null;
            try {
                response = await transport.get(url, this.headers, timeoutMs, signal);
            } catch (e: unknown) {
                if (isAbortError(e)) throw e;
                failure = e;
            }

            if (response) {
                const { status } = response;

                if (status === 429) {
                    const wait = delay * http.backoffFactor;
                    logger.warn(`HTTP 429 for ${url}. Waiting ${wait}s (attempt ${attempt}/${retries})`);
                    await this.sleep(wait * 1000);
                    delay *= http.backoffFactor;
                    continue;
                }

                if (status === 404) {
                    logger.warn(`Page not found: ${url}`);
                    return { status: 'not-found', url };
                }

                if (status === 403) {
                    const wait = delay * 2;
                    logger.warn(`Access denied (403) for ${url}. Waiting ${wait}s (attempt ${attempt}/${retries})`);
                    await this.sleep(wait * 1000);
                    delay *= 2;
                    continue;
                }

                if (status >= 200 && status < 300) {
                    logger.debug(`Success for ${url} (status: ${status})`);
                    await this.pause(category);
                    return { status: 'ok', url, $: cheerio.load(response.body) };
                }

                failure = new HttpStatusError(status, url);
            }

            if (failure instanceof TransportTimeoutError) {
                logger.warn(`Timeout for ${url} (attempt ${attempt}/${retries})`);
            } else {
                logger.error(`Request failed for ${url} (attempt ${attempt}/${retries}): ${errorMessage(failure)}`);
            }

            if (attempt < retries) {
                await this.sleep(delay * 1000);
                delay *= http.backoffFactor;
            }
        }

        logger.error(`All ${retries} attempts exhausted for ${url}`);
        return { status: 'failed', url };
    }
}
