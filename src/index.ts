#!/usr/bin/env node
require('dotenv').config();

import { outputFileOverride } from './util/env';
import { loadConfig, FrozenConfig } from './util/config';
import logger from './util/logger';
import { runWithItemLabel } from './util/context';
import { createItemQueue, createRateLimitedTransport, createScraperLimiter } from './util/queues';
import { HttpTransport, createAxiosTransport } from './util/http';
import { Sleep, createSleep } from './util/sleep';
import { ConfigError, errorMessage, isAbortError } from './util/errors';
import { DEFAULT_CALENDAR_NAME, DEFAULT_OUTPUT_FILE } from './util/constants';
import { RateLimitedFetcher } from './scraper/fetcher';
import { ScheduleScraper } from './scraper/schedule';
import { applyDetails, getMovieDetails } from './scraper/movie';
import { toCalendarDate } from './scraper/time';
import { MovieSummary } from './scraper/types';
import { CalendarEvent, materializeEvent, placeholderEvent } from './calendar/event';
import { writeCalendar } from './calendar/writer';

export type RunOutcome = 'ok' | 'empty' | 'interrupted';

export interface RunReport {
    outcome: RunOutcome;
    movies: number;
    failures: number;
    /** Events written to the calendar, placeholder included. */
    events: CalendarEvent[];
    output: string;
}

/** Seams for tests; production uses axios, real timers and the filesystem. */
export interface RunDependencies {
    transport?: HttpTransport;
    sleep?: Sleep;
    random?: () => number;
    now?: () => Date;
    signal?: AbortSignal;
    write?: (filePath: string, events: readonly CalendarEvent[], name: string) => void;
}

interface ProcessingResult {
    events: CalendarEvent[];
    failures: number;
    interrupted: boolean;
}

const PROGRESS_EVERY = 10;

async function processMovies(
    movies: MovieSummary[],
    config: FrozenConfig,
    fetcher: RateLimitedFetcher,
    deps: { now: () => Date; signal?: AbortSignal }
): Promise<ProcessingResult> {
    const excluded = new Set(config.calendar.excludeCountries);
    const enrich = !config.source.skipDetails;
    const queue = createItemQueue(config.http.concurrency);
    const total = movies.length;

    let failures = 0;
    let created = 0;
    let interrupted = false;

    logger.info(`Processing ${total} movies...`);

    const results = await Promise.all(movies.map((movie, index) => queue.add(async () => {
        const position = index + 1;
        if (interrupted || deps.signal?.aborted) {
            interrupted = true;
            return null;
        }

        return runWithItemLabel(`${position}/${total}`, async () => {
            let event: CalendarEvent | null = null;
            try {
                logger.info(`Processing: ${movie.title}`);

                let enriched = movie;
                if (enrich && movie.detailUrl) {
                    const details = await getMovieDetails(fetcher, movie.detailUrl, toCalendarDate(deps.now()));
                    enriched = applyDetails(movie, details);
                }

                event = materializeEvent(enriched, excluded, deps.now());
                if (event) {
                    created++;
                    logger.info(`Created event for ${event.name}`);
                } else {
                    logger.debug(`Skipping ${movie.title}: excluded country (${enriched.countries.join(', ')})`);
                }

                if (position % PROGRESS_EVERY === 0) {
                    logger.info(`Progress: ${position}/${total} movies, ${created} events`);
                }
            } catch (e: unknown) {
                if (isAbortError(e)) {
                    interrupted = true;
                    return null;
                }
                failures++;
                logger.error(`Failed to process ${movie.title}: ${errorMessage(e)}`);
            }

            // The finished event is kept even when the pause is interrupted
            if (position < total) {
                try {
                    await fetcher.pause('default');
                } catch (e: unknown) {
                    if (!isAbortError(e)) throw e;
                    interrupted = true;
                }
            }

            return event;
        });
    })));

    const events = results.filter((event): event is CalendarEvent => event !== null);
    return { events, failures, interrupted };
}

/**
 * One scrape: collect listing pages, enrich each movie, write the calendar.
 * A calendar file is written in every case, even when the run fails; the
 * failure is rethrown after that.
 */
export async function run(config: FrozenConfig, deps: RunDependencies = {}): Promise<RunReport> {
    const now = deps.now ?? (() => new Date());
    const write = deps.write ?? writeCalendar;
    const { output, name } = config.calendar;

    const finish = (outcome: RunOutcome, movies: number, failures: number, events: CalendarEvent[]): RunReport => {
        write(output, events, name);
        return { outcome, movies, failures, events, output };
    };

    try {
        const limiter = createScraperLimiter(config.http);
        const transport = createRateLimitedTransport(deps.transport ?? createAxiosTransport(), limiter, 'Schedule');
        const fetcher = new RateLimitedFetcher({
            transport,
            http: config.http,
            sleep: deps.sleep ?? createSleep(deps.signal),
            random: deps.random,
            signal: deps.signal,
        });

        const scraper = new ScheduleScraper(config.source.url, fetcher, config.source.maxPages, config.source.maxMovies);
        const movies = await scraper.collect();

        if (movies.length === 0) {
            const aborted = deps.signal?.aborted === true;
            logger.error(aborted ? 'Interrupted before any movie was found' : 'No movies found on any page');
            return finish(aborted ? 'interrupted' : 'empty', 0, 0, [
                placeholderEvent('No movies found', 'Could not find any movies in the cinema schedule', now()),
            ]);
        }

        const result = await processMovies(movies, config, fetcher, { now, signal: deps.signal });
        const interrupted = result.interrupted || deps.signal?.aborted === true;

        logger.info(`Done: ${movies.length} movies processed, ${result.events.length} events created, ${result.failures} failures`);

        if (interrupted && result.events.length === 0) {
            return finish('interrupted', movies.length, result.failures, [
                placeholderEvent('Scraping interrupted', 'The run was stopped before any event was created', now()),
            ]);
        }

        return finish(interrupted ? 'interrupted' : 'ok', movies.length, result.failures, result.events);
    } catch (e: unknown) {
        logger.fatal(`Critical error: ${errorMessage(e)}`);
        write(output, [placeholderEvent('Scraping failed', `Scraping failed with an error: ${errorMessage(e)}`, now())], name);
        throw e;
    }
}

export async function main(): Promise<number> {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
        logger.warn(`Received ${signal}, writing partial results`);
        controller.abort();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
        let config: FrozenConfig;
        try {
            config = loadConfig();
        } catch (e: unknown) {
            logger.fatal(errorMessage(e));
            if (e instanceof ConfigError) {
                e.issues.forEach(issue => logger.error(`- ${issue}`));
            }
            writeCalendar(outputFileOverride() ?? DEFAULT_OUTPUT_FILE, [
                placeholderEvent('Scraping failed', `Invalid configuration: ${errorMessage(e)}`),
            ], DEFAULT_CALENDAR_NAME);
            return 1;
        }

        logger.info(`Schedule: ${config.source.url}`);
        logger.info(`Max pages: ${config.source.maxPages}, movie limit: ${config.source.maxMovies ?? 'none'}`);
        logger.info(`Details: ${config.source.skipDetails ? 'skipped' : 'enabled'}, base delay: ${config.http.baseDelay}s`);
        logger.info(`Excluded countries: ${config.calendar.excludeCountries.join(', ') || 'none'}`);

        const report = await run(config, { signal: controller.signal });
        return report.outcome === 'interrupted' ? 130 : 0;
    } catch (e: unknown) {
        logger.error(`Run failed: ${errorMessage(e)}`);
        return 1;
    } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
    }
}

if (require.main === module) {
    main()
        .then(code => {
            process.exitCode = code;
        })
        .catch((e: unknown) => {
            logger.fatal(`Unexpected error: ${errorMessage(e)}`);
            process.exitCode = 1;
        });
}
