import type { CheerioAPI } from 'cheerio';
import { MovieSummary } from './types';
import logger from '../util/logger';
import Scraper from './scraper.interface';
import { RateLimitedFetcher } from './fetcher';
import { isAbortError } from '../util/errors';

export abstract class BaseScraper implements Scraper {
    constructor(
        protected fetcher: RateLimitedFetcher,
        protected maxPages: number,
        protected maxMovies?: number
    ) { }

    // Abstract methods that must be implemented by subclasses
    protected abstract pageUrl(page: number): string;
    protected abstract extractMovies($: CheerioAPI, pageUrl: string): MovieSummary[];
    protected abstract hasContent($: CheerioAPI): boolean;

    async collect(): Promise<MovieSummary[]> {
        const movies: MovieSummary[] = [];
        try {
            await this.collectPages(movies);
        } catch (e: unknown) {
            if (!isAbortError(e)) throw e;
            logger.warn(`Collection interrupted, keeping ${movies.length} movies found so far`);
        }
        return movies;
    }

    /**
     * Fills `movies` page by page. Writes into the caller's array so that an
     * interruption still leaves the pages already merged.
     */
    protected async collectPages(movies: MovieSummary[]): Promise<void> {
        const seenTitles = new Set(movies.map(movie => movie.title));
        let page = 1;

        logger.info(`Collecting schedule pages (max ${this.maxPages})`);

        while (page <= this.maxPages) {
            const url = this.pageUrl(page);
            logger.info(`Fetching page ${page}: ${url}`);

            const result = await this.fetcher.fetch(url, 'page');
            if (result.status !== 'ok') {
                logger.warn(`Could not fetch page ${page} (${result.status}), stopping`);
                break;
            }

            const pageMovies = this.extractMovies(result.$, url);
            if (pageMovies.length === 0) {
                logger.info(`No movies on page ${page}, stopping`);
                break;
            }

            let added = 0;
            for (const movie of pageMovies) {
                if (seenTitles.has(movie.title)) continue;
                seenTitles.add(movie.title);
                movies.push(movie);
                added++;
            }
            logger.info(`Page ${page}: ${pageMovies.length} movies, ${added} new (total ${movies.length})`);

            if (this.maxMovies && movies.length >= this.maxMovies) {
                logger.info(`Reached movie limit (${this.maxMovies}), stopping`);
                movies.splice(this.maxMovies);
                break;
            }

            if (page < this.maxPages && !(await this.nextPageExists(page))) {
                logger.info(`Page ${page + 1} not found, stopping`);
                break;
            }

            page++;
            if (page <= this.maxPages) {
                await this.fetcher.pause('page');
            }
        }

        logger.info(`Collected ${movies.length} unique movies`);
    }

    /** One attempt only; any fetch failure counts as "no next page". */
    protected async nextPageExists(page: number): Promise<boolean> {
        const result = await this.fetcher.fetch(this.pageUrl(page + 1), 'page', 1);
        return result.status === 'ok' && this.hasContent(result.$);
    }
}
