import type { CheerioAPI } from 'cheerio';
import { MovieSummary } from './types';
import { BaseScraper } from './scraper.base';
import { RateLimitedFetcher } from './fetcher';
import { extractListing } from './listing';
import { CONTENT_BLOCK_SELECTORS } from './selectors';

/**
 * Schedule listing paged as `<base>page2/`, `<base>page3/`, ... with no
 * reliable "last page" marker, so the next page is probed before moving on.
 */
export class ScheduleScraper extends BaseScraper {
    private readonly baseUrl: string;

    constructor(baseUrl: string, fetcher: RateLimitedFetcher, maxPages: number, maxMovies?: number) {
        super(fetcher, maxPages, maxMovies);
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    }

    protected pageUrl(page: number): string {
        return page === 1 ? this.baseUrl : `${this.baseUrl}page${page}/`;
    }

    protected extractMovies($: CheerioAPI, pageUrl: string): MovieSummary[] {
        return extractListing($, pageUrl);
    }

    protected hasContent($: CheerioAPI): boolean {
        return CONTENT_BLOCK_SELECTORS.some(selector => $(selector).length > 0);
    }
}
