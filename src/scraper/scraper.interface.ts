import { MovieSummary } from './types';

interface Scraper {
    /**
     * Walks the listing pages of the configured source and returns every
     * movie found, unique by title in first-seen order.
     *
     * Stops quietly at the end of the data (failed or empty page, negative
     * next-page probe, page or item cap). Cancellation also ends the walk
     * and returns what was collected so far.
     */
    collect(): Promise<MovieSummary[]>;
}

export default Scraper;
