import { ScheduleScraper } from './schedule';
import { RateLimitedFetcher } from './fetcher';
import { HttpResponse, HttpTransport } from '../util/http';
import { ScrapeAbortedError } from '../util/errors';
import { FrozenConfig } from '../util/config';

jest.mock('../util/logger', () => ({
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

const BASE_URL = 'https://www.afisha.ru/prm/schedule_cinema/';

const http: FrozenConfig['http'] = {
    baseDelay: 5,
    pageDelay: 8,
    detailDelay: 12,
    jitter: 3,
    backoffFactor: 3,
    maxRetries: 3,
    timeoutSeconds: 45,
    concurrency: 1,
};

const articles = (...titles: string[]) =>
    `<html><body>${titles.map(title => `<article><h2>${title}</h2><p>18:00</p></article>`).join('')}</body></html>`;

/** Serves fixed pages by URL; anything else is a 404. */
function siteTransport(pages: Record<string, string | Error>): HttpTransport & { get: jest.Mock } {
    return {
        get: jest.fn(async (url: string): Promise<HttpResponse> => {
            const page = pages[url];
            if (page instanceof Error) throw page;
            return page === undefined ? { status: 404, body: '' } : { status: 200, body: page };
        }),
    };
}

function createScraper(pages: Record<string, string | Error>, maxPages = 10, maxMovies?: number) {
    const transport = siteTransport(pages);
    const fetcher = new RateLimitedFetcher({ transport, http, random: () => 0, sleep: async () => undefined });
    const scraper = new ScheduleScraper(BASE_URL, fetcher, maxPages, maxMovies);
    const requested = () => transport.get.mock.calls.map(call => call[0]);
    return { scraper, requested };
}

describe('ScheduleScraper', () => {
    it('should stop after page 1 when the next page has no content blocks', async () => {
        const { scraper, requested } = createScraper({
            [BASE_URL]: `
                <div class="movie-item"><h3>Кин-дза-дза!</h3></div>
                <div class="movie-item"><h3>Сталкер</h3></div>
                <div class="movie-item"><h3>Солярис</h3></div>
            `,
            [`${BASE_URL}page2/`]: '<html><body><div class="footer">Ничего не найдено</div></body></html>',
        });

        const movies = await scraper.collect();

        expect(movies.map(movie => movie.title)).toEqual(['Кин-дза-дза!', 'Сталкер', 'Солярис']);
        expect(requested()).toEqual([BASE_URL, `${BASE_URL}page2/`]);
    });

    it('should keep the first occurrence of a title seen on several pages', async () => {
        const { scraper, requested } = createScraper({
            [BASE_URL]: articles('Брат', 'Сестра'),
            [`${BASE_URL}page2/`]: `<html><body>
                <article><h2>Сестра</h2><p>21:30</p></article>
                <article><h2>Мать</h2></article>
            </body></html>`,
        });

        const movies = await scraper.collect();

        expect(movies.map(movie => movie.title)).toEqual(['Брат', 'Сестра', 'Мать']);
        expect(movies[1].times).toEqual(['18:00']);
        // page 2 is probed, fetched, then page 3 is probed and missing
        expect(requested()).toEqual([BASE_URL, `${BASE_URL}page2/`, `${BASE_URL}page2/`, `${BASE_URL}page3/`]);
    });

    it('should truncate to the movie limit keeping discovery order', async () => {
        const { scraper } = createScraper({
            [BASE_URL]: articles('Фильм 1', 'Фильм 2', 'Фильм 3', 'Фильм 4'),
            [`${BASE_URL}page2/`]: articles('Фильм 5', 'Фильм 6', 'Фильм 7', 'Фильм 8'),
            [`${BASE_URL}page3/`]: articles('Фильм 9'),
        }, 10, 5);

        const movies = await scraper.collect();

        expect(movies.map(movie => movie.title)).toEqual(['Фильм 1', 'Фильм 2', 'Фильм 3', 'Фильм 4', 'Фильм 5']);
    });

    it('should not probe beyond the page limit', async () => {
        const { scraper, requested } = createScraper({
            [BASE_URL]: articles('Зеркало'),
            [`${BASE_URL}page2/`]: articles('Ностальгия'),
        }, 1);

        const movies = await scraper.collect();

        expect(movies.map(movie => movie.title)).toEqual(['Зеркало']);
        expect(requested()).toEqual([BASE_URL]);
    });

    it('should return nothing when the first page cannot be fetched', async () => {
        const { scraper } = createScraper({});

        await expect(scraper.collect()).resolves.toEqual([]);
    });

    it('should stop on a page without movies', async () => {
        const { scraper } = createScraper({
            [BASE_URL]: articles('Андрей Рублёв'),
            // Passes the probe (has .schedule) but holds no movies
            [`${BASE_URL}page2/`]: '<html><body><div class="schedule"></div></body></html>',
        });

        const movies = await scraper.collect();

        expect(movies.map(movie => movie.title)).toEqual(['Андрей Рублёв']);
    });

    it('should keep collected movies when interrupted', async () => {
        const { scraper } = createScraper({
            [BASE_URL]: articles('Иваново детство'),
            [`${BASE_URL}page2/`]: new ScrapeAbortedError(),
        });

        const movies = await scraper.collect();

        expect(movies.map(movie => movie.title)).toEqual(['Иваново детство']);
    });
});
