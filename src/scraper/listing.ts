import type { CheerioAPI } from 'cheerio';
import logger from '../util/logger';
import { MovieSummary } from './types';
import { extractTimes } from './time';
import { MOVIE_CONTAINER_SELECTORS, MOVIE_LINK_TOKENS, TITLE_SELECTORS } from './selectors';

const MIN_TITLE_LENGTH = 4;

export const cleanText = (text: string): string => text.replace(/\s+/g, ' ').trim();

/** Absolute form of `href`, or undefined when it cannot be resolved. */
export function resolveUrl(href: string | undefined, base: string): string | undefined {
    if (!href) return undefined;
    try {
        return new URL(href, base).toString();
    } catch {
        logger.debug(`Unresolvable link: ${href}`);
        return undefined;
    }
}

/**
 * Title probing: each selector's first match is read in order and probing stops
 * at the first text long enough to be a title. If none is, the last non-empty
 * text found is kept, so short titles survive when nothing better exists.
 */
export function probeTitle(textOf: (selector: string) => string | null): string | null {
    let title: string | null = null;

    for (const selector of TITLE_SELECTORS) {
        const text = textOf(selector);
        if (text === null) continue;

        title = text;
        if (title.length >= MIN_TITLE_LENGTH) break;
    }

    return title ? title : null;
}

function extractFromLinks($: CheerioAPI, origin: string): MovieSummary[] {
    const movies: MovieSummary[] = [];

    $('a[href]').each((_, element) => {
        const href = $(element).attr('href') ?? '';
        if (!MOVIE_LINK_TOKENS.some(token => href.includes(token))) return;

        const title = cleanText($(element).text());
        if (title.length < MIN_TITLE_LENGTH) return;

        movies.push({
            title,
            detailUrl: resolveUrl(href, origin),
            times: [],
            countries: [],
            nearestShowDate: null,
        });
    });

    logger.debug(`Found ${movies.length} movies through links`);
    return movies;
}

/**
 * Extracts movie summaries from one listing page.
 *
 * The first container selector that matches anything is used; later ones are
 * ignored. Without any container the page's movie links are used instead.
 */
export function extractListing($: CheerioAPI, pageUrl: string): MovieSummary[] {
    const origin = new URL(pageUrl).origin;

    const selector = MOVIE_CONTAINER_SELECTORS.find(candidate => $(candidate).length > 0);
    if (!selector) {
        return extractFromLinks($, origin);
    }

    const containers = $(selector);
    logger.debug(`Found containers with selector ${selector} (${containers.length})`);

    const movies: MovieSummary[] = [];
    containers.each((index, element) => {
        const container = $(element);

        const title = probeTitle(titleSelector => {
            const match = container.find(titleSelector).first();
            return match.length > 0 ? cleanText(match.text()) : null;
        });

        if (!title) {
            logger.debug(`Container ${index + 1} has no title, skipping`);
            return;
        }

        const times = extractTimes(container.text());
        const detailUrl = resolveUrl(container.find('a[href]').first().attr('href'), origin);

        movies.push({ title, detailUrl, times, countries: [], nearestShowDate: null });
        logger.debug(`Added movie: ${title} (${times.length} showtimes)`);
    });

    logger.debug(`Extracted ${movies.length} movies from ${pageUrl}`);
    return movies;
}
