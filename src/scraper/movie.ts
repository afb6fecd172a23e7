import type { CheerioAPI } from 'cheerio';
import JSON5 from 'json5';
import { z } from 'zod';
import logger from '../util/logger';
import { errorMessage } from '../util/errors';
import { RateLimitedFetcher } from './fetcher';
import { CalendarDate, EMPTY_DETAILS, MovieDetails, MovieSummary } from './types';
import { cleanText } from './listing';
import { compareDates, daysBetween, extractTimes, firstTime, formatDate, isValidDate } from './time';
import {
    ACTIVE_DATE_SELECTOR,
    CALENDAR_WIDGET_SELECTORS,
    COUNTRY_LABEL_DENYLIST,
    COUNTRY_SELECTORS,
    DAY_NUMBER_SELECTOR,
    JSON_LD_SELECTOR,
    MONTH_TOKENS,
    SHOWTIME_SELECTORS,
} from './selectors';

const MAX_COUNTRY_LENGTH = 50;
const FIRST_SHOW_HOUR = 6;
const LAST_SHOW_HOUR = 23;

/**
 * Obtain countries, nearest screening date and showtimes of a movie.
 * Resolves to empty details when there is no detail page or it cannot be fetched.
 */
export async function getMovieDetails(
    fetcher: RateLimitedFetcher,
    detailUrl: string | undefined,
    today: CalendarDate
): Promise<MovieDetails> {
    if (!detailUrl) {
        return { ...EMPTY_DETAILS };
    }

    logger.debug(`Fetching details and schedule: ${detailUrl}`);
    const result = await fetcher.fetch(detailUrl, 'detail');
    if (result.status !== 'ok') {
        return { ...EMPTY_DETAILS };
    }

    return extractMovieDetails(result.$, today);
}

export function extractMovieDetails($: CheerioAPI, today: CalendarDate): MovieDetails {
    return {
        countries: extractCountries($),
        nearestShowDate: extractNearestShowDate($, today),
        showtimes: extractShowtimes($),
    };
}

/**
 * Folds detail data into a listing summary. Countries and date come from the
 * detail page; showtimes become the sorted union of both sources.
 */
export function applyDetails(movie: MovieSummary, details: MovieDetails): MovieSummary {
    const times = details.showtimes.length > 0
        ? [...new Set([...movie.times, ...details.showtimes])].sort()
        : movie.times;

    return {
        ...movie,
        countries: details.countries,
        nearestShowDate: details.nearestShowDate,
        times,
    };
}

// --- Countries ---

function isCountryText(text: string): boolean {
    if (text.length === 0 || text.length >= MAX_COUNTRY_LENGTH) return false;
    const lower = text.toLowerCase();
    return !COUNTRY_LABEL_DENYLIST.some(word => lower.includes(word));
}

/**
 * Union over every country selector (not first-match-wins): the page spreads
 * countries across several meta blocks.
 */
export function extractCountries($: CheerioAPI): string[] {
    const countries: string[] = [];
    const add = (text: string) => {
        if (isCountryText(text) && !countries.includes(text)) {
            countries.push(text);
        }
    };

    for (const selector of COUNTRY_SELECTORS) {
        $(selector).each((_, element) => add(cleanText($(element).text())));
    }

    if (countries.length === 0) {
        countriesFromJsonLd($).forEach(country => add(cleanText(country)));
    }

    return countries;
}

const CountryRefSchema = z.union([z.string(), z.object({ name: z.string() })]);
const JsonLdMovieSchema = z.object({
    countryOfOrigin: z.union([CountryRefSchema, z.array(CountryRefSchema)]),
});

function countriesFromJsonLd($: CheerioAPI): string[] {
    const countries: string[] = [];

    $(JSON_LD_SELECTOR).each((_, element) => {
        let data: unknown;
        try {
            data = JSON5.parse($(element).html() || '{}');
        } catch (e: unknown) {
            logger.debug(`Failed to parse JSON-LD: ${errorMessage(e)}`);
            return;
        }

        const nodes: unknown[] = Array.isArray(data) ? data : [data];
        for (const node of nodes) {
            const parsed = JsonLdMovieSchema.safeParse(node);
            if (!parsed.success) continue;

            const origin = parsed.data.countryOfOrigin;
            for (const ref of Array.isArray(origin) ? origin : [origin]) {
                countries.push(typeof ref === 'string' ? ref : ref.name);
            }
        }
    });

    return countries;
}

// --- Nearest show date ---

function monthFromLabel(label: string): number | null {
    const lower = label.toLowerCase();
    const token = MONTH_TOKENS.find(([name]) => lower.includes(name));
    return token ? token[1] : null;
}

/**
 * Places a widget day on the calendar. The widget only shows near-term dates
 * and never the year.
 *
 * With a month name, the year that puts the date closest to `today` is used
 * (so "3 января" seen on 30 December is next year). Without one, the day is in
 * the current month if it has not passed yet, otherwise in the next month.
 */
export function inferShowDate(day: number, month: number | null, today: CalendarDate): CalendarDate | null {
    if (month === null) {
        const rollover = day < today.day;
        const candidate = rollover
            ? { year: today.month === 12 ? today.year + 1 : today.year, month: today.month === 12 ? 1 : today.month + 1, day }
            : { year: today.year, month: today.month, day };
        return isValidDate(candidate.year, candidate.month, candidate.day) ? candidate : null;
    }

    const candidates = [today.year - 1, today.year, today.year + 1]
        .filter(year => isValidDate(year, month, day))
        .map(year => ({ year, month, day }));

    if (candidates.length === 0) return null;

    return candidates.reduce((best, candidate) =>
        Math.abs(daysBetween(today, candidate)) < Math.abs(daysBetween(today, best)) ? candidate : best
    );
}

export function extractNearestShowDate($: CheerioAPI, today: CalendarDate): CalendarDate | null {
    const widgetSelector = CALENDAR_WIDGET_SELECTORS.find(selector => $(selector).length > 0);
    if (!widgetSelector) {
        logger.debug('Schedule calendar not found');
        return null;
    }

    const widget = $(widgetSelector).first();
    const dates: CalendarDate[] = [];

    widget.find(ACTIVE_DATE_SELECTOR).each((_, element) => {
        const link = $(element);
        const dayText = cleanText(link.find(DAY_NUMBER_SELECTOR).first().text());
        if (!/^\d{1,2}$/.test(dayText)) return;

        const day = parseInt(dayText, 10);
        const month = monthFromLabel(link.attr('aria-label') ?? '');
        const date = inferShowDate(day, month, today);

        if (date) {
            dates.push(date);
        } else {
            logger.debug(`Skipping invalid date: day ${day}, month ${month ?? 'unknown'}`);
        }
    });

    if (dates.length === 0) {
        logger.debug('No available dates in the schedule calendar');
        return null;
    }

    dates.sort(compareDates);
    logger.debug(`Nearest available date: ${formatDate(dates[0])}`);
    return dates[0];
}

// --- Showtimes ---

export function extractShowtimes($: CheerioAPI): string[] {
    const showtimes: string[] = [];

    for (const selector of SHOWTIME_SELECTORS) {
        $(selector).each((_, element) => {
            const time = firstTime(cleanText($(element).text()));
            if (time && !showtimes.includes(time)) {
                showtimes.push(time);
            }
        });
    }

    if (showtimes.length > 0) {
        return showtimes;
    }

    // No dedicated elements: scan the page text, keeping plausible screening hours only
    return extractTimes($.root().text(), time => time.hour >= FIRST_SHOW_HOUR && time.hour <= LAST_SHOW_HOUR);
}
