import { MovieSummary } from '../scraper/types';
import { addDays, formatDate, formatDateTime, parseTime, toCalendarDate } from '../scraper/time';
import { DEFAULT_SHOW_HOUR, EVENT_DURATION_HOURS } from '../util/constants';

export interface CalendarEvent {
    name: string;
    start: Date;
    end: Date;
    description: string;
    url?: string;
}

const HOUR_MS = 60 * 60 * 1000;

function withDuration(start: Date): Date {
    return new Date(start.getTime() + EVENT_DURATION_HOURS * HOUR_MS);
}

/**
 * Turns a movie into a calendar event, or null when one of its countries is
 * excluded (exact, case-sensitive match).
 *
 * Without a known screening date the event goes on tomorrow; without a valid
 * first showtime it starts at 19:00.
 */
export function materializeEvent(movie: MovieSummary, excludedCountries: ReadonlySet<string>, now: Date = new Date()): CalendarEvent | null {
    if (movie.countries.some(country => excludedCountries.has(country))) {
        return null;
    }

    const date = movie.nearestShowDate ?? addDays(toCalendarDate(now), 1);
    const time = movie.times.length > 0 ? parseTime(movie.times[0]) : null;

    const start = new Date(date.year, date.month - 1, date.day, time?.hour ?? DEFAULT_SHOW_HOUR, time?.minute ?? 0);

    const description = [
        `Film: ${movie.title}`,
        movie.countries.length > 0 ? `Country: ${movie.countries.slice(0, 3).join(', ')}` : null,
        movie.times.length > 0 ? `Showtimes: ${movie.times.slice(0, 5).join(', ')}` : null,
        movie.nearestShowDate ? `Nearest screening: ${formatDate(movie.nearestShowDate)}` : null,
        `Event: ${formatDateTime(start)}`,
        movie.detailUrl ? `Source: ${movie.detailUrl}` : null,
    ].filter((line): line is string => line !== null);

    return {
        name: movie.title,
        start,
        end: withDuration(start),
        description: description.join('\n'),
        url: movie.detailUrl,
    };
}

/** Explanatory event 24 hours from `now`, used when there is nothing else to publish. */
export function placeholderEvent(name: string, description: string, now: Date = new Date()): CalendarEvent {
    const start = new Date(now.getTime() + 24 * HOUR_MS);
    return { name, start, end: withDuration(start), description };
}
