/** A date without time of day or zone; `month` is 1-12. */
export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

export interface MovieSummary {
    title: string;
    detailUrl?: string;
    /** Canonical "HH:MM", unique. */
    times: string[];
    countries: string[];
    nearestShowDate: CalendarDate | null;
}

export interface MovieDetails {
    countries: string[];
    nearestShowDate: CalendarDate | null;
    showtimes: string[];
}

export const EMPTY_DETAILS: Readonly<MovieDetails> = Object.freeze({
    countries: [],
    nearestShowDate: null,
    showtimes: [],
});
