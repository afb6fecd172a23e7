import { CalendarDate } from './types';

/** Time-shaped tokens, tried in order. Dots are normalised to colons. */
export const TIME_PATTERNS: readonly RegExp[] = [
    /\d{1,2}[:.]\d{2}/g,
    /\d{1,2}:\d{2}/g,
    /\d{1,2}\.\d{2}/g,
];

const FIRST_TIME_TOKEN = /\d{1,2}[:.]\d{2}/;
const STRICT_TIME = /^(\d{1,2}):(\d{2})$/;

export interface TimeOfDay {
    hour: number;
    minute: number;
}

const pad = (value: number): string => value.toString().padStart(2, '0');

export function parseTime(raw: string): TimeOfDay | null {
    const match = raw.trim().replace('.', ':').match(STRICT_TIME);
    if (!match) return null;

    const hour = parseInt(match[1], 10);
    const minute = parseInt(match[2], 10);
    if (hour > 23 || minute > 59) return null;

    return { hour, minute };
}

/**
 * "9.05" -> "09:05". Returns null for anything that is not a 24-hour clock time.
 */
export function normalizeTime(raw: string): string | null {
    const time = parseTime(raw);
    return time ? `${pad(time.hour)}:${pad(time.minute)}` : null;
}

/**
 * Collects every valid time in `text`, in the order the patterns find them.
 * `accept` can reject times that parse but are implausible.
 */
export function extractTimes(text: string, accept: (time: TimeOfDay) => boolean = () => true): string[] {
    const times: string[] = [];

    for (const pattern of TIME_PATTERNS) {
        for (const match of text.matchAll(pattern)) {
            const time = parseTime(match[0]);
            if (!time || !accept(time)) continue;

            const normalized = `${pad(time.hour)}:${pad(time.minute)}`;
            if (!times.includes(normalized)) {
                times.push(normalized);
            }
        }
    }

    return times;
}

/** First time token in `text`, normalised, or null. */
export function firstTime(text: string): string | null {
    const match = text.match(FIRST_TIME_TOKEN);
    return match ? normalizeTime(match[0]) : null;
}

// --- Calendar dates ---

export function isValidDate(year: number, month: number, day: number): boolean {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
    if (month < 1 || month > 12 || day < 1) return false;
    // Day 0 of the following month is the last day of this one
    return day <= new Date(year, month, 0).getDate();
}

export function toCalendarDate(date: Date): CalendarDate {
    return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
    return toCalendarDate(new Date(date.year, date.month - 1, date.day + days));
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
    return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
    const msPerDay = 24 * 60 * 60 * 1000;
    return Math.round((Date.UTC(to.year, to.month - 1, to.day) - Date.UTC(from.year, from.month - 1, from.day)) / msPerDay);
}

export function formatDate(date: CalendarDate): string {
    return `${pad(date.day)}.${pad(date.month)}.${date.year}`;
}

export function formatDateTime(date: Date): string {
    return `${formatDate(toCalendarDate(date))} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}
