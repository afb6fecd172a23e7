import fs from 'fs';
import os from 'os';
import path from 'path';
import { renderCalendar, writeCalendar } from './writer';
import { CalendarEvent } from './event';

jest.mock('../util/logger', () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

const events: CalendarEvent[] = [
    {
        name: 'Сталкер',
        start: new Date(2026, 9, 20, 19, 0),
        end: new Date(2026, 9, 20, 21, 0),
        description: 'Film: Сталкер',
        url: 'https://www.afisha.ru/movie/stalker/',
    },
    {
        name: 'Солярис',
        start: new Date(2026, 9, 21, 10, 30),
        end: new Date(2026, 9, 21, 12, 30),
        description: 'Film: Солярис',
    },
];

describe('renderCalendar', () => {
    it('should emit one VEVENT per event with floating times', () => {
        const text = renderCalendar(events, 'Cinema schedule');

        expect(text.startsWith('BEGIN:VCALENDAR')).toBe(true);
        expect(text.match(/BEGIN:VEVENT/g)).toHaveLength(2);
        expect(text).toContain('SUMMARY:Сталкер');
        expect(text).toContain('SUMMARY:Солярис');
        expect(text).toMatch(/DTSTART:20261020T190000\r?\n/);
        expect(text).toMatch(/DTEND:20261021T123000\r?\n/);
    });

    it('should produce a valid empty calendar', () => {
        const text = renderCalendar([], 'Cinema schedule');

        expect(text).toContain('BEGIN:VCALENDAR');
        expect(text).toContain('END:VCALENDAR');
        expect(text).not.toContain('BEGIN:VEVENT');
    });
});

describe('writeCalendar', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'showtime-ical-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write the file in place and leave no temp files', () => {
        const target = path.join(dir, 'out', 'calendar.ics');

        writeCalendar(target, events, 'Cinema schedule');

        const text = fs.readFileSync(target, 'utf8');
        expect(text.match(/BEGIN:VEVENT/g)).toHaveLength(2);
        expect(text).toContain('SUMMARY:Солярис');
        expect(fs.readdirSync(path.dirname(target))).toEqual(['calendar.ics']);
    });
});
