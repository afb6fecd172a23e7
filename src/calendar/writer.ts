import fs from 'fs';
import path from 'path';
import ical from 'ical-generator';
import logger from '../util/logger';
import { CalendarEvent } from './event';

const PRODUCT_ID = '//showtime-ical//Cinema schedule//RU';

/**
 * Serialises events to iCalendar text. Times are floating: screenings happen
 * at the cinema's local wall-clock time.
 */
export function renderCalendar(events: readonly CalendarEvent[], name: string): string {
    const calendar = ical({ name, prodId: PRODUCT_ID });

    for (const event of events) {
        calendar.createEvent({
            start: event.start,
            end: event.end,
            summary: event.name,
            description: event.description,
            url: event.url ?? null,
            floating: true,
        });
    }

    return calendar.toString();
}

/**
 * Writes the calendar next to its final location and renames it into place,
 * so readers never see a partial file.
 */
export function writeCalendar(filePath: string, events: readonly CalendarEvent[], name: string): void {
    const target = path.resolve(filePath);
    const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(tempPath, renderCalendar(events, name), 'utf8');
    fs.renameSync(tempPath, target);

    const { size } = fs.statSync(target);
    logger.info(`Calendar saved: ${target} (${events.length} events, ${size} bytes)`);
}
