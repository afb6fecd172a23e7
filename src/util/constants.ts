export const DEFAULT_SCHEDULE_URL = 'https://www.afisha.ru/prm/schedule_cinema/';
export const DEFAULT_OUTPUT_FILE = 'calendar.ics';
export const DEFAULT_CALENDAR_NAME = 'Cinema schedule';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36';

// Browser-like headers; the schedule host answers bare clients with 403
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'ru-RU,ru;q=0.9,en-US;q=0.8,en;q=0.7',
    'Accept-Encoding': 'gzip, deflate, br',
    'DNT': '1',
    'Connection': 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Cache-Control': 'max-age=0',
};

// Screenings without a known time are placed at 19:00 and last two hours
export const DEFAULT_SHOW_HOUR = 19;
export const EVENT_DURATION_HOURS = 2;
