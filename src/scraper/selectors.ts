// Markup of the schedule site changes often. Every selector the scrapers rely on lives here.

/** Listing containers. The first selector that matches anything wins. */
export const MOVIE_CONTAINER_SELECTORS = [
    '.movie-item',
    '.film-item',
    '.schedule-item',
    '[data-movie]',
    '.movie',
    '.film',
    'article',
    '.content-item',
    '.list-item',
    '.cinema-movie',
    '.schedule-movie',
    '.event-item',
    '.item',
] as const;

/** Probed in order inside a container. */
export const TITLE_SELECTORS = ['h1', 'h2', 'h3', '.title', '.name', 'a', 'strong'] as const;

/** Fragments of an href that mark a link to a movie page. */
export const MOVIE_LINK_TOKENS = ['movie', 'film'] as const;

/** Any of these on a page means it has schedule content. */
export const CONTENT_BLOCK_SELECTORS = ['.movie', '.film', '.schedule', '.cinema', 'article'] as const;

/** Detail page. Matches of every selector are merged. */
export const COUNTRY_SELECTORS = [
    '[data-test="ITEM-META"] a',
    '.country',
    '.film-country',
    '.movie-country',
    'span:contains("Страна")',
    '.meta-info',
    '.film-meta',
] as const;

/** Metadata labels some country selectors pick up by accident. */
export const COUNTRY_LABEL_DENYLIST = ['жанр', 'режиссер', 'актер', 'год', 'время'] as const;

export const CALENDAR_WIDGET_SELECTORS = [
    '.EyErB',
    '[aria-label="Календарь"]',
    '.calendar',
    '.schedule-calendar',
] as const;

/** Enabled dates are links; disabled ones are rendered as buttons. */
export const ACTIVE_DATE_SELECTOR = 'a.pdT6c';
export const DAY_NUMBER_SELECTOR = '.YCVqY';

export const SHOWTIME_SELECTORS = [
    '.showtime',
    '.session-time',
    '.time',
    '[data-time]',
    '.screening-time',
] as const;

export const JSON_LD_SELECTOR = 'script[type="application/ld+json"]';

/** Genitive month names as they appear in the widget's aria-label ("12 октября"). */
export const MONTH_TOKENS: ReadonlyArray<readonly [string, number]> = [
    ['января', 1],
    ['февраля', 2],
    ['марта', 3],
    ['апреля', 4],
    ['мая', 5],
    ['июня', 6],
    ['июля', 7],
    ['августа', 8],
    ['сентября', 9],
    ['октября', 10],
    ['ноября', 11],
    ['декабря', 12],
];
