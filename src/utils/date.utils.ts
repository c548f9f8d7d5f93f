/**
 * Date Parsing Utilities
 */

import { ConfigError, DateDetectionError } from './errors';

// ============================================================================
// WHATSAPP DATE LAYOUTS
// ============================================================================

export type DateLayoutId = 'dmy-slash-24h' | 'mdy-slash-12h' | 'dmy-slash-12h' | 'dmy-dot-24h' | 'ymd-dash-24h';

export type DateLayout = {
    id: DateLayoutId;
    label: string;
    clock: '12h' | '24h';
    /**
     * Matches the timestamp prefix of a message line, up to and including the
     * " - " (Android) or "] " (iOS) that precedes the sender.
     */
    regex: RegExp;
};

export type DateParts = {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
};

// Android: "<date>, <time> - ", iOS: "[<date>, <time>] "; matchTimestampPrefix rejects mixed forms
const LINE_START = '^\\u200E?(?<open>\\[)?';
const LINE_END = '(?:(?<close>\\])\\s|\\s-\\s)';
const TIME_24H = '(?<hour>\\d{1,2}):(?<minute>\\d{2})(?::(?<second>\\d{2}))?(?![\\s\\u202F]*[AaPp]\\.?[Mm])';
const TIME_12H = '(?<hour>\\d{1,2}):(?<minute>\\d{2})(?::(?<second>\\d{2}))?[\\s\\u202F]*(?<meridiem>[AaPp])\\.?[Mm]\\.?';

function buildLayoutRegex(date: string, time: string): RegExp {
    return new RegExp(`${LINE_START}${date},?\\s${time}${LINE_END}`);
}

/**
 * WhatsApp message line examples, one per supported layout:
 *   "31/12/2024, 23:59 - Name: message"     (most of Europe, 24h)
 *   "12/31/24, 11:59 PM - Name: message"    (US, 12h)
 *   "31/12/24, 11:59 pm - Name: message"    (UK/AU/IN, 12h)
 *   "31.12.24, 23:59 - Name: message"       (DE/RU, 24h)
 *   "2024-12-31, 23:59 - Name: message"     (ISO, 24h)
 * Each also accepts seconds and the bracketed iOS form "[31/12/2024, 23:59:10] Name: message".
 * Ties during detection go to the earlier entry.
 */
export const DATE_LAYOUTS: readonly DateLayout[] = [
    {
        id: 'dmy-slash-24h',
        label: 'DD/MM/YYYY 24h',
        clock: '24h',
        regex: buildLayoutRegex('(?<day>\\d{1,2})\\/(?<month>\\d{1,2})\\/(?<year>\\d{2,4})', TIME_24H)
    },
    {
        id: 'mdy-slash-12h',
        label: 'MM/DD/YYYY 12h',
        clock: '12h',
        regex: buildLayoutRegex('(?<month>\\d{1,2})\\/(?<day>\\d{1,2})\\/(?<year>\\d{2,4})', TIME_12H)
    },
    {
        id: 'dmy-slash-12h',
        label: 'DD/MM/YYYY 12h',
        clock: '12h',
        regex: buildLayoutRegex('(?<day>\\d{1,2})\\/(?<month>\\d{1,2})\\/(?<year>\\d{2,4})', TIME_12H)
    },
    {
        id: 'dmy-dot-24h',
        label: 'DD.MM.YYYY 24h',
        clock: '24h',
        regex: buildLayoutRegex('(?<day>\\d{1,2})\\.(?<month>\\d{1,2})\\.(?<year>\\d{2,4})', TIME_24H)
    },
    {
        id: 'ymd-dash-24h',
        label: 'YYYY-MM-DD 24h',
        clock: '24h',
        regex: buildLayoutRegex('(?<year>\\d{4})-(?<month>\\d{1,2})-(?<day>\\d{1,2})', TIME_24H)
    }
];

export type TimestampPrefixMatch = {
    /** Null when the prefix has the layout's shape but an out-of-range field */
    timestamp: Date | null;
    /** Remainder of the line after the prefix */
    rest: string;
};

/**
 * Matches a line against a layout. Returns null when the line does not start
 * with a timestamp in that layout (i.e. it is a continuation line).
 */
export function matchTimestampPrefix(line: string, layout: DateLayout): TimestampPrefixMatch | null {
    const match = layout.regex.exec(line);
    if (!match?.groups) {
        return null;
    }

    const groups = match.groups;
    if ((groups.open === undefined) !== (groups.close === undefined)) {
        return null;
    }
    const rawYear = parseInt(groups.year ?? '', 10);
    let hour = parseInt(groups.hour ?? '', 10);

    if (layout.clock === '12h') {
        if (hour < 1 || hour > 12) {
            return { timestamp: null, rest: line.slice(match[0].length) };
        }
        // Convert 12-hour format to 24-hour format
        const isPm = (groups.meridiem ?? '').toUpperCase() === 'P';
        if (isPm && hour < 12) hour += 12;
        if (!isPm && hour === 12) hour = 0;
    }

    const timestamp = toUtcDate({
        // Convert 2-digit years to 4-digit (assumes 2000s)
        year: rawYear < 100 ? 2000 + rawYear : rawYear,
        month: parseInt(groups.month ?? '', 10),
        day: parseInt(groups.day ?? '', 10),
        hour,
        minute: parseInt(groups.minute ?? '', 10),
        second: groups.second ? parseInt(groups.second, 10) : 0
    });

    return { timestamp, rest: line.slice(match[0].length) };
}

/**
 * Picks the layout of a WhatsApp export from a sample of its lines.
 *
 * Every layout is scored by the number of sampled lines it matches with
 * in-range fields. The best score wins; ties keep the earlier layout.
 */
export function detectDateLayout(sample: readonly string[]): DateLayout {
    let best: DateLayout | null = null;
    let bestScore = 0;

    for (const layout of DATE_LAYOUTS) {
        let score = 0;
        for (const line of sample) {
            if (matchTimestampPrefix(line, layout)?.timestamp) {
                score++;
            }
        }
        if (score > bestScore) {
            best = layout;
            bestScore = score;
        }
    }

    if (!best) {
        const supported = DATE_LAYOUTS.map(layout => layout.label).join(', ');
        throw new DateDetectionError(
            `Could not detect the WhatsApp date format from the first ${sample.length} line(s). Supported formats: ${supported}`
        );
    }
    return best;
}

// ============================================================================
// GENERIC DATE HELPERS
// ============================================================================

/**
 * Builds a UTC instant from wall-clock parts, or null if any part is out of range
 * (month 13, February 30th, 25:00 ...).
 */
export function toUtcDate(parts: DateParts): Date | null {
    const { year, month, day, hour, minute, second } = parts;
    if ([year, month, day, hour, minute, second].some(value => !Number.isInteger(value))) {
        return null;
    }
    if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
        return null;
    }

    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    // Date.UTC rolls day overflow into the next month; reject instead
    if (date.getUTCDate() !== day || date.getUTCMonth() !== month - 1) {
        return null;
    }
    return date;
}

const ZONE_SUFFIX_REGEX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses an ISO 8601 timestamp. Values without a zone are read as UTC.
 */
export function parseIsoTimestamp(value: string): Date | null {
    const trimmed = value.trim();
    if (!/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(trimmed)) {
        return null;
    }
    const normalised = ZONE_SUFFIX_REGEX.test(trimmed) ? trimmed : `${trimmed}Z`;
    const millis = Date.parse(normalised.replace(' ', 'T'));
    return Number.isNaN(millis) ? null : new Date(millis);
}

/**
 * Parses seconds since the epoch given as a number or numeric string.
 */
export function parseUnixSeconds(value: string | number): Date | null {
    const seconds = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(seconds) || (typeof value === 'string' && value.trim() === '')) {
        return null;
    }
    return new Date(seconds * 1000);
}

const US_DATE_TIME_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp])[Mm]$/;

/**
 * Parses "M/D/YYYY h:mm AM" (Discord plain-text and CSV exports), read as UTC.
 */
export function parseUsDateTime(value: string): Date | null {
    const match = US_DATE_TIME_REGEX.exec(value.trim());
    if (!match) {
        return null;
    }
    const [, month, day, year, rawHour, minute, second, meridiem] = match;
    let hour = parseInt(rawHour ?? '', 10);
    if (hour < 1 || hour > 12) {
        return null;
    }
    const isPm = (meridiem ?? '').toUpperCase() === 'P';
    if (isPm && hour < 12) hour += 12;
    if (!isPm && hour === 12) hour = 0;

    return toUtcDate({
        year: parseInt(year ?? '', 10),
        month: parseInt(month ?? '', 10),
        day: parseInt(day ?? '', 10),
        hour,
        minute: parseInt(minute ?? '', 10),
        second: second ? parseInt(second, 10) : 0
    });
}

// ============================================================================
// FILTER DATES & OUTPUT FORMATTING
// ============================================================================

const FILTER_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD filter bound. 'start' gives midnight UTC, 'end' the
 * last millisecond of that day so the bound stays inclusive.
 */
export function parseFilterDate(value: string, edge: 'start' | 'end'): Date {
    const match = FILTER_DATE_REGEX.exec(value.trim());
    const start = match
        ? toUtcDate({
            year: parseInt(match[1] ?? '', 10),
            month: parseInt(match[2] ?? '', 10),
            day: parseInt(match[3] ?? '', 10),
            hour: 0,
            minute: 0,
            second: 0
        })
        : null;

    if (!start) {
        throw new ConfigError(`Invalid date '${value}'. Expected YYYY-MM-DD`);
    }
    return edge === 'start' ? start : new Date(start.getTime() + 24 * 60 * 60 * 1000 - 1);
}

/**
 * Formats an instant as "YYYY-MM-DD HH:MM:SS" in UTC.
 */
export function formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}
