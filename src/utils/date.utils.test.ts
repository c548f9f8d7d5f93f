import { describe, expect, it } from 'vitest';
import {
    DATE_LAYOUTS,
    detectDateLayout,
    formatTimestamp,
    matchTimestampPrefix,
    parseFilterDate,
    parseIsoTimestamp,
    parseUnixSeconds,
    parseUsDateTime,
    toUtcDate
} from './date.utils';
import { ConfigError, DateDetectionError } from './errors';

function layout(id: string) {
    const found = DATE_LAYOUTS.find(candidate => candidate.id === id);
    if (!found) throw new Error(`no layout ${id}`);
    return found;
}

describe('detectDateLayout', () => {
    it.each([
        ['31/12/2024, 23:59 - Alice: hi', 'dmy-slash-24h'],
        ['12/31/24, 11:59 PM - Alice: hi', 'mdy-slash-12h'],
        ['31.12.24, 23:59 - Alice: hi', 'dmy-dot-24h'],
        ['2024-12-31, 23:59 - Alice: hi', 'ymd-dash-24h'],
        ['[31/12/2024, 23:59:10] Alice: hi', 'dmy-slash-24h'],
        ['[12/31/24, 11:59:10\u202FPM] Alice: hi', 'mdy-slash-12h'],
        ['31/12/24, 11:59 pm - Alice: hi', 'dmy-slash-12h'],
        ['[19/3/2025, 8:00:59 pm] Alice: hi', 'dmy-slash-12h'],
        ['\u200E31/12/2024, 23:59 - Alice: hi', 'dmy-slash-24h']
    ])('detects the layout of %j', (line, expected) => {
        expect(detectDateLayout([line]).id).toBe(expected);
    });

    it('reads ambiguous 12-hour dates month first', () => {
        expect(detectDateLayout(['1/5/24, 10:00 AM - Alice: hi']).id).toBe('mdy-slash-12h');
    });

    it('picks the layout matching the most lines', () => {
        const sample = [
            '01/02/2024, 10:00 - Alice: one',
            'continuation',
            '13/02/2024, 10:00 - Bob: two',
            '1/2/24, 10:00 AM - Alice: stray'
        ];
        expect(detectDateLayout(sample).id).toBe('dmy-slash-24h');
    });

    it('throws a DateDetectionError listing supported layouts when nothing matches', () => {
        expect(() => detectDateLayout(['hello', 'world'])).toThrow(DateDetectionError);
        expect(() => detectDateLayout(['hello'])).toThrow(/DD\/MM\/YYYY 24h, MM\/DD\/YYYY 12h, DD\/MM\/YYYY 12h, DD\.MM\.YYYY 24h, YYYY-MM-DD 24h/);
    });
});

describe('matchTimestampPrefix', () => {
    it('converts 12-hour times and two-digit years', () => {
        const match = matchTimestampPrefix('12/31/24, 12:05 AM - Alice: hi', layout('mdy-slash-12h'));

        expect(match?.timestamp?.toISOString()).toBe('2024-12-31T00:05:00.000Z');
        expect(match?.rest).toBe('Alice: hi');
    });

    it('reads noon as 12:00', () => {
        const match = matchTimestampPrefix('1/5/24, 12:30 PM - Alice: hi', layout('mdy-slash-12h'));
        expect(match?.timestamp?.toISOString()).toBe('2024-01-05T12:30:00.000Z');
    });

    it('keeps seconds from the iOS form', () => {
        const match = matchTimestampPrefix('[05.01.2024, 08:09:10] Bob: yo', layout('dmy-dot-24h'));

        expect(match?.timestamp?.toISOString()).toBe('2024-01-05T08:09:10.000Z');
        expect(match?.rest).toBe('Bob: yo');
    });

    it('flags an out-of-range date with a null timestamp', () => {
        const match = matchTimestampPrefix('13/13/2024, 10:00 - Alice: hi', layout('dmy-slash-24h'));

        expect(match).not.toBeNull();
        expect(match?.timestamp).toBeNull();
    });

    it('returns null for continuation lines', () => {
        expect(matchTimestampPrefix('just more text', layout('dmy-slash-24h'))).toBeNull();
    });

    it('reads day-first 12-hour iOS lines', () => {
        const match = matchTimestampPrefix('[19/3/2025, 8:00:59 pm] Alice: hi', layout('dmy-slash-12h'));

        expect(match?.timestamp?.toISOString()).toBe('2025-03-19T20:00:59.000Z');
        expect(match?.rest).toBe('Alice: hi');
    });

    it.each([
        '05/01/2024, 09:59 server restarted',
        '[05/01/2024, 09:59 - Alice: hi',
        '05/01/2024, 09:59] Alice: hi'
    ])('needs a dash or a closing bracket matching the opening: %j', line => {
        expect(matchTimestampPrefix(line, layout('dmy-slash-24h'))).toBeNull();
    });
});

describe('toUtcDate', () => {
    it('rejects day overflow', () => {
        expect(toUtcDate({ year: 2023, month: 2, day: 29, hour: 0, minute: 0, second: 0 })).toBeNull();
        expect(toUtcDate({ year: 2024, month: 2, day: 29, hour: 0, minute: 0, second: 0 })?.toISOString())
            .toBe('2024-02-29T00:00:00.000Z');
    });
});

describe('timestamp parsers', () => {
    it('reads zone-less ISO values as UTC', () => {
        expect(parseIsoTimestamp('2024-01-05T10:00:00')?.toISOString()).toBe('2024-01-05T10:00:00.000Z');
        expect(parseIsoTimestamp('2024-01-05T10:00:00+02:00')?.toISOString()).toBe('2024-01-05T08:00:00.000Z');
        expect(parseIsoTimestamp('yesterday')).toBeNull();
    });

    it('reads unix seconds from numbers and strings', () => {
        expect(parseUnixSeconds('1704448800')?.toISOString()).toBe('2024-01-05T10:00:00.000Z');
        expect(parseUnixSeconds(1704448800)?.toISOString()).toBe('2024-01-05T10:00:00.000Z');
        expect(parseUnixSeconds('')).toBeNull();
        expect(parseUnixSeconds('soon')).toBeNull();
    });

    it('reads US date-times', () => {
        expect(parseUsDateTime('1/15/2024 10:30 AM')?.toISOString()).toBe('2024-01-15T10:30:00.000Z');
        expect(parseUsDateTime('1/15/2024 12:00 AM')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
        expect(parseUsDateTime('1/15/2024 13:00 PM')).toBeNull();
    });
});

describe('parseFilterDate', () => {
    it('gives the first and last millisecond of the day', () => {
        expect(parseFilterDate('2024-03-10', 'start').toISOString()).toBe('2024-03-10T00:00:00.000Z');
        expect(parseFilterDate('2024-03-10', 'end').toISOString()).toBe('2024-03-10T23:59:59.999Z');
    });

    it.each(['2024-02-30', '10/03/2024', '2024-3-1', ''])('rejects %j', value => {
        expect(() => parseFilterDate(value, 'start')).toThrow(ConfigError);
        expect(() => parseFilterDate(value, 'start')).toThrow('Expected YYYY-MM-DD');
    });
});

describe('formatTimestamp', () => {
    it('formats as UTC wall-clock time', () => {
        expect(formatTimestamp(new Date(Date.UTC(2024, 0, 5, 7, 8, 9)))).toBe('2024-01-05 07:08:09');
    });
});
