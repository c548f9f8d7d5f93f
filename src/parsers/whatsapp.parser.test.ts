import { describe, expect, it } from 'vitest';
import type { ParseOutcome } from '../types';
import { DATE_LAYOUTS } from '../utils/date.utils';
import { DateDetectionError, FileFatalError } from '../utils/errors';
import { chunksOf } from '../utils/stream.utils';
import { WhatsAppMessageBuilder, parseWhatsApp, streamWhatsApp } from './whatsapp.parser';

const ANDROID_CHAT = [
    '05/01/2024, 09:58 - Messages and calls are end-to-end encrypted. No one outside of this chat can read them.',
    '05/01/2024, 10:00 - Alice: Hey',
    '05/01/2024, 10:01 - Alice: Are you coming',
    'tonight?',
    '',
    '05/01/2024, 10:02 - Bob: <Media omitted>',
    '05/01/2024, 10:03 - Alice added Bob',
    '05/01/2024, 10:04 - Alice changed the subject from "Plans" to "Plans: Friday"',
    '05/01/2024, 10:05 - Bob: IMG-20240105-WA0001.jpg (file attached)',
    'Look at this',
    ''
].join('\n');

function messagesOf(outcomes: Iterable<ParseOutcome>) {
    return [...outcomes].flatMap(outcome => (outcome.ok ? [outcome.message] : []));
}

function errorsOf(outcomes: Iterable<ParseOutcome>) {
    return [...outcomes].flatMap(outcome => (outcome.ok ? [] : [outcome.error]));
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of source) {
        items.push(item);
    }
    return items;
}

describe('parseWhatsApp', () => {
    it('assembles messages from header and continuation lines', () => {
        const messages = messagesOf(parseWhatsApp(ANDROID_CHAT));

        expect(messages.map(message => [message.sender, message.text])).toEqual([
            ['Alice', 'Hey'],
            ['Alice', 'Are you coming\ntonight?'],
            ['Bob', ''],
            ['Bob', 'Look at this']
        ]);
        expect(messages[0]).toEqual({
            sender: 'Alice',
            timestamp: new Date('2024-01-05T10:00:00Z'),
            text: 'Hey',
            kind: 'message',
            attachments: []
        });
    });

    it('turns media notices into attachments', () => {
        const [, , media, photo] = messagesOf(parseWhatsApp(ANDROID_CHAT));

        expect(media?.attachments).toEqual([{ kind: 'media' }]);
        expect(photo?.attachments).toEqual([{ kind: 'photo', name: 'IMG-20240105-WA0001.jpg' }]);
    });

    it('keeps system lines only when asked', () => {
        const system = messagesOf(parseWhatsApp(ANDROID_CHAT, { includeSystem: true }))
            .filter(message => message.kind === 'system');

        expect(system.map(message => message.text)).toEqual([
            'Messages and calls are end-to-end encrypted. No one outside of this chat can read them.',
            'Alice added Bob',
            'Alice changed the subject from "Plans" to "Plans: Friday"'
        ]);
        expect(system.every(message => message.sender === 'System')).toBe(true);
    });

    it('reads the bracketed iOS form with 12-hour times', () => {
        const chat = [
            '\u200E[1/5/24, 10:00:00\u202FAM] Alice: \u200Eimage omitted',
            '[1/5/24, 1:15:30\u202FPM] Bob: Nice',
            '[1/5/24, 1:16:00\u202FPM] \u200EBob\u00A0Smith: Thanks'
        ].join('\r\n');
        const messages = messagesOf(parseWhatsApp(chat));

        expect(messages.map(message => message.timestamp.toISOString())).toEqual([
            '2024-01-05T10:00:00.000Z',
            '2024-01-05T13:15:30.000Z',
            '2024-01-05T13:16:00.000Z'
        ]);
        expect(messages[0]?.text).toBe('');
        expect(messages[0]?.attachments).toEqual([{ kind: 'photo' }]);
        expect(messages[2]?.sender).toBe('Bob Smith');
    });

    it('reports text before the first message once', () => {
        const chat = ['exported by a backup tool', 'second preamble line', '05/01/2024, 10:00 - Alice: Hey'].join('\n');
        const outcomes = [...parseWhatsApp(chat)];

        expect(errorsOf(outcomes).map(error => [error.record, error.reason])).toEqual([
            [1, 'text before the first message']
        ]);
        expect(outcomes[0]?.ok).toBe(false);
        expect(messagesOf(outcomes)).toHaveLength(1);
    });

    it('skips a header with an impossible date along with its continuation lines', () => {
        const chat = [
            '05/01/2024, 10:00 - Alice: Hey',
            '32/01/2024, 10:01 - Bob: broken',
            'still broken',
            '05/01/2024, 10:02 - Alice: Bye'
        ].join('\n');
        const outcomes = [...parseWhatsApp(chat)];

        expect(messagesOf(outcomes).map(message => message.text)).toEqual(['Hey', 'Bye']);
        expect(errorsOf(outcomes).map(error => error.message)).toEqual([
            'whatsapp record 2: date or time out of range'
        ]);
    });

    it('keeps a continuation line that starts with a date but has no dash', () => {
        const chat = [
            '05/01/2024, 10:00 - Alice: the log said:',
            '05/01/2024, 09:59 server restarted',
            '05/01/2024, 10:01 - Bob: ok'
        ].join('\n');
        const messages = messagesOf(parseWhatsApp(chat));

        expect(messages.map(message => [message.sender, message.text])).toEqual([
            ['Alice', 'the log said:\n05/01/2024, 09:59 server restarted'],
            ['Bob', 'ok']
        ]);
    });

    it('reads day-first 12-hour exports', () => {
        const chat = ['[19/3/2025, 8:00:59 pm] Alice: hi', '[19/3/2025, 8:01:10 pm] Bob: hey'].join('\n');
        const messages = messagesOf(parseWhatsApp(chat));

        expect(messages.map(message => message.timestamp.toISOString())).toEqual([
            '2025-03-19T20:00:59.000Z',
            '2025-03-19T20:01:10.000Z'
        ]);
    });

    it('fails when no date layout matches', () => {
        expect(() => [...parseWhatsApp('hello\nworld\n')]).toThrow(DateDetectionError);
    });

    it('fails on an empty file', () => {
        expect(() => [...parseWhatsApp('\n\n')]).toThrow(FileFatalError);
        expect(() => [...parseWhatsApp('')]).toThrow('WhatsApp export is empty');
    });
});

describe('streamWhatsApp', () => {
    it.each([1, 3, 17, 1024])('matches the in-memory parser with %i-character chunks', async size => {
        const streamed = await collect(streamWhatsApp(chunksOf(`\uFEFF${ANDROID_CHAT}`, size), { includeSystem: true }));
        expect(streamed).toEqual([...parseWhatsApp(`\uFEFF${ANDROID_CHAT}`, { includeSystem: true })]);
    });

    it('matches the in-memory parser on CRLF input', async () => {
        const crlf = ANDROID_CHAT.replace(/\n/g, '\r\n');
        const streamed = await collect(streamWhatsApp(chunksOf(crlf, 5)));
        expect(streamed).toEqual([...parseWhatsApp(crlf)]);
    });
});

describe('WhatsAppMessageBuilder', () => {
    it('holds a message until the next header arrives', () => {
        const layout = DATE_LAYOUTS[0];
        if (!layout) throw new Error('no layouts');
        const builder = new WhatsAppMessageBuilder(layout);

        expect(builder.accept('05/01/2024, 10:00 - Alice: Hey', 1)).toEqual([]);
        expect(builder.accept('more', 2)).toEqual([]);
        const flushed = builder.accept('05/01/2024, 10:01 - Bob: Hi', 3);

        expect(messagesOf(flushed).map(message => message.text)).toEqual(['Hey\nmore']);
        expect(messagesOf(builder.finish()).map(message => message.text)).toEqual(['Hi']);
    });
});
