import { describe, expect, it } from 'vitest';
import type { ParseOutcome } from '../types';
import { FileFatalError, RecordParseError } from '../utils/errors';
import { chunksOf } from '../utils/stream.utils';
import { flattenTelegramText, parseTelegram, streamTelegram } from './telegram.parser';

const TELEGRAM_EXPORT = JSON.stringify({
    name: 'Test Chat',
    type: 'personal_chat',
    id: 1,
    messages: [
        {
            id: 1,
            type: 'message',
            date: '2024-01-05T10:00:00',
            date_unixtime: '1704448800',
            from: 'Alice',
            from_id: 'user1',
            text: 'Hello'
        },
        {
            id: 2,
            type: 'service',
            date: '2024-01-05T10:01:00',
            date_unixtime: '1704448860',
            actor: 'Alice',
            actor_id: 'user1',
            action: 'invite_members',
            members: ['Bob'],
            text: ''
        },
        {
            id: 3,
            type: 'message',
            date: '2024-01-05T10:02:00',
            date_unixtime: '1704448920',
            edited: '2024-01-05T10:05:00',
            edited_unixtime: '1704449100',
            from: 'Bob',
            from_id: 'user2',
            reply_to_message_id: 1,
            text: ['Check ', { type: 'link', text: 'https://example.com' }, 'now']
        },
        {
            id: 4,
            type: 'message',
            date: '2024-01-05T10:03:00',
            date_unixtime: '1704448980',
            from: 'Bob',
            from_id: 'user2',
            forwarded_from: 'Carol',
            photo: 'photos/photo_1.jpg',
            text: 'look'
        },
        {
            id: 5,
            type: 'message',
            date: '2024-01-05T10:04:00',
            date_unixtime: '1704449040',
            from: null,
            from_id: 'user9',
            file: 'voice_messages/audio_1.ogg',
            media_type: 'voice_message',
            text: ''
        }
    ]
}, null, 2);

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

describe('parseTelegram', () => {
    it('maps message records to the unified shape', () => {
        const messages = messagesOf(parseTelegram(TELEGRAM_EXPORT));

        expect(messages).toHaveLength(4);
        expect(messages[0]).toEqual({
            id: '1',
            sender: 'Alice',
            timestamp: new Date('2024-01-05T10:00:00Z'),
            text: 'Hello',
            kind: 'message',
            attachments: []
        });
    });

    it('flattens text fragments and keeps reply and edit metadata', () => {
        const reply = messagesOf(parseTelegram(TELEGRAM_EXPORT))[1];

        expect(reply?.text).toBe('Check https://example.com now');
        expect(reply?.replyTo).toBe('1');
        expect(reply?.editedAt?.toISOString()).toBe('2024-01-05T10:05:00.000Z');
    });

    it('records forwards and attachments', () => {
        const [, , forwarded, voice] = messagesOf(parseTelegram(TELEGRAM_EXPORT));

        expect(forwarded?.forwardedFrom).toBe('Carol');
        expect(forwarded?.attachments).toEqual([{ kind: 'photo', name: 'photos/photo_1.jpg' }]);
        expect(voice?.attachments).toEqual([{ kind: 'voice', name: 'voice_messages/audio_1.ogg' }]);
    });

    it('falls back to from_id when the display name is missing', () => {
        const voice = messagesOf(parseTelegram(TELEGRAM_EXPORT))[3];
        expect(voice?.sender).toBe('user9');
    });

    it('drops service records unless asked to keep them', () => {
        expect(messagesOf(parseTelegram(TELEGRAM_EXPORT)).map(message => message.id)).toEqual(['1', '3', '4', '5']);

        const service = messagesOf(parseTelegram(TELEGRAM_EXPORT, { includeSystem: true }))[1];
        expect(service).toEqual({
            id: '2',
            sender: 'System',
            timestamp: new Date('2024-01-05T10:01:00Z'),
            text: 'Alice invite members',
            kind: 'system',
            attachments: []
        });
    });

    it('reports bad records and carries on', () => {
        const raw = JSON.stringify({
            messages: [
                { id: 1, type: 'message', date: '2024-01-05T10:00:00', from: 'Alice', text: 'ok' },
                { id: 2, type: 'message', from: 'Alice', text: 'no date' },
                { id: 3, type: 'message', date: '2024-01-05T10:02:00', text: 'nobody' },
                { id: 4, type: 'poll_result', date: '2024-01-05T10:03:00' },
                { id: 5, type: 'message', date: '2024-01-05T10:04:00', from: 'Bob', text: 42 },
                { id: 6, type: 'message', date: '2024-01-05T10:05:00', from: 'Bob', text: 'still here' }
            ]
        });
        const outcomes = [...parseTelegram(raw)];
        const errors = errorsOf(outcomes);

        expect(messagesOf(outcomes).map(message => message.text)).toEqual(['ok', 'still here']);
        expect(errors.every(error => error instanceof RecordParseError)).toBe(true);
        expect(errors.map(error => [error.record, error.reason])).toEqual([
            [2, 'missing or invalid date'],
            [3, 'missing sender'],
            [4, "unsupported record type 'poll_result'"],
            [5, expect.stringMatching(/^text: /)]
        ]);
        expect(errors[0]?.message).toBe('telegram record 2: missing or invalid date');
    });

    it('fails on an export without messages', () => {
        expect(() => [...parseTelegram('{"name": "Empty", "messages": []}')])
            .toThrow('Telegram export contains no "messages" array or it is empty');
        expect(() => [...parseTelegram('{"name": "Empty"}')]).toThrow(FileFatalError);
    });

    it('fails on an export from another platform', () => {
        const instagram = JSON.stringify({ messages: [{ sender_name: 'Alice', timestamp_ms: 1704448800000, content: 'hi' }] });
        expect(() => [...parseTelegram(instagram)]).toThrow('Input does not match the Telegram export format');
    });

    it('fails on malformed JSON', () => {
        expect(() => [...parseTelegram('{"messages": [')]).toThrow(FileFatalError);
    });

    it('gives the same result on every run', () => {
        expect([...parseTelegram(TELEGRAM_EXPORT)]).toEqual([...parseTelegram(TELEGRAM_EXPORT)]);
    });
});

describe('streamTelegram', () => {
    it.each([1, 7, 64, 4096])('matches the in-memory parser with %i-character chunks', async size => {
        const streamed = await collect(streamTelegram(chunksOf(TELEGRAM_EXPORT, size), { includeSystem: true }));
        expect(streamed).toEqual([...parseTelegram(TELEGRAM_EXPORT, { includeSystem: true })]);
    });

    it('fails on an empty messages array', async () => {
        await expect(collect(streamTelegram(chunksOf('{"messages": []}', 4))))
            .rejects.toThrow('Telegram export contains no "messages" array or it is empty');
    });
});

describe('flattenTelegramText', () => {
    it('handles plain strings and missing text', () => {
        expect(flattenTelegramText('plain')).toBe('plain');
        expect(flattenTelegramText(undefined)).toBe('');
    });

    it('joins entity fragments with single spaces', () => {
        expect(flattenTelegramText([{ type: 'bold', text: 'Hi' }, 'there', { type: 'mention', text: '@bob' }]))
            .toBe('Hi there @bob');
    });
});
