import { parse } from 'csv-parse/sync';
import { describe, expect, it } from 'vitest';
import type { Message } from '../types';
import { formatCsvRow, writeCsv } from './csv.writer';
import { createMemorySink } from './sink';
import { DEFAULT_FIELDS } from './writer.utils';

function message(sender: string, text: string, extra: Partial<Message> = {}): Message {
    return {
        sender,
        timestamp: new Date('2024-01-05T10:00:00Z'),
        text,
        kind: 'message',
        attachments: [],
        ...extra
    };
}

describe('writeCsv', () => {
    it('writes a header and one row per message', async () => {
        const sink = createMemorySink();
        const written = await writeCsv([message('Alice', 'plain'), message('Bob', 'a, "b"\nc')], sink, DEFAULT_FIELDS);

        expect(written).toBe(2);
        expect(sink.text()).toBe('sender,content\nAlice,plain\nBob,"a, ""b""\nc"\n');
        expect(sink.ended).toBe(true);
    });

    it('writes only the header when nothing is left', async () => {
        const sink = createMemorySink();
        expect(await writeCsv([], sink, DEFAULT_FIELDS)).toBe(0);
        expect(sink.text()).toBe('sender,content\n');
    });

    it('adds the selected columns in a fixed order', async () => {
        const sink = createMemorySink();
        const fields = { ...DEFAULT_FIELDS, timestamps: true, ids: true, replies: true, attachments: true };
        await writeCsv(
            [message('Alice', 'hi', { id: '7', replyTo: '3', attachments: [{ kind: 'photo', name: 'a.jpg' }, { kind: 'media' }] })],
            sink,
            fields
        );

        expect(sink.text()).toBe(
            'id,timestamp,sender,content,reply_to,attachments\n7,2024-01-05 10:00:00,Alice,hi,3,photo:a.jpg; media\n'
        );
    });

    it('leaves cells empty when a message has no value', async () => {
        const sink = createMemorySink();
        await writeCsv([message('Alice', '')], sink, { ...DEFAULT_FIELDS, replies: true, edited: true });

        expect(sink.text()).toBe('sender,content,reply_to,edited\nAlice,,,\n');
    });

    it('round-trips awkward text through a CSV parser', async () => {
        const texts = ['comma, here', 'quote " here', 'line\nbreak', 'carriage\rreturn', 'crlf\r\nend', '', '  padded  '];
        const sink = createMemorySink();
        await writeCsv(texts.map(text => message('Alice', text)), sink, DEFAULT_FIELDS);

        const rows: string[][] = parse(sink.text(), { from_line: 2 });
        expect(rows.map(row => row[1])).toEqual(texts);
    });
});

describe('writeCsv with a failing source', () => {
    it('aborts the sink after the rows already written', async () => {
        async function* source(): AsyncGenerator<Message> {
            yield message('Alice', 'plain');
            throw new Error('source failed');
        }
        const sink = createMemorySink();

        await expect(writeCsv(source(), sink, DEFAULT_FIELDS)).rejects.toThrow('source failed');
        expect(sink.aborted).toBe(true);
        expect(sink.text()).toBe('sender,content\nAlice,plain\n');
    });
});

describe('formatCsvRow', () => {
    it('quotes only the cells that need it', () => {
        expect(formatCsvRow(['a', 'b c', 'd,e'])).toBe('a,b c,"d,e"\n');
    });
});
