import { parse as createCsvParser } from 'csv-parse';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import type { Attachment, ParseOutcome } from '../types';
import type { ParserOptions } from '../types/options.types';
import { SYSTEM_SENDER } from '../utils/constants';
import { parseIsoTimestamp, parseUsDateTime } from '../utils/date.utils';
import { ChatpressError, FileFatalError, describeError } from '../utils/errors';
import { isRecord, peekInput, pullRecords, readLines, splitLines } from '../utils/stream.utils';
import { attachmentKindForFile, normaliseParticipantName, stripByteOrderMark } from '../utils/text.utils';
import { type JsonRecordDialect, parseJsonExport, streamJsonExport } from './json-export';
import { describeSchemaError, recordError } from './parser.utils';

// ============================================================================
// SHARED
// ============================================================================

type DiscordShape = 'json' | 'txt' | 'csv';

/**
 * DiscordChatExporter writes JSON, plain text or CSV; the first characters
 * tell them apart.
 */
export function detectDiscordShape(head: string): DiscordShape {
    const start = stripByteOrderMark(head).trimStart();
    if (!start) {
        throw new FileFatalError('Discord export is empty');
    }
    if (start.startsWith('{')) {
        return 'json';
    }
    if (start.startsWith('=') || start.startsWith('[')) {
        return 'txt';
    }
    if (/^"?AuthorID"?,/.test(start)) {
        return 'csv';
    }
    throw new FileFatalError('This does not look like a Discord export (expected JSON, plain text or CSV from DiscordChatExporter)');
}

function attachmentFromUrl(url: string): Attachment {
    const path = url.split(/[?#]/)[0] ?? url;
    return { kind: attachmentKindForFile(path), name: url };
}

function parseDiscordDate(value: string): Date | null {
    return parseIsoTimestamp(value) ?? parseUsDateTime(value);
}

function noMessages(): FileFatalError {
    return new FileFatalError('Discord export contains no messages');
}

// ============================================================================
// JSON
// ============================================================================

const DiscordRecordSchema = z.object({
    id: z.string(),
    type: z.string().optional(),
    timestamp: z.string(),
    timestampEdited: z.string().nullish(),
    content: z.string(),
    author: z.object({
        name: z.string(),
        nickname: z.string().nullish()
    }),
    attachments: z.array(z.object({ url: z.string(), fileName: z.string().optional() })).optional(),
    stickers: z.array(z.object({ name: z.string() })).optional(),
    reference: z.object({ messageId: z.string().nullish() }).nullish()
});

/** Record types that carry message content, slash-command replies included; everything else is a system event */
const USER_MESSAGE_TYPES = new Set(['Default', 'Reply', 'ChatInputCommand', 'ContextMenuCommand']);

function normaliseJsonRecord(raw: unknown, position: number, options: ParserOptions): ParseOutcome | null {
    const parsed = DiscordRecordSchema.safeParse(raw);
    if (!parsed.success) {
        return recordError('discord', position, describeSchemaError(parsed.error));
    }
    const record = parsed.data;

    const timestamp = parseIsoTimestamp(record.timestamp);
    if (!timestamp) {
        return recordError('discord', position, `invalid timestamp '${record.timestamp}'`);
    }

    if (record.type !== undefined && !USER_MESSAGE_TYPES.has(record.type)) {
        if (!options.includeSystem) {
            return null;
        }
        return {
            ok: true,
            message: {
                id: record.id,
                sender: SYSTEM_SENDER,
                timestamp,
                text: record.content || record.type,
                kind: 'system',
                attachments: []
            }
        };
    }

    const sender = normaliseParticipantName(record.author.nickname || record.author.name);
    if (!sender) {
        return recordError('discord', position, 'missing author');
    }

    const attachments: Attachment[] = (record.attachments ?? []).map(attachment => ({
        kind: attachmentKindForFile(attachment.fileName ?? attachment.url),
        name: attachment.fileName ?? attachment.url
    }));
    for (const sticker of record.stickers ?? []) {
        attachments.push({ kind: 'sticker', name: sticker.name });
    }

    return {
        ok: true,
        message: {
            id: record.id,
            sender,
            timestamp,
            text: record.content,
            kind: 'message',
            replyTo: record.reference?.messageId ?? undefined,
            editedAt: record.timestampEdited ? parseIsoTimestamp(record.timestampEdited) ?? undefined : undefined,
            attachments
        }
    };
}

const DISCORD_DIALECT: JsonRecordDialect = {
    platform: 'discord',
    label: 'Discord',
    looksLikeRecord: raw => isRecord(raw) && 'author' in raw && 'timestamp' in raw,
    normalise: normaliseJsonRecord
};

// ============================================================================
// PLAIN TEXT
// ============================================================================

const BANNER_REGEX = /^={10,}$/;
const TEXT_HEADER_REGEX = /^\[(\d{1,2}\/\d{1,2}\/\d{4} \d{1,2}:\d{2}(?::\d{2})? ?[AaPp][Mm])\] (.+)$/;
const BLOCK_MARKER_REGEX = /^\{([A-Za-z ]+)\}$/;

type TextBlock = 'content' | 'attachments' | 'stickers' | 'dropped';

type PendingTextMessage = {
    sender: string;
    timestamp: Date;
    lines: string[];
    attachments: Attachment[];
};

/**
 * Assembles messages from a plain-text export:
 *
 *   [1/15/2024 10:30 AM] alice
 *   Hello everyone
 *
 *   {Attachments}
 *   https://cdn.example.com/photo.png
 *
 * Outside the banners, the first text must be a message header; anything else
 * is a different kind of file and fails before a message is produced.
 */
export class DiscordTextBuilder {
    private pending: PendingTextMessage | null = null;
    private block: TextBlock = 'dropped';
    private inBanner = false;
    private seenHeader = false;

    accept(line: string, lineNumber: number): ParseOutcome[] {
        if (BANNER_REGEX.test(line.trim())) {
            this.inBanner = !this.inBanner;
            this.block = 'dropped';
            return this.flush();
        }
        if (this.inBanner) {
            return [];
        }

        const header = TEXT_HEADER_REGEX.exec(line);
        if (!header && !this.seenHeader && line.trim()) {
            throw new FileFatalError(
                `Input does not match the Discord plain-text export format (line ${lineNumber} is not a "[M/D/YYYY h:mm AM] author" header)`
            );
        }
        if (header) {
            this.seenHeader = true;
            const outcomes = this.flush();
            const timestamp = parseUsDateTime(header[1] ?? '');
            const sender = normaliseParticipantName(header[2] ?? '');
            if (!timestamp) {
                outcomes.push(recordError('discord', lineNumber, `invalid date '${header[1] ?? ''}'`));
                this.block = 'dropped';
            } else if (!sender) {
                outcomes.push(recordError('discord', lineNumber, 'missing author'));
                this.block = 'dropped';
            } else {
                this.pending = { sender, timestamp, lines: [], attachments: [] };
                this.block = 'content';
            }
            return outcomes;
        }

        if (!this.pending) {
            return [];
        }

        const marker = BLOCK_MARKER_REGEX.exec(line.trim());
        if (marker) {
            const name = marker[1] ?? '';
            this.block = name === 'Attachments' ? 'attachments' : name === 'Stickers' ? 'stickers' : 'dropped';
            return [];
        }

        const value = line.trim();
        switch (this.block) {
            case 'content':
                this.pending.lines.push(line);
                break;
            case 'attachments':
                if (value) this.pending.attachments.push(attachmentFromUrl(value));
                break;
            case 'stickers':
                if (value) this.pending.attachments.push({ kind: 'sticker', name: value });
                break;
            case 'dropped':
                break;
        }
        return [];
    }

    finish(): ParseOutcome[] {
        if (!this.seenHeader) {
            throw noMessages();
        }
        return this.flush();
    }

    private flush(): ParseOutcome[] {
        const pending = this.pending;
        this.pending = null;
        if (!pending) {
            return [];
        }
        return [{
            ok: true,
            message: {
                sender: pending.sender,
                timestamp: pending.timestamp,
                text: pending.lines.join('\n').trim(),
                kind: 'message',
                attachments: pending.attachments
            }
        }];
    }
}

// ============================================================================
// CSV
// ============================================================================

const CSV_OPTIONS = {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true
};

const DiscordCsvRowSchema = z.object({
    AuthorID: z.string().optional(),
    Author: z.string(),
    Date: z.string(),
    Content: z.string(),
    Attachments: z.string().optional(),
    Reactions: z.string().optional()
});

function normaliseCsvRow(raw: unknown, position: number): ParseOutcome {
    const parsed = DiscordCsvRowSchema.safeParse(raw);
    if (!parsed.success) {
        return recordError('discord', position, describeSchemaError(parsed.error));
    }
    const row = parsed.data;

    const timestamp = parseDiscordDate(row.Date);
    if (!timestamp) {
        return recordError('discord', position, `invalid date '${row.Date}'`);
    }
    const sender = normaliseParticipantName(row.Author);
    if (!sender) {
        return recordError('discord', position, 'missing author');
    }

    const attachments = (row.Attachments ?? '')
        .split(',')
        .map(url => url.trim())
        .filter(Boolean)
        .map(attachmentFromUrl);

    return {
        ok: true,
        message: { sender, timestamp, text: row.Content, kind: 'message', attachments }
    };
}

function csvFailure(error: unknown): Error {
    if (error instanceof ChatpressError) {
        return error;
    }
    return new FileFatalError(`Discord export is not valid CSV: ${describeError(error)}`, { cause: error });
}

function* parseCsvExport(raw: string): Generator<ParseOutcome> {
    let rows: unknown;
    try {
        rows = parseCsv(raw, CSV_OPTIONS);
    } catch (error) {
        throw csvFailure(error);
    }
    const records: unknown[] = Array.isArray(rows) ? rows : [];
    if (records.length === 0) {
        throw noMessages();
    }
    for (let index = 0; index < records.length; index++) {
        yield normaliseCsvRow(records[index], index + 1);
    }
}

async function* streamCsvExport(chunks: AsyncIterable<string>): AsyncGenerator<ParseOutcome> {
    let position = 0;
    try {
        for await (const row of pullRecords(chunks, createCsvParser(CSV_OPTIONS))) {
            yield normaliseCsvRow(row, ++position);
        }
    } catch (error) {
        throw csvFailure(error);
    }
    if (position === 0) {
        throw noMessages();
    }
}

// ============================================================================
// DISCORD PARSER
// ============================================================================

/**
 * Parses a DiscordChatExporter export (JSON, TXT or CSV) held in memory.
 */
export function* parseDiscord(raw: string, options: ParserOptions = {}): Generator<ParseOutcome> {
    const text = stripByteOrderMark(raw);
    switch (detectDiscordShape(text)) {
        case 'json':
            yield* parseJsonExport(text, DISCORD_DIALECT, options);
            return;
        case 'csv':
            yield* parseCsvExport(text);
            return;
        case 'txt': {
            const builder = new DiscordTextBuilder();
            const lines = splitLines(text);
            for (let index = 0; index < lines.length; index++) {
                yield* builder.accept(lines[index] ?? '', index + 1);
            }
            yield* builder.finish();
        }
    }
}

export async function* streamDiscord(
    chunks: AsyncIterable<string>,
    options: ParserOptions = {}
): AsyncGenerator<ParseOutcome> {
    const input = await peekInput(chunks);
    switch (detectDiscordShape(input.head)) {
        case 'json':
            yield* streamJsonExport(input.chunks, DISCORD_DIALECT, options);
            return;
        case 'csv':
            yield* streamCsvExport(input.chunks);
            return;
        case 'txt': {
            const builder = new DiscordTextBuilder();
            let lineNumber = 0;
            for await (const line of readLines(input.chunks)) {
                yield* builder.accept(line, ++lineNumber);
            }
            yield* builder.finish();
        }
    }
}
