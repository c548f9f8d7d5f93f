import { z } from 'zod';
import type { Attachment, AttachmentKind, ParseOutcome } from '../types';
import type { ParserOptions } from '../types/options.types';
import { repairMojibake, repairOptional } from '../utils/encoding.utils';
import { isRecord } from '../utils/stream.utils';
import { normaliseParticipantName, stripControlMarks } from '../utils/text.utils';
import { type JsonRecordDialect, parseJsonExport, streamJsonExport } from './json-export';
import { describeSchemaError, recordError } from './parser.utils';

// ============================================================================
// INSTAGRAM EXPORT SCHEMA
// ============================================================================

const MediaSchema = z.object({ uri: z.string() });

/**
 * Instagram message types from the export format ("message_1.json")
 */
const InstagramRecordSchema = z.object({
    sender_name: z.string(),
    timestamp_ms: z.number(),
    content: z.string().optional(),
    photos: z.array(MediaSchema).optional(),
    videos: z.array(MediaSchema).optional(),
    audio_files: z.array(MediaSchema).optional(),
    gifs: z.array(MediaSchema).optional(),
    files: z.array(MediaSchema).optional(),
    sticker: MediaSchema.optional(),
    share: z
        .object({
            link: z.string().optional(),
            share_text: z.string().optional()
        })
        .optional(),
    reactions: z.array(z.object({ reaction: z.string(), actor: z.string() })).optional()
});

type InstagramRecord = z.infer<typeof InstagramRecordSchema>;

const MEDIA_FIELDS = [
    ['photos', 'photo'],
    ['videos', 'video'],
    ['audio_files', 'audio'],
    ['gifs', 'gif'],
    ['files', 'document']
] as const satisfies ReadonlyArray<readonly [keyof InstagramRecord, AttachmentKind]>;

// ============================================================================
// FIELD MAPPING
// ============================================================================

function collectAttachments(record: InstagramRecord): Attachment[] {
    const attachments: Attachment[] = [];

    for (const [field, kind] of MEDIA_FIELDS) {
        for (const media of record[field] ?? []) {
            attachments.push({ kind, name: repairMojibake(media.uri) });
        }
    }
    if (record.sticker) {
        attachments.push({ kind: 'sticker', name: repairMojibake(record.sticker.uri) });
    }
    if (record.share) {
        attachments.push({
            kind: 'share',
            name: repairOptional(record.share.link),
            caption: repairOptional(record.share.share_text)
        });
    }
    for (const { actor, reaction } of record.reactions ?? []) {
        attachments.push({
            kind: 'reaction',
            caption: `${normaliseParticipantName(repairMojibake(actor))}: ${repairMojibake(reaction)}`
        });
    }

    return attachments;
}

function normaliseRecord(raw: unknown, position: number): ParseOutcome {
    const parsed = InstagramRecordSchema.safeParse(raw);
    if (!parsed.success) {
        return recordError('instagram', position, describeSchemaError(parsed.error));
    }
    const record = parsed.data;

    const sender = normaliseParticipantName(repairMojibake(record.sender_name));
    if (!sender) {
        return recordError('instagram', position, 'missing sender');
    }

    const timestamp = new Date(record.timestamp_ms);
    if (Number.isNaN(timestamp.getTime())) {
        return recordError('instagram', position, 'invalid timestamp_ms');
    }

    return {
        ok: true,
        message: {
            sender,
            timestamp,
            text: stripControlMarks(repairMojibake(record.content ?? '')),
            kind: 'message',
            attachments: collectAttachments(record)
        }
    };
}

const INSTAGRAM_DIALECT: JsonRecordDialect = {
    platform: 'instagram',
    label: 'Instagram',
    looksLikeRecord: raw => isRecord(raw) && 'sender_name' in raw && 'timestamp_ms' in raw,
    normalise: normaliseRecord
};

// ============================================================================
// INSTAGRAM PARSER
// ============================================================================

/**
 * Parses an Instagram JSON export held in memory. Messages keep the export's
 * order, which is newest first.
 */
export function parseInstagram(raw: string, options: ParserOptions = {}): Iterable<ParseOutcome> {
    return parseJsonExport(raw, INSTAGRAM_DIALECT, options);
}

export function streamInstagram(chunks: AsyncIterable<string>, options: ParserOptions = {}): AsyncIterable<ParseOutcome> {
    return streamJsonExport(chunks, INSTAGRAM_DIALECT, options);
}
