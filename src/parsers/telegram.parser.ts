import { z } from 'zod';
import type { Attachment, AttachmentKind, ParseOutcome } from '../types';
import type { ParserOptions } from '../types/options.types';
import { SYSTEM_SENDER } from '../utils/constants';
import { parseIsoTimestamp, parseUnixSeconds } from '../utils/date.utils';
import { isRecord } from '../utils/stream.utils';
import { joinFragments, normaliseParticipantName } from '../utils/text.utils';
import { type JsonRecordDialect, parseJsonExport, streamJsonExport } from './json-export';
import { describeSchemaError, recordError } from './parser.utils';

// ============================================================================
// TELEGRAM EXPORT SCHEMA
// ============================================================================

const IdSchema = z.union([z.number(), z.string()]);
const UnixTimeSchema = z.union([z.string(), z.number()]);

const TextFragmentSchema = z.union([
    z.string(),
    z.object({ type: z.string().optional(), text: z.string() })
]);

/**
 * One entry of `messages` in a Telegram Desktop "result.json" export.
 * Only the fields the converter reads are listed.
 */
const TelegramRecordSchema = z.object({
    id: IdSchema,
    type: z.string(),
    date: z.string().optional(),
    date_unixtime: UnixTimeSchema.optional(),
    edited: z.string().optional(),
    edited_unixtime: UnixTimeSchema.optional(),
    from: z.string().nullish(),
    from_id: z.string().nullish(),
    actor: z.string().nullish(),
    actor_id: z.string().nullish(),
    action: z.string().optional(),
    text: z.union([z.string(), z.array(TextFragmentSchema)]).optional(),
    reply_to_message_id: IdSchema.optional(),
    forwarded_from: z.string().nullish(),
    photo: z.string().optional(),
    file: z.string().optional(),
    file_name: z.string().optional(),
    media_type: z.string().optional(),
    sticker_emoji: z.string().optional(),
    poll: z.object({ question: z.string() }).optional(),
    location_information: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
    contact_information: z
        .object({
            first_name: z.string().optional(),
            last_name: z.string().optional(),
            phone_number: z.string().optional()
        })
        .optional()
});

type TelegramRecord = z.infer<typeof TelegramRecordSchema>;

// ============================================================================
// FIELD MAPPING
// ============================================================================

const FILE_MEDIA_KINDS: Record<string, AttachmentKind> = {
    sticker: 'sticker',
    video_file: 'video',
    video_message: 'video',
    voice_message: 'voice',
    audio_file: 'audio',
    animation: 'gif'
};

/**
 * Flattens `text`, which is either a plain string or a list of plain strings
 * and entity objects (links, bold, mentions ...).
 */
export function flattenTelegramText(text: TelegramRecord['text']): string {
    if (text === undefined) {
        return '';
    }
    if (typeof text === 'string') {
        return text;
    }
    return joinFragments(text.map(fragment => (typeof fragment === 'string' ? fragment : fragment.text)));
}

function collectAttachments(record: TelegramRecord): Attachment[] {
    const attachments: Attachment[] = [];

    if (record.photo) {
        attachments.push({ kind: 'photo', name: record.photo });
    }
    if (record.file) {
        const kind = FILE_MEDIA_KINDS[record.media_type ?? ''] ?? 'document';
        const attachment: Attachment = { kind, name: record.file_name ?? record.file };
        if (kind === 'sticker' && record.sticker_emoji) {
            attachment.caption = record.sticker_emoji;
        }
        attachments.push(attachment);
    }
    if (record.poll) {
        attachments.push({ kind: 'poll', caption: record.poll.question });
    }
    if (record.location_information) {
        const { latitude, longitude } = record.location_information;
        attachments.push({ kind: 'location', caption: `${latitude},${longitude}` });
    }
    if (record.contact_information) {
        const { first_name, last_name, phone_number } = record.contact_information;
        const name = [first_name, last_name].filter(Boolean).join(' ');
        attachments.push({ kind: 'contact', name: name || phone_number, caption: name ? phone_number : undefined });
    }

    return attachments;
}

function resolveTimestamp(unixtime: string | number | undefined, iso: string | undefined): Date | null {
    if (unixtime !== undefined) {
        return parseUnixSeconds(unixtime);
    }
    return iso === undefined ? null : parseIsoTimestamp(iso);
}

function describeServiceAction(record: TelegramRecord): string {
    const action = (record.action ?? 'service event').replace(/_/g, ' ');
    const actor = normaliseParticipantName(record.actor ?? '');
    return actor ? `${actor} ${action}` : action;
}

function normaliseRecord(raw: unknown, position: number, options: ParserOptions): ParseOutcome | null {
    const parsed = TelegramRecordSchema.safeParse(raw);
    if (!parsed.success) {
        return recordError('telegram', position, describeSchemaError(parsed.error));
    }
    const record = parsed.data;

    if (record.type !== 'message' && record.type !== 'service') {
        return recordError('telegram', position, `unsupported record type '${record.type}'`);
    }

    const timestamp = resolveTimestamp(record.date_unixtime, record.date);
    if (!timestamp) {
        return recordError('telegram', position, 'missing or invalid date');
    }

    if (record.type === 'service') {
        if (!options.includeSystem) {
            return null;
        }
        return {
            ok: true,
            message: {
                id: String(record.id),
                sender: SYSTEM_SENDER,
                timestamp,
                text: describeServiceAction(record),
                kind: 'system',
                attachments: []
            }
        };
    }

    const sender = normaliseParticipantName(record.from ?? '') || (record.from_id ?? '');
    if (!sender) {
        return recordError('telegram', position, 'missing sender');
    }

    const editedAt = resolveTimestamp(record.edited_unixtime, record.edited) ?? undefined;

    return {
        ok: true,
        message: {
            id: String(record.id),
            sender,
            timestamp,
            text: flattenTelegramText(record.text),
            kind: 'message',
            replyTo: record.reply_to_message_id === undefined ? undefined : String(record.reply_to_message_id),
            editedAt,
            forwardedFrom: record.forwarded_from ?? undefined,
            attachments: collectAttachments(record)
        }
    };
}

const TELEGRAM_DIALECT: JsonRecordDialect = {
    platform: 'telegram',
    label: 'Telegram',
    looksLikeRecord: raw => isRecord(raw) && 'type' in raw && ('date' in raw || 'date_unixtime' in raw),
    normalise: normaliseRecord
};

// ============================================================================
// TELEGRAM PARSER
// ============================================================================

/**
 * Parses a Telegram Desktop JSON export held in memory.
 */
export function parseTelegram(raw: string, options: ParserOptions = {}): Iterable<ParseOutcome> {
    return parseJsonExport(raw, TELEGRAM_DIALECT, options);
}

/**
 * Parses a Telegram Desktop JSON export record by record.
 */
export function streamTelegram(chunks: AsyncIterable<string>, options: ParserOptions = {}): AsyncIterable<ParseOutcome> {
    return streamJsonExport(chunks, TELEGRAM_DIALECT, options);
}
