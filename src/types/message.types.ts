/**
 * Message and Parse Outcome Type Definitions
 */

import type { RecordParseError } from '../utils/errors';

export type Platform = 'telegram' | 'whatsapp' | 'instagram' | 'discord';

export type AttachmentKind =
    | 'photo'
    | 'video'
    | 'audio'
    | 'voice'
    | 'gif'
    | 'sticker'
    | 'document'
    | 'share'
    | 'reaction'
    | 'poll'
    | 'location'
    | 'contact'
    | 'media';

export type Attachment = {
    kind: AttachmentKind;
    /** File name, URI or link the platform recorded */
    name?: string;
    caption?: string;
};

/**
 * `system` covers WhatsApp system lines ("X added Y") and Telegram service records
 */
export type MessageKind = 'message' | 'system';

/**
 * Represents a single message in the unified shape every parser produces.
 */
export type Message = {
    sender: string;
    timestamp: Date;
    /** May be empty for attachment-only messages */
    text: string;
    kind: MessageKind;
    /** Platform-native id, always a string (Discord snowflakes exceed 2^53) */
    id?: string;
    /** Id of another message in the same chat. Never dereferenced; may dangle after filtering */
    replyTo?: string;
    editedAt?: Date;
    forwardedFrom?: string;
    attachments: Attachment[];
};

export type ParseOutcome =
    | { ok: true; message: Message }
    | { ok: false; error: RecordParseError };

/**
 * Stands in for a run of messages the filter dropped, so that merging
 * never joins messages that were not adjacent in the source.
 */
export const SEQUENCE_BREAK: unique symbol = Symbol('sequence-break');

export type MessageStreamItem = Message | typeof SEQUENCE_BREAK;
