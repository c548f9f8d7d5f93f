import type { Attachment, Message } from '../types';
import type { FieldSelection } from '../types/options.types';
import { formatTimestamp } from '../utils/date.utils';
import type { OutputSink } from './sink';

// ============================================================================
// OUTPUT RECORD
// ============================================================================

export type MessageSource = Iterable<Message> | AsyncIterable<Message>;

/**
 * The written form of a message. Key order here is the order of CSV columns
 * and of JSON properties.
 */
export type OutputRecord = {
    id?: string;
    timestamp?: string;
    sender: string;
    content: string;
    reply_to?: string;
    edited?: string;
    forwarded_from?: string;
    attachments?: Attachment[];
};

export type OutputColumn = keyof OutputRecord;

export const DEFAULT_FIELDS: FieldSelection = {
    timestamps: false,
    replies: false,
    edited: false,
    ids: false,
    forwarded: false,
    attachments: false
};

/**
 * Columns written for a field selection, in output order.
 */
export function selectColumns(fields: FieldSelection): OutputColumn[] {
    const columns: OutputColumn[] = [];
    if (fields.ids) columns.push('id');
    if (fields.timestamps) columns.push('timestamp');
    columns.push('sender', 'content');
    if (fields.replies) columns.push('reply_to');
    if (fields.edited) columns.push('edited');
    if (fields.forwarded) columns.push('forwarded_from');
    if (fields.attachments) columns.push('attachments');
    return columns;
}

function copyAttachment(attachment: Attachment): Attachment {
    const copy: Attachment = { kind: attachment.kind };
    if (attachment.name !== undefined) copy.name = attachment.name;
    if (attachment.caption !== undefined) copy.caption = attachment.caption;
    return copy;
}

/**
 * Builds the output record for a message. Optional keys are present only when
 * selected and when the message has a value for them.
 */
export function toOutputRecord(message: Message, fields: FieldSelection): OutputRecord {
    return {
        ...(fields.ids && message.id !== undefined ? { id: message.id } : {}),
        ...(fields.timestamps ? { timestamp: formatTimestamp(message.timestamp) } : {}),
        sender: message.sender,
        content: message.text,
        ...(fields.replies && message.replyTo !== undefined ? { reply_to: message.replyTo } : {}),
        ...(fields.edited && message.editedAt !== undefined ? { edited: formatTimestamp(message.editedAt) } : {}),
        ...(fields.forwarded && message.forwardedFrom !== undefined ? { forwarded_from: message.forwardedFrom } : {}),
        ...(fields.attachments && message.attachments.length > 0
            ? { attachments: message.attachments.map(copyAttachment) }
            : {})
    };
}

/**
 * One-cell rendering of attachments: "photo:IMG_1.jpg; sticker".
 */
export function formatAttachmentList(attachments: readonly Attachment[]): string {
    return attachments.map(attachment => (attachment.name ? `${attachment.kind}:${attachment.name}` : attachment.kind)).join('; ');
}

// ============================================================================
// SINK LIFECYCLE
// ============================================================================

/**
 * Runs a writer body against a sink. The sink is ended when the body
 * completes and aborted when it (or the message source it reads) throws.
 */
export async function writeThrough(sink: OutputSink, body: () => Promise<number>): Promise<number> {
    let written: number;
    try {
        written = await body();
    } catch (error) {
        await sink.abort();
        throw error;
    }
    await sink.end();
    return written;
}
