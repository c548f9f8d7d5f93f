/**
 * Text Processing Utilities
 */

import type { Attachment, AttachmentKind } from '../types';
import { BYTE_ORDER_MARK, CONTROL_MARKS_REGEX, FILE_EXTENSION_KINDS } from './constants';

// ============================================================================
// TEXT PROCESSING
// ============================================================================

/**
 * Removes control and direction marks from text that WhatsApp often injects
 */
export function stripControlMarks(text: string): string {
    return text.replace(CONTROL_MARKS_REGEX, "");
}

/**
 * Normalises participant display names by collapsing any run of whitespace
 * characters (including non-breaking/narrow no-break spaces) into a single
 * ASCII space and trimming leading/trailing spaces.
 */
export function normaliseParticipantName(name: string): string {
    return stripControlMarks(name)
        .replace(/[\u00A0\u202F\u2007]/g, ' ') // NBSP, NNBSP, figure space
        .replace(/\s+/g, ' ')
        .trim();
}

export function stripByteOrderMark(text: string): string {
    return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/**
 * Concatenates text fragments so that each boundary between two fragments is
 * marked by exactly one space. Boundaries that already carry whitespace on
 * either side are left as they are.
 */
export function joinFragments(fragments: readonly string[]): string {
    let joined = '';
    for (const fragment of fragments) {
        if (!fragment) {
            continue;
        }
        if (joined && !/\s$/.test(joined) && !/^\s/.test(fragment)) {
            joined += ' ';
        }
        joined += fragment;
    }
    return joined;
}

// ============================================================================
// MEDIA NOTICES
// ============================================================================

const MEDIA_PLACEHOLDERS: ReadonlyArray<[RegExp, AttachmentKind]> = [
    [/^<?image omitted>?$/i, 'photo'],
    [/^<?video omitted>?$/i, 'video'],
    [/^<?audio omitted>?$/i, 'audio'],
    [/^<?sticker omitted>?$/i, 'sticker'],
    [/^<?document omitted>?$/i, 'document'],
    [/^<?gif omitted>?$/i, 'gif'],
    [/^<?contact card omitted>?$/i, 'contact'],
    [/^<?media omitted>?$/i, 'media']
];

const FILE_ATTACHED_REGEX = /^(.+?\.([A-Za-z0-9]{2,5})) \(file attached\)$/;

/**
 * Checks if a line of WhatsApp text is a media placeholder and returns its kind
 */
export function getMediaPlaceholderKind(text: string): AttachmentKind | null {
    const normalizedText = stripControlMarks(text).trim();
    for (const [pattern, kind] of MEDIA_PLACEHOLDERS) {
        if (pattern.test(normalizedText)) {
            return kind;
        }
    }
    return null;
}

export function attachmentKindForFile(fileName: string): AttachmentKind {
    const extension = fileName.slice(fileName.lastIndexOf('.') + 1).toLowerCase();
    return FILE_EXTENSION_KINDS[extension] ?? 'document';
}

/**
 * Splits WhatsApp attachment markers off a message body. The first line may be
 * a placeholder ("<Media omitted>") or "IMG-1.jpg (file attached)"; whatever
 * follows it is the caption and stays as text.
 */
export function extractWhatsAppAttachments(body: string): { text: string; attachments: Attachment[] } {
    const newline = body.indexOf('\n');
    const firstLine = newline === -1 ? body : body.slice(0, newline);
    const remainder = newline === -1 ? '' : body.slice(newline + 1);

    const placeholderKind = getMediaPlaceholderKind(firstLine);
    if (placeholderKind) {
        return { text: remainder, attachments: [{ kind: placeholderKind }] };
    }

    const fileMatch = FILE_ATTACHED_REGEX.exec(stripControlMarks(firstLine).trim());
    if (fileMatch?.[1]) {
        return {
            text: remainder,
            attachments: [{ kind: attachmentKindForFile(fileMatch[1]), name: fileMatch[1] }]
        };
    }

    return { text: body, attachments: [] };
}
