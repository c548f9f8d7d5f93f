/**
 * Constants and Configuration Values
 */

export const VERSION = '0.1.0';

// ============================================================================
// PIPELINE CONFIGURATION
// ============================================================================

/** Joins the texts of merged messages; marks the boundary between originals */
export const MERGE_SEPARATOR = ' | ';

/** Leading lines the WhatsApp date-layout detector looks at */
export const DATE_SAMPLE_LINES = 50;

export const PROGRESS_INTERVAL = 10_000;
export const MAX_REPORTED_RECORD_ERRORS = 20;

export const READ_CHUNK_BYTES = 64 * 1024;
export const DEFAULT_OUTPUT_BASENAME = 'optimized_chat';

/** Sender given to system lines, which have no author */
export const SYSTEM_SENDER = 'System';

// ============================================================================
// REGEX PATTERNS
// ============================================================================

// Control & direction marks often injected by WhatsApp (e.g., U+200E)
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;

export const BYTE_ORDER_MARK = '\uFEFF';

/**
 * A "sender" prefix matching one of these is really a system event whose
 * quoted text contains ": " (e.g. a new group subject).
 */
export const WHATSAPP_SYSTEM_PATTERNS: readonly RegExp[] = [
    /\schanged (?:the subject|the group name|this group's icon|the group description)\b/i,
    /\s(?:added|removed)\s/i,
    /\screated group\b/i,
    /'s security code (?:changed|with)\b/i,
    /^messages and calls are end-to-end encrypted/i
];

// ============================================================================
// MEDIA
// ============================================================================

export const FILE_EXTENSION_KINDS: Record<string, 'photo' | 'video' | 'audio' | 'gif' | 'sticker'> = {
    jpg: 'photo',
    jpeg: 'photo',
    png: 'photo',
    heic: 'photo',
    mp4: 'video',
    mov: 'video',
    '3gp': 'video',
    opus: 'audio',
    mp3: 'audio',
    m4a: 'audio',
    ogg: 'audio',
    gif: 'gif',
    webp: 'sticker'
};
