/**
 * Error Taxonomy
 */

import type { Platform } from '../types/message.types';

export type ErrorCode = 'FILE_FATAL' | 'DATE_LAYOUT_UNKNOWN' | 'RECORD_PARSE' | 'OUTPUT_IO' | 'CONFIG';

export class ChatpressError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * The input as a whole cannot be parsed. Aborts the run before output is written.
 */
export class FileFatalError extends ChatpressError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('FILE_FATAL', message, options);
    }
}

/**
 * No sampled WhatsApp line matched any supported date layout.
 */
export class DateDetectionError extends FileFatalError {
    override readonly code = 'DATE_LAYOUT_UNKNOWN';
}

/**
 * One malformed record inside an otherwise valid file.
 */
export class RecordParseError extends ChatpressError {
    readonly platform: Platform;
    /** 1-based record index, or line number for line-oriented exports */
    readonly record: number;
    readonly reason: string;

    constructor(platform: Platform, record: number, reason: string) {
        super('RECORD_PARSE', `${platform} record ${record}: ${reason}`);
        this.platform = platform;
        this.record = record;
        this.reason = reason;
    }
}

export class OutputIOError extends ChatpressError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('OUTPUT_IO', message, options);
    }
}

export class ConfigError extends ChatpressError {
    constructor(message: string) {
        super('CONFIG', message);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
