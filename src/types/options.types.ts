/**
 * Pipeline and Output Configuration Types
 */

import type { Platform } from './message.types';

export type OutputFormat = 'csv' | 'json' | 'jsonl';

/**
 * Optional fields a user opts into for output. Sender and content are always written.
 */
export type FieldSelection = {
    timestamps: boolean;
    replies: boolean;
    edited: boolean;
    ids: boolean;
    forwarded: boolean;
    attachments: boolean;
};

export type FilterConfig = {
    /** Inclusive lower bound */
    dateFrom?: Date;
    /** Inclusive upper bound */
    dateTo?: Date;
    /** Case-sensitive exact match */
    sender?: string;
};

export type ParserOptions = {
    /** Keep WhatsApp system lines and Telegram service records */
    includeSystem?: boolean;
};

export type MergeOptions = {
    /** When true (default), a filtered-out gap ends a run */
    consecutiveOnly?: boolean;
};

export type WriterOptions = {
    /** JSON only: one object per indented block instead of a single line */
    pretty?: boolean;
};

export type RunConfig = {
    platform: Platform;
    inputPath: string;
    outputPath: string;
    format: OutputFormat;
    fields: FieldSelection;
    filter: FilterConfig;
    merge: boolean;
    streaming: boolean;
    includeSystem: boolean;
    strict: boolean;
    pretty: boolean;
    progress: boolean;
    quiet: boolean;
};

export type PipelineStats = {
    /** Messages produced by the parser */
    parsed: number;
    /** Records skipped because they failed to parse */
    skipped: number;
    /** Messages left after filtering */
    filtered: number;
    /** Records written (after merging) */
    written: number;
    durationMs: number;
};
