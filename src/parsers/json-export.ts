import type { ParseOutcome, Platform } from '../types';
import type { ParserOptions } from '../types/options.types';
import { FileFatalError } from '../utils/errors';
import { readJsonArrayItems, streamJsonArrayItems } from '../utils/stream.utils';

// ============================================================================
// JSON EXPORT PLUMBING
// ============================================================================

/**
 * Per-platform hooks for exports shaped as `{ ..., "messages": [record, ...] }`.
 */
export type JsonRecordDialect = {
    platform: Platform;
    label: string;
    /** Cheap structural check on the first record to reject the wrong kind of export */
    looksLikeRecord(raw: unknown): boolean;
    /** Returns null for records that are valid but not wanted (e.g. dropped system records) */
    normalise(raw: unknown, position: number, options: ParserOptions): ParseOutcome | null;
};

function checkDialect(dialect: JsonRecordDialect, first: unknown): void {
    if (!dialect.looksLikeRecord(first)) {
        throw new FileFatalError(`Input does not match the ${dialect.label} export format (unexpected message record shape)`);
    }
}

function noMessages(dialect: JsonRecordDialect): FileFatalError {
    return new FileFatalError(`${dialect.label} export contains no "messages" array or it is empty`);
}

/**
 * Parses a fully loaded export.
 */
export function* parseJsonExport(
    text: string,
    dialect: JsonRecordDialect,
    options: ParserOptions
): Generator<ParseOutcome> {
    const records = readJsonArrayItems(text, 'messages', dialect.label);
    if (records.length === 0) {
        throw noMessages(dialect);
    }
    checkDialect(dialect, records[0]);

    for (let index = 0; index < records.length; index++) {
        const outcome = dialect.normalise(records[index], index + 1, options);
        if (outcome) {
            yield outcome;
        }
    }
}

/**
 * Parses an export one record at a time.
 */
export async function* streamJsonExport(
    chunks: AsyncIterable<string>,
    dialect: JsonRecordDialect,
    options: ParserOptions
): AsyncGenerator<ParseOutcome> {
    let position = 0;
    for await (const record of streamJsonArrayItems(chunks, 'messages', dialect.label)) {
        position++;
        if (position === 1) {
            checkDialect(dialect, record);
        }
        const outcome = dialect.normalise(record, position, options);
        if (outcome) {
            yield outcome;
        }
    }
    if (position === 0) {
        throw noMessages(dialect);
    }
}
