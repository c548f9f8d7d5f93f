/**
 * Streaming Utilities
 *
 * Parsers pull text chunks one at a time and hand records downstream as soon
 * as they are complete, so only the current chunk and record stay resident.
 */

import * as readline from 'node:readline';
import { Readable } from 'node:stream';
import JSONStream from 'minipass-json-stream';
import { ChatpressError, FileFatalError, describeError } from './errors';
import { stripByteOrderMark } from './text.utils';

// ============================================================================
// CHUNKS & LINES
// ============================================================================

export type PeekedInput = {
    /** Start of the input with any byte order mark removed */
    head: string;
    /** The whole input again, starting with `head` */
    chunks: AsyncIterable<string>;
};

/**
 * Reads chunks until at least `minLength` non-whitespace characters (or the
 * whole input) are buffered, so callers can sniff the format without losing data.
 */
export async function peekInput(chunks: AsyncIterable<string>, minLength = 64): Promise<PeekedInput> {
    const iterator = chunks[Symbol.asyncIterator]();
    let head = '';
    let exhausted = false;

    while (head.trim().length < minLength) {
        const next = await iterator.next();
        if (next.done) {
            exhausted = true;
            break;
        }
        head = stripByteOrderMark(head + next.value);
    }

    async function* replay(): AsyncGenerator<string> {
        if (head) {
            yield head;
        }
        if (exhausted) {
            return;
        }
        try {
            for (;;) {
                const next = await iterator.next();
                if (next.done) {
                    return;
                }
                yield next.value;
            }
        } finally {
            await iterator.return?.();
        }
    }

    return { head, chunks: replay() };
}

/**
 * Splits streamed text into lines, accepting \n, \r\n and \r.
 */
export async function* readLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
    const lines = readline.createInterface({
        input: Readable.from(chunks),
        crlfDelay: Infinity
    });
    try {
        for await (const line of lines) {
            yield line;
        }
    } finally {
        lines.close();
    }
}

/**
 * Splits in-memory text into lines exactly as {@link readLines} does, so both
 * reading modes see the same lines.
 */
export function splitLines(text: string): string[] {
    if (!text) {
        return [];
    }
    const lines = text.split(/\r\n|\n|\r/);
    if (/[\r\n]$/.test(text)) {
        lines.pop();
    }
    return lines;
}

export async function* chunksOf(text: string, size: number): AsyncGenerator<string> {
    for (let offset = 0; offset < text.length; offset += size) {
        yield text.slice(offset, offset + size);
    }
}

// ============================================================================
// RECORD TRANSFORMS
// ============================================================================

/**
 * The part of a text-in, records-out stream (minipass-json-stream, csv-parse) the
 * pull loop below relies on.
 */
export type RecordTransform = {
    write(chunk: string): boolean;
    end(): unknown;
    read(): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
    [Symbol.asyncIterator](): AsyncIterator<unknown>;
};

/**
 * Feeds chunks into a transform and yields each record as soon as the
 * transform buffers it. Records produced while the transform flushes are
 * drained after the input ends.
 */
export async function* pullRecords(
    chunks: AsyncIterable<string>,
    transform: RecordTransform
): AsyncGenerator<unknown> {
    const state: { failure: Error | null } = { failure: null };
    transform.on('error', error => {
        state.failure = error;
    });

    for await (const chunk of chunks) {
        transform.write(chunk);
        if (state.failure) {
            throw state.failure;
        }
        for (let record = transform.read(); record !== null; record = transform.read()) {
            yield record;
        }
    }

    transform.end();
    if (state.failure) {
        throw state.failure;
    }
    const remaining = transform[Symbol.asyncIterator]();
    for (;;) {
        const next = await remaining.next();
        if (next.done) {
            return;
        }
        yield next.value;
    }
}

// ============================================================================
// JSON DOCUMENTS
// ============================================================================

/**
 * Streams the items of the array at `arrayKey` in a root JSON object. The
 * document must open with `{` and close with `}`; anything else (including a
 * truncated file) is fatal, as is a syntax error anywhere in it.
 */
export async function* streamJsonArrayItems(
    chunks: AsyncIterable<string>,
    arrayKey: string,
    label: string
): AsyncGenerator<unknown> {
    const bounds = { first: '', last: '' };

    async function* guarded(): AsyncGenerator<string> {
        let started = false;
        for await (const raw of chunks) {
            const chunk = started ? raw : stripByteOrderMark(raw);
            started = true;
            const trimmed = chunk.trim();
            if (trimmed) {
                if (!bounds.first) {
                    bounds.first = trimmed.charAt(0);
                    if (bounds.first !== '{') {
                        throw new FileFatalError(`${label} export is not a JSON object`);
                    }
                }
                bounds.last = trimmed.charAt(trimmed.length - 1);
            }
            yield chunk;
        }
        if (!bounds.first) {
            throw new FileFatalError(`${label} export is empty`);
        }
        if (bounds.last !== '}') {
            throw new FileFatalError(`${label} export is truncated (the JSON document does not close)`);
        }
    }

    try {
        yield* pullRecords(guarded(), JSONStream.parse([arrayKey, true]));
    } catch (error) {
        if (error instanceof ChatpressError) {
            throw error;
        }
        throw new FileFatalError(`${label} export is not valid JSON: ${describeError(error)}`, { cause: error });
    }
}

/**
 * Parses a whole JSON document and returns the array at `arrayKey`, with the
 * same file-level failures as {@link streamJsonArrayItems}.
 */
export function readJsonArrayItems(text: string, arrayKey: string, label: string): unknown[] {
    const trimmed = stripByteOrderMark(text).trim();
    if (!trimmed) {
        throw new FileFatalError(`${label} export is empty`);
    }
    if (!trimmed.startsWith('{')) {
        throw new FileFatalError(`${label} export is not a JSON object`);
    }
    if (!trimmed.endsWith('}')) {
        throw new FileFatalError(`${label} export is truncated (the JSON document does not close)`);
    }

    let document: unknown;
    try {
        document = JSON.parse(trimmed);
    } catch (error) {
        throw new FileFatalError(`${label} export is not valid JSON: ${describeError(error)}`, { cause: error });
    }

    const items = isRecord(document) ? document[arrayKey] : undefined;
    return Array.isArray(items) ? items : [];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// PRIMING
// ============================================================================

/**
 * Pulls the first item so that failures raised while starting up surface
 * here, then hands back the full sequence.
 */
export async function primeStream<T>(source: AsyncIterable<T>): Promise<AsyncIterable<T>> {
    const iterator = source[Symbol.asyncIterator]();
    const first = await iterator.next();

    async function* replay(): AsyncGenerator<T> {
        if (first.done) {
            return;
        }
        try {
            yield first.value;
            for (;;) {
                const next = await iterator.next();
                if (next.done) {
                    return;
                }
                yield next.value;
            }
        } finally {
            // Closes the pipeline stages upstream when the consumer stops early
            await iterator.return?.();
        }
    }

    return replay();
}
