import { once } from "node:events";
import fs from "node:fs";
import { finished } from "node:stream/promises";
import { OutputIOError, describeError } from '../utils/errors';

// ============================================================================
// OUTPUT SINKS
// ============================================================================

/**
 * Destination for writer output. Every write resolves once the chunk is
 * accepted, so writers that await each call never outrun the destination.
 */
export type OutputSink = {
    write(chunk: string): Promise<void>;
    end(): Promise<void>;
    /** Releases the destination after a failed run; what was written stays */
    abort(): Promise<void>;
};

export type MemorySink = OutputSink & {
    /** Everything written so far */
    text(): string;
    readonly ended: boolean;
    readonly aborted: boolean;
};

/**
 * Writes to a file that is created on the first write (or on `end`, for
 * output with no content at all).
 */
export function createFileSink(filePath: string): OutputSink {
    let stream: fs.WriteStream | null = null;
    const state: { failure: Error | null } = { failure: null };

    function open(): fs.WriteStream {
        if (!stream) {
            stream = fs.createWriteStream(filePath, { encoding: "utf8" });
            stream.on("error", error => {
                state.failure = error;
            });
        }
        return stream;
    }

    function failure(error: unknown): OutputIOError {
        return new OutputIOError(`Cannot write ${filePath}: ${describeError(error)}`, { cause: error });
    }

    return {
        async write(chunk) {
            const out = open();
            if (state.failure) {
                throw failure(state.failure);
            }
            try {
                if (!out.write(chunk)) {
                    await once(out, "drain");
                }
            } catch (error) {
                throw failure(error);
            }
        },

        async end() {
            const out = open();
            try {
                out.end();
                await finished(out);
            } catch (error) {
                throw failure(error);
            }
            if (state.failure) {
                throw failure(state.failure);
            }
        },

        async abort() {
            const out = stream;
            if (!out || out.closed) {
                return;
            }
            // A failed stream closes itself; a healthy one flushes what it holds first
            const closed = new Promise<void>(resolve => out.once("close", () => resolve()));
            if (!out.destroyed && !out.writableEnded) {
                out.end();
            }
            await closed;
        }
    };
}

export function createMemorySink(): MemorySink {
    const chunks: string[] = [];
    let ended = false;
    let aborted = false;

    return {
        async write(chunk) {
            if (ended) {
                throw new OutputIOError('write after end');
            }
            chunks.push(chunk);
        },
        async end() {
            ended = true;
        },
        async abort() {
            ended = true;
            aborted = true;
        },
        text() {
            return chunks.join('');
        },
        get ended() {
            return ended;
        },
        get aborted() {
            return aborted;
        }
    };
}
