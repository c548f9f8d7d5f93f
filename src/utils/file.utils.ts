/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import { READ_CHUNK_BYTES } from './constants';
import { FileFatalError, describeError } from './errors';

// ============================================================================
// INPUT FILES
// ============================================================================

function inputFailure(filePath: string, error: unknown): FileFatalError {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
        return new FileFatalError(`Input file not found: ${filePath}`, { cause: error });
    }
    if (code === 'EISDIR') {
        return new FileFatalError(`Input path is a directory: ${filePath}`, { cause: error });
    }
    return new FileFatalError(`Cannot read ${filePath}: ${describeError(error)}`, { cause: error });
}

/**
 * Fails fast on a missing or unreadable input, before any parsing starts.
 */
export async function assertReadableFile(filePath: string): Promise<void> {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(filePath);
        await fs.promises.access(filePath, fs.constants.R_OK);
    } catch (error) {
        throw inputFailure(filePath, error);
    }
    if (!stats.isFile()) {
        throw new FileFatalError(`Input path is not a file: ${filePath}`);
    }
}

/**
 * Reads a file as UTF-8 text in fixed-size chunks. Multi-byte characters
 * split across chunk boundaries are reassembled by the stream's decoder.
 */
export async function* readInputChunks(filePath: string, chunkBytes = READ_CHUNK_BYTES): AsyncGenerator<string> {
    const stream = fs.createReadStream(filePath, { encoding: "utf8", highWaterMark: chunkBytes });
    try {
        for await (const chunk of stream) {
            yield String(chunk);
        }
    } catch (error) {
        throw inputFailure(filePath, error);
    } finally {
        stream.destroy();
    }
}

export async function readInputText(filePath: string): Promise<string> {
    try {
        return await fs.promises.readFile(filePath, "utf8");
    } catch (error) {
        throw inputFailure(filePath, error);
    }
}

// ============================================================================
// OUTPUT PATHS
// ============================================================================

/**
 * Refuses to write the output over the input export.
 */
export function isSameFile(first: string, second: string): boolean {
    return path.resolve(first) === path.resolve(second);
}
