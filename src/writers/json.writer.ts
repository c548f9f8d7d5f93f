import type { FieldSelection, WriterOptions } from '../types/options.types';
import type { OutputSink } from './sink';
import { type MessageSource, toOutputRecord, writeThrough } from './writer.utils';

// ============================================================================
// JSON WRITER
// ============================================================================

const INDENT = '  ';

/**
 * Writes one JSON array, element by element. Pretty output is laid out as
 * `JSON.stringify(records, null, 2)` would lay it out.
 */
export async function writeJson(
    messages: MessageSource,
    sink: OutputSink,
    fields: FieldSelection,
    options: WriterOptions = {}
): Promise<number> {
    const pretty = options.pretty ?? true;

    return writeThrough(sink, async () => {
        let written = 0;
        for await (const message of messages) {
            const record = toOutputRecord(message, fields);
            if (pretty) {
                const body = JSON.stringify(record, null, 2).replace(/\n/g, `\n${INDENT}`);
                await sink.write(`${written === 0 ? '[\n' : ',\n'}${INDENT}${body}`);
            } else {
                await sink.write(`${written === 0 ? '[' : ','}${JSON.stringify(record)}`);
            }
            written++;
        }

        if (written === 0) {
            await sink.write('[]\n');
        } else {
            await sink.write(pretty ? '\n]\n' : ']\n');
        }
        return written;
    });
}
