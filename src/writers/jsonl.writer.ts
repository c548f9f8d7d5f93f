import type { FieldSelection } from '../types/options.types';
import type { OutputSink } from './sink';
import { type MessageSource, toOutputRecord, writeThrough } from './writer.utils';

/**
 * Writes one compact JSON object per line.
 */
export async function writeJsonl(messages: MessageSource, sink: OutputSink, fields: FieldSelection): Promise<number> {
    return writeThrough(sink, async () => {
        let written = 0;
        for await (const message of messages) {
            await sink.write(`${JSON.stringify(toOutputRecord(message, fields))}\n`);
            written++;
        }
        return written;
    });
}
