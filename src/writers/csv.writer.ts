import { stringify } from 'csv-stringify/sync';
import type { FieldSelection } from '../types/options.types';
import type { OutputSink } from './sink';
import {
    type MessageSource,
    type OutputColumn,
    type OutputRecord,
    formatAttachmentList,
    selectColumns,
    toOutputRecord,
    writeThrough
} from './writer.utils';

// ============================================================================
// CSV WRITER
// ============================================================================

const CSV_OPTIONS = {
    delimiter: ',',
    record_delimiter: 'unix',
    // csv-stringify only quotes the record delimiter itself; a bare CR must be quoted too
    quoted_match: /\r/
} as const;

function cell(record: OutputRecord, column: OutputColumn): string {
    if (column === 'attachments') {
        return formatAttachmentList(record.attachments ?? []);
    }
    return record[column] ?? '';
}

export function formatCsvRow(values: readonly string[]): string {
    return stringify([values], CSV_OPTIONS);
}

/**
 * Writes a header row and one row per message. Returns the number of data rows.
 */
export async function writeCsv(messages: MessageSource, sink: OutputSink, fields: FieldSelection): Promise<number> {
    const columns = selectColumns(fields);

    return writeThrough(sink, async () => {
        await sink.write(formatCsvRow(columns));
        let written = 0;
        for await (const message of messages) {
            const record = toOutputRecord(message, fields);
            await sink.write(formatCsvRow(columns.map(column => cell(record, column))));
            written++;
        }
        return written;
    });
}
