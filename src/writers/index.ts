import type { FieldSelection, OutputFormat, WriterOptions } from '../types/options.types';
import { ConfigError } from '../utils/errors';
import { writeCsv } from './csv.writer';
import { writeJson } from './json.writer';
import { writeJsonl } from './jsonl.writer';
import type { OutputSink } from './sink';
import type { MessageSource } from './writer.utils';

export type OutputWriter = {
    format: OutputFormat;
    extension: string;
    write(messages: MessageSource, sink: OutputSink, fields: FieldSelection, options?: WriterOptions): Promise<number>;
};

export const OUTPUT_WRITERS: Readonly<Record<OutputFormat, OutputWriter>> = {
    csv: { format: 'csv', extension: '.csv', write: writeCsv },
    json: { format: 'json', extension: '.json', write: writeJson },
    jsonl: { format: 'jsonl', extension: '.jsonl', write: writeJsonl }
};

export function isOutputFormat(value: string): value is OutputFormat {
    return Object.prototype.hasOwnProperty.call(OUTPUT_WRITERS, value);
}

export function resolveOutputFormat(value: string): OutputFormat {
    const format = value.trim().toLowerCase();
    if (!isOutputFormat(format)) {
        throw new ConfigError(`Unknown output format '${value}'. Expected one of: ${Object.keys(OUTPUT_WRITERS).join(', ')}`);
    }
    return format;
}

export { writeCsv, formatCsvRow } from './csv.writer';
export { writeJson } from './json.writer';
export { writeJsonl } from './jsonl.writer';
export { createFileSink, createMemorySink, type MemorySink, type OutputSink } from './sink';
export {
    DEFAULT_FIELDS,
    formatAttachmentList,
    selectColumns,
    toOutputRecord,
    writeThrough,
    type MessageSource,
    type OutputColumn,
    type OutputRecord
} from './writer.utils';
