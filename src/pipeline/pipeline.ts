import type { Message, MessageStreamItem, ParseOutcome } from '../types';
import type { ParserOptions, PipelineStats, RunConfig } from '../types/options.types';
import { PLATFORM_PARSERS } from '../parsers';
import { PROGRESS_INTERVAL } from '../utils/constants';
import { ConfigError, type RecordParseError } from '../utils/errors';
import { assertReadableFile, isSameFile, readInputChunks, readInputText } from '../utils/file.utils';
import { primeStream } from '../utils/stream.utils';
import { OUTPUT_WRITERS } from '../writers';
import { type OutputSink, createFileSink } from '../writers/sink';
import { filterMessageStream, filterMessages, validateFilterConfig } from './message-filter';
import { dropBreakStream, dropBreaks, mergeConsecutive, mergeMessageStream } from './message-merger';

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Receives what happens during a run; the CLI prints it, tests record it.
 */
export type PipelineReporter = {
    /** Called for every skipped record with the running skip count */
    recordError?(error: RecordParseError, skipped: number): void;
    /** Called every PROGRESS_INTERVAL parsed messages */
    progress?(parsed: number): void;
};

export type PipelineOptions = {
    reporter?: PipelineReporter;
    /** Defaults to a file sink at `config.outputPath` */
    openSink?: (outputPath: string) => OutputSink;
};

/**
 * Splits parse outcomes into messages and counted record errors.
 */
class OutcomeTally {
    parsed = 0;
    skipped = 0;
    kept = 0;

    constructor(
        private readonly strict: boolean,
        private readonly reporter: PipelineReporter
    ) {}

    accept(outcome: ParseOutcome): Message | null {
        if (!outcome.ok) {
            if (this.strict) {
                throw outcome.error;
            }
            this.skipped++;
            this.reporter.recordError?.(outcome.error, this.skipped);
            return null;
        }
        this.parsed++;
        if (this.parsed % PROGRESS_INTERVAL === 0) {
            this.reporter.progress?.(this.parsed);
        }
        return outcome.message;
    }

    count(item: MessageStreamItem): MessageStreamItem {
        if (typeof item !== 'symbol') {
            this.kept++;
        }
        return item;
    }
}

async function* acceptStream(outcomes: AsyncIterable<ParseOutcome>, tally: OutcomeTally): AsyncGenerator<Message> {
    for await (const outcome of outcomes) {
        const message = tally.accept(outcome);
        if (message) yield message;
    }
}

async function* countStream(items: AsyncIterable<MessageStreamItem>, tally: OutcomeTally): AsyncGenerator<MessageStreamItem> {
    for await (const item of items) {
        yield tally.count(item);
    }
}

function checkRunConfig(config: RunConfig): void {
    validateFilterConfig(config.filter);
    if (isSameFile(config.inputPath, config.outputPath)) {
        throw new ConfigError(`Output path ${config.outputPath} would overwrite the input`);
    }
}

async function streamMessages(config: RunConfig, parserOptions: ParserOptions, tally: OutcomeTally): Promise<AsyncIterable<Message>> {
    const parser = PLATFORM_PARSERS[config.platform];
    const outcomes = parser.stream(readInputChunks(config.inputPath), parserOptions);
    const filtered = countStream(filterMessageStream(acceptStream(outcomes, tally), config.filter, { markGaps: true }), tally);
    const messages = config.merge ? mergeMessageStream(filtered) : dropBreakStream(filtered);
    return primeStream(messages);
}

async function collectMessages(config: RunConfig, parserOptions: ParserOptions, tally: OutcomeTally): Promise<Message[]> {
    const parser = PLATFORM_PARSERS[config.platform];
    const raw = await readInputText(config.inputPath);

    const parsed: Message[] = [];
    for (const outcome of parser.parse(raw, parserOptions)) {
        const message = tally.accept(outcome);
        if (message) parsed.push(message);
    }
    const filtered = Array.from(filterMessages(parsed, config.filter, { markGaps: true }), item => tally.count(item));
    return config.merge ? Array.from(mergeConsecutive(filtered)) : Array.from(dropBreaks(filtered));
}

/**
 * Runs Parser → Filter → Merge → Writer for one export. The output is opened
 * only once the first message (or the end of input) has been reached without
 * a fatal error, so an export that fails up front leaves no output file.
 */
export async function runPipeline(config: RunConfig, options: PipelineOptions = {}): Promise<PipelineStats> {
    const startedAt = performance.now();
    const reporter = options.reporter ?? {};
    const openSink = options.openSink ?? createFileSink;

    checkRunConfig(config);
    await assertReadableFile(config.inputPath);

    const tally = new OutcomeTally(config.strict, reporter);
    const parserOptions: ParserOptions = { includeSystem: config.includeSystem };
    const messages = config.streaming
        ? await streamMessages(config, parserOptions, tally)
        : await collectMessages(config, parserOptions, tally);

    const writer = OUTPUT_WRITERS[config.format];
    const written = await writer.write(messages, openSink(config.outputPath), config.fields, { pretty: config.pretty });

    return {
        parsed: tally.parsed,
        skipped: tally.skipped,
        filtered: tally.kept,
        written,
        durationMs: performance.now() - startedAt
    };
}
