import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError } from 'commander';
import { describeSourceNames, resolvePlatform } from '../parsers';
import { isFilterActive, runPipeline, validateFilterConfig, type PipelineReporter } from '../pipeline';
import type { FilterConfig, PipelineStats, RunConfig } from '../types/options.types';
import { MAX_REPORTED_RECORD_ERRORS, VERSION } from '../utils/constants';
import { formatTimestamp, parseFilterDate } from '../utils/date.utils';
import { ChatpressError, ConfigError, describeError } from '../utils/errors';
import { resolveOutputFormat } from '../writers';
import {
    ProgressSpinner,
    colorize,
    formatBytes,
    formatDuration,
    formatNumber,
    logError,
    logHeader,
    logInfo,
    logSuccess,
    logWarning,
    printKeyValueTable,
    showError
} from './cli.utils';
import { getDefaultOutputPath } from './output';

// ============================================================================
// COMMAND DEFINITION
// ============================================================================

/** Option values as commander hands them over */
export type CliOptions = {
    output?: string;
    format: string;
    timestamps?: boolean;
    replies?: boolean;
    edited?: boolean;
    ids?: boolean;
    forwarded?: boolean;
    attachments?: boolean;
    merge: boolean;
    after?: string;
    before?: string;
    from?: string;
    includeSystem?: boolean;
    strict?: boolean;
    compact?: boolean;
    streaming: boolean;
    progress?: boolean;
    quiet?: boolean;
};

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('chatpress')
        .description('Convert Telegram, WhatsApp, Instagram and Discord chat exports into compact CSV, JSON or JSONL')
        .version(VERSION, '-V, --version')
        .argument('<source>', `export platform (${describeSourceNames()})`)
        .argument('<input>', 'path to the exported chat file')
        .option('-o, --output <path>', 'output file (default: optimized_chat.<format>)')
        .option('-f, --format <format>', 'output format: csv, json or jsonl', 'csv')
        .option('-t, --timestamps', 'include message timestamps')
        .option('-r, --replies', 'include reply references')
        .option('-e, --edited', 'include edit timestamps')
        .option('--ids', 'include message ids')
        .option('--forwarded', 'include the original author of forwarded messages')
        .option('--attachments', 'include attachment descriptions')
        .option('--no-merge', 'keep consecutive messages from one sender separate')
        .option('--after <date>', 'only messages on or after YYYY-MM-DD')
        .option('--before <date>', 'only messages on or before YYYY-MM-DD')
        .option('--from <sender>', 'only messages from this sender (exact match)')
        .option('--include-system', 'keep system lines and service records')
        .option('--strict', 'stop at the first malformed record')
        .option('--compact', 'write JSON on a single line')
        .option('--no-streaming', 'load the whole export into memory before converting')
        .option('-p, --progress', 'show a progress indicator')
        .option('-q, --quiet', 'print errors only')
        .allowExcessArguments(false)
        .showHelpAfterError();

    return program;
}

// ============================================================================
// RUN CONFIGURATION
// ============================================================================

/**
 * Turns command-line values into a validated RunConfig.
 */
export function buildRunConfig(source: string, input: string, options: CliOptions, cwd: string = process.cwd()): RunConfig {
    const platform = resolvePlatform(source).platform;
    const format = resolveOutputFormat(options.format);

    if (options.from !== undefined && !options.from.trim()) {
        throw new ConfigError('--from needs a non-empty sender name');
    }
    const filter: FilterConfig = validateFilterConfig({
        dateFrom: options.after === undefined ? undefined : parseFilterDate(options.after, 'start'),
        dateTo: options.before === undefined ? undefined : parseFilterDate(options.before, 'end'),
        sender: options.from
    });

    return {
        platform,
        inputPath: path.resolve(cwd, input),
        outputPath: options.output ? path.resolve(cwd, options.output) : getDefaultOutputPath(format, cwd),
        format,
        fields: {
            timestamps: options.timestamps ?? false,
            replies: options.replies ?? false,
            edited: options.edited ?? false,
            ids: options.ids ?? false,
            forwarded: options.forwarded ?? false,
            attachments: options.attachments ?? false
        },
        filter,
        merge: options.merge,
        streaming: options.streaming,
        includeSystem: options.includeSystem ?? false,
        strict: options.strict ?? false,
        pretty: !options.compact,
        progress: (options.progress ?? false) && !options.quiet,
        quiet: options.quiet ?? false
    };
}

// ============================================================================
// CONSOLE REPORTING
// ============================================================================

function createReporter(config: RunConfig, spinner: ProgressSpinner | null): PipelineReporter {
    return {
        recordError(error, skipped) {
            if (config.quiet) return;
            if (skipped <= MAX_REPORTED_RECORD_ERRORS) {
                logWarning(`Skipped ${error.message}`);
            } else if (skipped === MAX_REPORTED_RECORD_ERRORS + 1) {
                logWarning('Further skipped records are counted but not listed');
            }
        },
        progress(parsed) {
            spinner?.setMessage(`Parsed ${formatNumber(parsed)} messages...`);
        }
    };
}

function describeFilter(filter: FilterConfig): string {
    const parts: string[] = [];
    if (filter.dateFrom) parts.push(`from ${formatTimestamp(filter.dateFrom).slice(0, 10)}`);
    if (filter.dateTo) parts.push(`until ${formatTimestamp(filter.dateTo).slice(0, 10)}`);
    if (filter.sender !== undefined) parts.push(`sender "${filter.sender}"`);
    return parts.join(', ');
}

function printSummary(config: RunConfig, stats: PipelineStats): void {
    printKeyValueTable([
        ['Parsed', formatNumber(stats.parsed)],
        ['Skipped', formatNumber(stats.skipped)],
        ['Kept', formatNumber(stats.filtered)],
        ['Written', formatNumber(stats.written)]
    ]);
    if (stats.skipped > 0) {
        logWarning(`${formatNumber(stats.skipped)} malformed record(s) were skipped`);
    }
    const size = formatBytes(fs.statSync(config.outputPath).size);
    logSuccess(`Wrote ${formatNumber(stats.written)} record(s) to ${config.outputPath} (${size})`);
    logInfo(`Finished in ${formatDuration(stats.durationMs)}`);
}

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

/**
 * Main CLI execution function. Resolves to the process exit code.
 */
export async function runCLI(argv: string[]): Promise<number> {
    const program = createProgram().exitOverride();

    try {
        program.parse(argv);
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode === 0 ? 0 : 1;
        }
        throw error;
    }

    const [source = '', input = ''] = program.args;
    let config: RunConfig;
    try {
        config = buildRunConfig(source, input, program.opts<CliOptions>());
    } catch (error) {
        showError(describeError(error));
        return 1;
    }

    const spinner = config.progress ? new ProgressSpinner('Reading export...') : null;
    try {
        if (!config.quiet) {
            logHeader(`CONVERTING ${resolvePlatform(config.platform).displayName.toUpperCase()} EXPORT`);
            logInfo(`Input: ${colorize(config.inputPath, 'bright')}`);
            if (isFilterActive(config.filter)) {
                logInfo(`Filter: ${describeFilter(config.filter)}`);
            }
        }
        spinner?.start();
        const stats = await runPipeline(config, { reporter: createReporter(config, spinner) });
        spinner?.stop();

        if (!config.quiet) {
            printSummary(config, stats);
        }
        return 0;
    } catch (error) {
        spinner?.stop();
        if (error instanceof ChatpressError) {
            logError(error.message);
        } else {
            logError(`Unexpected error: ${describeError(error)}`);
        }
        return 1;
    }
}
