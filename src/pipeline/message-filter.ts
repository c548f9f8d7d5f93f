import { SEQUENCE_BREAK, type Message, type MessageStreamItem } from '../types';
import type { FilterConfig } from '../types/options.types';
import { ConfigError } from '../utils/errors';

// ============================================================================
// MESSAGE FILTERING
// ============================================================================

export type FilterOptions = {
    /** Replace each run of dropped messages with one SEQUENCE_BREAK */
    markGaps?: boolean;
};

export function isFilterActive(config: FilterConfig): boolean {
    return config.dateFrom !== undefined || config.dateTo !== undefined || config.sender !== undefined;
}

/**
 * Rejects bounds that can never match anything.
 */
export function validateFilterConfig(config: FilterConfig): FilterConfig {
    if (config.dateFrom && config.dateTo && config.dateFrom > config.dateTo) {
        throw new ConfigError('The --after date must not be later than the --before date');
    }
    return config;
}

/**
 * Both date bounds are inclusive; the sender must match exactly, case included.
 */
export function matchesFilter(message: Message, config: FilterConfig): boolean {
    if (config.dateFrom && message.timestamp < config.dateFrom) {
        return false;
    }
    if (config.dateTo && message.timestamp > config.dateTo) {
        return false;
    }
    return config.sender === undefined || message.sender === config.sender;
}

/**
 * Tracks whether the previous message was dropped, so a run of dropped
 * messages turns into a single marker.
 */
class GapTracker {
    private inGap = false;

    constructor(private readonly markGaps: boolean) {}

    next(message: Message, keep: boolean): MessageStreamItem | null {
        if (keep) {
            this.inGap = false;
            return message;
        }
        if (!this.markGaps || this.inGap) {
            return null;
        }
        this.inGap = true;
        return SEQUENCE_BREAK;
    }
}

export function* filterMessages(
    messages: Iterable<Message>,
    config: FilterConfig,
    options: FilterOptions = {}
): Generator<MessageStreamItem> {
    const gaps = new GapTracker(options.markGaps ?? false);
    for (const message of messages) {
        const item = gaps.next(message, matchesFilter(message, config));
        if (item) yield item;
    }
}

export async function* filterMessageStream(
    messages: AsyncIterable<Message>,
    config: FilterConfig,
    options: FilterOptions = {}
): AsyncGenerator<MessageStreamItem> {
    const gaps = new GapTracker(options.markGaps ?? false);
    for await (const message of messages) {
        const item = gaps.next(message, matchesFilter(message, config));
        if (item) yield item;
    }
}
