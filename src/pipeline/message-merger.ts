import { SEQUENCE_BREAK, type Message, type MessageStreamItem } from '../types';
import type { MergeOptions } from '../types/options.types';
import { MERGE_SEPARATOR } from '../utils/constants';

// ============================================================================
// MESSAGE MERGING
// ============================================================================

/**
 * Combines a run of messages from one sender into a single record.
 * A run of one is returned as is.
 */
export function combineRun(run: readonly Message[]): Message {
    const [first, ...rest] = run;
    if (!first) {
        throw new RangeError('combineRun needs at least one message');
    }
    if (rest.length === 0) {
        return first;
    }

    let timestamp = first.timestamp;
    let editedAt = first.editedAt;
    for (const message of rest) {
        if (message.timestamp < timestamp) {
            timestamp = message.timestamp;
        }
        if (message.editedAt && (!editedAt || message.editedAt > editedAt)) {
            editedAt = message.editedAt;
        }
    }

    const merged: Message = {
        sender: first.sender,
        timestamp,
        text: run.map(message => message.text).join(MERGE_SEPARATOR),
        kind: first.kind,
        attachments: run.flatMap(message => message.attachments)
    };
    if (run.every(message => message.id !== undefined)) merged.id = first.id;
    if (first.replyTo !== undefined) merged.replyTo = first.replyTo;
    if (editedAt) merged.editedAt = editedAt;
    if (first.forwardedFrom !== undefined) merged.forwardedFrom = first.forwardedFrom;

    return merged;
}

/**
 * Collects runs one item at a time. `push` returns the record of a run that
 * the item has just ended, if any.
 */
export class RunAccumulator {
    private run: Message[] = [];

    constructor(private readonly consecutiveOnly = true) {}

    push(item: MessageStreamItem): Message | null {
        if (item === SEQUENCE_BREAK) {
            return this.consecutiveOnly ? this.flush() : null;
        }
        const current = this.run[0];
        if (current && current.sender !== item.sender) {
            const completed = this.flush();
            this.run.push(item);
            return completed;
        }
        this.run.push(item);
        return null;
    }

    flush(): Message | null {
        if (this.run.length === 0) {
            return null;
        }
        const completed = combineRun(this.run);
        this.run = [];
        return completed;
    }
}

/**
 * Merges runs of consecutive messages from the same sender. A sender change
 * ends a run, and so does a `SEQUENCE_BREAK` unless `consecutiveOnly` is false.
 */
export function* mergeConsecutive(
    items: Iterable<MessageStreamItem>,
    options: MergeOptions = {}
): Generator<Message> {
    const runs = new RunAccumulator(options.consecutiveOnly ?? true);
    for (const item of items) {
        const completed = runs.push(item);
        if (completed) yield completed;
    }
    const last = runs.flush();
    if (last) yield last;
}

export async function* mergeMessageStream(
    items: AsyncIterable<MessageStreamItem>,
    options: MergeOptions = {}
): AsyncGenerator<Message> {
    const runs = new RunAccumulator(options.consecutiveOnly ?? true);
    for await (const item of items) {
        const completed = runs.push(item);
        if (completed) yield completed;
    }
    const last = runs.flush();
    if (last) yield last;
}

/**
 * Pass-through used when merging is disabled.
 */
export function* dropBreaks(items: Iterable<MessageStreamItem>): Generator<Message> {
    for (const item of items) {
        if (item !== SEQUENCE_BREAK) yield item;
    }
}

export async function* dropBreakStream(items: AsyncIterable<MessageStreamItem>): AsyncGenerator<Message> {
    for await (const item of items) {
        if (item !== SEQUENCE_BREAK) yield item;
    }
}
