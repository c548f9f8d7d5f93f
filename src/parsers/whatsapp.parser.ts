import type { ParseOutcome } from '../types';
import type { ParserOptions } from '../types/options.types';
import { DATE_SAMPLE_LINES, SYSTEM_SENDER, WHATSAPP_SYSTEM_PATTERNS } from '../utils/constants';
import { type DateLayout, detectDateLayout, matchTimestampPrefix } from '../utils/date.utils';
import { FileFatalError } from '../utils/errors';
import { readLines, splitLines } from '../utils/stream.utils';
import {
    extractWhatsAppAttachments,
    normaliseParticipantName,
    stripByteOrderMark,
    stripControlMarks
} from '../utils/text.utils';
import { recordError } from './parser.utils';

// ============================================================================
// MESSAGE ASSEMBLY
// ============================================================================

type PendingMessage = {
    sender: string;
    timestamp: Date;
    body: string;
    system: boolean;
};

/**
 * Turns export lines into messages once the date layout is known. A message
 * is complete when the next header line (or the end of input) arrives, so at
 * most one message is held at a time.
 */
export class WhatsAppMessageBuilder {
    private pending: PendingMessage | null = null;
    private seenHeader = false;
    private firstOrphanLine: number | null = null;

    constructor(
        private readonly layout: DateLayout,
        private readonly options: ParserOptions = {}
    ) {}

    accept(line: string, lineNumber: number): ParseOutcome[] {
        const match = matchTimestampPrefix(line, this.layout);

        if (!match) {
            if (this.pending) {
                this.pending.body += '\n' + line;
            } else if (!this.seenHeader && this.firstOrphanLine === null) {
                this.firstOrphanLine = lineNumber;
            }
            // Lines following a rejected header line are dropped with it
            return [];
        }

        const outcomes = this.flush();
        if (!this.seenHeader) {
            this.seenHeader = true;
            if (this.firstOrphanLine !== null) {
                outcomes.unshift(recordError('whatsapp', this.firstOrphanLine, 'text before the first message'));
            }
        }

        if (!match.timestamp) {
            outcomes.push(recordError('whatsapp', lineNumber, 'date or time out of range'));
            return outcomes;
        }

        const separator = match.rest.indexOf(': ');
        const senderCandidate = separator === -1 ? '' : match.rest.slice(0, separator);
        const isSystem = separator === -1 || WHATSAPP_SYSTEM_PATTERNS.some(pattern => pattern.test(senderCandidate));

        if (isSystem) {
            this.pending = { sender: SYSTEM_SENDER, timestamp: match.timestamp, body: match.rest, system: true };
            return outcomes;
        }

        const sender = normaliseParticipantName(senderCandidate);
        if (!sender) {
            outcomes.push(recordError('whatsapp', lineNumber, 'missing sender'));
            return outcomes;
        }

        this.pending = {
            sender,
            timestamp: match.timestamp,
            body: match.rest.slice(separator + 2),
            system: false
        };
        return outcomes;
    }

    finish(): ParseOutcome[] {
        const outcomes = this.flush();
        if (!this.seenHeader && this.firstOrphanLine !== null) {
            outcomes.push(recordError('whatsapp', this.firstOrphanLine, 'text before the first message'));
        }
        return outcomes;
    }

    private flush(): ParseOutcome[] {
        const pending = this.pending;
        this.pending = null;
        if (!pending) {
            return [];
        }

        const body = stripControlMarks(pending.body);
        if (pending.system) {
            if (!this.options.includeSystem) {
                return [];
            }
            return [{
                ok: true,
                message: {
                    sender: SYSTEM_SENDER,
                    timestamp: pending.timestamp,
                    text: body.trim(),
                    kind: 'system',
                    attachments: []
                }
            }];
        }

        const { text, attachments } = extractWhatsAppAttachments(body);
        return [{
            ok: true,
            message: {
                sender: pending.sender,
                timestamp: pending.timestamp,
                text: text.trimEnd(),
                kind: 'message',
                attachments
            }
        }];
    }
}

// ============================================================================
// WHATSAPP PARSER
// ============================================================================

function detectLayoutOrFail(sample: readonly string[]): DateLayout {
    if (sample.every(line => !line.trim())) {
        throw new FileFatalError('WhatsApp export is empty');
    }
    return detectDateLayout(sample);
}

/**
 * Parses a WhatsApp chat export held in memory.
 */
export function* parseWhatsApp(raw: string, options: ParserOptions = {}): Generator<ParseOutcome> {
    const lines = splitLines(stripByteOrderMark(raw));
    const layout = detectLayoutOrFail(lines.slice(0, DATE_SAMPLE_LINES));
    const builder = new WhatsAppMessageBuilder(layout, options);

    for (let index = 0; index < lines.length; index++) {
        yield* builder.accept(lines[index] ?? '', index + 1);
    }
    yield* builder.finish();
}

/**
 * Parses a WhatsApp chat export line by line. The first lines are buffered
 * until the date layout is known.
 */
export async function* streamWhatsApp(
    chunks: AsyncIterable<string>,
    options: ParserOptions = {}
): AsyncGenerator<ParseOutcome> {
    const lines = readLines(chunks)[Symbol.asyncIterator]();
    const sample: string[] = [];

    while (sample.length < DATE_SAMPLE_LINES) {
        const next = await lines.next();
        if (next.done) {
            break;
        }
        sample.push(sample.length === 0 ? stripByteOrderMark(next.value) : next.value);
    }

    try {
        const builder = new WhatsAppMessageBuilder(detectLayoutOrFail(sample), options);
        let lineNumber = 0;

        for (const line of sample) {
            yield* builder.accept(line, ++lineNumber);
        }
        for (;;) {
            const next = await lines.next();
            if (next.done) {
                break;
            }
            yield* builder.accept(next.value, ++lineNumber);
        }
        yield* builder.finish();
    } finally {
        await lines.return?.(undefined);
    }
}
