import type { ZodError } from 'zod';
import type { ParseOutcome, Platform } from '../types';
import { RecordParseError } from '../utils/errors';

// ============================================================================
// OUTCOME HELPERS
// ============================================================================

export function recordError(platform: Platform, position: number, reason: string): ParseOutcome {
    return { ok: false, error: new RecordParseError(platform, position, reason) };
}

/**
 * Condenses a zod failure into one line: the first issue with its field path.
 */
export function describeSchemaError(error: ZodError): string {
    const issue = error.issues[0];
    if (!issue) {
        return 'invalid record';
    }
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
}
