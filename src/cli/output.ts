import path from "node:path";
import type { OutputFormat } from '../types/options.types';
import { DEFAULT_OUTPUT_BASENAME } from '../utils/constants';
import { OUTPUT_WRITERS } from '../writers';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

/**
 * Default output file in the working directory, named after the format:
 * optimized_chat.csv, optimized_chat.json or optimized_chat.jsonl
 */
export function getDefaultOutputPath(format: OutputFormat, cwd: string = process.cwd()): string {
    return path.join(path.resolve(cwd), `${DEFAULT_OUTPUT_BASENAME}${OUTPUT_WRITERS[format].extension}`);
}
