/**
 * chatpress - Main Entry Point
 *
 * Converts chat exports from Telegram, WhatsApp, Instagram and Discord into
 * one compact message format, written as CSV, JSON or JSONL.
 *
 * Usage:
 *  npx tsx src/index.ts wa "WhatsApp Chat with Alice.txt" -f jsonl
 */

import { pathToFileURL } from "node:url";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/** True when node (or tsx) was started on this file rather than importing it */
function isEntryScript(): boolean {
    const script = process.argv[1];
    return script !== undefined && pathToFileURL(script).href === import.meta.url;
}

if (isEntryScript()) {
    runCLI(process.argv)
        .then(exitCode => {
            process.exitCode = exitCode;
        })
        .catch((error: unknown) => {
            console.error("Unexpected error:", error);
            process.exitCode = 1;
        });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

// Re-export everything for library usage
export * from './types';
export * from './parsers';
export * from './pipeline';
export * from './writers';
export * from './utils';
export * from './cli';
