/**
 * Encoding Repair Utilities
 *
 * Instagram (and other Meta) exports write every string as the UTF-8 bytes of
 * the original text, each byte escaped as its own code point. Read back, an
 * emoji such as U+1F600 shows up as "ð\u009f\u0098\u0080". Text that went
 * through a Windows-1252 round trip on top of that ("Ã°ÂŸÂ˜Â€") is one more
 * layer of the same corruption.
 */

import * as iconv from 'iconv-lite';

const NON_ASCII_REGEX = /[^\x00-\x7F]/;
const REPLACEMENT_CHAR = '\uFFFD';

/**
 * Characters Windows-1252 places at 0x80-0x9F (€, ‚, ƒ, „, …, Ÿ and friends),
 * mapped back to their byte.
 */
const WINDOWS_1252_HIGH_BYTES: ReadonlyMap<string, number> = buildWindows1252Table();

function buildWindows1252Table(): Map<string, number> {
    const table = new Map<string, number>();
    for (let byte = 0x80; byte <= 0x9f; byte++) {
        const char = iconv.decode(Buffer.from([byte]), 'win1252');
        const codePoint = char.codePointAt(0) ?? 0;
        if (codePoint > 0xff && char !== REPLACEMENT_CHAR) {
            table.set(char, byte);
        }
    }
    return table;
}

/**
 * Maps every character to the single byte it was decoded from, or returns
 * null when some character cannot have come from a one-byte decode.
 */
function toSingleBytes(text: string): Buffer | null {
    const bytes: number[] = [];
    for (const char of text) {
        const codePoint = char.codePointAt(0) ?? 0;
        if (codePoint <= 0xff) {
            bytes.push(codePoint);
            continue;
        }
        const byte = WINDOWS_1252_HIGH_BYTES.get(char);
        if (byte === undefined) {
            return null;
        }
        bytes.push(byte);
    }
    return Buffer.from(bytes);
}

/**
 * Undoes one layer of corruption. Returns null when the text does not carry
 * the signature or the bytes are not valid UTF-8.
 */
function repairLayer(text: string): string | null {
    if (!NON_ASCII_REGEX.test(text)) {
        return null;
    }

    const bytes = toSingleBytes(text);
    if (!bytes) {
        return null;
    }

    const decoded = iconv.decode(bytes, 'utf8');
    if (decoded.includes(REPLACEMENT_CHAR)) {
        return null;
    }
    return decoded;
}

/**
 * Reverses double-encoded UTF-8. Text that does not match the corruption
 * signature is returned as is, so the function is idempotent.
 *
 * Every successful layer shortens the string (multi-byte sequences collapse
 * into single characters), so the loop ends at a fixed point.
 */
export function repairMojibake(text: string): string {
    let current = text;
    for (;;) {
        const repaired = repairLayer(current);
        if (repaired === null || repaired.length >= current.length) {
            return current;
        }
        current = repaired;
    }
}

/**
 * Applies {@link repairMojibake} to optional values read from export records.
 */
export function repairOptional(text: string | undefined): string | undefined {
    return text === undefined ? undefined : repairMojibake(text);
}
