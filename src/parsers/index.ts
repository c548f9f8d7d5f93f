import type { ParseOutcome, Platform } from '../types';
import type { ParserOptions } from '../types/options.types';
import { ConfigError } from '../utils/errors';
import { parseDiscord, streamDiscord } from './discord.parser';
import { parseInstagram, streamInstagram } from './instagram.parser';
import { parseTelegram, streamTelegram } from './telegram.parser';
import { parseWhatsApp, streamWhatsApp } from './whatsapp.parser';

// ============================================================================
// PARSER REGISTRY
// ============================================================================

export type PlatformParser = {
    platform: Platform;
    displayName: string;
    /** Short names accepted on the command line */
    aliases: readonly string[];
    /** Parses an export held in memory */
    parse(raw: string, options?: ParserOptions): Iterable<ParseOutcome>;
    /** Parses an export chunk by chunk, yielding each record once it is complete */
    stream(chunks: AsyncIterable<string>, options?: ParserOptions): AsyncIterable<ParseOutcome>;
};

export const PLATFORM_PARSERS: Readonly<Record<Platform, PlatformParser>> = {
    telegram: {
        platform: 'telegram',
        displayName: 'Telegram',
        aliases: ['tg'],
        parse: parseTelegram,
        stream: streamTelegram
    },
    whatsapp: {
        platform: 'whatsapp',
        displayName: 'WhatsApp',
        aliases: ['wa'],
        parse: parseWhatsApp,
        stream: streamWhatsApp
    },
    instagram: {
        platform: 'instagram',
        displayName: 'Instagram',
        aliases: ['ig'],
        parse: parseInstagram,
        stream: streamInstagram
    },
    discord: {
        platform: 'discord',
        displayName: 'Discord',
        aliases: ['dc'],
        parse: parseDiscord,
        stream: streamDiscord
    }
};

/**
 * Lists every accepted source name, e.g. "tg, telegram, wa, whatsapp, ...".
 */
export function describeSourceNames(): string {
    return Object.values(PLATFORM_PARSERS)
        .flatMap(parser => [...parser.aliases, parser.platform])
        .join(', ');
}

/**
 * Looks up a parser by its long or short name, ignoring case.
 */
export function resolvePlatform(name: string): PlatformParser {
    const wanted = name.trim().toLowerCase();
    const parser = Object.values(PLATFORM_PARSERS).find(
        candidate => candidate.platform === wanted || candidate.aliases.includes(wanted)
    );
    if (!parser) {
        throw new ConfigError(`Unknown source '${name}'. Expected one of: ${describeSourceNames()}`);
    }
    return parser;
}

export { parseTelegram, streamTelegram, flattenTelegramText } from './telegram.parser';
export { parseWhatsApp, streamWhatsApp, WhatsAppMessageBuilder } from './whatsapp.parser';
export { parseInstagram, streamInstagram } from './instagram.parser';
export { parseDiscord, streamDiscord, detectDiscordShape, DiscordTextBuilder } from './discord.parser';
