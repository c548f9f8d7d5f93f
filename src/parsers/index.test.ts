import { describe, expect, it } from 'vitest';
import { ConfigError } from '../utils/errors';
import { PLATFORM_PARSERS, describeSourceNames, resolvePlatform } from './index';

describe('resolvePlatform', () => {
    it.each([
        ['tg', 'telegram'],
        ['Telegram', 'telegram'],
        ['wa', 'whatsapp'],
        ['ig', 'instagram'],
        [' DC ', 'discord']
    ])('resolves %j to %s', (name, platform) => {
        expect(resolvePlatform(name).platform).toBe(platform);
    });

    it('lists accepted names for an unknown source', () => {
        expect(() => resolvePlatform('signal')).toThrow(ConfigError);
        expect(() => resolvePlatform('signal')).toThrow(
            "Unknown source 'signal'. Expected one of: tg, telegram, wa, whatsapp, ig, instagram, dc, discord"
        );
    });
});

describe('PLATFORM_PARSERS', () => {
    it('registers one parser per platform under its own key', () => {
        for (const [key, parser] of Object.entries(PLATFORM_PARSERS)) {
            expect(parser.platform).toBe(key);
        }
        expect(describeSourceNames().split(', ')).toHaveLength(8);
    });
});
