import { describe, it, expect } from 'vitest';

import { loadConfig, parseScopes } from '../src/config.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({});
        expect(config).toEqual({
            SWITCHER_USE_APP_TOKENS: false,
            SWITCHER_APP_NAME: 'fedi-switcher',
            SWITCHER_APP_SCOPES: 'read',
            SWITCHER_VERSION_CHECK: true,
            SWITCHER_REQUEST_TIMEOUT_SECONDS: 300,
            SWITCHER_DEBUG: false,
        });
    });

    it('reads boolean flags literally', () => {
        const config = loadConfig({
            SWITCHER_USE_APP_TOKENS: 'true',
            SWITCHER_VERSION_CHECK: 'false',
            SWITCHER_DEBUG: '1',
        });
        expect(config.SWITCHER_USE_APP_TOKENS).toBe(true);
        expect(config.SWITCHER_VERSION_CHECK).toBe(false);
        expect(config.SWITCHER_DEBUG).toBe(true);
    });

    it('coerces the request timeout', () => {
        expect(loadConfig({ SWITCHER_REQUEST_TIMEOUT_SECONDS: '15' }).SWITCHER_REQUEST_TIMEOUT_SECONDS).toBe(15);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({ SWITCHER_REQUEST_TIMEOUT_SECONDS: '-1' })).toThrow('Configuration validation failed');
        expect(() => loadConfig({ SWITCHER_USE_APP_TOKENS: 'maybe' })).toThrow('SWITCHER_USE_APP_TOKENS');
    });
});

describe('parseScopes', () => {
    it('splits on commas and whitespace', () => {
        expect(parseScopes('read, write:statuses  follow')).toEqual(['read', 'write:statuses', 'follow']);
    });
});
