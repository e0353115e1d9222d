import { describe, it, expect } from 'vitest';

import { formatAccountHandle, normalizeHost, parseAccountHandle } from '../src/switcher/account-handle.js';

describe('normalizeHost', () => {
    it('accepts bare hostnames and URLs', () => {
        expect(normalizeHost('mastodon.example')).toBe('mastodon.example');
        expect(normalizeHost('https://Mastodon.Example/')).toBe('mastodon.example');
        expect(normalizeHost('https://mastodon.example/@alice')).toBe('mastodon.example');
        expect(normalizeHost('  mastodon.example  ')).toBe('mastodon.example');
    });

    it('returns null for empty input', () => {
        expect(normalizeHost('')).toBeNull();
        expect(normalizeHost('   ')).toBeNull();
    });
});

describe('parseAccountHandle', () => {
    it('parses handles with and without host', () => {
        expect(parseAccountHandle('alice')).toEqual({ user: 'alice', host: null });
        expect(parseAccountHandle('@alice')).toEqual({ user: 'alice', host: null });
        expect(parseAccountHandle('alice@mastodon.example')).toEqual({ user: 'alice', host: 'mastodon.example' });
        expect(parseAccountHandle('@alice@Mastodon.Example')).toEqual({ user: 'alice', host: 'mastodon.example' });
    });

    it('rejects more than one host part', () => {
        expect(parseAccountHandle('alice@one.example@two.example')).toBeNull();
        expect(parseAccountHandle('@alice@one.example@two.example')).toBeNull();
    });

    it('rejects empty segments', () => {
        expect(parseAccountHandle('')).toBeNull();
        expect(parseAccountHandle('@')).toBeNull();
        expect(parseAccountHandle('alice@')).toBeNull();
    });
});

describe('formatAccountHandle', () => {
    it('joins user and host', () => {
        expect(formatAccountHandle('alice', 'mastodon.example')).toBe('alice@mastodon.example');
    });
});
