import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { InstanceSwitcher, type InstanceSwitcherOptions } from '../src/switcher/instance-switcher.js';
import { InstanceSwitcherError } from '../src/switcher/errors.js';
import { MastodonClient } from '../src/mastodon/client.js';
import { MastodonApiError } from '../src/mastodon/errors.js';
import { AppTokenStore } from '../src/state/app-tokens.js';
import { FakeFediverse, createRecordingLogger, json } from './helpers/fake-fediverse.js';

function htmlPage(): Response {
    return new Response('<html>hi</html>', { status: 200, headers: { 'Content-Type': 'text/html' } });
}

function timelineRoute(url: URL): Response {
    if (url.searchParams.get('max_id') === '2') {
        return json([{ id: '1' }]);
    }
    return json([{ id: '3' }, { id: '2' }], 200, {
        Link: '<https://alpha.example/api/v1/timelines/public?max_id=2>; rel="next", '
            + '<https://alpha.example/api/v1/timelines/public?min_id=3>; rel="prev"',
    });
}

function createNetwork(): FakeFediverse {
    return new FakeFediverse({
        'alpha.example': {
            accounts: [{ id: '11', username: 'alice' }],
            routes: {
                'GET /api/v1/timelines/public': timelineRoute,
                'GET /api/v1/instance/peers': htmlPage,
            },
        },
        'beta.example': {
            accounts: [{ id: '7', username: 'bob' }],
            routes: {
                'GET /api/v1/accounts/7/statuses': () => json([{ id: '70' }]),
            },
        },
        'down.example': { down: true },
        'web.example': { routes: { 'GET /api/v1/instance': htmlPage } },
    });
}

describe('InstanceSwitcher', () => {
    let network: FakeFediverse;
    let created: string[];
    let lines: string[];
    let switcher: InstanceSwitcher;

    function build(options: InstanceSwitcherOptions = {}): InstanceSwitcher {
        const recording = createRecordingLogger();
        lines = recording.lines;
        return new InstanceSwitcher({
            useAppTokens: false,
            versionCheck: true,
            logger: recording.logger,
            fetch: network.fetch,
            createClient: (clientOptions) => {
                created.push(clientOptions.host);
                return new MastodonClient(clientOptions);
            },
            ...options,
        });
    }

    beforeEach(() => {
        network = createNetwork();
        created = [];
        switcher = build();
    });

    describe('setHost', () => {
        it('creates one client per host and treats re-activation as a no-op', async () => {
            await switcher.setHost('alpha.example');
            await switcher.setHost('alpha.example');
            await switcher.setHost('https://Alpha.Example/');

            expect(switcher.activeHost).toBe('alpha.example');
            expect(created).toEqual(['alpha.example']);
            expect(network.count('alpha.example', 'GET', '/api/v1/instance')).toBe(1);
        });

        it('clears the active host when given null', async () => {
            await switcher.setHost('alpha.example');
            await switcher.setHost(null);

            expect(switcher.activeHost).toBeNull();
            expect(switcher.previousHost).toBe('alpha.example');
        });

        it('never retries a host whose client creation failed', async () => {
            await switcher.setHost('alpha.example');
            await switcher.setHost('down.example');
            expect(switcher.activeHost).toBeNull();

            await switcher.setHost('down.example');
            expect(switcher.activeHost).toBeNull();
            expect(created).toEqual(['alpha.example', 'down.example']);
            expect(network.count('down.example', 'GET', '/api/v1/instance')).toBe(1);
            expect(lines).toContain("warn: Couldn't instantiate client for host 'down.example'");
        });

        it('caches a host that answers with something other than JSON as failed', async () => {
            await expect(switcher.setHost('web.example')).resolves.toBeUndefined();
            await expect(switcher.setHost('web.example')).resolves.toBeUndefined();

            expect(switcher.activeHost).toBeNull();
            expect(network.count('web.example', 'GET', '/api/v1/instance')).toBe(1);
            expect(lines).toContain("warn: Couldn't instantiate client for host 'web.example'");
        });

        it('retries a failed host after resetFailures', async () => {
            await switcher.setHost('down.example');

            expect(switcher.resetFailures()).toBe(1);
            await switcher.setHost('down.example');
            expect(created).toEqual(['down.example', 'down.example']);
        });

        it('skips the version request when the check is disabled', async () => {
            switcher = build({ versionCheck: false });
            await switcher.setHost('down.example');

            expect(switcher.activeHost).toBe('down.example');
            expect(network.requests).toHaveLength(0);
        });

        it('rejects input that names no host', async () => {
            await expect(switcher.setHost('   ')).rejects.toMatchObject({ kind: 'parameter', method: 'setHost' });
        });
    });

    describe('resolveAccountId', () => {
        it('caches the id so a second resolution makes no request', async () => {
            expect(await switcher.resolveAccountId('bob', 'beta.example')).toBe('7');
            expect(await switcher.resolveAccountId('bob', 'beta.example')).toBe('7');

            expect(network.count('beta.example', 'GET', '/api/v1/accounts/lookup')).toBe(1);
        });

        it('caches a failed lookup as null', async () => {
            expect(await switcher.resolveAccountId('ghost', 'beta.example')).toBeNull();
            expect(await switcher.resolveAccountId('ghost', 'beta.example')).toBeNull();

            expect(network.count('beta.example', 'GET', '/api/v1/accounts/lookup')).toBe(1);
            expect(lines).toContain("warn: No id for account 'ghost@beta.example'");
        });

        it('returns null for an unreachable host and restores the active host', async () => {
            await switcher.setHost('alpha.example');

            expect(await switcher.resolveAccountId('bob', 'down.example')).toBeNull();
            expect(switcher.activeHost).toBe('alpha.example');
        });
    });

    describe('account-addressed calls', () => {
        it('resolves user@host, @user@host and bare user to the same account', async () => {
            await switcher.setHost('beta.example');

            const first = await switcher.accountLookup('bob@beta.example');
            const second = await switcher.accountLookup('@bob@beta.example');
            const third = await switcher.accountLookup('bob');

            expect([first.id, second.id, third.id]).toEqual(['7', '7', '7']);
            expect(network.count('beta.example', 'GET', '/api/v1/accounts/lookup')).toBe(1);
            expect(network.count('beta.example', 'GET', '/api/v1/accounts/7')).toBe(3);
        });

        it('calls the account host and restores the previously active host', async () => {
            await switcher.setHost('alpha.example');

            const page = await switcher.accountStatuses('bob@beta.example', { limit: 1 });

            expect(page.items.map((status) => status.id)).toEqual(['70']);
            expect(switcher.activeHost).toBe('alpha.example');
            const request = network.requests.find((entry) => entry.url.pathname === '/api/v1/accounts/7/statuses');
            expect(request?.url.hostname).toBe('beta.example');
            expect(request?.url.searchParams.get('limit')).toBe('1');
        });

        it('uses a numeric acct as an id on the active host', async () => {
            await switcher.setHost('alpha.example');

            const account = await switcher.accountLookup(11);

            expect(account.username).toBe('alice');
            expect(network.count('alpha.example', 'GET', '/api/v1/accounts/lookup')).toBe(0);
        });

        it('rejects a handle with more than one host before any request', async () => {
            const call = switcher.accountStatuses('bob@beta.example@alpha.example');

            await expect(call).rejects.toBeInstanceOf(InstanceSwitcherError);
            await expect(call).rejects.toMatchObject({ kind: 'parameter', method: 'accountStatuses' });
            expect(network.requests).toHaveLength(0);
        });

        it('requires a host part when no host is active', async () => {
            await expect(switcher.accountFollowers('bob')).rejects.toThrow(
                "accountFollowers(): parameter 'acct' must have the format 'user@host' if no active host is present"
            );
        });

        it('requires an active host for a numeric acct', async () => {
            await expect(switcher.accountFeaturedTags(7)).rejects.toMatchObject({ kind: 'parameter', target: '7' });
        });

        it('requires acct', async () => {
            await expect(switcher.accountFollowing('')).rejects.toThrow("accountFollowing() requires parameter 'acct'.");
        });

        it('raises a lookup error and restores the active host', async () => {
            await switcher.setHost('alpha.example');

            await expect(switcher.accountStatuses('ghost@beta.example')).rejects.toMatchObject({
                kind: 'lookup',
                message: "accountStatuses(): Failed to retrieve id for account 'ghost@beta.example'",
                host: 'beta.example',
            });
            expect(switcher.activeHost).toBe('alpha.example');
        });

        it('raises a connection error for an unreachable account host', async () => {
            await expect(switcher.accountStatuses('bob@down.example')).rejects.toMatchObject({
                kind: 'connection',
                message: "accountStatuses(): Failed to connect to host 'down.example'",
            });
            expect(switcher.activeHost).toBeNull();
        });
    });

    describe('instance-addressed calls', () => {
        it('targets an explicit host without changing the active host', async () => {
            await switcher.setHost('beta.example');

            const instance = await switcher.instance('alpha.example');

            expect(instance.uri).toBe('alpha.example');
            expect(switcher.activeHost).toBe('beta.example');
        });

        it('falls back to the active host', async () => {
            await switcher.setHost('alpha.example');

            const account = await switcher.account(undefined, '11');

            expect(account.username).toBe('alice');
        });

        it('requires a host when none is active', async () => {
            await expect(switcher.instancePeers()).rejects.toThrow(
                "instancePeers() requires parameter 'host' if no active host is designated."
            );
        });

        it('wraps API errors and keeps the original as cause', async () => {
            await switcher.setHost('beta.example');

            const error = await switcher.status('alpha.example', '404').catch((err: unknown) => err);

            expect(error).toBeInstanceOf(InstanceSwitcherError);
            expect(error).toMatchObject({
                kind: 'request',
                method: 'status',
                target: 'alpha.example',
                message: "status(): Request for 'alpha.example' on 'alpha.example' failed with error: Record not found",
            });
            expect(error instanceof Error && error.cause instanceof MastodonApiError).toBe(true);
            expect(switcher.activeHost).toBe('beta.example');
        });

        it('wraps a response that is not JSON as a request error', async () => {
            const error = await switcher.instancePeers('alpha.example').catch((err: unknown) => err);

            expect(error).toBeInstanceOf(InstanceSwitcherError);
            expect(error).toMatchObject({ kind: 'request', method: 'instancePeers', host: 'alpha.example' });
            expect(error instanceof Error && error.cause instanceof MastodonApiError).toBe(true);
        });

        it('raises a connection error for an unreachable host', async () => {
            await switcher.setHost('alpha.example');

            await expect(switcher.trends('down.example')).rejects.toMatchObject({ kind: 'connection', host: 'down.example' });
            expect(switcher.activeHost).toBe('alpha.example');
        });

        it('applies setLanguage to later requests on that host', async () => {
            await switcher.setLanguage('alpha.example', 'de');
            await switcher.instance('alpha.example');

            const last = network.requests[network.requests.length - 1];
            expect(last.acceptLanguage).toBe('de');
        });
    });

    describe('pagination', () => {
        it('continues on the previous host when none is given', async () => {
            const page = await switcher.timelinePublic('alpha.example', { limit: 2 });
            await switcher.setHost(null);

            const next = await switcher.fetchNext(page);

            expect(next?.items.map((status) => status.id)).toEqual(['1']);
            expect(next?.next).toBeNull();
            expect(switcher.activeHost).toBeNull();
        });

        it('collects every remaining page', async () => {
            const page = await switcher.timelinePublic('alpha.example');

            const all = await switcher.fetchRemaining(page);

            expect(all.map((status) => status.id)).toEqual(['3', '2', '1']);
        });

        it('requires a host before anything has been activated', async () => {
            const page = { items: [], next: 'https://alpha.example/api/v1/timelines/public?max_id=2', previous: null };

            await expect(switcher.fetchPrevious(page)).rejects.toMatchObject({ kind: 'parameter', method: 'fetchPrevious' });
        });
    });
});

describe('InstanceSwitcher configuration', () => {
    const saved = process.env.SWITCHER_DEBUG;

    beforeEach(() => {
        process.env.SWITCHER_DEBUG = 'on';
        vi.resetModules();
    });

    afterEach(() => {
        if (saved === undefined) delete process.env.SWITCHER_DEBUG;
        else process.env.SWITCHER_DEBUG = saved;
        vi.resetModules();
    });

    it('does not read the environment when every option is given', async () => {
        const fresh = await import('../src/switcher/instance-switcher.js');

        const switcher = new fresh.InstanceSwitcher({
            useAppTokens: false,
            appName: 'test-app',
            appScopes: ['read'],
            appWebsite: 'https://app.example',
            versionCheck: false,
            requestTimeoutSeconds: 5,
            userAgent: 'test-agent',
            logger: createRecordingLogger().logger,
        });

        expect(switcher.useAppTokens).toBe(false);
    });

    it('validates the environment for options left unset', async () => {
        const fresh = await import('../src/switcher/instance-switcher.js');

        expect(() => new fresh.InstanceSwitcher({ logger: createRecordingLogger().logger })).toThrow('SWITCHER_DEBUG');
    });
});

describe('InstanceSwitcher with app tokens', () => {
    let homeDir: string;
    let network: FakeFediverse;

    beforeEach(() => {
        homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fedi-switcher-test-'));
        network = new FakeFediverse({
            'alpha.example': {
                routes: {
                    'POST /api/v1/apps': () => json({
                        name: 'switcher-test',
                        client_id: 'test-client-id',
                        client_secret: 'test-client-secret',
                    }),
                    'POST /oauth/token': () => json({
                        access_token: 'test-access-token',
                        token_type: 'Bearer',
                        scope: 'read',
                        created_at: 0,
                    }),
                    'POST /oauth/revoke': () => json({}),
                },
            },
        });
    });

    afterEach(() => {
        fs.rmSync(homeDir, { recursive: true, force: true });
    });

    function build(): InstanceSwitcher {
        return new InstanceSwitcher({
            homeDir,
            useAppTokens: true,
            appName: 'switcher-test',
            appScopes: ['read'],
            versionCheck: true,
            logger: createRecordingLogger().logger,
            fetch: network.fetch,
        });
    }

    it('registers an app once and reuses it across sessions', async () => {
        const first = build();
        await first.setHost('alpha.example');
        first.close();

        const second = build();
        await second.setHost('alpha.example');
        second.close();

        expect(network.count('alpha.example', 'POST', '/api/v1/apps')).toBe(1);
        expect(network.count('alpha.example', 'POST', '/oauth/token')).toBe(1);
        expect(fs.existsSync(path.join(homeDir, 'cache', 'app_tokens.db'))).toBe(true);

        const registration = network.requests.find((request) => request.url.pathname === '/api/v1/apps');
        expect(registration?.body).toEqual({
            client_name: 'switcher-test',
            scopes: 'read',
            redirect_uris: 'urn:ietf:wg:oauth:2.0:oob',
        });
        const versionChecks = network.requests.filter((request) => request.url.pathname === '/api/v1/instance');
        expect(versionChecks.map((request) => request.authorization)).toEqual([
            'Bearer test-access-token',
            'Bearer test-access-token',
        ]);
    });

    it('revokes the access token and drops it from the store', async () => {
        const switcher = build();
        await switcher.setHost('alpha.example');

        await switcher.revokeAccessToken();
        switcher.close();

        const revoke = network.requests.find((request) => request.url.pathname === '/oauth/revoke');
        expect(revoke?.body).toEqual({
            client_id: 'test-client-id',
            client_secret: 'test-client-secret',
            token: 'test-access-token',
        });

        const store = new AppTokenStore(homeDir);
        expect(store.get('alpha.example')).toEqual({ clientId: 'test-client-id', clientSecret: 'test-client-secret' });
        store.close();
    });

    it('caches a failed registration for the session', async () => {
        const switcher = build();

        await switcher.setHost('unknown.example');
        await switcher.setHost('unknown.example');
        switcher.close();

        expect(switcher.activeHost).toBeNull();
        expect(network.count('unknown.example', 'POST', '/api/v1/apps')).toBe(1);
    });
});
