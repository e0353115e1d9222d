import { resolve } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';

import { getConfig, parseScopes, type Config } from '../config.js';
import { createConsoleLogger, type Logger } from '../logging/logger.js';
import { MastodonClient, type MastodonClientOptions } from '../mastodon/client.js';
import { MastodonApiError } from '../mastodon/errors.js';
import type {
    Account,
    AccountStatusesParams,
    Announcement,
    Application,
    Context,
    CreateAppOptions,
    DirectoryParams,
    Emoji,
    FeaturedTag,
    Instance,
    InstanceActivity,
    NodeInfo,
    Page,
    PaginationParams,
    Poll,
    PreviewCard,
    RegisteredApplication,
    Rule,
    SearchParams,
    SearchResults,
    Status,
    StatusEdit,
    Tag,
    TimelineParams,
    TrendLink,
    TrendParams,
} from '../mastodon/types.js';
import { AppTokenStore, type AppToken } from '../state/app-tokens.js';
import { formatAccountHandle, normalizeHost, parseAccountHandle } from './account-handle.js';
import { InstanceSwitcherError } from './errors.js';

/** `user`, `@user`, `user@host`, `@user@host`, or a numeric id on the active host. */
export type AccountRef = string | number;

/** Explicit host, or `undefined`/`null` for the active host. */
export type HostRef = string | null | undefined;

export interface InstanceSwitcherOptions {
    homeDir?: string;
    useAppTokens?: boolean;
    appName?: string;
    appScopes?: string[];
    appWebsite?: string;
    versionCheck?: boolean;
    requestTimeoutSeconds?: number;
    userAgent?: string;
    logger?: Logger;
    fetch?: typeof fetch;
    createClient?: (options: MastodonClientOptions) => MastodonClient;
}

/**
 * Addresses accounts and instances across many Mastodon hosts through one
 * object. Keeps one client per host, resolves `user@host` handles to account
 * ids, and points each call at the right host before restoring the host that
 * was active when the call started.
 *
 * Options left unset fall back to the `SWITCHER_*` environment; the
 * environment is only read (and validated) when at least one is unset.
 *
 * Calls are meant to be awaited one at a time.
 */
export class InstanceSwitcher {
    readonly useAppTokens: boolean;
    readonly home: string | null = null;

    // `null` marks a host whose client could not be created this session
    private clients = new Map<string, MastodonClient | null>();
    // `null` marks a failed lookup
    private accountIds = new Map<string, string | null>();
    private _activeHost: string | null = null;
    private _previousHost: string | null = null;

    private tokenStore: AppTokenStore | null = null;
    private log: Logger;
    private appName: string;
    private appScopes: string[];
    private appWebsite?: string;
    private versionCheck: boolean;
    private requestTimeoutSeconds: number;
    private userAgent?: string;
    private fetchImpl?: typeof fetch;
    private createClient: (options: MastodonClientOptions) => MastodonClient;

    constructor(options: InstanceSwitcherOptions = {}) {
        let loaded: Config | undefined;
        const config = (): Config => {
            if (!loaded) loaded = getConfig();
            return loaded;
        };
        this.log = options.logger ?? createConsoleLogger('switcher', config().SWITCHER_DEBUG);
        this.useAppTokens = options.useAppTokens ?? config().SWITCHER_USE_APP_TOKENS;
        this.appName = options.appName ?? config().SWITCHER_APP_NAME;
        this.appScopes = options.appScopes ?? parseScopes(config().SWITCHER_APP_SCOPES);
        this.appWebsite = options.appWebsite ?? config().SWITCHER_APP_WEBSITE;
        this.versionCheck = options.versionCheck ?? config().SWITCHER_VERSION_CHECK;
        this.requestTimeoutSeconds = options.requestTimeoutSeconds ?? config().SWITCHER_REQUEST_TIMEOUT_SECONDS;
        this.userAgent = options.userAgent ?? config().SWITCHER_USER_AGENT;
        this.fetchImpl = options.fetch;
        this.createClient = options.createClient ?? ((clientOptions) => new MastodonClient(clientOptions));

        if (this.useAppTokens) {
            this.home = this.initHomeDir(options.homeDir ?? config().SWITCHER_HOME_DIR);
            this.tokenStore = new AppTokenStore(this.home);
        } else if (options.homeDir !== undefined) {
            this.log.info(`Ignoring home directory '${options.homeDir}' (only needed with app tokens).`);
        }
    }

    get activeHost(): string | null {
        return this._activeHost;
    }

    get previousHost(): string | null {
        return this._previousHost;
    }

    private initHomeDir(homeDir?: string): string {
        if (!homeDir) {
            const cwd = process.cwd();
            this.log.info(`Using current working directory '${cwd}' as home dir.`);
            return cwd;
        }
        const home = resolve(homeDir);
        if (!existsSync(home)) {
            this.log.info(`Creating home directory '${home}'.`);
            mkdirSync(home, { recursive: true });
        } else {
            this.log.info(`Using home directory '${home}'.`);
        }
        return home;
    }

    /**
     * Make `hostname` the active host, creating its client on first use.
     * `null` clears the active host. A host whose client could not be created
     * leaves no active host behind; creation is not attempted again.
     */
    async setHost(hostname: string | null): Promise<void> {
        if (hostname === null) {
            this._activeHost = null;
            return;
        }
        const host = normalizeHost(hostname);
        if (!host) {
            throw new InstanceSwitcherError(`setHost(): '${hostname}' is not a valid host`, 'parameter', 'setHost', hostname);
        }
        await this.activate(host);
    }

    private async activate(host: string): Promise<MastodonClient | null> {
        if (this.clients.has(host)) {
            const cached = this.clients.get(host) ?? null;
            if (!cached) {
                this.log.warn(`Couldn't instantiate client for host '${host}'`);
                this._activeHost = null;
                return null;
            }
            return this.markActive(host, cached);
        }

        const client = await this.instantiate(host);
        this.clients.set(host, client);
        if (!client) {
            this._activeHost = null;
            return null;
        }
        this.log.debug(`Instantiated client for host '${host}'`);
        return this.markActive(host, client);
    }

    private markActive(host: string, client: MastodonClient): MastodonClient {
        this._activeHost = host;
        this._previousHost = host;
        return client;
    }

    private clientOptions(host: string, token?: AppToken | null): MastodonClientOptions {
        return {
            host,
            clientId: token?.clientId,
            clientSecret: token?.clientSecret,
            accessToken: token?.accessToken,
            userAgent: this.userAgent,
            requestTimeoutSeconds: this.requestTimeoutSeconds,
            fetch: this.fetchImpl,
        };
    }

    private async instantiate(host: string): Promise<MastodonClient | null> {
        const store = this.tokenStore;
        let token: AppToken | null = null;
        if (store) {
            token = await this.getAppToken(store, host);
            if (!token) return null;
        }

        const client = this.createClient(this.clientOptions(host, token));

        if (store && token && !token.accessToken) {
            try {
                const accessToken = await client.obtainAppToken(this.appScopes);
                store.setAccessToken(host, accessToken);
            } catch (error) {
                if (!(error instanceof MastodonApiError)) throw error;
                this.log.warn(`Couldn't obtain app access token at '${host}': ${error.message}`);
            }
        }

        if (this.versionCheck) {
            try {
                await client.retrieveMastodonVersion();
            } catch (error) {
                if (!(error instanceof MastodonApiError)) throw error;
                this.log.error(`Failed to instantiate client for host '${host}': ${error.message}`);
                return null;
            }
        }
        return client;
    }

    private async getAppToken(store: AppTokenStore, host: string): Promise<AppToken | null> {
        const stored = store.get(host);
        if (stored) return stored;

        let token: AppToken;
        try {
            const app = await this.createClient(this.clientOptions(host)).createApp({
                clientName: this.appName,
                scopes: this.appScopes,
                website: this.appWebsite,
            });
            token = { clientId: app.client_id, clientSecret: app.client_secret };
        } catch (error) {
            if (!(error instanceof MastodonApiError)) throw error;
            this.log.error(`Error when creating app token at '${host}': ${error.message}`);
            return null;
        }

        store.set(host, token);
        this.log.info(`Created app token for '${host}', saved to '${store.path}'`);
        return token;
    }

    /**
     * Resolve `user@host` to its account id. Results, including failed
     * lookups (`null`), are cached for the session.
     */
    async resolveAccountId(user: string, hostname: string): Promise<string | null> {
        const host = normalizeHost(hostname);
        if (!host) {
            throw new InstanceSwitcherError(`resolveAccountId(): '${hostname}' is not a valid host`, 'parameter', 'resolveAccountId', user);
        }
        const acct = formatAccountHandle(user, host);
        if (this.accountIds.has(acct)) {
            const cached = this.accountIds.get(acct) ?? null;
            if (cached === null) this.log.warn(`No id for account '${acct}'`);
            return cached;
        }

        const origin = this._activeHost;
        try {
            const client = await this.activate(host);
            if (!client) {
                this.log.error(`Error looking up account '${acct}': Couldn't connect to host '${host}'.`);
                return null;
            }

            let id: string | null = null;
            try {
                const account = await client.accountLookup(acct);
                id = account.id ? String(account.id) : null;
            } catch (error) {
                if (!(error instanceof MastodonApiError)) throw error;
                this.log.error(`Error looking up account '${acct}': ${error.message}`);
            }
            this.accountIds.set(acct, id);
            return id;
        } finally {
            this._activeHost = origin;
        }
    }

    /**
     * Forget failed client creations and failed id lookups so the next call
     * tries again. Returns the number of entries dropped.
     */
    resetFailures(): number {
        let dropped = 0;
        for (const [host, client] of this.clients) {
            if (client === null) {
                this.clients.delete(host);
                dropped++;
            }
        }
        for (const [acct, id] of this.accountIds) {
            if (id === null) {
                this.accountIds.delete(acct);
                dropped++;
            }
        }
        return dropped;
    }

    close(): void {
        this.tokenStore?.close();
    }

    // Dispatch

    /**
     * Run `call` against `host`, restoring the active host afterwards.
     * API errors are wrapped; anything else propagates unchanged.
     */
    private async onHost<R>(
        method: string,
        host: string,
        target: string,
        call: (client: MastodonClient) => Promise<R>
    ): Promise<R> {
        const origin = this._activeHost;
        try {
            const client = await this.activate(host);
            if (!client) {
                throw new InstanceSwitcherError(
                    `${method}(): Failed to connect to host '${host}'`,
                    'connection',
                    method,
                    target,
                    host
                );
            }
            try {
                return await call(client);
            } catch (error) {
                if (!(error instanceof MastodonApiError)) throw error;
                throw new InstanceSwitcherError(
                    `${method}(): Request for '${target}' on '${host}' failed with error: ${error.message}`,
                    'request',
                    method,
                    target,
                    host,
                    { cause: error }
                );
            }
        } finally {
            this._activeHost = origin;
        }
    }

    private async onInstance<R>(method: string, host: HostRef, call: (client: MastodonClient) => Promise<R>): Promise<R> {
        const requested = host ?? this._activeHost;
        if (!requested) {
            throw new InstanceSwitcherError(
                `${method}() requires parameter 'host' if no active host is designated.`,
                'parameter',
                method
            );
        }
        const normalized = normalizeHost(requested);
        if (!normalized) {
            throw new InstanceSwitcherError(`${method}(): '${requested}' is not a valid host`, 'parameter', method, requested);
        }
        return this.onHost(method, normalized, normalized, call);
    }

    private async onContinuation<R>(method: string, host: HostRef, call: (client: MastodonClient) => Promise<R>): Promise<R> {
        const requested = host ?? this._previousHost;
        if (!requested) {
            throw new InstanceSwitcherError(
                `${method}() requires parameter 'host' if no host has been used yet.`,
                'parameter',
                method
            );
        }
        return this.onInstance(method, requested, call);
    }

    private async onAccount<R>(
        method: string,
        acct: AccountRef,
        call: (client: MastodonClient, id: string) => Promise<R>
    ): Promise<R> {
        if (typeof acct === 'number') {
            const host = this._activeHost;
            if (!Number.isSafeInteger(acct) || acct < 0) {
                throw new InstanceSwitcherError(`${method}(): '${acct}' is not a valid account id`, 'parameter', method, String(acct));
            }
            if (!host) {
                throw new InstanceSwitcherError(
                    `${method}(): a numeric 'acct' is read as an account id and requires an active host`,
                    'parameter',
                    method,
                    String(acct)
                );
            }
            this.log.debug(`${method}(): Interpreting numerical value of 'acct' as account id.`);
            const id = String(acct);
            return this.onHost(method, host, id, (client) => call(client, id));
        }

        if (!acct || !acct.trim()) {
            throw new InstanceSwitcherError(`${method}() requires parameter 'acct'.`, 'parameter', method);
        }
        const handle = parseAccountHandle(acct);
        if (!handle) {
            throw new InstanceSwitcherError(
                `${method}(): parameter 'acct' must have the format 'user@host' (or 'user' for the active host)`,
                'parameter',
                method,
                acct
            );
        }
        const host = handle.host ?? this._activeHost;
        if (!host) {
            throw new InstanceSwitcherError(
                `${method}(): parameter 'acct' must have the format 'user@host' if no active host is present`,
                'parameter',
                method,
                acct
            );
        }

        return this.onHost(method, host, acct, async (client) => {
            const id = await this.resolveAccountId(handle.user, host);
            if (id === null) {
                throw new InstanceSwitcherError(
                    `${method}(): Failed to retrieve id for account '${acct}'`,
                    'lookup',
                    method,
                    acct,
                    host
                );
            }
            return call(client, id);
        });
    }

    // Account-addressed operations

    async accountLookup(acct: AccountRef): Promise<Account> {
        return this.onAccount('accountLookup', acct, (client, id) => client.account(id));
    }

    async accountStatuses(acct: AccountRef, params?: AccountStatusesParams): Promise<Page<Status>> {
        return this.onAccount('accountStatuses', acct, (client, id) => client.accountStatuses(id, params));
    }

    async accountFollowers(acct: AccountRef, params?: PaginationParams): Promise<Page<Account>> {
        return this.onAccount('accountFollowers', acct, (client, id) => client.accountFollowers(id, params));
    }

    async accountFollowing(acct: AccountRef, params?: PaginationParams): Promise<Page<Account>> {
        return this.onAccount('accountFollowing', acct, (client, id) => client.accountFollowing(id, params));
    }

    async accountFeaturedTags(acct: AccountRef): Promise<FeaturedTag[]> {
        return this.onAccount('accountFeaturedTags', acct, (client, id) => client.accountFeaturedTags(id));
    }

    // Instance-addressed operations

    async account(host: HostRef, id: string): Promise<Account> {
        return this.onInstance('account', host, (client) => client.account(id));
    }

    async announcements(host?: HostRef): Promise<Announcement[]> {
        return this.onInstance('announcements', host, (client) => client.announcements());
    }

    async appVerifyCredentials(host?: HostRef): Promise<Application> {
        return this.onInstance('appVerifyCredentials', host, (client) => client.appVerifyCredentials());
    }

    async createApp(host: HostRef, options: Partial<CreateAppOptions> = {}): Promise<RegisteredApplication> {
        return this.onInstance('createApp', host, (client) => client.createApp({
            clientName: options.clientName ?? this.appName,
            scopes: options.scopes ?? this.appScopes,
            redirectUris: options.redirectUris,
            website: options.website ?? this.appWebsite,
        }));
    }

    async customEmojis(host?: HostRef): Promise<Emoji[]> {
        return this.onInstance('customEmojis', host, (client) => client.customEmojis());
    }

    async directory(host?: HostRef, params?: DirectoryParams): Promise<Account[]> {
        return this.onInstance('directory', host, (client) => client.directory(params));
    }

    async instance(host?: HostRef): Promise<Instance> {
        return this.onInstance('instance', host, (client) => client.instance());
    }

    async instanceActivity(host?: HostRef): Promise<InstanceActivity[]> {
        return this.onInstance('instanceActivity', host, (client) => client.instanceActivity());
    }

    async instanceHealth(host?: HostRef): Promise<boolean> {
        return this.onInstance('instanceHealth', host, (client) => client.instanceHealth());
    }

    async instanceNodeinfo(host?: HostRef, schema?: string): Promise<NodeInfo> {
        return this.onInstance('instanceNodeinfo', host, (client) => client.instanceNodeinfo(schema));
    }

    async instancePeers(host?: HostRef): Promise<string[]> {
        return this.onInstance('instancePeers', host, (client) => client.instancePeers());
    }

    async instanceRules(host?: HostRef): Promise<Rule[]> {
        return this.onInstance('instanceRules', host, (client) => client.instanceRules());
    }

    async poll(host: HostRef, id: string): Promise<Poll> {
        return this.onInstance('poll', host, (client) => client.poll(id));
    }

    async retrieveMastodonVersion(host?: HostRef): Promise<string> {
        return this.onInstance('retrieveMastodonVersion', host, (client) => client.retrieveMastodonVersion());
    }

    /**
     * Revoke the host's app access token and drop it from the token store.
     */
    async revokeAccessToken(host?: HostRef): Promise<void> {
        return this.onInstance('revokeAccessToken', host, async (client) => {
            if (!client.hasAccessToken()) {
                throw new InstanceSwitcherError(
                    `revokeAccessToken(): No access token held for '${client.host}'`,
                    'request',
                    'revokeAccessToken',
                    client.host,
                    client.host
                );
            }
            await client.revokeAccessToken();
            this.tokenStore?.setAccessToken(client.host, null);
        });
    }

    async search(host: HostRef, q: string, params?: SearchParams): Promise<SearchResults> {
        return this.onInstance('search', host, (client) => client.search(q, params));
    }

    async setLanguage(host: HostRef, language: string | null): Promise<void> {
        return this.onInstance('setLanguage', host, async (client) => client.setLanguage(language));
    }

    async status(host: HostRef, id: string): Promise<Status> {
        return this.onInstance('status', host, (client) => client.status(id));
    }

    async statusCard(host: HostRef, id: string): Promise<PreviewCard | null> {
        return this.onInstance('statusCard', host, (client) => client.statusCard(id));
    }

    async statusContext(host: HostRef, id: string): Promise<Context> {
        return this.onInstance('statusContext', host, (client) => client.statusContext(id));
    }

    async statusFavouritedBy(host: HostRef, id: string, params?: PaginationParams): Promise<Page<Account>> {
        return this.onInstance('statusFavouritedBy', host, (client) => client.statusFavouritedBy(id, params));
    }

    async statusHistory(host: HostRef, id: string): Promise<StatusEdit[]> {
        return this.onInstance('statusHistory', host, (client) => client.statusHistory(id));
    }

    async statusRebloggedBy(host: HostRef, id: string, params?: PaginationParams): Promise<Page<Account>> {
        return this.onInstance('statusRebloggedBy', host, (client) => client.statusRebloggedBy(id, params));
    }

    async timelineHashtag(host: HostRef, hashtag: string, params?: TimelineParams): Promise<Page<Status>> {
        return this.onInstance('timelineHashtag', host, (client) => client.timelineHashtag(hashtag, params));
    }

    async timelineHome(host?: HostRef, params?: PaginationParams): Promise<Page<Status>> {
        return this.onInstance('timelineHome', host, (client) => client.timelineHome(params));
    }

    async timelineLocal(host?: HostRef, params?: Omit<TimelineParams, 'local' | 'remote'>): Promise<Page<Status>> {
        return this.onInstance('timelineLocal', host, (client) => client.timelineLocal(params));
    }

    async timelinePublic(host?: HostRef, params?: TimelineParams): Promise<Page<Status>> {
        return this.onInstance('timelinePublic', host, (client) => client.timelinePublic(params));
    }

    async trendingLinks(host?: HostRef, params?: TrendParams): Promise<TrendLink[]> {
        return this.onInstance('trendingLinks', host, (client) => client.trendingLinks(params));
    }

    async trendingStatuses(host?: HostRef, params?: TrendParams): Promise<Status[]> {
        return this.onInstance('trendingStatuses', host, (client) => client.trendingStatuses(params));
    }

    async trendingTags(host?: HostRef, params?: TrendParams): Promise<Tag[]> {
        return this.onInstance('trendingTags', host, (client) => client.trendingTags(params));
    }

    async trends(host?: HostRef, params?: TrendParams): Promise<Tag[]> {
        return this.onInstance('trends', host, (client) => client.trends(params));
    }

    async verifyMinimumVersion(host: HostRef, version: string): Promise<boolean> {
        return this.onInstance('verifyMinimumVersion', host, (client) => client.verifyMinimumVersion(version));
    }

    // Pagination continuations: default to the host of the previous call

    async fetchNext<T>(page: Page<T>, host?: HostRef): Promise<Page<T> | null> {
        return this.onContinuation('fetchNext', host, (client) => client.fetchNext(page));
    }

    async fetchPrevious<T>(page: Page<T>, host?: HostRef): Promise<Page<T> | null> {
        return this.onContinuation('fetchPrevious', host, (client) => client.fetchPrevious(page));
    }

    async fetchRemaining<T>(page: Page<T>, host?: HostRef): Promise<T[]> {
        return this.onContinuation('fetchRemaining', host, (client) => client.fetchRemaining(page));
    }
}
