import { MastodonApiError } from './errors.js';
import { buildQuery, parseLinkHeader } from './pagination.js';
import type {
    AccessToken,
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
} from './types.js';

export interface MastodonClientOptions {
    host: string;
    clientId?: string;
    clientSecret?: string;
    accessToken?: string;
    userAgent?: string;
    requestTimeoutSeconds?: number;
    fetch?: typeof fetch;
}

type RequestOptions = {
    query?: object;
    body?: Record<string, unknown>;
};

const DEFAULT_TIMEOUT_SECONDS = 300;
const DEFAULT_USER_AGENT = 'fedi-switcher';
const OOB_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';
const NODEINFO_SCHEMA = 'http://nodeinfo.diaspora.software/ns/schema/2.0';

/**
 * Read-only client for one Mastodon-compatible host.
 */
export class MastodonClient {
    readonly host: string;
    readonly clientId?: string;
    readonly clientSecret?: string;

    private baseUrl: string;
    private accessToken?: string;
    private userAgent: string;
    private timeoutMs: number;
    private language: string | null = null;
    private version: string | null = null;
    private fetchImpl: typeof fetch;

    constructor(options: MastodonClientOptions) {
        this.host = options.host;
        this.baseUrl = `https://${options.host}`;
        this.clientId = options.clientId;
        this.clientSecret = options.clientSecret;
        this.accessToken = options.accessToken;
        this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
        this.timeoutMs = (options.requestTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
        this.fetchImpl = options.fetch ?? fetch;
    }

    private async send(method: 'GET' | 'POST', target: string, options: RequestOptions = {}): Promise<Response> {
        const url = this.resolveUrl(target) + buildQuery(options.query);
        const headers: Record<string, string> = {
            Accept: 'application/json',
            'User-Agent': this.userAgent,
        };
        if (this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;
        if (this.language) headers['Accept-Language'] = this.language;
        if (options.body) headers['Content-Type'] = 'application/json';

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method,
                headers,
                body: options.body ? JSON.stringify(options.body) : undefined,
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new MastodonApiError(`Request to ${url} failed: ${reason}`, 0, this.host, target);
        }

        if (!response.ok) {
            const text = await response.text().catch(() => 'Mastodon API error');
            const retryAfter = Number(response.headers.get('Retry-After'));
            throw new MastodonApiError(
                extractErrorMessage(text) || `HTTP ${response.status}`,
                response.status,
                this.host,
                target,
                Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : undefined
            );
        }
        return response;
    }

    /**
     * Paths are relative to this host; absolute URLs (pagination and nodeinfo
     * links) must point back at it so the token is never sent elsewhere.
     */
    private resolveUrl(target: string): string {
        if (target.startsWith('/')) return `${this.baseUrl}${target}`;
        let url: URL;
        try {
            url = new URL(target);
        } catch {
            throw new MastodonApiError(`Invalid URL '${target}'`, 400, this.host, target);
        }
        if (url.hostname !== this.host) {
            throw new MastodonApiError(`Refusing to follow link to foreign host '${url.hostname}'`, 400, this.host, target);
        }
        return url.toString();
    }

    /** Body reads share the request timeout; a failure there counts as a network error. */
    private async readText(response: Response, target: string): Promise<string> {
        try {
            return await response.text();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new MastodonApiError(`Request to ${response.url || target} failed: ${reason}`, 0, this.host, target);
        }
    }

    private async readJson(response: Response, target: string): Promise<unknown> {
        const text = await this.readText(response, target);
        try {
            return JSON.parse(text);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new MastodonApiError(`Could not parse response as JSON: ${reason}`, response.status, this.host, target);
        }
    }

    private async request<T>(method: 'GET' | 'POST', target: string, options: RequestOptions = {}): Promise<T> {
        const response = await this.send(method, target, options);
        return await this.readJson(response, target) as T;
    }

    private async requestPage<T>(target: string, query?: object): Promise<Page<T>> {
        const response = await this.send('GET', target, { query });
        const items = await this.readJson(response, target) as T[];
        const links = parseLinkHeader(response.headers.get('Link'));
        return { items: items || [], ...links };
    }

    // Accounts

    async account(id: string): Promise<Account> {
        return this.request<Account>('GET', `/api/v1/accounts/${encodeURIComponent(id)}`);
    }

    async accountLookup(acct: string): Promise<Account> {
        return this.request<Account>('GET', '/api/v1/accounts/lookup', { query: { acct } });
    }

    async accountStatuses(id: string, params: AccountStatusesParams = {}): Promise<Page<Status>> {
        return this.requestPage<Status>(`/api/v1/accounts/${encodeURIComponent(id)}/statuses`, params);
    }

    async accountFollowers(id: string, params: PaginationParams = {}): Promise<Page<Account>> {
        return this.requestPage<Account>(`/api/v1/accounts/${encodeURIComponent(id)}/followers`, params);
    }

    async accountFollowing(id: string, params: PaginationParams = {}): Promise<Page<Account>> {
        return this.requestPage<Account>(`/api/v1/accounts/${encodeURIComponent(id)}/following`, params);
    }

    async accountFeaturedTags(id: string): Promise<FeaturedTag[]> {
        return this.request<FeaturedTag[]>('GET', `/api/v1/accounts/${encodeURIComponent(id)}/featured_tags`);
    }

    async directory(params: DirectoryParams = {}): Promise<Account[]> {
        return this.request<Account[]>('GET', '/api/v1/directory', { query: params });
    }

    // Apps

    async createApp(options: CreateAppOptions): Promise<RegisteredApplication> {
        return this.request<RegisteredApplication>('POST', '/api/v1/apps', {
            body: {
                client_name: options.clientName,
                scopes: (options.scopes ?? ['read']).join(' '),
                redirect_uris: options.redirectUris ?? OOB_REDIRECT_URI,
                website: options.website,
            },
        });
    }

    async appVerifyCredentials(): Promise<Application> {
        return this.request<Application>('GET', '/api/v1/apps/verify_credentials');
    }

    /**
     * Exchange the app credentials for an app-level token (client_credentials grant).
     * The token is used for every following request.
     */
    async obtainAppToken(scopes: string[] = ['read']): Promise<string> {
        if (!this.clientId || !this.clientSecret) {
            throw new Error(`Client for '${this.host}' has no app credentials`);
        }
        const token = await this.request<AccessToken>('POST', '/oauth/token', {
            body: {
                grant_type: 'client_credentials',
                client_id: this.clientId,
                client_secret: this.clientSecret,
                redirect_uri: OOB_REDIRECT_URI,
                scope: scopes.join(' '),
            },
        });
        this.accessToken = token.access_token;
        return token.access_token;
    }

    async revokeAccessToken(): Promise<void> {
        if (!this.accessToken) {
            throw new Error(`Client for '${this.host}' has no access token to revoke`);
        }
        await this.send('POST', '/oauth/revoke', {
            body: {
                client_id: this.clientId,
                client_secret: this.clientSecret,
                token: this.accessToken,
            },
        });
        this.accessToken = undefined;
    }

    hasAccessToken(): boolean {
        return Boolean(this.accessToken);
    }

    // Instance

    async instance(): Promise<Instance> {
        return this.request<Instance>('GET', '/api/v1/instance');
    }

    async instanceActivity(): Promise<InstanceActivity[]> {
        return this.request<InstanceActivity[]>('GET', '/api/v1/instance/activity');
    }

    async instanceHealth(): Promise<boolean> {
        const response = await this.send('GET', '/health');
        const text = await this.readText(response, '/health');
        return text.trim() === 'OK';
    }

    async instanceNodeinfo(schema: string = NODEINFO_SCHEMA): Promise<NodeInfo> {
        const discovery = await this.request<{ links?: Array<{ rel: string; href: string }> }>('GET', '/.well-known/nodeinfo');
        const link = (discovery.links || []).find((entry) => entry.rel === schema);
        if (!link) {
            throw new MastodonApiError(`Nodeinfo schema '${schema}' is not advertised`, 404, this.host, '/.well-known/nodeinfo');
        }
        return this.request<NodeInfo>('GET', link.href);
    }

    async instancePeers(): Promise<string[]> {
        return this.request<string[]>('GET', '/api/v1/instance/peers');
    }

    async instanceRules(): Promise<Rule[]> {
        return this.request<Rule[]>('GET', '/api/v1/instance/rules');
    }

    async announcements(): Promise<Announcement[]> {
        return this.request<Announcement[]>('GET', '/api/v1/announcements');
    }

    async customEmojis(): Promise<Emoji[]> {
        return this.request<Emoji[]>('GET', '/api/v1/custom_emojis');
    }

    /**
     * Fetch the instance and remember the numeric part of its version
     * (`4.2.1+glitch` -> `4.2.1`).
     */
    async retrieveMastodonVersion(): Promise<string> {
        const info = await this.instance();
        if (typeof info.version !== 'string') {
            throw new MastodonApiError('Instance response carries no version', 200, this.host, '/api/v1/instance');
        }
        this.version = normalizeVersion(info.version);
        return this.version;
    }

    async verifyMinimumVersion(minimum: string, cached = true): Promise<boolean> {
        const current = cached && this.version ? this.version : await this.retrieveMastodonVersion();
        return compareVersions(current, minimum) >= 0;
    }

    /** ISO 639 code sent as Accept-Language; `null` drops the header. */
    setLanguage(language: string | null): void {
        this.language = language;
    }

    // Statuses

    async status(id: string): Promise<Status> {
        return this.request<Status>('GET', `/api/v1/statuses/${encodeURIComponent(id)}`);
    }

    async statusCard(id: string): Promise<PreviewCard | null> {
        const status = await this.status(id);
        return status.card ?? null;
    }

    async statusContext(id: string): Promise<Context> {
        return this.request<Context>('GET', `/api/v1/statuses/${encodeURIComponent(id)}/context`);
    }

    async statusFavouritedBy(id: string, params: PaginationParams = {}): Promise<Page<Account>> {
        return this.requestPage<Account>(`/api/v1/statuses/${encodeURIComponent(id)}/favourited_by`, params);
    }

    async statusRebloggedBy(id: string, params: PaginationParams = {}): Promise<Page<Account>> {
        return this.requestPage<Account>(`/api/v1/statuses/${encodeURIComponent(id)}/reblogged_by`, params);
    }

    async statusHistory(id: string): Promise<StatusEdit[]> {
        return this.request<StatusEdit[]>('GET', `/api/v1/statuses/${encodeURIComponent(id)}/history`);
    }

    async poll(id: string): Promise<Poll> {
        return this.request<Poll>('GET', `/api/v1/polls/${encodeURIComponent(id)}`);
    }

    // Timelines

    async timelineHome(params: PaginationParams = {}): Promise<Page<Status>> {
        return this.requestPage<Status>('/api/v1/timelines/home', params);
    }

    async timelinePublic(params: TimelineParams = {}): Promise<Page<Status>> {
        return this.requestPage<Status>('/api/v1/timelines/public', params);
    }

    async timelineLocal(params: Omit<TimelineParams, 'local' | 'remote'> = {}): Promise<Page<Status>> {
        return this.timelinePublic({ ...params, local: true });
    }

    async timelineHashtag(hashtag: string, params: TimelineParams = {}): Promise<Page<Status>> {
        const tag = hashtag.replace(/^#/, '');
        if (!tag) {
            throw new MastodonApiError('Hashtag must not be empty', 400, this.host, '/api/v1/timelines/tag');
        }
        return this.requestPage<Status>(`/api/v1/timelines/tag/${encodeURIComponent(tag)}`, params);
    }

    // Search and trends

    async search(q: string, params: SearchParams = {}): Promise<SearchResults> {
        return this.request<SearchResults>('GET', '/api/v2/search', { query: { q, ...params } });
    }

    async trendingTags(params: TrendParams = {}): Promise<Tag[]> {
        return this.request<Tag[]>('GET', '/api/v1/trends/tags', { query: params });
    }

    async trendingStatuses(params: TrendParams = {}): Promise<Status[]> {
        return this.request<Status[]>('GET', '/api/v1/trends/statuses', { query: params });
    }

    async trendingLinks(params: TrendParams = {}): Promise<TrendLink[]> {
        return this.request<TrendLink[]>('GET', '/api/v1/trends/links', { query: params });
    }

    async trends(params: TrendParams = {}): Promise<Tag[]> {
        return this.trendingTags(params);
    }

    // Pagination

    async fetchNext<T>(page: Page<T>): Promise<Page<T> | null> {
        if (!page.next) return null;
        return this.requestPage<T>(page.next);
    }

    async fetchPrevious<T>(page: Page<T>): Promise<Page<T> | null> {
        if (!page.previous) return null;
        return this.requestPage<T>(page.previous);
    }

    async fetchRemaining<T>(page: Page<T>): Promise<T[]> {
        const items = [...page.items];
        const visited = new Set<string>();
        let current: Page<T> | null = page;
        while (current?.next && !visited.has(current.next)) {
            visited.add(current.next);
            current = await this.fetchNext(current);
            if (current) items.push(...current.items);
        }
        return items;
    }
}

function extractErrorMessage(text: string): string {
    try {
        const parsed: unknown = JSON.parse(text);
        if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
            return parsed.error;
        }
    } catch {
        return text.trim();
    }
    return text.trim();
}

export function normalizeVersion(raw: string): string {
    const match = raw.match(/^(\d+)(?:\.(\d+))?(?:\.(\d+))?/);
    if (!match) return '0.0.0';
    return [match[1], match[2] ?? '0', match[3] ?? '0'].join('.');
}

export function compareVersions(a: string, b: string): number {
    const left = normalizeVersion(a).split('.').map(Number);
    const right = normalizeVersion(b).split('.').map(Number);
    for (let i = 0; i < 3; i++) {
        if (left[i] !== right[i]) return left[i] - right[i];
    }
    return 0;
}
