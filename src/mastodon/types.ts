export interface Emoji {
    shortcode: string;
    url: string;
    static_url: string;
    visible_in_picker: boolean;
    category?: string | null;
}

export interface Field {
    name: string;
    value: string;
    verified_at?: string | null;
}

export interface Account {
    id: string;
    username: string;
    acct: string;
    url: string;
    display_name: string;
    note: string;
    avatar?: string;
    header?: string;
    locked?: boolean;
    bot?: boolean;
    discoverable?: boolean | null;
    group?: boolean;
    created_at: string;
    last_status_at?: string | null;
    statuses_count: number;
    followers_count: number;
    following_count: number;
    emojis?: Emoji[];
    fields?: Field[];
}

export interface Tag {
    name: string;
    url: string;
    history?: Array<{ day: string; uses: string; accounts: string }>;
}

export interface FeaturedTag {
    id: string;
    name: string;
    url?: string;
    statuses_count: number | string;
    last_status_at: string | null;
}

export interface MediaAttachment {
    id: string;
    type: 'unknown' | 'image' | 'gifv' | 'video' | 'audio';
    url: string;
    preview_url?: string | null;
    description?: string | null;
}

export interface PreviewCard {
    url: string;
    title: string;
    description: string;
    type: 'link' | 'photo' | 'video' | 'rich';
    author_name?: string;
    provider_name?: string;
    image?: string | null;
}

export interface TrendLink extends PreviewCard {
    history?: Array<{ day: string; uses: string; accounts: string }>;
}

export interface PollOption {
    title: string;
    votes_count: number | null;
}

export interface Poll {
    id: string;
    expires_at: string | null;
    expired: boolean;
    multiple: boolean;
    votes_count: number;
    voters_count?: number | null;
    options: PollOption[];
    voted?: boolean;
}

export interface Status {
    id: string;
    uri: string;
    url?: string | null;
    created_at: string;
    account: Account;
    content: string;
    visibility: 'public' | 'unlisted' | 'private' | 'direct';
    sensitive: boolean;
    spoiler_text: string;
    language?: string | null;
    in_reply_to_id?: string | null;
    in_reply_to_account_id?: string | null;
    reblog?: Status | null;
    replies_count: number;
    reblogs_count: number;
    favourites_count: number;
    media_attachments?: MediaAttachment[];
    tags?: Tag[];
    card?: PreviewCard | null;
    poll?: Poll | null;
    edited_at?: string | null;
}

export interface StatusEdit {
    content: string;
    spoiler_text: string;
    sensitive: boolean;
    created_at: string;
    account: Account;
}

export interface Context {
    ancestors: Status[];
    descendants: Status[];
}

export interface Announcement {
    id: string;
    content: string;
    starts_at?: string | null;
    ends_at?: string | null;
    published_at: string;
    updated_at: string;
    all_day: boolean;
}

export interface Application {
    name: string;
    website?: string | null;
    vapid_key?: string;
}

export interface RegisteredApplication extends Application {
    id?: string;
    client_id: string;
    client_secret: string;
    redirect_uri?: string;
}

export interface Instance {
    uri: string;
    title: string;
    short_description?: string;
    description: string;
    email?: string;
    version: string;
    languages?: string[];
    registrations?: boolean;
    approval_required?: boolean;
    stats?: { user_count: number; status_count: number; domain_count: number };
    thumbnail?: string | null;
    contact_account?: Account | null;
}

export interface InstanceActivity {
    week: string;
    statuses: string;
    logins: string;
    registrations: string;
}

export interface Rule {
    id: string;
    text: string;
}

export interface NodeInfo {
    version: string;
    software: { name: string; version: string; repository?: string; homepage?: string };
    protocols: string[];
    usage?: {
        users?: { total?: number; activeMonth?: number; activeHalfyear?: number };
        localPosts?: number;
    };
    openRegistrations: boolean;
    metadata?: Record<string, unknown>;
}

export interface SearchResults {
    accounts: Account[];
    statuses: Status[];
    hashtags: Tag[];
}

export interface AccessToken {
    access_token: string;
    token_type: string;
    scope: string;
    created_at: number;
}

/**
 * One slice of a paged endpoint. `next` and `previous` hold the absolute
 * URLs advertised by the response's Link header.
 */
export interface Page<T> {
    items: T[];
    next: string | null;
    previous: string | null;
}

export interface PaginationParams {
    max_id?: string;
    min_id?: string;
    since_id?: string;
    limit?: number;
}

export interface AccountStatusesParams extends PaginationParams {
    only_media?: boolean;
    pinned?: boolean;
    exclude_replies?: boolean;
    exclude_reblogs?: boolean;
    tagged?: string;
}

export interface TimelineParams extends PaginationParams {
    local?: boolean;
    remote?: boolean;
    only_media?: boolean;
}

export interface DirectoryParams {
    offset?: number;
    limit?: number;
    order?: 'active' | 'new';
    local?: boolean;
}

export interface SearchParams {
    type?: 'accounts' | 'hashtags' | 'statuses';
    resolve?: boolean;
    following?: boolean;
    account_id?: string;
    exclude_unreviewed?: boolean;
    max_id?: string;
    min_id?: string;
    limit?: number;
    offset?: number;
}

export interface TrendParams {
    limit?: number;
    offset?: number;
}

export interface CreateAppOptions {
    clientName: string;
    scopes?: string[];
    redirectUris?: string;
    website?: string;
}
