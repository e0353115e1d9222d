export interface AccountHandle {
    user: string;
    /** `null` for a bare `user`, which targets the active host. */
    host: string | null;
}

/**
 * Reduce `mastodon.social`, `https://Mastodon.Social/` or
 * `https://mastodon.social/@user` to the bare hostname.
 * Returns `null` for input that does not name a host.
 */
export function normalizeHost(input: string): string | null {
    const trimmed = input.trim();
    if (!trimmed) return null;
    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
    try {
        const hostname = new URL(withScheme).hostname;
        return hostname || null;
    } catch {
        return null;
    }
}

/**
 * Parse `user`, `@user`, `user@host` or `@user@host`.
 * Returns `null` for a handle with more than one host part or an empty segment.
 */
export function parseAccountHandle(acct: string): AccountHandle | null {
    const handle = acct.trim().replace(/^@/, '');
    const parts = handle.split('@');
    if (parts.some((part) => part.length === 0)) return null;

    if (parts.length === 1) {
        return { user: parts[0], host: null };
    }
    if (parts.length === 2) {
        const host = normalizeHost(parts[1]);
        return host ? { user: parts[0], host } : null;
    }
    return null;
}

export function formatAccountHandle(user: string, host: string): string {
    return `${user}@${host}`;
}
