export interface PageLinks {
    next: string | null;
    previous: string | null;
}

/**
 * Pull the `next` and `prev` targets out of an RFC 8288 Link header, e.g.
 * `<https://host/api/v1/timelines/public?max_id=10>; rel="next"`.
 */
export function parseLinkHeader(header: string | null): PageLinks {
    const links: PageLinks = { next: null, previous: null };
    if (!header) return links;

    for (const part of header.split(',')) {
        const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);
        if (!match) continue;
        const [, url, rel] = match;
        for (const name of rel.trim().split(/\s+/)) {
            if (name === 'next') links.next = url;
            if (name === 'prev' || name === 'previous') links.previous = url;
        }
    }
    return links;
}

/**
 * Serialize request parameters the way the Mastodon API reads them:
 * booleans as true/false, arrays as repeated `key[]` entries, unset values dropped.
 */
export function buildQuery(params: object = {}): string {
    const search = new URLSearchParams();
    for (const [key, raw] of Object.entries(params)) {
        const value: unknown = raw;
        if (value === undefined || value === null) continue;
        if (Array.isArray(value)) {
            for (const item of value) search.append(`${key}[]`, String(item));
        } else {
            search.append(key, String(value));
        }
    }
    const query = search.toString();
    return query ? `?${query}` : '';
}
