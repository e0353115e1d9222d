import Database from 'better-sqlite3';
import { join } from 'node:path';
import { mkdirSync } from 'node:fs';

export interface AppToken {
    clientId: string;
    clientSecret: string;
    accessToken?: string;
}

type AppTokenRow = {
    host: string;
    client_id: string;
    client_secret: string;
    access_token: string | null;
};

export const APP_TOKEN_FILE = 'app_tokens.db';

/**
 * Registered-application credentials per host, kept in
 * `<home>/cache/app_tokens.db` so repeated runs reuse one app per host.
 */
export class AppTokenStore {
    readonly path: string;
    private db: Database.Database;

    constructor(homeDir: string) {
        const cacheDir = join(homeDir, 'cache');
        mkdirSync(cacheDir, { recursive: true });

        this.path = join(cacheDir, APP_TOKEN_FILE);
        this.db = new Database(this.path);
        this.db.pragma('journal_mode = WAL');

        this.initializeSchema();
    }

    private initializeSchema(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS app_tokens (
                host TEXT PRIMARY KEY,
                client_id TEXT NOT NULL,
                client_secret TEXT NOT NULL,
                access_token TEXT,
                created_at TEXT NOT NULL
            );
        `);
    }

    get(host: string): AppToken | null {
        const row = this.db
            .prepare('SELECT host, client_id, client_secret, access_token FROM app_tokens WHERE host = ?')
            .get(host) as AppTokenRow | undefined;
        return row ? toAppToken(row) : null;
    }

    set(host: string, token: AppToken): void {
        this.db.prepare(`
            INSERT INTO app_tokens (host, client_id, client_secret, access_token, created_at)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(host) DO UPDATE SET
                client_id = excluded.client_id,
                client_secret = excluded.client_secret,
                access_token = excluded.access_token
        `).run(host, token.clientId, token.clientSecret, token.accessToken ?? null, new Date().toISOString());
    }

    setAccessToken(host: string, accessToken: string | null): void {
        this.db.prepare('UPDATE app_tokens SET access_token = ? WHERE host = ?').run(accessToken, host);
    }

    close(): void {
        if (this.db.open) this.db.close();
    }
}

function toAppToken(row: AppTokenRow): AppToken {
    const token: AppToken = { clientId: row.client_id, clientSecret: row.client_secret };
    if (row.access_token) token.accessToken = row.access_token;
    return token;
}
