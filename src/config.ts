import { z } from 'zod';
import 'dotenv/config';

const flag = (fallback: boolean) =>
    z.enum(['true', 'false', '1', '0', 'yes', 'no'])
        .optional()
        .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1' || value === 'yes'));

/**
 * Environment variable schema with validation
 */
const configSchema = z.object({
    // Home directory for the app-token cache (defaults to the working directory)
    SWITCHER_HOME_DIR: z.string().min(1).optional(),
    SWITCHER_USE_APP_TOKENS: flag(false),

    // Application registration
    SWITCHER_APP_NAME: z.string().min(1).default('fedi-switcher'),
    SWITCHER_APP_SCOPES: z.string().min(1).default('read'),
    SWITCHER_APP_WEBSITE: z.string().url().optional(),

    // Client behavior
    SWITCHER_VERSION_CHECK: flag(true),
    SWITCHER_REQUEST_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
    SWITCHER_USER_AGENT: z.string().min(1).optional(),

    SWITCHER_DEBUG: flag(false),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate configuration from environment variables.
 * Throws on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = configSchema.safeParse(env);

    if (!result.success) {
        const errors = result.error.issues
            .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
            .join('\n');
        throw new Error(`Configuration validation failed:\n${errors}`);
    }

    return result.data;
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the current config instance.
 * Loads config on first call.
 */
export function getConfig(): Config {
    if (!_config) {
        _config = loadConfig();
    }
    return _config;
}

/**
 * Reload configuration from environment.
 */
export function reloadConfig(): Config {
    _config = loadConfig();
    return _config;
}

/**
 * Split the comma or space separated scope list.
 */
export function parseScopes(scopes: string): string[] {
    return scopes.split(/[\s,]+/).map((scope) => scope.trim()).filter(Boolean);
}
