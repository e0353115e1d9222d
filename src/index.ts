/**
 * fedi-switcher
 *
 * One object for reading accounts and instances across many Mastodon hosts.
 */

export { InstanceSwitcher } from './switcher/instance-switcher.js';
export type { AccountRef, HostRef, InstanceSwitcherOptions } from './switcher/instance-switcher.js';
export { InstanceSwitcherError } from './switcher/errors.js';
export type { SwitcherErrorKind } from './switcher/errors.js';
export { normalizeHost, parseAccountHandle, formatAccountHandle } from './switcher/account-handle.js';
export type { AccountHandle } from './switcher/account-handle.js';

export { MastodonClient, compareVersions, normalizeVersion } from './mastodon/client.js';
export type { MastodonClientOptions } from './mastodon/client.js';
export { MastodonApiError } from './mastodon/errors.js';
export type * from './mastodon/types.js';

export { AppTokenStore } from './state/app-tokens.js';
export type { AppToken } from './state/app-tokens.js';

export { getConfig, loadConfig, reloadConfig } from './config.js';
export type { Config } from './config.js';
export { createConsoleLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
