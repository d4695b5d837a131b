// src/http-client/constants.ts

import os from 'node:os';
import { ConfigurationError, type SessionConfig } from './types.js';

export const LIBRARY_NAME = 'couch-request-kit';
export const LIBRARY_VERSION = '0.1.0';

/**
 * User-Agent sent with every request, e.g.
 * couch-request-kit/0.1.0/Node/v20.11.1/linux/x64
 */
export const USER_AGENT = [
    LIBRARY_NAME,
    LIBRARY_VERSION,
    'Node',
    process.version,
    os.platform(),
    os.arch(),
].join('/');

/**
 * Server endpoints, cookie names and IAM protocol constants
 */
export const API_CONSTANTS = {
    SESSION_PATH: '_session',
    IAM_SESSION_PATH: '_iam_session',
    AUTH_SESSION_COOKIE: 'AuthSession',
    IAM_SESSION_COOKIE: 'IAMSession',
    DEFAULT_IAM_TOKEN_URL: 'https://iam.bluemix.net/oidc/token',
    IAM_TOKEN_URL_ENV: 'IAM_TOKEN_URL',
    // fixed client credentials the token service requires for user API keys
    IAM_CLIENT_ID: 'bx',
    IAM_CLIENT_SECRET: 'bx',
    IAM_GRANT_TYPE: 'urn:ibm:params:oauth:grant-type:apikey',
    IAM_RESPONSE_TYPE: 'cloud_iam',
    CREDENTIALS_EXPIRED: 'credentials_expired',
} as const;

export const SESSION_DEFAULTS = {
    autoRenew: false,
} as const;

/**
 * Resolve the token endpoint: explicit value, then IAM_TOKEN_URL, then the default
 */
export function resolveTokenUrl(
    explicit?: string,
    env: NodeJS.ProcessEnv = process.env
): string {
    return explicit ?? env[API_CONSTANTS.IAM_TOKEN_URL_ENV] ?? API_CONSTANTS.DEFAULT_IAM_TOKEN_URL;
}

/**
 * Join a server base URL and a path segment with exactly one slash between them
 */
export function urlJoin(base: string, path: string): string {
    return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * Validate session configuration
 */
export function validateConfig(config: SessionConfig): boolean {
    if (!config.serverUrl) {
        return false;
    }
    try {
        const url = new URL(config.serverUrl);
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            return false;
        }
    } catch {
        return false;
    }
    if (config.timeout !== undefined && (!Number.isFinite(config.timeout) || config.timeout <= 0)) {
        return false;
    }
    return true;
}

export function assertValidConfig(config: SessionConfig): void {
    if (!validateConfig(config)) {
        throw new ConfigurationError(`Invalid session configuration for ${config.serverUrl || '<empty url>'}`);
    }
}
