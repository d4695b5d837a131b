// src/http-client/cookieSession.ts

import { API_CONSTANTS, SESSION_DEFAULTS, assertValidConfig, urlJoin } from './constants.js';
import { isSuccess, jsonBody } from './response.js';
import { ClientSession, RenewingSession, type AuthSession, type RenewalStrategy } from './session.js';
import { ErrorType, SessionError, type CookieSessionConfig, type HttpResponse } from './types.js';

/**
 * Username/password login against /_session; the server answers with an
 * AuthSession cookie that the transport keeps.
 */
export class CookieRenewal implements RenewalStrategy {
    public readonly name = 'CookieSession';
    public readonly sessionUrl: string;

    constructor(
        private readonly client: ClientSession,
        private readonly username: string,
        private readonly password: string,
        serverUrl: string
    ) {
        this.sessionUrl = urlJoin(serverUrl, API_CONSTANTS.SESSION_PATH);
    }

    /**
     * 401, or 403 with error "credentials_expired"
     */
    public isExpired(response: HttpResponse): boolean {
        if (response.status === 401) {
            return true;
        }
        if (response.status === 403) {
            return jsonBody(response)?.['error'] === API_CONSTANTS.CREDENTIALS_EXPIRED;
        }
        return false;
    }

    public async login(): Promise<void> {
        const response = await this.client.request('POST', this.sessionUrl, {
            data: new URLSearchParams({ name: this.username, password: this.password }),
        });
        this._assertSuccess(response, 'login');
        console.log(`[${this.name}] Logged in as ${this.username}`);
    }

    public async logout(): Promise<void> {
        const response = await this.client.request('DELETE', this.sessionUrl);
        this._assertSuccess(response, 'logout');
        console.log(`[${this.name}] Logged out ${this.username}`);
    }

    private _assertSuccess(response: HttpResponse, action: string): void {
        if (isSuccess(response)) {
            return;
        }
        throw new SessionError(
            ErrorType.AUTHENTICATION_ERROR,
            `Cookie ${action} failed: ${response.status} ${response.statusText}`,
            undefined,
            response.status
        );
    }
}

/**
 * Create a cookie-authenticated session. Nothing is sent until login() or the
 * first request.
 */
export function createCookieSession(config: CookieSessionConfig): AuthSession {
    assertValidConfig(config);

    const client = new ClientSession({ timeout: config.timeout, transport: config.transport });
    const strategy = new CookieRenewal(client, config.username, config.password, config.serverUrl);

    return new RenewingSession(client, strategy, {
        serverUrl: config.serverUrl,
        autoRenew: config.autoRenew ?? SESSION_DEFAULTS.autoRenew,
    });
}
