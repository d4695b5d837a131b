// src/http-client/iamSession.ts

import {
    API_CONSTANTS,
    SESSION_DEFAULTS,
    assertValidConfig,
    resolveTokenUrl,
    urlJoin,
} from './constants.js';
import { isSuccess, jsonBody } from './response.js';
import { TokenErrorSchema, TokenResponseSchema } from './schemas.js';
import { ClientSession, RenewingSession, type AuthSession, type RenewalStrategy } from './session.js';
import { ErrorType, SessionError, type HttpResponse, type IamSessionConfig } from './types.js';

const TOKEN_SERVICE_UNREACHABLE = 'Failed to contact IAM token service';
const TOKEN_EXCHANGE_FAILED = 'Failed to exchange IAM token with the database server';

/**
 * API key -> IAM access token -> IAMSession cookie.
 *
 * Renewal is proactive: with autoRenew on, a request made while no IAMSession
 * cookie is held logs in first. A 401 still triggers one login and reissue.
 */
export class IamRenewal implements RenewalStrategy {
    public readonly name = 'IamSession';
    public readonly sessionUrl: string;
    public readonly tokenUrl: string;

    constructor(
        private readonly client: ClientSession,
        private readonly apiKey: string,
        serverUrl: string,
        tokenUrl?: string
    ) {
        this.sessionUrl = urlJoin(serverUrl, API_CONSTANTS.IAM_SESSION_PATH);
        this.tokenUrl = resolveTokenUrl(tokenUrl);
    }

    public async beforeRequest(autoRenew: boolean): Promise<void> {
        this.client.cookies.clearExpired();
        if (autoRenew && !this.client.cookies.has(API_CONSTANTS.IAM_SESSION_COOKIE)) {
            await this.login();
        }
    }

    public isExpired(response: HttpResponse): boolean {
        return response.status === 401;
    }

    /**
     * Trade the API key for an access token
     */
    public async getAccessToken(): Promise<string> {
        let response: HttpResponse;
        try {
            response = await this.client.request('POST', this.tokenUrl, {
                auth: {
                    username: API_CONSTANTS.IAM_CLIENT_ID,
                    password: API_CONSTANTS.IAM_CLIENT_SECRET,
                },
                headers: { Accepts: 'application/json' },
                data: new URLSearchParams({
                    grant_type: API_CONSTANTS.IAM_GRANT_TYPE,
                    response_type: API_CONSTANTS.IAM_RESPONSE_TYPE,
                    apikey: this.apiKey,
                }),
            });
        } catch (error) {
            console.error(`[${this.name}] Token service request failed:`, error);
            throw new SessionError(ErrorType.TOKEN_SERVICE_ERROR, TOKEN_SERVICE_UNREACHABLE, error);
        }

        const body = jsonBody(response);

        // the token service reports failures in errorMessage
        if (!isSuccess(response)) {
            const failure = TokenErrorSchema.safeParse(body);
            throw new SessionError(
                ErrorType.TOKEN_SERVICE_ERROR,
                failure.success ? failure.data.errorMessage : TOKEN_SERVICE_UNREACHABLE,
                undefined,
                response.status
            );
        }

        const token = TokenResponseSchema.safeParse(body);
        if (!token.success) {
            throw new SessionError(
                ErrorType.INVALID_TOKEN_RESPONSE,
                'Invalid response from IAM token service',
                token.error,
                response.status
            );
        }
        return token.data.access_token;
    }

    public async login(): Promise<void> {
        // 1. API key -> access token
        const accessToken = await this.getAccessToken();

        // 2. access token -> IAMSession cookie, kept by the transport
        let response: HttpResponse;
        try {
            response = await this.client.request('POST', this.sessionUrl, {
                headers: { 'Content-Type': 'application/json' },
                data: JSON.stringify({ access_token: accessToken }),
            });
        } catch (error) {
            throw new SessionError(ErrorType.AUTHENTICATION_EXCHANGE_ERROR, TOKEN_EXCHANGE_FAILED, error);
        }

        if (!isSuccess(response)) {
            throw new SessionError(
                ErrorType.AUTHENTICATION_EXCHANGE_ERROR,
                TOKEN_EXCHANGE_FAILED,
                undefined,
                response.status
            );
        }
        console.log(`[${this.name}] IAM session established`);
    }

    /**
     * Local only: drop every cookie, the server is not contacted
     */
    public async logout(): Promise<void> {
        this.client.cookies.clear();
        console.log(`[${this.name}] Session cookies cleared`);
    }
}

/**
 * Create an IAM-authenticated session
 */
export function createIamSession(config: IamSessionConfig): AuthSession {
    assertValidConfig(config);

    const client = new ClientSession({ timeout: config.timeout, transport: config.transport });
    const strategy = new IamRenewal(client, config.apiKey, config.serverUrl, config.tokenUrl);

    return new RenewingSession(client, strategy, {
        serverUrl: config.serverUrl,
        autoRenew: config.autoRenew ?? SESSION_DEFAULTS.autoRenew,
    });
}
