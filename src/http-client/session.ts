// src/http-client/session.ts

import { HttpTransport } from './transport.js';
import { isSuccess, jsonBody } from './response.js';
import { SessionInfoSchema } from './schemas.js';
import {
    ErrorType,
    SessionError,
    type HttpMethod,
    type HttpResponse,
    type RequestOptions,
    type SessionInfo,
    type Transport,
} from './types.js';
import type { CookieStore } from './cookieStore.js';

/**
 * Anything that issues HTTP requests
 */
export interface HttpSession {
    readonly cookies: CookieStore;
    request(method: HttpMethod, url: string, options?: RequestOptions): Promise<HttpResponse>;
    get(url: string, options?: RequestOptions): Promise<HttpResponse>;
    post(url: string, options?: RequestOptions): Promise<HttpResponse>;
    put(url: string, options?: RequestOptions): Promise<HttpResponse>;
    delete(url: string, options?: RequestOptions): Promise<HttpResponse>;
    head(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

/**
 * An HttpSession that can authenticate itself and renew its credentials
 */
export interface AuthSession extends HttpSession {
    readonly serverUrl: string;
    readonly autoRenew: boolean;
    login(): Promise<void>;
    logout(): Promise<void>;
    info(): Promise<SessionInfo>;
}

/**
 * How a session establishes credentials and recognises that they lapsed
 */
export interface RenewalStrategy {
    /** Log prefix, e.g. CookieSession */
    readonly name: string;
    /** Endpoint answering GET with the current session info */
    readonly sessionUrl: string;
    /** Runs before every request, ahead of the expiry check */
    beforeRequest?(autoRenew: boolean): Promise<void>;
    isExpired(response: HttpResponse): boolean;
    login(): Promise<void>;
    logout(): Promise<void>;
}

type Send = (method: HttpMethod, url: string, options?: RequestOptions) => Promise<HttpResponse>;

/**
 * Shared verb helpers; subclasses only decide how request() goes out
 */
abstract class SessionVerbs {
    public abstract get cookies(): CookieStore;

    public abstract request(method: HttpMethod, url: string, options?: RequestOptions): Promise<HttpResponse>;

    public get(url: string, options?: RequestOptions): Promise<HttpResponse> {
        return this.request('GET', url, options);
    }

    public post(url: string, options?: RequestOptions): Promise<HttpResponse> {
        return this.request('POST', url, options);
    }

    public put(url: string, options?: RequestOptions): Promise<HttpResponse> {
        return this.request('PUT', url, options);
    }

    public delete(url: string, options?: RequestOptions): Promise<HttpResponse> {
        return this.request('DELETE', url, options);
    }

    public head(url: string, options?: RequestOptions): Promise<HttpResponse> {
        return this.request('HEAD', url, options);
    }
}

/**
 * Plain session: forwards to the transport with the session timeout injected.
 * Never retries and never renews.
 */
export class ClientSession extends SessionVerbs implements HttpSession {
    public readonly transport: Transport;
    public readonly timeout?: number;

    constructor(options: { timeout?: number; transport?: Transport } = {}) {
        super();
        this.transport = options.transport ?? new HttpTransport();
        this.timeout = options.timeout;
    }

    public get cookies(): CookieStore {
        return this.transport.cookies;
    }

    public request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<HttpResponse> {
        return this.transport.request(method, url, {
            ...options,
            timeout: this.timeout ?? options.timeout,
        });
    }
}

/**
 * Issue a request, renewing credentials and reissuing once when the strategy
 * says they lapsed. The reissued response is returned whatever its status.
 */
export async function dispatchWithRenewal(
    send: Send,
    strategy: RenewalStrategy,
    autoRenew: boolean,
    method: HttpMethod,
    url: string,
    options?: RequestOptions
): Promise<HttpResponse> {
    // 1. let the strategy refresh credentials up front
    if (strategy.beforeRequest) {
        await strategy.beforeRequest(autoRenew);
    }

    // 2. send and keep anything that is not an expiry
    const response = await send(method, url, options);
    if (!autoRenew || !strategy.isExpired(response)) {
        return response;
    }

    // 3. renew and reissue exactly once
    console.warn(`[${strategy.name}] ${method} ${url} returned ${response.status}, renewing session`);
    await strategy.login();
    return send(method, url, options);
}

/**
 * The authenticated session; cookie and IAM variants differ only in strategy
 */
export class RenewingSession extends SessionVerbs implements AuthSession {
    public readonly serverUrl: string;
    public readonly autoRenew: boolean;

    constructor(
        private readonly client: ClientSession,
        private readonly strategy: RenewalStrategy,
        options: { serverUrl: string; autoRenew: boolean }
    ) {
        super();
        this.serverUrl = options.serverUrl;
        this.autoRenew = options.autoRenew;
    }

    public get cookies(): CookieStore {
        return this.client.cookies;
    }

    public request(method: HttpMethod, url: string, options?: RequestOptions): Promise<HttpResponse> {
        return dispatchWithRenewal(
            (m, u, o) => this.client.request(m, u, o),
            this.strategy,
            this.autoRenew,
            method,
            url,
            options
        );
    }

    public login(): Promise<void> {
        return this.strategy.login();
    }

    public logout(): Promise<void> {
        return this.strategy.logout();
    }

    /**
     * Current session info from the server
     */
    public async info(): Promise<SessionInfo> {
        const response = await this.get(this.strategy.sessionUrl);
        if (!isSuccess(response)) {
            throw new SessionError(
                ErrorType.AUTHENTICATION_ERROR,
                `Failed to get session info: ${response.status} ${response.statusText}`,
                undefined,
                response.status
            );
        }

        const parsed = SessionInfoSchema.safeParse(jsonBody(response));
        if (!parsed.success) {
            throw new SessionError(
                ErrorType.AUTHENTICATION_ERROR,
                'Invalid session info returned by server',
                parsed.error,
                response.status
            );
        }
        return parsed.data;
    }
}
