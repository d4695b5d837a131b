// src/http-client/transport.ts

import axios, { type AxiosInstance } from 'axios';
import { CookieStore } from './cookieStore.js';
import { USER_AGENT } from './constants.js';
import { appendResponseErrorContent } from './response.js';
import type {
    HttpMethod,
    HttpResponse,
    RequestOptions,
    ResponseHook,
    Transport,
    TransportConfig,
} from './types.js';

/**
 * axios-backed transport with its own cookie store.
 * Every status code resolves; deciding what a 4xx means is up to the session.
 */
export class HttpTransport implements Transport {
    public readonly cookies: CookieStore = new CookieStore();
    private readonly client: AxiosInstance;
    private readonly userAgent: string;
    private readonly responseHooks: ResponseHook[];

    constructor(config: TransportConfig = {}) {
        this.client = config.axiosInstance ?? axios.create();
        this.userAgent = config.userAgent ?? USER_AGENT;
        this.responseHooks = config.responseHooks ?? [appendResponseErrorContent];
    }

    public async request(
        method: HttpMethod,
        url: string,
        options: RequestOptions = {}
    ): Promise<HttpResponse> {
        const headers: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...options.headers,
        };

        const cookieHeader = this.cookies.headerFor(url);
        if (cookieHeader && !this._hasHeader(headers, 'cookie')) {
            headers['Cookie'] = cookieHeader;
        }

        const response = await this.client.request<unknown>({
            method,
            url,
            headers,
            params: options.params,
            data: options.data,
            timeout: options.timeout,
            auth: options.auth,
            validateStatus: () => true,
        });

        this._storeCookies(response, url);

        return this.responseHooks.reduce<HttpResponse>((current, hook) => hook(current), response);
    }

    private _storeCookies(response: HttpResponse, url: string): void {
        const setCookieHeader: unknown = response.headers['set-cookie'];
        let values: string[] = [];

        if (Array.isArray(setCookieHeader)) {
            values = setCookieHeader.filter((v): v is string => typeof v === 'string');
        } else if (typeof setCookieHeader === 'string') {
            values = [setCookieHeader];
        }

        if (values.length > 0) {
            this.cookies.setFromHeaders(values, url);
        }
    }

    private _hasHeader(headers: Record<string, string>, name: string): boolean {
        return Object.keys(headers).some(key => key.toLowerCase() === name);
    }
}
