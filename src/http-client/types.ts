// src/http-client/types.ts

import type { AxiosInstance, AxiosResponse } from 'axios';
import type { CookieStore } from './cookieStore.js';

/**
 * Error type enumeration
 */
export enum ErrorType {
    // query option encoding
    UNKNOWN_OPTION = 'UNKNOWN_OPTION',
    INVALID_TYPE = 'INVALID_TYPE',
    INVALID_KEY_LIST_ITEM = 'INVALID_KEY_LIST_ITEM',
    INVALID_STALE_VALUE = 'INVALID_STALE_VALUE',
    CONVERSION_ERROR = 'CONVERSION_ERROR',
    // session authentication
    AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',
    AUTHENTICATION_EXCHANGE_ERROR = 'AUTHENTICATION_EXCHANGE_ERROR',
    TOKEN_SERVICE_ERROR = 'TOKEN_SERVICE_ERROR',
    INVALID_TOKEN_RESPONSE = 'INVALID_TOKEN_RESPONSE',
    // everything else
    CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
    HTTP_ERROR = 'HTTP_ERROR',
}

/**
 * Base class for every error raised by this library
 */
export class ClientError extends Error {
    constructor(
        public type: ErrorType,
        message: string,
        public originalError?: unknown
    ) {
        super(message);
        this.name = 'ClientError';
    }
}

/**
 * Raised synchronously while validating or encoding query options
 */
export class ArgumentError extends ClientError {
    constructor(type: ErrorType, message: string, originalError?: unknown) {
        super(type, message, originalError);
        this.name = 'ArgumentError';
    }
}

/**
 * Raised by login / logout / info and by the IAM token exchange
 */
export class SessionError extends ClientError {
    constructor(
        type: ErrorType,
        message: string,
        originalError?: unknown,
        public status?: number
    ) {
        super(type, message, originalError);
        this.name = 'SessionError';
    }
}

export class ConfigurationError extends ClientError {
    constructor(message: string, originalError?: unknown) {
        super(ErrorType.CONFIGURATION_ERROR, message, originalError);
        this.name = 'ConfigurationError';
    }
}

/**
 * Non-2xx response surfaced by raiseForStatus()
 */
export class HttpError extends ClientError {
    public readonly status: number;

    constructor(message: string, public response: HttpResponse) {
        super(ErrorType.HTTP_ERROR, message);
        this.name = 'HttpError';
        this.status = response.status;
    }
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD' | 'PATCH';

export type HttpResponse<T = unknown> = AxiosResponse<T>;

/** Query parameter value after encoding; null and undefined entries are dropped */
export type QueryParamValue =
    | string
    | number
    | boolean
    | null
    | undefined
    | readonly unknown[]
    | Readonly<Record<string, unknown>>;

export interface BasicAuth {
    username: string;
    password: string;
}

/**
 * Options accepted by every request issued through a transport or session
 */
export interface RequestOptions {
    headers?: Record<string, string>;
    params?: Record<string, QueryParamValue>;
    data?: unknown;
    /** Milliseconds; ignored when the session has its own timeout */
    timeout?: number;
    auth?: BasicAuth;
}

export type ResponseHook = (response: HttpResponse) => HttpResponse;

export interface TransportConfig {
    /** Pre-configured axios instance, e.g. with a custom adapter */
    axiosInstance?: AxiosInstance;
    userAgent?: string;
    responseHooks?: ResponseHook[];
}

/**
 * Anything that can put a request on the wire and owns a cookie store
 */
export interface Transport {
    readonly cookies: CookieStore;
    request(method: HttpMethod, url: string, options?: RequestOptions): Promise<HttpResponse>;
}

/**
 * Session configuration shared by both authentication variants
 */
export interface SessionConfig {
    serverUrl: string;
    /** Fixed timeout in milliseconds applied to every request */
    timeout?: number;
    autoRenew?: boolean;
    transport?: Transport;
}

export interface CookieSessionConfig extends SessionConfig {
    username: string;
    password: string;
}

export interface IamSessionConfig extends SessionConfig {
    apiKey: string;
    /** Defaults to IAM_TOKEN_URL from the environment, then the public endpoint */
    tokenUrl?: string;
}

/**
 * Body of GET /_session and GET /_iam_session
 */
export interface SessionInfo {
    ok?: boolean;
    userCtx?: {
        name: string | null;
        roles: string[];
    };
    info?: Record<string, unknown>;
    [key: string]: unknown;
}
