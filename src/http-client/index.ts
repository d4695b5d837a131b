// src/http-client/index.ts

/**
 * HTTP session module exports
 */

export { ClientSession, RenewingSession, dispatchWithRenewal } from './session.js';
export type { HttpSession, AuthSession, RenewalStrategy } from './session.js';
export { CookieRenewal, createCookieSession } from './cookieSession.js';
export { IamRenewal, createIamSession } from './iamSession.js';
export { HttpTransport } from './transport.js';
export { CookieStore, type Cookie } from './cookieStore.js';
export { getDocs, type GetDocsOptions, type JsonReplacer } from './docs.js';
export { appendResponseErrorContent, raiseForStatus, isSuccess, jsonBody } from './response.js';
export {
    ErrorType,
    ClientError,
    ArgumentError,
    SessionError,
    ConfigurationError,
    HttpError,
    type HttpMethod,
    type HttpResponse,
    type QueryParamValue,
    type BasicAuth,
    type RequestOptions,
    type ResponseHook,
    type Transport,
    type TransportConfig,
    type SessionConfig,
    type CookieSessionConfig,
    type IamSessionConfig,
    type SessionInfo,
} from './types.js';
export {
    USER_AGENT,
    API_CONSTANTS,
    SESSION_DEFAULTS,
    resolveTokenUrl,
    urlJoin,
    validateConfig,
} from './constants.js';
