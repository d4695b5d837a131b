// src/http-client/response.ts

import { HttpError, type HttpResponse } from './types.js';

export function isSuccess(response: HttpResponse): boolean {
    return response.status >= 200 && response.status < 300;
}

/**
 * Response body as a plain JSON object, or null when it is anything else.
 * axios leaves the body as text when it could not parse it.
 */
export function jsonBody(response: HttpResponse): Record<string, unknown> | null {
    let body: unknown = response.data;
    if (typeof body === 'string') {
        try {
            body = JSON.parse(body);
        } catch {
            return null;
        }
    }
    if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
        return Object.fromEntries(Object.entries(body));
    }
    return null;
}

function stringField(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    return typeof value === 'string' ? value : '';
}

/**
 * Response hook: for status >= 400, append the server's "{error} {reason}"
 * to the response's statusText. Bodies that are not JSON objects are left alone.
 */
export function appendResponseErrorContent(response: HttpResponse): HttpResponse {
    if (response.status < 400) {
        return response;
    }
    const body = jsonBody(response);
    if (body) {
        response.statusText += ` ${stringField(body, 'error')} ${stringField(body, 'reason')}`;
    }
    return response;
}

/**
 * Throw an HttpError for any non-2xx response
 */
export function raiseForStatus(response: HttpResponse): void {
    if (isSuccess(response)) {
        return;
    }
    const kind = response.status >= 500 ? 'Server Error' : 'Client Error';
    const url = response.config.url ?? '';
    throw new HttpError(`${response.status} ${kind}: ${response.statusText} for url: ${url}`, response);
}
