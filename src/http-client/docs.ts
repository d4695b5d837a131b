// src/http-client/docs.ts

import { translate } from '../query/parameterCodec.js';
import { raiseForStatus } from './response.js';
import type { HttpSession } from './session.js';
import type { HttpResponse } from './types.js';

export type JsonReplacer = (this: unknown, key: string, value: unknown) => unknown;

export interface GetDocsOptions {
    headers?: Record<string, string>;
    /** Query options; a `keys` entry turns the request into a POST */
    params?: Readonly<Record<string, unknown>>;
    /** Custom JSON encoding for the keys body */
    replacer?: JsonReplacer;
}

/**
 * Fetch documents from an endpoint such as _all_docs or a view.
 *
 * With `keys`, POST {"keys": [...]} as JSON; otherwise GET. The remaining
 * params are translated to query parameters either way. Throws HttpError on a
 * non-2xx response.
 */
export async function getDocs(
    session: HttpSession,
    url: string,
    options: GetDocsOptions = {}
): Promise<HttpResponse> {
    const { keys, ...rest } = options.params ?? {};
    const params = translate(rest);

    let response: HttpResponse;
    if (keys !== undefined && keys !== null) {
        const body = JSON.stringify({ keys }, options.replacer);
        response = await session.post(url, {
            headers: { ...options.headers, 'Content-Type': 'application/json' },
            params,
            data: body,
        });
    } else {
        response = await session.get(url, { headers: options.headers, params });
    }

    raiseForStatus(response);
    return response;
}
