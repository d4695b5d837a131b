// src/query/code.ts

/**
 * JavaScript source (a map or reduce function) as opposed to a plain string
 */
export interface Code {
    readonly kind: 'code';
    readonly source: string;
}

export function isCode(value: unknown): value is Code {
    return (
        typeof value === 'object' &&
        value !== null &&
        'kind' in value &&
        value.kind === 'code' &&
        'source' in value &&
        typeof value.source === 'string'
    );
}

/**
 * Wrap a string as Code; Code values are returned as they are
 */
export function codify(codeOrString: string | Code): Code;
export function codify(codeOrString: null | undefined): null;
export function codify(codeOrString: string | Code | null | undefined): Code | null;
export function codify(codeOrString: string | Code | null | undefined): Code | null {
    if (codeOrString === null || codeOrString === undefined) {
        return null;
    }
    if (isCode(codeOrString)) {
        return codeOrString;
    }
    return { kind: 'code', source: codeOrString };
}
