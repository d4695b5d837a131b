// src/query/parameterCodec.ts

import { ArgumentError, ErrorType } from '../http-client/types.js';
import {
    PASSTHROUGH_OPTIONS,
    RESULT_ARG_TYPES,
    STALE_VALUES,
    type ArgTypes,
} from './argTypes.js';
import { classify, ValueKind } from './valueKind.js';

/**
 * Wire form of one query option. Pass-through options keep the caller's value.
 */
export type EncodedOption = string | number | boolean | null | unknown[] | Record<string, unknown>;

export type EncodedOptions = Record<string, EncodedOption>;

function describeKinds(kinds: readonly ValueKind[]): string {
    return kinds.join(', ');
}

/**
 * Check a single option against a type table.
 * A boolean never satisfies an option that accepts integers.
 */
function checkType(table: ArgTypes, key: string, value: unknown): void {
    // own entries only; names such as constructor or __proto__ are unknown
    const kinds = Object.hasOwn(table, key) ? table[key] : undefined;
    if (!kinds) {
        throw new ArgumentError(ErrorType.UNKNOWN_OPTION, `Invalid argument: ${key}`);
    }
    const kind = classify(value).kind;
    if (!kinds.includes(kind) || (kind === ValueKind.BOOLEAN && kinds.includes(ValueKind.INTEGER))) {
        throw new ArgumentError(
            ErrorType.INVALID_TYPE,
            `Argument ${key} is not an instance of expected type: ${describeKinds(kinds)}`
        );
    }
}

/**
 * Validate one result option: known name, accepted type, well-formed key list
 * and stale mode.
 */
export function validate(key: string, value: unknown): void {
    checkType(RESULT_ARG_TYPES, key, value);

    if (key === 'keys' && Array.isArray(value)) {
        const keyKinds = RESULT_ARG_TYPES['key'] ?? [];
        for (const item of value) {
            const kind = classify(item).kind;
            if (kind === ValueKind.BOOLEAN || !keyKinds.includes(kind)) {
                throw new ArgumentError(
                    ErrorType.INVALID_KEY_LIST_ITEM,
                    `Key list element not of expected type: ${describeKinds(keyKinds)}`
                );
            }
        }
    }

    if (key === 'stale' && (typeof value !== 'string' || !STALE_VALUES.includes(value))) {
        throw new ArgumentError(
            ErrorType.INVALID_STALE_VALUE,
            `Invalid value for stale option ${String(value)} must be ok or update_after.`
        );
    }
}

/**
 * Validate options against any table (feed, _find, search index); only the
 * name and type rules apply.
 */
export function validateArgs(table: ArgTypes, options: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(options)) {
        if (value === undefined) {
            continue;
        }
        checkType(table, key, value);
    }
}

function encode(key: string, value: unknown): EncodedOption {
    const classified = classify(value);

    if (PASSTHROUGH_OPTIONS.has(key)) {
        if (classified.kind === ValueKind.UNSUPPORTED) {
            throw new TypeError(`${classified.kind} value cannot be sent verbatim`);
        }
        return classified.value;
    }

    switch (classified.kind) {
        case ValueKind.NULL:
            return null;
        case ValueKind.STRING:
        case ValueKind.SEQUENCE:
            return JSON.stringify(classified.value);
        case ValueKind.BOOLEAN:
            return classified.value ? 'true' : 'false';
        case ValueKind.INTEGER:
            return classified.value;
        default:
            throw new TypeError(`${classified.kind} value has no query string encoding`);
    }
}

/**
 * Convert one validated option to its wire form
 */
export function convert(key: string, value: unknown): EncodedOption {
    try {
        return encode(key, value);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ArgumentError(
            ErrorType.CONVERSION_ERROR,
            `Error converting argument ${key}: ${reason}`,
            error
        );
    }
}

/**
 * Translate client query options into CouchDB query parameters, e.g.
 * { include_docs: true } -> { include_docs: 'true' }.
 * Entries whose value is undefined are treated as absent.
 */
export function translate(options: Readonly<Record<string, unknown>>): EncodedOptions {
    const translation: EncodedOptions = {};
    for (const [key, value] of Object.entries(options)) {
        if (value === undefined) {
            continue;
        }
        validate(key, value);
        translation[key] = convert(key, value);
    }
    return translation;
}

/**
 * True when value is one of the given kinds or null
 */
export function typeOrNone(kinds: readonly ValueKind[], value: unknown): boolean {
    return value === null || kinds.includes(classify(value).kind);
}
