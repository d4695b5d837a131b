// src/query/valueKind.ts

/**
 * Closed set of value shapes the query encoder understands
 */
export enum ValueKind {
    STRING = 'string',
    INTEGER = 'integer',
    BOOLEAN = 'boolean',
    SEQUENCE = 'sequence',
    MAPPING = 'mapping',
    NULL = 'null',
    UNSUPPORTED = 'unsupported',
}

/**
 * A value tagged with its kind, computed once by classify()
 */
export type ClassifiedValue =
    | { kind: ValueKind.STRING; value: string }
    | { kind: ValueKind.INTEGER; value: number }
    | { kind: ValueKind.BOOLEAN; value: boolean }
    | { kind: ValueKind.SEQUENCE; value: unknown[] }
    | { kind: ValueKind.MAPPING; value: Record<string, unknown> }
    | { kind: ValueKind.NULL; value: null }
    | { kind: ValueKind.UNSUPPORTED; value: unknown };

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

export function classify(value: unknown): ClassifiedValue {
    if (value === null) {
        return { kind: ValueKind.NULL, value: null };
    }
    switch (typeof value) {
        case 'string':
            return { kind: ValueKind.STRING, value };
        case 'boolean':
            return { kind: ValueKind.BOOLEAN, value };
        case 'number':
            // floats, NaN and Infinity have no integer wire form
            return Number.isInteger(value)
                ? { kind: ValueKind.INTEGER, value }
                : { kind: ValueKind.UNSUPPORTED, value };
        case 'object':
            if (Array.isArray(value)) {
                return { kind: ValueKind.SEQUENCE, value };
            }
            if (isPlainObject(value)) {
                return { kind: ValueKind.MAPPING, value: Object.fromEntries(Object.entries(value)) };
            }
            return { kind: ValueKind.UNSUPPORTED, value };
        default:
            return { kind: ValueKind.UNSUPPORTED, value };
    }
}

export function kindOf(value: unknown): ValueKind {
    return classify(value).kind;
}
