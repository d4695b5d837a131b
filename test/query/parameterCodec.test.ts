// test/query/parameterCodec.test.ts
import { RESULT_ARG_TYPES } from '../../src/query/argTypes';
import { convert, translate, typeOrNone, validate } from '../../src/query/parameterCodec';
import { ValueKind } from '../../src/query/valueKind';
import { ArgumentError, ErrorType } from '../../src/http-client/types';
import { errorOf } from '../helpers/errors';

const SAMPLES: Record<ValueKind, unknown> = {
    [ValueKind.STRING]: 'doc-1',
    [ValueKind.INTEGER]: 7,
    [ValueKind.BOOLEAN]: true,
    [ValueKind.SEQUENCE]: ['doc-1', 2],
    [ValueKind.MAPPING]: { a: 1 },
    [ValueKind.NULL]: null,
    [ValueKind.UNSUPPORTED]: undefined,
};

function sampleFor(key: string, kind: ValueKind): unknown {
    // stale only takes its two modes
    return key === 'stale' ? 'ok' : SAMPLES[kind];
}

describe('validate', () => {
    test('should accept every declared type for every result option', () => {
        for (const [key, kinds] of Object.entries(RESULT_ARG_TYPES)) {
            for (const kind of kinds) {
                expect(() => validate(key, sampleFor(key, kind))).not.toThrow();
            }
        }
    });

    test('should reject booleans wherever an integer is expected', () => {
        const integerOptions = Object.entries(RESULT_ARG_TYPES)
            .filter(([, kinds]) => kinds.includes(ValueKind.INTEGER))
            .map(([key]) => key);

        expect(integerOptions).toEqual(
            expect.arrayContaining(['skip', 'limit', 'group_level', 'key', 'startkey', 'endkey'])
        );
        for (const key of integerOptions) {
            expect(errorOf(() => validate(key, true))).toMatchObject({ type: ErrorType.INVALID_TYPE });
        }
    });

    test('should accept skip=5 but not skip=true', () => {
        expect(() => validate('skip', 5)).not.toThrow();
        const error = errorOf(() => validate('skip', true));
        expect(error).toBeInstanceOf(ArgumentError);
        expect(error).toMatchObject({ type: ErrorType.INVALID_TYPE });
    });

    test('should reject unknown option names', () => {
        const error = errorOf(() => validate('bogus_key', 1));
        expect(error).toMatchObject({
            type: ErrorType.UNKNOWN_OPTION,
            message: 'Invalid argument: bogus_key',
        });
    });

    test('should treat names inherited from Object.prototype as unknown', () => {
        for (const key of ['constructor', 'toString', 'hasOwnProperty', 'valueOf', '__proto__']) {
            expect(errorOf(() => validate(key, 1))).toMatchObject({
                type: ErrorType.UNKNOWN_OPTION,
                message: `Invalid argument: ${key}`,
            });
        }
    });

    test('should reject non-integer numbers for integer options', () => {
        expect(errorOf(() => validate('limit', 2.5))).toMatchObject({ type: ErrorType.INVALID_TYPE });
    });

    test('should require keys to be a list', () => {
        expect(errorOf(() => validate('keys', 'doc-1'))).toMatchObject({ type: ErrorType.INVALID_TYPE });
    });

    test('should reject boolean and mapping items in a key list', () => {
        expect(errorOf(() => validate('keys', ['a', true]))).toMatchObject({
            type: ErrorType.INVALID_KEY_LIST_ITEM,
        });
        expect(errorOf(() => validate('keys', [{ a: 1 }]))).toMatchObject({
            type: ErrorType.INVALID_KEY_LIST_ITEM,
        });
        expect(() => validate('keys', ['a', 1, ['b', 2]])).not.toThrow();
    });

    test('should only accept the two stale modes', () => {
        expect(() => validate('stale', 'ok')).not.toThrow();
        expect(() => validate('stale', 'update_after')).not.toThrow();
        expect(errorOf(() => validate('stale', 'bogus'))).toMatchObject({
            type: ErrorType.INVALID_STALE_VALUE,
            message: 'Invalid value for stale option bogus must be ok or update_after.',
        });
    });
});

describe('translate', () => {
    test('should encode booleans as literal strings', () => {
        expect(translate({ include_docs: true })).toEqual({ include_docs: 'true' });
        expect(translate({ descending: false })).toEqual({ descending: 'false' });
    });

    test('should pass integers through', () => {
        expect(translate({ limit: 5 })).toEqual({ limit: 5 });
    });

    test('should JSON-encode strings and lists', () => {
        expect(translate({ key: 'foo' })).toEqual({ key: '"foo"' });
        expect(translate({ startkey: ['a', 1] })).toEqual({ startkey: '["a",1]' });
    });

    test('should send docids, stale and keys verbatim', () => {
        expect(
            translate({
                startkey_docid: 'doc-a',
                endkey_docid: 'doc-z',
                stale: 'update_after',
                keys: ['doc-a', 'doc-b'],
            })
        ).toEqual({
            startkey_docid: 'doc-a',
            endkey_docid: 'doc-z',
            stale: 'update_after',
            keys: ['doc-a', 'doc-b'],
        });
    });

    test('should keep null for nullable options', () => {
        expect(translate({ limit: null, group_level: null })).toEqual({ limit: null, group_level: null });
    });

    test('should skip undefined entries', () => {
        expect(translate({ limit: undefined, skip: 2 })).toEqual({ skip: 2 });
    });

    test('should reject an own __proto__ entry as unknown', () => {
        const options: Record<string, unknown> = JSON.parse('{"__proto__": 1}');
        expect(errorOf(() => translate(options))).toMatchObject({
            type: ErrorType.UNKNOWN_OPTION,
            message: 'Invalid argument: __proto__',
        });
        expect(errorOf(() => translate({ constructor: 1 }))).toMatchObject({ type: ErrorType.UNKNOWN_OPTION });
    });

    test('should fail on the first invalid option', () => {
        expect(errorOf(() => translate({ bogus_key: 1 }))).toMatchObject({ type: ErrorType.UNKNOWN_OPTION });
        expect(errorOf(() => translate({ stale: 'bogus' }))).toMatchObject({
            type: ErrorType.INVALID_STALE_VALUE,
        });
    });
});

describe('convert', () => {
    test('should wrap serialization failures', () => {
        const error = errorOf(() => convert('startkey', [BigInt(1)]));
        expect(error).toMatchObject({ type: ErrorType.CONVERSION_ERROR });
        expect(error).toHaveProperty('originalError', expect.any(TypeError));
    });

    test('should reject values with no wire encoding', () => {
        expect(errorOf(() => convert('key', { a: 1 }))).toMatchObject({
            type: ErrorType.CONVERSION_ERROR,
            message: 'Error converting argument key: mapping value has no query string encoding',
        });
    });

    test('should hand pass-through options back unchanged', () => {
        const keys = ['doc-a', { nested: true }];
        expect(convert('stale', 5)).toBe(5);
        expect(convert('startkey_docid', true)).toBe(true);
        expect(convert('keys', keys)).toBe(keys);
        expect(convert('endkey_docid', { id: 'doc-z' })).toEqual({ id: 'doc-z' });
    });

    test('should refuse pass-through values with no wire form', () => {
        expect(errorOf(() => convert('stale', undefined))).toMatchObject({
            type: ErrorType.CONVERSION_ERROR,
            message: 'Error converting argument stale: unsupported value cannot be sent verbatim',
        });
    });

    test('should reject cyclic lists', () => {
        const cyclic: unknown[] = [];
        cyclic.push(cyclic);
        expect(errorOf(() => convert('key', cyclic))).toMatchObject({ type: ErrorType.CONVERSION_ERROR });
    });
});

describe('typeOrNone', () => {
    test('should accept the listed kinds and null', () => {
        expect(typeOrNone([ValueKind.STRING], 'a')).toBe(true);
        expect(typeOrNone([ValueKind.STRING], null)).toBe(true);
        expect(typeOrNone([ValueKind.STRING], 1)).toBe(false);
    });
});
