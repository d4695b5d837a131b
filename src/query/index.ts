// src/query/index.ts

export {
    RESULT_ARG_TYPES,
    QUERY_ARG_TYPES,
    TEXT_INDEX_ARGS,
    SEARCH_INDEX_ARGS,
    STALE_VALUES,
    PASSTHROUGH_OPTIONS,
    feedArgTypes,
    type ArgTypes,
    type FeedKind,
} from './argTypes.js';
export {
    validate,
    validateArgs,
    convert,
    translate,
    typeOrNone,
    type EncodedOption,
    type EncodedOptions,
} from './parameterCodec.js';
export { ValueKind, classify, kindOf, type ClassifiedValue } from './valueKind.js';
export { codify, isCode, type Code } from './code.js';
