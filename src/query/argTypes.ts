// src/query/argTypes.ts

import { ValueKind } from './valueKind.js';

/**
 * Option name -> value kinds the server accepts for it
 */
export type ArgTypes = Readonly<Record<string, readonly ValueKind[]>>;

const { STRING, INTEGER, BOOLEAN, SEQUENCE, MAPPING, NULL } = ValueKind;

const KEY_TYPES = [INTEGER, STRING, SEQUENCE] as const;

/**
 * Options accepted by result-returning endpoints (_all_docs, views)
 */
export const RESULT_ARG_TYPES: ArgTypes = {
    descending: [BOOLEAN],
    endkey: KEY_TYPES,
    endkey_docid: [STRING],
    group: [BOOLEAN],
    group_level: [INTEGER, NULL],
    include_docs: [BOOLEAN],
    inclusive_end: [BOOLEAN],
    key: KEY_TYPES,
    keys: [SEQUENCE],
    limit: [INTEGER, NULL],
    reduce: [BOOLEAN],
    skip: [INTEGER, NULL],
    stale: [STRING],
    startkey: KEY_TYPES,
    startkey_docid: [STRING],
};

/** Values accepted by the stale option */
export const STALE_VALUES: readonly string[] = ['ok', 'update_after'];

/**
 * Options whose values go on the wire unchanged instead of JSON-encoded
 */
export const PASSTHROUGH_OPTIONS: ReadonlySet<string> = new Set([
    'keys',
    'endkey_docid',
    'startkey_docid',
    'stale',
]);

const COUCH_DB_UPDATES_ARG_TYPES: ArgTypes = {
    feed: [STRING],
    heartbeat: [BOOLEAN],
    timeout: [INTEGER, NULL],
};

const DB_UPDATES_ARG_TYPES: ArgTypes = {
    descending: [BOOLEAN],
    limit: [INTEGER, NULL],
    since: [INTEGER, STRING],
    ...COUCH_DB_UPDATES_ARG_TYPES,
    // the global feed takes a heartbeat interval, not a flag
    heartbeat: [INTEGER, NULL],
};

const CHANGES_ARG_TYPES: ArgTypes = {
    conflicts: [BOOLEAN],
    doc_ids: [SEQUENCE],
    filter: [STRING],
    include_docs: [BOOLEAN],
    style: [STRING],
    ...DB_UPDATES_ARG_TYPES,
};

/**
 * Options accepted by the _find query endpoint
 */
export const QUERY_ARG_TYPES: ArgTypes = {
    selector: [MAPPING],
    limit: [INTEGER, NULL],
    skip: [INTEGER, NULL],
    sort: [SEQUENCE],
    fields: [SEQUENCE],
    r: [INTEGER, NULL],
    bookmark: [STRING],
    use_index: [STRING],
};

export const TEXT_INDEX_ARGS: ArgTypes = {
    fields: [SEQUENCE],
    default_field: [MAPPING],
    selector: [MAPPING],
};

export const SEARCH_INDEX_ARGS: ArgTypes = {
    bookmark: [STRING],
    counts: [SEQUENCE],
    drilldown: [SEQUENCE],
    group_field: [STRING],
    group_limit: [INTEGER, NULL],
    group_sort: [STRING, SEQUENCE],
    include_docs: [BOOLEAN],
    limit: [INTEGER, NULL],
    query: [STRING, INTEGER],
    q: [STRING, INTEGER],
    ranges: [MAPPING],
    sort: [STRING, SEQUENCE],
    stale: [STRING],
    highlight_fields: [SEQUENCE],
    highlight_pre_tag: [STRING],
    highlight_post_tag: [STRING],
    highlight_number: [INTEGER, NULL],
    highlight_size: [INTEGER, NULL],
    include_fields: [SEQUENCE],
};

/**
 * 'Cloudant': the global _db_updates feed.
 * 'CouchDB': the plain CouchDB _db_updates feed.
 * Anything else: a database _changes feed.
 */
export type FeedKind = 'Cloudant' | 'CouchDB' | 'changes';

export function feedArgTypes(feedKind: FeedKind | string): ArgTypes {
    if (feedKind === 'Cloudant') {
        return DB_UPDATES_ARG_TYPES;
    }
    if (feedKind === 'CouchDB') {
        return COUCH_DB_UPDATES_ARG_TYPES;
    }
    return CHANGES_ARG_TYPES;
}
