import * as fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { utils } from './utils';
import type { Readers } from '../interfaces/readers';
import type { TranslationTable, TranslationValue } from '../interfaces/i18n';

function isTranslationValue(x: unknown): x is TranslationValue {
    if (x === null) return true;
    switch (typeof x) {
        case 'string':
        case 'boolean':
        case 'number':
            // .inf and .nan included
            return true;
        case 'object':
            if (Array.isArray(x)) return x.every(isTranslationValue);
            return isTranslationTable(x);
        default:
            return false;
    }
}

function isTranslationTable(x: unknown): x is TranslationTable {
    return utils.isRecord(x) && Object.values(x).every(isTranslationValue);
}

// Cached tables are handed out by Translator.loadLocale; nothing may change them
function deepFreeze(value: TranslationValue): void {
    if (typeof value === 'object' && value !== null) {
        Object.values(value).forEach(deepFreeze);
        Object.freeze(value);
    }
}

export const readers: Readers = {

    formats: ['yml', 'json'],

    toTable: function(parsed) {
        // an empty document is an empty table, not an error
        if (utils.isNil(parsed)) {
            const empty: TranslationTable = {};
            return Object.freeze(empty);
        }
        if (!utils.isRecord(parsed)) {
            const kind = Array.isArray(parsed) ? 'list' : typeof parsed;
            throw new Error(`Expected a mapping at the top level, got ${kind}`);
        }
        if (!isTranslationTable(parsed)) {
            throw new Error('Document contains values that are not strings, numbers, booleans, lists or mappings');
        }
        deepFreeze(parsed);
        return parsed;
    },

    yml: function(text) {
        const parsed: unknown = parseYaml(text, { merge: true, uniqueKeys: false });
        return readers.toTable(parsed);
    },

    json: function(text) {
        if (text.trim().length === 0) return {};
        const parsed: unknown = JSON.parse(text);
        return readers.toTable(parsed);
    },

    parse: function(format, text) {
        return format === 'json' ? readers.json(text) : readers.yml(text);
    },

    readUtf8: function(file) {
        return fs.readFileSync(file, 'utf8');
    },
};

export default readers;
