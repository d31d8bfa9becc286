// PURE utilities functions, no side effects, no dependencies

import type { Utils } from '../interfaces/utils';

const TRUE_SET = new Set(['true', 't', '1']); // , 'yes', 'y', 'on'

export const utils: Utils = {
    // ---- inline typing necessary below ----

        isRecord: function(x: unknown): x is Record<string, unknown> {
            // arrays are objects too, but never a mapping of keys
            return typeof x === 'object' && x !== null && !Array.isArray(x);
        },

        isNil: function<T>(x: T | null | undefined): x is null | undefined {
            return x === null || x === undefined;
        },

        notNil: function<T>(x: T | null | undefined): x is NonNullable<T> {
            // NonNullable: x is neither null nor undefined, at the same time
            return x !== null && x !== undefined;
        },

        isOwnKeyOf: function <T extends object>(obj: T, key: PropertyKey): key is keyof T {
            if (!obj) return false;
            // inherited members ('constructor', 'toString') are not keys
            return Object.prototype.hasOwnProperty.call(obj, key);
        },

        // Overloaded primitive type expectation helper
        expectType: (function() {
            function expectType<T extends object, K extends string>(obj: T, key: K, kind: 'string'): asserts obj is T & Record<K, string>;
            function expectType<T extends object, K extends string>(obj: T, key: K, kind: 'boolean'): asserts obj is T & Record<K, boolean>;
            function expectType(obj: object, key: string, kind: 'string' | 'boolean') {
                if (!obj || !(key in obj)) {
                    throw new Error(`Missing property "${key}"`);
                }
                const v: unknown = Reflect.get(obj, key);
                if (typeof v !== kind) {
                    throw new Error(`Expected "${key}" to be ${kind}, got ${typeof v}`);
                }
            }
            return expectType;
        })(),
    // ---- end of necessary inline typing ----

    isTrue: function(x) {
        if (utils.isNil(x)) {
            return false;
        }
        if (typeof x === 'boolean') return x === true;
        if (typeof x === 'number') return x === 1;
        if (typeof x === 'string') {
            return TRUE_SET.has(x.trim().toLowerCase());
        }
        return false;
    },

    replaceAll: function(text, search, replacement) {
        if (search.length === 0) return text;
        return text.split(search).join(replacement);
    }
};
