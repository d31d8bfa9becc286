
export interface Utils {
    isRecord(x: unknown): x is Record<string, unknown>;
    isNil<T>(x: T | null | undefined): x is null | undefined;
    notNil<T>(x: T | null | undefined): x is NonNullable<T>;
    isOwnKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T;

    // --- overload expectType
    expectType<T extends object, K extends string>(obj: T, key: K, kind: 'string'): asserts obj is T & Record<K, string>;
    expectType<T extends object, K extends string>(obj: T, key: K, kind: 'boolean'): asserts obj is T & Record<K, boolean>;

    isTrue: (x: unknown) => boolean;
    // Literal, global replacement: no RegExp and no `$&`-style patterns
    replaceAll: (text: string, search: string, replacement: string) => string;
}
