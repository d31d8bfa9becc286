
export type TranslationValue =
  | string
  | number
  | boolean
  | null
  | readonly TranslationValue[]
  | TranslationTable;

// frozen once loaded
export interface TranslationTable {
  readonly [key: string]: TranslationValue;
}

export type TableFormat = 'yml' | 'json';

// file path in, file contents out
export type FileReader = (file: string) => string;

export type Substitutions = Record<string, unknown>;

export interface TranslatorOptions {
  format?: TableFormat;
  readFile?: FileReader;
  debug?: boolean;
}

export interface I18N {
  setLocale: (locale: string) => void;
  getLocale: () => string;
  getDefaultLocale: () => string;
  isLoaded: (locale: string) => boolean;
  loadLocale: (locale: string) => TranslationTable;
  availableLocales: () => string[];
  t: (key: string, substitutions?: Substitutions) => string;
}
