import * as fs from 'fs';
import * as path from 'path';
import { readers } from '../library/readers';
import { utils } from '../library/utils';
import type {
  I18N,
  FileReader,
  Substitutions,
  TableFormat,
  TranslationTable,
  TranslationValue,
  TranslatorOptions,
} from '../interfaces/i18n';

export class LoadError extends Error {
  public readonly locale: string;
  public readonly file: string;
  constructor(locale: string, file: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot load translations for locale "${locale}" from ${file}: ${reason}`, { cause });
    this.name = 'LoadError';
    this.locale = locale;
    this.file = file;
    Object.setPrototypeOf(this, LoadError.prototype);
  }
}

export class Translator implements I18N {
  public readonly translationsDir: string;
  public readonly defaultLocale: string;
  public readonly format: TableFormat;
  private readonly readFile: FileReader;
  private readonly debug: boolean;
  private readonly dictionaries = new Map<string, TranslationTable>();
  private currentLocale: string;

  constructor(translationsDir = 'locales', defaultLocale = 'en', options: TranslatorOptions = {}) {
    this.translationsDir = translationsDir;
    this.defaultLocale = defaultLocale;
    this.format = options.format ?? 'yml';
    this.readFile = options.readFile ?? readers.readUtf8;
    this.debug = options.debug ?? false;
    this.currentLocale = defaultLocale;
    this.loadLocale(defaultLocale);
  }

  fileFor(locale: string): string {
    return path.join(this.translationsDir, `${locale}.${this.format}`);
  }

  loadLocale(locale: string): TranslationTable {
    const cached = this.dictionaries.get(locale);
    if (cached) return cached;
    const file = this.fileFor(locale);
    let table: TranslationTable;
    try {
      table = readers.parse(this.format, this.readFile(file));
    } catch (error) {
      throw new LoadError(locale, file, error);
    }
    this.dictionaries.set(locale, table);
    if (this.debug) console.log(`[I18n] Loaded locale "${locale}" from: ${file}`);
    return table;
  }

  // The locale switches even when its file then fails to load; lookups
  // against it miss and fall through to the default locale.
  setLocale(locale: string): void {
    this.currentLocale = locale;
    this.loadLocale(locale);
  }

  getLocale(): string {
    return this.currentLocale;
  }

  getDefaultLocale(): string {
    return this.defaultLocale;
  }

  isLoaded(locale: string): boolean {
    return this.dictionaries.has(locale);
  }

  availableLocales(): string[] {
    const ext = `.${this.format}`;
    try {
      return fs
        .readdirSync(this.translationsDir)
        .filter((f) => f.endsWith(ext))
        .map((f) => path.basename(f, ext))
        .sort();
    } catch {
      return [this.defaultLocale];
    }
  }

  t(key: string, substitutions: Substitutions = {}): string {
    let message = this.lookup(this.currentLocale, key);
    if (message === undefined && this.currentLocale !== this.defaultLocale) {
      message = this.lookup(this.defaultLocale, key);
    }
    if (message === undefined) return key;

    // Entries apply in insertion order to the running result, so a value
    // holding another entry's placeholder depends on that order.
    try {
      let phrase = message;
      for (const [name, value] of Object.entries(substitutions)) {
        const text = String(value);
        phrase = utils.replaceAll(phrase, `'{${name}}'`, text);
        phrase = utils.replaceAll(phrase, `"{${name}}"`, text);
        phrase = utils.replaceAll(phrase, `{${name}}`, text);
      }
      return phrase;
    } catch (error) {
      console.warn(`[I18n] Substitution failed for key "${key}":`, error);
      return message;
    }
  }

  private lookup(locale: string, key: string): string | undefined {
    const table = this.dictionaries.get(locale) ?? {};
    return leaf(nestedGet(table, key));
  }
}

function nestedGet(table: TranslationTable, key: string): TranslationValue | undefined {
  let current: TranslationValue = table;
  for (const segment of key.split('.')) {
    if (!utils.isRecord(current) || !utils.isOwnKeyOf(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function leaf(value: TranslationValue | undefined): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  // mappings, lists and null are not messages
  return undefined;
}

export default Translator;
