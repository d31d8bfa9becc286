import * as fs from 'fs';
import * as path from 'path';
import { readers } from '../library/readers';
import { utils } from '../library/utils';
import type { TableFormat, TranslatorOptions } from '../interfaces/i18n';

export class SettingsError extends Error {
  public file: string | undefined;
  constructor(message: string, file?: string) {
    super(message);
    this.name = 'SettingsError';
    this.file = file;
    Object.setPrototypeOf(this, SettingsError.prototype);
  }
}

export interface ResolvedSettings extends TranslatorOptions {
  translationsDir: string;
  defaultLocale: string;
  format: TableFormat;
  debug: boolean;
}

export interface ResolveArgs {
  file?: string;
  env?: Record<string, string | undefined>;
}

const DEFAULTS: ResolvedSettings = {
  translationsDir: 'locales',
  defaultLocale: 'en',
  format: 'yml',
  debug: false,
};

function storePath(file?: string): string {
  return path.resolve(file ?? 'i18n.settings.json');
}

function asFormat(value: string, file?: string): TableFormat {
  const format = readers.formats.find((f) => f === value);
  if (!format) {
    throw new SettingsError(`Unsupported translation format "${value}" (expected ${readers.formats.join(' or ')})`, file);
  }
  return format;
}

function readStore(file: string): Partial<ResolvedSettings> {
  // no settings file is the same as an empty one
  if (!fs.existsSync(file)) return {};

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Cannot read settings: ${reason}`, file);
  }
  if (!utils.isRecord(data)) {
    throw new SettingsError('Settings must be a JSON object', file);
  }

  const out: Partial<ResolvedSettings> = {};
  try {
    if ('translationsDir' in data) {
      utils.expectType(data, 'translationsDir', 'string');
      out.translationsDir = data.translationsDir;
    }
    if ('defaultLocale' in data) {
      utils.expectType(data, 'defaultLocale', 'string');
      out.defaultLocale = data.defaultLocale;
    }
    if ('format' in data) {
      utils.expectType(data, 'format', 'string');
      out.format = asFormat(data.format, file);
    }
    if ('debug' in data) {
      utils.expectType(data, 'debug', 'boolean');
      out.debug = data.debug;
    }
  } catch (error) {
    if (error instanceof SettingsError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(reason, file);
  }
  return out;
}

function readEnv(env: Record<string, string | undefined>): Partial<ResolvedSettings> {
  const out: Partial<ResolvedSettings> = {};
  if (env.I18N_DIR) out.translationsDir = env.I18N_DIR;
  if (env.I18N_DEFAULT_LOCALE) out.defaultLocale = env.I18N_DEFAULT_LOCALE;
  if (env.I18N_FORMAT) out.format = asFormat(env.I18N_FORMAT);
  if (utils.notNil(env.I18N_DEBUG)) out.debug = utils.isTrue(env.I18N_DEBUG);
  return out;
}

export const settings = {
  defaults: DEFAULTS,

  // defaults < settings file < environment
  resolve(args: ResolveArgs = {}): ResolvedSettings {
    return {
      ...DEFAULTS,
      ...readStore(storePath(args.file)),
      ...readEnv(args.env ?? process.env),
    };
  },
};

export default settings;
