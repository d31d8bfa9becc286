import { Translator } from './i18n';
import { settings } from './modules/settings';
import type { ResolveArgs } from './modules/settings';

export { Translator, LoadError } from './i18n';
export { settings, SettingsError } from './modules/settings';
export { readers } from './library/readers';
export type { ResolveArgs, ResolvedSettings } from './modules/settings';
export type {
    I18N,
    FileReader,
    Substitutions,
    TableFormat,
    TranslationTable,
    TranslationValue,
    TranslatorOptions,
} from './interfaces/i18n';

// Builds a Translator from i18n.settings.json and I18N_* environment variables
export function createTranslator(args: ResolveArgs = {}): Translator {
    const { translationsDir, defaultLocale, ...options } = settings.resolve(args);
    return new Translator(translationsDir, defaultLocale, options);
}

export default createTranslator;
