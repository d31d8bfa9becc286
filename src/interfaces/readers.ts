
import type { FileReader, TableFormat, TranslationTable } from './i18n';

export interface Readers {
    // text in, table out; throws on syntax errors or a non-mapping document
    yml: (text: string) => TranslationTable;
    json: (text: string) => TranslationTable;
    parse: (format: TableFormat, text: string) => TranslationTable;
    toTable: (parsed: unknown) => TranslationTable;
    readUtf8: FileReader;
    formats: readonly TableFormat[];
}
