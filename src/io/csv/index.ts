export { CsvFile } from './file';
export { CsvWriter } from './writer';
export { CsvParser, escapeField } from './parser';
export type { CsvRecord } from './parser';
export { defaultDelimiter, resolveCsvOptions, resolveCsvWriteOptions } from './options';
export type { CsvOptions, CsvWriteOptions, ResolvedCsvOptions, ResolvedCsvWriteOptions } from './options';
