import { getConfig } from '../../core/config';
import { ConfigurationError } from '../../errors';

/**
 * CSV reading options.
 */
export interface CsvOptions {
  /** Column delimiter (default: tab for `.tsv` files, else the configured delimiter) */
  delimiter?: string;

  /** Quote character (default: '"') */
  quote?: string;

  /** Whether the first record is a header (default: true) */
  hasHeader?: boolean;

  /**
   * Column names to use. With `hasHeader` the file header is skipped and
   * replaced; without it, these name the columns of a headerless file.
   */
  header?: readonly string[];

  /** Unquoted field value read as `null`, also written for `null` */
  nullToken?: string | null;

  /** Bytes read per chunk (default: configured `readChunkBytes`) */
  chunkBytes?: number;
}

/**
 * CSV writing options.
 */
export interface CsvWriteOptions {
  /** Column delimiter (default: tab for `.tsv` files, else the configured delimiter) */
  delimiter?: string;

  /** Quote character (default: '"') */
  quote?: string;

  /** Written for `null` values (default: empty field) */
  nullToken?: string | null;

  /** Bytes buffered before a write to disk (default: configured `writeBufferBytes`) */
  bufferBytes?: number;
}

/** Resolved reading options */
export interface ResolvedCsvOptions {
  delimiter: string;
  quote: string;
  hasHeader: boolean;
  header: readonly string[] | undefined;
  nullToken: string | null;
  chunkBytes: number;
}

/** Resolved writing options */
export interface ResolvedCsvWriteOptions {
  delimiter: string;
  quote: string;
  nullToken: string | null;
  bufferBytes: number;
}

/** Tab for `.tsv` paths, the configured delimiter otherwise. */
export function defaultDelimiter(path: string): string {
  return path.toLowerCase().endsWith('.tsv') ? '\t' : getConfig().delimiter;
}

function checkChar(option: string, value: string): string {
  if (value.length !== 1 || value === '\n' || value === '\r') {
    throw new ConfigurationError(
      `${option} must be a single character other than a line break, got ${JSON.stringify(value)}`,
      `pass a one-character ${option}`,
    );
  }
  return value;
}

function checkSize(option: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${option} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveCsvOptions(path: string, options: CsvOptions = {}): ResolvedCsvOptions {
  const config = getConfig();
  const delimiter = checkChar('delimiter', options.delimiter ?? defaultDelimiter(path));
  const quote = checkChar('quote', options.quote ?? config.quote);
  if (delimiter === quote) {
    throw new ConfigurationError('delimiter and quote must differ');
  }
  return {
    delimiter,
    quote,
    hasHeader: options.hasHeader ?? true,
    header: options.header,
    nullToken: options.nullToken === undefined ? config.nullToken : options.nullToken,
    chunkBytes: checkSize('chunkBytes', options.chunkBytes ?? config.readChunkBytes),
  };
}

export function resolveCsvWriteOptions(path: string, options: CsvWriteOptions = {}): ResolvedCsvWriteOptions {
  const config = getConfig();
  const delimiter = checkChar('delimiter', options.delimiter ?? defaultDelimiter(path));
  const quote = checkChar('quote', options.quote ?? config.quote);
  if (delimiter === quote) {
    throw new ConfigurationError('delimiter and quote must differ');
  }
  return {
    delimiter,
    quote,
    nullToken: options.nullToken === undefined ? config.nullToken : options.nullToken,
    bufferBytes: checkSize('bufferBytes', options.bufferBytes ?? config.writeBufferBytes),
  };
}
