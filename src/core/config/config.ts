import type { LogFormat, LogLevel } from '../logging';

/**
 * Library-wide defaults.
 */
export interface ScrublineConfig {
  /** Field delimiter for CSV files without a `.tsv` extension (default: ',') */
  delimiter: string;

  /** Quote character for CSV fields (default: '"') */
  quote: string;

  /** String that reads as `null` and is written for `null` (default: none) */
  nullToken: string | null;

  /** Bytes read from a file per chunk (default: 64KB) */
  readChunkBytes: number;

  /** Bytes buffered by a CSV writer before flushing (default: 64KB) */
  writeBufferBytes: number;

  /** Rows returned by `head()` without an argument (default: 10) */
  headRows: number;

  /** Minimum level of the default console logger (default: 'warn') */
  logLevel: LogLevel;

  /** Output format of the default console logger (default: 'pretty') */
  logFormat: LogFormat;
}

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: ScrublineConfig = {
  delimiter: ',',
  quote: '"',
  nullToken: null,
  readChunkBytes: 64 * 1024,
  writeBufferBytes: 64 * 1024,
  headRows: 10,
  logLevel: 'warn',
  logFormat: 'pretty',
};

/** Current global configuration */
let currentConfig: ScrublineConfig = { ...DEFAULT_CONFIG };

/**
 * Configure global defaults.
 *
 * @example
 * ```ts
 * import { configure } from 'scrubline';
 *
 * // Read empty cells as null everywhere
 * configure({ nullToken: '' });
 *
 * // Show pipeline run statistics
 * configure({ logLevel: 'debug' });
 * ```
 */
export function configure(options: Partial<ScrublineConfig>): void {
  currentConfig = { ...currentConfig, ...options };
}

/**
 * Get current configuration.
 */
export function getConfig(): Readonly<ScrublineConfig> {
  return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<ScrublineConfig> {
  return DEFAULT_CONFIG;
}
