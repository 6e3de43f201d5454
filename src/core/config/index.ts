/**
 * Global configuration module.
 */

export { configure, getConfig, resetConfig, getDefaultConfig } from './config';
export type { ScrublineConfig } from './config';
