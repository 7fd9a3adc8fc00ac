/**
 * asterism
 *
 * A hierarchical outline language: nesting is written with marker groups
 * (`*`, `**`, `***`) and every node gets a structural id (`*1**2`).
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './document/index.js';
export * from './parser/index.js';
export * from './render/index.js';
export * from './navigator/index.js';
export {
  ConfigParseError,
  DEFAULT_CONFIG,
  EnvCoercionError,
  applyEnvOverrides,
  getDefaultConfig,
  parseConfig,
} from './config/index.js';
export type { Config } from './config/index.js';
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
