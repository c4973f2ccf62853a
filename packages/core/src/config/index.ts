/**
 * Configuration module for lingolayer
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type { LingoConfig, LoadConfigResult, RawLingoConfig } from './types.js';

export {
  DEFAULT_ROOT_PATH,
  DEFAULT_LANGUAGE,
  DEFAULT_FORMAT,
  DEFAULT_CREATE_IF_MISSING,
  DEFAULT_EXCLUDE_ON_ACTION,
  DEFAULT_CONFIG_FILENAME,
} from './defaults.js';

export {
  ensureStringArray,
  ensureUniqueStrings,
  normalizeString,
  normalizeBoolean,
  normalizeFormat,
  normalizeConfig,
} from './normalizer.js';
export type { NormalizedConfig } from './normalizer.js';

export {
  validateConfig,
  assertConfigValid,
  isSafeLanguageFolder,
} from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { loadConfigWithMeta } from './loader.js';
export type { LoadConfigOptions } from './loader.js';

export { serverOptionsFromConfig, coordinatorOptionsFromConfig, createLanguageServer } from './runtime.js';
