/**
 * Default configuration values for lingolayer
 */

import type { PersistenceFormat } from '../engine.js';

export const DEFAULT_ROOT_PATH = 'languages';
export const DEFAULT_LANGUAGE = 'en';
export const DEFAULT_FORMAT: PersistenceFormat = 'ini';
export const DEFAULT_CREATE_IF_MISSING = false;
export const DEFAULT_EXCLUDE_ON_ACTION = true;
export const DEFAULT_CONFIG_FILENAME = 'lingolayer.config.json';
