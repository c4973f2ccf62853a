import type { LanguageCoordinatorOptions } from '../language-coordinator.js';
import { LanguageServer, type LanguageServerOptions } from '../language-server.js';
import type { LingoConfig } from './types.js';

/**
 * Server settings of a loaded config. `overrides` win over the config.
 */
export function serverOptionsFromConfig(
  config: LingoConfig,
  overrides: LanguageServerOptions = {}
): LanguageServerOptions {
  return {
    rootPath: config.rootPath,
    language: config.language,
    format: config.format,
    createIfMissing: config.createIfMissing,
    ...overrides,
  };
}

export function coordinatorOptionsFromConfig(
  config: LingoConfig,
  overrides: LanguageCoordinatorOptions = {}
): LanguageCoordinatorOptions {
  return {
    rootPath: config.rootPath,
    language: config.language,
    format: config.format,
    createIfMissing: config.createIfMissing,
    excludeOnAction: config.excludeOnAction,
    excludeTypes: config.excludeTypes,
    excludeAttributes: config.excludeAttributes,
    ...overrides,
  };
}

export function createLanguageServer(config: LingoConfig, overrides: LanguageServerOptions = {}): LanguageServer {
  return new LanguageServer(serverOptionsFromConfig(config, overrides));
}
