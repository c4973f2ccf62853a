import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import type { PersistenceFormat } from './engine.js';
import { EngineRegistry, defaultEngineRegistry } from './engine-registry.js';
import { ConfigurationError, ERROR_MESSAGES } from './errors.js';
import { EMPTY_LANGUAGE_INFO, LanguageInfo, createLanguageInfo } from './language-info.js';
import { LANGUAGE_INFO_FILE } from './language-server.js';

export interface LanguageCatalogEntry {
  /** Folder name under the languages root; what coordinators use as language. */
  folder: string;
  /** Absolute path of the language folder. */
  path: string;
  info: LanguageInfo;
}

export interface LanguageCatalogOptions {
  registry?: EngineRegistry;
}

function extensionFor(registry: EngineRegistry, format: PersistenceFormat): string {
  const extension = registry.extensionOf(format);
  if (!extension) {
    throw new ConfigurationError('engine-not-registered', ERROR_MESSAGES.engineNotRegistered(format));
  }
  return extension;
}

/**
 * Reads the metadata file of one language folder. A folder without one
 * yields the empty description.
 */
export function readLanguageInfo(
  rootPath: string,
  language: string,
  format: PersistenceFormat,
  options: LanguageCatalogOptions = {}
): LanguageInfo {
  const registry = options.registry ?? defaultEngineRegistry;
  const filePath = path.join(rootPath, language, `${LANGUAGE_INFO_FILE}${extensionFor(registry, format)}`);
  if (!fs.existsSync(filePath)) {
    return EMPTY_LANGUAGE_INFO;
  }
  return registry.create(format).readLanguageInfo(filePath);
}

/**
 * Every language folder under `rootPath` that holds a metadata file for
 * `format`, sorted by language id. Folders whose metadata has no id use
 * the folder name.
 */
export async function listLanguages(
  rootPath: string,
  format: PersistenceFormat,
  options: LanguageCatalogOptions = {}
): Promise<LanguageCatalogEntry[]> {
  const registry = options.registry ?? defaultEngineRegistry;
  const extension = extensionFor(registry, format);
  const engine = registry.create(format);

  const files = await fg(`*/${LANGUAGE_INFO_FILE}${extension}`, {
    cwd: rootPath,
    absolute: true,
    onlyFiles: true,
    unique: true,
  });

  const entries = files.map((filePath) => {
    const folderPath = path.dirname(filePath);
    const folder = path.basename(folderPath);
    const info = engine.readLanguageInfo(filePath);
    return {
      folder,
      path: folderPath,
      info: info.id ? info : createLanguageInfo({ ...info, id: folder }),
    };
  });

  return entries.sort((a, b) => a.info.id.localeCompare(b.info.id));
}
