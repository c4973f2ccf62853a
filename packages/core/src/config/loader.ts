/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { LingoConfig, LoadConfigResult, RawLingoConfig } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';
import { isPlainRecord } from '../language-info.js';
import { ConfigurationError } from '../errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Search upward through directories for a file.
 */
async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10;

  for (let depth = 0; depth < maxDepth; depth++) {
    const filePath = path.join(currentDir, filename);
    if (await exists(filePath)) {
      return filePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

async function readConfigFile(resolvedPath: string): Promise<RawLingoConfig> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new Error(`Config file not found at ${resolvedPath}.`);
    }
    throw new Error(`Unable to read config file at ${resolvedPath}: ${err.message}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContents);
  } catch (error) {
    throw new ConfigurationError(
      'invalid-config',
      `Config file at ${resolvedPath} contains invalid JSON: ${(error as Error).message}`,
      error
    );
  }

  if (!isPlainRecord(parsed)) {
    throw new ConfigurationError('invalid-config', `Config file at ${resolvedPath} must contain a JSON object.`);
  }
  return parsed;
}

function finalize(raw: RawLingoConfig, projectRoot: string): LingoConfig {
  const config = normalizeConfig(raw);
  assertConfigValid(config);
  return { ...config, rootPath: path.resolve(projectRoot, config.rootPath) };
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Fall back to defaults rooted at `cwd` when no config file is found. */
  allowMissing?: boolean;
}

/**
 * Load config file with upward directory traversal.
 * @param configPath - Path to config file (relative or absolute)
 * @returns Config object and metadata about where it was found
 */
export async function loadConfigWithMeta(
  configPath = DEFAULT_CONFIG_FILENAME,
  options: LoadConfigOptions = {}
): Promise<LoadConfigResult> {
  const cwd = options.cwd ?? process.cwd();
  let resolvedPath: string | null;

  if (path.isAbsolute(configPath)) {
    resolvedPath = configPath;
  } else {
    const cwdPath = path.resolve(cwd, configPath);
    if (await exists(cwdPath)) {
      resolvedPath = cwdPath;
    } else if (!configPath.includes(path.sep) || configPath === DEFAULT_CONFIG_FILENAME) {
      resolvedPath = await findUp(configPath, cwd);
    } else {
      resolvedPath = null;
    }
    if (!resolvedPath && !options.allowMissing) {
      resolvedPath = cwdPath;
    }
  }

  if (!resolvedPath) {
    return { config: finalize({}, cwd), projectRoot: cwd };
  }

  const rawConfig = await readConfigFile(resolvedPath);
  const projectRoot = path.dirname(resolvedPath);

  return {
    config: finalize(rawConfig, projectRoot),
    configPath: resolvedPath,
    projectRoot,
  };
}
