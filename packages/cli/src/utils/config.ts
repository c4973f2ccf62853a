import { loadConfigWithMeta, type LoadConfigResult } from '@lingolayer/core';

/**
 * Loads the project config. Without an explicit path a missing file is not
 * an error: defaults rooted at the working directory are used instead.
 */
export async function loadCliConfig(configPath?: string, cwd = process.cwd()): Promise<LoadConfigResult> {
  if (configPath) {
    return loadConfigWithMeta(configPath, { cwd });
  }
  return loadConfigWithMeta(undefined, { cwd, allowMissing: true });
}
