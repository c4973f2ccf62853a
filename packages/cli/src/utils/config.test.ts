import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadCliConfig } from './config.js';

describe('loadCliConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingolayer-cli-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('uses defaults rooted at the working directory when no config exists', async () => {
    const { config, configPath } = await loadCliConfig(undefined, tmpDir);

    expect(configPath).toBeUndefined();
    expect(config.rootPath).toBe(path.join(tmpDir, 'languages'));
    expect(config.format).toBe('ini');
  });

  it('loads the config file found in the working directory', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'lingolayer.config.json'),
      JSON.stringify({ rootPath: 'i18n', format: 'ini-flat', excludeTypes: 'Memo' })
    );

    const { config } = await loadCliConfig(undefined, tmpDir);

    expect(config.rootPath).toBe(path.join(tmpDir, 'i18n'));
    expect(config.format).toBe('ini-flat');
    expect(config.excludeTypes).toEqual(['Memo']);
  });

  it('requires an explicitly named config file to exist', async () => {
    await expect(loadCliConfig('missing.json', tmpDir)).rejects.toThrow(
      `Config file not found at ${path.join(tmpDir, 'missing.json')}.`
    );
  });
});
