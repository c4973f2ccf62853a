import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLanguageInfo } from '@lingolayer/core';
import { runCommand } from '../test-helpers/run-command.js';
import { formatLanguageLine, registerLanguages } from './languages.js';

describe('languages command', () => {
  let tmpDir: string;
  let configPath: string;
  let languagesDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingolayer-languages-'));
    configPath = path.join(tmpDir, 'lingolayer.config.json');
    languagesDir = path.join(tmpDir, 'languages');
    await fs.writeFile(configPath, JSON.stringify({ rootPath: 'languages', language: 'it' }));
    await fs.mkdir(path.join(languagesDir, 'it'), { recursive: true });
    await fs.mkdir(path.join(languagesDir, 'ar'), { recursive: true });
    await fs.writeFile(
      path.join(languagesDir, 'it', 'lang.lng'),
      '[Language]\nId=it-IT\nName=Italian\nNativeName=Italiano\n'
    );
    await fs.writeFile(path.join(languagesDir, 'ar', 'lang.lng'), '[Language]\nId=ar-SA\nName=Arabic\nIsRightToLeft=1\n');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('formatLanguageLine', () => {
    it('marks the current language and shows the native name', () => {
      const entry = {
        folder: 'it',
        path: '/languages/it',
        info: createLanguageInfo({ id: 'it-IT', name: 'Italian', nativeName: 'Italiano' }),
      };
      expect(formatLanguageLine(entry, 'it')).toBe('* it-IT    Italian (Italiano)');
    });

    it('flags right-to-left languages', () => {
      const entry = {
        folder: 'ar',
        path: '/languages/ar',
        info: createLanguageInfo({ id: 'ar-SA', name: 'Arabic', nativeName: 'Arabic', isRightToLeft: true }),
      };
      expect(formatLanguageLine(entry, 'it')).toBe('  ar-SA    Arabic [rtl]');
    });

    it('drops trailing padding when there are no names', () => {
      const entry = { folder: 'xx', path: '/languages/xx', info: createLanguageInfo({ id: 'xx' }) };
      expect(formatLanguageLine(entry, 'it')).toBe('  xx');
    });
  });

  it('lists languages sorted by id', async () => {
    const result = await runCommand(registerLanguages, ['languages', '-c', configPath]);

    expect(result.stdout).toEqual([
      `Languages in ${languagesDir}:`,
      '  ar-SA    Arabic [rtl]',
      '* it-IT    Italian (Italiano)',
    ]);
  });

  it('prints the catalog as JSON', async () => {
    const result = await runCommand(registerLanguages, ['languages', '-c', configPath, '--json']);
    const entries: Array<{ folder: string }> = JSON.parse(result.stdout[0]);

    expect(entries.map((entry) => entry.folder)).toEqual(['ar', 'it']);
  });

  it('reports an empty languages folder', async () => {
    await fs.writeFile(configPath, JSON.stringify({ rootPath: 'empty', language: 'it' }));

    const result = await runCommand(registerLanguages, ['languages', '-c', configPath]);

    expect(result.stdout).toEqual([`No languages found in ${path.join(tmpDir, 'empty')}`]);
  });
});
