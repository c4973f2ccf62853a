import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Container } from './container.js';
import { EngineRegistry } from './engine-registry.js';
import { IniEngine } from './engines/ini-engine.js';
import { ConfigurationError, DomainError } from './errors.js';
import { LanguageCoordinator, type LanguageCoordinatorOptions } from './language-coordinator.js';
import { LanguageServer } from './language-server.js';
import { silentLogger } from './logger.js';
import { IniDocument } from './utils/ini-document.js';
import { Form, buildMainForm, createFormRegistry } from './test-helpers/forms.js';

async function writeLanguage(root: string, language: string, files: Record<string, string>): Promise<void> {
  const folder = path.join(root, language);
  await fs.mkdir(folder, { recursive: true });
  for (const [name, contents] of Object.entries(files)) {
    await fs.writeFile(path.join(folder, name), contents);
  }
}

class FlakyIniEngine extends IniEngine {
  static instances = 0;

  constructor() {
    super();
    FlakyIniEngine.instances += 1;
    if (FlakyIniEngine.instances > 1) {
      throw new Error('engine failed to start');
    }
  }
}

describe('LanguageCoordinator', () => {
  let tempDir: string;
  const attributes = createFormRegistry();

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingolayer-coordinator-'));
    await writeLanguage(tempDir, 'it', {
      'Form1.lng': '[Strings]\nOpen=Apri\n\n[Form1.Button1]\nCaption=Conferma\n',
      'runtime.lng': '[Strings]\n7DFAB256=Salvato\nOpen=Apri (condiviso)\n',
      'lang.lng': '[Language]\nId=it-IT\nName=Italian\n',
    });
    await writeLanguage(tempDir, 'de', {
      'Form1.lng': '[Form1.Button1]\nCaption=Bestätigen\n',
      'lang.lng': '[Language]\nId=de-DE\nName=German\n',
    });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const createCoordinator = (options: LanguageCoordinatorOptions = {}) =>
    new LanguageCoordinator({ attributes, logger: silentLogger, ...options });

  describe('file path', () => {
    it('derives the file from root, language and container name', () => {
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'it' });

      expect(coordinator.filePath).toBe(path.join(tempDir, 'it', 'Form1.lng'));
      expect(coordinator.format).toBe('ini');
      expect(coordinator.excludeOnAction).toBe(true);
      expect(button.caption).toBe('OK');

      coordinator.load();
      expect(button.caption).toBe('Conferma');
    });

    it('reloads when the language changes', () => {
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'it' });

      coordinator.language = 'de';

      expect(coordinator.filePath).toBe(path.join(tempDir, 'de', 'Form1.lng'));
      expect(button.caption).toBe('Bestätigen');
    });

    it('derives language and root from an explicit file path', () => {
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form });

      coordinator.filePath = path.join(tempDir, 'de', 'Form1.lng');

      expect(coordinator.language).toBe('de');
      expect(coordinator.rootPath).toBe(tempDir);
      expect(button.caption).toBe('Bestätigen');
    });

    it('keeps an explicit file path across format and container changes', () => {
      const { form } = buildMainForm();
      const coordinator = createCoordinator({ container: form });
      const custom = path.join(tempDir, 'de', 'Custom.lng');

      coordinator.filePath = custom;
      coordinator.format = 'ini-flat';
      coordinator.container = buildMainForm().form;

      expect(coordinator.filePath).toBe(custom);
    });

    it('drops an explicit file path once the language changes', () => {
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form });
      coordinator.filePath = path.join(tempDir, 'de', 'Custom.lng');

      coordinator.language = 'it';

      expect(coordinator.filePath).toBe(path.join(tempDir, 'it', 'Form1.lng'));
      expect(button.caption).toBe('Conferma');
    });

    it('does not reload when clearing the root leaves no path to build', () => {
      const afterLoad = vi.fn();
      const { form } = buildMainForm();
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'it', hooks: { afterLoad } });
      coordinator.load();
      expect(afterLoad).toHaveBeenCalledTimes(1);

      coordinator.rootPath = '';

      expect(afterLoad).toHaveBeenCalledTimes(1);
    });

    it('switches extension when the format changes', () => {
      const onError = vi.fn();
      const { form } = buildMainForm();
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'it', hooks: { onError } });

      coordinator.format = 'json';

      const expected = path.join(tempDir, 'it', 'Form1.json');
      expect(coordinator.filePath).toBe(expected);
      expect(onError).toHaveBeenCalledWith(`Language file not found: ${expected}`, expect.any(DomainError));
    });

    it('rejects an empty language', () => {
      const coordinator = createCoordinator({ container: buildMainForm().form, rootPath: tempDir, language: 'it' });
      let caught: unknown;
      try {
        coordinator.language = '';
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({ code: 'empty-language' });
    });

    it('rejects a format without a registered engine', () => {
      const registry = new EngineRegistry();
      registry.register('ini', IniEngine);
      const coordinator = createCoordinator({ registry });

      expect(() => {
        coordinator.format = 'json';
      }).toThrow('No language engine registered for format "json".');
      expect(coordinator.format).toBe('ini');
    });
  });

  describe('load and save', () => {
    it('passes the container and file being processed to the hooks', () => {
      const calls: string[] = [];
      const record = (event: string) => (_coordinator: LanguageCoordinator, container: Container, filePath: string) => {
        calls.push(`${event}:${container.name}:${path.relative(tempDir, filePath)}`);
      };
      const { form } = buildMainForm();
      const other = new Form('Form2');
      const coordinator = createCoordinator({
        container: form,
        rootPath: tempDir,
        language: 'it',
        hooks: {
          beforeLoad: record('beforeLoad'),
          afterLoad: record('afterLoad'),
          beforeSave: record('beforeSave'),
          afterSave: record('afterSave'),
        },
      });
      const target = path.join(tempDir, 'de', 'Form2.lng');

      coordinator.save(other, target);
      coordinator.load(other, target);

      expect(calls).toEqual([
        `beforeSave:Form2:${path.join('de', 'Form2.lng')}`,
        `afterSave:Form2:${path.join('de', 'Form2.lng')}`,
        `beforeLoad:Form2:${path.join('de', 'Form2.lng')}`,
        `afterLoad:Form2:${path.join('de', 'Form2.lng')}`,
      ]);
    });

    it('exits silently when no file is known', () => {
      const beforeLoad = vi.fn();
      const coordinator = createCoordinator({ container: buildMainForm().form, hooks: { beforeLoad } });

      coordinator.load();

      expect(beforeLoad).not.toHaveBeenCalled();
    });

    it('cancels a load when beforeLoad returns false', () => {
      const afterLoad = vi.fn();
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({
        container: form,
        rootPath: tempDir,
        language: 'it',
        hooks: { beforeLoad: () => false, afterLoad },
      });

      coordinator.load();

      expect(button.caption).toBe('OK');
      expect(afterLoad).not.toHaveBeenCalled();
    });

    it('runs the hooks around a load', () => {
      const calls: string[] = [];
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({
        container: form,
        rootPath: tempDir,
        language: 'it',
        hooks: {
          beforeLoad: () => {
            calls.push(`before:${button.caption}`);
          },
          afterLoad: () => {
            calls.push(`after:${button.caption}`);
          },
        },
      });

      coordinator.load();

      expect(calls).toEqual(['before:OK', 'after:Conferma']);
    });

    it('reports a missing file through onError without calling afterLoad', () => {
      const onError = vi.fn();
      const afterLoad = vi.fn();
      const coordinator = createCoordinator({
        container: buildMainForm().form,
        rootPath: tempDir,
        language: 'fr',
        hooks: { onError, afterLoad },
      });

      expect(() => coordinator.load()).not.toThrow();

      expect(onError).toHaveBeenCalledTimes(1);
      const [, error] = onError.mock.calls[0];
      expect(error).toMatchObject({ kind: 'domain', code: 'missing-file' });
      expect(afterLoad).not.toHaveBeenCalled();
    });

    it('reports an engine that fails to start as a domain error', () => {
      FlakyIniEngine.instances = 0;
      const registry = new EngineRegistry();
      registry.register('ini', FlakyIniEngine);
      const onError = vi.fn();
      const coordinator = createCoordinator({
        registry,
        container: buildMainForm().form,
        rootPath: tempDir,
        language: 'it',
        hooks: { onError },
      });

      coordinator.load();

      expect(onError).toHaveBeenCalledWith(
        'The language engine for format "ini" could not be created.',
        expect.objectContaining({ code: 'engine-unavailable' })
      );
    });

    it('creates the language file on load when createIfMissing is set', async () => {
      const { form } = buildMainForm();
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'es', createIfMissing: true });

      coordinator.load();

      const document = IniDocument.load(path.join(tempDir, 'es', 'Form1.lng'));
      expect(document.read('Form1.Button1', 'Caption')).toBe('OK');
    });

    it('raises a configuration error when saving without a file', () => {
      const coordinator = createCoordinator({ container: buildMainForm().form });
      expect(() => coordinator.save()).toThrow(ConfigurationError);
      expect(() => coordinator.save()).toThrow('No language file selected.');
    });

    it('saves the container and runs the save hooks', () => {
      const afterSave = vi.fn();
      const { form, button } = buildMainForm();
      button.caption = 'Confirm';
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'de', hooks: { afterSave } });

      coordinator.save();

      expect(IniDocument.load(coordinator.filePath).read('Form1.Button1', 'Caption')).toBe('Confirm');
      expect(afterSave).toHaveBeenCalledWith(coordinator, form, coordinator.filePath);
    });

    it('cancels a save when beforeSave returns false', () => {
      const { form, button } = buildMainForm();
      button.caption = 'Confirm';
      const coordinator = createCoordinator({
        container: form,
        rootPath: tempDir,
        language: 'de',
        hooks: { beforeSave: () => false },
      });

      coordinator.save();

      expect(IniDocument.load(coordinator.filePath).read('Form1.Button1', 'Caption')).toBe('Bestätigen');
    });

    it('keeps action-owned attributes unless excludeOnAction is turned off', () => {
      const { form, button } = buildMainForm();
      button.action = { id: 'confirm' };
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'it' });

      coordinator.load();
      expect(button.caption).toBe('OK');

      coordinator.excludeOnAction = false;
      coordinator.load();
      expect(button.caption).toBe('Conferma');
    });

    it('pushes exclusion lists to the engine', () => {
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form, rootPath: tempDir, language: 'it' });
      coordinator.load();
      button.caption = 'OK';

      coordinator.excludeAttributes = ['Caption'];
      coordinator.load();

      expect(coordinator.excludeAttributes).toEqual(['Caption']);
      expect(button.caption).toBe('OK');
    });
  });

  describe('translation fallback', () => {
    it('prefers its own strings and falls back to the server', () => {
      const server = new LanguageServer({ rootPath: tempDir, language: 'it', logger: silentLogger });
      const coordinator = createCoordinator({ container: buildMainForm().form, server });

      expect(coordinator.translate('Open')).toBe('Apri');
      expect(coordinator.translate('Saved')).toBe('Salvato');
      expect(coordinator.translate('Unknown')).toBe('Unknown');
    });

    it('returns the text itself without a server', () => {
      const coordinator = createCoordinator();
      expect(coordinator.translate('Saved')).toBe('Saved');
    });

    it('stops falling back once disposed', () => {
      const server = new LanguageServer({ rootPath: tempDir, language: 'it', logger: silentLogger });
      const coordinator = createCoordinator({ container: buildMainForm().form, server });

      coordinator.dispose();

      expect(server.clientCount).toBe(0);
      expect(coordinator.translate('Saved')).toBe('Saved');
    });
  });

  describe('server synchronization', () => {
    it('follows the server language and reloads once per change', () => {
      const server = new LanguageServer({ rootPath: tempDir, language: 'it', logger: silentLogger });
      const afterLoad = vi.fn();
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form, server, hooks: { afterLoad } });

      expect(coordinator.language).toBe('it');
      expect(button.caption).toBe('Conferma');
      expect(coordinator.languageInfo.id).toBe('it-IT');
      expect(afterLoad).toHaveBeenCalledTimes(1);

      server.language = 'de';

      expect(button.caption).toBe('Bestätigen');
      expect(coordinator.languageInfo.id).toBe('de-DE');
      expect(afterLoad).toHaveBeenCalledTimes(2);
    });

    it('does not register when registerOnStart is false', () => {
      const server = new LanguageServer({ rootPath: tempDir, language: 'it', logger: silentLogger });
      const { form, button } = buildMainForm();
      const coordinator = createCoordinator({ container: form, server, registerOnStart: false });

      expect(server.clientCount).toBe(0);
      expect(button.caption).toBe('OK');

      coordinator.register();
      expect(button.caption).toBe('Conferma');
    });

    it('reports a server format it has no engine for and keeps its own', () => {
      const server = new LanguageServer({ rootPath: tempDir, language: 'it', logger: silentLogger });
      const registry = new EngineRegistry();
      registry.register('ini', IniEngine);
      const onError = vi.fn();
      const coordinator = createCoordinator({ container: buildMainForm().form, server, registry, hooks: { onError } });

      server.format = 'json';

      expect(coordinator.format).toBe('ini');
      expect(onError).toHaveBeenCalledWith(
        'The language engine for format "json" could not be created.',
        expect.objectContaining({ code: 'engine-unavailable' })
      );
    });

    it('is detached when the server is disposed', () => {
      const server = new LanguageServer({ rootPath: tempDir, language: 'it', logger: silentLogger });
      const coordinator = createCoordinator({ container: buildMainForm().form, server });

      server.dispose();

      expect(coordinator.translate('Saved')).toBe('Saved');
    });
  });
});
