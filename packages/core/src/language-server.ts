import fs from 'fs';
import path from 'path';
import type { LanguageEngine, PersistenceFormat } from './engine.js';
import { EngineRegistry, defaultEngineRegistry } from './engine-registry.js';
import { ConfigurationError, ERROR_MESSAGES } from './errors.js';
import { hashKey } from './key-encoder.js';
import { EMPTY_LANGUAGE_INFO, LanguageInfo } from './language-info.js';
import { Logger, defaultLogger } from './logger.js';
import { TranslationStore } from './translation-store.js';

/** Base name of the shared runtime strings file inside a language folder. */
export const RUNTIME_STRINGS_FILE = 'runtime';
/** Base name of the language metadata file inside a language folder. */
export const LANGUAGE_INFO_FILE = 'lang';

export interface LanguageSettings {
  language: string;
  rootPath: string;
  format: PersistenceFormat;
}

/**
 * What the server needs from a registered coordinator.
 */
export interface LanguageClient {
  synchronize(settings: LanguageSettings): void;
  setLanguageInfo(info: LanguageInfo): void;
  /** Called when the server is disposed while the client is still registered. */
  detach?(): void;
}

export type LanguageChangedListener = (info: LanguageInfo, settings: LanguageSettings) => void;

export interface LanguageServerOptions {
  language?: string;
  rootPath?: string;
  format?: PersistenceFormat;
  createIfMissing?: boolean;
  registry?: EngineRegistry;
  logger?: Logger;
}

/**
 * Shared language state for every coordinator of an application: the current
 * language, the languages folder, the runtime strings common to all
 * containers and the metadata of the active language.
 *
 * Changing any setting runs one update: the runtime strings are reloaded,
 * every client is synchronized, the language metadata is reloaded and pushed
 * to the clients, then `onLanguageChanged` listeners run.
 */
export class LanguageServer {
  private readonly registry: EngineRegistry;
  private readonly logger: Logger;
  private readonly createIfMissing: boolean;
  private readonly clients = new Set<LanguageClient>();
  private readonly listeners = new Set<LanguageChangedListener>();
  private readonly store = new TranslationStore();
  private engine: LanguageEngine;
  private currentLanguage: string;
  private currentRootPath: string;
  private currentFormat: PersistenceFormat;
  private info: LanguageInfo = EMPTY_LANGUAGE_INFO;

  constructor(options: LanguageServerOptions = {}) {
    this.registry = options.registry ?? defaultEngineRegistry;
    this.logger = options.logger ?? defaultLogger;
    this.createIfMissing = options.createIfMissing ?? false;
    this.currentLanguage = options.language ?? '';
    this.currentRootPath = options.rootPath ?? '';
    this.currentFormat = options.format ?? 'ini';
    this.engine = this.createEngine(this.currentFormat);
    this.update();
  }

  get language(): string {
    return this.currentLanguage;
  }

  set language(value: string) {
    if (!value) {
      throw new ConfigurationError('empty-language', ERROR_MESSAGES.emptyLanguage);
    }
    if (value === this.currentLanguage) {
      return;
    }
    this.currentLanguage = value;
    this.update();
  }

  get rootPath(): string {
    return this.currentRootPath;
  }

  set rootPath(value: string) {
    if (value === this.currentRootPath) {
      return;
    }
    this.currentRootPath = value;
    this.update();
  }

  get format(): PersistenceFormat {
    return this.currentFormat;
  }

  set format(value: PersistenceFormat) {
    if (value === this.currentFormat) {
      return;
    }
    this.engine = this.createEngine(value);
    this.currentFormat = value;
    this.update();
  }

  get languageInfo(): LanguageInfo {
    return this.info;
  }

  get settings(): LanguageSettings {
    return { language: this.currentLanguage, rootPath: this.currentRootPath, format: this.currentFormat };
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Folder of the current language, or undefined until both language and root are set. */
  get languageFolder(): string | undefined {
    if (!this.currentLanguage || !this.currentRootPath) {
      return undefined;
    }
    return path.join(this.currentRootPath, this.currentLanguage);
  }

  get runtimeStringsPath(): string | undefined {
    const folder = this.languageFolder;
    return folder ? path.join(folder, `${RUNTIME_STRINGS_FILE}${this.engine.extension}`) : undefined;
  }

  get languageInfoPath(): string | undefined {
    const folder = this.languageFolder;
    return folder ? path.join(folder, `${LANGUAGE_INFO_FILE}${this.engine.extension}`) : undefined;
  }

  /**
   * True when language and root are set and the language folder exists.
   */
  canSync(): boolean {
    const folder = this.languageFolder;
    if (!folder) {
      return false;
    }
    return fs.existsSync(folder) && fs.statSync(folder).isDirectory();
  }

  /**
   * Adds a client and synchronizes it right away when the server can sync.
   * Registering twice is a no-op.
   */
  registerClient(client: LanguageClient): void {
    if (this.clients.has(client)) {
      return;
    }
    this.clients.add(client);
    if (this.canSync()) {
      client.synchronize(this.settings);
      client.setLanguageInfo(this.info);
    }
  }

  unregisterClient(client: LanguageClient): void {
    this.clients.delete(client);
  }

  onLanguageChanged(listener: LanguageChangedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Looks `text` up in the shared runtime strings. Returns `text` itself when
   * no translation is known.
   */
  translate(text: string): string {
    if (!text) {
      return '';
    }
    return this.store.get(text) ?? text;
  }

  /**
   * Stores a runtime translation in memory and in the runtime strings file of
   * the current language.
   */
  addRuntimeString(original: string, translation: string): void {
    const filePath = this.runtimeStringsPath;
    if (!filePath) {
      throw new ConfigurationError('no-file', ERROR_MESSAGES.noFileSelected);
    }
    const outcome = this.engine.saveRuntimeStrings(filePath, [[hashKey(original), translation]]);
    if (!outcome.ok) {
      throw outcome.error;
    }
    this.store.set(original, translation);
  }

  /**
   * Runs the update sequence when the server can sync; otherwise does nothing.
   */
  update(): void {
    if (!this.canSync()) {
      this.logger.debug(`Language folder not available: ${this.languageFolder ?? '(unset)'}`);
      return;
    }

    this.importRuntimeStrings();
    const clients = Array.from(this.clients);
    const settings = this.settings;
    for (const client of clients) {
      client.synchronize(settings);
    }
    this.importLanguageInfo();
    for (const client of clients) {
      client.setLanguageInfo(this.info);
    }
    for (const listener of Array.from(this.listeners)) {
      listener(this.info, settings);
    }
  }

  dispose(): void {
    const clients = Array.from(this.clients);
    this.clients.clear();
    for (const client of clients) {
      client.detach?.();
    }
    this.listeners.clear();
    this.store.clear();
  }

  private createEngine(format: PersistenceFormat): LanguageEngine {
    return this.registry.create(format, { createIfMissing: this.createIfMissing, logger: this.logger });
  }

  private importRuntimeStrings(): void {
    const filePath = this.runtimeStringsPath;
    const staging = new TranslationStore();
    if (filePath) {
      const outcome = this.engine.load(undefined, filePath, staging);
      if (!outcome.ok) {
        this.logger.debug(outcome.error.message);
      }
    }
    this.store.assign(staging);
  }

  private importLanguageInfo(): void {
    const filePath = this.languageInfoPath;
    this.info = filePath && fs.existsSync(filePath) ? this.engine.readLanguageInfo(filePath) : EMPTY_LANGUAGE_INFO;
  }
}
